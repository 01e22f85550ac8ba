/**
 * Connection Pool
 *
 * Owns live connections keyed by (service type, connection id) and is the
 * single source of connection lifecycle events.
 */

import type { Connection, ConnectionRef, Unsubscribe } from "../connection/connection.types";
import { ConnectionError, ProviderNotFoundError, toError } from "../errors";
import { KeyedLock } from "../lock";
import { componentLogger, type Logger } from "../logger";
import {
	type ConnectionEvent,
	type ConnectionEventType,
	type ConnectionObserver,
	createConnectionEvent,
} from "../observer/observer.types";
import { ProviderRegistry } from "../provider/provider-registry";
import type { ConnectionProvider } from "../provider/provider.types";
import { connectionKey } from "../utils";
import type { CloseOutcome, ConnectionPoolOptions, PooledConnection, PoolEntry } from "./pool.types";

interface PoolSlot {
	connection: Connection;
	unsubscribe: Unsubscribe;
}

/**
 * Connection Pool
 *
 * @example
 * ```typescript
 * const pool = new ConnectionPool();
 * pool.registerProvider("redis", new RedisProvider({ connections: { cache: { host: "localhost" } } }));
 *
 * const { connection, created } = await pool.getConnection("redis", "cache");
 * await pool.closeAllConnections();
 * ```
 */
export class ConnectionPool {
	readonly registry: ProviderRegistry;
	readonly keyLock: KeyedLock;

	private connections = new Map<string, Map<string, PoolSlot>>();
	private observers: ConnectionObserver[] = [];
	private readonly logger: Logger;

	constructor(options: ConnectionPoolOptions = {}) {
		this.registry = options.registry ?? new ProviderRegistry();
		this.keyLock = options.keyLock ?? new KeyedLock();
		this.logger = componentLogger("connection-pool", options.logger);
	}

	// =========================================================================
	// Providers & Observers
	// =========================================================================

	registerProvider(serviceType: string, provider: ConnectionProvider): void {
		this.registry.register(serviceType, provider);
	}

	attachObserver(observer: ConnectionObserver): void {
		this.observers.push(observer);
	}

	detachObserver(observer: ConnectionObserver): boolean {
		const index = this.observers.indexOf(observer);
		if (index === -1) {
			return false;
		}
		this.observers.splice(index, 1);
		return true;
	}

	// =========================================================================
	// Connections
	// =========================================================================

	/**
	 * Return the pooled connection or create it with the registered provider.
	 * Concurrent calls for the same key share one creation.
	 *
	 * @throws ProviderNotFoundError if no provider is registered for the service type
	 * @throws whatever the provider throws
	 */
	async getConnection(serviceType: string, connectionId: string, config?: unknown): Promise<PooledConnection> {
		return this.keyLock.runExclusive(connectionKey(serviceType, connectionId), async () => {
			const existing = this.get(serviceType, connectionId);
			if (existing) {
				return { connection: existing, created: false };
			}

			const provider = this.registry.get(serviceType);
			if (!provider) {
				throw new ProviderNotFoundError(serviceType);
			}

			const connection = await provider.createConnection(connectionId, config);
			if (!connection) {
				throw new ConnectionError(
					`Provider for ${serviceType} returned no connection for ${connectionId}`,
					serviceType,
					connectionId,
				);
			}

			await this.addConnection(serviceType, connectionId, connection);
			return { connection, created: true };
		});
	}

	/**
	 * Register a live connection and emit "created".
	 * A different connection already pooled under the key is closed first.
	 * Does not take the key lock; callers creating connections hold it.
	 */
	async addConnection(serviceType: string, connectionId: string, connection: Connection): Promise<void> {
		const existing = this.get(serviceType, connectionId);
		if (existing === connection) {
			return;
		}
		if (existing) {
			this.logger.info({ serviceType, connectionId }, "Replacing pooled connection");
			const outcome = await this.release(serviceType, connectionId);
			if (outcome?.error) {
				this.logger.warn({ serviceType, connectionId, error: outcome.error }, "Replaced connection failed to close");
			}
			if (outcome?.notifyError) {
				this.logger.warn(
					{ serviceType, connectionId, error: outcome.notifyError },
					"Observer failed while handling replaced connection",
				);
			}
		}

		const unsubscribe = connection.on("error", (error) => {
			this.emit(serviceType, connectionId, "error", { error: error.message }).catch((notifyError: unknown) => {
				this.logger.error(
					{ serviceType, connectionId, error: toError(notifyError) },
					"Observer failed while handling connection error",
				);
			});
		});

		let serviceConnections = this.connections.get(serviceType);
		if (!serviceConnections) {
			serviceConnections = new Map();
			this.connections.set(serviceType, serviceConnections);
		}
		serviceConnections.set(connectionId, { connection, unsubscribe });
		this.logger.debug({ serviceType, connectionId }, "Connection added to pool");

		await this.emit(serviceType, connectionId, "created");
	}

	/**
	 * Close and remove one connection; no-op if absent.
	 * The entry is removed even when close() fails: "error" is emitted, then "closed",
	 * and the close failure is rethrown. An observer failure is rethrown after the
	 * connection is already closed and removed.
	 *
	 * @returns whether a connection was removed
	 */
	async closeConnection(serviceType: string, connectionId: string): Promise<boolean> {
		const outcome = await this.keyLock.runExclusive(connectionKey(serviceType, connectionId), () =>
			this.release(serviceType, connectionId),
		);
		if (!outcome) {
			return false;
		}
		if (outcome.error) {
			throw outcome.error;
		}
		if (outcome.notifyError) {
			throw outcome.notifyError;
		}
		return true;
	}

	/**
	 * Close every pooled connection. Failures are collected, never thrown.
	 */
	async closeAllConnections(): Promise<CloseOutcome[]> {
		const outcomes: CloseOutcome[] = [];

		for (const { serviceType, connectionId } of this.list()) {
			const outcome = await this.keyLock.runExclusive(connectionKey(serviceType, connectionId), () =>
				this.release(serviceType, connectionId),
			);
			if (outcome) {
				outcomes.push(outcome);
			}
		}

		this.logger.debug({ count: outcomes.length }, "Closed all connections");
		return outcomes;
	}

	// =========================================================================
	// Queries
	// =========================================================================

	get(serviceType: string, connectionId: string): Connection | undefined {
		return this.connections.get(serviceType)?.get(connectionId)?.connection;
	}

	has(serviceType: string, connectionId: string): boolean {
		return this.get(serviceType, connectionId) !== undefined;
	}

	/**
	 * Connection state of a pooled connection, undefined if not pooled
	 */
	getConnectionStatus(serviceType: string, connectionId: string): boolean | undefined {
		return this.get(serviceType, connectionId)?.isConnected();
	}

	list(): ConnectionRef[] {
		return this.getAllConnections().map(({ serviceType, connectionId }) => ({ serviceType, connectionId }));
	}

	/**
	 * Snapshot of all pooled connections
	 */
	getAllConnections(): PoolEntry[] {
		const entries: PoolEntry[] = [];
		for (const [serviceType, serviceConnections] of this.connections) {
			for (const [connectionId, slot] of serviceConnections) {
				entries.push({ serviceType, connectionId, connection: slot.connection });
			}
		}
		return entries;
	}

	get size(): number {
		let count = 0;
		for (const serviceConnections of this.connections.values()) {
			count += serviceConnections.size;
		}
		return count;
	}

	// =========================================================================
	// Internals
	// =========================================================================

	/**
	 * Remove, close and announce one connection; undefined if it is not pooled.
	 * "closed" is emitted whenever the entry is removed, after "error" if close() failed.
	 */
	private async release(serviceType: string, connectionId: string): Promise<CloseOutcome | undefined> {
		const serviceConnections = this.connections.get(serviceType);
		const slot = serviceConnections?.get(connectionId);
		if (!serviceConnections || !slot) {
			return undefined;
		}

		serviceConnections.delete(connectionId);
		if (serviceConnections.size === 0) {
			this.connections.delete(serviceType);
		}
		slot.unsubscribe();

		const outcome: CloseOutcome = { serviceType, connectionId, closed: true };
		const notifyErrors: (Error | undefined)[] = [];
		try {
			await slot.connection.close();
			this.logger.debug({ serviceType, connectionId }, "Connection closed");
		} catch (error) {
			const cause = toError(error);
			this.logger.error({ serviceType, connectionId, error: cause }, "Failed to close connection");
			outcome.closed = false;
			outcome.error = cause;
			notifyErrors.push(
				await this.tryEmit(serviceType, connectionId, "error", { error: cause.message, operation: "close" }),
			);
		}
		notifyErrors.push(await this.tryEmit(serviceType, connectionId, "closed"));

		const notifyError = notifyErrors.find((error) => error !== undefined);
		if (notifyError) {
			outcome.notifyError = notifyError;
		}
		return outcome;
	}

	/**
	 * Emit and hand back the observer failure instead of throwing it
	 */
	private async tryEmit(
		serviceType: string,
		connectionId: string,
		eventType: ConnectionEventType,
		details?: Record<string, unknown>,
	): Promise<Error | undefined> {
		try {
			await this.emit(serviceType, connectionId, eventType, details);
			return undefined;
		} catch (error) {
			return toError(error);
		}
	}

	private async emit(
		serviceType: string,
		connectionId: string,
		eventType: ConnectionEventType,
		details?: Record<string, unknown>,
	): Promise<void> {
		await this.notify(createConnectionEvent(serviceType, connectionId, eventType, details));
	}

	private async notify(event: ConnectionEvent): Promise<void> {
		for (const observer of [...this.observers]) {
			await observer.onConnectionEvent(event);
		}
	}
}
