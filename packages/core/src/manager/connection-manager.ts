/**
 * Connection Manager
 *
 * Thin coordinator over the pool: selects providers, fans lifecycle events
 * out to observers and turns provider failures into ConnectionResult values.
 */

import type { Connection, ConnectionRef } from "../connection/connection.types";
import { ConnectionError, ObserverNotificationError, ProviderNotFoundError, toError } from "../errors";
import { AsyncLock, type KeyedLock } from "../lock";
import { componentLogger, type Logger } from "../logger";
import type { ConnectionEvent, ConnectionObserver } from "../observer/observer.types";
import { ConnectionPool } from "../pool/connection-pool";
import type { CloseOutcome } from "../pool/pool.types";
import type { ProviderRegistry } from "../provider/provider-registry";
import type { ConnectionProvider } from "../provider/provider.types";
import { connectionKey } from "../utils";
import type { ConnectionFailed, ConnectionManagerOptions, ConnectionResult } from "./manager.types";

/**
 * Connection Manager
 *
 * Locking:
 * - registry and observer-list edits are serialized by one AsyncLock
 * - connection creation is serialized per (service type, connection id) by the pool's KeyedLock
 * - provider I/O and observer notification never hold the registry lock
 *
 * Events come from the pool only. The manager attaches itself to the pool
 * once and re-delivers each event to its own observers in attachment order.
 *
 * @example
 * ```typescript
 * const manager = new ConnectionManager();
 * await manager.initialize();
 * await manager.registerProvider("redis", new RedisProvider({ connections: { cache: {} } }));
 * await manager.attachObserver(new LoggingObserver());
 *
 * const result = await manager.createConnection("redis", "cache");
 * if (result.ok) {
 *   await result.connection.healthCheck();
 * }
 *
 * await manager.shutdown();
 * ```
 */
export class ConnectionManager {
	private readonly pool: ConnectionPool;
	private readonly registry: ProviderRegistry;
	private readonly keyLock: KeyedLock;
	private readonly lock = new AsyncLock();
	private readonly logger: Logger;

	private observers: ConnectionObserver[] = [];
	private initialized = false;

	constructor(options: ConnectionManagerOptions = {}) {
		this.logger = componentLogger("connection-manager", options.logger);
		this.pool = options.pool ?? new ConnectionPool({ logger: options.logger });
		this.registry = this.pool.registry;
		this.keyLock = this.pool.keyLock;

		this.pool.attachObserver({
			onConnectionEvent: async (event) => {
				try {
					await this.notifyObservers(event);
				} catch (error) {
					throw new ObserverNotificationError(event, toError(error));
				}
			},
		});
	}

	// =========================================================================
	// Lifecycle
	// =========================================================================

	/**
	 * Mark the manager ready. Repeated calls are no-ops.
	 */
	async initialize(): Promise<void> {
		if (this.initialized) {
			this.logger.warn("Connection manager already initialized");
			return;
		}

		this.initialized = true;
		this.logger.info("Connection manager initialized");
	}

	isInitialized(): boolean {
		return this.initialized;
	}

	/**
	 * Close all connections, then clear the ready flag.
	 * Providers and observers stay registered, so initialize() makes the manager usable again.
	 */
	async shutdown(): Promise<CloseOutcome[]> {
		this.logger.info("Shutting down connection manager");
		const outcomes = await this.closeAllConnections();
		this.initialized = false;
		this.logger.info({ closed: outcomes.filter((outcome) => outcome.closed).length }, "Connection manager shut down");
		return outcomes;
	}

	// =========================================================================
	// Observers
	// =========================================================================

	async attachObserver(observer: ConnectionObserver): Promise<void> {
		await this.lock.runExclusive(() => {
			this.observers.push(observer);
		});
		this.logger.debug({ observers: this.observers.length }, "Observer attached");
	}

	/**
	 * Remove the first attachment of an observer
	 */
	async detachObserver(observer: ConnectionObserver): Promise<boolean> {
		return this.lock.runExclusive(() => {
			const index = this.observers.indexOf(observer);
			if (index === -1) {
				return false;
			}
			this.observers.splice(index, 1);
			return true;
		});
	}

	/**
	 * Deliver an event to every observer, one at a time, in attachment order.
	 * The first observer failure propagates and the remaining observers are skipped.
	 */
	async notifyObservers(event: ConnectionEvent): Promise<void> {
		const observers = [...this.observers];
		this.logger.debug(
			{ serviceType: event.serviceType, connectionId: event.connectionId, eventType: event.eventType },
			`Notifying ${observers.length} observers`,
		);

		for (const observer of observers) {
			await observer.onConnectionEvent(event);
		}
	}

	// =========================================================================
	// Providers
	// =========================================================================

	/**
	 * Associate a provider with a service type, replacing any previous one.
	 * The pool shares the registry and sees the mapping immediately.
	 */
	async registerProvider(serviceType: string, provider: ConnectionProvider): Promise<void> {
		const previous = await this.lock.runExclusive(() => this.registry.register(serviceType, provider));
		this.logger.info({ serviceType, replaced: previous !== undefined }, "Provider registered");
	}

	async unregisterProvider(serviceType: string): Promise<boolean> {
		const removed = await this.lock.runExclusive(() => this.registry.unregister(serviceType));
		if (removed) {
			this.logger.info({ serviceType }, "Provider unregistered");
		}
		return removed;
	}

	getProvider(serviceType: string): ConnectionProvider | undefined {
		return this.registry.get(serviceType);
	}

	// =========================================================================
	// Connections
	// =========================================================================

	/**
	 * Create a connection with the registered provider and pool it.
	 *
	 * - no provider: `not_configured`, no event
	 * - provider throws or produces nothing: `failed`, no event, nothing pooled, no retry
	 * - success: pooled, exactly one "created" event
	 *
	 * @param connectionId - defaults to the provider's default connection
	 * @throws ObserverNotificationError if an observer fails on the "created" event;
	 *   the connection stays pooled
	 */
	async createConnection(serviceType: string, connectionId?: string): Promise<ConnectionResult> {
		const provider = this.registry.get(serviceType);
		if (!provider) {
			this.logger.warn({ serviceType }, "No provider found for service type");
			return { ok: false, reason: "not_configured", serviceType };
		}

		const id = connectionId ?? provider.defaultConnectionId?.();
		if (id === undefined) {
			return this.failed(
				serviceType,
				undefined,
				new ConnectionError(`No connection id given and ${serviceType} has no default connection`, serviceType),
			);
		}

		return this.keyLock.runExclusive<ConnectionResult>(connectionKey(serviceType, id), async () => {
			let connection: Connection | undefined;
			try {
				connection = await provider.createConnection(id);
			} catch (error) {
				return this.failed(serviceType, id, toError(error));
			}

			if (!connection) {
				return this.failed(
					serviceType,
					id,
					new ConnectionError(`Provider for ${serviceType} returned no connection for ${id}`, serviceType, id),
				);
			}

			await this.pool.addConnection(serviceType, id, connection);
			this.logger.info({ serviceType, connectionId: id }, "Connection created");
			return { ok: true, connection };
		});
	}

	/**
	 * Get the pooled connection, or create it through the pool.
	 * The configuration is handed to the provider unchanged.
	 *
	 * @throws ObserverNotificationError if an observer fails on the "created" event
	 */
	async getConnection(serviceType: string, connectionId: string, config?: unknown): Promise<ConnectionResult> {
		this.logger.debug({ serviceType, connectionId }, "Retrieving connection");
		try {
			const { connection } = await this.pool.getConnection(serviceType, connectionId, config);
			return { ok: true, connection };
		} catch (error) {
			if (error instanceof ObserverNotificationError) {
				throw error;
			}
			if (error instanceof ProviderNotFoundError) {
				this.logger.warn({ serviceType }, "No provider found for service type");
				return { ok: false, reason: "not_configured", serviceType };
			}
			return this.failed(serviceType, connectionId, toError(error));
		}
	}

	/**
	 * Close one connection; no-op if it is not pooled
	 *
	 * @returns whether a connection was closed
	 * @throws ObserverNotificationError if an observer fails on the "closed" event;
	 *   the connection is already closed and removed
	 */
	async closeConnection(serviceType: string, connectionId: string): Promise<boolean> {
		try {
			const closed = await this.pool.closeConnection(serviceType, connectionId);
			if (closed) {
				this.logger.info({ serviceType, connectionId }, "Connection closed");
			}
			return closed;
		} catch (error) {
			if (error instanceof ObserverNotificationError) {
				this.logger.error({ serviceType, connectionId, error }, "Observer failed after closing connection");
			} else {
				this.logger.error({ serviceType, connectionId, error: toError(error) }, "Error closing connection");
			}
			throw error;
		}
	}

	/**
	 * Close every pooled connection, best-effort
	 */
	async closeAllConnections(): Promise<CloseOutcome[]> {
		const outcomes = await this.pool.closeAllConnections();
		for (const { serviceType, connectionId, error, notifyError } of outcomes) {
			if (error) {
				this.logger.warn({ serviceType, connectionId, error }, "Connection did not close cleanly");
			}
			if (notifyError) {
				this.logger.warn({ serviceType, connectionId, error: notifyError }, "Observer failed after closing connection");
			}
		}
		return outcomes;
	}

	getConnectionStatus(serviceType: string, connectionId: string): boolean | undefined {
		return this.pool.getConnectionStatus(serviceType, connectionId);
	}

	listConnections(): ConnectionRef[] {
		return this.pool.list();
	}

	private failed(serviceType: string, connectionId: string | undefined, error: Error): ConnectionFailed {
		this.logger.error(
			{ serviceType, connectionId, error },
			`Error creating connection for ${serviceType}:${connectionId ?? "<default>"}: ${error.message}`,
		);
		return { ok: false, reason: "failed", serviceType, connectionId, error };
	}
}
