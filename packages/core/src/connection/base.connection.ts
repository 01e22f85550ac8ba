/**
 * Base Connection
 *
 * Lifecycle state machine and event plumbing shared by all provider connections.
 * Subclasses implement doOpen/doClose and expose their native client.
 */

import { toError } from "../errors";
import type { Connection, ConnectionEvents, ConnectionState, Unsubscribe } from "./connection.types";

/**
 * Base Connection class
 *
 * @typeParam TClient - Native SDK client type
 *
 * @example
 * ```typescript
 * class ShellConnection extends BaseConnection<ShellClient> {
 *   private client: ShellClient | null = null;
 *
 *   protected async doOpen() {
 *     this.client = await ShellClient.connect(this.host);
 *   }
 *
 *   protected async doClose() {
 *     await this.client?.end();
 *     this.client = null;
 *   }
 *
 *   protected nativeClient() {
 *     return this.client;
 *   }
 * }
 * ```
 */
export abstract class BaseConnection<TClient = unknown> implements Connection<TClient> {
	protected state: ConnectionState = "created";
	protected error?: Error;
	private eventHandlers: { [K in keyof ConnectionEvents]: Set<(data: ConnectionEvents[K]) => void> } = {
		connected: new Set(),
		disconnected: new Set(),
		error: new Set(),
	};

	readonly id: string;
	readonly serviceType: string;

	constructor(serviceType: string, id: string) {
		this.serviceType = serviceType;
		this.id = id;
	}

	// =========================================================================
	// State
	// =========================================================================

	getState(): ConnectionState {
		return this.state;
	}

	/**
	 * Last error that moved the connection into the "error" state
	 */
	getError(): Error | undefined {
		return this.error;
	}

	isConnected(): boolean {
		return this.state === "open";
	}

	// =========================================================================
	// Lifecycle
	// =========================================================================

	async open(): Promise<void> {
		if (this.state !== "created" && this.state !== "closed") {
			throw new Error(`Cannot open ${this.serviceType} connection ${this.id} in state ${this.state}`);
		}

		this.state = "opening";

		try {
			await this.doOpen();
			this.state = "open";
			this.error = undefined;
			this.emit("connected", undefined);
		} catch (error) {
			this.fail(toError(error));
			throw error;
		}
	}

	async close(): Promise<void> {
		if (this.state === "closed" || this.state === "created") {
			return;
		}

		if (this.state !== "open" && this.state !== "error") {
			throw new Error(`Cannot close ${this.serviceType} connection ${this.id} in state ${this.state}`);
		}

		this.state = "closing";

		try {
			await this.doClose();
			this.state = "closed";
			this.emit("disconnected", undefined);
		} catch (error) {
			this.fail(toError(error));
			throw error;
		}
	}

	/**
	 * Default health check reports the connection state
	 */
	async healthCheck(): Promise<boolean> {
		return this.isConnected();
	}

	/**
	 * Get the native SDK client
	 *
	 * @throws Error if the connection is not open
	 */
	getClient(): TClient {
		const client = this.nativeClient();
		if (!this.isConnected() || client === null) {
			throw new Error(`${this.serviceType} connection ${this.id} is not open. Call open() first.`);
		}
		return client;
	}

	// =========================================================================
	// Events
	// =========================================================================

	on<K extends keyof ConnectionEvents>(event: K, handler: (data: ConnectionEvents[K]) => void): Unsubscribe {
		const handlers = this.eventHandlers[event];
		handlers.add(handler);

		return () => {
			handlers.delete(handler);
		};
	}

	protected emit<K extends keyof ConnectionEvents>(event: K, data: ConnectionEvents[K]): void {
		for (const handler of [...this.eventHandlers[event]]) {
			handler(data);
		}
	}

	/**
	 * Record a runtime failure reported by the native client
	 */
	protected fail(error: Error): void {
		this.state = "error";
		this.error = error;
		this.emit("error", error);
	}

	/**
	 * Report a runtime failure the native client survives; the state is unchanged
	 */
	protected reportError(error: Error): void {
		this.emit("error", error);
	}

	/**
	 * Return to "open" once the native client has re-established its session
	 */
	protected recover(): void {
		if (this.state !== "error") {
			return;
		}
		this.state = "open";
		this.error = undefined;
		this.emit("connected", undefined);
	}

	protected abstract doOpen(): Promise<void>;
	protected abstract doClose(): Promise<void>;

	/**
	 * Native client, or null while no session exists
	 */
	protected abstract nativeClient(): TClient | null;
}
