/**
 * Connection Types
 *
 * Contract for live sessions to remote services (command hosts, databases,
 * message brokers). A connection is provider-specific in content; the pool
 * and manager only rely on this interface.
 */

/**
 * Unsubscribe function returned by event subscriptions
 */
export type Unsubscribe = () => void;

/**
 * Connection state
 */
export type ConnectionState = "created" | "opening" | "open" | "closing" | "closed" | "error";

/**
 * Events emitted by connections
 */
export interface ConnectionEvents {
	/** Emitted when the session is established */
	connected: undefined;
	/** Emitted when the session is closed */
	disconnected: undefined;
	/** Emitted on session or operation error */
	error: Error;
}

/**
 * Live connection to a remote service
 *
 * @typeParam TClient - Native SDK client type (e.g., Redis from ioredis, Pool from pg)
 */
export interface Connection<TClient = unknown> {
	/** Caller-supplied connection identifier */
	readonly id: string;

	/** Service type tag (e.g., "redis", "postgres", "kafka") */
	readonly serviceType: string;

	/**
	 * Establish the session
	 */
	open(): Promise<void>;

	/**
	 * Close the session and release its resources
	 */
	close(): Promise<void>;

	isConnected(): boolean;

	/**
	 * Get the native SDK client for direct access
	 */
	getClient(): TClient;

	/**
	 * Check whether the remote side still answers
	 */
	healthCheck(): Promise<boolean>;

	/**
	 * Subscribe to connection events
	 */
	on<K extends keyof ConnectionEvents>(event: K, handler: (data: ConnectionEvents[K]) => void): Unsubscribe;
}

/**
 * Identifies a pooled connection
 */
export interface ConnectionRef {
	serviceType: string;
	connectionId: string;
}
