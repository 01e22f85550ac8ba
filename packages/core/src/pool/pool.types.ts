/**
 * Pool Types
 */

import type { Connection, ConnectionRef } from "../connection/connection.types";
import type { KeyedLock } from "../lock";
import type { Logger } from "../logger";
import type { ProviderRegistry } from "../provider/provider-registry";

/**
 * Connection pool options
 */
export interface ConnectionPoolOptions {
	/** Provider registry used for get-or-create (default: a new empty registry) */
	registry?: ProviderRegistry;
	/** Per-connection lock; share it with whatever else creates connections for the pool */
	keyLock?: KeyedLock;
	logger?: Logger;
}

/**
 * Result of get-or-create
 */
export interface PooledConnection<C extends Connection = Connection> {
	connection: C;
	/** Whether the connection was created by this call */
	created: boolean;
}

/**
 * Pooled connection with its key
 */
export interface PoolEntry extends ConnectionRef {
	connection: Connection;
}

/**
 * Outcome of closing one connection during close-all.
 * The connection has left the pool whatever the outcome.
 */
export interface CloseOutcome extends ConnectionRef {
	/** Whether close() succeeded */
	closed: boolean;
	/** Why close() failed */
	error?: Error;
	/** First observer failure while announcing the close */
	notifyError?: Error;
}
