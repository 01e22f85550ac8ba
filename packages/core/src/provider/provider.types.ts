/**
 * Provider Types
 */

import type { Connection } from "../connection/connection.types";

/**
 * Factory that creates live connections for one service type
 *
 * The pool and manager treat providers as black boxes: retries, backoff and
 * health probing, when needed, live inside the provider.
 *
 * @typeParam C - Connection type produced by the provider
 * @typeParam TConfig - Per-connection configuration type
 */
export interface ConnectionProvider<C extends Connection = Connection, TConfig = unknown> {
	/**
	 * Create and open a connection.
	 * Resolving to undefined means the provider produced nothing.
	 *
	 * @param connectionId - Caller-supplied connection identifier
	 * @param config - Optional configuration overriding the provider's own
	 */
	createConnection(connectionId: string, config?: TConfig): Promise<C | undefined>;

	/**
	 * Connection id used when the caller does not name one
	 */
	defaultConnectionId?(): string | undefined;
}

/**
 * Per-connection settings every provider understands
 */
export interface BaseConnectionConfig {
	/** Disabled connections are skipped unless a config is passed explicitly (default: true) */
	enabled?: boolean;
}
