/**
 * Connection Manager Types
 */

import type { Connection } from "../connection/connection.types";
import type { Logger } from "../logger";
import type { ConnectionPool } from "../pool/connection-pool";

/**
 * Connection manager options
 */
export interface ConnectionManagerOptions {
	/**
	 * Pool to delegate connection bookkeeping to.
	 * The manager uses the pool's provider registry and key lock.
	 */
	pool?: ConnectionPool;
	logger?: Logger;
}

/**
 * Connection obtained
 */
export interface ConnectionAvailable<C extends Connection = Connection> {
	ok: true;
	connection: C;
}

/**
 * No provider registered for the service type
 */
export interface ConnectionNotConfigured {
	ok: false;
	reason: "not_configured";
	serviceType: string;
}

/**
 * Provider (or pool) failed to produce the connection
 */
export interface ConnectionFailed {
	ok: false;
	reason: "failed";
	serviceType: string;
	connectionId?: string;
	error: Error;
}

/**
 * Outcome of createConnection/getConnection
 */
export type ConnectionResult<C extends Connection = Connection> =
	| ConnectionAvailable<C>
	| ConnectionNotConfigured
	| ConnectionFailed;

/**
 * Connection from a result, or undefined for any failure
 */
export function unwrapConnection<C extends Connection>(result: ConnectionResult<C>): C | undefined {
	return result.ok ? result.connection : undefined;
}
