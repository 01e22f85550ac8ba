/**
 * Observer Types
 *
 * Lifecycle events and the observer contract.
 */

/**
 * Lifecycle event kinds
 */
export type ConnectionEventType = "created" | "closed" | "error";

/**
 * Immutable lifecycle notification
 */
export interface ConnectionEvent {
	readonly connectionId: string;
	readonly serviceType: string;
	readonly eventType: ConnectionEventType;
	/** Milliseconds since epoch */
	readonly timestamp: number;
	readonly details?: Readonly<Record<string, unknown>>;
}

/**
 * Anything with an async-callable event handler
 */
export interface ConnectionObserver {
	onConnectionEvent(event: ConnectionEvent): void | Promise<void>;
}

/**
 * Create a frozen event stamped with the current time
 */
export function createConnectionEvent(
	serviceType: string,
	connectionId: string,
	eventType: ConnectionEventType,
	details?: Record<string, unknown>,
): ConnectionEvent {
	return Object.freeze({
		connectionId,
		serviceType,
		eventType,
		timestamp: Date.now(),
		...(details ? { details: Object.freeze({ ...details }) } : {}),
	});
}
