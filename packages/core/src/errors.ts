/**
 * Errors
 *
 * Error classes raised by connections, providers, the pool and the config loader.
 */

import type { ZodIssue } from "zod";
import type { ConnectionEvent } from "./observer/observer.types";

/**
 * Normalize any thrown value into an Error
 */
export function toError(error: unknown): Error {
	return error instanceof Error ? error : new Error(String(error));
}

/**
 * Base error for connection lifecycle failures
 */
export class ConnectionError extends Error {
	constructor(
		message: string,
		public readonly serviceType?: string,
		public readonly connectionId?: string,
		public override readonly cause?: Error,
	) {
		super(message);
		this.name = "ConnectionError";
	}
}

/**
 * No provider is registered for a service type
 */
export class ProviderNotFoundError extends Error {
	constructor(public readonly serviceType: string) {
		super(`No provider registered for service type: ${serviceType}`);
		this.name = "ProviderNotFoundError";
	}
}

/**
 * An observer failed while a lifecycle event was being delivered.
 * Delivery to the observers after it was aborted.
 */
export class ObserverNotificationError extends Error {
	constructor(
		public readonly event: ConnectionEvent,
		public override readonly cause: Error,
	) {
		super(`Observer failed on ${event.eventType} event for ${event.serviceType}:${event.connectionId}: ${cause.message}`);
		this.name = "ObserverNotificationError";
	}
}

/**
 * Configuration file missing, unreadable or invalid
 */
export class ConfigError extends Error {
	constructor(
		message: string,
		public readonly path?: string,
		public readonly issues: ZodIssue[] = [],
		public override readonly cause?: Error,
	) {
		super(message);
		this.name = "ConfigError";
	}
}
