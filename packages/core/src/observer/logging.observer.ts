import { componentLogger, type Logger } from "../logger";
import type { ConnectionEvent, ConnectionObserver } from "./observer.types";

/**
 * Writes every lifecycle event to the log; error events at error level
 */
export class LoggingObserver implements ConnectionObserver {
	private readonly logger: Logger;

	constructor(logger?: Logger) {
		this.logger = componentLogger("connection-events", logger);
	}

	onConnectionEvent(event: ConnectionEvent): void {
		const record = {
			serviceType: event.serviceType,
			connectionId: event.connectionId,
			eventType: event.eventType,
			timestamp: new Date(event.timestamp).toISOString(),
			...(event.details ? { details: event.details } : {}),
		};

		if (event.eventType === "error") {
			this.logger.error(record, "Connection error");
		} else {
			this.logger.info(record, `Connection ${event.eventType}`);
		}
	}
}
