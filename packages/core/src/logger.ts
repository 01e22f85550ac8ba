/**
 * Logger
 *
 * pino-based structured logging shared by every harnesslink component.
 */

import pino, { type Logger } from "pino";

export type { Logger } from "pino";

/**
 * Environment variable consulted when no explicit level is given
 */
export const LOG_LEVEL_ENV = "HARNESSLINK_LOG_LEVEL";

export interface LoggerOptions {
	/** Logger name (default: "harnesslink") */
	name?: string;
	/** pino level; falls back to HARNESSLINK_LOG_LEVEL, then "info" */
	level?: string;
	/** Component name bound to every record */
	component?: string;
	/** Destination stream, stdout when omitted */
	destination?: pino.DestinationStream;
}

const REDACTED_PATHS = [
	"password",
	"secret",
	"token",
	"connectionString",
	"*.password",
	"*.secret",
	"*.token",
	"*.connectionString",
];

/**
 * Create a logger instance
 */
export function createLogger(options: LoggerOptions = {}): Logger {
	const loggerOptions: pino.LoggerOptions = {
		name: options.name ?? "harnesslink",
		level: options.level ?? process.env[LOG_LEVEL_ENV] ?? "info",
		formatters: {
			level: (label) => ({ level: label }),
		},
		timestamp: pino.stdTimeFunctions.isoTime,
		serializers: {
			error: pino.stdSerializers.err,
		},
		redact: {
			paths: REDACTED_PATHS,
			censor: "[REDACTED]",
		},
	};

	const logger = options.destination ? pino(loggerOptions, options.destination) : pino(loggerOptions);
	return options.component ? logger.child({ component: options.component }) : logger;
}

/**
 * Bind a component name to a caller-supplied logger, or create a new one
 */
export function componentLogger(component: string, logger?: Logger): Logger {
	return logger ? logger.child({ component }) : createLogger({ component });
}
