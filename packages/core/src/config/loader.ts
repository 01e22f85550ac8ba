/**
 * Harness configuration loader
 *
 * Reads a JSON file, expands environment variables and validates the result.
 *
 * @example config/harness.json
 * ```json
 * {
 *   "logLevel": "debug",
 *   "services": {
 *     "redis": {
 *       "connections": {
 *         "cache": { "host": "${REDIS_HOST:-localhost}", "port": 6379 }
 *       }
 *     }
 *   }
 * }
 * ```
 */

import { readFile } from "node:fs/promises";
import { ConfigError, toError } from "../errors";
import { type ConnectionConfig, type HarnessConfig, HarnessConfigSchema } from "./config.types";
import { expandEnvironmentVariables } from "./env-expander";

export interface LoadConfigOptions {
	/** Environment used for ${VAR} expansion (default: process.env) */
	env?: Record<string, string | undefined>;
}

/**
 * Load and validate a harness configuration file
 *
 * @throws ConfigError if the file cannot be read, is not JSON or fails validation
 */
export async function loadHarnessConfig(path: string, options: LoadConfigOptions = {}): Promise<HarnessConfig> {
	let content: string;
	try {
		content = await readFile(path, "utf-8");
	} catch (error) {
		throw new ConfigError(`Cannot read config file: ${path}`, path, [], toError(error));
	}

	let raw: unknown;
	try {
		raw = JSON.parse(content);
	} catch (error) {
		throw new ConfigError(`Config file is not valid JSON: ${path}`, path, [], toError(error));
	}

	return parseHarnessConfig(raw, options, path);
}

/**
 * Validate an already parsed configuration object
 */
export function parseHarnessConfig(raw: unknown, options: LoadConfigOptions = {}, path?: string): HarnessConfig {
	const expanded = expandEnvironmentVariables(raw, options.env);
	const result = HarnessConfigSchema.safeParse(expanded);
	if (!result.success) {
		const summary = result.error.issues
			.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
			.join("; ");
		throw new ConfigError(`Invalid harness configuration: ${summary}`, path, result.error.issues);
	}
	return result.data;
}

/**
 * Connections configured for one service type, empty when the service is absent
 */
export function getServiceConnections(config: HarnessConfig, serviceType: string): Record<string, ConnectionConfig> {
	return config.services[serviceType]?.connections ?? {};
}
