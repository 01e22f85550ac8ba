/**
 * Environment variable expansion for configuration values
 */

import { ConfigError } from "../errors";

type Env = Record<string, string | undefined>;

/**
 * Expand environment variables in every string of a parsed config tree.
 * Supports:
 * - ${VAR} - empty string when unset
 * - ${VAR:-default} - default when unset or empty
 * - ${VAR:?message} - ConfigError when unset or empty
 */
export function expandEnvironmentVariables(value: unknown, env: Env = process.env): unknown {
	if (typeof value === "string") {
		return expandString(value, env);
	}

	if (Array.isArray(value)) {
		return value.map((item) => expandEnvironmentVariables(item, env));
	}

	if (value && typeof value === "object") {
		const expanded: Record<string, unknown> = {};
		for (const [key, item] of Object.entries(value)) {
			expanded[key] = expandEnvironmentVariables(item, env);
		}
		return expanded;
	}

	return value;
}

function expandString(str: string, env: Env): string {
	return str.replace(/\$\{([^}]+)\}/g, (_match, expr: string) => {
		const colonIndex = expr.indexOf(":");
		const name = (colonIndex === -1 ? expr : expr.slice(0, colonIndex)).trim();
		const rest = colonIndex === -1 ? "" : expr.slice(colonIndex + 1);

		const value = env[name];
		if (value !== undefined && value !== "") {
			return value;
		}

		if (rest.startsWith("-")) {
			return rest.slice(1);
		}
		if (rest.startsWith("?")) {
			const message = rest.slice(1);
			throw new ConfigError(message || `Environment variable ${name} is not set`);
		}
		return "";
	});
}
