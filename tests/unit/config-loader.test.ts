/**
 * Configuration Loader Tests
 */

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import {
	ConfigError,
	expandEnvironmentVariables,
	getServiceConnections,
	loadHarnessConfig,
	parseHarnessConfig,
} from "harnesslink";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

describe("expandEnvironmentVariables", () => {
	const env = { REDIS_HOST: "cache.internal", EMPTY: "" };

	it("should substitute variables inside strings", () => {
		expect(expandEnvironmentVariables("redis://${REDIS_HOST}:6379", env)).toBe("redis://cache.internal:6379");
	});

	it("should use an empty string for unset variables", () => {
		expect(expandEnvironmentVariables("[${MISSING}]", env)).toBe("[]");
	});

	it("should apply defaults for unset or empty variables", () => {
		expect(expandEnvironmentVariables("${MISSING:-localhost}", env)).toBe("localhost");
		expect(expandEnvironmentVariables("${EMPTY:-fallback}", env)).toBe("fallback");
		expect(expandEnvironmentVariables("${REDIS_HOST:-localhost}", env)).toBe("cache.internal");
	});

	it("should throw for required variables that are unset", () => {
		expect(() => expandEnvironmentVariables("${DB_PASSWORD:?database password required}", env)).toThrow(
			new ConfigError("database password required"),
		);
		expect(() => expandEnvironmentVariables("${DB_PASSWORD:?}", env)).toThrow(
			"Environment variable DB_PASSWORD is not set",
		);
	});

	it("should walk arrays and objects and leave other values alone", () => {
		const input = { hosts: ["${REDIS_HOST}", "backup"], port: 6379, tls: false, extra: null };

		expect(expandEnvironmentVariables(input, env)).toEqual({
			hosts: ["cache.internal", "backup"],
			port: 6379,
			tls: false,
			extra: null,
		});
	});
});

describe("parseHarnessConfig", () => {
	it("should apply defaults", () => {
		const config = parseHarnessConfig({
			services: {
				redis: { connections: { cache: { host: "localhost" } } },
				kafka: {},
			},
		});

		expect(config).toEqual({
			services: {
				redis: { connections: { cache: { enabled: true, host: "localhost" } } },
				kafka: { connections: {} },
			},
		});
	});

	it("should accept an empty document", () => {
		expect(parseHarnessConfig({})).toEqual({ services: {} });
	});

	it("should expand variables before validating", () => {
		const config = parseHarnessConfig(
			{ services: { postgres: { connections: { main: { password: "${PGPASSWORD}" } } } } },
			{ env: { PGPASSWORD: "test-secret" } },
		);

		expect(getServiceConnections(config, "postgres")).toEqual({ main: { enabled: true, password: "test-secret" } });
	});

	it("should report every invalid field", () => {
		const raw = { logLevel: "loud", services: { redis: { connections: { cache: { enabled: "yes" } } } } };

		const error = (() => {
			try {
				parseHarnessConfig(raw);
			} catch (e) {
				return e;
			}
		})();

		expect(error).toBeInstanceOf(ConfigError);
		expect(error instanceof ConfigError ? error.issues.map((issue) => issue.path.join(".")) : []).toEqual([
			"logLevel",
			"services.redis.connections.cache.enabled",
		]);
	});
});

describe("getServiceConnections", () => {
	it("should return an empty record for absent services", () => {
		expect(getServiceConnections(parseHarnessConfig({}), "redis")).toEqual({});
	});
});

describe("loadHarnessConfig", () => {
	let dir: string;

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), "harnesslink-config-"));
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	it("should load a JSON file", async () => {
		const path = join(dir, "harness.json");
		await writeFile(
			path,
			JSON.stringify({
				logLevel: "debug",
				services: { redis: { connections: { cache: { host: "${TEST_REDIS_HOST:-localhost}", port: 6379 } } } },
			}),
		);

		const config = await loadHarnessConfig(path, { env: {} });

		expect(config.logLevel).toBe("debug");
		expect(getServiceConnections(config, "redis")).toEqual({
			cache: { enabled: true, host: "localhost", port: 6379 },
		});
	});

	it("should fail for missing files", async () => {
		const path = join(dir, "missing.json");

		await expect(loadHarnessConfig(path)).rejects.toThrow(new ConfigError(`Cannot read config file: ${path}`));
	});

	it("should fail for malformed JSON", async () => {
		const path = join(dir, "broken.json");
		await writeFile(path, "{ services: ");

		const error = await loadHarnessConfig(path).catch((e: unknown) => e);

		expect(error).toBeInstanceOf(ConfigError);
		expect(error).toMatchObject({ message: `Config file is not valid JSON: ${path}`, path });
	});

	it("should load the example configuration", async () => {
		const path = fileURLToPath(new URL("../../config/harness.example.json", import.meta.url));

		const config = await loadHarnessConfig(path, { env: { PGPASSWORD: "test-secret", REDIS_HOST: "redis.test" } });

		expect(config.logLevel).toBe("info");
		expect(getServiceConnections(config, "redis")).toEqual({
			cache: { enabled: true, host: "redis.test", port: 6379 },
			sessions: { enabled: false, host: "redis.test", port: 6379, db: 1 },
		});
		expect(getServiceConnections(config, "postgres").main).toMatchObject({
			host: "localhost",
			user: "postgres",
			password: "test-secret",
		});
		expect(getServiceConnections(config, "kafka").events).toMatchObject({ brokers: ["localhost:9092"] });
	});

	it("should refuse the example configuration without a database password", async () => {
		const path = fileURLToPath(new URL("../../config/harness.example.json", import.meta.url));

		await expect(loadHarnessConfig(path, { env: {} })).rejects.toThrow("PGPASSWORD must be set");
	});
});
