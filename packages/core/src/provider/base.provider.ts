/**
 * Base Connection Provider
 *
 * Resolves per-connection configuration, validates it and opens the
 * connection built by the concrete provider.
 */

import type { ZodType, ZodTypeDef } from "zod";
import type { Connection } from "../connection/connection.types";
import { ConfigError, ConnectionError, toError } from "../errors";
import { componentLogger, type Logger } from "../logger";
import type { BaseConnectionConfig, ConnectionProvider } from "./provider.types";

/**
 * Base provider options
 *
 * @typeParam TConfig - Per-connection configuration type
 */
export interface BaseProviderOptions<TConfig extends BaseConnectionConfig> {
	/** Configured connections keyed by connection id */
	connections?: Record<string, TConfig>;
	logger?: Logger;
}

/**
 * Base Connection Provider
 *
 * @typeParam C - Connection type
 * @typeParam TConfig - Per-connection configuration type
 */
export abstract class BaseConnectionProvider<C extends Connection, TConfig extends BaseConnectionConfig>
	implements ConnectionProvider<C, TConfig>
{
	abstract readonly serviceType: string;

	protected readonly connections: Map<string, TConfig>;
	protected readonly logger: Logger;

	/**
	 * Schema every resolved configuration is parsed with.
	 * Parsing applies schema defaults.
	 */
	protected readonly configSchema?: ZodType<TConfig, ZodTypeDef, unknown>;

	constructor(options: BaseProviderOptions<TConfig> = {}) {
		this.connections = new Map(Object.entries(options.connections ?? {}));
		this.logger = componentLogger(new.target.name, options.logger);
	}

	/**
	 * Ids of configured connections that are enabled, in configuration order
	 */
	getEnabledConnections(): string[] {
		return [...this.connections.entries()]
			.filter(([, config]) => config.enabled !== false)
			.map(([id]) => id);
	}

	/**
	 * First enabled connection
	 */
	defaultConnectionId(): string | undefined {
		return this.getEnabledConnections()[0];
	}

	/**
	 * Configuration registered for a connection id
	 */
	getConnectionConfig(connectionId: string): TConfig | undefined {
		return this.connections.get(connectionId);
	}

	/**
	 * Add or replace the configuration of a connection id
	 */
	configure(connectionId: string, config: TConfig): void {
		this.connections.set(connectionId, config);
	}

	async createConnection(connectionId: string, config?: TConfig): Promise<C> {
		const resolved = this.validateConfig(connectionId, this.resolveConfig(connectionId, config));
		const connection = this.buildConnection(connectionId, resolved);

		this.logger.debug({ connectionId }, "Opening connection");
		try {
			await connection.open();
		} catch (error) {
			const cause = toError(error);
			if (cause instanceof ConnectionError) {
				throw cause;
			}
			throw new ConnectionError(
				`Failed to open ${this.serviceType} connection ${connectionId}: ${cause.message}`,
				this.serviceType,
				connectionId,
				cause,
			);
		}
		this.logger.info({ connectionId }, "Connection opened");

		return connection;
	}

	/**
	 * Explicit config wins; otherwise the enabled configured one
	 */
	protected resolveConfig(connectionId: string, config?: TConfig): TConfig {
		if (config !== undefined) {
			return config;
		}

		const configured = this.connections.get(connectionId);
		if (!configured) {
			throw new ConnectionError(
				`Connection "${connectionId}" is not configured for ${this.serviceType}`,
				this.serviceType,
				connectionId,
			);
		}
		if (configured.enabled === false) {
			throw new ConnectionError(
				`Connection "${connectionId}" is disabled for ${this.serviceType}`,
				this.serviceType,
				connectionId,
			);
		}
		return configured;
	}

	protected validateConfig(connectionId: string, config: TConfig): TConfig {
		if (!this.configSchema) {
			return config;
		}

		const parsed = this.configSchema.safeParse(config);
		if (!parsed.success) {
			throw new ConfigError(
				`Invalid ${this.serviceType} configuration for connection "${connectionId}"`,
				undefined,
				parsed.error.issues,
			);
		}
		return parsed.data;
	}

	/**
	 * Build an unopened connection
	 */
	protected abstract buildConnection(connectionId: string, config: TConfig): C;
}
