/**
 * Redis Connection
 *
 * Live ioredis session for one configured connection.
 */

import Redis, { type RedisOptions } from "ioredis";
import { BaseConnection } from "harnesslink";
import type { RedisConnectionConfig } from "./redis.types";

/**
 * Redis Connection
 *
 * @example
 * ```typescript
 * const connection = new RedisConnection("cache", { host: "localhost", port: 6379 });
 * await connection.open();
 *
 * await connection.getClient().set("key", "value");
 * await connection.close();
 * ```
 */
export class RedisConnection extends BaseConnection<Redis> {
	readonly config: RedisConnectionConfig;

	private client: Redis | null = null;

	constructor(id: string, config: RedisConnectionConfig, serviceType = "redis") {
		super(serviceType, id);
		this.config = config;
	}

	/**
	 * ioredis options derived from the connection configuration
	 */
	buildOptions(): RedisOptions {
		const options: RedisOptions = {
			host: this.config.host ?? "localhost",
			port: this.config.port ?? 6379,
			password: this.config.password,
			db: this.config.db ?? 0,
			connectionName: this.config.name,
			connectTimeout: this.config.connectTimeout ?? 10000,
			commandTimeout: this.config.commandTimeout,
			maxRetriesPerRequest: this.config.maxRetriesPerRequest ?? 3,
			lazyConnect: true,
			...this.config.options,
		};

		if (this.config.tls) {
			options.tls = {};
		}

		return options;
	}

	protected async doOpen(): Promise<void> {
		const client = new Redis(this.buildOptions());

		// Errors while connecting reject connect(); afterwards they mark the connection
		// down until ioredis reconnects on its own
		client.on("error", (error: Error) => {
			if (this.state === "open") {
				this.fail(error);
			}
		});
		client.on("close", () => {
			if (this.state === "open") {
				this.fail(new Error(`redis connection ${this.id} lost`));
			}
		});
		client.on("ready", () => {
			if (this.client === client) {
				this.recover();
			}
		});
		// No further reconnection attempts
		client.on("end", () => {
			if (this.state === "open") {
				this.fail(new Error(`redis connection ${this.id} ended`));
			}
		});

		try {
			await client.connect();
		} catch (error) {
			client.disconnect();
			throw error;
		}

		this.client = client;
	}

	protected async doClose(): Promise<void> {
		const client = this.client;
		if (!client) {
			return;
		}

		try {
			await client.quit();
		} catch {
			// Force disconnect if quit fails
			client.disconnect();
		} finally {
			this.client = null;
		}
	}

	protected nativeClient(): Redis | null {
		return this.client;
	}

	/**
	 * PING the server
	 */
	override async healthCheck(): Promise<boolean> {
		if (!this.client || !this.isConnected()) {
			return false;
		}

		try {
			return (await this.client.ping()) === "PONG";
		} catch {
			return false;
		}
	}
}
