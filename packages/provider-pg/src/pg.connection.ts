/**
 * PostgreSQL Connection
 *
 * node-postgres Pool verified by acquiring one client on open.
 */

import { BaseConnection } from "harnesslink";
import { Pool, type PoolClient, type PoolConfig } from "pg";
import type { PostgresConnectionConfig } from "./pg.types";

/**
 * PostgreSQL Connection
 *
 * @example
 * ```typescript
 * const connection = new PostgresConnection("main", { database: "app", user: "postgres" });
 * await connection.open();
 *
 * const { rows } = await connection.getClient().query("SELECT * FROM users");
 * await connection.close();
 * ```
 */
export class PostgresConnection extends BaseConnection<Pool> {
	readonly config: PostgresConnectionConfig;

	private pool: Pool | null = null;

	constructor(id: string, config: PostgresConnectionConfig, serviceType = "postgres") {
		super(serviceType, id);
		this.config = config;
	}

	buildPoolConfig(): PoolConfig {
		return {
			host: this.config.host ?? "localhost",
			port: this.config.port ?? 5432,
			database: this.config.database,
			user: this.config.user,
			password: this.config.password,
			connectionString: this.config.connectionString,
			max: this.config.max ?? 10,
			min: this.config.min ?? 0,
			connectionTimeoutMillis: this.config.connectionTimeoutMillis ?? 30000,
			idleTimeoutMillis: this.config.idleTimeoutMillis ?? 10000,
			statement_timeout: this.config.statementTimeout,
			query_timeout: this.config.queryTimeout,
			application_name: this.config.applicationName,
			ssl: this.config.ssl,
			...this.config.options,
		};
	}

	protected async doOpen(): Promise<void> {
		const pool = new Pool(this.buildPoolConfig());

		// An idle client died; the pool discards it and stays usable
		pool.on("error", (error: Error) => {
			if (this.state === "open") {
				this.reportError(error);
			}
		});

		let client: PoolClient | null = null;
		try {
			client = await pool.connect();
		} catch (error) {
			await pool.end();
			throw error;
		} finally {
			client?.release();
		}

		this.pool = pool;
	}

	protected async doClose(): Promise<void> {
		const pool = this.pool;
		if (!pool) {
			return;
		}

		try {
			await pool.end();
		} finally {
			this.pool = null;
		}
	}

	protected nativeClient(): Pool | null {
		return this.pool;
	}

	/**
	 * Run `SELECT 1`
	 */
	override async healthCheck(): Promise<boolean> {
		if (!this.pool || !this.isConnected()) {
			return false;
		}

		try {
			await this.pool.query("SELECT 1");
			return true;
		} catch {
			return false;
		}
	}
}
