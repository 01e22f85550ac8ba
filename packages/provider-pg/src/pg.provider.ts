/**
 * PostgreSQL Provider
 */

import { BaseConnectionProvider, type BaseProviderOptions } from "harnesslink";
import { PostgresConnection } from "./pg.connection";
import { type PostgresConnectionConfig, postgresConnectionConfigSchema } from "./pg.types";

export type PostgresProviderOptions = BaseProviderOptions<PostgresConnectionConfig>;

/**
 * PostgreSQL Provider
 *
 * @example
 * ```typescript
 * const provider = new PostgresProvider({
 *   connections: {
 *     main: { host: "localhost", database: "app", user: "postgres", password: "${PGPASSWORD}" },
 *   },
 * });
 * ```
 */
export class PostgresProvider extends BaseConnectionProvider<PostgresConnection, PostgresConnectionConfig> {
	readonly serviceType = "postgres";

	protected override readonly configSchema = postgresConnectionConfigSchema;

	protected buildConnection(connectionId: string, config: PostgresConnectionConfig): PostgresConnection {
		return new PostgresConnection(connectionId, config, this.serviceType);
	}
}

/**
 * Factory function to create a PostgreSQL provider
 */
export function createPostgresProvider(options: PostgresProviderOptions = {}): PostgresProvider {
	return new PostgresProvider(options);
}
