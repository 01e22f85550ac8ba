/**
 * PostgreSQL Provider for harnesslink
 *
 * Connections expose a node-postgres Pool as their client.
 */

export { PostgresConnection } from "./pg.connection";
export { createPostgresProvider, PostgresProvider, type PostgresProviderOptions } from "./pg.provider";
export { type PostgresConnectionConfig, postgresConnectionConfigSchema } from "./pg.types";
