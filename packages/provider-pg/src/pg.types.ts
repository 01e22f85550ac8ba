/**
 * PostgreSQL Provider Types
 */

import type { ConnectionOptions } from "node:tls";
import type { PoolConfig } from "pg";
import { z } from "zod";

const objectOf = <T>(message: string) =>
	z.custom<T>((value) => typeof value === "object" && value !== null && !Array.isArray(value), { message });

export const postgresConnectionConfigSchema = z.object({
	enabled: z.boolean().optional(),
	/** PostgreSQL host (default: "localhost") */
	host: z.string().min(1).optional(),
	/** PostgreSQL port (default: 5432) */
	port: z.number().int().min(1).max(65535).optional(),
	database: z.string().optional(),
	user: z.string().optional(),
	password: z.string().optional(),
	/** Connection string (alternative to individual options) */
	connectionString: z.string().optional(),
	/** Maximum number of clients in the pool (default: 10) */
	max: z.number().int().positive().optional(),
	/** Minimum number of idle clients (default: 0) */
	min: z.number().int().min(0).optional(),
	/** Connection timeout in milliseconds (default: 30000) */
	connectionTimeoutMillis: z.number().int().min(0).optional(),
	/** Idle timeout in milliseconds (default: 10000) */
	idleTimeoutMillis: z.number().int().min(0).optional(),
	ssl: z.union([z.boolean(), objectOf<ConnectionOptions>("Expected a boolean or TLS options")]).optional(),
	/** Statement timeout in milliseconds */
	statementTimeout: z.number().int().positive().optional(),
	/** Query timeout in milliseconds */
	queryTimeout: z.number().int().positive().optional(),
	/** Application name for connection identification */
	applicationName: z.string().optional(),
	/** Additional pg pool options */
	options: objectOf<Partial<PoolConfig>>("Expected an object of pg pool options").optional(),
});

/**
 * PostgreSQL connection configuration
 */
export type PostgresConnectionConfig = z.infer<typeof postgresConnectionConfigSchema>;
