/**
 * Redis Provider Types
 *
 * Per-connection configuration for the Redis provider.
 */

import type { RedisOptions } from "ioredis";
import { z } from "zod";

export const redisConnectionConfigSchema = z.object({
	enabled: z.boolean().optional(),
	/** Redis host (default: "localhost") */
	host: z.string().min(1).optional(),
	/** Redis port (default: 6379) */
	port: z.number().int().min(1).max(65535).optional(),
	password: z.string().optional(),
	/** Database number (default: 0) */
	db: z.number().int().min(0).optional(),
	/** Connection name for identification */
	name: z.string().optional(),
	tls: z.boolean().optional(),
	/** Connection timeout in milliseconds (default: 10000) */
	connectTimeout: z.number().int().positive().optional(),
	/** Command timeout in milliseconds */
	commandTimeout: z.number().int().positive().optional(),
	/** Maximum number of retries per request (default: 3) */
	maxRetriesPerRequest: z.number().int().min(0).optional(),
	/** Additional ioredis options */
	options: z
		.custom<Partial<RedisOptions>>((value) => typeof value === "object" && value !== null, {
			message: "Expected an object of ioredis options",
		})
		.optional(),
});

/**
 * Redis connection configuration
 */
export type RedisConnectionConfig = z.infer<typeof redisConnectionConfigSchema>;
