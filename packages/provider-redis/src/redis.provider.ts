/**
 * Redis Provider
 *
 * Creates ioredis connections for the "redis" service type.
 */

import { BaseConnectionProvider, type BaseProviderOptions } from "harnesslink";
import { RedisConnection } from "./redis.connection";
import { type RedisConnectionConfig, redisConnectionConfigSchema } from "./redis.types";

export type RedisProviderOptions = BaseProviderOptions<RedisConnectionConfig>;

/**
 * Redis Provider
 *
 * @example
 * ```typescript
 * const provider = new RedisProvider({
 *   connections: {
 *     cache: { host: "localhost", port: 6379 },
 *     sessions: { host: "localhost", port: 6379, db: 1 },
 *   },
 * });
 *
 * await manager.registerProvider("redis", provider);
 * ```
 */
export class RedisProvider extends BaseConnectionProvider<RedisConnection, RedisConnectionConfig> {
	readonly serviceType = "redis";

	protected override readonly configSchema = redisConnectionConfigSchema;

	protected buildConnection(connectionId: string, config: RedisConnectionConfig): RedisConnection {
		return new RedisConnection(connectionId, config, this.serviceType);
	}
}

/**
 * Factory function to create a Redis provider
 */
export function createRedisProvider(options: RedisProviderOptions = {}): RedisProvider {
	return new RedisProvider(options);
}
