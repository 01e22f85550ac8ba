/**
 * Redis Provider for harnesslink
 *
 * @example
 * ```typescript
 * import { ConnectionManager } from "harnesslink";
 * import { RedisProvider } from "@harnesslink/provider-redis";
 *
 * const manager = new ConnectionManager();
 * await manager.registerProvider("redis", new RedisProvider({ connections: { cache: {} } }));
 *
 * const result = await manager.createConnection("redis", "cache");
 * if (result.ok) {
 *   await result.connection.healthCheck();
 * }
 * ```
 */

export { RedisConnection } from "./redis.connection";
export { createRedisProvider, RedisProvider, type RedisProviderOptions } from "./redis.provider";
export { type RedisConnectionConfig, redisConnectionConfigSchema } from "./redis.types";
