/**
 * harnesslink
 *
 * Connection management for BDD test harnesses: providers create live
 * connections to services under test, a pool owns them and observers are
 * told about every lifecycle change.
 *
 * Service providers ship as separate packages:
 * - @harnesslink/provider-redis - Redis via ioredis
 * - @harnesslink/provider-pg - PostgreSQL via pg
 * - @harnesslink/provider-kafka - Kafka via kafkajs
 *
 * @example
 * ```typescript
 * import { ConnectionManager, LoggingObserver, unwrapConnection } from "harnesslink";
 * import { RedisProvider } from "@harnesslink/provider-redis";
 *
 * const manager = new ConnectionManager();
 * await manager.initialize();
 * await manager.registerProvider("redis", new RedisProvider({ connections: { cache: { port: 6379 } } }));
 * await manager.attachObserver(new LoggingObserver());
 *
 * const redis = unwrapConnection(await manager.createConnection("redis", "cache"));
 * if (redis) {
 *   await redis.healthCheck();
 * }
 *
 * await manager.shutdown();
 * ```
 */

// Errors
export * from "./errors";
// Logging (pino)
export * from "./logger";
// Helpers
export * from "./utils";
// Locks
export * from "./lock";
// Connection contract and base class
export * from "./connection";
// Providers and registry
export * from "./provider";
// Events and built-in observers
export * from "./observer";
// Pool
export * from "./pool";
// Manager
export * from "./manager";
// Hub facade
export * from "./hub";
// Configuration
export * from "./config";
