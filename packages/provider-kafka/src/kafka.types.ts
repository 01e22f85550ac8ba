/**
 * Kafka Provider Types
 */

import type { ConnectionOptions } from "node:tls";
import type { Kafka, KafkaConfig, Producer, ProducerConfig, SASLOptions } from "kafkajs";
import { z } from "zod";

const objectOf = <T>(message: string) =>
	z.custom<T>((value) => typeof value === "object" && value !== null && !Array.isArray(value), { message });

/**
 * KafkaJS log levels by name, so they can be written in JSON config
 */
export const kafkaLogLevelSchema = z.enum(["nothing", "error", "warn", "info", "debug"]);
export type KafkaLogLevelName = z.infer<typeof kafkaLogLevelSchema>;

export const kafkaConnectionConfigSchema = z.object({
	enabled: z.boolean().optional(),
	/**
	 * Kafka broker addresses
	 * @example ["localhost:9092", "localhost:9093"]
	 */
	brokers: z.array(z.string().min(1)).min(1),
	/** Client ID (default: "harnesslink") */
	clientId: z.string().min(1).optional(),
	/** Connection timeout in milliseconds (default: 30000) */
	connectionTimeout: z.number().int().positive().optional(),
	/** Request timeout in milliseconds (default: 30000) */
	requestTimeout: z.number().int().positive().optional(),
	ssl: z.union([z.boolean(), objectOf<ConnectionOptions>("Expected a boolean or TLS options")]).optional(),
	sasl: objectOf<SASLOptions>("Expected SASL options").optional(),
	/** KafkaJS log level (default: "warn") */
	logLevel: kafkaLogLevelSchema.optional(),
	/** Shorter timeouts and retries for local brokers */
	testMode: z.boolean().optional(),
	/** Additional KafkaJS configuration options */
	kafkaOptions: objectOf<Partial<KafkaConfig>>("Expected an object of KafkaJS options").optional(),
	/** Producer-specific configuration */
	producerOptions: objectOf<ProducerConfig>("Expected an object of producer options").optional(),
});

/**
 * Kafka connection configuration
 */
export type KafkaConnectionConfig = z.infer<typeof kafkaConnectionConfigSchema>;

/**
 * Native client exposed by a Kafka connection
 */
export interface KafkaClient {
	kafka: Kafka;
	producer: Producer;
}

