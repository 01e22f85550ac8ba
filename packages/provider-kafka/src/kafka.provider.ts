/**
 * Kafka Provider
 */

import { BaseConnectionProvider, type BaseProviderOptions } from "harnesslink";
import { KafkaConnection } from "./kafka.connection";
import { type KafkaConnectionConfig, kafkaConnectionConfigSchema } from "./kafka.types";

export type KafkaProviderOptions = BaseProviderOptions<KafkaConnectionConfig>;

/**
 * Kafka Provider
 *
 * @example
 * ```typescript
 * const provider = new KafkaProvider({
 *   connections: {
 *     events: { brokers: ["localhost:9092"], clientId: "bdd-suite", testMode: true },
 *   },
 * });
 * ```
 */
export class KafkaProvider extends BaseConnectionProvider<KafkaConnection, KafkaConnectionConfig> {
	readonly serviceType = "kafka";

	protected override readonly configSchema = kafkaConnectionConfigSchema;

	protected buildConnection(connectionId: string, config: KafkaConnectionConfig): KafkaConnection {
		return new KafkaConnection(connectionId, config, this.serviceType, this.logger.child({ source: "kafkajs" }));
	}
}

/**
 * Factory function to create a Kafka provider
 */
export function createKafkaProvider(options: KafkaProviderOptions = {}): KafkaProvider {
	return new KafkaProvider(options);
}
