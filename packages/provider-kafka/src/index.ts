/**
 * Kafka Provider for harnesslink
 *
 * Connections expose `{ kafka, producer }` as their client.
 */

export { KafkaConnection } from "./kafka.connection";
export { createKafkaProvider, KafkaProvider, type KafkaProviderOptions } from "./kafka.provider";
export {
	type KafkaClient,
	type KafkaConnectionConfig,
	kafkaConnectionConfigSchema,
	type KafkaLogLevelName,
	kafkaLogLevelSchema,
} from "./kafka.types";
