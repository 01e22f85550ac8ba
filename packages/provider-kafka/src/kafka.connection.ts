/**
 * Kafka Connection
 *
 * KafkaJS client plus a connected producer. KafkaJS log output is routed
 * into the harnesslink logger.
 */

import { BaseConnection, createLogger, type Logger } from "harnesslink";
import { Kafka, type KafkaConfig, type LogEntry, logLevel } from "kafkajs";
import type { KafkaClient, KafkaConnectionConfig, KafkaLogLevelName } from "./kafka.types";

const LOG_LEVELS: Record<KafkaLogLevelName, logLevel> = {
	nothing: logLevel.NOTHING,
	error: logLevel.ERROR,
	warn: logLevel.WARN,
	info: logLevel.INFO,
	debug: logLevel.DEBUG,
};

// Faster failure against local brokers
const TEST_MODE_CONFIG: Partial<KafkaConfig> = {
	connectionTimeout: 3000,
	requestTimeout: 5000,
	enforceRequestTimeout: true,
	retry: {
		initialRetryTime: 100,
		retries: 3,
		maxRetryTime: 1000,
	},
};

/**
 * Kafka Connection
 *
 * @example
 * ```typescript
 * const connection = new KafkaConnection("events", { brokers: ["localhost:9092"] });
 * await connection.open();
 *
 * await connection.getClient().producer.send({ topic: "orders", messages: [{ value: "created" }] });
 * await connection.close();
 * ```
 */
export class KafkaConnection extends BaseConnection<KafkaClient> {
	readonly config: KafkaConnectionConfig;

	private client: KafkaClient | null = null;
	private readonly logger: Logger;

	constructor(id: string, config: KafkaConnectionConfig, serviceType = "kafka", logger?: Logger) {
		super(serviceType, id);
		this.config = config;
		this.logger = logger ?? createLogger({ component: "kafkajs" });
	}

	buildKafkaConfig(): KafkaConfig {
		return {
			clientId: this.config.clientId ?? "harnesslink",
			brokers: this.config.brokers,
			connectionTimeout: this.config.connectionTimeout ?? 30000,
			requestTimeout: this.config.requestTimeout ?? 30000,
			ssl: this.config.ssl,
			sasl: this.config.sasl,
			logLevel: LOG_LEVELS[this.config.logLevel ?? "warn"],
			logCreator: () => (entry) => this.log(entry),
			...(this.config.testMode ? TEST_MODE_CONFIG : {}),
			...this.config.kafkaOptions,
		};
	}

	protected async doOpen(): Promise<void> {
		const kafka = new Kafka(this.buildKafkaConfig());
		const producer = kafka.producer(this.config.producerOptions);

		await producer.connect();
		this.client = { kafka, producer };
	}

	protected async doClose(): Promise<void> {
		const client = this.client;
		if (!client) {
			return;
		}

		try {
			await client.producer.disconnect();
		} finally {
			this.client = null;
		}
	}

	protected nativeClient(): KafkaClient | null {
		return this.client;
	}

	/**
	 * Describe the cluster through a short-lived admin client
	 */
	override async healthCheck(): Promise<boolean> {
		if (!this.client || !this.isConnected()) {
			return false;
		}

		const admin = this.client.kafka.admin();
		try {
			await admin.connect();
			const cluster = await admin.describeCluster();
			return cluster.brokers.length > 0;
		} catch (error) {
			this.logger.debug({ connectionId: this.id, error }, "Kafka health check failed");
			return false;
		} finally {
			await admin.disconnect().catch((error: unknown) => {
				this.logger.debug({ connectionId: this.id, error }, "Kafka admin disconnect failed");
			});
		}
	}

	private log({ namespace, level, log }: LogEntry): void {
		const { message, ...extra } = log;
		const record = { namespace, connectionId: this.id, ...extra };

		switch (level) {
			case logLevel.ERROR:
				this.logger.error(record, message);
				break;
			case logLevel.WARN:
				this.logger.warn(record, message);
				break;
			case logLevel.INFO:
				this.logger.info(record, message);
				break;
			case logLevel.DEBUG:
				this.logger.debug(record, message);
				break;
		}
	}
}
