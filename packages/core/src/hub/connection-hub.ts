/**
 * Connection Hub
 *
 * Facade used by test hooks and step definitions: one manager with the
 * logging, metrics and health observers already attached, initialized on
 * first use.
 */

import type { CloseOutcome } from "../pool/pool.types";
import type { Logger } from "../logger";
import { ConnectionManager } from "../manager/connection-manager";
import type { ConnectionResult } from "../manager/manager.types";
import { HealthObserver, type HealthSnapshot } from "../observer/health.observer";
import { LoggingObserver } from "../observer/logging.observer";
import { MetricsObserver, type MetricsSnapshot } from "../observer/metrics.observer";
import { type ConnectionEventType, createConnectionEvent } from "../observer/observer.types";
import { ConnectionPool } from "../pool/connection-pool";
import type { ConnectionProvider } from "../provider/provider.types";
import { ProviderRegistry } from "../provider/provider-registry";

export interface ConnectionHubOptions {
	logger?: Logger;
	/** Providers registered during initialization, keyed by service type */
	providers?: Record<string, ConnectionProvider>;
}

/**
 * Connection Hub
 *
 * @example
 * ```typescript
 * const hub = new ConnectionHub({
 *   providers: { redis: new RedisProvider({ connections: { cache: {} } }) },
 * });
 *
 * const result = await hub.createConnection("redis", "cache");
 * hub.getConnectionHealth(); // { redis: { cache: true } }
 * await hub.shutdown();
 * ```
 */
export class ConnectionHub {
	readonly manager: ConnectionManager;
	readonly registry: ProviderRegistry;
	readonly metrics = new MetricsObserver();
	readonly health = new HealthObserver();

	private readonly loggingObserver: LoggingObserver;
	private readonly initialProviders: Record<string, ConnectionProvider>;
	private initializing?: Promise<void>;

	constructor(options: ConnectionHubOptions = {}) {
		const logger = options.logger;
		this.registry = new ProviderRegistry();
		this.manager = new ConnectionManager({
			pool: new ConnectionPool({ registry: this.registry, logger }),
			logger,
		});
		this.loggingObserver = new LoggingObserver(logger);
		this.initialProviders = options.providers ?? {};
	}

	/**
	 * Initialize the manager, attach the built-in observers and register
	 * the providers given at construction. Repeated calls are no-ops.
	 */
	async initialize(): Promise<void> {
		if (!this.initializing) {
			this.initializing = this.setup().catch((error: unknown) => {
				this.initializing = undefined;
				throw error;
			});
		}
		return this.initializing;
	}

	private async setup(): Promise<void> {
		await this.manager.initialize();
		await this.manager.attachObserver(this.loggingObserver);
		await this.manager.attachObserver(this.metrics);
		await this.manager.attachObserver(this.health);

		for (const [serviceType, provider] of Object.entries(this.initialProviders)) {
			await this.manager.registerProvider(serviceType, provider);
		}
	}

	/**
	 * Close all connections, forget every provider and observer and clear health state.
	 * Metrics are kept for inspection after the run.
	 */
	async shutdown(): Promise<CloseOutcome[]> {
		if (!this.initializing) {
			return [];
		}
		await this.initializing;

		const outcomes = await this.manager.shutdown();
		await this.manager.detachObserver(this.loggingObserver);
		await this.manager.detachObserver(this.metrics);
		await this.manager.detachObserver(this.health);
		this.registry.clear();
		this.health.reset();
		this.initializing = undefined;
		return outcomes;
	}

	isInitialized(): boolean {
		return this.manager.isInitialized();
	}

	async registerProvider(serviceType: string, provider: ConnectionProvider): Promise<void> {
		await this.initialize();
		await this.manager.registerProvider(serviceType, provider);
	}

	async getProvider(serviceType: string): Promise<ConnectionProvider | undefined> {
		await this.initialize();
		return this.manager.getProvider(serviceType);
	}

	async getAllProviders(): Promise<Map<string, ConnectionProvider>> {
		await this.initialize();
		return this.registry.getAll();
	}

	async createConnection(serviceType: string, connectionId?: string): Promise<ConnectionResult> {
		await this.initialize();
		return this.manager.createConnection(serviceType, connectionId);
	}

	async getConnection(serviceType: string, connectionId: string, config?: unknown): Promise<ConnectionResult> {
		await this.initialize();
		return this.manager.getConnection(serviceType, connectionId, config);
	}

	async closeConnection(serviceType: string, connectionId: string): Promise<boolean> {
		await this.initialize();
		return this.manager.closeConnection(serviceType, connectionId);
	}

	/**
	 * Health per service type and connection id, derived from lifecycle events
	 */
	getConnectionHealth(): HealthSnapshot {
		return this.health.getHealthStatus();
	}

	/**
	 * Event counts per service type and connection id
	 */
	getConnectionMetrics(): MetricsSnapshot {
		return this.metrics.getMetrics();
	}

	/**
	 * Publish an event raised outside the pool (e.g., by a step definition)
	 */
	async notifyConnectionEvent(
		connectionId: string,
		serviceType: string,
		eventType: ConnectionEventType,
		details?: Record<string, unknown>,
	): Promise<void> {
		await this.initialize();
		await this.manager.notifyObservers(createConnectionEvent(serviceType, connectionId, eventType, details));
	}
}
