import type { ConnectionEvent, ConnectionEventType, ConnectionObserver } from "./observer.types";

/**
 * Event counts for one connection
 */
export type ConnectionEventCounts = Partial<Record<ConnectionEventType, number>>;

/**
 * Event counts per service type, then per connection id
 */
export type MetricsSnapshot = Record<string, Record<string, ConnectionEventCounts>>;

/**
 * Counts lifecycle events per (service type, connection id)
 */
export class MetricsObserver implements ConnectionObserver {
	private counts = new Map<string, Map<string, ConnectionEventCounts>>();

	onConnectionEvent(event: ConnectionEvent): void {
		let connections = this.counts.get(event.serviceType);
		if (!connections) {
			connections = new Map();
			this.counts.set(event.serviceType, connections);
		}
		const counts = connections.get(event.connectionId) ?? {};
		counts[event.eventType] = (counts[event.eventType] ?? 0) + 1;
		connections.set(event.connectionId, counts);
	}

	/**
	 * Snapshot of all counters
	 */
	getMetrics(): MetricsSnapshot {
		const snapshot: MetricsSnapshot = {};
		for (const [serviceType, connections] of this.counts) {
			const perConnection: Record<string, ConnectionEventCounts> = {};
			for (const [connectionId, counts] of connections) {
				perConnection[connectionId] = { ...counts };
			}
			snapshot[serviceType] = perConnection;
		}
		return snapshot;
	}

	/**
	 * Total events of one kind across all connections
	 */
	total(eventType: ConnectionEventType): number {
		let sum = 0;
		for (const connections of this.counts.values()) {
			for (const counts of connections.values()) {
				sum += counts[eventType] ?? 0;
			}
		}
		return sum;
	}

	reset(): void {
		this.counts.clear();
	}
}
