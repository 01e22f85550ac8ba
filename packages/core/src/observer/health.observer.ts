import type { ConnectionEvent, ConnectionObserver } from "./observer.types";

/**
 * Health per service type, then per connection id
 */
export type HealthSnapshot = Record<string, Record<string, boolean>>;

/**
 * Tracks connection health from lifecycle events alone; it never probes.
 * created marks a connection healthy, error unhealthy, closed forgets it.
 */
export class HealthObserver implements ConnectionObserver {
	private status = new Map<string, Map<string, boolean>>();

	onConnectionEvent(event: ConnectionEvent): void {
		switch (event.eventType) {
			case "created":
				this.set(event.serviceType, event.connectionId, true);
				break;
			case "error":
				this.set(event.serviceType, event.connectionId, false);
				break;
			case "closed":
				this.forget(event.serviceType, event.connectionId);
				break;
		}
	}

	isHealthy(serviceType: string, connectionId: string): boolean | undefined {
		return this.status.get(serviceType)?.get(connectionId);
	}

	getHealthStatus(): HealthSnapshot {
		const snapshot: HealthSnapshot = {};
		for (const [serviceType, connections] of this.status) {
			snapshot[serviceType] = Object.fromEntries(connections);
		}
		return snapshot;
	}

	reset(): void {
		this.status.clear();
	}

	private set(serviceType: string, connectionId: string, healthy: boolean): void {
		let connections = this.status.get(serviceType);
		if (!connections) {
			connections = new Map();
			this.status.set(serviceType, connections);
		}
		connections.set(connectionId, healthy);
	}

	private forget(serviceType: string, connectionId: string): void {
		const connections = this.status.get(serviceType);
		if (!connections) {
			return;
		}
		connections.delete(connectionId);
		if (connections.size === 0) {
			this.status.delete(serviceType);
		}
	}
}
