/**
 * Provider Registry
 *
 * Instance-owned map from service type to provider. The manager and its
 * pool share one registry, so a registration is visible to both at once.
 */

import type { ConnectionProvider } from "./provider.types";

export class ProviderRegistry {
	private providers = new Map<string, ConnectionProvider>();

	/**
	 * Register a provider, replacing any previous one for the service type
	 *
	 * @returns the replaced provider, if any
	 */
	register(serviceType: string, provider: ConnectionProvider): ConnectionProvider | undefined {
		const previous = this.providers.get(serviceType);
		this.providers.set(serviceType, provider);
		return previous;
	}

	unregister(serviceType: string): boolean {
		return this.providers.delete(serviceType);
	}

	get(serviceType: string): ConnectionProvider | undefined {
		return this.providers.get(serviceType);
	}

	has(serviceType: string): boolean {
		return this.providers.has(serviceType);
	}

	/**
	 * Snapshot of all registrations
	 */
	getAll(): Map<string, ConnectionProvider> {
		return new Map(this.providers);
	}

	serviceTypes(): string[] {
		return [...this.providers.keys()];
	}

	clear(): void {
		this.providers.clear();
	}

	get size(): number {
		return this.providers.size;
	}
}
