/**
 * Core Utilities
 */

/**
 * Deferred promise - a promise with externally accessible resolve/reject
 */
export interface Deferred<T> {
	promise: Promise<T>;
	resolve: (value: T) => void;
	reject: (error: Error) => void;
}

/**
 * Create a deferred promise
 */
export function createDeferred<T>(): Deferred<T> {
	let resolve: (value: T) => void = () => {};
	let reject: (error: Error) => void = () => {};
	const promise = new Promise<T>((res, rej) => {
		resolve = res;
		reject = rej;
	});
	return { promise, resolve, reject };
}

/**
 * Build the lock key for a (service type, connection id) pair.
 * Distinct pairs never share a key, whatever characters the parts contain.
 */
export function connectionKey(serviceType: string, connectionId: string): string {
	return JSON.stringify([serviceType, connectionId]);
}
