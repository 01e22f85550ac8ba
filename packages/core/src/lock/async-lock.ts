/**
 * Async Lock
 *
 * FIFO mutual exclusion for async critical sections on the event loop.
 */

import { createDeferred } from "../utils";

/**
 * Non-reentrant async mutex.
 * Callers queue in arrival order; a rejected critical section releases the lock.
 *
 * @example
 * ```typescript
 * const lock = new AsyncLock();
 * await lock.runExclusive(async () => {
 *   providers.set("redis", provider);
 * });
 * ```
 */
export class AsyncLock {
	private tail: Promise<void> = Promise.resolve();
	private pending = 0;

	/**
	 * Whether a critical section is running or queued
	 */
	isLocked(): boolean {
		return this.pending > 0;
	}

	/**
	 * Run fn once every earlier caller has finished
	 */
	async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
		const previous = this.tail;
		const release = createDeferred<void>();
		this.tail = release.promise;
		this.pending++;

		await previous;
		try {
			return await fn();
		} finally {
			this.pending--;
			release.resolve();
		}
	}
}
