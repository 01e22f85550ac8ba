/**
 * Keyed Lock
 *
 * One AsyncLock per key, created on demand and dropped once idle,
 * so work on unrelated keys never waits on each other.
 */

import { AsyncLock } from "./async-lock";

export class KeyedLock {
	private locks = new Map<string, AsyncLock>();

	/**
	 * Run fn exclusively for the given key
	 */
	async runExclusive<T>(key: string, fn: () => T | Promise<T>): Promise<T> {
		let lock = this.locks.get(key);
		if (!lock) {
			lock = new AsyncLock();
			this.locks.set(key, lock);
		}

		try {
			return await lock.runExclusive(fn);
		} finally {
			if (!lock.isLocked() && this.locks.get(key) === lock) {
				this.locks.delete(key);
			}
		}
	}

	/**
	 * Whether work for the key is running or queued
	 */
	isLocked(key: string): boolean {
		return this.locks.get(key)?.isLocked() ?? false;
	}

	/**
	 * Number of keys with running or queued work
	 */
	get size(): number {
		return this.locks.size;
	}
}
