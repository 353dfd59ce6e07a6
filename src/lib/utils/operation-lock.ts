// Single-flight lock for auth and biometric operations
import { writable, get, type Readable } from 'svelte/store';
import type { OperationName } from '$lib/types/index.js';

export type LockResult<T> = { acquired: true; value: T } | { acquired: false; holder: OperationName };

/**
 * At most one guarded operation runs at a time. A request arriving while the
 * lock is held is refused immediately; nothing queues.
 */
export class OperationLock {
	private holder = writable<OperationName | null>(null);

	/** Name of the running operation, or null when idle */
	readonly current: Readable<OperationName | null> = { subscribe: this.holder.subscribe };

	get isHeld(): boolean {
		return get(this.holder) !== null;
	}

	/**
	 * Acquire synchronously, run `task`, release on every exit path.
	 * The check and the acquisition happen in the same tick.
	 */
	async run<T>(name: OperationName, task: () => Promise<T>): Promise<LockResult<T>> {
		const holder = get(this.holder);
		if (holder !== null) {
			return { acquired: false, holder };
		}

		this.holder.set(name);
		try {
			const value = await task();
			return { acquired: true, value };
		} finally {
			this.holder.set(null);
		}
	}
}
