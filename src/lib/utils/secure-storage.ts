// Persistent key/value storage used by the credential vault

/** Provider interface for native key/value storage (mockable in tests) */
export interface SecureStorageProvider {
	get(key: string): Promise<string | null>;
	set(key: string, value: string): Promise<void>;
	remove(key: string): Promise<void>;
}

/** In-memory implementation for testing */
export class MemorySecureStorage implements SecureStorageProvider {
	private store = new Map<string, string>();
	private failingKeys = new Set<string>();

	async get(key: string): Promise<string | null> {
		return this.store.get(key) ?? null;
	}

	async set(key: string, value: string): Promise<void> {
		if (this.failingKeys.has(key)) {
			throw new Error(`write rejected for ${key}`);
		}
		this.store.set(key, value);
	}

	async remove(key: string): Promise<void> {
		this.store.delete(key);
	}

	clear(): void {
		this.store.clear();
	}

	has(key: string): boolean {
		return this.store.has(key);
	}

	keys(): string[] {
		return [...this.store.keys()];
	}

	/** Make every later write to `key` reject (simulates a full or locked store) */
	failWritesTo(key: string): void {
		this.failingKeys.add(key);
	}
}

/** Read a boolean flag stored as "true"/"false" */
export async function readFlag(storage: SecureStorageProvider, key: string): Promise<boolean> {
	const val = await storage.get(key);
	return val === 'true';
}

/** Write a boolean flag as "true"/"false" */
export async function writeFlag(
	storage: SecureStorageProvider,
	key: string,
	value: boolean
): Promise<void> {
	await storage.set(key, value ? 'true' : 'false');
}
