// CapacitorSecureStorageProvider: vault persistence on @capacitor/preferences
//
// Preferences maps to SharedPreferences (Android) / UserDefaults (iOS). Vault
// entries live in their own preferences group so that clearing app settings
// elsewhere never touches them.
import { Preferences } from '@capacitor/preferences';
import type { SecureStorageProvider } from './secure-storage.js';

/** Capacitor implementation using @capacitor/preferences */
export class CapacitorSecureStorageProvider implements SecureStorageProvider {
	private group: string;
	private configured: Promise<void> | null = null;

	constructor(group = 'PawFinderVault') {
		this.group = group;
	}

	async get(key: string): Promise<string | null> {
		await this.ensureGroup();
		const result = await Preferences.get({ key });
		return result.value;
	}

	async set(key: string, value: string): Promise<void> {
		await this.ensureGroup();
		await Preferences.set({ key, value });
	}

	async remove(key: string): Promise<void> {
		await this.ensureGroup();
		await Preferences.remove({ key });
	}

	private ensureGroup(): Promise<void> {
		if (this.configured === null) {
			this.configured = Preferences.configure({ group: this.group }).catch((err: unknown) => {
				// Let the next call retry the configuration
				this.configured = null;
				throw err;
			});
		}
		return this.configured;
	}
}
