/**
 * Credential vault: stores one (identifier, secret) pair behind a biometric gate.
 *
 * The record is three storage entries: an enabled flag, the identifier and the
 * secret. The flag is written last and the record is read back after every
 * write, so a reader never sees `enabled` without both values. A record that
 * breaks that rule anyway (manual tampering, an interrupted legacy write) is
 * erased the next time it is read.
 */
import type { GateError, StoredCredentials, VaultError, VaultResult } from '$lib/types/index.js';
import type { BiometricGate } from './biometric.js';
import { readFlag, writeFlag, type SecureStorageProvider } from './secure-storage.js';
import { debugError, debugLog, debugWarn } from './log.js';

/** Current storage schema; keys of earlier versions are erased, never read */
export const VAULT_SCHEMA_VERSION = 4;

export interface VaultKeys {
	enabled: string;
	identifier: string;
	secret: string;
}

export function vaultKeys(prefix: string): VaultKeys {
	const v = `_v${VAULT_SCHEMA_VERSION}`;
	return {
		enabled: `${prefix}_biometric_enabled${v}`,
		identifier: `${prefix}_stored_identifier${v}`,
		secret: `${prefix}_stored_secret${v}`
	};
}

/** Keys written by schema versions 1 to 3 */
export function legacyVaultKeys(prefix: string): string[] {
	const keys: string[] = ['biometric_enabled', 'user_email'];
	for (const suffix of ['', '_v2', '_v3']) {
		keys.push(
			`${prefix}_biometric_enabled${suffix}`,
			`${prefix}_stored_email${suffix}`,
			`${prefix}_stored_password${suffix}`,
			`${prefix}_biometric_prompt_shown${suffix}`
		);
	}
	return keys;
}

export interface CredentialVaultOptions {
	appName: string;
	storagePrefix: string;
}

interface RawRecord {
	enabled: boolean;
	identifier: string | null;
	secret: string | null;
}

function fail<T>(error: VaultError): VaultResult<T> {
	return { ok: false, error };
}

function gateFailed<T>(reason: GateError): VaultResult<T> {
	return fail({ kind: 'gateFailed', reason });
}

export class CredentialVault {
	private storage: SecureStorageProvider;
	private gate: BiometricGate;
	private appName: string;
	private keys: VaultKeys;
	private legacyKeys: string[];

	constructor(storage: SecureStorageProvider, gate: BiometricGate, options: CredentialVaultOptions) {
		this.storage = storage;
		this.gate = gate;
		this.appName = options.appName;
		this.keys = vaultKeys(options.storagePrefix);
		this.legacyKeys = legacyVaultKeys(options.storagePrefix);
	}

	/**
	 * Whether biometric replay can be offered. False when the gate is
	 * unavailable, whatever the stored flag says.
	 */
	async isEnabled(): Promise<boolean> {
		if (!(await this.gate.isAvailable())) return false;

		const record = await this.readRecord();
		if (!record.enabled) return false;
		if (!isComplete(record)) {
			debugWarn('[Vault] Enabled flag set without credentials, erasing');
			await this.disable();
			return false;
		}
		return true;
	}

	/** Prompt once, then store the pair. A cancelled prompt leaves the vault untouched. */
	async enable(identifier: string, secret: string, signal?: AbortSignal): Promise<VaultResult> {
		if (identifier.trim() === '' || secret === '') {
			return fail({ kind: 'invalidInput' });
		}

		const verdict = await this.gate.evaluate(
			`Enable biometric authentication for ${this.appName}`,
			signal
		);
		if (!verdict.ok) return gateFailed(verdict.error);

		try {
			await this.write(identifier, secret);
		} catch (err) {
			debugError('[Vault] Write failed, rolling back:', err);
			await this.disable();
			return fail({ kind: 'persistenceFailed', message: 'Failed to save biometric settings' });
		}

		debugLog('[Vault] Enabled for', identifier);
		return { ok: true, value: undefined };
	}

	/** Erase all three entries. Idempotent; removal errors are logged, not raised. */
	async disable(): Promise<void> {
		const results = await Promise.allSettled([
			this.storage.remove(this.keys.enabled),
			this.storage.remove(this.keys.identifier),
			this.storage.remove(this.keys.secret)
		]);
		for (const result of results) {
			if (result.status === 'rejected') {
				debugError('[Vault] Failed to remove entry:', result.reason);
			}
		}
		debugLog('[Vault] Disabled');
	}

	/**
	 * Prompt, then hand back the stored pair. A gate that cannot be evaluated
	 * right now (lockout, sensor busy) yields `unavailable` and keeps the record.
	 */
	async retrieve(signal?: AbortSignal): Promise<VaultResult<StoredCredentials>> {
		const record = await this.readRecord();
		if (!record.enabled) return fail({ kind: 'disabled' });
		if (!isComplete(record)) {
			debugWarn('[Vault] Stored credentials missing or corrupted, erasing');
			await this.disable();
			return fail({ kind: 'corrupted' });
		}
		const unavailable = await this.gate.unavailableReason();
		if (unavailable) return fail({ kind: 'unavailable', reason: unavailable });

		const verdict = await this.gate.evaluate(`Sign in to ${this.appName}`, signal);
		if (!verdict.ok) return gateFailed(verdict.error);

		return { ok: true, value: { identifier: record.identifier, secret: record.secret } };
	}

	/** Let the user check the sensor works; stored credentials are not read */
	async test(signal?: AbortSignal): Promise<VaultResult> {
		const verdict = await this.gate.evaluate('Test biometric authentication', signal);
		if (!verdict.ok) return gateFailed(verdict.error);
		return { ok: true, value: undefined };
	}

	/** Identifier of the enabled record, read without prompting */
	async storedIdentifier(): Promise<string | null> {
		const record = await this.readRecord();
		if (!record.enabled || !isComplete(record)) return null;
		return record.identifier;
	}

	/** Erase entries left by earlier schema versions. Returns how many were found. */
	async migrateLegacyKeys(): Promise<number> {
		let removed = 0;
		for (const key of this.legacyKeys) {
			if ((await this.storage.get(key)) === null) continue;
			try {
				await this.storage.remove(key);
				removed++;
			} catch (err) {
				debugError('[Vault] Failed to erase legacy key', key, err);
			}
		}
		if (removed > 0) {
			debugLog('[Vault] Erased', removed, 'legacy entries');
		}
		return removed;
	}

	private async readRecord(): Promise<RawRecord> {
		const [enabled, identifier, secret] = await Promise.all([
			readFlag(this.storage, this.keys.enabled),
			this.storage.get(this.keys.identifier),
			this.storage.get(this.keys.secret)
		]);
		return { enabled, identifier, secret };
	}

	private async write(identifier: string, secret: string): Promise<void> {
		await this.storage.set(this.keys.identifier, identifier);
		await this.storage.set(this.keys.secret, secret);
		await writeFlag(this.storage, this.keys.enabled, true);

		const stored = await this.readRecord();
		if (!stored.enabled || stored.identifier !== identifier || stored.secret !== secret) {
			throw new Error('Vault record was not persisted');
		}
	}
}

function isComplete(
	record: RawRecord
): record is RawRecord & { identifier: string; secret: string } {
	return !!record.identifier && !!record.secret;
}
