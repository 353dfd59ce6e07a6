// CapacitorBiometricProvider: wraps @capgo/capacitor-native-biometric
import { NativeBiometric, BiometryType, type AvailableResult } from '@capgo/capacitor-native-biometric';
import type { BiometricCapability, GateError } from '$lib/types/index.js';
import type { BiometricProvider, BiometricVerdict } from './biometric.js';
import { debugWarn } from './log.js';

/** Native error codes rejected by verifyIdentity() and reported by isAvailable() */
const NATIVE_ERROR_CODES: Record<number, GateError> = {
	1: { kind: 'notAvailable' },
	2: { kind: 'lockedOut' },
	3: { kind: 'notEnrolled' },
	4: { kind: 'lockedOut' },
	10: { kind: 'failed' },
	11: { kind: 'appCancelled' },
	14: { kind: 'passcodeNotSet' },
	15: { kind: 'systemCancelled' },
	16: { kind: 'userCancelled' },
	// "Use Password" button
	17: { kind: 'userCancelled' }
};

/** Maps native biometry type to our BiometricCapability type */
export function mapBiometryType(result: AvailableResult): BiometricCapability['type'] {
	switch (result.biometryType) {
		case BiometryType.TOUCH_ID:
		case BiometryType.FINGERPRINT:
		case BiometryType.MULTIPLE:
			return 'fingerprint';
		case BiometryType.FACE_ID:
		case BiometryType.FACE_AUTHENTICATION:
			return 'face';
		case BiometryType.IRIS_AUTHENTICATION:
			return 'iris';
		default:
			return 'none';
	}
}

/** Maps a verifyIdentity() rejection to a gate error */
export function mapNativeError(err: unknown): GateError {
	const code = readCode(err);
	if (code !== null && code in NATIVE_ERROR_CODES) {
		return NATIVE_ERROR_CODES[code];
	}
	const message = err instanceof Error ? err.message : String(err);
	return { kind: 'other', message };
}

function readCode(err: unknown): number | null {
	if (typeof err !== 'object' || err === null || !('code' in err)) return null;
	const code = Number(err.code);
	return Number.isInteger(code) ? code : null;
}

/** Capacitor implementation using @capgo/capacitor-native-biometric */
export class CapacitorBiometricProvider implements BiometricProvider {
	private appName: string;

	constructor(appName: string) {
		this.appName = appName;
	}

	async isAvailable(): Promise<BiometricCapability> {
		try {
			const result = await NativeBiometric.isAvailable();
			const capability: BiometricCapability = {
				available: result.isAvailable,
				type: mapBiometryType(result)
			};
			if (!result.isAvailable && result.errorCode !== undefined) {
				const reason = NATIVE_ERROR_CODES[result.errorCode];
				if (reason) capability.reason = reason;
			}
			return capability;
		} catch (err) {
			debugWarn('[Biometric] isAvailable() rejected:', err);
			return { available: false, type: 'none' };
		}
	}

	async verify(reason: string): Promise<BiometricVerdict> {
		try {
			await NativeBiometric.verifyIdentity({
				reason,
				title: this.appName,
				subtitle: 'Verify your identity',
				negativeButtonText: 'Use Password'
			});
			return { success: true };
		} catch (err) {
			return { success: false, error: mapNativeError(err) };
		}
	}
}
