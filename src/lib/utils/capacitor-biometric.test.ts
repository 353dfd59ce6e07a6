// Capacitor biometric provider over a mocked native plugin
import { describe, it, expect, vi, beforeEach } from 'vitest';

const native = vi.hoisted(() => ({
	isAvailable: vi.fn(),
	verifyIdentity: vi.fn()
}));

vi.mock('@capgo/capacitor-native-biometric', () => ({
	NativeBiometric: native,
	BiometryType: {
		NONE: 0,
		TOUCH_ID: 1,
		FACE_ID: 2,
		FINGERPRINT: 3,
		FACE_AUTHENTICATION: 4,
		IRIS_AUTHENTICATION: 5,
		MULTIPLE: 6
	}
}));

import { BiometryType } from '@capgo/capacitor-native-biometric';
import { CapacitorBiometricProvider, mapBiometryType, mapNativeError } from './capacitor-biometric.js';

describe('capacitor biometric provider', () => {
	beforeEach(() => {
		native.isAvailable.mockReset();
		native.verifyIdentity.mockReset();
	});

	it('maps native biometry types', () => {
		expect(mapBiometryType({ isAvailable: true, biometryType: BiometryType.FACE_ID })).toBe('face');
		expect(mapBiometryType({ isAvailable: true, biometryType: BiometryType.TOUCH_ID })).toBe('fingerprint');
		expect(mapBiometryType({ isAvailable: true, biometryType: BiometryType.MULTIPLE })).toBe('fingerprint');
		expect(mapBiometryType({ isAvailable: true, biometryType: BiometryType.IRIS_AUTHENTICATION })).toBe('iris');
		expect(mapBiometryType({ isAvailable: false, biometryType: BiometryType.NONE })).toBe('none');
	});

	it('maps native error codes', () => {
		expect(mapNativeError({ code: '16', message: 'cancelled' })).toEqual({ kind: 'userCancelled' });
		expect(mapNativeError({ code: 4 })).toEqual({ kind: 'lockedOut' });
		expect(mapNativeError({ code: '3' })).toEqual({ kind: 'notEnrolled' });
		expect(mapNativeError(new Error('plugin crashed'))).toEqual({
			kind: 'other',
			message: 'plugin crashed'
		});
	});

	it('reports capability from the plugin', async () => {
		native.isAvailable.mockResolvedValueOnce({ isAvailable: true, biometryType: BiometryType.FACE_ID });
		const provider = new CapacitorBiometricProvider('PawFinder');

		expect(await provider.isAvailable()).toEqual({ available: true, type: 'face' });
	});

	it('reads a lockout from the capability error code', async () => {
		native.isAvailable.mockResolvedValueOnce({
			isAvailable: false,
			biometryType: BiometryType.FACE_ID,
			errorCode: 4
		});
		const provider = new CapacitorBiometricProvider('PawFinder');

		expect(await provider.isAvailable()).toEqual({
			available: false,
			type: 'face',
			reason: { kind: 'lockedOut' }
		});
	});

	it('treats a rejected capability query as unavailable', async () => {
		native.isAvailable.mockRejectedValueOnce(new Error('not implemented on web'));
		const provider = new CapacitorBiometricProvider('PawFinder');

		expect(await provider.isAvailable()).toEqual({ available: false, type: 'none' });
	});

	it('prompts with the reason and app name', async () => {
		native.verifyIdentity.mockResolvedValueOnce(undefined);
		const provider = new CapacitorBiometricProvider('PawFinder');

		expect(await provider.verify('Sign in to PawFinder')).toEqual({ success: true });
		expect(native.verifyIdentity).toHaveBeenCalledWith({
			reason: 'Sign in to PawFinder',
			title: 'PawFinder',
			subtitle: 'Verify your identity',
			negativeButtonText: 'Use Password'
		});
	});

	it('returns a tagged failure when the prompt is rejected', async () => {
		native.verifyIdentity.mockRejectedValueOnce({ code: '17', message: 'Use Password tapped' });
		const provider = new CapacitorBiometricProvider('PawFinder');

		expect(await provider.verify('Sign in')).toEqual({
			success: false,
			error: { kind: 'userCancelled' }
		});
	});
});
