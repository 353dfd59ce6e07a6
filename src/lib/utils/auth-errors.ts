// Error taxonomy: human strings and mapping from backend, gate and vault failures
import type { AuthError, AuthErrorCode, GateError, VaultError } from '$lib/types/index.js';
import { IdentityBackendError } from '$lib/api/identity.js';

/** Default human string per code; `gateCancelled` is never shown */
export const AUTH_ERROR_MESSAGES: Record<AuthErrorCode, string> = {
	invalidCredentials: 'Incorrect email or password. Please try again.',
	accountNotFound: 'No account found with this email address.',
	accountDisabled: 'This account has been disabled.',
	invalidInput: 'Please enter a valid email address.',
	accountExists: 'An account already exists with this email address.',
	weakSecret: 'Password must be at least 6 characters long.',
	network: 'Network error. Please check your connection.',
	rateLimited: 'Too many requests. Please try again later.',
	operationNotAllowed: 'This sign-in method is not enabled.',
	gateUnavailable: 'Biometric authentication is not available on this device.',
	gateNotEnrolled: 'Please set up biometric authentication in Settings first.',
	gateLockedOut: 'Biometric authentication is temporarily locked. Please use your device passcode.',
	gateCancelled: '',
	gateFailed: 'Biometric authentication failed. Please try again.',
	vaultCorrupted: 'Biometric credentials are missing or corrupted.',
	vaultDisabled: 'Biometric authentication is not enabled.',
	vaultWriteFailed: 'Failed to save biometric settings.',
	busy: 'Another sign-in operation is already in progress.',
	unknown: 'Something went wrong. Please try again.'
};

export function authError(code: AuthErrorCode, message?: string): AuthError {
	return { code, message: message ?? AUTH_ERROR_MESSAGES[code] };
}

/** Codes whose message should not reach the published error field */
export function isSilent(error: AuthError): boolean {
	return error.code === 'gateCancelled';
}

/**
 * Map anything a backend call rejected with into the taxonomy.
 * Backend adapters reject with IdentityBackendError; anything else is `unknown`.
 */
export function mapBackendError(err: unknown): AuthError {
	if (err instanceof IdentityBackendError) {
		if (err.code === 'unknown') return authError('unknown', err.message || undefined);
		return authError(err.code);
	}
	if (err instanceof Error && err.message) {
		return authError('unknown', err.message);
	}
	return authError('unknown');
}

export function mapGateError(error: GateError): AuthError {
	switch (error.kind) {
		case 'userCancelled':
			return authError('gateCancelled');
		case 'notAvailable':
			return authError('gateUnavailable');
		case 'notEnrolled':
			return authError('gateNotEnrolled');
		case 'lockedOut':
			return authError('gateLockedOut');
		case 'passcodeNotSet':
			return authError('gateFailed', 'Please set up a device passcode first.');
		case 'appCancelled':
			return authError('gateFailed', 'Authentication was cancelled by the app.');
		case 'systemCancelled':
			return authError('gateFailed', 'Authentication was cancelled by the system.');
		case 'failed':
			return authError('gateFailed');
		case 'other':
			return authError('gateFailed', `Biometric authentication failed: ${error.message}`);
	}
}

export function mapVaultError(error: VaultError): AuthError {
	switch (error.kind) {
		case 'invalidInput':
			return authError('invalidInput', 'Email and password are required.');
		case 'disabled':
			return authError('vaultDisabled');
		case 'corrupted':
			return { ...authError('vaultCorrupted'), hint: 'use_password' };
		case 'persistenceFailed':
			return authError('vaultWriteFailed', `${error.message}.`);
		case 'unavailable':
		case 'gateFailed':
			return mapGateError(error.reason);
	}
}
