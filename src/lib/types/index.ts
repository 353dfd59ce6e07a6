// Auth core type definitions shared by the gate, vault and session controller

/** Biometric hardware kind reported by the platform */
export type BiometricType = 'face' | 'fingerprint' | 'iris' | 'none';

/** Biometric capability info */
export interface BiometricCapability {
	/** Whether the platform policy can be evaluated right now (enrolled, not locked out, passcode set) */
	available: boolean;
	type: BiometricType;
	/** Platform reason when `available` is false, if it gave one */
	reason?: GateError;
}

/** Why a biometric evaluation did not succeed */
export type GateError =
	| { kind: 'userCancelled' }
	| { kind: 'notAvailable' }
	| { kind: 'notEnrolled' }
	| { kind: 'lockedOut' }
	| { kind: 'passcodeNotSet' }
	| { kind: 'appCancelled' }
	| { kind: 'systemCancelled' }
	| { kind: 'failed' }
	| { kind: 'other'; message: string };

export type GateErrorKind = GateError['kind'];

/** Outcome of a single biometric evaluation */
export type GateResult = { ok: true } | { ok: false; error: GateError };

/** Why a vault operation did not succeed */
export type VaultError =
	| { kind: 'invalidInput' }
	| { kind: 'disabled' }
	| { kind: 'corrupted' }
	/** Gate cannot be evaluated right now; the record is kept */
	| { kind: 'unavailable'; reason: GateError }
	| { kind: 'persistenceFailed'; message: string }
	| { kind: 'gateFailed'; reason: GateError };

export type VaultResult<T = void> = { ok: true; value: T } | { ok: false; error: VaultError };

/** Credential pair replayed against the identity backend */
export interface StoredCredentials {
	identifier: string;
	secret: string;
}

/** Bare session fields published by the identity backend */
export interface IdentitySession {
	uid: string;
	email: string;
	displayName: string | null;
	emailVerified: boolean;
	/** ISO-8601 */
	createdAt: string;
	photoUrl: string | null;
	phoneNumber: string | null;
}

/** Cached profile snapshot shown by the presentation layer */
export interface UserProfile {
	id: string;
	email: string;
	fullName: string;
	firstName: string;
	createdAt: string;
	profileImageUrl: string | null;
	phoneNumber: string | null;
	isEmailVerified: boolean;
}

/** Error taxonomy surfaced to callers */
export type AuthErrorCode =
	| 'invalidCredentials'
	| 'accountNotFound'
	| 'accountDisabled'
	| 'invalidInput'
	| 'accountExists'
	| 'weakSecret'
	| 'network'
	| 'rateLimited'
	| 'operationNotAllowed'
	| 'gateUnavailable'
	| 'gateNotEnrolled'
	| 'gateLockedOut'
	| 'gateCancelled'
	| 'gateFailed'
	| 'vaultCorrupted'
	| 'vaultDisabled'
	| 'vaultWriteFailed'
	| 'busy'
	| 'unknown';

/** Suggested next step for the user */
export type AuthErrorHint = 'use_password' | 'retry' | 'open_settings';

export interface AuthError {
	code: AuthErrorCode;
	message: string;
	hint?: AuthErrorHint;
}

/** Result of every controller request */
export type AuthOutcome =
	| { ok: true }
	| { ok: false; error: AuthError; accountCreated?: boolean };

/** Operations guarded by the single-flight lock */
export type OperationName =
	| 'enable_biometric'
	| 'disable_biometric'
	| 'test_biometric'
	| 'biometric_sign_in'
	| 'sign_in'
	| 'sign_up'
	| 'sign_out'
	| 'complete_profile';

/** Session phase of the state machine */
export type AuthPhase = 'signed_out' | 'authenticating' | 'signed_in' | 'signing_up';

/** Published snapshot consumed by the presentation layer */
export interface AuthUIState {
	phase: AuthPhase;
	isAuthenticated: boolean;
	isLoading: boolean;
	isBiometricAuthenticated: boolean;
	isBiometricEnabled: boolean;
	biometricType: BiometricType;
	errorMessage: string | null;
	error: AuthError | null;
	noticeMessage: string | null;
	currentSession: UserProfile | null;
	busyOperation: OperationName | null;
	/** Automatic biometric prompts are suppressed until the user taps */
	requiresExplicitUnlock: boolean;
}

/** Screen the presentation layer should show on launch */
export type LaunchScreen = 'welcome' | 'biometric_unlock' | 'home';
