// Public surface of the PawFinder auth core
export type * from './types/index.js';
export { DEFAULT_AUTH_CONFIG, MAX_AUTO_PROMPT_FAILURES, resolveAuthConfig } from './config.js';
export type { AuthConfig } from './config.js';
export { setDebugMode, isDebugMode } from './utils/log.js';
export {
	BiometricGate,
	MockBiometricProvider,
	NoOpBiometricProvider
} from './utils/biometric.js';
export type { BiometricProvider, BiometricVerdict } from './utils/biometric.js';
export { MemorySecureStorage } from './utils/secure-storage.js';
export type { SecureStorageProvider } from './utils/secure-storage.js';
export {
	CredentialVault,
	VAULT_SCHEMA_VERSION,
	vaultKeys,
	legacyVaultKeys
} from './utils/credential-vault.js';
export { OperationLock } from './utils/operation-lock.js';
export type { LockResult } from './utils/operation-lock.js';
export {
	resolveLaunchScreen,
	biometricTypeName,
	NoOpLifecycleListener,
	ManualLifecycleListener
} from './utils/lifecycle.js';
export type { LifecycleListener } from './utils/lifecycle.js';
export {
	AUTH_ERROR_MESSAGES,
	authError,
	isSilent,
	mapBackendError,
	mapGateError,
	mapVaultError
} from './utils/auth-errors.js';
export { IdentityBackendError, MemoryIdentityBackend } from './api/identity.js';
export type {
	BackendErrorCode,
	IdentityBackendClient,
	ProfileDocument,
	SessionListener
} from './api/identity.js';
export {
	SupabaseIdentityBackend,
	createSupabaseIdentityBackend,
	mapSupabaseError,
	toIdentitySession
} from './api/supabase-identity.js';
export {
	AuthSessionController,
	PASSWORD_RESET_SENT,
	TOO_MANY_ATTEMPTS,
	buildProfile
} from './stores/auth-session.js';
export type { AuthSessionDeps, AutoPromptResult } from './stores/auth-session.js';
export { createAuthSession, startAuthSession, startPlatformAuthSession } from './auth.js';
export type { AuthSessionOptions, StartAuthSessionOptions } from './auth.js';
