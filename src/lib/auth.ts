// Wiring: build the gate, vault and controller from injected platform providers
import type { IdentityBackendClient } from '$lib/api/identity.js';
import { resolveAuthConfig, type AuthConfig } from '$lib/config.js';
import { BiometricGate, type BiometricProvider } from '$lib/utils/biometric.js';
import { CredentialVault } from '$lib/utils/credential-vault.js';
import type { SecureStorageProvider } from '$lib/utils/secure-storage.js';
import type { LifecycleListener } from '$lib/utils/lifecycle.js';
import {
	createBiometricProvider,
	createLifecycleListener,
	createSecureStorage
} from '$lib/utils/capacitor-init.js';
import { AuthSessionController } from '$lib/stores/auth-session.js';

export interface AuthSessionOptions {
	backend: IdentityBackendClient;
	biometricProvider: BiometricProvider;
	storage: SecureStorageProvider;
	config?: Partial<AuthConfig>;
}

export function createAuthSession(options: AuthSessionOptions): AuthSessionController {
	const config = resolveAuthConfig(options.config);
	const gate = new BiometricGate(options.biometricProvider);
	const vault = new CredentialVault(options.storage, gate, {
		appName: config.appName,
		storagePrefix: config.storagePrefix
	});
	return new AuthSessionController({ backend: options.backend, gate, vault, config });
}

export interface StartAuthSessionOptions extends AuthSessionOptions {
	lifecycle: LifecycleListener;
}

/**
 * Start the controller, run the launch prompt and re-run it on every
 * foreground event. Cold start emits no foreground event of its own.
 */
export async function startAuthSession(options: StartAuthSessionOptions): Promise<AuthSessionController> {
	const controller = createAuthSession(options);
	await controller.start();
	controller.bindLifecycle(options.lifecycle);
	controller.promptOnLaunch();
	return controller;
}

/** App entry point: pick the platform providers, then {@link startAuthSession} */
export async function startPlatformAuthSession(
	backend: IdentityBackendClient,
	config: Partial<AuthConfig> = {}
): Promise<AuthSessionController> {
	const resolved = resolveAuthConfig(config);
	const [biometricProvider, storage, lifecycle] = await Promise.all([
		createBiometricProvider(resolved.appName),
		createSecureStorage(),
		createLifecycleListener()
	]);

	return startAuthSession({ backend, biometricProvider, storage, lifecycle, config: resolved });
}
