// Capacitor provider selection: native plugins on iOS/Android, inert providers on web
//
// Native modules are lazy-imported so web builds never load them.
import { Capacitor } from '@capacitor/core';
import type { BiometricProvider } from './biometric.js';
import type { SecureStorageProvider } from './secure-storage.js';
import type { LifecycleListener } from './lifecycle.js';

/** Whether the app is running on a native platform (iOS/Android) */
export function isNative(): boolean {
	return Capacitor.isNativePlatform();
}

/**
 * Create the appropriate BiometricProvider for the current platform.
 * On web nothing can be evaluated, so biometric replay is never offered.
 */
export async function createBiometricProvider(appName: string): Promise<BiometricProvider> {
	if (!isNative()) {
		const { NoOpBiometricProvider } = await import('./biometric.js');
		return new NoOpBiometricProvider();
	}
	const { CapacitorBiometricProvider } = await import('./capacitor-biometric.js');
	return new CapacitorBiometricProvider(appName);
}

/** Vault storage: Capacitor Preferences on device, in-memory on web */
export async function createSecureStorage(): Promise<SecureStorageProvider> {
	if (!isNative()) {
		const { MemorySecureStorage } = await import('./secure-storage.js');
		return new MemorySecureStorage();
	}
	const { CapacitorSecureStorageProvider } = await import('./capacitor-secure-storage.js');
	return new CapacitorSecureStorageProvider();
}

/** Create the appropriate LifecycleListener for the current platform. */
export async function createLifecycleListener(): Promise<LifecycleListener> {
	if (!isNative()) {
		const { NoOpLifecycleListener } = await import('./lifecycle.js');
		return new NoOpLifecycleListener();
	}
	const { CapacitorLifecycleListener } = await import('./capacitor-lifecycle.js');
	return new CapacitorLifecycleListener();
}
