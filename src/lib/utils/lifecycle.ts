// App lifecycle: foreground/background feed and launch screen selection
import type { AuthUIState, BiometricType, LaunchScreen } from '$lib/types/index.js';

/** Lifecycle event source (native Capacitor App plugin in production) */
export interface LifecycleListener {
	/** Returns the unsubscribe function */
	onForeground(callback: () => void): () => void;
	onBackground(callback: () => void): () => void;
}

/**
 * Decide which screen to show from the published auth state.
 *
 * 1. Signed in → home
 * 2. Signed out + biometric replay enabled → biometric unlock
 * 3. Otherwise → welcome (email and password)
 */
export function resolveLaunchScreen(
	state: Pick<AuthUIState, 'isAuthenticated' | 'isBiometricEnabled'>
): LaunchScreen {
	if (state.isAuthenticated) return 'home';
	if (state.isBiometricEnabled) return 'biometric_unlock';
	return 'welcome';
}

const BIOMETRIC_TYPE_NAMES: Record<BiometricType, string> = {
	face: 'Face ID',
	fingerprint: 'Touch ID',
	iris: 'Optic ID',
	none: 'Biometric'
};

/** Label for unlock screen copy, e.g. "Sign in with Face ID" */
export function biometricTypeName(type: BiometricType): string {
	return BIOMETRIC_TYPE_NAMES[type];
}

/** No-op lifecycle listener for non-native environments */
export class NoOpLifecycleListener implements LifecycleListener {
	onForeground(_callback: () => void): () => void {
		return () => {};
	}
	onBackground(_callback: () => void): () => void {
		return () => {};
	}
}

/** Lifecycle listener driven by hand, for tests and web previews */
export class ManualLifecycleListener implements LifecycleListener {
	private foreground = new Set<() => void>();
	private background = new Set<() => void>();

	onForeground(callback: () => void): () => void {
		this.foreground.add(callback);
		return () => {
			this.foreground.delete(callback);
		};
	}

	onBackground(callback: () => void): () => void {
		this.background.add(callback);
		return () => {
			this.background.delete(callback);
		};
	}

	enterForeground(): void {
		this.foreground.forEach((callback) => callback());
	}

	enterBackground(): void {
		this.background.forEach((callback) => callback());
	}

	get listenerCount(): number {
		return this.foreground.size + this.background.size;
	}
}
