// CapacitorLifecycleListener: wraps @capacitor/app state changes
import { App, type AppState } from '@capacitor/app';
import type { PluginListenerHandle } from '@capacitor/core';
import type { LifecycleListener } from './lifecycle.js';
import { debugError } from './log.js';

/** Capacitor implementation using @capacitor/app */
export class CapacitorLifecycleListener implements LifecycleListener {
	onForeground(callback: () => void): () => void {
		return this.listen((state) => {
			if (state.isActive) callback();
		});
	}

	onBackground(callback: () => void): () => void {
		return this.listen((state) => {
			if (!state.isActive) callback();
		});
	}

	private listen(handler: (state: AppState) => void): () => void {
		const handle: Promise<PluginListenerHandle> = App.addListener('appStateChange', handler);
		return () => {
			handle
				.then((h) => h.remove())
				.catch((err: unknown) => debugError('[Lifecycle] Failed to remove listener:', err));
		};
	}
}
