/**
 * Opt-in scoped console logging.
 *
 * Every call is dropped unless debug mode is on, either through
 * {@link setDebugMode} or the `debug` flag of the auth config. Callers pass a
 * bracketed scope (`[Vault]`, `[Auth]`) as the first argument, and never a
 * stored secret.
 *
 * @example
 * setDebugMode(true);
 * debugLog('[Vault]', 'enabled for', identifier);
 */

let debugEnabled = false;

/** Enable or disable debug output at runtime. */
export function setDebugMode(enabled: boolean): void {
	debugEnabled = enabled;
}

export function isDebugMode(): boolean {
	return debugEnabled;
}

export function debugLog(...args: unknown[]): void {
	if (debugEnabled) {
		console.log(...args);
	}
}

export function debugWarn(...args: unknown[]): void {
	if (debugEnabled) {
		console.warn(...args);
	}
}

export function debugError(...args: unknown[]): void {
	if (debugEnabled) {
		console.error(...args);
	}
}
