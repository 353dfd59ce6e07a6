// Auth core configuration: app naming, storage prefix, auto-prompt policy

export interface AuthConfig {
	/** Shown in biometric prompt reasons */
	appName: string;
	/** Prefix of every vault storage key */
	storagePrefix: string;
	/** Backend collection holding one profile document per user */
	profileCollection: string;
	/** Consecutive biometric failures before automatic prompts stop */
	maxAutoPromptFailures: number;
	/** Forward scoped debug logs to the console */
	debug: boolean;
}

/** Maximum consecutive failed biometric sign-ins before auto-prompting stops */
export const MAX_AUTO_PROMPT_FAILURES = 3;

export const DEFAULT_AUTH_CONFIG: AuthConfig = {
	appName: 'PawFinder',
	storagePrefix: 'pawfinder',
	profileCollection: 'users',
	maxAutoPromptFailures: MAX_AUTO_PROMPT_FAILURES,
	debug: false
};

/**
 * Merge overrides onto the defaults and validate the result.
 * Throws on values that would make the vault or the auto-prompt policy unusable.
 */
export function resolveAuthConfig(overrides: Partial<AuthConfig> = {}): AuthConfig {
	const config: AuthConfig = { ...DEFAULT_AUTH_CONFIG, ...overrides };

	if (config.appName.trim() === '') {
		throw new Error('AuthConfig.appName must not be empty');
	}
	if (!/^[a-z0-9_]+$/i.test(config.storagePrefix)) {
		throw new Error(
			`AuthConfig.storagePrefix must be alphanumeric, got "${config.storagePrefix}"`
		);
	}
	if (config.profileCollection.trim() === '') {
		throw new Error('AuthConfig.profileCollection must not be empty');
	}
	if (!Number.isInteger(config.maxAutoPromptFailures) || config.maxAutoPromptFailures < 1) {
		throw new Error(
			`AuthConfig.maxAutoPromptFailures must be a positive integer, got ${config.maxAutoPromptFailures}`
		);
	}

	return config;
}
