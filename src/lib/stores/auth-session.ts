/**
 * Auth session controller.
 *
 * Reconciles three asynchronous inputs into one published {@link AuthUIState}:
 * the identity backend's session feed, the credential vault (and the biometric
 * gate behind it), and the single-flight {@link OperationLock}. Every request
 * method resolves to an {@link AuthOutcome}; nothing rejects across this
 * boundary.
 *
 * Store updates all happen on the JS event loop, so the lock check and its
 * acquisition are never separated by an await.
 */
import { writable, derived, get, type Readable } from 'svelte/store';
import type {
	AuthError,
	AuthOutcome,
	AuthPhase,
	AuthUIState,
	BiometricType,
	IdentitySession,
	LaunchScreen,
	OperationName,
	UserProfile,
	VaultError
} from '$lib/types/index.js';
import type { IdentityBackendClient } from '$lib/api/identity.js';
import { resolveAuthConfig, type AuthConfig } from '$lib/config.js';
import type { BiometricGate } from '$lib/utils/biometric.js';
import type { CredentialVault } from '$lib/utils/credential-vault.js';
import { OperationLock } from '$lib/utils/operation-lock.js';
import {
	authError,
	isSilent,
	mapBackendError,
	mapGateError,
	mapVaultError
} from '$lib/utils/auth-errors.js';
import {
	biometricTypeName,
	resolveLaunchScreen,
	type LifecycleListener
} from '$lib/utils/lifecycle.js';
import { debugError, debugLog, debugWarn, setDebugMode } from '$lib/utils/log.js';

export const PASSWORD_RESET_SENT = 'Password reset email sent!';
export const TOO_MANY_ATTEMPTS = 'Too many attempts. Please use email and password to sign in.';
const REPLAY_FAILED = 'Sign-in failed. Please use your email and password.';
const BIOMETRIC_GONE = 'Biometric authentication is not available. Please use email and password.';
const BIOMETRIC_UNAVAILABLE_NOW =
	'Biometric authentication is not available right now. Please use email and password.';
const BIOMETRIC_LOCKED = 'Biometric authentication is locked. Please use your device passcode and try again.';
const PROFILE_SAVE_FAILED = 'Your account was created, but saving your profile failed. Please try again.';

export interface AuthSessionDeps {
	backend: IdentityBackendClient;
	gate: BiometricGate;
	vault: CredentialVault;
	config?: Partial<AuthConfig>;
}

/** Why an automatic prompt did or did not run */
export type AutoPromptResult =
	| { attempted: true; outcome: AuthOutcome }
	| {
			attempted: false;
			reason: 'already_attempted' | 'suppressed' | 'signed_in' | 'busy' | 'not_enabled' | 'disposed';
	  };

interface ControllerState {
	session: IdentitySession | null;
	profile: UserProfile | null;
	isBiometricAuthenticated: boolean;
	isBiometricEnabled: boolean;
	biometricType: BiometricType;
	error: AuthError | null;
	noticeMessage: string | null;
	requiresExplicitUnlock: boolean;
}

const INITIAL_STATE: ControllerState = {
	session: null,
	profile: null,
	isBiometricAuthenticated: false,
	isBiometricEnabled: false,
	biometricType: 'none',
	error: null,
	noticeMessage: null,
	requiresExplicitUnlock: false
};

const OK: AuthOutcome = { ok: true };

function phaseFor(operation: OperationName | null, session: IdentitySession | null): AuthPhase {
	if (operation === 'sign_in' || operation === 'biometric_sign_in') return 'authenticating';
	if (operation === 'sign_up') return 'signing_up';
	return session ? 'signed_in' : 'signed_out';
}

/** Profile snapshot from the bare session plus whatever the profile document adds */
export function buildProfile(
	session: IdentitySession,
	fullName: string,
	extras: { profileImageUrl?: string | null; phoneNumber?: string | null } = {}
): UserProfile {
	return {
		id: session.uid,
		email: session.email,
		fullName,
		firstName: fullName.split(' ')[0] || fullName,
		createdAt: session.createdAt,
		profileImageUrl: extras.profileImageUrl ?? session.photoUrl,
		phoneNumber: extras.phoneNumber ?? session.phoneNumber,
		isEmailVerified: session.emailVerified
	};
}

function nonEmptyString(value: unknown): string | null {
	return typeof value === 'string' && value.trim() !== '' ? value : null;
}

export class AuthSessionController {
	private backend: IdentityBackendClient;
	private gate: BiometricGate;
	private vault: CredentialVault;
	private config: AuthConfig;
	private lock = new OperationLock();
	private internal = writable<ControllerState>(INITIAL_STATE);
	private abort = new AbortController();

	private startup: Promise<void> | null = null;
	private disposed = false;
	private sessionSeen = false;
	private sessionGeneration = 0;
	private pendingProfile: Promise<void> = Promise.resolve();
	private pendingAutoPrompt: Promise<AutoPromptResult> | null = null;
	private unsubscribers: Array<() => void> = [];

	private autoAttempted = false;
	private consecutiveFailures = 0;

	/** Published snapshot consumed by the presentation layer */
	readonly state: Readable<AuthUIState>;
	readonly isAuthenticated: Readable<boolean>;
	readonly errorMessage: Readable<string | null>;
	readonly launchScreen: Readable<LaunchScreen>;
	/** Display name of the device's biometric kind */
	readonly biometricLabel: Readable<string>;

	constructor(deps: AuthSessionDeps) {
		this.backend = deps.backend;
		this.gate = deps.gate;
		this.vault = deps.vault;
		this.config = resolveAuthConfig(deps.config);
		if (this.config.debug) setDebugMode(true);

		this.state = derived([this.internal, this.lock.current], ([$s, $op]): AuthUIState => ({
			phase: phaseFor($op, $s.session),
			isAuthenticated: $s.session !== null,
			isLoading: $op !== null,
			isBiometricAuthenticated: $s.isBiometricAuthenticated,
			isBiometricEnabled: $s.isBiometricEnabled,
			biometricType: $s.biometricType,
			errorMessage: $s.error ? $s.error.message : null,
			error: $s.error,
			noticeMessage: $s.noticeMessage,
			currentSession: $s.profile,
			busyOperation: $op,
			requiresExplicitUnlock: $s.requiresExplicitUnlock
		}));
		this.isAuthenticated = derived(this.state, ($s) => $s.isAuthenticated);
		this.errorMessage = derived(this.state, ($s) => $s.errorMessage);
		this.launchScreen = derived(this.state, ($s) => resolveLaunchScreen($s));
		this.biometricLabel = derived(this.state, ($s) => biometricTypeName($s.biometricType));
	}

	/** Current snapshot without subscribing */
	snapshot(): AuthUIState {
		return get(this.state);
	}

	/**
	 * Erase legacy vault keys, read biometric state and subscribe to the
	 * session feed. Safe to call more than once.
	 */
	start(): Promise<void> {
		if (this.startup === null) {
			this.startup = this.initialize();
		}
		return this.startup;
	}

	/** Resolves once the latest profile reload and automatic prompt have finished */
	async settled(): Promise<void> {
		if (this.pendingAutoPrompt) await this.pendingAutoPrompt;
		await this.pendingProfile;
	}

	// ── Session feed ──────────────────────────────────────────────

	private async initialize(): Promise<void> {
		this.unsubscribers.push(this.backend.onSessionChange((session) => this.handleSessionChange(session)));

		try {
			await this.vault.migrateLegacyKeys();
		} catch (err) {
			debugError('[Auth] Legacy vault cleanup failed:', err);
		}
		await this.refreshBiometricState();

		if (!this.sessionSeen) {
			try {
				const session = await this.backend.currentSession();
				if (!this.sessionSeen) this.handleSessionChange(session);
			} catch (err) {
				debugWarn('[Auth] Could not read current session:', err);
			}
		}
	}

	private handleSessionChange(session: IdentitySession | null): void {
		if (this.disposed) return;
		this.sessionSeen = true;
		const generation = ++this.sessionGeneration;

		if (!session) {
			debugLog('[Auth] Signed out');
			this.update({ session: null, profile: null, isBiometricAuthenticated: false });
			return;
		}

		debugLog('[Auth] Session for', session.uid);
		this.update({ session });
		this.pendingProfile = this.reloadProfile(session, generation);
	}

	/** Treat a session returned by a backend call like a feed signal, unless the feed already delivered it */
	private adoptSession(session: IdentitySession | null): void {
		const current = get(this.internal).session;
		if ((current?.uid ?? null) !== (session?.uid ?? null)) {
			this.handleSessionChange(session);
		}
	}

	private async reloadProfile(session: IdentitySession, generation: number): Promise<void> {
		const profile = await this.loadProfile(session);
		if (this.disposed || generation !== this.sessionGeneration) return;
		this.update({ profile });
	}

	private async loadProfile(session: IdentitySession): Promise<UserProfile> {
		try {
			const doc = await this.backend.getDocument(this.config.profileCollection, session.uid);
			const fullName = doc ? nonEmptyString(doc.fullName) : null;
			if (doc && fullName) {
				return buildProfile(session, fullName, {
					profileImageUrl: nonEmptyString(doc.profileImageUrl),
					phoneNumber: nonEmptyString(doc.phoneNumber)
				});
			}
		} catch (err) {
			debugWarn('[Auth] Profile load failed, using session fields:', err);
		}
		return buildProfile(session, session.displayName ?? 'User');
	}

	/** Reload the cached profile for the current session */
	async refreshCurrentUser(): Promise<void> {
		const session = get(this.internal).session;
		if (!session) return;
		const generation = ++this.sessionGeneration;
		this.pendingProfile = this.reloadProfile(session, generation);
		await this.pendingProfile;
	}

	/** Re-read capability and vault state (e.g. after returning from system settings) */
	async refreshBiometricState(): Promise<void> {
		try {
			const [biometricType, isBiometricEnabled] = await Promise.all([
				this.gate.capability(),
				this.vault.isEnabled()
			]);
			this.update({ biometricType, isBiometricEnabled });
		} catch (err) {
			debugError('[Auth] Could not read biometric state:', err);
			this.update({ isBiometricEnabled: false });
		}
	}

	// ── Password flows ────────────────────────────────────────────

	async requestSignIn(identifier: string, secret: string, alsoEnableBiometric = false): Promise<AuthOutcome> {
		if (this.lock.isHeld) return this.busy('sign_in');
		const id = identifier.trim();
		if (id === '' || secret === '') {
			return this.fail(authError('invalidInput', 'Email and password are required.'));
		}

		const outcome = await this.runLocked('sign_in', async () => {
			this.update({ error: null, noticeMessage: null });
			try {
				const session = await this.backend.signIn(id, secret);
				this.adoptSession(session);
				debugLog('[Auth] Password sign-in succeeded');
				return OK;
			} catch (err) {
				debugWarn('[Auth] Password sign-in failed:', err);
				return this.fail(mapBackendError(err));
			}
		});

		// Runs under its own lock acquisition; a failure here does not undo the sign-in
		if (outcome.ok && alsoEnableBiometric && (await this.gate.isAvailable())) {
			await this.enableBiometric(id, secret);
		}
		return outcome;
	}

	/**
	 * Create the account, write its profile document, then set the display
	 * name. Once the account exists it is never rolled back: later failures
	 * come back with `accountCreated: true` and can be retried through
	 * {@link completeProfile}.
	 */
	async requestSignUp(identifier: string, secret: string, profileName: string): Promise<AuthOutcome> {
		if (this.lock.isHeld) return this.busy('sign_up');
		const id = identifier.trim();
		const name = profileName.trim();
		if (id === '' || secret === '' || name === '') {
			return this.fail(authError('invalidInput', 'Email, password and name are required.'));
		}

		return this.runLocked('sign_up', async () => {
			this.update({ error: null, noticeMessage: null });
			let session: IdentitySession;
			try {
				session = await this.backend.signUp(id, secret);
			} catch (err) {
				debugWarn('[Auth] Account creation failed:', err);
				return this.fail(mapBackendError(err));
			}
			this.adoptSession(session);
			return this.writeProfile(session, name);
		});
	}

	/** Retry the profile steps of a sign-up for the signed-in account */
	async completeProfile(profileName: string): Promise<AuthOutcome> {
		if (this.lock.isHeld) return this.busy('complete_profile');
		const name = profileName.trim();
		if (name === '') return this.fail(authError('invalidInput', 'Please enter your name.'));

		return this.runLocked('complete_profile', async () => {
			const session = get(this.internal).session;
			if (!session) {
				return this.fail(authError('unknown', 'Sign in to finish setting up your profile.'));
			}
			this.update({ error: null, noticeMessage: null });
			return this.writeProfile(session, name);
		});
	}

	private async writeProfile(session: IdentitySession, fullName: string): Promise<AuthOutcome> {
		try {
			await this.backend.setDocument(this.config.profileCollection, session.uid, {
				fullName,
				email: session.email,
				createdAt: new Date().toISOString(),
				isEmailVerified: session.emailVerified
			});
			await this.backend.updateDisplayName(fullName);
		} catch (err) {
			debugError('[Auth] Profile setup failed after account creation:', err);
			const mapped = mapBackendError(err);
			return this.fail({ code: mapped.code, message: PROFILE_SAVE_FAILED, hint: 'retry' }, true);
		}
		await this.refreshCurrentUser();
		return OK;
	}

	/** Sign out remotely. Biometric opt-in survives so the next sign-in can replay. */
	async requestSignOut(): Promise<AuthOutcome> {
		if (this.lock.isHeld) return this.busy('sign_out');

		return this.runLocked('sign_out', async () => {
			try {
				await this.backend.signOut();
			} catch (err) {
				const mapped = mapBackendError(err);
				return this.fail({ ...mapped, message: `Error signing out: ${mapped.message}` });
			}
			this.adoptSession(null);
			this.update({ isBiometricAuthenticated: false, error: null, noticeMessage: null });
			return OK;
		});
	}

	/** Not lock-guarded: it cannot race any terminal state */
	async requestPasswordReset(identifier: string): Promise<AuthOutcome> {
		const id = identifier.trim();
		if (id === '') return this.fail(authError('invalidInput'));

		this.update({ error: null, noticeMessage: null });
		try {
			await this.backend.sendPasswordReset(id);
		} catch (err) {
			return this.fail(mapBackendError(err));
		}
		this.update({ noticeMessage: PASSWORD_RESET_SENT });
		return OK;
	}

	// ── Biometric flows ───────────────────────────────────────────

	/** Explicit (tapped) biometric sign-in; allowed even when auto prompts are suppressed */
	requestBiometricSignIn(): Promise<AuthOutcome> {
		return this.biometricSignIn();
	}

	/**
	 * Launch prompt: at most once per foreground cycle, and not at all once
	 * consecutive failures reach the configured cap.
	 */
	async autoBiometricSignIn(): Promise<AutoPromptResult> {
		if (this.disposed) return { attempted: false, reason: 'disposed' };
		if (this.autoAttempted) return { attempted: false, reason: 'already_attempted' };
		const current = get(this.internal);
		if (current.requiresExplicitUnlock) return { attempted: false, reason: 'suppressed' };
		if (current.session) return { attempted: false, reason: 'signed_in' };
		if (this.lock.isHeld) return { attempted: false, reason: 'busy' };

		this.autoAttempted = true;
		let enabled: boolean;
		try {
			enabled = await this.vault.isEnabled();
		} catch (err) {
			debugError('[Auth] Could not read biometric state for automatic prompt:', err);
			return { attempted: false, reason: 'not_enabled' };
		}
		this.update({ isBiometricEnabled: enabled });
		if (!enabled) return { attempted: false, reason: 'not_enabled' };

		debugLog('[Auth] Automatic biometric prompt');
		const outcome = await this.biometricSignIn();
		return { attempted: true, outcome };
	}

	/** A new foreground cycle allows one more automatic prompt */
	onForeground(): void {
		this.autoAttempted = false;
	}

	/**
	 * Start a foreground cycle and run its automatic prompt in the background.
	 * Await {@link settled} to observe the result.
	 */
	promptOnLaunch(): void {
		this.onForeground();
		this.pendingAutoPrompt = this.autoBiometricSignIn();
	}

	/** Drive the launch prompt from app foreground events */
	bindLifecycle(listener: LifecycleListener): void {
		this.unsubscribers.push(listener.onForeground(() => this.promptOnLaunch()));
	}

	private async biometricSignIn(): Promise<AuthOutcome> {
		if (this.lock.isHeld) return this.busy('biometric_sign_in');

		const outcome = await this.runLocked('biometric_sign_in', async () => {
			this.update({ error: null, noticeMessage: null });
			// A disabled or broken record is rejected before any prompt
			const retrieved = await this.vault.retrieve(this.abort.signal);
			if (!retrieved.ok) return this.handleRetrieveFailure(retrieved.error);

			const { identifier, secret } = retrieved.value;
			try {
				const session = await this.backend.signIn(identifier, secret);
				this.adoptSession(session);
				this.update({ isBiometricAuthenticated: true });
				debugLog('[Auth] Biometric sign-in succeeded');
				return OK;
			} catch (err) {
				// Stored secret may be stale; the vault stays enabled
				debugWarn('[Auth] Credential replay failed:', err);
				const mapped = mapBackendError(err);
				if (mapped.code === 'network' || mapped.code === 'rateLimited') {
					return this.fail({ ...mapped, hint: 'retry' });
				}
				return this.fail({ code: mapped.code, message: REPLAY_FAILED, hint: 'use_password' });
			}
		});

		this.recordBiometricOutcome(outcome);
		return outcome;
	}

	private async handleRetrieveFailure(error: VaultError): Promise<AuthOutcome> {
		switch (error.kind) {
			case 'disabled':
				this.update({ isBiometricEnabled: false });
				return this.fail(mapVaultError(error));
			case 'corrupted':
				// The vault has already erased itself
				this.update({ isBiometricEnabled: false });
				return this.fail(mapVaultError(error));
			case 'unavailable': {
				// Lockout and similar states pass; the record is kept
				this.update({ isBiometricEnabled: false });
				const mapped = mapGateError(error.reason);
				const message = error.reason.kind === 'lockedOut' ? BIOMETRIC_LOCKED : BIOMETRIC_UNAVAILABLE_NOW;
				return this.fail({ code: mapped.code, message, hint: 'use_password' });
			}
			case 'gateFailed': {
				const reason = error.reason;
				const mapped = mapGateError(reason);
				if (reason.kind === 'notAvailable' || reason.kind === 'notEnrolled') {
					await this.vault.disable();
					this.update({ isBiometricEnabled: false });
					return this.fail({ code: mapped.code, message: BIOMETRIC_GONE, hint: 'use_password' });
				}
				if (reason.kind === 'lockedOut') {
					return this.fail({ code: mapped.code, message: BIOMETRIC_LOCKED, hint: 'use_password' });
				}
				if (reason.kind === 'userCancelled') {
					return this.fail(mapped);
				}
				return this.fail({ ...mapped, hint: 'retry' });
			}
			default:
				return this.fail(mapVaultError(error));
		}
	}

	private recordBiometricOutcome(outcome: AuthOutcome): void {
		if (outcome.ok) {
			this.consecutiveFailures = 0;
			this.update({ requiresExplicitUnlock: false });
			return;
		}
		// Neither reached a prompt
		if (outcome.error.code === 'busy' || outcome.error.code === 'vaultDisabled') return;

		this.consecutiveFailures++;
		if (this.consecutiveFailures >= this.config.maxAutoPromptFailures) {
			debugWarn('[Auth] Biometric failed', this.consecutiveFailures, 'times, automatic prompts off');
			const showing = get(this.internal).error;
			this.update({
				requiresExplicitUnlock: true,
				error: showing ? { ...showing, message: TOO_MANY_ATTEMPTS, hint: 'use_password' } : null
			});
		}
	}

	/** Settings toggle: prompt once, then store the pair */
	async enableBiometric(identifier: string, secret: string): Promise<AuthOutcome> {
		if (this.lock.isHeld) return this.busy('enable_biometric');

		return this.runLocked('enable_biometric', async () => {
			const result = await this.vault.enable(identifier.trim(), secret, this.abort.signal);
			if (!result.ok) {
				return this.fail(mapVaultError(result.error));
			}
			await this.refreshBiometricState();
			this.consecutiveFailures = 0;
			this.update({ error: null, requiresExplicitUnlock: false });
			debugLog('[Auth] Biometric sign-in enabled');
			return OK;
		});
	}

	async disableBiometric(): Promise<AuthOutcome> {
		if (this.lock.isHeld) return this.busy('disable_biometric');

		return this.runLocked('disable_biometric', async () => {
			await this.vault.disable();
			this.consecutiveFailures = 0;
			this.update({
				isBiometricEnabled: false,
				isBiometricAuthenticated: false,
				requiresExplicitUnlock: false
			});
			return OK;
		});
	}

	/** Check the sensor works; the outcome is returned, not published */
	async testBiometric(): Promise<AuthOutcome> {
		if (this.lock.isHeld) return this.busy('test_biometric');

		return this.runLocked('test_biometric', async () => {
			const result = await this.vault.test(this.abort.signal);
			return result.ok ? OK : { ok: false, error: mapVaultError(result.error) };
		});
	}

	// ── Housekeeping ──────────────────────────────────────────────

	/** Dismiss the current error and notice */
	clearError(): void {
		this.update({ error: null, noticeMessage: null });
	}

	/** Unsubscribe from every feed and cancel pending biometric prompts */
	dispose(): void {
		if (this.disposed) return;
		this.disposed = true;
		this.unsubscribers.forEach((unsubscribe) => unsubscribe());
		this.unsubscribers = [];
		this.abort.abort();
		this.gate.invalidate();
	}

	private async runLocked(name: OperationName, task: () => Promise<AuthOutcome>): Promise<AuthOutcome> {
		const result = await this.lock.run(name, async () => {
			try {
				return await task();
			} catch (err) {
				debugError(`[Auth] ${name} failed unexpectedly:`, err);
				return this.fail(authError('unknown', err instanceof Error ? err.message : undefined));
			}
		});
		return result.acquired ? result.value : this.busy(name);
	}

	private busy(name: OperationName): AuthOutcome {
		debugWarn('[Auth] Refused', name, 'while another operation is running');
		return { ok: false, error: authError('busy') };
	}

	/** Publish an error (a silent one clears the field) and return it as an outcome */
	private fail(error: AuthError, accountCreated = false): AuthOutcome {
		this.update({ error: isSilent(error) ? null : error, noticeMessage: null });
		return accountCreated ? { ok: false, error, accountCreated } : { ok: false, error };
	}

	private update(patch: Partial<ControllerState>): void {
		if (this.disposed) return;
		this.internal.update((state) => ({ ...state, ...patch }));
	}
}
