// Identity backend contract consumed by the session controller
import type { AuthErrorCode, IdentitySession } from '$lib/types/index.js';

/** Failure codes a backend adapter may reject with */
export type BackendErrorCode = Extract<
	AuthErrorCode,
	| 'invalidCredentials'
	| 'accountNotFound'
	| 'accountDisabled'
	| 'invalidInput'
	| 'accountExists'
	| 'weakSecret'
	| 'network'
	| 'rateLimited'
	| 'operationNotAllowed'
	| 'unknown'
>;

export class IdentityBackendError extends Error {
	readonly code: BackendErrorCode;

	constructor(code: BackendErrorCode, message = '') {
		super(message);
		this.name = 'IdentityBackendError';
		this.code = code;
	}
}

export type SessionListener = (session: IdentitySession | null) => void;

export type ProfileDocument = Record<string, unknown>;

/**
 * Remote identity backend. Every method rejects with IdentityBackendError on
 * a failure the backend can classify.
 */
export interface IdentityBackendClient {
	signIn(identifier: string, secret: string): Promise<IdentitySession>;
	signUp(identifier: string, secret: string): Promise<IdentitySession>;
	signOut(): Promise<void>;
	sendPasswordReset(identifier: string): Promise<void>;
	/** Subscribe to session changes; returns the unsubscribe function */
	onSessionChange(listener: SessionListener): () => void;
	currentSession(): Promise<IdentitySession | null>;
	getDocument(collection: string, id: string): Promise<ProfileDocument | null>;
	setDocument(collection: string, id: string, fields: ProfileDocument): Promise<void>;
	updateDisplayName(displayName: string): Promise<void>;
}

type BackendMethod = Exclude<keyof IdentityBackendClient, 'onSessionChange'>;

interface MemoryAccount {
	secret: string;
	session: IdentitySession;
	disabled: boolean;
}

/** In-memory backend for testing */
export class MemoryIdentityBackend implements IdentityBackendClient {
	private accounts = new Map<string, MemoryAccount>();
	private documents = new Map<string, ProfileDocument>();
	private listeners = new Set<SessionListener>();
	private current: IdentitySession | null = null;
	private failures = new Map<BackendMethod, Error>();
	private holds = new Map<BackendMethod, Promise<void>>();
	private nextUid = 1;

	/** Every call made, in order, with its arguments */
	readonly calls: Array<{ method: BackendMethod; args: unknown[] }> = [];

	addAccount(identifier: string, secret: string, displayName: string | null = null): IdentitySession {
		const session: IdentitySession = {
			uid: `uid-${this.nextUid++}`,
			email: identifier,
			displayName,
			emailVerified: false,
			createdAt: '2026-01-01T00:00:00.000Z',
			photoUrl: null,
			phoneNumber: null
		};
		this.accounts.set(identifier, { secret, session, disabled: false });
		return session;
	}

	disableAccount(identifier: string): void {
		const account = this.accounts.get(identifier);
		if (account) account.disabled = true;
	}

	changeSecret(identifier: string, secret: string): void {
		const account = this.accounts.get(identifier);
		if (account) account.secret = secret;
	}

	/** Reject the next call to `method` with `error` */
	failNext(method: BackendMethod, error: Error): void {
		this.failures.set(method, error);
	}

	/** Keep the next call to `method` pending until the returned function runs */
	holdNext(method: BackendMethod): () => void {
		let release = () => {};
		this.holds.set(
			method,
			new Promise<void>((resolve) => {
				release = resolve;
			})
		);
		return release;
	}

	/** Push a session change as if it came from another device or a token refresh */
	emitSession(session: IdentitySession | null): void {
		this.current = session;
		this.listeners.forEach((listener) => listener(session));
	}

	listenerCount(): number {
		return this.listeners.size;
	}

	document(collection: string, id: string): ProfileDocument | null {
		return this.documents.get(`${collection}/${id}`) ?? null;
	}

	callsTo(method: BackendMethod): unknown[][] {
		return this.calls.filter((call) => call.method === method).map((call) => call.args);
	}

	async signIn(identifier: string, secret: string): Promise<IdentitySession> {
		await this.enter('signIn', [identifier, secret]);
		const account = this.accounts.get(identifier);
		if (!account) throw new IdentityBackendError('accountNotFound');
		if (account.disabled) throw new IdentityBackendError('accountDisabled');
		if (account.secret !== secret) throw new IdentityBackendError('invalidCredentials');
		this.emitSession(account.session);
		return account.session;
	}

	async signUp(identifier: string, secret: string): Promise<IdentitySession> {
		await this.enter('signUp', [identifier, secret]);
		if (this.accounts.has(identifier)) throw new IdentityBackendError('accountExists');
		if (secret.length < 6) throw new IdentityBackendError('weakSecret');
		const session = this.addAccount(identifier, secret);
		this.emitSession(session);
		return session;
	}

	async signOut(): Promise<void> {
		await this.enter('signOut', []);
		this.emitSession(null);
	}

	async sendPasswordReset(identifier: string): Promise<void> {
		await this.enter('sendPasswordReset', [identifier]);
		if (!this.accounts.has(identifier)) throw new IdentityBackendError('accountNotFound');
	}

	onSessionChange(listener: SessionListener): () => void {
		this.listeners.add(listener);
		return () => {
			this.listeners.delete(listener);
		};
	}

	async currentSession(): Promise<IdentitySession | null> {
		await this.enter('currentSession', []);
		return this.current;
	}

	async getDocument(collection: string, id: string): Promise<ProfileDocument | null> {
		await this.enter('getDocument', [collection, id]);
		return this.document(collection, id);
	}

	async setDocument(collection: string, id: string, fields: ProfileDocument): Promise<void> {
		await this.enter('setDocument', [collection, id, fields]);
		this.documents.set(`${collection}/${id}`, { ...fields });
	}

	async updateDisplayName(displayName: string): Promise<void> {
		await this.enter('updateDisplayName', [displayName]);
		if (!this.current) throw new IdentityBackendError('unknown', 'No signed-in user');
		const updated = { ...this.current, displayName };
		this.current = updated;
		const account = this.accounts.get(updated.email);
		if (account) account.session = updated;
	}

	private async enter(method: BackendMethod, args: unknown[]): Promise<void> {
		this.calls.push({ method, args });
		const hold = this.holds.get(method);
		if (hold) {
			this.holds.delete(method);
			await hold;
		}
		const failure = this.failures.get(method);
		if (failure) {
			this.failures.delete(method);
			throw failure;
		}
	}
}
