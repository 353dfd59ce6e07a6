/**
 * Supabase-backed identity backend.
 *
 * Auth calls go to Supabase Auth; profile documents live in a table named
 * after the collection, keyed by an `id` column holding the auth user id.
 * Auth failures are classified by their `code` and rethrown as
 * {@link IdentityBackendError}.
 */

import {
	createClient,
	isAuthError,
	isAuthRetryableFetchError,
	type SupabaseClient,
	type User
} from '@supabase/supabase-js';
import type { IdentitySession } from '$lib/types/index.js';
import {
	IdentityBackendError,
	type BackendErrorCode,
	type IdentityBackendClient,
	type ProfileDocument,
	type SessionListener
} from './identity.js';
import { debugLog } from '$lib/utils/log.js';

const SUPABASE_ERROR_CODES: Partial<Record<string, BackendErrorCode>> = {
	invalid_credentials: 'invalidCredentials',
	user_not_found: 'accountNotFound',
	user_banned: 'accountDisabled',
	email_address_invalid: 'invalidInput',
	validation_failed: 'invalidInput',
	email_exists: 'accountExists',
	user_already_exists: 'accountExists',
	weak_password: 'weakSecret',
	over_request_rate_limit: 'rateLimited',
	over_email_send_rate_limit: 'rateLimited',
	email_provider_disabled: 'operationNotAllowed',
	signup_disabled: 'operationNotAllowed',
	provider_disabled: 'operationNotAllowed',
	request_timeout: 'network'
};

/** Classify a Supabase (or fetch) failure */
export function mapSupabaseError(err: unknown): IdentityBackendError {
	if (isAuthRetryableFetchError(err)) {
		return new IdentityBackendError('network', err.message);
	}
	if (isAuthError(err)) {
		const code = err.code ? SUPABASE_ERROR_CODES[err.code] : undefined;
		if (code) return new IdentityBackendError(code, err.message);
		if (err.status === 429) return new IdentityBackendError('rateLimited', err.message);
		return new IdentityBackendError('unknown', err.message);
	}
	// fetch() rejects with a TypeError when the device is offline
	if (err instanceof TypeError) {
		return new IdentityBackendError('network', err.message);
	}
	return new IdentityBackendError('unknown', err instanceof Error ? err.message : String(err));
}

function stringOrNull(value: unknown): string | null {
	return typeof value === 'string' && value !== '' ? value : null;
}

function isRecord(value: unknown): value is ProfileDocument {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Bare session fields from a Supabase user */
export function toIdentitySession(user: User): IdentitySession {
	const metadata: Record<string, unknown> = user.user_metadata ?? {};
	return {
		uid: user.id,
		email: user.email ?? '',
		displayName: stringOrNull(metadata.display_name) ?? stringOrNull(metadata.full_name),
		emailVerified: Boolean(user.email_confirmed_at),
		createdAt: user.created_at,
		photoUrl: stringOrNull(metadata.avatar_url),
		phoneNumber: stringOrNull(user.phone)
	};
}

export interface SupabaseIdentityOptions {
	/** Where the password reset email links to */
	passwordResetRedirect?: string;
}

export class SupabaseIdentityBackend implements IdentityBackendClient {
	private client: SupabaseClient;
	private options: SupabaseIdentityOptions;

	constructor(client: SupabaseClient, options: SupabaseIdentityOptions = {}) {
		this.client = client;
		this.options = options;
	}

	async signIn(identifier: string, secret: string): Promise<IdentitySession> {
		const { data, error } = await this.client.auth.signInWithPassword({
			email: identifier,
			password: secret
		});
		if (error) throw mapSupabaseError(error);
		if (!data.user) throw new IdentityBackendError('unknown', 'No user returned');
		return toIdentitySession(data.user);
	}

	async signUp(identifier: string, secret: string): Promise<IdentitySession> {
		const { data, error } = await this.client.auth.signUp({ email: identifier, password: secret });
		if (error) throw mapSupabaseError(error);
		if (!data.user) throw new IdentityBackendError('unknown', 'No user returned');
		// With email confirmation on, an existing address comes back as a user without identities
		if (data.user.identities?.length === 0) {
			throw new IdentityBackendError('accountExists');
		}
		return toIdentitySession(data.user);
	}

	async signOut(): Promise<void> {
		const { error } = await this.client.auth.signOut();
		if (error) throw mapSupabaseError(error);
	}

	async sendPasswordReset(identifier: string): Promise<void> {
		const redirectTo = this.options.passwordResetRedirect;
		const { error } = await this.client.auth.resetPasswordForEmail(
			identifier,
			redirectTo ? { redirectTo } : undefined
		);
		if (error) throw mapSupabaseError(error);
	}

	onSessionChange(listener: SessionListener): () => void {
		const { data } = this.client.auth.onAuthStateChange((event, session) => {
			debugLog('[Supabase] Auth event', event);
			listener(session ? toIdentitySession(session.user) : null);
		});
		return () => data.subscription.unsubscribe();
	}

	async currentSession(): Promise<IdentitySession | null> {
		const { data, error } = await this.client.auth.getSession();
		if (error) throw mapSupabaseError(error);
		return data.session ? toIdentitySession(data.session.user) : null;
	}

	async getDocument(collection: string, id: string): Promise<ProfileDocument | null> {
		const { data, error } = await this.client.from(collection).select('*').eq('id', id).maybeSingle();
		if (error) throw new IdentityBackendError('unknown', error.message);
		return isRecord(data) ? data : null;
	}

	async setDocument(collection: string, id: string, fields: ProfileDocument): Promise<void> {
		const { error } = await this.client.from(collection).upsert({ ...fields, id });
		if (error) throw new IdentityBackendError('unknown', error.message);
	}

	async updateDisplayName(displayName: string): Promise<void> {
		const { error } = await this.client.auth.updateUser({
			data: { display_name: displayName, full_name: displayName }
		});
		if (error) throw mapSupabaseError(error);
	}
}

/** Build a backend over a fresh client; sessions persist and refresh in the background */
export function createSupabaseIdentityBackend(
	url: string,
	anonKey: string,
	options: SupabaseIdentityOptions = {}
): SupabaseIdentityBackend {
	const client = createClient(url, anonKey, {
		auth: {
			persistSession: true,
			autoRefreshToken: true,
			detectSessionInUrl: false
		}
	});
	return new SupabaseIdentityBackend(client, options);
}
