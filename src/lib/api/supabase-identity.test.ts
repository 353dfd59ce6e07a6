// Supabase identity backend: error mapping, auth calls and profile documents
import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
	AuthApiError,
	AuthRetryableFetchError,
	createClient,
	type Session,
	type SupabaseClient,
	type User
} from '@supabase/supabase-js';
import { SupabaseIdentityBackend, mapSupabaseError, toIdentitySession } from './supabase-identity.js';

function makeUser(overrides: Partial<User> = {}): User {
	return {
		id: 'user-1',
		aud: 'authenticated',
		app_metadata: {},
		user_metadata: { full_name: 'Ana Silva' },
		created_at: '2026-01-01T00:00:00Z',
		email: 'ana@example.com',
		email_confirmed_at: '2026-01-02T00:00:00Z',
		...overrides
	};
}

function makeSession(user: User): Session {
	return {
		access_token: 'test-token',
		refresh_token: 'test-refresh',
		expires_in: 3600,
		token_type: 'bearer',
		user
	};
}

interface RestCall {
	url: string;
	method: string;
	body: string | null;
}

describe('mapSupabaseError', () => {
	it('classifies auth errors by code', () => {
		const err = mapSupabaseError(new AuthApiError('Invalid login credentials', 400, 'invalid_credentials'));
		expect(err.code).toBe('invalidCredentials');
		expect(err.message).toBe('Invalid login credentials');

		expect(mapSupabaseError(new AuthApiError('taken', 422, 'user_already_exists')).code).toBe(
			'accountExists'
		);
		expect(mapSupabaseError(new AuthApiError('weak', 422, 'weak_password')).code).toBe('weakSecret');
		expect(mapSupabaseError(new AuthApiError('banned', 400, 'user_banned')).code).toBe(
			'accountDisabled'
		);
	});

	it('falls back to the status for rate limits', () => {
		expect(mapSupabaseError(new AuthApiError('slow down', 429, undefined)).code).toBe('rateLimited');
		expect(mapSupabaseError(new AuthApiError('teapot', 418, undefined)).code).toBe('unknown');
	});

	it('treats transport failures as network errors', () => {
		expect(mapSupabaseError(new AuthRetryableFetchError('fetch failed', 0)).code).toBe('network');
		expect(mapSupabaseError(new TypeError('fetch failed')).code).toBe('network');
	});

	it('keeps the message of anything else', () => {
		const err = mapSupabaseError(new Error('disk full'));
		expect(err.code).toBe('unknown');
		expect(err.message).toBe('disk full');
	});
});

describe('toIdentitySession', () => {
	it('reads display name and verification from the user', () => {
		expect(toIdentitySession(makeUser())).toEqual({
			uid: 'user-1',
			email: 'ana@example.com',
			displayName: 'Ana Silva',
			emailVerified: true,
			createdAt: '2026-01-01T00:00:00Z',
			photoUrl: null,
			phoneNumber: null
		});
	});

	it('prefers display_name and tolerates missing fields', () => {
		const session = toIdentitySession(
			makeUser({
				user_metadata: { display_name: 'Ana', avatar_url: 'https://cdn.example.com/a.png' },
				email: undefined,
				email_confirmed_at: undefined,
				phone: ''
			})
		);
		expect(session.displayName).toBe('Ana');
		expect(session.email).toBe('');
		expect(session.emailVerified).toBe(false);
		expect(session.photoUrl).toBe('https://cdn.example.com/a.png');
		expect(session.phoneNumber).toBeNull();
	});
});

describe('supabase identity backend', () => {
	let client: SupabaseClient;
	let backend: SupabaseIdentityBackend;
	let restCalls: RestCall[];
	let restResponse: () => Response;

	beforeEach(() => {
		restCalls = [];
		restResponse = () => new Response(null, { status: 201 });
		const fetchStub = async (input: RequestInfo | URL, init?: RequestInit): Promise<Response> => {
			const url = input instanceof Request ? input.url : input.toString();
			restCalls.push({
				url,
				method: init?.method ?? 'GET',
				body: typeof init?.body === 'string' ? init.body : null
			});
			return restResponse();
		};
		client = createClient('http://localhost:54321', 'test-anon-key', {
			auth: { persistSession: false, autoRefreshToken: false, detectSessionInUrl: false },
			global: { fetch: fetchStub }
		});
		backend = new SupabaseIdentityBackend(client, { passwordResetRedirect: 'pawfinder://reset' });
	});

	it('signs in with email and password', async () => {
		const user = makeUser();
		const spy = vi
			.spyOn(client.auth, 'signInWithPassword')
			.mockResolvedValueOnce({ data: { user, session: makeSession(user) }, error: null });

		const session = await backend.signIn('ana@example.com', 'test-secret');
		expect(session.uid).toBe('user-1');
		expect(spy).toHaveBeenCalledWith({ email: 'ana@example.com', password: 'test-secret' });
	});

	it('rejects sign-in with a classified error', async () => {
		vi.spyOn(client.auth, 'signInWithPassword').mockResolvedValueOnce({
			data: { user: null, session: null },
			error: new AuthApiError('Invalid login credentials', 400, 'invalid_credentials')
		});

		await expect(backend.signIn('ana@example.com', 'wrong')).rejects.toMatchObject({
			name: 'IdentityBackendError',
			code: 'invalidCredentials'
		});
	});

	it('reports an obfuscated duplicate sign-up as accountExists', async () => {
		vi.spyOn(client.auth, 'signUp').mockResolvedValueOnce({
			data: { user: makeUser({ identities: [] }), session: null },
			error: null
		});

		await expect(backend.signUp('ana@example.com', 'test-secret')).rejects.toMatchObject({
			code: 'accountExists'
		});
	});

	it('returns the new session on sign-up', async () => {
		vi.spyOn(client.auth, 'signUp').mockResolvedValueOnce({
			data: { user: makeUser({ user_metadata: {} }), session: null },
			error: null
		});

		const session = await backend.signUp('ana@example.com', 'test-secret');
		expect(session.displayName).toBeNull();
	});

	it('sends password reset with the redirect', async () => {
		const spy = vi
			.spyOn(client.auth, 'resetPasswordForEmail')
			.mockResolvedValueOnce({ data: {}, error: null });

		await backend.sendPasswordReset('ana@example.com');
		expect(spy).toHaveBeenCalledWith('ana@example.com', { redirectTo: 'pawfinder://reset' });
	});

	it('stores the display name in user metadata', async () => {
		const spy = vi
			.spyOn(client.auth, 'updateUser')
			.mockResolvedValueOnce({ data: { user: makeUser() }, error: null });

		await backend.updateDisplayName('Ana Silva');
		expect(spy).toHaveBeenCalledWith({ data: { display_name: 'Ana Silva', full_name: 'Ana Silva' } });
	});

	it('reads the current session', async () => {
		const user = makeUser();
		vi.spyOn(client.auth, 'getSession').mockResolvedValueOnce({
			data: { session: makeSession(user) },
			error: null
		});

		expect((await backend.currentSession())?.email).toBe('ana@example.com');
	});

	it('delivers the initial empty session to listeners', async () => {
		const listener = vi.fn();
		const off = backend.onSessionChange(listener);

		await vi.waitFor(() => expect(listener).toHaveBeenCalledWith(null));
		off();
	});

	it('reads a profile document by id', async () => {
		restResponse = () =>
			new Response(JSON.stringify([{ id: 'user-1', fullName: 'Ana Silva' }]), {
				status: 200,
				headers: { 'Content-Type': 'application/json' }
			});

		const doc = await backend.getDocument('users', 'user-1');
		expect(doc).toEqual({ id: 'user-1', fullName: 'Ana Silva' });

		const call = restCalls[restCalls.length - 1];
		expect(call.method).toBe('GET');
		expect(call.url).toContain('/rest/v1/users?');
		expect(call.url).toContain('id=eq.user-1');
	});

	it('returns null for a missing profile document', async () => {
		restResponse = () =>
			new Response('[]', { status: 200, headers: { 'Content-Type': 'application/json' } });

		expect(await backend.getDocument('users', 'user-2')).toBeNull();
	});

	it('upserts a profile document keyed by id', async () => {
		await backend.setDocument('users', 'user-1', { fullName: 'Ana Silva' });

		const call = restCalls[restCalls.length - 1];
		expect(call.method).toBe('POST');
		expect(call.url).toContain('/rest/v1/users');
		expect(JSON.parse(call.body ?? 'null')).toEqual({ fullName: 'Ana Silva', id: 'user-1' });
	});

	it('surfaces a failed document write as unknown', async () => {
		restResponse = () =>
			new Response(JSON.stringify({ message: 'permission denied for table users', code: '42501' }), {
				status: 403,
				headers: { 'Content-Type': 'application/json' }
			});

		await expect(backend.setDocument('users', 'user-1', { fullName: 'Ana' })).rejects.toMatchObject({
			code: 'unknown',
			message: 'permission denied for table users'
		});
	});
});
