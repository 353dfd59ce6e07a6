// Biometric gate: availability, tagged verdicts and cancellation
import { describe, it, expect, vi } from 'vitest';
import {
	BiometricGate,
	MockBiometricProvider,
	NoOpBiometricProvider,
	type BiometricProvider
} from './biometric.js';

describe('biometric gate', () => {
	it('succeeds when biometric is available and the user verifies', async () => {
		const provider = new MockBiometricProvider({ available: true, type: 'fingerprint' }, true);
		const gate = new BiometricGate(provider);

		expect(await gate.isAvailable()).toBe(true);
		expect(await gate.capability()).toBe('fingerprint');

		const result = await gate.evaluate('Sign in to PawFinder');
		expect(result).toEqual({ ok: true });
		expect(provider.prompts).toEqual(['Sign in to PawFinder']);
	});

	it('returns failed when the user does not match', async () => {
		const provider = new MockBiometricProvider({ available: true, type: 'face' }, false);
		const gate = new BiometricGate(provider);

		const result = await gate.evaluate('Sign in');
		expect(result).toEqual({ ok: false, error: { kind: 'failed' } });
	});

	it('passes queued platform errors through unchanged', async () => {
		const provider = new MockBiometricProvider({ available: true, type: 'face' });
		provider.queueVerdict({ success: false, error: { kind: 'lockedOut' } });
		const gate = new BiometricGate(provider);

		expect(await gate.evaluate('Sign in')).toEqual({ ok: false, error: { kind: 'lockedOut' } });
		// Queue drained, default verdict again
		expect(await gate.evaluate('Sign in')).toEqual({ ok: true });
	});

	it('reports notAvailable without prompting when the device lacks biometrics', async () => {
		const gate = new BiometricGate(new NoOpBiometricProvider());

		expect(await gate.isAvailable()).toBe(false);
		expect(await gate.capability()).toBe('none');
		expect(await gate.evaluate('Sign in')).toEqual({ ok: false, error: { kind: 'notAvailable' } });
	});

	it('keeps the hardware type when the policy cannot be evaluated', async () => {
		const provider = new MockBiometricProvider({ available: false, type: 'face' });
		const gate = new BiometricGate(provider);

		expect(await gate.capability()).toBe('face');
		expect(await gate.isAvailable()).toBe(false);
		expect(await gate.evaluate('Sign in')).toEqual({ ok: false, error: { kind: 'notAvailable' } });
		expect(provider.prompts).toEqual([]);
	});

	it('explains why the policy cannot be evaluated', async () => {
		const provider = new MockBiometricProvider({ available: true, type: 'fingerprint' });
		const gate = new BiometricGate(provider);
		expect(await gate.unavailableReason()).toBeNull();

		provider.setCapability({ available: false, type: 'fingerprint' });
		expect(await gate.unavailableReason()).toEqual({ kind: 'notAvailable' });

		provider.setCapability({ available: false, type: 'fingerprint', reason: { kind: 'lockedOut' } });
		expect(await gate.unavailableReason()).toEqual({ kind: 'lockedOut' });
	});

	it('turns a throwing provider into an other error', async () => {
		const provider: BiometricProvider = {
			isAvailable: async () => ({ available: true, type: 'fingerprint' }),
			verify: async () => {
				throw new Error('sensor offline');
			}
		};
		const gate = new BiometricGate(provider);

		expect(await gate.evaluate('Sign in')).toEqual({
			ok: false,
			error: { kind: 'other', message: 'sensor offline' }
		});
	});

	it('treats a failing capability query as unavailable', async () => {
		const provider: BiometricProvider = {
			isAvailable: async () => {
				throw new Error('plugin missing');
			},
			verify: async () => ({ success: true })
		};
		const gate = new BiometricGate(provider);

		expect(await gate.isAvailable()).toBe(false);
		expect(await gate.capability()).toBe('none');
	});

	it('resolves appCancelled for an already aborted signal', async () => {
		const provider = new MockBiometricProvider({ available: true, type: 'fingerprint' });
		const gate = new BiometricGate(provider);
		const controller = new AbortController();
		controller.abort();

		expect(await gate.evaluate('Sign in', controller.signal)).toEqual({
			ok: false,
			error: { kind: 'appCancelled' }
		});
		expect(provider.prompts).toEqual([]);
	});

	it('cancels an open prompt when the signal aborts', async () => {
		const provider = new MockBiometricProvider({ available: true, type: 'fingerprint' });
		provider.hold();
		const gate = new BiometricGate(provider);
		const controller = new AbortController();

		const pending = gate.evaluate('Sign in', controller.signal);
		await vi.waitFor(() => expect(provider.prompts).toHaveLength(1));
		controller.abort();

		expect(await pending).toEqual({ ok: false, error: { kind: 'appCancelled' } });
		provider.release();
	});

	it('invalidate cancels every open prompt', async () => {
		const provider = new MockBiometricProvider({ available: true, type: 'face' });
		provider.hold();
		const gate = new BiometricGate(provider);

		const first = gate.evaluate('one');
		const second = gate.evaluate('two');
		await vi.waitFor(() => expect(provider.prompts).toHaveLength(2));
		gate.invalidate();

		expect(await first).toEqual({ ok: false, error: { kind: 'appCancelled' } });
		expect(await second).toEqual({ ok: false, error: { kind: 'appCancelled' } });
		provider.release();

		// Later evaluations are unaffected
		expect(await gate.evaluate('three')).toEqual({ ok: true });
	});
});
