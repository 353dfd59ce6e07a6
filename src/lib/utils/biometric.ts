// Biometric gate: tagged verdicts over a pluggable platform evaluator
import type {
	BiometricCapability,
	BiometricType,
	GateError,
	GateResult
} from '$lib/types/index.js';
import { debugWarn } from './log.js';

/** Platform verdict for a single prompt */
export type BiometricVerdict = { success: true } | { success: false; error: GateError };

/** Provider interface for native biometric APIs (mockable in tests) */
export interface BiometricProvider {
	isAvailable(): Promise<BiometricCapability>;
	verify(reason: string): Promise<BiometricVerdict>;
}

/** Default no-op provider when no native API is available */
export class NoOpBiometricProvider implements BiometricProvider {
	async isAvailable(): Promise<BiometricCapability> {
		return { available: false, type: 'none' };
	}
	async verify(_reason: string): Promise<BiometricVerdict> {
		return { success: false, error: { kind: 'notAvailable' } };
	}
}

/** In-memory provider for testing */
export class MockBiometricProvider implements BiometricProvider {
	private capability: BiometricCapability;
	private verdicts: BiometricVerdict[] = [];
	private defaultVerdict: BiometricVerdict;
	private pending: Array<() => void> = [];
	private holdPrompts = false;

	/** Reasons passed to every prompt, in order */
	readonly prompts: string[] = [];

	constructor(capability: BiometricCapability, shouldSucceed = true) {
		this.capability = capability;
		this.defaultVerdict = shouldSucceed
			? { success: true }
			: { success: false, error: { kind: 'failed' } };
	}

	async isAvailable(): Promise<BiometricCapability> {
		return this.capability;
	}

	async verify(reason: string): Promise<BiometricVerdict> {
		this.prompts.push(reason);
		const verdict = this.verdicts.shift() ?? this.defaultVerdict;
		if (this.holdPrompts) {
			await new Promise<void>((resolve) => this.pending.push(resolve));
		}
		return verdict;
	}

	setCapability(capability: BiometricCapability): void {
		this.capability = capability;
	}

	setSuccess(value: boolean): void {
		this.defaultVerdict = value ? { success: true } : { success: false, error: { kind: 'failed' } };
	}

	/** Queue a verdict for the next prompt only */
	queueVerdict(verdict: BiometricVerdict): void {
		this.verdicts.push(verdict);
	}

	/** Keep prompts open until {@link release} is called */
	hold(): void {
		this.holdPrompts = true;
	}

	release(): void {
		this.holdPrompts = false;
		const waiting = this.pending;
		this.pending = [];
		waiting.forEach((resolve) => resolve());
	}
}

const CANCELLED: GateResult = { ok: false, error: { kind: 'appCancelled' } };

/** Biometric gate logic: availability checks and cancellable evaluations */
export class BiometricGate {
	private provider: BiometricProvider;
	private inFlight = new Set<AbortController>();

	constructor(provider: BiometricProvider) {
		this.provider = provider;
	}

	/** Hardware kind, regardless of whether it can be evaluated right now */
	async capability(): Promise<BiometricType> {
		const cap = await this.readCapability();
		return cap.type;
	}

	/** True when hardware is present and the policy can be evaluated now */
	async isAvailable(): Promise<boolean> {
		const cap = await this.readCapability();
		return cap.type !== 'none' && cap.available;
	}

	/** Why the policy cannot be evaluated now, or null when it can */
	async unavailableReason(): Promise<GateError | null> {
		const cap = await this.readCapability();
		if (cap.type !== 'none' && cap.available) return null;
		return cap.reason ?? { kind: 'notAvailable' };
	}

	/**
	 * Prompt for biometric proof of presence.
	 * Always resolves to a tagged result; provider failures become `other`.
	 */
	async evaluate(reason: string, signal?: AbortSignal): Promise<GateResult> {
		if (signal?.aborted) return CANCELLED;
		if (!(await this.isAvailable())) {
			return { ok: false, error: { kind: 'notAvailable' } };
		}

		const controller = new AbortController();
		const onAbort = () => controller.abort();
		signal?.addEventListener('abort', onAbort, { once: true });
		this.inFlight.add(controller);

		const cancelled = new Promise<GateResult>((resolve) => {
			controller.signal.addEventListener('abort', () => resolve(CANCELLED), { once: true });
		});

		try {
			return await Promise.race([this.verify(reason), cancelled]);
		} finally {
			this.inFlight.delete(controller);
			signal?.removeEventListener('abort', onAbort);
		}
	}

	/** Cancel every evaluation still waiting on the platform */
	invalidate(): void {
		const controllers = [...this.inFlight];
		this.inFlight.clear();
		controllers.forEach((controller) => controller.abort());
	}

	private async verify(reason: string): Promise<GateResult> {
		try {
			const verdict = await this.provider.verify(reason);
			return verdict.success ? { ok: true } : { ok: false, error: verdict.error };
		} catch (err) {
			debugWarn('[Gate] Provider threw during evaluation:', err);
			return { ok: false, error: { kind: 'other', message: errorText(err) } };
		}
	}

	private async readCapability(): Promise<BiometricCapability> {
		try {
			return await this.provider.isAvailable();
		} catch (err) {
			debugWarn('[Gate] Capability query failed:', err);
			return { available: false, type: 'none' };
		}
	}
}

function errorText(err: unknown): string {
	if (err instanceof Error) return err.message;
	return String(err);
}
