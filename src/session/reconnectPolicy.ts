import type { ReconnectConfig } from '../config/monitorConfig';

export interface ReconnectPolicy {
	initialDelayMs: number;
	maxDelayMs: number;
	multiplier: number;
	/** Fraction of the computed delay added or removed at random, 0..1. */
	jitterFraction: number;
	/** Retries after the first attempt; unlimited when absent. */
	maxAttempts?: number;
}

export const DEFAULT_RECONNECT_POLICY: Readonly<ReconnectPolicy> = {
	initialDelayMs: 1_000,
	maxDelayMs: 30_000,
	multiplier: 2,
	jitterFraction: 0.1
};

export function reconnectPolicyFromConfig(config: ReconnectConfig): ReconnectPolicy {
	return {
		initialDelayMs: config.initialDelayMs,
		maxDelayMs: config.maxDelayMs,
		multiplier: config.multiplier,
		jitterFraction: config.jitterFraction,
		maxAttempts: config.maxAttempts
	};
}

/**
 * Backoff for the given zero-based attempt. `random` must return a value in
 * [0, 1); it is drawn exactly once.
 */
export function delayForAttempt(policy: ReconnectPolicy, attempt: number, random: () => number = Math.random): number {
	const exponent = Math.max(0, attempt);
	const base = Math.min(policy.initialDelayMs * Math.pow(policy.multiplier, exponent), policy.maxDelayMs);
	const jitter = (random() * 2 - 1) * base * policy.jitterFraction;
	return Math.max(0, Math.round(base + jitter));
}

export function hasAttemptsLeft(policy: ReconnectPolicy, attempt: number): boolean {
	return policy.maxAttempts === undefined || attempt < policy.maxAttempts;
}
