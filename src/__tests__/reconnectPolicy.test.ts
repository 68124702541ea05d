import assert from 'node:assert/strict';
import test from 'node:test';
import {
	DEFAULT_RECONNECT_POLICY,
	delayForAttempt,
	hasAttemptsLeft,
	reconnectPolicyFromConfig
} from '../session/reconnectPolicy';

const noJitter = (): number => 0.5;

test('delayForAttempt doubles from the initial delay', () => {
	assert.equal(delayForAttempt(DEFAULT_RECONNECT_POLICY, 0, noJitter), 1000);
	assert.equal(delayForAttempt(DEFAULT_RECONNECT_POLICY, 1, noJitter), 2000);
	assert.equal(delayForAttempt(DEFAULT_RECONNECT_POLICY, 2, noJitter), 4000);
});

test('delayForAttempt caps at the maximum delay', () => {
	const policy = { initialDelayMs: 1000, maxDelayMs: 5000, multiplier: 10, jitterFraction: 0 };
	assert.equal(delayForAttempt(policy, 1, noJitter), 5000);
	assert.equal(delayForAttempt(policy, 30, noJitter), 5000);
});

test('jitter stays within the configured fraction', () => {
	const policy = { initialDelayMs: 10_000, maxDelayMs: 60_000, multiplier: 2, jitterFraction: 0.1 };
	assert.equal(delayForAttempt(policy, 0, () => 0), 9000);
	assert.equal(delayForAttempt(policy, 0, () => 0.999999), 11_000);
	const delays = new Set<number>();
	for (let index = 0; index < 50; index += 1) {
		const delay = delayForAttempt(policy, 0);
		assert.ok(delay >= 9000 && delay <= 11_000, `delay ${delay} out of range`);
		delays.add(delay);
	}
	assert.ok(delays.size > 1, 'jittered delays should not all be identical');
});

test('hasAttemptsLeft is unlimited without maxAttempts', () => {
	assert.equal(hasAttemptsLeft(DEFAULT_RECONNECT_POLICY, 1_000), true);
	const limited = { ...DEFAULT_RECONNECT_POLICY, maxAttempts: 3 };
	assert.equal(hasAttemptsLeft(limited, 2), true);
	assert.equal(hasAttemptsLeft(limited, 3), false);
});

test('reconnectPolicyFromConfig copies every field', () => {
	assert.deepEqual(
		reconnectPolicyFromConfig({
			initialDelayMs: 500,
			maxDelayMs: 8000,
			multiplier: 1.5,
			jitterFraction: 0.2,
			maxAttempts: 4
		}),
		{ initialDelayMs: 500, maxDelayMs: 8000, multiplier: 1.5, jitterFraction: 0.2, maxAttempts: 4 }
	);
});
