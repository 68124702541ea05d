import assert from 'node:assert/strict';
import test from 'node:test';
import { formatConnectionState, runWatchCommand } from '../cli/watchCommand';
import { normalizeMonitorConfig } from '../config/monitorConfig';
import { ClientError, connectionError } from '../errors/ClientError';
import { SessionManager } from '../session/sessionManager';
import { FakeMonitorSession, makePosition } from './testHelpers';

const TIMEOUTS = { connectTimeoutMs: 1000, requestTimeoutMs: 1000 };

test('formatConnectionState describes every state', () => {
	assert.equal(formatConnectionState({ kind: 'CONNECTING' }), 'Connecting...');
	assert.equal(formatConnectionState({ kind: 'CONNECTED', endpoint: 'localhost:9501' }), 'Connected to localhost:9501');
	assert.equal(formatConnectionState({ kind: 'DISCONNECTED', sinceMs: 0, reason: 'Stopped' }), 'Disconnected: Stopped');
	assert.equal(formatConnectionState({ kind: 'RECONNECTING', attempt: 2 }), 'Reconnecting (attempt 2)...');
});

test('watch prints position lines until aborted', async () => {
	const session = new FakeMonitorSession([makePosition('X1')]);
	const sessionManager = new SessionManager({ connector: async () => session, timeouts: TIMEOUTS });
	const controller = new AbortController();
	const lines: string[] = [];

	await runWatchCommand({
		sessionManager,
		config: normalizeMonitorConfig({}, {}),
		write: (line) => {
			lines.push(line);
			if (line.startsWith('X1:')) {
				controller.abort();
			}
		},
		signal: controller.signal
	});

	assert.equal(lines[0], 'Connecting...');
	assert.equal(lines[1], 'Connected to localhost:9501');
	assert.ok(lines[2]?.startsWith('X1: Running'));
	assert.equal(lines[3], 'Disconnected: Stopped');
	assert.equal(session.closed, true);
});

test('watch rethrows the last connection error once reconnection gives up', async () => {
	const sessionManager = new SessionManager({
		connector: async () => {
			throw connectionError('localhost:9501', new Error('refused'));
		},
		timeouts: TIMEOUTS
	});
	const lines: string[] = [];

	await assert.rejects(
		runWatchCommand({
			sessionManager,
			config: normalizeMonitorConfig(
				{
					refresh: { intervalMs: 20 },
					reconnect: { initialDelayMs: 10, maxDelayMs: 10, jitterFraction: 0, maxAttempts: 1 }
				},
				{}
			),
			write: (line) => lines.push(line),
			signal: new AbortController().signal
		}),
		(error: unknown) => error instanceof ClientError && error.code === 'CONNECTION'
	);

	assert.deepEqual(lines, [
		'Connecting...',
		'Disconnected: Failed to connect to localhost:9501',
		'Reconnecting (attempt 1)...',
		'Disconnected: Failed to connect to localhost:9501'
	]);
});
