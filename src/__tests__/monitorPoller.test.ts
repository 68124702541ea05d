import assert from 'node:assert/strict';
import test from 'node:test';
import type { Position } from '../device/positionTypes';
import { connectionError, notFoundError, protocolError, rpcError } from '../errors/ClientError';
import type { MonitorSession } from '../session/monitorSession';
import { SessionManager } from '../session/sessionManager';
import { countChannelStates } from '../telemetry/channelStates';
import { MonitorPoller, type MonitorPollerOptions } from '../telemetry/monitorPoller';
import type { ChannelStateCategory } from '../telemetry/dutyTime';
import { TelemetryStore } from '../telemetry/telemetryStore';
import { ThroughputTracker } from '../telemetry/yieldHistory';
import { FakeMonitorSession, createPositionScript, makeAcquisition, makePosition, makeYieldPoint } from './testHelpers';

const POLICY = { initialDelayMs: 1000, maxDelayMs: 30_000, multiplier: 2, jitterFraction: 0.1 };

interface PollerHarness {
	poller: MonitorPoller;
	store: TelemetryStore;
	sessionManager: SessionManager;
	refreshed: Array<readonly Position[]>;
	connects: () => number;
	setNow: (ms: number) => void;
}

function createPoller(
	connect: () => Promise<MonitorSession>,
	overrides: Partial<MonitorPollerOptions> = {}
): PollerHarness {
	let nowMs = 0;
	let connectCount = 0;
	const now = (): number => nowMs;
	const sessionManager = new SessionManager({
		connector: () => {
			connectCount += 1;
			return connect();
		},
		timeouts: { connectTimeoutMs: 1000, requestTimeoutMs: 1000 },
		now
	});
	const store = new TelemetryStore();
	const refreshed: Array<readonly Position[]> = [];
	const poller = new MonitorPoller({
		sessionManager,
		store,
		host: 'localhost',
		port: 9501,
		policy: POLICY,
		intervalMs: 1000,
		throughput: new ThroughputTracker(5000, now),
		onRefreshComplete: (positions) => refreshed.push(positions),
		now,
		random: () => 0.5,
		...overrides
	});
	return {
		poller,
		store,
		sessionManager,
		refreshed,
		connects: () => connectCount,
		setNow: (ms) => {
			nowMs = ms;
		}
	};
}

test('a tick connects and refreshes every position', async () => {
	const session = new FakeMonitorSession([makePosition('X1', { controlPort: 8001 }), makePosition('X2', { controlPort: 0 })]);
	const { poller, store, refreshed } = createPoller(async () => session);

	await poller.tick();

	assert.equal(poller.getPhase(), 'refreshing');
	assert.deepEqual(store.get('X1')?.runState, { kind: 'RUNNING' });
	assert.equal(store.get('X1')?.runId, 'run-1');
	assert.equal(store.get('X1')?.stats?.readsProcessed, 100);
	assert.equal(store.get('X1')?.stats?.passRate, 80);
	assert.deepEqual(store.get('X2')?.runState, { kind: 'IDLE' });
	assert.equal(store.get('X2')?.stats, undefined);
	assert.deepEqual(
		refreshed.map((positions) => positions.map((position) => position.name)),
		[['X1', 'X2']]
	);
	assert.equal(session.opened, 1);
	assert.equal(session.closedPositionSessions, 1);
});

test('idle positions are not asked for telemetry', async () => {
	const session = new FakeMonitorSession([makePosition('X1')]);
	session.scripts.set('X1', createPositionScript({ status: 'READY' }));
	const { poller, store } = createPoller(async () => session);

	await poller.tick();

	assert.deepEqual(store.get('X1')?.runState, { kind: 'IDLE' });
	assert.deepEqual(session.scripts.get('X1')?.calls, ['currentStatus']);
});

test('a run ending purges only that position', async () => {
	const session = new FakeMonitorSession([makePosition('X1'), makePosition('X2')]);
	const { poller, store } = createPoller(async () => session);
	await poller.tick();
	assert.equal(store.get('X1')?.stats?.runId, 'run-1');

	const script = session.scripts.get('X1');
	assert.ok(script);
	script.status = 'READY';
	await poller.tick();

	assert.deepEqual(store.get('X1')?.runState, { kind: 'IDLE' });
	assert.equal(store.get('X1')?.stats, undefined);
	assert.equal(store.get('X1')?.runId, undefined);
	assert.equal(store.get('X2')?.stats?.runId, 'run-1');
});

test('a failing position is recorded on that position only', async () => {
	const session = new FakeMonitorSession([makePosition('X1', { controlPort: 8001 }), makePosition('X2')]);
	session.openErrors.set('X1', connectionError('localhost:8001', new Error('ECONNREFUSED')));
	const { poller, store, sessionManager } = createPoller(async () => session);

	await poller.tick();

	assert.equal(store.get('X1')?.lastError, 'Failed to connect to localhost:8001');
	assert.equal(store.get('X1')?.stale, true);
	assert.equal(store.get('X2')?.lastError, undefined);
	assert.deepEqual(store.get('X2')?.runState, { kind: 'RUNNING' });
	assert.equal(sessionManager.currentState().kind, 'CONNECTED');
});

test('a failed position list drops the session and backs off', async () => {
	const session = new FakeMonitorSession([makePosition('X1')]);
	const { poller, store, sessionManager, connects, setNow } = createPoller(async () => session);
	await poller.tick();

	session.listError = protocolError('bad reply');
	await poller.tick();

	assert.equal(session.closed, true);
	assert.equal(poller.getPhase(), 'reconnecting');
	assert.deepEqual(sessionManager.currentState(), {
		kind: 'DISCONNECTED',
		sinceMs: 0,
		reason: 'Protocol error: bad reply'
	});
	assert.equal(store.get('X1')?.stale, true);

	session.listError = undefined;
	setNow(999);
	await poller.tick();
	assert.equal(connects(), 1);

	setNow(1000);
	await poller.tick();
	assert.equal(connects(), 2);
	assert.equal(store.get('X1')?.stale, false);
});

test('reconnect gives up once maxAttempts is spent', async () => {
	const failures: unknown[] = [];
	const { poller, connects, setNow, sessionManager } = createPoller(
		async () => {
			throw connectionError('localhost:9501', new Error('ECONNREFUSED'));
		},
		{ policy: { ...POLICY, maxAttempts: 1 }, onGiveUp: (error) => failures.push(error) }
	);

	await poller.tick();
	assert.equal(connects(), 1);
	assert.deepEqual(sessionManager.currentState(), { kind: 'RECONNECTING', attempt: 1 });

	setNow(500);
	await poller.tick();
	assert.equal(connects(), 1);

	setNow(1000);
	await poller.tick();
	assert.equal(connects(), 2);
	assert.equal(failures.length, 1);
	assert.equal(poller.getPhase(), 'stopped');
});

test('the detail position collects run telemetry', async () => {
	const session = new FakeMonitorSession([makePosition('X1'), makePosition('X2')]);
	const topology = {
		channelCount: 2,
		width: 2,
		height: 1,
		coords: [
			{ col: 0, row: 0 },
			{ col: 1, row: 0 }
		]
	};
	const channelStates = countChannelStates(2, [
		{ channel: 1, label: 'strand' },
		{ channel: 2, label: 'pore' }
	]);
	session.scripts.set(
		'X1',
		createPositionScript({
			acquisition: makeAcquisition('run-7'),
			yieldHistory: [makeYieldPoint(0, 0), makeYieldPoint(10, 5000)],
			histogram: {
				bucketRanges: [{ start: 0, end: 1000 }],
				bucketValues: [4],
				n50: 800,
				outliersExcluded: true,
				outlierPercent: 0.01,
				sourceDataEnd: 60
			},
			dutyTime: { stateTimes: new Map<ChannelStateCategory, number>([['STRAND', 30]]), poreOccupancy: [0.3, 0.1] },
			meanQuality: 11.25,
			topology,
			channelStates
		})
	);
	const { poller, store } = createPoller(async () => session, { detailPosition: 'X1' });

	await poller.tick();

	const entry = store.get('X1');
	assert.equal(entry?.yieldHistory?.length, 2);
	assert.equal(entry?.histogram?.n50, 800);
	assert.deepEqual(entry?.histogramRequest, { excludeOutliers: true });
	assert.deepEqual(entry?.dutyTime?.poreOccupancy, [0.3, 0.1]);
	assert.equal(entry?.topology, topology);
	assert.equal(entry?.channelStates, channelStates);
	assert.equal(entry?.stats?.throughputBasesPerSecond, 500);
	assert.equal(entry?.stats?.meanQuality, 11.25);
	assert.equal(entry?.stats?.activePores, 2);
	assert.deepEqual(session.scripts.get('X1')?.calls, [
		'currentStatus',
		'currentPhase',
		'acquisitionInfo',
		'yieldHistory',
		'readLengthHistogram',
		'dutyTime',
		'meanQuality',
		'channelLayout',
		'channelStates:2'
	]);
	assert.deepEqual(session.scripts.get('X2')?.calls, ['currentStatus', 'currentPhase', 'acquisitionInfo']);
});

test('failed detail reads keep the rest of the refresh', async () => {
	const session = new FakeMonitorSession([makePosition('X1')]);
	session.scripts.set(
		'X1',
		createPositionScript({
			yieldHistory: new Error('stream timed out'),
			meanQuality: 9.5
		})
	);
	const { poller, store } = createPoller(async () => session, { detailPosition: 'X1' });

	await poller.tick();

	const entry = store.get('X1');
	assert.equal(entry?.lastError, undefined);
	assert.equal(entry?.yieldHistory, undefined);
	assert.equal(entry?.stats?.meanQuality, 9.5);
	assert.equal(entry?.stats?.readsProcessed, 100);
});

test('stop waits for the tick and closes the session', async () => {
	const session = new FakeMonitorSession([makePosition('X1')]);
	const { poller, sessionManager } = createPoller(async () => session);
	await poller.tick();

	await poller.stop();

	assert.equal(poller.getPhase(), 'stopped');
	assert.equal(session.closed, true);
	assert.deepEqual(sessionManager.currentState(), { kind: 'DISCONNECTED', sinceMs: 0, reason: 'Stopped' });
});

test('a position whose control service is gone is shown as not running', async () => {
	const session = new FakeMonitorSession([makePosition('X1')]);
	const { poller, store } = createPoller(async () => session);
	await poller.tick();
	assert.equal(store.get('X1')?.stats?.runId, 'run-1');

	session.openErrors.set('X1', notFoundError('Position control service', 'X1'));
	await poller.tick();

	assert.deepEqual(store.get('X1')?.runState, { kind: 'IDLE' });
	assert.equal(store.get('X1')?.stats, undefined);
	assert.equal(store.get('X1')?.runId, undefined);
	assert.equal(store.get('X1')?.lastError, 'Position control service not found: X1');
});

test('an RPC not-found from the position also reads as not running', async () => {
	const session = new FakeMonitorSession([makePosition('X1')]);
	const { poller, store } = createPoller(async () => session);
	await poller.tick();
	const script = session.scripts.get('X1');
	assert.ok(script);

	script.status = rpcError('current_status', 'NOT_FOUND', 'service not found');
	await poller.tick();

	assert.deepEqual(store.get('X1')?.runState, { kind: 'IDLE' });
	assert.equal(store.get('X1')?.stats, undefined);
	assert.equal(store.get('X1')?.lastError, 'current_status: service not found');
});

test('a new run id starts throughput from scratch', async () => {
	const session = new FakeMonitorSession([makePosition('X1')]);
	session.scripts.set(
		'X1',
		createPositionScript({ yieldHistory: [makeYieldPoint(0, 0), makeYieldPoint(10, 5000)] })
	);
	const { poller, store, setNow } = createPoller(async () => session, { detailPosition: 'X1' });
	await poller.tick();
	assert.equal(store.get('X1')?.stats?.throughputBasesPerSecond, 500);

	const script = session.scripts.get('X1');
	assert.ok(script);
	script.acquisition = makeAcquisition('run-2');
	script.yieldHistory = [makeYieldPoint(5, 100)];
	setNow(10_000);
	await poller.tick();

	assert.equal(store.get('X1')?.stats?.runId, 'run-2');
	assert.equal(store.get('X1')?.stats?.throughputBasesPerSecond, 0);
});
