import assert from 'node:assert/strict';
import * as grpc from '@grpc/grpc-js';
import test, { after, before } from 'node:test';
import { ClientError } from '../errors/ClientError';
import { AcquisitionClient } from '../protocol/acquisitionClient';
import { DataClient } from '../protocol/dataClient';
import { DeviceClient } from '../protocol/deviceClient';
import { ManagerClient } from '../protocol/managerClient';
import { ProtocolClient } from '../protocol/protocolClient';
import { StatisticsClient } from '../protocol/statisticsClient';
import { createRpcSessionConnector } from '../session/rpcSessionConnector';
import { getServiceDefinition } from '../transport/protoLoader';
import { RpcConnection } from '../transport/rpcConnection';
import { makePosition } from './testHelpers';

const seenCredentials: string[] = [];

function recordCredential(metadata: grpc.Metadata): void {
	const [value] = metadata.get('local-auth');
	seenCredentials.push(value === undefined ? '' : String(value));
}

const managerService: grpc.UntypedServiceImplementation = {
	flow_cell_positions: (call: grpc.ServerWritableStream<unknown, unknown>) => {
		recordCredential(call.metadata);
		call.write({
			total_count: 3,
			positions: [
				{ name: 'X1', state: 'STATE_RUNNING', rpc_ports: { secure: 8001 }, parent_name: 'GXB01', device_type: 'GRIDION' },
				{ name: 'X2', state: 'STATE_HARDWARE_ERROR', rpc_ports: { secure: 8002 }, parent_name: 'GXB01', device_type: 'GRIDION', error_info: 'overheated' }
			]
		});
		// The stream stays open after the initial list, as the real manager does.
		call.write({
			total_count: 3,
			positions: [{ name: 'MS1', state: 'STATE_INITIALISING', parent_name: '', device_type: 'MINION', is_simulated: true }]
		});
	},
	local_authentication_token_path: (call: grpc.ServerUnaryCall<unknown, unknown>, callback: grpc.sendUnaryData<unknown>) => {
		recordCredential(call.metadata);
		callback(null, { path: '/tmp/seqwatch-test/token' });
	}
};

const acquisitionService: grpc.UntypedServiceImplementation = {
	current_status: (_call: grpc.ServerUnaryCall<unknown, unknown>, callback: grpc.sendUnaryData<unknown>) => {
		callback(null, { status: 'PROCESSING' });
	},
	get_acquisition_info: (_call: grpc.ServerUnaryCall<unknown, unknown>, callback: grpc.sendUnaryData<unknown>) => {
		callback(null, {
			run_id: 'run-42',
			yield_summary: {
				read_count: 10,
				basecalled_pass_read_count: 7,
				basecalled_fail_read_count: 2,
				basecalled_pass_bases: 7000,
				basecalled_fail_bases: 1500
			}
		});
	},
	stop: (_call: grpc.ServerUnaryCall<unknown, unknown>, callback: grpc.sendUnaryData<unknown>) => {
		callback(null, {});
	}
};

const protocolService: grpc.UntypedServiceImplementation = {
	get_current_protocol_run: (_call: grpc.ServerUnaryCall<unknown, unknown>, callback: grpc.sendUnaryData<unknown>) => {
		callback(null, { phase: 'PHASE_SEQUENCING' });
	},
	pause_protocol: (_call: grpc.ServerUnaryCall<unknown, unknown>, callback: grpc.sendUnaryData<unknown>) => {
		callback({ code: grpc.status.FAILED_PRECONDITION, details: 'No protocol running' });
	},
	resume_protocol: (_call: grpc.ServerUnaryCall<unknown, unknown>, callback: grpc.sendUnaryData<unknown>) => {
		callback(null, {});
	},
	stop_protocol: (_call: grpc.ServerUnaryCall<unknown, unknown>, callback: grpc.sendUnaryData<unknown>) => {
		callback(null, {});
	}
};

const statisticsService: grpc.UntypedServiceImplementation = {
	stream_acquisition_output: (call: grpc.ServerWritableStream<unknown, unknown>) => {
		call.end();
	},
	// Never answers, so reads against it run into their deadline.
	stream_duty_time: () => undefined,
	stream_read_length_histogram: (call: grpc.ServerWritableStream<unknown, unknown>) => {
		call.end();
	},
	stream_basecall_boxplots: (call: grpc.ServerWritableStream<unknown, unknown>) => {
		call.end();
	}
};

const dataService: grpc.UntypedServiceImplementation = {
	get_channel_states: (call: grpc.ServerWritableStream<unknown, unknown>) => {
		call.write({
			channel_states: [
				{ channel: 1, state_name: 'strand' },
				{ channel: 2, state_name: 'pore' },
				{ channel: 3, state_id: 7 }
			]
		});
	}
};

const deviceService: grpc.UntypedServiceImplementation = {
	get_channels_layout: (_call: grpc.ServerUnaryCall<unknown, unknown>, callback: grpc.sendUnaryData<unknown>) => {
		callback(null, {
			channel_records: [
				{ id: 1, name: 'ch1', mux_records: [{ id: 1, phys_x: 10, phys_y: 5 }] },
				{ id: 2, name: 'ch2', mux_records: [{ id: 1, phys_x: 30, phys_y: 5 }] },
				{ id: 3, name: 'ch3', mux_records: [{ id: 1, phys_x: 10, phys_y: 9 }] },
				{ id: 4, name: 'ch4', mux_records: [] }
			]
		});
	}
};

let server: grpc.Server;
let connection: RpcConnection;
let serverPort: number;

function bind(target: grpc.Server): Promise<number> {
	return new Promise<number>((resolve, reject) => {
		target.bindAsync('127.0.0.1:0', grpc.ServerCredentials.createInsecure(), (error, port) => {
			if (error) {
				reject(error);
				return;
			}
			resolve(port);
		});
	});
}

before(async () => {
	server = new grpc.Server();
	server.addService(getServiceDefinition('manager.ManagerService'), managerService);
	server.addService(getServiceDefinition('acquisition.AcquisitionService'), acquisitionService);
	server.addService(getServiceDefinition('protocol.ProtocolService'), protocolService);
	server.addService(getServiceDefinition('statistics.StatisticsService'), statisticsService);
	server.addService(getServiceDefinition('data.DataService'), dataService);
	server.addService(getServiceDefinition('device.DeviceService'), deviceService);
	serverPort = await bind(server);
	connection = await RpcConnection.open({
		host: '127.0.0.1',
		port: serverPort,
		credential: () => 'test-secret',
		connectTimeoutMs: 5000,
		requestTimeoutMs: 5000
	});
});

after(() => {
	connection.close();
	server.forceShutdown();
});

test('listPositions reads until the advertised total has arrived', async () => {
	const manager = new ManagerClient(connection, { streamTimeoutMs: 5000 });

	const positions = await manager.listPositions();

	assert.deepEqual(positions, [
		{ id: 'X1', name: 'X1', deviceId: 'GXB01', deviceType: 'GRIDION', state: 'RUNNING', controlPort: 8001, isSimulated: false, errorInfo: undefined },
		{ id: 'X2', name: 'X2', deviceId: 'GXB01', deviceType: 'GRIDION', state: 'ERROR', controlPort: 8002, isSimulated: false, errorInfo: 'overheated' },
		{ id: 'MS1', name: 'MS1', deviceId: 'MS1', deviceType: 'MINION', state: 'INITIALISING', controlPort: 0, isSimulated: true, errorInfo: undefined }
	]);
});

test('calls carry the local credential header', async () => {
	const manager = new ManagerClient(connection, { streamTimeoutMs: 5000 });

	assert.equal(await manager.localCredentialPath(), '/tmp/seqwatch-test/token');
	assert.ok(seenCredentials.length > 0);
	assert.ok(seenCredentials.every((value) => value === 'test-secret'));
});

test('acquisition status and counters are decoded', async () => {
	const acquisition = new AcquisitionClient(connection);

	assert.equal(await acquisition.currentStatus(), 'PROCESSING');
	assert.deepEqual(await acquisition.acquisitionInfo(), {
		runId: 'run-42',
		readsProcessed: 10,
		readsPassed: 7,
		readsFailed: 2,
		basesPassed: 7000,
		basesFailed: 1500
	});
	assert.equal(await acquisition.currentRunId(), 'run-42');
});

test('server status codes surface as RPC errors', async () => {
	const protocol = new ProtocolClient(connection);

	assert.equal(await protocol.currentPhase(), 'PHASE_SEQUENCING');
	await assert.rejects(protocol.pause(), (error: unknown) => {
		assert.ok(error instanceof ClientError);
		assert.equal(error.code, 'RPC');
		assert.equal(error.rpcCode, 'FAILED_PRECONDITION');
		assert.equal(error.displayMessage, 'pause_protocol: No protocol running');
		return true;
	});
});

test('statistics streams that end empty yield empty results', async () => {
	const statistics = new StatisticsClient(connection, 5000);

	assert.deepEqual(await statistics.yieldHistory('run-42'), []);
	assert.equal(await statistics.meanQuality('run-42'), undefined);
});

test('a silent stream times out', async () => {
	const statistics = new StatisticsClient(connection, 100);

	await assert.rejects(statistics.dutyTime('run-42'), (error: unknown) => {
		assert.ok(error instanceof ClientError);
		assert.equal(error.code, 'TIMEOUT');
		assert.equal(error.displayMessage, 'Operation timed out: stream_duty_time');
		return true;
	});
});

test('channel states decode both oneof variants', async () => {
	const data = new DataClient(connection, 5000);

	const counts = await data.channelStates(4);

	assert.deepEqual(counts.states, ['strand', 'pore', 'state_7', undefined]);
	assert.equal(counts.sequencing, 1);
	assert.equal(counts.poreAvailable, 1);
	assert.equal(counts.unavailable, 0);
	assert.equal(counts.inactive, 2);
	assert.equal(counts.activePores, 2);
});

test('channel layout is compacted into a grid', async () => {
	const device = new DeviceClient(connection);

	assert.deepEqual(await device.channelLayout(), {
		channelCount: 4,
		width: 2,
		height: 2,
		coords: [
			{ col: 0, row: 0 },
			{ col: 1, row: 0 },
			{ col: 0, row: 1 },
			{ col: 0, row: 0 }
		]
	});
});

test('plaintext still refuses remote hosts', async () => {
	const connect = createRpcSessionConnector({ trust: {}, plaintext: true, streamTimeoutMs: 1000 });

	await assert.rejects(connect('192.0.2.1', 9501, { connectTimeoutMs: 1000, requestTimeoutMs: 1000 }), (error: unknown) => {
		assert.ok(error instanceof ClientError);
		assert.equal(error.code, 'CONNECTION');
		assert.equal(error.message, 'Connection to 192.0.2.1:9501 failed: Remote hosts are not supported; use localhost');
		return true;
	});
});

test('the plaintext connector bootstraps the credential and opens position sessions', async () => {
	const connect = createRpcSessionConnector({
		trust: {},
		plaintext: true,
		streamTimeoutMs: 5000,
		readCredentialFile: async () => JSON.stringify({ token: 'connector-token' })
	});
	const session = await connect('127.0.0.1', serverPort, { connectTimeoutMs: 5000, requestTimeoutMs: 5000 });
	try {
		assert.equal(session.endpoint, `127.0.0.1:${serverPort}`);
		assert.deepEqual(await session.listDevices(), [
			{ id: 'GXB01', name: 'GXB01', state: 'ERROR', positionNames: ['X1', 'X2'] },
			{ id: 'MS1', name: 'MS1', state: 'BUSY', positionNames: ['MS1'] }
		]);
		assert.equal(seenCredentials[seenCredentials.length - 1], 'connector-token');

		const positionSession = await session.openPosition(makePosition('X5', { controlPort: serverPort }));
		try {
			assert.equal(await positionSession.acquisition.currentStatus(), 'PROCESSING');
		} finally {
			positionSession.close();
		}
	} finally {
		session.close();
	}
});
