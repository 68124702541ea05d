import * as path from 'node:path';
import * as protoLoader from '@grpc/proto-loader';

export const PROTO_ROOT = path.resolve(__dirname, '..', '..', 'proto');

const PROTO_FILES = [
	'minknow_api/manager.proto',
	'minknow_api/acquisition.proto',
	'minknow_api/protocol.proto',
	'minknow_api/statistics.proto',
	'minknow_api/data.proto',
	'minknow_api/device.proto'
];

const LOADER_OPTIONS: protoLoader.Options = {
	keepCase: true,
	longs: Number,
	enums: String,
	defaults: true,
	oneofs: true,
	includeDirs: [PROTO_ROOT]
};

export type ServiceName =
	| 'manager.ManagerService'
	| 'acquisition.AcquisitionService'
	| 'protocol.ProtocolService'
	| 'statistics.StatisticsService'
	| 'data.DataService'
	| 'device.DeviceService';

export type RpcMethod = protoLoader.MethodDefinition<object, object>;

let packageDefinition: protoLoader.PackageDefinition | undefined;

export function loadPackageDefinition(): protoLoader.PackageDefinition {
	packageDefinition ??= protoLoader.loadSync(PROTO_FILES, LOADER_OPTIONS);
	return packageDefinition;
}

export function getServiceDefinition(service: ServiceName): protoLoader.ServiceDefinition {
	const definition = loadPackageDefinition()[`minknow_api.${service}`];
	if (!definition || 'format' in definition) {
		throw new Error(`Service minknow_api.${service} is missing from the bundled schema.`);
	}
	return definition;
}

export function getMethodDefinition(service: ServiceName, method: string): RpcMethod {
	const definition = getServiceDefinition(service)[method];
	if (!definition) {
		throw new Error(`Method ${method} is missing from minknow_api.${service}.`);
	}
	return definition;
}
