import { asRecord, readBoolean, readEnumName, readNumber, readOptionalRecord, readString } from '../transport/wireReader';

export type PositionState = 'IDLE' | 'INITIALISING' | 'RUNNING' | 'ERROR';
export type DeviceState = 'READY' | 'BUSY' | 'ERROR' | 'OFFLINE';

/**
 * A flow-cell position as reported by discovery. `name` is its identity.
 */
export interface Position {
	id: string;
	name: string;
	deviceId: string;
	deviceType: string;
	state: PositionState;
	/** Port of the position's control service; 0 while none is running. */
	controlPort: number;
	isSimulated: boolean;
	errorInfo?: string;
}

export interface Device {
	id: string;
	name: string;
	state: DeviceState;
	positionNames: string[];
}

export function positionStateFromWire(state: string): PositionState {
	switch (state) {
		case 'STATE_INITIALISING':
			return 'INITIALISING';
		case 'STATE_RUNNING':
			return 'RUNNING';
		case 'STATE_HARDWARE_ERROR':
		case 'STATE_SOFTWARE_ERROR':
			return 'ERROR';
		default:
			return 'IDLE';
	}
}

export function positionFromWire(message: unknown): Position {
	const context = 'FlowCellPosition';
	const record = asRecord(message, context);
	const name = readString(record, 'name', context);
	const parentName = readString(record, 'parent_name', context);
	const rpcPorts = readOptionalRecord(record, 'rpc_ports', context);
	const errorInfo = readString(record, 'error_info', context);
	return {
		id: name,
		name,
		deviceId: parentName.length > 0 ? parentName : name,
		deviceType: readString(record, 'device_type', context),
		state: positionStateFromWire(readEnumName(record, 'state', context)),
		controlPort: rpcPorts ? readNumber(rpcPorts, 'secure', `${context}.rpc_ports`) : 0,
		isSimulated: readBoolean(record, 'is_simulated', context),
		errorInfo: errorInfo.length > 0 ? errorInfo : undefined
	};
}

function deviceStateFor(positions: readonly Position[]): DeviceState {
	if (positions.some((position) => position.state === 'ERROR')) {
		return 'ERROR';
	}
	if (positions.some((position) => position.state === 'INITIALISING')) {
		return 'BUSY';
	}
	if (positions.every((position) => position.controlPort === 0)) {
		return 'OFFLINE';
	}
	return 'READY';
}

/**
 * Groups positions by their parent device, keeping discovery order.
 */
export function groupDevices(positions: readonly Position[]): Device[] {
	const byDevice = new Map<string, Position[]>();
	for (const position of positions) {
		const group = byDevice.get(position.deviceId);
		if (group) {
			group.push(position);
		} else {
			byDevice.set(position.deviceId, [position]);
		}
	}

	return [...byDevice.entries()].map(([deviceId, group]) => ({
		id: deviceId,
		name: deviceId,
		state: deviceStateFor(group),
		positionNames: group.map((position) => position.name)
	}));
}
