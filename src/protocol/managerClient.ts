import type { Logger } from '../diagnostics/logger';
import { positionFromWire, type Position } from '../device/positionTypes';
import type { RpcConnection } from '../transport/rpcConnection';
import { asRecord, readNumber, readRecordArray, readString } from '../transport/wireReader';

const SERVICE = 'manager.ManagerService';

export interface DiscoveryService {
	listPositions(): Promise<Position[]>;
	localCredentialPath(): Promise<string>;
}

export interface ManagerClientOptions {
	streamTimeoutMs: number;
	logger?: Logger;
}

function positionCount(messages: readonly unknown[]): number {
	return messages.reduce<number>(
		(count, message) => count + readRecordArray(asRecord(message, 'FlowCellPositionsResponse'), 'positions', 'FlowCellPositionsResponse').length,
		0
	);
}

/**
 * Discovery calls on the manager endpoint.
 */
export class ManagerClient implements DiscoveryService {
	public constructor(
		private readonly connection: RpcConnection,
		private readonly options: ManagerClientOptions
	) {}

	/**
	 * The positions stream first replays the full list, which may span
	 * several messages, and then stays open for updates. Reading stops once
	 * the advertised total has arrived.
	 */
	public async listPositions(): Promise<Position[]> {
		const messages = await this.connection.streamUntil(
			SERVICE,
			'flow_cell_positions',
			{},
			{
				timeoutMs: this.options.streamTimeoutMs,
				isComplete: (received) => {
					const first = asRecord(received[0], 'FlowCellPositionsResponse');
					const total = readNumber(first, 'total_count', 'FlowCellPositionsResponse');
					return positionCount(received) >= total;
				}
			}
		);

		const positions: Position[] = [];
		for (const message of messages) {
			const response = asRecord(message, 'FlowCellPositionsResponse');
			for (const entry of readRecordArray(response, 'positions', 'FlowCellPositionsResponse')) {
				positions.push(positionFromWire(entry));
			}
		}
		this.options.logger?.debug('Listed positions.', { count: positions.length });
		return positions;
	}

	public async localCredentialPath(): Promise<string> {
		const response = await this.connection.unary(SERVICE, 'local_authentication_token_path', {});
		return readString(asRecord(response, 'LocalAuthenticationTokenPathResponse'), 'path', 'LocalAuthenticationTokenPathResponse');
	}
}
