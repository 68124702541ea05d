import { ClientError } from '../errors/ClientError';
import { acquisitionSnapshotFromWire, type AcquisitionSnapshot } from '../telemetry/acquisitionStats';
import type { RpcConnection } from '../transport/rpcConnection';
import { asRecord, readEnumName } from '../transport/wireReader';

const SERVICE = 'acquisition.AcquisitionService';

export type StopDataAction = 'STOP_DEFAULT' | 'STOP_KEEP_ALL_DATA' | 'STOP_FINISH_PROCESSING';

export interface AcquisitionService {
	/** Coarse acquisition status name, e.g. `PROCESSING`. */
	currentStatus(): Promise<string>;
	acquisitionInfo(runId?: string): Promise<AcquisitionSnapshot>;
	/** Run id of the current acquisition, or `undefined` when none has started. */
	currentRunId(): Promise<string | undefined>;
	stop(dataAction?: StopDataAction): Promise<void>;
}

export class AcquisitionClient implements AcquisitionService {
	public constructor(private readonly connection: RpcConnection) {}

	public async currentStatus(): Promise<string> {
		const response = await this.connection.unary(SERVICE, 'current_status', {});
		return readEnumName(asRecord(response, 'CurrentStatusResponse'), 'status', 'CurrentStatusResponse');
	}

	public async acquisitionInfo(runId = ''): Promise<AcquisitionSnapshot> {
		const response = await this.connection.unary(SERVICE, 'get_acquisition_info', { run_id: runId });
		return acquisitionSnapshotFromWire(response);
	}

	public async currentRunId(): Promise<string | undefined> {
		try {
			const info = await this.acquisitionInfo();
			return info.runId.length > 0 ? info.runId : undefined;
		} catch (error) {
			// The server answers FAILED_PRECONDITION while no acquisition has ever run.
			if (error instanceof ClientError && error.code === 'RPC' && error.rpcCode === 'FAILED_PRECONDITION') {
				return undefined;
			}
			throw error;
		}
	}

	public async stop(dataAction: StopDataAction = 'STOP_DEFAULT'): Promise<void> {
		await this.connection.unary(SERVICE, 'stop', { data_action_on_stop: dataAction, wait_until_ready: false });
	}
}
