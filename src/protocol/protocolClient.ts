import type { RpcConnection } from '../transport/rpcConnection';
import { asRecord, readEnumName } from '../transport/wireReader';

const SERVICE = 'protocol.ProtocolService';

export interface ProtocolRunService {
	/** Phase name of the current protocol run, e.g. `PHASE_SEQUENCING`. */
	currentPhase(): Promise<string>;
	pause(): Promise<void>;
	resume(): Promise<void>;
	stop(): Promise<void>;
}

export class ProtocolClient implements ProtocolRunService {
	public constructor(private readonly connection: RpcConnection) {}

	public async currentPhase(): Promise<string> {
		const response = await this.connection.unary(SERVICE, 'get_current_protocol_run', {});
		return readEnumName(asRecord(response, 'ProtocolRunInfo'), 'phase', 'ProtocolRunInfo');
	}

	public async pause(): Promise<void> {
		await this.connection.unary(SERVICE, 'pause_protocol', {});
	}

	public async resume(): Promise<void> {
		await this.connection.unary(SERVICE, 'resume_protocol', {});
	}

	public async stop(): Promise<void> {
		await this.connection.unary(SERVICE, 'stop_protocol', {});
	}
}
