import type { Logger } from '../diagnostics/logger';
import { toErrorMessage } from '../errors/MonitorError';
import type { AcquisitionService } from '../protocol/acquisitionClient';
import type { ProtocolRunService } from '../protocol/protocolClient';
import { runState, runStateError, type RunState } from './runState';

export interface RunStateSources {
	acquisition: Pick<AcquisitionService, 'currentStatus'>;
	protocol: Pick<ProtocolRunService, 'currentPhase'>;
}

const PAUSED_PHASES: ReadonlySet<string> = new Set([
	'PHASE_PAUSED',
	'PHASE_PAUSING',
	'PHASE_BAD_TEMPERATURE_AUTOMATIC_PAUSE',
	'PHASE_FLOWCELL_DISCONNECT_AUTOMATIC_PAUSE',
	'PHASE_DEVICE_ERROR_AUTOMATIC_PAUSE',
	'PHASE_FLOWCELL_MISMATCH_AUTOMATIC_PAUSE',
	'PHASE_LOW_DISK_SPACE_AUTOMATIC_PAUSE'
]);

export function runStateFromStatus(status: string): RunState {
	switch (status) {
		case 'READY':
			return runState('IDLE');
		case 'STARTING':
			return runState('STARTING');
		case 'PROCESSING':
			return runState('RUNNING');
		case 'FINISHING':
			return runState('FINISHING');
		case 'ERROR_STATUS':
			return runStateError('Unknown error');
		default:
			return runState('IDLE');
	}
}

/**
 * Refines a processing acquisition by protocol phase; `undefined` keeps the
 * coarse state.
 */
export function runStateFromPhase(phase: string): RunState | undefined {
	if (PAUSED_PHASES.has(phase) || phase.endsWith('_AUTOMATIC_PAUSE')) {
		return runState('PAUSED');
	}
	switch (phase) {
		case 'PHASE_PREPARING_FOR_MUX_SCAN':
		case 'PHASE_MUX_SCAN':
			return runState('MUX_SCANNING');
		case 'PHASE_RESUMING':
		case 'PHASE_INITIALISING':
			return runState('STARTING');
		case 'PHASE_SEQUENCING':
			return runState('RUNNING');
		case 'PHASE_COMPLETED':
			return runState('FINISHING');
		default:
			return undefined;
	}
}

/**
 * Merges acquisition status and protocol phase into one run state. The phase
 * is only consulted while the acquisition is processing; failing to read it
 * leaves the position RUNNING.
 */
export async function resolveRunState(sources: RunStateSources, logger?: Logger): Promise<RunState> {
	const coarse = runStateFromStatus(await sources.acquisition.currentStatus());
	if (coarse.kind !== 'RUNNING') {
		return coarse;
	}

	let phase: string;
	try {
		phase = await sources.protocol.currentPhase();
	} catch (error) {
		logger?.debug('Protocol phase query failed, keeping running state.', { error: toErrorMessage(error) });
		return coarse;
	}
	return runStateFromPhase(phase) ?? coarse;
}
