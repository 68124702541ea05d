import type { Logger } from '../diagnostics/logger';
import type { PositionSession } from '../device/positionSession';
import type { Position } from '../device/positionTypes';
import { runStateLabel } from '../device/runState';
import { resolveRunState } from '../device/runStateResolver';
import { notFoundError } from '../errors/ClientError';
import type { MonitorSession } from '../session/monitorSession';
import { describeError } from '../session/sessionManager';
import { formatBases, formatNumber } from './formatters';

export interface StatusCommandOptions {
	session: MonitorSession;
	json: boolean;
	positionName?: string;
	write: (line: string) => void;
	logger?: Logger;
}

export interface PositionStatus {
	name: string;
	state: string;
	runId?: string;
	reads: number;
	basesPassed: number;
	basesFailed: number;
	simulated: boolean;
}

function emptyStatus(position: Position, state: string): PositionStatus {
	return { name: position.name, state, reads: 0, basesPassed: 0, basesFailed: 0, simulated: position.isSimulated };
}

export async function collectPositionStatus(
	session: MonitorSession,
	position: Position,
	logger?: Logger
): Promise<PositionStatus> {
	if (position.controlPort <= 0) {
		return emptyStatus(position, 'Not running');
	}

	let positionSession: PositionSession;
	try {
		positionSession = await session.openPosition(position);
	} catch (error) {
		return emptyStatus(position, `Connection error: ${describeError(error)}`);
	}

	try {
		const state = await resolveRunState(positionSession, logger);
		const info = await positionSession.acquisition.acquisitionInfo();
		return {
			name: position.name,
			state: runStateLabel(state),
			runId: info.runId.length > 0 ? info.runId : undefined,
			reads: info.readsProcessed,
			basesPassed: info.basesPassed,
			basesFailed: info.basesFailed,
			simulated: position.isSimulated
		};
	} catch (error) {
		return emptyStatus(position, `Error: ${describeError(error)}`);
	} finally {
		positionSession.close();
	}
}

export async function runStatusCommand(options: StatusCommandOptions): Promise<void> {
	const positions = await options.session.listPositions();
	const selected = options.positionName
		? positions.filter((position) => position.name === options.positionName)
		: positions;
	if (options.positionName && selected.length === 0) {
		throw notFoundError('Position', options.positionName);
	}
	if (selected.length === 0) {
		options.write(options.json ? '[]' : 'No positions found');
		return;
	}

	const results: PositionStatus[] = [];
	for (const position of selected) {
		results.push(await collectPositionStatus(options.session, position, options.logger));
	}

	if (options.json) {
		options.write(JSON.stringify(results, null, 2));
		return;
	}
	for (const status of results) {
		options.write(`Position: ${status.name}${status.simulated ? ' (simulated)' : ''}`);
		options.write(`  State: ${status.state}`);
		if (status.runId) {
			options.write(`  Run ID: ${status.runId}`);
		}
		options.write(`  Reads: ${formatNumber(status.reads)}`);
		options.write(`  Bases passed: ${formatBases(status.basesPassed)}`);
		options.write(`  Bases failed: ${formatBases(status.basesFailed)}`);
		options.write('');
	}
}
