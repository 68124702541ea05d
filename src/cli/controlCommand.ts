import type { RunControlAction, RunControlResult, RunControlService } from '../control/runControlService';
import { MonitorError } from '../errors/MonitorError';

export interface ControlCommandOptions {
	service: RunControlService;
	action: RunControlAction;
	positionName: string;
	acquisitionOnly: boolean;
	write: (line: string) => void;
}

const ACTION_LABELS: Record<RunControlAction, string> = {
	pause: 'Paused',
	resume: 'Resumed',
	stop: 'Stopped'
};

export async function runControlCommand(options: ControlCommandOptions): Promise<void> {
	const { service, positionName } = options;
	let result: RunControlResult;
	switch (options.action) {
		case 'pause':
			result = await service.pause(positionName);
			break;
		case 'resume':
			result = await service.resume(positionName);
			break;
		case 'stop':
			result = await service.stop(positionName, { acquisitionOnly: options.acquisitionOnly });
			break;
	}
	if (!result.ok) {
		throw new MonitorError('CONTROL_FAILED', `Failed to ${options.action} ${positionName}: ${result.message}`);
	}
	options.write(`${ACTION_LABELS[options.action]} ${positionName}`);
}
