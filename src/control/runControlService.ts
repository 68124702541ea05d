import type { Logger } from '../diagnostics/logger';
import { withPositionSession, type PositionSession } from '../device/positionSession';
import { notFoundError } from '../errors/ClientError';
import { describeError, type SessionManager } from '../session/sessionManager';

export type RunControlAction = 'pause' | 'resume' | 'stop';

export type RunControlResult = { ok: true } | { ok: false; message: string };

export interface StopOptions {
	/** Stop only the acquisition and leave the protocol script running. */
	acquisitionOnly?: boolean;
}

export interface RunControlServiceOptions {
	sessionManager: SessionManager;
	logger?: Logger;
}

/**
 * Pause, resume and stop requests against one position. Failures are
 * reported to the caller and never touch the connection state.
 */
export class RunControlService {
	public constructor(private readonly options: RunControlServiceOptions) {}

	public pause(positionName: string): Promise<RunControlResult> {
		return this.run('pause', positionName, (session) => session.protocol.pause());
	}

	public resume(positionName: string): Promise<RunControlResult> {
		return this.run('resume', positionName, (session) => session.protocol.resume());
	}

	public stop(positionName: string, options: StopOptions = {}): Promise<RunControlResult> {
		return this.run('stop', positionName, (session) =>
			options.acquisitionOnly ? session.acquisition.stop() : session.protocol.stop()
		);
	}

	private async run(
		action: RunControlAction,
		positionName: string,
		issue: (session: PositionSession) => Promise<void>
	): Promise<RunControlResult> {
		try {
			const session = this.options.sessionManager.requireSession();
			const positions = await session.listPositions();
			const position = positions.find((entry) => entry.name === positionName);
			if (!position) {
				throw notFoundError('Position', positionName);
			}
			await withPositionSession((target) => session.openPosition(target), position, issue);
			this.options.logger?.info('Run control request accepted.', { action, position: positionName });
			return { ok: true };
		} catch (error) {
			const message = describeError(error);
			this.options.logger?.warn('Run control request failed.', { action, position: positionName, error: message });
			return { ok: false, message };
		}
	}
}
