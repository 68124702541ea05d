import type { Logger } from '../diagnostics/logger';
import { withPositionSession, type PositionSession } from '../device/positionSession';
import type { Position } from '../device/positionTypes';
import { isRunActive, runState, type RunState } from '../device/runState';
import { resolveRunState } from '../device/runStateResolver';
import { ClientError } from '../errors/ClientError';
import { toErrorMessage } from '../errors/MonitorError';
import type { MonitorSession } from '../session/monitorSession';
import { delayForAttempt, hasAttemptsLeft, type ReconnectPolicy } from '../session/reconnectPolicy';
import { describeError, isRetriableError, type SessionManager } from '../session/sessionManager';
import { deriveStats } from './acquisitionStats';
import { DEFAULT_HISTOGRAM_REQUEST, sameHistogramRequest, type HistogramRequest } from './readLengthHistogram';
import type { TelemetryPatch, TelemetryStore } from './telemetryStore';
import { ThroughputTracker } from './yieldHistory';

export type PollerPhase = 'idle' | 'reconnecting' | 'refreshing' | 'stopped';

export interface MonitorPollerOptions {
	sessionManager: SessionManager;
	store: TelemetryStore;
	host: string;
	port: number;
	policy: ReconnectPolicy;
	intervalMs: number;
	throughput?: ThroughputTracker;
	detailPosition?: string;
	histogramRequest?: HistogramRequest;
	onPositionsChange?: (positions: readonly Position[]) => void;
	onTelemetryChange?: (positionName: string) => void;
	/** Called after every tick that refreshed the position list. */
	onRefreshComplete?: (positions: readonly Position[]) => void;
	/** Called once when `maxAttempts` is exhausted; the poller stops itself. */
	onGiveUp?: (error: unknown) => void;
	now?: () => number;
	random?: () => number;
	logger?: Logger;
}

function isMissingControlService(error: unknown): boolean {
	return (
		error instanceof ClientError &&
		(error.code === 'NOT_FOUND' || (error.code === 'RPC' && error.rpcCode === 'NOT_FOUND'))
	);
}

function samePositions(left: readonly Position[], right: readonly Position[]): boolean {
	if (left.length !== right.length) {
		return false;
	}
	return left.every((position, index) => {
		const other = right[index];
		return (
			other !== undefined &&
			position.name === other.name &&
			position.state === other.state &&
			position.controlPort === other.controlPort
		);
	});
}

/**
 * The refresh loop. Each tick either attempts to reconnect (when backoff
 * allows) or refreshes every position in discovery order. Ticks never
 * overlap: the next one is scheduled when the previous one settles.
 */
export class MonitorPoller {
	private readonly throughput: ThroughputTracker;
	private readonly now: () => number;
	private readonly random: () => number;
	private timer: NodeJS.Timeout | undefined;
	private running: Promise<void> | undefined;
	private phase: PollerPhase = 'idle';
	private positions: Position[] = [];
	private attempt = 0;
	private nextReconnectAtMs = 0;
	private detailPosition: string | undefined;
	private histogramRequest: HistogramRequest;

	public constructor(private readonly options: MonitorPollerOptions) {
		this.throughput = options.throughput ?? new ThroughputTracker();
		this.now = options.now ?? Date.now;
		this.random = options.random ?? Math.random;
		this.detailPosition = options.detailPosition;
		this.histogramRequest = options.histogramRequest ?? DEFAULT_HISTOGRAM_REQUEST;
	}

	public getPhase(): PollerPhase {
		return this.phase;
	}

	public listPositions(): Position[] {
		return [...this.positions];
	}

	public setDetailPosition(positionName: string | undefined): void {
		this.detailPosition = positionName;
	}

	public setHistogramRequest(request: HistogramRequest): void {
		this.histogramRequest = { ...request };
	}

	public start(): void {
		if (this.phase !== 'idle') {
			return;
		}
		this.phase = this.options.sessionManager.currentSession() ? 'refreshing' : 'reconnecting';
		this.schedule(0);
	}

	/**
	 * Abandons the loop, waits for a tick in progress and closes the session.
	 */
	public async stop(): Promise<void> {
		if (this.phase === 'stopped') {
			return;
		}
		this.phase = 'stopped';
		if (this.timer) {
			clearTimeout(this.timer);
			this.timer = undefined;
		}
		await this.running;
		this.options.sessionManager.disconnect('Stopped');
	}

	/**
	 * Runs one tick now. Exposed for callers that drive the loop themselves.
	 */
	public async tick(): Promise<void> {
		if (this.running) {
			return this.running;
		}
		this.running = this.runTick().finally(() => {
			this.running = undefined;
		});
		return this.running;
	}

	private isStopped(): boolean {
		return this.phase === 'stopped';
	}

	private schedule(delayMs: number): void {
		if (this.isStopped()) {
			return;
		}
		this.timer = setTimeout(() => {
			this.timer = undefined;
			void this.tick()
				.catch((error: unknown) => {
					this.options.logger?.error('Monitor tick failed.', { error: toErrorMessage(error) });
				})
				.finally(() => this.schedule(this.options.intervalMs));
		}, delayMs);
	}

	private async runTick(): Promise<void> {
		if (this.isStopped()) {
			return;
		}
		let session = this.options.sessionManager.currentSession();
		if (!session) {
			this.phase = 'reconnecting';
			session = await this.tryReconnect();
			if (!session || this.isStopped()) {
				return;
			}
		}
		this.phase = 'refreshing';
		await this.refresh(session);
	}

	private async tryReconnect(): Promise<MonitorSession | undefined> {
		const nowMs = this.now();
		if (nowMs < this.nextReconnectAtMs) {
			return undefined;
		}

		try {
			const session = await this.options.sessionManager.connect(this.options.host, this.options.port);
			this.attempt = 0;
			this.nextReconnectAtMs = 0;
			return session;
		} catch (error) {
			const { policy } = this.options;
			if (!hasAttemptsLeft(policy, this.attempt)) {
				this.options.logger?.error('Giving up on reconnection.', { attempt: this.attempt, error: describeError(error) });
				this.phase = 'stopped';
				this.options.onGiveUp?.(error);
				return undefined;
			}
			const delayMs = isRetriableError(error) ? delayForAttempt(policy, this.attempt, this.random) : policy.maxDelayMs;
			this.options.logger?.warn('Reconnect attempt failed.', {
				attempt: this.attempt,
				delayMs,
				error: describeError(error)
			});
			this.attempt += 1;
			this.nextReconnectAtMs = nowMs + delayMs;
			this.options.sessionManager.markReconnecting(this.attempt);
			return undefined;
		}
	}

	private async refresh(session: MonitorSession): Promise<void> {
		let positions: Position[];
		try {
			positions = await session.listPositions();
		} catch (error) {
			const reason = describeError(error);
			this.options.logger?.warn('Position list failed, dropping session.', { error: reason });
			this.options.sessionManager.disconnect(reason);
			this.options.store.markAllStale();
			this.attempt = 0;
			this.nextReconnectAtMs = this.now() + delayForAttempt(this.options.policy, 0, this.random);
			if (!this.isStopped()) {
				this.phase = 'reconnecting';
			}
			return;
		}

		const changed = !samePositions(this.positions, positions);
		this.positions = positions;
		const removed = this.options.store.pruneMissing(new Set(positions.map((position) => position.name)));
		for (const positionName of removed) {
			this.throughput.forget(positionName);
		}
		if (changed) {
			this.options.onPositionsChange?.(positions);
		}

		for (const position of positions) {
			if (this.isStopped()) {
				return;
			}
			await this.refreshPosition(session, position);
		}
		this.options.onRefreshComplete?.(positions);
	}

	private async refreshPosition(session: MonitorSession, position: Position): Promise<void> {
		const { store } = this.options;
		if (position.controlPort <= 0) {
			this.applyRunState(position.name, runState('IDLE'));
			return;
		}

		try {
			await withPositionSession(
				(target) => session.openPosition(target),
				position,
				async (positionSession) => {
					const state = await resolveRunState(positionSession, this.options.logger);
					this.applyRunState(position.name, state);
					if (!isRunActive(state)) {
						return;
					}
					const patch = await this.collectRunTelemetry(positionSession, position.name);
					if (store.update(position.name, patch)) {
						this.options.onTelemetryChange?.(position.name);
					}
				}
			);
		} catch (error) {
			const message = describeError(error);
			this.options.logger?.warn('Position refresh failed.', { position: position.name, error: message });
			// No control service behind the port: the position is not running.
			if (isMissingControlService(error)) {
				this.applyRunState(position.name, runState('IDLE'));
			}
			store.recordError(position.name, message);
			this.options.onTelemetryChange?.(position.name);
		}
	}

	private applyRunState(positionName: string, state: RunState): void {
		const update = this.options.store.setRunState(positionName, state);
		if (update.purged) {
			this.throughput.forget(positionName);
			this.options.logger?.info('Run ended, cleared cached telemetry.', { position: positionName });
		}
		if (update.changed) {
			this.options.onTelemetryChange?.(positionName);
		}
	}

	private async collectRunTelemetry(positionSession: PositionSession, positionName: string): Promise<TelemetryPatch> {
		const info = await positionSession.acquisition.acquisitionInfo();
		const cached = this.options.store.get(positionName);
		const sameRun = cached?.runId === undefined || cached.runId === info.runId;
		if (!sameRun) {
			this.throughput.forget(positionName);
		}
		const patch: TelemetryPatch = { runId: info.runId };

		let meanQuality = sameRun ? cached?.stats?.meanQuality : undefined;
		let activePores = sameRun ? cached?.stats?.activePores : undefined;

		if (positionName === this.detailPosition && info.runId.length > 0) {
			const runId = info.runId;
			const { statistics } = positionSession;

			const yieldHistory = await this.optionalRead(positionName, 'yield history', () => statistics.yieldHistory(runId));
			if (yieldHistory) {
				patch.yieldHistory = yieldHistory;
				this.throughput.update(positionName, yieldHistory);
			}

			if (cached?.histogramRequest && !sameHistogramRequest(cached.histogramRequest, this.histogramRequest)) {
				this.options.store.discardHistogram(positionName);
			}
			const request = { ...this.histogramRequest };
			const histogram = await this.optionalRead(positionName, 'read length histogram', () =>
				statistics.readLengthHistogram(runId, request)
			);
			if (histogram) {
				patch.histogram = histogram;
				patch.histogramRequest = request;
			}

			const dutyTime = await this.optionalRead(positionName, 'duty time', () => statistics.dutyTime(runId));
			if (dutyTime) {
				patch.dutyTime = dutyTime;
			}

			const quality = await this.optionalRead(positionName, 'mean quality', () => statistics.meanQuality(runId));
			if (quality !== undefined) {
				meanQuality = quality;
			}

			const topology =
				(sameRun ? cached?.topology : undefined) ??
				(await this.optionalRead(positionName, 'channel layout', () => positionSession.layout.channelLayout()));
			if (topology) {
				patch.topology = topology;
				const channelStates = await this.optionalRead(positionName, 'channel states', () =>
					positionSession.channels.channelStates(topology.channelCount)
				);
				if (channelStates) {
					patch.channelStates = channelStates;
					activePores = channelStates.activePores;
				}
			}
		}

		patch.stats = deriveStats(info, {
			throughputBasesPerSecond: this.throughput.get(positionName),
			meanQuality,
			activePores
		});
		return patch;
	}

	/**
	 * Detail reads are best effort: a failure or timeout keeps the cached
	 * value and the read is tried again next tick.
	 */
	private async optionalRead<T>(positionName: string, what: string, read: () => Promise<T>): Promise<T | undefined> {
		try {
			return await read();
		} catch (error) {
			this.options.logger?.debug(`Skipped ${what} this tick.`, {
				position: positionName,
				error: describeError(error)
			});
			return undefined;
		}
	}
}
