import type { ChannelTopology } from '../device/channelTopology';
import { isRunActive, sameRunState, type RunState } from '../device/runState';
import type { StatsSnapshot } from './acquisitionStats';
import type { ChannelStateCounts } from './channelStates';
import type { DutyTimeSnapshot } from './dutyTime';
import type { HistogramRequest, HistogramView } from './readLengthHistogram';
import type { YieldPoint } from './yieldHistory';

/**
 * Everything the monitor knows about one position. Run-scoped fields are
 * dropped together when the run ends or its id changes.
 */
export interface PositionTelemetry {
	positionName: string;
	runState?: RunState;
	runId?: string;
	stats?: StatsSnapshot;
	yieldHistory?: YieldPoint[];
	histogram?: HistogramView;
	histogramRequest?: HistogramRequest;
	dutyTime?: DutyTimeSnapshot;
	channelStates?: ChannelStateCounts;
	topology?: ChannelTopology;
	/** Last refresh failure for this position, cleared by the next success. */
	lastError?: string;
	/** True while the values shown are from before a failure or disconnect. */
	stale: boolean;
	updatedAtIso?: string;
}

export type TelemetryPatch = Partial<
	Omit<PositionTelemetry, 'positionName' | 'runState' | 'lastError' | 'stale' | 'updatedAtIso'>
>;

export interface RunStateUpdate {
	changed: boolean;
	/** The run went from active to inactive and its caches were dropped. */
	purged: boolean;
}

const RUN_SCOPED_KEYS: ReadonlyArray<keyof TelemetryPatch> = [
	'runId',
	'stats',
	'yieldHistory',
	'histogram',
	'histogramRequest',
	'dutyTime',
	'channelStates',
	'topology'
];

function clearRunScoped(entry: PositionTelemetry): PositionTelemetry {
	const next: PositionTelemetry = { ...entry };
	for (const key of RUN_SCOPED_KEYS) {
		delete next[key];
	}
	return next;
}

export class TelemetryStore {
	private readonly entries = new Map<string, PositionTelemetry>();

	public get(positionName: string): PositionTelemetry | undefined {
		return this.entries.get(positionName);
	}

	public list(): PositionTelemetry[] {
		return [...this.entries.values()];
	}

	/**
	 * Stores the resolved run state. Leaving an active state purges that
	 * position's run-scoped caches in the same step; other positions are
	 * untouched.
	 */
	public setRunState(positionName: string, state: RunState): RunStateUpdate {
		const existing = this.entries.get(positionName) ?? { positionName, stale: false };
		const changed = !sameRunState(existing.runState, state);
		const purged = isRunActive(existing.runState) && !isRunActive(state);
		const base = purged ? clearRunScoped(existing) : existing;
		this.entries.set(positionName, {
			...base,
			runState: state,
			lastError: undefined,
			stale: false,
			updatedAtIso: new Date().toISOString()
		});
		return { changed: changed || purged, purged };
	}

	/**
	 * Merges fresh telemetry. A patch carrying a different run id starts from
	 * empty run-scoped caches.
	 */
	public update(positionName: string, patch: TelemetryPatch): boolean {
		const existing = this.entries.get(positionName) ?? { positionName, stale: false };
		const runChanged = patch.runId !== undefined && existing.runId !== undefined && patch.runId !== existing.runId;
		const base = runChanged ? clearRunScoped(existing) : existing;

		let changed = runChanged || existing.stale || existing.lastError !== undefined;
		for (const key of RUN_SCOPED_KEYS) {
			if (patch[key] !== undefined && base[key] !== patch[key]) {
				changed = true;
			}
		}

		this.entries.set(positionName, {
			...base,
			...patch,
			positionName,
			lastError: undefined,
			stale: false,
			updatedAtIso: new Date().toISOString()
		});
		return changed;
	}

	/**
	 * Keeps the last known values visible but marks them stale.
	 */
	public recordError(positionName: string, message: string): void {
		const existing = this.entries.get(positionName) ?? { positionName, stale: false };
		this.entries.set(positionName, { ...existing, lastError: message, stale: true });
	}

	public markAllStale(): void {
		for (const [positionName, entry] of this.entries) {
			this.entries.set(positionName, { ...entry, stale: true });
		}
	}

	/**
	 * Drops the cached histogram so the next refresh requests a fresh one.
	 */
	public discardHistogram(positionName: string): void {
		const existing = this.entries.get(positionName);
		if (existing) {
			const next = { ...existing };
			delete next.histogram;
			delete next.histogramRequest;
			this.entries.set(positionName, next);
		}
	}

	public pruneMissing(validPositionNames: Set<string>): string[] {
		const removed: string[] = [];
		for (const positionName of this.entries.keys()) {
			if (!validPositionNames.has(positionName)) {
				this.entries.delete(positionName);
				removed.push(positionName);
			}
		}
		return removed;
	}

	public clear(): void {
		this.entries.clear();
	}
}
