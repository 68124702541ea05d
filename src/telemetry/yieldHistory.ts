import { asRecord, readNumber, readOptionalRecord, readRecordArray } from '../transport/wireReader';
import { yieldCountsFromWire } from './acquisitionStats';

export interface YieldPoint {
	secondsSinceStart: number;
	reads: number;
	bases: number;
	readsPassed: number;
	readsFailed: number;
	basesPassed: number;
	basesFailed: number;
}

export const DEFAULT_THROUGHPUT_INTERVAL_MS = 5_000;

/**
 * Flattens every snapshot of one acquisition-output response into points.
 * Snapshots without a yield summary are skipped.
 */
export function yieldPointsFromWire(message: unknown): YieldPoint[] {
	const context = 'StreamAcquisitionOutputResponse';
	const response = asRecord(message, context);
	const points: YieldPoint[] = [];
	for (const filtered of readRecordArray(response, 'snapshots', context)) {
		for (const snapshot of readRecordArray(filtered, 'snapshots', `${context}.snapshots`)) {
			const summary = readOptionalRecord(snapshot, 'yield_summary', `${context}.snapshot`);
			if (!summary) {
				continue;
			}
			const counts = yieldCountsFromWire(summary, `${context}.snapshot.yield_summary`);
			points.push({
				secondsSinceStart: readNumber(snapshot, 'seconds', `${context}.snapshot`),
				reads: counts.readsPassed + counts.readsFailed,
				bases: counts.basesPassed + counts.basesFailed,
				readsPassed: counts.readsPassed,
				readsFailed: counts.readsFailed,
				basesPassed: counts.basesPassed,
				basesFailed: counts.basesFailed
			});
		}
	}
	return points;
}

/**
 * Orders points by time and keeps one point per second value; where the
 * server repeats a second, the later point wins.
 */
export function reduceYieldHistory(points: readonly YieldPoint[]): YieldPoint[] {
	const sorted = [...points].sort((left, right) => left.secondsSinceStart - right.secondsSinceStart);
	const result: YieldPoint[] = [];
	for (const point of sorted) {
		const last = result[result.length - 1];
		if (last && last.secondsSinceStart === point.secondsSinceStart) {
			result[result.length - 1] = point;
		} else {
			result.push(point);
		}
	}
	return result;
}

/**
 * Bases per second across the two most recent points, or `undefined` with
 * fewer than two.
 */
export function computeThroughput(points: readonly YieldPoint[]): number | undefined {
	if (points.length < 2) {
		return undefined;
	}
	const last = points[points.length - 1];
	const previous = points[points.length - 2];
	const elapsed = Math.max(1, last.secondsSinceStart - previous.secondsSinceStart);
	return (last.bases - previous.bases) / elapsed;
}

interface ThroughputEntry {
	value: number;
	computedAtMs: number;
}

/**
 * Per-position throughput, recomputed at most once per interval.
 */
export class ThroughputTracker {
	private readonly entries = new Map<string, ThroughputEntry>();

	public constructor(
		private readonly intervalMs: number = DEFAULT_THROUGHPUT_INTERVAL_MS,
		private readonly now: () => number = Date.now
	) {}

	public update(positionName: string, points: readonly YieldPoint[]): number | undefined {
		const existing = this.entries.get(positionName);
		const nowMs = this.now();
		if (existing && nowMs - existing.computedAtMs < this.intervalMs) {
			return existing.value;
		}
		const value = computeThroughput(points);
		if (value === undefined) {
			return existing?.value;
		}
		this.entries.set(positionName, { value, computedAtMs: nowMs });
		return value;
	}

	public get(positionName: string): number | undefined {
		return this.entries.get(positionName)?.value;
	}

	public forget(positionName: string): void {
		this.entries.delete(positionName);
	}
}
