import { asRecord, readNumber, readOptionalRecord, readString, type WireRecord } from '../transport/wireReader';

export interface AcquisitionSnapshot {
	runId: string;
	readsProcessed: number;
	readsPassed: number;
	readsFailed: number;
	basesPassed: number;
	basesFailed: number;
}

export interface StatsSnapshot extends AcquisitionSnapshot {
	basesCalled: number;
	meanReadLength: number;
	/** Percentage of basecalled reads that passed, 0..100. */
	passRate: number;
	throughputBasesPerSecond: number;
	throughputGigabasesPerHour: number;
	meanQuality?: number;
	activePores?: number;
	updatedAtIso: string;
}

export interface StatsExtras {
	throughputBasesPerSecond?: number;
	meanQuality?: number;
	activePores?: number;
}

export function yieldCountsFromWire(summary: WireRecord | undefined, context: string): Omit<AcquisitionSnapshot, 'runId'> {
	if (!summary) {
		return { readsProcessed: 0, readsPassed: 0, readsFailed: 0, basesPassed: 0, basesFailed: 0 };
	}
	return {
		readsProcessed: readNumber(summary, 'read_count', context),
		readsPassed: readNumber(summary, 'basecalled_pass_read_count', context),
		readsFailed: readNumber(summary, 'basecalled_fail_read_count', context),
		basesPassed: readNumber(summary, 'basecalled_pass_bases', context),
		basesFailed: readNumber(summary, 'basecalled_fail_bases', context)
	};
}

export function acquisitionSnapshotFromWire(message: unknown): AcquisitionSnapshot {
	const context = 'AcquisitionRunInfo';
	const record = asRecord(message, context);
	const summary = readOptionalRecord(record, 'yield_summary', context);
	return {
		runId: readString(record, 'run_id', context),
		...yieldCountsFromWire(summary, `${context}.yield_summary`)
	};
}

export function passRate(readsPassed: number, readsFailed: number): number {
	const total = readsPassed + readsFailed;
	return total === 0 ? 0 : (readsPassed / total) * 100;
}

export function toGigabasesPerHour(basesPerSecond: number): number {
	return (basesPerSecond * 3_600) / 1_000_000_000;
}

export function deriveStats(snapshot: AcquisitionSnapshot, extras: StatsExtras = {}, now: Date = new Date()): StatsSnapshot {
	const basesCalled = snapshot.basesPassed + snapshot.basesFailed;
	const totalReads = snapshot.readsPassed + snapshot.readsFailed;
	const throughput = extras.throughputBasesPerSecond ?? 0;
	return {
		...snapshot,
		basesCalled,
		meanReadLength: totalReads > 0 ? basesCalled / totalReads : 0,
		passRate: passRate(snapshot.readsPassed, snapshot.readsFailed),
		throughputBasesPerSecond: throughput,
		throughputGigabasesPerHour: toGigabasesPerHour(throughput),
		meanQuality: extras.meanQuality,
		activePores: extras.activePores,
		updatedAtIso: now.toISOString()
	};
}
