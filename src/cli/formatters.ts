import { runStateLabel } from '../device/runState';
import type { PositionTelemetry } from '../telemetry/telemetryStore';

export function formatNumber(value: number): string {
	if (value >= 1_000_000) {
		return `${(value / 1_000_000).toFixed(2)}M`;
	}
	if (value >= 1_000) {
		return `${(value / 1_000).toFixed(2)}K`;
	}
	return String(value);
}

export function formatBases(value: number): string {
	if (value >= 1_000_000_000) {
		return `${(value / 1_000_000_000).toFixed(2)} Gb`;
	}
	if (value >= 1_000_000) {
		return `${(value / 1_000_000).toFixed(2)} Mb`;
	}
	if (value >= 1_000) {
		return `${(value / 1_000).toFixed(2)} Kb`;
	}
	return `${value} b`;
}

export function formatThroughput(gigabasesPerHour: number): string {
	return `${gigabasesPerHour.toFixed(2)} Gb/h`;
}

/**
 * One status line for the watch output.
 */
export function formatPositionLine(entry: PositionTelemetry): string {
	const parts = [`${entry.positionName}: ${entry.runState ? runStateLabel(entry.runState) : 'Unknown'}`];
	if (entry.runState?.kind === 'ERROR') {
		parts[0] += ` (${entry.runState.message})`;
	}
	if (entry.stale) {
		parts[0] += ' [stale]';
	}
	const stats = entry.stats;
	if (stats) {
		parts.push(`reads ${formatNumber(stats.readsProcessed)}`);
		parts.push(`bases ${formatBases(stats.basesCalled)}`);
		parts.push(`pass ${stats.passRate.toFixed(1)}%`);
		parts.push(formatThroughput(stats.throughputGigabasesPerHour));
		if (stats.meanQuality !== undefined) {
			parts.push(`Q${stats.meanQuality.toFixed(1)}`);
		}
		if (stats.activePores !== undefined) {
			parts.push(`pores ${stats.activePores}`);
		}
	}
	if (entry.lastError) {
		parts.push(`error: ${entry.lastError}`);
	}
	return parts.join(' | ');
}
