import { asRecord, readNumber, readNumberArray, readRecordArray, readRecordMap } from '../transport/wireReader';

export type ChannelStateCategory = 'STRAND' | 'PORE' | 'ADAPTER' | 'UNAVAILABLE' | 'UNBLOCK' | 'OTHER';
export type OccupancyCategory = 'SEQUENCING' | 'PORE_AVAILABLE' | 'INACTIVE' | 'UNAVAILABLE';

export interface BucketRange {
	start: number;
	end: number;
}

export interface DutyTimeSnapshot {
	timeRange?: BucketRange;
	stateTimes: Map<ChannelStateCategory, number>;
	poreOccupancy: number[];
}

const SEQUENCING_THRESHOLD = 0.2;
const PORE_AVAILABLE_THRESHOLD = 0.05;

const UNAVAILABLE_MARKERS = ['unavailable', 'inactive', 'saturated', 'zero', 'multiple'];

/**
 * Maps a server channel-state label onto a display category. Matching is a
 * case-insensitive substring test, checked in a fixed order.
 */
export function classifyChannelState(label: string): ChannelStateCategory {
	const normalized = label.toLowerCase();
	if (normalized.includes('strand') || normalized.includes('sequencing')) {
		return 'STRAND';
	}
	if (normalized.includes('adapter')) {
		return 'ADAPTER';
	}
	if (normalized.includes('unblock')) {
		return 'UNBLOCK';
	}
	if (UNAVAILABLE_MARKERS.some((marker) => normalized.includes(marker))) {
		return 'UNAVAILABLE';
	}
	if (normalized.includes('pore')) {
		return 'PORE';
	}
	return 'OTHER';
}

export function occupancyCategory(occupancy: number): OccupancyCategory {
	if (occupancy >= SEQUENCING_THRESHOLD) {
		return 'SEQUENCING';
	}
	if (occupancy >= PORE_AVAILABLE_THRESHOLD) {
		return 'PORE_AVAILABLE';
	}
	if (occupancy > 0) {
		return 'INACTIVE';
	}
	return 'UNAVAILABLE';
}

export function bucketRangeFromWire(record: Record<string, unknown>, context: string): BucketRange {
	return {
		start: readNumber(record, 'start', context),
		end: readNumber(record, 'end', context)
	};
}

export function dutyTimeFromWire(message: unknown): DutyTimeSnapshot {
	const context = 'StreamDutyTimeResponse';
	const response = asRecord(message, context);
	const ranges = readRecordArray(response, 'bucket_ranges', context);
	const lastRange = ranges[ranges.length - 1];

	const stateTimes = new Map<ChannelStateCategory, number>();
	for (const [label, data] of readRecordMap(response, 'channel_states', context)) {
		const total = readNumberArray(data, 'state_times', `${context}.channel_states.${label}`).reduce(
			(sum, value) => sum + value,
			0
		);
		const category = classifyChannelState(label);
		stateTimes.set(category, (stateTimes.get(category) ?? 0) + total);
	}

	return {
		timeRange: lastRange ? bucketRangeFromWire(lastRange, `${context}.bucket_ranges`) : undefined,
		stateTimes,
		poreOccupancy: readNumberArray(response, 'pore_occupancy', context)
	};
}
