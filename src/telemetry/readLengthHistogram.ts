import { asRecord, readNumber, readNumberArray, readRecordArray } from '../transport/wireReader';
import { bucketRangeFromWire, type BucketRange } from './dutyTime';

/** Share of reads the server drops from both tails when outliers are excluded. */
export const OUTLIER_PERCENT = 0.01;
export const HISTOGRAM_POLL_SECONDS = 30;
export const READ_LENGTH_TYPE = 'ESTIMATED_BASES';

export interface HistogramRequest {
	excludeOutliers: boolean;
	range?: BucketRange;
}

export interface HistogramView {
	bucketRanges: BucketRange[];
	bucketValues: number[];
	n50: number;
	outliersExcluded: boolean;
	outlierPercent: number;
	requestedRange?: BucketRange;
	sourceDataEnd: number;
}

export const DEFAULT_HISTOGRAM_REQUEST: Readonly<HistogramRequest> = { excludeOutliers: true };

export function sameHistogramRequest(left: HistogramRequest, right: HistogramRequest): boolean {
	return (
		left.excludeOutliers === right.excludeOutliers &&
		left.range?.start === right.range?.start &&
		left.range?.end === right.range?.end
	);
}

export function histogramRequestMessage(runId: string, request: HistogramRequest): object {
	return {
		acquisition_run_id: runId,
		read_length_type: READ_LENGTH_TYPE,
		discard_outlier_percent: request.excludeOutliers ? OUTLIER_PERCENT : 0,
		poll_time_seconds: HISTOGRAM_POLL_SECONDS,
		data_selection: request.range ? { start: request.range.start, end: request.range.end, step: 0 } : undefined
	};
}

/**
 * Builds the view from one histogram response. Buckets pass through as the
 * server sent them; only the first data series (all reads) is kept.
 */
export function histogramFromWire(message: unknown, request: HistogramRequest): HistogramView {
	const context = 'StreamReadLengthHistogramResponse';
	const response = asRecord(message, context);
	const series = readRecordArray(response, 'histogram_data', context)[0];
	return {
		bucketRanges: readRecordArray(response, 'bucket_ranges', context).map((range) =>
			bucketRangeFromWire(range, `${context}.bucket_ranges`)
		),
		bucketValues: series ? readNumberArray(series, 'bucket_values', `${context}.histogram_data`) : [],
		n50: series ? readNumber(series, 'n50', `${context}.histogram_data`) : 0,
		outliersExcluded: request.excludeOutliers,
		outlierPercent: request.excludeOutliers ? OUTLIER_PERCENT : 0,
		requestedRange: request.range ? { ...request.range } : undefined,
		sourceDataEnd: readNumber(response, 'source_data_end', context)
	};
}
