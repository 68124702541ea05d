import { dutyTimeFromWire, type DutyTimeSnapshot } from '../telemetry/dutyTime';
import { histogramFromWire, histogramRequestMessage, type HistogramRequest, type HistogramView } from '../telemetry/readLengthHistogram';
import { reduceYieldHistory, yieldPointsFromWire, type YieldPoint } from '../telemetry/yieldHistory';
import type { RpcConnection } from '../transport/rpcConnection';
import { asRecord, readNumber, readRecordArray } from '../transport/wireReader';

const SERVICE = 'statistics.StatisticsService';

const BOXPLOT_DATASET_WIDTH = 10;
const BOXPLOT_POLL_SECONDS = 60;

export interface StatisticsService {
	yieldHistory(runId: string): Promise<YieldPoint[]>;
	dutyTime(runId: string): Promise<DutyTimeSnapshot | undefined>;
	readLengthHistogram(runId: string, request: HistogramRequest): Promise<HistogramView | undefined>;
	/** Median q-score of the most recent boxplot dataset. */
	meanQuality(runId: string): Promise<number | undefined>;
}

/**
 * Statistics streams never end on their own; each call takes the first
 * message and cancels the stream.
 */
export class StatisticsClient implements StatisticsService {
	public constructor(
		private readonly connection: RpcConnection,
		private readonly streamTimeoutMs: number
	) {}

	public async yieldHistory(runId: string): Promise<YieldPoint[]> {
		const message = await this.first('stream_acquisition_output', { acquisition_run_id: runId });
		return message === undefined ? [] : reduceYieldHistory(yieldPointsFromWire(message));
	}

	public async dutyTime(runId: string): Promise<DutyTimeSnapshot | undefined> {
		const message = await this.first('stream_duty_time', { acquisition_run_id: runId });
		return message === undefined ? undefined : dutyTimeFromWire(message);
	}

	public async readLengthHistogram(runId: string, request: HistogramRequest): Promise<HistogramView | undefined> {
		const message = await this.first('stream_read_length_histogram', histogramRequestMessage(runId, request));
		return message === undefined ? undefined : histogramFromWire(message, request);
	}

	public async meanQuality(runId: string): Promise<number | undefined> {
		const message = await this.first('stream_basecall_boxplots', {
			acquisition_run_id: runId,
			data_type: 'QSCORE',
			dataset_width: BOXPLOT_DATASET_WIDTH,
			poll_time: BOXPLOT_POLL_SECONDS
		});
		if (message === undefined) {
			return undefined;
		}
		const datasets = readRecordArray(asRecord(message, 'BoxplotResponse'), 'datasets', 'BoxplotResponse');
		const last = datasets[datasets.length - 1];
		return last ? readNumber(last, 'q50', 'BoxplotResponse.datasets') : undefined;
	}

	private first(method: string, request: object): Promise<unknown> {
		return this.connection.streamFirst(SERVICE, method, request, { timeoutMs: this.streamTimeoutMs });
	}
}
