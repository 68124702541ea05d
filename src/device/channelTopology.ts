import { asRecord, readNumber, readRecordArray } from '../transport/wireReader';
import { occupancyCategory, type OccupancyCategory } from '../telemetry/dutyTime';

export interface ChannelCoordinate {
	col: number;
	row: number;
}

export interface ChannelTopology {
	channelCount: number;
	width: number;
	height: number;
	/** `coords[channelId - 1]` is the grid cell of that channel. */
	coords: ChannelCoordinate[];
}

export interface ChannelRecord {
	id: number;
	physX?: number;
	physY?: number;
}

export function channelRecordsFromWire(message: unknown): ChannelRecord[] {
	const context = 'GetChannelsLayoutResponse';
	const response = asRecord(message, context);
	return readRecordArray(response, 'channel_records', context).map((record) => {
		const recordContext = `${context}.channel_records`;
		const mux = readRecordArray(record, 'mux_records', recordContext)[0];
		return {
			id: readNumber(record, 'id', recordContext),
			physX: mux ? readNumber(mux, 'phys_x', `${recordContext}.mux_records`) : undefined,
			physY: mux ? readNumber(mux, 'phys_y', `${recordContext}.mux_records`) : undefined
		};
	});
}

function rankMap(values: Iterable<number>): Map<number, number> {
	const sorted = [...new Set(values)].sort((left, right) => left - right);
	return new Map(sorted.map((value, index) => [value, index]));
}

/**
 * Compacts physical coordinates into a dense grid: each distinct X becomes a
 * column and each distinct Y a row, in ascending order. Channels without a
 * coordinate stay at (0, 0); id 0 shares index 0 with id 1, and ids above
 * channelCount are ignored.
 */
export function normalizeChannelTopology(records: readonly ChannelRecord[]): ChannelTopology {
	const channelCount = records.length;
	const placed: Array<{ index: number; x: number; y: number }> = [];
	for (const record of records) {
		const index = Math.max(0, record.id - 1);
		if (index >= channelCount || record.physX === undefined || record.physY === undefined) {
			continue;
		}
		placed.push({ index, x: record.physX, y: record.physY });
	}

	const columns = rankMap(placed.map((entry) => entry.x));
	const rows = rankMap(placed.map((entry) => entry.y));
	const coords: ChannelCoordinate[] = Array.from({ length: channelCount }, () => ({ col: 0, row: 0 }));
	for (const entry of placed) {
		coords[entry.index] = { col: columns.get(entry.x) ?? 0, row: rows.get(entry.y) ?? 0 };
	}

	return {
		channelCount,
		width: columns.size,
		height: rows.size,
		coords
	};
}

/**
 * Occupancy category per grid cell, `grid[row][col]`. Cells with no channel
 * or no occupancy sample are `undefined`.
 */
export function occupancyGrid(
	topology: ChannelTopology,
	poreOccupancy: readonly number[]
): Array<Array<OccupancyCategory | undefined>> {
	const grid: Array<Array<OccupancyCategory | undefined>> = Array.from({ length: topology.height }, () =>
		new Array<OccupancyCategory | undefined>(topology.width).fill(undefined)
	);
	topology.coords.forEach((coord, index) => {
		const value = poreOccupancy[index];
		const row = grid[coord.row];
		if (value === undefined || !row || coord.col >= row.length) {
			return;
		}
		row[coord.col] = occupancyCategory(value);
	});
	return grid;
}
