import assert from 'node:assert/strict';
import test from 'node:test';
import { channelRecordsFromWire, normalizeChannelTopology, occupancyGrid } from '../device/channelTopology';

const THREE_CHANNELS = [
	{ id: 1, physX: 10, physY: 100 },
	{ id: 2, physX: 20, physY: 100 },
	{ id: 3, physX: 10, physY: 200 }
];

test('normalizeChannelTopology compacts coordinates into a dense grid', () => {
	assert.deepEqual(normalizeChannelTopology(THREE_CHANNELS), {
		channelCount: 3,
		width: 2,
		height: 2,
		coords: [
			{ col: 0, row: 0 },
			{ col: 1, row: 0 },
			{ col: 0, row: 1 }
		]
	});
});

test('normalizeChannelTopology leaves unplaced channels at the origin', () => {
	const topology = normalizeChannelTopology([...THREE_CHANNELS, { id: 4 }]);
	assert.equal(topology.channelCount, 4);
	assert.deepEqual(topology.coords[3], { col: 0, row: 0 });
	assert.equal(topology.width, 2);
});

test('normalizeChannelTopology places channel id 0 at the first index', () => {
	const topology = normalizeChannelTopology([
		{ id: 0, physX: 4, physY: 2 },
		{ id: 2, physX: 8, physY: 2 }
	]);
	assert.deepEqual(topology, {
		channelCount: 2,
		width: 2,
		height: 1,
		coords: [
			{ col: 0, row: 0 },
			{ col: 1, row: 0 }
		]
	});
});

test('normalizeChannelTopology ignores ids outside the channel range', () => {
	const topology = normalizeChannelTopology([
		{ id: 5, physX: 1, physY: 1 },
		{ id: 1, physX: 3, physY: 3 }
	]);
	assert.deepEqual(topology, {
		channelCount: 2,
		width: 1,
		height: 1,
		coords: [
			{ col: 0, row: 0 },
			{ col: 0, row: 0 }
		]
	});
});

test('channelRecordsFromWire uses the first mux record', () => {
	assert.deepEqual(
		channelRecordsFromWire({
			channel_records: [
				{
					id: 1,
					name: '1',
					mux_records: [
						{ id: 1, phys_x: 10, phys_y: 100 },
						{ id: 2, phys_x: 99, phys_y: 99 }
					]
				},
				{ id: 2, name: '2', mux_records: [] }
			]
		}),
		[
			{ id: 1, physX: 10, physY: 100 },
			{ id: 2, physX: undefined, physY: undefined }
		]
	);
});

test('occupancyGrid places categories by row and column', () => {
	const grid = occupancyGrid(normalizeChannelTopology(THREE_CHANNELS), [0.25, 0.1, 0.02]);
	assert.deepEqual(grid, [
		['SEQUENCING', 'PORE_AVAILABLE'],
		['INACTIVE', undefined]
	]);
});
