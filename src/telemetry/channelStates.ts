import { asRecord, readNumber, readRecordArray, readString } from '../transport/wireReader';
import { classifyChannelState } from './dutyTime';

export interface ChannelStateCounts {
	channelCount: number;
	/** Label per 0-based channel index; `undefined` where the server sent nothing. */
	states: Array<string | undefined>;
	stateCounts: Map<string, number>;
	sequencing: number;
	poreAvailable: number;
	unavailable: number;
	inactive: number;
	activePores: number;
}

export interface ChannelStateEntry {
	channel: number;
	label: string;
}

export function channelStatesRequestMessage(channelCount: number): object {
	return {
		first_channel: 1,
		last_channel: channelCount,
		use_channel_states_ids: { value: false },
		wait_for_processing: true
	};
}

export function channelStateEntriesFromWire(message: unknown): ChannelStateEntry[] {
	const context = 'GetChannelStatesResponse';
	const response = asRecord(message, context);
	return readRecordArray(response, 'channel_states', context).map((entry) => {
		const entryContext = `${context}.channel_states`;
		let label = 'unknown';
		if (entry.state === 'state_name') {
			label = readString(entry, 'state_name', entryContext);
		} else if (entry.state === 'state_id') {
			label = `state_${readNumber(entry, 'state_id', entryContext)}`;
		}
		return { channel: readNumber(entry, 'channel', entryContext), label };
	});
}

/**
 * Places labels by channel (1-based on the wire) and counts them per label
 * and per occupancy bucket. Channels without a label count as inactive.
 */
export function countChannelStates(channelCount: number, entries: readonly ChannelStateEntry[]): ChannelStateCounts {
	const states: Array<string | undefined> = new Array<string | undefined>(channelCount).fill(undefined);
	const stateCounts = new Map<string, number>();
	for (const entry of entries) {
		const index = entry.channel - 1;
		if (index >= 0 && index < channelCount) {
			states[index] = entry.label;
		}
		stateCounts.set(entry.label, (stateCounts.get(entry.label) ?? 0) + 1);
	}

	let sequencing = 0;
	let poreAvailable = 0;
	let unavailable = 0;
	let inactive = 0;
	for (const label of states) {
		const category = label === undefined ? 'OTHER' : classifyChannelState(label);
		if (category === 'STRAND') {
			sequencing += 1;
		} else if (category === 'PORE') {
			poreAvailable += 1;
		} else if (category === 'UNAVAILABLE') {
			unavailable += 1;
		} else {
			inactive += 1;
		}
	}

	return {
		channelCount,
		states,
		stateCounts,
		sequencing,
		poreAvailable,
		unavailable,
		inactive,
		activePores: sequencing + poreAvailable
	};
}
