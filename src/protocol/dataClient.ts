import { channelStateEntriesFromWire, channelStatesRequestMessage, countChannelStates, type ChannelStateCounts } from '../telemetry/channelStates';
import type { RpcConnection } from '../transport/rpcConnection';

export interface ChannelStateService {
	channelStates(channelCount: number): Promise<ChannelStateCounts>;
}

export class DataClient implements ChannelStateService {
	public constructor(
		private readonly connection: RpcConnection,
		private readonly streamTimeoutMs: number
	) {}

	public async channelStates(channelCount: number): Promise<ChannelStateCounts> {
		const message = await this.connection.streamFirst(
			'data.DataService',
			'get_channel_states',
			channelStatesRequestMessage(channelCount),
			{ timeoutMs: this.streamTimeoutMs }
		);
		return countChannelStates(channelCount, message === undefined ? [] : channelStateEntriesFromWire(message));
	}
}
