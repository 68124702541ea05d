import { channelRecordsFromWire, normalizeChannelTopology, type ChannelTopology } from '../device/channelTopology';
import type { RpcConnection } from '../transport/rpcConnection';

export interface ChannelLayoutService {
	channelLayout(): Promise<ChannelTopology>;
}

export class DeviceClient implements ChannelLayoutService {
	public constructor(private readonly connection: RpcConnection) {}

	public async channelLayout(): Promise<ChannelTopology> {
		const response = await this.connection.unary('device.DeviceService', 'get_channels_layout', {});
		return normalizeChannelTopology(channelRecordsFromWire(response));
	}
}
