import type { Logger } from '../diagnostics/logger';
import { openPositionSession, type PositionSession } from '../device/positionSession';
import { groupDevices, type Device, type Position } from '../device/positionTypes';
import type { DiscoveryService } from '../protocol/managerClient';
import type { RpcConnection } from '../transport/rpcConnection';
import type { TrustAnchor } from '../transport/trustAnchor';

/**
 * A live session with the discovery endpoint. Position sub-sessions reuse
 * its host, trust anchor and credential.
 */
export interface MonitorSession {
	readonly endpoint: string;
	listPositions(): Promise<Position[]>;
	listDevices(): Promise<Device[]>;
	openPosition(position: Position): Promise<PositionSession>;
	close(): void;
}

export interface RpcMonitorSessionOptions {
	host: string;
	connection: RpcConnection;
	discovery: DiscoveryService;
	trustAnchor?: TrustAnchor;
	credential?: string;
	connectTimeoutMs: number;
	requestTimeoutMs: number;
	streamTimeoutMs: number;
	logger?: Logger;
}

export class RpcMonitorSession implements MonitorSession {
	public readonly endpoint: string;

	public constructor(private readonly options: RpcMonitorSessionOptions) {
		this.endpoint = options.connection.endpoint;
	}

	public listPositions(): Promise<Position[]> {
		return this.options.discovery.listPositions();
	}

	public async listDevices(): Promise<Device[]> {
		return groupDevices(await this.listPositions());
	}

	public openPosition(position: Position): Promise<PositionSession> {
		const credential = this.options.credential;
		return openPositionSession(position, {
			host: this.options.host,
			trustAnchor: this.options.trustAnchor,
			credential: () => credential,
			connectTimeoutMs: this.options.connectTimeoutMs,
			requestTimeoutMs: this.options.requestTimeoutMs,
			streamTimeoutMs: this.options.streamTimeoutMs,
			logger: this.options.logger
		});
	}

	public close(): void {
		this.options.connection.close();
	}
}
