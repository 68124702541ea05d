import type { Logger } from '../diagnostics/logger';
import { notFoundError } from '../errors/ClientError';
import { AcquisitionClient, type AcquisitionService } from '../protocol/acquisitionClient';
import { DataClient, type ChannelStateService } from '../protocol/dataClient';
import { DeviceClient, type ChannelLayoutService } from '../protocol/deviceClient';
import { ProtocolClient, type ProtocolRunService } from '../protocol/protocolClient';
import { StatisticsClient, type StatisticsService } from '../protocol/statisticsClient';
import { RpcConnection } from '../transport/rpcConnection';
import type { TrustAnchor } from '../transport/trustAnchor';
import type { Position } from './positionTypes';

/**
 * Service families of one position's control endpoint, all on one channel.
 */
export interface PositionServices {
	acquisition: AcquisitionService;
	protocol: ProtocolRunService;
	statistics: StatisticsService;
	channels: ChannelStateService;
	layout: ChannelLayoutService;
}

export interface PositionSession extends PositionServices {
	readonly position: Position;
	close(): void;
}

export interface PositionSessionOptions {
	host: string;
	trustAnchor?: TrustAnchor;
	credential?: () => string | undefined;
	connectTimeoutMs: number;
	requestTimeoutMs: number;
	streamTimeoutMs: number;
	logger?: Logger;
}

export type PositionSessionOpener = (position: Position) => Promise<PositionSession>;

export async function openPositionSession(position: Position, options: PositionSessionOptions): Promise<PositionSession> {
	if (position.controlPort <= 0) {
		throw notFoundError('Position control service', position.name);
	}

	const connection = await RpcConnection.open({
		host: options.host,
		port: position.controlPort,
		trustAnchor: options.trustAnchor,
		credential: options.credential,
		connectTimeoutMs: options.connectTimeoutMs,
		requestTimeoutMs: options.requestTimeoutMs,
		logger: options.logger
	});
	options.logger?.debug('Position session opened.', { position: position.name, endpoint: connection.endpoint });

	return {
		position,
		acquisition: new AcquisitionClient(connection),
		protocol: new ProtocolClient(connection),
		statistics: new StatisticsClient(connection, options.streamTimeoutMs),
		channels: new DataClient(connection, options.streamTimeoutMs),
		layout: new DeviceClient(connection),
		close: () => connection.close()
	};
}

/**
 * Opens a sub-session for one unit of work and always closes it afterwards.
 */
export async function withPositionSession<T>(
	open: PositionSessionOpener,
	position: Position,
	work: (session: PositionSession) => Promise<T>
): Promise<T> {
	const session = await open(position);
	try {
		return await work(session);
	} finally {
		session.close();
	}
}
