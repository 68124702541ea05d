import type { Logger } from '../diagnostics/logger';
import { toErrorMessage } from '../errors/MonitorError';
import { ManagerClient } from '../protocol/managerClient';
import { readLocalCredential } from '../transport/localCredential';
import { RpcConnection } from '../transport/rpcConnection';
import {
	formatEndpoint,
	loadTrustAnchor,
	tlsServerNameForHost,
	type TrustAnchor,
	type TrustAnchorOptions
} from '../transport/trustAnchor';
import { RpcMonitorSession } from './monitorSession';
import type { ConnectTimeouts, SessionConnector } from './sessionManager';

export interface RpcSessionConnectorOptions {
	trust: Omit<TrustAnchorOptions, 'logger'>;
	/** Insecure channel credentials for local simulators; the host must still be loopback. */
	plaintext?: boolean;
	streamTimeoutMs: number;
	readCredentialFile?: (filePath: string) => Promise<string>;
	logger?: Logger;
}

/**
 * Connector used outside tests: resolves trust, opens the discovery channel,
 * then fetches the local credential through it. The credential is attached by
 * the channel interceptor from then on.
 */
export function createRpcSessionConnector(options: RpcSessionConnectorOptions): SessionConnector {
	return async (host: string, port: number, timeouts: ConnectTimeouts) => {
		const endpoint = formatEndpoint(host, port);
		tlsServerNameForHost(host, port);
		let trustAnchor: TrustAnchor | undefined;
		if (!options.plaintext) {
			trustAnchor = await loadTrustAnchor(endpoint, { ...options.trust, logger: options.logger });
		}

		let credential: string | undefined;
		const connection = await RpcConnection.open({
			host,
			port,
			trustAnchor,
			credential: () => credential,
			connectTimeoutMs: timeouts.connectTimeoutMs,
			requestTimeoutMs: timeouts.requestTimeoutMs,
			logger: options.logger
		});

		const discovery = new ManagerClient(connection, { streamTimeoutMs: options.streamTimeoutMs, logger: options.logger });
		try {
			const tokenPath = await discovery.localCredentialPath();
			credential = await readLocalCredential(tokenPath, { readFile: options.readCredentialFile, logger: options.logger });
		} catch (error) {
			options.logger?.warn('Credential bootstrap failed.', { endpoint, error: toErrorMessage(error) });
			connection.close();
			throw error;
		}

		options.logger?.info('Connected to discovery service.', { endpoint, authenticated: credential !== undefined });
		return new RpcMonitorSession({
			host,
			connection,
			discovery,
			trustAnchor,
			credential,
			connectTimeoutMs: timeouts.connectTimeoutMs,
			requestTimeoutMs: timeouts.requestTimeoutMs,
			streamTimeoutMs: options.streamTimeoutMs,
			logger: options.logger
		});
	};
}
