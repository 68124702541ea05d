import type { Logger } from '../diagnostics/logger';
import type { MonitorConfig } from '../config/monitorConfig';
import { reconnectPolicyFromConfig } from '../session/reconnectPolicy';
import type { ConnectionState, SessionManager } from '../session/sessionManager';
import { MonitorPoller } from '../telemetry/monitorPoller';
import { TelemetryStore } from '../telemetry/telemetryStore';
import { ThroughputTracker } from '../telemetry/yieldHistory';
import { formatPositionLine } from './formatters';

export interface WatchCommandOptions {
	sessionManager: SessionManager;
	config: MonitorConfig;
	positionName?: string;
	write: (line: string) => void;
	/** Aborting ends the loop; the CLI wires it to SIGINT. */
	signal: AbortSignal;
	logger?: Logger;
}

export function formatConnectionState(state: ConnectionState): string {
	switch (state.kind) {
		case 'CONNECTING':
			return 'Connecting...';
		case 'CONNECTED':
			return `Connected to ${state.endpoint}`;
		case 'DISCONNECTED':
			return `Disconnected: ${state.reason}`;
		case 'RECONNECTING':
			return `Reconnecting (attempt ${state.attempt})...`;
	}
}

/**
 * Runs the refresh loop until the signal aborts or reconnection gives up.
 * The give-up error is rethrown so the caller can pick an exit code.
 */
export async function runWatchCommand(options: WatchCommandOptions): Promise<void> {
	const { config } = options;
	const store = new TelemetryStore();
	const unsubscribe = options.sessionManager.onStateChange((event) => {
		options.write(formatConnectionState(event.current));
	});

	let giveUpError: unknown;
	let finish: () => void = () => undefined;
	const finished = new Promise<void>((resolve) => {
		finish = resolve;
	});

	const poller = new MonitorPoller({
		sessionManager: options.sessionManager,
		store,
		host: config.connection.host,
		port: config.connection.port,
		policy: reconnectPolicyFromConfig(config.reconnect),
		intervalMs: config.refresh.intervalMs,
		throughput: new ThroughputTracker(config.refresh.throughputIntervalMs),
		detailPosition: options.positionName,
		histogramRequest: { excludeOutliers: config.refresh.excludeHistogramOutliers },
		onRefreshComplete: (positions) => {
			const shown = options.positionName
				? positions.filter((position) => position.name === options.positionName)
				: positions;
			if (shown.length === 0) {
				options.write(options.positionName ? `Position ${options.positionName} not found` : 'No positions found');
				return;
			}
			for (const position of shown) {
				const entry = store.get(position.name);
				if (entry) {
					options.write(formatPositionLine(entry));
				}
			}
		},
		onGiveUp: (error) => {
			giveUpError = error;
			finish();
		},
		logger: options.logger
	});

	const onAbort = (): void => finish();
	if (options.signal.aborted) {
		finish();
	} else {
		options.signal.addEventListener('abort', onAbort, { once: true });
	}

	poller.start();
	try {
		await finished;
	} finally {
		options.signal.removeEventListener('abort', onAbort);
		await poller.stop();
		unsubscribe();
	}
	if (giveUpError !== undefined) {
		throw giveUpError;
	}
}
