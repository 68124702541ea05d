import type { Logger } from '../diagnostics/logger';
import { ClientError, disconnectedError } from '../errors/ClientError';
import { toErrorMessage } from '../errors/MonitorError';
import type { MonitorSession } from './monitorSession';
import { delayForAttempt, hasAttemptsLeft, type ReconnectPolicy } from './reconnectPolicy';

export type ConnectionState =
	| { kind: 'CONNECTING' }
	| { kind: 'CONNECTED'; endpoint: string }
	| { kind: 'DISCONNECTED'; sinceMs: number; reason: string }
	| { kind: 'RECONNECTING'; attempt: number };

export interface ConnectionStateChangeEvent {
	previous: ConnectionState;
	current: ConnectionState;
}

export type ConnectionStateListener = (event: ConnectionStateChangeEvent) => void;

export interface ConnectTimeouts {
	connectTimeoutMs: number;
	requestTimeoutMs: number;
}

export type SessionConnector = (host: string, port: number, timeouts: ConnectTimeouts) => Promise<MonitorSession>;

export interface SessionManagerOptions {
	connector: SessionConnector;
	timeouts: ConnectTimeouts;
	sleep?: (ms: number) => Promise<void>;
	random?: () => number;
	now?: () => number;
	logger?: Logger;
}

const defaultSleep = (ms: number): Promise<void> =>
	new Promise<void>((resolve) => {
		setTimeout(resolve, ms);
	});

export function describeError(error: unknown): string {
	return error instanceof ClientError ? error.displayMessage : toErrorMessage(error);
}

export function isRetriableError(error: unknown): boolean {
	return error instanceof ClientError && error.isRetriable();
}

/**
 * Owns the single discovery session of the process and its connection state.
 */
export class SessionManager {
	private readonly listeners: ConnectionStateListener[] = [];
	private readonly sleep: (ms: number) => Promise<void>;
	private readonly random: () => number;
	private readonly now: () => number;
	private state: ConnectionState;
	private session: MonitorSession | undefined;
	private inFlight: Promise<MonitorSession> | undefined;
	private disposed = false;

	public constructor(private readonly options: SessionManagerOptions) {
		this.sleep = options.sleep ?? defaultSleep;
		this.random = options.random ?? Math.random;
		this.now = options.now ?? Date.now;
		this.state = { kind: 'DISCONNECTED', sinceMs: this.now(), reason: 'Not connected' };
	}

	public onStateChange(listener: ConnectionStateListener): () => void {
		this.listeners.push(listener);
		return () => {
			const index = this.listeners.indexOf(listener);
			if (index >= 0) {
				this.listeners.splice(index, 1);
			}
		};
	}

	public currentState(): ConnectionState {
		return this.state;
	}

	public currentSession(): MonitorSession | undefined {
		return this.session;
	}

	public requireSession(): MonitorSession {
		if (!this.session) {
			throw disconnectedError('No active session');
		}
		return this.session;
	}

	/**
	 * One attempt. A call made while another attempt is running shares that
	 * attempt's outcome. Success replaces and closes any previous session.
	 */
	public connect(host: string, port: number, timeouts: ConnectTimeouts = this.options.timeouts): Promise<MonitorSession> {
		if (this.inFlight) {
			return this.inFlight;
		}
		const attempt = this.runAttempt(host, port, timeouts).finally(() => {
			this.inFlight = undefined;
		});
		this.inFlight = attempt;
		return attempt;
	}

	/**
	 * Retries retriable failures with backoff. `attempt` counts retries, so
	 * `maxAttempts` = 3 allows one initial attempt plus three retries before
	 * the last error is returned. Fatal failures are returned at once.
	 */
	public async connectWithRetry(host: string, port: number, policy: ReconnectPolicy): Promise<MonitorSession> {
		let attempt = 0;
		for (;;) {
			try {
				return await this.connect(host, port);
			} catch (error) {
				if (!isRetriableError(error) || this.disposed) {
					throw error;
				}
				if (!hasAttemptsLeft(policy, attempt)) {
					this.options.logger?.error('Maximum reconnection attempts reached.', {
						attempt,
						maxAttempts: policy.maxAttempts
					});
					throw error;
				}
				const delayMs = delayForAttempt(policy, attempt, this.random);
				this.options.logger?.warn('Connection failed, retrying.', {
					attempt,
					delayMs,
					error: describeError(error)
				});
				attempt += 1;
				this.markReconnecting(attempt);
				await this.sleep(delayMs);
				if (this.disposed) {
					throw disconnectedError('Session manager stopped');
				}
			}
		}
	}

	public markReconnecting(attempt: number): void {
		this.setState({ kind: 'RECONNECTING', attempt });
	}

	/**
	 * Drops the live session, if any, and records why.
	 */
	public disconnect(reason: string): void {
		const session = this.session;
		this.session = undefined;
		session?.close();
		if (this.state.kind !== 'DISCONNECTED' || this.state.reason !== reason) {
			this.setState({ kind: 'DISCONNECTED', sinceMs: this.now(), reason });
		}
	}

	public dispose(): void {
		if (this.disposed) {
			return;
		}
		this.disposed = true;
		this.disconnect('Stopped');
		this.listeners.length = 0;
	}

	private async runAttempt(host: string, port: number, timeouts: ConnectTimeouts): Promise<MonitorSession> {
		if (this.state.kind !== 'RECONNECTING') {
			this.setState({ kind: 'CONNECTING' });
		}
		this.options.logger?.info('Connecting to discovery service.', { host, port });

		let session: MonitorSession;
		try {
			session = await this.options.connector(host, port, timeouts);
		} catch (error) {
			this.setState({ kind: 'DISCONNECTED', sinceMs: this.now(), reason: describeError(error) });
			throw error;
		}

		if (this.disposed) {
			session.close();
			throw disconnectedError('Session manager stopped');
		}
		const previous = this.session;
		this.session = session;
		previous?.close();
		this.setState({ kind: 'CONNECTED', endpoint: session.endpoint });
		return session;
	}

	private setState(next: ConnectionState): void {
		const previous = this.state;
		this.state = next;
		const event: ConnectionStateChangeEvent = { previous, current: next };
		for (const listener of [...this.listeners]) {
			try {
				listener(event);
			} catch (error) {
				this.options.logger?.warn('Connection state listener failed.', { error: toErrorMessage(error) });
			}
		}
	}
}
