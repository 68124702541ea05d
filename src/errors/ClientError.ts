import { MonitorError } from './MonitorError';

/**
 * Failure categories for calls against the instrument server.
 */
export type ClientErrorCode =
	| 'CONNECTION'
	| 'RPC'
	| 'PROTOCOL'
	| 'NOT_FOUND'
	| 'TIMEOUT'
	| 'DISCONNECTED'
	| 'AUTH';

/**
 * Status names reported by the RPC layer that a later attempt may clear.
 */
const RETRIABLE_RPC_CODES: ReadonlySet<string> = new Set(['UNAVAILABLE', 'DEADLINE_EXCEEDED', 'ABORTED']);

export interface ClientErrorOptions {
	code: ClientErrorCode;
	message: string;
	endpoint?: string;
	operation?: string;
	rpcCode?: string;
	resource?: string;
	id?: string;
	cause?: unknown;
}

/**
 * Unified error class for discovery, position and streaming calls.
 * `message` holds the detail; `displayMessage` is the short line shown to users.
 */
export class ClientError extends MonitorError {
	declare readonly code: ClientErrorCode;
	public readonly endpoint?: string;
	public readonly operation?: string;
	public readonly rpcCode?: string;
	public readonly resource?: string;
	public readonly id?: string;

	public constructor(options: ClientErrorOptions) {
		super(options.code, options.message, options.cause);
		this.name = 'ClientError';
		this.endpoint = options.endpoint;
		this.operation = options.operation;
		this.rpcCode = options.rpcCode;
		this.resource = options.resource;
		this.id = options.id;
	}

	public isRetriable(): boolean {
		switch (this.code) {
			case 'CONNECTION':
			case 'TIMEOUT':
			case 'DISCONNECTED':
				return true;
			case 'RPC':
				return this.rpcCode !== undefined && RETRIABLE_RPC_CODES.has(this.rpcCode);
			default:
				return false;
		}
	}

	public get displayMessage(): string {
		switch (this.code) {
			case 'CONNECTION':
				return `Failed to connect to ${this.endpoint ?? 'server'}`;
			case 'RPC':
				return `${this.operation ?? 'unknown'}: ${this.message}`;
			case 'PROTOCOL':
				return `Protocol error: ${this.message}`;
			case 'NOT_FOUND':
				return `${this.resource ?? 'Resource'} not found: ${this.id ?? ''}`;
			case 'TIMEOUT':
				return `Operation timed out: ${this.operation ?? 'unknown'}`;
			case 'DISCONNECTED':
				return 'Connection lost';
			case 'AUTH':
				return `Authentication error: ${this.message}`;
		}
	}
}

export function connectionError(endpoint: string, cause: unknown, detail?: string): ClientError {
	const reason = detail ?? (cause instanceof Error ? cause.message : String(cause));
	return new ClientError({
		code: 'CONNECTION',
		message: `Connection to ${endpoint} failed: ${reason}`,
		endpoint,
		cause
	});
}

export function rpcError(operation: string, rpcCode: string, message: string, cause?: unknown): ClientError {
	return new ClientError({ code: 'RPC', message, operation, rpcCode, cause });
}

export function protocolError(message: string): ClientError {
	return new ClientError({ code: 'PROTOCOL', message });
}

export function notFoundError(resource: string, id: string): ClientError {
	return new ClientError({ code: 'NOT_FOUND', message: `${resource} not found: ${id}`, resource, id });
}

export function timeoutError(operation: string): ClientError {
	return new ClientError({ code: 'TIMEOUT', message: `Operation timed out: ${operation}`, operation });
}

export function disconnectedError(reason?: string): ClientError {
	return new ClientError({ code: 'DISCONNECTED', message: reason ?? 'Connection lost' });
}

export function authError(message: string, cause?: unknown): ClientError {
	return new ClientError({ code: 'AUTH', message, cause });
}

export function isClientError(error: unknown): error is ClientError {
	return error instanceof ClientError;
}
