import * as grpc from '@grpc/grpc-js';
import type { Logger } from '../diagnostics/logger';
import { ClientError, connectionError, rpcError } from '../errors/ClientError';
import { LOCAL_AUTH_HEADER } from './localCredential';
import { getMethodDefinition, type ServiceName } from './protoLoader';
import { collectMessages, readFirst, type CancellableStream } from './streamRead';
import { formatEndpoint, TLS_SERVER_NAME, type TrustAnchor } from './trustAnchor';

export interface RpcConnectionOptions {
	host: string;
	port: number;
	/** TLS root of trust; plaintext is only used when absent. */
	trustAnchor?: TrustAnchor;
	/** Read on every call, so a credential resolved after connecting still applies. */
	credential?: () => string | undefined;
	connectTimeoutMs: number;
	requestTimeoutMs: number;
	logger?: Logger;
}

export interface StreamCallOptions {
	timeoutMs: number;
}

function isServiceError(error: unknown): error is grpc.ServiceError {
	return error instanceof Error && 'code' in error && typeof error.code === 'number';
}

export function statusName(code: grpc.status): string {
	return grpc.status[code] ?? `STATUS_${code}`;
}

export function toClientError(operation: string, error: unknown): ClientError {
	if (error instanceof ClientError) {
		return error;
	}
	if (isServiceError(error)) {
		return rpcError(operation, statusName(error.code), error.details || error.message, error);
	}
	const message = error instanceof Error ? error.message : String(error);
	return rpcError(operation, 'UNKNOWN', message, error);
}

function createCredentialInterceptor(credential: () => string | undefined): grpc.Interceptor {
	return (options, nextCall) =>
		new grpc.InterceptingCall(nextCall(options), {
			start(metadata, listener, next) {
				const token = credential();
				if (token) {
					metadata.set(LOCAL_AUTH_HEADER, token);
				}
				next(metadata, listener);
			}
		});
}

/**
 * One channel to one endpoint. Every service client of that endpoint issues
 * its calls through the same instance, and therefore the same channel and
 * credential interceptor.
 */
export class RpcConnection {
	public readonly endpoint: string;
	private readonly client: grpc.Client;
	private readonly requestTimeoutMs: number;
	private readonly connectTimeoutMs: number;
	private readonly logger?: Logger;
	private closed = false;

	public constructor(options: RpcConnectionOptions) {
		this.endpoint = formatEndpoint(options.host, options.port);
		this.requestTimeoutMs = options.requestTimeoutMs;
		this.connectTimeoutMs = options.connectTimeoutMs;
		this.logger = options.logger;

		const interceptors = options.credential ? [createCredentialInterceptor(options.credential)] : [];
		const credentials = options.trustAnchor
			? grpc.credentials.createSsl(Buffer.from(options.trustAnchor.pem, 'utf8'))
			: grpc.credentials.createInsecure();
		const tlsOptions = options.trustAnchor
			? {
				'grpc.ssl_target_name_override': TLS_SERVER_NAME,
				'grpc.default_authority': TLS_SERVER_NAME
			}
			: {};
		this.client = new grpc.Client(this.endpoint, credentials, { ...tlsOptions, interceptors });
	}

	public static async open(options: RpcConnectionOptions): Promise<RpcConnection> {
		const connection = new RpcConnection(options);
		try {
			await connection.waitForReady();
		} catch (error) {
			connection.close();
			throw error;
		}
		return connection;
	}

	public waitForReady(timeoutMs = this.connectTimeoutMs): Promise<void> {
		return new Promise<void>((resolve, reject) => {
			this.client.waitForReady(Date.now() + timeoutMs, (error) => {
				if (error) {
					reject(connectionError(this.endpoint, error));
					return;
				}
				this.logger?.debug('RPC channel ready.', { endpoint: this.endpoint });
				resolve();
			});
		});
	}

	public unary(service: ServiceName, method: string, request: object): Promise<unknown> {
		const definition = getMethodDefinition(service, method);
		return new Promise<unknown>((resolve, reject) => {
			this.client.makeUnaryRequest(
				definition.path,
				definition.requestSerialize,
				definition.responseDeserialize,
				request,
				new grpc.Metadata(),
				{ deadline: Date.now() + this.requestTimeoutMs },
				(error, response) => {
					if (error) {
						reject(toClientError(method, error));
						return;
					}
					resolve(response);
				}
			);
		});
	}

	public openStream(service: ServiceName, method: string, request: object): CancellableStream {
		const definition = getMethodDefinition(service, method);
		return this.client.makeServerStreamRequest(
			definition.path,
			definition.requestSerialize,
			definition.responseDeserialize,
			request,
			new grpc.Metadata()
		);
	}

	/**
	 * First message of a server stream, bounded by `timeoutMs`.
	 */
	public streamFirst(
		service: ServiceName,
		method: string,
		request: object,
		options: StreamCallOptions
	): Promise<unknown> {
		return readFirst(this.openStream(service, method, request), {
			timeoutMs: options.timeoutMs,
			operation: method,
			mapError: (error) => toClientError(method, error)
		});
	}

	public streamUntil(
		service: ServiceName,
		method: string,
		request: object,
		options: StreamCallOptions & { isComplete: (messages: readonly unknown[]) => boolean }
	): Promise<unknown[]> {
		return collectMessages(this.openStream(service, method, request), {
			timeoutMs: options.timeoutMs,
			operation: method,
			isComplete: options.isComplete,
			mapError: (error) => toClientError(method, error)
		});
	}

	public isClosed(): boolean {
		return this.closed;
	}

	public close(): void {
		if (this.closed) {
			return;
		}
		this.closed = true;
		this.client.close();
		this.logger?.debug('RPC channel closed.', { endpoint: this.endpoint });
	}
}
