import { timeoutError } from '../errors/ClientError';

/**
 * The slice of a server-streaming call that bounded reads rely on.
 */
export interface CancellableStream {
	on(event: 'data', listener: (message: unknown) => void): unknown;
	on(event: 'error', listener: (error: Error) => void): unknown;
	on(event: 'end', listener: () => void): unknown;
	cancel(): void;
}

export interface StreamReadOptions {
	timeoutMs: number;
	operation: string;
	/** Translates a stream failure into the caller's error type. */
	mapError?: (error: Error) => Error;
}

export interface CollectOptions extends StreamReadOptions {
	/** Called after each message; returning true ends the read. */
	isComplete: (messages: readonly unknown[]) => boolean;
}

/**
 * Collects messages until `isComplete` accepts them or the server ends the
 * stream. The stream is cancelled once the read settles, so a long-lived
 * server stream never outlives the read. Missing the deadline cancels the
 * stream and rejects with TIMEOUT.
 */
export function collectMessages(stream: CancellableStream, options: CollectOptions): Promise<unknown[]> {
	return new Promise<unknown[]>((resolve, reject) => {
		const messages: unknown[] = [];
		let settled = false;

		const settle = (finish: () => void): void => {
			if (settled) {
				return;
			}
			settled = true;
			clearTimeout(timer);
			stream.cancel();
			finish();
		};

		const timer = setTimeout(() => {
			settle(() => reject(timeoutError(options.operation)));
		}, Math.max(1, options.timeoutMs));
		timer.unref?.();

		stream.on('data', (message) => {
			if (settled) {
				return;
			}
			messages.push(message);
			let complete: boolean;
			try {
				complete = options.isComplete(messages);
			} catch (error) {
				settle(() => reject(error));
				return;
			}
			if (complete) {
				settle(() => resolve(messages));
			}
		});
		// The listener stays attached after settling: cancelling emits a late error.
		stream.on('error', (error) => {
			settle(() => reject(options.mapError ? options.mapError(error) : error));
		});
		stream.on('end', () => {
			settle(() => resolve(messages));
		});
	});
}

/**
 * Resolves the first message of a stream, or `undefined` when the server
 * closes it without sending anything.
 */
export async function readFirst(stream: CancellableStream, options: StreamReadOptions): Promise<unknown> {
	const messages = await collectMessages(stream, { ...options, isComplete: (received) => received.length >= 1 });
	return messages[0];
}
