import { ClientError } from '../errors/ClientError';
import { ConfigError } from '../errors/ConfigError';
import { MonitorError } from '../errors/MonitorError';

export const EXIT_CODES = {
	OK: 0,
	ERROR: 1,
	CONNECTION: 2,
	INVALID_ARGUMENTS: 3,
	NOT_FOUND: 4
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export class UsageError extends MonitorError {
	public constructor(message: string) {
		super('INVALID_ARGUMENTS', message);
		this.name = 'UsageError';
	}
}

function exitCodeForRpc(rpcCode: string | undefined): ExitCode {
	switch (rpcCode) {
		case 'NOT_FOUND':
			return EXIT_CODES.NOT_FOUND;
		case 'UNAVAILABLE':
		case 'DEADLINE_EXCEEDED':
			return EXIT_CODES.CONNECTION;
		case 'INVALID_ARGUMENT':
			return EXIT_CODES.INVALID_ARGUMENTS;
		default:
			return EXIT_CODES.ERROR;
	}
}

export function exitCodeForError(error: unknown): ExitCode {
	if (error instanceof UsageError || error instanceof ConfigError) {
		return EXIT_CODES.INVALID_ARGUMENTS;
	}
	if (!(error instanceof ClientError)) {
		return EXIT_CODES.ERROR;
	}
	switch (error.code) {
		case 'CONNECTION':
		case 'DISCONNECTED':
		case 'TIMEOUT':
		case 'AUTH':
			return EXIT_CODES.CONNECTION;
		case 'NOT_FOUND':
			return EXIT_CODES.NOT_FOUND;
		case 'RPC':
			return exitCodeForRpc(error.rpcCode);
		case 'PROTOCOL':
			return EXIT_CODES.ERROR;
	}
}
