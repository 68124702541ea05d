import fs from 'node:fs';
import path from 'node:path';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';
export type LogLevelSetting = LogLevel | 'off';

export const LOG_LEVEL_SETTINGS: readonly LogLevelSetting[] = ['off', 'error', 'warn', 'info', 'debug', 'trace'];

export interface Logger {
	error(message: string, meta?: Record<string, unknown>): void;
	warn(message: string, meta?: Record<string, unknown>): void;
	info(message: string, meta?: Record<string, unknown>): void;
	debug(message: string, meta?: Record<string, unknown>): void;
	trace(message: string, meta?: Record<string, unknown>): void;
}

const LEVEL_ORDER: Record<LogLevelSetting, number> = {
	off: -1,
	error: 0,
	warn: 1,
	info: 2,
	debug: 3,
	trace: 4
};

export function toLogLine(level: LogLevel, message: string, meta?: Record<string, unknown>): string {
	const timestamp = new Date().toISOString();
	if (!meta || Object.keys(meta).length === 0) {
		return `[${timestamp}] [${level}] ${message}`;
	}

	let serialized = '';
	try {
		serialized = JSON.stringify(meta);
	} catch {
		serialized = '{"meta":"unserializable"}';
	}
	return `[${timestamp}] [${level}] ${message} ${serialized}`;
}

export class NoopLogger implements Logger {
	public error(_message: string, _meta?: Record<string, unknown>): void {}
	public warn(_message: string, _meta?: Record<string, unknown>): void {}
	public info(_message: string, _meta?: Record<string, unknown>): void {}
	public debug(_message: string, _meta?: Record<string, unknown>): void {}
	public trace(_message: string, _meta?: Record<string, unknown>): void {}
}

/**
 * Level-filtered logger that hands each formatted line to a sink.
 */
export class LineLogger implements Logger {
	private readonly minLevel: number;
	private readonly appendLine: (line: string) => void;

	public constructor(appendLine: (line: string) => void, level: LogLevelSetting = 'info') {
		this.appendLine = appendLine;
		this.minLevel = LEVEL_ORDER[level];
	}

	public error(message: string, meta?: Record<string, unknown>): void {
		this.log('error', message, meta);
	}

	public warn(message: string, meta?: Record<string, unknown>): void {
		this.log('warn', message, meta);
	}

	public info(message: string, meta?: Record<string, unknown>): void {
		this.log('info', message, meta);
	}

	public debug(message: string, meta?: Record<string, unknown>): void {
		this.log('debug', message, meta);
	}

	public trace(message: string, meta?: Record<string, unknown>): void {
		this.log('trace', message, meta);
	}

	private log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
		if (LEVEL_ORDER[level] > this.minLevel) {
			return;
		}
		this.appendLine(toLogLine(level, message, meta));
	}
}

export interface FileLogger extends Logger {
	readonly filePath: string;
	close(): Promise<void>;
}

/**
 * Appends log lines to `filePath`, creating its directory first. The terminal
 * belongs to the command output, so nothing is ever written to stderr.
 * A write failure disables the sink for the rest of the process.
 */
export function createFileLogger(filePath: string, level: LogLevelSetting = 'info'): FileLogger {
	fs.mkdirSync(path.dirname(filePath), { recursive: true });
	const stream = fs.createWriteStream(filePath, { flags: 'a', encoding: 'utf8' });
	let broken = false;
	stream.on('error', () => {
		broken = true;
	});

	const lineLogger = new LineLogger((line) => {
		if (!broken) {
			stream.write(`${line}\n`);
		}
	}, level);

	return {
		filePath,
		error: (message, meta) => lineLogger.error(message, meta),
		warn: (message, meta) => lineLogger.warn(message, meta),
		info: (message, meta) => lineLogger.info(message, meta),
		debug: (message, meta) => lineLogger.debug(message, meta),
		trace: (message, meta) => lineLogger.trace(message, meta),
		close: () =>
			new Promise<void>((resolve) => {
				if (broken || stream.closed) {
					resolve();
					return;
				}
				stream.end(() => resolve());
			})
	};
}
