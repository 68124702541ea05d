#!/usr/bin/env node
import { parseArgs } from 'node:util';
import { loadMonitorConfig, type MonitorConfig, type MonitorConfigOverrides } from '../config/monitorConfig';
import { RunControlService } from '../control/runControlService';
import { NoopLogger, createFileLogger, type FileLogger, type LogLevelSetting, type Logger } from '../diagnostics/logger';
import { createRpcSessionConnector } from '../session/rpcSessionConnector';
import { SessionManager, describeError } from '../session/sessionManager';
import { runControlCommand } from './controlCommand';
import { EXIT_CODES, UsageError, exitCodeForError, type ExitCode } from './exitCodes';
import { runListCommand } from './listCommand';
import { runStatusCommand } from './statusCommand';
import { runWatchCommand } from './watchCommand';

export const USAGE = `Usage: seqwatch [options] <command>

Commands:
  list                  List devices and their positions
  status                Show run state and yield per position
  watch                 Refresh continuously until interrupted
  pause <position>      Pause the protocol on a position
  resume <position>     Resume a paused protocol
  stop <position>       Stop the protocol (--acquisition-only stops acquisition only)

Options:
  -H, --host <host>     Server host (default localhost)
  -p, --port <port>     Discovery port (default 9501)
  -c, --config <file>   Config file
  -v                    Verbose logging; repeat for debug and trace
      --log <file>      Log file
      --json            JSON output for list and status
  -P, --position <name> Restrict status or watch to one position
  -h, --help            Show this help`;

const COMMANDS = ['list', 'status', 'watch', 'pause', 'resume', 'stop'] as const;
type CommandName = (typeof COMMANDS)[number];

export interface CliArguments {
	command: CommandName;
	target?: string;
	configPath?: string;
	overrides: MonitorConfigOverrides;
	json: boolean;
	positionName?: string;
	acquisitionOnly: boolean;
}

export interface CliIo {
	stdout: (line: string) => void;
	stderr: (line: string) => void;
	env: NodeJS.ProcessEnv;
	/** Ends `watch`; wired to SIGINT when run as a program. */
	signal: AbortSignal;
}

function verbosityLevel(count: number): LogLevelSetting | undefined {
	if (count <= 0) {
		return undefined;
	}
	if (count === 1) {
		return 'info';
	}
	return count === 2 ? 'debug' : 'trace';
}

function parsePort(text: string): number {
	const port = Number(text);
	if (!Number.isInteger(port) || port < 1 || port > 65_535) {
		throw new UsageError(`Invalid port: ${text}`);
	}
	return port;
}

function isCommandName(value: string): value is CommandName {
	return COMMANDS.some((command) => command === value);
}

function parseRawArguments(argv: readonly string[]) {
	try {
		return parseArgs({
			args: [...argv],
			allowPositionals: true,
			options: {
				host: { type: 'string', short: 'H' },
				port: { type: 'string', short: 'p' },
				config: { type: 'string', short: 'c' },
				verbose: { type: 'boolean', short: 'v', multiple: true },
				log: { type: 'string' },
				json: { type: 'boolean' },
				position: { type: 'string', short: 'P' },
				'acquisition-only': { type: 'boolean' },
				help: { type: 'boolean', short: 'h' }
			}
		});
	} catch (error) {
		throw new UsageError(describeError(error));
	}
}

/**
 * Returns `undefined` when help was requested.
 */
export function parseCliArguments(argv: readonly string[]): CliArguments | undefined {
	const { values, positionals } = parseRawArguments(argv);
	if (values.help) {
		return undefined;
	}
	const [commandText, target, ...extra] = positionals;
	if (commandText === undefined) {
		throw new UsageError('Missing command');
	}
	if (!isCommandName(commandText)) {
		throw new UsageError(`Unknown command: ${commandText}`);
	}
	const needsTarget = commandText === 'pause' || commandText === 'resume' || commandText === 'stop';
	if (needsTarget && target === undefined) {
		throw new UsageError(`Command ${commandText} needs a position name`);
	}
	if ((!needsTarget && target !== undefined) || extra.length > 0) {
		throw new UsageError(`Unexpected argument: ${needsTarget ? extra[0] : target}`);
	}

	return {
		command: commandText,
		target,
		configPath: values.config,
		overrides: {
			host: values.host,
			port: values.port !== undefined ? parsePort(values.port) : undefined,
			logLevel: verbosityLevel(values.verbose?.length ?? 0),
			logFile: values.log
		},
		json: values.json ?? false,
		positionName: values.position,
		acquisitionOnly: values['acquisition-only'] ?? false
	};
}

function createLogger(config: MonitorConfig): FileLogger | undefined {
	if (config.logging.level === 'off') {
		return undefined;
	}
	return createFileLogger(config.logging.filePath, config.logging.level);
}

async function dispatch(args: CliArguments, config: MonitorConfig, io: CliIo, logger: Logger): Promise<void> {
	const { connection } = config;
	const sessionManager = new SessionManager({
		connector: createRpcSessionConnector({
			trust: {
				explicitPath: connection.trustedCaPath,
				searchPaths: connection.certificateSearchPaths
			},
			plaintext: connection.plaintext,
			streamTimeoutMs: config.refresh.streamTimeoutMs,
			logger
		}),
		timeouts: { connectTimeoutMs: connection.connectTimeoutMs, requestTimeoutMs: connection.requestTimeoutMs },
		logger
	});

	try {
		if (args.command === 'watch') {
			await runWatchCommand({
				sessionManager,
				config,
				positionName: args.positionName,
				write: io.stdout,
				signal: io.signal,
				logger
			});
			return;
		}

		const session = await sessionManager.connect(connection.host, connection.port);
		switch (args.command) {
			case 'list':
				await runListCommand({ session, json: args.json, write: io.stdout });
				return;
			case 'status':
				await runStatusCommand({
					session,
					json: args.json,
					positionName: args.positionName,
					write: io.stdout,
					logger
				});
				return;
			case 'pause':
			case 'resume':
			case 'stop':
				await runControlCommand({
					service: new RunControlService({ sessionManager, logger }),
					action: args.command,
					positionName: args.target ?? '',
					acquisitionOnly: args.acquisitionOnly,
					write: io.stdout
				});
				return;
		}
	} finally {
		sessionManager.dispose();
	}
}

type Prepared = { args: CliArguments; config: MonitorConfig } | { exitCode: ExitCode };

function prepare(argv: readonly string[], io: CliIo): Prepared {
	try {
		const args = parseCliArguments(argv);
		if (!args) {
			io.stdout(USAGE);
			return { exitCode: EXIT_CODES.OK };
		}
		const config = loadMonitorConfig({ configPath: args.configPath, env: io.env, overrides: args.overrides });
		return { args, config };
	} catch (error) {
		io.stderr(`Error: ${describeError(error)}`);
		if (error instanceof UsageError) {
			io.stderr(USAGE);
		}
		return { exitCode: exitCodeForError(error) };
	}
}

export async function main(argv: readonly string[], io: CliIo): Promise<ExitCode> {
	const prepared = prepare(argv, io);
	if ('exitCode' in prepared) {
		return prepared.exitCode;
	}
	const { args, config } = prepared;

	let fileLogger: FileLogger | undefined;
	try {
		fileLogger = createLogger(config);
	} catch (error) {
		io.stderr(`Error: Failed to open log file ${config.logging.filePath}: ${describeError(error)}`);
		return EXIT_CODES.ERROR;
	}
	const logger: Logger = fileLogger ?? new NoopLogger();
	logger.info('Starting.', { command: args.command, host: config.connection.host, port: config.connection.port });

	try {
		await dispatch(args, config, io, logger);
		return EXIT_CODES.OK;
	} catch (error) {
		const message = describeError(error);
		logger.error('Command failed.', { command: args.command, error: message });
		io.stderr(`Error: ${message}`);
		return exitCodeForError(error);
	} finally {
		await fileLogger?.close();
	}
}

if (require.main === module) {
	const controller = new AbortController();
	process.once('SIGINT', () => controller.abort());
	main(process.argv.slice(2), {
		stdout: (line) => process.stdout.write(`${line}\n`),
		stderr: (line) => process.stderr.write(`${line}\n`),
		env: process.env,
		signal: controller.signal
	})
		.then((code) => {
			process.exitCode = code;
		})
		.catch((error: unknown) => {
			process.stderr.write(`Error: ${describeError(error)}\n`);
			process.exitCode = EXIT_CODES.ERROR;
		});
}
