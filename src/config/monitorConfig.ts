import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { LOG_LEVEL_SETTINGS, type LogLevelSetting, type Logger } from '../diagnostics/logger';
import { ConfigError } from '../errors/ConfigError';
import { toErrorMessage } from '../errors/MonitorError';
import {
	isRecord,
	sanitizeBoolean,
	sanitizeEnum,
	sanitizeFloat,
	sanitizeNumber,
	sanitizeString,
	sanitizeStringList
} from './sanitizers';

const APP_DIR_NAME = 'seqwatch';

const DEFAULT_HOST = 'localhost';
const DEFAULT_PORT = 9501;
const DEFAULT_CONNECT_TIMEOUT_MS = 5_000;
const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

const DEFAULT_REFRESH_INTERVAL_MS = 1_000;
const DEFAULT_STREAM_TIMEOUT_MS = 5_000;
const DEFAULT_THROUGHPUT_INTERVAL_MS = 5_000;
const MIN_REFRESH_INTERVAL_MS = 100;
const MAX_REFRESH_INTERVAL_MS = 60_000;

const DEFAULT_RECONNECT_INITIAL_MS = 1_000;
const DEFAULT_RECONNECT_MAX_MS = 30_000;
const DEFAULT_RECONNECT_MULTIPLIER = 2;
const DEFAULT_RECONNECT_JITTER = 0.1;

export interface ConnectionConfig {
	host: string;
	port: number;
	connectTimeoutMs: number;
	requestTimeoutMs: number;
	/** Explicit CA bundle; searched before the platform defaults. */
	trustedCaPath?: string;
	/** Replaces the platform default search table when non-empty. */
	certificateSearchPaths: string[];
	/** Skip TLS entirely; only simulators serve plaintext. */
	plaintext: boolean;
}

export interface RefreshConfig {
	intervalMs: number;
	streamTimeoutMs: number;
	throughputIntervalMs: number;
	excludeHistogramOutliers: boolean;
}

export interface ReconnectConfig {
	initialDelayMs: number;
	maxDelayMs: number;
	multiplier: number;
	jitterFraction: number;
	maxAttempts?: number;
}

export interface LoggingConfig {
	level: LogLevelSetting;
	filePath: string;
}

export interface MonitorConfig {
	connection: ConnectionConfig;
	refresh: RefreshConfig;
	reconnect: ReconnectConfig;
	logging: LoggingConfig;
}

/**
 * Values given on the command line; they win over the file and the environment.
 */
export interface MonitorConfigOverrides {
	host?: string;
	port?: number;
	logLevel?: LogLevelSetting;
	logFile?: string;
}

export interface LoadMonitorConfigOptions {
	configPath?: string;
	env?: NodeJS.ProcessEnv;
	overrides?: MonitorConfigOverrides;
	logger?: Logger;
}

function defaultStateDir(env: NodeJS.ProcessEnv): string {
	const stateHome = sanitizeString(env.XDG_STATE_HOME) ?? path.join(os.homedir(), '.local', 'state');
	return path.join(stateHome, APP_DIR_NAME);
}

export function defaultConfigPath(env: NodeJS.ProcessEnv = process.env): string {
	const configHome = sanitizeString(env.XDG_CONFIG_HOME) ?? path.join(os.homedir(), '.config');
	return path.join(configHome, APP_DIR_NAME, 'config.json');
}

export function normalizeMonitorConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env): MonitorConfig {
	const root = isRecord(raw) ? raw : {};
	const connection = isRecord(root.connection) ? root.connection : {};
	const refresh = isRecord(root.refresh) ? root.refresh : {};
	const reconnect = isRecord(root.reconnect) ? root.reconnect : {};
	const logging = isRecord(root.logging) ? root.logging : {};

	const maxAttempts = sanitizeNumber(reconnect.maxAttempts, 0, 0);
	return {
		connection: {
			host: sanitizeString(connection.host) ?? DEFAULT_HOST,
			port: sanitizeNumber(connection.port, DEFAULT_PORT, 0),
			connectTimeoutMs: sanitizeNumber(connection.connectTimeoutMs, DEFAULT_CONNECT_TIMEOUT_MS, 0),
			requestTimeoutMs: sanitizeNumber(connection.requestTimeoutMs, DEFAULT_REQUEST_TIMEOUT_MS, 0),
			trustedCaPath: sanitizeString(connection.trustedCaPath),
			certificateSearchPaths: sanitizeStringList(connection.certificateSearchPaths),
			plaintext: sanitizeBoolean(connection.plaintext, false)
		},
		refresh: {
			intervalMs: sanitizeNumber(refresh.intervalMs, DEFAULT_REFRESH_INTERVAL_MS, 0),
			streamTimeoutMs: sanitizeNumber(refresh.streamTimeoutMs, DEFAULT_STREAM_TIMEOUT_MS, 0),
			throughputIntervalMs: sanitizeNumber(refresh.throughputIntervalMs, DEFAULT_THROUGHPUT_INTERVAL_MS, 0),
			excludeHistogramOutliers: sanitizeBoolean(refresh.excludeHistogramOutliers, true)
		},
		reconnect: {
			initialDelayMs: sanitizeNumber(reconnect.initialDelayMs, DEFAULT_RECONNECT_INITIAL_MS, 0),
			maxDelayMs: sanitizeNumber(reconnect.maxDelayMs, DEFAULT_RECONNECT_MAX_MS, 0),
			multiplier: sanitizeFloat(reconnect.multiplier, DEFAULT_RECONNECT_MULTIPLIER),
			jitterFraction: sanitizeFloat(reconnect.jitterFraction, DEFAULT_RECONNECT_JITTER),
			maxAttempts: maxAttempts > 0 ? maxAttempts : undefined
		},
		logging: {
			level: sanitizeEnum(logging.level, LOG_LEVEL_SETTINGS, 'off'),
			filePath: sanitizeString(logging.filePath) ?? path.join(defaultStateDir(env), 'seqwatch.log')
		}
	};
}

function parsePortText(field: string, text: string): number {
	const port = Number(text);
	if (!Number.isInteger(port)) {
		throw new ConfigError(field, `Invalid port: ${field} must be an integer, got "${text}"`);
	}
	return port;
}

function parseLogLevelText(field: string, text: string): LogLevelSetting {
	const level = LOG_LEVEL_SETTINGS.find((entry) => entry === text.trim().toLowerCase());
	if (!level) {
		throw new ConfigError(field, `Invalid log level "${text}": expected one of ${LOG_LEVEL_SETTINGS.join(', ')}`);
	}
	return level;
}

export function applyEnvironment(config: MonitorConfig, env: NodeJS.ProcessEnv): MonitorConfig {
	const host = sanitizeString(env.SEQWATCH_HOST);
	const portText = sanitizeString(env.SEQWATCH_PORT);
	const levelText = sanitizeString(env.SEQWATCH_LOG_LEVEL);
	const logFile = sanitizeString(env.SEQWATCH_LOG_FILE);
	const trustedCa = sanitizeString(env.MINKNOW_TRUSTED_CA);
	return {
		...config,
		connection: {
			...config.connection,
			host: host ?? config.connection.host,
			port: portText !== undefined ? parsePortText('SEQWATCH_PORT', portText) : config.connection.port,
			trustedCaPath: trustedCa ?? config.connection.trustedCaPath
		},
		logging: {
			level: levelText !== undefined ? parseLogLevelText('SEQWATCH_LOG_LEVEL', levelText) : config.logging.level,
			filePath: logFile ?? config.logging.filePath
		}
	};
}

export function applyOverrides(config: MonitorConfig, overrides: MonitorConfigOverrides): MonitorConfig {
	return {
		...config,
		connection: {
			...config.connection,
			host: overrides.host ?? config.connection.host,
			port: overrides.port ?? config.connection.port
		},
		logging: {
			level: overrides.logLevel ?? config.logging.level,
			filePath: overrides.logFile ?? config.logging.filePath
		}
	};
}

export function validateMonitorConfig(config: MonitorConfig): MonitorConfig {
	const { connection, refresh, reconnect } = config;
	if (!Number.isInteger(connection.port) || connection.port < 1 || connection.port > 65_535) {
		throw new ConfigError('connection.port', 'Invalid port: must be between 1 and 65535');
	}
	if (connection.connectTimeoutMs <= 0) {
		throw new ConfigError('connection.connectTimeoutMs', 'Invalid timeout: connectTimeoutMs must be positive');
	}
	if (connection.requestTimeoutMs <= 0) {
		throw new ConfigError('connection.requestTimeoutMs', 'Invalid timeout: requestTimeoutMs must be positive');
	}
	if (refresh.intervalMs < MIN_REFRESH_INTERVAL_MS || refresh.intervalMs > MAX_REFRESH_INTERVAL_MS) {
		throw new ConfigError('refresh.intervalMs', 'Invalid refresh interval: must be between 100ms and 60s');
	}
	if (refresh.streamTimeoutMs <= 0) {
		throw new ConfigError('refresh.streamTimeoutMs', 'Invalid timeout: streamTimeoutMs must be positive');
	}
	if (reconnect.multiplier <= 1) {
		throw new ConfigError('reconnect.multiplier', 'Invalid multiplier: must be greater than 1.0');
	}
	if (reconnect.jitterFraction < 0 || reconnect.jitterFraction > 1) {
		throw new ConfigError('reconnect.jitterFraction', 'Invalid jitter: must be between 0 and 1');
	}
	if (reconnect.maxDelayMs < reconnect.initialDelayMs) {
		throw new ConfigError('reconnect.maxDelayMs', 'Invalid reconnect delays: maxDelayMs is below initialDelayMs');
	}
	return config;
}

function readConfigFile(configPath: string, explicit: boolean, logger?: Logger): unknown {
	let rawText: string;
	try {
		rawText = fs.readFileSync(configPath, 'utf8');
	} catch (error) {
		if (!explicit && isMissingFileError(error)) {
			logger?.debug('No config file, using defaults.', { configPath });
			return {};
		}
		throw new ConfigError('config', `Failed to read config file ${configPath}: ${toErrorMessage(error)}`, error);
	}

	let parsed: unknown;
	try {
		parsed = JSON.parse(rawText);
	} catch (error) {
		throw new ConfigError('config', `Failed to parse config file ${configPath}: ${toErrorMessage(error)}`, error);
	}
	if (!isRecord(parsed)) {
		throw new ConfigError('config', `Failed to parse config file ${configPath}: JSON root must be an object.`);
	}
	return parsed;
}

function isMissingFileError(error: unknown): boolean {
	return isRecord(error) && error.code === 'ENOENT';
}

/**
 * Builds the effective configuration: defaults, then the JSON file, then the
 * environment, then command-line overrides. An explicitly named file must
 * exist; the default location may be absent.
 */
export function loadMonitorConfig(options: LoadMonitorConfigOptions = {}): MonitorConfig {
	const env = options.env ?? process.env;
	const explicitPath = options.configPath ?? sanitizeString(env.SEQWATCH_CONFIG);
	const configPath = explicitPath ?? defaultConfigPath(env);
	const raw = readConfigFile(configPath, explicitPath !== undefined, options.logger);

	let config = normalizeMonitorConfig(raw, env);
	config = applyEnvironment(config, env);
	config = applyOverrides(config, options.overrides ?? {});
	return validateMonitorConfig(config);
}
