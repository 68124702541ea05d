import { MonitorError } from './MonitorError';

/**
 * Raised when a configuration file, environment override or command-line flag
 * holds a value the monitor cannot run with.
 */
export class ConfigError extends MonitorError {
	public readonly field: string;

	public constructor(field: string, message: string, cause?: unknown) {
		super('INVALID_CONFIG', message, cause);
		this.name = 'ConfigError';
		this.field = field;
	}
}
