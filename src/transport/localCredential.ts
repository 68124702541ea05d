import * as fs from 'node:fs/promises';
import type { Logger } from '../diagnostics/logger';
import { authError } from '../errors/ClientError';
import { toErrorMessage } from '../errors/MonitorError';
import { isRecord } from '../config/sanitizers';

/** Request header carrying the local bearer credential. */
export const LOCAL_AUTH_HEADER = 'local-auth';

export interface LocalCredentialOptions {
	readFile?: (filePath: string) => Promise<string>;
	logger?: Logger;
}

/**
 * Reads the bearer token from the file the discovery service points at.
 * Resolves `undefined` (guest mode) when the server names no file or the file
 * does not exist.
 */
export async function readLocalCredential(
	tokenPath: string,
	options: LocalCredentialOptions = {}
): Promise<string | undefined> {
	const trimmed = tokenPath.trim();
	if (trimmed.length === 0) {
		options.logger?.debug('No local credential path returned, continuing as guest.');
		return undefined;
	}

	const readFile = options.readFile ?? ((filePath: string) => fs.readFile(filePath, 'utf8'));
	let content: string;
	try {
		content = await readFile(trimmed);
	} catch (error) {
		if (isRecord(error) && error.code === 'ENOENT') {
			options.logger?.debug('Local credential file does not exist, continuing as guest.', { path: trimmed });
			return undefined;
		}
		throw authError(`Failed to read token file ${trimmed}: ${toErrorMessage(error)}`, error);
	}

	let parsed: unknown;
	try {
		parsed = JSON.parse(content);
	} catch (error) {
		throw authError(`Failed to parse token file: ${toErrorMessage(error)}`, error);
	}

	if (!isRecord(parsed) || typeof parsed.token !== 'string') {
		throw authError("Token file missing 'token' field");
	}
	options.logger?.debug('Loaded local credential.', { path: trimmed });
	return parsed.token;
}
