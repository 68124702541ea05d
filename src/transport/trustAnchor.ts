import * as fs from 'node:fs/promises';
import type { Logger } from '../diagnostics/logger';
import { connectionError } from '../errors/ClientError';
import { toErrorMessage } from '../errors/MonitorError';
import { isRecord } from '../config/sanitizers';

export const LOOPBACK_HOSTS: readonly string[] = ['localhost', '127.0.0.1', '::1'];

/** Name the server certificate is issued for, whatever loopback address is dialled. */
export const TLS_SERVER_NAME = 'localhost';

export const TRUSTED_CA_ENV = 'MINKNOW_TRUSTED_CA';

export const PLATFORM_CERTIFICATE_PATHS: Readonly<Partial<Record<NodeJS.Platform, readonly string[]>>> = {
	linux: ['/data/rpc-certs/minknow/ca.crt', '/var/lib/minknow/data/rpc-certs/minknow/ca.crt'],
	darwin: ['/Library/MinKNOW/data/rpc-certs/minknow/ca.crt']
};

const PEM_CERTIFICATE_PATTERN = /-----BEGIN CERTIFICATE-----[\s\S]+?-----END CERTIFICATE-----/;

export interface TrustAnchor {
	pem: string;
	sourcePath: string;
}

export interface TrustAnchorOptions {
	/** Checked first; from config or the trusted-CA environment variable. */
	explicitPath?: string;
	/** Replaces the platform table when non-empty. */
	searchPaths?: readonly string[];
	platform?: NodeJS.Platform;
	readFile?: (filePath: string) => Promise<string>;
	logger?: Logger;
}

export function isLoopbackHost(host: string): boolean {
	return LOOPBACK_HOSTS.includes(host.trim().toLowerCase());
}

export function formatEndpoint(host: string, port: number): string {
	return host.includes(':') ? `[${host}]:${port}` : `${host}:${port}`;
}

export function tlsServerNameForHost(host: string, port: number): string {
	if (!isLoopbackHost(host)) {
		throw connectionError(
			formatEndpoint(host, port),
			undefined,
			'Remote hosts are not supported; use localhost'
		);
	}
	return TLS_SERVER_NAME;
}

export function certificateSearchPaths(options: TrustAnchorOptions = {}): string[] {
	const defaults =
		options.searchPaths && options.searchPaths.length > 0
			? options.searchPaths
			: PLATFORM_CERTIFICATE_PATHS[options.platform ?? process.platform] ?? [];
	const paths = options.explicitPath ? [options.explicitPath, ...defaults] : [...defaults];
	return [...new Set(paths)];
}

function isMissingFile(error: unknown): boolean {
	return isRecord(error) && error.code === 'ENOENT';
}

/**
 * Walks the certificate search table and returns the first readable PEM
 * bundle. Missing files are skipped quietly; any other failure is logged and
 * reported in the final error if nothing usable turns up.
 */
export async function loadTrustAnchor(endpoint: string, options: TrustAnchorOptions = {}): Promise<TrustAnchor> {
	const readFile = options.readFile ?? ((filePath: string) => fs.readFile(filePath, 'utf8'));
	const candidates = certificateSearchPaths(options);
	const failures: string[] = [];

	for (const candidate of candidates) {
		let content: string;
		try {
			content = await readFile(candidate);
		} catch (error) {
			if (isMissingFile(error)) {
				options.logger?.trace('CA certificate not found, trying next path.', { path: candidate });
				continue;
			}
			options.logger?.warn('Failed to read CA certificate.', { path: candidate, error: toErrorMessage(error) });
			failures.push(`${candidate}: ${toErrorMessage(error)}`);
			continue;
		}

		if (!PEM_CERTIFICATE_PATTERN.test(content)) {
			options.logger?.warn('CA certificate file holds no PEM certificate.', { path: candidate });
			failures.push(`${candidate}: no PEM certificate block`);
			continue;
		}

		options.logger?.debug('Loaded CA certificate.', { path: candidate });
		return { pem: content, sourcePath: candidate };
	}

	const tried = candidates.length > 0 ? candidates.join(', ') : '(none)';
	const detail =
		failures.length > 0
			? `Failed to read CA certificate (${failures.join('; ')}). Paths tried: ${tried}.`
			: `CA certificate not found. Paths tried: ${tried}.`;
	throw connectionError(endpoint, undefined, `${detail} Set ${TRUSTED_CA_ENV} to point at the server CA bundle.`);
}
