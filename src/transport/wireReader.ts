import { protocolError } from '../errors/ClientError';
import { isRecord } from '../config/sanitizers';

/**
 * Accessors over decoded protobuf messages. The loader hands back plain
 * objects with defaults filled in; anything of an unexpected shape is a
 * protocol violation.
 */

export type WireRecord = Record<string, unknown>;

export function asRecord(value: unknown, context: string): WireRecord {
	if (!isRecord(value)) {
		throw protocolError(`${context}: expected a message, got ${describe(value)}`);
	}
	return value;
}

export function readOptionalRecord(record: WireRecord, key: string, context: string): WireRecord | undefined {
	const value = record[key];
	if (value === undefined || value === null) {
		return undefined;
	}
	return asRecord(value, `${context}.${key}`);
}

export function readString(record: WireRecord, key: string, context: string): string {
	const value = record[key];
	if (value === undefined || value === null) {
		return '';
	}
	if (typeof value !== 'string') {
		throw protocolError(`${context}.${key}: expected a string, got ${describe(value)}`);
	}
	return value;
}

export function readNumber(record: WireRecord, key: string, context: string): number {
	return toNumber(record[key], `${context}.${key}`);
}

export function readBoolean(record: WireRecord, key: string, context: string): boolean {
	const value = record[key];
	if (value === undefined || value === null) {
		return false;
	}
	if (typeof value !== 'boolean') {
		throw protocolError(`${context}.${key}: expected a boolean, got ${describe(value)}`);
	}
	return value;
}

/**
 * Enum fields arrive by name; a value the local schema does not know arrives
 * as its number and is returned in decimal form.
 */
export function readEnumName(record: WireRecord, key: string, context: string): string {
	const value = record[key];
	if (typeof value === 'string') {
		return value;
	}
	if (typeof value === 'number') {
		return String(value);
	}
	if (value === undefined || value === null) {
		return '';
	}
	throw protocolError(`${context}.${key}: expected an enum value, got ${describe(value)}`);
}

export function readArray(record: WireRecord, key: string, context: string): unknown[] {
	const value = record[key];
	if (value === undefined || value === null) {
		return [];
	}
	if (!Array.isArray(value)) {
		throw protocolError(`${context}.${key}: expected a list, got ${describe(value)}`);
	}
	return value;
}

export function readRecordArray(record: WireRecord, key: string, context: string): WireRecord[] {
	return readArray(record, key, context).map((entry, index) => asRecord(entry, `${context}.${key}[${index}]`));
}

export function readNumberArray(record: WireRecord, key: string, context: string): number[] {
	return readArray(record, key, context).map((entry, index) => toNumber(entry, `${context}.${key}[${index}]`));
}

export function readRecordMap(record: WireRecord, key: string, context: string): Map<string, WireRecord> {
	const value = record[key];
	const result = new Map<string, WireRecord>();
	if (value === undefined || value === null) {
		return result;
	}
	const entries = asRecord(value, `${context}.${key}`);
	for (const [entryKey, entryValue] of Object.entries(entries)) {
		result.set(entryKey, asRecord(entryValue, `${context}.${key}.${entryKey}`));
	}
	return result;
}

function toNumber(value: unknown, context: string): number {
	if (value === undefined || value === null) {
		return 0;
	}
	if (typeof value === 'number' && !Number.isNaN(value)) {
		return value;
	}
	// 64-bit fields beyond the safe integer range may arrive as text.
	if (typeof value === 'string' && value.trim().length > 0 && Number.isFinite(Number(value))) {
		return Number(value);
	}
	throw protocolError(`${context}: expected a number, got ${describe(value)}`);
}

function describe(value: unknown): string {
	if (value === null) {
		return 'null';
	}
	if (Array.isArray(value)) {
		return 'list';
	}
	return typeof value;
}
