/**
 * JSON file I/O for the config and history files.
 *
 * Reads report "missing" and "invalid" separately so callers can tell a
 * first run from a corrupt file. Filesystem errors other than ENOENT
 * (EISDIR, EACCES) are thrown.
 */

import {
	mkdirSync,
	readFileSync,
	renameSync,
	rmSync,
	writeFileSync,
} from 'node:fs';
import { dirname } from 'node:path';
import { toError } from '../errors/base.js';

export type JsonReadResult =
	| { readonly status: 'missing' }
	| { readonly status: 'ok'; readonly value: unknown }
	| { readonly status: 'invalid'; readonly error: Error };

const isMissingFileError = (err: unknown): boolean =>
	err instanceof Error && 'code' in err && err.code === 'ENOENT';

export function readJsonFile(path: string): JsonReadResult {
	let raw: string;
	try {
		raw = readFileSync(path, 'utf-8');
	} catch (err) {
		if (isMissingFileError(err)) return { status: 'missing' };
		throw err;
	}

	try {
		return { status: 'ok', value: JSON.parse(raw) };
	} catch (err) {
		return { status: 'invalid', error: toError(err) };
	}
}

/**
 * Write a value as tab-indented JSON. The data goes to a sibling temp file
 * first and is renamed over the target, so readers never see a partial file.
 * Creates parent directories if needed.
 */
export function writeJsonFile(path: string, data: unknown): void {
	mkdirSync(dirname(path), { recursive: true });
	const tmpPath = `${path}.${process.pid}.tmp`;
	try {
		writeFileSync(tmpPath, `${JSON.stringify(data, null, '\t')}\n`, 'utf-8');
		renameSync(tmpPath, path);
	} catch (err) {
		rmSync(tmpPath, { force: true });
		throw err;
	}
}

export const isPlainObject = (
	value: unknown,
): value is Record<string, unknown> =>
	typeof value === 'object' && value !== null && !Array.isArray(value);
