/**
 * HistoryStore — the persisted, ordered log of answered queries.
 *
 * history.json holds a JSON array, oldest entry first. The whole array is
 * read when the store is created and rewritten after each change.
 */

import { z } from 'zod';
import {
	createPersistenceError,
	createStartupError,
	describeReason,
} from '../errors/index.js';
import { createSilentLogger, type Logger } from '../logger.js';
import { readJsonFile, writeJsonFile } from '../utils/json-io.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface HistoryEntry {
	/** ISO-8601 time the response arrived. */
	readonly timestamp: string;
	readonly query: string;
	readonly response: string;
}

export interface HistoryStoreOptions {
	readonly path: string;
	readonly logger?: Logger;
	/** Clock used to stamp entries. */
	readonly now?: () => Date;
}

export interface HistoryStore {
	readonly path: string;
	/** All entries, oldest first. */
	readonly list: () => readonly HistoryEntry[];
	/**
	 * Add an entry at the tail and persist. On a failed write the entry is
	 * kept for this session and a PERSISTENCE_FAILED error is thrown.
	 */
	readonly append: (
		entry: Pick<HistoryEntry, 'query' | 'response'>,
	) => HistoryEntry;
	/** Empty the log. Nothing changes if the write fails. */
	readonly clear: () => void;
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

const historyEntrySchema = z.object({
	timestamp: z.string(),
	query: z.string(),
	response: z.string(),
});

function parseEntries(
	value: unknown,
	logger: Logger,
): HistoryEntry[] {
	if (!Array.isArray(value)) {
		logger.warn('History file is not a JSON array, starting empty');
		return [];
	}

	const entries: HistoryEntry[] = [];
	for (const item of value) {
		const parsed = historyEntrySchema.safeParse(item);
		if (parsed.success) {
			entries.push(Object.freeze(parsed.data));
		}
	}
	const dropped = value.length - entries.length;
	if (dropped > 0) {
		logger.warn(`Dropped ${dropped} malformed history entr${dropped === 1 ? 'y' : 'ies'}`);
	}
	return entries;
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createHistoryStore(options: HistoryStoreOptions): HistoryStore {
	const { path } = options;
	const logger = (options.logger ?? createSilentLogger()).child('history');
	const now = options.now ?? (() => new Date());

	let read: ReturnType<typeof readJsonFile>;
	try {
		read = readJsonFile(path);
	} catch (err) {
		throw createStartupError(
			`Cannot read history at ${path} (${describeReason(err)})`,
			{ cause: err, metadata: { path } },
		);
	}

	let entries: HistoryEntry[] = [];
	if (read.status === 'ok') {
		entries = parseEntries(read.value, logger);
	} else if (read.status === 'invalid') {
		logger.warn('History file is not valid JSON, starting empty', {
			path,
			error: read.error.message,
		});
	}

	const list = (): readonly HistoryEntry[] => [...entries];

	const append = (
		entry: Pick<HistoryEntry, 'query' | 'response'>,
	): HistoryEntry => {
		const stored: HistoryEntry = Object.freeze({
			timestamp: now().toISOString(),
			query: entry.query,
			response: entry.response,
		});
		entries.push(stored);
		try {
			writeJsonFile(path, entries);
		} catch (err) {
			throw createPersistenceError(path, 'append', { cause: err });
		}
		return stored;
	};

	const clear = (): void => {
		try {
			writeJsonFile(path, []);
		} catch (err) {
			throw createPersistenceError(path, 'clear', { cause: err });
		}
		entries = [];
		logger.debug('History cleared', { path });
	};

	return Object.freeze({ path, list, append, clear });
}
