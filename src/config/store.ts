/**
 * ConfigStore — loads, validates and persists config.json.
 *
 * The file is read once by `load()` and fully rewritten after every change.
 * Concurrent edits from another process are not detected; the last save
 * wins.
 */

import {
	createConfigLoadError,
	createPersistenceError,
	createStartupError,
	createUnknownOptionError,
	createInvalidOptionValueError,
	describeReason,
	type AskshError,
} from '../errors/index.js';
import { createSilentLogger, type Logger } from '../logger.js';
import { readJsonFile, writeJsonFile } from '../utils/json-io.js';
import {
	CONFIG_FIELDS,
	CONFIG_KEYS,
	type Config,
	type ConfigIssue,
	type ConfigKey,
	coerceFieldText,
	DEFAULT_CONFIG,
	type FieldSchema,
	isConfigKey,
	parseField,
	resolveConfig,
} from './schema.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ConfigLoadResult {
	readonly config: Config;
	readonly source: 'file' | 'defaults';
	/** Fields that were present but invalid and fell back to defaults. */
	readonly issues: readonly ConfigIssue[];
	/** Set when the file existed but could not be parsed at all. */
	readonly failure?: AskshError;
}

export interface ConfigStoreOptions {
	readonly path: string;
	readonly logger?: Logger;
}

export interface ConfigStore {
	readonly path: string;
	readonly load: () => ConfigLoadResult;
	readonly save: (config: Config) => void;
	readonly update: (field: string, value: unknown) => Config;
	readonly reset: () => Config;
	readonly current: () => Config;
	readonly describeOptions: () => readonly FieldSchema[];
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createConfigStore(options: ConfigStoreOptions): ConfigStore {
	const { path } = options;
	const logger = (options.logger ?? createSilentLogger()).child('config');

	let config: Config = DEFAULT_CONFIG;
	let extras: Readonly<Record<string, unknown>> = {};

	const load = (): ConfigLoadResult => {
		let read: ReturnType<typeof readJsonFile>;
		try {
			read = readJsonFile(path);
		} catch (err) {
			throw createStartupError(
				`Cannot read configuration at ${path} (${describeReason(err)})`,
				{ cause: err, metadata: { path } },
			);
		}

		if (read.status === 'missing') {
			logger.debug('No config file, using defaults', { path });
			config = DEFAULT_CONFIG;
			extras = {};
			return { config, source: 'defaults', issues: [] };
		}

		if (read.status === 'invalid') {
			const failure = createConfigLoadError(path, {
				cause: read.error,
				reason: read.error.message,
			});
			logger.warn('Config file is not valid JSON, using defaults', {
				path,
				error: read.error.message,
			});
			config = DEFAULT_CONFIG;
			extras = {};
			return { config, source: 'defaults', issues: [], failure };
		}

		const resolved = resolveConfig(read.value);
		if (resolved.issues.some((issue) => issue.key === '(root)')) {
			const failure = createConfigLoadError(path, {
				reason: 'expected a JSON object',
			});
			logger.warn('Config file is not a JSON object, using defaults', { path });
			config = DEFAULT_CONFIG;
			extras = {};
			return { config, source: 'defaults', issues: [], failure };
		}

		for (const issue of resolved.issues) {
			logger.warn(`Invalid "${issue.key}" in config, using default`, {
				reason: issue.message,
			});
		}

		config = resolved.config;
		extras = resolved.extras;
		return { config, source: 'file', issues: resolved.issues };
	};

	const save = (next: Config): void => {
		config = next;
		try {
			writeJsonFile(path, { ...extras, ...next });
		} catch (err) {
			throw createPersistenceError(path, 'save', { cause: err });
		}
		logger.debug('Saved config', { path });
	};

	const setField = <K extends ConfigKey>(key: K, value: unknown): Config => {
		const parsed = parseField(key, coerceFieldText(key, value));
		if (!parsed.ok) {
			throw createInvalidOptionValueError(key, value, parsed.reason);
		}
		return Object.freeze({ ...config, [key]: parsed.value });
	};

	const update = (field: string, value: unknown): Config => {
		if (!isConfigKey(field)) {
			throw createUnknownOptionError(field, CONFIG_KEYS);
		}
		save(setField(field, value));
		return config;
	};

	const reset = (): Config => {
		save(DEFAULT_CONFIG);
		return config;
	};

	return Object.freeze({
		path,
		load,
		save,
		update,
		reset,
		current: () => config,
		describeOptions: () => CONFIG_FIELDS,
	});
}
