// ---------------------------------------------------------------------------
// Configuration schema — one zod validator and one default per field
// ---------------------------------------------------------------------------

import { z } from 'zod';
import { isPlainObject } from '../utils/json-io.js';

export const BACKEND_TYPES = ['ollama'] as const;
export type BackendType = (typeof BACKEND_TYPES)[number];

/** Keys are snake_case because they are written to config.json verbatim. */
export interface Config {
	readonly model: string;
	readonly url: string;
	readonly backend_type: BackendType;
	readonly prompt_prefix: string;
	readonly auto_run_prompt: boolean;
	readonly request_timeout_ms: number;
}

export type ConfigKey = keyof Config;

export const DEFAULT_PROMPT_PREFIX =
	'You are a helpful assistant that provides accurate bash commands for Linux. ' +
	'Be concise and only output the command, unless the user specifically asks for explanation.';

export const DEFAULT_CONFIG: Config = Object.freeze({
	model: 'phi4:latest',
	url: 'http://localhost:11434/api/generate',
	backend_type: 'ollama',
	prompt_prefix: DEFAULT_PROMPT_PREFIX,
	auto_run_prompt: true,
	request_timeout_ms: 60_000,
});

// ---------------------------------------------------------------------------
// Field descriptions (drive the config editor and !help)
// ---------------------------------------------------------------------------

export type FieldType = 'string' | 'url' | 'enum' | 'boolean' | 'integer';

export interface FieldSchema {
	readonly key: ConfigKey;
	readonly type: FieldType;
	readonly description: string;
	readonly default: Config[ConfigKey];
	readonly options?: readonly string[];
}

export const CONFIG_FIELDS: readonly FieldSchema[] = Object.freeze([
	Object.freeze({
		key: 'model',
		type: 'string',
		description: 'Model name sent to the backend',
		default: DEFAULT_CONFIG.model,
	}),
	Object.freeze({
		key: 'url',
		type: 'url',
		description: 'Backend generate endpoint',
		default: DEFAULT_CONFIG.url,
	}),
	Object.freeze({
		key: 'backend_type',
		type: 'enum',
		description: 'Request/response scheme of the backend',
		default: DEFAULT_CONFIG.backend_type,
		options: BACKEND_TYPES,
	}),
	Object.freeze({
		key: 'prompt_prefix',
		type: 'string',
		description: 'System instruction placed before every query',
		default: DEFAULT_CONFIG.prompt_prefix,
	}),
	Object.freeze({
		key: 'auto_run_prompt',
		type: 'boolean',
		description: 'Ask whether to run each suggested command',
		default: DEFAULT_CONFIG.auto_run_prompt,
	}),
	Object.freeze({
		key: 'request_timeout_ms',
		type: 'integer',
		description: 'How long to wait for the backend, in milliseconds',
		default: DEFAULT_CONFIG.request_timeout_ms,
	}),
] satisfies FieldSchema[]);

export const CONFIG_KEYS: readonly ConfigKey[] = Object.freeze(
	CONFIG_FIELDS.map((field) => field.key),
);

export const isConfigKey = (value: string): value is ConfigKey =>
	CONFIG_KEYS.some((key) => key === value);

// ---------------------------------------------------------------------------
// Validators
// ---------------------------------------------------------------------------

/** Largest delay a Node timer holds; longer ones fire after 1ms. */
export const MAX_TIMEOUT_MS = 2_147_483_647;

const nonBlank = z
	.string()
	.refine((value) => value.trim().length > 0, 'must not be empty');

const httpUrl = z
	.string()
	.url('must be a URL')
	.refine((value) => /^https?:\/\//i.test(value), 'must be an http(s) URL');

type FieldValidators = {
	readonly [K in ConfigKey]: z.ZodType<Config[K], z.ZodTypeDef, unknown>;
};

const FIELD_VALIDATORS: FieldValidators = Object.freeze({
	model: nonBlank,
	url: httpUrl,
	backend_type: z.enum(BACKEND_TYPES, {
		errorMap: () => ({
			message: `must be one of: ${BACKEND_TYPES.join(', ')}`,
		}),
	}),
	prompt_prefix: nonBlank,
	auto_run_prompt: z.boolean({ invalid_type_error: 'must be true or false' }),
	request_timeout_ms: z
		.number({ invalid_type_error: 'must be a number' })
		.int('must be a whole number')
		.positive('must be greater than zero')
		.max(MAX_TIMEOUT_MS, `must be at most ${MAX_TIMEOUT_MS}`),
});

export type FieldParseResult<K extends ConfigKey> =
	| { readonly ok: true; readonly value: Config[K] }
	| { readonly ok: false; readonly reason: string };

export function parseField<K extends ConfigKey>(
	key: K,
	value: unknown,
): FieldParseResult<K> {
	const result = FIELD_VALIDATORS[key].safeParse(value);
	if (result.success) return { ok: true, value: result.data };
	return {
		ok: false,
		reason: result.error.issues[0]?.message ?? 'invalid value',
	};
}

// ---------------------------------------------------------------------------
// Text coercion (values typed at the prompt arrive as strings)
// ---------------------------------------------------------------------------

const TRUE_WORDS = new Set(['true', 'yes', 'on', '1', 'y']);
const FALSE_WORDS = new Set(['false', 'no', 'off', '0', 'n']);

export function coerceFieldText(key: ConfigKey, value: unknown): unknown {
	if (typeof value !== 'string') return value;
	const field = CONFIG_FIELDS.find((f) => f.key === key);

	switch (field?.type) {
		case 'boolean': {
			const word = value.trim().toLowerCase();
			if (TRUE_WORDS.has(word)) return true;
			if (FALSE_WORDS.has(word)) return false;
			return value;
		}
		case 'integer':
			return /^\s*-?\d+\s*$/.test(value) ? Number(value) : value;
		case 'url':
		case 'enum':
			return value.trim();
		default:
			return value;
	}
}

// ---------------------------------------------------------------------------
// Whole-document resolution
// ---------------------------------------------------------------------------

export interface ConfigIssue {
	readonly key: string;
	readonly message: string;
}

export interface ResolvedConfig {
	readonly config: Config;
	readonly issues: readonly ConfigIssue[];
	/** Fields not in the schema; written back untouched on save. */
	readonly extras: Readonly<Record<string, unknown>>;
}

/**
 * Validate a parsed config.json document field by field. A missing field
 * takes its default silently; an invalid one takes its default and is
 * reported as an issue. Other fields keep their values.
 */
export function resolveConfig(raw: unknown): ResolvedConfig {
	if (!isPlainObject(raw)) {
		return {
			config: DEFAULT_CONFIG,
			issues: [{ key: '(root)', message: 'expected a JSON object' }],
			extras: {},
		};
	}

	const issues: ConfigIssue[] = [];

	const pick = <K extends ConfigKey>(key: K): Config[K] => {
		if (raw[key] === undefined) return DEFAULT_CONFIG[key];
		const parsed = parseField(key, raw[key]);
		if (parsed.ok) return parsed.value;
		issues.push({ key, message: parsed.reason });
		return DEFAULT_CONFIG[key];
	};

	const config: Config = Object.freeze({
		model: pick('model'),
		url: pick('url'),
		backend_type: pick('backend_type'),
		prompt_prefix: pick('prompt_prefix'),
		auto_run_prompt: pick('auto_run_prompt'),
		request_timeout_ms: pick('request_timeout_ms'),
	});

	const extras = Object.fromEntries(
		Object.entries(raw).filter(([key]) => !isConfigKey(key)),
	);

	return { config, issues, extras };
}
