import { describe, expect, it } from 'vitest';
import { dataPaths, resolveDataDir } from '../src/config/paths.js';
import {
	CONFIG_KEYS,
	coerceFieldText,
	DEFAULT_CONFIG,
	isConfigKey,
	MAX_TIMEOUT_MS,
	parseField,
	resolveConfig,
} from '../src/config/schema.js';

// ===========================================================================
// Defaults and keys
// ===========================================================================

describe('DEFAULT_CONFIG', () => {
	it('should point at a local Ollama', () => {
		expect(DEFAULT_CONFIG.model).toBe('phi4:latest');
		expect(DEFAULT_CONFIG.url).toBe('http://localhost:11434/api/generate');
		expect(DEFAULT_CONFIG.backend_type).toBe('ollama');
		expect(DEFAULT_CONFIG.auto_run_prompt).toBe(true);
		expect(DEFAULT_CONFIG.request_timeout_ms).toBe(60_000);
	});

	it('should list every field in order', () => {
		expect(CONFIG_KEYS).toEqual([
			'model',
			'url',
			'backend_type',
			'prompt_prefix',
			'auto_run_prompt',
			'request_timeout_ms',
		]);
		expect(isConfigKey('url')).toBe(true);
		expect(isConfigKey('theme')).toBe(false);
	});
});

// ===========================================================================
// parseField
// ===========================================================================

describe('parseField', () => {
	it('should accept valid values', () => {
		expect(parseField('model', 'llama3')).toEqual({ ok: true, value: 'llama3' });
		expect(parseField('request_timeout_ms', 5000)).toEqual({
			ok: true,
			value: 5000,
		});
	});

	it('should reject blank text', () => {
		expect(parseField('model', '   ')).toEqual({
			ok: false,
			reason: 'must not be empty',
		});
	});

	it('should reject non-URLs and non-http URLs', () => {
		expect(parseField('url', 'not a url')).toEqual({
			ok: false,
			reason: 'must be a URL',
		});
		expect(parseField('url', 'ftp://example.com/x')).toEqual({
			ok: false,
			reason: 'must be an http(s) URL',
		});
	});

	it('should reject unknown backends', () => {
		expect(parseField('backend_type', 'openai')).toEqual({
			ok: false,
			reason: 'must be one of: ollama',
		});
	});

	it('should reject non-boolean run prompt values', () => {
		expect(parseField('auto_run_prompt', 'yes')).toEqual({
			ok: false,
			reason: 'must be true or false',
		});
	});

	it('should reject bad timeouts', () => {
		expect(parseField('request_timeout_ms', 0)).toEqual({
			ok: false,
			reason: 'must be greater than zero',
		});
		expect(parseField('request_timeout_ms', 1.5)).toEqual({
			ok: false,
			reason: 'must be a whole number',
		});
		expect(parseField('request_timeout_ms', 'soon')).toEqual({
			ok: false,
			reason: 'must be a number',
		});
	});

	it('should cap timeouts at what a timer can hold', () => {
		expect(parseField('request_timeout_ms', MAX_TIMEOUT_MS)).toEqual({
			ok: true,
			value: 2_147_483_647,
		});
		expect(parseField('request_timeout_ms', 3_000_000_000)).toEqual({
			ok: false,
			reason: 'must be at most 2147483647',
		});
	});
});

// ===========================================================================
// coerceFieldText
// ===========================================================================

describe('coerceFieldText', () => {
	it('should read boolean words', () => {
		expect(coerceFieldText('auto_run_prompt', 'YES')).toBe(true);
		expect(coerceFieldText('auto_run_prompt', 'off')).toBe(false);
		expect(coerceFieldText('auto_run_prompt', 'maybe')).toBe('maybe');
	});

	it('should read integers', () => {
		expect(coerceFieldText('request_timeout_ms', ' 30 ')).toBe(30);
		expect(coerceFieldText('request_timeout_ms', '1.5')).toBe('1.5');
	});

	it('should trim URLs but keep free text as typed', () => {
		expect(coerceFieldText('url', ' http://h:1/api/generate ')).toBe(
			'http://h:1/api/generate',
		);
		expect(coerceFieldText('prompt_prefix', ' be brief ')).toBe(' be brief ');
	});

	it('should pass non-strings through', () => {
		expect(coerceFieldText('auto_run_prompt', false)).toBe(false);
	});
});

// ===========================================================================
// resolveConfig
// ===========================================================================

describe('resolveConfig', () => {
	it('should fall back to defaults for a non-object', () => {
		const resolved = resolveConfig([]);
		expect(resolved.config).toEqual(DEFAULT_CONFIG);
		expect(resolved.issues).toEqual([
			{ key: '(root)', message: 'expected a JSON object' },
		]);
	});

	it('should take missing fields from defaults silently', () => {
		const resolved = resolveConfig({ model: 'llama3' });
		expect(resolved.config).toEqual({ ...DEFAULT_CONFIG, model: 'llama3' });
		expect(resolved.issues).toEqual([]);
	});

	it('should replace only the invalid field', () => {
		const resolved = resolveConfig({
			model: 'llama3',
			url: 5,
			auto_run_prompt: false,
		});
		expect(resolved.config).toEqual({
			...DEFAULT_CONFIG,
			model: 'llama3',
			auto_run_prompt: false,
		});
		expect(resolved.issues.map((issue) => issue.key)).toEqual(['url']);
	});

	it('should keep unknown fields as extras', () => {
		const resolved = resolveConfig({ model: 'llama3', theme: 'dark' });
		expect(resolved.extras).toEqual({ theme: 'dark' });
	});
});

// ===========================================================================
// Data paths
// ===========================================================================

describe('resolveDataDir', () => {
	it('should prefer the explicit directory, then the environment', () => {
		expect(resolveDataDir('/opt/a', { ASKSH_DATA_DIR: '/opt/b' })).toBe('/opt/a');
		expect(resolveDataDir(undefined, { ASKSH_DATA_DIR: '/opt/b' })).toBe(
			'/opt/b',
		);
	});

	it('should default to ~/.asksh', () => {
		expect(resolveDataDir(undefined, {})).toMatch(/[\\/]\.asksh$/);
	});

	it('should name the files inside it', () => {
		expect(dataPaths('/d')).toEqual({
			dataDir: '/d',
			config: '/d/config.json',
			history: '/d/history.json',
			inputHistory: '/d/input-history',
		});
	});
});
