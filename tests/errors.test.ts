import { describe, expect, it } from 'vitest';
import {
	createAskshError,
	createBackendInvalidResponseError,
	createBackendTimeoutError,
	createBackendUnreachableError,
	createConfigLoadError,
	createExecutionError,
	createInvalidOptionValueError,
	createPersistenceError,
	createStartupError,
	createUnknownOptionError,
	createUsageError,
	describeReason,
	EXIT_CODES,
	hasCode,
	isAskshError,
	isBackendError,
	isBackendTimeoutError,
	isBackendUnreachableError,
	isConfigError,
	isExecutionError,
	isPersistenceError,
	isStartupError,
	isUnknownOptionError,
	isUsageError,
	toError,
	wrapError,
} from '../src/errors/index.js';

// ===========================================================================
// createAskshError
// ===========================================================================

describe('createAskshError', () => {
	it('should create an Error with defaults', () => {
		const err = createAskshError('boom');
		expect(err).toBeInstanceOf(Error);
		expect(err.message).toBe('boom');
		expect(err.name).toBe('AskshError');
		expect(err.code).toBe('ASKSH_ERROR');
		expect(err.exitCode).toBe(1);
		expect(err.metadata).toEqual({});
	});

	it('should keep the cause', () => {
		const cause = new Error('root');
		const err = createAskshError('outer', { cause });
		expect(err.cause).toBe(cause);
	});

	it('should serialise to JSON with the cause summarised', () => {
		const err = createAskshError('outer', {
			code: 'X',
			exitCode: 9,
			metadata: { a: 1 },
			cause: new TypeError('inner'),
		});
		const json = err.toJSON();
		expect(json.code).toBe('X');
		expect(json.exitCode).toBe(9);
		expect(json.metadata).toEqual({ a: 1 });
		expect(json.cause).toEqual({ name: 'TypeError', message: 'inner' });
	});

	it('should freeze metadata', () => {
		const err = createAskshError('m', { metadata: { a: 1 } });
		expect(Object.isFrozen(err.metadata)).toBe(true);
	});
});

// ===========================================================================
// Guards and utilities
// ===========================================================================

describe('isAskshError', () => {
	it('should accept factory errors and reject plain errors', () => {
		expect(isAskshError(createUsageError('bad'))).toBe(true);
		expect(isAskshError(new Error('plain'))).toBe(false);
		expect(isAskshError({ code: 'X', exitCode: 1 })).toBe(false);
		expect(isAskshError(undefined)).toBe(false);
	});

	it('should match codes with hasCode', () => {
		const err = createUsageError('bad');
		expect(hasCode(err, 'USAGE_ERROR')).toBe(true);
		expect(hasCode(err, 'OTHER')).toBe(false);
	});
});

describe('toError', () => {
	it('should pass errors through and wrap other values', () => {
		const err = new Error('x');
		expect(toError(err)).toBe(err);
		expect(toError('text').message).toBe('text');
		expect(toError(42).message).toBe('42');
	});
});

describe('wrapError', () => {
	it('should wrap a cause under a new message', () => {
		const cause = new Error('inner');
		const err = wrapError('outer', cause, 'WRAPPED');
		expect(err.message).toBe('outer');
		expect(err.code).toBe('WRAPPED');
		expect(err.cause).toBe(cause);
	});
});

describe('describeReason', () => {
	it('should prefer a system error code', () => {
		const err = Object.assign(new Error('connect ECONNREFUSED'), {
			code: 'ECONNREFUSED',
		});
		expect(describeReason(err)).toBe('ECONNREFUSED');
	});

	it('should look through causes', () => {
		const inner = Object.assign(new Error('x'), { code: 'ENOTFOUND' });
		expect(describeReason(new TypeError('fetch failed', { cause: inner }))).toBe(
			'ENOTFOUND',
		);
	});

	it('should fall back to the message', () => {
		expect(describeReason(new Error('plain'))).toBe('plain');
		expect(describeReason('text')).toBe('text');
	});
});

// ===========================================================================
// Config errors
// ===========================================================================

describe('config errors', () => {
	it('should build CONFIG_LOAD_FAILED with the path', () => {
		const err = createConfigLoadError('/tmp/config.json', {
			reason: 'Unexpected token',
		});
		expect(err.code).toBe('CONFIG_LOAD_FAILED');
		expect(err.exitCode).toBe(EXIT_CODES.config);
		expect(err.configPath).toBe('/tmp/config.json');
		expect(err.message).toBe(
			'Could not load configuration from /tmp/config.json: Unexpected token',
		);
		expect(isConfigError(err)).toBe(true);
	});

	it('should list known options on UNKNOWN_OPTION', () => {
		const err = createUnknownOptionError('colour', ['model', 'url']);
		expect(err.message).toBe(
			'Unknown option "colour". Known options: model, url',
		);
		expect(err.knownOptions).toEqual(['model', 'url']);
		expect(isUnknownOptionError(err)).toBe(true);
		expect(isConfigError(err)).toBe(true);
	});

	it('should explain INVALID_OPTION_VALUE', () => {
		const err = createInvalidOptionValueError('url', 'nope', 'must be a URL');
		expect(err.message).toBe('Invalid value for "url": must be a URL');
		expect(err.option).toBe('url');
		expect(err.exitCode).toBe(78);
	});

	it('should mark STARTUP_FAILED', () => {
		const err = createStartupError('cannot start');
		expect(isStartupError(err)).toBe(true);
		expect(isConfigError(err)).toBe(false);
	});
});

// ===========================================================================
// Persistence, backend, execution, usage
// ===========================================================================

describe('createPersistenceError', () => {
	it('should name the operation, path and reason', () => {
		const cause = Object.assign(new Error('denied'), { code: 'EACCES' });
		const err = createPersistenceError('/data/history.json', 'append', { cause });
		expect(err.message).toBe('Failed to append /data/history.json (EACCES)');
		expect(err.exitCode).toBe(74);
		expect(err.operation).toBe('append');
		expect(isPersistenceError(err)).toBe(true);
	});
});

describe('backend errors', () => {
	const url = 'http://localhost:11434/api/generate';

	it('should describe an HTTP failure', () => {
		const err = createBackendUnreachableError(url, {
			status: 500,
			reason: 'model not found',
		});
		expect(err.message).toBe(
			`Backend at ${url} is unreachable: HTTP 500 - model not found`,
		);
		expect(err.status).toBe(500);
		expect(err.exitCode).toBe(69);
		expect(isBackendUnreachableError(err)).toBe(true);
	});

	it('should describe a connection failure', () => {
		const err = createBackendUnreachableError(url, { reason: 'ECONNREFUSED' });
		expect(err.message).toBe(`Backend at ${url} is unreachable: ECONNREFUSED`);
		expect(err.status).toBeUndefined();
	});

	it('should carry the timeout', () => {
		const err = createBackendTimeoutError(url, 1500);
		expect(err.message).toBe(`Backend at ${url} timed out after 1500ms`);
		expect(err.timeoutMs).toBe(1500);
		expect(err.exitCode).toBe(75);
		expect(isBackendTimeoutError(err)).toBe(true);
	});

	it('should group every backend error', () => {
		expect(isBackendError(createBackendInvalidResponseError(url, 'x'))).toBe(
			true,
		);
		expect(isBackendError(createUsageError('x'))).toBe(false);
	});
});

describe('execution and usage errors', () => {
	it('should build EXECUTION_FAILED', () => {
		const err = createExecutionError('ls', 'command is empty');
		expect(err.message).toBe('Could not execute command: command is empty');
		expect(err.command).toBe('ls');
		expect(err.exitCode).toBe(71);
		expect(isExecutionError(err)).toBe(true);
	});

	it('should build USAGE_ERROR', () => {
		const err = createUsageError('Unknown option: --nope');
		expect(err.exitCode).toBe(64);
		expect(isUsageError(err)).toBe(true);
	});
});
