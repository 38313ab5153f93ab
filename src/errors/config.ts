// ---------------------------------------------------------------------------
// Configuration Errors
// ---------------------------------------------------------------------------

import type { AskshError } from './base.js';
import { createAskshError, EXIT_CODES, hasCode, isAskshError } from './base.js';

export const createConfigLoadError = (
	configPath: string,
	options: { cause?: unknown; reason?: string } = {},
): AskshError & { readonly configPath: string } =>
	Object.assign(
		createAskshError(
			`Could not load configuration from ${configPath}${options.reason ? `: ${options.reason}` : ''}`,
			{
				name: 'ConfigLoadError',
				code: 'CONFIG_LOAD_FAILED',
				exitCode: EXIT_CODES.config,
				cause: options.cause,
				metadata: { configPath },
			},
		),
		{ configPath },
	);

export const createUnknownOptionError = (
	option: string,
	knownOptions: readonly string[],
): AskshError & {
	readonly option: string;
	readonly knownOptions: readonly string[];
} =>
	Object.assign(
		createAskshError(
			`Unknown option "${option}". Known options: ${knownOptions.join(', ')}`,
			{
				name: 'UnknownOptionError',
				code: 'UNKNOWN_OPTION',
				exitCode: EXIT_CODES.config,
				metadata: { option, knownOptions },
			},
		),
		{ option, knownOptions: Object.freeze([...knownOptions]) },
	);

export const createInvalidOptionValueError = (
	option: string,
	value: unknown,
	reason: string,
): AskshError & { readonly option: string } =>
	Object.assign(
		createAskshError(`Invalid value for "${option}": ${reason}`, {
			name: 'InvalidOptionValueError',
			code: 'INVALID_OPTION_VALUE',
			exitCode: EXIT_CODES.config,
			metadata: { option, value },
		}),
		{ option },
	);

/**
 * Raised when the process cannot start at all, e.g. the config path exists
 * but is a directory.
 */
export const createStartupError = (
	message: string,
	options: { cause?: unknown; metadata?: Record<string, unknown> } = {},
): AskshError =>
	createAskshError(message, {
		name: 'StartupError',
		code: 'STARTUP_FAILED',
		exitCode: EXIT_CODES.config,
		cause: options.cause,
		metadata: options.metadata,
	});

// ---------------------------------------------------------------------------
// Type Guards
// ---------------------------------------------------------------------------

export const isConfigLoadError = (
	value: unknown,
): value is AskshError & { readonly configPath: string } =>
	hasCode(value, 'CONFIG_LOAD_FAILED');

export const isUnknownOptionError = (
	value: unknown,
): value is AskshError & {
	readonly option: string;
	readonly knownOptions: readonly string[];
} => hasCode(value, 'UNKNOWN_OPTION');

export const isInvalidOptionValueError = (
	value: unknown,
): value is AskshError & { readonly option: string } =>
	hasCode(value, 'INVALID_OPTION_VALUE');

export const isStartupError = (value: unknown): value is AskshError =>
	hasCode(value, 'STARTUP_FAILED');

export const isConfigError = (value: unknown): value is AskshError =>
	isAskshError(value) &&
	(value.code.startsWith('CONFIG_') ||
		value.code === 'UNKNOWN_OPTION' ||
		value.code === 'INVALID_OPTION_VALUE');
