/**
 * Plain-text renderers for everything the session shows. Each returns a
 * string for `SessionIO.write`; colour comes from the `TermColors` passed in.
 */

import type { Config, FieldSchema } from '../config/schema.js';
import type { HistoryEntry } from '../history/store.js';
import type { BackendCheckResult, ModelInfo } from '../inference/health.js';
import type { CommandSuggestion } from '../inference/client.js';
import type { CommandResult } from '../runner/command-runner.js';
import type { TermColors } from './types.js';

// ---------------------------------------------------------------------------
// Status lines
// ---------------------------------------------------------------------------

export type StatusLevel = 'ok' | 'warn' | 'fail';

const statusIcon = (level: StatusLevel, colors: TermColors): string =>
	level === 'ok'
		? colors.green('●')
		: level === 'warn'
			? colors.yellow('●')
			: colors.red('●');

export function renderStatusLine(
	level: StatusLevel,
	message: string,
	colors: TermColors,
): string {
	return `  ${statusIcon(level, colors)} ${message}`;
}

export function renderError(message: string, colors: TermColors): string {
	return `${colors.red('Error:')} ${message}`;
}

export function renderWarning(message: string, colors: TermColors): string {
	return `${colors.yellow('Warning:')} ${message}`;
}

// ---------------------------------------------------------------------------
// Session
// ---------------------------------------------------------------------------

export function renderWelcome(config: Config, colors: TermColors): string {
	return [
		`${colors.bold('asksh')} ${colors.dim('·')} ${config.model}`,
		colors.dim('Describe what you want to do, or type !help for directives.'),
	].join('\n');
}

export const renderPrompt = (colors: TermColors): string =>
	`${colors.green('asksh')}${colors.dim('>')} `;

export function renderSuggestion(
	suggestion: CommandSuggestion,
	colors: TermColors,
): string {
	if (suggestion.text === '') {
		return renderStatusLine(
			'warn',
			colors.dim('The model returned an empty response.'),
			colors,
		);
	}
	return colors.blue(suggestion.text);
}

export function renderCommandPreview(
	command: string,
	colors: TermColors,
): string {
	return `${colors.yellow('Extracted command:')} ${colors.bold(command)}`;
}

export const renderConfirmPrompt = (colors: TermColors): string =>
	`${colors.yellow('Execute?')} [y/N] `;

export const renderNotExecuted = (colors: TermColors): string =>
	colors.dim('Command not executed.');

export const renderExecuting = (command: string, colors: TermColors): string =>
	colors.dim(`$ ${command}`);

export function renderExitStatus(
	result: CommandResult,
	colors: TermColors,
): string {
	if (result.exitCode === null) {
		return renderStatusLine(
			'fail',
			`Terminated by ${result.signal ?? 'signal'}`,
			colors,
		);
	}
	return renderStatusLine(
		result.exitCode === 0 ? 'ok' : 'fail',
		`Exited with status ${result.exitCode}`,
		colors,
	);
}

// ---------------------------------------------------------------------------
// History
// ---------------------------------------------------------------------------

/**
 * Oldest first, numbered from 1:
 *
 *   1. list files · 2026-01-01T00:00:00.000Z
 *      ls -la
 */
export function renderHistory(
	entries: readonly HistoryEntry[],
	colors: TermColors,
): string {
	if (entries.length === 0) return colors.dim('No command history yet.');

	const width = String(entries.length).length;
	const indent = ' '.repeat(width + 4);
	const lines: string[] = [];

	entries.forEach((entry, i) => {
		const n = `${String(i + 1).padStart(width)}.`;
		lines.push(
			`  ${colors.dim(n)} ${colors.green(entry.query)} ${colors.dim(`· ${entry.timestamp}`)}`,
		);
		for (const line of entry.response.split('\n')) {
			lines.push(`${indent}${colors.blue(line)}`);
		}
	});

	return lines.join('\n');
}

// ---------------------------------------------------------------------------
// Help
// ---------------------------------------------------------------------------

export interface DirectiveInfo {
	readonly name: string;
	readonly aliases?: readonly string[];
	readonly usage: string;
	readonly description: string;
}

export function renderHelp(
	directives: readonly DirectiveInfo[],
	autoRun: boolean,
	colors: TermColors,
): string {
	const lines: string[] = [colors.bold(colors.cyan('Directives:'))];
	const maxUsage = Math.max(...directives.map((d) => d.usage.length));

	for (const directive of directives) {
		const aliasStr =
			directive.aliases && directive.aliases.length > 0
				? colors.gray(` (${directive.aliases.map((a) => `!${a}`).join(', ')})`)
				: '';
		lines.push(
			`  ${directive.usage.padEnd(maxUsage + 2)}${colors.dim(directive.description)}${aliasStr}`,
		);
	}

	lines.push('');
	lines.push('Anything else is sent to the model as a request.');
	lines.push(
		`Run prompt: ${autoRun ? colors.green('on') : colors.yellow('off')}`,
	);

	return lines.join('\n');
}

// ---------------------------------------------------------------------------
// Config
// ---------------------------------------------------------------------------

const PREVIEW_CHARS = 48;

const preview = (value: unknown): string => {
	const text = String(value);
	return text.length > PREVIEW_CHARS
		? `${text.slice(0, PREVIEW_CHARS - 1)}…`
		: text;
};

export function renderConfig(
	config: Config,
	fields: readonly FieldSchema[],
	colors: TermColors,
): string {
	const width = Math.max(...fields.map((f) => f.key.length));
	return [
		colors.bold(colors.cyan('Configuration:')),
		...fields.map(
			(field) => `  ${field.key.padEnd(width + 2)}${String(config[field.key])}`,
		),
	].join('\n');
}

/** Numbered field list for the interactive editor. */
export function renderConfigMenu(
	config: Config,
	fields: readonly FieldSchema[],
	colors: TermColors,
): string {
	const width = Math.max(...fields.map((f) => f.key.length));
	return [
		colors.bold(colors.cyan('Edit configuration:')),
		...fields.map(
			(field, i) =>
				`  ${i + 1}. ${field.key.padEnd(width + 2)}${colors.dim(preview(config[field.key]))}`,
		),
	].join('\n');
}

// ---------------------------------------------------------------------------
// Backend status
// ---------------------------------------------------------------------------

export function renderBackendStatus(
	config: Config,
	result: BackendCheckResult,
	models: readonly ModelInfo[],
	colors: TermColors,
): string {
	const label = (name: string): string => colors.bold(name.padEnd(10));

	if (!result.ok) {
		return renderStatusLine(
			'fail',
			`${label('backend')} ${config.url} ${colors.dim(`(${result.error})`)}`,
			colors,
		);
	}

	const version = result.version ? ` v${result.version}` : '';
	const installed = models.some((m) => m.name === config.model);
	const lines = [
		renderStatusLine(
			'ok',
			`${label('backend')} ${config.backend_type}${version} at ${config.url}`,
			colors,
		),
		renderStatusLine(
			installed ? 'ok' : 'warn',
			`${label('model')} ${config.model}${installed ? '' : colors.dim(' (not installed)')}`,
			colors,
		),
	];

	if (models.length > 0) {
		const width = Math.max(...models.map((m) => m.name.length));
		lines.push('');
		lines.push(colors.bold(colors.cyan('Installed models:')));
		for (const model of models) {
			lines.push(`  ${model.name.padEnd(width + 2)}${colors.dim(model.size)}`);
		}
	}

	return lines.join('\n');
}
