// ---------------------------------------------------------------------------
// Directives — `!`-prefixed session commands, looked up by name or alias
// ---------------------------------------------------------------------------

import { CONFIG_FIELDS, type Config, type FieldSchema } from '../config/schema.js';
import type { ConfigStore } from '../config/store.js';
import { EXIT_CODES, createUnknownOptionError } from '../errors/index.js';
import type { HistoryStore } from '../history/store.js';
import type { BackendHealth } from '../inference/health.js';
import {
	renderBackendStatus,
	renderConfig,
	renderConfigMenu,
	renderHelp,
	renderHistory,
	renderStatusLine,
	type DirectiveInfo,
} from './render.js';
import type { SessionIO, TermColors } from './types.js';

export const DIRECTIVE_MARKER = '!';

export interface DirectiveContext {
	readonly io: SessionIO;
	readonly colors: TermColors;
	readonly configStore: ConfigStore;
	readonly historyStore: HistoryStore;
	readonly health: BackendHealth;
	readonly directives: () => readonly Directive[];
}

export interface DirectiveResult {
	/** End the session after this directive. */
	readonly exit: boolean;
	/** Process status when this directive is the whole of a one-shot run. */
	readonly status?: number;
}

export interface Directive extends DirectiveInfo {
	readonly execute: (
		args: string,
		ctx: DirectiveContext,
	) => Promise<DirectiveResult>;
}

const CONTINUE: DirectiveResult = Object.freeze({ exit: false });
const EXIT: DirectiveResult = Object.freeze({ exit: true });

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

export interface ParsedDirective {
	readonly name: string;
	readonly args: string;
}

/** `!config model llama3` → `{ name: 'config', args: 'model llama3' }` */
export function parseDirective(input: string): ParsedDirective | undefined {
	const text = input.trim();
	if (!text.startsWith(DIRECTIVE_MARKER)) return undefined;

	const body = text.slice(DIRECTIVE_MARKER.length);
	const space = body.search(/\s/);
	if (space === -1) return Object.freeze({ name: body.toLowerCase(), args: '' });
	return Object.freeze({
		name: body.slice(0, space).toLowerCase(),
		args: body.slice(space).trim(),
	});
}

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

export interface DirectiveRegistry {
	readonly register: (directive: Directive) => void;
	readonly registerAll: (directives: readonly Directive[]) => void;
	readonly get: (nameOrAlias: string) => Directive | undefined;
	readonly getAll: () => readonly Directive[];
}

export function createDirectiveRegistry(): DirectiveRegistry {
	const directives = new Map<string, Directive>();
	const aliases = new Map<string, string>();

	function register(directive: Directive): void {
		directives.set(directive.name, directive);
		if (directive.aliases) {
			for (const alias of directive.aliases) {
				aliases.set(alias, directive.name);
			}
		}
	}

	function registerAll(list: readonly Directive[]): void {
		for (const directive of list) register(directive);
	}

	function get(nameOrAlias: string): Directive | undefined {
		return (
			directives.get(nameOrAlias) ??
			directives.get(aliases.get(nameOrAlias) ?? '')
		);
	}

	function getAll(): readonly Directive[] {
		return [...directives.values()];
	}

	return Object.freeze({ register, registerAll, get, getAll });
}

// ---------------------------------------------------------------------------
// Config editing
// ---------------------------------------------------------------------------

const findField = (choice: string): FieldSchema | undefined => {
	const index = Number(choice);
	if (Number.isInteger(index) && index >= 1 && index <= CONFIG_FIELDS.length) {
		return CONFIG_FIELDS[index - 1];
	}
	return CONFIG_FIELDS.find((field) => field.key === choice);
};

const announceSaved = (
	ctx: DirectiveContext,
	key: string,
	config: Config,
): void => {
	const field = CONFIG_FIELDS.find((f) => f.key === key);
	const value = field ? String(config[field.key]) : '';
	ctx.io.write(renderStatusLine('ok', `Saved ${key} = ${value}`, ctx.colors));
};

const noChanges = (ctx: DirectiveContext): void => {
	ctx.io.write(ctx.colors.dim('No changes made.'));
};

async function editInteractively(ctx: DirectiveContext): Promise<void> {
	const { io, colors, configStore } = ctx;
	const current = configStore.current();

	io.write(renderConfigMenu(current, CONFIG_FIELDS, colors));
	const choice = (
		await io.read(`Field to edit [1-${CONFIG_FIELDS.length}, Enter to cancel]: `)
	)?.trim();
	if (!choice) {
		noChanges(ctx);
		return;
	}

	const field = findField(choice);
	if (!field) {
		throw createUnknownOptionError(
			choice,
			CONFIG_FIELDS.map((f) => f.key),
		);
	}

	// Booleans flip without asking for a value.
	if (field.type === 'boolean') {
		const next = configStore.update(field.key, !current[field.key]);
		announceSaved(ctx, field.key, next);
		return;
	}

	if (field.options) {
		io.write(colors.dim(`Options: ${field.options.join(', ')}`));
	}
	const value = (
		await io.read(`New value for ${field.key} [${String(current[field.key])}]: `)
	)?.trim();
	if (!value) {
		noChanges(ctx);
		return;
	}

	announceSaved(ctx, field.key, configStore.update(field.key, value));
}

// ---------------------------------------------------------------------------
// Built-in directives
// ---------------------------------------------------------------------------

export function createBuiltinDirectives(): readonly Directive[] {
	return [
		{
			name: 'help',
			aliases: ['?'],
			usage: '!help',
			description: 'Show this help',
			execute: async (_args, ctx) => {
				ctx.io.write(
					renderHelp(
						ctx.directives(),
						ctx.configStore.current().auto_run_prompt,
						ctx.colors,
					),
				);
				return CONTINUE;
			},
		},
		{
			name: 'config',
			usage: '!config [show | reset | <field> [value]]',
			description: 'Edit settings',
			execute: async (args, ctx) => {
				const { configStore, io, colors } = ctx;
				if (args === '') {
					await editInteractively(ctx);
					return CONTINUE;
				}
				if (args === 'show') {
					io.write(renderConfig(configStore.current(), CONFIG_FIELDS, colors));
					return CONTINUE;
				}
				if (args === 'reset') {
					configStore.reset();
					io.write(
						renderStatusLine('ok', 'Configuration reset to defaults', colors),
					);
					return CONTINUE;
				}

				const space = args.search(/\s/);
				const key = space === -1 ? args : args.slice(0, space);
				const value = space === -1 ? '' : args.slice(space).trim();
				if (value === '') {
					const field = CONFIG_FIELDS.find((f) => f.key === key);
					if (!field) {
						throw createUnknownOptionError(
							key,
							CONFIG_FIELDS.map((f) => f.key),
						);
					}
					io.write(
						`${colors.bold(field.key)} = ${String(configStore.current()[field.key])}\n${colors.dim(field.description)}`,
					);
					return CONTINUE;
				}

				announceSaved(ctx, key, configStore.update(key, value));
				return CONTINUE;
			},
		},
		{
			name: 'history',
			usage: '!history',
			description: 'Show past requests, oldest first',
			execute: async (_args, ctx) => {
				ctx.io.write(renderHistory(ctx.historyStore.list(), ctx.colors));
				return CONTINUE;
			},
		},
		{
			name: 'clear',
			usage: '!clear',
			description: 'Clear the history',
			execute: async (_args, ctx) => {
				ctx.historyStore.clear();
				ctx.io.write(renderStatusLine('ok', 'History cleared', ctx.colors));
				return CONTINUE;
			},
		},
		{
			name: 'status',
			usage: '!status',
			description: 'Check the backend and list its models',
			execute: async (_args, ctx) => {
				const config = ctx.configStore.current();
				const result = await ctx.health.check(config);
				const models = result.ok ? await ctx.health.listModels(config) : [];
				ctx.io.write(renderBackendStatus(config, result, models, ctx.colors));
				return result.ok
					? CONTINUE
					: Object.freeze({ exit: false, status: EXIT_CODES.unavailable });
			},
		},
		{
			name: 'quit',
			aliases: ['exit', 'q'],
			usage: '!quit',
			description: 'Leave asksh',
			execute: async (_args, ctx) => {
				ctx.io.write(ctx.colors.dim('Goodbye!'));
				return EXIT;
			},
		},
	];
}
