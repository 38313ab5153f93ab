// ---------------------------------------------------------------------------
// CLI argument parsing
// ---------------------------------------------------------------------------

import { createUsageError } from '../src/errors/index.js';
import { isLogLevel, LOG_LEVELS, type LogLevel } from '../src/logger.js';

export const VERSION = '0.1.0';

export type CLIAction =
	| 'interactive'
	| 'query'
	| 'config'
	| 'history'
	| 'clear-history'
	| 'status'
	| 'help'
	| 'version';

export interface CLIArgs {
	readonly action: CLIAction;
	/** Positional words joined with spaces; empty unless `action` is 'query'. */
	readonly query: string;
	readonly dataDir?: string;
	readonly logLevel?: LogLevel;
}

const ACTION_FLAGS: Readonly<Record<string, CLIAction>> = Object.freeze({
	'--config': 'config',
	'--history': 'history',
	'--clear-history': 'clear-history',
	'--status': 'status',
});

/** Maps each session-level action to the directive that performs it. */
export const ACTION_DIRECTIVES: Readonly<Partial<Record<CLIAction, string>>> =
	Object.freeze({
		config: '!config',
		history: '!history',
		'clear-history': '!clear',
		status: '!status',
	});

/**
 * Parse `process.argv`. Throws a USAGE_ERROR for unknown flags, missing
 * flag values, or a query combined with an action flag.
 */
export function parseArgs(argv: readonly string[]): CLIArgs {
	const args = argv.slice(2);
	const words: string[] = [];
	let action: CLIAction | undefined;
	let dataDir: string | undefined;
	let logLevel: LogLevel | undefined;
	let help = false;
	let version = false;

	for (let i = 0; i < args.length; i++) {
		const arg = args[i] ?? '';

		if (arg === '--') {
			words.push(...args.slice(i + 1));
			break;
		}
		if (!arg.startsWith('-') || arg === '-') {
			words.push(arg);
			continue;
		}

		// --flag=value
		const eq = arg.indexOf('=');
		const flag = arg.startsWith('--') && eq !== -1 ? arg.slice(0, eq) : arg;
		const inline = flag === arg ? undefined : arg.slice(eq + 1);
		const takeValue = (): string => {
			const value = inline ?? args[++i];
			if (value === undefined || value === '') {
				throw createUsageError(`${flag} needs a value`);
			}
			return value;
		};

		const mapped = ACTION_FLAGS[flag];
		if (mapped !== undefined) {
			if (action !== undefined && action !== mapped) {
				throw createUsageError(`${flag} cannot be combined with --${action}`);
			}
			action = mapped;
		} else if (flag === '--help' || flag === '-h') {
			help = true;
		} else if (flag === '--version' || flag === '-v') {
			version = true;
		} else if (flag === '--data-dir') {
			dataDir = takeValue();
		} else if (flag === '--log-level') {
			const level = takeValue();
			if (!isLogLevel(level)) {
				throw createUsageError(
					`--log-level must be one of: ${LOG_LEVELS.join(', ')}`,
				);
			}
			logLevel = level;
		} else {
			throw createUsageError(`Unknown option: ${flag}`);
		}
	}

	const query = words.join(' ').trim();

	if (help) return Object.freeze({ action: 'help', query: '', dataDir, logLevel });
	if (version) {
		return Object.freeze({ action: 'version', query: '', dataDir, logLevel });
	}
	if (action !== undefined) {
		if (query !== '') {
			throw createUsageError(`--${action} does not take a query`);
		}
		return Object.freeze({ action, query, dataDir, logLevel });
	}

	return Object.freeze({
		action: query === '' ? 'interactive' : 'query',
		query,
		dataDir,
		logLevel,
	});
}

export function renderUsage(): string {
	return `asksh ${VERSION} — turn plain-English requests into shell commands

Usage:
  asksh [options] [query...]

With a query, asksh answers once and exits; without one it starts a session.
Piped input is added to a one-shot query as context.

Options:
  --config                    Edit settings interactively
  --history                   Show past requests
  --clear-history             Clear past requests
  --status                    Check the backend and list its models
  --data-dir <path>           Data directory (default: ~/.asksh, or $ASKSH_DATA_DIR)
  --log-level <level>         Log level: ${LOG_LEVELS.join('|')}
  -v, --version               Print the version
  -h, --help                  Show this help

In a session, type !help for directives.
`;
}

/** Piped stdin goes ahead of the query as context. */
export function withPipedContext(query: string, piped: string | undefined): string {
	const context = piped?.trim() ?? '';
	return context === '' ? query : `${context}\n\n${query}`;
}
