// ---------------------------------------------------------------------------
// Session Engine
//
// Drives one session, either as a read loop or a single pass. Each line is
// dispatched as a directive or a query; every failure is caught here and
// rendered, so no error ends an interactive session.
// ---------------------------------------------------------------------------

import type { ConfigStore } from '../config/store.js';
import {
	EXIT_CODES,
	createUsageError,
	isAskshError,
	toError,
} from '../errors/index.js';
import type { HistoryStore } from '../history/store.js';
import type { CommandSuggestion, InferenceClient } from '../inference/client.js';
import { type BackendHealth, createBackendHealth } from '../inference/health.js';
import { createSilentLogger, type Logger } from '../logger.js';
import { type CommandRunner, exitStatusOf } from '../runner/command-runner.js';
import {
	createBuiltinDirectives,
	createDirectiveRegistry,
	type DirectiveContext,
	type ParsedDirective,
	parseDirective,
} from './directives.js';
import {
	renderCommandPreview,
	renderConfirmPrompt,
	renderError,
	renderExecuting,
	renderExitStatus,
	renderNotExecuted,
	renderPrompt,
	renderSuggestion,
	renderWarning,
	renderWelcome,
} from './render.js';
import { createSessionState } from './state.js';
import {
	type CycleOutcome,
	type SessionIO,
	type SessionSnapshot,
	type TermColors,
	plainColors,
} from './types.js';

export interface SessionEngineOptions {
	readonly configStore: ConfigStore;
	readonly historyStore: HistoryStore;
	readonly inference: InferenceClient;
	readonly runner: CommandRunner;
	readonly io: SessionIO;
	readonly health?: BackendHealth;
	readonly colors?: TermColors;
	readonly logger?: Logger;
}

/**
 * How a line is classified. `'query'` sends it to the backend even when it
 * starts with the directive marker; used for text the user did not type.
 */
export type InputKind = 'auto' | 'query';

export interface RunOnceOptions {
	readonly kind?: InputKind;
}

export interface SessionEngine {
	/** Dispatch one line of input. */
	readonly handle: (input: string, kind?: InputKind) => Promise<CycleOutcome>;
	/** Read-eval loop until end of input or `!quit`. Resolves 0. */
	readonly runInteractive: () => Promise<number>;
	/** One query or directive, then exit. Resolves the process status. */
	readonly runOnce: (input: string, options?: RunOnceOptions) => Promise<number>;
	readonly snapshot: () => SessionSnapshot;
}

const isAffirmative = (answer: string | undefined): boolean =>
	/^(y|yes)$/i.test(answer?.trim() ?? '');

const outcome = (status: number, exit = false): CycleOutcome =>
	Object.freeze({ exit, status });

export function createSessionEngine(
	options: SessionEngineOptions,
): SessionEngine {
	const { configStore, historyStore, inference, runner, io } = options;
	const colors = options.colors ?? plainColors;
	const logger = (options.logger ?? createSilentLogger()).child('session');
	const state = createSessionState(logger);

	const registry = createDirectiveRegistry();
	registry.registerAll(createBuiltinDirectives());

	const directiveContext: DirectiveContext = Object.freeze({
		io,
		colors,
		configStore,
		historyStore,
		health: options.health ?? createBackendHealth(),
		directives: registry.getAll,
	});

	/** Render a failure and return the status it maps to. */
	const reportFailure = (err: unknown): number => {
		if (isAskshError(err)) {
			logger.debug(`${err.code}: ${err.message}`);
			io.write(renderError(err.message, colors));
			return err.exitCode;
		}
		const error = toError(err);
		logger.error('Unexpected failure', error);
		io.write(renderError(error.message, colors));
		return EXIT_CODES.failure;
	};

	// -----------------------------------------------------------------------
	// Directives
	// -----------------------------------------------------------------------

	async function runDirective(parsed: ParsedDirective): Promise<CycleOutcome> {
		state.to('executing-directive');

		let result: CycleOutcome;
		const directive = registry.get(parsed.name);
		if (!directive) {
			result = outcome(
				reportFailure(
					createUsageError(
						`Unknown directive "!${parsed.name}". Type !help for a list.`,
					),
				),
			);
		} else {
			try {
				const done = await directive.execute(parsed.args, directiveContext);
				result = outcome(done.status ?? EXIT_CODES.ok, done.exit);
			} catch (err) {
				result = outcome(reportFailure(err));
			}
		}

		state.to(result.exit ? 'exited' : 'idle');
		return result;
	}

	// -----------------------------------------------------------------------
	// Queries
	// -----------------------------------------------------------------------

	const recordHistory = (suggestion: CommandSuggestion): void => {
		try {
			historyStore.append({
				query: suggestion.query,
				response: suggestion.text,
			});
		} catch (err) {
			logger.warn('History entry not saved', {
				error: toError(err).message,
			});
			io.write(renderWarning(toError(err).message, colors));
		}
	};

	async function confirmAndRun(command: string): Promise<number> {
		state.to('confirming');
		io.write(renderCommandPreview(command, colors));
		const answer = await io.read(renderConfirmPrompt(colors));

		if (!isAffirmative(answer)) {
			io.write(renderNotExecuted(colors));
			return EXIT_CODES.ok;
		}

		state.to('executing');
		io.write(renderExecuting(command, colors));
		// The child owns the terminal until it exits.
		io.suspend();
		try {
			const result = await runner.run(command);
			logger.debug('Command finished', {
				exitCode: result.exitCode,
				signal: result.signal,
				durationMs: result.durationMs,
			});
			io.write(renderExitStatus(result, colors));
			return exitStatusOf(result);
		} catch (err) {
			return reportFailure(err);
		} finally {
			io.resume();
		}
	}

	async function runQuery(text: string): Promise<CycleOutcome> {
		const config = configStore.current();

		state.to('querying-backend');
		state.setBusy(true);
		io.busy(true, `Asking ${config.model}…`);

		let suggestion: CommandSuggestion | undefined;
		let failure: unknown;
		try {
			suggestion = await inference.query(text, config);
		} catch (err) {
			failure = err;
		} finally {
			state.setBusy(false);
			io.busy(false);
		}

		state.to('rendering-result');

		// Failed queries are not recorded in history.
		if (suggestion === undefined) {
			const status = reportFailure(failure);
			state.to('idle');
			return outcome(status);
		}

		state.setLastSuggestion(suggestion);
		io.write(renderSuggestion(suggestion, colors));
		recordHistory(suggestion);

		let status: number = EXIT_CODES.ok;
		if (config.auto_run_prompt && suggestion.command !== '') {
			status = await confirmAndRun(suggestion.command);
		}

		state.to('idle');
		return outcome(status);
	}

	// -----------------------------------------------------------------------
	// Entry points
	// -----------------------------------------------------------------------

	async function handle(
		input: string,
		kind: InputKind = 'auto',
	): Promise<CycleOutcome> {
		const text = input.trim();
		if (text === '') return outcome(EXIT_CODES.ok);

		const parsed = kind === 'auto' ? parseDirective(text) : undefined;
		return parsed ? runDirective(parsed) : runQuery(text);
	}

	async function runInteractive(): Promise<number> {
		state.setMode('interactive');
		io.write(renderWelcome(configStore.current(), colors));

		for (;;) {
			if (state.phase() !== 'awaiting-input') state.to('awaiting-input');
			const line = await io.read(renderPrompt(colors));
			if (line === undefined) {
				state.to('exited');
				break;
			}
			const result = await handle(line);
			if (result.exit) break;
		}

		return EXIT_CODES.ok;
	}

	async function runOnce(
		input: string,
		options: RunOnceOptions = {},
	): Promise<number> {
		state.setMode('one-shot');
		const result = await handle(input, options.kind);
		if (state.phase() !== 'exited') state.to('exited');
		return result.status;
	}

	return Object.freeze({
		handle,
		runInteractive,
		runOnce,
		snapshot: state.snapshot,
	});
}
