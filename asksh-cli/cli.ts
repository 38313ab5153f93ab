#!/usr/bin/env node
// ---------------------------------------------------------------------------
// asksh — entry point
// ---------------------------------------------------------------------------

import { Readable } from 'node:stream';
import { dataPaths, resolveDataDir } from '../src/config/paths.js';
import { createConfigStore } from '../src/config/store.js';
import { EXIT_CODES, isAskshError, toError } from '../src/errors/index.js';
import { createHistoryStore } from '../src/history/store.js';
import { createInferenceClient } from '../src/inference/client.js';
import { createLogger } from '../src/logger.js';
import { createCommandRunner } from '../src/runner/command-runner.js';
import { createSessionEngine } from '../src/session/engine.js';
import { renderError } from '../src/session/render.js';
import {
	ACTION_DIRECTIVES,
	parseArgs,
	renderUsage,
	VERSION,
	withPipedContext,
} from './args.js';
import { createTerminalIO, PIPE_IDLE_MS, readPipedInput } from './terminal.js';
import { createColors, createSpinner } from './ui.js';

const colors = createColors();

async function main(): Promise<number> {
	const args = parseArgs(process.argv);

	if (args.action === 'help') {
		process.stdout.write(renderUsage());
		return EXIT_CODES.ok;
	}
	if (args.action === 'version') {
		process.stdout.write(`${VERSION}\n`);
		return EXIT_CODES.ok;
	}

	const logger = createLogger({ context: 'asksh', level: args.logLevel });
	const paths = dataPaths(resolveDataDir(args.dataDir));
	logger.debug('Using data directory', { dataDir: paths.dataDir });

	// -- Stores ---------------------------------------------------------------

	const configStore = createConfigStore({ path: paths.config, logger });
	const loaded = configStore.load();
	if (loaded.failure) {
		process.stderr.write(`${colors.yellow('Warning:')} ${loaded.failure.message}\n`);
	}
	const historyStore = createHistoryStore({ path: paths.history, logger });

	// -- Services -------------------------------------------------------------

	const piped =
		args.action === 'query' && process.stdin.isTTY !== true
			? await readPipedInput(process.stdin, PIPE_IDLE_MS, logger)
			: undefined;
	// A pipe left open by its writer would otherwise keep the process alive.
	if (piped !== undefined && !process.stdin.readableEnded) process.stdin.destroy();

	// Once stdin has been drained for context, confirmations read as "no".
	const io = createTerminalIO({
		input: piped === undefined ? process.stdin : Readable.from([]),
		output: process.stdout,
		spinner: createSpinner({ colors }),
		historyPath: args.action === 'interactive' ? paths.inputHistory : undefined,
		logger,
	});

	const engine = createSessionEngine({
		configStore,
		historyStore,
		inference: createInferenceClient({ logger }),
		runner: createCommandRunner({
			shell: process.env.SHELL,
			onStdout: (chunk) => process.stdout.write(chunk),
			onStderr: (chunk) => process.stderr.write(chunk),
		}),
		io,
		colors,
		logger,
	});

	try {
		if (args.action === 'interactive') return await engine.runInteractive();
		const directive = ACTION_DIRECTIVES[args.action];
		if (directive !== undefined) return await engine.runOnce(directive);
		// With piped context in front, the text is always a query: a pipe
		// that starts with `!` must not run a directive.
		const context = piped?.trim() ?? '';
		return await engine.runOnce(withPipedContext(args.query, piped), {
			kind: context === '' ? 'auto' : 'query',
		});
	} finally {
		io.close();
	}
}

main().then(
	(status) => {
		process.exitCode = status;
	},
	(err: unknown) => {
		const error = toError(err);
		process.stderr.write(`${renderError(error.message, colors)}\n`);
		if (isAskshError(err) && err.code === 'USAGE_ERROR') {
			process.stderr.write(colors.dim('Run asksh --help for usage.\n'));
		}
		process.exitCode = isAskshError(err) ? err.exitCode : EXIT_CODES.failure;
	},
);
