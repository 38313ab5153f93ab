import { realpathSync } from 'node:fs';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { isExecutionError } from '../src/errors/index.js';
import {
	createCommandRunner,
	exitStatusOf,
} from '../src/runner/command-runner.js';
import { createTempDir, type TempDir } from './utils/mocks.js';

const failureOf = (promise: Promise<unknown>): Promise<unknown> =>
	promise.then(
		() => undefined,
		(err: unknown) => err,
	);

describe('createCommandRunner', () => {
	let dir: TempDir;

	beforeEach(() => {
		dir = createTempDir('asksh-runner-');
	});

	afterEach(() => {
		dir.remove();
	});

	it('runs a simple echo command', async () => {
		const result = await createCommandRunner().run('echo hello world');
		expect(result.exitCode).toBe(0);
		expect(result.signal).toBeNull();
		expect(result.stdout).toBe('hello world\n');
		expect(result.truncated).toBe(false);
	});

	it('reports a non-zero exit code as data', async () => {
		const result = await createCommandRunner().run('exit 3');
		expect(result.exitCode).toBe(3);
		expect(exitStatusOf(result)).toBe(3);
	});

	it('captures stderr', async () => {
		const result = await createCommandRunner().run('echo error-output >&2');
		expect(result.stderr).toBe('error-output\n');
		expect(result.stdout).toBe('');
	});

	it('streams output to the sinks', async () => {
		const out: string[] = [];
		const err: string[] = [];
		const runner = createCommandRunner({
			onStdout: (chunk) => out.push(chunk),
			onStderr: (chunk) => err.push(chunk),
		});

		await runner.run('echo to-out; echo to-err >&2');

		expect(out.join('')).toBe('to-out\n');
		expect(err.join('')).toBe('to-err\n');
	});

	it('truncates captured output at maxOutputBytes', async () => {
		const runner = createCommandRunner({ maxOutputBytes: 10 });
		const result = await runner.run('printf 0123456789abcdef');
		expect(result.stdout).toBe('0123456789');
		expect(result.truncated).toBe(true);
	});

	it('runs in the given directory with extra environment', async () => {
		const runner = createCommandRunner({
			cwd: dir.path,
			env: { ASKSH_TEST_VALUE: 'placeholder' },
		});
		const result = await runner.run('pwd; printf %s "$ASKSH_TEST_VALUE"');
		expect(result.stdout).toBe(`${realpathSync(dir.path)}\nplaceholder`);
	});

	it('reports a signal and maps it to 128 + n', async () => {
		const result = await createCommandRunner().run('kill -TERM $$');
		expect(result.exitCode).toBeNull();
		expect(result.signal).toBe('SIGTERM');
		expect(exitStatusOf(result)).toBe(143);
	});

	it('gives the command end of input when stdin is ignored', async () => {
		const runner = createCommandRunner({ stdin: 'ignore' });
		const result = await runner.run('cat; echo done');
		expect(result.exitCode).toBe(0);
		expect(result.stdout).toBe('done\n');
	});

	it('rejects empty commands without spawning', async () => {
		const err = await failureOf(createCommandRunner().run('   '));
		expect(isExecutionError(err)).toBe(true);
		expect(err instanceof Error && err.message).toBe(
			'Could not execute command: command is empty',
		);
	});

	it('rejects when the shell cannot be started', async () => {
		const runner = createCommandRunner({ shell: '/nonexistent/sh' });
		const err = await failureOf(runner.run('echo hi'));
		expect(isExecutionError(err)).toBe(true);
		expect(err instanceof Error && err.message).toBe(
			'Could not execute command: /nonexistent/sh: ENOENT',
		);
	});
});
