import { mkdirSync, readdirSync, readFileSync, writeFileSync } from 'node:fs';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { isPlainObject, readJsonFile, writeJsonFile } from '../../src/utils/json-io.js';
import { createTempDir, type TempDir } from './mocks.js';

describe('json-io', () => {
	let dir: TempDir;

	beforeEach(() => {
		dir = createTempDir();
	});

	afterEach(() => {
		dir.remove();
	});

	it('should report a missing file', () => {
		expect(readJsonFile(dir.file('nope.json'))).toEqual({ status: 'missing' });
	});

	it('should report invalid JSON without throwing', () => {
		const path = dir.file('bad.json');
		writeFileSync(path, '{ not json');
		const result = readJsonFile(path);
		expect(result.status).toBe('invalid');
	});

	it('should throw for a directory', () => {
		const path = dir.file('folder');
		mkdirSync(path);
		expect(() => readJsonFile(path)).toThrow();
	});

	it('should write tab-indented JSON with a trailing newline', () => {
		const path = dir.file('nested/out.json');
		writeJsonFile(path, { a: 1 });
		expect(readFileSync(path, 'utf-8')).toBe('{\n\t"a": 1\n}\n');
		expect(readJsonFile(path)).toEqual({ status: 'ok', value: { a: 1 } });
	});

	it('should leave no temp file behind', () => {
		writeJsonFile(dir.file('out.json'), []);
		expect(readdirSync(dir.path)).toEqual(['out.json']);
	});

	it('should tell plain objects from arrays and null', () => {
		expect(isPlainObject({})).toBe(true);
		expect(isPlainObject([])).toBe(false);
		expect(isPlainObject(null)).toBe(false);
	});
});
