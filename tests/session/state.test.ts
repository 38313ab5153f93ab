import { describe, expect, it } from 'vitest';
import { createMemoryTransport, createLogger, createSilentLogger } from '../../src/logger.js';
import { canTransition, createSessionState } from '../../src/session/state.js';

describe('canTransition', () => {
	it('should follow the query cycle', () => {
		expect(canTransition('idle', 'awaiting-input')).toBe(true);
		expect(canTransition('awaiting-input', 'querying-backend')).toBe(true);
		expect(canTransition('querying-backend', 'rendering-result')).toBe(true);
		expect(canTransition('rendering-result', 'confirming')).toBe(true);
		expect(canTransition('confirming', 'executing')).toBe(true);
		expect(canTransition('executing', 'idle')).toBe(true);
	});

	it('should forbid skipping steps and leaving exited', () => {
		expect(canTransition('idle', 'executing')).toBe(false);
		expect(canTransition('querying-backend', 'idle')).toBe(false);
		expect(canTransition('exited', 'idle')).toBe(false);
	});
});

describe('createSessionState', () => {
	it('should start idle in interactive mode', () => {
		const state = createSessionState(createSilentLogger());
		expect(state.snapshot()).toEqual({
			mode: 'interactive',
			phase: 'idle',
			busy: false,
			lastSuggestion: undefined,
		});
	});

	it('should throw on an illegal transition', () => {
		const state = createSessionState(createSilentLogger());
		expect(() => state.to('executing')).toThrow(
			'Illegal session transition idle → executing',
		);
		expect(state.phase()).toBe('idle');
	});

	it('should log transitions at debug', () => {
		const transport = createMemoryTransport();
		const state = createSessionState(
			createLogger({ level: 'debug', transports: [transport] }),
		);
		state.to('awaiting-input');
		expect(transport.entries.map((e) => e.message)).toEqual([
			'idle → awaiting-input',
		]);
	});

	it('should return frozen snapshots', () => {
		const state = createSessionState(createSilentLogger());
		const before = state.snapshot();
		state.setBusy(true);
		expect(before.busy).toBe(false);
		expect(state.snapshot().busy).toBe(true);
		expect(Object.isFrozen(before)).toBe(true);
	});
});
