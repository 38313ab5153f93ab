import { defineConfig } from 'vitest/config';

export default defineConfig({
	test: {
		include: ['tests/**/*.test.ts', 'asksh-cli/tests/**/*.test.ts'],
		environment: 'node',
		testTimeout: 10_000,
	},
});
