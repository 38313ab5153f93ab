import { homedir } from 'node:os';
import { join, resolve } from 'node:path';

export const DATA_DIR_ENV = 'ASKSH_DATA_DIR';

export interface DataPaths {
	readonly dataDir: string;
	readonly config: string;
	readonly history: string;
	/** Readline line history for interactive mode. */
	readonly inputHistory: string;
}

/**
 * Resolve the per-user data directory: an explicit value wins, then
 * $ASKSH_DATA_DIR, then ~/.asksh.
 */
export function resolveDataDir(
	explicit?: string,
	env: NodeJS.ProcessEnv = process.env,
): string {
	const fromEnv = env[DATA_DIR_ENV];
	if (explicit) return resolve(explicit);
	if (fromEnv) return resolve(fromEnv);
	return join(homedir(), '.asksh');
}

export function dataPaths(dataDir: string): DataPaths {
	return Object.freeze({
		dataDir,
		config: join(dataDir, 'config.json'),
		history: join(dataDir, 'history.json'),
		inputHistory: join(dataDir, 'input-history'),
	});
}
