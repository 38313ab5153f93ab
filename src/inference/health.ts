/**
 * Backend connection testing and model discovery.
 *
 * Both hit `GET <origin>/api/tags` with a short AbortController timeout,
 * independent of the query timeout.
 */

import type { Config } from '../config/schema.js';
import { describeReason } from '../errors/index.js';
import { withTimeout } from '../utils/timeout.js';
import type { FetchLike } from './client.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type BackendCheckResult =
	| { readonly ok: true; readonly version?: string }
	| { readonly ok: false; readonly error: string };

export interface ModelInfo {
	readonly name: string;
	readonly size: string;
}

export interface BackendHealth {
	readonly check: (config: Config) => Promise<BackendCheckResult>;
	readonly listModels: (config: Config) => Promise<readonly ModelInfo[]>;
}

export interface BackendHealthOptions {
	readonly fetch?: FetchLike;
	readonly timeoutMs?: number;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const KB = 1024;
const MB = KB * 1024;
const GB = MB * 1024;

/**
 * Format a byte count into a human-readable string (e.g., "1.9 GB").
 */
export function formatBytes(bytes: number): string {
	if (bytes >= GB) {
		return `${(bytes / GB).toFixed(1)} GB`;
	}
	if (bytes >= MB) {
		return `${(bytes / MB).toFixed(1)} MB`;
	}
	if (bytes >= KB) {
		return `${(bytes / KB).toFixed(1)} KB`;
	}
	return `${bytes} B`;
}

/** `http://host:11434/api/generate` → `http://host:11434/api/tags` */
export function tagsEndpoint(url: string): string {
	return new URL('/api/tags', url).toString();
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === 'object' && value !== null;

const DEFAULT_TIMEOUT_MS = 5000;

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createBackendHealth(
	options: BackendHealthOptions = {},
): BackendHealth {
	const fetchImpl: FetchLike = options.fetch ?? globalThis.fetch;
	const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

	const getTags = (url: string): Promise<Response> =>
		withTimeout(
			({ signal }) => fetchImpl(tagsEndpoint(url), { method: 'GET', signal }),
			timeoutMs,
		);

	const check = async (config: Config): Promise<BackendCheckResult> => {
		try {
			const response = await getTags(config.url);
			if (!response.ok) {
				return Object.freeze({
					ok: false as const,
					error: `HTTP ${response.status}: ${response.statusText}`,
				});
			}
			const version = response.headers.get('x-ollama-version') ?? undefined;
			return Object.freeze({ ok: true as const, version });
		} catch (err: unknown) {
			if (err instanceof Error && err.name === 'AbortError') {
				return Object.freeze({
					ok: false as const,
					error: `Connection timed out after ${timeoutMs}ms`,
				});
			}
			return Object.freeze({ ok: false as const, error: describeReason(err) });
		}
	};

	const listModels = async (config: Config): Promise<readonly ModelInfo[]> => {
		try {
			const response = await getTags(config.url);
			if (!response.ok) return [];

			const data: unknown = await response.json();
			if (!isRecord(data) || !Array.isArray(data.models)) return [];

			return data.models.filter(isRecord).map((model) =>
				Object.freeze({
					name: String(model.name),
					size: typeof model.size === 'number' ? formatBytes(model.size) : '?',
				}),
			);
		} catch {
			return [];
		}
	};

	return Object.freeze({ check, listModels });
}
