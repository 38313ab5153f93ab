// ---------------------------------------------------------------------------
// asksh — public library API
//
// Everything needed to embed the assistant: the stores, the backend client,
// the command runner, and the session engine that ties them together.
// ---------------------------------------------------------------------------

// ---- Config ---------------------------------------------------------------
export {
	dataPaths,
	DATA_DIR_ENV,
	type DataPaths,
	resolveDataDir,
} from './config/paths.js';
export {
	BACKEND_TYPES,
	type BackendType,
	CONFIG_FIELDS,
	CONFIG_KEYS,
	type Config,
	type ConfigIssue,
	type ConfigKey,
	coerceFieldText,
	DEFAULT_CONFIG,
	DEFAULT_PROMPT_PREFIX,
	type FieldSchema,
	type FieldType,
	isConfigKey,
	parseField,
	resolveConfig,
} from './config/schema.js';
export {
	type ConfigLoadResult,
	type ConfigStore,
	type ConfigStoreOptions,
	createConfigStore,
} from './config/store.js';

// ---- Errors ---------------------------------------------------------------
export * from './errors/index.js';

// ---- History --------------------------------------------------------------
export {
	createHistoryStore,
	type HistoryEntry,
	type HistoryStore,
	type HistoryStoreOptions,
} from './history/store.js';

// ---- Inference ------------------------------------------------------------
export { type BackendAdapter, BACKENDS, composePrompt } from './inference/backends.js';
export {
	type CommandSuggestion,
	createInferenceClient,
	type FetchLike,
	type InferenceClient,
	type InferenceClientOptions,
} from './inference/client.js';
export { extractCommand } from './inference/extract.js';
export {
	type BackendCheckResult,
	type BackendHealth,
	type BackendHealthOptions,
	createBackendHealth,
	formatBytes,
	type ModelInfo,
} from './inference/health.js';

// ---- Logging --------------------------------------------------------------
export {
	createLogger,
	createMemoryTransport,
	createSilentLogger,
	createStreamTransport,
	isLogLevel,
	type LogEntry,
	type Logger,
	type LoggerOptions,
	type LogLevel,
	LOG_LEVELS,
	type LogTransport,
	type MemoryTransportHandle,
} from './logger.js';

// ---- Runner ---------------------------------------------------------------
export {
	type CommandResult,
	type CommandRunner,
	type CommandRunnerOptions,
	createCommandRunner,
	exitStatusOf,
} from './runner/command-runner.js';

// ---- Session --------------------------------------------------------------
export {
	createBuiltinDirectives,
	createDirectiveRegistry,
	type Directive,
	type DirectiveContext,
	type DirectiveRegistry,
	type DirectiveResult,
	parseDirective,
} from './session/directives.js';
export {
	createSessionEngine,
	type InputKind,
	type RunOnceOptions,
	type SessionEngine,
	type SessionEngineOptions,
} from './session/engine.js';
export { canTransition } from './session/state.js';
export {
	type CycleOutcome,
	plainColors,
	type SessionIO,
	type SessionMode,
	type SessionPhase,
	type SessionSnapshot,
	type TermColors,
} from './session/types.js';
