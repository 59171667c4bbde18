// ============================================================================
// testwire Runner - Public API
// Discovery and execution against an out-of-process test worker.
// ============================================================================

export {
	FrontController,
	mintOperationToken,
	type ControllerOptions,
	type Operation,
	type TestAssembly,
} from './front-controller.js';
export {
	addTrait,
	isThreadMultiplier,
	parseMaxThreads,
	parseParallel,
	parseTrait,
	resolveSettings,
	type MaxThreads,
	type ParallelMode,
	type ResolvedSettings,
	type RunnerSettings,
	type SettingsFilters,
	type UserSettings,
} from './settings.js';
export { SpyMessageSink, isTerminalMessage, type OperationKind } from './spy-sink.js';
export {
	formatDuration,
	mergeSummaries,
	summarizeRun,
	type RunSummary,
	type TestResult,
} from './run-summary.js';
