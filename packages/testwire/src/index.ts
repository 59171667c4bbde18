// ============================================================================
// testwire - Public API
// Launch a test worker, let it connect back, and drive discovery and
// execution over one connection.
//
// import { FrontController, SpyMessageSink, summarizeRun } from 'testwire';
//
// const controller = await FrontController.forDiscoveryAndExecution({
//   executablePath: './bin/unit-tests',
// });
// const spy = new SpyMessageSink('find-and-run');
// await controller.findAndRun(spy.sink, { parallel: 'all' });
// console.log(summarizeRun(await spy.finished));
// await controller.dispose();
// ============================================================================

// Configuration
export {
	CONFIG_FILES,
	configSchema,
	configuredSettings,
	configuredWorkers,
	defineConfig,
	loadConfig,
	resolveExecutable,
	validateConfig,
} from './config.js';
export type { LoadedConfig, TestwireConfig } from './config.js';

// Command line and reporting (for embedding)
export { mergeSettings, parseCliArgs } from './cli-options.js';
export type { CliFlags, CliInvocation, Command } from './cli-options.js';
export { ConsoleReporter, computeTimingStats } from './reporter.js';
export type { ReporterOptions, TimingStats } from './reporter.js';
export { DEFAULT_OPERATION_TIMEOUT_MS, runSession, workerName } from './session.js';
export type { SessionOptions, SessionResult } from './session.js';

// Runner
export {
	FrontController,
	SpyMessageSink,
	formatDuration,
	isTerminalMessage,
	mergeSummaries,
	mintOperationToken,
	parseMaxThreads,
	parseParallel,
	parseTrait,
	resolveSettings,
	summarizeRun,
} from 'testwire-runner';
export type {
	ControllerOptions,
	MaxThreads,
	Operation,
	OperationKind,
	ParallelMode,
	ResolvedSettings,
	RunSummary,
	RunnerSettings,
	TestAssembly,
	TestResult,
	UserSettings,
} from 'testwire-runner';

// Engine (for advanced usage)
export {
	EngineEventBus,
	InProcessSupervisor,
	ProcessSupervisor,
	RunnerEngine,
} from 'testwire-engine';
export type {
	DiagnosticSink,
	DisposeOptions,
	EngineEvents,
	EngineState,
	InProcessWorker,
	RunnerEngineOptions,
	TransportKind,
	WorkerHandle,
	WorkerSupervisor,
} from 'testwire-engine';

// Worker side
export { connectToRunner, matchesFilters, parseWorkerArgs, serveTests } from 'testwire-worker';
export type { HostedTest, RunnerConnection, RunnerEndpoint, WorkerIdentity } from 'testwire-worker';

// Protocol and errors
export {
	ConfigError,
	EngineNotReadyError,
	OperationNotSupportedError,
	PROTOCOL_VERSION,
	ProtocolError,
	ShutdownTimeoutError,
	SpawnError,
	TestwireError,
} from 'testwire-protocol';
export type { MessageKind, MessageSink, WorkerMessage } from 'testwire-protocol';
