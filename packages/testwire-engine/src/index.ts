// ============================================================================
// testwire Engine - Public API
// ============================================================================

export {
	DEFAULT_HANDSHAKE_TIMEOUT_MS,
	DEFAULT_READY_TIMEOUT_MS,
	DEFAULT_SHUTDOWN_GRACE_MS,
	RunnerEngine,
	defaultDiagnosticSink,
	type DiagnosticSink,
	type DisposeOptions,
	type RunnerEngineOptions,
	type WorkerLaunchOptions,
} from './engine.js';
export {
	EngineEventBus,
	type EngineEventName,
	type EngineEvents,
	type EventListener,
	type HistoryEntry,
	type OperationCloseReason,
} from './event-bus.js';
export {
	SocketListener,
	WebSocketListener,
	createListener,
	type Connection,
	type ListenAddress,
	type Listener,
	type ListenerOptions,
	type TransportKind,
} from './listener.js';
export { OperationRegistry, type PendingOperation } from './registry.js';
export { canTransition, isTerminal, type EngineState } from './state.js';
export {
	ProcessSupervisor,
	type ShutdownOutcome,
	type WorkerHandle,
	type WorkerSpawnOptions,
	type WorkerSupervisor,
} from './supervisor.js';
export {
	InProcessSupervisor,
	type InProcessWorker,
	type InProcessWorkerControl,
} from './in-process.js';
