// ============================================================================
// testwire Protocol - Public API
// Message types, frame codec, and the error taxonomy shared by runner and worker.
// ============================================================================

export {
	CONNECTION_TOKEN,
	PROTOCOL_VERSION,
	executionOptionsSchema,
	findAndRunRequestSchema,
	findOptionsSchema,
	findRequestSchema,
	isMessageKind,
	runnerRequestSchema,
	testFiltersSchema,
	workerMessageSchema,
} from './messages.js';
export type {
	ExecutionOptions,
	FindAndRunRequest,
	FindOptions,
	FindRequest,
	MessageKind,
	MessageOf,
	MessageSink,
	RunnerRequest,
	TestFilters,
	WireMessage,
	WorkerMessage,
} from './messages.js';
export {
	DEFAULT_MAX_FRAME_BYTES,
	FrameDecoder,
	decodeFrame,
	encodeFrame,
	type FrameSchema,
} from './codec.js';
export {
	ConfigError,
	EngineNotReadyError,
	OperationNotSupportedError,
	ProtocolError,
	ShutdownTimeoutError,
	SpawnError,
	TestwireError,
	toError,
} from './errors.js';
