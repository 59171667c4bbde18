// ============================================================================
// testwire Engine - Runner Engine
// Listener + codec + registry + supervisor, composed into one connection
// state machine:
//
//   start()          not-started -> listening   (bind, spawn worker)
//   hello received   listening   -> connected   (handshake metadata known)
//   dispose()        *           -> closed
//   any fault        *           -> faulted
//
// One reader (the connection's data handler) decodes frames and routes them
// by operation token. Requests are written whole, one frame per call.
// ============================================================================

import {
	CONNECTION_TOKEN,
	EngineNotReadyError,
	type FindAndRunRequest,
	type FindRequest,
	FrameDecoder,
	type MessageOf,
	type MessageSink,
	PROTOCOL_VERSION,
	ProtocolError,
	type RunnerRequest,
	ShutdownTimeoutError,
	TestwireError,
	type WorkerMessage,
	encodeFrame,
	toError,
	workerMessageSchema,
} from 'testwire-protocol';
import { EngineEventBus } from './event-bus.js';
import {
	type Connection,
	type ListenAddress,
	type Listener,
	type TransportKind,
	createListener,
} from './listener.js';
import { OperationRegistry } from './registry.js';
import { type EngineState, canTransition, isTerminal } from './state.js';
import {
	ProcessSupervisor,
	type WorkerHandle,
	type WorkerSpawnOptions,
	type WorkerSupervisor,
} from './supervisor.js';

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

/** How long sends and metadata reads wait for the connected state */
export const DEFAULT_READY_TIMEOUT_MS = 30_000;

/** How long the worker has to connect and say hello */
export const DEFAULT_HANDSHAKE_TIMEOUT_MS = 30_000;

/** How long disposal waits for the worker to exit */
export const DEFAULT_SHUTDOWN_GRACE_MS = 5_000;

/** Longest frame excerpt written by debug tracing */
const TRACE_LIMIT = 500;

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

/** Everything needed to launch the worker, except where it should connect */
export type WorkerLaunchOptions = Omit<WorkerSpawnOptions, 'connectionArgs'>;

/** Receives human-readable status lines. Never part of control flow. */
export type DiagnosticSink = (message: string) => void;

export interface RunnerEngineOptions {
	worker: WorkerLaunchOptions;
	/** Transport the worker connects back over (default: 'ws') */
	transport?: TransportKind;
	/** Socket path for the 'pipe' transport */
	pipePath?: string;
	/** Process management (default: ProcessSupervisor) */
	supervisor?: WorkerSupervisor;
	/** Status lines (default: console.warn with a [testwire] prefix) */
	diagnostics?: DiagnosticSink;
	/** Forward the worker's connection-level diagnostics */
	workerDiagnostics?: boolean;
	/** Forward the worker's connection-level internal diagnostics */
	internalDiagnostics?: boolean;
	/** Lifecycle events; pass one in to observe start() itself */
	bus?: EngineEventBus;
	readyTimeoutMs?: number;
	handshakeTimeoutMs?: number;
	maxFrameBytes?: number;
	/** Trace every frame through the diagnostic sink */
	debug?: boolean;
}

export interface DisposeOptions {
	/** How long to wait for the worker to exit (default: 5000) */
	graceMillis?: number;
	/**
	 * What to do when the worker outlives the grace period.
	 * 'report' only emits a diagnostic; 'kill' also force-terminates it.
	 */
	onShutdownTimeout?: 'report' | 'kill';
}

type HelloPayload = MessageOf<'hello'>['payload'];

export function defaultDiagnosticSink(message: string): void {
	console.warn(`[testwire] ${message}`);
}

// ---------------------------------------------------------------------------
// RunnerEngine
// ---------------------------------------------------------------------------

/**
 * Drives one worker process over one connection.
 *
 * ```ts
 * const engine = await RunnerEngine.start({ worker: { executablePath: './tests' } });
 * engine.register(token, sink);
 * await engine.sendFind(token, { options, filters });
 * // ...
 * await engine.dispose();
 * ```
 */
export class RunnerEngine {
	readonly bus: EngineEventBus;

	private currentState: EngineState = 'not-started';
	private readonly registry = new OperationRegistry();
	private readonly supervisor: WorkerSupervisor;
	private readonly decoder: FrameDecoder<WorkerMessage>;
	private readonly report: DiagnosticSink;

	private listener: Listener | null = null;
	private connection: Connection | null = null;
	private workerHandle: WorkerHandle | null = null;
	private hello: HelloPayload | null = null;
	private faultError: Error | null = null;

	private handshakeTimer: NodeJS.Timeout | null = null;
	private unwatchExit: (() => void) | null = null;
	private accepting: Promise<void> | null = null;
	private transportClosing: Promise<void> | null = null;
	private workerStopping: Promise<void> | null = null;
	private disposing: Promise<void> | null = null;

	constructor(private readonly options: RunnerEngineOptions) {
		this.bus = options.bus ?? new EngineEventBus();
		this.supervisor = options.supervisor ?? new ProcessSupervisor();
		this.decoder = new FrameDecoder(workerMessageSchema, options.maxFrameBytes);
		this.report = options.diagnostics ?? defaultDiagnosticSink;
	}

	/**
	 * Create an engine, bind its listener and launch the worker.
	 *
	 * @throws SpawnError when the worker cannot be launched; nothing stays bound
	 */
	static async start(options: RunnerEngineOptions): Promise<RunnerEngine> {
		const engine = new RunnerEngine(options);
		await engine.listen();
		return engine;
	}

	get state(): EngineState {
		return this.currentState;
	}

	/** The launched worker, once start() has spawned it */
	get worker(): WorkerHandle | null {
		return this.workerHandle;
	}

	/** Why the engine faulted, if it did */
	get fault(): Error | null {
		return this.faultError;
	}

	/** Tokens of the operations still receiving messages */
	get pendingOperations(): string[] {
		return this.registry.tokens();
	}

	// -----------------------------------------------------------------------
	// Startup
	// -----------------------------------------------------------------------

	/** not-started -> listening: bind the listener, then spawn the worker */
	async listen(): Promise<void> {
		if (this.currentState !== 'not-started') {
			throw new TestwireError(`Runner engine was already started (state: ${this.currentState})`);
		}
		this.transition('listening');

		const listener = createListener(this.options.transport ?? 'ws', {
			path: this.options.pipePath,
			onRejected: (reason) => {
				this.bus.emit('connection:reject', { reason });
				this.diagnostic(`Refused an extra worker connection: ${reason}`);
			},
		});
		this.listener = listener;

		let address: ListenAddress;
		try {
			address = await listener.start();
		} catch (err) {
			const error = toError(err);
			this.fail(error);
			await this.closeTransport();
			throw error;
		}

		let handle: WorkerHandle;
		try {
			handle = await this.supervisor.spawn({ ...this.options.worker, connectionArgs: address.workerArgs });
		} catch (err) {
			const error = toError(err);
			this.fail(error);
			// Release the address before anyone sees the failure
			await this.closeTransport();
			throw error;
		}

		this.workerHandle = handle;
		this.bus.emit('worker:spawn', { processId: handle.processId, connectionParam: handle.connectionParam });
		this.trace(`Launched worker ${handle.processId} with ${handle.connectionParam}`);

		if (isTerminal(this.currentState)) {
			// Disposed while the worker was starting
			await this.stopWorker();
			throw new EngineNotReadyError(this.currentState, 0, this.terminalReason());
		}

		const handshakeTimeout = this.options.handshakeTimeoutMs ?? DEFAULT_HANDSHAKE_TIMEOUT_MS;
		this.handshakeTimer = setTimeout(() => {
			this.handshakeTimer = null;
			if (this.currentState === 'listening') {
				this.fail(new ProtocolError(`Worker did not connect and say hello within ${handshakeTimeout}ms`));
			}
		}, handshakeTimeout);

		this.unwatchExit = this.supervisor.onExit(handle, (exited) => this.onWorkerExit(exited));
		this.accepting = this.acceptWorker(listener);
	}

	private async acceptWorker(listener: Listener): Promise<void> {
		let connection: Connection;
		try {
			connection = await listener.accepted();
		} catch (err) {
			// Closing the listener ourselves also lands here
			if (!isTerminal(this.currentState)) this.fail(toError(err));
			return;
		}
		if (isTerminal(this.currentState)) return;

		this.connection = connection;
		this.bus.emit('connection:accept', { address: connection.remoteAddress });
		this.trace(`Worker connected from ${connection.remoteAddress}`);

		connection.onClose((reason) => {
			if (!isTerminal(this.currentState)) {
				this.fail(new TestwireError(`Worker connection closed unexpectedly (${reason})`));
			}
		});
		connection.onData((chunk) => this.onData(chunk));
	}

	private onWorkerExit(handle: WorkerHandle): void {
		this.bus.emit('worker:exit', {
			processId: handle.processId,
			exitCode: handle.exitCode ?? null,
			signal: handle.signal,
		});
		if (this.currentState !== 'listening') return;

		const status = handle.signal ? `signal ${handle.signal}` : `exit code ${String(handle.exitCode)}`;
		const stderr = handle.stderr.trim();
		this.fail(
			new TestwireError(`Worker process ${handle.processId} exited (${status}) before connecting`, {
				hint: stderr ? `Worker stderr: ${stderr.slice(-TRACE_LIMIT)}` : undefined,
			}),
		);
	}

	// -----------------------------------------------------------------------
	// Reader
	// -----------------------------------------------------------------------

	private onData(chunk: Buffer): void {
		if (isTerminal(this.currentState)) return;
		try {
			this.decoder.feed(chunk, (message) => this.onMessage(message));
		} catch (err) {
			this.fail(toError(err));
		}
	}

	private onMessage(message: WorkerMessage): void {
		if (isTerminal(this.currentState)) return;
		this.trace(`<<< RECV ${JSON.stringify(message)}`);

		if (this.currentState === 'listening') {
			this.handshake(message);
			return;
		}

		if (message.operationToken === CONNECTION_TOKEN) {
			this.onConnectionMessage(message);
			return;
		}
		this.route(message);
	}

	private handshake(message: WorkerMessage): void {
		if (message.messageKind !== 'hello') {
			throw new ProtocolError(`Handshake failed: expected hello, received ${message.messageKind}`);
		}
		if (message.operationToken !== CONNECTION_TOKEN) {
			throw new ProtocolError('Handshake failed: hello must carry the connection token');
		}
		if (message.payload.protocolVersion !== PROTOCOL_VERSION) {
			throw new ProtocolError(
				`Handshake failed: worker speaks protocol version ${message.payload.protocolVersion}, runner speaks ${PROTOCOL_VERSION}`,
				{ hint: 'Update the worker and runner packages to matching versions.' },
			);
		}

		this.hello = message.payload;
		this.clearHandshakeTimer();
		this.transition('connected');
		this.bus.emit('handshake', {
			testFrameworkDisplayName: message.payload.testFrameworkDisplayName,
			testAssemblyUniqueId: message.payload.testAssemblyUniqueId,
		});
		this.trace(`Handshake complete: ${message.payload.testFrameworkDisplayName} (${message.payload.testAssemblyUniqueId})`);
	}

	private onConnectionMessage(message: WorkerMessage): void {
		switch (message.messageKind) {
			case 'diagnostic':
				if (this.options.workerDiagnostics) this.diagnostic(message.payload.message);
				return;
			case 'internal-diagnostic':
				if (this.options.internalDiagnostics) this.diagnostic(message.payload.message);
				return;
			case 'error':
				this.diagnostic(`Worker reported an error: ${message.payload.message}`);
				return;
			case 'hello':
				throw new ProtocolError('Worker sent a second hello after the handshake');
			default:
				this.unroutable(message);
		}
	}

	private route(message: WorkerMessage): void {
		const token = message.operationToken;
		if (!this.registry.has(token)) {
			this.unroutable(message);
			return;
		}

		let keepGoing: boolean;
		try {
			keepGoing = this.registry.dispatch(token, message);
		} catch (err) {
			this.registry.unregister(token);
			this.diagnostic(
				`Message sink for operation ${token} threw on ${message.messageKind}: ${toError(err).message}; no further messages will be routed to it`,
			);
			this.bus.emit('operation:close', { token, reason: 'sink-threw' });
			return;
		}

		if (!keepGoing) {
			this.registry.unregister(token);
			this.bus.emit('operation:close', { token, reason: 'completed' });
		}
	}

	private unroutable(message: WorkerMessage): void {
		const token = message.operationToken;
		this.bus.emit('message:unroutable', { token, messageKind: message.messageKind });
		this.diagnostic(
			`Dropped ${message.messageKind} message for ${token === CONNECTION_TOKEN ? 'the connection' : `unknown operation ${token}`}`,
		);
	}

	// -----------------------------------------------------------------------
	// Readiness
	// -----------------------------------------------------------------------

	/**
	 * Wait until the engine is connected. Never changes state.
	 *
	 * @throws EngineNotReadyError on timeout, on abort, or once the engine
	 * is closed or faulted
	 */
	async waitForReady(
		timeoutMs: number = this.options.readyTimeoutMs ?? DEFAULT_READY_TIMEOUT_MS,
		signal?: AbortSignal,
	): Promise<void> {
		if (this.currentState === 'connected') return;

		const startedAt = Date.now();
		const notReady = (reason?: string) => new EngineNotReadyError(this.currentState, Date.now() - startedAt, reason);

		if (isTerminal(this.currentState)) throw notReady(this.terminalReason());
		if (signal?.aborted) throw notReady('wait was cancelled');

		await new Promise<void>((resolve, reject) => {
			const finish = (error?: EngineNotReadyError) => {
				clearTimeout(timer);
				unsubscribe();
				signal?.removeEventListener('abort', onAbort);
				if (error) {
					reject(error);
				} else {
					resolve();
				}
			};
			const onAbort = () => finish(notReady('wait was cancelled'));
			const timer = setTimeout(() => finish(notReady()), timeoutMs);
			const unsubscribe = this.bus.on('state:change', ({ to }) => {
				if (to === 'connected') {
					finish();
				} else if (isTerminal(to)) {
					finish(notReady(this.terminalReason()));
				}
			});
			signal?.addEventListener('abort', onAbort, { once: true });
		});
	}

	// -----------------------------------------------------------------------
	// Operations
	// -----------------------------------------------------------------------

	/**
	 * Start routing messages for a token to a sink.
	 *
	 * @throws EngineNotReadyError once the engine is closed or faulted
	 */
	register(token: string, sink: MessageSink): void {
		if (isTerminal(this.currentState)) {
			throw new EngineNotReadyError(this.currentState, 0, this.terminalReason());
		}
		this.registry.register(token, sink);
		this.bus.emit('operation:open', { token });
	}

	/** Stop routing messages for a token. Safe to call more than once. */
	unregister(token: string): boolean {
		const removed = this.registry.unregister(token);
		if (removed) this.bus.emit('operation:close', { token, reason: 'unregistered' });
		return removed;
	}

	/** Send a discovery request once connected */
	sendFind(token: string, payload: FindRequest['payload']): Promise<void> {
		return this.send({ operationToken: token, messageKind: 'find', payload });
	}

	/** Send a discovery-and-execution request once connected */
	sendFindAndRun(token: string, payload: FindAndRunRequest['payload']): Promise<void> {
		return this.send({ operationToken: token, messageKind: 'find-and-run', payload });
	}

	private async send(request: RunnerRequest): Promise<void> {
		await this.waitForReady();
		const connection = this.connection;
		// State may have moved on while the wait resolved
		if (this.currentState !== 'connected' || !connection) {
			throw new EngineNotReadyError(this.currentState, 0, this.terminalReason());
		}

		const frame = encodeFrame(request);
		this.trace(`>>> SEND ${frame.toString('utf-8').trimEnd()}`);
		connection.write(frame);
		this.bus.emit('operation:send', { token: request.operationToken, messageKind: request.messageKind });
	}

	// -----------------------------------------------------------------------
	// Handshake metadata
	// -----------------------------------------------------------------------

	async testFrameworkDisplayName(): Promise<string> {
		return (await this.handshakeInfo()).testFrameworkDisplayName;
	}

	async testAssemblyUniqueId(): Promise<string> {
		return (await this.handshakeInfo()).testAssemblyUniqueId;
	}

	/** The worker's target framework, if its hello named one */
	async targetFramework(): Promise<string | undefined> {
		return (await this.handshakeInfo()).targetFramework;
	}

	private async handshakeInfo(): Promise<HelloPayload> {
		await this.waitForReady();
		if (!this.hello) {
			throw new EngineNotReadyError(this.currentState, 0, 'handshake metadata is missing');
		}
		return this.hello;
	}

	// -----------------------------------------------------------------------
	// Teardown
	// -----------------------------------------------------------------------

	/**
	 * Close the transport, then stop the worker. Safe from any state and
	 * safe to call more than once; repeated calls share one teardown.
	 * A worker that will not exit is reported, never thrown.
	 */
	dispose(options: DisposeOptions = {}): Promise<void> {
		this.disposing ??= this.teardown(options);
		return this.disposing;
	}

	private async teardown(options: DisposeOptions): Promise<void> {
		await this.closeTransport();
		await this.stopWorker(options);
		this.unwatchExit?.();
		this.unwatchExit = null;
		await this.accepting;
	}

	/**
	 * Phase one of teardown: drop pending operations, move to 'closed'
	 * (a faulted engine stays faulted) and release the connection and address.
	 */
	closeTransport(): Promise<void> {
		this.transportClosing ??= this.releaseTransport();
		return this.transportClosing;
	}

	private async releaseTransport(): Promise<void> {
		this.clearHandshakeTimer();
		for (const token of this.registry.clear()) {
			this.bus.emit('operation:close', { token, reason: 'disposed' });
		}
		if (!isTerminal(this.currentState)) this.transition('closed');

		const listener = this.listener;
		if (!listener) return;
		try {
			await listener.close();
		} catch (err) {
			this.diagnostic(`Failed to release the transport: ${toError(err).message}`);
		}
	}

	/**
	 * Phase two of teardown: ask the worker to exit and wait out the grace
	 * period. Sends at most one termination request per engine.
	 */
	stopWorker(options: DisposeOptions = {}): Promise<void> {
		const worker = this.workerHandle;
		if (!worker) return Promise.resolve();
		this.workerStopping ??= this.shutdownWorker(worker, options);
		return this.workerStopping;
	}

	private async shutdownWorker(worker: WorkerHandle, options: DisposeOptions): Promise<void> {
		const graceMillis = options.graceMillis ?? DEFAULT_SHUTDOWN_GRACE_MS;
		try {
			const outcome = await this.supervisor.shutdown(worker, graceMillis);
			if (outcome === 'exited') return;

			this.diagnostic(new ShutdownTimeoutError(worker.processId, graceMillis).message);
			if (options.onShutdownTimeout === 'kill') {
				this.diagnostic(`Killing worker process ${worker.processId}`);
				this.supervisor.kill(worker);
			}
		} catch (err) {
			this.diagnostic(`Failed to stop worker process ${worker.processId}: ${toError(err).message}`);
		}
	}

	// -----------------------------------------------------------------------
	// State
	// -----------------------------------------------------------------------

	private transition(to: EngineState): void {
		const from = this.currentState;
		if (!canTransition(from, to)) {
			throw new TestwireError(`Invalid engine state transition: ${from} -> ${to}`);
		}
		this.currentState = to;
		this.bus.emit('state:change', { from, to });
	}

	/** Report the error, drop pending operations, and move to 'faulted' */
	private fail(error: Error): void {
		if (isTerminal(this.currentState)) return;

		const dropped = this.registry.clear();
		const pending = dropped.length > 0 ? ` Pending operations dropped: ${dropped.join(', ')}` : '';
		this.diagnostic(`Runner engine faulted: ${error.message}${pending}`);

		this.faultError = error;
		this.clearHandshakeTimer();
		for (const token of dropped) {
			this.bus.emit('operation:close', { token, reason: 'faulted' });
		}
		this.transition('faulted');
		this.bus.emit('fault', { error });
		// Stored, so dispose() waits for it
		this.transportClosing ??= this.releaseTransport();
	}

	private terminalReason(): string | undefined {
		if (this.currentState === 'faulted') {
			return `engine faulted: ${this.faultError?.message ?? 'unknown error'}`;
		}
		if (this.currentState === 'closed') return 'engine was disposed';
		return undefined;
	}

	private clearHandshakeTimer(): void {
		if (this.handshakeTimer) {
			clearTimeout(this.handshakeTimer);
			this.handshakeTimer = null;
		}
	}

	// -----------------------------------------------------------------------
	// Diagnostics
	// -----------------------------------------------------------------------

	private diagnostic(message: string): void {
		try {
			this.report(message);
		} catch (err) {
			console.warn(`[testwire] diagnostic sink threw: ${toError(err).message}`);
		}
	}

	private trace(message: string): void {
		if (!this.options.debug) return;
		this.diagnostic(message.length > TRACE_LIMIT ? `${message.slice(0, TRACE_LIMIT)}...` : message);
	}
}
