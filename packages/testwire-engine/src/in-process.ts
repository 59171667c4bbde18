// ============================================================================
// testwire Engine - In-Process Supervisor
// Runs a worker function inside this process instead of launching a binary.
// The worker still connects back over a real loopback transport, so the
// engine cannot tell the difference. Used to embed workers and to test them.
// ============================================================================

import type { ShutdownOutcome, WorkerHandle, WorkerSpawnOptions, WorkerSupervisor } from './supervisor.js';

/** What an in-process worker can do to its own lifecycle */
export interface InProcessWorkerControl {
	readonly processId: number;
	/** Mark the worker as exited */
	exit(code?: number): void;
	/** Replace the default shutdown behaviour (exit with code 0) */
	onShutdown(handler: () => void): void;
	/** Append to the handle's stdout / stderr tails */
	stdout(text: string): void;
	stderr(text: string): void;
}

/** Body of an in-process worker. Receives the connection arguments. */
export type InProcessWorker = (connectionArgs: string[], control: InProcessWorkerControl) => void | Promise<void>;

class InProcessHandle implements WorkerHandle {
	readonly startedAt = Date.now();
	hasExited = false;
	exitCode: number | null | undefined = undefined;
	signal: NodeJS.Signals | null = null;
	stdout = '';
	stderr = '';
	shutdownRequests = 0;
	shutdownHandler: (() => void) | null = null;
	private listeners = new Set<(handle: WorkerHandle) => void>();

	constructor(
		readonly processId: number,
		readonly connectionParam: string,
	) {}

	exit(code: number | null, signal: NodeJS.Signals | null): void {
		if (this.hasExited) return;
		this.hasExited = true;
		this.exitCode = code;
		this.signal = signal;
		const listeners = [...this.listeners];
		this.listeners.clear();
		for (const listener of listeners) listener(this);
	}

	onExit(listener: (handle: WorkerHandle) => void): () => void {
		if (this.hasExited) {
			listener(this);
			return () => {};
		}
		this.listeners.add(listener);
		return () => {
			this.listeners.delete(listener);
		};
	}
}

/**
 * Supervisor whose workers are functions.
 *
 * ```ts
 * const supervisor = new InProcessSupervisor(async (args) => {
 *   const runner = await connectToRunner(parseWorkerArgs(args), identity);
 *   serveTests(runner, tests);
 * });
 * const engine = await RunnerEngine.start({ worker: { executablePath: 'in-process' }, supervisor });
 * ```
 */
export class InProcessSupervisor implements WorkerSupervisor {
	private nextProcessId: number;
	private readonly workers = new WeakMap<WorkerHandle, InProcessHandle>();
	/** Every spawn request, oldest first */
	readonly launches: WorkerSpawnOptions[] = [];

	constructor(
		private readonly worker: InProcessWorker,
		options: { firstProcessId?: number } = {},
	) {
		this.nextProcessId = options.firstProcessId ?? 10_000;
	}

	async spawn(options: WorkerSpawnOptions): Promise<WorkerHandle> {
		this.launches.push(options);
		const handle = new InProcessHandle(this.nextProcessId++, options.connectionArgs.join(' '));
		this.workers.set(handle, handle);

		const control: InProcessWorkerControl = {
			processId: handle.processId,
			exit: (code = 0) => handle.exit(code, null),
			onShutdown: (handler) => {
				handle.shutdownHandler = handler;
			},
			stdout: (text) => {
				handle.stdout += text;
			},
			stderr: (text) => {
				handle.stderr += text;
			},
		};

		// Started after spawn() returns, the way a real process would be
		setImmediate(() => {
			Promise.resolve()
				.then(() => this.worker([...options.connectionArgs], control))
				.catch((err: unknown) => {
					handle.stderr += err instanceof Error ? (err.stack ?? err.message) : String(err);
					handle.exit(1, null);
				});
		});

		return handle;
	}

	async shutdown(handle: WorkerHandle, graceMillis: number): Promise<ShutdownOutcome> {
		const worker = this.lookup(handle);
		if (worker.hasExited) return 'exited';

		if (worker.shutdownRequests === 0) {
			worker.shutdownRequests++;
			if (worker.shutdownHandler) {
				worker.shutdownHandler();
			} else {
				worker.exit(0, null);
			}
		}

		if (worker.hasExited) return 'exited';
		return new Promise<ShutdownOutcome>((resolve) => {
			const timer = setTimeout(() => {
				unsubscribe();
				resolve('timed-out');
			}, graceMillis);
			const unsubscribe = worker.onExit(() => {
				clearTimeout(timer);
				resolve('exited');
			});
		});
	}

	kill(handle: WorkerHandle): void {
		this.lookup(handle).exit(null, 'SIGKILL');
	}

	onExit(handle: WorkerHandle, listener: (handle: WorkerHandle) => void): () => void {
		return this.lookup(handle).onExit(listener);
	}

	/** How many times shutdown() asked this worker to stop */
	shutdownRequests(handle: WorkerHandle): number {
		return this.lookup(handle).shutdownRequests;
	}

	private lookup(handle: WorkerHandle): InProcessHandle {
		const worker = this.workers.get(handle);
		if (!worker) {
			throw new Error(`Worker ${handle.processId} was not launched by this supervisor`);
		}
		return worker;
	}
}
