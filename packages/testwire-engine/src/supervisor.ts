// ============================================================================
// testwire Engine - Worker Supervisor
// Launches the worker executable with its connection arguments, watches it,
// and stops it on request. Owns process identity and exit status only; it
// never reads or writes protocol bytes.
// ============================================================================

import { type ChildProcess, spawn } from 'node:child_process';
import { dirname, isAbsolute, sep } from 'node:path';
import { SpawnError } from 'testwire-protocol';

/** How much of each output stream is kept for diagnostics (64 KiB) */
const OUTPUT_TAIL_CHARS = 64 * 1024;

/** Options for launching a worker */
export interface WorkerSpawnOptions {
	/** Worker executable (a test binary, or node for a script worker) */
	executablePath: string;
	/** Arguments placed before the connection arguments */
	args?: string[];
	/** Arguments that tell the worker where to connect, e.g. ['--tcp', '51234'] */
	connectionArgs: string[];
	/** Working directory (default: the executable's directory, or ours for a bare command name) */
	workingDirectory?: string;
	/** Environment (default: this process's environment) */
	env?: NodeJS.ProcessEnv;
}

/** Read-only view of a launched worker. Only the supervisor updates it. */
export interface WorkerHandle {
	readonly processId: number;
	/** The connection arguments, joined with spaces */
	readonly connectionParam: string;
	readonly startedAt: number;
	readonly hasExited: boolean;
	/** null when the worker was ended by a signal; undefined while it runs */
	readonly exitCode: number | null | undefined;
	readonly signal: NodeJS.Signals | null;
	/** Tail of everything the worker wrote to stdout */
	readonly stdout: string;
	/** Tail of everything the worker wrote to stderr */
	readonly stderr: string;
}

export type ShutdownOutcome = 'exited' | 'timed-out';

export interface WorkerSupervisor {
	/**
	 * Launch a worker.
	 *
	 * @throws SpawnError when the executable is missing or the OS refuses it
	 */
	spawn(options: WorkerSpawnOptions): Promise<WorkerHandle>;
	/**
	 * Ask the worker to stop and wait up to graceMillis for it to exit.
	 * Sends at most one termination signal per worker and never force-kills.
	 */
	shutdown(handle: WorkerHandle, graceMillis: number): Promise<ShutdownOutcome>;
	/** Forced termination, for callers whose policy is to escalate */
	kill(handle: WorkerHandle): void;
	/** Called once when the worker exits (immediately if it already has) */
	onExit(handle: WorkerHandle, listener: (handle: WorkerHandle) => void): () => void;
}

// ---------------------------------------------------------------------------
// Child-process implementation
// ---------------------------------------------------------------------------

class ManagedWorker implements WorkerHandle {
	readonly startedAt = Date.now();
	private code: number | null | undefined = undefined;
	private exitSignal: NodeJS.Signals | null = null;
	private out = '';
	private err = '';
	private listeners = new Set<(handle: WorkerHandle) => void>();
	/** Set once SIGTERM has been sent */
	terminationRequested = false;

	constructor(
		readonly process: ChildProcess,
		readonly processId: number,
		readonly connectionParam: string,
	) {
		process.stdout?.on('data', (chunk: Buffer) => {
			this.out = tail(this.out + chunk.toString('utf-8'));
		});
		process.stderr?.on('data', (chunk: Buffer) => {
			this.err = tail(this.err + chunk.toString('utf-8'));
		});
		process.once('exit', (code, signal) => {
			this.code = code;
			this.exitSignal = signal;
			const listeners = [...this.listeners];
			this.listeners.clear();
			for (const listener of listeners) listener(this);
		});
	}

	get hasExited(): boolean {
		return this.code !== undefined;
	}

	get exitCode(): number | null | undefined {
		return this.code;
	}

	get signal(): NodeJS.Signals | null {
		return this.exitSignal;
	}

	get stdout(): string {
		return this.out;
	}

	get stderr(): string {
		return this.err;
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

	/** Resolves true on exit, false if graceMillis passes first */
	waitForExit(graceMillis: number): Promise<boolean> {
		return new Promise<boolean>((resolve) => {
			const timer = setTimeout(() => {
				unsubscribe();
				resolve(false);
			}, graceMillis);
			const unsubscribe = this.onExit(() => {
				clearTimeout(timer);
				resolve(true);
			});
		});
	}
}

/**
 * Supervises workers as local child processes.
 *
 * ```ts
 * const supervisor = new ProcessSupervisor();
 * const handle = await supervisor.spawn({
 *   executablePath: '/path/to/tests',
 *   connectionArgs: ['--tcp', '51234'],
 * });
 * // ...
 * if ((await supervisor.shutdown(handle, 5000)) === 'timed-out') supervisor.kill(handle);
 * ```
 */
export class ProcessSupervisor implements WorkerSupervisor {
	private readonly workers = new WeakMap<WorkerHandle, ManagedWorker>();

	async spawn(options: WorkerSpawnOptions): Promise<WorkerHandle> {
		const { executablePath } = options;
		const args = [...(options.args ?? []), ...options.connectionArgs];
		let child: ChildProcess;
		try {
			child = spawn(executablePath, args, {
				cwd: options.workingDirectory ?? defaultWorkingDirectory(executablePath),
				env: options.env ?? process.env,
				stdio: ['ignore', 'pipe', 'pipe'],
				windowsHide: true,
			});
		} catch (err) {
			throw new SpawnError(executablePath, err instanceof Error ? err.message : String(err), err);
		}

		await new Promise<void>((resolve, reject) => {
			const onError = (err: Error) => {
				child.off('spawn', onSpawn);
				const reason = 'code' in err && err.code === 'ENOENT' ? `executable not found (${err.message})` : err.message;
				reject(new SpawnError(executablePath, reason, err));
			};
			const onSpawn = () => {
				child.off('error', onError);
				resolve();
			};
			child.once('error', onError);
			child.once('spawn', onSpawn);
		});

		if (child.pid === undefined) {
			throw new SpawnError(executablePath, 'the OS did not report a process id');
		}

		// Later errors (e.g. a failed kill) surface as exit status, not as a crash
		child.on('error', (err) => {
			console.warn(`[testwire] worker ${child.pid ?? '?'} reported: ${err.message}`);
		});

		const worker = new ManagedWorker(child, child.pid, options.connectionArgs.join(' '));
		this.workers.set(worker, worker);
		return worker;
	}

	async shutdown(handle: WorkerHandle, graceMillis: number): Promise<ShutdownOutcome> {
		const worker = this.lookup(handle);
		if (worker.hasExited) return 'exited';

		if (!worker.terminationRequested) {
			worker.terminationRequested = true;
			worker.process.kill('SIGTERM');
		}

		return (await worker.waitForExit(graceMillis)) ? 'exited' : 'timed-out';
	}

	kill(handle: WorkerHandle): void {
		const worker = this.lookup(handle);
		if (worker.hasExited) return;
		worker.process.kill('SIGKILL');
	}

	onExit(handle: WorkerHandle, listener: (handle: WorkerHandle) => void): () => void {
		return this.lookup(handle).onExit(listener);
	}

	private lookup(handle: WorkerHandle): ManagedWorker {
		const worker = this.workers.get(handle);
		if (!worker) {
			throw new Error(`Worker ${handle.processId} was not launched by this supervisor`);
		}
		return worker;
	}
}

/** A bare command name is looked up on PATH and runs where we run */
function defaultWorkingDirectory(executablePath: string): string | undefined {
	const hasDirectory = isAbsolute(executablePath) || executablePath.includes('/') || executablePath.includes(sep);
	return hasDirectory ? dirname(executablePath) : undefined;
}

function tail(text: string): string {
	return text.length > OUTPUT_TAIL_CHARS ? text.slice(-OUTPUT_TAIL_CHARS) : text;
}
