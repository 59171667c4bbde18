// ============================================================================
// testwire Protocol - Error Taxonomy
// Every failure the runner can report, from a worker that won't launch to a
// worker that won't exit. Each error says what happened and, where possible,
// what to look at next.
// ============================================================================

/**
 * Base class for all testwire errors.
 */
export class TestwireError extends Error {
	override readonly name: string = 'TestwireError';

	/** Hint for how to fix the issue */
	readonly hint?: string;

	constructor(message: string, options: { hint?: string; cause?: unknown } = {}) {
		super(options.hint ? `${message}\nHint: ${options.hint}` : message);
		this.hint = options.hint;
		if (options.cause !== undefined) {
			this.cause = options.cause;
		}
	}
}

/**
 * The worker executable is missing or the OS refused to start it.
 * Fatal: surfaced to whoever asked for the engine.
 */
export class SpawnError extends TestwireError {
	override readonly name = 'SpawnError';
	readonly executablePath: string;

	constructor(executablePath: string, reason: string, cause?: unknown) {
		super(`Could not launch worker '${executablePath}': ${reason}`, {
			hint: 'Check that the path points at an executable file and that it is built.',
			cause,
		});
		this.executablePath = executablePath;
	}
}

/**
 * A malformed frame, an unknown message kind, or a failed handshake.
 * Fatal to the connection.
 */
export class ProtocolError extends TestwireError {
	override readonly name = 'ProtocolError';
}

/**
 * The engine did not reach the connected state within the wait window.
 * Recoverable: the caller may retry or give up.
 */
export class EngineNotReadyError extends TestwireError {
	override readonly name = 'EngineNotReadyError';
	/** State the engine was in when the wait gave up */
	readonly state: string;
	/** How long the caller waited (ms) */
	readonly elapsed: number;

	constructor(state: string, elapsed: number, reason?: string) {
		super(
			`Runner engine is not connected (state: ${state}, waited ${elapsed}ms)${reason ? `: ${reason}` : ''}`,
			{ hint: 'Make sure the worker connects back to the address it was given on its command line.' },
		);
		this.state = state;
		this.elapsed = elapsed;
	}
}

/**
 * The worker process did not exit within the shutdown grace period.
 * Non-fatal: reported as a diagnostic, never thrown out of disposal.
 */
export class ShutdownTimeoutError extends TestwireError {
	override readonly name = 'ShutdownTimeoutError';
	readonly processId: number;
	readonly graceMillis: number;

	constructor(processId: number, graceMillis: number) {
		super(
			`Worker process ${processId} did not exit within ${graceMillis}ms; it may need to be stopped manually`,
		);
		this.processId = processId;
		this.graceMillis = graceMillis;
	}
}

/**
 * The requested operation has no wire shape and is refused explicitly.
 */
export class OperationNotSupportedError extends TestwireError {
	override readonly name = 'OperationNotSupportedError';

	constructor(operation: string) {
		super(`Operation '${operation}' is not supported by out-of-process workers`, {
			hint: 'Use findAndRun() with filters to execute a subset of tests.',
		});
	}
}

/**
 * An invalid settings value, config file, or command-line flag.
 */
export class ConfigError extends TestwireError {
	override readonly name = 'ConfigError';
}

/** Normalise anything thrown into an Error */
export function toError(err: unknown): Error {
	return err instanceof Error ? err : new Error(String(err));
}
