// ============================================================================
// testwire Engine - Operation Registry
// Routes inbound messages to the sink of the operation that asked for them.
// Owned by one RunnerEngine and never handed out.
// ============================================================================

import type { MessageSink, WorkerMessage } from 'testwire-protocol';

/** An in-flight find or find-and-run operation */
export interface PendingOperation {
	token: string;
	sink: MessageSink;
	createdAt: number;
}

/**
 * Map from operation token to sink.
 *
 * No method awaits, so register/dispatch/unregister never interleave on the
 * event loop. Messages for one token reach its sink in dispatch order.
 */
export class OperationRegistry {
	private readonly operations = new Map<string, PendingOperation>();

	/**
	 * Start routing messages for a token.
	 *
	 * @throws Error if the token is already registered
	 */
	register(token: string, sink: MessageSink): void {
		if (this.operations.has(token)) {
			throw new Error(`Operation token "${token}" is already registered`);
		}
		this.operations.set(token, { token, sink, createdAt: Date.now() });
	}

	/**
	 * Deliver a message to the token's sink.
	 *
	 * @returns false when the token is unknown or the sink asked to stop.
	 * A sink that throws propagates to the caller.
	 */
	dispatch(token: string, message: WorkerMessage): boolean {
		const operation = this.operations.get(token);
		if (!operation) return false;
		return operation.sink(message);
	}

	/** Stop routing messages for a token. Safe to call more than once. */
	unregister(token: string): boolean {
		return this.operations.delete(token);
	}

	has(token: string): boolean {
		return this.operations.has(token);
	}

	get(token: string): Readonly<PendingOperation> | undefined {
		return this.operations.get(token);
	}

	/** Tokens currently registered, oldest first */
	tokens(): string[] {
		return [...this.operations.keys()];
	}

	get size(): number {
		return this.operations.size;
	}

	/** Drop every operation; returns the tokens that were pending */
	clear(): string[] {
		const tokens = this.tokens();
		this.operations.clear();
		return tokens;
	}
}
