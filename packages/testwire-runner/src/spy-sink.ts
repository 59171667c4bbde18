// ============================================================================
// testwire Runner - Spy Message Sink
// Collects every message for one operation and resolves once the operation
// reaches its terminal message.
// ============================================================================

import type { MessageKind, MessageOf, MessageSink, WorkerMessage } from 'testwire-protocol';

/** The two request kinds a sink can be attached to */
export type OperationKind = 'find' | 'find-and-run';

const TERMINAL_KINDS: Record<OperationKind, readonly MessageKind[]> = {
	'find': ['discovery-complete', 'error'],
	'find-and-run': ['run-complete', 'error'],
};

/** Whether a message ends an operation of the given kind */
export function isTerminalMessage(operation: OperationKind, message: WorkerMessage): boolean {
	return TERMINAL_KINDS[operation].includes(message.messageKind);
}

/**
 * Records the messages of one operation.
 *
 * ```ts
 * const spy = new SpyMessageSink('find');
 * await controller.find(spy.sink);
 * const messages = await spy.finished;
 * ```
 */
export class SpyMessageSink {
	readonly messages: WorkerMessage[] = [];
	/** Resolves with every message once the terminal message arrives */
	readonly finished: Promise<WorkerMessage[]>;

	private resolveFinished: (messages: WorkerMessage[]) => void = () => {};
	private done = false;

	constructor(readonly operation: OperationKind = 'find-and-run') {
		this.finished = new Promise((resolve) => {
			this.resolveFinished = resolve;
		});
	}

	/** The sink to hand to the front controller */
	readonly sink: MessageSink = (message) => {
		if (this.done) return false;
		this.messages.push(message);
		if (isTerminalMessage(this.operation, message)) {
			this.done = true;
			this.resolveFinished(this.messages);
			return false;
		}
		return true;
	};

	get isFinished(): boolean {
		return this.done;
	}

	/** Messages of one kind, in arrival order */
	ofKind<K extends MessageKind>(kind: K): MessageOf<K>[] {
		return this.messages.filter((message): message is MessageOf<K> => message.messageKind === kind);
	}
}
