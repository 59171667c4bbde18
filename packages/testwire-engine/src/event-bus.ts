// ============================================================================
// testwire Engine - EventBus
// Type-safe lifecycle events for one runner engine.
// Reporters, the CLI, and the engine's own readiness waits plug into these.
// ============================================================================

import type { MessageKind } from 'testwire-protocol';
import type { EngineState } from './state.js';

// ---------------------------------------------------------------------------
// Event Map - every event and its payload
// ---------------------------------------------------------------------------

/** Why an operation stopped receiving messages */
export type OperationCloseReason = 'completed' | 'sink-threw' | 'unregistered' | 'faulted' | 'disposed';

export interface EngineEvents {
	// State machine
	'state:change': { from: EngineState; to: EngineState };
	'fault': { error: Error };

	// Worker process
	'worker:spawn': { processId: number; connectionParam: string };
	'worker:exit': { processId: number; exitCode: number | null; signal: string | null };

	// Connection
	'connection:accept': { address: string };
	'connection:reject': { reason: string };
	'handshake': { testFrameworkDisplayName: string; testAssemblyUniqueId: string };

	// Operations
	'operation:open': { token: string };
	'operation:send': { token: string; messageKind: string };
	'operation:close': { token: string; reason: OperationCloseReason };
	'message:unroutable': { token: string; messageKind: MessageKind };
}

export type EngineEventName = keyof EngineEvents;

export type EventListener<K extends EngineEventName> = (payload: EngineEvents[K]) => void;

/** Entry kept while history recording is on */
export interface HistoryEntry {
	event: EngineEventName;
	payload: unknown;
	timestamp: number;
}

// ---------------------------------------------------------------------------
// EventBus
// ---------------------------------------------------------------------------

/**
 * Synchronous event bus. Listeners run in registration order during emit().
 *
 * ```ts
 * const bus = new EngineEventBus();
 * bus.on('state:change', ({ from, to }) => console.log(`${from} -> ${to}`));
 * ```
 *
 * A listener that throws is reported through `onListenerError` and the
 * remaining listeners still run.
 */
export class EngineEventBus {
	private listeners = new Map<EngineEventName, Set<EventListener<never>>>();
	private history: HistoryEntry[] = [];
	private recordHistory = false;
	private readonly onListenerError: (event: EngineEventName, error: unknown) => void;

	constructor(options: { onListenerError?: (event: EngineEventName, error: unknown) => void } = {}) {
		this.onListenerError =
			options.onListenerError ??
			((event, error) => {
				const message = error instanceof Error ? error.message : String(error);
				console.warn(`[testwire] listener for "${event}" threw: ${message}`);
			});
	}

	// -----------------------------------------------------------------------
	// Subscription
	// -----------------------------------------------------------------------

	/** Register a listener. Returns an unsubscribe function. */
	on<K extends EngineEventName>(event: K, listener: EventListener<K>): () => void {
		let set = this.listeners.get(event);
		if (!set) {
			set = new Set();
			this.listeners.set(event, set);
		}
		const entry = listener as EventListener<never>;
		set.add(entry);

		return () => {
			const current = this.listeners.get(event);
			if (!current) return;
			current.delete(entry);
			if (current.size === 0) this.listeners.delete(event);
		};
	}

	/** Register a listener that removes itself after the first call */
	once<K extends EngineEventName>(event: K, listener: EventListener<K>): () => void {
		const unsubscribe = this.on(event, (payload) => {
			unsubscribe();
			listener(payload);
		});
		return unsubscribe;
	}

	/** Remove all listeners for one event, or for every event */
	off(event?: EngineEventName): void {
		if (event) {
			this.listeners.delete(event);
		} else {
			this.listeners.clear();
		}
	}

	// -----------------------------------------------------------------------
	// Emission
	// -----------------------------------------------------------------------

	emit<K extends EngineEventName>(event: K, payload: EngineEvents[K]): void {
		if (this.recordHistory) {
			this.history.push({ event, payload, timestamp: Date.now() });
		}

		const set = this.listeners.get(event);
		if (!set) return;

		// Snapshot so once() listeners can unsubscribe mid-emit
		for (const listener of [...set]) {
			try {
				(listener as EventListener<K>)(payload);
			} catch (err) {
				this.onListenerError(event, err);
			}
		}
	}

	// -----------------------------------------------------------------------
	// Introspection
	// -----------------------------------------------------------------------

	listenerCount(event?: EngineEventName): number {
		if (event) {
			return this.listeners.get(event)?.size ?? 0;
		}
		let total = 0;
		for (const set of this.listeners.values()) {
			total += set.size;
		}
		return total;
	}

	// -----------------------------------------------------------------------
	// History (for debugging / test assertions)
	// -----------------------------------------------------------------------

	enableHistory(): void {
		this.recordHistory = true;
	}

	disableHistory(): void {
		this.recordHistory = false;
		this.history = [];
	}

	getHistory(): ReadonlyArray<HistoryEntry> {
		return this.history;
	}

	/** Payloads of one event type, oldest first */
	getEventsOfType<K extends EngineEventName>(event: K): Array<EngineEvents[K]> {
		return this.history
			.filter((h) => h.event === event)
			.map((h) => h.payload as EngineEvents[K]);
	}
}
