// ============================================================================
// testwire Engine - Connection State Machine
//
//   not-started -> listening -> connected -> closed
//         \____________\____________\______> faulted
//
// Forward only. 'faulted' is reachable from every non-terminal state.
// ============================================================================

export type EngineState = 'not-started' | 'listening' | 'connected' | 'closed' | 'faulted';

const ORDER: Record<EngineState, number> = {
	'not-started': 0,
	listening: 1,
	connected: 2,
	closed: 3,
	faulted: 4,
};

/** 'closed' and 'faulted' never change again */
export function isTerminal(state: EngineState): boolean {
	return state === 'closed' || state === 'faulted';
}

/** Whether the engine may move from one state to another */
export function canTransition(from: EngineState, to: EngineState): boolean {
	if (isTerminal(from)) return false;
	if (to === 'faulted') return true;
	// Disposal may close an engine that never connected
	if (to === 'closed') return true;
	return ORDER[to] === ORDER[from] + 1;
}
