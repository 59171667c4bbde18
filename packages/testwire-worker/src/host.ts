// ============================================================================
// testwire Worker - Test Host
// Answers find and find-and-run requests for a fixed list of test functions.
// Enough to build a real worker from plain functions, and the stand-in
// worker the runner's own tests talk to.
// ============================================================================

import type { FindAndRunRequest, FindRequest, RunnerRequest, TestFilters, WorkerMessage } from 'testwire-protocol';
import type { RunnerConnection } from './worker.js';

/** One test the host can discover and run */
export interface HostedTest {
	/** Unique within the worker */
	id: string;
	displayName?: string;
	className?: string;
	methodName?: string;
	namespace?: string;
	traits?: Record<string, string[]>;
	/** Skip reason; a skipped test never runs */
	skip?: string;
	/** Throw (or reject) to fail. Output written through `output` is reported. */
	run?: (output: (text: string) => void) => void | Promise<void>;
}

// ---------------------------------------------------------------------------
// Filtering
// ---------------------------------------------------------------------------

function matchesTraits(traits: Record<string, string[]>, wanted: Record<string, string[]>): boolean {
	return Object.entries(wanted).some(([name, values]) =>
		values.some((value) => traits[name]?.includes(value) ?? false),
	);
}

/**
 * Whether a test passes the filters. Each non-empty include list must match,
 * and any exclude match removes the test.
 */
export function matchesFilters(test: HostedTest, filters: TestFilters): boolean {
	const traits = test.traits ?? {};
	const included = (list: string[], value: string | undefined) =>
		list.length === 0 || (value !== undefined && list.includes(value));
	const excluded = (list: string[], value: string | undefined) => value !== undefined && list.includes(value);

	if (!included(filters.includedClasses, test.className)) return false;
	if (!included(filters.includedMethods, test.methodName)) return false;
	if (!included(filters.includedNamespaces, test.namespace)) return false;
	if (Object.keys(filters.includedTraits).length > 0 && !matchesTraits(traits, filters.includedTraits)) {
		return false;
	}

	if (excluded(filters.excludedClasses, test.className)) return false;
	if (excluded(filters.excludedMethods, test.methodName)) return false;
	if (excluded(filters.excludedNamespaces, test.namespace)) return false;
	return !matchesTraits(traits, filters.excludedTraits);
}

// ---------------------------------------------------------------------------
// Host
// ---------------------------------------------------------------------------

/**
 * Serve requests from the runner until the connection closes.
 *
 * Each request is answered with its own token; a request that fails inside
 * the host is answered with an `error` message.
 */
export function serveTests(runner: RunnerConnection, tests: readonly HostedTest[]): void {
	runner.onRequest((request) => {
		handle(runner, tests, request).catch((err: unknown) => {
			const error = err instanceof Error ? err : new Error(String(err));
			if (runner.isOpen) {
				runner.send({
					operationToken: request.operationToken,
					messageKind: 'error',
					payload: { message: error.message, stackTrace: error.stack },
				});
			}
		});
	});
}

async function handle(runner: RunnerConnection, tests: readonly HostedTest[], request: RunnerRequest): Promise<void> {
	const send = (message: WorkerMessage) => {
		// Messages for a closed connection have nowhere to go
		if (runner.isOpen) runner.send(message);
	};

	const selected = discover(send, tests, request);
	if (request.messageKind === 'find') return;

	await execute(send, selected, request);
}

function discover(
	send: (message: WorkerMessage) => void,
	tests: readonly HostedTest[],
	request: FindRequest | FindAndRunRequest,
): HostedTest[] {
	const { operationToken: token, payload } = request;
	const { options, filters } = payload;
	send({ operationToken: token, messageKind: 'discovery-starting', payload: {} });

	const selected = tests.filter((test) => matchesFilters(test, filters));
	for (const test of selected) {
		send({
			operationToken: token,
			messageKind: 'test-case-discovered',
			payload: {
				testCaseUniqueId: test.id,
				displayName: test.displayName ?? test.id,
				className: test.className,
				methodName: test.methodName,
				namespace: test.namespace,
				traits: test.traits ?? {},
			},
		});
	}

	if (options.diagnosticMessages) {
		send({
			operationToken: token,
			messageKind: 'diagnostic',
			payload: { message: `Discovered ${selected.length} of ${tests.length} test(s)` },
		});
	}
	send({ operationToken: token, messageKind: 'discovery-complete', payload: { testCasesToRun: selected.length } });
	return selected;
}

async function execute(
	send: (message: WorkerMessage) => void,
	selected: HostedTest[],
	request: FindAndRunRequest,
): Promise<void> {
	const token = request.operationToken;
	const { execution } = request.payload;
	const started = Date.now();
	let failed = 0;
	let skipped = 0;
	let total = 0;

	send({ operationToken: token, messageKind: 'run-starting', payload: { testCaseCount: selected.length } });

	for (const test of selected) {
		const ref = { testCaseUniqueId: test.id, displayName: test.displayName ?? test.id };
		total++;

		if (test.skip !== undefined) {
			if (execution.failSkips) {
				failed++;
				send({
					operationToken: token,
					messageKind: 'test-failed',
					payload: { ...ref, duration: 0, message: `Skipped test treated as a failure: ${test.skip}` },
				});
			} else {
				skipped++;
				send({ operationToken: token, messageKind: 'test-skipped', payload: { ...ref, reason: test.skip } });
			}
		} else {
			send({ operationToken: token, messageKind: 'test-starting', payload: ref });
			const testStarted = Date.now();
			try {
				await test.run?.((output) => {
					send({ operationToken: token, messageKind: 'test-output', payload: { testCaseUniqueId: test.id, output } });
				});
				send({ operationToken: token, messageKind: 'test-passed', payload: { ...ref, duration: Date.now() - testStarted } });
			} catch (err) {
				failed++;
				const error = err instanceof Error ? err : new Error(String(err));
				send({
					operationToken: token,
					messageKind: 'test-failed',
					payload: {
						...ref,
						duration: Date.now() - testStarted,
						message: error.message,
						stackTrace: error.stack,
					},
				});
			}
		}

		if (execution.stopOnFail && failed > 0) break;
	}

	send({
		operationToken: token,
		messageKind: 'run-complete',
		payload: { testsTotal: total, testsFailed: failed, testsSkipped: skipped, duration: Date.now() - started },
	});
}
