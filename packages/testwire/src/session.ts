// ============================================================================
// testwire - Session
// Runs one command against every configured worker. Workers go one after
// another, or all at once when assemblies may run in parallel. Every worker
// is disposed before the session ends, whatever happened to it.
// ============================================================================

import { basename } from 'node:path';
import { DEFAULT_SHUTDOWN_GRACE_MS } from 'testwire-engine';
import { TestwireError, type WorkerMessage, toError } from 'testwire-protocol';
import {
	type ControllerOptions,
	FrontController,
	type RunSummary,
	SpyMessageSink,
	type TestAssembly,
	type UserSettings,
	mergeSummaries,
	summarizeRun,
} from 'testwire-runner';
import type { Command } from './cli-options.js';
import type { ConsoleReporter } from './reporter.js';

export interface SessionOptions {
	command: Command;
	workers: TestAssembly[];
	settings: UserSettings;
	reporter: ConsoleReporter;
	/** Transport, timeouts, tracing, and the supervisor to launch workers with */
	controller?: ControllerOptions;
	/** How long each worker has to finish its find or run (default: 600000) */
	operationTimeoutMs?: number;
	/** How long each worker has to exit (default: 5000) */
	shutdownGraceMs?: number;
}

export interface SessionResult {
	/** Test cases found across all workers */
	discovered: number;
	/** Totals across all workers; empty for `find` */
	summary: RunSummary;
	/** 0 when everything passed, 1 otherwise */
	exitCode: number;
}

/** How long a worker may take over one find or run */
export const DEFAULT_OPERATION_TIMEOUT_MS = 600_000;

interface WorkerOutcome {
	discovered: number;
	summary: RunSummary;
}

/** Short name for a worker in the output */
export function workerName(assembly: TestAssembly): string {
	return basename(assembly.executablePath);
}

function failedOutcome(message: string): WorkerOutcome {
	return { discovered: 0, summary: { ...summarizeRun([]), error: message } };
}

/**
 * Run a command against every worker.
 * Never throws for a worker that fails; the failure lands in the result.
 */
export async function runSession(options: SessionOptions): Promise<SessionResult> {
	const concurrent = options.settings.parallel === 'assemblies' || options.settings.parallel === 'all';

	let outcomes: WorkerOutcome[];
	if (concurrent) {
		outcomes = await Promise.all(options.workers.map((worker) => runWorker(worker, options)));
	} else {
		outcomes = [];
		for (const worker of options.workers) {
			outcomes.push(await runWorker(worker, options));
		}
	}

	const discovered = outcomes.reduce((sum, outcome) => sum + outcome.discovered, 0);
	const summary = mergeSummaries(outcomes.map((outcome) => outcome.summary));

	if (options.command === 'find') {
		options.reporter.discoverySummary(discovered, options.workers.length);
	} else {
		options.reporter.summary(summary);
	}

	const failed = summary.failed > 0 || summary.error !== undefined;
	return { discovered, summary, exitCode: failed ? 1 : 0 };
}

async function runWorker(assembly: TestAssembly, options: SessionOptions): Promise<WorkerOutcome> {
	const { reporter } = options;
	const name = workerName(assembly);

	const controller = await FrontController.forDiscoveryAndExecution(assembly, {
		diagnostics: (message) => reporter.diagnostic(`${name}: ${message}`),
		...options.controller,
	}).catch((err: unknown) => toError(err));
	if (controller instanceof Error) {
		reporter.workerFailed(name, controller);
		return failedOutcome(`${name}: ${controller.message}`);
	}

	try {
		reporter.workerStarted(name, await controller.testFrameworkDisplayName());

		const spy = new SpyMessageSink(options.command === 'find' ? 'find' : 'find-and-run');
		const sink = (message: WorkerMessage) => {
			reporter.message(message);
			return spy.sink(message);
		};
		const operation =
			options.command === 'find'
				? await controller.find(sink, options.settings)
				: await controller.findAndRun(sink, options.settings);

		const reason = await withDeadline(
			operation.closed,
			options.operationTimeoutMs ?? DEFAULT_OPERATION_TIMEOUT_MS,
			operation.kind,
		);
		if (!spy.isFinished) {
			const cause = controller.engine.fault;
			throw new TestwireError(
				`Worker stopped answering before the ${operation.kind} finished (${reason})${cause ? `: ${cause.message}` : ''}`,
			);
		}

		const summary = summarizeRun(spy.messages);
		if (summary.error !== undefined) summary.error = `${name}: ${summary.error}`;
		return { discovered: spy.ofKind('test-case-discovered').length, summary };
	} catch (err) {
		const error = toError(err);
		reporter.workerFailed(name, error);
		return failedOutcome(`${name}: ${error.message}`);
	} finally {
		await controller.dispose({
			graceMillis: options.shutdownGraceMs ?? DEFAULT_SHUTDOWN_GRACE_MS,
			onShutdownTimeout: 'kill',
		});
	}
}

/** A worker that stays connected but never finishes must not hold the session forever */
async function withDeadline<T>(closed: Promise<T>, timeoutMs: number, kind: string): Promise<T> {
	let timer: NodeJS.Timeout | undefined;
	const deadline = new Promise<never>((_, reject) => {
		timer = setTimeout(() => {
			reject(
				new TestwireError(`Worker did not finish the ${kind} within ${timeoutMs}ms`, {
					hint: 'Raise --runtimeout (or "runTimeout" in the config) if the tests need longer.',
				}),
			);
		}, timeoutMs);
	});
	try {
		return await Promise.race([closed, deadline]);
	} finally {
		clearTimeout(timer);
	}
}
