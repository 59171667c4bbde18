// ============================================================================
// testwire Runner - Run Summary
// Folds the messages of one find-and-run pass into per-test results and
// totals. The worker's own run-complete counts win over the folded ones.
// ============================================================================

import type { WorkerMessage } from 'testwire-protocol';

/** Result of a single test */
export interface TestResult {
	testCaseUniqueId: string;
	displayName: string;
	status: 'passed' | 'failed' | 'skipped';
	/** Milliseconds; 0 for skipped tests */
	duration: number;
	/** Failure message or skip reason */
	message?: string;
	stackTrace?: string;
	/** Output the test wrote while running */
	output: string;
}

/** Summary of a full run */
export interface RunSummary {
	total: number;
	passed: number;
	failed: number;
	skipped: number;
	/** Milliseconds */
	duration: number;
	results: TestResult[];
	/** Set when the worker answered with an error instead of completing */
	error?: string;
}

/**
 * Build a summary from a find-and-run message stream.
 * Messages for other operations must already be filtered out.
 */
export function summarizeRun(messages: readonly WorkerMessage[]): RunSummary {
	const results: TestResult[] = [];
	const output = new Map<string, string>();
	let complete: { total: number; failed: number; skipped: number; duration: number } | null = null;
	let error: string | undefined;

	for (const message of messages) {
		switch (message.messageKind) {
			case 'test-output':
				output.set(
					message.payload.testCaseUniqueId,
					(output.get(message.payload.testCaseUniqueId) ?? '') + message.payload.output,
				);
				break;
			case 'test-passed':
				results.push({
					testCaseUniqueId: message.payload.testCaseUniqueId,
					displayName: message.payload.displayName,
					status: 'passed',
					duration: message.payload.duration,
					output: '',
				});
				break;
			case 'test-failed':
				results.push({
					testCaseUniqueId: message.payload.testCaseUniqueId,
					displayName: message.payload.displayName,
					status: 'failed',
					duration: message.payload.duration,
					message: message.payload.message,
					stackTrace: message.payload.stackTrace,
					output: '',
				});
				break;
			case 'test-skipped':
				results.push({
					testCaseUniqueId: message.payload.testCaseUniqueId,
					displayName: message.payload.displayName,
					status: 'skipped',
					duration: 0,
					message: message.payload.reason,
					output: '',
				});
				break;
			case 'run-complete':
				complete = {
					total: message.payload.testsTotal,
					failed: message.payload.testsFailed,
					skipped: message.payload.testsSkipped,
					duration: message.payload.duration,
				};
				break;
			case 'error':
				error = message.payload.message;
				break;
			default:
				break;
		}
	}

	for (const result of results) {
		result.output = output.get(result.testCaseUniqueId) ?? '';
	}

	const failed = complete?.failed ?? results.filter((r) => r.status === 'failed').length;
	const skipped = complete?.skipped ?? results.filter((r) => r.status === 'skipped').length;
	const total = complete?.total ?? results.length;

	return {
		total,
		passed: Math.max(0, total - failed - skipped),
		failed,
		skipped,
		duration: complete?.duration ?? results.reduce((sum, r) => sum + r.duration, 0),
		results,
		...(error !== undefined ? { error } : {}),
	};
}

/** Add several summaries together, e.g. one per worker */
export function mergeSummaries(summaries: readonly RunSummary[]): RunSummary {
	const errors = summaries.flatMap((s) => (s.error !== undefined ? [s.error] : []));
	return {
		total: summaries.reduce((sum, s) => sum + s.total, 0),
		passed: summaries.reduce((sum, s) => sum + s.passed, 0),
		failed: summaries.reduce((sum, s) => sum + s.failed, 0),
		skipped: summaries.reduce((sum, s) => sum + s.skipped, 0),
		duration: summaries.reduce((sum, s) => sum + s.duration, 0),
		results: summaries.flatMap((s) => s.results),
		...(errors.length > 0 ? { error: errors.join('\n') } : {}),
	};
}

/** Human-friendly duration: 850ms, 4.2s, 2m 5.0s */
export function formatDuration(ms: number): string {
	if (ms < 1000) return `${Math.round(ms)}ms`;
	if (ms < 60_000) return `${(ms / 1000).toFixed(1)}s`;
	const minutes = Math.floor(ms / 60_000);
	const seconds = ((ms % 60_000) / 1000).toFixed(1);
	return `${minutes}m ${seconds}s`;
}
