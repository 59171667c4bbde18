// ============================================================================
// testwire - Console Reporter
// Prints what the workers report as it arrives: discovered tests for `find`,
// one line per test for `run`, then a summary with timing statistics.
// ============================================================================

import type { WorkerMessage } from 'testwire-protocol';
import { type RunSummary, formatDuration } from 'testwire-runner';

export interface ReporterOptions {
	/** Where normal output goes (default: console.log) */
	write?: (line: string) => void;
	/** Where diagnostics and errors go (default: console.error) */
	writeError?: (line: string) => void;
	/** ANSI colours (default: true) */
	color?: boolean;
}

export interface TimingStats {
	min: number;
	max: number;
	avg: number;
	median: number;
	p95: number;
	total: number;
}

/** Min, max, mean, median and 95th percentile of test durations */
export function computeTimingStats(durations: readonly number[]): TimingStats {
	if (durations.length === 0) {
		return { min: 0, max: 0, avg: 0, median: 0, p95: 0, total: 0 };
	}

	const sorted = [...durations].sort((a, b) => a - b);
	const total = sorted.reduce((sum, d) => sum + d, 0);
	const at = (index: number) => sorted[Math.min(sorted.length - 1, Math.max(0, index))] ?? 0;

	return {
		min: at(0),
		max: at(sorted.length - 1),
		avg: Math.round(total / sorted.length),
		median: at(Math.floor(sorted.length / 2)),
		p95: at(Math.ceil(sorted.length * 0.95) - 1),
		total,
	};
}

const GREEN = 32;
const RED = 31;
const YELLOW = 33;
const DIM = 2;

export class ConsoleReporter {
	private readonly write: (line: string) => void;
	private readonly writeError: (line: string) => void;
	private readonly color: boolean;

	constructor(options: ReporterOptions = {}) {
		this.write = options.write ?? ((line) => console.log(line));
		this.writeError = options.writeError ?? ((line) => console.error(line));
		this.color = options.color ?? true;
	}

	private paint(code: number, text: string): string {
		return this.color ? `\x1b[${code}m${text}\x1b[0m` : text;
	}

	// -----------------------------------------------------------------------
	// Progress
	// -----------------------------------------------------------------------

	workerStarted(worker: string, framework: string): void {
		this.write(`\n  ${worker} ${this.paint(DIM, `(${framework})`)}`);
	}

	workerFailed(worker: string, error: Error): void {
		this.writeError(`  ${this.paint(RED, '✗')} ${worker}: ${error.message}`);
	}

	/** Engine and worker status lines */
	diagnostic(message: string): void {
		this.writeError(`  ${this.paint(DIM, `[testwire] ${message}`)}`);
	}

	/** One message from a worker's operation */
	message(message: WorkerMessage): void {
		switch (message.messageKind) {
			case 'test-case-discovered':
				this.write(`    ${message.payload.displayName}`);
				break;
			case 'discovery-complete':
				this.write(`  ${this.paint(DIM, `${message.payload.testCasesToRun} test case(s) found`)}`);
				break;
			case 'test-passed':
				this.write(
					`    ${this.paint(GREEN, '✓')} ${message.payload.displayName} ${this.paint(DIM, `(${message.payload.duration}ms)`)}`,
				);
				break;
			case 'test-failed':
				this.write(
					`    ${this.paint(RED, '✗')} ${message.payload.displayName} ${this.paint(DIM, `(${message.payload.duration}ms)`)}`,
				);
				for (const line of message.payload.message.split('\n')) {
					this.write(`      ${this.paint(RED, line)}`);
				}
				break;
			case 'test-skipped':
				this.write(`    ${this.paint(YELLOW, '-')} ${message.payload.displayName} ${this.paint(DIM, `(${message.payload.reason})`)}`);
				break;
			case 'diagnostic':
				this.diagnostic(message.payload.message);
				break;
			case 'error':
				this.writeError(`  ${this.paint(RED, `Worker error: ${message.payload.message}`)}`);
				break;
			default:
				break;
		}
	}

	// -----------------------------------------------------------------------
	// Summaries
	// -----------------------------------------------------------------------

	discoverySummary(total: number, workers: number): void {
		this.write('');
		this.write(`  Found ${total} test case(s) in ${workers} worker(s)`);
		this.write('');
	}

	summary(summary: RunSummary): void {
		const { total, passed, failed, skipped, duration } = summary;
		const timing = computeTimingStats(summary.results.filter((r) => r.status !== 'skipped').map((r) => r.duration));

		this.write('');
		this.write('  ─────────────────────────────────────');

		const parts: string[] = [];
		if (passed > 0) parts.push(this.paint(GREEN, `${passed} passed`));
		if (failed > 0) parts.push(this.paint(RED, `${failed} failed`));
		if (skipped > 0) parts.push(this.paint(YELLOW, `${skipped} skipped`));

		this.write(`  Tests:  ${parts.length > 0 ? `${parts.join(', ')} ` : ''}(${total} total)`);
		if (timing.total > 0) {
			this.write(
				`  Timing: avg ${formatDuration(timing.avg)} · p95 ${formatDuration(timing.p95)} · max ${formatDuration(timing.max)}`,
			);
		}
		this.write(`  Time:   ${formatDuration(duration)}`);
		this.write('');

		if (failed > 0) {
			this.write(`  ${this.paint(RED, 'Some tests failed.')}`);
		} else if (summary.error !== undefined) {
			this.write(`  ${this.paint(RED, 'Some workers did not finish.')}`);
		} else if (total === 0) {
			this.write('  No tests were run.');
		} else {
			this.write(`  ${this.paint(GREEN, 'All tests passed!')}`);
		}
		this.write('');
	}
}
