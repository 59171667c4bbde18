// ============================================================================
// testwire Worker - Public API
// Connect a worker process back to the runner that launched it.
// ============================================================================

export {
	RunnerConnection,
	connectToRunner,
	parseWorkerArgs,
	type RunnerEndpoint,
	type WorkerIdentity,
	type WorkerStream,
} from './worker.js';
export { matchesFilters, serveTests, type HostedTest } from './host.js';
