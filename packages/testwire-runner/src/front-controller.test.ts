import { EngineNotReadyError, OperationNotSupportedError, type WorkerMessage } from 'testwire-protocol';
import { InProcessSupervisor, type InProcessWorker } from 'testwire-engine';
import { type HostedTest, connectToRunner, parseWorkerArgs, serveTests } from 'testwire-worker';
import { afterEach, describe, expect, it } from 'vitest';
import { FrontController, type TestAssembly, mintOperationToken } from './front-controller.js';
import { summarizeRun } from './run-summary.js';
import { SpyMessageSink } from './spy-sink.js';

const identity = {
	testFrameworkDisplayName: 'fake-framework 2.1',
	testAssemblyUniqueId: 'calculator-tests',
	targetFramework: 'node20',
};

const tests: HostedTest[] = [
	{
		id: 'math.add',
		displayName: 'Math.add sums two numbers',
		className: 'Math',
		methodName: 'add',
		run: (output) => output('1 + 2 = 3'),
	},
	{
		id: 'math.divide',
		className: 'Math',
		methodName: 'divide',
		run: () => {
			throw new Error('expected 2, got Infinity');
		},
	},
	{ id: 'strings.trim', className: 'Strings', methodName: 'trim', traits: { category: ['slow'] }, skip: 'not ready' },
];

const controllers: FrontController[] = [];

afterEach(async () => {
	await Promise.all(controllers.splice(0).map((controller) => controller.dispose({ graceMillis: 100 })));
});

function hostingWorker(hosted: HostedTest[] = tests): InProcessWorker {
	return async (args) => {
		const runner = await connectToRunner(parseWorkerArgs(args), identity);
		serveTests(runner, hosted);
	};
}

async function launch(
	worker: InProcessWorker = hostingWorker(),
	assembly: Partial<TestAssembly> = {},
): Promise<{ controller: FrontController; supervisor: InProcessSupervisor; diagnostics: string[] }> {
	const supervisor = new InProcessSupervisor(worker);
	const diagnostics: string[] = [];
	const controller = await FrontController.forDiscoveryAndExecution(
		{ executablePath: 'calculator-tests', ...assembly },
		{ supervisor, diagnostics: (message) => diagnostics.push(message), transport: 'tcp', readyTimeoutMs: 5000 },
	);
	controllers.push(controller);
	return { controller, supervisor, diagnostics };
}

function kinds(messages: WorkerMessage[]): string[] {
	return messages.map((message) => message.messageKind);
}

describe('FrontController', () => {
	it('should mint 32-character lowercase hex tokens', () => {
		const first = mintOperationToken();
		const second = mintOperationToken();

		expect(first).toMatch(/^[0-9a-f]{32}$/);
		expect(second).not.toBe(first);
	});

	it('should discover tests matching the filters', async () => {
		const { controller } = await launch();
		const spy = new SpyMessageSink('find');

		const operation = await controller.find(spy.sink, { filters: { includedClasses: ['Math'] } });
		const messages = await spy.finished;

		expect(operation.kind).toBe('find');
		expect(kinds(messages)).toEqual([
			'discovery-starting',
			'test-case-discovered',
			'test-case-discovered',
			'discovery-complete',
		]);
		expect(spy.ofKind('test-case-discovered').map((m) => m.payload.testCaseUniqueId)).toEqual([
			'math.add',
			'math.divide',
		]);
		expect(messages.every((m) => m.operationToken === operation.token)).toBe(true);
		await expect(operation.closed).resolves.toBe('completed');
		expect(controller.engine.pendingOperations).toEqual([]);
	});

	it('should run tests and report each outcome', async () => {
		const { controller } = await launch();
		const spy = new SpyMessageSink('find-and-run');

		const operation = await controller.findAndRun(spy.sink);
		const summary = summarizeRun(await spy.finished);

		expect(summary).toMatchObject({ total: 3, passed: 1, failed: 1, skipped: 1 });
		expect(summary.results.map((r) => [r.testCaseUniqueId, r.status])).toEqual([
			['math.add', 'passed'],
			['math.divide', 'failed'],
			['strings.trim', 'skipped'],
		]);
		expect(summary.results[0]?.output).toBe('1 + 2 = 3');
		expect(summary.results[1]?.message).toBe('expected 2, got Infinity');
		expect(summary.results[2]?.message).toBe('not ready');
		await expect(operation.closed).resolves.toBe('completed');
	});

	it('should pass execution settings to the worker', async () => {
		const { controller } = await launch();
		const spy = new SpyMessageSink('find-and-run');

		await controller.findAndRun(spy.sink, { failSkips: true, stopOnFail: true, filters: { excludedMethods: ['add'] } });
		const summary = summarizeRun(await spy.finished);

		// divide fails first and stops the run before the skipped test
		expect(summary.results.map((r) => r.testCaseUniqueId)).toEqual(['math.divide']);
		expect(summary).toMatchObject({ total: 1, failed: 1, skipped: 0 });
	});

	it('should keep concurrent operations apart', async () => {
		const { controller } = await launch();
		const discovery = new SpyMessageSink('find');
		const execution = new SpyMessageSink('find-and-run');

		const [found, ran] = await Promise.all([
			controller.find(discovery.sink, { filters: { includedTraits: { category: ['slow'] } } }),
			controller.findAndRun(execution.sink, { filters: { includedMethods: ['add'] } }),
		]);
		await Promise.all([discovery.finished, execution.finished]);

		expect(found.token).not.toBe(ran.token);
		expect(discovery.ofKind('test-case-discovered').map((m) => m.payload.testCaseUniqueId)).toEqual([
			'strings.trim',
		]);
		expect(execution.ofKind('test-passed').map((m) => m.payload.testCaseUniqueId)).toEqual(['math.add']);
		expect(discovery.messages.every((m) => m.operationToken === found.token)).toBe(true);
		expect(execution.messages.every((m) => m.operationToken === ran.token)).toBe(true);
	});

	it('should stop routing as soon as the sink declines', async () => {
		const { controller } = await launch();
		const received: WorkerMessage[] = [];

		const operation = await controller.find((message) => {
			received.push(message);
			return false;
		});

		await expect(operation.closed).resolves.toBe('completed');
		expect(kinds(received)).toEqual(['discovery-starting']);
	});

	it('should finish an operation the worker answers with an error', async () => {
		const { controller } = await launch(async (args) => {
			const runner = await connectToRunner(parseWorkerArgs(args), identity);
			runner.onRequest((request) => {
				runner.send({
					operationToken: request.operationToken,
					messageKind: 'error',
					payload: { message: 'test assembly failed to load' },
				});
			});
		});
		const spy = new SpyMessageSink('find');

		const operation = await controller.find(spy.sink);

		expect(kinds(await spy.finished)).toEqual(['error']);
		expect(summarizeRun(spy.messages).error).toBe('test assembly failed to load');
		await expect(operation.closed).resolves.toBe('completed');
	});

	it('should refuse run() once the worker is connected', async () => {
		const { controller } = await launch();

		await expect(controller.run(() => true)).rejects.toBeInstanceOf(OperationNotSupportedError);
		expect(controller.engine.state).toBe('connected');
	});

	it('should report metadata from the handshake', async () => {
		const { controller } = await launch();

		await expect(controller.testFrameworkDisplayName()).resolves.toBe('fake-framework 2.1');
		await expect(controller.testAssemblyUniqueId()).resolves.toBe('calculator-tests');
		await expect(controller.targetFramework()).resolves.toBe('node20');
	});

	it("should prefer the assembly's own target framework", async () => {
		const { controller } = await launch(hostingWorker(), { targetFramework: 'node22' });

		await expect(controller.targetFramework()).resolves.toBe('node22');
	});

	it('should pass worker arguments and the config file to the launch', async () => {
		const { supervisor } = await launch(hostingWorker(), {
			args: ['--reporter', 'quiet'],
			configFilename: 'worker.config.json',
			workingDirectory: '/srv/tests',
		});

		expect(supervisor.launches).toHaveLength(1);
		expect(supervisor.launches[0]).toMatchObject({
			executablePath: 'calculator-tests',
			args: ['--reporter', 'quiet', '--config', 'worker.config.json'],
			workingDirectory: '/srv/tests',
		});
		expect(supervisor.launches[0]?.connectionArgs[0]).toBe('--tcp');
	});

	it('should reject new operations after disposal', async () => {
		const { controller } = await launch();
		await controller.dispose();

		await expect(controller.find(() => true)).rejects.toBeInstanceOf(EngineNotReadyError);
		expect(controller.engine.pendingOperations).toEqual([]);
	});

	it('should close pending operations when disposed', async () => {
		// A worker that accepts requests and never answers them
		const { controller } = await launch(async (args) => {
			const runner = await connectToRunner(parseWorkerArgs(args), identity);
			runner.onRequest(() => {});
		});

		const operation = await controller.findAndRun(() => true);
		expect(controller.engine.pendingOperations).toEqual([operation.token]);

		await controller.dispose({ graceMillis: 100 });
		await expect(operation.closed).resolves.toBe('disposed');
	});
});
