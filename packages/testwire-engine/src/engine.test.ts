import { once } from 'node:events';
import { type Socket, connect } from 'node:net';
import {
	EngineNotReadyError,
	type FindRequest,
	type RunnerRequest,
	SpawnError,
	type WorkerMessage,
	encodeFrame,
} from 'testwire-protocol';
import { type RunnerConnection, connectToRunner, parseWorkerArgs } from 'testwire-worker';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { RunnerEngine, type RunnerEngineOptions } from './engine.js';
import { EngineEventBus } from './event-bus.js';
import { type InProcessWorker, InProcessSupervisor } from './in-process.js';
import type { WorkerSupervisor } from './supervisor.js';

const identity = {
	testFrameworkDisplayName: 'fake-framework 1.0',
	testAssemblyUniqueId: 'suite-1',
	targetFramework: 'node20',
};

const findPayload: FindRequest['payload'] = {
	options: {
		preEnumerateTheories: false,
		culture: null,
		diagnosticMessages: false,
		internalDiagnosticMessages: false,
	},
	filters: {
		includedClasses: [],
		excludedClasses: [],
		includedMethods: [],
		excludedMethods: [],
		includedNamespaces: [],
		excludedNamespaces: [],
		includedTraits: {},
		excludedTraits: {},
	},
};

const engines: RunnerEngine[] = [];

afterEach(async () => {
	await Promise.all(engines.splice(0).map((engine) => engine.dispose({ graceMillis: 100 })));
});

interface Harness {
	engine: RunnerEngine;
	supervisor: InProcessSupervisor;
	diagnostics: string[];
}

async function startEngine(
	worker: InProcessWorker,
	options: Partial<RunnerEngineOptions> = {},
): Promise<Harness> {
	const diagnostics: string[] = [];
	const supervisor = new InProcessSupervisor(worker, { firstProcessId: 4242 });
	const engine = await RunnerEngine.start({
		worker: { executablePath: 'fake-worker' },
		supervisor,
		diagnostics: (message) => diagnostics.push(message),
		...options,
	});
	engines.push(engine);
	return { engine, supervisor, diagnostics };
}

/** A worker that connects with the real client and hands it to the test */
function connectingWorker(onConnected: (runner: RunnerConnection) => void): InProcessWorker {
	return async (args) => {
		const runner = await connectToRunner(parseWorkerArgs(args), identity);
		onConnected(runner);
	};
}

/** A worker that connects over raw TCP so the test can write arbitrary bytes */
function rawTcpWorker(onConnected: (socket: Socket) => void): InProcessWorker {
	return async (args) => {
		const endpoint = parseWorkerArgs(args);
		if (endpoint.transport !== 'tcp') throw new Error('expected a tcp endpoint');
		const socket = connect({ host: '127.0.0.1', port: endpoint.port });
		await once(socket, 'connect');
		socket.on('error', () => socket.destroy());
		onConnected(socket);
	};
}

/** A connecting worker plus a promise of its connection, for tests that drive it */
function capturedWorker(): { worker: InProcessWorker; runner: Promise<RunnerConnection> } {
	let resolve: (runner: RunnerConnection) => void = () => {};
	const runner = new Promise<RunnerConnection>((r) => {
		resolve = r;
	});
	return { worker: connectingWorker(resolve), runner };
}

function helloFrame(protocolVersion = 1): Buffer {
	return encodeFrame({
		operationToken: '',
		messageKind: 'hello',
		payload: { protocolVersion, testFrameworkDisplayName: 'raw', testAssemblyUniqueId: 'raw-1' },
	});
}

// ---------------------------------------------------------------------------
// Startup and handshake
// ---------------------------------------------------------------------------

describe('RunnerEngine startup', () => {
	it('should reach connected after the hello and expose its metadata', async () => {
		const bus = new EngineEventBus();
		bus.enableHistory();
		const { engine, supervisor } = await startEngine(connectingWorker(() => {}), { bus });

		await engine.waitForReady(2000);

		expect(engine.state).toBe('connected');
		await expect(engine.testFrameworkDisplayName()).resolves.toBe('fake-framework 1.0');
		await expect(engine.testAssemblyUniqueId()).resolves.toBe('suite-1');
		await expect(engine.targetFramework()).resolves.toBe('node20');
		expect(supervisor.launches[0]?.connectionArgs[0]).toBe('--ws');
		expect(bus.getEventsOfType('worker:spawn')).toEqual([
			{ processId: 4242, connectionParam: supervisor.launches[0]?.connectionArgs.join(' ') },
		]);
	});

	it('should fail with SpawnError and release the listener when the worker cannot launch', async () => {
		const bus = new EngineEventBus();
		bus.enableHistory();
		let boundPort = 0;
		const supervisor: WorkerSupervisor = {
			spawn: async (options) => {
				boundPort = Number(options.connectionArgs[1]);
				throw new SpawnError('/missing/worker', 'executable not found');
			},
			shutdown: async () => 'exited',
			kill: () => {},
			onExit: () => () => {},
		};
		const diagnostics: string[] = [];

		await expect(
			RunnerEngine.start({
				worker: { executablePath: '/missing/worker' },
				transport: 'tcp',
				supervisor,
				bus,
				diagnostics: (message) => diagnostics.push(message),
			}),
		).rejects.toBeInstanceOf(SpawnError);

		expect(bus.getEventsOfType('state:change').map((change) => change.to)).toEqual(['listening', 'faulted']);
		expect(diagnostics[0]).toMatch(/^Runner engine faulted: Could not launch worker '\/missing\/worker'/);

		// Nothing is listening on the address the worker would have been given
		const probe = connect({ host: '127.0.0.1', port: boundPort });
		const [error] = await once(probe, 'error');
		expect(error).toMatchObject({ code: 'ECONNREFUSED' });
	});

	it('should report a missing executable through the process supervisor', async () => {
		await expect(
			RunnerEngine.start({
				worker: { executablePath: '/nonexistent/testwire-worker' },
				diagnostics: () => {},
			}),
		).rejects.toThrow("Could not launch worker '/nonexistent/testwire-worker': executable not found");
	});

	it('should fault when the first frame is not a hello', async () => {
		const { engine, diagnostics } = await startEngine(
			rawTcpWorker((socket) => {
				socket.write(encodeFrame({ operationToken: '', messageKind: 'diagnostic', payload: { message: 'hi' } }));
			}),
			{ transport: 'tcp' },
		);

		await expect(engine.waitForReady(2000)).rejects.toThrow(EngineNotReadyError);
		expect(engine.state).toBe('faulted');
		expect(diagnostics).toContain('Runner engine faulted: Handshake failed: expected hello, received diagnostic');
	});

	it('should fault on a protocol version mismatch', async () => {
		const { engine } = await startEngine(
			rawTcpWorker((socket) => socket.write(helloFrame(2))),
			{ transport: 'tcp' },
		);

		await expect(engine.waitForReady(2000)).rejects.toThrow(
			'engine faulted: Handshake failed: worker speaks protocol version 2, runner speaks 1',
		);
	});

	it('should fault when the worker exits before connecting', async () => {
		const { engine } = await startEngine((_args, control) => {
			control.stderr('boot failure\n');
			control.exit(3);
		});

		await expect(engine.waitForReady(2000)).rejects.toThrow(
			'engine faulted: Worker process 4242 exited (exit code 3) before connecting',
		);
		expect(engine.fault?.message).toContain('Hint: Worker stderr: boot failure');
	});

	it('should fault when the worker never says hello within the handshake timeout', async () => {
		const { engine, diagnostics } = await startEngine(
			rawTcpWorker(() => {}),
			{ transport: 'tcp', handshakeTimeoutMs: 100 },
		);

		await expect(engine.waitForReady(2000)).rejects.toThrow(EngineNotReadyError);
		expect(diagnostics).toContain('Runner engine faulted: Worker did not connect and say hello within 100ms');
	});
});

// ---------------------------------------------------------------------------
// Readiness
// ---------------------------------------------------------------------------

describe('RunnerEngine readiness', () => {
	it('should time out without changing state when the worker never connects', async () => {
		const { engine } = await startEngine(() => {});

		const started = Date.now();
		const error = await engine.waitForReady(150).catch((err: unknown) => err);
		const elapsed = Date.now() - started;

		expect(error).toBeInstanceOf(EngineNotReadyError);
		expect(elapsed).toBeGreaterThanOrEqual(140);
		expect(elapsed).toBeLessThan(1500);
		expect(engine.state).toBe('listening');
	});

	it('should fail a send issued before the worker connects once the window passes', async () => {
		const { engine } = await startEngine(() => {}, { readyTimeoutMs: 100 });

		await expect(engine.sendFind('op', findPayload)).rejects.toThrow(
			/^Runner engine is not connected \(state: listening, waited \d+ms\)/,
		);
	});

	it('should stop waiting when the signal aborts', async () => {
		const { engine } = await startEngine(() => {});
		const controller = new AbortController();
		setTimeout(() => controller.abort(), 20);

		await expect(engine.waitForReady(5000, controller.signal)).rejects.toThrow('wait was cancelled');
		expect(engine.state).toBe('listening');
	});

	it('should let a waiting send through once the worker connects', async () => {
		let release: () => void = () => {};
		const gate = new Promise<void>((resolve) => {
			release = resolve;
		});
		const requests: RunnerRequest[] = [];
		const { engine } = await startEngine(async (args) => {
			await gate;
			const runner = await connectToRunner(parseWorkerArgs(args), identity);
			runner.onRequest((request) => requests.push(request));
		});

		const sending = engine.sendFind('op-early', findPayload);
		setTimeout(release, 30);
		await sending;

		await vi.waitFor(() => expect(requests.map((r) => r.operationToken)).toEqual(['op-early']));
	});
});

// ---------------------------------------------------------------------------
// Routing
// ---------------------------------------------------------------------------

describe('RunnerEngine routing', () => {
	it('should deliver a discovery pass to its sink in wire order', async () => {
		const { engine } = await startEngine(
			connectingWorker((runner) => {
				runner.onRequest((request) => {
					const token = request.operationToken;
					for (const id of ['a', 'b', 'c']) {
						runner.send({
							operationToken: token,
							messageKind: 'test-case-discovered',
							payload: { testCaseUniqueId: id, displayName: `test ${id}`, traits: {} },
						});
					}
					runner.send({ operationToken: token, messageKind: 'discovery-complete', payload: { testCasesToRun: 3 } });
				});
			}),
		);

		const received: WorkerMessage[] = [];
		const sink = vi.fn((message: WorkerMessage) => {
			received.push(message);
			return message.messageKind !== 'discovery-complete';
		});
		engine.register('find-1', sink);
		await engine.sendFind('find-1', findPayload);

		await vi.waitFor(() => expect(sink).toHaveBeenCalledTimes(4));
		expect(received.map((m) => m.messageKind)).toEqual([
			'test-case-discovered',
			'test-case-discovered',
			'test-case-discovered',
			'discovery-complete',
		]);
		const ids = received.map((m) => (m.messageKind === 'test-case-discovered' ? m.payload.testCaseUniqueId : null));
		expect(ids).toEqual(['a', 'b', 'c', null]);
		// The terminal message ends routing for the token
		expect(engine.pendingOperations).toEqual([]);
	});

	it('should keep two operations apart', async () => {
		const captured = capturedWorker();
		const { engine } = await startEngine(captured.worker);
		await engine.waitForReady(2000);
		const worker = await captured.runner;

		const collect = (into: string[]) => (message: WorkerMessage) => {
			if (message.messageKind === 'diagnostic') into.push(message.payload.message);
			return true;
		};
		const first: string[] = [];
		const second: string[] = [];
		engine.register('t1', collect(first));
		engine.register('t2', collect(second));

		const send = (token: string, message: string) =>
			worker.send({ operationToken: token, messageKind: 'diagnostic', payload: { message } });
		send('t1', 'one');
		send('t2', 'two');
		send('t1', 'three');

		await vi.waitFor(() => expect(first).toEqual(['one', 'three']));
		expect(second).toEqual(['two']);
	});

	it('should report messages for unknown tokens', async () => {
		const bus = new EngineEventBus();
		bus.enableHistory();
		const { engine, diagnostics } = await startEngine(
			connectingWorker((runner) => {
				runner.send({ operationToken: 'ghost', messageKind: 'diagnostic', payload: { message: 'boo' } });
			}),
			{ bus },
		);
		await engine.waitForReady(2000);

		await vi.waitFor(() =>
			expect(bus.getEventsOfType('message:unroutable')).toEqual([{ token: 'ghost', messageKind: 'diagnostic' }]),
		);
		expect(diagnostics).toContain('Dropped diagnostic message for unknown operation ghost');
		expect(engine.state).toBe('connected');
	});

	it('should unregister a sink that throws and keep the connection', async () => {
		const captured = capturedWorker();
		const { engine, diagnostics } = await startEngine(captured.worker);
		await engine.waitForReady(2000);
		const worker = await captured.runner;

		const throwing = vi.fn((_message: WorkerMessage): boolean => {
			throw new Error('boom');
		});
		const healthy = vi.fn((_message: WorkerMessage) => true);
		engine.register('bad', throwing);
		engine.register('good', healthy);

		const send = (token: string) =>
			worker.send({ operationToken: token, messageKind: 'diagnostic', payload: { message: 'x' } });
		send('bad');
		send('good');
		send('bad');

		await vi.waitFor(() => expect(healthy).toHaveBeenCalledTimes(1));
		await vi.waitFor(() => expect(diagnostics).toContain('Dropped diagnostic message for unknown operation bad'));
		expect(throwing).toHaveBeenCalledTimes(1);
		expect(diagnostics).toContain(
			'Message sink for operation bad threw on diagnostic: boom; no further messages will be routed to it',
		);
		expect(engine.state).toBe('connected');
	});

	it('should forward connection-level diagnostics only when enabled', async () => {
		const worker = connectingWorker((runner) => {
			runner.send({ operationToken: '', messageKind: 'internal-diagnostic', payload: { message: 'internal' } });
			runner.diagnostic('public');
			runner.send({ operationToken: '', messageKind: 'error', payload: { message: 'disk full' } });
		});

		const quiet = await startEngine(worker);
		await vi.waitFor(() => expect(quiet.diagnostics).toContain('Worker reported an error: disk full'));
		expect(quiet.diagnostics).not.toContain('public');
		expect(quiet.diagnostics).not.toContain('internal');

		const publicOnly = await startEngine(worker, { workerDiagnostics: true });
		await vi.waitFor(() =>
			expect(publicOnly.diagnostics).toEqual(['public', 'Worker reported an error: disk full']),
		);

		const verbose = await startEngine(worker, { workerDiagnostics: true, internalDiagnostics: true });
		await vi.waitFor(() =>
			expect(verbose.diagnostics).toEqual(['internal', 'public', 'Worker reported an error: disk full']),
		);
	});

	it('should trace frames in both directions in debug mode', async () => {
		const { engine, diagnostics } = await startEngine(connectingWorker(() => {}), { debug: true });
		await engine.waitForReady(2000);
		engine.register('op', () => true);
		await engine.sendFind('op', findPayload);

		expect(diagnostics.some((line) => line.startsWith('<<< RECV {"operationToken":"","messageKind":"hello"'))).toBe(true);
		expect(diagnostics.some((line) => line.startsWith('>>> SEND {"operationToken":"op","messageKind":"find"'))).toBe(true);
	});
});

// ---------------------------------------------------------------------------
// Faults
// ---------------------------------------------------------------------------

describe('RunnerEngine faults', () => {
	it('should fault on an unparsable frame and stop feeding pending sinks', async () => {
		let resolveSocket: (socket: Socket) => void = () => {};
		const connected = new Promise<Socket>((resolve) => {
			resolveSocket = resolve;
		});
		const { engine, diagnostics } = await startEngine(
			rawTcpWorker((socket) => {
				socket.write(helloFrame());
				resolveSocket(socket);
			}),
			{ transport: 'tcp' },
		);
		await engine.waitForReady(2000);
		const socket = await connected;

		const sink = vi.fn((_message: WorkerMessage) => true);
		engine.register('op', sink);
		socket.write('garbage\n');
		socket.write(encodeFrame({ operationToken: 'op', messageKind: 'diagnostic', payload: { message: 'late' } }));

		await vi.waitFor(() => expect(engine.state).toBe('faulted'));
		expect(sink).not.toHaveBeenCalled();
		expect(diagnostics).toContain('Runner engine faulted: Malformed frame: garbage Pending operations dropped: op');
		expect(engine.pendingOperations).toEqual([]);
		expect(() => engine.register('after', () => true)).toThrow(EngineNotReadyError);
	});

	it('should fault when the worker drops the connection', async () => {
		const captured = capturedWorker();
		const { engine } = await startEngine(captured.worker);
		await engine.waitForReady(2000);

		await (await captured.runner).close();

		await vi.waitFor(() => expect(engine.state).toBe('faulted'));
		expect(engine.fault?.message).toMatch(/^Worker connection closed unexpectedly/);
	});

	it('should stay faulted after disposal', async () => {
		const { engine } = await startEngine((_args, control) => control.exit(1));
		await vi.waitFor(() => expect(engine.state).toBe('faulted'));

		await engine.dispose();
		expect(engine.state).toBe('faulted');
	});
});

// ---------------------------------------------------------------------------
// Disposal
// ---------------------------------------------------------------------------

describe('RunnerEngine disposal', () => {
	it('should move forward only: listening, connected, closed', async () => {
		const bus = new EngineEventBus();
		bus.enableHistory();
		const { engine } = await startEngine(connectingWorker(() => {}), { bus });
		await engine.waitForReady(2000);
		await engine.dispose();

		expect(bus.getEventsOfType('state:change')).toEqual([
			{ from: 'not-started', to: 'listening' },
			{ from: 'listening', to: 'connected' },
			{ from: 'connected', to: 'closed' },
		]);
	});

	it('should be idempotent and ask the worker to stop only once', async () => {
		const { engine, supervisor } = await startEngine(connectingWorker(() => {}));
		await engine.waitForReady(2000);

		await Promise.all([engine.dispose(), engine.dispose()]);
		await engine.dispose();

		expect(engine.state).toBe('closed');
		const handle = engine.worker;
		expect(handle?.hasExited).toBe(true);
		expect(handle && supervisor.shutdownRequests(handle)).toBe(1);
		await expect(engine.waitForReady(100)).rejects.toThrow('engine was disposed');
	});

	it('should report, not throw, when the worker outlives the grace period', async () => {
		// Ignores the shutdown request instead of exiting
		const { engine, diagnostics } = await startEngine(async (args, control) => {
			control.onShutdown(() => {});
			await connectToRunner(parseWorkerArgs(args), identity);
		});
		await engine.waitForReady(2000);

		await expect(engine.dispose({ graceMillis: 50 })).resolves.toBeUndefined();

		expect(diagnostics).toEqual([
			'Worker process 4242 did not exit within 50ms; it may need to be stopped manually',
		]);
		expect(engine.worker?.hasExited).toBe(false);
		expect(engine.state).toBe('closed');
	});

	it('should kill a worker that outlives the grace period when asked to', async () => {
		const { engine, diagnostics } = await startEngine(async (args, control) => {
			control.onShutdown(() => {});
			await connectToRunner(parseWorkerArgs(args), identity);
		});
		await engine.waitForReady(2000);

		await engine.dispose({ graceMillis: 50, onShutdownTimeout: 'kill' });

		expect(diagnostics).toEqual([
			'Worker process 4242 did not exit within 50ms; it may need to be stopped manually',
			'Killing worker process 4242',
		]);
		expect(engine.worker?.signal).toBe('SIGKILL');
	});

	it('should close an engine that never connected', async () => {
		const { engine } = await startEngine(() => {});

		await engine.dispose({ graceMillis: 50 });

		expect(engine.state).toBe('closed');
		await expect(engine.sendFind('op', findPayload)).rejects.toThrow(EngineNotReadyError);
	});

	it('should drop pending operations on disposal', async () => {
		const bus = new EngineEventBus();
		bus.enableHistory();
		const { engine } = await startEngine(connectingWorker(() => {}), { bus });
		await engine.waitForReady(2000);
		engine.register('left-behind', () => true);

		await engine.dispose();

		expect(bus.getEventsOfType('operation:close')).toEqual([{ token: 'left-behind', reason: 'disposed' }]);
	});
});
