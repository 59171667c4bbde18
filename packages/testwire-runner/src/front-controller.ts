// ============================================================================
// testwire Runner - Front Controller
// The caller-facing API for one test worker: discovery, discovery plus
// execution, and metadata. Each pass gets its own operation token so the
// engine can route the worker's answers back to the right sink.
// ============================================================================

import { randomUUID } from 'node:crypto';
import {
	type OperationCloseReason,
	RunnerEngine,
	type RunnerEngineOptions,
	type DisposeOptions,
} from 'testwire-engine';
import { type MessageSink, OperationNotSupportedError, toError } from 'testwire-protocol';
import { type UserSettings, resolveSettings } from './settings.js';
import { type OperationKind, isTerminalMessage } from './spy-sink.js';

/** A test worker executable and how to launch it */
export interface TestAssembly {
	executablePath: string;
	/** Extra worker arguments, placed before the connection argument */
	args?: string[];
	/** Default: the executable's directory */
	workingDirectory?: string;
	env?: Record<string, string | undefined>;
	/** Known target framework; otherwise taken from the worker's hello */
	targetFramework?: string;
	/** Config file for the worker, passed as `--config <file>` */
	configFilename?: string;
}

/** Engine options other than the worker itself */
export type ControllerOptions = Omit<RunnerEngineOptions, 'worker'>;

/** One find or find-and-run pass in flight */
export interface Operation {
	token: string;
	kind: OperationKind;
	/** Resolves once the engine stops routing messages for this operation */
	closed: Promise<OperationCloseReason>;
}

/** Fresh 32-character lowercase hex token */
export function mintOperationToken(): string {
	return randomUUID().replace(/-/g, '');
}

/**
 * Drives one worker for discovery and execution.
 *
 * ```ts
 * const controller = await FrontController.forDiscoveryAndExecution({ executablePath: './tests' });
 * const spy = new SpyMessageSink('find-and-run');
 * await controller.findAndRun(spy.sink, { parallel: 'all' });
 * console.log(summarizeRun(await spy.finished));
 * await controller.dispose();
 * ```
 */
export class FrontController {
	private constructor(
		readonly assembly: TestAssembly,
		readonly engine: RunnerEngine,
	) {}

	/**
	 * Launch the worker and start listening for its connection.
	 *
	 * @throws SpawnError when the worker cannot be launched
	 */
	static async forDiscoveryAndExecution(
		assembly: TestAssembly,
		options: ControllerOptions = {},
	): Promise<FrontController> {
		const args = [...(assembly.args ?? [])];
		if (assembly.configFilename) args.push('--config', assembly.configFilename);

		const engine = await RunnerEngine.start({
			...options,
			worker: {
				executablePath: assembly.executablePath,
				args,
				workingDirectory: assembly.workingDirectory,
				env: assembly.env,
			},
		});
		return new FrontController(assembly, engine);
	}

	// -----------------------------------------------------------------------
	// Metadata
	// -----------------------------------------------------------------------

	testFrameworkDisplayName(): Promise<string> {
		return this.engine.testFrameworkDisplayName();
	}

	testAssemblyUniqueId(): Promise<string> {
		return this.engine.testAssemblyUniqueId();
	}

	/** The assembly's own target framework, else the one the worker reported */
	async targetFramework(): Promise<string | undefined> {
		if (this.assembly.targetFramework) return this.assembly.targetFramework;
		return this.engine.targetFramework();
	}

	// -----------------------------------------------------------------------
	// Operations
	// -----------------------------------------------------------------------

	/** Discover tests. The sink receives messages up to discovery-complete. */
	async find(sink: MessageSink, settings: UserSettings = {}): Promise<Operation> {
		const { options, filters } = resolveSettings(settings);
		return this.start('find', sink, (token) => this.engine.sendFind(token, { options, filters }));
	}

	/** Discover and run tests. The sink receives messages up to run-complete. */
	async findAndRun(sink: MessageSink, settings: UserSettings = {}): Promise<Operation> {
		const resolved = resolveSettings(settings);
		return this.start('find-and-run', sink, (token) => this.engine.sendFindAndRun(token, resolved));
	}

	/**
	 * Running an already-discovered list of test cases has no wire request.
	 * Waits for the worker like the other operations, then refuses.
	 */
	async run(_sink: MessageSink, _settings: UserSettings = {}): Promise<Operation> {
		await this.engine.waitForReady();
		throw new OperationNotSupportedError('run');
	}

	private async start(
		kind: OperationKind,
		sink: MessageSink,
		send: (token: string) => Promise<void>,
	): Promise<Operation> {
		const token = mintOperationToken();

		// Stop routing once the operation's terminal message has been delivered
		this.engine.register(token, (message) => {
			const wanted = sink(message);
			return wanted && !isTerminalMessage(kind, message);
		});
		const closed = new Promise<OperationCloseReason>((resolve) => {
			const unsubscribe = this.engine.bus.on('operation:close', (event) => {
				if (event.token !== token) return;
				unsubscribe();
				resolve(event.reason);
			});
		});

		try {
			await send(token);
		} catch (err) {
			this.engine.unregister(token);
			throw toError(err);
		}
		return { token, kind, closed };
	}

	// -----------------------------------------------------------------------
	// Teardown
	// -----------------------------------------------------------------------

	/** Close the connection and stop the worker. Safe to call more than once. */
	dispose(options?: DisposeOptions): Promise<void> {
		return this.engine.dispose(options);
	}
}
