// ============================================================================
// testwire Worker - Runner Connection
// The worker's half of the protocol: read the connection argument the runner
// passed on the command line, connect back, say hello, then receive requests
// and send results tagged with each request's token.
// ============================================================================

import { type Socket, connect } from 'node:net';
import {
	CONNECTION_TOKEN,
	ConfigError,
	FrameDecoder,
	type MessageOf,
	PROTOCOL_VERSION,
	type RunnerRequest,
	TestwireError,
	type WorkerMessage,
	encodeFrame,
	runnerRequestSchema,
	toError,
} from 'testwire-protocol';
import { type RawData, WebSocket } from 'ws';

/** Where the runner is listening */
export type RunnerEndpoint =
	| { transport: 'ws'; url: string }
	| { transport: 'tcp'; port: number }
	| { transport: 'pipe'; path: string };

/** Identity sent in the hello frame */
export type WorkerIdentity = Omit<MessageOf<'hello'>['payload'], 'protocolVersion'>;

const MIN_PORT = 1024;
const MAX_PORT = 65535;

// ---------------------------------------------------------------------------
// Command line
// ---------------------------------------------------------------------------

/**
 * Find the connection argument in a worker's command line.
 * Other arguments are left for the worker itself.
 *
 * @throws ConfigError when no usable connection argument is present
 */
export function parseWorkerArgs(argv: readonly string[]): RunnerEndpoint {
	for (let i = 0; i < argv.length; i++) {
		const flag = argv[i];
		if (flag !== '--ws' && flag !== '--tcp' && flag !== '--pipe') continue;

		const value = argv[i + 1];
		if (value === undefined || value.startsWith('--')) {
			throw new ConfigError(`${flag} requires a value`);
		}

		switch (flag) {
			case '--ws':
				if (!/^wss?:\/\//.test(value)) {
					throw new ConfigError(`--ws expects a ws:// URL, got '${value}'`);
				}
				return { transport: 'ws', url: value };
			case '--tcp': {
				const port = Number(value);
				if (!Number.isInteger(port) || port < MIN_PORT || port > MAX_PORT) {
					throw new ConfigError(`--tcp expects a port between ${MIN_PORT} and ${MAX_PORT}, got '${value}'`);
				}
				return { transport: 'tcp', port };
			}
			case '--pipe':
				return { transport: 'pipe', path: value };
		}
	}

	throw new ConfigError('No runner connection argument found', {
		hint: 'Workers are started with --ws <url>, --tcp <port> or --pipe <path>.',
	});
}

// ---------------------------------------------------------------------------
// Byte streams
// ---------------------------------------------------------------------------

/** A bidirectional byte stream to the runner */
export interface WorkerStream {
	write(data: Buffer): void;
	onData(handler: (chunk: Buffer) => void): void;
	onClose(handler: (reason: string) => void): void;
	close(): Promise<void>;
}

function openWebSocket(url: string): Promise<WorkerStream> {
	return new Promise((resolve, reject) => {
		const ws = new WebSocket(url);
		ws.once('error', (err: Error) => {
			reject(new TestwireError(`Could not connect to runner at ${url}: ${err.message}`, { cause: err }));
		});
		ws.once('open', () => {
			ws.removeAllListeners('error');
			ws.on('error', () => ws.terminate());
			resolve({
				write: (data) => ws.send(data),
				onData: (handler) => {
					ws.on('message', (data: RawData) => handler(toBuffer(data)));
				},
				onClose: (handler) => {
					ws.on('close', (code: number, reason: Buffer) => handler(reason.toString('utf-8') || `code ${code}`));
				},
				close: () =>
					new Promise<void>((done) => {
						if (ws.readyState === WebSocket.CLOSED) {
							done();
							return;
						}
						ws.once('close', () => done());
						ws.close(1000, 'worker closing');
					}),
			});
		});
	});
}

function openSocket(options: { port: number; host: string } | { path: string }, label: string): Promise<WorkerStream> {
	return new Promise((resolve, reject) => {
		const socket: Socket = connect(options);
		socket.once('error', (err: Error) => {
			reject(new TestwireError(`Could not connect to runner at ${label}: ${err.message}`, { cause: err }));
		});
		socket.once('connect', () => {
			socket.removeAllListeners('error');
			// 'close' follows and reports the end of the stream
			socket.on('error', () => socket.destroy());
			resolve({
				write: (data) => {
					socket.write(data);
				},
				onData: (handler) => {
					socket.on('data', handler);
				},
				onClose: (handler) => {
					socket.on('close', (hadError: boolean) => handler(hadError ? 'socket error' : 'socket closed'));
				},
				close: () =>
					new Promise<void>((done) => {
						if (socket.destroyed) {
							done();
							return;
						}
						socket.once('close', () => done());
						socket.end();
					}),
			});
		});
	});
}

// ---------------------------------------------------------------------------
// RunnerConnection
// ---------------------------------------------------------------------------

/**
 * An open, handshaken connection to the runner.
 *
 * ```ts
 * const runner = await connectToRunner(parseWorkerArgs(process.argv.slice(2)), {
 *   testFrameworkDisplayName: 'my-framework 1.0',
 *   testAssemblyUniqueId: 'my-suite',
 * });
 * runner.onRequest((request) => { ... runner.send(...) });
 * ```
 */
export class RunnerConnection {
	private readonly decoder: FrameDecoder<RunnerRequest>;
	private requestHandler: ((request: RunnerRequest) => void) | null = null;
	private early: RunnerRequest[] = [];
	private closeHandlers: Array<(reason: string) => void> = [];
	private closedReason: string | null = null;

	constructor(
		private readonly stream: WorkerStream,
		maxFrameBytes?: number,
	) {
		this.decoder = new FrameDecoder(runnerRequestSchema, maxFrameBytes);
		stream.onData((chunk) => this.onData(chunk));
		stream.onClose((reason) => this.ended(reason));
	}

	get isOpen(): boolean {
		return this.closedReason === null;
	}

	/** Set the request handler. Requests that arrived earlier are replayed. */
	onRequest(handler: (request: RunnerRequest) => void): void {
		this.requestHandler = handler;
		const early = this.early;
		this.early = [];
		for (const request of early) handler(request);
	}

	/** Called once when the runner goes away */
	onClose(handler: (reason: string) => void): void {
		if (this.closedReason !== null) {
			handler(this.closedReason);
			return;
		}
		this.closeHandlers.push(handler);
	}

	/** Send one message to the runner */
	send(message: WorkerMessage): void {
		if (!this.isOpen) {
			throw new TestwireError(`Cannot send ${message.messageKind}: the runner connection is closed`);
		}
		this.stream.write(encodeFrame(message));
	}

	/** Send a diagnostic line that belongs to the connection rather than an operation */
	diagnostic(message: string): void {
		this.send({ operationToken: CONNECTION_TOKEN, messageKind: 'diagnostic', payload: { message } });
	}

	async close(): Promise<void> {
		if (!this.isOpen) return;
		await this.stream.close();
	}

	private onData(chunk: Buffer): void {
		try {
			this.decoder.feed(chunk, (request) => {
				if (this.requestHandler) {
					this.requestHandler(request);
				} else {
					this.early.push(request);
				}
			});
		} catch (err) {
			// The runner sent something unreadable; nothing after it can be trusted
			this.ended(`protocol error: ${toError(err).message}`);
			void this.stream.close();
		}
	}

	private ended(reason: string): void {
		if (this.closedReason !== null) return;
		this.closedReason = reason;
		const handlers = this.closeHandlers;
		this.closeHandlers = [];
		for (const handler of handlers) handler(reason);
	}
}

/**
 * Connect back to the runner and complete the handshake.
 *
 * @throws TestwireError when the runner cannot be reached
 */
export async function connectToRunner(
	endpoint: RunnerEndpoint,
	identity: WorkerIdentity,
	options: { maxFrameBytes?: number } = {},
): Promise<RunnerConnection> {
	let stream: WorkerStream;
	switch (endpoint.transport) {
		case 'ws':
			stream = await openWebSocket(endpoint.url);
			break;
		case 'tcp':
			stream = await openSocket({ host: '127.0.0.1', port: endpoint.port }, `tcp port ${endpoint.port}`);
			break;
		case 'pipe':
			stream = await openSocket({ path: endpoint.path }, endpoint.path);
			break;
	}

	const connection = new RunnerConnection(stream, options.maxFrameBytes);
	connection.send({
		operationToken: CONNECTION_TOKEN,
		messageKind: 'hello',
		payload: { protocolVersion: PROTOCOL_VERSION, ...identity },
	});
	return connection;
}

function toBuffer(data: RawData): Buffer {
	if (Buffer.isBuffer(data)) return data;
	if (Array.isArray(data)) return Buffer.concat(data);
	return Buffer.from(data);
}
