// ============================================================================
// testwire Engine - Transport Listeners
// Accept exactly one connection back from a spawned worker.
// Two transports share one contract:
//   1. WebSocket (ws) on an ephemeral loopback port   --ws ws://127.0.0.1:PORT
//   2. Raw socket (node:net): TCP loopback or a Unix domain socket / named pipe
//                                                      --tcp PORT | --pipe PATH
// A second inbound connection is always closed straight away.
// ============================================================================

import { randomUUID } from 'node:crypto';
import { type AddressInfo, type Server, type Socket, createServer } from 'node:net';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { type RawData, WebSocket, WebSocketServer } from 'ws';

/** Transports a worker can connect back over */
export type TransportKind = 'ws' | 'tcp' | 'pipe';

/** Where the listener is bound, and how to tell a worker about it */
export interface ListenAddress {
	transport: TransportKind;
	/** Printable address, e.g. ws://127.0.0.1:51234 */
	url: string;
	/** Command-line arguments that point a worker at this address */
	workerArgs: string[];
}

/** One accepted, bidirectional byte stream */
export interface Connection {
	readonly remoteAddress: string;
	readonly isOpen: boolean;
	/** Write bytes. Callers serialize whole frames; there is one writer. */
	write(data: Buffer): void;
	/** Set the single reader. Chunks that arrived earlier are replayed first. */
	onData(handler: (chunk: Buffer) => void): void;
	/** Called once when the peer goes away or close() completes */
	onClose(handler: (reason: string) => void): void;
	close(): Promise<void>;
}

export interface Listener {
	/** Bind to an ephemeral address */
	start(): Promise<ListenAddress>;
	/** Resolves with the first inbound connection; rejects if closed first */
	accepted(): Promise<Connection>;
	/** Release the connection and the bound address. Idempotent. */
	close(): Promise<void>;
}

export interface ListenerOptions {
	/** Called when a second connection attempt is turned away */
	onRejected?: (reason: string) => void;
	/** Pipe path for the 'pipe' transport (default: generated in tmpdir) */
	path?: string;
}

/** Give up waiting for a graceful close after this long */
const CLOSE_TIMEOUT_MS = 1_000;

const REJECT_REASON = 'runner already has a worker connection';

/**
 * Create a listener for the given transport.
 */
export function createListener(transport: TransportKind, options: ListenerOptions = {}): Listener {
	switch (transport) {
		case 'ws':
			return new WebSocketListener(options);
		case 'tcp':
			return new SocketListener('tcp', options);
		case 'pipe':
			return new SocketListener('pipe', options);
	}
}

// ---------------------------------------------------------------------------
// Shared acceptance bookkeeping
// ---------------------------------------------------------------------------

interface Waiter {
	resolve: (connection: Connection) => void;
	reject: (error: Error) => void;
}

abstract class SingleConnectionListener implements Listener {
	protected connection: Connection | null = null;
	protected closed = false;
	private waiters: Waiter[] = [];
	private closing: Promise<void> | null = null;
	protected readonly onRejected: (reason: string) => void;

	constructor(options: ListenerOptions) {
		this.onRejected = options.onRejected ?? (() => {});
	}

	abstract start(): Promise<ListenAddress>;
	protected abstract closeServer(): Promise<void>;

	accepted(): Promise<Connection> {
		if (this.connection) return Promise.resolve(this.connection);
		if (this.closed) return Promise.reject(new Error('Listener closed before a worker connected'));
		return new Promise<Connection>((resolve, reject) => {
			this.waiters.push({ resolve, reject });
		});
	}

	/** Returns false if a connection was already accepted */
	protected accept(connection: Connection): boolean {
		if (this.connection || this.closed) return false;
		this.connection = connection;
		for (const waiter of this.waiters) waiter.resolve(connection);
		this.waiters = [];
		return true;
	}

	close(): Promise<void> {
		this.closing ??= this.doClose();
		return this.closing;
	}

	private async doClose(): Promise<void> {
		this.closed = true;
		for (const waiter of this.waiters) {
			waiter.reject(new Error('Listener closed before a worker connected'));
		}
		this.waiters = [];
		if (this.connection) await this.connection.close();
		await this.closeServer();
	}
}

/**
 * Buffers chunks and the close reason until a reader is attached,
 * so nothing sent straight after connect is lost.
 */
abstract class BufferedConnection implements Connection {
	abstract readonly remoteAddress: string;
	private dataHandler: ((chunk: Buffer) => void) | null = null;
	private closeHandler: ((reason: string) => void) | null = null;
	private early: Buffer[] = [];
	private closeReason: string | null = null;
	protected open = true;

	get isOpen(): boolean {
		return this.open;
	}

	abstract write(data: Buffer): void;
	abstract close(): Promise<void>;

	onData(handler: (chunk: Buffer) => void): void {
		this.dataHandler = handler;
		const early = this.early;
		this.early = [];
		for (const chunk of early) handler(chunk);
	}

	onClose(handler: (reason: string) => void): void {
		this.closeHandler = handler;
		if (this.closeReason !== null) handler(this.closeReason);
	}

	protected received(chunk: Buffer): void {
		if (this.dataHandler) {
			this.dataHandler(chunk);
		} else {
			this.early.push(chunk);
		}
	}

	protected ended(reason: string): void {
		if (this.closeReason !== null) return;
		this.open = false;
		this.closeReason = reason;
		this.closeHandler?.(reason);
	}
}

// ---------------------------------------------------------------------------
// WebSocket transport
// ---------------------------------------------------------------------------

class WebSocketConnection extends BufferedConnection {
	readonly remoteAddress: string;

	constructor(private readonly ws: WebSocket, remoteAddress: string) {
		super();
		this.remoteAddress = remoteAddress;

		ws.on('message', (data: RawData) => this.received(toBuffer(data)));
		ws.on('close', (code: number, reason: Buffer) => {
			this.ended(reason.toString('utf-8') || `code ${code}`);
		});
		// 'close' always follows 'error'; the reason is reported there
		ws.on('error', (err: Error) => {
			if (this.open) this.ended(`socket error: ${err.message}`);
		});
	}

	write(data: Buffer): void {
		if (this.ws.readyState !== WebSocket.OPEN) {
			throw new Error('Connection is not open');
		}
		this.ws.send(data);
	}

	close(): Promise<void> {
		return new Promise<void>((resolve) => {
			if (this.ws.readyState === WebSocket.CLOSED) {
				resolve();
				return;
			}
			const timer = setTimeout(() => {
				this.ws.terminate();
				resolve();
			}, CLOSE_TIMEOUT_MS);
			this.ws.once('close', () => {
				clearTimeout(timer);
				resolve();
			});
			this.ws.close(1000, 'runner closing');
		});
	}
}

export class WebSocketListener extends SingleConnectionListener {
	private server: WebSocketServer | null = null;

	async start(): Promise<ListenAddress> {
		if (this.server) throw new Error('Listener already started');

		const server = new WebSocketServer({ host: '127.0.0.1', port: 0 });
		this.server = server;

		await new Promise<void>((resolve, reject) => {
			server.once('listening', () => resolve());
			server.once('error', reject);
		});

		server.on('connection', (ws: WebSocket, request) => {
			const remote = `${request.socket.remoteAddress ?? 'unknown'}:${request.socket.remotePort ?? 0}`;
			if (!this.accept(new WebSocketConnection(ws, remote))) {
				ws.close(1008, REJECT_REASON);
				this.onRejected(`${REJECT_REASON} (refused ${remote})`);
			}
		});

		const { port } = portOf(server.address());
		const url = `ws://127.0.0.1:${port}`;
		return { transport: 'ws', url, workerArgs: ['--ws', url] };
	}

	protected closeServer(): Promise<void> {
		const server = this.server;
		if (!server) return Promise.resolve();
		return new Promise<void>((resolve, reject) => {
			// Rejected sockets may still be mid-handshake
			for (const client of server.clients) client.terminate();
			server.close((err) => (err ? reject(err) : resolve()));
		});
	}
}

// ---------------------------------------------------------------------------
// Raw socket transport (TCP or Unix domain socket / named pipe)
// ---------------------------------------------------------------------------

class SocketConnection extends BufferedConnection {
	readonly remoteAddress: string;

	constructor(private readonly socket: Socket, remoteAddress: string) {
		super();
		this.remoteAddress = remoteAddress;

		socket.on('data', (chunk: Buffer) => this.received(chunk));
		socket.on('close', (hadError: boolean) => {
			this.ended(hadError ? 'socket closed after an error' : 'socket closed');
		});
		socket.on('error', (err: Error) => {
			if (this.open) this.ended(`socket error: ${err.message}`);
		});
	}

	write(data: Buffer): void {
		if (this.socket.destroyed || !this.socket.writable) {
			throw new Error('Connection is not open');
		}
		this.socket.write(data);
	}

	close(): Promise<void> {
		return new Promise<void>((resolve) => {
			if (this.socket.destroyed) {
				resolve();
				return;
			}
			const timer = setTimeout(() => {
				this.socket.destroy();
				resolve();
			}, CLOSE_TIMEOUT_MS);
			this.socket.once('close', () => {
				clearTimeout(timer);
				resolve();
			});
			this.socket.end();
		});
	}
}

export class SocketListener extends SingleConnectionListener {
	private server: Server | null = null;
	private readonly path: string;

	constructor(
		private readonly transport: 'tcp' | 'pipe',
		options: ListenerOptions = {},
	) {
		super(options);
		this.path = options.path ?? defaultPipePath();
	}

	async start(): Promise<ListenAddress> {
		if (this.server) throw new Error('Listener already started');

		const server = createServer((socket) => {
			const remote =
				this.transport === 'tcp' ? `${socket.remoteAddress ?? 'unknown'}:${socket.remotePort ?? 0}` : this.path;
			if (!this.accept(new SocketConnection(socket, remote))) {
				socket.destroy();
				this.onRejected(`${REJECT_REASON} (refused ${remote})`);
			}
		});
		this.server = server;

		await new Promise<void>((resolve, reject) => {
			server.once('error', reject);
			if (this.transport === 'tcp') {
				server.listen({ host: '127.0.0.1', port: 0 }, () => resolve());
			} else {
				server.listen({ path: this.path }, () => resolve());
			}
		});

		if (this.transport === 'pipe') {
			return { transport: 'pipe', url: this.path, workerArgs: ['--pipe', this.path] };
		}
		const { port } = portOf(server.address());
		return { transport: 'tcp', url: `tcp://127.0.0.1:${port}`, workerArgs: ['--tcp', String(port)] };
	}

	protected closeServer(): Promise<void> {
		const server = this.server;
		if (!server?.listening) return Promise.resolve();
		return new Promise<void>((resolve, reject) => {
			server.close((err) => (err ? reject(err) : resolve()));
		});
	}
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function portOf(address: AddressInfo | string | null): AddressInfo {
	if (address === null || typeof address === 'string') {
		throw new Error(`Listener is not bound to a TCP port (${String(address)})`);
	}
	return address;
}

function defaultPipePath(): string {
	const name = `testwire-${randomUUID()}`;
	return process.platform === 'win32' ? `\\\\.\\pipe\\${name}` : join(tmpdir(), `${name}.sock`);
}

function toBuffer(data: RawData): Buffer {
	if (Buffer.isBuffer(data)) return data;
	if (Array.isArray(data)) return Buffer.concat(data);
	return Buffer.from(data);
}
