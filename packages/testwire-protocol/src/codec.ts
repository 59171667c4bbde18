// ============================================================================
// testwire Protocol - Frame Codec
// Newline-delimited JSON. One frame = one JSON object + '\n'.
// Transport reads can split a frame anywhere or carry several frames at once,
// so the decoder buffers until it sees a delimiter.
// ============================================================================

import { z } from 'zod';
import { ProtocolError } from './errors.js';
import type { WireMessage } from './messages.js';

/** Largest frame accepted before the decoder gives up (64 MiB) */
export const DEFAULT_MAX_FRAME_BYTES = 64 * 1024 * 1024;

const NEWLINE = 0x0a;
const CARRIAGE_RETURN = 0x0d;

/** Any zod schema, whatever its input type */
export type FrameSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/**
 * Encode one message as a complete frame, delimiter included.
 * JSON.stringify escapes newlines inside strings, so the delimiter is unambiguous.
 */
export function encodeFrame(message: WireMessage): Buffer {
	return Buffer.from(`${JSON.stringify(message)}\n`, 'utf-8');
}

/**
 * Decode a single frame (without its delimiter) and validate it.
 *
 * @throws ProtocolError for invalid JSON, a non-object, or a schema mismatch
 */
export function decodeFrame<T>(bytes: Buffer | string, schema: FrameSchema<T>): T {
	const text = typeof bytes === 'string' ? bytes : bytes.toString('utf-8');

	let raw: unknown;
	try {
		raw = JSON.parse(text);
	} catch (err) {
		throw new ProtocolError(`Malformed frame: ${preview(text)}`, { cause: err });
	}

	if (raw === null || typeof raw !== 'object' || Array.isArray(raw)) {
		throw new ProtocolError(`Frame is not a JSON object: ${preview(text)}`);
	}

	const result = schema.safeParse(raw);
	if (!result.success) {
		throw new ProtocolError(describeIssues(raw, result.error));
	}
	return result.data;
}

/**
 * Reassembles frames from arbitrarily split transport reads.
 *
 * ```ts
 * const decoder = new FrameDecoder(workerMessageSchema);
 * socket.on('data', (chunk) => decoder.feed(chunk, route));
 * ```
 *
 * After a ProtocolError the decoder refuses further input.
 */
export class FrameDecoder<T> {
	private buffered: Buffer[] = [];
	private bufferedBytes = 0;
	private failed = false;

	constructor(
		private readonly schema: FrameSchema<T>,
		private readonly maxFrameBytes: number = DEFAULT_MAX_FRAME_BYTES,
	) {}

	/** Number of bytes held while waiting for a delimiter */
	get pendingBytes(): number {
		return this.bufferedBytes;
	}

	/**
	 * Feed a chunk, calling onFrame for each complete frame in order.
	 * Frames before a bad frame in the same chunk are still delivered.
	 */
	feed(chunk: Buffer | string, onFrame: (frame: T) => void): void {
		if (this.failed) {
			throw new ProtocolError('Decoder stopped after an earlier framing error');
		}

		let data = typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : chunk;
		let newline = data.indexOf(NEWLINE);

		try {
			while (newline !== -1) {
				const head = data.subarray(0, newline);
				const frame =
					this.buffered.length > 0 ? Buffer.concat([...this.buffered, head]) : head;
				this.buffered = [];
				this.bufferedBytes = 0;
				data = data.subarray(newline + 1);
				newline = data.indexOf(NEWLINE);

				this.checkSize(frame.length);
				const body = frame.at(-1) === CARRIAGE_RETURN ? frame.subarray(0, -1) : frame;
				// Blank lines are keepalives
				if (body.length === 0) continue;
				onFrame(decodeFrame(body, this.schema));
			}

			if (data.length > 0) {
				this.buffered.push(data);
				this.bufferedBytes += data.length;
				this.checkSize(this.bufferedBytes);
			}
		} catch (err) {
			this.failed = true;
			this.buffered = [];
			this.bufferedBytes = 0;
			throw err;
		}
	}

	/** Feed a chunk and return the complete frames it finished */
	push(chunk: Buffer | string): T[] {
		const frames: T[] = [];
		this.feed(chunk, (frame) => frames.push(frame));
		return frames;
	}

	private checkSize(size: number): void {
		if (size > this.maxFrameBytes) {
			throw new ProtocolError(`Frame exceeds ${this.maxFrameBytes} bytes without a delimiter`);
		}
	}
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function preview(text: string): string {
	return text.length > 200 ? `${text.slice(0, 200)}...` : text;
}

function describeIssues(raw: object, error: z.ZodError): string {
	const issue = error.issues[0];
	if (!issue) return 'Invalid frame';

	if (issue.code === z.ZodIssueCode.invalid_union_discriminator) {
		const kind = 'messageKind' in raw ? raw.messageKind : undefined;
		return `Unknown message kind ${JSON.stringify(kind) ?? 'undefined'}`;
	}

	const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
	return `Invalid frame at ${path}: ${issue.message}`;
}
