/**
 * Streaming codec - one raw DEFLATE stream per pipe session, cut into frames
 * at chunk boundaries.
 *
 * The sliding window carries over from frame to frame, so frames must reach
 * the decompressor complete and in the order they were produced. A stream
 * can only be restarted from its first frame.
 */

import { Deflate, Inflate, type DeflateOptions } from "fflate";
import { CodecError, concatBytes } from "@rpipe/shared";

export type CompressionLevel = NonNullable<DeflateOptions["level"]>;

export class Compressor {
	private deflate: Deflate;
	private output: Uint8Array[] = [];
	private finished = false;

	constructor(level: CompressionLevel = 6) {
		this.deflate = new Deflate({ level }, (data) => {
			this.output.push(data);
		});
	}

	/**
	 * Compress `data` into one frame. The final frame closes the stream.
	 */
	compressFrame(data: Uint8Array, final = false): Uint8Array {
		if (this.finished) {
			throw new CodecError("Compressor already produced its final frame");
		}

		this.deflate.push(data, final);
		if (final) {
			this.finished = true;
		} else {
			// Emit everything buffered so far instead of waiting for a full block
			this.deflate.flush();
		}

		const frame = concatBytes(this.output);
		this.output = [];
		return frame;
	}
}

export class Decompressor {
	private inflate: Inflate;
	private output: Uint8Array[] = [];
	private ended = false;
	private failure: CodecError | null = null;

	constructor() {
		this.inflate = new Inflate((data) => {
			this.output.push(data);
		});
	}

	/**
	 * Decompress the next frame. Output may trail the input by a few bits'
	 * worth of symbols until the following frame arrives; the final frame
	 * flushes everything.
	 *
	 * @throws CodecError on a malformed or truncated stream. The instance is
	 * unusable afterwards.
	 */
	decompressFrame(frame: Uint8Array, final = false): Uint8Array {
		if (this.failure) {
			throw this.failure;
		}
		if (this.ended) {
			throw new CodecError("Frame received after the final frame");
		}

		try {
			this.inflate.push(frame, final);
		} catch (err) {
			const reason = err instanceof Error ? err.message : String(err);
			this.failure = new CodecError(`Malformed compressed frame: ${reason}`, {
				cause: err,
			});
			throw this.failure;
		}

		if (final) {
			this.ended = true;
		}

		const data = concatBytes(this.output);
		this.output = [];
		return data;
	}
}

/**
 * Lazily compress a byte stream: one frame per input piece, the last piece
 * becoming the final frame (an empty final frame for empty input).
 */
export async function* compress(
	source: AsyncIterable<Uint8Array> | Iterable<Uint8Array>,
	level?: CompressionLevel,
): AsyncGenerator<Uint8Array> {
	const compressor = new Compressor(level);
	let held: Uint8Array | null = null;

	for await (const piece of source) {
		if (held) {
			yield compressor.compressFrame(held);
		}
		held = piece;
	}

	yield compressor.compressFrame(held ?? new Uint8Array(0), true);
}

/**
 * Lazily decompress frames produced by `compress`, in order
 */
export async function* decompress(
	frames: AsyncIterable<Uint8Array> | Iterable<Uint8Array>,
): AsyncGenerator<Uint8Array> {
	const decompressor = new Decompressor();
	let held: Uint8Array | null = null;

	for await (const frame of frames) {
		if (held) {
			const data = decompressor.decompressFrame(held);
			if (data.byteLength > 0) yield data;
		}
		held = frame;
	}

	if (!held) {
		throw new CodecError("Compressed stream has no frames");
	}
	const tail = decompressor.decompressFrame(held, true);
	if (tail.byteLength > 0) yield tail;
}
