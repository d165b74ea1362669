/**
 * Writer end of a pipe: re-chunks, compresses, encrypts and appends
 */

import type { Logger } from "pino";
import {
	DEFAULT_CLIENT_OPTIONS,
	SequenceMismatchError,
	SessionNotFoundError,
	SessionSealedError,
	TransferFailedError,
	concatBytes,
} from "@rpipe/shared";
import type { ChunkRecord, PipeTransport, RetryPolicy } from "@rpipe/shared";
import { Compressor, type CompressionLevel } from "./codec.js";
import { CryptoBox, type Secret } from "./crypto-box.js";
import {
	backoffDelay,
	resolveRetryPolicy,
	sleep as defaultSleep,
	withRetry,
	type RetryOptions,
	type Sleep,
} from "./retry.js";

export interface PipeWriterOptions {
	chunkSize?: number;
	retry?: Partial<RetryPolicy>;
	compressionLevel?: CompressionLevel;
	logger?: Logger;
	signal?: AbortSignal;
	sleep?: Sleep;
}

type WriterState = "open" | "closing" | "closed" | "failed";

// Encoded chunks held before the writer waits for the server
const MAX_QUEUED_CHUNKS = 4;

export class PipeWriter {
	private readonly chunkSize: number;
	private readonly policy: RetryPolicy;
	private readonly wait: Sleep;
	private readonly compressor: Compressor;

	private pending: Uint8Array[] = [];
	private pendingBytes = 0;
	private queue: ChunkRecord[] = []; // encoded, not yet accepted by the server
	private nextSeq = 0;
	private lastAcceptedSeq = -1;
	private bytesIn = 0;

	private state: WriterState = "open";
	private failure: unknown = null;
	private chain: Promise<void> = Promise.resolve();

	private constructor(
		private readonly transport: PipeTransport,
		private readonly box: CryptoBox,
		private readonly session: { id: string; writeToken: string; readerAuth: Uint8Array },
		private readonly options: PipeWriterOptions,
	) {
		this.chunkSize = options.chunkSize ?? DEFAULT_CLIENT_OPTIONS.chunkSize;
		if (!Number.isInteger(this.chunkSize) || this.chunkSize < 1) {
			throw new RangeError("chunkSize must be a positive integer");
		}
		this.policy = resolveRetryPolicy(options.retry);
		this.wait = options.sleep ?? defaultSleep;
		this.compressor = new Compressor(options.compressionLevel);
	}

	/**
	 * Open a session and return a writer for it. The session id is what the
	 * reader needs, together with the shared secret.
	 */
	static async open(
		transport: PipeTransport,
		secret: Secret,
		options: PipeWriterOptions = {},
	): Promise<PipeWriter> {
		const { box, handshake, readerAuth } = CryptoBox.create(secret);
		const policy = resolveRetryPolicy(options.retry);

		// A retried open may leave an orphaned session behind; the TTL reclaims it
		const opened = await withRetry(
			"open session",
			() => transport.openSession(handshake, { signal: options.signal }),
			{ policy, signal: options.signal, sleep: options.sleep },
		);

		options.logger?.info({ sessionId: opened.sessionId }, "Pipe session opened");

		return new PipeWriter(
			transport,
			box,
			{ id: opened.sessionId, writeToken: opened.writeToken, readerAuth },
			options,
		);
	}

	get sessionId(): string {
		return this.session.id;
	}

	get writeToken(): string {
		return this.session.writeToken;
	}

	/** Credential for the reader's ack and close; derivable from the secret */
	get readerAuth(): Uint8Array {
		return this.session.readerAuth;
	}

	/** Plaintext bytes accepted by `write` so far */
	get bytesWritten(): number {
		return this.bytesIn;
	}

	/** Number of chunks the server has accepted */
	get chunksAccepted(): number {
		return this.lastAcceptedSeq + 1;
	}

	/** Encoded chunks not yet accepted by the server */
	get chunksInFlight(): number {
		return this.queue.length;
	}

	/**
	 * Queue `data` for the pipe. Resolves once every full chunk it completes
	 * has been accepted by the server. At most a few chunks are encoded ahead
	 * of the server, so a large write is paced by its backpressure.
	 */
	write(data: Uint8Array): Promise<void> {
		return this.enqueue(async () => {
			this.assertWritable();
			if (data.byteLength === 0) return;

			this.pending.push(data);
			this.pendingBytes += data.byteLength;
			this.bytesIn += data.byteLength;

			// Hold one piece back so the last chunk can carry the end-of-stream flag
			while (this.pendingBytes > this.chunkSize) {
				this.encode(this.take(this.chunkSize), false);
				if (this.queue.length >= MAX_QUEUED_CHUNKS) {
					await this.drain();
				}
			}
			await this.drain();

			// The held-back remainder may still view the caller's buffer
			if (this.pending.length > 0) {
				this.pending = [concatBytes(this.pending)];
			}
		});
	}

	/**
	 * Write everything from `source`, then close
	 */
	async pipeFrom(source: AsyncIterable<Uint8Array> | Iterable<Uint8Array>): Promise<void> {
		for await (const piece of source) {
			await this.write(piece);
		}
		await this.close();
	}

	/**
	 * Send the final chunk and seal the session. Calling it again after it
	 * succeeded is a no-op.
	 */
	close(): Promise<void> {
		return this.enqueue(async () => {
			if (this.state === "closed") return;
			this.assertWritable();
			this.state = "closing";

			this.encode(this.take(this.pendingBytes), true);
			await this.drain();

			try {
				await withRetry(
					"seal session",
					() =>
						this.transport.sealSession(this.session.id, this.session.writeToken, {
							signal: this.options.signal,
						}),
					this.retryOptions(),
				);
			} catch (err) {
				// The final chunk already sealed the stream; a fast reader may have
				// drained and closed the session before this request arrived
				if (!(err instanceof SessionNotFoundError)) throw err;
				this.options.logger?.debug(
					{ sessionId: this.session.id },
					"Session already drained by the reader",
				);
			}

			this.state = "closed";
			this.options.logger?.info(
				{ sessionId: this.session.id, chunks: this.nextSeq, bytes: this.bytesIn },
				"Pipe sealed",
			);
		});
	}

	/**
	 * Stop writing without sealing. A write or close in progress rejects with
	 * `reason` once its current append returns. The server reclaims the
	 * session once its TTL runs out.
	 */
	abort(reason: unknown = new Error("Writer aborted")): void {
		if (this.state === "closed") return;
		this.state = "failed";
		this.failure = reason;
		this.pending = [];
		this.pendingBytes = 0;
		this.queue = [];
	}

	private enqueue<T>(task: () => Promise<T>): Promise<T> {
		const run = this.chain.then(task);
		this.chain = run.then(
			() => undefined,
			(err: unknown) => {
				if (this.state === "open" || this.state === "closing") {
					this.state = "failed";
					this.failure = err;
				}
			},
		);
		return run;
	}

	private assertWritable(): void {
		if (this.state === "failed") {
			throw this.failure;
		}
		if (this.state !== "open") {
			throw new SessionSealedError(`Writer for session ${this.session.id} is closed`);
		}
	}

	private throwIfAborted(): void {
		if (this.state === "failed") {
			throw this.failure;
		}
	}

	private take(bytes: number): Uint8Array {
		const parts: Uint8Array[] = [];
		let needed = Math.min(bytes, this.pendingBytes);
		this.pendingBytes -= needed;

		while (needed > 0 && this.pending.length > 0) {
			const head = this.pending[0];
			if (head.byteLength <= needed) {
				parts.push(head);
				this.pending.shift();
				needed -= head.byteLength;
			} else {
				parts.push(head.subarray(0, needed));
				this.pending[0] = head.subarray(needed);
				needed = 0;
			}
		}
		return concatBytes(parts);
	}

	private encode(plaintext: Uint8Array, isLast: boolean): void {
		const seq = this.nextSeq++;
		const compressed = this.compressor.compressFrame(plaintext, isLast);
		const { ciphertext, tag } = this.box.seal(seq, compressed, isLast);

		this.queue.push({
			seq,
			ciphertext,
			tag,
			isLast,
			plaintextLen: plaintext.byteLength,
			compressedLen: compressed.byteLength,
		});
	}

	/**
	 * Append queued chunks one at a time, in order
	 */
	private async drain(): Promise<void> {
		let fullAttempts = 0;
		let resyncs = 0;

		while (this.queue.length > 0) {
			const chunk = this.queue[0];
			let sends = 0;
			const outcome = await withRetry(
				`append chunk ${chunk.seq}`,
				() => {
					sends++;
					return this.transport.appendChunk(this.session.id, this.session.writeToken, chunk, {
						signal: this.options.signal,
					});
				},
				this.retryOptions(),
			);
			this.throwIfAborted();

			switch (outcome.status) {
				case "accepted":
					this.queue.shift();
					this.lastAcceptedSeq = outcome.seq;
					fullAttempts = 0;
					resyncs = 0;
					if (outcome.duplicate) {
						this.options.logger?.debug(
							{ sessionId: this.session.id, seq: outcome.seq },
							"Chunk already stored",
						);
					}
					break;

				case "sequence_mismatch":
					if (++resyncs > this.policy.maxAttempts) {
						throw new SequenceMismatchError(outcome.expected, chunk.seq);
					}
					this.resync(outcome.expected, chunk.seq);
					break;

				case "store_full": {
					fullAttempts++;
					if (fullAttempts >= this.policy.maxAttempts) {
						throw new TransferFailedError(
							`Chunk ${chunk.seq} rejected: server buffer stayed full`,
							fullAttempts,
						);
					}
					const delayMs = backoffDelay(fullAttempts - 1, this.policy);
					this.options.logger?.debug(
						{ sessionId: this.session.id, seq: chunk.seq, delayMs },
						"Server buffer full, backing off",
					);
					await this.wait(delayMs, this.options.signal);
					this.throwIfAborted();
					break;
				}

				case "session_not_found":
					// An earlier send of the final chunk may have landed with its
					// response lost, letting the reader drain and close the session
					if (chunk.isLast && sends > 1) {
						this.queue.shift();
						this.lastAcceptedSeq = chunk.seq;
						this.options.logger?.debug(
							{ sessionId: this.session.id, seq: chunk.seq },
							"Session already drained by the reader",
						);
						break;
					}
					throw new SessionNotFoundError(this.session.id);
			}
		}
	}

	/**
	 * Reconcile with the server's view of the next sequence number
	 *
	 * @throws SequenceMismatchError when the server expects a chunk this
	 * writer no longer holds or has not produced
	 */
	private resync(expected: number, sent: number): void {
		if (expected <= this.lastAcceptedSeq || expected >= this.nextSeq) {
			throw new SequenceMismatchError(expected, sent);
		}

		this.options.logger?.warn(
			{ sessionId: this.session.id, expected, sent },
			"Resyncing with server",
		);

		const dropped = this.queue.filter((c) => c.seq < expected);
		this.queue = this.queue.filter((c) => c.seq >= expected);
		if (dropped.length > 0) {
			this.lastAcceptedSeq = expected - 1;
		}
	}

	private retryOptions(): RetryOptions {
		return {
			policy: this.policy,
			signal: this.options.signal,
			sleep: this.wait,
			onRetry: (attempt, delayMs, error) => {
				this.options.logger?.warn(
					{ sessionId: this.session.id, attempt, delayMs, err: error },
					"Retrying after transport error",
				);
			},
		};
	}
}
