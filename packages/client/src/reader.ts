/**
 * Reader end of a pipe: a lazy, single-pass stream of the writer's bytes
 */

import type { Logger } from "pino";
import {
	AuthError,
	ChunkOutOfRangeError,
	CodecError,
	DEFAULT_CLIENT_OPTIONS,
	SessionNotFoundError,
	TransferFailedError,
	concatBytes,
} from "@rpipe/shared";
import type {
	ChunkRecord,
	FetchOutcome,
	PipeTransport,
	RetryPolicy,
} from "@rpipe/shared";
import { Decompressor } from "./codec.js";
import { CryptoBox, type Secret } from "./crypto-box.js";
import {
	backoffDelay,
	resolveRetryPolicy,
	sleep as defaultSleep,
	withRetry,
	type RetryOptions,
	type Sleep,
} from "./retry.js";

export interface PipeReaderOptions {
	fetchWaitMs?: number;
	idleTimeoutMs?: number;
	retry?: Partial<RetryPolicy>;
	logger?: Logger;
	signal?: AbortSignal;
	sleep?: Sleep;
	now?: () => number;
}

export class PipeReader implements AsyncIterable<Uint8Array> {
	private readonly policy: RetryPolicy;
	private readonly wait: Sleep;
	private readonly now: () => number;
	private readonly fetchWaitMs: number;
	private readonly idleTimeoutMs: number;

	private started = false;
	private seq = 0;
	private bytesOut = 0;

	private constructor(
		private readonly transport: PipeTransport,
		private readonly box: CryptoBox,
		private readonly sessionId: string,
		private readonly readerAuth: Uint8Array,
		private readonly options: PipeReaderOptions,
	) {
		this.policy = resolveRetryPolicy(options.retry);
		this.wait = options.sleep ?? defaultSleep;
		this.now = options.now ?? Date.now;
		this.fetchWaitMs = options.fetchWaitMs ?? DEFAULT_CLIENT_OPTIONS.fetchWaitMs;
		this.idleTimeoutMs = options.idleTimeoutMs ?? DEFAULT_CLIENT_OPTIONS.idleTimeoutMs;
	}

	/**
	 * Attach to an existing session.
	 *
	 * @throws SessionNotFoundError if the id does not resolve
	 * @throws AuthError if `secret` is not the writer's
	 */
	static async open(
		transport: PipeTransport,
		secret: Secret,
		sessionId: string,
		options: PipeReaderOptions = {},
	): Promise<PipeReader> {
		const session = await withRetry(
			"describe session",
			() => transport.describeSession(sessionId, { signal: options.signal }),
			{
				policy: resolveRetryPolicy(options.retry),
				signal: options.signal,
				sleep: options.sleep,
			},
		);
		const { box, readerAuth } = CryptoBox.fromSession(secret, session);

		options.logger?.debug({ sessionId, state: session.state }, "Pipe reader attached");
		return new PipeReader(transport, box, sessionId, readerAuth, options);
	}

	/** Sequence number of the next chunk to read */
	get position(): number {
		return this.seq;
	}

	/** Plaintext bytes yielded so far */
	get bytesRead(): number {
		return this.bytesOut;
	}

	[Symbol.asyncIterator](): AsyncIterator<Uint8Array> {
		if (this.started) {
			throw new Error(`Pipe ${this.sessionId} can only be read once`);
		}
		this.started = true;
		return this.iterate();
	}

	/**
	 * Read the whole stream into memory
	 */
	async readAll(): Promise<Uint8Array> {
		const parts: Uint8Array[] = [];
		for await (const part of this) {
			parts.push(part);
		}
		return concatBytes(parts);
	}

	private async *iterate(): AsyncGenerator<Uint8Array> {
		const decompressor = new Decompressor();
		let expectedBytes = 0;

		for (;;) {
			const seq = this.seq;
			const { chunk, compressed } = await this.readChunk(seq);
			const data = decompressor.decompressFrame(compressed, chunk.isLast);
			expectedBytes += chunk.plaintextLen;

			if (data.byteLength > 0) {
				this.bytesOut += data.byteLength;
				yield data;
			}

			if (chunk.isLast) {
				if (this.bytesOut !== expectedBytes) {
					throw new CodecError(
						`Stream decoded to ${this.bytesOut} bytes, writer sent ${expectedBytes}`,
					);
				}
				await this.ack(seq);
				this.seq = seq + 1;
				await this.close();
				this.options.logger?.info(
					{ sessionId: this.sessionId, chunks: this.seq, bytes: this.bytesOut },
					"Pipe drained",
				);
				return;
			}

			// Consumer has taken the data: release the chunk before moving on
			await this.ack(seq);
			this.seq = seq + 1;
		}
	}

	/**
	 * Fetch and decrypt one chunk. A tag failure is retried with one fresh
	 * fetch before it is reported.
	 */
	private async readChunk(seq: number): Promise<{ chunk: ChunkRecord; compressed: Uint8Array }> {
		const chunk = await this.fetchChunk(seq);
		try {
			return { chunk, compressed: this.decrypt(seq, chunk) };
		} catch (err) {
			if (!(err instanceof AuthError)) throw err;
			this.options.logger?.warn(
				{ sessionId: this.sessionId, seq },
				"Chunk failed authentication, fetching again",
			);
		}

		const again = await this.fetchChunk(seq);
		return { chunk: again, compressed: this.decrypt(seq, again) };
	}

	private decrypt(seq: number, chunk: ChunkRecord): Uint8Array {
		// Opened under the requested seq, so a chunk served for the wrong slot fails its tag
		const compressed = this.box.open(seq, chunk.ciphertext, chunk.tag, chunk.isLast);
		if (compressed.byteLength !== chunk.compressedLen) {
			throw new CodecError(
				`Chunk ${seq} holds ${compressed.byteLength} compressed bytes, header says ${chunk.compressedLen}`,
			);
		}
		return compressed;
	}

	/**
	 * Long-poll for chunk `seq`, backing off between empty polls until the
	 * idle timeout
	 */
	private async fetchChunk(seq: number): Promise<ChunkRecord> {
		const deadline = this.now() + this.idleTimeoutMs;
		let polls = 0;

		for (;;) {
			let outcome: FetchOutcome;
			try {
				outcome = await withRetry(
					`fetch chunk ${seq}`,
					() =>
						this.transport.fetchChunk(this.sessionId, seq, {
							waitMs: this.fetchWaitMs,
							signal: this.options.signal,
						}),
					this.retryOptions(),
				);
			} catch (err) {
				if (err instanceof ChunkOutOfRangeError) {
					throw new CodecError(`Stream sealed at chunk ${err.lastSeq} without a final chunk`, {
						cause: err,
					});
				}
				throw err;
			}

			switch (outcome.status) {
				case "ok":
					return outcome.chunk;

				case "session_not_found":
					throw new SessionNotFoundError(this.sessionId);

				case "not_yet_available": {
					const remaining = deadline - this.now();
					if (remaining <= 0) {
						throw new TransferFailedError(
							`No chunk ${seq} from the writer within ${this.idleTimeoutMs}ms`,
							polls + 1,
						);
					}
					const delayMs = Math.min(backoffDelay(polls, this.policy), remaining);
					await this.wait(delayMs, this.options.signal);
					polls++;
					break;
				}
			}
		}
	}

	private async close(): Promise<void> {
		let sends = 0;
		try {
			await withRetry(
				"close session",
				() => {
					sends++;
					return this.transport.closeSession(this.sessionId, this.readerAuth, {
						signal: this.options.signal,
					});
				},
				this.retryOptions(),
			);
		} catch (err) {
			// A resent close finds the session already gone when the first one
			// landed and only its response was lost
			if (!(err instanceof SessionNotFoundError && sends > 1)) throw err;
			this.options.logger?.debug({ sessionId: this.sessionId }, "Session already closed");
		}
	}

	private async ack(seq: number): Promise<void> {
		await withRetry(
			`ack chunk ${seq}`,
			() =>
				this.transport.ack(this.sessionId, seq, this.readerAuth, {
					signal: this.options.signal,
				}),
			this.retryOptions(),
		);
	}

	private retryOptions(): RetryOptions {
		return {
			policy: this.policy,
			signal: this.options.signal,
			sleep: this.wait,
			onRetry: (attempt, delayMs, error) => {
				this.options.logger?.warn(
					{ sessionId: this.sessionId, attempt, delayMs, err: error },
					"Retrying after transport error",
				);
			},
		};
	}
}
