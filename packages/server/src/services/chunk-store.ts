/**
 * In-memory chunk store - ordered, append-only buffer of encrypted chunks
 * per session with dedup, bounded capacity and ack-driven eviction
 */

import { createHash } from "node:crypto";
import { EventEmitter, once } from "node:events";
import type { Logger } from "pino";
import {
  AckOutOfRangeError,
  BadRequestError,
  CRYPTO_PARAMS,
  ChunkEvictedError,
  ChunkOutOfRangeError,
  PayloadTooLargeError,
  SequenceConflictError,
  SessionNotFoundError,
  SessionSealedError,
} from "@rpipe/shared";
import type { AppendResult, ChunkRecord, FetchResult } from "@rpipe/shared";

export interface ChunkStoreOptions {
  capacity: number; // max unacked chunks per session
  appendWaitMs: number; // upper bound for a blocked append
  maxFetchWaitMs: number; // upper bound for a fetch long-poll
  maxChunkBytes: number;
  logger?: Logger;
}

export interface AppendOptions {
  waitMs?: number;
}

export interface FetchOptions {
  waitMs?: number;
}

export interface BufferStats {
  nextWriteSeq: number;
  ackedThrough: number;
  buffered: number;
  sealed: boolean;
}

interface StoredChunk {
  record: ChunkRecord;
  digest: string;
}

interface SessionBuffer {
  chunks: Map<number, StoredChunk>; // unacked chunks, keyed by seq
  digests: Map<number, string>; // every accepted seq, survives eviction
  nextWriteSeq: number;
  ackedThrough: number;
  sealed: boolean;
  events: EventEmitter; // "appended" (new data or sealed), "acked" (space freed)
}

/**
 * SHA-256 over every field of a chunk; two appends of the same seq are the
 * same chunk iff their digests match.
 */
export function digestChunk(chunk: ChunkRecord): string {
  const header = Buffer.alloc(17);
  header.writeUInt8(chunk.isLast ? 1 : 0, 0);
  header.writeDoubleBE(chunk.plaintextLen, 1);
  header.writeDoubleBE(chunk.compressedLen, 9);

  return createHash("sha256")
    .update(header)
    .update(chunk.tag)
    .update(chunk.ciphertext)
    .digest("hex");
}

export class ChunkStore {
  private buffers = new Map<string, SessionBuffer>();

  constructor(private options: ChunkStoreOptions) {}

  get capacity(): number {
    return this.options.capacity;
  }

  get size(): number {
    return this.buffers.size;
  }

  create(sessionId: string): void {
    if (this.buffers.has(sessionId)) {
      throw new Error(`Buffer for session ${sessionId} already exists`);
    }

    const events = new EventEmitter();
    events.setMaxListeners(0); // one listener per blocked request

    this.buffers.set(sessionId, {
      chunks: new Map(),
      digests: new Map(),
      nextWriteSeq: 0,
      ackedThrough: -1,
      sealed: false,
      events,
    });
  }

  has(sessionId: string): boolean {
    return this.buffers.has(sessionId);
  }

  stats(sessionId: string): BufferStats {
    const buffer = this.require(sessionId);
    return {
      nextWriteSeq: buffer.nextWriteSeq,
      ackedThrough: buffer.ackedThrough,
      buffered: buffer.chunks.size,
      sealed: buffer.sealed,
    };
  }

  /**
   * Append the chunk at `chunk.seq`.
   *
   * Blocks while the buffer holds `capacity` unacked chunks, for at most
   * `waitMs` (capped at `appendWaitMs`), then reports `store_full`.
   *
   * @throws SequenceConflictError if `seq` is stored with different content
   * @throws SessionSealedError if the writer already finished
   */
  async append(
    sessionId: string,
    chunk: ChunkRecord,
    options: AppendOptions = {}
  ): Promise<AppendResult> {
    this.validate(chunk);

    const digest = digestChunk(chunk);
    const waitMs = Math.min(
      options.waitMs ?? this.options.appendWaitMs,
      this.options.appendWaitMs
    );
    const deadline = Date.now() + waitMs;

    for (;;) {
      const buffer = this.require(sessionId);

      if (chunk.seq < buffer.nextWriteSeq) {
        if (buffer.digests.get(chunk.seq) === digest) {
          this.options.logger?.debug(
            { sessionId, seq: chunk.seq },
            "Duplicate append acknowledged"
          );
          return {
            status: "accepted",
            seq: chunk.seq,
            nextWriteSeq: buffer.nextWriteSeq,
            duplicate: true,
            sealed: buffer.sealed,
          };
        }
        throw new SequenceConflictError(chunk.seq);
      }

      if (chunk.seq > buffer.nextWriteSeq) {
        return { status: "sequence_mismatch", expected: buffer.nextWriteSeq };
      }

      if (buffer.sealed) {
        throw new SessionSealedError(
          `Session ${sessionId} is sealed after ${buffer.nextWriteSeq} chunks`
        );
      }

      if (buffer.chunks.size < this.options.capacity) {
        buffer.chunks.set(chunk.seq, { record: chunk, digest });
        buffer.digests.set(chunk.seq, digest);
        buffer.nextWriteSeq = chunk.seq + 1;
        if (chunk.isLast) {
          buffer.sealed = true;
        }
        buffer.events.emit("appended", chunk.seq);

        return {
          status: "accepted",
          seq: chunk.seq,
          nextWriteSeq: buffer.nextWriteSeq,
          duplicate: false,
          sealed: buffer.sealed,
        };
      }

      // Backpressure: wait for the reader to ack
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        this.options.logger?.debug(
          { sessionId, seq: chunk.seq, capacity: this.options.capacity },
          "Append rejected: buffer full"
        );
        return { status: "store_full" };
      }
      await waitForEvent(buffer.events, "acked", remaining);
    }
  }

  /**
   * Fetch the chunk at `seq`, long-polling up to `waitMs` (capped at
   * `maxFetchWaitMs`) while the writer has not produced it.
   *
   * @throws ChunkEvictedError if the chunk was acked and evicted
   * @throws ChunkOutOfRangeError if `seq` is past the end of a sealed stream
   */
  async fetch(
    sessionId: string,
    seq: number,
    options: FetchOptions = {}
  ): Promise<FetchResult> {
    const waitMs = Math.min(options.waitMs ?? 0, this.options.maxFetchWaitMs);
    const deadline = Date.now() + waitMs;

    for (;;) {
      const buffer = this.require(sessionId);

      if (seq < buffer.nextWriteSeq) {
        const stored = buffer.chunks.get(seq);
        if (!stored) {
          throw new ChunkEvictedError(seq);
        }
        return { status: "ok", chunk: stored.record };
      }

      if (buffer.sealed) {
        throw new ChunkOutOfRangeError(seq, buffer.nextWriteSeq - 1);
      }

      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        return {
          status: "not_yet_available",
          nextWriteSeq: buffer.nextWriteSeq,
          state: "open",
        };
      }
      await waitForEvent(buffer.events, "appended", remaining);
    }
  }

  /**
   * Mark every chunk up to and including `seq` as consumed and evict it.
   * Returns the new ack watermark.
   */
  ack(sessionId: string, seq: number): number {
    const buffer = this.require(sessionId);

    if (seq >= buffer.nextWriteSeq) {
      throw new AckOutOfRangeError(seq, buffer.nextWriteSeq);
    }
    if (seq <= buffer.ackedThrough) {
      return buffer.ackedThrough;
    }

    for (let s = buffer.ackedThrough + 1; s <= seq; s++) {
      buffer.chunks.delete(s);
    }
    buffer.ackedThrough = seq;
    buffer.events.emit("acked", seq);

    return seq;
  }

  /**
   * Writer-side end of stream without a final chunk. Idempotent.
   */
  seal(sessionId: string): void {
    const buffer = this.require(sessionId);
    if (buffer.sealed) return;

    buffer.sealed = true;
    buffer.events.emit("appended", buffer.nextWriteSeq - 1);
  }

  /**
   * True once the stream is sealed and every chunk has been acked
   */
  isDrained(sessionId: string): boolean {
    const buffer = this.require(sessionId);
    return buffer.sealed && buffer.ackedThrough === buffer.nextWriteSeq - 1;
  }

  /**
   * Drop a session's buffer. Blocked appends and fetches wake up and fail
   * with SessionNotFoundError.
   */
  release(sessionId: string): void {
    const buffer = this.buffers.get(sessionId);
    if (!buffer) return;

    this.buffers.delete(sessionId);
    buffer.chunks.clear();
    buffer.events.emit("acked", -1);
    buffer.events.emit("appended", -1);
    buffer.events.removeAllListeners();
  }

  private require(sessionId: string): SessionBuffer {
    const buffer = this.buffers.get(sessionId);
    if (!buffer) {
      throw new SessionNotFoundError(sessionId);
    }
    return buffer;
  }

  private validate(chunk: ChunkRecord): void {
    if (!Number.isSafeInteger(chunk.seq) || chunk.seq < 0) {
      throw new BadRequestError(`Invalid sequence number ${chunk.seq}`);
    }
    if (chunk.tag.byteLength !== CRYPTO_PARAMS.TAG_BYTES) {
      throw new BadRequestError(
        `Auth tag must be ${CRYPTO_PARAMS.TAG_BYTES} bytes, got ${chunk.tag.byteLength}`
      );
    }
    if (chunk.ciphertext.byteLength > this.options.maxChunkBytes) {
      throw new PayloadTooLargeError(
        `Chunk of ${chunk.ciphertext.byteLength} bytes exceeds ${this.options.maxChunkBytes}`
      );
    }
  }
}

/**
 * Resolve true when `event` fires, false once `ms` elapses
 */
async function waitForEvent(
  emitter: EventEmitter,
  event: string,
  ms: number
): Promise<boolean> {
  try {
    await once(emitter, event, { signal: AbortSignal.timeout(ms) });
    return true;
  } catch (err) {
    if (err instanceof Error && err.name === "AbortError") {
      return false;
    }
    throw err;
  }
}
