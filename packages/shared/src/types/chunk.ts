/**
 * Chunk types
 */

import type { SessionState } from "./session.js";

/**
 * A sequence-numbered unit of compressed, encrypted plaintext
 */
export interface ChunkRecord {
  seq: number;
  ciphertext: Uint8Array;
  tag: Uint8Array;
  isLast: boolean;
  plaintextLen: number;
  compressedLen: number;
}

/**
 * Result of a chunk-store append. Conflicts and lifecycle failures are
 * thrown; these are the outcomes a writer reconciles locally.
 */
export type AppendResult =
  | {
      status: "accepted";
      seq: number;
      nextWriteSeq: number;
      duplicate: boolean;
      sealed: boolean;
    }
  | { status: "sequence_mismatch"; expected: number }
  | { status: "store_full" };

export type FetchResult =
  | { status: "ok"; chunk: ChunkRecord }
  | { status: "not_yet_available"; nextWriteSeq: number; state: SessionState };

/**
 * Transport-level outcomes additionally report a vanished session as a value
 */
export type AppendOutcome = AppendResult | { status: "session_not_found" };

export type FetchOutcome = FetchResult | { status: "session_not_found" };
