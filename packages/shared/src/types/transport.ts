/**
 * Abstract request/response channel between the pipe clients and the server
 */

import type { AppendOutcome, ChunkRecord, FetchOutcome } from "./chunk.js";
import type {
  HandshakeParams,
  OpenSessionResponse,
  SessionInfo,
} from "./session.js";

export interface RequestOptions {
  signal?: AbortSignal;
}

export interface FetchChunkOptions extends RequestOptions {
  /** Bounded server-side long-poll while the chunk is not yet written */
  waitMs?: number;
}

export interface PipeTransport {
  openSession(
    params: HandshakeParams,
    options?: RequestOptions
  ): Promise<OpenSessionResponse>;

  /** @throws SessionNotFoundError */
  describeSession(
    sessionId: string,
    options?: RequestOptions
  ): Promise<SessionInfo>;

  appendChunk(
    sessionId: string,
    writeToken: string,
    chunk: ChunkRecord,
    options?: RequestOptions
  ): Promise<AppendOutcome>;

  fetchChunk(
    sessionId: string,
    seq: number,
    options?: FetchChunkOptions
  ): Promise<FetchOutcome>;

  /** Acknowledge every chunk up to and including `seq` */
  ack(
    sessionId: string,
    seq: number,
    readerAuth: Uint8Array,
    options?: RequestOptions
  ): Promise<{ ackedThrough: number }>;

  /** Writer-side close: seal the session */
  sealSession(
    sessionId: string,
    writeToken: string,
    options?: RequestOptions
  ): Promise<SessionInfo>;

  /** Reader-side close of a sealed, fully acked session */
  closeSession(
    sessionId: string,
    readerAuth: Uint8Array,
    options?: RequestOptions
  ): Promise<void>;
}
