/**
 * Session management - pipe session table, lifecycle state machine and
 * access control
 */

import { nanoid } from "nanoid";
import {
  SignJWT,
  importPKCS8,
  importSPKI,
  jwtVerify,
  type KeyLike,
} from "jose";
import { createHash, timingSafeEqual } from "node:crypto";
import type { Logger } from "pino";
import {
  AccessDeniedError,
  BadRequestError,
  CRYPTO_PARAMS,
  SessionNotDrainedError,
  SessionNotFoundError,
  StoreFullError,
  TOKEN_CLAIMS,
  fromBase64,
} from "@rpipe/shared";
import type {
  AppendResult,
  ChunkRecord,
  FetchResult,
  HandshakeParams,
  OpenSessionResponse,
  PipeServerConfig,
  SessionInfo,
  SessionState,
} from "@rpipe/shared";
import { ChunkStore, type AppendOptions, type FetchOptions } from "./chunk-store.js";
import { KeyedLock } from "./keyed-lock.js";
import type { SigningKeyPair } from "./crypto.js";

export interface SessionManagerOptions {
  config: PipeServerConfig;
  signingKeys: SigningKeyPair;
  logger: Logger;
  now?: () => number;
}

interface PipeSession {
  id: string;
  createdAt: number;
  lastActivityAt: number;
  state: SessionState;
  handshake: HandshakeParams;
  verifier: Buffer;
}

export class SessionManager {
  private sessions = new Map<string, PipeSession>();
  private privateKey: KeyLike | null = null;
  private publicKey: KeyLike | null = null;
  private locks = new KeyedLock();
  private now: () => number;
  private log: Logger;
  readonly store: ChunkStore;

  constructor(private options: SessionManagerOptions) {
    this.now = options.now ?? Date.now;
    this.log = options.logger;
    this.store = new ChunkStore({
      capacity: options.config.bufferCapacity,
      appendWaitMs: options.config.appendWaitMs,
      maxFetchWaitMs: options.config.maxFetchWaitMs,
      maxChunkBytes: options.config.maxChunkBytes,
      logger: options.logger,
    });
  }

  async initialize() {
    this.privateKey = await importPKCS8(
      this.options.signingKeys.privateKey,
      "EdDSA"
    );
    this.publicKey = await importSPKI(
      this.options.signingKeys.publicKey,
      "EdDSA"
    );
  }

  get size(): number {
    return this.sessions.size;
  }

  async openSession(params: HandshakeParams): Promise<OpenSessionResponse> {
    if (!this.privateKey) {
      throw new Error("SessionManager not initialized");
    }
    if (this.sessions.size >= this.options.config.maxSessions) {
      throw new StoreFullError(
        `Session limit of ${this.options.config.maxSessions} reached`
      );
    }

    requireLength(params.salt, CRYPTO_PARAMS.SALT_BYTES, "salt");
    requireLength(params.nonceBase, CRYPTO_PARAMS.NONCE_BYTES, "nonceBase");
    const verifier = Buffer.from(
      requireLength(params.readerVerifier, 32, "readerVerifier")
    );

    const sessionId = nanoid();
    const now = this.now();

    const writeToken = await new SignJWT({ sid: sessionId })
      .setProtectedHeader({ alg: "EdDSA" })
      .setIssuer(TOKEN_CLAIMS.ISSUER)
      .setAudience(TOKEN_CLAIMS.WRITER_AUDIENCE)
      .setSubject(sessionId)
      .setIssuedAt()
      .setExpirationTime(
        `${Math.floor(this.options.config.tokenTtlMs / 1000)}s`
      )
      .sign(this.privateKey);

    const session: PipeSession = {
      id: sessionId,
      createdAt: now,
      lastActivityAt: now,
      state: "open",
      handshake: params,
      verifier,
    };

    this.sessions.set(sessionId, session);
    this.store.create(sessionId);
    this.log.info({ sessionId }, "Session opened");

    return { sessionId, writeToken, session: this.describe(sessionId) };
  }

  describe(sessionId: string): SessionInfo {
    const session = this.require(sessionId);
    const stats = this.store.stats(sessionId);

    return {
      id: session.id,
      state: session.state,
      createdAt: session.createdAt,
      lastActivityAt: session.lastActivityAt,
      nextWriteSeq: stats.nextWriteSeq,
      ackedThrough: stats.ackedThrough,
      capacity: this.store.capacity,
      kdf: session.handshake.kdf,
      salt: session.handshake.salt,
      nonceBase: session.handshake.nonceBase,
      readerVerifier: session.handshake.readerVerifier,
    };
  }

  /**
   * @throws AccessDeniedError unless `token` is a writer token for this session
   */
  async verifyWriter(sessionId: string, token: string): Promise<void> {
    if (!this.publicKey) {
      throw new Error("SessionManager not initialized");
    }
    this.require(sessionId);

    try {
      await jwtVerify(token, this.publicKey, {
        algorithms: ["EdDSA"],
        issuer: TOKEN_CLAIMS.ISSUER,
        audience: TOKEN_CLAIMS.WRITER_AUDIENCE,
        subject: sessionId,
      });
    } catch (err) {
      throw new AccessDeniedError("Invalid write token", { cause: err });
    }
  }

  /**
   * @throws AccessDeniedError unless SHA-256(readerAuth) matches the verifier
   * the writer registered at open
   */
  verifyReader(sessionId: string, readerAuth: Uint8Array): void {
    const session = this.require(sessionId);
    const presented = createHash("sha256").update(readerAuth).digest();

    if (!timingSafeEqual(presented, session.verifier)) {
      throw new AccessDeniedError("Invalid reader credentials");
    }
  }

  async appendChunk(
    sessionId: string,
    chunk: ChunkRecord,
    options: AppendOptions = {}
  ): Promise<AppendResult> {
    // Appends are serialized per session; fetch and ack never take this lock
    return this.locks.run(sessionId, async () => {
      const session = this.require(sessionId);
      this.touch(session);

      const result = await this.store.append(sessionId, chunk, options);
      this.touch(session);

      if (result.status === "accepted" && result.sealed && session.state === "open") {
        session.state = "sealed";
        this.log.info(
          { sessionId, chunks: result.nextWriteSeq },
          "Session sealed by final chunk"
        );
      } else if (result.status === "sequence_mismatch") {
        this.log.warn(
          { sessionId, seq: chunk.seq, expected: result.expected },
          "Sequence mismatch"
        );
      }

      return result;
    });
  }

  async fetchChunk(
    sessionId: string,
    seq: number,
    options: FetchOptions = {}
  ): Promise<FetchResult> {
    const session = this.require(sessionId);
    this.touch(session);

    const result = await this.store.fetch(sessionId, seq, options);
    this.touch(session);

    return result;
  }

  ack(sessionId: string, seq: number): number {
    const session = this.require(sessionId);
    this.touch(session);

    const ackedThrough = this.store.ack(sessionId, seq);
    this.log.debug({ sessionId, ackedThrough }, "Chunks acked");
    return ackedThrough;
  }

  /**
   * Writer-side close: no further appends are accepted. Idempotent.
   */
  async seal(sessionId: string): Promise<SessionInfo> {
    return this.locks.run(sessionId, async () => {
      const session = this.require(sessionId);
      this.touch(session);

      if (session.state === "open") {
        this.store.seal(sessionId);
        session.state = "sealed";
        this.log.info({ sessionId }, "Session sealed by writer");
      }

      return this.describe(sessionId);
    });
  }

  /**
   * Reader-side close of a sealed, fully acked session. The session expires
   * immediately and its id stops resolving.
   */
  async close(sessionId: string): Promise<SessionInfo> {
    return this.locks.run(sessionId, async () => {
      const session = this.require(sessionId);

      if (session.state !== "sealed" || !this.store.isDrained(sessionId)) {
        throw new SessionNotDrainedError(
          `Session ${sessionId} cannot be closed before every chunk of a sealed stream is acked`
        );
      }

      const info = this.describe(sessionId);
      this.expire(session, "closed by reader");
      return { ...info, state: "expired" };
    });
  }

  /**
   * Expire every session idle for longer than the TTL. Each teardown takes
   * the session lock, so it never races an in-flight append.
   */
  async sweep(): Promise<string[]> {
    const ttl = this.options.config.sessionTtlMs;
    const candidates = Array.from(this.sessions.values())
      .filter((s) => this.now() - s.lastActivityAt > ttl)
      .map((s) => s.id);

    const expired: string[] = [];
    for (const id of candidates) {
      await this.locks.run(id, async () => {
        const session = this.sessions.get(id);
        // Activity while waiting for the lock keeps the session alive
        if (!session || this.now() - session.lastActivityAt <= ttl) return;

        this.expire(session, "idle");
        expired.push(id);
      });
    }

    return expired;
  }

  /**
   * Drop every session (shutdown)
   */
  clear(): void {
    for (const session of Array.from(this.sessions.values())) {
      this.expire(session, "shutdown");
    }
  }

  private expire(session: PipeSession, reason: string): void {
    session.state = "expired";
    this.store.release(session.id);
    this.sessions.delete(session.id);
    this.log.info({ sessionId: session.id, reason }, "Session expired");
  }

  private touch(session: PipeSession): void {
    session.lastActivityAt = this.now();
  }

  private require(sessionId: string): PipeSession {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new SessionNotFoundError(sessionId);
    }
    return session;
  }
}

function requireLength(base64: string, bytes: number, field: string): Uint8Array {
  const decoded = fromBase64(base64);
  if (decoded.byteLength !== bytes) {
    throw new BadRequestError(
      `${field} must be ${bytes} bytes, got ${decoded.byteLength}`
    );
  }
  return decoded;
}
