/**
 * JSON wire schemas (zod). Binary fields travel as base64 strings.
 */

import { z } from "zod";
import type { ChunkRecord } from "./types/chunk.js";
import { fromBase64, toBase64 } from "./encoding.js";

const BASE64_RE = /^[A-Za-z0-9+/]*={0,2}$/;

const base64 = z.string().regex(BASE64_RE, "must be base64");
const seqNumber = z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER);
const byteLength = z.number().int().nonnegative();

export const sessionIdSchema = z.string().regex(/^[A-Za-z0-9_-]{8,64}$/);

export const handshakeSchema = z.object({
  kdf: z.literal("hkdf-sha256"),
  salt: base64,
  nonceBase: base64,
  readerVerifier: base64,
});

export const sessionStateSchema = z.enum(["open", "sealed", "expired"]);

export const sessionInfoSchema = z.object({
  id: z.string(),
  state: sessionStateSchema,
  createdAt: z.number(),
  lastActivityAt: z.number(),
  nextWriteSeq: seqNumber,
  ackedThrough: z.number().int().min(-1),
  capacity: z.number().int().positive(),
  kdf: z.literal("hkdf-sha256"),
  salt: base64,
  nonceBase: base64,
  readerVerifier: base64,
});

export const wireChunkSchema = z.object({
  seq: seqNumber,
  ciphertext: base64,
  tag: base64,
  isLast: z.boolean(),
  plaintextLen: byteLength,
  compressedLen: byteLength,
});

export type WireChunk = z.infer<typeof wireChunkSchema>;

export const appendChunkBodySchema = wireChunkSchema.omit({ seq: true });

export const ackBodySchema = z.object({ seq: seqNumber });

export const errorBodySchema = z
  .object({
    ok: z.literal(false),
    code: z.string(),
    message: z.string(),
  })
  .passthrough();

export const openSessionResponseSchema = z.object({
  ok: z.literal(true),
  sessionId: z.string(),
  writeToken: z.string(),
  session: sessionInfoSchema,
});

export const sessionResponseSchema = z.object({
  ok: z.literal(true),
  session: sessionInfoSchema,
});

export const appendResponseSchema = z.object({
  ok: z.literal(true),
  status: z.literal("accepted"),
  seq: seqNumber,
  nextWriteSeq: seqNumber,
  duplicate: z.boolean(),
  sealed: z.boolean(),
});

export const fetchResponseSchema = z.discriminatedUnion("status", [
  z.object({
    ok: z.literal(true),
    status: z.literal("ok"),
    chunk: wireChunkSchema,
  }),
  z.object({
    ok: z.literal(true),
    status: z.literal("not_yet_available"),
    nextWriteSeq: seqNumber,
    state: sessionStateSchema,
  }),
]);

export const ackResponseSchema = z.object({
  ok: z.literal(true),
  ackedThrough: z.number().int().min(-1),
});

export const okResponseSchema = z.object({ ok: z.literal(true) });

export function chunkToWire(chunk: ChunkRecord): WireChunk {
  return {
    seq: chunk.seq,
    ciphertext: toBase64(chunk.ciphertext),
    tag: toBase64(chunk.tag),
    isLast: chunk.isLast,
    plaintextLen: chunk.plaintextLen,
    compressedLen: chunk.compressedLen,
  };
}

export function chunkFromWire(wire: WireChunk): ChunkRecord {
  return {
    seq: wire.seq,
    ciphertext: fromBase64(wire.ciphertext),
    tag: fromBase64(wire.tag),
    isLast: wire.isLast,
    plaintextLen: wire.plaintextLen,
    compressedLen: wire.compressedLen,
  };
}
