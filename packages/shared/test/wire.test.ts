import { describe, expect, it } from "vitest";
import {
  appendChunkBodySchema,
  chunkFromWire,
  chunkToWire,
  concatBytes,
  fetchResponseSchema,
  fromBase64,
  handshakeSchema,
  toBase64,
} from "../src/index.js";
import type { ChunkRecord } from "../src/index.js";

describe("encoding", () => {
  it("encodes base64 from a view into a larger buffer", () => {
    const backing = new Uint8Array([0, 1, 2, 3, 4, 5]);
    expect(toBase64(backing.subarray(2, 5))).toBe("AgME");
    expect(Array.from(fromBase64("AgME"))).toEqual([2, 3, 4]);
  });

  it("concatenates byte arrays", () => {
    const joined = concatBytes([new Uint8Array([1, 2]), new Uint8Array(0), new Uint8Array([3])]);
    expect(Array.from(joined)).toEqual([1, 2, 3]);
    expect(concatBytes([]).byteLength).toBe(0);
  });
});

describe("wire schemas", () => {
  it("converts chunks to and from their JSON form", () => {
    const chunk: ChunkRecord = {
      seq: 7,
      ciphertext: new Uint8Array([104, 105]),
      tag: new Uint8Array(16).fill(1),
      isLast: true,
      plaintextLen: 2,
      compressedLen: 2,
    };

    const wire = chunkToWire(chunk);
    expect(wire.ciphertext).toBe("aGk=");
    expect(wire.tag).toBe("AQEBAQEBAQEBAQEBAQEBAQ==");

    const back = chunkFromWire(wire);
    expect(back.seq).toBe(7);
    expect(Array.from(back.ciphertext)).toEqual([104, 105]);
    expect(back.isLast).toBe(true);
  });

  it("rejects malformed handshakes", () => {
    expect(
      handshakeSchema.safeParse({
        kdf: "pbkdf2",
        salt: "AAAA",
        nonceBase: "AAAA",
        readerVerifier: "AAAA",
      }).success
    ).toBe(false);
    expect(
      handshakeSchema.safeParse({
        kdf: "hkdf-sha256",
        salt: "not base64!",
        nonceBase: "AAAA",
        readerVerifier: "AAAA",
      }).success
    ).toBe(false);
  });

  it("rejects negative lengths in an append body", () => {
    const parsed = appendChunkBodySchema.safeParse({
      ciphertext: "",
      tag: "AAAA",
      isLast: false,
      plaintextLen: -1,
      compressedLen: 0,
    });
    expect(parsed.success).toBe(false);
  });

  it("discriminates fetch responses on status", () => {
    const parsed = fetchResponseSchema.parse({
      ok: true,
      status: "not_yet_available",
      nextWriteSeq: 2,
      state: "open",
    });
    expect(parsed.status).toBe("not_yet_available");
  });
});
