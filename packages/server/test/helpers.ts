import { pino } from "pino";
import { DEFAULT_SERVER_CONFIG } from "@rpipe/shared";
import type { ChunkRecord, PipeServerConfig } from "@rpipe/shared";

export const silentLogger = pino({ level: "silent" });

export function makeChunk(
  seq: number,
  text = `chunk-${seq}`,
  overrides: Partial<ChunkRecord> = {}
): ChunkRecord {
  const ciphertext = new TextEncoder().encode(text);
  return {
    seq,
    ciphertext,
    tag: new Uint8Array(16).fill(seq % 256),
    isLast: false,
    plaintextLen: ciphertext.byteLength,
    compressedLen: ciphertext.byteLength,
    ...overrides,
  };
}

export function testConfig(
  overrides: Partial<PipeServerConfig> = {}
): PipeServerConfig {
  return {
    ...DEFAULT_SERVER_CONFIG,
    bufferCapacity: 4,
    appendWaitMs: 0,
    maxFetchWaitMs: 200,
    ...overrides,
  };
}
