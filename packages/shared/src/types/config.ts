/**
 * Configuration types - rpipe.config.json and client options
 */

import { RETRY_CONFIG } from "../constants.js";

export interface PipeServerConfig {
  port: number;
  bindAddress: string;
  bufferCapacity: number; // max unacked chunks retained per session
  sessionTtlMs: number; // inactivity before expiry
  sweepIntervalMs: number;
  appendWaitMs: number; // max time an append blocks on a full buffer
  maxFetchWaitMs: number; // max long-poll for a chunk not yet written
  maxChunkBytes: number; // ciphertext bytes per chunk
  maxSessions: number;
  tokenTtlMs: number; // writer token lifetime
  keyDir: string; // default ".rpipe/keys"
}

export interface RetryPolicy {
  maxAttempts: number;
  baseMs: number;
  capMs: number;
}

export interface PipeClientOptions {
  chunkSize: number; // plaintext bytes per chunk before compression
  retry: RetryPolicy;
  fetchWaitMs: number;
  idleTimeoutMs: number; // reader gives up after this long without a new chunk
}

/**
 * Default server configuration
 */
export const DEFAULT_SERVER_CONFIG: PipeServerConfig = {
  port: 7878,
  bindAddress: "127.0.0.1",
  bufferCapacity: 32,
  sessionTtlMs: 5 * 60 * 1000, // 5 minutes idle
  sweepIntervalMs: 30 * 1000,
  appendWaitMs: 10 * 1000,
  maxFetchWaitMs: 25 * 1000,
  maxChunkBytes: 4 * 1024 * 1024, // 4MB
  maxSessions: 1024,
  tokenTtlMs: 24 * 60 * 60 * 1000, // 24 hours
  keyDir: ".rpipe/keys",
};

/**
 * Default client options
 */
export const DEFAULT_CLIENT_OPTIONS: PipeClientOptions = {
  chunkSize: 64 * 1024, // 64KB
  retry: {
    maxAttempts: RETRY_CONFIG.MAX_ATTEMPTS,
    baseMs: RETRY_CONFIG.BACKOFF_BASE_MS,
    capMs: RETRY_CONFIG.BACKOFF_CAP_MS,
  },
  fetchWaitMs: 20 * 1000,
  idleTimeoutMs: 10 * 60 * 1000,
};
