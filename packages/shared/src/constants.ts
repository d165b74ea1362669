/**
 * Shared constants
 */

/**
 * Wire protocol version, bound into every chunk's associated data
 */
export const PROTOCOL_VERSION = "rpipe/v1" as const;

/**
 * Endpoints
 */
export const ENDPOINTS = {
  HEALTH: "/health",
  SESSIONS: "/sessions",
  SESSION: "/sessions/:id",
  SESSION_SEAL: "/sessions/:id/seal",
  SESSION_ACK: "/sessions/:id/ack",
  CHUNK: "/sessions/:id/chunks/:seq",
} as const;

/**
 * HTTP headers
 */
export const HEADERS = {
  AUTHORIZATION: "authorization",
  READER_AUTH: "x-rpipe-reader-auth",
  RETRY_AFTER: "retry-after",
  CONTENT_TYPE_JSON: "application/json",
} as const;

/**
 * JWT claims for writer tokens
 */
export const TOKEN_CLAIMS = {
  ISSUER: "rpipe-server",
  WRITER_AUDIENCE: "rpipe:writer",
} as const;

/**
 * Key schedule parameters
 */
export const CRYPTO_PARAMS = {
  KDF: "hkdf-sha256",
  CIPHER: "aes-256-gcm",
  KEY_BYTES: 32,
  SALT_BYTES: 16,
  NONCE_BYTES: 12,
  TAG_BYTES: 16,
  CHUNK_KEY_INFO: "rpipe/v1 chunk key",
  READER_AUTH_INFO: "rpipe/v1 reader auth",
} as const;

/**
 * Retry configuration: exponential backoff, base * 2^attempt capped at capMs
 */
export const RETRY_CONFIG = {
  MAX_ATTEMPTS: 5,
  BACKOFF_BASE_MS: 250,
  BACKOFF_CAP_MS: 8000,
} as const;
