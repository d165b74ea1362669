/**
 * Session types
 */

export type SessionState = "open" | "sealed" | "expired";

/**
 * Parameters the writer sends to open a session. The shared secret never
 * leaves the clients: the server only learns the KDF salt, the nonce base
 * and a hash of the reader-auth key.
 */
export interface HandshakeParams {
  kdf: "hkdf-sha256";
  salt: string; // base64, 16 bytes
  nonceBase: string; // base64, 12 bytes
  readerVerifier: string; // base64 SHA-256 of the reader-auth key
}

/**
 * Public view of a session, as served to writers and readers
 */
export interface SessionInfo {
  id: string;
  state: SessionState;
  createdAt: number;
  lastActivityAt: number;
  nextWriteSeq: number;
  ackedThrough: number; // -1 until the first ack
  capacity: number;
  kdf: "hkdf-sha256";
  salt: string;
  nonceBase: string;
  readerVerifier: string;
}

export interface OpenSessionResponse {
  sessionId: string;
  writeToken: string; // EdDSA JWT scoped to this session
  session: SessionInfo;
}
