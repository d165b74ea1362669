/**
 * Per-session authenticated encryption (AES-256-GCM).
 *
 * Keys come from HKDF-SHA256 over the shared secret with a random per-session
 * salt. Nonces are never random: each one is the session's nonce base XORed
 * with the chunk's sequence number, so they stay unique as long as a sequence
 * number is sealed at most once per session.
 */

import {
	createCipheriv,
	createDecipheriv,
	createHash,
	hkdfSync,
	randomBytes,
	timingSafeEqual,
} from "node:crypto";
import {
	AuthError,
	CRYPTO_PARAMS,
	PROTOCOL_VERSION,
	fromBase64,
	toBase64,
} from "@rpipe/shared";
import type { HandshakeParams, SessionInfo } from "@rpipe/shared";

export type Secret = string | Uint8Array;

export interface SessionKeys {
	chunkKey: Uint8Array;
	readerAuth: Uint8Array;
}

export interface SealedChunk {
	ciphertext: Uint8Array;
	tag: Uint8Array;
}

export function deriveSessionKeys(secret: Secret, salt: Uint8Array): SessionKeys {
	const ikm = typeof secret === "string" ? Buffer.from(secret, "utf-8") : secret;
	if (ikm.byteLength === 0) {
		throw new AuthError("Shared secret must not be empty");
	}

	const derive = (info: string) =>
		new Uint8Array(hkdfSync("sha256", ikm, salt, info, CRYPTO_PARAMS.KEY_BYTES));

	return {
		chunkKey: derive(CRYPTO_PARAMS.CHUNK_KEY_INFO),
		readerAuth: derive(CRYPTO_PARAMS.READER_AUTH_INFO),
	};
}

/**
 * What the server stores to check reader credentials: SHA-256(readerAuth)
 */
export function readerVerifierOf(readerAuth: Uint8Array): Uint8Array {
	return createHash("sha256").update(readerAuth).digest();
}

export function nonceFor(nonceBase: Uint8Array, seq: number): Uint8Array {
	if (!Number.isSafeInteger(seq) || seq < 0) {
		throw new RangeError(`Invalid sequence number ${seq}`);
	}

	const counter = Buffer.alloc(8);
	counter.writeBigUInt64BE(BigInt(seq));

	const nonce = Uint8Array.from(nonceBase);
	const offset = nonce.byteLength - counter.byteLength;
	for (let i = 0; i < counter.byteLength; i++) {
		nonce[offset + i] ^= counter[i];
	}
	return nonce;
}

/**
 * Associated data binds the protocol version, the sequence number and the
 * end-of-stream flag to each chunk.
 */
function associatedData(seq: number, isLast: boolean): Buffer {
	const header = Buffer.alloc(9);
	header.writeBigUInt64BE(BigInt(seq), 0);
	header.writeUInt8(isLast ? 1 : 0, 8);
	return Buffer.concat([Buffer.from(PROTOCOL_VERSION, "utf-8"), header]);
}

export class CryptoBox {
	private lastSealedSeq = -1;

	constructor(
		private readonly key: Uint8Array,
		private readonly nonceBase: Uint8Array,
	) {
		if (key.byteLength !== CRYPTO_PARAMS.KEY_BYTES) {
			throw new RangeError(`Key must be ${CRYPTO_PARAMS.KEY_BYTES} bytes`);
		}
		if (nonceBase.byteLength !== CRYPTO_PARAMS.NONCE_BYTES) {
			throw new RangeError(`Nonce base must be ${CRYPTO_PARAMS.NONCE_BYTES} bytes`);
		}
	}

	/**
	 * Writer side: fresh salt and nonce base, plus the handshake to send
	 */
	static create(secret: Secret): {
		box: CryptoBox;
		handshake: HandshakeParams;
		readerAuth: Uint8Array;
	} {
		const salt = randomBytes(CRYPTO_PARAMS.SALT_BYTES);
		const nonceBase = randomBytes(CRYPTO_PARAMS.NONCE_BYTES);
		const keys = deriveSessionKeys(secret, salt);

		return {
			box: new CryptoBox(keys.chunkKey, nonceBase),
			handshake: {
				kdf: CRYPTO_PARAMS.KDF,
				salt: toBase64(salt),
				nonceBase: toBase64(nonceBase),
				readerVerifier: toBase64(readerVerifierOf(keys.readerAuth)),
			},
			readerAuth: keys.readerAuth,
		};
	}

	/**
	 * Reader side: rebuild the box from the session's public parameters.
	 *
	 * @throws AuthError if `secret` is not the one the writer used
	 */
	static fromSession(
		secret: Secret,
		session: Pick<SessionInfo, "salt" | "nonceBase" | "readerVerifier">,
	): { box: CryptoBox; readerAuth: Uint8Array } {
		const keys = deriveSessionKeys(secret, fromBase64(session.salt));
		const expected = fromBase64(session.readerVerifier);
		const actual = readerVerifierOf(keys.readerAuth);

		if (
			expected.byteLength !== actual.byteLength ||
			!timingSafeEqual(expected, actual)
		) {
			throw new AuthError("Secret does not match this session");
		}

		return {
			box: new CryptoBox(keys.chunkKey, fromBase64(session.nonceBase)),
			readerAuth: keys.readerAuth,
		};
	}

	/**
	 * Encrypt one chunk. Sequence numbers must strictly increase across calls
	 * on the same box; sealing a number twice would reuse its nonce.
	 */
	seal(seq: number, plaintext: Uint8Array, isLast: boolean): SealedChunk {
		if (seq <= this.lastSealedSeq) {
			throw new RangeError(
				`Refusing to reuse nonce: chunk ${seq} sealed after ${this.lastSealedSeq}`,
			);
		}

		const cipher = createCipheriv(CRYPTO_PARAMS.CIPHER, this.key, nonceFor(this.nonceBase, seq), {
			authTagLength: CRYPTO_PARAMS.TAG_BYTES,
		});
		cipher.setAAD(associatedData(seq, isLast));
		const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()]);
		this.lastSealedSeq = seq;

		return { ciphertext, tag: cipher.getAuthTag() };
	}

	/**
	 * Decrypt and verify one chunk.
	 *
	 * @throws AuthError on a tag mismatch: the chunk was corrupted or tampered
	 * with, or `seq`/`isLast` do not match what was sealed
	 */
	open(seq: number, ciphertext: Uint8Array, tag: Uint8Array, isLast: boolean): Uint8Array {
		if (tag.byteLength !== CRYPTO_PARAMS.TAG_BYTES) {
			throw new AuthError(`Chunk ${seq} has a ${tag.byteLength}-byte tag`);
		}

		const decipher = createDecipheriv(
			CRYPTO_PARAMS.CIPHER,
			this.key,
			nonceFor(this.nonceBase, seq),
			{ authTagLength: CRYPTO_PARAMS.TAG_BYTES },
		);
		decipher.setAAD(associatedData(seq, isLast));
		decipher.setAuthTag(tag);

		try {
			return Buffer.concat([decipher.update(ciphertext), decipher.final()]);
		} catch (err) {
			throw new AuthError(`Chunk ${seq} failed authentication`, { cause: err });
		}
	}
}
