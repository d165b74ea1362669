/**
 * Cryptography utilities (Ed25519 signing keys for writer tokens)
 */

import { generateKeyPair, exportSPKI, exportPKCS8 } from "jose";
import { createHash } from "node:crypto";
import { access, mkdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";

export interface SigningKeyPair {
  privateKey: string; // PKCS#8 PEM
  publicKey: string; // SPKI PEM
}

export const SIGNING_KEY_FILES = {
  PRIVATE: "signing.key",
  PUBLIC: "signing.pub",
} as const;

export async function generateSigningKeys(): Promise<
  SigningKeyPair & { fingerprint: string }
> {
  const { publicKey, privateKey } = await generateKeyPair("EdDSA", {
    crv: "Ed25519",
  });

  const publicKeyPem = await exportSPKI(publicKey);
  const privateKeyPem = await exportPKCS8(privateKey);

  return {
    publicKey: publicKeyPem,
    privateKey: privateKeyPem,
    fingerprint: fingerprintOf(publicKeyPem),
  };
}

/**
 * Fingerprint (SHA-256 of the public key PEM, first 16 hex chars)
 */
export function fingerprintOf(publicKeyPem: string): string {
  return createHash("sha256").update(publicKeyPem).digest("hex").slice(0, 16);
}

/**
 * Load the key pair from `keyDir`, generating and writing one on first run.
 */
export async function ensureSigningKeys(
  keyDir: string
): Promise<SigningKeyPair & { fingerprint: string; created: boolean }> {
  const privateKeyPath = join(keyDir, SIGNING_KEY_FILES.PRIVATE);
  const publicKeyPath = join(keyDir, SIGNING_KEY_FILES.PUBLIC);

  try {
    await access(privateKeyPath);
  } catch {
    const generated = await generateSigningKeys();
    await mkdir(keyDir, { recursive: true });
    await writeFile(privateKeyPath, generated.privateKey, {
      encoding: "utf-8",
      mode: 0o600,
    });
    await writeFile(publicKeyPath, generated.publicKey, "utf-8");
    return { ...generated, created: true };
  }

  const privateKey = await readFile(privateKeyPath, "utf-8");
  const publicKey = await readFile(publicKeyPath, "utf-8");
  return {
    privateKey,
    publicKey,
    fingerprint: fingerprintOf(publicKey),
    created: false,
  };
}
