/**
 * Key authentication primitives — curve keys, ECDH and the challenge cipher.
 *
 * Uses the Node.js crypto module. The shared secret is the X coordinate of
 * the ECDH point and keys AES-256-CFB directly. Constant-time comparison via
 * timingSafeEqual keeps challenge checks free of timing leaks.
 */

import { createCipheriv, createDecipheriv, createECDH, timingSafeEqual } from "node:crypto";
import { COORDINATE_SIZE } from "./codec.js";
import type { PrivateKey, PublicKey } from "./types.js";

/** Curve shared by every node in a deployment. */
export const DEFAULT_CURVE = "secp256k1";

const CHALLENGE_CIPHER = "aes-256-cfb";

/** SEC1 prefix of an uncompressed point. */
const UNCOMPRESSED_POINT = 0x04;

export class InvalidPublicKeyError extends Error {
  constructor(reason: string) {
    super(`invalid public key: ${reason}`);
    this.name = "InvalidPublicKeyError";
  }
}

function pad(value: Buffer): Buffer {
  if (value.length >= COORDINATE_SIZE) return value;
  const out = Buffer.alloc(COORDINATE_SIZE);
  value.copy(out, COORDINATE_SIZE - value.length);
  return out;
}

function fromUncompressed(point: Buffer): PublicKey {
  return {
    x: Buffer.from(point.subarray(1, 1 + COORDINATE_SIZE)),
    y: Buffer.from(point.subarray(1 + COORDINATE_SIZE)),
  };
}

function toUncompressed(key: PublicKey): Buffer {
  return Buffer.concat([Buffer.from([UNCOMPRESSED_POINT]), pad(key.x), pad(key.y)]);
}

// --- Keys ---

export function generatePrivateKey(curve = DEFAULT_CURVE): PrivateKey {
  const ecdh = createECDH(curve);
  ecdh.generateKeys();
  return {
    d: pad(ecdh.getPrivateKey()),
    publicKey: fromUncompressed(ecdh.getPublicKey()),
  };
}

export function privateKeyFromHex(hex: string, curve = DEFAULT_CURVE): PrivateKey {
  if (!/^[0-9a-fA-F]{64}$/.test(hex)) {
    throw new Error("private key must be 64 hex characters");
  }

  const d = Buffer.from(hex, "hex");
  const ecdh = createECDH(curve);
  try {
    ecdh.setPrivateKey(d);
  } catch (err) {
    throw new Error(`private key out of range for ${curve}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return { d, publicKey: fromUncompressed(ecdh.getPublicKey()) };
}

export function privateKeyToHex(key: PrivateKey): string {
  return key.d.toString("hex");
}

export function publicKeysEqual(a: PublicKey, b: PublicKey): boolean {
  return pad(a.x).equals(pad(b.x)) && pad(a.y).equals(pad(b.y));
}

// --- ECDH ---

/**
 * X coordinate of d·P. Throws InvalidPublicKeyError when P is not a point
 * on the curve.
 */
export function computeSharedSecret(
  d: Buffer,
  peerKey: PublicKey,
  curve = DEFAULT_CURVE,
): Buffer {
  const ecdh = createECDH(curve);
  ecdh.setPrivateKey(d);
  try {
    return ecdh.computeSecret(toUncompressed(peerKey));
  } catch (err) {
    throw new InvalidPublicKeyError(err instanceof Error ? err.message : String(err));
  }
}

// --- Challenge cipher ---

export function encryptChallenge(secret: Buffer, iv: Buffer, plaintext: Buffer): Buffer {
  const cipher = createCipheriv(CHALLENGE_CIPHER, secret, iv);
  return Buffer.concat([cipher.update(plaintext), cipher.final()]);
}

export function decryptChallenge(secret: Buffer, iv: Buffer, ciphertext: Buffer): Buffer {
  const decipher = createDecipheriv(CHALLENGE_CIPHER, secret, iv);
  return Buffer.concat([decipher.update(ciphertext), decipher.final()]);
}

export function constantTimeEqual(a: Buffer, b: Buffer): boolean {
  if (a.length !== b.length) return false;
  return timingSafeEqual(a, b);
}
