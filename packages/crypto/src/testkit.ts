/**
 * didtoken Crypto Test Kit
 *
 * This module contains utilities for TEST FIXTURES ONLY.
 * These functions are NOT exported from the main entry point.
 *
 * Import path: @didtoken/crypto/testkit
 *
 * SECURITY: Never use these in production. Token issuance is not part of
 * this library; signCompact exists so tests can build tokens.
 */

import { base64urlEncode } from './base64url.js';
import { getPublicKey, randomSecretKey, sign } from './ed25519.js';
import { CryptoError } from './errors.js';
import { canonicalize } from './jcs.js';

export interface Ed25519Keypair {
  privateKey: Uint8Array;
  publicKey: Uint8Array;
}

/**
 * Generate a random Ed25519 keypair
 */
export async function generateKeypair(): Promise<Ed25519Keypair> {
  const privateKey = randomSecretKey();
  const publicKey = await getPublicKey(privateKey);
  return { privateKey, publicKey };
}

/**
 * Generate an Ed25519 keypair from a deterministic seed.
 *
 * WARNING: FOR TEST FIXTURES ONLY. Seeded keys are predictable.
 *
 * @param seed - 32-byte seed
 *
 * @example
 * ```ts
 * const { privateKey, publicKey } = await generateKeypairFromSeed(new Uint8Array(32).fill(7));
 * ```
 */
export async function generateKeypairFromSeed(seed: Uint8Array): Promise<Ed25519Keypair> {
  if (seed.length !== 32) {
    throw new CryptoError('CRYPTO_INVALID_SEED_LENGTH', 'Ed25519 seed must be 32 bytes');
  }

  // In Ed25519, the private key IS the seed (32 bytes)
  const privateKey = seed;
  const publicKey = await getPublicKey(privateKey);

  return { privateKey, publicKey };
}

/**
 * Sign a header and payload into a compact JWS.
 *
 * Header and payload are serialized with JCS so fixtures are stable. The
 * header is used as given, including a deliberately wrong `alg`.
 */
export async function signCompact(
  header: Record<string, unknown>,
  payload: Record<string, unknown>,
  privateKey: Uint8Array
): Promise<string> {
  const headerB64 = encodeSegment(header);
  const payloadB64 = encodeSegment(payload);
  return signSegments(headerB64, payloadB64, privateKey);
}

/**
 * Sign two already-encoded segments. Lets tests sign segments that are not
 * valid JSON or not canonical.
 */
export async function signSegments(
  headerB64: string,
  payloadB64: string,
  privateKey: Uint8Array
): Promise<string> {
  const signingInput = `${headerB64}.${payloadB64}`;
  const signature = await sign(new TextEncoder().encode(signingInput), privateKey);
  return `${signingInput}.${base64urlEncode(signature)}`;
}

/**
 * JCS-serialize a JSON value and base64url-encode it
 */
export function encodeSegment(value: unknown): string {
  return base64urlEncode(new TextEncoder().encode(canonicalize(value)));
}
