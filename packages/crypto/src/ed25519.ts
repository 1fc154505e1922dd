/**
 * Internal Ed25519 wrapper -- async-only surface
 *
 * Only the async methods from @noble/ed25519 are used. In noble v3, sync
 * methods require explicit hash configuration; async methods use built-in
 * Web Crypto (SHA-512) and need no configuration.
 *
 * All other modules in @didtoken/crypto MUST import from this file, never
 * directly from '@noble/ed25519'.
 *
 * Key material handling:
 * - Private keys are 32-byte Uint8Array (Ed25519 seed)
 * - Public keys are 32-byte Uint8Array (compressed Ed25519 point)
 * - Signatures are 64-byte Uint8Array (R || S)
 */

import { signAsync, verifyAsync, getPublicKeyAsync, utils } from '@noble/ed25519';

export const PUBLIC_KEY_LENGTH = 32;
export const SIGNATURE_LENGTH = 64;

/** Sign a message with Ed25519 (async, Web Crypto backed) */
export const sign = signAsync;

/**
 * Verify an Ed25519 signature (async, Web Crypto backed).
 *
 * Runs in RFC 8032 mode (zip215: false): non-canonical encodings and
 * small-order keys are rejected.
 */
export function verify(
  signature: Uint8Array,
  message: Uint8Array,
  publicKey: Uint8Array
): Promise<boolean> {
  return verifyAsync(signature, message, publicKey, { zip215: false });
}

/** Derive public key from private key (async, Web Crypto backed) */
export const getPublicKey = getPublicKeyAsync;

/** Generate a cryptographically random 32-byte secret key (CSPRNG) */
export const randomSecretKey = utils.randomSecretKey;
