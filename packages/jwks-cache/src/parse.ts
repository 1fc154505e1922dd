/**
 * JWKS document parsing and key selection.
 */

import { isEd25519Jwk, jwkToPublicKeyBytes } from '@didtoken/crypto';
import { ErrorCodes, JwksError } from './errors.js';
import type { JWK, JwksDocument } from './types.js';

export const DEFAULT_MAX_KEYS = 100;

const utf8Decoder = new TextDecoder('utf-8', { fatal: true });

/**
 * Parse raw JWKS bytes into a frozen document.
 *
 * @throws JwksError E_JWKS_INVALID or E_JWKS_TOO_MANY_KEYS
 */
export function parseJwks(body: Uint8Array, maxKeys = DEFAULT_MAX_KEYS): JwksDocument {
  let data: unknown;
  try {
    data = JSON.parse(utf8Decoder.decode(body));
  } catch (err) {
    throw new JwksError(ErrorCodes.JWKS_INVALID, 'Invalid JSON response', { cause: err });
  }

  return validateJwks(data, maxKeys);
}

/**
 * Validate an already-parsed JWKS value.
 */
export function validateJwks(data: unknown, maxKeys = DEFAULT_MAX_KEYS): JwksDocument {
  if (!isRecord(data)) {
    throw new JwksError(ErrorCodes.JWKS_INVALID, 'Invalid JWKS structure');
  }

  const { keys } = data;
  if (!Array.isArray(keys)) {
    throw new JwksError(ErrorCodes.JWKS_INVALID, 'JWKS must have keys array');
  }

  if (keys.length > maxKeys) {
    throw new JwksError(
      ErrorCodes.JWKS_TOO_MANY_KEYS,
      `Too many keys: ${keys.length} > ${maxKeys}`
    );
  }

  const parsed = keys.map((key: unknown, index: number) => Object.freeze(validateJwk(key, index)));
  return Object.freeze({ keys: Object.freeze(parsed) });
}

/**
 * Normalize one JWK entry. Optional members of the wrong type are dropped,
 * which leaves such a key unusable for Ed25519 rather than failing the set.
 */
function validateJwk(data: unknown, index: number): JWK {
  if (!isRecord(data) || typeof data.kty !== 'string') {
    throw new JwksError(ErrorCodes.JWKS_INVALID, `Invalid JWK at index ${index}`);
  }

  const jwk: JWK = { kty: data.kty };
  for (const member of ['crv', 'x', 'kid', 'use', 'alg'] as const) {
    const value = data[member];
    if (typeof value === 'string') {
      jwk[member] = value;
    }
  }
  return jwk;
}

/**
 * Select the Ed25519 key for a key id.
 *
 * With a kid: the Ed25519 key whose kid matches exactly. Without one: the
 * only Ed25519 key, if the document holds exactly one.
 *
 * @throws JwksError E_KEY_NOT_FOUND
 */
export function selectKey(document: JwksDocument, kid: string | undefined): Readonly<JWK> {
  const candidates: Readonly<JWK>[] = document.keys.filter((key) => isEd25519Jwk(key));

  if (kid === undefined) {
    if (candidates.length === 1) {
      return candidates[0];
    }
    throw new JwksError(
      ErrorCodes.KEY_NOT_FOUND,
      `Token has no kid and JWKS holds ${candidates.length} Ed25519 keys`
    );
  }

  const match = candidates.find((key) => key.kid === kid);
  if (!match) {
    throw new JwksError(ErrorCodes.KEY_NOT_FOUND, `Key with kid ${kid} not found in JWKS`);
  }
  return match;
}

/**
 * Decode the public key bytes of a selected JWK.
 *
 * @throws JwksError E_KEY_INVALID if `x` is not 32 bytes of base64url
 */
export function publicKeyOf(jwk: Readonly<JWK>): Uint8Array {
  try {
    return jwkToPublicKeyBytes(jwk);
  } catch (err) {
    throw new JwksError(
      ErrorCodes.KEY_INVALID,
      `Invalid key material for kid ${jwk.kid ?? '(none)'}`,
      { cause: err }
    );
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}
