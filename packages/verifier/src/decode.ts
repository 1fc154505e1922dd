/**
 * Compact token decoding
 */

import {
  decodeJsonSegment,
  decodeSignatureSegment,
  isCryptoError,
  splitCompact,
  type CompactJws,
} from '@didtoken/crypto';
import type { ZodError } from 'zod';
import {
  HeaderSchema,
  MAX_CLAIM_DEPTH,
  REGISTERED_CLAIM_NAMES,
  RegisteredClaimsSchema,
} from './claims.js';
import type { Claims, Header, JsonValue } from './claims.js';
import { VerificationError } from './errors.js';

/**
 * Structurally decoded, not yet verified, token.
 */
export interface DecodedToken {
  header: Header;
  claims: Claims;
  /** ASCII bytes of the header and payload segments as received */
  signingInput: Uint8Array;
  /** Raw signature, or null when the segment is not canonical base64url */
  signature: Uint8Array | null;
}

/**
 * Decode a compact token into header, claims, signing input and signature.
 *
 * Nothing here is trusted: the signature is not checked and no claim
 * policy is applied.
 *
 * @throws VerificationError E_MALFORMED_TOKEN
 */
export function decodeToken(token: string): DecodedToken {
  const jws = splitToken(token);
  const header = parseSegment('header', jws.headerB64, (value) => {
    const result = HeaderSchema.safeParse(value);
    if (!result.success) {
      throw malformed('header', result.error);
    }
    return result.data;
  });
  const claims = parseSegment('payload', jws.payloadB64, parseClaims);

  return {
    header,
    claims,
    signingInput: jws.signingInput,
    signature: decodeSignatureSegment(jws.signatureB64),
  };
}

function splitToken(token: string): CompactJws {
  try {
    return splitCompact(token);
  } catch (err) {
    if (isCryptoError(err)) {
      throw new VerificationError('E_MALFORMED_TOKEN', 'Token must have three segments', {
        cause: err,
      });
    }
    throw err;
  }
}

function parseSegment<T>(
  name: string,
  segment: string,
  parse: (value: Record<string, unknown>) => T
): T {
  let value: Record<string, unknown>;
  try {
    value = decodeJsonSegment(segment);
  } catch (err) {
    if (isCryptoError(err)) {
      throw new VerificationError('E_MALFORMED_TOKEN', `Invalid ${name}: ${err.message}`, {
        cause: err,
      });
    }
    throw err;
  }
  return parse(value);
}

function parseClaims(payload: Record<string, unknown>): Claims {
  const registered = RegisteredClaimsSchema.safeParse(payload);
  if (!registered.success) {
    throw malformed('payload', registered.error);
  }

  // fromEntries defines own properties, so a "__proto__" member stays data
  const entries: [string, JsonValue][] = [];
  for (const [name, value] of Object.entries(payload)) {
    if (REGISTERED_CLAIM_NAMES.has(name)) {
      continue;
    }
    assertClaimValue(name, value);
    entries.push([name, value]);
  }

  return { ...registered.data, extra: Object.fromEntries(entries) };
}

/**
 * Walks a claim value with an explicit stack, so nesting is bounded by
 * MAX_CLAIM_DEPTH and never by the call stack.
 */
function assertClaimValue(name: string, value: unknown): asserts value is JsonValue {
  const stack: Array<[unknown, (string | number)[]]> = [[value, [name]]];

  for (let item = stack.pop(); item !== undefined; item = stack.pop()) {
    const [current, path] = item;

    // path holds the claim name plus one segment per level
    if (path.length - 1 > MAX_CLAIM_DEPTH) {
      throw invalidClaim(path, `nesting exceeds ${MAX_CLAIM_DEPTH} levels`);
    }

    if (current === null || typeof current === 'string' || typeof current === 'boolean') {
      continue;
    }
    if (typeof current === 'number') {
      if (!Number.isFinite(current)) {
        throw invalidClaim(path, 'non-finite number');
      }
      continue;
    }
    if (Array.isArray(current)) {
      for (let i = current.length - 1; i >= 0; i--) {
        stack.push([current[i], [...path, i]]);
      }
      continue;
    }
    if (typeof current === 'object') {
      for (const [key, member] of Object.entries(current)) {
        stack.push([member, [...path, key]]);
      }
      continue;
    }

    throw invalidClaim(path, `${typeof current} is not a JSON value`);
  }
}

function invalidClaim(path: (string | number)[], reason: string): VerificationError {
  return new VerificationError('E_MALFORMED_TOKEN', `Invalid payload: ${path.join('.')}: ${reason}`);
}

function malformed(name: string, error: ZodError): VerificationError {
  const issue = error.issues[0];
  const detail = issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : error.message;
  return new VerificationError('E_MALFORMED_TOKEN', `Invalid ${name}: ${detail}`, {
    cause: error,
  });
}
