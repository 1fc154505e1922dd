/**
 * Header and claims model
 */

import { z } from 'zod';

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

/**
 * Nesting allowed below an unrecognized claim. The claim value itself is
 * depth 0.
 */
export const MAX_CLAIM_DEPTH = 32;

/**
 * JOSE header. Only `alg` is required; `alg` is checked against EdDSA by
 * the validator, not here, so a wrong algorithm is reported as such.
 */
export const HeaderSchema = z
  .object({
    alg: z.string(),
    kid: z.string().optional(),
    typ: z.string().optional(),
  })
  .passthrough();

export type Header = z.infer<typeof HeaderSchema>;

const NumericDate = z.number().int();

/**
 * Recognized payload claims. Unknown members are stripped here and kept
 * separately as `extra`.
 */
export const RegisteredClaimsSchema = z.object({
  sub: z.string(),
  iss: z.string().optional(),
  aud: z.union([z.string(), z.array(z.string())]).optional(),
  exp: NumericDate.optional(),
  nbf: NumericDate.optional(),
  iat: NumericDate.optional(),
  jti: z.string().optional(),
  scope: z.string().optional(),
});

export type RegisteredClaims = z.infer<typeof RegisteredClaimsSchema>;

export const REGISTERED_CLAIM_NAMES: ReadonlySet<string> = new Set(
  Object.keys(RegisteredClaimsSchema.shape)
);

/**
 * Decoded payload: recognized claims plus every other member.
 *
 * `extra` is a plain object, so its keys follow JavaScript property order:
 * integer-like names ("0", "42") first in ascending numeric order, then the
 * remaining names in payload order.
 */
export interface Claims extends RegisteredClaims {
  extra: Record<string, JsonValue>;
}

/**
 * Claims that passed signature verification and every policy check.
 * Returned frozen by `validateClaims` only.
 */
export type VerifiedClaims = Readonly<Claims>;

/**
 * Audience values as a list; a single string is a one-element list.
 */
export function audienceList(aud: Claims['aud']): readonly string[] {
  if (aud === undefined) {
    return [];
  }
  return typeof aud === 'string' ? [aud] : aud;
}
