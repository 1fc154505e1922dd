/**
 * Shared fixtures for verifier tests
 */

import { vi } from 'vitest';
import { pino } from 'pino';
import { publicKeyToJwk } from '@didtoken/crypto';
import {
  generateKeypairFromSeed,
  signCompact,
  type Ed25519Keypair,
} from '@didtoken/crypto/testkit';
import { JwksResolver, type JWK } from '@didtoken/jwks-cache';

export const NOW_MS = 1_700_000_000_500;
export const NOW = 1_700_000_000;
export const JWKS_URI = 'https://id.example/.well-known/jwks.json';
export const SUBJECT = 'did:example:alice';

export const clock = (): number => NOW_MS;
export const silent = pino({ level: 'silent' });

export function seededKeypair(fill: number): Promise<Ed25519Keypair> {
  return generateKeypairFromSeed(new Uint8Array(32).fill(fill));
}

export function jwksBody(keys: readonly JWK[]): Uint8Array {
  return new TextEncoder().encode(JSON.stringify({ keys }));
}

/**
 * Resolver over an in-process fetcher that always returns the given keys.
 */
export function resolverFor(keys: readonly JWK[]) {
  const fetcher = vi.fn(async () => jwksBody(keys));
  const resolver = new JwksResolver({ fetcher, clock, logger: silent });
  return { resolver, fetcher };
}

export function jwkFor(keypair: Ed25519Keypair, kid?: string): JWK {
  return { ...publicKeyToJwk(keypair.publicKey, kid) };
}

export function signToken(
  keypair: Ed25519Keypair,
  payload: Record<string, unknown>,
  header: Record<string, unknown> = { alg: 'EdDSA', typ: 'JWT', kid: 'k1' }
): Promise<string> {
  return signCompact(header, payload, keypair.privateKey);
}

/**
 * Payload valid at NOW for SUBJECT.
 */
export function validPayload(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    sub: SUBJECT,
    iss: 'https://id.example',
    aud: 'https://api.example',
    iat: NOW - 60,
    nbf: NOW - 60,
    exp: NOW + 3600,
    ...overrides,
  };
}
