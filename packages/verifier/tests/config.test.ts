import { describe, it, expect, vi, afterEach, beforeAll } from 'vitest';
import type { Ed25519Keypair } from '@didtoken/crypto/testkit';
import { createTokenVerifier, loadConfig } from '../src/config.js';
import {
  JWKS_URI,
  clock,
  jwkFor,
  jwksBody,
  seededKeypair,
  signToken,
  silent,
  validPayload,
} from './fixtures.js';

let signer: Ed25519Keypair;

beforeAll(async () => {
  signer = await seededKeypair(1);
});

describe('loadConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      leewaySeconds: 300,
      issuer: undefined,
      audience: undefined,
      jwks: {
        ttlSeconds: 300,
        timeoutMs: 5000,
        maxResponseBytes: 1048576,
        maxKeys: 100,
        allowStale: true,
        maxStaleAgeSeconds: undefined,
        allowLocalhost: false,
        allowedHosts: [],
      },
      logLevel: 'info',
    });
  });

  it('reads every variable', () => {
    const config = loadConfig({
      DIDTOKEN_LEEWAY_SECONDS: '60',
      DIDTOKEN_ISSUER: 'https://id.example',
      DIDTOKEN_AUDIENCE: ' https://api.example ',
      DIDTOKEN_JWKS_TTL_SECONDS: '900',
      DIDTOKEN_JWKS_TIMEOUT_MS: '2500',
      DIDTOKEN_JWKS_MAX_BYTES: '65536',
      DIDTOKEN_JWKS_MAX_KEYS: '10',
      DIDTOKEN_JWKS_ALLOW_STALE: 'false',
      DIDTOKEN_JWKS_MAX_STALE_SECONDS: '3600',
      DIDTOKEN_JWKS_ALLOW_LOCALHOST: 'true',
      DIDTOKEN_JWKS_ALLOWED_HOSTS: 'ID.example, keys.example ,',
      LOG_LEVEL: 'debug',
    });

    expect(config).toEqual({
      leewaySeconds: 60,
      issuer: 'https://id.example',
      audience: 'https://api.example',
      jwks: {
        ttlSeconds: 900,
        timeoutMs: 2500,
        maxResponseBytes: 65536,
        maxKeys: 10,
        allowStale: false,
        maxStaleAgeSeconds: 3600,
        allowLocalhost: true,
        allowedHosts: ['id.example', 'keys.example'],
      },
      logLevel: 'debug',
    });
  });

  it('falls back to defaults for unparseable values', () => {
    const config = loadConfig({
      DIDTOKEN_LEEWAY_SECONDS: 'five minutes',
      DIDTOKEN_JWKS_ALLOW_STALE: 'yes',
      DIDTOKEN_JWKS_MAX_STALE_SECONDS: 'forever',
      DIDTOKEN_ISSUER: '   ',
    });

    expect(config.leewaySeconds).toBe(300);
    expect(config.jwks.allowStale).toBe(true);
    expect(config.jwks.maxStaleAgeSeconds).toBeUndefined();
    expect(config.issuer).toBeUndefined();
  });
});

describe('createTokenVerifier', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('builds a verifier that enforces the configured issuer', async () => {
    const fetcher = vi.fn(async () => jwksBody([jwkFor(signer, 'k1')]));
    const config = loadConfig({ DIDTOKEN_ISSUER: 'https://id.example' });
    const verifier = createTokenVerifier(config, { fetcher, clock, logger: silent });

    const accepted = await verifier.verify(await signToken(signer, validPayload()), JWKS_URI);
    const rejected = await verifier.verify(
      await signToken(signer, validPayload({ iss: 'https://other' })),
      JWKS_URI
    );

    expect(accepted.ok).toBe(true);
    expect(rejected.ok ? undefined : rejected.code).toBe('E_ISSUER_MISMATCH');
    expect(fetcher).toHaveBeenCalledTimes(1);
  });

  it('applies the host allowlist to the HTTP fetcher', async () => {
    const fetchMock = vi.fn(async () => new Response(JSON.stringify({ keys: [] })));
    vi.stubGlobal('fetch', fetchMock);
    const config = loadConfig({ DIDTOKEN_JWKS_ALLOWED_HOSTS: 'keys.example' });
    const verifier = createTokenVerifier(config, { clock, logger: silent });

    const result = await verifier.verify(await signToken(signer, validPayload()), JWKS_URI);

    expect(result.ok ? undefined : result.code).toBe('E_JWKS_FETCH_FAILED');
    expect(result.ok ? undefined : result.message).toBe('Host not in allowlist: id.example');
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('fetches through the global fetch for an allowed host', async () => {
    const body = JSON.stringify({ keys: [jwkFor(signer, 'k1')] });
    const fetchMock = vi.fn(async () => new Response(body, { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);
    const config = loadConfig({ DIDTOKEN_JWKS_ALLOWED_HOSTS: 'id.example' });
    const verifier = createTokenVerifier(config, { clock, logger: silent });

    const result = await verifier.verify(await signToken(signer, validPayload()), JWKS_URI);

    expect(result.ok).toBe(true);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});
