import {
  createHttpFetcher,
  DEFAULT_MAX_KEYS,
  DEFAULT_MAX_RESPONSE_BYTES,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_TTL_SECONDS,
  JwksResolver,
  type Clock,
  type JwksFetcher,
} from '@didtoken/jwks-cache';
import type { Logger } from 'pino';
import { createLogger } from './logging.js';
import { DEFAULT_LEEWAY_SECONDS } from './validate.js';
import { TokenVerifier } from './verifier.js';

type Env = Record<string, string | undefined>;

function bool(v: string | undefined, d = false): boolean {
  return v === 'true' ? true : v === 'false' ? false : d;
}

function num(v: string | undefined, d: number): number {
  const n = v ? Number(v) : NaN;
  return Number.isFinite(n) ? n : d;
}

function optNum(v: string | undefined): number | undefined {
  const n = v ? Number(v) : NaN;
  return Number.isFinite(n) ? n : undefined;
}

function str(v: string | undefined): string | undefined {
  const s = v?.trim();
  return s ? s : undefined;
}

function arr(v: string | undefined, d: string[] = []): string[] {
  const list = (v || '').split(',').map((s) => s.trim()).filter(Boolean);
  return list.length ? list : d;
}

export interface DidTokenConfig {
  leewaySeconds: number;
  issuer: string | undefined;
  audience: string | undefined;
  jwks: {
    ttlSeconds: number;
    timeoutMs: number;
    maxResponseBytes: number;
    maxKeys: number;
    allowStale: boolean;
    maxStaleAgeSeconds: number | undefined;
    allowLocalhost: boolean;
    allowedHosts: string[];
  };
  logLevel: string;
}

/**
 * Read verifier settings from the environment. Unset or unparseable
 * values fall back to defaults.
 */
export function loadConfig(env: Env = process.env): DidTokenConfig {
  return {
    leewaySeconds: num(env.DIDTOKEN_LEEWAY_SECONDS, DEFAULT_LEEWAY_SECONDS),
    issuer: str(env.DIDTOKEN_ISSUER),
    audience: str(env.DIDTOKEN_AUDIENCE),

    jwks: {
      ttlSeconds: num(env.DIDTOKEN_JWKS_TTL_SECONDS, DEFAULT_TTL_SECONDS),
      timeoutMs: num(env.DIDTOKEN_JWKS_TIMEOUT_MS, DEFAULT_TIMEOUT_MS),
      maxResponseBytes: num(env.DIDTOKEN_JWKS_MAX_BYTES, DEFAULT_MAX_RESPONSE_BYTES),
      maxKeys: num(env.DIDTOKEN_JWKS_MAX_KEYS, DEFAULT_MAX_KEYS),
      allowStale: bool(env.DIDTOKEN_JWKS_ALLOW_STALE, true),
      maxStaleAgeSeconds: optNum(env.DIDTOKEN_JWKS_MAX_STALE_SECONDS),
      allowLocalhost: bool(env.DIDTOKEN_JWKS_ALLOW_LOCALHOST, false),
      allowedHosts: arr(env.DIDTOKEN_JWKS_ALLOWED_HOSTS).map((host) => host.toLowerCase()),
    },

    logLevel: env.LOG_LEVEL || 'info',
  };
}

export interface VerifierOverrides {
  /** Replaces the HTTP fetcher built from config */
  fetcher?: JwksFetcher;
  clock?: Clock;
  logger?: Logger;
}

/**
 * Build a TokenVerifier from configuration.
 */
export function createTokenVerifier(
  config: DidTokenConfig = loadConfig(),
  overrides: VerifierOverrides = {}
): TokenVerifier {
  const logger = overrides.logger ?? createLogger('didtoken', { level: config.logLevel });
  const { jwks } = config;
  const allowedHosts = new Set(jwks.allowedHosts);

  const fetcher =
    overrides.fetcher ??
    createHttpFetcher({
      maxResponseBytes: jwks.maxResponseBytes,
      allowLocalhost: jwks.allowLocalhost,
      isAllowedHost: allowedHosts.size > 0 ? (host) => allowedHosts.has(host) : undefined,
    });

  const resolver = new JwksResolver({
    fetcher,
    clock: overrides.clock,
    ttlSeconds: jwks.ttlSeconds,
    timeoutMs: jwks.timeoutMs,
    maxKeys: jwks.maxKeys,
    allowStale: jwks.allowStale,
    maxStaleAgeSeconds: jwks.maxStaleAgeSeconds,
    logger: logger.child({ component: 'jwks' }),
  });

  return new TokenVerifier({
    resolver,
    logger,
    leeway: config.leewaySeconds,
    issuer: config.issuer,
    audience: config.audience,
    clock: overrides.clock,
  });
}
