/**
 * didtoken Crypto Package
 *
 * Ed25519 compact JWS verification, JSON Canonicalization (RFC 8785),
 * strict base64url and Ed25519 JWK helpers.
 *
 * @packageDocumentation
 */

export * from './base64url.js';
export * from './errors.js';
export * from './jcs.js';
export * from './jwk.js';
export * from './jws.js';
export { PUBLIC_KEY_LENGTH, SIGNATURE_LENGTH } from './ed25519.js';
