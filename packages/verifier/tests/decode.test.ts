import { describe, it, expect } from 'vitest';
import { base64urlEncodeString } from '@didtoken/crypto';
import { encodeSegment } from '@didtoken/crypto/testkit';
import { MAX_CLAIM_DEPTH } from '../src/claims.js';
import { decodeToken } from '../src/decode.js';
import { VerificationError } from '../src/errors.js';

const HEADER = encodeSegment({ alg: 'EdDSA', kid: 'k1' });
const SIGNATURE = 'AAAA';

function token(payload: unknown, header = HEADER): string {
  return `${header}.${base64urlEncodeString(JSON.stringify(payload))}.${SIGNATURE}`;
}

function nested(depth: number): string {
  return `${'['.repeat(depth)}${']'.repeat(depth)}`;
}

function rawToken(payload: string): string {
  return `${HEADER}.${base64urlEncodeString(payload)}.${SIGNATURE}`;
}

function failure(fn: () => unknown): VerificationError | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof VerificationError) {
      return err;
    }
    throw err;
  }
  return undefined;
}

describe('decodeToken', () => {
  it('splits header, claims, signing input and signature', () => {
    const raw = token({ sub: 'did:example:alice', iss: 'https://id.example', exp: 1700000000 });
    const decoded = decodeToken(raw);

    expect(decoded.header).toEqual({ alg: 'EdDSA', kid: 'k1' });
    expect(decoded.claims).toEqual({
      sub: 'did:example:alice',
      iss: 'https://id.example',
      exp: 1700000000,
      extra: {},
    });
    expect(new TextDecoder().decode(decoded.signingInput)).toBe(raw.slice(0, raw.lastIndexOf('.')));
    expect(Array.from(decoded.signature ?? [])).toEqual([0, 0, 0]);
  });

  it('keeps unrecognized members in extra, in payload order for non-integer names', () => {
    const decoded = decodeToken(
      token({ zeta: 1, sub: 'did:example:alice', alpha: { nested: [true, null] }, scope: 'read' })
    );

    expect(decoded.claims.scope).toBe('read');
    expect(Object.keys(decoded.claims.extra)).toEqual(['zeta', 'alpha']);
    expect(decoded.claims.extra).toEqual({ zeta: 1, alpha: { nested: [true, null] } });
  });

  it('orders integer-like extra names first, ascending', () => {
    const decoded = decodeToken(rawToken('{"sub":"did:x:1","b":1,"10":2,"a":3,"2":4}'));

    expect(Object.keys(decoded.claims.extra)).toEqual(['2', '10', 'b', 'a']);
    expect(decoded.claims.extra).toEqual({ b: 1, 10: 2, a: 3, 2: 4 });
  });

  it('keeps a "__proto__" member as plain data', () => {
    const payload = `{"sub":"did:example:alice","__proto__":{"polluted":true}}`;
    const decoded = decodeToken(`${HEADER}.${base64urlEncodeString(payload)}.${SIGNATURE}`);

    expect(Object.getPrototypeOf(decoded.claims.extra)).toBe(Object.prototype);
    expect(Object.keys(decoded.claims.extra)).toEqual(['__proto__']);
  });

  it('accepts aud as a string or an array of strings', () => {
    expect(decodeToken(token({ sub: 'did:x:1', aud: 'a' })).claims.aud).toBe('a');
    expect(decodeToken(token({ sub: 'did:x:1', aud: ['a', 'b'] })).claims.aud).toEqual(['a', 'b']);
  });

  it('passes extra header members through', () => {
    const header = encodeSegment({ alg: 'EdDSA', typ: 'JWT', cty: 'example' });
    expect(decodeToken(token({ sub: 'did:x:1' }, header)).header).toEqual({
      alg: 'EdDSA',
      typ: 'JWT',
      cty: 'example',
    });
  });

  it('does not reject a non-EdDSA alg', () => {
    const header = encodeSegment({ alg: 'HS256' });
    expect(decodeToken(token({ sub: 'did:x:1' }, header)).header.alg).toBe('HS256');
  });

  it('returns a null signature for a non-canonical signature segment', () => {
    const raw = token({ sub: 'did:x:1' });
    const decoded = decodeToken(`${raw.slice(0, -SIGNATURE.length)}AA==`);
    expect(decoded.signature).toBeNull();
  });

  it('rejects the wrong number of segments', () => {
    const error = failure(() => decodeToken('a.b'));
    expect(error?.code).toBe('E_MALFORMED_TOKEN');
    expect(error?.message).toBe('Token must have three segments');

    expect(failure(() => decodeToken('a.b.c.d'))?.code).toBe('E_MALFORMED_TOKEN');
    expect(failure(() => decodeToken(''))?.code).toBe('E_MALFORMED_TOKEN');
  });

  it('rejects padded or non-base64url segments', () => {
    expect(failure(() => decodeToken(`${HEADER}=.e30.AAAA`))?.code).toBe('E_MALFORMED_TOKEN');
    expect(failure(() => decodeToken(`${HEADER}.e3+9.AAAA`))?.code).toBe('E_MALFORMED_TOKEN');
  });

  it('rejects payloads that are not JSON objects', () => {
    expect(failure(() => decodeToken(token(['did:x:1'])))?.code).toBe('E_MALFORMED_TOKEN');
    expect(failure(() => decodeToken(token('did:x:1')))?.code).toBe('E_MALFORMED_TOKEN');
    expect(
      failure(() => decodeToken(`${HEADER}.${base64urlEncodeString('{"sub":')}.AAAA`))?.code
    ).toBe('E_MALFORMED_TOKEN');
  });

  it('rejects a missing or non-string sub', () => {
    const error = failure(() => decodeToken(token({ iss: 'https://id.example' })));
    expect(error?.code).toBe('E_MALFORMED_TOKEN');
    expect(error?.message).toBe('Invalid payload: sub: Required');

    expect(failure(() => decodeToken(token({ sub: 42 })))?.code).toBe('E_MALFORMED_TOKEN');
  });

  it('rejects non-integer time claims', () => {
    expect(failure(() => decodeToken(token({ sub: 'did:x:1', exp: 1.5 })))?.code).toBe(
      'E_MALFORMED_TOKEN'
    );
    expect(failure(() => decodeToken(token({ sub: 'did:x:1', nbf: '0' })))?.code).toBe(
      'E_MALFORMED_TOKEN'
    );
  });

  it('rejects aud arrays with non-string members', () => {
    expect(failure(() => decodeToken(token({ sub: 'did:x:1', aud: ['a', 1] })))?.code).toBe(
      'E_MALFORMED_TOKEN'
    );
  });

  it(`accepts extra claims nested ${MAX_CLAIM_DEPTH} levels deep`, () => {
    const arrays = decodeToken(rawToken(`{"sub":"did:x:1","n":${nested(MAX_CLAIM_DEPTH + 1)}}`));
    expect(Array.isArray(arrays.claims.extra.n)).toBe(true);

    const objects = decodeToken(
      rawToken(`{"sub":"did:x:1","n":${'{"a":'.repeat(MAX_CLAIM_DEPTH)}1${'}'.repeat(MAX_CLAIM_DEPTH)}}`)
    );
    expect(typeof objects.claims.extra.n).toBe('object');
  });

  it('rejects extra claims nested one level deeper', () => {
    const error = failure(() =>
      decodeToken(rawToken(`{"sub":"did:x:1","n":${nested(MAX_CLAIM_DEPTH + 2)}}`))
    );
    expect(error?.code).toBe('E_MALFORMED_TOKEN');
    expect(error?.message).toBe(
      `Invalid payload: n.${Array(MAX_CLAIM_DEPTH + 1).fill(0).join('.')}: nesting exceeds 32 levels`
    );
  });

  it('rejects a 50,000-level nested claim without exhausting the call stack', () => {
    const error = failure(() => decodeToken(rawToken(`{"sub":"did:x:1","n":${nested(50_000)}}`)));
    expect(error?.code).toBe('E_MALFORMED_TOKEN');
    expect(error?.message).toMatch(/: nesting exceeds 32 levels$/);

    const objects = `{"sub":"did:x:1","o":${'{"a":'.repeat(50_000)}1${'}'.repeat(50_000)}}`;
    expect(failure(() => decodeToken(rawToken(objects)))?.code).toBe('E_MALFORMED_TOKEN');
  });

  it('rejects a header without a string alg', () => {
    const header = encodeSegment({ kid: 'k1' });
    const error = failure(() => decodeToken(token({ sub: 'did:x:1' }, header)));
    expect(error?.code).toBe('E_MALFORMED_TOKEN');
    expect(error?.message).toBe('Invalid header: alg: Required');
  });
});
