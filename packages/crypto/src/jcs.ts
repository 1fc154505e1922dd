/**
 * JSON Canonicalization Scheme (RFC 8785)
 *
 * Deterministic JSON serialization. Used to produce stable token segments
 * so that the same header/payload always yields the same signing input.
 */

/**
 * Canonicalize a JSON value according to RFC 8785
 *
 * Object members whose value is `undefined` are omitted, matching
 * JSON.stringify. Any other non-JSON value throws.
 */
export function canonicalize(value: unknown): string {
  if (value === null) {
    return 'null';
  }

  switch (typeof value) {
    case 'boolean':
      return value ? 'true' : 'false';
    case 'number':
      return canonicalizeNumber(value);
    case 'string':
      return JSON.stringify(value);
    case 'object':
      break;
    default:
      throw new TypeError(`Cannot canonicalize type: ${typeof value}`);
  }

  if (Array.isArray(value)) {
    return `[${value.map(canonicalize).join(',')}]`;
  }

  // Sort keys lexicographically by UTF-16 code unit
  const members = Object.entries(value)
    .filter(([, member]) => member !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([key, member]) => `${JSON.stringify(key)}:${canonicalize(member)}`);
  return `{${members.join(',')}}`;
}

function canonicalizeNumber(n: number): string {
  if (!Number.isFinite(n)) {
    throw new TypeError('Cannot canonicalize non-finite number');
  }
  if (Object.is(n, -0)) {
    return '0';
  }
  // ECMAScript Number::toString is the RFC 8785 number serialization
  return String(n);
}

/**
 * Canonicalize and encode as UTF-8 bytes
 */
export function canonicalizeBytes(value: unknown): Uint8Array {
  return new TextEncoder().encode(canonicalize(value));
}
