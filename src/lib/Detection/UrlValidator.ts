import { isIPv6 } from 'net';
import { safeStringConversion } from '../CellValue/CellValue.js';

/**
 * Scheme, authority and remainder of a URI reference, split without any
 * normalisation beyond lower-casing the scheme.
 */
export interface UriParts {
  readonly scheme: string;
  readonly authority: string;
  readonly rest: string;
}

const SCHEME = /^([A-Za-z][A-Za-z0-9+.-]*):/;
const AUTHORITY_END = /[/?#]/;
const BRACKET = /[[\]]/;
const BRACKETED_HOST = /^\[([^[\]]*)\](?::[^[\]]*)?$/;
const IP_FUTURE = /^v[0-9a-f]+\..+$/i;

export const ALLOWED_SCHEMES: readonly string[] = ['http', 'https'];

/**
 * Splits a string into scheme and authority the way RFC 3986 appendix B
 * reads a URI reference. Missing components come back as empty strings;
 * an authority only exists after `//`.
 */
export const splitUri = (input: string): UriParts => {
  let rest = input;
  let scheme = '';

  const schemeMatch = SCHEME.exec(rest);
  if (schemeMatch) {
    scheme = schemeMatch[1].toLowerCase();
    rest = rest.slice(schemeMatch[0].length);
  }

  let authority = '';
  if (rest.startsWith('//')) {
    const afterSlashes = rest.slice(2);
    const end = afterSlashes.search(AUTHORITY_END);
    authority = end === -1 ? afterSlashes : afterSlashes.slice(0, end);
    rest = end === -1 ? '' : afterSlashes.slice(end);
  }

  return { scheme, authority, rest };
};

/**
 * False when the authority holds `[` or `]` anywhere other than around an
 * IPv6 (or IPvFuture) literal host, e.g. `[::1`, `exa]mple.com`,
 * `[example]`.
 */
export const hasWellFormedHost = (authority: string): boolean => {
  if (!BRACKET.test(authority)) return true;
  const host = authority.slice(authority.lastIndexOf('@') + 1);
  const match = BRACKETED_HOST.exec(host);
  if (!match) return false;
  const literal = match[1];
  return IP_FUTURE.test(literal) || isIPv6(literal);
};

/**
 * Strict syntactic check for an absolute http(s) URL.
 *
 * Requires a scheme of `http` or `https` (any case) and a non-empty
 * authority that does not start or end with a dot. Paths, queries,
 * fragments and ports are not inspected, so `http://localhost:3000`,
 * `https://192.168.1.1` and single-label intranet hosts are all valid.
 * Any input is accepted; `null`, blank strings and `NaN` are simply
 * invalid.
 *
 * @example
 * ```typescript
 * isValidUrl('http://example.com');   // true
 * isValidUrl('ftp://example.com');    // false
 * isValidUrl('https://');             // false
 * isValidUrl('https://example.com.'); // false
 * isValidUrl(null);                   // false
 * ```
 *
 * @group Detection
 * @public
 */
export const isValidUrl = (value: unknown): boolean => {
  const text = safeStringConversion(value);
  if (text === '') return false;

  const { scheme, authority } = splitUri(text);
  if (scheme === '' || authority === '') return false;
  if (!ALLOWED_SCHEMES.includes(scheme)) return false;
  if (!hasWellFormedHost(authority)) return false;

  const host = authority.toLowerCase();
  return !host.startsWith('.') && !host.endsWith('.');
};
