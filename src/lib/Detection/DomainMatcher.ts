const LETTER = /\p{L}/u;
const TLD_LABEL = /^[\p{L}-]+$/u;
const HOST_LABEL = /^[\p{L}\p{N}-]+$/u;

const MIN_TOKEN_LENGTH = 4;
const MAX_DOMAIN_LENGTH = 100;
const MIN_TLD_LENGTH = 2;
const MAX_TLD_LENGTH = 20;

/**
 * Decides whether a single token has the shape of a domain name, optionally
 * followed by a path (`arxiv.org/ai-safety`).
 *
 * Only the part before the first `/` is checked. TLDs may contain hyphens
 * and run up to 20 characters so that compound pseudo-TLDs such as
 * `ai-ethics.missing-domain` still count as domain-shaped. The label in
 * front of the TLD needs at least one letter, which keeps dotted numbers
 * like `10.20.30.40` out.
 *
 * @example
 * ```typescript
 * looksLikeDomain('example.com');         // true
 * looksLikeDomain('arxiv.org/ai-safety'); // true
 * looksLikeDomain('a..b.com');            // false
 * looksLikeDomain('-bad.com');            // false
 * ```
 *
 * @group Detection
 * @public
 */
export const looksLikeDomain = (token: string): boolean => {
  if (token.length < MIN_TOKEN_LENGTH || !token.includes('.')) return false;

  const slash = token.indexOf('/');
  const domain = slash === -1 ? token : token.slice(0, slash);

  const labels = domain.split('.');
  if (labels.length < 2) return false;

  const tld = labels[labels.length - 1];
  const tldLength = Array.from(tld).length;
  if (tldLength < MIN_TLD_LENGTH || tldLength > MAX_TLD_LENGTH) return false;
  if (!TLD_LABEL.test(tld)) return false;

  for (const label of labels.slice(0, -1)) {
    if (!HOST_LABEL.test(label)) return false;
    if (label.startsWith('-') || label.endsWith('-')) return false;
  }

  if (Array.from(domain).length > MAX_DOMAIN_LENGTH) return false;
  if (domain.startsWith('.') || domain.endsWith('.')) return false;

  return LETTER.test(labels[labels.length - 2]);
};
