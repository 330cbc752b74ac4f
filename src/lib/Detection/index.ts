/**
 * URL detection: a heuristic prefilter followed by a strict validator.
 *
 * `looksLikeUrl` decides whether a fragment of text is worth checking at
 * all; `isValidUrl` decides whether it is a well-formed absolute http(s)
 * URL. Both are pure and never throw.
 *
 * @example
 * ```typescript
 * import { isValidUrl, looksLikeUrl } from 'linkscan';
 *
 * const fragment = 'www.example.com';
 * if (looksLikeUrl(fragment)) {
 *   console.log(isValidUrl(fragment) ? 'valid' : 'invalid'); // 'invalid'
 * }
 * ```
 *
 * @group Detection
 * @public
 */

export { looksLikeDomain } from './DomainMatcher.js';
export {
  looksLikeUrl,
  SENTENCE_INDICATORS,
  URL_MARKERS,
} from './FragmentClassifier.js';
export {
  ALLOWED_SCHEMES,
  hasWellFormedHost,
  isValidUrl,
  splitUri,
  type UriParts,
} from './UrlValidator.js';
