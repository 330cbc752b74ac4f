import { looksLikeDomain } from './DomainMatcher.js';

const MIN_FRAGMENT_LENGTH = 4;
const MAX_FRAGMENT_LENGTH = 200;
const MAX_SPACES = 2;

/**
 * Substrings that mark a fragment as carrying a URL regardless of what
 * surrounds them.
 */
export const URL_MARKERS: readonly string[] = [
  'http://',
  'https://',
  'www.',
  'ftp://',
];

/**
 * Substrings that mark a fragment as prose. Matched against the
 * lower-cased fragment.
 */
export const SENTENCE_INDICATORS: readonly string[] = [
  '. ', '! ', '? ', ', and ', ', or ',
  ' the ', ' a ', ' an ', ' is ', ' are ', ' was ', ' were ',
  ' will ', ' can ', ' could ', ' should ', ' would ', ' may ', ' might ',
  ' this ', ' that ', ' these ', ' those ',
  ' with ', ' without ', ' from ', ' into ', ' about ', ' through ',
  ' during ', ' before ', ' after ', ' over ', ' under ', ' above ',
  ' below ', ' between ', ' among ', ' within ',
];

const TOKEN_PUNCTUATION = '.,!?()[]{}"\'-';

const stripPunctuation = (token: string): string => {
  let start = 0;
  let end = token.length;
  while (start < end && TOKEN_PUNCTUATION.includes(token[start])) start++;
  while (end > start && TOKEN_PUNCTUATION.includes(token[end - 1])) end--;
  return token.slice(start, end);
};

const countSpaces = (text: string): number => {
  let spaces = 0;
  for (const char of text) {
    if (char === ' ') spaces++;
  }
  return spaces;
};

/**
 * Cheap prefilter deciding whether a fragment is worth handing to the
 * strict validator.
 *
 * Rules are applied in order and the first one that matches decides:
 *
 * 1. shorter than 4 or longer than 200 characters: rejected
 * 2. more than two spaces: rejected
 * 3. contains `http://`, `https://`, `www.` or `ftp://`: accepted
 * 4. contains a sentence indicator (`' the '`, `'. '`, ...): rejected
 * 5. some whitespace-separated token, stripped of surrounding punctuation,
 *    has domain shape: accepted
 * 6. otherwise rejected
 *
 * Marker detection runs before the prose check so that a short sentence
 * embedding `http://` still gets validated, and the prose check runs before
 * the domain check so that `see the company policy.` does not.
 *
 * @example
 * ```typescript
 * looksLikeUrl('https://openai.com/research'); // true
 * looksLikeUrl('arxiv.org/ai-safety');         // true
 * looksLikeUrl('not-a-url');                   // false
 * looksLikeUrl('The future of AI is bright');  // false
 * ```
 *
 * @group Detection
 * @public
 */
export const looksLikeUrl = (fragment: string): boolean => {
  const text = fragment.trim();

  const length = Array.from(text).length;
  if (length < MIN_FRAGMENT_LENGTH || length > MAX_FRAGMENT_LENGTH) {
    return false;
  }

  if (countSpaces(text) > MAX_SPACES) return false;

  const lower = text.toLowerCase();
  if (URL_MARKERS.some((marker) => lower.includes(marker))) return true;

  if (SENTENCE_INDICATORS.some((indicator) => lower.includes(indicator))) {
    return false;
  }

  if (!text.includes('.')) return false;

  return text
    .split(/\s+/)
    .some((token) => looksLikeDomain(stripPunctuation(token)));
};
