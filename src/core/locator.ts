import { type UrlCandidate } from '../types/redaction';

const HOST = String.raw`(?:[a-zA-Z0-9.-]+|\[[a-fA-F0-9:]+\])`;
const PORT = String.raw`(?::[0-9]+)?`;
const PATH = String.raw`(?:/[a-zA-Z0-9_@%+.-]*)*`;
const QUERY = String.raw`(?:\?[a-zA-Z0-9_@%&+=;-]*)?`;
const FRAGMENT = String.raw`(?:#[a-zA-Z0-9_@%&+=;-]*)?`;

// Word boundaries that count any Unicode letter or digit as a word character
const WORD = String.raw`[\p{L}\p{N}_]`;
const WORD_START = `(?<!${WORD})`;
const WORD_END = `(?:(?<=${WORD})(?!${WORD})|(?<!${WORD})(?=${WORD}))`;

/**
 * Shape of a URL candidate inside free text. The character classes leave out
 * quotes, brackets and whitespace so surrounding prose is not swallowed; the
 * word boundaries at both ends keep trailing punctuation outside the match.
 * A match never ends between two word characters, so a value running into
 * a non-ASCII letter is cut back to the last boundary before it.
 */
export const URL_PATTERN_SOURCE = `${WORD_START}https?://${HOST}${PORT}${PATH}${QUERY}${FRAGMENT}${WORD_END}`;

/**
 * Returns a fresh global matcher. A global RegExp carries lastIndex between
 * calls, so every scan gets its own instance.
 */
export function createUrlPattern(): RegExp {
  return new RegExp(URL_PATTERN_SOURCE, 'gu');
}

/**
 * Lazily yields the URL candidates of one line, left to right and
 * non-overlapping.
 */
export function* findUrlCandidates(line: string): Generator<UrlCandidate> {
  for (const match of line.matchAll(createUrlPattern())) {
    const start = match.index ?? 0;
    yield { text: match[0], start, end: start + match[0].length };
  }
}
