import { parseUrl, serializeUrl, encodeQueryComponent } from './url-parser';
import { DEFAULT_REDACTION_STRING } from '../config/defaults';
import { UrlParseError } from '../errors/redaction-errors';
import { logger as defaultLogger, type Logger } from '../utils/logger';
import { type ParsedUrl, type QueryPair, type UrlRedaction } from '../types/redaction';

function unchanged(url: string): UrlRedaction {
  return { original: url, url, status: 'unchanged', redactedParameters: [] };
}

/**
 * Replaces the value of every query parameter named in paramsToRedact with
 * the token and reports what happened.
 *
 * Repeated occurrences of a redacted name collapse into the first one. Pairs
 * that do not match keep their exact text and position, and a URL with no
 * matching pair comes back byte for byte. A URL that fails to parse comes
 * back unchanged with status "fallback".
 */
export function redactUrl(
  url: string,
  paramsToRedact: readonly string[],
  token: string
): UrlRedaction {
  let parsed: ParsedUrl;
  try {
    parsed = parseUrl(url);
  } catch (error) {
    if (error instanceof UrlParseError) {
      return { ...unchanged(url), status: 'fallback', error };
    }
    throw error;
  }

  if (!parsed.query || parsed.query.length === 0) {
    return unchanged(url);
  }

  const targets = new Set(paramsToRedact);
  const redacted = new Set<string>();
  const pairs: QueryPair[] = [];

  for (const pair of parsed.query) {
    if (!targets.has(pair.name)) {
      pairs.push(pair);
      continue;
    }
    if (redacted.has(pair.name)) {
      continue;
    }
    redacted.add(pair.name);

    const rawName = pair.hasValue ? pair.raw.slice(0, pair.raw.indexOf('=')) : pair.raw;
    pairs.push({ raw: `${rawName}=${encodeQueryComponent(token)}`, name: pair.name, value: token, hasValue: true });
  }

  if (redacted.size === 0) {
    return unchanged(url);
  }

  return {
    original: url,
    url: serializeUrl({ ...parsed, query: pairs }),
    status: 'redacted',
    redactedParameters: [...redacted],
  };
}

/**
 * String form of redactUrl. A URL that cannot be parsed is logged as a
 * warning and returned as given.
 */
export function redact(
  url: string,
  paramsToRedact: readonly string[],
  token = DEFAULT_REDACTION_STRING,
  log: Logger = defaultLogger
): string {
  const result = redactUrl(url, paramsToRedact, token);
  if (result.status === 'fallback') {
    log.warn(`Error redacting URL ${url}: ${result.error?.reason ?? 'unparseable'}`);
  }
  return result.url;
}
