import { findUrlCandidates } from './locator';
import { redactUrl } from './redactor';
import { type LineRedaction, type RedactionOptions, type UrlRedaction } from '../types/redaction';

/**
 * Redacts every URL candidate in a line and splices the results back at
 * their original spans. Text between candidates is copied through.
 */
export function redactLine(line: string, options: RedactionOptions): LineRedaction {
  const urls: UrlRedaction[] = [];
  let output = '';
  let cursor = 0;

  for (const candidate of findUrlCandidates(line)) {
    const result = redactUrl(candidate.text, options.parameters, options.redactionString);
    urls.push(result);
    output += line.slice(cursor, candidate.start) + result.url;
    cursor = candidate.end;
  }

  return { line: output + line.slice(cursor), urls };
}
