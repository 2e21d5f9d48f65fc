import { type UrlParseError } from '../errors/redaction-errors';

export interface UrlCandidate {
  text: string;
  start: number;   // Offset of the first character in the line
  end: number;     // Offset one past the last character
}

export interface QueryPair {
  raw: string;       // Exact source text, e.g. "api%5Fkey=abc"
  name: string;      // Form-decoded name
  value: string;     // Form-decoded value ('' when absent)
  hasValue: boolean; // false for a bare "flag" with no '='
}

export interface ParsedUrl {
  scheme: string;
  authority?: string;
  path: string;
  params?: string;
  query?: QueryPair[];
  fragment?: string;
}

export type RedactionStatus = 'redacted' | 'unchanged' | 'fallback';

export interface UrlRedaction {
  original: string;
  url: string;
  status: RedactionStatus;
  redactedParameters: string[];
  error?: UrlParseError;
}

export interface RedactionOptions {
  parameters: readonly string[];
  redactionString: string;
}

export interface LineRedaction {
  line: string;
  urls: UrlRedaction[];
}

export interface FallbackRecord {
  lineNumber: number;
  url: string;
  reason: string;
}

export interface RedactionStats {
  linesProcessed: number;
  linesWithErrors: number;
  urlsFound: number;
  urlsRedacted: number;
  parametersRedacted: number;
  fallbacks: FallbackRecord[];
}
