import { detect } from 'chardet';
import iconv from 'iconv-lite';

export const FALLBACK_ENCODING = 'utf-8';

export interface DecodedText {
  text: string;
  encoding: string;
}

/**
 * Guesses the character encoding of raw file contents. Falls back to UTF-8
 * when detection fails or names an encoding iconv-lite cannot decode.
 */
export function detectEncoding(buffer: Buffer): string {
  if (buffer.length === 0) {
    return FALLBACK_ENCODING;
  }
  const detected = detect(buffer);
  return detected && iconv.encodingExists(detected) ? detected : FALLBACK_ENCODING;
}

export function decodeBuffer(buffer: Buffer): DecodedText {
  const encoding = detectEncoding(buffer);
  // iconv-lite strips a leading BOM by default
  return { text: iconv.decode(buffer, encoding), encoding };
}
