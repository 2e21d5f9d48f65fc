import { readFile } from 'node:fs/promises';
import { decodeBuffer } from './encoding';
import { readLines, splitLines } from './line-reader';
import { InputSourceError } from '../errors/redaction-errors';
import { type LineSource } from '../core/pipeline';

export const STDIN_PATH = '-';

export interface InputSource {
  description: string;
  encoding: string;
  lines: LineSource;
}

/**
 * Opens the input for line-by-line reading. "-" streams standard input as
 * UTF-8; a file is read whole so its encoding can be detected first.
 */
export async function openInput(
  inputPath: string,
  stdin: AsyncIterable<string | Buffer> = process.stdin
): Promise<InputSource> {
  if (inputPath === STDIN_PATH) {
    return { description: 'standard input', encoding: 'utf-8', lines: readLines(stdin) };
  }

  let buffer: Buffer;
  try {
    buffer = await readFile(inputPath);
  } catch (error) {
    throw new InputSourceError(inputPath, error);
  }

  const { text, encoding } = decodeBuffer(buffer);
  return { description: inputPath, encoding, lines: splitLines(text) };
}
