import { StringDecoder } from 'node:string_decoder';

/**
 * Splits text into lines, each keeping its "\n" or "\r\n" terminator. A last
 * line without a terminator is yielded as is.
 */
export function* splitLines(text: string): Generator<string> {
  let start = 0;
  let newline = text.indexOf('\n');
  while (newline !== -1) {
    yield text.slice(start, newline + 1);
    start = newline + 1;
    newline = text.indexOf('\n', start);
  }
  if (start < text.length) {
    yield text.slice(start);
  }
}

/**
 * Streaming counterpart of splitLines. Buffer chunks are decoded as UTF-8,
 * including characters split across chunk boundaries.
 */
export async function* readLines(chunks: AsyncIterable<string | Buffer>): AsyncGenerator<string> {
  const decoder = new StringDecoder('utf8');
  let buffered = '';

  for await (const chunk of chunks) {
    buffered += typeof chunk === 'string' ? chunk : decoder.write(chunk);

    let newline = buffered.indexOf('\n');
    while (newline !== -1) {
      yield buffered.slice(0, newline + 1);
      buffered = buffered.slice(newline + 1);
      newline = buffered.indexOf('\n');
    }
  }

  buffered += decoder.end();
  if (buffered) {
    yield buffered;
  }
}
