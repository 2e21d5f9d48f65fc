import { describe, it, expect } from 'vitest';
import { Readable } from 'node:stream';
import { readLines, splitLines } from '@/utils/line-reader';

async function collect(iterable: AsyncIterable<string>): Promise<string[]> {
  const lines: string[] = [];
  for await (const line of iterable) {
    lines.push(line);
  }
  return lines;
}

describe('splitLines', () => {
  it('should keep line terminators', () => {
    expect([...splitLines('a\nb\r\nc\n')]).toEqual(['a\n', 'b\r\n', 'c\n']);
  });

  it('should yield a final line without a terminator', () => {
    expect([...splitLines('a\nlast')]).toEqual(['a\n', 'last']);
  });

  it('should keep blank lines', () => {
    expect([...splitLines('\n\nx')]).toEqual(['\n', '\n', 'x']);
  });

  it('should yield nothing for empty text', () => {
    expect([...splitLines('')]).toEqual([]);
  });
});

describe('readLines', () => {
  it('should reassemble lines split across chunks', async () => {
    const lines = await collect(readLines(Readable.from(['fir', 'st\nsec', 'ond\n', 'third'])));

    expect(lines).toEqual(['first\n', 'second\n', 'third']);
  });

  it('should decode multi-byte characters split across buffers', async () => {
    const bytes = Buffer.from('café\nnext\n', 'utf8');
    // Split inside the two-byte "é"
    const chunks = [bytes.subarray(0, 4), bytes.subarray(4)];

    const lines = await collect(readLines(Readable.from(chunks)));

    expect(lines).toEqual(['café\n', 'next\n']);
  });

  it('should yield nothing for an empty stream', async () => {
    expect(await collect(readLines(Readable.from([])))).toEqual([]);
  });
});
