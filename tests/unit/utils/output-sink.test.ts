import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { Writable } from 'node:stream';
import { openOutput } from '@/utils/output-sink';
import { OutputDestinationError } from '@/errors/redaction-errors';

describe('openOutput', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'url-redact-output-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should write to a file and flush on close', async () => {
    const file = path.join(tempDir, 'out.log');
    const sink = await openOutput(file);

    await sink.write('first\n');
    await sink.write('second');
    await sink.close();

    expect(sink.description).toBe(file);
    expect(await fs.readFile(file, 'utf8')).toBe('first\nsecond');
  });

  it('should create the file before anything is written', async () => {
    const file = path.join(tempDir, 'empty.log');
    const sink = await openOutput(file);
    await sink.close();

    expect(await fs.readFile(file, 'utf8')).toBe('');
  });

  it('should throw OutputDestinationError for an unwritable path', async () => {
    const file = path.join(tempDir, 'no-such-dir', 'out.log');

    await expect(openOutput(file)).rejects.toThrow(OutputDestinationError);
  });

  it('should write to the given stream when no path is set and leave it open', async () => {
    const chunks: string[] = [];
    const stream = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        chunks.push(chunk.toString());
        callback();
      },
    });

    const sink = await openOutput(undefined, stream);
    await sink.write('to stdout\n');
    await sink.close();

    expect(sink.description).toBe('standard output');
    expect(chunks).toEqual(['to stdout\n']);
    expect(stream.writableEnded).toBe(false);
  });

  it('should reject writes once the stream fails instead of throwing', async () => {
    const stream = new Writable({
      write(_chunk: Buffer, _encoding, callback) {
        callback(Object.assign(new Error('write EPIPE'), { code: 'EPIPE' }));
      },
    });

    const sink = await openOutput(undefined, stream);
    expect(stream.listenerCount('error')).toBe(1);

    await expect(sink.write('first\n')).rejects.toThrow('write EPIPE');
    await expect(sink.write('second\n')).rejects.toThrow();
    await expect(sink.close()).resolves.toBeUndefined();
    expect(stream.listenerCount('error')).toBe(0);
  });
});
