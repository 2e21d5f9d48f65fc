import { open, type FileHandle } from 'node:fs/promises';
import { type Writable } from 'node:stream';
import { OutputDestinationError } from '../errors/redaction-errors';
import { type LineSink } from '../core/pipeline';

export interface OutputSink extends LineSink {
  description: string;
  close(): Promise<void>;
}

function streamSink(description: string, stream: Writable, owned: boolean): OutputSink {
  // A failed write (EPIPE on a closed pipe) also emits 'error'; the write
  // callback carries it to the caller, later writes get it straight away
  let failure: Error | undefined;
  const onError = (error: Error): void => {
    failure = error;
  };
  stream.on('error', onError);

  return {
    description,
    write: (text) => {
      if (failure) return Promise.reject(failure);
      return new Promise<void>((resolve, reject) => {
        stream.write(text, (error) => (error ? reject(error) : resolve()));
      });
    },
    close: () => {
      // Standard output belongs to the process; only files are ended
      if (!owned) {
        stream.off('error', onError);
        return Promise.resolve();
      }
      if (failure) return Promise.resolve();
      return new Promise<void>((resolve, reject) => {
        stream.once('error', reject);
        stream.end(() => resolve());
      });
    },
  };
}

/**
 * Opens the output destination. Without a path, writes go to stdout. A file
 * is opened eagerly so an unwritable path fails before any line is processed.
 */
export async function openOutput(
  outputPath?: string,
  stdout: Writable = process.stdout
): Promise<OutputSink> {
  if (!outputPath) {
    return streamSink('standard output', stdout, false);
  }

  let handle: FileHandle;
  try {
    handle = await open(outputPath, 'w');
  } catch (error) {
    throw new OutputDestinationError(outputPath, error);
  }

  return streamSink(outputPath, handle.createWriteStream({ encoding: 'utf8' }), true);
}
