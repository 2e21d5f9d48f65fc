import { redactLine } from './line-redactor';
import { logger as defaultLogger, type Logger } from '../utils/logger';
import { type LineRedaction, type RedactionOptions, type RedactionStats } from '../types/redaction';

export type LineSource = AsyncIterable<string> | Iterable<string>;

export interface LineSink {
  write(text: string): Promise<void>;
}

export function createStats(): RedactionStats {
  return {
    linesProcessed: 0,
    linesWithErrors: 0,
    urlsFound: 0,
    urlsRedacted: 0,
    parametersRedacted: 0,
    fallbacks: [],
  };
}

function record(stats: RedactionStats, result: LineRedaction, lineNumber: number, log: Logger): void {
  stats.urlsFound += result.urls.length;

  for (const url of result.urls) {
    if (url.status === 'redacted') {
      stats.urlsRedacted++;
      stats.parametersRedacted += url.redactedParameters.length;
      log.debug(`Line ${lineNumber}: redacted ${url.redactedParameters.join(', ')}`);
    } else if (url.status === 'fallback') {
      const reason = url.error?.reason ?? 'unparseable';
      stats.fallbacks.push({ lineNumber, url: url.original, reason });
      log.warn(`Line ${lineNumber}: error redacting URL ${url.original}: ${reason}`);
    }
  }
}

/**
 * Redacts lines one at a time, in order, writing each result to the sink.
 * A line that fails unexpectedly is logged and written unchanged; sink
 * failures propagate.
 */
export async function redactStream(
  lines: LineSource,
  sink: LineSink,
  options: RedactionOptions,
  log: Logger = defaultLogger
): Promise<RedactionStats> {
  const stats = createStats();
  let lineNumber = 0;

  for await (const line of lines) {
    lineNumber++;
    let output = line;

    try {
      const result = redactLine(line, options);
      record(stats, result, lineNumber, log);
      output = result.line;
    } catch (error) {
      stats.linesWithErrors++;
      const message = error instanceof Error ? error.message : String(error);
      log.error(`Line ${lineNumber}: error processing line, writing it unchanged: ${message}`);
    }

    stats.linesProcessed++;
    await sink.write(output);
  }

  return stats;
}
