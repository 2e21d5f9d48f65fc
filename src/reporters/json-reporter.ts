import fs from 'node:fs/promises';
import { Reporter, ReportData } from './base';
import { logger as defaultLogger, type Logger } from '../utils/logger';

export class JsonReporter implements Reporter {
  private readonly outputPath: string;
  private readonly log: Logger;

  constructor(outputPath: string = 'url-redact-report.json', log: Logger = defaultLogger) {
    this.outputPath = outputPath;
    this.log = log;
  }

  async generate(data: ReportData): Promise<void> {
    const report = {
      metadata: {
        generatedAt: new Date().toISOString(),
        durationMs: data.endTime.getTime() - data.startTime.getTime(),
        input: data.input,
        output: data.output,
        encoding: data.encoding,
        parameters: data.parameters,
        redactionString: data.redactionString,
      },
      summary: {
        linesProcessed: data.stats.linesProcessed,
        linesWithErrors: data.stats.linesWithErrors,
        urlsFound: data.stats.urlsFound,
        urlsRedacted: data.stats.urlsRedacted,
        parametersRedacted: data.stats.parametersRedacted,
        fallbackCount: data.stats.fallbacks.length,
      },
      fallbacks: data.stats.fallbacks,
    };

    await fs.writeFile(this.outputPath, JSON.stringify(report, null, 2), 'utf8');
    this.log.info(`JSON report generated at ${this.outputPath}`);
  }
}
