import { Command } from 'commander';
import { ConfigLoader } from '../config/loader';
import { DEFAULT_CONFIG_FILENAME, DEFAULT_PARAMETERS, DEFAULT_REDACTION_STRING } from '../config/defaults';
import { type Config } from '../config/schema';
import { redactStream } from '../core/pipeline';
import { ConfigError } from '../errors/redaction-errors';
import { ConsoleReporter } from '../reporters/console-reporter';
import { JsonReporter } from '../reporters/json-reporter';
import { type Reporter, type ReportData } from '../reporters/base';
import { openInput, STDIN_PATH, type InputSource } from '../utils/input-source';
import { openOutput, type OutputSink } from '../utils/output-sink';
import { logger } from '../utils/logger';
import { type RedactionStats } from '../types/redaction';

export interface RedactCommandOptions {
  output?: string;
  parameters?: string;
  redaction_string?: string;
  log_level?: string;
  config?: string;
  report?: string;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function reportFatal(error: unknown): void {
  logger.error(describeError(error));
  if (error instanceof ConfigError) {
    error.issues.forEach((issue) => logger.error(`  - ${issue.path}: ${issue.message}`));
  }
}

/**
 * Runs one redaction pass and resolves to the process exit code:
 * 0 on completion, 1 when configuration, input or output cannot be set up
 * or writing fails part way.
 */
export async function runRedact(input: string, options: RedactCommandOptions): Promise<number> {
  const startTime = new Date();

  // 1. Load Config
  let config: Config;
  try {
    config = ConfigLoader.load(options.config, {
      parameters: options.parameters,
      redactionString: options.redaction_string,
      logLevel: options.log_level,
      report: options.report,
    });
  } catch (error) {
    reportFatal(error);
    return 1;
  }
  logger.setLevel(config.logLevel);

  // 2. Open input, then output
  let source: InputSource;
  let sink: OutputSink;
  try {
    logger.info(input === STDIN_PATH ? 'Reading from standard input.' : `Reading from file: ${input}`);
    source = await openInput(input);
    logger.debug(`Input encoding: ${source.encoding}`);

    logger.info(options.output ? `Writing to file: ${options.output}` : 'Writing to standard output.');
    sink = await openOutput(options.output);
  } catch (error) {
    reportFatal(error);
    return 1;
  }

  // 3. Pipeline: Locate -> Redact -> Write
  let stats: RedactionStats;
  try {
    stats = await redactStream(source.lines, sink, {
      parameters: config.parameters,
      redactionString: config.redactionString,
    });
  } catch (error) {
    logger.error(`Error processing data: ${describeError(error)}`);
    return 1;
  } finally {
    await sink.close();
  }

  // 4. Reporting
  const reportData: ReportData = {
    input: source.description,
    output: sink.description,
    encoding: source.encoding,
    parameters: config.parameters,
    redactionString: config.redactionString,
    stats,
    startTime,
    endTime: new Date(),
  };

  const reporters: Reporter[] = [];
  if (logger.isEnabled('info')) {
    reporters.push(new ConsoleReporter());
  }
  if (config.report) {
    reporters.push(new JsonReporter(config.report));
  }

  try {
    for (const reporter of reporters) {
      await reporter.generate(reportData);
    }
  } catch (error) {
    // The redacted output is already complete
    logger.error(`Failed to write report: ${describeError(error)}`);
  }

  return 0;
}

export const redactCommand = new Command('redact')
  .description('Redact sensitive query parameters from URLs in a file or standard input')
  .argument('[input]', `Input file to process; use '${STDIN_PATH}' for standard input`, STDIN_PATH)
  .option('-o, --output <path>', 'File to write the redacted text to (default: standard output)')
  .option('-p, --parameters <list>', `Comma-separated parameters to redact (default: ${DEFAULT_PARAMETERS.join(',')})`)
  .option('-r, --redaction_string <token>', `Replacement for redacted values (default: ${DEFAULT_REDACTION_STRING})`)
  .option('-l, --log_level <level>', 'Logging level: DEBUG, INFO, WARNING, ERROR or CRITICAL (default: INFO)')
  .option('-c, --config <path>', `Path to ${DEFAULT_CONFIG_FILENAME}`)
  .option('--report <path>', 'Write a JSON run report to this path')
  .action(async (input: string, options: RedactCommandOptions) => {
    const exitCode = await runRedact(input, options);
    if (exitCode !== 0) {
      process.exit(exitCode);
    }
  });
