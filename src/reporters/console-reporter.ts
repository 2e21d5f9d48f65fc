import chalk from 'chalk';
import { Reporter, ReportData } from './base';

// Summary goes to stderr: stdout may be carrying the redacted text
export class ConsoleReporter implements Reporter {
  async generate(data: ReportData): Promise<void> {
    const { stats } = data;
    const fallbackCount = stats.fallbacks.length;

    console.error('\n' + chalk.bold.blue('=== url-redact Summary ==='));
    console.error(`Input:               ${data.input} (${data.encoding})`);
    console.error(`Output:              ${data.output}`);
    console.error(`Lines Processed:     ${stats.linesProcessed}`);
    console.error(`URLs Found:          ${stats.urlsFound}`);
    console.error(`URLs Redacted:       ${stats.urlsRedacted > 0 ? chalk.green(stats.urlsRedacted) : 0}`);
    console.error(`Values Redacted:     ${stats.parametersRedacted}`);
    console.error(`Unparseable URLs:    ${fallbackCount > 0 ? chalk.yellow(fallbackCount) : 0}`);
    console.error(`Lines With Errors:   ${stats.linesWithErrors > 0 ? chalk.red(stats.linesWithErrors) : 0}`);
    console.error(`Duration:            ${((data.endTime.getTime() - data.startTime.getTime()) / 1000).toFixed(2)}s`);

    if (fallbackCount > 0) {
      console.error('\n' + chalk.bold.yellow('Left Unmodified:'));
      stats.fallbacks.slice(0, 10).forEach((fallback) => {
        console.error(`  - line ${fallback.lineNumber}: ${chalk.cyan(fallback.url)} (${chalk.gray(fallback.reason)})`);
      });

      if (fallbackCount > 10) {
        console.error(`\n... and ${fallbackCount - 10} more. See the JSON report for full details.`);
      }
    }

    console.error(chalk.bold.blue('=========================='));
  }
}
