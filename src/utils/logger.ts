import chalk from 'chalk';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'critical'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const levelPriority: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  critical: 50,
};

const levelLabel: Record<LogLevel, string> = {
  debug: chalk.gray('DEBUG'),
  info: chalk.blue('INFO'),
  warn: chalk.yellow('WARNING'),
  error: chalk.red('ERROR'),
  critical: chalk.bold.red('CRITICAL'),
};

export interface LogStream {
  write(chunk: string): unknown;
}

export interface LoggerOptions {
  level?: LogLevel;
  stream?: LogStream;
}

export interface Logger {
  readonly level: LogLevel;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  critical(message: string): void;
  setLevel(level: LogLevel): void;
  isEnabled(level: LogLevel): boolean;
}

/**
 * Creates a leveled logger that writes "timestamp - LEVEL - message" lines.
 * Defaults to stderr so redacted text on stdout stays clean.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  let currentLevel: LogLevel = options.level ?? 'info';
  const stream = options.stream ?? process.stderr;

  const isEnabled = (level: LogLevel) => levelPriority[level] >= levelPriority[currentLevel];

  const write = (level: LogLevel, message: string) => {
    if (!isEnabled(level)) {
      return;
    }
    stream.write(`${new Date().toISOString()} - ${levelLabel[level]} - ${message}\n`);
  };

  return {
    get level() {
      return currentLevel;
    },
    debug: (message) => write('debug', message),
    info: (message) => write('info', message),
    warn: (message) => write('warn', message),
    error: (message) => write('error', message),
    critical: (message) => write('critical', message),
    setLevel: (level) => {
      currentLevel = level;
    },
    isEnabled,
  };
}

export const logger = createLogger();
