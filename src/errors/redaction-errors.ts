export class UrlParseError extends Error {
  readonly code = 'URL_PARSE_ERROR';

  constructor(
    public readonly url: string,
    public readonly reason: string
  ) {
    super(`Could not parse URL ${url}: ${reason}`);
    this.name = 'UrlParseError';
  }
}

export class InputSourceError extends Error {
  readonly code = 'INPUT_SOURCE_ERROR';

  constructor(
    public readonly path: string,
    public readonly originalError: unknown
  ) {
    let message = `Error opening input file: ${path}`;

    if (isErrnoException(originalError) && originalError.code === 'ENOENT') {
      message = `Input file not found: ${path}`;
    } else if (originalError instanceof Error) {
      message += ` (${originalError.message})`;
    }

    super(message);
    this.name = 'InputSourceError';
  }
}

export class OutputDestinationError extends Error {
  readonly code = 'OUTPUT_DESTINATION_ERROR';

  constructor(
    public readonly path: string,
    public readonly originalError: unknown
  ) {
    const detail = originalError instanceof Error ? `: ${originalError.message}` : '';
    super(`Error opening output file ${path}${detail}`);
    this.name = 'OutputDestinationError';
  }
}

export interface ConfigIssue {
  path: string;
  message: string;
}

export class ConfigError extends Error {
  readonly code = 'CONFIG_ERROR';

  constructor(
    message: string,
    public readonly issues: ConfigIssue[] = []
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}
