import { type Config } from './schema';

export const DEFAULT_PARAMETERS = ['api_key', 'password', 'session_id', 'auth_token'] as const;
export const DEFAULT_REDACTION_STRING = 'REDACTED';
export const DEFAULT_LOG_LEVEL = 'info' as const;
export const DEFAULT_CONFIG_FILENAME = 'url-redact.yaml';

export const DEFAULT_CONFIG: Config = {
  parameters: [...DEFAULT_PARAMETERS],
  redactionString: DEFAULT_REDACTION_STRING,
  logLevel: DEFAULT_LOG_LEVEL,
};

// Written by `url-redact init`; kept in step with DEFAULT_CONFIG
export const DEFAULT_CONFIG_TEMPLATE = `# url-redact configuration
# Values here are overridden by URL_REDACT_* environment variables,
# which are in turn overridden by command-line options.

# Query parameters whose values are replaced (exact, case-sensitive names).
parameters:
  - api_key
  - password
  - session_id
  - auth_token

# Text substituted for every redacted value.
redactionString: "REDACTED"

# One of: DEBUG, INFO, WARNING, ERROR, CRITICAL
logLevel: "INFO"

# Uncomment to write a JSON summary of each run.
# report: "./url-redact-report.json"
`;
