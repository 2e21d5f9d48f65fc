import fs from 'node:fs';
import path from 'node:path';
import yaml from 'js-yaml';
import { type ZodIssue } from 'zod';
import { ConfigSchema, ConfigFileSchema, type Config, type ConfigOverrides } from './schema';
import { DEFAULT_CONFIG, DEFAULT_CONFIG_FILENAME, DEFAULT_CONFIG_TEMPLATE } from './defaults';
import { ConfigError, isErrnoException, type ConfigIssue } from '../errors/redaction-errors';

interface RawConfig {
  parameters: string[];
  redactionString: string;
  logLevel: string;
  report?: string;
}

/**
 * Splits a comma-separated parameter list, trimming names and dropping blanks.
 */
export function parseParameterList(value: string | readonly string[]): string[] {
  const entries = typeof value === 'string' ? value.split(',') : value;
  return entries.map((entry) => entry.trim()).filter(Boolean);
}

function toIssues(issues: ZodIssue[]): ConfigIssue[] {
  return issues.map((issue) => ({
    path: issue.path.join('.') || '(root)',
    message: issue.message,
  }));
}

export class ConfigLoader {
  private static readonly DEFAULT_CONFIG_PATH = DEFAULT_CONFIG_FILENAME;

  /**
   * Resolves the run configuration. Precedence, lowest first:
   * defaults, YAML file, URL_REDACT_* environment variables, CLI overrides.
   */
  static load(
    configPath?: string,
    overrides: ConfigOverrides = {},
    env: NodeJS.ProcessEnv = process.env
  ): Config {
    const fileConfig = this.loadFile(configPath);
    const envConfig = this.loadFromEnv(env);

    const merged = [fileConfig, envConfig, overrides].reduce<RawConfig>(
      (config, layer) => this.mergeLayer(config, layer),
      { ...DEFAULT_CONFIG, parameters: [...DEFAULT_CONFIG.parameters] }
    );

    const result = ConfigSchema.safeParse(merged);
    if (!result.success) {
      throw new ConfigError('Configuration validation failed', toIssues(result.error.issues));
    }

    return result.data;
  }

  /**
   * Writes the commented default configuration to `targetPath`. Never
   * overwrites: an existing file is a ConfigError.
   */
  static writeDefault(targetPath: string): void {
    try {
      fs.writeFileSync(targetPath, DEFAULT_CONFIG_TEMPLATE, { encoding: 'utf8', flag: 'wx' });
    } catch (error) {
      if (isErrnoException(error) && error.code === 'EEXIST') {
        throw new ConfigError(`${targetPath} already exists`);
      }
      const detail = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`Failed to create ${targetPath}: ${detail}`);
    }
  }

  private static loadFile(configPath?: string): ConfigOverrides {
    const targetPath = configPath || path.join(process.cwd(), this.DEFAULT_CONFIG_PATH);

    if (!fs.existsSync(targetPath)) {
      if (configPath) {
        throw new ConfigError(`Configuration file not found at ${targetPath}`);
      }
      return {};
    }

    let parsedYaml: unknown;
    try {
      parsedYaml = yaml.load(fs.readFileSync(targetPath, 'utf8'));
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`Failed to load configuration from ${targetPath}: ${detail}`);
    }

    // An empty file parses to undefined
    if (parsedYaml === undefined || parsedYaml === null) {
      return {};
    }

    const result = ConfigFileSchema.safeParse(parsedYaml);
    if (!result.success) {
      throw new ConfigError(
        `Invalid configuration in ${targetPath}`,
        toIssues(result.error.issues)
      );
    }

    return result.data;
  }

  private static loadFromEnv(env: NodeJS.ProcessEnv): ConfigOverrides {
    const config: ConfigOverrides = {};

    if (env.URL_REDACT_PARAMETERS) {
      config.parameters = env.URL_REDACT_PARAMETERS;
    }

    if (env.URL_REDACT_REDACTION_STRING !== undefined) {
      config.redactionString = env.URL_REDACT_REDACTION_STRING;
    }

    if (env.URL_REDACT_LOG_LEVEL) {
      config.logLevel = env.URL_REDACT_LOG_LEVEL;
    }

    return config;
  }

  private static mergeLayer(config: RawConfig, layer: ConfigOverrides): RawConfig {
    const merged = { ...config };

    // Only override if explicitly set
    if (layer.parameters !== undefined) {
      merged.parameters = parseParameterList(layer.parameters);
    }

    if (layer.redactionString !== undefined) {
      merged.redactionString = layer.redactionString;
    }

    if (layer.logLevel !== undefined) {
      merged.logLevel = layer.logLevel;
    }

    if (layer.report !== undefined) {
      merged.report = layer.report;
    }

    return merged;
  }
}
