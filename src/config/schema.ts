import { z } from 'zod';
import { LOG_LEVELS } from '../utils/logger';

const LEVEL_ALIASES: Record<string, string> = {
  warning: 'warn',
  fatal: 'critical',
};

/**
 * Accepts the level names in any case, plus "WARNING" and "FATAL" aliases.
 */
export const LogLevelSchema = z.preprocess((value) => {
  if (typeof value !== 'string') return value;
  const lowered = value.trim().toLowerCase();
  return LEVEL_ALIASES[lowered] ?? lowered;
}, z.enum(LOG_LEVELS));

export const ConfigSchema = z.object({
  parameters: z
    .array(z.string().min(1, 'Parameter names cannot be empty'))
    .min(1, 'At least one parameter to redact is required'),
  redactionString: z.string(),
  logLevel: LogLevelSchema,
  report: z.string().min(1).optional(),
});

// Shape of url-redact.yaml: every key optional, unknown keys rejected
export const ConfigFileSchema = z
  .object({
    parameters: z.union([z.array(z.string()), z.string()]).optional(),
    redactionString: z.string().optional(),
    logLevel: z.string().optional(),
    report: z.string().optional(),
  })
  .strict();

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigFile = z.infer<typeof ConfigFileSchema>;
export type ConfigOverrides = ConfigFile;
