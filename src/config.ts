import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { InvalidOptionsError } from './errors.js';
import type { LogLevel } from './logger.js';

export const DEFAULT_MAX_PHONEMES = 20;

const LogLevelSchema = z.enum(['silent', 'error', 'warn', 'info', 'debug']);

// Env vars arrive as strings; empty ones count as unset.
const optionalEnvString = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value.trim() === '' ? undefined : value.trim()));

export const EnvConfigSchema = z.object({
  PHONETIC_BM_RULES_DIR: optionalEnvString,
  PHONETIC_MAX_PHONEMES: optionalEnvString.pipe(
    z.coerce.number().int().positive().default(DEFAULT_MAX_PHONEMES)
  ),
  PHONETIC_LOG_LEVEL: optionalEnvString.pipe(LogLevelSchema.default('warn')),
});

export interface PhoneticConfig {
  /** Directory holding the Beider-Morse rule resources (`<name>.txt`). */
  rulesDir: string | undefined;
  maxPhonemes: number;
  logLevel: LogLevel;
}

/**
 * Merge a `.env` file (default: `./.env`) into `process.env`. Variables that
 * are already set win. A missing file is not an error.
 */
export function loadPhoneticEnv(path?: string): NodeJS.ProcessEnv {
  loadDotenv(path === undefined ? {} : { path });
  return process.env;
}

export function getPhoneticConfig(env: NodeJS.ProcessEnv = process.env): PhoneticConfig {
  const parsed = EnvConfigSchema.safeParse(env);
  if (!parsed.success) {
    throw new InvalidOptionsError(`Invalid phonetic environment configuration: ${formatIssues(parsed.error)}`);
  }

  return {
    rulesDir: parsed.data.PHONETIC_BM_RULES_DIR,
    maxPhonemes: parsed.data.PHONETIC_MAX_PHONEMES,
    logLevel: parsed.data.PHONETIC_LOG_LEVEL,
  };
}

export const EngineOptionsSchema = z.object({
  nameType: z.enum(['ash', 'gen', 'sep']),
  ruleType: z.enum(['approx', 'exact']),
  concat: z.boolean().default(true),
  /** Falls back to the `ConfigFiles` default when omitted. */
  maxPhonemes: z.number().int().positive().optional(),
});

export type EngineOptionsInput = z.input<typeof EngineOptionsSchema>;
export type EngineOptions = z.output<typeof EngineOptionsSchema>;

export function parseEngineOptions(options: EngineOptionsInput): EngineOptions {
  const parsed = EngineOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new InvalidOptionsError(`Invalid engine options: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
