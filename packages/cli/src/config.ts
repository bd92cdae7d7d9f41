import { z } from 'zod';
import type { LevelWithSilent } from 'pino';
import type { EmbeddingSettingsInput } from '@embedbatch/core';
import { CliError } from './errors.js';

/** dotenv leaves unset-but-declared variables as empty strings. */
const blankAsUndefined = (value: unknown): unknown => (typeof value === 'string' && value.trim() === '' ? undefined : value);

const requiredString = z.preprocess(blankAsUndefined, z.string());
const optionalString = z.preprocess(blankAsUndefined, z.string().optional());
const optionalCount = z.preprocess(blankAsUndefined, z.coerce.number().int().positive().optional());

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const satisfies readonly LevelWithSilent[];

export const envSchema = z.object({
  OPENAI_API_KEY: optionalString,
  OPENAI_BASE_URL: z.preprocess(blankAsUndefined, z.string().url().optional()),
  DATABASE_URL: requiredString,
  LOG_LEVEL: z.preprocess(blankAsUndefined, z.enum(LOG_LEVELS).default('info')),
  EMBEDDING_MODEL: optionalString,
  EMBEDDING_DIMENSIONS: optionalCount,
  EMBEDDING_REQUESTS_PER_FILE: optionalCount,
  EMBEDDING_WINDOW_SIZE: optionalCount,
  EMBEDDING_FILE_POLL_INTERVAL_MS: optionalCount,
  EMBEDDING_JOB_POLL_INTERVAL_MS: optionalCount,
  EMBEDDING_MAX_CONCURRENT_SUBMISSIONS: optionalCount,
  EMBEDDING_RETRY_GROUP_SIZE: optionalCount,
  EMBEDDING_RETRY_CONCURRENCY: optionalCount,
  EMBEDDING_RETRY_MODEL: optionalString,
});

export interface CliConfig {
  /** Absent until a command that talks to the remote API asks for it through `requireApiKey`. */
  readonly openaiApiKey: string | undefined;
  readonly openaiBaseUrl: string | undefined;
  readonly databaseUrl: string;
  readonly logLevel: LevelWithSilent;
  readonly settings: EmbeddingSettingsInput;
}

/** Validate environment variables into a `CliConfig`. */
export function loadConfig(env: NodeJS.ProcessEnv): CliConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new CliError('VALIDATION', `Invalid configuration: ${issues.join('; ')}`, { issues });
  }
  const vars = parsed.data;
  return {
    openaiApiKey: vars.OPENAI_API_KEY,
    openaiBaseUrl: vars.OPENAI_BASE_URL,
    databaseUrl: vars.DATABASE_URL,
    logLevel: vars.LOG_LEVEL,
    settings: {
      model: vars.EMBEDDING_MODEL,
      dimensions: vars.EMBEDDING_DIMENSIONS,
      requestsPerFile: vars.EMBEDDING_REQUESTS_PER_FILE,
      windowSize: vars.EMBEDDING_WINDOW_SIZE,
      filePollIntervalMs: vars.EMBEDDING_FILE_POLL_INTERVAL_MS,
      jobPollIntervalMs: vars.EMBEDDING_JOB_POLL_INTERVAL_MS,
      maxConcurrentSubmissions: vars.EMBEDDING_MAX_CONCURRENT_SUBMISSIONS,
      retry: {
        groupSize: vars.EMBEDDING_RETRY_GROUP_SIZE,
        concurrency: vars.EMBEDDING_RETRY_CONCURRENCY,
        model: vars.EMBEDDING_RETRY_MODEL,
      },
    },
  };
}

export function requireApiKey(config: CliConfig): string {
  if (config.openaiApiKey === undefined) {
    throw new CliError('VALIDATION', 'Invalid configuration: OPENAI_API_KEY: Required');
  }
  return config.openaiApiKey;
}
