import { z } from 'zod';

const positiveInt = z.number().int().positive();

export const embeddingSettingsSchema = z.object({
  /** Request lines per uploaded input file. */
  requestsPerFile: positiveInt.default(100),
  /** Fragments fetched per driver iteration. */
  windowSize: positiveInt.default(10_000),
  model: z.string().min(1).default('text-embedding-3-small'),
  dimensions: positiveInt.optional().default(1536),
  concurrency: z
    .object({
      upload: positiveInt.default(4),
      filePoll: positiveInt.default(8),
      jobCreation: positiveInt.default(4),
      jobPoll: positiveInt.default(16),
      ingestion: positiveInt.default(4),
    })
    .default({}),
  filePollIntervalMs: positiveInt.default(3_000),
  jobPollIntervalMs: positiveInt.default(60_000),
  /** Upper bound on file uploads and job creations in flight at once, across all stages. */
  maxConcurrentSubmissions: positiveInt.default(2),
  retry: z
    .object({
      /** Failed jobs combined into one replacement job. */
      groupSize: positiveInt.default(4),
      /** Groups resubmitted at once. */
      concurrency: positiveInt.default(2),
      /** Model written into every request line of a resubmitted payload. */
      model: z.string().min(1).default('text-embedding-3-small'),
    })
    .default({}),
});

/** Resolved settings, built once at process start and passed by reference. */
export type EmbeddingSettings = z.infer<typeof embeddingSettingsSchema>;

/** Settings as accepted from callers: every field optional. */
export type EmbeddingSettingsInput = z.input<typeof embeddingSettingsSchema>;

/** Apply defaults and validate. Throws a `ZodError` listing every invalid field. */
export function resolveSettings(input: EmbeddingSettingsInput = {}): EmbeddingSettings {
  return embeddingSettingsSchema.parse(input);
}
