import { z } from 'zod';
import type { FragmentEmbedding, ResultFailure } from '../model/Embedding.js';
import { parseCorrelationId } from '../model/FragmentRef.js';

const resultLineSchema = z.object({
  custom_id: z.string(),
  response: z
    .object({
      status_code: z.number().optional(),
      body: z
        .object({
          data: z.array(z.object({ embedding: z.array(z.number()) }).passthrough()).optional(),
        })
        .passthrough()
        .nullish(),
    })
    .passthrough()
    .nullish(),
  error: z
    .object({ message: z.string().optional(), code: z.string().nullish() })
    .passthrough()
    .nullish(),
});

export interface ParsedResults {
  readonly embeddings: readonly FragmentEmbedding[];
  readonly failures: readonly ResultFailure[];
  /** Lines that were not JSON, had an unknown correlation id, or carried an empty vector. */
  readonly skippedLines: number;
}

/**
 * Parse a downloaded result file. Works on the in-memory content only.
 *
 * Each line is matched back to its fragment through `custom_id`. A line with
 * an `error`, a non-2xx status code, or an error body counts as a failure.
 */
export function parseResultContent(content: string): ParsedResults {
  const embeddings: FragmentEmbedding[] = [];
  const failures: ResultFailure[] = [];
  let skippedLines = 0;

  for (const line of content.split('\n')) {
    const trimmed = line.trim();
    if (trimmed === '') continue;

    let json: unknown;
    try {
      json = JSON.parse(trimmed);
    } catch {
      skippedLines++;
      continue;
    }

    const parsed = resultLineSchema.safeParse(json);
    if (!parsed.success) {
      skippedLines++;
      continue;
    }

    const ref = parseCorrelationId(parsed.data.custom_id);
    if (!ref) {
      skippedLines++;
      continue;
    }

    const { response, error } = parsed.data;
    if (error) {
      failures.push({ ref, message: error.message ?? error.code ?? 'unknown error' });
      continue;
    }

    const statusCode = response?.status_code;
    if (statusCode !== undefined && (statusCode < 200 || statusCode >= 300)) {
      failures.push({ ref, message: `request failed with status ${String(statusCode)}` });
      continue;
    }

    const vector = response?.body?.data?.[0]?.embedding;
    if (!vector || vector.length === 0) {
      skippedLines++;
      continue;
    }

    embeddings.push({ ref, vector });
  }

  return { embeddings, failures, skippedLines };
}
