import type { Fragment } from '../model/FragmentRef.js';
import { fragmentKey, toCorrelationId } from '../model/FragmentRef.js';
import type { FragmentBatch } from '../model/PipelineItem.js';
import { BatchSplitter } from './BatchSplitter.js';

export const EMBEDDINGS_ENDPOINT = '/v1/embeddings';

export interface RequestFormatOptions {
  /** Number of request lines per uploaded file. */
  readonly requestsPerFile: number;
  readonly model: string;
  readonly dimensions?: number;
}

/** One line of a batch input file. */
export interface EmbeddingRequestLine {
  readonly custom_id: string;
  readonly method: 'POST';
  readonly url: typeof EMBEDDINGS_ENDPOINT;
  readonly body: {
    readonly input: string;
    readonly model: string;
    readonly encoding_format: 'float';
    readonly dimensions?: number;
  };
}

export function toRequestLine(fragment: Fragment, options: Omit<RequestFormatOptions, 'requestsPerFile'>): EmbeddingRequestLine {
  return {
    custom_id: toCorrelationId(fragment),
    method: 'POST',
    url: EMBEDDINGS_ENDPOINT,
    body: {
      input: fragment.text,
      model: options.model,
      encoding_format: 'float',
      ...(options.dimensions !== undefined ? { dimensions: options.dimensions } : {}),
    },
  };
}

/**
 * Package fragments into request files of at most `requestsPerFile` lines.
 *
 * Pure transformation, nothing is written to disk. A fragment listed twice is
 * only sent once, so no request file ever repeats a reference.
 */
export function buildRequestPayloads(fragments: readonly Fragment[], options: RequestFormatOptions): FragmentBatch[] {
  const seen = new Set<string>();
  const unique: Fragment[] = [];
  for (const fragment of fragments) {
    const key = fragmentKey(fragment);
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(fragment);
  }

  return new BatchSplitter(options.requestsPerFile).split(unique).map((group) => ({
    refs: group.map((f) => ({ ownerId: f.ownerId, fragmentId: f.fragmentId })),
    payload: group.map((f) => JSON.stringify(toRequestLine(f, options))).join('\n'),
  }));
}
