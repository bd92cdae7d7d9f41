import type { FragmentEmbedding } from '../model/Embedding.js';
import type { FragmentRef } from '../model/FragmentRef.js';

/** Port for the result store that receives embedding vectors. */
export interface VectorStore {
  /** Insert or replace vectors keyed by fragment reference. */
  upsertEmbeddings(embeddings: readonly FragmentEmbedding[]): Promise<void>;
  /** Read back which of the given references currently have a stored vector. */
  findStoredRefs(refs: readonly FragmentRef[]): Promise<readonly FragmentRef[]>;
  count(): Promise<number>;
}
