import type { FragmentEmbedding } from '../../domain/model/Embedding.js';
import type { FragmentRef } from '../../domain/model/FragmentRef.js';
import { fragmentKey } from '../../domain/model/FragmentRef.js';
import type { VectorStore } from '../../domain/ports/VectorStore.js';

/** Non-persistent vector store keyed by fragment reference. */
export class InMemoryVectorStore implements VectorStore {
  private vectors = new Map<string, FragmentEmbedding>();

  upsertEmbeddings(embeddings: readonly FragmentEmbedding[]): Promise<void> {
    for (const embedding of embeddings) {
      this.vectors.set(fragmentKey(embedding.ref), {
        ref: { ownerId: embedding.ref.ownerId, fragmentId: embedding.ref.fragmentId },
        vector: [...embedding.vector],
      });
    }
    return Promise.resolve();
  }

  findStoredRefs(refs: readonly FragmentRef[]): Promise<readonly FragmentRef[]> {
    return Promise.resolve(refs.filter((ref) => this.vectors.has(fragmentKey(ref))));
  }

  count(): Promise<number> {
    return Promise.resolve(this.vectors.size);
  }

  /** Stored vector for a reference, if any. */
  get(ref: FragmentRef): FragmentEmbedding | undefined {
    return this.vectors.get(fragmentKey(ref));
  }
}
