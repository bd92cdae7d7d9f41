import type { FragmentRef } from './FragmentRef.js';

/** A vector produced for one fragment. */
export interface FragmentEmbedding {
  readonly ref: FragmentRef;
  readonly vector: readonly number[];
}

/** A result line that carried an error instead of a vector. */
export interface ResultFailure {
  readonly ref: FragmentRef;
  readonly message: string;
}
