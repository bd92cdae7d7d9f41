import type { FragmentRef } from './FragmentRef.js';
import type { JobStatus } from './JobStatus.js';

/** Persisted state of one remote batch job. */
export interface BatchJob {
  readonly jobId: string;
  readonly fileId: string;
  readonly fragmentRefs: readonly FragmentRef[];
  readonly status: JobStatus;
  /** `true` only once results are stored and a read-back confirmed every one of them. */
  readonly processed: boolean;
  readonly createdAt: number;
  readonly completedAt?: number;
  readonly processedAt?: number;
  readonly resultFileId?: string;
  readonly retryOf?: string;
  readonly supersededBy?: string;
  /** Set on jobs created by combining several failed jobs. */
  readonly combinedBatch?: boolean;
  readonly combinedFrom?: readonly string[];
  readonly combinedFromFileIds?: readonly string[];
  /** History of an in-place retry: job ids and input files this record used before. */
  readonly previousJobIds?: readonly string[];
  readonly previousFileIds?: readonly string[];
  readonly retryCount?: number;
}

/** Fields accepted by `BatchLifecycleStore.upsertJobMetadata()`. */
export interface JobMetadataInput {
  readonly jobId: string;
  readonly fileId: string;
  readonly fragmentRefs: readonly FragmentRef[];
  readonly status: JobStatus;
  /** Id of the failed job this one replaces; that record is removed. */
  readonly retryOf?: string;
  readonly combinedFrom?: readonly string[];
  readonly combinedFromFileIds?: readonly string[];
}

/** New identity assigned to a job record by an in-place retry. */
export interface JobReplacement {
  readonly jobId: string;
  readonly fileId: string;
}
