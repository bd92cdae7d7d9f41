import type { BatchJob, JobMetadataInput, JobReplacement } from '../model/BatchJob.js';
import type { FileStatus } from '../model/FileStatus.js';
import type { Fragment, FragmentRef } from '../model/FragmentRef.js';
import type { JobStatus } from '../model/JobStatus.js';
import type { UploadedFile } from '../model/UploadedFile.js';

/**
 * Port for the durable record of every upload and job.
 *
 * All writes are upserts keyed by the natural id (`fileId` / `jobId`) so
 * concurrent stages converge without locking. Job status only moves forward:
 * `updateJobStatus()` ignores a change that `canTransitionJob()` rejects and
 * reports it by resolving to `false`.
 */
export interface BatchLifecycleStore {
  /** Register fragments produced by the segmentation step. Existing fragments are overwritten. */
  saveFragments(fragments: readonly Fragment[]): Promise<void>;
  /** Fragments not claimed by any job other than a superseded one, in stable order. */
  listFragmentsWithoutActiveJob(limit: number): Promise<readonly Fragment[]>;

  upsertFileMetadata(fileId: string, fragmentRefs: readonly FragmentRef[], status: FileStatus): Promise<void>;
  updateFileStatus(fileId: string, status: FileStatus): Promise<void>;
  getFile(fileId: string): Promise<UploadedFile | null>;
  listFiles(): Promise<readonly UploadedFile[]>;

  /** Create or replace a job record. A second call with the same `jobId` replaces the first. */
  upsertJobMetadata(job: JobMetadataInput): Promise<void>;
  /** Record a polled status; sets `completedAt` when the status is terminal. */
  updateJobStatus(jobId: string, status: JobStatus, resultFileId?: string): Promise<boolean>;
  markJobProcessed(jobId: string): Promise<void>;
  markJobSuperseded(jobId: string, supersededBy: string): Promise<void>;
  /**
   * Move a failed job record onto a new remote job: the record keeps its
   * fragments, takes the new ids, resets to `validating`, appends the old ids
   * to its history and increments `retryCount`.
   */
  recordJobRetry(oldJobId: string, replacement: JobReplacement): Promise<void>;
  getJob(jobId: string): Promise<BatchJob | null>;
  listJobs(): Promise<readonly BatchJob[]>;

  /** Ids of jobs still running remotely, or completed but not yet processed. */
  listIncompleteJobIds(): Promise<readonly string[]>;
  /** Jobs with status `failed`, oldest first. */
  listFailedJobs(): Promise<readonly BatchJob[]>;
  /** A failed job by id, or the oldest failed job when no id is given. */
  findFailedJob(jobId?: string): Promise<BatchJob | null>;
}
