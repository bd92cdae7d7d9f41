import type { BatchJob, JobMetadataInput, JobReplacement } from '../../domain/model/BatchJob.js';
import type { FileStatus } from '../../domain/model/FileStatus.js';
import type { Fragment, FragmentRef } from '../../domain/model/FragmentRef.js';
import { fragmentKey } from '../../domain/model/FragmentRef.js';
import {
  JobStatus,
  canTransitionJob,
  isActiveJobStatus,
  isTerminalJobStatus,
} from '../../domain/model/JobStatus.js';
import type { UploadedFile } from '../../domain/model/UploadedFile.js';
import type { BatchLifecycleStore } from '../../domain/ports/BatchLifecycleStore.js';

/** Non-persistent lifecycle store. Used as the default and in tests. */
export class InMemoryLifecycleStore implements BatchLifecycleStore {
  private fragments = new Map<string, Fragment>();
  private files = new Map<string, UploadedFile>();
  private jobs = new Map<string, BatchJob>();

  saveFragments(fragments: readonly Fragment[]): Promise<void> {
    for (const fragment of fragments) {
      this.fragments.set(fragmentKey(fragment), { ...fragment });
    }
    return Promise.resolve();
  }

  listFragmentsWithoutActiveJob(limit: number): Promise<readonly Fragment[]> {
    const claimed = new Set<string>();
    for (const job of this.jobs.values()) {
      if (job.status === JobStatus.SUPERSEDED) continue;
      for (const ref of job.fragmentRefs) claimed.add(fragmentKey(ref));
    }

    const available = [...this.fragments.values()]
      .filter((f) => !claimed.has(fragmentKey(f)))
      .sort((a, b) => a.ownerId - b.ownerId || a.fragmentId - b.fragmentId);
    return Promise.resolve(available.slice(0, limit));
  }

  upsertFileMetadata(fileId: string, fragmentRefs: readonly FragmentRef[], status: FileStatus): Promise<void> {
    const now = Date.now();
    const existing = this.files.get(fileId);
    this.files.set(fileId, {
      fileId,
      fragmentRefs: [...fragmentRefs],
      status,
      createdAt: existing?.createdAt ?? now,
      updatedAt: now,
    });
    return Promise.resolve();
  }

  updateFileStatus(fileId: string, status: FileStatus): Promise<void> {
    const existing = this.files.get(fileId);
    if (existing) {
      this.files.set(fileId, { ...existing, status, updatedAt: Date.now() });
    }
    return Promise.resolve();
  }

  getFile(fileId: string): Promise<UploadedFile | null> {
    return Promise.resolve(this.files.get(fileId) ?? null);
  }

  listFiles(): Promise<readonly UploadedFile[]> {
    return Promise.resolve([...this.files.values()]);
  }

  upsertJobMetadata(input: JobMetadataInput): Promise<void> {
    if (input.retryOf !== undefined && input.retryOf !== input.jobId) {
      this.jobs.delete(input.retryOf);
    }
    this.jobs.set(input.jobId, {
      jobId: input.jobId,
      fileId: input.fileId,
      fragmentRefs: [...input.fragmentRefs],
      status: input.status,
      processed: false,
      createdAt: Date.now(),
      ...(input.retryOf !== undefined ? { retryOf: input.retryOf } : {}),
      ...(input.combinedFrom !== undefined
        ? {
            combinedBatch: true,
            combinedFrom: [...input.combinedFrom],
            combinedFromFileIds: [...(input.combinedFromFileIds ?? [])],
          }
        : {}),
    });
    return Promise.resolve();
  }

  updateJobStatus(jobId: string, status: JobStatus, resultFileId?: string): Promise<boolean> {
    const job = this.jobs.get(jobId);
    if (!job || !canTransitionJob(job.status, status)) return Promise.resolve(false);

    this.jobs.set(jobId, {
      ...job,
      status,
      ...(resultFileId !== undefined ? { resultFileId } : {}),
      ...(isTerminalJobStatus(status) && job.completedAt === undefined ? { completedAt: Date.now() } : {}),
    });
    return Promise.resolve(true);
  }

  markJobProcessed(jobId: string): Promise<void> {
    const job = this.jobs.get(jobId);
    if (job) {
      this.jobs.set(jobId, { ...job, processed: true, processedAt: Date.now() });
    }
    return Promise.resolve();
  }

  markJobSuperseded(jobId: string, supersededBy: string): Promise<void> {
    const job = this.jobs.get(jobId);
    if (!job) return Promise.reject(new Error(`Job ${jobId} not found`));
    if (!canTransitionJob(job.status, JobStatus.SUPERSEDED)) {
      return Promise.reject(new Error(`Job ${jobId} cannot be superseded from status ${job.status}`));
    }
    this.jobs.set(jobId, { ...job, status: JobStatus.SUPERSEDED, supersededBy });
    return Promise.resolve();
  }

  recordJobRetry(oldJobId: string, replacement: JobReplacement): Promise<void> {
    const job = this.jobs.get(oldJobId);
    if (!job) return Promise.reject(new Error(`Job ${oldJobId} not found`));

    const { completedAt: _completedAt, resultFileId: _resultFileId, processedAt: _processedAt, ...rest } = job;
    this.jobs.delete(oldJobId);
    this.jobs.set(replacement.jobId, {
      ...rest,
      jobId: replacement.jobId,
      fileId: replacement.fileId,
      status: JobStatus.VALIDATING,
      processed: false,
      createdAt: Date.now(),
      previousJobIds: [...(job.previousJobIds ?? []), oldJobId],
      previousFileIds: [...(job.previousFileIds ?? []), job.fileId],
      retryCount: (job.retryCount ?? 0) + 1,
    });
    return Promise.resolve();
  }

  getJob(jobId: string): Promise<BatchJob | null> {
    return Promise.resolve(this.jobs.get(jobId) ?? null);
  }

  listJobs(): Promise<readonly BatchJob[]> {
    return Promise.resolve([...this.jobs.values()]);
  }

  listIncompleteJobIds(): Promise<readonly string[]> {
    const ids = [...this.jobs.values()]
      .filter((job) => isActiveJobStatus(job.status) || (job.status === JobStatus.COMPLETED && !job.processed))
      .map((job) => job.jobId);
    return Promise.resolve(ids);
  }

  listFailedJobs(): Promise<readonly BatchJob[]> {
    const failed = [...this.jobs.values()]
      .filter((job) => job.status === JobStatus.FAILED)
      .sort((a, b) => a.createdAt - b.createdAt);
    return Promise.resolve(failed);
  }

  async findFailedJob(jobId?: string): Promise<BatchJob | null> {
    if (jobId === undefined) {
      const [first] = await this.listFailedJobs();
      return first ?? null;
    }
    const job = this.jobs.get(jobId);
    return job?.status === JobStatus.FAILED ? job : null;
  }
}
