import { isJobStatus } from '@embedbatch/core';
import type { BatchJob, JobStatus } from '@embedbatch/core';
import type { JobRow } from '../models/JobModel.js';
import { toFragmentRefs, toIdList, toTimestamp } from './refs.js';

function toJobStatus(value: string): JobStatus {
  if (!isJobStatus(value)) throw new Error(`Unknown job status in store: ${value}`);
  return value;
}

export function toRow(job: BatchJob): JobRow {
  return {
    jobId: job.jobId,
    fileId: job.fileId,
    fragmentRefs: job.fragmentRefs.map((r) => ({ ownerId: r.ownerId, fragmentId: r.fragmentId })),
    status: job.status,
    processed: job.processed,
    createdAt: job.createdAt,
    completedAt: job.completedAt ?? null,
    processedAt: job.processedAt ?? null,
    resultFileId: job.resultFileId ?? null,
    retryOf: job.retryOf ?? null,
    supersededBy: job.supersededBy ?? null,
    combinedBatch: job.combinedBatch ?? false,
    combinedFrom: job.combinedFrom ? [...job.combinedFrom] : null,
    combinedFromFileIds: job.combinedFromFileIds ? [...job.combinedFromFileIds] : null,
    previousJobIds: job.previousJobIds ? [...job.previousJobIds] : null,
    previousFileIds: job.previousFileIds ? [...job.previousFileIds] : null,
    retryCount: job.retryCount ?? 0,
  };
}

export function toDomain(row: JobRow): BatchJob {
  const completedAt = toTimestamp(row.completedAt);
  const processedAt = toTimestamp(row.processedAt);
  const combinedFrom = toIdList(row.combinedFrom);
  const combinedFromFileIds = toIdList(row.combinedFromFileIds);
  const previousJobIds = toIdList(row.previousJobIds);
  const previousFileIds = toIdList(row.previousFileIds);

  return {
    jobId: row.jobId,
    fileId: row.fileId,
    fragmentRefs: toFragmentRefs(row.fragmentRefs),
    status: toJobStatus(row.status),
    processed: Boolean(row.processed),
    createdAt: toTimestamp(row.createdAt),
    ...(completedAt !== undefined ? { completedAt } : {}),
    ...(processedAt !== undefined ? { processedAt } : {}),
    ...(row.resultFileId !== null ? { resultFileId: row.resultFileId } : {}),
    ...(row.retryOf !== null ? { retryOf: row.retryOf } : {}),
    ...(row.supersededBy !== null ? { supersededBy: row.supersededBy } : {}),
    ...(row.combinedBatch ? { combinedBatch: true } : {}),
    ...(combinedFrom ? { combinedFrom } : {}),
    ...(row.combinedBatch ? { combinedFromFileIds: combinedFromFileIds ?? [] } : {}),
    ...(previousJobIds ? { previousJobIds } : {}),
    ...(previousFileIds ? { previousFileIds } : {}),
    ...(row.retryCount > 0 ? { retryCount: row.retryCount } : {}),
  };
}
