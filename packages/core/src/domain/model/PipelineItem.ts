import { z } from 'zod';
import type { FragmentRef } from './FragmentRef.js';

/**
 * Payloads moving between stages:
 * `FragmentBatch` → `UploadedFileHandle` → (ready) `UploadedFileHandle` → job id → `CompletedJobHandle`.
 */

/** Input of the upload stage: the fragments in one request file and its JSONL body. */
export interface FragmentBatch {
  readonly refs: readonly FragmentRef[];
  readonly payload: string;
}

/** An uploaded input file and the fragments it covers. */
export interface UploadedFileHandle {
  readonly fileId: string;
  readonly refs: readonly FragmentRef[];
}

/** A job that completed with a downloadable result file. */
export interface CompletedJobHandle {
  readonly jobId: string;
  readonly resultFileId: string;
}

const fragmentRefSchema = z.object({
  ownerId: z.number().int(),
  fragmentId: z.number().int(),
});

export const fragmentBatchSchema = z.object({
  refs: z.array(fragmentRefSchema).min(1),
  payload: z.string().min(1),
});

export const uploadedFileHandleSchema = z.object({
  fileId: z.string().min(1),
  refs: z.array(fragmentRefSchema),
});

export const jobIdSchema = z.string().min(1);

export const completedJobHandleSchema = z.object({
  jobId: z.string().min(1),
  resultFileId: z.string().min(1),
});
