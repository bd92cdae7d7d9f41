import type { FileStatus } from '../model/FileStatus.js';
import type { JobStatus } from '../model/JobStatus.js';

/** Snapshot returned by `pollFileStatus()`. `ready` is `true` once the file can back a job. */
export interface FilePollResult {
  readonly status: FileStatus;
  readonly ready: boolean;
}

/** Snapshot returned by `pollJobStatus()`. */
export interface JobPollResult {
  readonly status: JobStatus;
  readonly resultFileId?: string;
}

/**
 * Port for the external asynchronous batch API.
 *
 * Poll methods throw on transport failures; callers treat a throw as a
 * transient condition and poll again on the next tick.
 */
export interface RemoteJobClient {
  /** Upload a JSONL request file. Returns the remote file id. */
  submitFile(payload: string): Promise<string>;
  pollFileStatus(fileId: string): Promise<FilePollResult>;
  /** Create a batch job over an uploaded file. Returns the remote job id. */
  createJob(fileId: string): Promise<string>;
  pollJobStatus(jobId: string): Promise<JobPollResult>;
  /** Download a job's line-delimited result file into memory. */
  fetchResultContent(resultFileId: string): Promise<string>;
  /** Download a previously submitted input file, used to rebuild failed jobs. */
  fetchInputContent(fileId: string): Promise<string>;
}
