import type { FileStatus } from './FileStatus.js';
import type { FragmentRef } from './FragmentRef.js';

/** Audit record of an input file submitted to the remote API. Never deleted. */
export interface UploadedFile {
  readonly fileId: string;
  readonly fragmentRefs: readonly FragmentRef[];
  readonly status: FileStatus;
  readonly createdAt: number;
  readonly updatedAt: number;
}
