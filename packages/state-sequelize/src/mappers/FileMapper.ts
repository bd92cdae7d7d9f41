import { FileStatus } from '@embedbatch/core';
import type { UploadedFile } from '@embedbatch/core';
import type { FileRow } from '../models/FileModel.js';
import { toFragmentRefs, toTimestamp } from './refs.js';

function toFileStatus(value: string): FileStatus {
  for (const status of Object.values(FileStatus)) {
    if (status === value) return status;
  }
  throw new Error(`Unknown file status in store: ${value}`);
}

export function toRow(file: UploadedFile): FileRow {
  return {
    fileId: file.fileId,
    fragmentRefs: file.fragmentRefs.map((r) => ({ ownerId: r.ownerId, fragmentId: r.fragmentId })),
    status: file.status,
    createdAt: file.createdAt,
    updatedAt: file.updatedAt,
  };
}

export function toDomain(row: FileRow): UploadedFile {
  return {
    fileId: row.fileId,
    fragmentRefs: toFragmentRefs(row.fragmentRefs),
    status: toFileStatus(row.status),
    createdAt: toTimestamp(row.createdAt),
    updatedAt: toTimestamp(row.updatedAt),
  };
}
