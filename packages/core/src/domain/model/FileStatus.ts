/** Processing status of an uploaded input file as reported by the remote API. */
export const FileStatus = {
  UPLOADED: 'uploaded',
  PROCESSING: 'processing',
  PROCESSED: 'processed',
  FAILED: 'failed',
} as const;

export type FileStatus = (typeof FileStatus)[keyof typeof FileStatus];
