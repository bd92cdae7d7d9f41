/** Codes carried by `PipelineStateError`. */
export const PipelineErrorCode = {
  NOT_STARTED: 'PIPELINE_NOT_STARTED',
  ALREADY_STARTED: 'PIPELINE_ALREADY_STARTED',
  STAGE_STOPPED: 'STAGE_STOPPED',
  NO_STAGES: 'PIPELINE_NO_STAGES',
} as const;

export type PipelineErrorCode = (typeof PipelineErrorCode)[keyof typeof PipelineErrorCode];

/** Thrown when the pipeline or one of its stages is used outside its lifecycle. */
export class PipelineStateError extends Error {
  constructor(
    readonly code: PipelineErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'PipelineStateError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
