import type { UploadedFileHandle } from '../../domain/model/PipelineItem.js';
import { uploadedFileHandleSchema } from '../../domain/model/PipelineItem.js';
import { JobStatus } from '../../domain/model/JobStatus.js';
import type { EmbeddingContext } from '../EmbeddingContext.js';
import type { StageContext, StageProcessor } from '../PipelineStage.js';
import { errorMessage } from '../errors.js';

export const JOB_CREATION_STAGE = 'job-creation';

/** Creates a batch job over a ready file and records it as `validating`. */
export class JobCreationProcessor implements StageProcessor<UploadedFileHandle, string> {
  readonly inputSchema = uploadedFileHandleSchema;

  constructor(private readonly ctx: EmbeddingContext) {}

  async process(handle: UploadedFileHandle, stage: StageContext): Promise<string | null> {
    const { client, store, submissionGate, events } = this.ctx;
    const { fileId, refs } = handle;

    let jobId: string;
    try {
      jobId = await submissionGate.run(() => client.createJob(fileId));
    } catch (error) {
      stage.logger.error({ fileId, error: errorMessage(error) }, 'Job creation failed');
      return null;
    }

    try {
      await store.upsertJobMetadata({ jobId, fileId, fragmentRefs: refs, status: JobStatus.VALIDATING });
    } catch (error) {
      stage.logger.error({ jobId, fileId, error: errorMessage(error) }, 'Created job could not be recorded');
      return null;
    }

    stage.logger.info({ jobId, fileId, fragmentCount: refs.length }, 'Job created');
    events.emit({ type: 'job:created', jobId, fileId, fragmentCount: refs.length, timestamp: Date.now() });
    return jobId;
  }
}
