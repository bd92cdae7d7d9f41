import type { FragmentBatch, UploadedFileHandle } from '../../domain/model/PipelineItem.js';
import { fragmentBatchSchema } from '../../domain/model/PipelineItem.js';
import { FileStatus } from '../../domain/model/FileStatus.js';
import type { EmbeddingContext } from '../EmbeddingContext.js';
import type { StageContext, StageProcessor } from '../PipelineStage.js';
import { errorMessage } from '../errors.js';

export const UPLOAD_STAGE = 'upload';

/**
 * Submits one request file and records it as `uploaded`.
 *
 * A failed submission only drops this batch; its fragments stay unclaimed and
 * are picked up again by a later window.
 */
export class UploadProcessor implements StageProcessor<FragmentBatch, UploadedFileHandle> {
  readonly inputSchema = fragmentBatchSchema;

  constructor(private readonly ctx: EmbeddingContext) {}

  async process(batch: FragmentBatch, stage: StageContext): Promise<UploadedFileHandle | null> {
    const { client, store, submissionGate, events } = this.ctx;

    let fileId: string;
    try {
      fileId = await submissionGate.run(() => client.submitFile(batch.payload));
    } catch (error) {
      stage.logger.error({ fragmentCount: batch.refs.length, error: errorMessage(error) }, 'File upload failed');
      return null;
    }

    try {
      await store.upsertFileMetadata(fileId, batch.refs, FileStatus.UPLOADED);
    } catch (error) {
      stage.logger.error(
        { fileId, fragmentCount: batch.refs.length, error: errorMessage(error) },
        'Uploaded file could not be recorded',
      );
      return null;
    }
    stage.logger.info({ fileId, fragmentCount: batch.refs.length }, 'File uploaded');
    events.emit({ type: 'file:uploaded', fileId, fragmentCount: batch.refs.length, timestamp: Date.now() });

    return { fileId, refs: batch.refs };
  }
}
