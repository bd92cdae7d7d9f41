import type { UploadedFileHandle } from '../../domain/model/PipelineItem.js';
import { uploadedFileHandleSchema } from '../../domain/model/PipelineItem.js';
import { FileStatus } from '../../domain/model/FileStatus.js';
import type { EmbeddingContext } from '../EmbeddingContext.js';
import type { StageContext, StageProcessor } from '../PipelineStage.js';
import { pollFileUntilSettled } from '../polling.js';

export const FILE_READINESS_POLL_STAGE = 'file-readiness-poll';

/** Waits for an uploaded file to be processed remotely. A failed file shuts the pipeline down. */
export class FileReadinessPollProcessor implements StageProcessor<UploadedFileHandle, UploadedFileHandle> {
  readonly inputSchema = uploadedFileHandleSchema;

  constructor(private readonly ctx: EmbeddingContext) {}

  async process(handle: UploadedFileHandle, stage: StageContext): Promise<UploadedFileHandle | null> {
    const { client, store, settings, sleep, events } = this.ctx;

    const result = await pollFileUntilSettled(client, store, handle.fileId, {
      intervalMs: settings.filePollIntervalMs,
      sleep,
      logger: stage.logger,
      signal: stage.signal,
    });
    if (!result) return null;

    if (result.status === FileStatus.FAILED) {
      stage.logger.error({ fileId: handle.fileId }, 'File processing failed');
      events.emit({ type: 'file:failed', fileId: handle.fileId, timestamp: Date.now() });
      stage.shutdown(`File ${handle.fileId} failed processing`);
      return null;
    }

    stage.logger.info({ fileId: handle.fileId }, 'File ready');
    events.emit({ type: 'file:ready', fileId: handle.fileId, timestamp: Date.now() });
    return handle;
  }
}
