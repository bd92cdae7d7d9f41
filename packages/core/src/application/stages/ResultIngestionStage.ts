import type { CompletedJobHandle } from '../../domain/model/PipelineItem.js';
import { completedJobHandleSchema } from '../../domain/model/PipelineItem.js';
import { fragmentKey } from '../../domain/model/FragmentRef.js';
import { parseResultContent } from '../../domain/services/ResultParser.js';
import type { EmbeddingContext } from '../EmbeddingContext.js';
import type { StageContext, StageProcessor } from '../PipelineStage.js';
import { errorMessage } from '../errors.js';

export const RESULT_INGESTION_STAGE = 'result-ingestion';

/**
 * Downloads a job's results into memory, stores the vectors, and marks the job
 * processed once a read-back finds every vector that was written.
 *
 * Failures stay with the job: nothing here shuts the pipeline down, and a job
 * that is not marked processed is resumed by the next run.
 */
export class ResultIngestionProcessor implements StageProcessor<CompletedJobHandle, never> {
  readonly inputSchema = completedJobHandleSchema;

  constructor(private readonly ctx: EmbeddingContext) {}

  async process(handle: CompletedJobHandle, stage: StageContext): Promise<null> {
    const { client, store, vectorStore, events } = this.ctx;
    const { jobId, resultFileId } = handle;
    const log = stage.logger.child({ jobId, resultFileId });

    let content: string;
    try {
      content = await client.fetchResultContent(resultFileId);
    } catch (error) {
      log.error({ error: errorMessage(error) }, 'Result download failed');
      return null;
    }

    const { embeddings, failures, skippedLines } = parseResultContent(content);
    if (failures.length > 0 || skippedLines > 0) {
      log.warn(
        { failedCount: failures.length, skippedLines, firstError: failures[0]?.message },
        'Some result lines carried no embedding',
      );
    }
    if (embeddings.length === 0) {
      log.warn('No embeddings in result file');
      return null;
    }

    try {
      await vectorStore.upsertEmbeddings(embeddings);
    } catch (error) {
      log.error({ embeddingCount: embeddings.length, error: errorMessage(error) }, 'Embedding upsert failed');
      return null;
    }

    const written = embeddings.map((e) => e.ref);
    let stored: Set<string>;
    try {
      stored = new Set((await vectorStore.findStoredRefs(written)).map(fragmentKey));
    } catch (error) {
      log.error({ error: errorMessage(error) }, 'Read-back failed, job left unprocessed');
      return null;
    }
    const confirmed = written.filter((ref) => stored.has(fragmentKey(ref))).length;
    if (confirmed < written.length) {
      log.error({ expected: written.length, stored: confirmed }, 'Read-back is missing embeddings, job left unprocessed');
      events.emit({
        type: 'job:verification-failed',
        jobId,
        expected: written.length,
        stored: confirmed,
        timestamp: Date.now(),
      });
      return null;
    }

    try {
      await store.markJobProcessed(jobId);
    } catch (error) {
      log.error({ error: errorMessage(error) }, 'Job could not be marked processed');
      return null;
    }
    log.info({ embeddingCount: embeddings.length, failedCount: failures.length }, 'Job processed');
    events.emit({
      type: 'job:processed',
      jobId,
      embeddingCount: embeddings.length,
      failedCount: failures.length,
      timestamp: Date.now(),
    });
    return null;
  }
}
