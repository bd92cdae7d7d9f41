import type { CompletedJobHandle } from '../../domain/model/PipelineItem.js';
import { jobIdSchema } from '../../domain/model/PipelineItem.js';
import { JobStatus } from '../../domain/model/JobStatus.js';
import type { EmbeddingContext } from '../EmbeddingContext.js';
import type { StageContext, StageProcessor } from '../PipelineStage.js';
import { pollJobUntilTerminal } from '../polling.js';

export const JOB_COMPLETION_POLL_STAGE = 'job-completion-poll';

/**
 * Polls a job until the remote API reports a terminal status.
 *
 * - `completed` with a result file: forwarded for ingestion.
 * - `completed` without one: logged and dropped.
 * - any other terminal status: pipeline shutdown.
 */
export class JobCompletionPollProcessor implements StageProcessor<string, CompletedJobHandle> {
  readonly inputSchema = jobIdSchema;

  constructor(private readonly ctx: EmbeddingContext) {}

  async process(jobId: string, stage: StageContext): Promise<CompletedJobHandle | null> {
    const { client, store, settings, sleep, events } = this.ctx;

    const result = await pollJobUntilTerminal(client, store, jobId, {
      intervalMs: settings.jobPollIntervalMs,
      sleep,
      logger: stage.logger,
      signal: stage.signal,
      onSnapshot: (snapshot) => {
        events.emit({ type: 'job:status', jobId, status: snapshot.status, timestamp: Date.now() });
      },
    });
    if (!result) return null;

    if (result.status === JobStatus.COMPLETED) {
      if (!result.resultFileId) {
        stage.logger.warn({ jobId }, 'Job completed without a result file');
        return null;
      }
      stage.logger.info({ jobId, resultFileId: result.resultFileId }, 'Job completed');
      events.emit({ type: 'job:completed', jobId, resultFileId: result.resultFileId, timestamp: Date.now() });
      return { jobId, resultFileId: result.resultFileId };
    }

    stage.logger.error({ jobId, status: result.status }, 'Job ended without results');
    events.emit({ type: 'job:failed', jobId, status: result.status, timestamp: Date.now() });
    stage.shutdown(`Job ${jobId} ended with status ${result.status}`);
    return null;
  }
}
