import { buildRequestPayloads } from '../domain/services/RequestFormatter.js';
import type { EmbeddingContext } from './EmbeddingContext.js';
import { Pipeline } from './Pipeline.js';
import type { PipelineStatus } from './Pipeline.js';
import { PipelineStage } from './PipelineStage.js';
import type { StageProcessor } from './PipelineStage.js';
import { PipelineErrorCode, PipelineStateError } from './errors.js';
import { UPLOAD_STAGE, UploadProcessor } from './stages/UploadStage.js';
import { FILE_READINESS_POLL_STAGE, FileReadinessPollProcessor } from './stages/FileReadinessPollStage.js';
import { JOB_CREATION_STAGE, JobCreationProcessor } from './stages/JobCreationStage.js';
import { JOB_COMPLETION_POLL_STAGE, JobCompletionPollProcessor } from './stages/JobCompletionPollStage.js';
import { RESULT_INGESTION_STAGE, ResultIngestionProcessor } from './stages/ResultIngestionStage.js';

/** Outcome of one `EmbeddingDriver.run()`. */
export interface RunSummary {
  readonly windows: number;
  readonly fragmentsSubmitted: number;
  readonly requestFiles: number;
  readonly resumedJobs: number;
  readonly jobsCreated: number;
  readonly jobsProcessed: number;
  /** Set when a remote-reported failure shut the pipeline down. */
  readonly shutdownReason: string | null;
}

/**
 * Runs the five-stage pipeline over every fragment that has no active job.
 *
 * Incomplete jobs from earlier runs go straight to the completion-poll stage.
 * Windows are processed strictly one after another: the next window is only
 * fetched once the pipeline has drained the current one.
 */
export class EmbeddingDriver {
  private pipeline: Pipeline | null = null;

  constructor(private readonly ctx: EmbeddingContext) {}

  /** Assemble upload → file-readiness-poll → job-creation → job-completion-poll → result-ingestion. */
  buildPipeline(): Pipeline {
    const { settings, logger, events } = this.ctx;
    const pipeline = new Pipeline({ logger, events });
    const stage = <In, Out>(processor: StageProcessor<In, Out>, name: string, concurrency: number) =>
      new PipelineStage(processor, { name, concurrency, shutdown: pipeline.notifier, logger, events });

    pipeline
      .addStage(stage(new UploadProcessor(this.ctx), UPLOAD_STAGE, settings.concurrency.upload))
      .addStage(stage(new FileReadinessPollProcessor(this.ctx), FILE_READINESS_POLL_STAGE, settings.concurrency.filePoll))
      .addStage(stage(new JobCreationProcessor(this.ctx), JOB_CREATION_STAGE, settings.concurrency.jobCreation))
      .addStage(stage(new JobCompletionPollProcessor(this.ctx), JOB_COMPLETION_POLL_STAGE, settings.concurrency.jobPoll))
      .addStage(stage(new ResultIngestionProcessor(this.ctx), RESULT_INGESTION_STAGE, settings.concurrency.ingestion));
    return pipeline;
  }

  async run(): Promise<RunSummary> {
    if (this.pipeline?.isStarted) {
      throw new PipelineStateError(PipelineErrorCode.ALREADY_STARTED, 'A run is already in progress');
    }
    const { store, settings, events, logger } = this.ctx;
    const pipeline = this.buildPipeline();
    this.pipeline = pipeline;

    let jobsCreated = 0;
    let jobsProcessed = 0;
    const onCreated = (): void => {
      jobsCreated++;
    };
    const onProcessed = (): void => {
      jobsProcessed++;
    };
    events.on('job:created', onCreated);
    events.on('job:processed', onProcessed);

    let windows = 0;
    let fragmentsSubmitted = 0;
    let requestFiles = 0;
    let resumedJobs = 0;

    pipeline.start();
    try {
      const pollStage = pipeline.getStage(JOB_COMPLETION_POLL_STAGE);
      const incomplete = await store.listIncompleteJobIds();
      if (pollStage && incomplete.length > 0) {
        logger.info({ jobCount: incomplete.length }, 'Resuming incomplete jobs');
        for (const jobId of incomplete) pollStage.enqueue(jobId);
        resumedJobs = incomplete.length;
      }

      while (pipeline.isAccepting) {
        const fragments = await store.listFragmentsWithoutActiveJob(settings.windowSize);
        if (fragments.length === 0) {
          logger.info('No fragments left without a job');
          break;
        }
        if (!pipeline.isAccepting) break;

        const batches = buildRequestPayloads(fragments, settings);
        const createdBefore = jobsCreated;
        for (const batch of batches) {
          pipeline.enqueue(batch);
        }
        logger.info({ window: windows, fragmentCount: fragments.length, requestFiles: batches.length }, 'Window enqueued');

        await pipeline.waitForCompletion();
        events.emit({
          type: 'window:drained',
          windowIndex: windows,
          fragmentCount: fragments.length,
          requestFileCount: batches.length,
          timestamp: Date.now(),
        });
        windows++;
        fragmentsSubmitted += fragments.length;
        requestFiles += batches.length;

        if (!pipeline.isAccepting) break;
        if (jobsCreated === createdBefore) {
          logger.error({ window: windows - 1, fragmentCount: fragments.length }, 'Window created no job, stopping');
          break;
        }
      }

      await pipeline.waitForCompletion();
    } finally {
      events.off('job:created', onCreated);
      events.off('job:processed', onProcessed);
      await pipeline.shutdown();
    }

    const summary: RunSummary = {
      windows,
      fragmentsSubmitted,
      requestFiles,
      resumedJobs,
      jobsCreated,
      jobsProcessed,
      shutdownReason: pipeline.shutdownReason,
    };
    logger.info({ ...summary }, 'Run finished');
    return summary;
  }

  /** Stop the current run. Queued items are dropped; in-flight polls exit at their next wait. */
  async stop(): Promise<void> {
    if (this.pipeline) await this.pipeline.shutdown();
  }

  status(): PipelineStatus | null {
    return this.pipeline?.getStatus() ?? null;
  }
}
