import type { Logger } from 'pino';
import type { BatchJob } from '../domain/model/BatchJob.js';
import { FileStatus } from '../domain/model/FileStatus.js';
import type { FragmentRef } from '../domain/model/FragmentRef.js';
import { uniqueRefs } from '../domain/model/FragmentRef.js';
import { JobStatus } from '../domain/model/JobStatus.js';
import { BatchSplitter } from '../domain/services/BatchSplitter.js';
import { combinePayloads, rewritePayloadModel } from '../domain/services/PayloadRewriter.js';
import type { EmbeddingContext } from './EmbeddingContext.js';
import { errorMessage } from './errors.js';
import { pollFileUntilSettled, pollJobUntilTerminal } from './polling.js';

/** One replacement job submitted by a retry. */
export interface RetryOutcome {
  readonly jobId: string;
  readonly fileId: string;
  /** Failed jobs whose fragments this job now covers. */
  readonly replaces: readonly string[];
  /** Status the replacement reached, or `null` when polling was stopped first. */
  readonly finalStatus: JobStatus | null;
}

export interface RetrySummary {
  readonly failedJobs: number;
  readonly groups: number;
  readonly outcomes: readonly RetryOutcome[];
  /** Groups for which no replacement job could be created. */
  readonly abandoned: number;
}

export interface RetryOptions {
  readonly signal?: AbortSignal;
}

interface RecoveredPayload {
  readonly job: BatchJob;
  readonly content: string;
}

/**
 * Resubmits failed jobs with their request lines rewritten to the retry model.
 *
 * `retryFailedJobs()` combines failed jobs into groups and replaces each group
 * with one new job, leaving the old records as `superseded`. `retryJob()`
 * resubmits a single job and moves its existing record onto the new job.
 */
export class RetryCoordinator {
  constructor(private readonly ctx: EmbeddingContext) {}

  async retryFailedJobs(options: RetryOptions = {}): Promise<RetrySummary> {
    const { store, settings, logger } = this.ctx;
    const failed = await store.listFailedJobs();
    if (failed.length === 0) {
      logger.info('No failed jobs to retry');
      return { failedJobs: 0, groups: 0, outcomes: [], abandoned: 0 };
    }

    const groups = new BatchSplitter(settings.retry.groupSize).split(failed);
    logger.info({ failedJobs: failed.length, groups: groups.length }, 'Retrying failed jobs in groups');

    const outcomes: RetryOutcome[] = [];
    let abandoned = 0;
    const active = new Set<Promise<void>>();

    for (const [index, group] of groups.entries()) {
      if (options.signal?.aborted) break;
      while (active.size >= settings.retry.concurrency) {
        await Promise.race(active);
      }

      const task: Promise<void> = this.retryGroup(group, index, options)
        .then((outcome) => {
          if (outcome) outcomes.push(outcome);
          else abandoned++;
        })
        .catch((error: unknown) => {
          abandoned++;
          logger.error({ group: index, error: errorMessage(error) }, 'Retry group failed');
        })
        .finally(() => {
          active.delete(task);
        });
      active.add(task);
    }

    await Promise.all([...active]);
    logger.info({ submitted: outcomes.length, abandoned }, 'Retry finished');
    return { failedJobs: failed.length, groups: groups.length, outcomes, abandoned };
  }

  /**
   * Resubmit one failed job, or the oldest failed job when no id is given.
   * Resolves to `null` when there is no such job or it could not be resubmitted.
   */
  async retryJob(jobId?: string, options: RetryOptions = {}): Promise<RetryOutcome | null> {
    const { store, logger } = this.ctx;
    const job = await store.findFailedJob(jobId);
    if (!job) {
      logger.error({ jobId }, 'No failed job found to retry');
      return null;
    }

    const log = logger.child({ retryOf: job.jobId });
    const recovered = await this.recoverPayload(job, log);
    if (!recovered) return null;

    const submitted = await this.submit(recovered.content, job.fragmentRefs, log, options);
    if (!submitted) return null;

    try {
      await store.recordJobRetry(job.jobId, submitted);
      log.info({ jobId: submitted.jobId, fileId: submitted.fileId }, 'Job resubmitted');
    } catch (error) {
      log.error(
        { jobId: submitted.jobId, fileId: submitted.fileId, replaces: [job.jobId], error: errorMessage(error) },
        'Replacement job created but not recorded',
      );
    }
    this.ctx.events.emit({
      type: 'retry:submitted',
      jobId: submitted.jobId,
      replaces: [job.jobId],
      combined: false,
      timestamp: Date.now(),
    });

    const finalStatus = await this.waitForTerminal(submitted.jobId, log, options);
    return { ...submitted, replaces: [job.jobId], finalStatus };
  }

  private async retryGroup(group: readonly BatchJob[], index: number, options: RetryOptions): Promise<RetryOutcome | null> {
    const { store, events } = this.ctx;
    const log = this.ctx.logger.child({ group: index });

    const recovered: RecoveredPayload[] = [];
    for (const job of group) {
      const payload = await this.recoverPayload(job, log);
      if (payload) recovered.push(payload);
    }
    if (recovered.length === 0) {
      log.error({ jobIds: group.map((j) => j.jobId) }, 'No payload in group could be recovered, group abandoned');
      return null;
    }

    const replaces = recovered.map((r) => r.job.jobId);
    const refs = uniqueRefs(recovered.flatMap((r) => r.job.fragmentRefs));
    const submitted = await this.submit(combinePayloads(recovered.map((r) => r.content)), refs, log, options);
    if (!submitted) return null;

    let recorded = true;
    try {
      await store.upsertJobMetadata({
        jobId: submitted.jobId,
        fileId: submitted.fileId,
        fragmentRefs: refs,
        status: JobStatus.VALIDATING,
        combinedFrom: replaces,
        combinedFromFileIds: recovered.map((r) => r.job.fileId),
      });
    } catch (error) {
      recorded = false;
      log.error(
        { jobId: submitted.jobId, fileId: submitted.fileId, replaces, error: errorMessage(error) },
        'Replacement job created but not recorded',
      );
    }
    // Members stay failed while nothing in the store covers their fragments.
    if (recorded) {
      for (const oldJobId of replaces) {
        try {
          await store.markJobSuperseded(oldJobId, submitted.jobId);
        } catch (error) {
          log.warn({ jobId: oldJobId, supersededBy: submitted.jobId, error: errorMessage(error) }, 'Failed job could not be superseded');
        }
      }
      log.info({ jobId: submitted.jobId, replaces, fragmentCount: refs.length }, 'Combined replacement job created');
    }
    events.emit({ type: 'retry:submitted', jobId: submitted.jobId, replaces, combined: true, timestamp: Date.now() });

    const finalStatus = await this.waitForTerminal(submitted.jobId, log, options);
    return { ...submitted, replaces, finalStatus };
  }

  /** Download a job's input file and rewrite its model. `null` means this job cannot be retried. */
  private async recoverPayload(job: BatchJob, log: Logger): Promise<RecoveredPayload | null> {
    let original: string;
    try {
      original = await this.ctx.client.fetchInputContent(job.fileId);
    } catch (error) {
      log.warn({ jobId: job.jobId, fileId: job.fileId, error: errorMessage(error) }, 'Input file could not be downloaded, skipping job');
      return null;
    }

    const rewritten = rewritePayloadModel(original, this.ctx.settings.retry.model);
    if (rewritten.droppedLines > 0) {
      log.warn({ jobId: job.jobId, droppedLines: rewritten.droppedLines }, 'Dropped malformed request lines');
    }
    if (rewritten.lineCount === 0) {
      log.warn({ jobId: job.jobId, fileId: job.fileId }, 'No request lines left after rewrite, skipping job');
      return null;
    }
    return { job, content: rewritten.content };
  }

  /** Upload a payload, wait for the file, and create a job over it. */
  private async submit(
    payload: string,
    refs: readonly FragmentRef[],
    log: Logger,
    options: RetryOptions,
  ): Promise<{ jobId: string; fileId: string } | null> {
    const { client, store, settings, sleep, submissionGate } = this.ctx;

    let fileId: string;
    try {
      fileId = await submissionGate.run(() => client.submitFile(payload));
    } catch (error) {
      log.error({ error: errorMessage(error) }, 'Retry upload failed');
      return null;
    }
    try {
      await store.upsertFileMetadata(fileId, refs, FileStatus.UPLOADED);
    } catch (error) {
      log.error({ fileId, error: errorMessage(error) }, 'Retry file uploaded but not recorded');
    }

    const file = await pollFileUntilSettled(client, store, fileId, {
      intervalMs: settings.filePollIntervalMs,
      sleep,
      logger: log,
      signal: options.signal,
    });
    if (!file || file.status === FileStatus.FAILED) {
      log.error({ fileId, status: file?.status ?? null }, 'Retry file never became ready');
      return null;
    }

    try {
      const jobId = await submissionGate.run(() => client.createJob(fileId));
      return { jobId, fileId };
    } catch (error) {
      log.error({ fileId, error: errorMessage(error) }, 'Retry job creation failed');
      return null;
    }
  }

  private async waitForTerminal(jobId: string, log: Logger, options: RetryOptions): Promise<JobStatus | null> {
    const { client, store, settings, sleep, events } = this.ctx;
    const result = await pollJobUntilTerminal(client, store, jobId, {
      intervalMs: settings.jobPollIntervalMs,
      sleep,
      logger: log,
      signal: options.signal,
      onSnapshot: (snapshot) => {
        events.emit({ type: 'job:status', jobId, status: snapshot.status, timestamp: Date.now() });
      },
    });
    if (result) log.info({ jobId, status: result.status }, 'Replacement job reached a terminal state');
    return result?.status ?? null;
  }
}
