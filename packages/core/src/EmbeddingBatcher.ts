import type { Logger } from 'pino';
import type { Fragment } from './domain/model/FragmentRef.js';
import type { BatchLifecycleStore } from './domain/ports/BatchLifecycleStore.js';
import type { RemoteJobClient } from './domain/ports/RemoteJobClient.js';
import type { VectorStore } from './domain/ports/VectorStore.js';
import type { EventType, EventPayload, DomainEvent } from './domain/events/DomainEvents.js';
import type { EmbeddingSettings, EmbeddingSettingsInput } from './config/EmbeddingSettings.js';
import { resolveSettings } from './config/EmbeddingSettings.js';
import type { EmbeddingContext } from './application/EmbeddingContext.js';
import { EmbeddingDriver } from './application/EmbeddingDriver.js';
import type { RunSummary } from './application/EmbeddingDriver.js';
import { EventBus } from './application/EventBus.js';
import { buildLifecycleReport } from './application/LifecycleReport.js';
import type { LifecycleReport } from './application/LifecycleReport.js';
import type { PipelineStatus } from './application/Pipeline.js';
import { RetryCoordinator } from './application/RetryCoordinator.js';
import type { RetryOptions, RetryOutcome, RetrySummary } from './application/RetryCoordinator.js';
import { Semaphore } from './application/Semaphore.js';
import { defaultLogger } from './infrastructure/logging/logger.js';
import { InMemoryLifecycleStore } from './infrastructure/state/InMemoryLifecycleStore.js';
import { InMemoryVectorStore } from './infrastructure/state/InMemoryVectorStore.js';
import { sleep as realSleep } from './infrastructure/time/sleep.js';
import type { Sleep } from './infrastructure/time/sleep.js';

/** Configuration for an `EmbeddingBatcher`. Only the remote client is required. */
export interface EmbeddingBatcherConfig {
  readonly client: RemoteJobClient;
  /** Durable record of uploads and jobs. Default: `InMemoryLifecycleStore`. */
  readonly store?: BatchLifecycleStore;
  /** Destination of embedding vectors. Default: `InMemoryVectorStore`. */
  readonly vectorStore?: VectorStore;
  /** Overrides for the defaults in `embeddingSettingsSchema`. */
  readonly settings?: EmbeddingSettingsInput;
  readonly logger?: Logger;
  /** Delay used between polls. Tests pass one that does not wait. */
  readonly sleep?: Sleep;
}

/**
 * Facade over the embedding pipeline: resumable runs, failed-job retries and
 * status reporting, all sharing one store, client and settings.
 *
 * @example
 * ```typescript
 * const batcher = new EmbeddingBatcher({ client, store, vectorStore, settings: { requestsPerFile: 500 } });
 * batcher.on('job:processed', (e) => console.log(e.jobId, e.embeddingCount));
 * const summary = await batcher.run();
 * ```
 */
export class EmbeddingBatcher {
  private readonly ctx: EmbeddingContext;
  private readonly driver: EmbeddingDriver;
  private readonly retry: RetryCoordinator;

  constructor(config: EmbeddingBatcherConfig) {
    const settings = resolveSettings(config.settings);
    const logger = config.logger ?? defaultLogger;
    this.ctx = {
      client: config.client,
      store: config.store ?? new InMemoryLifecycleStore(),
      vectorStore: config.vectorStore ?? new InMemoryVectorStore(),
      settings,
      events: new EventBus(logger),
      logger,
      sleep: config.sleep ?? realSleep,
      submissionGate: new Semaphore(settings.maxConcurrentSubmissions),
    };
    this.driver = new EmbeddingDriver(this.ctx);
    this.retry = new RetryCoordinator(this.ctx);
  }

  get settings(): EmbeddingSettings {
    return this.ctx.settings;
  }

  /** Register fragments to embed. Re-importing a fragment replaces its text. */
  importFragments(fragments: readonly Fragment[]): Promise<void> {
    return this.ctx.store.saveFragments(fragments);
  }

  /** Resume incomplete jobs, then embed every fragment without an active job. */
  run(): Promise<RunSummary> {
    return this.driver.run();
  }

  /** Stop a run in progress. */
  stop(): Promise<void> {
    return this.driver.stop();
  }

  /** Combine failed jobs into groups and resubmit each group as one job. */
  retryFailedJobs(options?: RetryOptions): Promise<RetrySummary> {
    return this.retry.retryFailedJobs(options);
  }

  /** Resubmit one failed job in place; the oldest failed job when `jobId` is omitted. */
  retryJob(jobId?: string, options?: RetryOptions): Promise<RetryOutcome | null> {
    return this.retry.retryJob(jobId, options);
  }

  /** Snapshot of the running pipeline, or `null` before the first run. */
  getStatus(): PipelineStatus | null {
    return this.driver.status();
  }

  /** Counts of stored files, jobs and vectors. */
  report(): Promise<LifecycleReport> {
    return buildLifecycleReport(this.ctx.store, this.ctx.vectorStore);
  }

  /** Subscribe to a lifecycle event. Returns `this` for chaining. */
  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.events.on(type, handler);
    return this;
  }

  /** Unsubscribe a handler previously registered with `on()`. */
  off<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.events.off(type, handler);
    return this;
  }

  /** Subscribe to all events regardless of type. Returns `this` for chaining. */
  onAny(handler: (event: DomainEvent) => void): this {
    this.ctx.events.onAny(handler);
    return this;
  }

  /** Unsubscribe a wildcard handler previously registered with `onAny()`. */
  offAny(handler: (event: DomainEvent) => void): this {
    this.ctx.events.offAny(handler);
    return this;
  }
}
