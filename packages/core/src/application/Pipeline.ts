import type { Logger } from 'pino';
import type { EventBus } from './EventBus.js';
import type { RunnableStage, ShutdownNotifier, StageStatus } from './PipelineStage.js';
import { PipelineErrorCode, PipelineStateError, errorMessage } from './errors.js';

export interface PipelineStatus {
  readonly started: boolean;
  readonly shutdownReason: string | null;
  readonly stages: readonly StageStatus[];
}

/**
 * Chains stages, starts and stops their worker pools, and turns a stage's
 * fatal failure into a pipeline-wide shutdown.
 *
 * Stages receive `pipeline.notifier` at construction instead of a reference
 * to the pipeline itself.
 *
 * @example
 * ```typescript
 * const pipeline = new Pipeline({ logger });
 * pipeline.addStage(new PipelineStage(upload, { name: 'upload', concurrency: 4, shutdown: pipeline.notifier, logger }));
 * pipeline.start();
 * pipeline.enqueue(batch);
 * await pipeline.waitForCompletion();
 * ```
 */
export class Pipeline {
  private readonly stages: RunnableStage[] = [];
  private readonly logger: Logger;
  private readonly events: EventBus | undefined;
  private started = false;
  private shutdownPromise: Promise<void> | null = null;
  private stopping: Promise<void> | null = null;
  private reason: string | null = null;

  readonly notifier: ShutdownNotifier = (reason) => {
    this.triggerShutdown(reason).catch((error: unknown) => {
      this.logger.error({ reason, error: errorMessage(error) }, 'Pipeline shutdown failed');
    });
  };

  constructor(options: { readonly logger: Logger; readonly events?: EventBus }) {
    this.logger = options.logger;
    this.events = options.events;
  }

  get isStarted(): boolean {
    return this.started;
  }

  /** Started and not yet asked to stop. Set to `false` synchronously by `shutdown()`. */
  get isAccepting(): boolean {
    return this.started && this.stopping === null;
  }

  /** Reason passed to the first `triggerShutdown()` since the last start, if any. */
  get shutdownReason(): string | null {
    return this.reason;
  }

  /** Append a stage; the previously added stage forwards its output to it. */
  addStage(stage: RunnableStage): this {
    if (this.started) {
      throw new PipelineStateError(PipelineErrorCode.ALREADY_STARTED, 'Cannot add stages to a started pipeline');
    }
    const previous = this.stages[this.stages.length - 1];
    if (previous) previous.next = stage;
    this.stages.push(stage);
    return this;
  }

  getStage(name: string): RunnableStage | undefined {
    return this.stages.find((stage) => stage.name === name);
  }

  start(): void {
    if (this.started) {
      this.logger.warn('Pipeline already started');
      return;
    }
    if (this.stages.length === 0) {
      throw new PipelineStateError(PipelineErrorCode.NO_STAGES, 'Pipeline has no stages');
    }
    this.shutdownPromise = null;
    this.stopping = null;
    this.reason = null;
    for (const stage of this.stages) {
      stage.startWorkers();
    }
    this.started = true;
    const stageNames = this.stages.map((s) => s.name);
    this.logger.info({ stages: stageNames }, 'Pipeline started');
    this.events?.emit({ type: 'pipeline:started', stageNames, timestamp: Date.now() });
  }

  /** Hand an item to the first stage. */
  enqueue(item: unknown): void {
    const first = this.stages[0];
    if (!this.started || !first) {
      throw new PipelineStateError(PipelineErrorCode.NOT_STARTED, 'Pipeline is not started');
    }
    first.enqueue(item);
  }

  /** Wait until every stage, in order, has drained its queue and finished its in-flight items. */
  async waitForCompletion(): Promise<void> {
    for (const stage of this.stages) {
      await stage.join();
    }
  }

  /** Shut down once for a fatal remote failure. Later calls return the same promise. */
  triggerShutdown(reason: string): Promise<void> {
    if (this.shutdownPromise) {
      this.logger.debug({ reason }, 'Shutdown already in progress');
      return this.shutdownPromise;
    }
    this.reason = reason;
    this.logger.error({ reason }, 'Pipeline shutdown triggered');
    this.events?.emit({ type: 'pipeline:shutdown', reason, timestamp: Date.now() });
    this.shutdownPromise = this.shutdown();
    return this.shutdownPromise;
  }

  /** Stop stages last-to-first, then mark the pipeline not started. Concurrent calls share one stop. */
  shutdown(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.stopStages();
    }
    return this.stopping;
  }

  private async stopStages(): Promise<void> {
    for (const stage of [...this.stages].reverse()) {
      await stage.stopWorkers();
    }
    this.started = false;
    this.logger.info('Pipeline stopped');
  }

  getStatus(): PipelineStatus {
    return {
      started: this.started,
      shutdownReason: this.reason,
      stages: this.stages.map((stage) => stage.getStatus()),
    };
  }
}
