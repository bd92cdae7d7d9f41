import type { Logger } from 'pino';
import type { z } from 'zod';
import type { EventBus } from './EventBus.js';
import { PipelineErrorCode, PipelineStateError, errorMessage } from './errors.js';
import { WorkQueue } from './WorkQueue.js';

/** Narrow capability a stage uses to ask the pipeline for a global shutdown. */
export type ShutdownNotifier = (reason: string) => void;

/** What a processor sees while handling one item. */
export interface StageContext {
  readonly stage: string;
  /** Aborted when the stage stops; long waits must honour it. */
  readonly signal: AbortSignal;
  readonly shutdown: ShutdownNotifier;
  readonly logger: Logger;
}

/**
 * Business logic of one stage. `process()` returns the item to forward, or
 * `null` to drop it. A throw is logged and treated as a drop.
 */
export interface StageProcessor<In, Out> {
  readonly inputSchema: z.ZodType<In, z.ZodTypeDef, unknown>;
  process(item: In, ctx: StageContext): Promise<Out | null>;
}

/** Snapshot returned by `getStatus()`. Read without pausing workers. */
export interface StageStatus {
  readonly name: string;
  readonly queueDepth: number;
  readonly workers: number;
  readonly concurrency: number;
  /** Items that finished processing, forwarded or dropped. */
  readonly processed: number;
  readonly dropped: number;
  readonly running: boolean;
}

/** The receiving end of a stage, as seen by its predecessor. */
export interface StageInput {
  readonly name: string;
  enqueue(item: unknown): void;
}

/** Type-erased view of a stage, used by the `Pipeline` to hold stages of different item types. */
export interface RunnableStage extends StageInput {
  next: StageInput | null;
  readonly isRunning: boolean;
  startWorkers(): void;
  stopWorkers(): Promise<void>;
  join(): Promise<void>;
  getStatus(): StageStatus;
}

export interface PipelineStageOptions {
  readonly name: string;
  readonly concurrency: number;
  readonly shutdown: ShutdownNotifier;
  readonly logger: Logger;
  readonly events?: EventBus;
}

/**
 * Queue plus a fixed pool of workers wrapped around a `StageProcessor`.
 *
 * All workers share one input queue, so a slow item only occupies its own
 * worker. Results are forwarded to `next` when the processor returns a
 * non-null value and the stage has not been stopped.
 */
export class PipelineStage<In, Out> implements RunnableStage {
  readonly name: string;
  readonly concurrency: number;
  next: StageInput | null = null;

  private readonly queue = new WorkQueue<unknown>();
  private readonly logger: Logger;
  private readonly shutdown: ShutdownNotifier;
  private readonly events: EventBus | undefined;
  private controller: AbortController | null = null;
  private workers: Promise<void>[] = [];
  private liveWorkers = 0;
  private processedCount = 0;
  private droppedCount = 0;

  constructor(
    private readonly processor: StageProcessor<In, Out>,
    options: PipelineStageOptions,
  ) {
    if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
      throw new Error(`Stage "${options.name}" needs a positive integer concurrency`);
    }
    this.name = options.name;
    this.concurrency = options.concurrency;
    this.shutdown = options.shutdown;
    this.events = options.events;
    this.logger = options.logger.child({ stage: options.name });
  }

  get isRunning(): boolean {
    return this.controller !== null;
  }

  enqueue(item: unknown): void {
    if (!this.controller) {
      throw new PipelineStateError(PipelineErrorCode.STAGE_STOPPED, `Stage "${this.name}" is not accepting items`);
    }
    this.queue.push(item);
  }

  startWorkers(): void {
    if (this.controller) return;
    const controller = new AbortController();
    this.controller = controller;
    this.workers = Array.from({ length: this.concurrency }, () => this.work(controller.signal));
    this.logger.debug({ concurrency: this.concurrency }, 'Workers started');
  }

  /** Cancel every worker, drop queued items and wait for in-flight items to unwind. No-op when stopped. */
  async stopWorkers(): Promise<void> {
    const controller = this.controller;
    if (!controller) return;
    this.controller = null;
    controller.abort();
    const dropped = this.queue.clear();
    await Promise.allSettled(this.workers);
    this.workers = [];
    this.logger.info({ dropped }, 'Workers stopped');
  }

  /** Resolve when every enqueued item has been processed or dropped. */
  join(): Promise<void> {
    return this.queue.join();
  }

  getStatus(): StageStatus {
    return {
      name: this.name,
      queueDepth: this.queue.size,
      workers: this.liveWorkers,
      concurrency: this.concurrency,
      processed: this.processedCount,
      dropped: this.droppedCount,
      running: this.isRunning,
    };
  }

  private async work(signal: AbortSignal): Promise<void> {
    this.liveWorkers++;
    try {
      for (;;) {
        const entry = await this.queue.take(signal);
        if (!entry) return;
        try {
          await this.handle(entry.item, signal);
        } finally {
          this.processedCount++;
          this.queue.done();
        }
      }
    } finally {
      this.liveWorkers--;
    }
  }

  private async handle(raw: unknown, signal: AbortSignal): Promise<void> {
    const parsed = this.processor.inputSchema.safeParse(raw);
    if (!parsed.success) {
      this.droppedCount++;
      const error = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      this.logger.error({ error }, 'Dropped malformed item');
      this.events?.emit({ type: 'item:rejected', stage: this.name, error, timestamp: Date.now() });
      return;
    }

    let result: Out | null;
    try {
      result = await this.processor.process(parsed.data, {
        stage: this.name,
        signal,
        shutdown: this.shutdown,
        logger: this.logger,
      });
    } catch (error) {
      this.droppedCount++;
      this.logger.error({ error: errorMessage(error) }, 'Item processing failed');
      return;
    }

    if (result === null) {
      this.droppedCount++;
      return;
    }
    if (signal.aborted || !this.next) return;

    try {
      this.next.enqueue(result);
    } catch (error) {
      this.droppedCount++;
      this.logger.warn({ next: this.next.name, error: errorMessage(error) }, 'Could not forward item');
    }
  }
}
