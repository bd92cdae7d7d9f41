import { describe, it, expect, vi } from 'vitest';
import { z } from 'zod';
import { EventBus } from '../../../src/application/EventBus.js';
import { PipelineStage } from '../../../src/application/PipelineStage.js';
import type { StageContext, StageInput, StageProcessor } from '../../../src/application/PipelineStage.js';
import { PipelineStateError } from '../../../src/application/errors.js';
import type { ItemRejectedEvent } from '../../../src/domain/events/DomainEvents.js';
import { silentLogger } from '../../helpers/context.js';

function numberStage(
  process: (item: number, ctx: StageContext) => Promise<number | null>,
  concurrency = 1,
  events?: EventBus,
): PipelineStage<number, number> {
  const processor: StageProcessor<number, number> = { inputSchema: z.number(), process };
  return new PipelineStage(processor, { name: 'numbers', concurrency, shutdown: vi.fn(), logger: silentLogger, events });
}

function collector(): StageInput & { received: unknown[] } {
  const received: unknown[] = [];
  return { name: 'sink', received, enqueue: (item) => received.push(item) };
}

const tick = (): Promise<void> =>
  new Promise((resolve) => {
    setImmediate(resolve);
  });

describe('PipelineStage', () => {
  it('should forward each result to the next stage', async () => {
    const stage = numberStage((n) => Promise.resolve(n * 2), 2);
    const sink = collector();
    stage.next = sink;

    stage.startWorkers();
    stage.enqueue(1);
    stage.enqueue(2);
    stage.enqueue(3);
    await stage.join();

    expect([...sink.received].sort()).toEqual([2, 4, 6]);
    expect(stage.getStatus()).toMatchObject({ processed: 3, dropped: 0, running: true });
    await stage.stopWorkers();
  });

  it('should drop an undefined item and keep draining the items behind it', async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const stage = numberStage(async (n) => {
      if (n === 1) await gate;
      return n * 2;
    });
    const sink = collector();
    stage.next = sink;

    stage.startWorkers();
    stage.enqueue(1);
    await tick();
    stage.enqueue(undefined);
    stage.enqueue(2);
    release();
    await stage.join();

    expect(sink.received).toEqual([2, 4]);
    expect(stage.getStatus()).toMatchObject({ queueDepth: 0, processed: 3, dropped: 1 });
    await stage.stopWorkers();
  });

  it('should drop null results and items of the wrong shape', async () => {
    const events = new EventBus();
    const rejected: ItemRejectedEvent[] = [];
    events.on('item:rejected', (e) => rejected.push(e));
    const stage = numberStage((n) => Promise.resolve(n % 2 === 0 ? n * 2 : null), 1, events);
    const sink = collector();
    stage.next = sink;

    stage.startWorkers();
    stage.enqueue(1);
    stage.enqueue('not a number');
    stage.enqueue(2);
    await stage.join();

    expect(sink.received).toEqual([4]);
    expect(stage.getStatus()).toMatchObject({ processed: 3, dropped: 2 });
    expect(rejected).toHaveLength(1);
    expect(rejected[0]?.stage).toBe('numbers');
    await stage.stopWorkers();
  });

  it('should drop an item whose processing throws and keep going', async () => {
    const stage = numberStage((n) => (n === 2 ? Promise.reject(new Error('bad item')) : Promise.resolve(n)));
    const sink = collector();
    stage.next = sink;

    stage.startWorkers();
    for (const n of [1, 2, 3]) stage.enqueue(n);
    await stage.join();

    expect(sink.received).toEqual([1, 3]);
    expect(stage.getStatus().dropped).toBe(1);
    await stage.stopWorkers();
  });

  it('should refuse items while stopped', () => {
    const stage = numberStage((n) => Promise.resolve(n));

    let caught: unknown;
    try {
      stage.enqueue(1);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(PipelineStateError);
    expect(caught).toMatchObject({ code: 'STAGE_STOPPED', message: 'Stage "numbers" is not accepting items' });
  });

  it('should let workers share one queue', async () => {
    const gates: (() => void)[] = [];
    const stage = numberStage(
      (n) =>
        new Promise((resolve) => {
          gates.push(() => resolve(n));
        }),
      3,
    );

    stage.startWorkers();
    for (const n of [1, 2, 3, 4, 5]) stage.enqueue(n);
    await tick();

    expect(stage.getStatus()).toMatchObject({ queueDepth: 2, workers: 3, concurrency: 3 });

    while (gates.length > 0 || stage.getStatus().queueDepth > 0) {
      gates.shift()?.();
      await tick();
    }
    await stage.join();
    expect(stage.getStatus().processed).toBe(5);
    await stage.stopWorkers();
  });

  it('should cancel in-flight items, drop queued ones and unblock join on stop', async () => {
    const stage = numberStage(
      (_n, ctx) =>
        new Promise((resolve) => {
          ctx.signal.addEventListener('abort', () => resolve(null));
        }),
    );
    const sink = collector();
    stage.next = sink;

    stage.startWorkers();
    for (const n of [1, 2, 3]) stage.enqueue(n);
    await tick();
    await stage.stopWorkers();
    await stage.join();

    expect(sink.received).toEqual([]);
    expect(stage.getStatus()).toMatchObject({ queueDepth: 0, workers: 0, running: false, processed: 1 });
  });

  it('should treat stopWorkers on a stopped stage as a no-op', async () => {
    const stage = numberStage((n) => Promise.resolve(n));
    await expect(stage.stopWorkers()).resolves.toBeUndefined();

    stage.startWorkers();
    await stage.stopWorkers();
    await expect(stage.stopWorkers()).resolves.toBeUndefined();
  });

  it('should reject a non-positive concurrency', () => {
    expect(() => numberStage((n) => Promise.resolve(n), 0)).toThrow('Stage "numbers" needs a positive integer concurrency');
  });
});
