import { describe, it, expect, vi } from 'vitest';
import { z } from 'zod';
import { EventBus } from '../../../src/application/EventBus.js';
import { Pipeline } from '../../../src/application/Pipeline.js';
import { PipelineStage } from '../../../src/application/PipelineStage.js';
import type { StageContext } from '../../../src/application/PipelineStage.js';
import { PipelineStateError } from '../../../src/application/errors.js';
import { silentLogger } from '../../helpers/context.js';

type Handler = (item: string, ctx: StageContext) => Promise<string | null>;

function addStage(pipeline: Pipeline, name: string, handler: Handler, concurrency = 1): PipelineStage<string, string> {
  const stage = new PipelineStage(
    { inputSchema: z.string(), process: handler },
    { name, concurrency, shutdown: pipeline.notifier, logger: silentLogger },
  );
  pipeline.addStage(stage);
  return stage;
}

const tick = (): Promise<void> =>
  new Promise((resolve) => {
    setImmediate(resolve);
  });

describe('Pipeline', () => {
  it('should pass items through stages in the order they were added', async () => {
    const pipeline = new Pipeline({ logger: silentLogger });
    const seen: string[] = [];
    addStage(pipeline, 'first', (item) => Promise.resolve(`${item}>first`));
    addStage(pipeline, 'second', (item) => Promise.resolve(`${item}>second`));
    addStage(pipeline, 'last', (item) => {
      seen.push(item);
      return Promise.resolve(null);
    });

    pipeline.start();
    pipeline.enqueue('a');
    await pipeline.waitForCompletion();

    expect(seen).toEqual(['a>first>second']);
    await pipeline.shutdown();
  });

  it('should reject enqueue before start', () => {
    const pipeline = new Pipeline({ logger: silentLogger });
    addStage(pipeline, 'only', (item) => Promise.resolve(item));

    expect(() => pipeline.enqueue('a')).toThrow(PipelineStateError);
    expect(() => pipeline.enqueue('a')).toThrow('Pipeline is not started');
  });

  it('should reject new stages after start', async () => {
    const pipeline = new Pipeline({ logger: silentLogger });
    addStage(pipeline, 'only', (item) => Promise.resolve(item));
    pipeline.start();

    expect(() => addStage(pipeline, 'late', (item) => Promise.resolve(item))).toThrow(
      'Cannot add stages to a started pipeline',
    );
    await pipeline.shutdown();
  });

  it('should warn and do nothing on a second start', async () => {
    const warn = vi.spyOn(silentLogger, 'warn');
    const pipeline = new Pipeline({ logger: silentLogger });
    addStage(pipeline, 'only', (item) => Promise.resolve(item));

    pipeline.start();
    pipeline.start();

    expect(warn).toHaveBeenCalledWith('Pipeline already started');
    expect(pipeline.isStarted).toBe(true);
    warn.mockRestore();
    await pipeline.shutdown();
  });

  it('should refuse to start without stages', () => {
    const pipeline = new Pipeline({ logger: silentLogger });
    expect(() => pipeline.start()).toThrow('Pipeline has no stages');
  });

  it('should stop stages last to first', async () => {
    const pipeline = new Pipeline({ logger: silentLogger });
    const stages = ['a', 'b', 'c'].map((name) => addStage(pipeline, name, (item) => Promise.resolve(item)));
    const order: string[] = [];
    for (const stage of stages) {
      const stop = stage.stopWorkers.bind(stage);
      vi.spyOn(stage, 'stopWorkers').mockImplementation(async () => {
        order.push(stage.name);
        await stop();
      });
    }

    pipeline.start();
    await pipeline.shutdown();

    expect(order).toEqual(['c', 'b', 'a']);
    expect(pipeline.isStarted).toBe(false);
  });

  it('should shut every stage down when one reports a fatal failure', async () => {
    const events = new EventBus();
    const shutdowns: string[] = [];
    events.on('pipeline:shutdown', (e) => shutdowns.push(e.reason));
    const pipeline = new Pipeline({ logger: silentLogger, events });

    const slow = addStage(pipeline, 'slow', async (item) => {
      await tick();
      return item;
    });
    const judge = addStage(pipeline, 'judge', (item, ctx) => {
      if (item === 'fatal') {
        ctx.shutdown('remote job failed');
        return Promise.resolve(null);
      }
      return Promise.resolve(item);
    });

    pipeline.start();
    pipeline.enqueue('fatal');
    for (let i = 0; i < 20; i++) pipeline.enqueue(`item-${String(i)}`);
    await pipeline.waitForCompletion();
    await pipeline.triggerShutdown('second failure');

    expect(shutdowns).toEqual(['remote job failed']);
    expect(pipeline.shutdownReason).toBe('remote job failed');
    expect(pipeline.isStarted).toBe(false);
    expect(slow.getStatus().processed).toBeLessThan(21);
    for (const stage of [slow, judge]) {
      expect(stage.isRunning).toBe(false);
      expect(() => stage.enqueue('late')).toThrow(PipelineStateError);
    }
    expect(() => pipeline.enqueue('late')).toThrow(PipelineStateError);
  });

  it('should look up stages by name and report their status', async () => {
    const pipeline = new Pipeline({ logger: silentLogger });
    addStage(pipeline, 'upload', (item) => Promise.resolve(item), 2);
    addStage(pipeline, 'ingest', () => Promise.resolve(null), 3);

    expect(pipeline.getStage('ingest')?.name).toBe('ingest');
    expect(pipeline.getStage('missing')).toBeUndefined();

    pipeline.start();
    const status = pipeline.getStatus();
    expect(status.started).toBe(true);
    expect(status.shutdownReason).toBeNull();
    expect(status.stages.map((s) => [s.name, s.concurrency, s.running])).toEqual([
      ['upload', 2, true],
      ['ingest', 3, true],
    ]);
    await pipeline.shutdown();
  });

  it('should accept a new start after a shutdown', async () => {
    const pipeline = new Pipeline({ logger: silentLogger });
    const seen: string[] = [];
    addStage(pipeline, 'only', (item) => {
      seen.push(item);
      return Promise.resolve(null);
    });

    pipeline.start();
    await pipeline.triggerShutdown('first run failed');
    pipeline.start();
    pipeline.enqueue('again');
    await pipeline.waitForCompletion();

    expect(seen).toEqual(['again']);
    expect(pipeline.shutdownReason).toBeNull();
    await pipeline.shutdown();
  });
});
