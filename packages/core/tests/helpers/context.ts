import { pino } from 'pino';
import type { Logger } from 'pino';
import { vi } from 'vitest';
import type { EmbeddingContext } from '../../src/application/EmbeddingContext.js';
import { EventBus } from '../../src/application/EventBus.js';
import type { StageContext } from '../../src/application/PipelineStage.js';
import { Semaphore } from '../../src/application/Semaphore.js';
import { resolveSettings } from '../../src/config/EmbeddingSettings.js';
import type { EmbeddingSettingsInput } from '../../src/config/EmbeddingSettings.js';
import type { Fragment } from '../../src/domain/model/FragmentRef.js';
import { InMemoryLifecycleStore } from '../../src/infrastructure/state/InMemoryLifecycleStore.js';
import { InMemoryVectorStore } from '../../src/infrastructure/state/InMemoryVectorStore.js';
import type { Sleep } from '../../src/infrastructure/time/sleep.js';
import { FakeRemoteJobClient } from './FakeRemoteJobClient.js';

export const silentLogger: Logger = pino({ level: 'silent' });

/** Yields to the event loop instead of waiting. */
export const immediateSleep: Sleep = () =>
  new Promise<void>((resolve) => {
    setImmediate(resolve);
  });

export function createTestContext(
  overrides: Partial<Omit<EmbeddingContext, 'settings'>> = {},
  settings: EmbeddingSettingsInput = {},
): EmbeddingContext {
  return {
    client: new FakeRemoteJobClient(),
    store: new InMemoryLifecycleStore(),
    vectorStore: new InMemoryVectorStore(),
    settings: resolveSettings(settings),
    events: new EventBus(silentLogger),
    logger: silentLogger,
    sleep: immediateSleep,
    submissionGate: new Semaphore(2),
    ...overrides,
  };
}

export function createStageContext(
  signal: AbortSignal = new AbortController().signal,
  logger: Logger = silentLogger,
): StageContext {
  return { stage: 'test-stage', signal, shutdown: vi.fn(), logger };
}

export interface LogLine {
  readonly level: number;
  readonly msg?: string;
  readonly [field: string]: unknown;
}

/** A logger that keeps every line it writes, parsed. */
export function recordingLogger(): { logger: Logger; lines: LogLine[] } {
  const lines: LogLine[] = [];
  const logger = pino(
    { level: 'debug' },
    {
      write(line: string) {
        const parsed: unknown = JSON.parse(line);
        if (typeof parsed === 'object' && parsed !== null && 'level' in parsed && typeof parsed.level === 'number') {
          lines.push({ ...parsed, level: parsed.level });
        }
      },
    },
  );
  return { logger, lines };
}

/** Log lines at `error` level. */
export function errorLines(lines: readonly LogLine[]): LogLine[] {
  return lines.filter((line) => line.level === 50);
}

/** `count` fragments for one owner, ids starting at 0. */
export function fragmentsFor(ownerId: number, count: number): Fragment[] {
  return Array.from({ length: count }, (_, fragmentId) => ({
    ownerId,
    fragmentId,
    text: `owner ${String(ownerId)} fragment ${String(fragmentId)}`,
  }));
}
