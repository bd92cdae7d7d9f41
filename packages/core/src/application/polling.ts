import type { Logger } from 'pino';
import { FileStatus } from '../domain/model/FileStatus.js';
import { isTerminalJobStatus } from '../domain/model/JobStatus.js';
import type { BatchLifecycleStore } from '../domain/ports/BatchLifecycleStore.js';
import type { FilePollResult, JobPollResult, RemoteJobClient } from '../domain/ports/RemoteJobClient.js';
import type { Sleep } from '../infrastructure/time/sleep.js';
import { errorMessage } from './errors.js';

export interface PollOptions {
  readonly intervalMs: number;
  readonly sleep: Sleep;
  readonly logger: Logger;
  readonly signal?: AbortSignal;
}

/** One polled resource: how to read its status, record it, and recognise the end state. */
export interface PollTarget<S> {
  readonly context: Record<string, unknown>;
  poll(): Promise<S>;
  /** Called with every successful snapshot before `isSettled()` is checked. */
  observe(snapshot: S): Promise<void>;
  isSettled(snapshot: S): boolean;
}

/**
 * Poll until `target` settles. Resolves to the settling snapshot, or to
 * `null` when the signal aborts first.
 *
 * A throwing `poll()` is a transient condition: it is logged and retried on
 * the next tick. A throwing `observe()` is logged and the snapshot still
 * counts, so the stored status may lag until a later poll records it.
 * There is no overall timeout.
 */
export async function pollUntil<S>(target: PollTarget<S>, options: PollOptions): Promise<S | null> {
  const { intervalMs, sleep, logger, signal } = options;

  while (!signal?.aborted) {
    let snapshot: S;
    try {
      snapshot = await target.poll();
    } catch (error) {
      logger.warn({ ...target.context, error: errorMessage(error) }, 'Status poll failed, retrying');
      await sleep(intervalMs, signal);
      continue;
    }

    try {
      await target.observe(snapshot);
    } catch (error) {
      logger.error({ ...target.context, error: errorMessage(error) }, 'Polled status could not be recorded');
    }
    if (target.isSettled(snapshot)) return snapshot;

    logger.debug({ ...target.context, intervalMs }, 'Not settled yet, waiting');
    await sleep(intervalMs, signal);
  }

  return null;
}

/** Poll an uploaded file until it is ready or has failed, persisting each observed status. */
export function pollFileUntilSettled(
  client: RemoteJobClient,
  store: BatchLifecycleStore,
  fileId: string,
  options: PollOptions,
): Promise<FilePollResult | null> {
  return pollUntil<FilePollResult>(
    {
      context: { fileId },
      poll: () => client.pollFileStatus(fileId),
      observe: (snapshot) => store.updateFileStatus(fileId, snapshot.status),
      isSettled: (snapshot) => snapshot.ready || snapshot.status === FileStatus.FAILED,
    },
    options,
  );
}

/**
 * Poll a job until the remote API reports a terminal status, persisting each
 * observed status (and the result file id once one appears).
 */
export function pollJobUntilTerminal(
  client: RemoteJobClient,
  store: BatchLifecycleStore,
  jobId: string,
  options: PollOptions & { readonly onSnapshot?: (snapshot: JobPollResult) => void },
): Promise<JobPollResult | null> {
  return pollUntil<JobPollResult>(
    {
      context: { jobId },
      poll: () => client.pollJobStatus(jobId),
      observe: async (snapshot) => {
        const applied = await store.updateJobStatus(jobId, snapshot.status, snapshot.resultFileId);
        if (!applied) {
          options.logger.debug({ jobId, status: snapshot.status }, 'Stored status not changed by poll');
        }
        options.onSnapshot?.(snapshot);
      },
      isSettled: (snapshot) => isTerminalJobStatus(snapshot.status),
    },
    options,
  );
}
