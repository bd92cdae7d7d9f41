import { JobStatus } from '../domain/model/JobStatus.js';
import type { BatchLifecycleStore } from '../domain/ports/BatchLifecycleStore.js';
import type { VectorStore } from '../domain/ports/VectorStore.js';

/** Counts of stored records, grouped by status. */
export interface LifecycleReport {
  readonly files: Readonly<Record<string, number>>;
  readonly jobs: Readonly<Record<string, number>>;
  /** Completed jobs whose results have not been confirmed in the vector store. */
  readonly unprocessedCompletedJobs: number;
  readonly vectors: number;
}

function countBy<T>(items: readonly T[], key: (item: T) => string): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const item of items) {
    const k = key(item);
    counts[k] = (counts[k] ?? 0) + 1;
  }
  return counts;
}

export async function buildLifecycleReport(store: BatchLifecycleStore, vectorStore: VectorStore): Promise<LifecycleReport> {
  const [files, jobs, vectors] = await Promise.all([store.listFiles(), store.listJobs(), vectorStore.count()]);
  return {
    files: countBy(files, (f) => f.status),
    jobs: countBy(jobs, (j) => j.status),
    unprocessedCompletedJobs: jobs.filter((j) => j.status === JobStatus.COMPLETED && !j.processed).length,
    vectors,
  };
}
