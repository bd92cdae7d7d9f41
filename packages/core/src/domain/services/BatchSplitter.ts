/**
 * Groups a list into consecutive fixed-size batches, preserving order.
 * The final batch may hold fewer items than `batchSize`.
 *
 * Used for request files (fragments per file) and retry groups (failed jobs per combined job).
 */
export class BatchSplitter {
  constructor(private readonly batchSize: number) {
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new Error('Batch size must be a positive integer');
    }
  }

  split<T>(items: readonly T[]): T[][] {
    const batches: T[][] = [];
    for (let start = 0; start < items.length; start += this.batchSize) {
      batches.push(items.slice(start, start + this.batchSize));
    }
    return batches;
  }
}
