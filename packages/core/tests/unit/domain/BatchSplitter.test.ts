import { describe, it, expect } from 'vitest';
import { BatchSplitter } from '../../../src/domain/services/BatchSplitter.js';

describe('BatchSplitter', () => {
  it('should split into fixed-size batches with a smaller last batch', () => {
    expect(new BatchSplitter(2).split([1, 2, 3, 4, 5])).toEqual([[1, 2], [3, 4], [5]]);
  });

  it('should return no batches for an empty list', () => {
    expect(new BatchSplitter(4).split([])).toEqual([]);
  });

  it('should split 9 items into groups of 4, 4 and 1', () => {
    const groups = new BatchSplitter(4).split(['a', 'b', 'c', 'd', 'e', 'f', 'g', 'h', 'i']);
    expect(groups.map((g) => g.length)).toEqual([4, 4, 1]);
    expect(groups[2]).toEqual(['i']);
  });

  it('should reject a non-positive batch size', () => {
    expect(() => new BatchSplitter(0)).toThrow('Batch size must be a positive integer');
    expect(() => new BatchSplitter(1.5)).toThrow('Batch size must be a positive integer');
  });
});
