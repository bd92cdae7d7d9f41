import { describe, it, expect } from 'vitest';
import { parseResultContent } from '../../../src/domain/services/ResultParser.js';

const line = (value: unknown): string => JSON.stringify(value);

describe('ResultParser', () => {
  it('should map each result line back to its fragment', () => {
    const content = [
      line({ custom_id: '1-0', response: { status_code: 200, body: { data: [{ embedding: [0.1, 0.2] }] } }, error: null }),
      line({ custom_id: '4-9', response: { status_code: 200, body: { data: [{ embedding: [0.3] }] } }, error: null }),
    ].join('\n');

    const result = parseResultContent(content);

    expect(result.embeddings).toEqual([
      { ref: { ownerId: 1, fragmentId: 0 }, vector: [0.1, 0.2] },
      { ref: { ownerId: 4, fragmentId: 9 }, vector: [0.3] },
    ]);
    expect(result.failures).toEqual([]);
    expect(result.skippedLines).toBe(0);
  });

  it('should report error lines and non-2xx responses as failures', () => {
    const content = [
      line({ custom_id: '1-1', response: null, error: { code: 'server_error', message: 'boom' } }),
      line({ custom_id: '1-2', response: { status_code: 429, body: { error: { message: 'slow down' } } } }),
      line({ custom_id: '1-3', error: { code: 'invalid_request' } }),
    ].join('\n');

    const result = parseResultContent(content);

    expect(result.embeddings).toEqual([]);
    expect(result.failures).toEqual([
      { ref: { ownerId: 1, fragmentId: 1 }, message: 'boom' },
      { ref: { ownerId: 1, fragmentId: 2 }, message: 'request failed with status 429' },
      { ref: { ownerId: 1, fragmentId: 3 }, message: 'invalid_request' },
    ]);
  });

  it('should count malformed lines, unknown ids and empty vectors as skipped', () => {
    const content = [
      'not json',
      line({ custom_id: 'qid-1-chunk-2', response: { status_code: 200, body: { data: [{ embedding: [1] }] } } }),
      line({ custom_id: '1-3', response: { status_code: 200, body: { data: [] } } }),
      line({ no_id: true }),
      '',
      line({ custom_id: '2-0', response: { status_code: 200, body: { data: [{ embedding: [0.5] }] } } }),
    ].join('\n');

    const result = parseResultContent(content);

    expect(result.skippedLines).toBe(4);
    expect(result.embeddings).toEqual([{ ref: { ownerId: 2, fragmentId: 0 }, vector: [0.5] }]);
  });

  it('should return nothing for empty content', () => {
    expect(parseResultContent('')).toEqual({ embeddings: [], failures: [], skippedLines: 0 });
  });
});
