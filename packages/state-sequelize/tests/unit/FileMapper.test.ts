import { describe, it, expect } from 'vitest';
import * as FileMapper from '../../src/mappers/FileMapper.js';

describe('FileMapper', () => {
  it('should round-trip an uploaded file', () => {
    const file = {
      fileId: 'file-001',
      fragmentRefs: [{ ownerId: 3, fragmentId: 9 }],
      status: 'processed' as const,
      createdAt: 1700000000000,
      updatedAt: 1700000005000,
    };

    expect(FileMapper.toDomain(FileMapper.toRow(file))).toEqual(file);
  });

  it('should reject an unknown status', () => {
    const row = { fileId: 'f', fragmentRefs: [], status: 'deleted', createdAt: 1, updatedAt: 1 };

    expect(() => FileMapper.toDomain(row)).toThrow('Unknown file status in store: deleted');
  });
});
