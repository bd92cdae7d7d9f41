import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Sequelize } from 'sequelize';
import fs from 'fs';
import path from 'path';
import os from 'os';
import { SQLite3Wrapper } from '../better-sqlite3-adapter.js';
import { SequelizeLifecycleStore } from '../../src/SequelizeLifecycleStore.js';
import { SequelizeVectorStore } from '../../src/SequelizeVectorStore.js';
import type { Fragment } from '@embedbatch/core';

const ref = (ownerId: number, fragmentId: number) => ({ ownerId, fragmentId });

function fragmentsFor(ownerId: number, count: number): Fragment[] {
  return Array.from({ length: count }, (_, fragmentId) => ({ ownerId, fragmentId, text: `text ${String(fragmentId)}` }));
}

function createSequelize(storage: string): Sequelize {
  return new Sequelize({
    dialect: 'sqlite',
    storage,
    logging: false,
    dialectModule: { Database: SQLite3Wrapper },
    pool: {
      max: 1,
      min: 1,
      idle: 30000,
      acquire: 60000,
      evict: 30000,
    },
  });
}

describe('SequelizeLifecycleStore', () => {
  let sequelize: Sequelize;
  let store: SequelizeLifecycleStore;
  let dbPath: string;

  beforeEach(async () => {
    dbPath = path.join(os.tmpdir(), `test-embed-${String(Date.now())}-${String(Math.random())}.sqlite`);
    sequelize = createSequelize(dbPath);
    store = new SequelizeLifecycleStore(sequelize);
    await store.initialize();
  });

  afterEach(async () => {
    await sequelize.close();
    fs.rmSync(dbPath, { force: true });
  });

  describe('initialize', () => {
    it('should be idempotent', async () => {
      await expect(store.initialize()).resolves.toBeUndefined();
    });
  });

  describe('fragments', () => {
    it('should list unclaimed fragments ordered by owner then fragment id', async () => {
      await store.saveFragments([...fragmentsFor(2, 2), ...fragmentsFor(1, 2)]);

      const listed = await store.listFragmentsWithoutActiveJob(10);

      expect(listed).toEqual([
        { ownerId: 1, fragmentId: 0, text: 'text 0' },
        { ownerId: 1, fragmentId: 1, text: 'text 1' },
        { ownerId: 2, fragmentId: 0, text: 'text 0' },
        { ownerId: 2, fragmentId: 1, text: 'text 1' },
      ]);
    });

    it('should replace the text of a fragment saved twice', async () => {
      await store.saveFragments([{ ownerId: 1, fragmentId: 0, text: 'first' }]);
      await store.saveFragments([{ ownerId: 1, fragmentId: 0, text: 'second' }]);

      expect(await store.listFragmentsWithoutActiveJob(10)).toEqual([{ ownerId: 1, fragmentId: 0, text: 'second' }]);
    });

    it('should exclude fragments claimed by a job unless it is superseded', async () => {
      await store.saveFragments(fragmentsFor(1, 4));
      await store.upsertJobMetadata({ jobId: 'job-a', fileId: 'file-a', fragmentRefs: [ref(1, 0)], status: 'in_progress' });
      await store.upsertJobMetadata({ jobId: 'job-b', fileId: 'file-b', fragmentRefs: [ref(1, 1)], status: 'failed' });
      await store.upsertJobMetadata({ jobId: 'job-c', fileId: 'file-c', fragmentRefs: [ref(1, 2)], status: 'failed' });
      await store.markJobSuperseded('job-c', 'job-d');

      const listed = await store.listFragmentsWithoutActiveJob(10);

      expect(listed.map((f) => f.fragmentId)).toEqual([2, 3]);
    });

    it('should honour the limit', async () => {
      await store.saveFragments(fragmentsFor(1, 5));

      expect(await store.listFragmentsWithoutActiveJob(3)).toHaveLength(3);
    });
  });

  describe('files', () => {
    it('should persist and update an uploaded file', async () => {
      await store.upsertFileMetadata('file-1', [ref(1, 0), ref(1, 1)], 'uploaded');
      await store.updateFileStatus('file-1', 'processed');

      const file = await store.getFile('file-1');
      expect(file?.status).toBe('processed');
      expect(file?.fragmentRefs).toEqual([ref(1, 0), ref(1, 1)]);
      expect(await store.getFile('file-x')).toBeNull();
    });

    it('should keep the creation time on a second upsert', async () => {
      await store.upsertFileMetadata('file-1', [], 'uploaded');
      const first = await store.getFile('file-1');
      await store.upsertFileMetadata('file-1', [], 'failed');

      const files = await store.listFiles();
      expect(files).toHaveLength(1);
      expect(files[0]?.createdAt).toBe(first?.createdAt);
      expect(files[0]?.status).toBe('failed');
    });
  });

  describe('jobs', () => {
    it('should store exactly one record when a job is upserted twice', async () => {
      await store.upsertJobMetadata({ jobId: 'job-1', fileId: 'file-1', fragmentRefs: [ref(1, 0)], status: 'validating' });
      await store.upsertJobMetadata({ jobId: 'job-1', fileId: 'file-1', fragmentRefs: [ref(1, 0)], status: 'in_progress' });

      const jobs = await store.listJobs();
      expect(jobs).toHaveLength(1);
      expect(jobs[0]?.status).toBe('in_progress');
    });

    it('should replace the record named by retryOf', async () => {
      await store.saveFragments(fragmentsFor(1, 1));
      await store.upsertJobMetadata({ jobId: 'job-1', fileId: 'file-1', fragmentRefs: [ref(1, 0)], status: 'failed' });
      await store.upsertJobMetadata({
        jobId: 'job-2',
        fileId: 'file-2',
        fragmentRefs: [ref(1, 0)],
        status: 'validating',
        retryOf: 'job-1',
      });

      expect(await store.getJob('job-1')).toBeNull();
      expect((await store.getJob('job-2'))?.retryOf).toBe('job-1');
      expect(await store.listFragmentsWithoutActiveJob(10)).toEqual([]);
    });

    it('should move status forward only and stamp completion once', async () => {
      await store.upsertJobMetadata({ jobId: 'job-1', fileId: 'file-1', fragmentRefs: [], status: 'validating' });

      expect(await store.updateJobStatus('job-1', 'in_progress')).toBe(true);
      expect(await store.updateJobStatus('job-1', 'completed', 'result-1')).toBe(true);
      expect(await store.updateJobStatus('job-1', 'in_progress')).toBe(false);
      expect(await store.updateJobStatus('job-x', 'completed')).toBe(false);

      const job = await store.getJob('job-1');
      expect(job?.status).toBe('completed');
      expect(job?.resultFileId).toBe('result-1');
      expect(job?.completedAt).toBeTypeOf('number');
    });

    it('should mark a job processed', async () => {
      await store.upsertJobMetadata({ jobId: 'job-1', fileId: 'file-1', fragmentRefs: [], status: 'completed' });

      await store.markJobProcessed('job-1');

      const job = await store.getJob('job-1');
      expect(job?.processed).toBe(true);
      expect(job?.processedAt).toBeTypeOf('number');
    });

    it('should list incomplete and failed jobs', async () => {
      await store.upsertJobMetadata({ jobId: 'running', fileId: 'f1', fragmentRefs: [], status: 'validating' });
      await store.upsertJobMetadata({ jobId: 'unprocessed', fileId: 'f2', fragmentRefs: [], status: 'completed' });
      await store.upsertJobMetadata({ jobId: 'done', fileId: 'f3', fragmentRefs: [], status: 'completed' });
      await store.markJobProcessed('done');
      await store.upsertJobMetadata({ jobId: 'broken', fileId: 'f4', fragmentRefs: [], status: 'failed' });

      expect([...(await store.listIncompleteJobIds())].sort()).toEqual(['running', 'unprocessed']);
      expect((await store.listFailedJobs()).map((j) => j.jobId)).toEqual(['broken']);
      expect((await store.findFailedJob())?.jobId).toBe('broken');
      expect(await store.findFailedJob('done')).toBeNull();
    });

    it('should record combined lineage and supersede the members', async () => {
      await store.upsertJobMetadata({ jobId: 'old-1', fileId: 'f1', fragmentRefs: [ref(1, 0)], status: 'failed' });
      await store.upsertJobMetadata({ jobId: 'old-2', fileId: 'f2', fragmentRefs: [ref(2, 0)], status: 'failed' });
      await store.upsertJobMetadata({
        jobId: 'new-1',
        fileId: 'f9',
        fragmentRefs: [ref(1, 0), ref(2, 0)],
        status: 'validating',
        combinedFrom: ['old-1', 'old-2'],
        combinedFromFileIds: ['f1', 'f2'],
      });
      await store.markJobSuperseded('old-1', 'new-1');
      await store.markJobSuperseded('old-2', 'new-1');

      expect(await store.getJob('new-1')).toMatchObject({
        combinedBatch: true,
        combinedFrom: ['old-1', 'old-2'],
        combinedFromFileIds: ['f1', 'f2'],
      });
      expect(await store.getJob('old-2')).toMatchObject({ status: 'superseded', supersededBy: 'new-1' });
      await expect(store.markJobSuperseded('new-1', 'x')).rejects.toThrow(
        'Job new-1 cannot be superseded from status validating',
      );
    });

    it('should move a retried record onto the new job', async () => {
      await store.saveFragments(fragmentsFor(1, 1));
      await store.upsertJobMetadata({ jobId: 'job-1', fileId: 'file-1', fragmentRefs: [ref(1, 0)], status: 'validating' });
      await store.updateJobStatus('job-1', 'failed');

      await store.recordJobRetry('job-1', { jobId: 'job-2', fileId: 'file-2' });

      expect(await store.getJob('job-1')).toBeNull();
      const job = await store.getJob('job-2');
      expect(job).toMatchObject({
        status: 'validating',
        fragmentRefs: [ref(1, 0)],
        previousJobIds: ['job-1'],
        previousFileIds: ['file-1'],
        retryCount: 1,
      });
      expect(job?.completedAt).toBeUndefined();
      expect(await store.listFragmentsWithoutActiveJob(10)).toEqual([]);
      await expect(store.recordJobRetry('job-1', { jobId: 'job-3', fileId: 'file-3' })).rejects.toThrow(
        'Job job-1 not found',
      );
    });

    it('should date a retried record from the resubmission', async () => {
      vi.useFakeTimers({ toFake: ['Date'] });
      try {
        vi.setSystemTime(1000);
        await store.upsertJobMetadata({ jobId: 'job-1', fileId: 'file-1', fragmentRefs: [ref(1, 0)], status: 'failed' });
        vi.setSystemTime(2000);
        await store.upsertJobMetadata({ jobId: 'job-2', fileId: 'file-2', fragmentRefs: [ref(2, 0)], status: 'failed' });
        vi.setSystemTime(3000);

        await store.recordJobRetry('job-1', { jobId: 'job-3', fileId: 'file-3' });
        await store.updateJobStatus('job-3', 'failed');

        expect((await store.getJob('job-3'))?.createdAt).toBe(3000);
        expect((await store.listFailedJobs()).map((j) => j.jobId)).toEqual(['job-2', 'job-3']);
      } finally {
        vi.useRealTimers();
      }
    });
  });
});

describe('SequelizeVectorStore', () => {
  let sequelize: Sequelize;
  let vectors: SequelizeVectorStore;
  let dbPath: string;

  beforeEach(async () => {
    dbPath = path.join(os.tmpdir(), `test-vectors-${String(Date.now())}-${String(Math.random())}.sqlite`);
    sequelize = createSequelize(dbPath);
    vectors = new SequelizeVectorStore(sequelize, { readBackChunkSize: 2 });
    await vectors.initialize();
  });

  afterEach(async () => {
    await sequelize.close();
    fs.rmSync(dbPath, { force: true });
  });

  it('should replace a vector written twice', async () => {
    await vectors.upsertEmbeddings([{ ref: ref(1, 0), vector: [0.1, 0.2] }]);
    await vectors.upsertEmbeddings([{ ref: ref(1, 0), vector: [0.3, 0.4] }]);

    expect(await vectors.count()).toBe(1);
    expect(await vectors.getVector(ref(1, 0))).toEqual([0.3, 0.4]);
  });

  it('should read back stored references across chunks', async () => {
    await vectors.upsertEmbeddings([
      { ref: ref(1, 0), vector: [1] },
      { ref: ref(1, 1), vector: [1] },
      { ref: ref(2, 0), vector: [1] },
    ]);

    const found = await vectors.findStoredRefs([ref(1, 0), ref(1, 1), ref(1, 2), ref(2, 0), ref(3, 0)]);

    expect([...found].sort((a, b) => a.ownerId - b.ownerId || a.fragmentId - b.fragmentId)).toEqual([
      ref(1, 0),
      ref(1, 1),
      ref(2, 0),
    ]);
    expect(await vectors.getVector(ref(3, 0))).toBeNull();
  });
});
