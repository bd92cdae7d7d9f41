import { Op, literal } from 'sequelize';
import type { Sequelize, Transaction } from 'sequelize';
import {
  ACTIVE_JOB_STATUSES,
  JobStatus,
  canTransitionJob,
  isTerminalJobStatus,
  uniqueRefs,
} from '@embedbatch/core';
import type {
  BatchJob,
  BatchLifecycleStore,
  FileStatus,
  Fragment,
  FragmentRef,
  JobMetadataInput,
  JobReplacement,
  UploadedFile,
} from '@embedbatch/core';
import { defineFileModel } from './models/FileModel.js';
import type { FileModel } from './models/FileModel.js';
import { FRAGMENT_MODEL_NAME, defineFragmentModel } from './models/FragmentModel.js';
import type { FragmentModel } from './models/FragmentModel.js';
import { JOB_FRAGMENTS_TABLE, defineJobFragmentModel } from './models/JobFragmentModel.js';
import type { JobFragmentModel } from './models/JobFragmentModel.js';
import { JOBS_TABLE, defineJobModel } from './models/JobModel.js';
import type { JobModel } from './models/JobModel.js';
import * as FileMapper from './mappers/FileMapper.js';
import * as JobMapper from './mappers/JobMapper.js';

/**
 * Sequelize-based `BatchLifecycleStore` for `@embedbatch/core`.
 *
 * Persists fragments, uploaded files and batch jobs to a relational database
 * using Sequelize v6. Supports any dialect supported by Sequelize (PostgreSQL,
 * MySQL, MariaDB, SQLite, MS SQL Server).
 *
 * Job membership is mirrored into `embedding_job_fragments` so that the
 * "fragments without an active job" query runs in the database.
 *
 * Call `initialize()` after construction to create tables.
 */
export class SequelizeLifecycleStore implements BatchLifecycleStore {
  private readonly sequelize: Sequelize;
  private readonly Fragment: FragmentModel;
  private readonly File: FileModel;
  private readonly Job: JobModel;
  private readonly JobFragment: JobFragmentModel;

  constructor(sequelize: Sequelize) {
    this.sequelize = sequelize;
    this.Fragment = defineFragmentModel(this.sequelize);
    this.File = defineFileModel(this.sequelize);
    this.Job = defineJobModel(this.sequelize);
    this.JobFragment = defineJobFragmentModel(this.sequelize);
  }

  async initialize(): Promise<void> {
    await this.Fragment.sync();
    await this.File.sync();
    await this.Job.sync();
    await this.JobFragment.sync();
  }

  // ── Fragments ───────────────────────────────────────────────────────

  async saveFragments(fragments: readonly Fragment[]): Promise<void> {
    if (fragments.length === 0) return;
    await this.Fragment.bulkCreate(
      fragments.map((f) => ({ ownerId: f.ownerId, fragmentId: f.fragmentId, text: f.text })),
      { updateOnDuplicate: ['text'] },
    );
  }

  async listFragmentsWithoutActiveJob(limit: number): Promise<readonly Fragment[]> {
    const rows = await this.Fragment.findAll({
      where: literal(this.unclaimedCondition()),
      order: [
        ['ownerId', 'ASC'],
        ['fragmentId', 'ASC'],
      ],
      limit,
    });
    return rows.map((r) => r.get({ plain: true }));
  }

  // ── Files ───────────────────────────────────────────────────────────

  async upsertFileMetadata(fileId: string, fragmentRefs: readonly FragmentRef[], status: FileStatus): Promise<void> {
    const now = Date.now();
    const existing = await this.getFile(fileId);
    const file: UploadedFile = {
      fileId,
      fragmentRefs,
      status,
      createdAt: existing?.createdAt ?? now,
      updatedAt: now,
    };
    await this.File.upsert(FileMapper.toRow(file));
  }

  async updateFileStatus(fileId: string, status: FileStatus): Promise<void> {
    await this.File.update({ status, updatedAt: Date.now() }, { where: { fileId } });
  }

  async getFile(fileId: string): Promise<UploadedFile | null> {
    const row = await this.File.findByPk(fileId);
    if (!row) return null;
    return FileMapper.toDomain(row.get({ plain: true }));
  }

  async listFiles(): Promise<readonly UploadedFile[]> {
    const rows = await this.File.findAll({ order: [['createdAt', 'ASC']] });
    return rows.map((r) => FileMapper.toDomain(r.get({ plain: true })));
  }

  // ── Jobs ────────────────────────────────────────────────────────────

  async upsertJobMetadata(input: JobMetadataInput): Promise<void> {
    const job: BatchJob = {
      jobId: input.jobId,
      fileId: input.fileId,
      fragmentRefs: uniqueRefs(input.fragmentRefs),
      status: input.status,
      processed: false,
      createdAt: Date.now(),
      ...(input.retryOf !== undefined ? { retryOf: input.retryOf } : {}),
      ...(input.combinedFrom !== undefined
        ? {
            combinedBatch: true,
            combinedFrom: [...input.combinedFrom],
            combinedFromFileIds: [...(input.combinedFromFileIds ?? [])],
          }
        : {}),
    };

    await this.sequelize.transaction(async (transaction) => {
      if (input.retryOf !== undefined && input.retryOf !== input.jobId) {
        await this.JobFragment.destroy({ where: { jobId: input.retryOf }, transaction });
        await this.Job.destroy({ where: { jobId: input.retryOf }, transaction });
      }
      await this.Job.upsert(JobMapper.toRow(job), { transaction });
      await this.replaceMembership(job.jobId, job.fragmentRefs, transaction);
    });
  }

  async updateJobStatus(jobId: string, status: JobStatus, resultFileId?: string): Promise<boolean> {
    const job = await this.getJob(jobId);
    if (!job || !canTransitionJob(job.status, status)) return false;

    // Conditional on the status we read, so a concurrent poll cannot move it backwards
    const [affectedRows] = await this.Job.update(
      {
        status,
        ...(resultFileId !== undefined ? { resultFileId } : {}),
        ...(isTerminalJobStatus(status) && job.completedAt === undefined ? { completedAt: Date.now() } : {}),
      },
      { where: { jobId, status: job.status } },
    );
    return affectedRows > 0;
  }

  async markJobProcessed(jobId: string): Promise<void> {
    await this.Job.update({ processed: true, processedAt: Date.now() }, { where: { jobId } });
  }

  async markJobSuperseded(jobId: string, supersededBy: string): Promise<void> {
    const job = await this.getJob(jobId);
    if (!job) throw new Error(`Job ${jobId} not found`);
    if (!canTransitionJob(job.status, JobStatus.SUPERSEDED)) {
      throw new Error(`Job ${jobId} cannot be superseded from status ${job.status}`);
    }
    await this.Job.update({ status: JobStatus.SUPERSEDED, supersededBy }, { where: { jobId } });
  }

  async recordJobRetry(oldJobId: string, replacement: JobReplacement): Promise<void> {
    const job = await this.getJob(oldJobId);
    if (!job) throw new Error(`Job ${oldJobId} not found`);

    const { completedAt: _completedAt, resultFileId: _resultFileId, processedAt: _processedAt, ...rest } = job;
    const moved: BatchJob = {
      ...rest,
      jobId: replacement.jobId,
      fileId: replacement.fileId,
      status: JobStatus.VALIDATING,
      processed: false,
      createdAt: Date.now(),
      previousJobIds: [...(job.previousJobIds ?? []), oldJobId],
      previousFileIds: [...(job.previousFileIds ?? []), job.fileId],
      retryCount: (job.retryCount ?? 0) + 1,
    };

    await this.sequelize.transaction(async (transaction) => {
      await this.JobFragment.destroy({ where: { jobId: oldJobId }, transaction });
      await this.Job.destroy({ where: { jobId: oldJobId }, transaction });
      await this.Job.upsert(JobMapper.toRow(moved), { transaction });
      await this.replaceMembership(moved.jobId, moved.fragmentRefs, transaction);
    });
  }

  async getJob(jobId: string): Promise<BatchJob | null> {
    const row = await this.Job.findByPk(jobId);
    if (!row) return null;
    return JobMapper.toDomain(row.get({ plain: true }));
  }

  async listJobs(): Promise<readonly BatchJob[]> {
    const rows = await this.Job.findAll({
      order: [
        ['createdAt', 'ASC'],
        ['jobId', 'ASC'],
      ],
    });
    return rows.map((r) => JobMapper.toDomain(r.get({ plain: true })));
  }

  async listIncompleteJobIds(): Promise<readonly string[]> {
    const rows = await this.Job.findAll({
      attributes: ['jobId'],
      where: {
        [Op.or]: [
          { status: { [Op.in]: [...ACTIVE_JOB_STATUSES] } },
          { status: JobStatus.COMPLETED, processed: false },
        ],
      },
      order: [
        ['createdAt', 'ASC'],
        ['jobId', 'ASC'],
      ],
    });
    return rows.map((r) => r.get('jobId'));
  }

  async listFailedJobs(): Promise<readonly BatchJob[]> {
    const rows = await this.Job.findAll({
      where: { status: JobStatus.FAILED },
      order: [
        ['createdAt', 'ASC'],
        ['jobId', 'ASC'],
      ],
    });
    return rows.map((r) => JobMapper.toDomain(r.get({ plain: true })));
  }

  async findFailedJob(jobId?: string): Promise<BatchJob | null> {
    if (jobId === undefined) {
      const [first] = await this.listFailedJobs();
      return first ?? null;
    }
    const job = await this.getJob(jobId);
    return job?.status === JobStatus.FAILED ? job : null;
  }

  // ── Internals ───────────────────────────────────────────────────────

  private async replaceMembership(jobId: string, refs: readonly FragmentRef[], transaction: Transaction): Promise<void> {
    await this.JobFragment.destroy({ where: { jobId }, transaction });
    if (refs.length === 0) return;
    await this.JobFragment.bulkCreate(
      refs.map((r) => ({ jobId, ownerId: r.ownerId, fragmentId: r.fragmentId })),
      { transaction },
    );
  }

  /** Correlated `NOT EXISTS` over job membership, ignoring superseded jobs. */
  private unclaimedCondition(): string {
    const qi = this.sequelize.getQueryInterface();
    const q = (identifier: string): string => qi.quoteIdentifier(identifier);
    const fragment = q(FRAGMENT_MODEL_NAME);
    return [
      'NOT EXISTS (SELECT 1',
      `FROM ${qi.quoteTable(JOB_FRAGMENTS_TABLE)} AS ${q('jf')}`,
      `INNER JOIN ${qi.quoteTable(JOBS_TABLE)} AS ${q('j')} ON ${q('j')}.${q('jobId')} = ${q('jf')}.${q('jobId')}`,
      `WHERE ${q('j')}.${q('status')} <> ${this.sequelize.escape(JobStatus.SUPERSEDED)}`,
      `AND ${q('jf')}.${q('ownerId')} = ${fragment}.${q('ownerId')}`,
      `AND ${q('jf')}.${q('fragmentId')} = ${fragment}.${q('fragmentId')})`,
    ].join(' ');
  }
}
