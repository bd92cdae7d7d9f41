import { Op } from 'sequelize';
import type { Sequelize } from 'sequelize';
import { z } from 'zod';
import { BatchSplitter } from '@embedbatch/core';
import type { FragmentEmbedding, FragmentRef, VectorStore } from '@embedbatch/core';
import { defineVectorModel } from './models/VectorModel.js';
import type { VectorModel } from './models/VectorModel.js';
import { parseJson } from './utils/parseJson.js';

export interface SequelizeVectorStoreOptions {
  /** Default: `embedding_vectors`. */
  readonly tableName?: string;
  /** References per read-back query. Default: `500`. */
  readonly readBackChunkSize?: number;
}

const vectorSchema = z.array(z.number());

/**
 * Sequelize-based `VectorStore`. Vectors are stored as JSON keyed by
 * `(ownerId, fragmentId)`; a second write for the same fragment replaces the first.
 */
export class SequelizeVectorStore implements VectorStore {
  private readonly Vector: VectorModel;
  private readonly splitter: BatchSplitter;

  constructor(sequelize: Sequelize, options?: SequelizeVectorStoreOptions) {
    this.Vector = defineVectorModel(sequelize, options?.tableName);
    this.splitter = new BatchSplitter(options?.readBackChunkSize ?? 500);
  }

  async initialize(): Promise<void> {
    await this.Vector.sync();
  }

  async upsertEmbeddings(embeddings: readonly FragmentEmbedding[]): Promise<void> {
    if (embeddings.length === 0) return;
    const now = Date.now();
    await this.Vector.bulkCreate(
      embeddings.map((e) => ({
        ownerId: e.ref.ownerId,
        fragmentId: e.ref.fragmentId,
        vector: [...e.vector],
        updatedAt: now,
      })),
      { updateOnDuplicate: ['vector', 'updatedAt'] },
    );
  }

  async findStoredRefs(refs: readonly FragmentRef[]): Promise<readonly FragmentRef[]> {
    const found: FragmentRef[] = [];
    for (const chunk of this.splitter.split(refs)) {
      const rows = await this.Vector.findAll({
        attributes: ['ownerId', 'fragmentId'],
        where: { [Op.or]: chunk.map((r) => ({ ownerId: r.ownerId, fragmentId: r.fragmentId })) },
      });
      for (const row of rows) {
        found.push({ ownerId: row.get('ownerId'), fragmentId: row.get('fragmentId') });
      }
    }
    return found;
  }

  async count(): Promise<number> {
    return this.Vector.count();
  }

  /** Stored vector for a reference, or `null`. */
  async getVector(ref: FragmentRef): Promise<number[] | null> {
    const row = await this.Vector.findOne({ where: { ownerId: ref.ownerId, fragmentId: ref.fragmentId } });
    if (!row) return null;
    return vectorSchema.parse(parseJson(row.get('vector')));
  }
}
