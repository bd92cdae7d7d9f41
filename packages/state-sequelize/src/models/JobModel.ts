import { DataTypes } from 'sequelize';
import type { Sequelize, ModelStatic, Model } from 'sequelize';

export interface JobRow {
  jobId: string;
  fileId: string;
  fragmentRefs: unknown;
  status: string;
  processed: boolean | number;
  createdAt: number | string;
  completedAt: number | string | null;
  processedAt: number | string | null;
  resultFileId: string | null;
  retryOf: string | null;
  supersededBy: string | null;
  combinedBatch: boolean | number;
  combinedFrom: unknown;
  combinedFromFileIds: unknown;
  previousJobIds: unknown;
  previousFileIds: unknown;
  retryCount: number;
}

export type JobModel = ModelStatic<Model<JobRow> & JobRow>;

export const JOBS_TABLE = 'embedding_jobs';

export function defineJobModel(sequelize: Sequelize): JobModel {
  return sequelize.define<Model<JobRow> & JobRow>(
    'EmbeddingJob',
    {
      jobId: {
        type: DataTypes.STRING(128),
        primaryKey: true,
        allowNull: false,
      },
      fileId: {
        type: DataTypes.STRING(128),
        allowNull: false,
      },
      fragmentRefs: {
        type: DataTypes.JSON,
        allowNull: false,
        defaultValue: [],
      },
      status: {
        type: DataTypes.STRING(20),
        allowNull: false,
      },
      processed: {
        type: DataTypes.BOOLEAN,
        allowNull: false,
        defaultValue: false,
      },
      createdAt: {
        type: DataTypes.BIGINT,
        allowNull: false,
      },
      completedAt: {
        type: DataTypes.BIGINT,
        allowNull: true,
      },
      processedAt: {
        type: DataTypes.BIGINT,
        allowNull: true,
      },
      resultFileId: {
        type: DataTypes.STRING(128),
        allowNull: true,
      },
      retryOf: {
        type: DataTypes.STRING(128),
        allowNull: true,
      },
      supersededBy: {
        type: DataTypes.STRING(128),
        allowNull: true,
      },
      combinedBatch: {
        type: DataTypes.BOOLEAN,
        allowNull: false,
        defaultValue: false,
      },
      combinedFrom: {
        type: DataTypes.JSON,
        allowNull: true,
      },
      combinedFromFileIds: {
        type: DataTypes.JSON,
        allowNull: true,
      },
      previousJobIds: {
        type: DataTypes.JSON,
        allowNull: true,
      },
      previousFileIds: {
        type: DataTypes.JSON,
        allowNull: true,
      },
      retryCount: {
        type: DataTypes.INTEGER,
        allowNull: false,
        defaultValue: 0,
      },
    },
    {
      tableName: JOBS_TABLE,
      timestamps: false,
      indexes: [{ fields: ['status'] }],
    },
  );
}
