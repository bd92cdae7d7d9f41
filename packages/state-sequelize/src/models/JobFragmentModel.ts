import { DataTypes } from 'sequelize';
import type { Sequelize, ModelStatic, Model } from 'sequelize';

/** Membership of a fragment in a job, kept beside the job row so unclaimed fragments can be found in SQL. */
export interface JobFragmentRow {
  jobId: string;
  ownerId: number;
  fragmentId: number;
}

export type JobFragmentModel = ModelStatic<Model<JobFragmentRow>>;

export const JOB_FRAGMENTS_TABLE = 'embedding_job_fragments';

export function defineJobFragmentModel(sequelize: Sequelize): JobFragmentModel {
  return sequelize.define<Model<JobFragmentRow>>(
    'EmbeddingJobFragment',
    {
      jobId: {
        type: DataTypes.STRING(128),
        primaryKey: true,
        allowNull: false,
      },
      ownerId: {
        type: DataTypes.INTEGER,
        primaryKey: true,
        allowNull: false,
      },
      fragmentId: {
        type: DataTypes.INTEGER,
        primaryKey: true,
        allowNull: false,
      },
    },
    {
      tableName: JOB_FRAGMENTS_TABLE,
      timestamps: false,
      indexes: [{ fields: ['ownerId', 'fragmentId'] }],
    },
  );
}
