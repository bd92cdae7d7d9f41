import { DataTypes } from 'sequelize';
import type { Sequelize, ModelStatic, Model } from 'sequelize';

export interface VectorRow {
  ownerId: number;
  fragmentId: number;
  vector: unknown;
  updatedAt: number | string;
}

export type VectorModel = ModelStatic<Model<VectorRow> & VectorRow>;

export function defineVectorModel(sequelize: Sequelize, tableName = 'embedding_vectors'): VectorModel {
  return sequelize.define<Model<VectorRow> & VectorRow>(
    'EmbeddingVector',
    {
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
      vector: {
        type: DataTypes.JSON,
        allowNull: false,
      },
      updatedAt: {
        type: DataTypes.BIGINT,
        allowNull: false,
      },
    },
    {
      tableName,
      timestamps: false,
    },
  );
}
