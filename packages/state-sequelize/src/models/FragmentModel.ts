import { DataTypes } from 'sequelize';
import type { Sequelize, ModelStatic, Model } from 'sequelize';

export interface FragmentRow {
  ownerId: number;
  fragmentId: number;
  text: string;
}

export type FragmentModel = ModelStatic<Model<FragmentRow>>;

export const FRAGMENT_MODEL_NAME = 'EmbeddingFragment';

export function defineFragmentModel(sequelize: Sequelize): FragmentModel {
  return sequelize.define<Model<FragmentRow>>(
    FRAGMENT_MODEL_NAME,
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
      text: {
        type: DataTypes.TEXT,
        allowNull: false,
      },
    },
    {
      tableName: 'embedding_fragments',
      timestamps: false,
    },
  );
}
