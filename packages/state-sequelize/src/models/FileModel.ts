import { DataTypes } from 'sequelize';
import type { Sequelize, ModelStatic, Model } from 'sequelize';

export interface FileRow {
  fileId: string;
  fragmentRefs: unknown;
  status: string;
  createdAt: number | string;
  updatedAt: number | string;
}

export type FileModel = ModelStatic<Model<FileRow>>;

export function defineFileModel(sequelize: Sequelize): FileModel {
  return sequelize.define<Model<FileRow>>(
    'EmbeddingFile',
    {
      fileId: {
        type: DataTypes.STRING(128),
        primaryKey: true,
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
      createdAt: {
        type: DataTypes.BIGINT,
        allowNull: false,
      },
      updatedAt: {
        type: DataTypes.BIGINT,
        allowNull: false,
      },
    },
    {
      tableName: 'embedding_files',
      timestamps: false,
    },
  );
}
