import { Sequelize } from 'sequelize';
import type { Logger } from 'pino';
import type { BatchLifecycleStore, RemoteJobClient, VectorStore } from '@embedbatch/core';
import { createOpenAIJobClient } from '@embedbatch/openai';
import { SequelizeLifecycleStore, SequelizeVectorStore } from '@embedbatch/state-sequelize';
import type { CliConfig } from './config.js';
import { requireApiKey } from './config.js';

/** Stores opened for one command, released by `close()`. */
export interface Storage {
  readonly store: BatchLifecycleStore;
  readonly vectorStore: VectorStore;
  close(): Promise<void>;
}

/** Constructs the adapters a command needs. Tests replace these with in-process fakes. */
export interface CliServices {
  openStorage(config: CliConfig, logger: Logger): Promise<Storage>;
  createClient(config: CliConfig, logger: Logger): RemoteJobClient;
}

export const defaultServices: CliServices = {
  async openStorage(config, logger) {
    const sequelize = new Sequelize(config.databaseUrl, {
      logging: (sql: string) => logger.trace({ sql }, 'SQL'),
    });
    const store = new SequelizeLifecycleStore(sequelize);
    const vectorStore = new SequelizeVectorStore(sequelize);
    try {
      await store.initialize();
      await vectorStore.initialize();
    } catch (error) {
      await sequelize.close();
      throw error;
    }
    return { store, vectorStore, close: () => sequelize.close() };
  },

  createClient(config, logger) {
    return createOpenAIJobClient({
      apiKey: requireApiKey(config),
      ...(config.openaiBaseUrl !== undefined ? { baseURL: config.openaiBaseUrl } : {}),
      logger,
    });
  },
};
