export { SequelizeLifecycleStore } from './SequelizeLifecycleStore.js';
export { SequelizeVectorStore } from './SequelizeVectorStore.js';
export type { SequelizeVectorStoreOptions } from './SequelizeVectorStore.js';
