import type { Logger } from 'pino';
import type { BatchLifecycleStore } from '../domain/ports/BatchLifecycleStore.js';
import type { RemoteJobClient } from '../domain/ports/RemoteJobClient.js';
import type { VectorStore } from '../domain/ports/VectorStore.js';
import type { EmbeddingSettings } from '../config/EmbeddingSettings.js';
import type { Sleep } from '../infrastructure/time/sleep.js';
import type { EventBus } from './EventBus.js';
import type { Semaphore } from './Semaphore.js';

/**
 * Collaborators shared by every stage, the driver and the retry coordinator.
 *
 * Built once per `EmbeddingBatcher` and passed by reference. Nothing in it is
 * mutated after construction.
 */
export interface EmbeddingContext {
  readonly client: RemoteJobClient;
  readonly store: BatchLifecycleStore;
  readonly vectorStore: VectorStore;
  readonly settings: EmbeddingSettings;
  readonly events: EventBus;
  readonly logger: Logger;
  readonly sleep: Sleep;
  /** Bounds file uploads and job creations in flight across all stages. */
  readonly submissionGate: Semaphore;
}
