// Main entry point
export { EmbeddingBatcher } from './EmbeddingBatcher.js';
export type { EmbeddingBatcherConfig } from './EmbeddingBatcher.js';

// Configuration
export { embeddingSettingsSchema, resolveSettings } from './config/EmbeddingSettings.js';
export type { EmbeddingSettings, EmbeddingSettingsInput } from './config/EmbeddingSettings.js';

// Domain model
export type { Fragment, FragmentRef } from './domain/model/FragmentRef.js';
export { fragmentKey, toCorrelationId, parseCorrelationId, uniqueRefs } from './domain/model/FragmentRef.js';
export { FileStatus } from './domain/model/FileStatus.js';
export {
  JobStatus,
  ACTIVE_JOB_STATUSES,
  TERMINAL_JOB_STATUSES,
  canTransitionJob,
  isActiveJobStatus,
  isTerminalJobStatus,
  isFailureJobStatus,
  isJobStatus,
} from './domain/model/JobStatus.js';
export type { UploadedFile } from './domain/model/UploadedFile.js';
export type { BatchJob, JobMetadataInput, JobReplacement } from './domain/model/BatchJob.js';
export type { FragmentBatch, UploadedFileHandle, CompletedJobHandle } from './domain/model/PipelineItem.js';
export type { FragmentEmbedding, ResultFailure } from './domain/model/Embedding.js';

// Domain services
export { BatchSplitter } from './domain/services/BatchSplitter.js';
export { EMBEDDINGS_ENDPOINT, buildRequestPayloads, toRequestLine } from './domain/services/RequestFormatter.js';
export type { RequestFormatOptions, EmbeddingRequestLine } from './domain/services/RequestFormatter.js';
export { parseResultContent } from './domain/services/ResultParser.js';
export type { ParsedResults } from './domain/services/ResultParser.js';
export { rewritePayloadModel, combinePayloads } from './domain/services/PayloadRewriter.js';
export type { RewrittenPayload } from './domain/services/PayloadRewriter.js';

// Ports (for custom implementations)
export type { RemoteJobClient, FilePollResult, JobPollResult } from './domain/ports/RemoteJobClient.js';
export type { BatchLifecycleStore } from './domain/ports/BatchLifecycleStore.js';
export type { VectorStore } from './domain/ports/VectorStore.js';

// Pipeline machinery (for custom stages and pipelines)
export { EventBus } from './application/EventBus.js';
export { PipelineStateError, PipelineErrorCode, errorMessage } from './application/errors.js';
export { WorkQueue } from './application/WorkQueue.js';
export { Semaphore } from './application/Semaphore.js';
export { PipelineStage } from './application/PipelineStage.js';
export type {
  StageProcessor,
  StageContext,
  StageStatus,
  StageInput,
  RunnableStage,
  ShutdownNotifier,
  PipelineStageOptions,
} from './application/PipelineStage.js';
export { Pipeline } from './application/Pipeline.js';
export type { PipelineStatus } from './application/Pipeline.js';
export { pollUntil, pollFileUntilSettled, pollJobUntilTerminal } from './application/polling.js';
export type { PollOptions, PollTarget } from './application/polling.js';
export type { EmbeddingContext } from './application/EmbeddingContext.js';
export { EmbeddingDriver } from './application/EmbeddingDriver.js';
export type { RunSummary } from './application/EmbeddingDriver.js';
export { RetryCoordinator } from './application/RetryCoordinator.js';
export type { RetryOptions, RetryOutcome, RetrySummary } from './application/RetryCoordinator.js';
export { buildLifecycleReport } from './application/LifecycleReport.js';
export type { LifecycleReport } from './application/LifecycleReport.js';

// Concrete stages
export { UPLOAD_STAGE, UploadProcessor } from './application/stages/UploadStage.js';
export { FILE_READINESS_POLL_STAGE, FileReadinessPollProcessor } from './application/stages/FileReadinessPollStage.js';
export { JOB_CREATION_STAGE, JobCreationProcessor } from './application/stages/JobCreationStage.js';
export { JOB_COMPLETION_POLL_STAGE, JobCompletionPollProcessor } from './application/stages/JobCompletionPollStage.js';
export { RESULT_INGESTION_STAGE, ResultIngestionProcessor } from './application/stages/ResultIngestionStage.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  PipelineStartedEvent,
  PipelineShutdownEvent,
  ItemRejectedEvent,
  FileUploadedEvent,
  FileReadyEvent,
  FileFailedEvent,
  JobCreatedEvent,
  JobStatusEvent,
  JobCompletedEvent,
  JobFailedEvent,
  JobProcessedEvent,
  JobVerificationFailedEvent,
  RetrySubmittedEvent,
  WindowDrainedEvent,
} from './domain/events/DomainEvents.js';

// Infrastructure adapters
export { createLogger, defaultLogger } from './infrastructure/logging/logger.js';
export type { LoggerOptions } from './infrastructure/logging/logger.js';
export { sleep } from './infrastructure/time/sleep.js';
export type { Sleep } from './infrastructure/time/sleep.js';
export { InMemoryLifecycleStore } from './infrastructure/state/InMemoryLifecycleStore.js';
export { InMemoryVectorStore } from './infrastructure/state/InMemoryVectorStore.js';
