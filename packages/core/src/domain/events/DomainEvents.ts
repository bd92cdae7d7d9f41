import type { JobStatus } from '../model/JobStatus.js';

/** Emitted when `Pipeline.start()` has started every stage. */
export interface PipelineStartedEvent {
  readonly type: 'pipeline:started';
  readonly stageNames: readonly string[];
  readonly timestamp: number;
}

/** Emitted once per shutdown triggered by a remote-reported failure. */
export interface PipelineShutdownEvent {
  readonly type: 'pipeline:shutdown';
  readonly reason: string;
  readonly timestamp: number;
}

/** Emitted when an item is dropped because it did not match a stage's input shape. */
export interface ItemRejectedEvent {
  readonly type: 'item:rejected';
  readonly stage: string;
  readonly error: string;
  readonly timestamp: number;
}

export interface FileUploadedEvent {
  readonly type: 'file:uploaded';
  readonly fileId: string;
  readonly fragmentCount: number;
  readonly timestamp: number;
}

export interface FileReadyEvent {
  readonly type: 'file:ready';
  readonly fileId: string;
  readonly timestamp: number;
}

export interface FileFailedEvent {
  readonly type: 'file:failed';
  readonly fileId: string;
  readonly timestamp: number;
}

export interface JobCreatedEvent {
  readonly type: 'job:created';
  readonly jobId: string;
  readonly fileId: string;
  readonly fragmentCount: number;
  readonly timestamp: number;
}

/** Emitted for every successful status poll. */
export interface JobStatusEvent {
  readonly type: 'job:status';
  readonly jobId: string;
  readonly status: JobStatus;
  readonly timestamp: number;
}

export interface JobCompletedEvent {
  readonly type: 'job:completed';
  readonly jobId: string;
  readonly resultFileId: string;
  readonly timestamp: number;
}

/** Emitted when a job ends in any terminal state other than `completed`. */
export interface JobFailedEvent {
  readonly type: 'job:failed';
  readonly jobId: string;
  readonly status: JobStatus;
  readonly timestamp: number;
}

/** Emitted after results were stored and every vector was confirmed by read-back. */
export interface JobProcessedEvent {
  readonly type: 'job:processed';
  readonly jobId: string;
  readonly embeddingCount: number;
  readonly failedCount: number;
  readonly timestamp: number;
}

/** Emitted when the read-back found fewer stored vectors than were written. */
export interface JobVerificationFailedEvent {
  readonly type: 'job:verification-failed';
  readonly jobId: string;
  readonly expected: number;
  readonly stored: number;
  readonly timestamp: number;
}

/** Emitted when a retry submitted a replacement job. */
export interface RetrySubmittedEvent {
  readonly type: 'retry:submitted';
  readonly jobId: string;
  readonly replaces: readonly string[];
  readonly combined: boolean;
  readonly timestamp: number;
}

/** Emitted by the driver once the pipeline drained a window. */
export interface WindowDrainedEvent {
  readonly type: 'window:drained';
  readonly windowIndex: number;
  readonly fragmentCount: number;
  readonly requestFileCount: number;
  readonly timestamp: number;
}

/** Discriminated union of all domain events. */
export type DomainEvent =
  | PipelineStartedEvent
  | PipelineShutdownEvent
  | ItemRejectedEvent
  | FileUploadedEvent
  | FileReadyEvent
  | FileFailedEvent
  | JobCreatedEvent
  | JobStatusEvent
  | JobCompletedEvent
  | JobFailedEvent
  | JobProcessedEvent
  | JobVerificationFailedEvent
  | RetrySubmittedEvent
  | WindowDrainedEvent;

/** String literal union of all event type names. */
export type EventType = DomainEvent['type'];

/** Extract the payload type for a specific event type. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
