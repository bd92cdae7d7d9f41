/**
 * Finite state machine for the batch job lifecycle.
 *
 * Valid transitions:
 * - `validating` → `in_progress` | `finalizing` | `cancelling` | any terminal state
 * - `in_progress` → `finalizing` | `cancelling` | any terminal state
 * - `finalizing` → `cancelling` | any terminal state
 * - `cancelling` → any terminal state
 * - `failed` | `expired` | `cancelled` | `error` → `superseded`
 * - `completed`, `superseded` → (final)
 *
 * Re-applying the current status is always allowed, so repeated polls are idempotent.
 */
export const JobStatus = {
  VALIDATING: 'validating',
  IN_PROGRESS: 'in_progress',
  FINALIZING: 'finalizing',
  CANCELLING: 'cancelling',
  COMPLETED: 'completed',
  FAILED: 'failed',
  EXPIRED: 'expired',
  CANCELLED: 'cancelled',
  ERROR: 'error',
  SUPERSEDED: 'superseded',
} as const;

export type JobStatus = (typeof JobStatus)[keyof typeof JobStatus];

/** Statuses the remote API may still move away from. */
export const ACTIVE_JOB_STATUSES: readonly JobStatus[] = [
  JobStatus.VALIDATING,
  JobStatus.IN_PROGRESS,
  JobStatus.FINALIZING,
  JobStatus.CANCELLING,
];

/** Statuses after which the remote API guarantees no further transition. */
export const TERMINAL_JOB_STATUSES: readonly JobStatus[] = [
  JobStatus.COMPLETED,
  JobStatus.FAILED,
  JobStatus.EXPIRED,
  JobStatus.CANCELLED,
  JobStatus.ERROR,
];

const REMOTE_TERMINAL = TERMINAL_JOB_STATUSES;
const FAILURE_TERMINAL: readonly JobStatus[] = [
  JobStatus.FAILED,
  JobStatus.EXPIRED,
  JobStatus.CANCELLED,
  JobStatus.ERROR,
];

const VALID_TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  [JobStatus.VALIDATING]: [JobStatus.IN_PROGRESS, JobStatus.FINALIZING, JobStatus.CANCELLING, ...REMOTE_TERMINAL],
  [JobStatus.IN_PROGRESS]: [JobStatus.FINALIZING, JobStatus.CANCELLING, ...REMOTE_TERMINAL],
  [JobStatus.FINALIZING]: [JobStatus.CANCELLING, ...REMOTE_TERMINAL],
  [JobStatus.CANCELLING]: [...REMOTE_TERMINAL],
  [JobStatus.COMPLETED]: [],
  [JobStatus.FAILED]: [JobStatus.SUPERSEDED],
  [JobStatus.EXPIRED]: [JobStatus.SUPERSEDED],
  [JobStatus.CANCELLED]: [JobStatus.SUPERSEDED],
  [JobStatus.ERROR]: [JobStatus.SUPERSEDED],
  [JobStatus.SUPERSEDED]: [],
};

const KNOWN_STATUSES = new Set<string>(Object.values(JobStatus));

/** Check whether a status change respects the forward-only lifecycle. */
export function canTransitionJob(from: JobStatus, to: JobStatus): boolean {
  return from === to || VALID_TRANSITIONS[from].includes(to);
}

export function isTerminalJobStatus(status: JobStatus): boolean {
  return TERMINAL_JOB_STATUSES.includes(status);
}

export function isActiveJobStatus(status: JobStatus): boolean {
  return ACTIVE_JOB_STATUSES.includes(status);
}

/** A terminal state that means the job produced no usable output. */
export function isFailureJobStatus(status: JobStatus): boolean {
  return FAILURE_TERMINAL.includes(status);
}

export function isJobStatus(value: string): value is JobStatus {
  return KNOWN_STATUSES.has(value);
}
