import { describe, it, expect } from 'vitest';
import {
  canTransitionJob,
  isActiveJobStatus,
  isFailureJobStatus,
  isJobStatus,
  isTerminalJobStatus,
} from '../../../src/domain/model/JobStatus.js';

describe('JobStatus', () => {
  it('should allow forward transitions reported by polling', () => {
    expect(canTransitionJob('validating', 'in_progress')).toBe(true);
    expect(canTransitionJob('in_progress', 'finalizing')).toBe(true);
    expect(canTransitionJob('finalizing', 'completed')).toBe(true);
    expect(canTransitionJob('validating', 'failed')).toBe(true);
    expect(canTransitionJob('in_progress', 'expired')).toBe(true);
  });

  it('should reject backward transitions', () => {
    expect(canTransitionJob('in_progress', 'validating')).toBe(false);
    expect(canTransitionJob('completed', 'in_progress')).toBe(false);
    expect(canTransitionJob('failed', 'in_progress')).toBe(false);
  });

  it('should allow re-applying the current status', () => {
    expect(canTransitionJob('in_progress', 'in_progress')).toBe(true);
    expect(canTransitionJob('completed', 'completed')).toBe(true);
  });

  it('should only supersede jobs that ended in failure', () => {
    expect(canTransitionJob('failed', 'superseded')).toBe(true);
    expect(canTransitionJob('expired', 'superseded')).toBe(true);
    expect(canTransitionJob('completed', 'superseded')).toBe(false);
    expect(canTransitionJob('in_progress', 'superseded')).toBe(false);
    expect(canTransitionJob('superseded', 'failed')).toBe(false);
  });

  it('should classify statuses', () => {
    expect(isTerminalJobStatus('completed')).toBe(true);
    expect(isTerminalJobStatus('error')).toBe(true);
    expect(isTerminalJobStatus('cancelling')).toBe(false);
    expect(isTerminalJobStatus('superseded')).toBe(false);
    expect(isActiveJobStatus('finalizing')).toBe(true);
    expect(isActiveJobStatus('completed')).toBe(false);
    expect(isFailureJobStatus('cancelled')).toBe(true);
    expect(isFailureJobStatus('completed')).toBe(false);
  });

  it('should recognise known status strings only', () => {
    expect(isJobStatus('in_progress')).toBe(true);
    expect(isJobStatus('IN_PROGRESS')).toBe(false);
    expect(isJobStatus('unknown')).toBe(false);
  });
});
