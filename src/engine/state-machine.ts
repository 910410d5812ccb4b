/**
 * Job state machine.
 *
 * Enforces valid job state transitions and maps progress events onto the
 * states they imply.
 */

import { JobStatus, VALID_JOB_TRANSITIONS } from '../domain/job';
import { TypedError, createTypedError } from '../domain/errors';
import { ProgressEvent } from '../connection/types';

/** Result of a state transition attempt. */
export interface TransitionResult<S> {
  success: boolean;
  newStatus?: S;
  error?: TypedError;
}

/** Attempt a job state transition. */
export function transitionJobStatus(
  current: JobStatus,
  target: JobStatus,
): TransitionResult<JobStatus> {
  const validTargets = VALID_JOB_TRANSITIONS[current];
  if (!validTargets.includes(target)) {
    return {
      success: false,
      error: createTypedError({
        code: 'SESSION.INVALID_TRANSITION',
        message: `Invalid job state transition: ${current} -> ${target}`,
        retryable: false,
        details: { current, target, validTargets },
      }),
    };
  }
  return { success: true, newStatus: target };
}

/** Check if a job status is terminal. */
export function isTerminalJobStatus(status: JobStatus): boolean {
  return (
    status === JobStatus.Succeeded ||
    status === JobStatus.Failed ||
    status === JobStatus.Cancelled
  );
}

/** The status an event moves a job to, if it implies one. */
export function statusForEvent(event: ProgressEvent): JobStatus | undefined {
  switch (event.type) {
    case 'queued':
      return JobStatus.Queued;
    case 'running':
    case 'executing':
    case 'progress':
    case 'cached':
      return JobStatus.Running;
    case 'succeeded':
      return JobStatus.Succeeded;
    case 'failed':
      return JobStatus.Failed;
    case 'cancelled':
      return JobStatus.Cancelled;
    default:
      return undefined;
  }
}
