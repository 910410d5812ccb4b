/**
 * Job lifecycle.
 *
 * A job is one server-side execution of a submitted graph snapshot. Its
 * status only moves forward; a server may omit a phase (a fully cached graph
 * never reports running), so forward skips are valid.
 */

/** Job lifecycle states. */
export enum JobStatus {
  Submitted = 'submitted',
  Queued = 'queued',
  Running = 'running',
  Succeeded = 'succeeded',
  Failed = 'failed',
  Cancelled = 'cancelled',
}

/** Valid state transitions for jobs. */
export const VALID_JOB_TRANSITIONS: Record<JobStatus, JobStatus[]> = {
  [JobStatus.Submitted]: [
    JobStatus.Queued,
    JobStatus.Running,
    JobStatus.Succeeded,
    JobStatus.Failed,
    JobStatus.Cancelled,
  ],
  [JobStatus.Queued]: [JobStatus.Running, JobStatus.Succeeded, JobStatus.Failed, JobStatus.Cancelled],
  [JobStatus.Running]: [JobStatus.Succeeded, JobStatus.Failed, JobStatus.Cancelled],
  [JobStatus.Succeeded]: [],
  [JobStatus.Failed]: [],
  [JobStatus.Cancelled]: [],
};
