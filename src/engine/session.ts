/**
 * Execution session: the client-side view of one submitted job.
 *
 * State changes come only from the job's progress stream. The session reads
 * the stream in a single consumer loop; every `wait()` shares that loop and
 * races it against its own deadline.
 */

import { ComfyConnection, JobFailure, JobHandle, ProgressEvent, ProgressStream } from '../connection/types';
import { GraphSnapshot } from '../serialization/snapshot';
import { JobStatus } from '../domain/job';
import { errorMessage, sessionTimeoutError, transportError } from '../domain/errors';
import { Logger, logger } from '../logger';
import { isTerminalJobStatus, statusForEvent, transitionJobStatus } from './state-machine';
import { Artifact, ResultCollection, RunResult } from './results';

export interface WaitOptions {
  /** Give up after this many ms: the job is cancelled and `TimeoutError` thrown. */
  timeoutMs?: number;
  /** Aborting stops waiting, cancels the job and resolves as cancelled. */
  signal?: AbortSignal;
  /** Called with every event this wait observes. */
  onEvent?: (event: ProgressEvent) => void;
}

export interface SessionOptions {
  /** Deadline used when `wait()` is given none. Unset means no deadline. */
  defaultTimeoutMs?: number;
  /**
   * How long a timed-out or aborted wait gives the cancel request before it
   * returns anyway. The request keeps running in the background.
   */
  cancelGraceMs?: number;
}

export const DEFAULT_CANCEL_GRACE_MS = 2_000;

/** Latest numeric progress reported by the server. */
export interface NodeProgress {
  nodeId?: number;
  value: number;
  max: number;
}

type WaitOutcome = 'settled' | 'timeout' | 'aborted';

export class ExecutionSession {
  readonly handle: JobHandle;
  readonly snapshot: GraphSnapshot;

  private statusValue = JobStatus.Submitted;
  private eventCount = 0;
  private failureValue: JobFailure | undefined;
  private currentNode: number | undefined;
  private lastProgress: NodeProgress | undefined;
  private readonly artifacts: Artifact[] = [];
  private readonly listeners = new Set<(event: ProgressEvent) => void>();
  private consumer: Promise<void> | undefined;
  private collection: ResultCollection | undefined;
  private readonly log: Logger;

  constructor(
    private readonly connection: ComfyConnection,
    handle: JobHandle,
    snapshot: GraphSnapshot,
    private readonly stream: ProgressStream,
    private readonly options: SessionOptions = {},
  ) {
    this.handle = handle;
    this.snapshot = snapshot;
    this.log = logger.child({ module: 'session', jobId: handle.id });
  }

  get jobId(): string {
    return this.handle.id;
  }

  get status(): JobStatus {
    return this.statusValue;
  }

  get done(): boolean {
    return isTerminalJobStatus(this.statusValue);
  }

  /** Number of events applied so far. Never decreases. */
  get progress(): number {
    return this.eventCount;
  }

  get failure(): JobFailure | undefined {
    return this.failureValue;
  }

  /** Node the server reported as executing most recently. */
  get executingNode(): number | undefined {
    return this.currentNode;
  }

  get nodeProgress(): NodeProgress | undefined {
    return this.lastProgress;
  }

  /**
   * Artifacts of the job. Empty until the job has succeeded, and for jobs that
   * did not succeed.
   */
  get results(): ResultCollection {
    if (this.statusValue !== JobStatus.Succeeded) return ResultCollection.empty();
    if (!this.collection) {
      this.collection = new ResultCollection(this.artifacts, this.snapshot.nodeOrder);
    }
    return this.collection;
  }

  /** Await a terminal state. */
  async wait(options: WaitOptions = {}): Promise<RunResult> {
    const { onEvent, signal } = options;
    const timeoutMs = options.timeoutMs ?? this.options.defaultTimeoutMs;
    if (onEvent) this.listeners.add(onEvent);
    try {
      if (!this.done) {
        const outcome = await this.raceDeadline(this.settle(), timeoutMs, signal);
        if (outcome === 'timeout') {
          await this.abandon(`timed out after ${timeoutMs}ms`);
          throw sessionTimeoutError(this.jobId, timeoutMs ?? 0);
        }
        if (outcome === 'aborted') {
          await this.abandon('aborted by caller');
        }
      }
      return this.result();
    } finally {
      if (onEvent) this.listeners.delete(onEvent);
    }
  }

  /**
   * Ask the server to cancel. The status changes when the server acknowledges
   * on the progress stream. No-op once the job is terminal.
   */
  async cancel(): Promise<void> {
    if (this.done) return;
    this.log.info('Cancelling job');
    await this.connection.cancel(this.handle);
  }

  result(): RunResult {
    return {
      jobId: this.jobId,
      status: this.statusValue,
      failure: this.failureValue,
      artifacts: this.results,
    };
  }

  private settle(): Promise<void> {
    if (!this.consumer) this.consumer = this.consume();
    return this.consumer;
  }

  private async consume(): Promise<void> {
    try {
      for await (const event of this.stream) {
        this.apply(event);
        if (this.done) return;
      }
    } finally {
      this.stream.close();
    }
    if (!this.done) {
      throw transportError(`Progress stream for job ${this.jobId} ended before the job finished`, {
        code: 'TRANSPORT.STREAM_ENDED',
        jobId: this.jobId,
      });
    }
  }

  private apply(event: ProgressEvent): void {
    if (event.jobId !== this.jobId) {
      this.log.warn('Ignoring event for another job', { eventJobId: event.jobId, type: event.type });
      return;
    }
    this.eventCount++;
    this.notify(event);

    switch (event.type) {
      case 'executing':
        this.currentNode = event.nodeId;
        break;
      case 'progress':
        this.lastProgress = { nodeId: event.nodeId, value: event.value, max: event.max };
        break;
      case 'artifact':
        if (!this.done) {
          this.artifacts.push(
            new Artifact(event, (ref) => this.connection.fetchArtifact(ref)),
          );
        }
        break;
      case 'unknown':
        this.log.debug('Ignoring unrecognized event', { kind: event.kind });
        return;
      default:
        break;
    }

    const target = statusForEvent(event);
    if (!target || target === this.statusValue) return;

    const transition = transitionJobStatus(this.statusValue, target);
    if (!transition.success) {
      this.log.debug('Ignoring event that would be an invalid transition', {
        type: event.type,
        error: transition.error?.message,
      });
      return;
    }
    this.statusValue = target;
    if (event.type === 'failed') this.failureValue = event.failure;
    this.log.info('Job status changed', { status: target });
  }

  private notify(event: ProgressEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        this.log.warn('Event listener threw', { error: errorMessage(err) });
      }
    }
  }

  /**
   * Stop tracking a job the caller no longer waits for. The session is
   * cancelled locally at once; the server's answer is awaited only up to the
   * grace period.
   */
  private async abandon(reason: string): Promise<void> {
    if (this.done) return;
    this.log.warn('Abandoning job', { reason });
    this.statusValue = JobStatus.Cancelled;

    const graceMs = this.options.cancelGraceMs ?? DEFAULT_CANCEL_GRACE_MS;
    const request = this.connection.cancel(this.handle).then(
      () => 'sent' as const,
      (err: unknown) => {
        this.log.warn('Cancel request failed', { error: errorMessage(err) });
        return 'failed' as const;
      },
    );
    let timer: ReturnType<typeof setTimeout> | undefined;
    const grace = new Promise<'pending'>((resolve) => {
      timer = setTimeout(() => resolve('pending'), graceMs);
    });
    try {
      if ((await Promise.race([request, grace])) === 'pending') {
        this.log.warn('Cancel request still pending, not waiting for it', { graceMs });
      }
    } finally {
      if (timer) clearTimeout(timer);
      this.stream.close();
    }
  }

  private raceDeadline(
    work: Promise<void>,
    timeoutMs: number | undefined,
    signal: AbortSignal | undefined,
  ): Promise<WaitOutcome> {
    return new Promise<WaitOutcome>((resolve, reject) => {
      if (signal?.aborted) {
        resolve('aborted');
        return;
      }
      const timer = timeoutMs !== undefined && Number.isFinite(timeoutMs) && timeoutMs >= 0
        ? setTimeout(() => finish(() => resolve('timeout')), timeoutMs)
        : undefined;
      const onAbort = () => finish(() => resolve('aborted'));
      const finish = (settle: () => void) => {
        if (timer) clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        settle();
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      work
        .then(() => finish(() => resolve('settled')))
        .catch((err: unknown) => finish(() => reject(err)));
    });
  }
}
