/**
 * Connection capability contract.
 *
 * Local and remote transports both implement `ComfyConnection`; callers pick
 * one at construction time and the rest of the client never learns which.
 */

import { GraphSnapshot } from '../serialization/snapshot';

/** Opaque handle for one submitted job. */
export interface JobHandle {
  /** Server-assigned job (prompt) id. */
  readonly id: string;
  /** Client id the job was submitted under. */
  readonly clientId: string;
  /** Position number the server assigned on submission. */
  readonly queueNumber?: number;
  readonly submittedAt: string;
}

/** Where an artifact lives on the server. */
export interface ArtifactRef {
  filename: string;
  subfolder: string;
  /** Server folder kind, e.g. "output" or "temp". */
  folder: string;
  /** Output list the file came from, e.g. "images" or "gifs". */
  outputKey: string;
}

/** Server-reported failure of a job. */
export interface JobFailure {
  reason: string;
  nodeId?: number;
  nodeType?: string;
  exceptionType?: string;
  traceback?: string[];
}

/** Normalized progress events, one union across transports. */
export type ProgressEvent =
  | { type: 'queued'; jobId: string; position?: number }
  | { type: 'running'; jobId: string }
  | { type: 'executing'; jobId: string; nodeId: number }
  | { type: 'progress'; jobId: string; nodeId?: number; value: number; max: number }
  | { type: 'cached'; jobId: string; nodeIds: number[] }
  | { type: 'artifact'; jobId: string; nodeId: number; slot: number; ref: ArtifactRef }
  | { type: 'succeeded'; jobId: string }
  | { type: 'failed'; jobId: string; failure: JobFailure }
  | { type: 'cancelled'; jobId: string }
  | { type: 'unknown'; jobId: string; kind: string; raw: unknown };

export type ProgressEventType = ProgressEvent['type'];

/**
 * Ordered event channel for one job. Iteration ends after the job's terminal
 * event, or throws TransportError when the underlying connection drops.
 */
export interface ProgressStream extends AsyncIterable<ProgressEvent> {
  /** Stop delivering events and release the channel. */
  close(): void;
  readonly closed: boolean;
}

export interface ComfyConnection {
  /** Submit a snapshot. At most one server-side job per call; never retried. */
  submit(snapshot: GraphSnapshot): Promise<JobHandle>;
  /** The job's event channel. Single consumer; repeated calls return the same stream. */
  openProgress(handle: JobHandle): ProgressStream;
  /** Fetch an artifact's bytes. Idempotent and safe to retry. */
  fetchArtifact(ref: ArtifactRef): Promise<Uint8Array>;
  /** Ask the server to cancel. Acknowledgement arrives on the progress stream. */
  cancel(handle: JobHandle): Promise<void>;
  /** Close sockets and release any acquired worker. */
  close(): Promise<void>;
}
