/**
 * Result collection.
 *
 * Artifacts are ordered by the producing node's position in the submitted
 * snapshot, then by output slot, regardless of the order the server finished
 * them in. Payloads are downloaded on first access and cached; concurrent
 * first accesses share one download.
 */

import { ArtifactRef, JobFailure } from '../connection/types';
import { JobStatus } from '../domain/job';
import { UNKNOWN_MEDIA_TYPE, mediaTypeFromFilename, sniffMediaType } from './media-types';

export type ArtifactFetcher = (ref: ArtifactRef) => Promise<Uint8Array>;

export interface ArtifactInit {
  nodeId: number;
  slot: number;
  ref: ArtifactRef;
}

/** One output file of a job. */
export class Artifact {
  readonly nodeId: number;
  /** Position in the producing node's output list. */
  readonly slot: number;
  readonly ref: Readonly<ArtifactRef>;

  private payload: Promise<Uint8Array> | undefined;
  private sniffedType: string | undefined;

  constructor(init: ArtifactInit, private readonly fetcher: ArtifactFetcher) {
    this.nodeId = init.nodeId;
    this.slot = init.slot;
    this.ref = Object.freeze({ ...init.ref });
  }

  get filename(): string {
    return this.ref.filename;
  }

  /**
   * Media type from the file extension. Unknown extensions fall back to the
   * payload's magic bytes once it has been fetched.
   */
  get mediaType(): string {
    const fromName = mediaTypeFromFilename(this.ref.filename);
    if (fromName !== UNKNOWN_MEDIA_TYPE) return fromName;
    return this.sniffedType ?? UNKNOWN_MEDIA_TYPE;
  }

  /** The payload. Fetched on first call; a failed fetch is not cached. */
  bytes(): Promise<Uint8Array> {
    if (!this.payload) {
      this.payload = this.fetcher(this.ref).then(
        (bytes) => {
          this.sniffedType = sniffMediaType(bytes);
          return bytes;
        },
        (err: unknown) => {
          this.payload = undefined;
          throw err;
        },
      );
    }
    return this.payload;
  }
}

/** Ordered, read-only artifacts of one job. */
export class ResultCollection implements Iterable<Artifact> {
  private readonly items: readonly Artifact[];

  /**
   * @param nodeOrder - node ids in the submitted snapshot's declaration order
   */
  constructor(artifacts: Iterable<Artifact>, nodeOrder: readonly number[]) {
    const position = new Map(nodeOrder.map((id, index) => [id, index]));
    const rank = (artifact: Artifact) => position.get(artifact.nodeId) ?? Number.MAX_SAFE_INTEGER;
    this.items = Object.freeze(
      [...artifacts].sort(
        (a, b) => rank(a) - rank(b) || a.nodeId - b.nodeId || a.slot - b.slot,
      ),
    );
  }

  static empty(): ResultCollection {
    return new ResultCollection([], []);
  }

  get length(): number {
    return this.items.length;
  }

  /** Artifact at `index`; negative indices count from the end. */
  at(index: number): Artifact | undefined {
    return this.items.at(index);
  }

  /** Artifacts produced by one node, in slot order. */
  byNode(nodeId: number): Artifact[] {
    return this.items.filter((artifact) => artifact.nodeId === nodeId);
  }

  toArray(): Artifact[] {
    return [...this.items];
  }

  /** Fetch every payload, in collection order. */
  bytes(): Promise<Uint8Array[]> {
    return Promise.all(this.items.map((artifact) => artifact.bytes()));
  }

  [Symbol.iterator](): Iterator<Artifact> {
    return this.items[Symbol.iterator]();
  }
}

/** Outcome of a finished job. */
export interface RunResult {
  jobId: string;
  status: JobStatus;
  /** Present when the job failed. */
  failure?: JobFailure;
  /** Empty unless the job succeeded. */
  artifacts: ResultCollection;
}
