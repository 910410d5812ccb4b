/**
 * Local-server transport.
 *
 * Talks directly to a known server address: HTTP (via `fetch`) for
 * submission, artifact download, cancellation and server utilities, plus one
 * WebSocket per connection carrying execution events for every job submitted
 * under this connection's client id.
 *
 * Events are routed to per-job channels by job id. Events can arrive before
 * the submit response tells us the job id, so those are buffered (bounded)
 * and replayed when the job registers.
 *
 * Connection failures surface immediately as TransportError. Submissions are
 * never retried; artifact fetches are, because they are idempotent.
 */

import { v4 as uuid } from 'uuid';
import WebSocket from 'ws';
import { EventChannel } from './event-channel';
import {
  QueueStatus,
  SocketMessage,
  messageJobId,
  queueEntryIds,
  queueStatusSchema,
  socketMessageSchema,
  submitRejectionSchema,
  submitResponseSchema,
  toProgressEvents,
} from './protocol';
import { DEFAULT_FETCH_RETRY_POLICY, RetryPolicy, withRetries } from './retry';
import { ArtifactRef, ComfyConnection, JobHandle, ProgressEvent, ProgressStream } from './types';
import { GraphSnapshot } from '../serialization/snapshot';
import { WorkflowConverter } from '../serialization/files';
import { JsonObject } from '../graph/types';
import {
  SubmissionRejectedError,
  TransportError,
  createTypedError,
  errorMessage,
  maskSecretsInMessage,
  transportError,
} from '../domain/errors';
import { Logger, logger } from '../logger';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

/** The slice of a WebSocket the transport uses; `ws` satisfies it. */
export interface EventSocket {
  on(event: 'open', listener: () => void): unknown;
  on(event: 'message', listener: (data: unknown, isBinary: boolean) => void): unknown;
  on(event: 'close', listener: (code: number) => void): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
  close(): void;
}

export type SocketFactory = (url: string, headers: Record<string, string>) => EventSocket;

export const defaultSocketFactory: SocketFactory = (url, headers) => new WebSocket(url, { headers });

export interface LocalConnectionOptions {
  /** Server address, e.g. "http://127.0.0.1:8188". */
  baseUrl: string;
  /** Client id for event routing. Default: a fresh UUID. */
  clientId?: string;
  /** Extra headers on every request and on the socket handshake. */
  headers?: Record<string, string>;
  fetch?: FetchLike;
  socketFactory?: SocketFactory;
  /** Retry policy for artifact fetches. */
  fetchRetry?: Partial<RetryPolicy>;
  /** Cap on events buffered for a job id that has not registered yet. */
  maxBufferedEvents?: number;
  /** Values masked out of error messages (API keys, tokens). */
  secrets?: string[];
}

export const DEFAULT_MAX_BUFFERED_EVENTS = 256;
/** Distinct unclaimed job ids kept in the early-event buffer. */
const MAX_PENDING_JOBS = 64;

interface JobState {
  handle: JobHandle;
  channel: EventChannel;
  slots: Map<number, number>;
  finished: boolean;
}

export class LocalConnection implements ComfyConnection, WorkflowConverter {
  readonly baseUrl: string;
  readonly clientId: string;

  private readonly headers: Record<string, string>;
  private readonly fetchImpl: FetchLike;
  private readonly socketFactory: SocketFactory;
  private readonly retryPolicy: RetryPolicy;
  private readonly maxBufferedEvents: number;
  private readonly secrets: string[];
  private readonly log: Logger;

  private readonly jobs = new Map<string, JobState>();
  private readonly pending = new Map<string, SocketMessage[]>();
  private socket: EventSocket | undefined;
  private socketReady: Promise<void> | undefined;
  private closed = false;

  constructor(options: LocalConnectionOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.clientId = options.clientId ?? uuid();
    this.headers = { ...options.headers };
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.socketFactory = options.socketFactory ?? defaultSocketFactory;
    this.retryPolicy = { ...DEFAULT_FETCH_RETRY_POLICY, ...options.fetchRetry };
    this.maxBufferedEvents = options.maxBufferedEvents ?? DEFAULT_MAX_BUFFERED_EVENTS;
    this.secrets = options.secrets ?? [];
    this.log = logger.child({ module: 'local-connection', baseUrl: this.baseUrl, clientId: this.clientId });
  }

  async submit(snapshot: GraphSnapshot): Promise<JobHandle> {
    this.assertOpen();
    await this.ensureSocket();

    const res = await this.request('/prompt', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ prompt: snapshot.prompt, client_id: this.clientId }),
    });

    if (!res.ok) {
      const body = await this.readJson(res).catch(() => undefined);
      const rejection = submitRejectionSchema.safeParse(body);
      if (res.status === 400 && rejection.success) {
        const { error, node_errors: nodeErrors = {} } = rejection.data;
        const reason = typeof error === 'string' ? error : error?.message ?? 'Prompt rejected';
        throw new SubmissionRejectedError(
          createTypedError({
            code: 'TRANSPORT.REJECTED',
            message: this.mask(`Server rejected the workflow: ${reason}`),
            details: { statusCode: res.status, nodeErrors },
            suggestedFixes: [
              { type: 'FIX_NODE_INPUTS', params: { nodes: Object.keys(nodeErrors) } },
            ],
          }),
          nodeErrors,
          res.status,
        );
      }
      throw this.httpError('POST /prompt', res.status, body === undefined ? '' : JSON.stringify(body), false);
    }

    const parsed = submitResponseSchema.safeParse(await this.readJson(res));
    if (!parsed.success) {
      throw transportError('Submit response did not include a job id', { code: 'TRANSPORT.PROTOCOL' });
    }

    const handle: JobHandle = Object.freeze({
      id: parsed.data.prompt_id,
      clientId: this.clientId,
      queueNumber: parsed.data.number,
      submittedAt: new Date().toISOString(),
    });
    const job: JobState = {
      handle,
      channel: new EventChannel(() => this.jobs.delete(handle.id)),
      slots: new Map(),
      finished: false,
    };
    this.jobs.set(handle.id, job);
    this.log.info('Job submitted', { jobId: handle.id, queueNumber: handle.queueNumber });

    // The accepted submission is the server's queue acknowledgement.
    job.channel.push({ type: 'queued', jobId: handle.id, position: parsed.data.number });

    const early = this.pending.get(handle.id);
    if (early) {
      this.pending.delete(handle.id);
      for (const message of early) this.dispatch(job, message);
    }
    return handle;
  }

  /** Whether the job was submitted here and its progress stream is still open. */
  isTracking(jobId: string): boolean {
    return this.jobs.has(jobId);
  }

  openProgress(handle: JobHandle): ProgressStream {
    const job = this.jobs.get(handle.id);
    if (!job) {
      throw transportError(`No open event channel for job ${handle.id}`, { code: 'TRANSPORT.UNKNOWN_JOB', jobId: handle.id });
    }
    return job.channel;
  }

  async fetchArtifact(ref: ArtifactRef): Promise<Uint8Array> {
    this.assertOpen();
    const query = new URLSearchParams({ filename: ref.filename, subfolder: ref.subfolder, type: ref.folder });
    const path = `/view?${query.toString()}`;
    return withRetries(
      async () => {
        const res = await this.request(path, { method: 'GET' }, true);
        if (!res.ok) {
          const text = await res.text().catch(() => '');
          throw this.httpError(`GET /view`, res.status, text, true);
        }
        return new Uint8Array(await res.arrayBuffer());
      },
      this.retryPolicy,
      (err, attempt, delayMs) =>
        this.log.warn('Artifact fetch failed; retrying', { filename: ref.filename, attempt, delayMs, error: err.message }),
    );
  }

  /**
   * Cancel a job. A queued job is deleted from the queue and acknowledged
   * here; a running job is interrupted and acknowledged by the server's
   * interruption event. Jobs that are already finished are left alone.
   */
  async cancel(handle: JobHandle): Promise<void> {
    this.assertOpen();
    const job = this.jobs.get(handle.id);
    if (job?.finished) return;

    let queue = await this.getQueueStatus();
    if (queueEntryIds(queue.queue_pending).includes(handle.id)) {
      await this.postJson('/queue', { delete: [handle.id] });
      queue = await this.getQueueStatus();
      if (!queueEntryIds(queue.queue_running).includes(handle.id)) {
        // It may have started and finished between the two queue reads.
        if (await this.inHistory(handle.id)) {
          this.log.info('Job finished before it could be deleted', { jobId: handle.id });
          return;
        }
        this.log.info('Queued job deleted', { jobId: handle.id });
        if (job) this.dispatchEvent(job, { type: 'cancelled', jobId: handle.id });
        return;
      }
    }
    if (queueEntryIds(queue.queue_running).includes(handle.id)) {
      this.log.info('Interrupting running job', { jobId: handle.id });
      await this.postJson('/interrupt', { prompt_id: handle.id });
      return;
    }
    this.log.debug('Job not in queue; nothing to cancel', { jobId: handle.id });
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.failActiveJobs(transportError('Connection closed', { code: 'TRANSPORT.CLOSED' }));
    this.pending.clear();
    const socket = this.socket;
    this.socket = undefined;
    this.socketReady = undefined;
    socket?.close();
  }

  // --- Server utilities ---

  /** True when the server answers its stats endpoint. */
  async isAvailable(): Promise<boolean> {
    try {
      const res = await this.request('/system_stats', { method: 'GET' });
      return res.ok;
    } catch (err) {
      this.log.debug('Server not available', { error: errorMessage(err) });
      return false;
    }
  }

  async getSystemStats(): Promise<unknown> {
    return this.getJson('/system_stats');
  }

  async getQueueStatus(): Promise<QueueStatus> {
    const parsed = queueStatusSchema.safeParse(await this.getJson('/queue'));
    if (!parsed.success) {
      throw transportError('Queue status response was malformed', { code: 'TRANSPORT.PROTOCOL' });
    }
    return parsed.data;
  }

  /** Execution history, for one job or for all recent jobs. */
  async getHistory(jobId?: string): Promise<Record<string, unknown>> {
    const body = await this.getJson(jobId ? `/history/${encodeURIComponent(jobId)}` : '/history');
    if (typeof body !== 'object' || body === null || Array.isArray(body)) {
      throw transportError('History response was malformed', { code: 'TRANSPORT.PROTOCOL' });
    }
    return { ...body };
  }

  private async inHistory(jobId: string): Promise<boolean> {
    const history = await this.getHistory(jobId);
    return Object.prototype.hasOwnProperty.call(history, jobId);
  }

  /** Convert an editor-format workflow through the server's converter endpoint. */
  async convertWorkflow(document: JsonObject): Promise<unknown> {
    const res = await this.postJson('/workflow/convert', document);
    return this.readJson(res);
  }

  // --- Internals ---

  private assertOpen(): void {
    if (this.closed) {
      throw transportError('Connection is closed', { code: 'TRANSPORT.CLOSED' });
    }
  }

  private ensureSocket(): Promise<void> {
    if (this.socketReady) return this.socketReady;

    const url = `${toSocketUrl(this.baseUrl)}/ws?clientId=${encodeURIComponent(this.clientId)}`;
    const ready = new Promise<void>((resolve, reject) => {
      let opened = false;
      const failOpen = (reason: string, cause?: unknown) => {
        if (this.socketReady === ready) {
          this.socketReady = undefined;
          this.socket = undefined;
        }
        reject(transportError(this.mask(`WebSocket connection to ${url} failed: ${reason}`), { cause }));
      };

      let socket: EventSocket;
      try {
        socket = this.socketFactory(url, this.headers);
      } catch (err) {
        failOpen(errorMessage(err), err);
        return;
      }
      this.socket = socket;

      socket.on('open', () => {
        opened = true;
        this.log.debug('Event socket open');
        resolve();
      });
      socket.on('message', (data, isBinary) => this.handleSocketData(data, isBinary));
      socket.on('error', (err) => {
        if (!opened) failOpen(err.message, err);
        else this.log.warn('Event socket error', { error: err.message });
      });
      socket.on('close', (code) => {
        if (!opened) {
          failOpen(`closed during handshake (code ${code})`);
          return;
        }
        if (this.socket === socket) {
          this.socket = undefined;
          this.socketReady = undefined;
        }
        if (!this.closed) {
          this.log.warn('Event socket closed', { code });
          this.failActiveJobs(
            transportError(`Event socket closed (code ${code})`, { code: 'TRANSPORT.DISCONNECTED' }),
          );
        }
      });
    });
    this.socketReady = ready;
    return ready;
  }

  private handleSocketData(data: unknown, isBinary: boolean): void {
    // Binary frames carry preview images, not job events.
    if (isBinary) return;

    let json: unknown;
    try {
      json = JSON.parse(decodeFrame(data));
    } catch (err) {
      this.log.warn('Ignoring malformed socket message', { error: errorMessage(err) });
      return;
    }
    const parsed = socketMessageSchema.safeParse(json);
    if (!parsed.success) {
      this.log.debug('Ignoring socket message without a type');
      return;
    }

    const message = parsed.data;
    const jobId = messageJobId(message);
    if (!jobId) return;

    const job = this.jobs.get(jobId);
    if (job) {
      this.dispatch(job, message);
      return;
    }
    this.bufferEarly(jobId, message);
  }

  private bufferEarly(jobId: string, message: SocketMessage): void {
    let queue = this.pending.get(jobId);
    if (!queue) {
      if (this.pending.size >= MAX_PENDING_JOBS) {
        const oldest = this.pending.keys().next();
        if (!oldest.done) this.pending.delete(oldest.value);
      }
      queue = [];
      this.pending.set(jobId, queue);
    }
    if (queue.length >= this.maxBufferedEvents) {
      this.log.warn('Dropping event for unregistered job', { jobId, type: message.type });
      return;
    }
    queue.push(message);
  }

  private dispatch(job: JobState, message: SocketMessage): void {
    const nextSlot = (nodeId: number): number => {
      const slot = job.slots.get(nodeId) ?? 0;
      job.slots.set(nodeId, slot + 1);
      return slot;
    };
    for (const event of toProgressEvents(job.handle.id, message, nextSlot)) {
      this.dispatchEvent(job, event);
    }
  }

  private dispatchEvent(job: JobState, event: ProgressEvent): void {
    if (job.finished) return;
    job.channel.push(event);
    if (event.type === 'succeeded' || event.type === 'failed' || event.type === 'cancelled') {
      job.finished = true;
      job.channel.end();
      this.log.info('Job finished', { jobId: job.handle.id, outcome: event.type });
    }
  }

  private failActiveJobs(err: TransportError): void {
    for (const job of this.jobs.values()) {
      if (!job.finished) {
        job.finished = true;
        job.channel.fail(err);
      }
    }
  }

  private async request(path: string, init: RequestInit, idempotent: boolean = false): Promise<Response> {
    const url = `${this.baseUrl}${path}`;
    const headers = { ...this.headers, ...headersToRecord(init.headers) };
    try {
      return await this.fetchImpl(url, { ...init, headers });
    } catch (err) {
      throw transportError(this.mask(`Request to ${url} failed: ${errorMessage(err)}`), {
        code: 'TRANSPORT.CONNECTION',
        retryable: idempotent,
        cause: err,
      });
    }
  }

  private async getJson(path: string): Promise<unknown> {
    const res = await this.request(path, { method: 'GET' }, true);
    if (!res.ok) {
      const text = await res.text().catch(() => '');
      throw this.httpError(`GET ${path}`, res.status, text, true);
    }
    return this.readJson(res);
  }

  private async postJson(path: string, body: unknown): Promise<Response> {
    const res = await this.request(path, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });
    if (!res.ok) {
      const text = await res.text().catch(() => '');
      throw this.httpError(`POST ${path}`, res.status, text, false);
    }
    return res;
  }

  private async readJson(res: Response): Promise<unknown> {
    const text = await res.text();
    try {
      return text.length > 0 ? JSON.parse(text) : undefined;
    } catch {
      throw transportError(`Server returned non-JSON response (HTTP ${res.status}): ${text.slice(0, 200)}`, {
        code: 'TRANSPORT.PROTOCOL',
        statusCode: res.status,
      });
    }
  }

  private httpError(operation: string, status: number, body: string, idempotent: boolean): TransportError {
    return transportError(this.mask(`${operation} returned HTTP ${status}: ${body.slice(0, 200)}`), {
      code: 'TRANSPORT.HTTP',
      statusCode: status,
      retryable: idempotent && (status === 429 || status >= 500),
    });
  }

  private mask(message: string): string {
    return maskSecretsInMessage(message, this.secrets);
  }
}

/** http(s)://host → ws(s)://host */
export function toSocketUrl(baseUrl: string): string {
  return baseUrl.replace(/^http(s?):\/\//i, (_match, secure: string) => `ws${secure}://`);
}

function decodeFrame(data: unknown): string {
  if (typeof data === 'string') return data;
  if (Buffer.isBuffer(data)) return data.toString('utf-8');
  if (Array.isArray(data) && data.every((part): part is Buffer => Buffer.isBuffer(part))) {
    return Buffer.concat(data).toString('utf-8');
  }
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf-8');
  throw new TypeError('Unsupported socket frame');
}

function headersToRecord(headers: RequestInit['headers']): Record<string, string> {
  if (!headers) return {};
  return Object.fromEntries(new Headers(headers).entries());
}
