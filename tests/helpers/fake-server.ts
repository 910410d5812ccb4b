/**
 * In-process stand-in for an execution server: a fetch implementation with
 * the server's HTTP routes, and in-memory sockets for the event channel.
 */

import { EventEmitter } from 'events';
import { EventSocket, FetchLike, SocketFactory } from '../../src/connection/local';
import { ArtifactRef, ComfyConnection, JobHandle, ProgressEvent, ProgressStream } from '../../src/connection/types';
import { EventChannel } from '../../src/connection/event-channel';
import { GraphSnapshot } from '../../src/serialization/snapshot';

export class FakeSocket extends EventEmitter implements EventSocket {
  closed = false;

  constructor(
    readonly url: string,
    readonly headers: Record<string, string>,
    autoOpen: boolean,
  ) {
    super();
    if (autoOpen) queueMicrotask(() => this.emit('open'));
  }

  send(type: string, data: Record<string, unknown>): void {
    this.emit('message', Buffer.from(JSON.stringify({ type, data })), false);
  }

  sendRaw(text: string): void {
    this.emit('message', Buffer.from(text), false);
  }

  /** Simulate the server dropping the connection. */
  drop(code: number = 1006): void {
    this.emit('close', code);
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.emit('close', 1000);
  }
}

export interface RecordedRequest {
  method: string;
  path: string;
  query: URLSearchParams;
  headers: Record<string, string>;
  body: unknown;
}

type Handler = (req: RecordedRequest) => Response | Promise<Response>;

export function json(body: unknown, status: number = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

export class FakeComfyServer {
  readonly requests: RecordedRequest[] = [];
  readonly sockets: FakeSocket[] = [];
  readonly files = new Map<string, Uint8Array>();
  readonly running: string[] = [];
  readonly pending: string[] = [];
  /** Finished jobs, served from /history/<id>. */
  readonly history = new Map<string, Record<string, unknown>>();
  /** Rejects every fetch as a network failure. */
  offline = false;
  /** Sockets fail their handshake. */
  refuseSockets = false;
  /** Number of upcoming /view requests answered with HTTP 500. */
  viewFailures = 0;
  /** Called with the job id before /prompt responds. */
  onSubmit: ((jobId: string) => void) | undefined;

  private jobCounter = 0;
  private readonly overrides = new Map<string, Handler>();

  readonly fetch: FetchLike = async (input, init) => {
    const url = new URL(input);
    const headers = Object.fromEntries(new Headers(init?.headers).entries());
    const text = typeof init?.body === 'string' ? init.body : undefined;
    const req: RecordedRequest = {
      method: init?.method ?? 'GET',
      path: url.pathname,
      query: url.searchParams,
      headers,
      body: text ? JSON.parse(text) : undefined,
    };
    this.requests.push(req);
    if (this.offline) throw new TypeError('fetch failed');
    const override = this.overrides.get(`${req.method} ${req.path}`);
    return override ? override(req) : this.route(req);
  };

  readonly socketFactory: SocketFactory = (url, headers) => {
    const socket = new FakeSocket(url, headers, !this.refuseSockets);
    if (this.refuseSockets) {
      queueMicrotask(() => socket.emit('error', new Error('connect ECONNREFUSED')));
    }
    this.sockets.push(socket);
    return socket;
  };

  /** Replace the handler for one route, e.g. `handle('POST /prompt', ...)`. */
  handle(route: string, handler: Handler): void {
    this.overrides.set(route, handler);
  }

  get socket(): FakeSocket {
    const socket = this.sockets[this.sockets.length - 1];
    if (!socket) throw new Error('no socket opened');
    return socket;
  }

  /** Send a job-scoped message on the latest socket. */
  emit(type: string, jobId: string, data: Record<string, unknown> = {}): void {
    this.socket.send(type, { ...data, prompt_id: jobId });
  }

  requestsTo(method: string, path: string): RecordedRequest[] {
    return this.requests.filter((r) => r.method === method && r.path === path);
  }

  private route(req: RecordedRequest): Response {
    const key = `${req.method} ${req.path}`;
    if (req.method === 'GET' && req.path.startsWith('/history/')) {
      const jobId = decodeURIComponent(req.path.slice('/history/'.length));
      const entry = this.history.get(jobId);
      return json(entry ? { [jobId]: entry } : {});
    }
    switch (key) {
      case 'POST /prompt': {
        const jobId = `job-${++this.jobCounter}`;
        this.onSubmit?.(jobId);
        return json({ prompt_id: jobId, number: this.jobCounter - 1, node_errors: {} });
      }
      case 'GET /queue':
        return json({
          queue_running: this.running.map((id, i) => [i, id, {}, {}, []]),
          queue_pending: this.pending.map((id, i) => [i + this.running.length, id, {}, {}, []]),
        });
      case 'POST /queue': {
        const body = req.body;
        if (isRecord(body) && Array.isArray(body.delete)) {
          for (const id of body.delete) {
            const index = this.pending.indexOf(String(id));
            if (index >= 0) this.pending.splice(index, 1);
          }
        }
        return json({});
      }
      case 'POST /interrupt':
        return json({});
      case 'GET /view': {
        if (this.viewFailures > 0) {
          this.viewFailures--;
          return new Response('busy', { status: 500 });
        }
        const bytes = this.files.get(req.query.get('filename') ?? '');
        return bytes ? new Response(Buffer.from(bytes)) : new Response('not found', { status: 404 });
      }
      case 'GET /system_stats':
        return json({ system: { os: 'posix' }, devices: [] });
      case 'GET /history':
        return json({});
      default:
        return new Response('not found', { status: 404 });
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Wait for pending promise callbacks to run. */
export async function flush(): Promise<void> {
  for (let i = 0; i < 10; i++) await Promise.resolve();
  await new Promise((resolve) => setImmediate(resolve));
}

/**
 * A scripted ComfyConnection: each submit gets a channel the test drives
 * directly with `push`.
 */
export class ScriptedConnection implements ComfyConnection {
  readonly submitted: GraphSnapshot[] = [];
  readonly cancelled: string[] = [];
  readonly channels = new Map<string, EventChannel>();
  readonly fetches: ArtifactRef[] = [];
  closed = false;
  /** Acknowledge cancel requests with a `cancelled` event. */
  ackCancel = false;
  private counter = 0;

  async submit(snapshot: GraphSnapshot): Promise<JobHandle> {
    this.submitted.push(snapshot);
    const id = `job-${++this.counter}`;
    this.channels.set(id, new EventChannel());
    return { id, clientId: 'test-client', submittedAt: new Date(0).toISOString() };
  }

  openProgress(handle: JobHandle): ProgressStream {
    return this.channel(handle.id);
  }

  async fetchArtifact(ref: ArtifactRef): Promise<Uint8Array> {
    this.fetches.push(ref);
    return new Uint8Array(Buffer.from(ref.filename));
  }

  async cancel(handle: JobHandle): Promise<void> {
    this.cancelled.push(handle.id);
    if (this.ackCancel) this.push({ type: 'cancelled', jobId: handle.id });
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  push(event: ProgressEvent): void {
    this.channel(event.jobId).push(event);
  }

  channel(jobId: string): EventChannel {
    const channel = this.channels.get(jobId);
    if (!channel) throw new Error(`unknown job ${jobId}`);
    return channel;
  }
}

export function artifactRef(filename: string, overrides: Partial<ArtifactRef> = {}): ArtifactRef {
  return { filename, subfolder: '', folder: 'output', outputKey: 'images', ...overrides };
}
