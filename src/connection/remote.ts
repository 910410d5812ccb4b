/**
 * Remote-worker transport.
 *
 * A RemoteConnection has no server of its own: it asks a WorkerProvisioner
 * for one before the first operation, then speaks the ordinary server
 * protocol to the acquired worker through a LocalConnection. How the worker
 * is rented, started or authenticated is the provisioner's business.
 */

import { LocalConnection, LocalConnectionOptions } from './local';
import { ReadinessConfig, mergeReadinessConfig, waitUntilReady } from './readiness';
import { ArtifactRef, ComfyConnection, JobHandle, ProgressStream } from './types';
import { GraphSnapshot } from '../serialization/snapshot';
import { WorkflowConverter } from '../serialization/files';
import { JsonObject } from '../graph/types';
import {
  ProvisioningError,
  createTypedError,
  errorMessage,
  maskSecretsInMessage,
  provisioningError,
  transportError,
} from '../domain/errors';
import { logger } from '../logger';

/** A reachable worker running the execution server. */
export interface WorkerEndpoint {
  baseUrl: string;
  /** Headers required on every request to the worker (e.g. auth). */
  headers?: Record<string, string>;
  /** Provider-specific identifier, used in logs and on release. */
  workerId?: string;
}

export interface WorkerProvisioner {
  /** Obtain a worker that is ready to accept jobs. */
  acquire(): Promise<WorkerEndpoint>;
  /** Give the worker back. Optional; attached workers have nothing to release. */
  release?(worker: WorkerEndpoint): Promise<void>;
}

/** Options forwarded to the LocalConnection that talks to the worker. */
export type RemoteConnectionOptions = Omit<LocalConnectionOptions, 'baseUrl' | 'headers'>;

const log = logger.child({ module: 'remote-connection' });

export class RemoteConnection implements ComfyConnection, WorkflowConverter {
  private acquisition: Promise<{ worker: WorkerEndpoint; connection: LocalConnection }> | undefined;
  private workerConnection: LocalConnection | undefined;
  private closed = false;

  constructor(
    private readonly provisioner: WorkerProvisioner,
    private readonly options: RemoteConnectionOptions = {},
  ) {}

  /** The acquired worker, once acquisition has completed. */
  async worker(): Promise<WorkerEndpoint> {
    const { worker } = await this.acquire();
    return worker;
  }

  async submit(snapshot: GraphSnapshot): Promise<JobHandle> {
    const { connection } = await this.acquire();
    return connection.submit(snapshot);
  }

  openProgress(handle: JobHandle): ProgressStream {
    return this.connectionFor(handle).openProgress(handle);
  }

  async fetchArtifact(ref: ArtifactRef): Promise<Uint8Array> {
    const { connection } = await this.acquire();
    return connection.fetchArtifact(ref);
  }

  async cancel(handle: JobHandle): Promise<void> {
    await this.connectionFor(handle).cancel(handle);
  }

  /** Convert an editor-format workflow on the worker. */
  async convertWorkflow(document: JsonObject): Promise<unknown> {
    const { connection } = await this.acquire();
    return connection.convertWorkflow(document);
  }

  /** Close the worker connection and release the worker. */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.workerConnection = undefined;
    const pending = this.acquisition;
    this.acquisition = undefined;
    if (!pending) return;

    let acquired: { worker: WorkerEndpoint; connection: LocalConnection };
    try {
      acquired = await pending;
    } catch (err) {
      log.debug('Nothing to release; acquisition had failed', { error: errorMessage(err) });
      return;
    }
    await acquired.connection.close();
    if (this.provisioner.release) {
      log.info('Releasing worker', { workerId: acquired.worker.workerId, baseUrl: acquired.worker.baseUrl });
      try {
        await this.provisioner.release(acquired.worker);
      } catch (err) {
        throw provisioningError(
          maskSecretsInMessage(`Failed to release worker: ${errorMessage(err)}`, this.secrets(acquired.worker)),
          err,
          { workerId: acquired.worker.workerId },
        );
      }
    }
  }

  /** The worker connection, if it still tracks the job. Jobs are forgotten once their stream closes. */
  private connectionFor(handle: JobHandle): LocalConnection {
    const connection = this.workerConnection;
    if (!connection || !connection.isTracking(handle.id)) {
      throw transportError(`Job ${handle.id} was not submitted through this connection`, {
        code: 'TRANSPORT.UNKNOWN_JOB',
        jobId: handle.id,
      });
    }
    return connection;
  }

  private acquire(): Promise<{ worker: WorkerEndpoint; connection: LocalConnection }> {
    if (this.closed) {
      return Promise.reject(transportError('Connection is closed', { code: 'TRANSPORT.CLOSED' }));
    }
    if (!this.acquisition) {
      // A failed acquisition is not cached; the next caller tries again.
      this.acquisition = this.acquireWorker().catch((err: unknown) => {
        this.acquisition = undefined;
        throw err;
      });
    }
    return this.acquisition;
  }

  private async acquireWorker(): Promise<{ worker: WorkerEndpoint; connection: LocalConnection }> {
    log.info('Acquiring worker');
    let worker: WorkerEndpoint;
    try {
      worker = await this.provisioner.acquire();
    } catch (err) {
      if (err instanceof ProvisioningError) throw err;
      const secrets = this.options.secrets ?? [];
      throw provisioningError(maskSecretsInMessage(`Worker acquisition failed: ${errorMessage(err)}`, secrets), err);
    }
    log.info('Worker acquired', { workerId: worker.workerId, baseUrl: worker.baseUrl });

    const connection = new LocalConnection({
      ...this.options,
      baseUrl: worker.baseUrl,
      headers: worker.headers,
      secrets: this.secrets(worker),
    });
    if (!this.closed) this.workerConnection = connection;
    return { worker, connection };
  }

  private secrets(worker: WorkerEndpoint): string[] {
    return [
      ...(this.options.secrets ?? []),
      ...Object.values(worker.headers ?? {}).map((value) => value.replace(/^Bearer\s+/i, '')),
    ];
  }
}

export interface AttachedWorkerOptions {
  /** URL of an already running worker. */
  baseUrl: string;
  /** Sent as a bearer token on every request. */
  apiKey?: string;
  readiness?: Partial<ReadinessConfig>;
  fetch?: (input: string, init?: RequestInit) => Promise<Response>;
}

/**
 * Provisioner for a worker that already exists at a known URL (a rented pod,
 * a tunnel). Acquisition waits until the worker's server answers.
 */
export class AttachedWorkerProvisioner implements WorkerProvisioner {
  private readonly baseUrl: string;
  private readonly headers: Record<string, string>;
  private readonly fetchImpl: (input: string, init?: RequestInit) => Promise<Response>;

  constructor(private readonly options: AttachedWorkerOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.headers = options.apiKey ? { Authorization: `Bearer ${options.apiKey}` } : {};
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  async acquire(): Promise<WorkerEndpoint> {
    const config = mergeReadinessConfig(this.options.readiness);
    const probeLog = log.child({ baseUrl: this.baseUrl });

    const result = await waitUntilReady(async (signal) => {
      const res = await this.fetchImpl(`${this.baseUrl}/system_stats`, { headers: this.headers, signal });
      if (!res.ok) throw new Error(`/system_stats returned HTTP ${res.status}`);
      return true;
    }, {
      ...config,
      onProgress: (progress) => {
        probeLog.debug('Worker not ready yet', { ...progress });
        config.onProgress?.(progress);
      },
    });

    if (!result.ready) {
      const secrets = this.options.apiKey ? [this.options.apiKey] : [];
      throw new ProvisioningError(
        createTypedError({
          code: 'PROVISIONING.NOT_READY',
          message: maskSecretsInMessage(
            `Worker at ${this.baseUrl} was not ready after ${result.totalElapsedMs}ms` +
              (result.lastError ? `: ${result.lastError}` : ''),
            secrets,
          ),
          retryable: true,
          details: { probeCount: result.probeCount, totalElapsedMs: result.totalElapsedMs },
          suggestedFixes: [
            { type: 'INCREASE_READINESS_BUDGET', params: { readinessBudgetMs: config.readinessBudgetMs * 2 } },
          ],
        }),
      );
    }

    probeLog.info('Worker ready', { probeCount: result.probeCount, elapsedMs: result.totalElapsedMs });
    return { baseUrl: this.baseUrl, headers: { ...this.headers } };
  }
}
