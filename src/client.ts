/**
 * WorkflowClient binds a graph to a connection.
 *
 *   const client = WorkflowClient.fromConfig(createClientConfig(configFromEnv()));
 *   const graph = await client.loadWorkflow('portrait.json');
 *   graph.node('Positive Prompt').property('text').set('a lighthouse at dusk');
 *   const result = await client.run(graph);
 *   for (const artifact of result.artifacts) await artifact.bytes();
 */

import { ComfyConnection } from './connection/types';
import { LocalConnection } from './connection/local';
import { RemoteConnection } from './connection/remote';
import { WorkflowGraph } from './graph/graph';
import { createSnapshot } from './serialization/snapshot';
import { LoadWorkflowOptions, WorkflowConverter, loadWorkflowFile, parseWorkflowDocument } from './serialization/files';
import { ExecutionSession, WaitOptions } from './engine/session';
import { RunResult } from './engine/results';
import { ClientConfig, ConnectionDeps, createConnection } from './config';
import { logger } from './logger';

export interface WorkflowClientOptions {
  /** Deadline for `wait()` and `run()` when the caller gives none. */
  defaultTimeoutMs?: number;
  /** Converter for editor-format files; defaults to the connection when it can convert. */
  converter?: WorkflowConverter;
}

const log = logger.child({ module: 'client' });

export class WorkflowClient {
  constructor(
    readonly connection: ComfyConnection,
    private readonly options: WorkflowClientOptions = {},
  ) {}

  static fromConfig(config: ClientConfig, deps: ConnectionDeps = {}): WorkflowClient {
    return new WorkflowClient(createConnection(config, deps), { defaultTimeoutMs: config.timeoutMs });
  }

  /**
   * Snapshot the graph and submit it. Later edits to `graph` do not affect
   * the submitted job.
   */
  async submit(graph: WorkflowGraph): Promise<ExecutionSession> {
    const snapshot = createSnapshot(graph);
    const handle = await this.connection.submit(snapshot);
    log.debug('Opened session', { jobId: handle.id, nodes: snapshot.nodeOrder.length });
    const stream = this.connection.openProgress(handle);
    return new ExecutionSession(this.connection, handle, snapshot, stream, {
      defaultTimeoutMs: this.options.defaultTimeoutMs,
    });
  }

  /** Submit and wait for the terminal state. */
  async run(graph: WorkflowGraph, options: WaitOptions = {}): Promise<RunResult> {
    const session = await this.submit(graph);
    return session.wait(options);
  }

  async loadWorkflow(path: string): Promise<WorkflowGraph> {
    return loadWorkflowFile(path, this.loadOptions());
  }

  async parseWorkflow(text: string): Promise<WorkflowGraph> {
    return parseWorkflowDocument(text, this.loadOptions());
  }

  async close(): Promise<void> {
    await this.connection.close();
  }

  private loadOptions(): LoadWorkflowOptions {
    if (this.options.converter) return { converter: this.options.converter };
    const connection = this.connection;
    if (connection instanceof LocalConnection || connection instanceof RemoteConnection) {
      return { converter: connection };
    }
    return {};
  }
}
