/**
 * Workflow file load/save.
 *
 * API-format files load directly. Editor-format files need the server's
 * conversion endpoint, reached through any `WorkflowConverter` (the local
 * connection implements one).
 */

import { readFile, writeFile } from 'fs/promises';
import { WorkflowGraph } from '../graph/graph';
import { JsonObject } from '../graph/types';
import { deserializeGraph, isUiFormat, serializeGraph, topLevelKeys } from './api-format';
import { invalidGraphError } from '../domain/errors';
import { logger } from '../logger';

/** Converts an editor-format document into the API format. */
export interface WorkflowConverter {
  convertWorkflow(document: JsonObject): Promise<unknown>;
}

export interface LoadWorkflowOptions {
  /** Used when the document is in the editor format. */
  converter?: WorkflowConverter;
}

const log = logger.child({ module: 'workflow-files' });

/** Parse workflow JSON text of either format into a graph. */
export async function parseWorkflowDocument(text: string, options: LoadWorkflowOptions = {}): Promise<WorkflowGraph> {
  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (err) {
    throw invalidGraphError(`Workflow is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }

  if (isUiFormat(document) && options.converter) {
    log.debug('Converting editor-format workflow to API format');
    const converted = await options.converter.convertWorkflow(document);
    return deserializeGraph(converted);
  }
  return deserializeGraph(document, { keyOrder: topLevelKeys(text) });
}

/** Load a workflow file. Filesystem errors propagate unchanged. */
export async function loadWorkflowFile(path: string, options: LoadWorkflowOptions = {}): Promise<WorkflowGraph> {
  const text = await readFile(path, 'utf-8');
  const graph = await parseWorkflowDocument(text, options);
  log.debug('Loaded workflow', { path, nodes: graph.size });
  return graph;
}

/** Write the graph's API-format rendering (generators drawn) to a file. */
export async function saveWorkflowFile(graph: WorkflowGraph, path: string, options: { indent?: number } = {}): Promise<void> {
  const json = JSON.stringify(serializeGraph(graph), null, options.indent ?? 2);
  await writeFile(path, `${json}\n`, 'utf-8');
}
