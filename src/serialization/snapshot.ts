/**
 * Immutable submission snapshots.
 *
 * A snapshot is taken once per submission. It owns a deep-frozen copy of the
 * rendered prompt, so mutating the live graph afterwards (or redrawing its
 * generators) never reaches a job that is already in flight.
 */

import { WorkflowGraph } from '../graph/graph';
import { ApiPrompt, serializeGraph } from './api-format';

export interface GraphSnapshot {
  /** Rendered API-format document. Frozen. */
  readonly prompt: Readonly<ApiPrompt>;
  /** Node ids in declaration order, used to order results. */
  readonly nodeOrder: readonly number[];
  /** The prompt as JSON text, exactly as submitted. */
  readonly json: string;
  readonly createdAt: string;
}

export function createSnapshot(graph: WorkflowGraph): GraphSnapshot {
  const prompt = serializeGraph(graph);
  return Object.freeze({
    prompt: deepFreeze(prompt),
    nodeOrder: Object.freeze(graph.nodeIds()),
    json: JSON.stringify(prompt),
    createdAt: new Date().toISOString(),
  });
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
