/**
 * Wire protocol of the execution server.
 *
 * HTTP responses and WebSocket messages are validated with zod at the edge
 * and translated into the transport-neutral `ProgressEvent` union. Message
 * kinds the client does not know become `unknown` events rather than errors.
 */

import { z } from 'zod';
import { ArtifactRef, JobFailure, ProgressEvent } from './types';
import { parseNodeId } from '../serialization/api-format';

// --- HTTP responses ---

export const submitResponseSchema = z.object({
  prompt_id: z.string().min(1),
  number: z.number().optional(),
  node_errors: z.record(z.unknown()).optional(),
});

export const submitRejectionSchema = z.object({
  error: z
    .union([
      z.string(),
      z.object({ type: z.string().optional(), message: z.string().optional(), details: z.string().optional() }).passthrough(),
    ])
    .optional(),
  node_errors: z.record(z.unknown()).optional(),
});

/** Queue entries are tuples whose second element is the job id. */
const queueEntrySchema = z.array(z.unknown()).min(2);

export const queueStatusSchema = z.object({
  queue_running: z.array(queueEntrySchema),
  queue_pending: z.array(queueEntrySchema),
});

export type QueueStatus = z.infer<typeof queueStatusSchema>;

export function queueEntryIds(entries: QueueStatus['queue_running']): string[] {
  return entries.map((entry) => entry[1]).filter((id): id is string => typeof id === 'string');
}

// --- WebSocket messages ---

export const socketMessageSchema = z.object({
  type: z.string(),
  data: z.record(z.unknown()).default({}),
});

export type SocketMessage = z.infer<typeof socketMessageSchema>;

const outputFileSchema = z
  .object({
    filename: z.string().min(1),
    subfolder: z.string().default(''),
    type: z.string().default('output'),
  })
  .passthrough();

const executedSchema = z.object({
  node: z.union([z.string(), z.number()]),
  output: z.record(z.unknown()).nullable().default({}),
});

const progressSchema = z.object({
  value: z.number(),
  max: z.number(),
  node: z.union([z.string(), z.number()]).nullable().optional(),
});

const executionErrorSchema = z.object({
  node_id: z.union([z.string(), z.number()]).nullable().optional(),
  node_type: z.string().nullable().optional(),
  exception_message: z.string().optional(),
  exception_type: z.string().optional(),
  traceback: z.array(z.string()).optional(),
});

/** Job id a message belongs to, or undefined for server-wide messages. */
export function messageJobId(message: SocketMessage): string | undefined {
  const id = message.data.prompt_id;
  return typeof id === 'string' && id.length > 0 ? id : undefined;
}

function toNodeId(value: unknown): number | undefined {
  if (typeof value === 'number') return Number.isSafeInteger(value) && value >= 0 ? value : undefined;
  if (typeof value === 'string') return parseNodeId(value);
  return undefined;
}

/** Files listed in an `executed` output, in output-key order. */
export function outputFiles(output: Record<string, unknown>): ArtifactRef[] {
  const files: ArtifactRef[] = [];
  for (const [outputKey, value] of Object.entries(output)) {
    if (!Array.isArray(value)) continue;
    for (const item of value) {
      const parsed = outputFileSchema.safeParse(item);
      if (parsed.success) {
        files.push({
          filename: parsed.data.filename,
          subfolder: parsed.data.subfolder,
          folder: parsed.data.type,
          outputKey,
        });
      }
    }
  }
  return files;
}

/**
 * Translate one job-scoped message into events.
 *
 * `nextSlot` hands out per-node slot indices so a node that reports outputs
 * more than once keeps counting instead of restarting at 0.
 */
export function toProgressEvents(
  jobId: string,
  message: SocketMessage,
  nextSlot: (nodeId: number) => number,
): ProgressEvent[] {
  const unknown: ProgressEvent = { type: 'unknown', jobId, kind: message.type, raw: message.data };

  switch (message.type) {
    case 'execution_start':
      return [{ type: 'running', jobId }];

    case 'execution_cached': {
      const nodes = Array.isArray(message.data.nodes) ? message.data.nodes : [];
      const nodeIds = nodes.map(toNodeId).filter((id): id is number => id !== undefined);
      return [{ type: 'cached', jobId, nodeIds }];
    }

    case 'executing': {
      // A null node marks the end of execution on servers without execution_success.
      if (message.data.node === null) return [{ type: 'succeeded', jobId }];
      const nodeId = toNodeId(message.data.node);
      return nodeId === undefined ? [unknown] : [{ type: 'executing', jobId, nodeId }];
    }

    case 'progress': {
      const parsed = progressSchema.safeParse(message.data);
      if (!parsed.success) return [unknown];
      return [{
        type: 'progress',
        jobId,
        nodeId: toNodeId(parsed.data.node),
        value: parsed.data.value,
        max: parsed.data.max,
      }];
    }

    case 'executed': {
      const parsed = executedSchema.safeParse(message.data);
      const nodeId = parsed.success ? toNodeId(parsed.data.node) : undefined;
      if (!parsed.success || nodeId === undefined) return [unknown];
      return outputFiles(parsed.data.output ?? {}).map((ref) => ({
        type: 'artifact' as const,
        jobId,
        nodeId,
        slot: nextSlot(nodeId),
        ref,
      }));
    }

    case 'execution_success':
      return [{ type: 'succeeded', jobId }];

    case 'execution_error':
      return [{ type: 'failed', jobId, failure: toFailure(message.data) }];

    case 'execution_interrupted':
      return [{ type: 'cancelled', jobId }];

    default:
      return [unknown];
  }
}

function toFailure(data: Record<string, unknown>): JobFailure {
  const parsed = executionErrorSchema.safeParse(data);
  if (!parsed.success) {
    return { reason: 'Execution failed (unparseable error report)' };
  }
  const { node_id, node_type, exception_message, exception_type, traceback } = parsed.data;
  return {
    reason: exception_message?.trim() || exception_type || 'Execution failed',
    nodeId: toNodeId(node_id),
    nodeType: node_type ?? undefined,
    exceptionType: exception_type,
    traceback,
  };
}
