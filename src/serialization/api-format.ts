/**
 * API ("prompt") format adapter.
 *
 * The execution server accepts a graph as an object keyed by node id:
 *
 *   {
 *     "3": {
 *       "inputs": { "seed": 42, "model": ["4", 0] },
 *       "class_type": "KSampler",
 *       "_meta": { "title": "Sampler" }
 *     }
 *   }
 *
 * Links are two-element arrays `[sourceId, slot]` inside `inputs`. Every field
 * the client does not model (unknown node keys, other `_meta` keys, input
 * values of any other shape) is kept per node and re-emitted verbatim, so a
 * deserialize → serialize round trip loses nothing the server needs.
 */

import { z } from 'zod';
import { WorkflowGraph, NodeCreateOptions } from '../graph/graph';
import {
  AssignableValue,
  JsonObject,
  JsonValue,
  NodeInit,
  coarseTypeOf,
  isOutputRef,
  isScalarValue,
  isValueGenerator,
  outputRef,
} from '../graph/types';
import { invalidGraphError, propertyTypeError, uiFormatError } from '../domain/errors';

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ]),
);

const apiDocumentSchema = z.record(z.record(jsonValueSchema));

const apiNodeSchema = z.object({
  class_type: z.string().min(1),
  inputs: z.record(jsonValueSchema).optional(),
  _meta: z.record(jsonValueSchema).optional(),
});

const MODELLED_NODE_FIELDS = new Set(['class_type', 'inputs', '_meta']);

/** One node of an API-format document. */
export interface ApiNode {
  class_type: string;
  inputs?: JsonObject;
  _meta?: JsonObject;
  [field: string]: JsonValue | undefined;
}

/** An API-format document. */
export type ApiPrompt = Record<string, ApiNode>;

export interface DeserializeOptions {
  /**
   * Node keys in the order the source text declares them. Object enumeration
   * puts integer-like keys in ascending order, so this is the only way the
   * declaration order of a parsed document survives. Keys not listed follow
   * in enumeration order.
   */
  keyOrder?: readonly string[];
}

const CANONICAL_ID = /^(0|[1-9]\d*)$/;

/** Parse a node id key; only canonical non-negative integers are accepted. */
export function parseNodeId(key: string): number | undefined {
  if (!CANONICAL_ID.test(key)) return undefined;
  const id = Number(key);
  return Number.isSafeInteger(id) ? id : undefined;
}

/** A link inside `inputs`: `[sourceId, slot]` with a canonical id, as a string or a number. */
function parseLink(value: JsonValue): { nodeId: number; slot: number; numericSource: boolean } | undefined {
  if (!Array.isArray(value) || value.length !== 2) return undefined;
  const [source, slot] = value;
  const nodeId =
    typeof source === 'string' ? parseNodeId(source) :
    typeof source === 'number' && Number.isSafeInteger(source) && source >= 0 ? source :
    undefined;
  if (nodeId === undefined) return undefined;
  if (typeof slot !== 'number' || !Number.isSafeInteger(slot) || slot < 0) return undefined;
  return { nodeId, slot, numericSource: typeof source === 'number' };
}

/** Check a document looks like the editor ("UI") format rather than the API format. */
export function isUiFormat(document: unknown): document is JsonObject {
  return (
    typeof document === 'object' &&
    document !== null &&
    !Array.isArray(document) &&
    'nodes' in document &&
    Array.isArray(document.nodes) &&
    'links' in document &&
    Array.isArray(document.links)
  );
}

/**
 * Build a graph from an API-format document (already JSON-parsed).
 *
 * Fails with InvalidGraphError when the document is not an object of nodes,
 * an id is not a canonical integer, a node has no `class_type`, or a link
 * references a node that does not exist.
 */
export function deserializeGraph(document: unknown, options: DeserializeOptions = {}): WorkflowGraph {
  if (isUiFormat(document)) {
    throw uiFormatError();
  }
  const parsed = apiDocumentSchema.safeParse(document);
  if (!parsed.success) {
    throw invalidDocumentError(parsed.error.issues);
  }

  const inits: NodeInit[] = [];
  const createOptions: NodeCreateOptions[] = [];

  for (const key of declaredKeys(parsed.data, options.keyOrder)) {
    const id = parseNodeId(key);
    if (id === undefined) {
      throw invalidGraphError(`Node id "${key}" is not a non-negative integer`, { key });
    }
    const raw = parsed.data[key];
    const fields = apiNodeSchema.safeParse(raw);
    if (!fields.success) {
      throw invalidDocumentError(fields.error.issues, key);
    }
    const { class_type: type, inputs, _meta: meta } = fields.data;

    const extraFields: JsonObject = {};
    for (const [field, value] of Object.entries(raw)) {
      if (!MODELLED_NODE_FIELDS.has(field)) extraFields[field] = value;
    }

    const properties: Record<string, AssignableValue> = {};
    const opaqueInputs: Array<[string, JsonValue]> = [];
    const numericLinkInputs: string[] = [];
    for (const [name, value] of Object.entries(inputs ?? {})) {
      const link = parseLink(value);
      if (link) {
        properties[name] = outputRef(link.nodeId, link.slot);
        if (link.numericSource) numericLinkInputs.push(name);
      } else if (typeof value === 'number' || typeof value === 'string' || typeof value === 'boolean') {
        properties[name] = value;
      } else {
        opaqueInputs.push([name, value]);
      }
    }

    let name: string | undefined;
    const extraMeta: JsonObject = {};
    for (const [metaKey, metaValue] of Object.entries(meta ?? {})) {
      if (metaKey === 'title' && typeof metaValue === 'string') name = metaValue;
      else extraMeta[metaKey] = metaValue;
    }

    inits.push({ id, type, name, properties });
    createOptions.push({
      extraFields,
      extraMeta,
      metaPresent: meta !== undefined,
      inputsPresent: inputs !== undefined,
      numericLinkInputs,
      opaqueInputs,
      inputOrder: Object.keys(inputs ?? {}),
    });
  }

  const graph = new WorkflowGraph();
  graph.addNodes(inits, createOptions);
  return graph;
}

/** Parse API-format JSON text into a graph, keeping the text's node order. */
export function parseGraph(text: string): WorkflowGraph {
  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (err) {
    throw invalidGraphError(`Workflow is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  return deserializeGraph(document, { keyOrder: topLevelKeys(text) });
}

/**
 * Keys of the top-level object of a JSON text, in the order they appear.
 * Returns an empty list when the top-level value is not an object. The text
 * must already be known to be valid JSON.
 */
export function topLevelKeys(text: string): string[] {
  const keys: string[] = [];
  let depth = 0;
  let topIsObject = false;
  let expectKey = false;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === '"') {
      const end = closingQuote(text, i);
      if (depth === 1 && expectKey) {
        const key: unknown = JSON.parse(text.slice(i, end + 1));
        if (typeof key === 'string') keys.push(key);
        expectKey = false;
      }
      i = end;
    } else if (ch === '{' || ch === '[') {
      depth++;
      if (depth === 1) {
        topIsObject = ch === '{';
        expectKey = topIsObject;
      }
    } else if (ch === '}' || ch === ']') {
      depth--;
    } else if (ch === ',' && depth === 1) {
      expectKey = topIsObject;
    }
  }
  return keys;
}

function closingQuote(text: string, open: number): number {
  let i = open + 1;
  while (i < text.length && text[i] !== '"') {
    i += text[i] === '\\' ? 2 : 1;
  }
  return i;
}

function declaredKeys(data: Record<string, unknown>, keyOrder: readonly string[] = []): string[] {
  const keys = new Set<string>();
  for (const key of keyOrder) {
    if (Object.prototype.hasOwnProperty.call(data, key)) keys.add(key);
  }
  for (const key of Object.keys(data)) keys.add(key);
  return Array.from(keys);
}

function invalidDocumentError(issues: z.ZodIssue[], nodeKey?: string) {
  return invalidGraphError('Workflow document is not a valid API-format graph', {
    issues: issues.map((issue) => ({
      path: (nodeKey === undefined ? issue.path : [nodeKey, ...issue.path]).join('.'),
      message: issue.message,
    })),
  });
}

/**
 * Render a graph in the exact shape the submission endpoint expects.
 *
 * Each generator is drawn once per call and its result must be a number,
 * string or boolean. Integer-like keys always enumerate in ascending order,
 * so declaration order travels separately (see `createSnapshot`).
 */
export function serializeGraph(graph: WorkflowGraph): ApiPrompt {
  const prompt: ApiPrompt = {};
  for (const node of graph.nodes()) {
    const inputs: Record<string, JsonValue> = {};
    for (const [name, entry] of node.entries()) {
      inputs[name] = entry.kind === 'opaque'
        ? structuredClone(entry.value)
        : renderValue(node.id, name, entry.value, node.numericLinkInputs.has(name));
    }

    const rendered: ApiNode = {
      ...(node.inputsPresent || Object.keys(inputs).length > 0 ? { inputs } : {}),
      class_type: node.type,
    };
    const meta: JsonObject = { ...structuredClone(node.extraMeta) };
    if (node.name !== undefined) meta.title = node.name;
    if (node.metaPresent || Object.keys(meta).length > 0) {
      rendered._meta = meta;
    }
    for (const [key, value] of Object.entries(node.extraFields)) {
      rendered[key] = structuredClone(value);
    }
    prompt[String(node.id)] = rendered;
  }
  return prompt;
}

function renderValue(nodeId: number, name: string, value: AssignableValue, numericSource: boolean): JsonValue {
  if (isOutputRef(value)) return [numericSource ? value.nodeId : String(value.nodeId), value.slot];
  if (isValueGenerator(value)) {
    const drawn: unknown = value.draw();
    if (isScalarValue(drawn)) return drawn;
    const type = coarseTypeOf(drawn) ?? typeof drawn;
    throw propertyTypeError(nodeId, name, 'number, string or boolean', `${type} from generator "${value.label}"`);
  }
  return value;
}
