/**
 * Graph model value types.
 *
 * Nodes hold an ordered map of property name → value. Values are either
 * scalars, references to another node's output slot (a link), or
 * caller-supplied generators drawn at serialization time.
 */

/** Any JSON value, used for fields the client passes through without modelling. */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/** Scalar property values. */
export type ScalarValue = number | string | boolean;

/** Coarse type names used when validating property writes. */
export type CoarseType = 'number' | 'string' | 'boolean' | 'link' | 'generator';

/** Reference to one output slot of another node. */
export interface OutputRef {
  readonly kind: 'output-ref';
  readonly nodeId: number;
  readonly slot: number;
}

/**
 * A value drawn once per serialization (e.g. a fresh random seed).
 * The client never interprets what the generator returns beyond its coarse type.
 */
export interface ValueGenerator {
  readonly kind: 'generator';
  readonly label: string;
  draw(): ScalarValue;
}

/** Concrete values a property can hold once serialized. */
export type PropertyValue = ScalarValue | OutputRef;

/** Values a property handle accepts. */
export type AssignableValue = PropertyValue | ValueGenerator;

/** A directed connection from a source output slot to a named target input. */
export interface Link {
  source: { nodeId: number; slot: number };
  target: { nodeId: number; input: string };
}

/** Lookup forms accepted by `WorkflowGraph.node()`. */
export type NodeQuery =
  | number
  | string
  | { id: number }
  | { name: string }
  | { type: string };

/** Input for adding a node programmatically. */
export interface NodeInit {
  id: number;
  type: string;
  name?: string;
  properties?: Record<string, AssignableValue>;
}

/** Build a reference to `slot` of node `nodeId`. */
export function outputRef(nodeId: number, slot: number = 0): OutputRef {
  return { kind: 'output-ref', nodeId, slot };
}

/** Wrap a caller-supplied function so it is drawn on every serialization. */
export function generated(draw: () => ScalarValue, label: string = 'generated'): ValueGenerator {
  return { kind: 'generator', label, draw };
}

export function isOutputRef(value: unknown): value is OutputRef {
  return typeof value === 'object' && value !== null && 'kind' in value && value.kind === 'output-ref';
}

export function isValueGenerator(value: unknown): value is ValueGenerator {
  return typeof value === 'object' && value !== null && 'kind' in value && value.kind === 'generator';
}

export function isScalarValue(value: unknown): value is ScalarValue {
  return (
    typeof value === 'string' ||
    typeof value === 'boolean' ||
    (typeof value === 'number' && Number.isFinite(value))
  );
}

/** Coarse type of a value, or undefined when the value is not assignable. */
export function coarseTypeOf(value: unknown): CoarseType | undefined {
  if (isOutputRef(value)) return 'link';
  if (isValueGenerator(value)) return 'generator';
  if (typeof value === 'number') return Number.isFinite(value) ? 'number' : undefined;
  if (typeof value === 'string') return 'string';
  if (typeof value === 'boolean') return 'boolean';
  return undefined;
}

/** Ids are non-negative safe integers. */
export function isValidNodeId(id: unknown): id is number {
  return typeof id === 'number' && Number.isSafeInteger(id) && id >= 0;
}

export function isValidSlot(slot: unknown): slot is number {
  return typeof slot === 'number' && Number.isSafeInteger(slot) && slot >= 0;
}
