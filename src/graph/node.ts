/**
 * Workflow nodes and property handles.
 *
 * A node owns its inputs: modelled properties (scalars, links, generators)
 * and pass-through entries whose JSON shape the client does not model. Both
 * live in one ordered map so re-serialization keeps the original input order.
 */

import {
  AssignableValue,
  CoarseType,
  JsonObject,
  JsonValue,
  OutputRef,
  coarseTypeOf,
  isOutputRef,
  isValidSlot,
} from './types';
import {
  invalidGraphError,
  propertyNotFoundError,
  propertyTypeError,
} from '../domain/errors';

/** The part of the graph a node consults when validating link writes. */
export interface NodeOwner {
  hasNode(id: number): boolean;
}

/** One input entry: either a modelled property or an opaque JSON value. */
export type NodeInput =
  | { kind: 'property'; value: AssignableValue }
  | { kind: 'opaque'; value: JsonValue };

/** A resolved reference to one property on one node. */
export class PropertyHandle {
  constructor(
    private readonly node: WorkflowNode,
    readonly name: string,
  ) {}

  get nodeId(): number {
    return this.node.id;
  }

  /** Current value. Throws NotFoundError if the property was deleted since resolution. */
  get value(): AssignableValue {
    return this.node.getProperty(this.name);
  }

  get(): AssignableValue {
    return this.value;
  }

  /** In-place write; validates the coarse type only. */
  set(value: AssignableValue): void {
    this.node.writeProperty(this.name, value, { mustExist: true });
  }

  equals(other: AssignableValue): boolean {
    const current = this.value;
    if (isOutputRef(current) && isOutputRef(other)) {
      return current.nodeId === other.nodeId && current.slot === other.slot;
    }
    return current === other;
  }
}

export class WorkflowNode {
  /** Display name (`_meta.title` in the API format). Not unique. */
  name: string | undefined;
  /** Unmodelled node-level fields, re-emitted verbatim. */
  readonly extraFields: JsonObject;
  /** Unmodelled `_meta` fields besides the title. */
  readonly extraMeta: JsonObject;
  /** Emit `_meta` even when it would be empty. */
  readonly metaPresent: boolean;
  /** Emit `inputs` even when the node has none. */
  readonly inputsPresent: boolean;
  /** Inputs whose link source id the source document wrote as a number. */
  readonly numericLinkInputs: ReadonlySet<string>;

  private readonly inputs = new Map<string, NodeInput>();
  private owner: NodeOwner | undefined;

  /** @internal Nodes are created through `WorkflowGraph.addNode()`. */
  constructor(
    owner: NodeOwner,
    readonly id: number,
    readonly type: string,
    options: {
      name?: string;
      extraFields?: JsonObject;
      extraMeta?: JsonObject;
      metaPresent?: boolean;
      inputsPresent?: boolean;
      numericLinkInputs?: Iterable<string>;
    } = {},
  ) {
    this.owner = owner;
    this.name = options.name;
    this.extraFields = options.extraFields ?? {};
    this.extraMeta = options.extraMeta ?? {};
    this.metaPresent = options.metaPresent ?? false;
    this.inputsPresent = options.inputsPresent ?? true;
    this.numericLinkInputs = new Set(options.numericLinkInputs);
  }

  /** Resolve a property handle. Throws NotFoundError if the node has no such property. */
  property(name: string): PropertyHandle {
    if (this.inputs.get(name)?.kind !== 'property') {
      throw propertyNotFoundError(this.id, name, this.propertyNames());
    }
    return new PropertyHandle(this, name);
  }

  hasProperty(name: string): boolean {
    return this.inputs.get(name)?.kind === 'property';
  }

  /** Names of modelled properties in input order. */
  propertyNames(): string[] {
    const names: string[] = [];
    for (const [name, input] of this.inputs) {
      if (input.kind === 'property') names.push(name);
    }
    return names;
  }

  getProperty(name: string): AssignableValue {
    const input = this.inputs.get(name);
    if (!input || input.kind !== 'property') {
      throw propertyNotFoundError(this.id, name, this.propertyNames());
    }
    return input.value;
  }

  /** Create or overwrite a property. Use `property(name).set()` to require existence. */
  setProperty(name: string, value: AssignableValue): this {
    this.writeProperty(name, value, { mustExist: false });
    return this;
  }

  deleteProperty(name: string): void {
    if (this.inputs.get(name)?.kind !== 'property') {
      throw propertyNotFoundError(this.id, name, this.propertyNames());
    }
    this.inputs.delete(name);
  }

  /** Links into this node, keyed by input name. */
  incomingRefs(): Array<{ input: string; ref: OutputRef }> {
    const refs: Array<{ input: string; ref: OutputRef }> = [];
    for (const [input, entry] of this.inputs) {
      if (entry.kind === 'property' && isOutputRef(entry.value)) {
        refs.push({ input, ref: entry.value });
      }
    }
    return refs;
  }

  /** All input entries, modelled and opaque, in order. */
  entries(): Array<[string, NodeInput]> {
    return Array.from(this.inputs.entries());
  }

  get attached(): boolean {
    return this.owner !== undefined;
  }

  /** @internal Store an opaque input verbatim. */
  setOpaqueInput(name: string, value: JsonValue): void {
    this.inputs.set(name, { kind: 'opaque', value });
  }

  /** @internal Store a property without link validation (batch construction). */
  setPropertyUnchecked(name: string, value: AssignableValue): void {
    this.inputs.set(name, { kind: 'property', value });
  }

  /** @internal Reorder inputs; names not listed keep their relative order at the end. */
  reorderInputs(order: string[]): void {
    const entries = new Map(this.inputs);
    this.inputs.clear();
    for (const name of order) {
      const entry = entries.get(name);
      if (entry) {
        this.inputs.set(name, entry);
        entries.delete(name);
      }
    }
    for (const [name, entry] of entries) {
      this.inputs.set(name, entry);
    }
  }

  /** @internal Called when the owning graph removes this node. */
  detach(): void {
    this.owner = undefined;
  }

  /** @internal */
  writeProperty(name: string, value: AssignableValue, options: { mustExist: boolean }): void {
    const owner = this.owner;
    if (!owner) {
      throw invalidGraphError(`Node ${this.id} was removed from its graph`, { property: name }, this.id);
    }
    const existing = this.inputs.get(name);
    if (options.mustExist && existing?.kind !== 'property') {
      throw propertyNotFoundError(this.id, name, this.propertyNames());
    }

    const incoming = assertAssignable(this.id, name, value);
    if (existing?.kind === 'property') {
      const current = coarseTypeOf(existing.value);
      if (isScalarType(current) && isScalarType(incoming) && current !== incoming) {
        throw propertyTypeError(this.id, name, String(current), incoming);
      }
    }
    if (isOutputRef(value)) {
      assertLinkTarget(this.id, value, (id) => owner.hasNode(id));
    }

    this.inputs.set(name, { kind: 'property', value });
  }
}

/** Check a value is assignable at all and return its coarse type. */
export function assertAssignable(nodeId: number, name: string, value: unknown): CoarseType {
  const type = coarseTypeOf(value);
  if (type === undefined) {
    throw propertyTypeError(nodeId, name, 'number, string, boolean, link or generator', describeValue(value));
  }
  return type;
}

/** Check a link into `nodeId` points at an existing, different node and a valid slot. */
export function assertLinkTarget(nodeId: number, ref: OutputRef, hasNode: (id: number) => boolean): void {
  if (!isValidSlot(ref.slot)) {
    throw invalidGraphError(`Invalid output slot ${ref.slot} on link into node ${nodeId}`, { ref }, nodeId);
  }
  if (ref.nodeId === nodeId) {
    throw invalidGraphError(`Node ${nodeId} cannot link to its own output`, { ref }, nodeId);
  }
  if (!hasNode(ref.nodeId)) {
    throw invalidGraphError(`Link into node ${nodeId} references missing node ${ref.nodeId}`, { ref }, nodeId);
  }
}

function isScalarType(type: string | undefined): boolean {
  return type === 'number' || type === 'string' || type === 'boolean';
}

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (typeof value === 'number') return 'non-finite number';
  return typeof value;
}
