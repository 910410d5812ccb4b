/**
 * Workflow graph: an ordered collection of nodes plus the links between them.
 *
 * Links are not stored separately. A link is a property whose value is an
 * `OutputRef`, so the link set is always derived from node inputs and can
 * never drift from them. Every edit that could leave a dangling link fails
 * with InvalidGraphError at the edit itself.
 *
 * Graphs are not safe to mutate while a snapshot is being taken; callers
 * build and edit a graph, then serialize it once per submission.
 */

import { AssignableValue, JsonValue, NodeInit, NodeQuery, Link, isValidNodeId, isValidSlot, outputRef, isOutputRef } from './types';
import { NodeOwner, WorkflowNode, assertAssignable, assertLinkTarget } from './node';
import {
  ambiguousNodeError,
  invalidGraphError,
  nodeNotFoundError,
} from '../domain/errors';

/** Options for removing a node. */
export interface RemoveNodeOptions {
  /** Also delete every input that links to the removed node. Default: false. */
  detachLinks?: boolean;
}

/** Node creation options beyond NodeInit, used by the deserializer. */
export interface NodeCreateOptions {
  extraFields?: WorkflowNode['extraFields'];
  extraMeta?: WorkflowNode['extraMeta'];
  opaqueInputs?: Array<[string, JsonValue]>;
  /** Input names in source order; properties and opaque inputs interleave. */
  inputOrder?: string[];
  /** Whether the source document carried a `_meta` object. */
  metaPresent?: boolean;
  /** Whether the source document carried an `inputs` object. Defaults to true. */
  inputsPresent?: boolean;
  /** Inputs whose link source id was written as a number. */
  numericLinkInputs?: string[];
}

export class WorkflowGraph implements NodeOwner {
  private readonly nodesById = new Map<number, WorkflowNode>();

  get size(): number {
    return this.nodesById.size;
  }

  hasNode(id: number): boolean {
    return this.nodesById.has(id);
  }

  /**
   * Resolve exactly one node.
   *
   * A number looks up by id; a string looks up by display name. Name and type
   * lookups fail with AmbiguousError when more than one node matches.
   */
  node(query: NodeQuery): WorkflowNode {
    if (typeof query === 'number') return this.nodeById(query);
    if (typeof query === 'string') return this.single(query, 'name');
    if ('id' in query) return this.nodeById(query.id);
    if ('name' in query) return this.single(query.name, 'name');
    return this.single(query.type, 'type');
  }

  /** All nodes in declaration order, optionally filtered by name or type. */
  nodes(filter?: { name?: string; type?: string }): WorkflowNode[] {
    const all = Array.from(this.nodesById.values());
    if (!filter) return all;
    return all.filter(
      (n) =>
        (filter.name === undefined || n.name === filter.name) &&
        (filter.type === undefined || n.type === filter.type),
    );
  }

  /** Node ids in declaration order. */
  nodeIds(): number[] {
    return Array.from(this.nodesById.keys());
  }

  addNode(init: NodeInit): WorkflowNode {
    return this.addNodes([init])[0];
  }

  /**
   * Add several nodes at once. Links may reference any node already in the
   * graph or any node in the batch, so forward references are allowed.
   * Nothing is added when any node in the batch is invalid.
   */
  addNodes(inits: NodeInit[], createOptions: NodeCreateOptions[] = []): WorkflowNode[] {
    const batchIds = new Set<number>();
    for (const init of inits) {
      if (!isValidNodeId(init.id)) {
        throw invalidGraphError(`Node id must be a non-negative integer, got ${String(init.id)}`, { id: init.id });
      }
      if (this.nodesById.has(init.id) || batchIds.has(init.id)) {
        throw invalidGraphError(`Duplicate node id ${init.id}`, { id: init.id }, init.id);
      }
      if (typeof init.type !== 'string' || init.type.length === 0) {
        throw invalidGraphError(`Node ${init.id} has no type`, { id: init.id }, init.id);
      }
      batchIds.add(init.id);
    }

    const inBatchOrGraph = (id: number): boolean => this.nodesById.has(id) || batchIds.has(id);

    const created = inits.map((init, index) => {
      const options = createOptions[index] ?? {};
      const node = new WorkflowNode(this, init.id, init.type, {
        name: init.name,
        extraFields: options.extraFields,
        extraMeta: options.extraMeta,
        metaPresent: options.metaPresent,
        inputsPresent: options.inputsPresent,
        numericLinkInputs: options.numericLinkInputs,
      });
      for (const [name, value] of options.opaqueInputs ?? []) {
        node.setOpaqueInput(name, value);
      }
      for (const [name, value] of Object.entries(init.properties ?? {})) {
        assertAssignable(init.id, name, value);
        if (isOutputRef(value)) assertLinkTarget(init.id, value, inBatchOrGraph);
        node.setPropertyUnchecked(name, value);
      }
      if (options.inputOrder) node.reorderInputs(options.inputOrder);
      return node;
    });

    for (const node of created) {
      this.nodesById.set(node.id, node);
    }
    return created;
  }

  /**
   * Remove a node. Fails when other nodes still link to it, unless
   * `detachLinks` is set, in which case those linked inputs are deleted too.
   */
  removeNode(id: number, options: RemoveNodeOptions = {}): void {
    const node = this.nodeById(id);
    const dependents = this.links().filter((link) => link.source.nodeId === id);
    if (dependents.length > 0 && !options.detachLinks) {
      throw invalidGraphError(
        `Node ${id} is still linked into ${dependents.map((l) => `${l.target.nodeId}.${l.target.input}`).join(', ')}`,
        { dependents },
        id,
      );
    }
    for (const link of dependents) {
      this.nodeById(link.target.nodeId).deleteProperty(link.target.input);
    }
    this.nodesById.delete(id);
    node.detach();
  }

  /** Connect `source.slot` to the named input of `target`, replacing any value there. */
  addLink(source: { nodeId: number; slot: number }, target: { nodeId: number; input: string }): Link {
    if (!this.nodesById.has(source.nodeId)) {
      throw invalidGraphError(`Link source node ${source.nodeId} does not exist`, { source, target });
    }
    if (!isValidSlot(source.slot)) {
      throw invalidGraphError(`Invalid output slot ${source.slot}`, { source, target }, source.nodeId);
    }
    const targetNode = this.nodesById.get(target.nodeId);
    if (!targetNode) {
      throw invalidGraphError(`Link target node ${target.nodeId} does not exist`, { source, target });
    }
    targetNode.setProperty(target.input, outputRef(source.nodeId, source.slot));
    return { source: { ...source }, target: { ...target } };
  }

  /** Remove the link feeding `target.input`. */
  removeLink(target: { nodeId: number; input: string }): void {
    const targetNode = this.nodeById(target.nodeId);
    const value = targetNode.hasProperty(target.input) ? targetNode.getProperty(target.input) : undefined;
    if (!isOutputRef(value)) {
      throw invalidGraphError(`Input "${target.input}" of node ${target.nodeId} is not linked`, { target }, target.nodeId);
    }
    targetNode.deleteProperty(target.input);
  }

  /** Links in target-node declaration order. */
  links(): Link[] {
    const links: Link[] = [];
    for (const node of this.nodesById.values()) {
      for (const { input, ref } of node.incomingRefs()) {
        links.push({
          source: { nodeId: ref.nodeId, slot: ref.slot },
          target: { nodeId: node.id, input },
        });
      }
    }
    return links;
  }

  /** Independent deep copy. Generators are shared by reference. */
  clone(): WorkflowGraph {
    const copy = new WorkflowGraph();
    const inits: NodeInit[] = [];
    const options: NodeCreateOptions[] = [];
    for (const node of this.nodesById.values()) {
      const properties: Record<string, AssignableValue> = {};
      const opaqueInputs: NonNullable<NodeCreateOptions['opaqueInputs']> = [];
      for (const [name, entry] of node.entries()) {
        if (entry.kind === 'property') properties[name] = entry.value;
        else opaqueInputs.push([name, structuredClone(entry.value)]);
      }
      inits.push({ id: node.id, type: node.type, name: node.name, properties });
      options.push({
        extraFields: structuredClone(node.extraFields),
        extraMeta: structuredClone(node.extraMeta),
        metaPresent: node.metaPresent,
        inputsPresent: node.inputsPresent,
        numericLinkInputs: Array.from(node.numericLinkInputs),
        opaqueInputs,
        inputOrder: node.entries().map(([name]) => name),
      });
    }
    copy.addNodes(inits, options);
    return copy;
  }

  private nodeById(id: number): WorkflowNode {
    const node = this.nodesById.get(id);
    if (!node) throw nodeNotFoundError(id, 'id');
    return node;
  }

  private single(reference: string, kind: 'name' | 'type'): WorkflowNode {
    const matches = this.nodes(kind === 'name' ? { name: reference } : { type: reference });
    if (matches.length === 0) throw nodeNotFoundError(reference, kind);
    if (matches.length > 1) {
      throw ambiguousNodeError(reference, kind, matches.map((n) => n.id));
    }
    return matches[0];
  }
}
