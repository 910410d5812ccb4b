import { WorkflowGraph } from '../../src/graph/graph';
import { generated, outputRef } from '../../src/graph/types';
import {
  AmbiguousError,
  InvalidGraphError,
  NotFoundError,
} from '../../src/domain/errors';

function sampleGraph(): WorkflowGraph {
  const graph = new WorkflowGraph();
  graph.addNodes([
    { id: 4, type: 'CheckpointLoaderSimple', name: 'Load Checkpoint', properties: { ckpt_name: 'model.safetensors' } },
    { id: 6, type: 'CLIPTextEncode', name: 'Positive', properties: { text: 'a red fox', clip: outputRef(4, 1) } },
    { id: 3, type: 'KSampler', name: 'Sampler', properties: { seed: 1, steps: 20, model: outputRef(4, 0), positive: outputRef(6, 0) } },
  ]);
  return graph;
}

describe('WorkflowGraph lookup', () => {
  test('resolves nodes by id and by name', () => {
    const graph = sampleGraph();
    expect(graph.node(3).type).toBe('KSampler');
    expect(graph.node('Positive').id).toBe(6);
    expect(graph.node({ id: 4 }).name).toBe('Load Checkpoint');
    expect(graph.node({ type: 'KSampler' }).id).toBe(3);
  });

  test('unknown id or name fails with NotFoundError', () => {
    const graph = sampleGraph();
    expect(() => graph.node(99)).toThrow(NotFoundError);
    expect(() => graph.node('Negative')).toThrow(NotFoundError);
  });

  test('a name shared by two nodes is ambiguous, never the first match', () => {
    const graph = new WorkflowGraph();
    graph.addNodes([
      { id: 3, type: 'CLIPTextEncode', name: 'A', properties: { text: 'x' } },
      { id: 7, type: 'CLIPTextEncode', name: 'A', properties: { text: 'y' } },
    ]);

    let caught: unknown;
    try {
      graph.node('A');
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(AmbiguousError);
    expect(caught instanceof AmbiguousError && caught.candidates).toEqual([3, 7]);
    expect(caught instanceof AmbiguousError && caught.code).toBe('GRAPH.AMBIGUOUS');

    expect(graph.node(3).property('text').value).toBe('x');
    expect(graph.node(7).property('text').value).toBe('y');
  });

  test('type lookups are ambiguous too', () => {
    const graph = new WorkflowGraph();
    graph.addNodes([
      { id: 1, type: 'SaveImage' },
      { id: 2, type: 'SaveImage' },
    ]);
    expect(() => graph.node({ type: 'SaveImage' })).toThrow(AmbiguousError);
    expect(graph.nodes({ type: 'SaveImage' }).map((n) => n.id)).toEqual([1, 2]);
  });

  test('nodes() keeps declaration order', () => {
    expect(sampleGraph().nodes().map((n) => n.id)).toEqual([4, 6, 3]);
  });
});

describe('PropertyHandle', () => {
  test('set mutates in place and is visible through other handles', () => {
    const graph = sampleGraph();
    const handle = graph.node('Sampler').property('seed');
    handle.set(1234);
    expect(graph.node(3).property('seed').get()).toBe(1234);
    expect(handle.equals(1234)).toBe(true);
  });

  test('missing property fails with NotFoundError listing what exists', () => {
    const graph = sampleGraph();
    let caught: unknown;
    try {
      graph.node(4).property('vae_name');
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(NotFoundError);
    expect(caught instanceof NotFoundError && caught.typedError.details).toEqual({
      property: 'vae_name',
      available: ['ckpt_name'],
    });
  });

  test('scalar writes must keep the coarse type', () => {
    const handle = sampleGraph().node(3).property('steps');
    expect(() => handle.set('twenty')).toThrow(InvalidGraphError);
    expect(() => handle.set(Number.NaN)).toThrow(InvalidGraphError);
    expect(handle.value).toBe(20);
  });

  test('a scalar may be replaced by a link to an existing node', () => {
    const graph = sampleGraph();
    graph.node(3).property('seed').set(outputRef(4, 2));
    expect(graph.links()).toContainEqual({ source: { nodeId: 4, slot: 2 }, target: { nodeId: 3, input: 'seed' } });
  });

  test('links must reference an existing node', () => {
    const handle = sampleGraph().node(3).property('model');
    expect(() => handle.set(outputRef(42, 0))).toThrow(InvalidGraphError);
    expect(() => handle.set(outputRef(4, -1))).toThrow(InvalidGraphError);
  });

  test('generators are accepted without interpretation', () => {
    const handle = sampleGraph().node(3).property('seed');
    const seed = generated(() => 7, 'seed');
    handle.set(seed);
    expect(handle.value).toBe(seed);
  });
});

describe('structural edits', () => {
  test('addNode rejects duplicate and non-integer ids', () => {
    const graph = sampleGraph();
    expect(() => graph.addNode({ id: 3, type: 'KSampler' })).toThrow(InvalidGraphError);
    expect(() => graph.addNode({ id: 1.5, type: 'KSampler' })).toThrow(InvalidGraphError);
    expect(() => graph.addNode({ id: -1, type: 'KSampler' })).toThrow(InvalidGraphError);
  });

  test('a batch with a dangling link adds nothing', () => {
    const graph = sampleGraph();
    expect(() =>
      graph.addNodes([
        { id: 8, type: 'VAEDecode', properties: { samples: outputRef(3, 0) } },
        { id: 9, type: 'SaveImage', properties: { images: outputRef(10, 0) } },
      ]),
    ).toThrow(InvalidGraphError);
    expect(graph.hasNode(8)).toBe(false);
    expect(graph.size).toBe(3);
  });

  test('a batch may link forward to nodes declared later in it', () => {
    const graph = new WorkflowGraph();
    graph.addNodes([
      { id: 9, type: 'SaveImage', properties: { images: outputRef(8, 0) } },
      { id: 8, type: 'VAEDecode' },
    ]);
    expect(graph.links()).toEqual([{ source: { nodeId: 8, slot: 0 }, target: { nodeId: 9, input: 'images' } }]);
  });

  test('removing a node that is still a link source fails', () => {
    const graph = sampleGraph();
    expect(() => graph.removeNode(4)).toThrow(InvalidGraphError);
    expect(graph.hasNode(4)).toBe(true);
  });

  test('detachLinks removes the node and the inputs that linked to it', () => {
    const graph = sampleGraph();
    graph.removeNode(6, { detachLinks: true });
    expect(graph.hasNode(6)).toBe(false);
    expect(graph.node(3).hasProperty('positive')).toBe(false);
  });

  test('a removed node rejects further writes', () => {
    const graph = sampleGraph();
    const sampler = graph.node(3);
    graph.removeNode(3);
    expect(sampler.attached).toBe(false);
    expect(() => sampler.setProperty('seed', 2)).toThrow(InvalidGraphError);
  });

  test('addLink and removeLink edit the target input', () => {
    const graph = sampleGraph();
    graph.addNode({ id: 8, type: 'VAEDecode' });
    graph.addLink({ nodeId: 3, slot: 0 }, { nodeId: 8, input: 'samples' });
    expect(graph.node(8).property('samples').value).toEqual(outputRef(3, 0));

    graph.removeLink({ nodeId: 8, input: 'samples' });
    expect(graph.node(8).hasProperty('samples')).toBe(false);
    expect(() => graph.removeLink({ nodeId: 3, input: 'seed' })).toThrow(InvalidGraphError);
  });

  test('a node cannot link to itself', () => {
    const graph = sampleGraph();
    expect(() => graph.addLink({ nodeId: 3, slot: 0 }, { nodeId: 3, input: 'latent_image' })).toThrow(InvalidGraphError);
  });
});

describe('clone', () => {
  test('produces an independent copy', () => {
    const graph = sampleGraph();
    const copy = graph.clone();
    copy.node(3).property('seed').set(99);
    copy.removeNode(3);

    expect(graph.node(3).property('seed').value).toBe(1);
    expect(copy.nodes().map((n) => n.id)).toEqual([4, 6]);
    expect(copy.node(6).property('clip').value).toEqual(outputRef(4, 1));
  });
});
