import { Artifact, ArtifactFetcher, ResultCollection } from '../../src/engine/results';
import { mediaTypeFromFilename, sniffMediaType } from '../../src/engine/media-types';
import { ArtifactRef } from '../../src/connection/types';
import { artifactRef } from '../helpers/fake-server';

const byName: ArtifactFetcher = async (ref) => new Uint8Array(Buffer.from(ref.filename));

function artifact(nodeId: number, slot: number, filename: string, fetcher: ArtifactFetcher = byName) {
  return new Artifact({ nodeId, slot, ref: artifactRef(filename) }, fetcher);
}

describe('ResultCollection', () => {
  test('orders by declaration order, then slot, regardless of arrival order', () => {
    const collection = new ResultCollection(
      [artifact(5, 0, 'c.png'), artifact(9, 1, 'b.png'), artifact(2, 0, 'x.png'), artifact(9, 0, 'a.png')],
      [9, 2, 5],
    );
    expect(collection.toArray().map((a) => a.filename)).toEqual(['a.png', 'b.png', 'x.png', 'c.png']);
    expect(collection.length).toBe(4);
  });

  test('nodes missing from the order go last, by id', () => {
    const collection = new ResultCollection(
      [artifact(40, 0, 'late.png'), artifact(30, 0, 'early.png'), artifact(1, 0, 'first.png')],
      [1],
    );
    expect([...collection].map((a) => a.nodeId)).toEqual([1, 30, 40]);
  });

  test('at() and byNode()', () => {
    const collection = new ResultCollection(
      [artifact(9, 1, 'b.png'), artifact(2, 0, 'x.png'), artifact(9, 0, 'a.png')],
      [2, 9],
    );
    expect(collection.at(0)?.filename).toBe('x.png');
    expect(collection.at(-1)?.filename).toBe('b.png');
    expect(collection.at(5)).toBeUndefined();
    expect(collection.byNode(9).map((a) => a.slot)).toEqual([0, 1]);
    expect(collection.byNode(7)).toEqual([]);
  });

  test('toArray returns a copy', () => {
    const collection = new ResultCollection([artifact(1, 0, 'a.png')], [1]);
    collection.toArray().pop();
    expect(collection.length).toBe(1);
  });

  test('empty()', () => {
    expect(ResultCollection.empty().length).toBe(0);
  });

  test('bytes() fetches every payload in order', async () => {
    const collection = new ResultCollection([artifact(2, 0, 'b.png'), artifact(1, 0, 'a.png')], [1, 2]);
    const payloads = await collection.bytes();
    expect(payloads.map((p) => Buffer.from(p).toString())).toEqual(['a.png', 'b.png']);
  });
});

describe('Artifact', () => {
  test('concurrent first reads share one download', async () => {
    const fetcher = jest.fn(async (_ref: ArtifactRef) => new Uint8Array([1, 2, 3]));
    const a = artifact(9, 0, 'a.png', fetcher);

    const [first, second] = await Promise.all([a.bytes(), a.bytes()]);
    await a.bytes();

    expect(fetcher).toHaveBeenCalledTimes(1);
    expect(first).toBe(second);
  });

  test('a failed download is retried on the next read', async () => {
    const fetcher = jest
      .fn<Promise<Uint8Array>, [ArtifactRef]>()
      .mockRejectedValueOnce(new Error('HTTP 503'))
      .mockResolvedValueOnce(new Uint8Array([9]));
    const a = artifact(9, 0, 'a.png', fetcher);

    await expect(a.bytes()).rejects.toThrow('HTTP 503');
    await expect(a.bytes()).resolves.toEqual(new Uint8Array([9]));
    expect(fetcher).toHaveBeenCalledTimes(2);
  });

  test('media type comes from the extension, else from the payload', async () => {
    expect(artifact(1, 0, 'clip.MP4').mediaType).toBe('video/mp4');

    const png = new Uint8Array([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);
    const a = artifact(1, 0, 'output_00001_', jest.fn(async () => png));
    expect(a.mediaType).toBe('application/octet-stream');
    await a.bytes();
    expect(a.mediaType).toBe('image/png');
  });

  test('the file reference is frozen', () => {
    expect(Object.isFrozen(artifact(1, 0, 'a.png').ref)).toBe(true);
  });
});

describe('media types', () => {
  test('mediaTypeFromFilename', () => {
    expect(mediaTypeFromFilename('a.webp')).toBe('image/webp');
    expect(mediaTypeFromFilename('a.tar.gz')).toBe('application/octet-stream');
    expect(mediaTypeFromFilename('noext')).toBe('application/octet-stream');
    expect(mediaTypeFromFilename('trailing.')).toBe('application/octet-stream');
  });

  test('sniffMediaType', () => {
    expect(sniffMediaType(new Uint8Array([0xff, 0xd8, 0xff, 0xe0]))).toBe('image/jpeg');
    expect(sniffMediaType(new Uint8Array(Buffer.from('GIF89a')))).toBe('image/gif');
    expect(sniffMediaType(new Uint8Array(Buffer.from('RIFF\0\0\0\0WEBPVP8 ')))).toBe('image/webp');
    expect(sniffMediaType(new Uint8Array(Buffer.from('RIFF\0\0\0\0WAVEfmt ')))).toBe('audio/wav');
    expect(sniffMediaType(new Uint8Array(Buffer.from('\0\0\0\x18ftypmp42')))).toBe('video/mp4');
    expect(sniffMediaType(new Uint8Array([0x1a, 0x45, 0xdf, 0xa3]))).toBe('video/webm');
    expect(sniffMediaType(new Uint8Array([1, 2]))).toBe('application/octet-stream');
  });
});
