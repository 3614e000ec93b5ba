// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { LocalVectorStore } from '../src/rag/stores/local-store.js';
import { MemoryVectorStore } from '../src/rag/stores/memory-store.js';
import { RemoteVectorStore, pointIdFor } from '../src/rag/stores/remote-store.js';
import type { VectorStore } from '../src/rag/vector-store.js';
import {
  BackendUnavailableError,
  DimensionMismatchError,
  TimeoutError,
} from '../src/errors.js';
import type { Document } from '../src/rag/types.js';

interface FakePoint {
  id: string | number;
  vector: number[];
  payload: Record<string, unknown>;
}

interface FakeCollection {
  size: number;
  distance: string;
  points: Map<string | number, FakePoint>;
}

// In-process stand-in for a Qdrant server
const server = vi.hoisted(() => ({
  collections: new Map<string, FakeCollection>(),
  clientConfigs: new Array<{ url: string; timeout?: number }>(),
  failing: false,
  hanging: false,
}));

vi.mock('@qdrant/js-client-rest', () => {
  const respond = async <T>(value: () => T): Promise<T> => {
    if (server.hanging) return new Promise<T>(() => {});
    if (server.failing) throw new Error('connect ECONNREFUSED');
    return value();
  };

  const collection = (name: string): FakeCollection => {
    const found = server.collections.get(name);
    if (!found) throw new Error(`Not found: Collection \`${name}\` doesn't exist!`);
    return found;
  };

  class QdrantClient {
    constructor(config: { url: string; timeout?: number }) {
      server.clientConfigs.push(config);
    }

    getCollections() {
      return respond(() => ({
        collections: [...server.collections.keys()].map((name) => ({ name })),
      }));
    }

    getCollection(name: string) {
      return respond(() => {
        const c = collection(name);
        return { config: { params: { vectors: { size: c.size, distance: c.distance } } } };
      });
    }

    createCollection(name: string, body: { vectors: { size: number; distance: string } }) {
      return respond(() => {
        server.collections.set(name, { size: body.vectors.size, distance: body.vectors.distance, points: new Map() });
        return true;
      });
    }

    deleteCollection(name: string) {
      return respond(() => server.collections.delete(name));
    }

    retrieve(name: string, body: { ids: Array<string | number> }) {
      return respond(() => {
        const c = collection(name);
        return body.ids.flatMap((id) => {
          const point = c.points.get(id);
          return point ? [{ id: point.id, payload: point.payload }] : [];
        });
      });
    }

    upsert(name: string, body: { points: FakePoint[] }) {
      return respond(() => {
        const c = collection(name);
        for (const point of body.points) {
          if (point.vector.length !== c.size) throw new Error('Wrong input: Vector dimension error');
          c.points.set(point.id, point);
        }
        return { status: 'completed' };
      });
    }

    count(name: string) {
      return respond(() => ({ count: collection(name).points.size }));
    }

    scroll(name: string, body: { limit: number; offset?: string | number; with_vector?: boolean }) {
      return respond(() => {
        const ids = [...collection(name).points.keys()].map(String).sort();
        const start = body.offset === undefined ? 0 : ids.indexOf(String(body.offset));
        const page = ids.slice(start, start + body.limit);
        const next = ids[start + body.limit];
        return {
          points: page.map((id) => {
            const p = collection(name).points.get(id);
            if (!p) return { id, payload: null };
            return body.with_vector ? { id, payload: p.payload, vector: p.vector } : { id, payload: p.payload };
          }),
          next_page_offset: next ?? null,
        };
      });
    }

    delete(name: string, body: { points: Array<string | number> }) {
      return respond(() => {
        const c = collection(name);
        for (const id of body.points) c.points.delete(id);
        return { status: 'completed' };
      });
    }
  }

  return { QdrantClient };
});

const QDRANT_URL = 'http://qdrant.test:6333';

function doc(id: string, embedding: number[], source = id): Document {
  return { id, content: `content of ${id}`, embedding, metadata: { source } };
}

describe('pointIdFor', () => {
  it('derives a stable UUID from the document id', () => {
    const id = pointIdFor('notes.md_chunk_0');
    expect(id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-5[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(pointIdFor('notes.md_chunk_0')).toBe(id);
    expect(pointIdFor('notes.md_chunk_1')).not.toBe(id);
  });
});

describe('RemoteVectorStore', () => {
  beforeEach(() => {
    server.collections.clear();
    server.clientConfigs.length = 0;
    server.failing = false;
    server.hanging = false;
  });

  it('creates a cosine collection of the requested size on connect', async () => {
    const store = await RemoteVectorStore.connect(QDRANT_URL, 'knowledge', { dimensions: 3, timeoutMs: 5000 });

    expect(store.getUrl()).toBe(QDRANT_URL);
    expect(server.clientConfigs).toEqual([{ url: QDRANT_URL, timeout: 5000 }]);
    const created = server.collections.get('knowledge');
    expect(created?.size).toBe(3);
    expect(created?.distance).toBe('Cosine');
  });

  it('creates the collection lazily when the size is not known up front', async () => {
    const store = await RemoteVectorStore.connect(QDRANT_URL, 'knowledge');

    expect(server.collections.has('knowledge')).toBe(false);
    expect(await store.count()).toBe(0);
    expect(await store.search([1, 0], 3)).toEqual([]);
    expect(await store.getIndexedPaths()).toEqual([]);

    await store.add(doc('a', [1, 0, 0, 0]));
    expect(server.collections.get('knowledge')?.size).toBe(4);
    expect(await store.count()).toBe(1);
  });

  it('creates the collection once for concurrent first adds', async () => {
    const store = await RemoteVectorStore.connect(QDRANT_URL, 'knowledge');

    await Promise.all([store.add(doc('a', [1, 0])), store.add(doc('b', [0, 1]))]);

    expect(await store.count()).toBe(2);
  });

  it('adopts an existing collection of the same size', async () => {
    const first = await RemoteVectorStore.connect(QDRANT_URL, 'knowledge', { dimensions: 2 });
    await first.add(doc('a', [1, 0]));

    const second = await RemoteVectorStore.connect(QDRANT_URL, 'knowledge', { dimensions: 2 });
    expect(await second.count()).toBe(1);
  });

  it('rejects an existing collection of a different size', async () => {
    await RemoteVectorStore.connect(QDRANT_URL, 'knowledge', { dimensions: 2 });

    await expect(
      RemoteVectorStore.connect(QDRANT_URL, 'knowledge', { dimensions: 3 })
    ).rejects.toThrow(BackendUnavailableError);
  });

  it('maps stored payloads back to documents', async () => {
    const store = await RemoteVectorStore.connect(QDRANT_URL, 'knowledge', { dimensions: 2 });
    await store.add({ id: 'f.md_chunk_0', content: 'hello', embedding: [1, 0], metadata: { source: 'f.md', chunk: '0' } });

    const point = server.collections.get('knowledge')?.points.get(pointIdFor('f.md_chunk_0'));
    expect(point?.payload).toMatchObject({
      docId: 'f.md_chunk_0',
      content: 'hello',
      metadata: { source: 'f.md', chunk: '0' },
    });

    const [result] = await store.search([1, 0], 1);
    expect(result.document).toEqual({
      id: 'f.md_chunk_0',
      content: 'hello',
      embedding: [1, 0],
      metadata: { source: 'f.md', chunk: '0' },
    });
    expect(result.score).toBeCloseTo(1, 5);
  });

  it('orders results by score, then insertion order', async () => {
    const store = await RemoteVectorStore.connect(QDRANT_URL, 'knowledge', { dimensions: 2 });
    await store.add(doc('first', [1, 0]));
    await store.add(doc('second', [2, 0]));
    await store.add(doc('third', [3, 0]));
    await store.add(doc('other', [0, 1]));

    const results = await store.search([1, 0], 4);
    expect(results.map((r) => r.document.id)).toEqual(['first', 'second', 'third', 'other']);
  });

  it('breaks ties beyond topK by insertion order', async () => {
    const store = await RemoteVectorStore.connect(QDRANT_URL, 'knowledge', { dimensions: 2 });
    for (const id of ['first', 'second', 'third', 'fourth', 'fifth']) {
      await store.add(doc(id, [1, 0]));
    }

    expect((await store.search([1, 0], 1)).map((r) => r.document.id)).toEqual(['first']);
    expect((await store.search([1, 0], 3)).map((r) => r.document.id)).toEqual(['first', 'second', 'third']);
  });

  it('scores a query of a different dimensionality as 0', async () => {
    const store = await RemoteVectorStore.connect(QDRANT_URL, 'knowledge', { dimensions: 2 });
    await store.add(doc('a', [1, 0]));
    await store.add(doc('b', [0, 1]));

    const results = await store.search([1, 0, 0], 2);

    expect(results.map((r) => [r.document.id, r.score])).toEqual([['a', 0], ['b', 0]]);
  });

  it('keeps the original position when a document is overwritten', async () => {
    const store = await RemoteVectorStore.connect(QDRANT_URL, 'knowledge', { dimensions: 2 });
    await store.add(doc('first', [1, 0]));
    await store.add(doc('second', [1, 0]));
    await store.add({ ...doc('first', [1, 0]), content: 'updated' });

    const results = await store.search([1, 0], 2);
    expect(results.map((r) => r.document.id)).toEqual(['first', 'second']);
    expect(results[0].document.content).toBe('updated');
    expect(await store.count()).toBe(2);
  });

  it('returns an empty list for topK 0 without calling the server', async () => {
    const store = await RemoteVectorStore.connect(QDRANT_URL, 'knowledge', { dimensions: 2 });
    await store.add(doc('a', [1, 0]));
    server.failing = true;

    expect(await store.search([1, 0], 0)).toEqual([]);
  });

  it('rejects embeddings of a different dimensionality before sending them', async () => {
    const store = await RemoteVectorStore.connect(QDRANT_URL, 'knowledge', { dimensions: 2 });
    await expect(store.add(doc('a', [1, 0, 0]))).rejects.toThrow(DimensionMismatchError);
  });

  it('lists sources and removes by prefix across scroll pages', async () => {
    const store = await RemoteVectorStore.connect(QDRANT_URL, 'knowledge', { dimensions: 2 });
    for (let i = 0; i < 300; i++) {
      await store.add(doc(`chunk${i}`, [1, i], `/repo/docs/file${i % 3}.md`));
    }
    await store.add(doc('keep', [1, 0], '/repo/docs-old/x.md'));

    expect(await store.getIndexedPaths()).toEqual([
      '/repo/docs-old/x.md',
      '/repo/docs/file0.md',
      '/repo/docs/file1.md',
      '/repo/docs/file2.md',
    ]);

    expect(await store.removeBySource('/repo/docs')).toBe(300);
    expect(await store.count()).toBe(1);
    expect(await store.removeBySource('/repo/docs')).toBe(0);
  });

  it('clears by recreating the collection', async () => {
    const store = await RemoteVectorStore.connect(QDRANT_URL, 'knowledge', { dimensions: 2 });
    await store.add(doc('a', [1, 0]));

    await store.clear();
    await store.clear();

    expect(await store.count()).toBe(0);
    expect(server.collections.get('knowledge')?.size).toBe(2);
    await store.add(doc('b', [0, 1]));
    expect(await store.count()).toBe(1);
  });

  it('forgets an inferred size when cleared', async () => {
    const store = await RemoteVectorStore.connect(QDRANT_URL, 'knowledge');
    await store.add(doc('a', [1, 0]));

    await store.clear();
    expect(server.collections.has('knowledge')).toBe(false);

    await store.add(doc('b', [1, 0, 0]));
    expect(await store.count()).toBe(1);
    expect(server.collections.get('knowledge')?.size).toBe(3);
  });

  it('keeps a requested size when cleared', async () => {
    const store = await RemoteVectorStore.connect(QDRANT_URL, 'knowledge', { dimensions: 2 });
    await store.add(doc('a', [1, 0]));

    await store.clear();

    await expect(store.add(doc('b', [1, 0, 0]))).rejects.toThrow(DimensionMismatchError);
  });

  it('reports an unreachable server as BackendUnavailableError', async () => {
    server.failing = true;

    await expect(RemoteVectorStore.connect(QDRANT_URL, 'knowledge')).rejects.toThrow(BackendUnavailableError);
    await expect(RemoteVectorStore.connect(QDRANT_URL, 'knowledge')).rejects.toThrow(
      `Qdrant getCollections failed at ${QDRANT_URL}: connect ECONNREFUSED`
    );
  });

  it('reports failures after connecting as BackendUnavailableError', async () => {
    const store = await RemoteVectorStore.connect(QDRANT_URL, 'knowledge', { dimensions: 2 });
    server.failing = true;

    await expect(store.add(doc('a', [1, 0]))).rejects.toThrow(BackendUnavailableError);
    await expect(store.count()).rejects.toThrow(BackendUnavailableError);
  });

  it('bounds each request by the configured timeout', async () => {
    server.hanging = true;

    const attempt = RemoteVectorStore.connect(QDRANT_URL, 'knowledge', { timeoutMs: 20 });

    await expect(attempt).rejects.toThrow(TimeoutError);
    await expect(attempt).rejects.toMatchObject({ transient: true, code: 'TIMEOUT' });
  });
});

describe('store engines', () => {
  let root: string;

  beforeEach(() => {
    server.collections.clear();
    server.failing = false;
    server.hanging = false;
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'ragstore-engines-'));
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  async function engines(): Promise<Array<[string, VectorStore]>> {
    return [
      ['memory', new MemoryVectorStore()],
      ['local', await LocalVectorStore.open(root, 'knowledge')],
      ['remote', await RemoteVectorStore.connect(QDRANT_URL, 'knowledge')],
    ];
  }

  const corpus = [
    doc('tie-1', [1, 1, 0]),
    doc('best', [1, 0, 0]),
    doc('tie-2', [2, 2, 0]),
    doc('far', [0, 0, 1]),
    doc('tie-3', [4, 4, 0]),
    doc('close', [2, 1, 0]),
  ];

  it('return the same ranking for the same documents and query', async () => {
    const rankings = new Map<string, string[]>();
    for (const [name, store] of await engines()) {
      for (const document of corpus) await store.add(document);
      const results = await store.search([1, 0.5, 0], 4);
      rankings.set(name, results.map((r) => r.document.id));
      await store.close();
    }

    expect(rankings.get('memory')).toEqual(['close', 'tie-1', 'tie-2', 'tie-3']);
    expect(rankings.get('local')).toEqual(rankings.get('memory'));
    expect(rankings.get('remote')).toEqual(rankings.get('memory'));
  });

  it('cut ties at topK the same way', async () => {
    for (const [name, store] of await engines()) {
      for (const document of corpus) await store.add(document);
      const results = await store.search([1, 1, 0], 2);
      expect(results.map((r) => `${name}:${r.document.id}`)).toEqual([`${name}:tie-1`, `${name}:tie-2`]);
      await store.close();
    }
  });
});
