// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Remote vector store.
 *
 * Forwards every operation to a Qdrant server over its REST API. Point ids
 * are UUIDs derived from the document id, which travels in the payload
 * together with the content, metadata and an insertion sequence.
 *
 * Search scrolls the whole collection and ranks it locally by exact cosine
 * similarity, so results and their tie order match the other engines.
 */

import { QdrantClient } from '@qdrant/js-client-rest';
import * as crypto from 'crypto';
import { BackendUnavailableError, RagError, errorMessage } from '../../errors.js';
import { logger } from '../../logger.js';
import { withTimeout } from '../../utils/timeout.js';
import { rankDocuments } from '../../utils/vector.js';
import type { Document, SearchResult } from '../types.js';
import type { VectorStore } from '../vector-store.js';
import { assertTopK, checkDocument, matchesSource, sortedSources } from './shared.js';

/** Points fetched per scroll page */
const SCROLL_PAGE_SIZE = 256;

/** Default bound for one request */
const DEFAULT_TIMEOUT_MS = 10000;

export interface RemoteStoreOptions {
  /** Fixed dimensionality; the collection is created lazily when omitted */
  dimensions?: number;
  /** Upper bound for one request in milliseconds */
  timeoutMs?: number;
}

/**
 * Payload stored with every point.
 */
interface PointPayload {
  docId: string;
  content: string;
  metadata: Record<string, string>;
  seq: number;
}

/**
 * A point as returned by scroll or retrieve.
 */
interface RemotePoint {
  id: string | number;
  payload?: Record<string, unknown> | null;
  vector?: unknown;
}

/**
 * Derive a stable UUID for a document id (Qdrant only accepts integers
 * and UUIDs as point ids).
 */
export function pointIdFor(documentId: string): string {
  const hex = crypto.createHash('sha256').update(documentId).digest('hex');
  const variant = ((parseInt(hex[16], 16) & 0x3) | 0x8).toString(16);
  return [
    hex.slice(0, 8),
    hex.slice(8, 12),
    '5' + hex.slice(13, 16),
    variant + hex.slice(17, 20),
    hex.slice(20, 32),
  ].join('-');
}

export class RemoteVectorStore implements VectorStore {
  private dimensions: number | null;
  private readonly requestedDimensions: number | null;
  private collectionReady: boolean;
  private seqCounter = 0;
  private creating: Promise<void> | null = null;

  private constructor(
    private client: QdrantClient,
    private readonly url: string,
    private readonly collectionName: string,
    dimensions: number | null,
    collectionReady: boolean,
    private readonly timeoutMs: number
  ) {
    this.dimensions = dimensions;
    this.requestedDimensions = dimensions;
    this.collectionReady = collectionReady;
  }

  /**
   * Connect to the server and verify (or create) the collection.
   * @throws BackendUnavailableError if the server is unreachable or the
   *   collection has a different vector size
   */
  static async connect(
    url: string,
    collectionName: string,
    options: RemoteStoreOptions = {}
  ): Promise<RemoteVectorStore> {
    const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    let client: QdrantClient;
    try {
      client = new QdrantClient({ url, timeout: timeoutMs });
    } catch (error) {
      throw new BackendUnavailableError(`Invalid Qdrant URL ${url}: ${errorMessage(error)}`, { cause: error });
    }

    const store = new RemoteVectorStore(
      client,
      url,
      collectionName,
      options.dimensions ?? null,
      false,
      timeoutMs
    );
    await store.verifyCollection(options.dimensions);
    logger.storeOpened('remote', collectionName, await store.count());
    return store;
  }

  async add(document: Document): Promise<void> {
    const dimensions = checkDocument(document, this.dimensions);
    await this.ensureCollection(dimensions);

    const id = pointIdFor(document.id);
    const existing = await this.call('retrieve', (client) =>
      client.retrieve(this.collectionName, { ids: [id], with_payload: true, with_vector: false })
    );
    const previous = existing.length > 0 ? decodePayload(existing[0].payload) : null;

    const payload: PointPayload = {
      docId: document.id,
      content: document.content,
      metadata: { ...document.metadata },
      seq: previous?.seq ?? this.nextSeq(),
    };

    await this.call('upsert', (client) =>
      client.upsert(this.collectionName, {
        wait: true,
        points: [{ id, vector: [...document.embedding], payload: { ...payload } }],
      })
    );
  }

  async search(queryEmbedding: number[], topK: number): Promise<SearchResult[]> {
    assertTopK(topK);
    if (topK === 0) return [];

    const points = await this.scrollAll(true);
    const decoded: Array<{ document: Document; seq: number }> = [];
    for (const point of points) {
      const entry = decodePoint(point);
      if (entry) decoded.push(entry);
    }
    decoded.sort((a, b) => a.seq - b.seq);

    return rankDocuments(queryEmbedding, decoded.map((entry) => entry.document), topK);
  }

  async count(): Promise<number> {
    if (!this.collectionReady) return 0;
    const result = await this.call('count', (client) =>
      client.count(this.collectionName, { exact: true })
    );
    return result.count;
  }

  async clear(): Promise<void> {
    if (!this.collectionReady) return;

    await this.call('deleteCollection', (client) => client.deleteCollection(this.collectionName));
    this.collectionReady = false;
    // An inferred size goes with the data; a requested one is kept
    this.dimensions = this.requestedDimensions;
    if (this.requestedDimensions !== null) {
      await this.ensureCollection(this.requestedDimensions);
    }
  }

  async getIndexedPaths(): Promise<string[]> {
    const points = await this.scrollAll();
    const sources: string[] = [];
    for (const point of points) {
      const payload = decodePayload(point.payload);
      if (payload?.metadata.source !== undefined) {
        sources.push(payload.metadata.source);
      }
    }
    return sortedSources(sources);
  }

  async removeBySource(source: string): Promise<number> {
    const points = await this.scrollAll();
    const ids: Array<string | number> = [];
    for (const point of points) {
      const payload = decodePayload(point.payload);
      if (payload && matchesSource(payload.metadata.source ?? '', source)) {
        ids.push(point.id);
      }
    }

    if (ids.length > 0) {
      await this.call('delete', (client) =>
        client.delete(this.collectionName, { wait: true, points: ids })
      );
    }
    return ids.length;
  }

  async close(): Promise<void> {
    // The REST client holds no persistent connection
  }

  /**
   * Get the server URL.
   */
  getUrl(): string {
    return this.url;
  }

  private async verifyCollection(dimensions: number | undefined): Promise<void> {
    const { collections } = await this.call('getCollections', (client) => client.getCollections());
    const exists = collections.some((c) => c.name === this.collectionName);

    if (exists) {
      const info = await this.call('getCollection', (client) => client.getCollection(this.collectionName));
      const size = readVectorSize(info.config.params.vectors);
      if (dimensions !== undefined && size !== null && size !== dimensions) {
        throw new BackendUnavailableError(
          `Collection "${this.collectionName}" stores ${size}-dimensional vectors, ` +
          `but ${dimensions} were requested`
        );
      }
      this.dimensions = size ?? this.dimensions;
      this.collectionReady = true;
      return;
    }

    if (dimensions !== undefined) {
      await this.ensureCollection(dimensions);
    }
  }

  private async ensureCollection(dimensions: number): Promise<void> {
    if (this.collectionReady) return;

    // Concurrent first adds share one create request
    if (!this.creating) {
      this.creating = this.call('createCollection', (client) =>
        client.createCollection(this.collectionName, {
          vectors: { size: dimensions, distance: 'Cosine' },
        })
      )
        .then(() => {
          this.dimensions = dimensions;
          this.collectionReady = true;
        })
        .finally(() => {
          this.creating = null;
        });
    }
    await this.creating;
  }

  private async scrollAll(withVector = false): Promise<RemotePoint[]> {
    if (!this.collectionReady) return [];

    const points: RemotePoint[] = [];
    let offset: string | number | undefined;
    do {
      const page = await this.call('scroll', (client) =>
        client.scroll(this.collectionName, {
          limit: SCROLL_PAGE_SIZE,
          offset,
          with_payload: true,
          with_vector: withVector,
        })
      );
      points.push(...page.points);
      const next = page.next_page_offset;
      offset = typeof next === 'string' || typeof next === 'number' ? next : undefined;
    } while (offset !== undefined);

    return points;
  }

  private nextSeq(): number {
    this.seqCounter = (this.seqCounter + 1) % 1000;
    return Date.now() * 1000 + this.seqCounter;
  }

  /**
   * Run one request with the configured bound, mapping transport failures
   * to BackendUnavailableError.
   */
  private async call<T>(operation: string, request: (client: QdrantClient) => Promise<T>): Promise<T> {
    logger.request('Qdrant', operation, this.collectionName);
    try {
      return await withTimeout(() => request(this.client), this.timeoutMs, `Qdrant ${operation}`);
    } catch (error) {
      if (error instanceof RagError) throw error;
      throw new BackendUnavailableError(
        `Qdrant ${operation} failed at ${this.url}: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }
}

/**
 * Read the vector size from a collection's vector configuration.
 */
function readVectorSize(vectors: unknown): number | null {
  if (typeof vectors === 'object' && vectors !== null && 'size' in vectors && typeof vectors.size === 'number') {
    return vectors.size;
  }
  return null;
}

function decodePayload(payload: Record<string, unknown> | null | undefined): PointPayload | null {
  if (!payload) return null;

  const { docId, content, metadata, seq } = payload;
  if (typeof docId !== 'string' || typeof content !== 'string') return null;

  const attributes: Record<string, string> = {};
  if (typeof metadata === 'object' && metadata !== null) {
    for (const [key, value] of Object.entries(metadata)) {
      if (typeof value === 'string') attributes[key] = value;
    }
  }

  return {
    docId,
    content,
    metadata: attributes,
    seq: typeof seq === 'number' ? seq : Number.MAX_SAFE_INTEGER,
  };
}

function decodePoint(point: RemotePoint): { document: Document; seq: number } | null {
  const payload = decodePayload(point.payload);
  if (!payload) return null;

  const vector = point.vector;
  const embedding =
    Array.isArray(vector) && vector.every((n): n is number => typeof n === 'number') ? vector : [];

  return {
    document: {
      id: payload.docId,
      content: payload.content,
      embedding,
      metadata: payload.metadata,
    },
    seq: payload.seq,
  };
}
