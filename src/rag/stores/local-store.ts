// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Embedded vector store.
 *
 * Persists each collection as a vectra LocalIndex under
 * `<root>/<collection>`, next to a `collection.json` sidecar recording the
 * collection's dimensionality. Ranking is the same exact scan as the
 * in-memory engine, with ties ordered by a persisted insertion sequence.
 */

import { LocalIndex } from 'vectra';
import * as fs from 'fs';
import * as path from 'path';
import { BackendUnavailableError, StoreError, errorMessage } from '../../errors.js';
import { logger } from '../../logger.js';
import { ReadWriteLock } from '../../utils/rw-lock.js';
import { rankDocuments } from '../../utils/vector.js';
import type { Document, SearchResult } from '../types.js';
import type { VectorStore } from '../vector-store.js';
import { assertTopK, checkDocument, matchesSource, sortedSources } from './shared.js';

/** Sidecar file describing the collection */
const SIDECAR_FILE = 'collection.json';

/**
 * Contents of the collection sidecar.
 */
interface CollectionInfo {
  name: string;
  dimensions: number | null;
  createdAt: string;
}

/**
 * A stored item decoded back into a document.
 */
interface StoredDocument {
  document: Document;
  seq: number;
}

type MetadataValue = string | number | boolean;

export class LocalVectorStore implements VectorStore {
  private lock = new ReadWriteLock();
  private nextSeq: number;

  private constructor(
    private index: LocalIndex,
    private readonly collectionPath: string,
    private info: CollectionInfo,
    nextSeq: number,
    private readonly requestedDimensions: number | null
  ) {
    this.nextSeq = nextSeq;
  }

  /**
   * Open the collection at `<root>/<collectionName>`, creating it if absent.
   * @throws BackendUnavailableError if the path is not writable or the
   *   collection was created with a different dimensionality
   */
  static async open(
    root: string,
    collectionName: string,
    dimensions?: number
  ): Promise<LocalVectorStore> {
    const collectionPath = path.join(root, collectionName);

    try {
      await fs.promises.mkdir(collectionPath, { recursive: true });
      await fs.promises.access(collectionPath, fs.constants.W_OK);
    } catch (error) {
      throw new BackendUnavailableError(
        `Cannot open collection at ${collectionPath}: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    const index = new LocalIndex(collectionPath);
    let items: StoredDocument[];
    try {
      if (!(await index.isIndexCreated())) {
        await index.createIndex({ version: 1 });
      }
      items = decodeItems(await index.listItems());
    } catch (error) {
      throw new BackendUnavailableError(
        `Cannot load collection at ${collectionPath}: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    const sidecar = await readSidecar(collectionPath);
    const stored = sidecar?.dimensions ?? items[0]?.document.embedding.length ?? null;
    if (dimensions !== undefined && stored !== null && stored !== dimensions) {
      throw new BackendUnavailableError(
        `Collection "${collectionName}" stores ${stored}-dimensional vectors, ` +
        `but ${dimensions} were requested`
      );
    }

    const info: CollectionInfo = {
      name: collectionName,
      dimensions: stored ?? dimensions ?? null,
      createdAt: sidecar?.createdAt ?? new Date().toISOString(),
    };
    await writeSidecar(collectionPath, info);

    const nextSeq = items.reduce((max, item) => Math.max(max, item.seq + 1), 0);
    logger.storeOpened('embedded', collectionName, items.length);
    return new LocalVectorStore(index, collectionPath, info, nextSeq, dimensions ?? null);
  }

  async add(document: Document): Promise<void> {
    await this.lock.withWrite(async () => {
      const dimensions = checkDocument(document, this.info.dimensions);

      const existing = await this.index.getItem(document.id);
      const existingSeq = existing ? readSeq(existing.metadata) : null;
      const seq = existingSeq ?? this.nextSeq++;

      const metadata: Record<string, MetadataValue> = {
        content: document.content,
        source: document.metadata.source ?? '',
        seq,
        attributes: JSON.stringify(document.metadata),
      };

      await this.index.upsertItem({
        id: document.id,
        vector: [...document.embedding],
        metadata,
      });

      if (this.info.dimensions === null) {
        this.info = { ...this.info, dimensions };
        await writeSidecar(this.collectionPath, this.info);
      }
    });
  }

  async search(queryEmbedding: number[], topK: number): Promise<SearchResult[]> {
    assertTopK(topK);
    if (topK === 0) return [];

    return this.lock.withRead(async () => {
      const items = decodeItems(await this.index.listItems());
      return rankDocuments(queryEmbedding, items.map((item) => item.document), topK);
    });
  }

  async count(): Promise<number> {
    return this.lock.withRead(async () => (await this.index.listItems()).length);
  }

  async clear(): Promise<void> {
    await this.lock.withWrite(async () => {
      const items = await this.index.listItems();
      await this.deleteItems(items.map((item) => item.id));
      this.nextSeq = 0;
      // An inferred dimensionality goes with the data; a requested one is kept
      if (this.info.dimensions !== this.requestedDimensions) {
        this.info = { ...this.info, dimensions: this.requestedDimensions };
        await writeSidecar(this.collectionPath, this.info);
      }
    });
  }

  async getIndexedPaths(): Promise<string[]> {
    return this.lock.withRead(async () => {
      const items = decodeItems(await this.index.listItems());
      return sortedSources(items.map((item) => item.document.metadata.source));
    });
  }

  async removeBySource(source: string): Promise<number> {
    return this.lock.withWrite(async () => {
      const items = decodeItems(await this.index.listItems());
      const ids = items
        .filter((item) => matchesSource(item.document.metadata.source ?? '', source))
        .map((item) => item.document.id);
      await this.deleteItems(ids);
      return ids.length;
    });
  }

  async close(): Promise<void> {
    // vectra writes through on every update; nothing is held open
  }

  /**
   * Get the collection directory.
   */
  getPath(): string {
    return this.collectionPath;
  }

  /**
   * Delete items in one vectra update, cancelling it on failure.
   */
  private async deleteItems(ids: string[]): Promise<void> {
    if (ids.length === 0) return;

    await this.index.beginUpdate();
    try {
      for (const id of ids) {
        await this.index.deleteItem(id);
      }
      await this.index.endUpdate();
    } catch (error) {
      this.index.cancelUpdate();
      throw new StoreError(`Failed to delete from ${this.collectionPath}: ${errorMessage(error)}`, 'STORE', {
        cause: error,
      });
    }
  }
}

/**
 * Decode vectra items into documents ordered by insertion sequence.
 */
function decodeItems(
  items: Array<{ id: string; vector: number[]; metadata: Record<string, MetadataValue> }>
): StoredDocument[] {
  const decoded: StoredDocument[] = [];
  for (const item of items) {
    const content = item.metadata.content;
    decoded.push({
      document: {
        id: item.id,
        content: typeof content === 'string' ? content : '',
        embedding: item.vector,
        metadata: readAttributes(item.metadata),
      },
      seq: readSeq(item.metadata) ?? Number.MAX_SAFE_INTEGER,
    });
  }
  return decoded.sort((a, b) => a.seq - b.seq);
}

function readSeq(metadata: Record<string, MetadataValue>): number | null {
  const seq = metadata.seq;
  return typeof seq === 'number' ? seq : null;
}

function readAttributes(metadata: Record<string, MetadataValue>): Record<string, string> {
  const attributes: Record<string, string> = {};
  const raw = metadata.attributes;
  if (typeof raw === 'string') {
    const parsed: unknown = JSON.parse(raw);
    if (typeof parsed === 'object' && parsed !== null) {
      for (const [key, value] of Object.entries(parsed)) {
        if (typeof value === 'string') attributes[key] = value;
      }
    }
  }
  const source = metadata.source;
  if (attributes.source === undefined && typeof source === 'string') {
    attributes.source = source;
  }
  return attributes;
}

async function readSidecar(collectionPath: string): Promise<CollectionInfo | null> {
  const file = path.join(collectionPath, SIDECAR_FILE);
  if (!fs.existsSync(file)) return null;

  let parsed: unknown;
  try {
    parsed = JSON.parse(await fs.promises.readFile(file, 'utf-8'));
  } catch (error) {
    throw new BackendUnavailableError(`Corrupt collection sidecar ${file}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
  if (typeof parsed !== 'object' || parsed === null) return null;

  const name = 'name' in parsed && typeof parsed.name === 'string' ? parsed.name : path.basename(collectionPath);
  const dimensions = 'dimensions' in parsed && typeof parsed.dimensions === 'number' ? parsed.dimensions : null;
  const createdAt =
    'createdAt' in parsed && typeof parsed.createdAt === 'string' ? parsed.createdAt : new Date().toISOString();
  return { name, dimensions, createdAt };
}

async function writeSidecar(collectionPath: string, info: CollectionInfo): Promise<void> {
  try {
    await fs.promises.writeFile(path.join(collectionPath, SIDECAR_FILE), JSON.stringify(info, null, 2));
  } catch (error) {
    throw new BackendUnavailableError(`Cannot write collection sidecar in ${collectionPath}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}
