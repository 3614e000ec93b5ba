// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * In-memory vector store.
 *
 * Reference engine: one ordered array of documents behind a read-write
 * lock, searched by exact cosine scan. Other engines must rank exactly as
 * this one does.
 */

import { ReadWriteLock } from '../../utils/rw-lock.js';
import { rankDocuments } from '../../utils/vector.js';
import type { Document, SearchResult } from '../types.js';
import type { VectorStore } from '../vector-store.js';
import { assertTopK, checkDocument, matchesSource, sortedSources } from './shared.js';

export interface MemoryStoreOptions {
  /** Fixed dimensionality; inferred from the first document when omitted */
  dimensions?: number;
}

export class MemoryVectorStore implements VectorStore {
  private documents: Document[] = [];
  private positions = new Map<string, number>();
  private lock = new ReadWriteLock();
  private readonly fixedDimensions: number | null;
  private dimensions: number | null;

  constructor(options: MemoryStoreOptions = {}) {
    this.fixedDimensions = options.dimensions ?? null;
    this.dimensions = this.fixedDimensions;
  }

  async add(document: Document): Promise<void> {
    const stored = copyDocument(document);
    await this.lock.withWrite(() => {
      this.dimensions = checkDocument(stored, this.dimensions);

      const existing = this.positions.get(stored.id);
      if (existing !== undefined) {
        // Overwrite in place to keep the original tie-break position
        this.documents[existing] = stored;
      } else {
        this.positions.set(stored.id, this.documents.length);
        this.documents.push(stored);
      }
    });
  }

  async search(queryEmbedding: number[], topK: number): Promise<SearchResult[]> {
    assertTopK(topK);
    return this.lock.withRead(() => rankDocuments(queryEmbedding, this.documents, topK));
  }

  async count(): Promise<number> {
    return this.lock.withRead(() => this.documents.length);
  }

  async clear(): Promise<void> {
    await this.lock.withWrite(() => {
      this.documents = [];
      this.positions.clear();
      this.dimensions = this.fixedDimensions;
    });
  }

  async getIndexedPaths(): Promise<string[]> {
    return this.lock.withRead(() => sortedSources(this.documents.map((d) => d.metadata.source)));
  }

  async removeBySource(source: string): Promise<number> {
    return this.lock.withWrite(() => {
      const kept = this.documents.filter((d) => !matchesSource(d.metadata.source ?? '', source));
      const removed = this.documents.length - kept.length;
      if (removed > 0) {
        this.documents = kept;
        this.positions = new Map(kept.map((d, i) => [d.id, i]));
      }
      return removed;
    });
  }

  async close(): Promise<void> {
    // Nothing to release
  }
}

/**
 * Detach a stored document from the caller's arrays and objects.
 */
function copyDocument(document: Document): Document {
  return {
    id: document.id,
    content: document.content,
    embedding: [...document.embedding],
    metadata: { ...document.metadata },
  };
}
