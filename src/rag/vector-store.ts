// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Vector Store
 *
 * The storage contract shared by every backend, and the factory that picks
 * a backend from the configured storage mode.
 */

import * as os from 'os';
import * as path from 'path';
import type { Document, SearchResult, StorageMode } from './types.js';
import { MemoryVectorStore } from './stores/memory-store.js';
import { LocalVectorStore } from './stores/local-store.js';
import { RemoteVectorStore } from './stores/remote-store.js';

/**
 * Capability interface implemented by every storage engine.
 */
export interface VectorStore {
  /** Add a document, overwriting any stored document with the same id */
  add(document: Document): Promise<void>;
  /** Up to `topK` results, descending by score, ties in insertion order */
  search(queryEmbedding: number[], topK: number): Promise<SearchResult[]>;
  /** Number of stored documents */
  count(): Promise<number>;
  /** Remove every document */
  clear(): Promise<void>;
  /** Distinct `source` metadata values, sorted */
  getIndexedPaths(): Promise<string[]>;
  /** Remove documents whose source is `source` or lies beneath it */
  removeBySource(source: string): Promise<number>;
  /** Release backend resources */
  close(): Promise<void>;
}

/**
 * Options shared by all backends.
 */
export interface VectorStoreOptions {
  /** Collection (table) name */
  collectionName: string;
  /** Fixed vector dimensionality; inferred from the first document when omitted */
  dimensions?: number;
  /** Upper bound for one remote call in milliseconds */
  timeoutMs?: number;
}

/**
 * Expand a leading `~` to the user's home directory.
 */
export function expandHome(p: string): string {
  if (p === '~') return os.homedir();
  if (p.startsWith('~/')) return path.join(os.homedir(), p.slice(2));
  return p;
}

/**
 * Create a vector store for the given storage mode.
 *
 * - `memory` keeps documents in process (reference engine)
 * - `embedded` persists a vectra index under a local path
 * - `remote` talks to a Qdrant server
 */
export async function createVectorStore(
  mode: StorageMode,
  options: VectorStoreOptions
): Promise<VectorStore> {
  switch (mode.kind) {
    case 'memory':
      return new MemoryVectorStore({ dimensions: options.dimensions });

    case 'embedded':
      return LocalVectorStore.open(expandHome(mode.path), options.collectionName, options.dimensions);

    case 'remote':
      return RemoteVectorStore.connect(mode.url, options.collectionName, {
        dimensions: options.dimensions,
        timeoutMs: options.timeoutMs,
      });
  }
}
