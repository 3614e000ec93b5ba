// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * RAG System Types
 *
 * Defines the document model, storage configuration and retrieval results
 * for the Retrieval-Augmented Generation engine.
 */

/**
 * One indexed unit: a whole snippet or one chunk of a file.
 */
export interface Document {
  /** Unique within a store, derived from the source identity */
  id: string;
  /** The exact text the embedding represents */
  content: string;
  /** Dense vector, fixed dimensionality per collection */
  embedding: number[];
  /** Always carries `source`; chunked files also carry `chunk` */
  metadata: Record<string, string>;
}

/**
 * Result from a similarity search.
 */
export interface SearchResult {
  /** The matching document */
  document: Document;
  /** Cosine similarity in [-1, 1]; 0 for degenerate inputs */
  score: number;
}

/**
 * Selects the storage backend for a vector store.
 */
export type StorageMode =
  | { kind: 'embedded'; path: string }
  | { kind: 'remote'; url: string }
  | { kind: 'memory' };

/**
 * Embedding providers that can be configured.
 */
export type EmbeddingProviderName = 'ollama' | 'openai';

/**
 * Configuration for the RAG system.
 */
export interface RAGConfig {
  /** Embedding provider to use */
  embeddingProvider: EmbeddingProviderName;
  /** Embedding model identifier (each provider has its own default) */
  embeddingModel?: string;
  /** Ollama base URL (default: http://localhost:11434) */
  ollamaBaseUrl: string;
  /** Vector dimensionality of the collection (inferred when omitted) */
  dimensions?: number;
  /** Chunk window in characters */
  chunkSize: number;
  /** Overlap between consecutive chunks in characters */
  chunkOverlap: number;
  /** Number of results to return */
  topK: number;
  /** Concurrent embedding requests per file */
  parallelJobs: number;
  /** Collection (table) name inside the backend */
  collectionName: string;
  /** Upper bound for one embedding call in milliseconds (0 disables) */
  embedTimeoutMs: number;
  /** Upper bound for one remote store call in milliseconds (0 disables) */
  storeTimeoutMs: number;
  /** Directory names skipped while walking */
  excludeDirs: string[];
  /** Backend selection */
  storage: StorageMode;
}

/**
 * Default RAG configuration.
 */
export const DEFAULT_RAG_CONFIG: RAGConfig = {
  embeddingProvider: 'ollama',
  ollamaBaseUrl: 'http://localhost:11434',
  chunkSize: 1000,
  chunkOverlap: 200,
  topK: 3,
  parallelJobs: 4,
  collectionName: 'knowledge',
  embedTimeoutMs: 30000,
  storeTimeoutMs: 10000,
  excludeDirs: ['.git', 'node_modules'],
  storage: { kind: 'embedded', path: '~/.ragstore/vectors' },
};

/**
 * Progress callback for indexing operations.
 */
export type IndexProgressCallback = (current: number, total: number, file: string) => void;
