// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

/**
 * RAG System Exports
 *
 * Main entry point for the retrieval engine.
 */

// Types
export type {
  Document,
  SearchResult,
  StorageMode,
  EmbeddingProviderName,
  RAGConfig,
  IndexProgressCallback,
} from './types.js';

export { DEFAULT_RAG_CONFIG } from './types.js';

// Embedding providers
export {
  BaseEmbeddingProvider,
  EmbeddingCache,
  OpenAIEmbeddingProvider,
  OllamaEmbeddingProvider,
  createEmbeddingProvider,
} from './embeddings/index.js';
export type { EmbeddingProviderOptions, OpenAIEmbeddingOptions } from './embeddings/index.js';

// Storage engines
export { createVectorStore, expandHome } from './vector-store.js';
export type { VectorStore, VectorStoreOptions } from './vector-store.js';
export { MemoryVectorStore } from './stores/memory-store.js';
export type { MemoryStoreOptions } from './stores/memory-store.js';
export { LocalVectorStore } from './stores/local-store.js';
export { RemoteVectorStore, pointIdFor } from './stores/remote-store.js';
export type { RemoteStoreOptions } from './stores/remote-store.js';

// Core components
export { TextChunker, chunkText, validateChunkParams, DEFAULT_CHUNKER_CONFIG } from './chunker.js';
export type { ChunkerConfig } from './chunker.js';
export { collectFiles, isIndexable, INDEXABLE_EXTENSIONS, DEFAULT_EXCLUDED_DIRS } from './walker.js';
export type { WalkOptions } from './walker.js';
export { RetrievalManager, createRetrievalManager, isIngestible, CONTEXT_HEADER } from './manager.js';
export type { RetrievalManagerOptions } from './manager.js';
