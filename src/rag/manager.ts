// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Retrieval Manager
 *
 * Ties chunking, embedding and storage together: ingests snippets, single
 * files and directory trees, and renders the best matches for a query as a
 * context block for a prompt.
 */

import * as crypto from 'crypto';
import * as fs from 'fs';
import { ConfigurationError, IoError, RagError, StoreError, errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import { withTimeout } from '../utils/timeout.js';
import { TextChunker, validateChunkParams } from './chunker.js';
import type { BaseEmbeddingProvider } from './embeddings/base.js';
import { createEmbeddingProvider } from './embeddings/index.js';
import type { IndexProgressCallback, RAGConfig, SearchResult } from './types.js';
import { DEFAULT_RAG_CONFIG } from './types.js';
import { createVectorStore, type VectorStore } from './vector-store.js';
import { collectFiles } from './walker.js';

/** Header of the rendered context block */
export const CONTEXT_HEADER = '\n\nRelevant context from your knowledge base:\n';

/** Longest passage shown per result in tool output */
const MAX_TOOL_OUTPUT_CHARS = 3000;

export type RetrievalManagerOptions = Partial<
  Pick<
    RAGConfig,
    'chunkSize' | 'chunkOverlap' | 'topK' | 'parallelJobs' | 'embedTimeoutMs' | 'excludeDirs'
  >
>;

export class RetrievalManager {
  private embeddingProvider: BaseEmbeddingProvider;
  private vectorStore: VectorStore;
  private chunker: TextChunker;
  private topK: number;
  private parallelJobs: number;
  private embedTimeoutMs: number;
  private excludeDirs: string[];

  /** Progress callback, called once per ingested file */
  onProgress: IndexProgressCallback | null = null;

  /**
   * @throws ConfigurationError on invalid chunk, topK or parallelism settings
   */
  constructor(
    embeddingProvider: BaseEmbeddingProvider,
    vectorStore: VectorStore,
    options: RetrievalManagerOptions = {}
  ) {
    const settings = { ...DEFAULT_RAG_CONFIG, ...options };

    if (!Number.isInteger(settings.topK) || settings.topK < 0) {
      throw new ConfigurationError(`topK must be a non-negative integer (got ${settings.topK})`);
    }
    if (!Number.isInteger(settings.parallelJobs) || settings.parallelJobs < 1) {
      throw new ConfigurationError(`parallelJobs must be a positive integer (got ${settings.parallelJobs})`);
    }

    this.embeddingProvider = embeddingProvider;
    this.vectorStore = vectorStore;
    this.chunker = new TextChunker({
      chunkSize: settings.chunkSize,
      chunkOverlap: settings.chunkOverlap,
    });
    this.topK = settings.topK;
    this.parallelJobs = settings.parallelJobs;
    this.embedTimeoutMs = settings.embedTimeoutMs;
    this.excludeDirs = settings.excludeDirs;
  }

  /**
   * Store one snippet as a single document.
   * @returns The document id, `<source>_<content hash>`
   */
  async addKnowledge(content: string, source: string): Promise<string> {
    const embedding = await this.embed(content);
    const id = `${source}_${contentHash(content)}`;

    await this.store(() =>
      this.vectorStore.add({ id, content, embedding, metadata: { source } })
    );
    logger.debug(`Added knowledge ${id}`);
    return id;
  }

  /**
   * Ingest every indexable file beneath `root`, one file at a time, in
   * traversal order. Each file's previous chunks are replaced.
   *
   * The first embedding or storage failure stops the walk and is rethrown
   * with the offending file attached; files stored before it stay.
   *
   * @returns Number of files ingested (unreadable, empty and binary files are skipped)
   */
  async indexDirectory(root: string): Promise<number> {
    const files = await collectFiles(root, { excludeDirs: this.excludeDirs });
    logger.verbose(`Found ${files.length} indexable files in ${root}`);

    let processed = 0;
    for (let i = 0; i < files.length; i++) {
      const file = files[i];

      let content: string;
      try {
        content = await fs.promises.readFile(file, 'utf-8');
      } catch (error) {
        logger.skipped(file, `unreadable (${errorMessage(error)})`);
        continue;
      }

      if (!isIngestible(content)) {
        logger.skipped(file, 'empty or binary');
        continue;
      }

      await this.ingestFile(file, content);
      processed++;
      this.onProgress?.(i + 1, files.length, file);
    }

    return processed;
  }

  /**
   * Ingest a single file, replacing its previous chunks.
   * @returns Number of chunks stored (0 for empty or binary files)
   * @throws IoError if the file cannot be read
   */
  async indexFile(filePath: string): Promise<number> {
    let content: string;
    try {
      content = await fs.promises.readFile(filePath, 'utf-8');
    } catch (error) {
      throw new IoError(`Cannot read ${filePath}: ${errorMessage(error)}`, { cause: error });
    }

    if (!isIngestible(content)) {
      return 0;
    }
    return this.ingestFile(filePath, content);
  }

  /**
   * Render the best matches for `query` as a context block, or `""` when
   * nothing is stored or nothing matches.
   */
  async retrieveContext(query: string): Promise<string> {
    const results = await this.search(query);
    if (results.length === 0) {
      return '';
    }

    let context = CONTEXT_HEADER;
    results.forEach((result, i) => {
      context += `\n[${i + 1}] ${result.document.content}\n`;
    });
    return context;
  }

  /**
   * Scored matches for `query`, best first.
   */
  async search(query: string, topK: number = this.topK): Promise<SearchResult[]> {
    if ((await this.vectorStore.count()) === 0) {
      return [];
    }

    const embedding = await this.embed(query);
    return this.store(() => this.vectorStore.search(embedding, topK));
  }

  /**
   * Format results as a numbered list (for tool output).
   */
  formatAsToolOutput(results: SearchResult[]): string {
    if (results.length === 0) {
      return 'No relevant knowledge found.';
    }

    const lines: string[] = [`Found ${results.length} relevant passages:\n`];

    for (let i = 0; i < results.length; i++) {
      const { document, score } = results[i];
      const matchPercent = Math.round(score * 100);
      const chunk = document.metadata.chunk;

      const location = chunk !== undefined ? ` (chunk ${chunk})` : '';
      lines.push(`${i + 1}. ${document.metadata.source ?? document.id}${location}`);
      lines.push(`   Match: ${matchPercent}%`);
      lines.push('');
      lines.push(
        document.content.length > MAX_TOOL_OUTPUT_CHARS
          ? document.content.slice(0, MAX_TOOL_OUTPUT_CHARS) + '\n... (truncated)'
          : document.content
      );
      lines.push('');
    }

    return lines.join('\n');
  }

  async knowledgeBaseCount(): Promise<number> {
    return this.vectorStore.count();
  }

  async clear(): Promise<void> {
    await this.vectorStore.clear();
  }

  /**
   * Remove everything stored for a source (or beneath a directory).
   * @returns Number of documents removed
   */
  async removeSource(source: string): Promise<number> {
    return this.vectorStore.removeBySource(source);
  }

  /**
   * Distinct sources in the store, sorted.
   */
  async getIndexedSources(): Promise<string[]> {
    return this.vectorStore.getIndexedPaths();
  }

  async close(): Promise<void> {
    await this.vectorStore.close();
  }

  /**
   * Chunk and embed a file, then swap its stored chunks for the new ones.
   * Nothing is written until every chunk has an embedding.
   */
  private async ingestFile(file: string, content: string): Promise<number> {
    try {
      const chunks = this.chunker.chunk(content);
      const embeddings = await this.embedAll(chunks);

      await this.store(() => this.vectorStore.removeBySource(file));
      for (let i = 0; i < chunks.length; i++) {
        await this.store(() =>
          this.vectorStore.add({
            id: `${file}_chunk_${i}`,
            content: chunks[i],
            embedding: embeddings[i],
            metadata: { source: file, chunk: String(i) },
          })
        );
      }

      logger.indexedFile(file, chunks.length);
      return chunks.length;
    } catch (error) {
      if (error instanceof RagError) {
        throw error.attachFile(file);
      }
      throw error;
    }
  }

  /**
   * Embed texts with at most `parallelJobs` requests in flight, keeping
   * results in input order.
   */
  private async embedAll(texts: string[]): Promise<number[][]> {
    const embeddings: number[][] = [];
    for (let i = 0; i < texts.length; i += this.parallelJobs) {
      const batch = texts.slice(i, i + this.parallelJobs);
      embeddings.push(...(await Promise.all(batch.map((text) => this.embed(text)))));
    }
    return embeddings;
  }

  private async embed(text: string): Promise<number[]> {
    return withTimeout(
      (signal) => this.embeddingProvider.embedOne(text, signal),
      this.embedTimeoutMs,
      `${this.embeddingProvider.getName()} embedding`
    );
  }

  /**
   * Run a store call, wrapping unexpected failures as StoreError.
   */
  private async store<T>(operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      if (error instanceof RagError) throw error;
      throw new StoreError(`Vector store operation failed: ${errorMessage(error)}`, 'STORE', {
        cause: error,
      });
    }
  }
}

/**
 * Build a manager, its embedding provider and its store from configuration.
 */
export async function createRetrievalManager(
  config: RAGConfig,
  embeddingProvider: BaseEmbeddingProvider = createEmbeddingProvider(config)
): Promise<RetrievalManager> {
  // Validate settings before touching the backend
  validateChunkParams(config.chunkSize, config.chunkOverlap);

  const vectorStore = await createVectorStore(config.storage, {
    collectionName: config.collectionName,
    dimensions: config.dimensions,
    timeoutMs: config.storeTimeoutMs,
  });

  return new RetrievalManager(embeddingProvider, vectorStore, config);
}

/**
 * First 16 hex digits of the content's SHA-256.
 */
function contentHash(content: string): string {
  return crypto.createHash('sha256').update(content).digest('hex').slice(0, 16);
}

/**
 * Check if content is worth embedding: not empty, and not binary (null bytes
 * or a high ratio of control characters in the first 1000 characters).
 */
export function isIngestible(content: string): boolean {
  if (content.length === 0) {
    return false;
  }

  let nonPrintable = 0;
  const sampleSize = Math.min(1000, content.length);
  for (let i = 0; i < sampleSize; i++) {
    const code = content.charCodeAt(i);
    if (code === 0) {
      return false;
    }
    if (code < 32 && code !== 9 && code !== 10 && code !== 13) {
      nonPrintable++;
    }
  }

  return nonPrintable / sampleSize <= 0.1;
}
