// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Base Embedding Provider
 *
 * Abstract class that all embedding providers must implement.
 */

import { createHash } from 'crypto';
import { EmptyResultError } from '../../errors.js';

function hashText(text: string): string {
  return createHash('sha256').update(text).digest('hex').slice(0, 16);
}

export interface EmbeddingCacheStats {
  size: number;
  hits: number;
  misses: number;
}

/**
 * Least-recently-used map from text key to vector; entries expire
 * `ttlMs` after they were stored. A capacity of 0 disables caching.
 */
export class EmbeddingCache {
  private readonly entries = new Map<string, { vector: number[]; expiresAt: number }>();
  private hits = 0;
  private misses = 0;

  constructor(
    private readonly capacity = 1000,
    private readonly ttlMs = 60 * 60 * 1000
  ) {}

  lookup(key: string): number[] | undefined {
    const entry = this.entries.get(key);
    if (entry === undefined || Date.now() >= entry.expiresAt) {
      this.entries.delete(key);
      this.misses++;
      return undefined;
    }

    // Map iteration order is recency order
    this.entries.delete(key);
    this.entries.set(key, entry);
    this.hits++;
    return entry.vector;
  }

  store(key: string, vector: number[]): void {
    if (this.capacity <= 0) return;

    this.entries.delete(key);
    for (const oldest of this.entries.keys()) {
      if (this.entries.size < this.capacity) break;
      this.entries.delete(oldest);
    }
    this.entries.set(key, { vector, expiresAt: Date.now() + this.ttlMs });
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  stats(): EmbeddingCacheStats {
    return { size: this.entries.size, hits: this.hits, misses: this.misses };
  }
}

/**
 * Options shared by embedding providers.
 */
export interface EmbeddingProviderOptions {
  /** Maximum cached embeddings (0 disables the cache) */
  cacheSize?: number;
  /** Cache entry lifetime in minutes */
  cacheTtlMinutes?: number;
}

/**
 * Abstract base class for embedding providers.
 *
 * The wire request is (model identifier, text); the model is fixed per
 * provider instance.
 */
export abstract class BaseEmbeddingProvider {
  private readonly cache: EmbeddingCache;

  constructor(options: EmbeddingProviderOptions = {}) {
    this.cache = new EmbeddingCache(options.cacheSize ?? 1000, (options.cacheTtlMinutes ?? 60) * 60 * 1000);
  }

  /**
   * Get the provider name (e.g., "OpenAI", "Ollama").
   */
  abstract getName(): string;

  /**
   * Get the model name being used.
   */
  abstract getModel(): string;

  /**
   * Get the embedding vector dimensions.
   */
  abstract getDimensions(): number;

  /**
   * Generate embeddings for multiple texts.
   * @param texts - Text strings to embed
   * @param signal - Aborts the in-flight request
   * @throws EmbeddingUnavailableError if the service cannot be reached
   */
  abstract embed(texts: string[], signal?: AbortSignal): Promise<number[][]>;

  /**
   * Check if the provider is available and properly configured.
   */
  abstract isAvailable(): Promise<boolean>;

  /**
   * Generate embedding for a single text with caching.
   * @throws EmptyResultError if the service returned no vector
   */
  async embedOne(text: string, signal?: AbortSignal): Promise<number[]> {
    const cacheKey = `${this.getName()}:${this.getModel()}:${hashText(text)}`;
    const cached = this.cache.lookup(cacheKey);
    if (cached !== undefined) {
      return cached;
    }

    const results = await this.embed([text], signal);
    const embedding = results[0];
    if (!embedding || embedding.length === 0) {
      throw new EmptyResultError(`${this.getName()} returned no embedding for model ${this.getModel()}`);
    }

    this.cache.store(cacheKey, embedding);
    return embedding;
  }

  getCacheStats(): EmbeddingCacheStats {
    return this.cache.stats();
  }

  clearCache(): void {
    this.cache.clear();
  }
}
