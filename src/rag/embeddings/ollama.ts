// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Ollama Embedding Provider
 *
 * Uses Ollama's local embedding models for generating embeddings.
 */

import { EmbeddingUnavailableError, EmptyResultError, errorMessage } from '../../errors.js';
import { logger } from '../../logger.js';
import { BaseEmbeddingProvider, type EmbeddingProviderOptions } from './base.js';

/**
 * Model dimensions for common Ollama embedding models.
 */
const MODEL_DIMENSIONS: Record<string, number> = {
  'nomic-embed-text': 768,
  'mxbai-embed-large': 1024,
  'all-minilm': 384,
  'snowflake-arctic-embed': 1024,
};

/**
 * Read `embeddings` from an /api/embed response body.
 */
function readEmbeddings(body: unknown): number[][] | null {
  if (typeof body !== 'object' || body === null || !('embeddings' in body)) {
    return null;
  }
  const { embeddings } = body;
  if (!Array.isArray(embeddings)) return null;

  const vectors: number[][] = [];
  for (const vector of embeddings) {
    if (!Array.isArray(vector) || !vector.every((n): n is number => typeof n === 'number')) {
      return null;
    }
    vectors.push(vector);
  }
  return vectors;
}

/**
 * Ollama embedding provider implementation.
 */
export class OllamaEmbeddingProvider extends BaseEmbeddingProvider {
  private baseUrl: string;
  private model: string;
  private dimensions: number | null = null;

  constructor(
    model: string = 'nomic-embed-text',
    baseUrl: string = 'http://localhost:11434',
    options: EmbeddingProviderOptions = {}
  ) {
    super(options);
    this.model = model;
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  getName(): string {
    return 'Ollama';
  }

  getModel(): string {
    return this.model;
  }

  getDimensions(): number {
    // Return cached dimensions if we've detected them
    if (this.dimensions !== null) {
      return this.dimensions;
    }
    return MODEL_DIMENSIONS[this.model] ?? 768;
  }

  async embed(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    if (texts.length === 0) return [];

    logger.request('Ollama', 'embed', `${this.model} (${texts.length} inputs)`);
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/api/embed`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ model: this.model, input: texts }),
        signal,
      });
    } catch (error) {
      throw new EmbeddingUnavailableError(
        `Ollama is not reachable at ${this.baseUrl}: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    if (!response.ok) {
      throw new EmbeddingUnavailableError(
        `Ollama embedding request failed: ${response.status} ${response.statusText}`
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new EmbeddingUnavailableError(`Ollama returned an unreadable response: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    const embeddings = readEmbeddings(body);
    if (!embeddings || embeddings.length === 0) {
      throw new EmptyResultError(`Ollama returned no embeddings for model ${this.model}`);
    }

    // Cache the dimensions from the first successful response
    if (this.dimensions === null && embeddings[0].length > 0) {
      this.dimensions = embeddings[0].length;
    }

    return embeddings;
  }

  async isAvailable(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/api/tags`, { method: 'GET' });
      if (!response.ok) {
        return false;
      }

      const data: unknown = await response.json();
      const models =
        typeof data === 'object' && data !== null && 'models' in data && Array.isArray(data.models)
          ? data.models
          : [];
      return models.some((m: unknown) => {
        if (typeof m !== 'object' || m === null || !('name' in m) || typeof m.name !== 'string') {
          return false;
        }
        return m.name === this.model || m.name.startsWith(`${this.model}:`);
      });
    } catch (error) {
      logger.debug(`Ollama availability check failed: ${errorMessage(error)}`);
      return false;
    }
  }
}
