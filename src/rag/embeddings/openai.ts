// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

/**
 * OpenAI Embedding Provider
 *
 * Uses OpenAI's text-embedding models for generating embeddings.
 */

import OpenAI from 'openai';
import { ConfigurationError, EmbeddingUnavailableError, EmptyResultError, errorMessage } from '../../errors.js';
import { logger } from '../../logger.js';
import { BaseEmbeddingProvider, type EmbeddingProviderOptions } from './base.js';

/**
 * Model dimensions for OpenAI embedding models.
 */
const MODEL_DIMENSIONS: Record<string, number> = {
  'text-embedding-3-small': 1536,
  'text-embedding-3-large': 3072,
  'text-embedding-ada-002': 1536,
};

/** OpenAI caps the number of inputs per request */
const BATCH_SIZE = 100;

export interface OpenAIEmbeddingOptions extends EmbeddingProviderOptions {
  /** API key (default: OPENAI_API_KEY) */
  apiKey?: string;
  /** Override the API base URL */
  baseURL?: string;
}

/**
 * OpenAI embedding provider implementation.
 */
export class OpenAIEmbeddingProvider extends BaseEmbeddingProvider {
  private client: OpenAI | null = null;
  private model: string;
  private apiKey: string | undefined;
  private baseURL: string | undefined;

  constructor(model: string = 'text-embedding-3-small', options: OpenAIEmbeddingOptions = {}) {
    super(options);
    this.model = model;
    this.apiKey = options.apiKey ?? process.env.OPENAI_API_KEY;
    this.baseURL = options.baseURL;
  }

  getName(): string {
    return 'OpenAI';
  }

  getModel(): string {
    return this.model;
  }

  getDimensions(): number {
    return MODEL_DIMENSIONS[this.model] ?? 1536;
  }

  async embed(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    if (texts.length === 0) return [];

    const client = this.getClient();
    const allEmbeddings: number[][] = [];

    for (let i = 0; i < texts.length; i += BATCH_SIZE) {
      const batch = texts.slice(i, i + BATCH_SIZE);
      logger.request('OpenAI', 'embed', `${this.model} (${batch.length} inputs)`);

      let data: Array<{ index: number; embedding: number[] }>;
      try {
        const response = await client.embeddings.create({ model: this.model, input: batch }, { signal });
        data = response.data;
      } catch (error) {
        throw new EmbeddingUnavailableError(`OpenAI embedding request failed: ${errorMessage(error)}`, {
          cause: error,
        });
      }

      if (data.length === 0) {
        throw new EmptyResultError(`OpenAI returned no embeddings for model ${this.model}`);
      }
      if (data.length !== batch.length) {
        throw new EmptyResultError(
          `OpenAI returned ${data.length} embeddings for ${batch.length} inputs (model ${this.model})`
        );
      }

      // Sort by index to maintain order
      const sorted = [...data].sort((a, b) => a.index - b.index);
      allEmbeddings.push(...sorted.map((d) => d.embedding));
    }

    return allEmbeddings;
  }

  async isAvailable(): Promise<boolean> {
    if (!this.apiKey) {
      return false;
    }

    try {
      // Make a minimal request to verify the API key works
      await this.getClient().embeddings.create({ model: this.model, input: 'test' });
      return true;
    } catch (error) {
      logger.debug(`OpenAI availability check failed: ${errorMessage(error)}`);
      return false;
    }
  }

  private getClient(): OpenAI {
    if (!this.client) {
      if (!this.apiKey) {
        throw new ConfigurationError('OPENAI_API_KEY is not set');
      }
      this.client = new OpenAI({ apiKey: this.apiKey, baseURL: this.baseURL });
    }
    return this.client;
  }
}
