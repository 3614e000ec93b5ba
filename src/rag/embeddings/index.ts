// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Embedding Provider Factory
 *
 * Creates the embedding provider named by the configuration.
 */

import { BaseEmbeddingProvider } from './base.js';
import { OpenAIEmbeddingProvider } from './openai.js';
import { OllamaEmbeddingProvider } from './ollama.js';
import type { RAGConfig } from '../types.js';

export {
  BaseEmbeddingProvider,
  EmbeddingCache,
  type EmbeddingCacheStats,
  type EmbeddingProviderOptions,
} from './base.js';
export { OpenAIEmbeddingProvider, type OpenAIEmbeddingOptions } from './openai.js';
export { OllamaEmbeddingProvider } from './ollama.js';

/**
 * Create an embedding provider based on configuration.
 */
export function createEmbeddingProvider(
  config: Pick<RAGConfig, 'embeddingProvider' | 'embeddingModel' | 'ollamaBaseUrl'>
): BaseEmbeddingProvider {
  switch (config.embeddingProvider) {
    case 'openai':
      return new OpenAIEmbeddingProvider(config.embeddingModel);
    case 'ollama':
      return new OllamaEmbeddingProvider(config.embeddingModel, config.ollamaBaseUrl);
  }
}

