// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Vector utilities for embedding-based operations.
 */

import type { Document, SearchResult } from '../rag/types.js';

/**
 * Compute cosine similarity between two embedding vectors.
 * Returns value between -1 and 1 (1 = identical, 0 = orthogonal, -1 = opposite).
 * Mismatched lengths and zero-magnitude vectors score 0.
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) return 0;
  let dotProduct = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  const denominator = Math.sqrt(normA) * Math.sqrt(normB);
  return denominator === 0 ? 0 : dotProduct / denominator;
}

/**
 * Rank documents against a query vector by exact linear scan.
 *
 * Documents must be given in insertion order: the sort is stable, so equal
 * scores keep that order.
 */
export function rankDocuments(
  query: number[],
  documents: Iterable<Document>,
  topK: number
): SearchResult[] {
  if (topK === 0) return [];

  const results: SearchResult[] = [];
  for (const document of documents) {
    results.push({ document, score: cosineSimilarity(query, document.embedding) });
  }

  results.sort((a, b) => b.score - a.score);
  return results.slice(0, topK);
}
