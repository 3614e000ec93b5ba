// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect } from 'vitest';
import { cosineSimilarity, rankDocuments } from '../src/utils/vector.js';
import type { Document } from '../src/rag/types.js';

function doc(id: string, embedding: number[]): Document {
  return { id, content: id, embedding, metadata: { source: id } };
}

describe('Vector Utilities', () => {
  describe('cosineSimilarity', () => {
    it('returns 1 for identical vectors', () => {
      expect(cosineSimilarity([1, 0, 0], [1, 0, 0])).toBeCloseTo(1, 5);
    });

    it('returns 0 for orthogonal vectors', () => {
      expect(cosineSimilarity([1, 0, 0], [0, 1, 0])).toBeCloseTo(0, 5);
    });

    it('returns -1 for opposite vectors', () => {
      expect(cosineSimilarity([1, 2], [-1, -2])).toBeCloseTo(-1, 5);
    });

    it('ignores magnitude', () => {
      expect(cosineSimilarity([1, 1], [3, 3])).toBeCloseTo(1, 5);
    });

    it('returns 0 for vectors of different lengths', () => {
      expect(cosineSimilarity([1, 0], [1, 0, 0])).toBe(0);
    });

    it('returns 0 when either vector has zero magnitude', () => {
      expect(cosineSimilarity([0, 0], [1, 0])).toBe(0);
      expect(cosineSimilarity([1, 0], [0, 0])).toBe(0);
    });
  });

  describe('rankDocuments', () => {
    const documents = [
      doc('a', [1, 0]),
      doc('b', [0, 1]),
      doc('c', [1, 1]),
    ];

    it('orders by descending score and truncates to topK', () => {
      const results = rankDocuments([1, 0], documents, 2);
      expect(results.map((r) => r.document.id)).toEqual(['a', 'c']);
      expect(results[0].score).toBeCloseTo(1, 5);
      expect(results[1].score).toBeCloseTo(Math.SQRT1_2, 5);
    });

    it('returns everything when topK exceeds the document count', () => {
      expect(rankDocuments([1, 0], documents, 10)).toHaveLength(3);
    });

    it('returns nothing for topK 0', () => {
      expect(rankDocuments([1, 0], documents, 0)).toEqual([]);
    });

    it('keeps insertion order for equal scores', () => {
      const tied = [doc('first', [2, 0]), doc('second', [1, 0]), doc('third', [5, 0])];
      const results = rankDocuments([1, 0], tied, 3);
      expect(results.map((r) => r.document.id)).toEqual(['first', 'second', 'third']);
    });
  });
});
