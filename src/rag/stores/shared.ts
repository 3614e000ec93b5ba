// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Checks shared by all storage engines.
 */

import { ConfigurationError, DimensionMismatchError, StoreError } from '../../errors.js';
import type { Document } from '../types.js';

/**
 * True when `candidate` equals `source` or is nested beneath it.
 * Both `/` and `\` count as separators.
 */
export function matchesSource(candidate: string, source: string): boolean {
  const root = source.length > 1 ? source.replace(/[\\/]+$/, '') : source;
  if (candidate === root) return true;
  if (!candidate.startsWith(root)) return false;
  if (root.endsWith('/') || root.endsWith('\\')) return true;
  const next = candidate.charAt(root.length);
  return next === '/' || next === '\\';
}

/**
 * Reject a top-k that is not a non-negative integer.
 */
export function assertTopK(topK: number): void {
  if (!Number.isInteger(topK) || topK < 0) {
    throw new ConfigurationError(`topK must be a non-negative integer (got ${topK})`);
  }
}

/**
 * Validate a document before it is stored.
 * @returns The dimensionality the collection has after this document
 */
export function checkDocument(document: Document, expected: number | null): number {
  if (!document.id) {
    throw new StoreError('Document id must not be empty');
  }
  if (document.embedding.length === 0) {
    throw new StoreError(`Document ${document.id} has an empty embedding`);
  }
  if (expected !== null && document.embedding.length !== expected) {
    throw new DimensionMismatchError(expected, document.embedding.length);
  }
  return document.embedding.length;
}

/**
 * Sorted distinct sources.
 */
export function sortedSources(sources: Iterable<string>): string[] {
  return Array.from(new Set(sources)).sort();
}
