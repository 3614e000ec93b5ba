/**
 * Text Chunker
 *
 * Splits text into overlapping fixed-size windows for separate embedding.
 */

import { ConfigurationError } from '../errors.js';

/**
 * Configuration for the chunker.
 */
export interface ChunkerConfig {
  /** Window size in characters */
  chunkSize: number;
  /** Characters shared by consecutive windows */
  chunkOverlap: number;
}

/**
 * Default chunker configuration.
 */
export const DEFAULT_CHUNKER_CONFIG: ChunkerConfig = {
  chunkSize: 1000,
  chunkOverlap: 200,
};

/**
 * Reject window parameters that cannot make progress.
 */
export function validateChunkParams(chunkSize: number, overlap: number): void {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new ConfigurationError(`chunkSize must be a positive integer (got ${chunkSize})`);
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    throw new ConfigurationError(`chunkOverlap must be a non-negative integer (got ${overlap})`);
  }
  if (overlap >= chunkSize) {
    throw new ConfigurationError(
      `chunkOverlap (${overlap}) must be smaller than chunkSize (${chunkSize})`
    );
  }
}

/**
 * Split text into windows of `chunkSize` characters, each starting
 * `chunkSize - overlap` characters after the previous one. The last window
 * ends exactly at the end of the text.
 *
 * Lengths count Unicode code points, so surrogate pairs are never split.
 */
export function chunkText(text: string, chunkSize: number, overlap: number): string[] {
  validateChunkParams(chunkSize, overlap);

  const chars = Array.from(text);
  if (chars.length <= chunkSize) {
    return [text];
  }

  const chunks: string[] = [];
  const step = chunkSize - overlap;

  for (let start = 0; start < chars.length; start += step) {
    const end = Math.min(start + chunkSize, chars.length);
    chunks.push(chars.slice(start, end).join(''));
    if (end === chars.length) break;
  }

  return chunks;
}

/**
 * Chunker bound to one configuration.
 */
export class TextChunker {
  private config: ChunkerConfig;

  constructor(config: Partial<ChunkerConfig> = {}) {
    this.config = { ...DEFAULT_CHUNKER_CONFIG, ...config };
    validateChunkParams(this.config.chunkSize, this.config.chunkOverlap);
  }

  chunk(text: string): string[] {
    return chunkText(text, this.config.chunkSize, this.config.chunkOverlap);
  }

  getConfig(): ChunkerConfig {
    return { ...this.config };
  }
}
