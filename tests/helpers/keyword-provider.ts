// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Deterministic embedding provider for tests.
 *
 * One axis per keyword ("cat", "dog"), a constant axis, and the first
 * character, so different texts get different vectors and similar texts
 * rank predictably.
 */

import { BaseEmbeddingProvider } from '../../src/rag/embeddings/base.js';
import { EmbeddingUnavailableError } from '../../src/errors.js';

export function vectorFor(text: string): number[] {
  return [
    text.includes('cat') ? 1 : 0,
    text.includes('dog') ? 1 : 0,
    0.1,
    (text.codePointAt(0) ?? 0) / 1000,
  ];
}

export class KeywordEmbeddingProvider extends BaseEmbeddingProvider {
  /** Every text passed to embed(), in call order */
  calls: string[] = [];
  inFlight = 0;
  maxInFlight = 0;
  /** Fail any request containing this text */
  failOn: string | null = null;
  /** Answer with no vectors */
  empty = false;
  /** Never answer */
  hang = false;
  delayFor: (text: string) => number = () => 0;

  constructor() {
    super({ cacheSize: 0 });
  }

  getName(): string {
    return 'Keyword';
  }

  getModel(): string {
    return 'keyword-test';
  }

  getDimensions(): number {
    return 4;
  }

  async embed(texts: string[]): Promise<number[][]> {
    this.calls.push(...texts);
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      if (this.hang) {
        await new Promise<void>(() => {});
      }
      const delay = this.delayFor(texts[0]);
      if (delay > 0) {
        await new Promise((resolve) => setTimeout(resolve, delay));
      }
      const failOn = this.failOn;
      if (failOn !== null && texts.some((t) => t.includes(failOn))) {
        throw new EmbeddingUnavailableError('service down');
      }
      return this.empty ? [] : texts.map(vectorFor);
    } finally {
      this.inFlight--;
    }
  }

  async isAvailable(): Promise<boolean> {
    return true;
  }
}
