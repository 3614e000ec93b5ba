// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Error taxonomy for the retrieval engine.
 *
 * Every failure raised by ragstore is a RagError subclass carrying a stable
 * code, so callers can branch on the kind without parsing messages.
 */

export type RagErrorCode =
  | 'CONFIGURATION'
  | 'EMBEDDING_UNAVAILABLE'
  | 'EMPTY_RESULT'
  | 'STORE'
  | 'BACKEND_UNAVAILABLE'
  | 'DIMENSION_MISMATCH'
  | 'UNSUPPORTED_OPERATION'
  | 'IO'
  | 'TIMEOUT';

/**
 * Base class for all ragstore errors.
 */
export class RagError extends Error {
  /** File being processed when the error occurred, if any */
  file?: string;

  constructor(
    message: string,
    public readonly code: RagErrorCode,
    public readonly transient: boolean = false,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'RagError';
  }

  /**
   * Attach the offending file to the error (first caller wins).
   */
  attachFile(file: string): this {
    if (this.file === undefined) {
      this.file = file;
      this.message = `${file}: ${this.message}`;
    }
    return this;
  }
}

/**
 * Invalid parameters, rejected before any I/O happens.
 */
export class ConfigurationError extends RagError {
  constructor(message: string) {
    super(message, 'CONFIGURATION');
    this.name = 'ConfigurationError';
  }
}

/**
 * The embedding service could not be reached or refused the request.
 */
export class EmbeddingUnavailableError extends RagError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'EMBEDDING_UNAVAILABLE', false, options);
    this.name = 'EmbeddingUnavailableError';
  }
}

/**
 * The embedding service answered with no vector for non-empty input.
 */
export class EmptyResultError extends RagError {
  constructor(message = 'No embeddings returned') {
    super(message, 'EMPTY_RESULT');
    this.name = 'EmptyResultError';
  }
}

/**
 * Storage failure. Subclasses narrow the kind.
 */
export class StoreError extends RagError {
  constructor(
    message: string,
    code: RagErrorCode = 'STORE',
    options?: { cause?: unknown }
  ) {
    super(message, code, false, options);
    this.name = 'StoreError';
  }
}

export class BackendUnavailableError extends StoreError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'BACKEND_UNAVAILABLE', options);
    this.name = 'BackendUnavailableError';
  }
}

export class DimensionMismatchError extends StoreError {
  constructor(
    public readonly expected: number,
    public readonly actual: number
  ) {
    super(
      `Embedding has ${actual} dimensions but the collection expects ${expected}`,
      'DIMENSION_MISMATCH'
    );
    this.name = 'DimensionMismatchError';
  }
}

export class UnsupportedOperationError extends StoreError {
  constructor(operation: string, backend: string) {
    super(`${backend} does not support ${operation}`, 'UNSUPPORTED_OPERATION');
    this.name = 'UnsupportedOperationError';
  }
}

/**
 * Filesystem failure while walking or reading an ingestion root.
 */
export class IoError extends RagError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'IO', false, options);
    this.name = 'IoError';
  }
}

/**
 * A bounded call did not finish in time. Safe to retry.
 */
export class TimeoutError extends RagError {
  constructor(label: string, public readonly timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`, 'TIMEOUT', true);
    this.name = 'TimeoutError';
  }
}

/**
 * Render an unknown thrown value as a message.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
