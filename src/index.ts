// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * ragstore
 *
 * Chunk, embed and store text in a vector knowledge base, and retrieve the
 * most relevant passages as prompt context.
 */

export * from './rag/index.js';

export { cosineSimilarity, rankDocuments } from './utils/vector.js';
export { ReadWriteLock } from './utils/rw-lock.js';
export { withTimeout } from './utils/timeout.js';

export * from './errors.js';
export { logger, LogLevel, parseLogLevel } from './logger.js';
export * from './config/index.js';
export { VERSION } from './version.js';
