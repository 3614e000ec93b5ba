// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Validator
 *
 * Turns untyped JSON into configuration fields, and checks a resolved
 * configuration for settings that cannot work together.
 */

import type { EmbeddingProviderName, RAGConfig, StorageMode } from '../rag/types.js';
import type { ParsedConfig } from './types.js';

/**
 * Valid provider names.
 */
const VALID_PROVIDERS: readonly EmbeddingProviderName[] = ['ollama', 'openai'];

const NUMBER_FIELDS = [
  'dimensions',
  'chunkSize',
  'chunkOverlap',
  'topK',
  'parallelJobs',
  'embedTimeoutMs',
  'storeTimeoutMs',
] as const;

const STRING_FIELDS = ['embeddingModel', 'ollamaBaseUrl', 'collectionName'] as const;

const KNOWN_FIELDS = new Set<string>([
  ...NUMBER_FIELDS,
  ...STRING_FIELDS,
  'embeddingProvider',
  'excludeDirs',
  'storage',
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isProviderName(value: unknown): value is EmbeddingProviderName {
  return value === 'ollama' || value === 'openai';
}

/**
 * Parse the `storage` key: `{ "embedded": { "path" } }`,
 * `{ "remote": { "url" } }` or `{ "memory": {} }`.
 */
export function parseStorage(value: unknown): StorageMode | string {
  if (!isRecord(value)) {
    return 'storage must be an object';
  }

  const keys = Object.keys(value);
  if (keys.length !== 1) {
    return `storage must name exactly one backend (embedded, remote, memory), got ${keys.length}`;
  }

  const kind = keys[0];
  const settings = value[kind];
  if (!isRecord(settings)) {
    return `storage.${kind} must be an object`;
  }

  switch (kind) {
    case 'embedded':
      if (typeof settings.path !== 'string' || settings.path === '') {
        return 'storage.embedded.path must be a non-empty string';
      }
      return { kind: 'embedded', path: settings.path };
    case 'remote':
      if (typeof settings.url !== 'string' || settings.url === '') {
        return 'storage.remote.url must be a non-empty string';
      }
      return { kind: 'remote', url: settings.url };
    case 'memory':
      return { kind: 'memory' };
    default:
      return `Unknown storage backend "${kind}". Valid: embedded, remote, memory`;
  }
}

/**
 * Parse one configuration layer.
 * Invalid or unknown fields are dropped with a warning.
 */
export function parseRagConfig(raw: unknown): ParsedConfig {
  const config: ParsedConfig['config'] = {};
  const warnings: string[] = [];

  if (raw === null || raw === undefined) {
    return { config, warnings };
  }
  if (!isRecord(raw)) {
    return { config, warnings: ['Configuration must be a JSON object'] };
  }

  for (const key of Object.keys(raw)) {
    if (!KNOWN_FIELDS.has(key)) {
      warnings.push(`Unknown option "${key}"`);
    }
  }

  if (raw.embeddingProvider !== undefined) {
    if (isProviderName(raw.embeddingProvider)) {
      config.embeddingProvider = raw.embeddingProvider;
    } else {
      warnings.push(
        `Unknown embeddingProvider "${String(raw.embeddingProvider)}". Valid: ${VALID_PROVIDERS.join(', ')}`
      );
    }
  }

  for (const field of NUMBER_FIELDS) {
    const value = raw[field];
    if (value === undefined) continue;
    if (typeof value === 'number' && Number.isFinite(value)) {
      config[field] = value;
    } else {
      warnings.push(`${field} must be a number`);
    }
  }

  for (const field of STRING_FIELDS) {
    const value = raw[field];
    if (value === undefined) continue;
    if (typeof value === 'string' && value !== '') {
      config[field] = value;
    } else {
      warnings.push(`${field} must be a non-empty string`);
    }
  }

  if (raw.excludeDirs !== undefined) {
    const dirs = raw.excludeDirs;
    if (Array.isArray(dirs) && dirs.every((d): d is string => typeof d === 'string')) {
      config.excludeDirs = [...dirs];
    } else {
      warnings.push('excludeDirs must be an array of strings');
    }
  }

  if (raw.storage !== undefined) {
    const storage = parseStorage(raw.storage);
    if (typeof storage === 'string') {
      warnings.push(storage);
    } else {
      config.storage = storage;
    }
  }

  return { config, warnings };
}

function isValidUrl(value: string): boolean {
  try {
    new URL(value);
    return true;
  } catch {
    return false;
  }
}

/**
 * Validate a resolved configuration.
 * Returns an array of problems; an empty array means the configuration is usable.
 */
export function validateRagConfig(config: RAGConfig): string[] {
  const problems: string[] = [];

  if (!Number.isInteger(config.chunkSize) || config.chunkSize <= 0) {
    problems.push('chunkSize must be a positive integer');
  } else if (!Number.isInteger(config.chunkOverlap) || config.chunkOverlap < 0) {
    problems.push('chunkOverlap must be a non-negative integer');
  } else if (config.chunkOverlap >= config.chunkSize) {
    problems.push(`chunkOverlap (${config.chunkOverlap}) must be smaller than chunkSize (${config.chunkSize})`);
  }

  if (!Number.isInteger(config.topK) || config.topK <= 0) {
    problems.push('topK must be a positive integer');
  }
  if (!Number.isInteger(config.parallelJobs) || config.parallelJobs <= 0) {
    problems.push('parallelJobs must be a positive integer');
  }
  if (config.dimensions !== undefined && (!Number.isInteger(config.dimensions) || config.dimensions <= 0)) {
    problems.push('dimensions must be a positive integer');
  }
  if (config.embedTimeoutMs < 0 || config.storeTimeoutMs < 0) {
    problems.push('Timeouts must not be negative (0 disables them)');
  }

  if (!isValidUrl(config.ollamaBaseUrl)) {
    problems.push(`ollamaBaseUrl is not a valid URL: "${config.ollamaBaseUrl}"`);
  }
  if (config.storage.kind === 'remote' && !isValidUrl(config.storage.url)) {
    problems.push(`storage.remote.url is not a valid URL: "${config.storage.url}"`);
  }

  return problems;
}
