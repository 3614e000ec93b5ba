// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Merger
 *
 * Functions for merging configuration from multiple sources.
 * Priority: CLI options > workspace (or --config) file > global file > defaults
 */

import { ConfigurationError } from '../errors.js';
import { DEFAULT_RAG_CONFIG, type RAGConfig } from '../rag/types.js';
import { loadConfigFile, loadGlobalConfig, loadWorkspaceConfig, type LoadedConfig } from './loader.js';
import type { CLIOptions, ResolvedConfig } from './types.js';
import { parseRagConfig, validateRagConfig } from './validator.js';

/**
 * Merge parsed layers over the defaults, lowest priority first.
 */
export function mergeConfig(...layers: Array<Partial<RAGConfig>>): RAGConfig {
  const config: RAGConfig = {
    ...DEFAULT_RAG_CONFIG,
    excludeDirs: [...DEFAULT_RAG_CONFIG.excludeDirs],
  };

  for (const layer of layers) {
    Object.assign(config, layer);
  }

  return config;
}

export interface ResolveOptions extends CLIOptions {
  /** Directory searched for workspace config files */
  cwd?: string;
  /** Directory holding the global config.json (for testing) */
  globalDir?: string;
}

/**
 * Load, parse, merge and validate configuration.
 * @throws ConfigurationError if an explicit --config file cannot be read,
 *   or the merged configuration is unusable
 */
export function resolveConfig(options: ResolveOptions = {}): ResolvedConfig {
  const files: LoadedConfig[] = [
    loadGlobalConfig(options.globalDir),
    options.config ? loadConfigFile(options.config) : loadWorkspaceConfig(options.cwd),
  ];

  const layers: Array<Partial<RAGConfig>> = [];
  const warnings: string[] = [];
  const sources: string[] = [];

  for (const file of files) {
    if (file.configPath === null) continue;
    sources.push(file.configPath);

    const parsed = parseRagConfig(file.config);
    layers.push(parsed.config);
    for (const warning of parsed.warnings) {
      warnings.push(`${file.configPath}: ${warning}`);
    }
  }

  // CLI options override config files
  if (options.collection) {
    layers.push({ collectionName: options.collection });
  }

  const config = mergeConfig(...layers);
  const problems = validateRagConfig(config);
  if (problems.length > 0) {
    throw new ConfigurationError(`Invalid configuration: ${problems.join('; ')}`);
  }

  return { config, warnings, sources };
}
