// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Module
 *
 * Configuration loading, validation, and merging for ragstore:
 *
 * - types.ts     - Type definitions (ParsedConfig, ResolvedConfig, etc.)
 * - loader.ts    - File I/O (global and workspace config files)
 * - validator.ts - Parsing untyped JSON and semantic validation
 * - merger.ts    - Layer merging with priority handling
 */

export type { ParsedConfig, CLIOptions, ResolvedConfig } from './types.js';

export {
  CONFIG_FILES,
  GLOBAL_CONFIG_DIR,
  GLOBAL_CONFIG_FILE,
  loadGlobalConfig,
  loadWorkspaceConfig,
  loadConfigFile,
  type LoadedConfig,
} from './loader.js';

export { parseRagConfig, parseStorage, validateRagConfig } from './validator.js';

export { mergeConfig, resolveConfig, type ResolveOptions } from './merger.js';
