// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Types
 *
 * Shapes of parsed and resolved configuration.
 */

import type { RAGConfig } from '../rag/types.js';

/**
 * Result of parsing one configuration layer.
 */
export interface ParsedConfig {
  /** Fields that were present and valid */
  config: Partial<RAGConfig>;
  /** Problems with fields that were ignored */
  warnings: string[];
}

/**
 * CLI options that can override configuration.
 */
export interface CLIOptions {
  /** Explicit config file, replacing workspace discovery */
  config?: string;
  /** Collection name override */
  collection?: string;
}

/**
 * Fully resolved configuration with provenance.
 */
export interface ResolvedConfig {
  config: RAGConfig;
  /** Non-fatal problems found in configuration files */
  warnings: string[];
  /** Configuration files that contributed, lowest priority first */
  sources: string[];
}
