// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Loader
 *
 * Functions for reading configuration files from disk.
 * Handles the global file and the files discovered in the working directory.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConfigurationError, errorMessage } from '../errors.js';
import { logger } from '../logger.js';

/**
 * Configuration file names (checked in order).
 */
export const CONFIG_FILES = ['.ragstore.json', 'ragstore.config.json'];

/**
 * Global config directory path.
 */
export const GLOBAL_CONFIG_DIR = path.join(os.homedir(), '.ragstore');

/**
 * Global config file path.
 */
export const GLOBAL_CONFIG_FILE = path.join(GLOBAL_CONFIG_DIR, 'config.json');

/**
 * Raw contents of one configuration file.
 */
export interface LoadedConfig {
  /** Parsed JSON, not yet validated */
  config: unknown;
  configPath: string | null;
}

const NOT_FOUND: LoadedConfig = { config: null, configPath: null };

/**
 * Read and parse a file that may be absent. A file that exists but fails to
 * parse is reported and contributes nothing.
 */
function readOptional(configPath: string): LoadedConfig | null {
  if (!fs.existsSync(configPath)) {
    return null;
  }
  try {
    return { config: JSON.parse(fs.readFileSync(configPath, 'utf-8')), configPath };
  } catch (error) {
    logger.warn(`Failed to parse ${configPath}: ${errorMessage(error)}`);
    return { config: null, configPath };
  }
}

/**
 * Load global configuration from ~/.ragstore/config.json.
 * @param overrideDir - Optional directory override for testing
 */
export function loadGlobalConfig(overrideDir?: string): LoadedConfig {
  const configPath = overrideDir ? path.join(overrideDir, 'config.json') : GLOBAL_CONFIG_FILE;
  return readOptional(configPath) ?? NOT_FOUND;
}

/**
 * Load the first of CONFIG_FILES present in the given directory.
 */
export function loadWorkspaceConfig(cwd: string = process.cwd()): LoadedConfig {
  for (const fileName of CONFIG_FILES) {
    const loaded = readOptional(path.join(cwd, fileName));
    if (loaded) return loaded;
  }
  return NOT_FOUND;
}

/**
 * Load an explicitly named configuration file.
 * @throws ConfigurationError if the file is missing or not valid JSON
 */
export function loadConfigFile(configPath: string): LoadedConfig {
  let content: string;
  try {
    content = fs.readFileSync(configPath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read config file ${configPath}: ${errorMessage(error)}`);
  }

  try {
    return { config: JSON.parse(content), configPath };
  } catch (error) {
    throw new ConfigurationError(`Invalid JSON in ${configPath}: ${errorMessage(error)}`);
  }
}
