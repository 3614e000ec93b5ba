// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Directory Walker
 *
 * Collects indexable files beneath a root using an explicit work-list of
 * pending directories, so traversal order is fixed and easy to test:
 * breadth-first, entries of each directory sorted by name.
 */

import * as fs from 'fs';
import * as path from 'path';
import { IoError, errorMessage } from '../errors.js';
import { logger } from '../logger.js';

/** File extensions accepted for ingestion (case-sensitive) */
export const INDEXABLE_EXTENSIONS: ReadonlySet<string> = new Set([
  'rs', 'go', 'py', 'js', 'ts', 'tsx', 'jsx', 'md', 'txt',
]);

/** Directory names skipped unless configured otherwise */
export const DEFAULT_EXCLUDED_DIRS = ['.git', 'node_modules'];

export interface WalkOptions {
  /** Directory names to skip at any depth */
  excludeDirs?: string[];
}

/**
 * Check if a file should be indexed based on its extension.
 */
export function isIndexable(filePath: string): boolean {
  const base = path.basename(filePath);
  const dot = base.lastIndexOf('.');
  if (dot <= 0 || dot === base.length - 1) {
    return false;
  }
  return INDEXABLE_EXTENSIONS.has(base.slice(dot + 1));
}

/**
 * Collect indexable files beneath `root`.
 *
 * Failing to read the root itself is an IoError; unreadable subdirectories
 * are skipped. Symbolic links are not followed.
 */
export async function collectFiles(root: string, options: WalkOptions = {}): Promise<string[]> {
  const excluded = new Set(options.excludeDirs ?? DEFAULT_EXCLUDED_DIRS);
  const files: string[] = [];
  const pending: string[] = [root];
  let isRoot = true;

  while (pending.length > 0) {
    const dir = pending.shift();
    if (dir === undefined) break;

    let entries: fs.Dirent[];
    try {
      entries = await fs.promises.readdir(dir, { withFileTypes: true });
    } catch (error) {
      if (isRoot) {
        throw new IoError(`Cannot read directory ${root}: ${errorMessage(error)}`, { cause: error });
      }
      logger.skipped(dir, `unreadable directory (${errorMessage(error)})`);
      continue;
    }
    isRoot = false;

    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        if (!excluded.has(entry.name)) {
          pending.push(fullPath);
        }
      } else if (entry.isFile() && isIndexable(entry.name)) {
        files.push(fullPath);
      }
    }
  }

  return files;
}
