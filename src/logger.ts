// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Logger
 *
 * Level-aware output for ingestion and retrieval. Results of CLI commands
 * go to stdout through the program's writer; everything here is
 * diagnostics.
 */

import chalk from 'chalk';

/**
 * Graduated verbosity: NORMAL → VERBOSE → DEBUG → TRACE
 */
export enum LogLevel {
  /** Warnings and errors only */
  NORMAL = 0,
  /** Per-file ingestion progress */
  VERBOSE = 1,
  /** Skipped files, store and config details */
  DEBUG = 2,
  /** Every embedding and backend request */
  TRACE = 3,
}

/**
 * Parse log level from CLI flags (the most detailed flag wins).
 */
export function parseLogLevel(options: {
  verbose?: boolean;
  debug?: boolean;
  trace?: boolean;
}): LogLevel {
  if (options.trace) return LogLevel.TRACE;
  if (options.debug) return LogLevel.DEBUG;
  if (options.verbose) return LogLevel.VERBOSE;
  return LogLevel.NORMAL;
}

class Logger {
  private level: LogLevel = LogLevel.NORMAL;

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return this.level >= level;
  }

  private at(level: LogLevel, line: () => string): void {
    if (this.level >= level) {
      console.log(line());
    }
  }

  verbose(message: string): void {
    this.at(LogLevel.VERBOSE, () => chalk.dim(message));
  }

  debug(message: string): void {
    this.at(LogLevel.DEBUG, () => chalk.dim(`[Debug] ${message}`));
  }

  trace(message: string): void {
    this.at(LogLevel.TRACE, () => chalk.gray(`[Trace] ${message}`));
  }

  // Ingestion

  /** `[current/total] file` while a directory is indexed (VERBOSE). */
  progress(current: number, total: number, file: string): void {
    this.at(LogLevel.VERBOSE, () => chalk.dim(`[${current}/${total}] `) + file);
  }

  /** A file was chunked, embedded and stored (VERBOSE). */
  indexedFile(filePath: string, chunks: number): void {
    this.at(
      LogLevel.VERBOSE,
      () => chalk.green(`✓ Indexed: ${filePath}`) + chalk.dim(` (${chunks} chunks)`)
    );
  }

  /** A file or directory was left out of ingestion (DEBUG). */
  skipped(filePath: string, reason: string): void {
    this.at(LogLevel.DEBUG, () => chalk.dim(`[Skip] ${filePath}: ${reason}`));
  }

  // Backends

  /** A vector store collection was opened (DEBUG). */
  storeOpened(kind: string, collection: string, documents: number): void {
    this.at(
      LogLevel.DEBUG,
      () => chalk.dim(`[Store] ${kind} collection "${collection}" opened (${documents} documents)`)
    );
  }

  /** One request to an embedding service or store backend (TRACE). */
  request(backend: string, operation: string, detail?: string): void {
    this.at(
      LogLevel.TRACE,
      () => chalk.gray(`[${backend}] ${operation}`) + (detail ? chalk.dim(` ${detail}`) : '')
    );
  }

  // Always shown

  /**
   * Log an error; the stack follows at DEBUG level.
   */
  error(message: string, error?: Error): void {
    console.error(chalk.red(`Error: ${message}`));
    if (error && this.level >= LogLevel.DEBUG) {
      console.error(chalk.dim(error.stack ?? 'No stack trace available'));
    }
  }

  warn(message: string): void {
    console.warn(chalk.yellow(`Warning: ${message}`));
  }

  info(message: string): void {
    console.log(chalk.blue(`Info: ${message}`));
  }
}

/**
 * Process-wide logger; its level is the only global mutable state.
 */
export const logger = new Logger();
