// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * ragstore command-line program.
 *
 * Commands:
 *   add <text> [-s <label>]     Store a snippet
 *   index <dir>                 Ingest every indexable file beneath a directory
 *   query <text>                Print the context block for a query
 *   search <text> [-k <n>]      Print scored matches
 *   count                       Number of stored documents
 *   sources                     Distinct sources in the store
 *   remove <source>             Remove a source (or everything beneath a directory)
 *   clear                       Remove every document
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { resolveConfig } from '../config/index.js';
import { errorMessage } from '../errors.js';
import { logger, parseLogLevel } from '../logger.js';
import { createRetrievalManager, type RetrievalManager } from '../rag/manager.js';
import type { RAGConfig } from '../rag/types.js';
import { VERSION } from '../version.js';

/**
 * Global options accepted before any command.
 */
type GlobalOptions = {
  config?: string;
  collection?: string;
  verbose?: boolean;
  debug?: boolean;
  trace?: boolean;
};

/**
 * Seams for running the program in tests.
 */
export interface ProgramDeps {
  /** Build a manager from resolved configuration */
  createManager?: (config: RAGConfig) => Promise<RetrievalManager>;
  /** Output sink for command results */
  write?: (text: string) => void;
  /** Directory searched for workspace config files */
  cwd?: string;
  /** Directory holding the global config.json */
  globalDir?: string;
}

/**
 * Build the `ragstore` program.
 */
export function createProgram(deps: ProgramDeps = {}): Command {
  const createManager = deps.createManager ?? ((config: RAGConfig) => createRetrievalManager(config));
  const write = deps.write ?? ((text: string) => console.log(text));

  const program = new Command();

  program
    .name('ragstore')
    .description('Index text into a vector knowledge base and retrieve context for prompts')
    .version(VERSION, '-v, --version', 'Output the current version')
    .option('-c, --config <file>', 'Config file to use instead of .ragstore.json discovery')
    .option('--collection <name>', 'Collection to operate on')
    .option('--verbose', 'Show per-file progress')
    .option('--debug', 'Show store and embedding details')
    .option('--trace', 'Show individual backend requests');

  program.hook('preAction', () => {
    logger.setLevel(parseLogLevel(program.opts<GlobalOptions>()));
  });

  /**
   * Resolve configuration, open a manager, run the command and close it.
   * Failures are reported and set a non-zero exit code.
   */
  const run = async (action: (manager: RetrievalManager) => Promise<void>): Promise<void> => {
    const options = program.opts<GlobalOptions>();
    try {
      const resolved = resolveConfig({
        config: options.config,
        collection: options.collection,
        cwd: deps.cwd,
        globalDir: deps.globalDir,
      });
      for (const warning of resolved.warnings) {
        logger.warn(warning);
      }
      logger.debug(`Config sources: ${resolved.sources.join(', ') || '(defaults)'}`);

      const manager = await createManager(resolved.config);
      try {
        await action(manager);
      } finally {
        await manager.close();
      }
    } catch (error) {
      logger.error(errorMessage(error), error instanceof Error ? error : undefined);
      process.exitCode = 1;
    }
  };

  program
    .command('add <text>')
    .description('Store a snippet in the knowledge base')
    .option('-s, --source <label>', 'Source label for the snippet', 'cli')
    .action(async (text: string, opts: { source: string }) => {
      await run(async (manager) => {
        const id = await manager.addKnowledge(text, opts.source);
        write(`Added ${id}`);
      });
    });

  program
    .command('index <dir>')
    .description('Index every supported file beneath a directory')
    .action(async (dir: string) => {
      await run(async (manager) => {
        manager.onProgress = (current, total, file) => logger.progress(current, total, file);
        const files = await manager.indexDirectory(dir);
        const documents = await manager.knowledgeBaseCount();
        write(`Indexed ${files} files (${documents} documents in the knowledge base)`);
      });
    });

  program
    .command('query <text>')
    .description('Print the context block a prompt would receive')
    .action(async (text: string) => {
      await run(async (manager) => {
        const context = await manager.retrieveContext(text);
        write(context === '' ? chalk.dim('No relevant knowledge found.') : context);
      });
    });

  program
    .command('search <text>')
    .description('List scored matches for a query')
    .option('-k, --top-k <n>', 'Number of results')
    .action(async (text: string, opts: { topK?: string }) => {
      await run(async (manager) => {
        const results = opts.topK === undefined
          ? await manager.search(text)
          : await manager.search(text, Number(opts.topK));
        write(manager.formatAsToolOutput(results));
      });
    });

  program
    .command('count')
    .description('Number of stored documents')
    .action(async () => {
      await run(async (manager) => {
        write(String(await manager.knowledgeBaseCount()));
      });
    });

  program
    .command('sources')
    .description('List indexed sources')
    .action(async () => {
      await run(async (manager) => {
        const sources = await manager.getIndexedSources();
        write(sources.length === 0 ? chalk.dim('No sources indexed.') : sources.join('\n'));
      });
    });

  program
    .command('remove <source>')
    .description('Remove a source, or everything indexed beneath a directory')
    .action(async (source: string) => {
      await run(async (manager) => {
        const removed = await manager.removeSource(source);
        write(`Removed ${removed} documents`);
      });
    });

  program
    .command('clear')
    .description('Remove every document from the collection')
    .action(async () => {
      await run(async (manager) => {
        await manager.clear();
        write('Knowledge base cleared.');
      });
    });

  return program;
}
