import type { Command } from 'commander';
import { UsageError } from '@leansmith/shared';
import { createVectorIndex } from '@leansmith/core';
import { loadCliConfig, globalOptions } from '../config';
import { OutputRenderer } from '../output/renderer';
import type { CliDeps } from '../types';

export function registerSearchCommand(program: Command, deps: CliDeps) {
  program
    .command('search')
    .argument('<query>', 'Text to search for')
    .option('-k, --top-k <k>', 'Number of results to return')
    .description('Search the retrieval index')
    .action(async (query: string, options: { topK?: string }, command: Command) => {
      const { config, logger } = loadCliConfig(command, deps);

      let k = config.retrieval.maxChunks;
      if (options.topK !== undefined) {
        k = Number(options.topK);
        if (!Number.isInteger(k) || k <= 0) {
          throw new UsageError(`--top-k must be a positive integer, got '${options.topK}'`);
        }
      }

      const index = createVectorIndex(config, { logger, baseDir: deps.cwd });
      const results = await index.search(query, k);
      new OutputRenderer(Boolean(globalOptions(command).json), deps.write, deps.colors).searchResults(results);
    });
}
