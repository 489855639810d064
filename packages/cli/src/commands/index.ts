import path from 'node:path';
import { readFile } from 'node:fs/promises';
import type { Command } from 'commander';
import { createVectorIndex } from '@leansmith/core';
import { loadCliConfig, globalOptions } from '../config';
import { OutputRenderer } from '../output/renderer';
import type { CliDeps } from '../types';

export function registerIndexCommand(program: Command, deps: CliDeps) {
  const indexCommand = program.command('index').description('Manage the retrieval index');

  const open = (command: Command) => {
    const { config, logger } = loadCliConfig(command, deps);
    const index = createVectorIndex(config, { logger, baseDir: deps.cwd });
    const renderer = new OutputRenderer(Boolean(globalOptions(command).json), deps.write, deps.colors);
    return { index, renderer, indexDir: path.resolve(deps.cwd, config.retrieval.indexDir) };
  };

  indexCommand
    .command('build')
    .description('Load the index, or build it from the documents directory')
    .option('--force', 'Rebuild even when a valid index is persisted', false)
    .action(async (options: { force: boolean }, command: Command) => {
      const { index, renderer, indexDir } = open(command);
      const state = await index.build({ force: options.force });
      renderer.indexBuilt(state.chunks.length, state.metadata.embedding_model, indexDir);
    });

  indexCommand
    .command('status')
    .description('Show what is persisted, without building')
    .action(async (_options: unknown, command: Command) => {
      const { index, renderer, indexDir } = open(command);
      renderer.indexStatus(await index.status(), indexDir);
    });

  indexCommand
    .command('add')
    .argument('<file>', 'Text file to chunk and embed')
    .option('--source <label>', 'Source label for the new chunks (default: the file name)')
    .description('Add a document to the index')
    .action(async (file: string, options: { source?: string }, command: Command) => {
      const { index, renderer } = open(command);
      const content = await readFile(path.resolve(deps.cwd, file), 'utf8');
      const source = options.source ?? path.basename(file);
      renderer.chunksAdded(await index.add(content, source), source);
    });
}
