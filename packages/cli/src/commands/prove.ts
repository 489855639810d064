import path from 'node:path';
import type { Command } from 'commander';
import { mainWorkflow } from '@leansmith/core';
import { TaskLoader } from '@leansmith/eval';
import { loadCliConfig, globalOptions } from '../config';
import { OutputRenderer } from '../output/renderer';
import type { CliDeps } from '../types';

export function registerProveCommand(program: Command, deps: CliDeps) {
  program
    .command('prove')
    .argument('<taskDir>', 'Task directory with description.txt and task.lean')
    .description('Synthesize an implementation and proof for one task')
    .action(async (taskDir: string, _options: unknown, command: Command) => {
      const opts = globalOptions(command);
      const { config, logger } = loadCliConfig(command, deps);
      const dir = path.resolve(deps.cwd, taskDir);
      const task = await new TaskLoader(path.dirname(dir), logger).load(dir);

      const solution = await mainWorkflow(task.description, task.template, {
        config,
        logger,
        baseDir: deps.cwd,
        compiler: deps.compiler,
      });

      new OutputRenderer(Boolean(opts.json), deps.write, deps.colors).solution(task.id, solution);
    });
}
