import path from 'node:path';
import type { Command } from 'commander';
import { LakeCompiler, ProofCompiler } from '@leansmith/exec';
import { mainWorkflow } from '@leansmith/core';
import { EvaluationRunner, SimpleRenderer, SolutionEvaluator, TaskLoader } from '@leansmith/eval';
import { loadCliConfig, globalOptions } from '../config';
import { OutputRenderer } from '../output/renderer';
import type { CliDeps } from '../types';

interface EvalOptions {
  task?: string;
  tasksDir: string;
  out?: string;
}

export function registerEvalCommand(program: Command, deps: CliDeps) {
  program
    .command('eval')
    .description('Run tasks through the workflow and score the solutions')
    .option('--task <id>', 'Run a single task by directory name')
    .option('--tasks-dir <dir>', 'Directory holding task_id_* directories', 'tasks')
    .option('--out <file>', 'Write results as JSON to this file')
    .action(async (options: EvalOptions, command: Command) => {
      const opts = globalOptions(command);
      const { config, logger } = loadCliConfig(command, deps);

      const compiler = new ProofCompiler(
        deps.compiler ??
          new LakeCompiler({ ...config.compiler, cwd: path.resolve(deps.cwd, config.compiler.cwd), logger }),
      );
      const runner = new EvaluationRunner({
        loader: new TaskLoader(path.resolve(deps.cwd, options.tasksDir), logger),
        evaluator: new SolutionEvaluator(compiler),
        solve: (task, taskLogger) =>
          mainWorkflow(task.description, task.template, {
            config,
            logger: taskLogger,
            baseDir: deps.cwd,
            compiler: deps.compiler,
          }),
        logger,
        renderer: opts.json ? undefined : new SimpleRenderer(deps.write, deps.colors),
      });

      if (options.task) {
        await runner.runTask(options.task);
      } else {
        await runner.runAll();
      }

      if (options.out) {
        await runner.writeResults(path.resolve(deps.cwd, options.out));
      }

      if (opts.json) {
        new OutputRenderer(true, deps.write).json({ summary: runner.summary(), results: runner.collected });
      } else if (!options.task) {
        new SimpleRenderer(deps.write, deps.colors).logSummary(runner.summary());
      }
    });
}
