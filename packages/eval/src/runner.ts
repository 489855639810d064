import path from 'node:path';
import fs from 'fs-extra';
import { UsageError, errorMessage, type Logger, type Solution, type Task } from '@leansmith/shared';
import type { SolutionEvaluator } from './evaluator';
import type { SimpleRenderer } from './renderer';
import type { TaskLoader } from './task-loader';
import type { EvalSummary, EvalTaskResult } from './types';

/**
 * Produces a solution for a task; `mainWorkflow` in production. `logger`
 * tags every message with the task id.
 */
export type SolveFn = (task: Task, logger: Logger) => Promise<Solution>;

export interface EvaluationRunnerOptions {
  loader: TaskLoader;
  evaluator: SolutionEvaluator;
  solve: SolveFn;
  logger: Logger;
  renderer?: SimpleRenderer;
}

export function summarize(results: readonly EvalTaskResult[]): EvalSummary {
  const total = results.length;
  const successful = results.filter((r) => r.success).length;
  const totalScore = results.reduce((sum, r) => sum + r.score, 0);
  return {
    total,
    successful,
    failed: total - successful,
    successRate: total > 0 ? successful / total : 0,
    totalScore,
    averageScore: total > 0 ? totalScore / total : 0,
    failedTasks: results.filter((r) => !r.success).map((r) => ({ taskId: r.taskId, error: r.error })),
  };
}

/**
 * Runs tasks through the workflow one at a time and scores each solution.
 */
export class EvaluationRunner {
  private readonly results: EvalTaskResult[] = [];

  constructor(private readonly options: EvaluationRunnerOptions) {}

  get collected(): readonly EvalTaskResult[] {
    return this.results;
  }

  /**
   * @throws {UsageError} If no directory exists for `taskId`
   */
  async runTask(taskId: string, index = 0, total = 1): Promise<EvalTaskResult> {
    const dir = this.options.loader.taskDir(taskId);
    if (!(await fs.pathExists(dir))) {
      throw new UsageError(`Task ${taskId} not found in ${this.options.loader.tasksDir}`);
    }
    return this.runDir(dir, index, total);
  }

  async runAll(): Promise<EvalTaskResult[]> {
    const dirs = await this.options.loader.discover();
    if (dirs.length === 0) {
      await this.options.logger.warn('No tasks found');
      return [];
    }
    this.options.renderer?.logRunStarted(dirs.length, this.options.loader.tasksDir);

    const results: EvalTaskResult[] = [];
    for (const [index, dir] of dirs.entries()) {
      try {
        results.push(await this.runDir(dir, index, dirs.length));
      } catch (error) {
        await this.options.logger.warn(`Skipping ${path.basename(dir)}: ${errorMessage(error)}`);
      }
    }
    return results;
  }

  summary(): EvalSummary {
    return summarize(this.results);
  }

  async writeResults(filePath: string): Promise<void> {
    await fs.ensureDir(path.dirname(filePath));
    await fs.writeJson(filePath, { summary: this.summary(), results: this.results }, { spaces: 2 });
  }

  private async runDir(dir: string, index: number, total: number): Promise<EvalTaskResult> {
    const { loader, evaluator, solve, renderer } = this.options;
    const task = await loader.load(dir);
    renderer?.logTaskStarted(task, index, total);

    const started = Date.now();
    let result: EvalTaskResult;
    try {
      const solution = await solve(
        { description: task.description, template: task.template },
        this.options.logger.child({ task: task.id }),
      );
      result = { ...(await evaluator.evaluate(task, solution)), solution };
    } catch (error) {
      result = {
        taskId: task.id,
        success: false,
        error: `Workflow failed: ${errorMessage(error)}`,
        codeCompiles: false,
        proofValid: false,
        score: 0,
      };
    }
    result.durationMs = Date.now() - started;

    this.results.push(result);
    renderer?.logTaskFinished(result);
    return result;
  }
}
