import pc from 'picocolors';
import type { EvalSummary, EvalTask, EvalTaskResult } from './types';

export type Colors = ReturnType<typeof pc.createColors>;

const RULE = '='.repeat(50);

export class SimpleRenderer {
  constructor(
    private readonly write: (line: string) => void = console.log,
    private readonly colors: Colors = pc,
  ) {}

  logRunStarted(taskCount: number, tasksDir: string) {
    this.write(this.colors.bold(this.colors.cyan(`Found ${taskCount} tasks in ${tasksDir}`)));
  }

  logTaskStarted(task: EvalTask, index: number, total: number) {
    const c = this.colors;
    const description = task.description.length > 100 ? `${task.description.slice(0, 100)}...` : task.description;
    this.write(c.gray(`\n(${index + 1}/${total})`) + ` Processing task: ${c.bold(task.id)}`);
    this.write(`  Description: ${description}`);
  }

  logTaskFinished(result: EvalTaskResult) {
    const c = this.colors;
    const badge = result.success ? c.bold(c.green('SUCCESS')) : c.bold(c.red('FAILED'));
    const duration = result.durationMs !== undefined ? ` in ${result.durationMs}ms` : '';
    this.write(`  Finished task: ${c.bold(result.taskId)}${duration}. Result: ${badge}`);
    if (!result.success) {
      this.write(c.red(`  Error: ${result.error}`));
    }
  }

  logSummary(summary: EvalSummary) {
    const c = this.colors;
    if (summary.total === 0) {
      this.write('No results to summarize');
      return;
    }

    const rate = summary.successRate * 100;
    const rateColor = rate > 80 ? c.green : rate > 50 ? c.yellow : c.red;

    this.write(RULE);
    this.write(c.bold(c.cyan('SUMMARY')));
    this.write(RULE);
    this.write(`Total tasks: ${summary.total}`);
    this.write(`Successful: ${c.green(String(summary.successful))}`);
    this.write(`Failed: ${c.red(String(summary.failed))}`);
    this.write(`Success rate: ${rateColor(`${rate.toFixed(1)}%`)}`);
    this.write(`Total score: ${summary.totalScore.toFixed(1)}/${summary.total}`);
    this.write(`Average score: ${summary.averageScore.toFixed(3)}`);

    if (summary.failedTasks.length > 0) {
      this.write('\nFailed tasks:');
      for (const failed of summary.failedTasks) {
        const error = failed.error.length > 80 ? `${failed.error.slice(0, 80)}...` : failed.error;
        this.write(`  ${failed.taskId}: ${error}`);
      }
    }
  }
}
