import path from 'node:path';
import { readFile, readdir } from 'node:fs/promises';
import fs from 'fs-extra';
import { CODE_SLOT, PROOF_SLOT, hasSlots } from '@leansmith/exec';
import { ConfigError, type Logger } from '@leansmith/shared';
import type { EvalTask } from './types';

export const TASK_DIR_PREFIX = 'task_id_';

/**
 * Reads task directories: `description.txt` and `task.lean` are required,
 * `tests.lean` is optional.
 */
export class TaskLoader {
  constructor(
    readonly tasksDir: string,
    private readonly logger: Logger,
  ) {}

  /** Task directories under `tasksDir`, sorted by name. */
  async discover(): Promise<string[]> {
    if (!(await fs.pathExists(this.tasksDir))) {
      await this.logger.warn(`Tasks directory ${this.tasksDir} not found`);
      return [];
    }
    const entries = await readdir(this.tasksDir, { withFileTypes: true });
    return entries
      .filter((e) => e.isDirectory() && e.name.startsWith(TASK_DIR_PREFIX))
      .map((e) => path.join(this.tasksDir, e.name))
      .sort();
  }

  taskDir(taskId: string): string {
    return path.join(this.tasksDir, taskId);
  }

  /**
   * @throws {ConfigError} If a required file is missing, or `task.lean`
   * lacks one of the code and proof slots
   */
  async load(dir: string): Promise<EvalTask> {
    const descriptionPath = path.join(dir, 'description.txt');
    const templatePath = path.join(dir, 'task.lean');
    const testsPath = path.join(dir, 'tests.lean');

    if (!(await fs.pathExists(descriptionPath))) {
      throw new ConfigError(`Missing description.txt in ${dir}`);
    }
    if (!(await fs.pathExists(templatePath))) {
      throw new ConfigError(`Missing task.lean in ${dir}`);
    }

    const description = (await readFile(descriptionPath, 'utf8')).trim();
    const template = await readFile(templatePath, 'utf8');
    if (!hasSlots(template)) {
      throw new ConfigError(`task.lean in ${dir} must contain both ${CODE_SLOT} and ${PROOF_SLOT}`);
    }
    const tests = (await fs.pathExists(testsPath)) ? await readFile(testsPath, 'utf8') : '';

    return { id: path.basename(dir), dir, description, template, tests };
  }
}
