import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import path from 'node:path';
import os from 'node:os';
import fs from 'fs-extra';
import yaml from 'js-yaml';
import pc from 'picocolors';
import type { CompileResult, SourceCompiler } from '@leansmith/exec';
import { UsageError } from '@leansmith/shared';
import { createProgram } from './program';
import type { CliDeps } from './types';

const passing: SourceCompiler = {
  compile: async (): Promise<CompileResult> => ({ success: true, output: '', error: '', exitCode: 0 }),
};

describe('leansmith CLI', () => {
  let cwd: string;
  let lines: string[];

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), 'leansmith-cli-'));
    lines = [];
    await fs.writeFile(
      path.join(cwd, '.leansmith.yaml'),
      yaml.dump({
        providers: { offline: { type: 'fake', model: 'test' } },
        defaults: { planner: 'offline', generator: 'offline', verifier: 'offline' },
        retry: { initialDelayMs: 0 },
        retrieval: { embeddings: { provider: 'local-hash', model: 'local', dims: 32 } },
        logging: { level: 'error' },
      }),
    );
  });

  afterEach(async () => {
    await fs.remove(cwd);
  });

  async function run(...args: string[]) {
    const deps: CliDeps = {
      cwd,
      env: {},
      homeDir: cwd,
      write: (line) => lines.push(line),
      colors: pc.createColors(false),
      compiler: passing,
    };
    const program = createProgram(deps).exitOverride();
    await program.parseAsync(args, { from: 'user' });
  }

  async function writeTask(id: string, description: string) {
    const dir = path.join(cwd, 'tasks', id);
    await fs.ensureDir(dir);
    await fs.writeFile(path.join(dir, 'description.txt'), description);
    await fs.writeFile(path.join(dir, 'task.lean'), 'def add (a b : Nat) : Nat := {{code}}\ntheorem t : add 1 2 = 3 := by {{proof}}\n');
  }

  it('proves a task and prints the pair', async () => {
    await writeTask('task_id_0', 'Add two natural numbers');

    await run('prove', 'tasks/task_id_0');

    expect(lines).toEqual(['Solution for task_id_0', '\nCode:', 'a + b', '\nProof:', 'rfl']);
  });

  it('prints the pair as JSON', async () => {
    await writeTask('task_id_0', 'Add two natural numbers');

    await run('--json', 'prove', 'tasks/task_id_0');

    expect(JSON.parse(lines.join('\n'))).toEqual({ taskId: 'task_id_0', code: 'a + b', proof: 'rfl' });
  });

  it('evaluates every task and reports the summary as JSON', async () => {
    await writeTask('task_id_0', 'Add two natural numbers');
    await writeTask('task_id_1', 'Add two more natural numbers');

    await run('--json', 'eval', '--out', 'results.json');

    const output: { summary: { total: number; successful: number } } = JSON.parse(lines.join('\n'));
    expect(output.summary).toMatchObject({ total: 2, successful: 2 });
    expect(await fs.pathExists(path.join(cwd, 'results.json'))).toBe(true);
  });

  it('builds the index and reports its status', async () => {
    await run('--json', 'index', 'build');
    const built: { chunkCount: number; model: string } = JSON.parse(lines.join('\n'));
    lines.length = 0;

    await run('--json', 'index', 'status');
    const status: { persisted: boolean; chunkCount: number } = JSON.parse(lines.join('\n'));

    expect(built.model).toBe('local-hash:32');
    expect(built.chunkCount).toBeGreaterThan(0);
    expect(status).toMatchObject({ persisted: true, chunkCount: built.chunkCount });
  });

  it('reports a missing index without building one', async () => {
    await run('index', 'status');

    expect(lines).toEqual([`No index found at ${path.join(cwd, '.leansmith', 'index')}`]);
  });

  it('adds a document under the given source label', async () => {
    await fs.writeFile(path.join(cwd, 'notes.txt'), 'theorem two : 1 + 1 = 2 := by norm_num');

    await run('index', 'add', 'notes.txt', '--source', 'notes');

    expect(lines).toEqual(['Added 1 chunk from notes']);
  });

  it('limits search results to k', async () => {
    await run('--json', 'search', 'omega tactic', '-k', '2');

    const results: unknown[] = JSON.parse(lines.join('\n'));
    expect(results).toHaveLength(2);
  });

  it('rejects a non-positive k', async () => {
    await expect(run('search', 'omega', '-k', '0')).rejects.toThrow(UsageError);
  });
});
