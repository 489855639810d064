import { spawn, spawnSync } from 'child_process';
import { promises as fs } from 'fs';
import { relative, resolve } from 'path';
import { ensureDir } from 'fs-extra';
import { CompilerError, eventMeta, type CompilerConfig, type Logger } from '@leansmith/shared';
import type { CompileResult, SourceCompiler } from './types';

function killProcessTree(pid: number, signal: NodeJS.Signals = 'SIGTERM'): void {
  if (process.platform === 'win32') {
    spawnSync('taskkill', ['/PID', String(pid), '/T', '/F']);
    return;
  }
  // Negative pid signals the whole group; the child is spawned detached.
  try {
    process.kill(-pid, signal);
  } catch (error) {
    if (!(error instanceof Error && 'code' in error && error.code === 'ESRCH')) {
      throw error;
    }
  }
}

export interface LakeCompilerOptions extends CompilerConfig {
  logger: Logger;
  runId?: string;
}

/**
 * Writes the source into the playground directory and runs the configured
 * command (`lake lean <file>` by default) on it. The file is removed
 * afterwards whatever the outcome.
 */
export class LakeCompiler implements SourceCompiler {
  private readonly cwd: string;
  private readonly workDir: string;

  constructor(private readonly options: LakeCompilerOptions) {
    this.cwd = resolve(options.cwd);
    this.workDir = resolve(this.cwd, options.workDir);
  }

  async compile(source: string, fileName: string): Promise<CompileResult> {
    const filePath = resolve(this.workDir, fileName);
    const started = Date.now();
    let timedOut = false;

    await ensureDir(this.workDir);
    try {
      await fs.writeFile(filePath, source, 'utf8');
      const result = await this.run(relative(this.cwd, filePath));
      timedOut = result.timedOut;
      await this.options.logger.log({
        ...eventMeta(this.options.runId ?? 'compiler'),
        type: 'CompilationFinished',
        payload: {
          fileName,
          success: result.success,
          exitCode: result.exitCode,
          durationMs: Date.now() - started,
          timedOut,
        },
      });
      return {
        success: result.success,
        output: result.output,
        error: result.error,
        exitCode: result.exitCode,
      };
    } finally {
      await fs.rm(filePath, { force: true });
    }
  }

  private run(target: string): Promise<CompileResult & { timedOut: boolean }> {
    const { command, args, timeoutMs } = this.options;

    return new Promise((resolvePromise, reject) => {
      let settled = false;
      let stdout = '';
      let stderr = '';

      const child = spawn(command, [...args, target], {
        cwd: this.cwd,
        stdio: ['ignore', 'pipe', 'pipe'],
        detached: true,
      });

      const timer = setTimeout(() => {
        if (settled) return;
        settled = true;
        if (child.pid) {
          try {
            killProcessTree(child.pid);
          } catch {
            child.kill('SIGKILL');
          }
        }
        resolvePromise({
          success: false,
          output: stdout,
          error: `Compilation timed out after ${timeoutMs / 1000} seconds`,
          exitCode: -1,
          timedOut: true,
        });
      }, timeoutMs);

      child.stdout?.on('data', (chunk: Buffer) => {
        stdout += chunk.toString('utf8');
      });
      child.stderr?.on('data', (chunk: Buffer) => {
        stderr += chunk.toString('utf8');
      });

      child.on('error', (err) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        reject(new CompilerError(`Failed to start compiler '${command}': ${err.message}`, { cause: err }));
      });

      child.on('close', (code) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolvePromise({
          success: code === 0,
          output: stdout,
          error: stderr,
          exitCode: code ?? -1,
          timedOut: false,
        });
      });
    });
  }
}
