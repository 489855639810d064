import os from 'node:os';
import { Command } from 'commander';
import { version } from '../package.json';
import { registerProveCommand } from './commands/prove';
import { registerEvalCommand } from './commands/eval';
import { registerIndexCommand } from './commands/index';
import { registerSearchCommand } from './commands/search';
import type { CliDeps } from './types';

export function defaultDeps(): CliDeps {
  return {
    cwd: process.cwd(),
    env: process.env,
    homeDir: os.homedir(),
    write: (line) => console.log(line),
  };
}

export function createProgram(deps: CliDeps = defaultDeps()): Command {
  const program = new Command();

  program
    .name('leansmith')
    .description('Synthesize Lean 4 implementations with machine-checked proofs')
    .version(version)
    .option('--json', 'Output results as JSON')
    .option('--config <path>', 'Path to configuration file')
    .option('--verbose', 'Enable verbose logging');

  registerProveCommand(program, deps);
  registerEvalCommand(program, deps);
  registerIndexCommand(program, deps);
  registerSearchCommand(program, deps);

  return program;
}
