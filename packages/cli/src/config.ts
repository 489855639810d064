import type { Command } from 'commander';
import { ConfigLoader, createLogger } from '@leansmith/core';
import type { Config, Logger } from '@leansmith/shared';
import type { CliDeps, GlobalOptions } from './types';

export function globalOptions(command: Command): GlobalOptions {
  let root = command;
  while (root.parent) {
    root = root.parent;
  }
  return root.opts<GlobalOptions>();
}

export function loadCliConfig(command: Command, deps: CliDeps): { config: Config; logger: Logger } {
  const opts = globalOptions(command);
  const config = ConfigLoader.load({
    configPath: opts.config,
    cwd: deps.cwd,
    env: deps.env,
    homeDir: deps.homeDir,
    flags: opts.verbose ? { logging: { level: 'debug' } } : undefined,
  });
  return { config, logger: createLogger(config, deps.cwd) };
}
