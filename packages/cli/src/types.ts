import type { SourceCompiler } from '@leansmith/exec';
import type { Colors } from '@leansmith/eval';

/** Options accepted by every command. */
export interface GlobalOptions {
  json?: boolean;
  config?: string;
  verbose?: boolean;
}

/** Process-level inputs, replaced in tests. */
export interface CliDeps {
  cwd: string;
  env: NodeJS.ProcessEnv;
  homeDir?: string;
  write: (line: string) => void;
  colors?: Colors;
  /** Replaces the Lake compiler */
  compiler?: SourceCompiler;
}
