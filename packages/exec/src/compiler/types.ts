export interface CompileResult {
  success: boolean;
  /** Captured stdout */
  output: string;
  /** Captured stderr, or the timeout message */
  error: string;
  /** -1 when the process timed out or was killed by a signal */
  exitCode: number;
}

/**
 * Anything that turns a source file into a compile verdict.
 */
export interface SourceCompiler {
  compile(source: string, fileName: string): Promise<CompileResult>;
}
