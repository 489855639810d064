import { AppError, ConfigError, UsageError } from '@leansmith/shared';

export function exitCodeFor(error: unknown): number {
  return error instanceof ConfigError || error instanceof UsageError ? 2 : 1;
}

/** Lines to print for an error that escaped a command. */
export function formatError(error: unknown, options: { json?: boolean; verbose?: boolean }): string[] {
  if (options.json) {
    const body =
      error instanceof AppError
        ? { code: error.code, message: error.message, details: error.details }
        : { code: 'UnknownError', message: error instanceof Error ? error.message : String(error) };
    return [JSON.stringify({ error: body })];
  }

  const lines = [`Error: ${error instanceof Error ? error.message : String(error)}`];
  if (error instanceof AppError && error.details) {
    lines.push(
      `  Details: ${typeof error.details === 'string' ? error.details : JSON.stringify(error.details, null, 2)}`,
    );
  }
  if (options.verbose && error instanceof Error && error.stack) {
    lines.push(`\nStack Trace:\n${error.stack}`);
  } else {
    lines.push('\nFor more details, run with the --verbose flag.');
  }
  return lines;
}
