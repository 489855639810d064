#!/usr/bin/env -S npx tsx
import { createProgram } from './program';
import { exitCodeFor, formatError } from './errors';
import type { GlobalOptions } from './types';

const program = createProgram();

async function main() {
  try {
    await program.parseAsync(process.argv);
  } catch (e) {
    const opts = program.opts<GlobalOptions>();
    const print = opts.json ? console.log : console.error;
    for (const line of formatError(e, opts)) {
      print(line);
    }
    process.exit(exitCodeFor(e));
  }
}

void main();
