import {
  FULL_SOLUTION_FILE,
  IMPLEMENTATION_FILE,
  SYNTAX_FILE,
  fillTemplate,
  implementationSource,
  syntaxCheckSource,
} from './template';
import type { CompileResult, SourceCompiler } from './types';

/**
 * Task-level checks over a source compiler.
 */
export class ProofCompiler implements SourceCompiler {
  constructor(private readonly compiler: SourceCompiler) {}

  compile(source: string, fileName: string): Promise<CompileResult> {
    return this.compiler.compile(source, fileName);
  }

  /** Type-checks the implementation with the proof left as `sorry`. */
  checkImplementation(template: string, code: string): Promise<CompileResult> {
    return this.compile(implementationSource(template, code), IMPLEMENTATION_FILE);
  }

  checkFullSolution(template: string, code: string, proof: string): Promise<CompileResult> {
    return this.compile(fillTemplate(template, code, proof), FULL_SOLUTION_FILE);
  }

  checkSyntax(code: string): Promise<CompileResult> {
    return this.compile(syntaxCheckSource(code), SYNTAX_FILE);
  }
}
