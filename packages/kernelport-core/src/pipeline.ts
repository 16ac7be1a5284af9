import { parseCuda } from "./parser/parser.js";
import { WgslGenerator, type GenerateOptions } from "./codegen/generator.js";
import type { Diagnostic } from "./diagnostics/index.js";
import type { Program } from "./parser/ast.js";

export interface TranslateResult {
  program: Program;
  output: string;
  diagnostics: Diagnostic[];
}

/**
 * Parse and generate a CUDA source string.
 * This is the primary entry point for translating a source unit; syntax
 * errors propagate, generation gaps are reported as diagnostics.
 */
export function translate(source: string, options?: GenerateOptions): TranslateResult {
  // 1. Parse
  const program = parseCuda(source);

  // 2. Generate with a generator owned by this call
  const generator = new WgslGenerator(options);
  const output = generator.generate(program);

  return { program, output, diagnostics: [...generator.diagnostics] };
}

/**
 * Parse without generating (for inspection and visualization).
 */
export function parseOnly(source: string): Program {
  return parseCuda(source);
}
