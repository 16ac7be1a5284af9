import * as fs from "node:fs";
import * as path from "node:path";
import { glob } from "glob";
import {
  astToDot,
  GenerationError,
  isUnresolvedMapping,
  KernelSyntaxError,
  parseTranslatorConfig,
  translate,
  type GenerateOptions,
  type TranslateResult,
  type TranslatorConfigInput,
} from "@kernelport/core";
import type { Logger } from "./logger.js";

export interface TranslateFileOptions {
  /** Explicit output path; defaults to `<input basename>.wgsl` in `cwd` */
  output?: string;
  /** Also write the AST as Graphviz DOT next to the output */
  parseTree?: boolean;
  generate?: Omit<GenerateOptions, "onDiagnostic">;
  cwd: string;
  /** Receives the generated code (used by --debug) */
  print?: (code: string) => void;
}

/**
 * Expand input patterns into absolute file paths, deduplicated and sorted.
 * A pattern that matches nothing is kept as a path so the missing file is
 * reported when it is read.
 */
export async function expandInputs(patterns: string[], cwd: string): Promise<string[]> {
  const files = new Set<string>();
  for (const pattern of patterns) {
    const matches = await glob(pattern, { cwd, absolute: true, nodir: true });
    if (matches.length === 0) {
      files.add(path.resolve(cwd, pattern));
    }
    for (const match of matches) {
      files.add(match);
    }
  }
  return [...files].sort();
}

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/** Read a source file, logging file-system failures; undefined when unreadable */
export function readSource(filePath: string, logger: Logger): string | undefined {
  try {
    return fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    const code = errorCode(err);
    if (code === "ENOENT") {
      logger.error(`'${path.basename(filePath)}' not found in '${path.dirname(filePath)}'!`);
    } else if (code === "EACCES" || code === "EPERM") {
      logger.error(`No permission to read '${filePath}'!`);
    } else if (code === "EISDIR") {
      logger.error(`'${filePath}' is a directory`);
    } else {
      logger.error(`OS error reading '${filePath}': ${err instanceof Error ? err.message : String(err)}`);
    }
    return undefined;
  }
}

/** Read and validate a JSON translator config file */
export function loadConfigFile(filePath: string): TranslatorConfigInput {
  const text = fs.readFileSync(filePath, "utf-8");
  return parseTranslatorConfig(JSON.parse(text));
}

export function defaultOutputPath(inputPath: string, cwd: string): string {
  const base = path.basename(inputPath, path.extname(inputPath));
  return path.join(cwd, `${base}.wgsl`);
}

/**
 * Translate one file and write its WGSL output. Returns false when the file
 * could not be read, parsed, generated or written; the reason is logged.
 */
export function translateFile(
  inputPath: string,
  options: TranslateFileOptions,
  logger: Logger,
): boolean {
  const name = path.basename(inputPath);
  logger.debug(`Reading '${inputPath}'...`);
  const source = readSource(inputPath, logger);
  if (source === undefined) return false;

  logger.debug(`Translating '${name}'...`);
  let result: TranslateResult;
  try {
    result = translate(source, {
      ...options.generate,
      onDiagnostic: (d) => logger.diagnostic(d),
    });
  } catch (err) {
    if (err instanceof KernelSyntaxError) {
      logger.error(`Syntax error in '${name}': ${err.message}`);
      return false;
    }
    if (err instanceof GenerationError) {
      logger.error(`Cannot generate WGSL for '${name}': ${err.message}`);
      return false;
    }
    throw err;
  }
  if (result.diagnostics.some(isUnresolvedMapping)) {
    logger.warn(`'${name}' uses constructs with no WGSL equivalent; check the output`);
  }

  const outputPath = options.output
    ? path.resolve(options.cwd, options.output)
    : defaultOutputPath(inputPath, options.cwd);

  try {
    if (options.parseTree) {
      const dotPath = path.join(
        path.dirname(outputPath),
        `${path.basename(outputPath, path.extname(outputPath))}.dot`,
      );
      fs.writeFileSync(dotPath, astToDot(result.program), "utf-8");
      logger.debug(`Parse tree written to '${dotPath}'`);
    }
    fs.writeFileSync(outputPath, result.output, "utf-8");
  } catch (err) {
    logger.error(`Cannot write output for '${name}': ${err instanceof Error ? err.message : String(err)}`);
    return false;
  }

  logger.info(`${name} -> ${path.relative(options.cwd, outputPath) || outputPath}`);
  if (options.print) {
    logger.debug("Generated code:");
    options.print(result.output);
  }
  return true;
}

/** Translate every input; the exit code is 1 if any file failed */
export async function translateAll(
  patterns: string[],
  options: TranslateFileOptions,
  logger: Logger,
): Promise<number> {
  const inputs = await expandInputs(patterns, options.cwd);
  if (options.output && inputs.length > 1) {
    logger.error(`--output needs exactly one input file, got ${inputs.length}`);
    return 1;
  }

  let failures = 0;
  for (const input of inputs) {
    if (!translateFile(input, options, logger)) failures++;
  }
  if (inputs.length > 1) {
    logger.info(`Translated ${inputs.length - failures} of ${inputs.length} file(s)`);
  }
  return failures > 0 ? 1 : 0;
}
