#!/usr/bin/env node
import * as path from "node:path";
import { ConfigError, type TranslatorConfigInput } from "@kernelport/core";
import { CliUsageError, parseCliArgs, type CliOptions } from "./args.js";
import { loadConfigFile, translateAll } from "./files.js";
import { Logger } from "./logger.js";

async function main() {
  let options: CliOptions;
  try {
    options = parseCliArgs(process.argv.slice(2));
  } catch (err) {
    if (err instanceof CliUsageError) {
      console.error(`Error: ${err.message}`);
      printUsage();
      process.exit(1);
    }
    throw err;
  }

  if (options.help) {
    printUsage();
    process.exit(0);
  }

  const cwd = process.cwd();
  const logger = new Logger({
    level: options.debug ? "debug" : "info",
    ...(options.fileLog && { filePath: path.join(cwd, "kernelport.log") }),
  });
  if (options.fileLog) logger.debug("Logging to 'kernelport.log'...");

  let config: TranslatorConfigInput | undefined;
  if (options.configPath) {
    try {
      config = loadConfigFile(path.resolve(cwd, options.configPath));
    } catch (err) {
      if (err instanceof ConfigError || err instanceof SyntaxError) {
        logger.error(`Invalid config '${options.configPath}': ${err.message}`);
      } else {
        logger.error(`Cannot read config '${options.configPath}': ${err}`);
      }
      process.exit(1);
    }
  }

  const exitCode = await translateAll(
    options.inputs,
    {
      cwd,
      output: options.output,
      parseTree: options.parseTree,
      generate: {
        indentUnit: " ".repeat(options.indent),
        braceSingleStatements: options.braceAll,
        config,
      },
      ...(options.debug && { print: (code: string) => process.stdout.write(code) }),
    },
    logger,
  );

  logger.debug("Exiting...");
  process.exit(exitCode);
}

function printUsage() {
  console.log(`
kernelport - CUDA kernel to WGSL compute shader translator

Usage:
  kernelport <input.cu...> [options]

Inputs may be file paths or glob patterns ("kernels/**/*.cu").

Options:
  -o, --output <path>   Output .wgsl file (single input only; default: <input>.wgsl)
  -c, --config <file>   JSON translator config (typeMap, builtins, functionMap)
  --indent <n>          Spaces per indentation level (default: 4)
  --brace-all           Brace every single-statement loop and branch body
  -t, --parse-tree      Write the AST as Graphviz DOT next to the output
  -d, --debug           Show debug information and print the generated code
  -f, --file-log        Also append logs to 'kernelport.log'
  -h, --help            Show this help
`);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
