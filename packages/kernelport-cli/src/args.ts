export interface CliOptions {
  /** Input paths or glob patterns */
  inputs: string[];
  output?: string;
  debug: boolean;
  fileLog: boolean;
  parseTree: boolean;
  configPath?: string;
  /** Spaces per indentation level */
  indent: number;
  braceAll: boolean;
  help: boolean;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

const DEFAULT_INDENT = 4;

export function parseCliArgs(args: string[]): CliOptions {
  const options: CliOptions = {
    inputs: [],
    debug: false,
    fileLog: false,
    parseTree: false,
    indent: DEFAULT_INDENT,
    braceAll: false,
    help: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;
    switch (arg) {
      case "-h":
      case "--help":
        options.help = true;
        break;
      case "-d":
      case "--debug":
        options.debug = true;
        break;
      case "-f":
      case "--file-log":
        options.fileLog = true;
        break;
      case "-t":
      case "--parse-tree":
        options.parseTree = true;
        break;
      case "--brace-all":
        options.braceAll = true;
        break;
      case "-o":
      case "--output":
        options.output = flagValue(args, ++i, arg);
        break;
      case "-c":
      case "--config":
        options.configPath = flagValue(args, ++i, arg);
        break;
      case "--indent": {
        const value = flagValue(args, ++i, arg);
        const indent = Number(value);
        if (!Number.isInteger(indent) || indent < 0) {
          throw new CliUsageError(`--indent requires a non-negative integer, got: ${value}`);
        }
        options.indent = indent;
        break;
      }
      default:
        if (arg.startsWith("-") && arg !== "-") {
          throw new CliUsageError(`Unknown option: ${arg}`);
        }
        options.inputs.push(arg);
    }
  }

  if (!options.help && options.inputs.length === 0) {
    throw new CliUsageError("No input file specified");
  }
  return options;
}

function flagValue(args: string[], index: number, flag: string): string {
  const value = args[index];
  if (value === undefined || value.startsWith("-")) {
    throw new CliUsageError(`${flag} requires a value`);
  }
  return value;
}
