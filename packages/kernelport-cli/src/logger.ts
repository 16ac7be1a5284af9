import * as fs from "node:fs";
import chalk, { Chalk, type ChalkInstance } from "chalk";
import { Severity, type Diagnostic, formatDiagnostic } from "@kernelport/core";

export type LogLevel = "debug" | "info" | "warning" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warning: 2,
  error: 3,
};

const SEVERITY_LEVEL: Record<Severity, LogLevel> = {
  [Severity.DEBUG]: "debug",
  [Severity.INFO]: "info",
  [Severity.WARNING]: "warning",
  [Severity.ERROR]: "error",
};

export interface LoggerOptions {
  /** Lowest level that is written (default: info) */
  level?: LogLevel;
  /** Also append every written message to this file */
  filePath?: string;
  /** Force colours on or off; defaults to the terminal's support */
  color?: boolean;
  stdout?: (line: string) => void;
  stderr?: (line: string) => void;
  now?: () => Date;
}

/** `[kernelport] message` lines on the console, optionally mirrored to a log file */
export class Logger {
  private readonly level: LogLevel;
  private readonly filePath?: string;
  private readonly chalk: ChalkInstance;
  private readonly stdout: (line: string) => void;
  private readonly stderr: (line: string) => void;
  private readonly now: () => Date;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? "info";
    this.filePath = options.filePath;
    this.chalk =
      options.color === undefined ? chalk : new Chalk({ level: options.color ? 1 : 0 });
    this.stdout = options.stdout ?? ((line) => console.log(line));
    this.stderr = options.stderr ?? ((line) => console.error(line));
    this.now = options.now ?? (() => new Date());
  }

  debug(message: string): void {
    this.log("debug", message);
  }

  info(message: string): void {
    this.log("info", message);
  }

  warn(message: string): void {
    this.log("warning", message);
  }

  error(message: string): void {
    this.log("error", message);
  }

  /** Route a generator diagnostic by its severity */
  diagnostic(diagnostic: Diagnostic): void {
    this.log(SEVERITY_LEVEL[diagnostic.severity], formatDiagnostic(diagnostic));
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  log(level: LogLevel, message: string): void {
    if (!this.isEnabled(level)) return;

    const c = this.chalk;
    const prefix = `${c.cyan("[")}${c.green("kernelport")}${c.cyan("]")}`;
    switch (level) {
      case "error":
        this.stderr(`${prefix} ${c.red(message)}`);
        break;
      case "warning":
        this.stderr(`${prefix} ${c.yellow(message)}`);
        break;
      case "debug":
        this.stdout(`${prefix} ${c.gray(message)}`);
        break;
      default:
        this.stdout(`${prefix} ${message}`);
    }

    if (this.filePath) {
      fs.appendFileSync(
        this.filePath,
        `[kernelport] ${this.now().toISOString()} : ${message}\n`,
        "utf-8",
      );
    }
  }
}
