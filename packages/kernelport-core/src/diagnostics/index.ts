import type { SourceRange } from "../parser/ast.js";

export enum Severity {
  ERROR = "error",
  WARNING = "warning",
  INFO = "info",
  DEBUG = "debug",
}

/** Rule identifiers for diagnostics raised while generating WGSL */
export type DiagnosticRule =
  | "fallback"
  | "unresolved_builtin"
  | "unresolved_qualifier"
  | "kernel_return_type"
  | "entry_point_renamed"
  | "builtins_injected";

export interface Diagnostic {
  rule: DiagnosticRule;
  severity: Severity;
  message: string;
  /** Name of the kernel being generated */
  kernel?: string;
  loc?: SourceRange;
}

export type DiagnosticListener = (diagnostic: Diagnostic) => void;

/** Rules that report a source concept with no WGSL equivalent */
const UNRESOLVED_RULES = new Set<DiagnosticRule>(["unresolved_builtin", "unresolved_qualifier"]);

export function isUnresolvedMapping(diagnostic: Diagnostic): boolean {
  return UNRESOLVED_RULES.has(diagnostic.rule);
}

/** `[rule] message (kernel k, line l)` */
export function formatDiagnostic(diagnostic: Diagnostic): string {
  const context: string[] = [];
  if (diagnostic.kernel) context.push(`kernel ${diagnostic.kernel}`);
  if (diagnostic.loc) context.push(`line ${diagnostic.loc.start.line}`);
  const suffix = context.length > 0 ? ` (${context.join(", ")})` : "";
  return `[${diagnostic.rule}] ${diagnostic.message}${suffix}`;
}
