import { collectIdentifiers } from "../analysis/identifiers.js";
import { Severity, type Diagnostic, type DiagnosticListener } from "../diagnostics/index.js";
import type {
  Assignment,
  Body,
  Conditional,
  Declaration,
  ElseClause,
  Expression,
  KernelArgument,
  KernelSpec,
  Program,
  SourceRange,
  Statement,
} from "../parser/ast.js";
import {
  lookup,
  mapType,
  resolveConfig,
  type TranslatorConfig,
  type TranslatorConfigInput,
} from "./config.js";

export interface GenerateOptions {
  /** One level of indentation (default: four spaces) */
  indentUnit?: string;
  /** Entry-point function name; suffixed with the kernel name in multi-kernel programs */
  entryPoint?: string;
  workgroupSize?: readonly [number, number, number];
  /** Overrides merged over the default type, builtin and function tables */
  config?: TranslatorConfigInput;
  /** Render unbraced loop and branch bodies as braced blocks */
  braceSingleStatements?: boolean;
  onDiagnostic?: DiagnosticListener;
}

export class GenerationError extends Error {
  constructor(
    message: string,
    public kernel?: string,
    public loc?: SourceRange,
  ) {
    super(loc ? `${message} at line ${loc.start.line}, column ${loc.start.column}` : message);
    this.name = "GenerationError";
  }
}

/** State scoped to the kernel being generated */
interface KernelState {
  name: string;
  identifiers: ReadonlySet<string>;
  /** Module-scope declarations hoisted out of the kernel body */
  hoisted: string[];
  /** Module-scope prefix for this kernel's bindings and workgroup vars; empty for a lone kernel */
  prefix: string;
  /** Source name -> emitted module-scope name */
  renames: Map<string, string>;
}

interface RenderedBody {
  lines: string[];
  braced: boolean;
}

/**
 * Translates a kernel AST into WGSL source. An instance may be reused for
 * several programs in sequence; it must not be shared between concurrent
 * translations.
 */
export class WgslGenerator {
  readonly diagnostics: Diagnostic[] = [];
  private readonly config: TranslatorConfig;
  private readonly indentUnit: string;
  private readonly entryPoint: string;
  private readonly workgroupSize: readonly [number, number, number];
  private readonly braceSingleStatements: boolean;
  private readonly onDiagnostic?: DiagnosticListener;
  private kernel: KernelState | null = null;
  private moduleNames = new Set<string>();

  constructor(options: GenerateOptions = {}) {
    this.config = resolveConfig(options.config);
    this.indentUnit = options.indentUnit ?? "    ";
    this.entryPoint = options.entryPoint ?? "main";
    this.workgroupSize = options.workgroupSize ?? [64, 1, 1];
    this.braceSingleStatements = options.braceSingleStatements ?? false;
    this.onDiagnostic = options.onDiagnostic;
  }

  generate(program: Program): string {
    this.diagnostics.length = 0;
    this.moduleNames = new Set();
    const multiKernel = program.kernels.length > 1;
    const chunks = program.kernels.map((kernel, index) =>
      this.generateKernel(kernel, index, multiKernel),
    );
    return chunks.length > 0 ? `${chunks.join("\n\n")}\n` : "";
  }

  // ── Kernels ──

  private generateKernel(kernel: KernelSpec, index: number, multiKernel: boolean): string {
    const name = kernel.decl.name;
    const state: KernelState = {
      name,
      identifiers: collectIdentifiers(kernel),
      hoisted: [],
      prefix: multiKernel ? `${name}_` : "",
      renames: new Map(),
    };
    this.kernel = state;
    try {
      if (kernel.returnType !== "void") {
        this.report({
          rule: "kernel_return_type",
          severity: Severity.WARNING,
          message: `Kernel return type '${kernel.returnType}' is ignored; compute entry points return nothing`,
          loc: kernel.loc,
        });
      }

      const bindings = kernel.decl.args.map((arg, binding) => this.binding(arg, index, binding));
      const body = this.statements(kernel.body, 1);
      const header = [...bindings, ...state.hoisted];

      let entry = this.entryPoint;
      if (multiKernel) {
        entry = `${this.entryPoint}_${name}`;
        this.report({
          rule: "entry_point_renamed",
          severity: Severity.INFO,
          message: `Entry point for kernel '${name}' is named '${entry}'`,
        });
      }

      const lines: string[] = [];
      if (header.length > 0) lines.push(...header, "");
      lines.push(`@compute @workgroup_size(${this.workgroupSize.join(", ")})`);
      lines.push(`fn ${entry}(${this.builtinParameters().join(", ")}) {`);
      lines.push(...body);
      lines.push("}");
      return lines.join("\n");
    } finally {
      this.kernel = null;
    }
  }

  /** One storage binding per kernel argument */
  private binding(arg: KernelArgument, group: number, binding: number): string {
    const name = this.declareModuleName(arg.name, arg.loc);
    const type = mapType(this.config, arg.type.name);
    const prefix = `@group(${group}) @binding(${binding})`;
    if (arg.type.pointer) {
      return `${prefix} var<storage, read_write> ${name} : array<${type}>;`;
    }
    return `${prefix} var<uniform> ${name} : ${type};`;
  }

  /**
   * Entry-point parameters for the builtins the kernel references, in
   * builtin-table order. Parameters keep the source builtin's name so body
   * references such as `threadIdx.x` resolve to them unchanged.
   */
  private builtinParameters(): string[] {
    const kernel = this.currentKernel();
    const params: string[] = [];
    for (const [name, mapping] of Object.entries(this.config.builtins)) {
      if (!kernel.identifiers.has(name)) continue;
      if ("unresolved" in mapping) {
        this.report({
          rule: "unresolved_builtin",
          severity: Severity.WARNING,
          message: `'${name}' has no WGSL builtin: ${mapping.unresolved}`,
        });
        continue;
      }
      params.push(`@builtin(${mapping.attribute}) ${name} : ${mapping.type}`);
    }
    if (params.length > 0) {
      this.report({
        rule: "builtins_injected",
        severity: Severity.DEBUG,
        message: `Injected ${params.length} builtin parameter(s)`,
      });
    }
    return params;
  }

  // ── Statements ──

  private statements(stmts: readonly Statement[], depth: number): string[] {
    return stmts.flatMap((stmt) => this.statement(stmt, depth));
  }

  private statement(stmt: Statement, depth: number): string[] {
    const pad = this.indent(depth);
    switch (stmt.kind) {
      case "declaration":
        return this.declaration(stmt, depth);
      case "assignment":
        return [`${pad}${this.assignment(stmt)};`];
      case "expression":
        return [`${pad}${this.expression(stmt.expression)};`];
      case "while":
        return this.body(`while (${this.expression(stmt.condition)})`, stmt.body, depth).lines;
      case "for": {
        const update =
          stmt.update.kind === "assignment"
            ? this.assignment(stmt.update)
            : this.expression(stmt.update);
        const header = `for (${this.forInit(stmt.init)} ${this.expression(stmt.condition)}; ${update})`;
        return this.body(header, stmt.body, depth).lines;
      }
      case "if":
        return this.conditional(stmt, depth);
      default:
        return assertNever(stmt);
    }
  }

  /**
   * Render `header` followed by a body. Braced bodies close at `depth`;
   * a single unbraced statement sits one level deeper with no braces.
   */
  private body(header: string, body: Body, depth: number): RenderedBody {
    const pad = this.indent(depth);
    const inner =
      body.kind === "block"
        ? this.statements(body.statements, depth + 1)
        : this.statement(body.statement, depth + 1);
    // A declaration can render to several vars (multi-name) or to none (hoisted)
    if (
      body.kind === "single" &&
      !this.braceSingleStatements &&
      (body.statement.kind !== "declaration" || inner.length === 1)
    ) {
      return { lines: [`${pad}${header}`, ...inner], braced: false };
    }
    return { lines: [`${pad}${header} {`, ...inner, `${pad}}`], braced: true };
  }

  private conditional(stmt: Conditional, depth: number): string[] {
    const pad = this.indent(depth);
    const first = this.body(`if (${this.expression(stmt.condition)})`, stmt.body, depth);
    const lines = [...first.lines];
    let previousBraced = first.braced;

    for (const clause of flattenElseClauses(stmt.elseClauses)) {
      const rendered =
        clause.kind === "else_if"
          ? this.body(`else if (${this.expression(clause.conditional.condition)})`, clause.conditional.body, depth)
          : this.body("else", clause.body, depth);
      const [head, ...rest] = rendered.lines;
      if (head === undefined) continue;
      if (previousBraced) {
        // `}` and `else` share a line
        lines[lines.length - 1] = `${pad}} ${head.slice(pad.length)}`;
      } else {
        lines.push(head);
      }
      lines.push(...rest);
      previousBraced = rendered.braced;
    }
    return lines;
  }

  private declaration(decl: Declaration, depth: number): string[] {
    const type = this.declaredType(decl);

    if (decl.qualifier === "shared") {
      if (decl.init) {
        throw new GenerationError(
          `Workgroup variable '${decl.names.join(", ")}' cannot have an initializer`,
          this.currentKernel().name,
          decl.loc,
        );
      }
      for (const source of decl.names) {
        const name = this.declareModuleName(source, decl.loc);
        this.currentKernel().hoisted.push(`var<workgroup> ${name} : ${type};`);
      }
      return [];
    }

    if (decl.qualifier) {
      this.report({
        rule: "unresolved_qualifier",
        severity: Severity.WARNING,
        message: `No WGSL address space for '__${decl.qualifier}__' local '${decl.names.join(", ")}'; emitted as a function-scope var`,
        loc: decl.loc,
      });
    }

    const pad = this.indent(depth);
    const init = decl.init ? ` = ${this.expression(decl.init)}` : "";
    return decl.names.map((name) => `${pad}var ${name} : ${type}${init};`);
  }

  /** Inline `for` initializer, terminated with `;` */
  private forInit(init: Declaration | Assignment): string {
    if (init.kind === "assignment") {
      return `${this.assignment(init)};`;
    }
    const name = init.names[0];
    if (init.qualifier || name === undefined || init.names.length !== 1) {
      throw new GenerationError(
        "A for-loop initializer must declare exactly one unqualified variable",
        this.currentKernel().name,
        init.loc,
      );
    }
    const value = init.init ? ` = ${this.expression(init.init)}` : "";
    return `var ${name} : ${this.declaredType(init)}${value};`;
  }

  /** Remapped element type wrapped in one `array<...>` per dimension, outermost first */
  private declaredType(decl: Declaration): string {
    let type = mapType(this.config, decl.type);
    for (let i = decl.dimensions.length - 1; i >= 0; i--) {
      const dim = decl.dimensions[i];
      if (dim) type = `array<${type}, ${this.expression(dim)}>`;
    }
    return type;
  }

  private assignment(stmt: Assignment): string {
    return `${this.expression(stmt.target)} ${stmt.op} ${this.expression(stmt.value)}`;
  }

  // ── Expressions ──

  private expression(expr: Expression): string {
    switch (expr.kind) {
      case "binary":
        return `${this.expression(expr.left)} ${expr.op} ${this.expression(expr.right)}`;
      case "unary": {
        const operand = this.expression(expr.operand);
        if (expr.op === "++" || expr.op === "--") {
          return this.fallback(`prefix '${expr.op}'`, [expr.op, operand], expr.loc);
        }
        // `-(-x)` must not collapse into `--x`
        if ((expr.op === "-" || expr.op === "+") && operand.startsWith(expr.op)) {
          return `${expr.op} ${operand}`;
        }
        return `${expr.op}${operand}`;
      }
      case "postfix":
        return `${this.expression(expr.operand)}${expr.op}`;
      case "call": {
        const callee =
          expr.callee.kind === "identifier"
            ? (lookup(this.config.functionMap, expr.callee.name) ?? expr.callee.name)
            : this.expression(expr.callee);
        return `${callee}(${expr.args.map((arg) => this.expression(arg)).join(", ")})`;
      }
      case "index":
        return `${this.expression(expr.object)}[${this.expression(expr.index)}]`;
      case "member":
        return `${this.expression(expr.object)}.${expr.property}`;
      case "paren":
        return `(${this.expression(expr.expression)})`;
      case "identifier":
        return this.kernel?.renames.get(expr.name) ?? expr.name;
      case "literal":
        return expr.raw;
      default:
        return assertNever(expr);
    }
  }

  /** Degraded output: no dedicated rule, so the children are concatenated verbatim */
  private fallback(what: string, children: string[], loc?: SourceRange): string {
    this.report({
      rule: "fallback",
      severity: Severity.WARNING,
      message: `No WGSL translation for ${what}; emitted verbatim`,
      loc,
    });
    return children.join("");
  }

  // ── Helpers ──

  /**
   * Claim a module-scope name for a kernel variable. In multi-kernel programs
   * the name is prefixed with the kernel name and body references follow it.
   */
  private declareModuleName(source: string, loc?: SourceRange): string {
    const kernel = this.currentKernel();
    const name = `${kernel.prefix}${source}`;
    if (this.moduleNames.has(name)) {
      throw new GenerationError(`'${name}' is already declared at module scope`, kernel.name, loc);
    }
    this.moduleNames.add(name);
    if (name !== source) kernel.renames.set(source, name);
    return name;
  }

  private report(diagnostic: Diagnostic): void {
    const withKernel: Diagnostic = this.kernel
      ? { ...diagnostic, kernel: this.kernel.name }
      : diagnostic;
    this.diagnostics.push(withKernel);
    this.onDiagnostic?.(withKernel);
  }

  private currentKernel(): KernelState {
    if (!this.kernel) {
      throw new GenerationError("No kernel is being generated");
    }
    return this.kernel;
  }

  private indent(depth: number): string {
    return this.indentUnit.repeat(depth);
  }
}

/** Yield else clauses in chain order, lifting clauses nested under an `else if` */
function* flattenElseClauses(clauses: readonly ElseClause[]): Generator<ElseClause> {
  for (const clause of clauses) {
    yield clause;
    if (clause.kind === "else_if") {
      yield* flattenElseClauses(clause.conditional.elseClauses);
    }
  }
}

function assertNever(value: never): never {
  throw new GenerationError(`Unhandled AST node: ${JSON.stringify(value)}`);
}

/** Generate WGSL for a parsed program with a fresh generator */
export function generate(program: Program, options?: GenerateOptions): string {
  return new WgslGenerator(options).generate(program);
}
