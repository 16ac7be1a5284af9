/** Source location for error reporting */
export interface SourceLocation {
  line: number;
  column: number;
  offset: number;
}

export interface SourceRange {
  start: SourceLocation;
  end: SourceLocation;
}

// ── Expressions ──

export type BinaryOperator =
  | "*"
  | "/"
  | "%"
  | "+"
  | "-"
  | "<<"
  | ">>"
  | "<"
  | ">"
  | "<="
  | ">="
  | "=="
  | "!="
  | "&"
  | "^"
  | "|"
  | "&&"
  | "||";

export type PrefixOperator = "++" | "--" | "+" | "-" | "!" | "~" | "*";

export type PostfixOperator = "++" | "--";

export type LiteralKind = "integer" | "signed_integer" | "decimal" | "boolean";

/** `left op right` */
export interface BinaryExpr {
  readonly kind: "binary";
  readonly op: BinaryOperator;
  readonly left: Expression;
  readonly right: Expression;
  readonly loc?: SourceRange;
}

/** Prefix operator: `-x`, `!x`, `*p`, `++i` */
export interface UnaryExpr {
  readonly kind: "unary";
  readonly op: PrefixOperator;
  readonly operand: Expression;
  readonly loc?: SourceRange;
}

/** `i++` / `i--` */
export interface PostfixExpr {
  readonly kind: "postfix";
  readonly op: PostfixOperator;
  readonly operand: Expression;
  readonly loc?: SourceRange;
}

/** `callee(arg, ...)` */
export interface CallExpr {
  readonly kind: "call";
  readonly callee: Expression;
  readonly args: readonly Expression[];
  readonly loc?: SourceRange;
}

/** `object[index]` */
export interface IndexExpr {
  readonly kind: "index";
  readonly object: Expression;
  readonly index: Expression;
  readonly loc?: SourceRange;
}

/** `object.property` */
export interface MemberExpr {
  readonly kind: "member";
  readonly object: Expression;
  readonly property: string;
  readonly loc?: SourceRange;
}

/** Explicit parentheses in the source */
export interface ParenExpr {
  readonly kind: "paren";
  readonly expression: Expression;
  readonly loc?: SourceRange;
}

export interface IdentifierExpr {
  readonly kind: "identifier";
  readonly name: string;
  readonly loc?: SourceRange;
}

/** Numeric or boolean literal; `raw` is the exact source text */
export interface LiteralExpr {
  readonly kind: "literal";
  readonly literal: LiteralKind;
  readonly raw: string;
  readonly loc?: SourceRange;
}

export type Expression =
  | BinaryExpr
  | UnaryExpr
  | PostfixExpr
  | CallExpr
  | IndexExpr
  | MemberExpr
  | ParenExpr
  | IdentifierExpr
  | LiteralExpr;

/** Assignable expression: an identifier with chained index/member accesses */
export type LValue = IdentifierExpr | IndexExpr | MemberExpr;

// ── Statements ──

export type StorageQualifier = "shared" | "global" | "device";

export type AssignmentOperator = "=" | "+=" | "-=" | "*=" | "/=";

/** Braced block or a single unbraced statement */
export type Body =
  | { readonly kind: "block"; readonly statements: readonly Statement[] }
  | { readonly kind: "single"; readonly statement: Statement };

/** `[qualifier] type name ([dim])* (= init)?;` or `type a, b, c;` */
export interface Declaration {
  readonly kind: "declaration";
  readonly qualifier?: StorageQualifier;
  readonly type: string;
  readonly names: readonly string[];
  readonly dimensions: readonly Expression[];
  readonly init?: Expression;
  readonly loc?: SourceRange;
}

/** `target op value;` */
export interface Assignment {
  readonly kind: "assignment";
  readonly target: LValue;
  readonly op: AssignmentOperator;
  readonly value: Expression;
  readonly loc?: SourceRange;
}

/** `expression;` */
export interface ExpressionStatement {
  readonly kind: "expression";
  readonly expression: Expression;
  readonly loc?: SourceRange;
}

export interface WhileLoop {
  readonly kind: "while";
  readonly condition: Expression;
  readonly body: Body;
  readonly loc?: SourceRange;
}

/** `for (init; condition; update) body` */
export interface ForLoop {
  readonly kind: "for";
  readonly init: Declaration | Assignment;
  readonly condition: Expression;
  readonly update: Expression | Assignment;
  readonly body: Body;
  readonly loc?: SourceRange;
}

/**
 * An `else` clause. `else if` chains are flat: each `else_if` wraps a
 * conditional without else clauses of its own.
 */
export type ElseClause =
  | { readonly kind: "else_if"; readonly conditional: Conditional }
  | { readonly kind: "else"; readonly body: Body };

export interface Conditional {
  readonly kind: "if";
  readonly condition: Expression;
  readonly body: Body;
  readonly elseClauses: readonly ElseClause[];
  readonly loc?: SourceRange;
}

export type Statement =
  | ForLoop
  | WhileLoop
  | Conditional
  | Declaration
  | ExpressionStatement
  | Assignment;

// ── Kernels ──

export interface TypeRef {
  readonly name: string;
  readonly pointer: boolean;
}

export interface KernelArgument {
  readonly type: TypeRef;
  readonly name: string;
  readonly loc?: SourceRange;
}

/** `name(type a, type* b, ...)` */
export interface KernelDecl {
  readonly name: string;
  readonly args: readonly KernelArgument[];
  readonly loc?: SourceRange;
}

/** `__global__ returnType name(args) { body }` */
export interface KernelSpec {
  readonly kind: "kernel";
  readonly returnType: string;
  readonly decl: KernelDecl;
  readonly body: readonly Statement[];
  readonly loc?: SourceRange;
}

/** Root AST node: the kernels of one source unit, in declaration order */
export interface Program {
  readonly kernels: readonly KernelSpec[];
  readonly loc?: SourceRange;
}
