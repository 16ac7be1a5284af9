import type { Body, Expression, KernelSpec, Statement } from "../parser/ast.js";

/**
 * Collect the distinct identifier names a kernel references: argument names,
 * declared names, and every identifier expression in its body. Member
 * property names (`.x`) and type names are not identifiers.
 */
export function collectIdentifiers(kernel: KernelSpec): ReadonlySet<string> {
  const names = new Set<string>();
  for (const arg of kernel.decl.args) {
    names.add(arg.name);
  }
  for (const stmt of kernel.body) {
    visitStatement(stmt, names);
  }
  return names;
}

function visitStatement(stmt: Statement, names: Set<string>): void {
  switch (stmt.kind) {
    case "declaration":
      for (const name of stmt.names) names.add(name);
      for (const dim of stmt.dimensions) visitExpression(dim, names);
      if (stmt.init) visitExpression(stmt.init, names);
      return;
    case "assignment":
      visitExpression(stmt.target, names);
      visitExpression(stmt.value, names);
      return;
    case "expression":
      visitExpression(stmt.expression, names);
      return;
    case "while":
      visitExpression(stmt.condition, names);
      visitBody(stmt.body, names);
      return;
    case "for":
      visitStatement(stmt.init, names);
      visitExpression(stmt.condition, names);
      if (stmt.update.kind === "assignment") {
        visitStatement(stmt.update, names);
      } else {
        visitExpression(stmt.update, names);
      }
      visitBody(stmt.body, names);
      return;
    case "if":
      visitExpression(stmt.condition, names);
      visitBody(stmt.body, names);
      for (const clause of stmt.elseClauses) {
        if (clause.kind === "else_if") {
          visitStatement(clause.conditional, names);
        } else {
          visitBody(clause.body, names);
        }
      }
      return;
  }
}

function visitBody(body: Body, names: Set<string>): void {
  if (body.kind === "single") {
    visitStatement(body.statement, names);
    return;
  }
  for (const stmt of body.statements) {
    visitStatement(stmt, names);
  }
}

function visitExpression(expr: Expression, names: Set<string>): void {
  switch (expr.kind) {
    case "identifier":
      names.add(expr.name);
      return;
    case "literal":
      return;
    case "binary":
      visitExpression(expr.left, names);
      visitExpression(expr.right, names);
      return;
    case "unary":
    case "postfix":
      visitExpression(expr.operand, names);
      return;
    case "call":
      visitExpression(expr.callee, names);
      for (const arg of expr.args) visitExpression(arg, names);
      return;
    case "index":
      visitExpression(expr.object, names);
      visitExpression(expr.index, names);
      return;
    case "member":
      visitExpression(expr.object, names);
      return;
    case "paren":
      visitExpression(expr.expression, names);
      return;
  }
}
