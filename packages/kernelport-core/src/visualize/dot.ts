import type {
  Body,
  Expression,
  KernelSpec,
  Program,
  Statement,
} from "../parser/ast.js";

/**
 * Render a kernel AST as a Graphviz digraph: one node per AST node, edges
 * from parent to child in source order. Feed the result to `dot -Tpng`.
 */
export function astToDot(program: Program, graphName = "ast"): string {
  const writer = new DotWriter();
  const root = writer.node("program");
  for (const kernel of program.kernels) {
    writer.edge(root, kernelNode(writer, kernel));
  }
  return writer.render(graphName);
}

class DotWriter {
  private nextId = 0;
  private readonly lines: string[] = [];

  node(label: string): string {
    const id = `n${this.nextId++}`;
    this.lines.push(`  ${id} [label="${escapeLabel(label)}"];`);
    return id;
  }

  edge(from: string, to: string, label?: string): void {
    const attrs = label ? ` [label="${escapeLabel(label)}"]` : "";
    this.lines.push(`  ${from} -> ${to}${attrs};`);
  }

  render(graphName: string): string {
    return [
      `digraph ${graphName} {`,
      "  node [shape=box, fontname=\"monospace\"];",
      ...this.lines,
      "}",
      "",
    ].join("\n");
  }
}

function escapeLabel(label: string): string {
  return label.replace(/\\/g, "\\\\").replace(/"/g, '\\"');
}

function kernelNode(w: DotWriter, kernel: KernelSpec): string {
  const id = w.node(`kernel ${kernel.decl.name}`);
  w.edge(id, w.node(`returns ${kernel.returnType}`));
  for (const arg of kernel.decl.args) {
    w.edge(id, w.node(`arg ${arg.type.name}${arg.type.pointer ? "*" : ""} ${arg.name}`));
  }
  for (const stmt of kernel.body) {
    w.edge(id, statementNode(w, stmt));
  }
  return id;
}

function bodyEdges(w: DotWriter, parent: string, body: Body, label: string): void {
  const statements = body.kind === "block" ? body.statements : [body.statement];
  for (const stmt of statements) {
    w.edge(parent, statementNode(w, stmt), label);
  }
}

function statementNode(w: DotWriter, stmt: Statement): string {
  switch (stmt.kind) {
    case "declaration": {
      const qualifier = stmt.qualifier ? `${stmt.qualifier} ` : "";
      const id = w.node(`declaration ${qualifier}${stmt.type} ${stmt.names.join(", ")}`);
      for (const dim of stmt.dimensions) w.edge(id, expressionNode(w, dim), "dim");
      if (stmt.init) w.edge(id, expressionNode(w, stmt.init), "init");
      return id;
    }
    case "assignment": {
      const id = w.node(`assignment ${stmt.op}`);
      w.edge(id, expressionNode(w, stmt.target), "target");
      w.edge(id, expressionNode(w, stmt.value), "value");
      return id;
    }
    case "expression": {
      const id = w.node("expression statement");
      w.edge(id, expressionNode(w, stmt.expression));
      return id;
    }
    case "while": {
      const id = w.node("while");
      w.edge(id, expressionNode(w, stmt.condition), "cond");
      bodyEdges(w, id, stmt.body, "body");
      return id;
    }
    case "for": {
      const id = w.node("for");
      w.edge(id, statementNode(w, stmt.init), "init");
      w.edge(id, expressionNode(w, stmt.condition), "cond");
      w.edge(
        id,
        stmt.update.kind === "assignment"
          ? statementNode(w, stmt.update)
          : expressionNode(w, stmt.update),
        "update",
      );
      bodyEdges(w, id, stmt.body, "body");
      return id;
    }
    case "if": {
      const id = w.node("if");
      w.edge(id, expressionNode(w, stmt.condition), "cond");
      bodyEdges(w, id, stmt.body, "then");
      for (const clause of stmt.elseClauses) {
        if (clause.kind === "else_if") {
          w.edge(id, statementNode(w, clause.conditional), "else");
        } else {
          bodyEdges(w, id, clause.body, "else");
        }
      }
      return id;
    }
  }
}

function expressionNode(w: DotWriter, expr: Expression): string {
  switch (expr.kind) {
    case "binary": {
      const id = w.node(expr.op);
      w.edge(id, expressionNode(w, expr.left));
      w.edge(id, expressionNode(w, expr.right));
      return id;
    }
    case "unary": {
      const id = w.node(`prefix ${expr.op}`);
      w.edge(id, expressionNode(w, expr.operand));
      return id;
    }
    case "postfix": {
      const id = w.node(`postfix ${expr.op}`);
      w.edge(id, expressionNode(w, expr.operand));
      return id;
    }
    case "call": {
      const id = w.node("call");
      w.edge(id, expressionNode(w, expr.callee), "callee");
      for (const arg of expr.args) w.edge(id, expressionNode(w, arg), "arg");
      return id;
    }
    case "index": {
      const id = w.node("index");
      w.edge(id, expressionNode(w, expr.object));
      w.edge(id, expressionNode(w, expr.index));
      return id;
    }
    case "member": {
      const id = w.node(`.${expr.property}`);
      w.edge(id, expressionNode(w, expr.object));
      return id;
    }
    case "paren": {
      const id = w.node("( )");
      w.edge(id, expressionNode(w, expr.expression));
      return id;
    }
    case "identifier":
      return w.node(expr.name);
    case "literal":
      return w.node(expr.raw);
  }
}
