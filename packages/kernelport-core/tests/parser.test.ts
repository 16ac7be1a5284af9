import { describe, it, expect } from "vitest";
import { KernelSyntaxError, ParseError, parseCuda, type Statement } from "../src/parser/index.js";

function kernelBody(statements: string): readonly Statement[] {
  const program = parseCuda(`__global__ void k() { ${statements} }`);
  return program.kernels[0]!.body;
}

function valueOf(statement: string): unknown {
  const [stmt] = kernelBody(statement);
  if (stmt?.kind !== "assignment") throw new Error(`expected an assignment, got ${stmt?.kind}`);
  return stmt.value;
}

describe("Parser", () => {
  describe("kernels", () => {
    it("parses a kernel signature", () => {
      const program = parseCuda("__global__ void add(int* a, float s) {}");
      expect(program.kernels).toHaveLength(1);
      const kernel = program.kernels[0]!;
      expect(kernel.returnType).toBe("void");
      expect(kernel.decl.name).toBe("add");
      expect(kernel.decl.args).toMatchObject([
        { type: { name: "int", pointer: true }, name: "a" },
        { type: { name: "float", pointer: false }, name: "s" },
      ]);
      expect(kernel.body).toEqual([]);
    });

    it("accepts kernels without arguments", () => {
      const program = parseCuda("__global__ void k() {}");
      expect(program.kernels[0]!.decl.args).toEqual([]);
    });

    it("parses several kernels in source order", () => {
      const program = parseCuda("__global__ void first() {}\n__global__ void second() {}");
      expect(program.kernels.map((k) => k.decl.name)).toEqual(["first", "second"]);
      expect(program.kernels[1]!.loc?.start).toEqual({ line: 2, column: 1, offset: 27 });
    });

    it("parses an empty source as an empty program", () => {
      expect(parseCuda("  // nothing here\n").kernels).toEqual([]);
    });
  });

  describe("declarations", () => {
    it("parses several names in one declaration", () => {
      expect(kernelBody("int a, b, c;")).toMatchObject([
        { kind: "declaration", type: "int", names: ["a", "b", "c"], dimensions: [] },
      ]);
    });

    it("parses an initializer", () => {
      const [decl] = kernelBody("int i = threadIdx.x;");
      expect(decl).toMatchObject({
        kind: "declaration",
        names: ["i"],
        init: {
          kind: "member",
          property: "x",
          object: { kind: "identifier", name: "threadIdx" },
        },
      });
    });

    it("parses array dimensions outermost first", () => {
      const [decl] = kernelBody("float m[4][8];");
      expect(decl).toMatchObject({
        kind: "declaration",
        type: "float",
        names: ["m"],
        dimensions: [
          { kind: "literal", raw: "4" },
          { kind: "literal", raw: "8" },
        ],
      });
    });

    it("records storage qualifiers", () => {
      const [decl] = kernelBody("__shared__ float tile[64];");
      expect(decl).toMatchObject({ kind: "declaration", qualifier: "shared", names: ["tile"] });
    });

    it("leaves the qualifier out of unqualified declarations", () => {
      const [decl] = kernelBody("int a;");
      expect(decl).not.toHaveProperty("qualifier");
      expect(decl).not.toHaveProperty("init");
    });
  });

  describe("statements", () => {
    it("tells assignments from expression statements", () => {
      expect(kernelBody("a[i] += 1; foo(a); i++;").map((s) => s.kind)).toEqual([
        "assignment",
        "expression",
        "expression",
      ]);
    });

    it("parses compound assignment operators", () => {
      const ops = kernelBody("a = 1; a += 1; a -= 1; a *= 2; a /= 2;").map((s) =>
        s.kind === "assignment" ? s.op : s.kind,
      );
      expect(ops).toEqual(["=", "+=", "-=", "*=", "/="]);
    });

    it("parses a while loop with a single-statement body", () => {
      expect(kernelBody("while (i < n) i++;")).toMatchObject([
        {
          kind: "while",
          condition: { kind: "binary", op: "<" },
          body: { kind: "single", statement: { kind: "expression" } },
        },
      ]);
    });

    it("parses a for loop with a declared counter", () => {
      const [loop] = kernelBody("for (int i = 0; i < n; i++) x += i;");
      expect(loop).toMatchObject({
        kind: "for",
        init: { kind: "declaration", type: "int", names: ["i"] },
        condition: { kind: "binary", op: "<" },
        update: { kind: "postfix", op: "++" },
        body: { kind: "single", statement: { kind: "assignment", op: "+=" } },
      });
    });

    it("parses assignments as for-loop initializer and update", () => {
      const [loop] = kernelBody("for (i = 0; i < 4; i += 2) {}");
      expect(loop).toMatchObject({
        kind: "for",
        init: { kind: "assignment", op: "=" },
        update: { kind: "assignment", op: "+=" },
        body: { kind: "block", statements: [] },
      });
    });

    it("keeps an else-if chain flat", () => {
      const [cond] = kernelBody("if (a) x = 1; else if (b) x = 2; else x = 3;");
      expect(cond).toMatchObject({
        kind: "if",
        condition: { kind: "identifier", name: "a" },
        elseClauses: [
          {
            kind: "else_if",
            conditional: { condition: { kind: "identifier", name: "b" }, elseClauses: [] },
          },
          { kind: "else", body: { kind: "single" } },
        ],
      });
    });

    it("attaches an else to the innermost unbraced if", () => {
      const [outer] = kernelBody("if (a) if (b) x = 1; else x = 2;");
      expect(outer).toMatchObject({
        kind: "if",
        elseClauses: [],
        body: { kind: "single", statement: { kind: "if", elseClauses: [{ kind: "else" }] } },
      });
    });
  });

  describe("expressions", () => {
    it("binds multiplication tighter than addition", () => {
      expect(valueOf("x = a + b * c;")).toMatchObject({
        kind: "binary",
        op: "+",
        left: { name: "a" },
        right: { kind: "binary", op: "*", left: { name: "b" }, right: { name: "c" } },
      });
    });

    it("associates operators of one level to the left", () => {
      expect(valueOf("x = a - b - c;")).toMatchObject({
        kind: "binary",
        op: "-",
        left: { kind: "binary", op: "-", left: { name: "a" }, right: { name: "b" } },
        right: { name: "c" },
      });
    });

    it("orders comparison below equality", () => {
      expect(valueOf("x = a < b == c;")).toMatchObject({
        op: "==",
        left: { op: "<" },
        right: { name: "c" },
      });
    });

    it("orders logical and above logical or", () => {
      expect(valueOf("x = a || b && c;")).toMatchObject({
        op: "||",
        left: { name: "a" },
        right: { op: "&&" },
      });
    });

    it("binds prefix operators tighter than binary ones", () => {
      expect(valueOf("x = -a * b;")).toMatchObject({
        op: "*",
        left: { kind: "unary", op: "-", operand: { name: "a" } },
        right: { name: "b" },
      });
    });

    it("nests prefix operators", () => {
      expect(valueOf("x = !~a;")).toMatchObject({
        kind: "unary",
        op: "!",
        operand: { kind: "unary", op: "~", operand: { name: "a" } },
      });
    });

    it("chains postfix operations left to right", () => {
      expect(valueOf("x = a[i].y;")).toMatchObject({
        kind: "member",
        property: "y",
        object: { kind: "index", object: { name: "a" }, index: { name: "i" } },
      });
    });

    it("parses calls with arguments", () => {
      expect(valueOf("x = fmaxf(a, 2);")).toMatchObject({
        kind: "call",
        callee: { kind: "identifier", name: "fmaxf" },
        args: [{ name: "a" }, { kind: "literal", literal: "integer", raw: "2" }],
      });
    });

    it("keeps parentheses as nodes", () => {
      expect(valueOf("x = (a + b) * c;")).toMatchObject({
        op: "*",
        left: { kind: "paren", expression: { op: "+" } },
      });
    });

    it("classifies literals", () => {
      const literals = ["1", "-1", "1.5f", "true"].map((raw) => valueOf(`x = ${raw};`));
      expect(literals).toMatchObject([
        { literal: "integer", raw: "1" },
        { literal: "signed_integer", raw: "-1" },
        { literal: "decimal", raw: "1.5f" },
        { literal: "boolean", raw: "true" },
      ]);
    });
  });

  describe("errors", () => {
    it("reports an unterminated block", () => {
      expect(() => parseCuda("__global__ void k() { int i = 0;")).toThrow(
        "Unterminated block, expected '}', got end of input at line 1, column 33",
      );
    });

    it("reports a missing semicolon", () => {
      expect(() => parseCuda("__global__ void k() { x = 1 }")).toThrow(
        "Expected ';', got '}' at line 1, column 29",
      );
    });

    it("requires the __global__ marker", () => {
      expect(() => parseCuda("void k() {}")).toThrow(
        "Expected '__global__', got 'void' at line 1, column 1",
      );
    });

    it("rejects assignment to a non-lvalue", () => {
      expect(() => parseCuda("__global__ void k() { f(a) = 1; }")).toThrow(
        "Invalid assignment target before '=' at line 1, column 28",
      );
    });

    it("raises parse errors as syntax errors carrying the token", () => {
      try {
        parseCuda("__global__ void k() { x = ; }");
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(ParseError);
        expect(err).toBeInstanceOf(KernelSyntaxError);
        if (err instanceof ParseError) {
          expect(err.token.value).toBe(";");
          expect(err.message).toBe("Expected expression, got ';' at line 1, column 27");
        }
      }
    });
  });
});
