import { describe, it, expect } from "vitest";
import { KernelSyntaxError, Lexer, LexerError, TokenType } from "../src/parser/lexer.js";

describe("Lexer", () => {
  it("tokenizes a kernel header", () => {
    const tokens = new Lexer("__global__ void k(int* a) {}").tokenize();
    expect(tokens.map((t) => t.type)).toEqual([
      TokenType.Global,
      TokenType.Identifier,
      TokenType.Identifier,
      TokenType.LParen,
      TokenType.Identifier,
      TokenType.Star,
      TokenType.Identifier,
      TokenType.RParen,
      TokenType.LBrace,
      TokenType.RBrace,
      TokenType.EOF,
    ]);
  });

  it("keeps the exact text of literals", () => {
    const tokens = new Lexer("42 0x1F 10u 1.5f .5 2e-3 true false").tokenize();
    expect(tokens.map((t) => t.type)).toEqual([
      TokenType.Integer,
      TokenType.Integer,
      TokenType.Integer,
      TokenType.Decimal,
      TokenType.Decimal,
      TokenType.Decimal,
      TokenType.True,
      TokenType.False,
      TokenType.EOF,
    ]);
    expect(tokens.map((t) => t.value)).toEqual([
      "42",
      "0x1F",
      "10u",
      "1.5f",
      ".5",
      "2e-3",
      "true",
      "false",
      "",
    ]);
  });

  it("reads a sign as part of a literal only where no operand just ended", () => {
    const assign = new Lexer("x = -1;").tokenize();
    expect(assign[2]!.type).toBe(TokenType.SignedInteger);
    expect(assign[2]!.value).toBe("-1");

    const minus = new Lexer("a-1").tokenize();
    expect(minus.map((t) => t.type)).toEqual([
      TokenType.Identifier,
      TokenType.Minus,
      TokenType.Integer,
      TokenType.EOF,
    ]);

    const afterParen = new Lexer("(a)+2").tokenize();
    expect(afterParen[3]!.type).toBe(TokenType.Plus);

    const doubleMinus = new Lexer("a - -1").tokenize();
    expect(doubleMinus.map((t) => t.value)).toEqual(["a", "-", "-1", ""]);
  });

  it("matches multi-character operators longest first", () => {
    const tokens = new Lexer("a += b << 2 && c != d").tokenize();
    expect(tokens.map((t) => t.value)).toEqual(["a", "+=", "b", "<<", "2", "&&", "c", "!=", "d", ""]);

    const incDec = new Lexer("i++ --j").tokenize();
    expect(incDec.map((t) => t.type)).toEqual([
      TokenType.Identifier,
      TokenType.PlusPlus,
      TokenType.MinusMinus,
      TokenType.Identifier,
      TokenType.EOF,
    ]);
  });

  it("recognizes the storage keywords", () => {
    const tokens = new Lexer("__shared__ __device__ __global__ shared").tokenize();
    expect(tokens.map((t) => t.type)).toEqual([
      TokenType.Shared,
      TokenType.Device,
      TokenType.Global,
      TokenType.Identifier,
      TokenType.EOF,
    ]);
  });

  it("skips line and block comments", () => {
    const tokens = new Lexer("int a; // note\n/* block\n comment */ float b;").tokenize();
    const ids = tokens.filter((t) => t.type === TokenType.Identifier);
    expect(ids.map((t) => t.value)).toEqual(["int", "a", "float", "b"]);
  });

  it("tracks line and column across comments", () => {
    const tokens = new Lexer("int a; // note\n/* block\n comment */ float b;").tokenize();
    const floatToken = tokens.find((t) => t.value === "float");
    expect(floatToken!.loc.line).toBe(3);
    expect(floatToken!.loc.column).toBe(13);
  });

  it("rejects unknown characters", () => {
    expect(() => new Lexer("int @").tokenize()).toThrow(
      "Unexpected character '@' at line 1, column 5",
    );
    expect(() => new Lexer("int @").tokenize()).toThrow(LexerError);
  });

  it("rejects an unterminated block comment", () => {
    expect(() => new Lexer("int /* oops")).toThrow(
      "Unterminated block comment at line 1, column 5",
    );
  });

  it("raises lexer errors as syntax errors", () => {
    try {
      new Lexer("$").tokenize();
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(KernelSyntaxError);
      if (err instanceof LexerError) {
        expect(err.loc).toEqual({ line: 1, column: 1, offset: 0 });
      }
    }
  });
});
