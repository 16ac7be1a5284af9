import type { SourceLocation } from "./ast.js";

export enum TokenType {
  // Keywords
  Global = "__global__",
  Shared = "__shared__",
  Device = "__device__",
  If = "if",
  Else = "else",
  While = "while",
  For = "for",
  True = "true",
  False = "false",

  // Symbols
  LParen = "(",
  RParen = ")",
  LBrace = "{",
  RBrace = "}",
  LBracket = "[",
  RBracket = "]",
  Comma = ",",
  Semicolon = ";",
  Dot = ".",

  // Operators
  PlusPlus = "++",
  MinusMinus = "--",
  PlusEquals = "+=",
  MinusEquals = "-=",
  StarEquals = "*=",
  SlashEquals = "/=",
  ShiftLeft = "<<",
  ShiftRight = ">>",
  LessEqual = "<=",
  GreaterEqual = ">=",
  EqualEqual = "==",
  NotEqual = "!=",
  AndAnd = "&&",
  OrOr = "||",
  Plus = "+",
  Minus = "-",
  Star = "*",
  Slash = "/",
  Percent = "%",
  Less = "<",
  Greater = ">",
  Amp = "&",
  Caret = "^",
  Pipe = "|",
  Bang = "!",
  Tilde = "~",
  Equals = "=",

  // Literals
  Identifier = "identifier",
  Integer = "integer",
  SignedInteger = "signed integer",
  Decimal = "decimal",

  // Special
  EOF = "eof",
}

export interface Token {
  type: TokenType;
  value: string;
  loc: SourceLocation;
}

const KEYWORDS: Record<string, TokenType> = {
  __global__: TokenType.Global,
  __shared__: TokenType.Shared,
  __device__: TokenType.Device,
  if: TokenType.If,
  else: TokenType.Else,
  while: TokenType.While,
  for: TokenType.For,
  true: TokenType.True,
  false: TokenType.False,
};

// Longest match first within each leading character
const OPERATORS: readonly TokenType[] = [
  TokenType.PlusPlus,
  TokenType.MinusMinus,
  TokenType.PlusEquals,
  TokenType.MinusEquals,
  TokenType.StarEquals,
  TokenType.SlashEquals,
  TokenType.ShiftLeft,
  TokenType.ShiftRight,
  TokenType.LessEqual,
  TokenType.GreaterEqual,
  TokenType.EqualEqual,
  TokenType.NotEqual,
  TokenType.AndAnd,
  TokenType.OrOr,
  TokenType.Plus,
  TokenType.Minus,
  TokenType.Star,
  TokenType.Slash,
  TokenType.Percent,
  TokenType.Less,
  TokenType.Greater,
  TokenType.Amp,
  TokenType.Caret,
  TokenType.Pipe,
  TokenType.Bang,
  TokenType.Tilde,
  TokenType.Equals,
  TokenType.LParen,
  TokenType.RParen,
  TokenType.LBrace,
  TokenType.RBrace,
  TokenType.LBracket,
  TokenType.RBracket,
  TokenType.Comma,
  TokenType.Semicolon,
  TokenType.Dot,
];

/** Tokens after which a `+`/`-` is a binary operator, never a literal sign */
const OPERAND_END = new Set<TokenType>([
  TokenType.Identifier,
  TokenType.Integer,
  TokenType.SignedInteger,
  TokenType.Decimal,
  TokenType.True,
  TokenType.False,
  TokenType.RParen,
  TokenType.RBracket,
  TokenType.PlusPlus,
  TokenType.MinusMinus,
]);

/** Base class for every error raised while reading kernel source */
export class KernelSyntaxError extends Error {
  constructor(
    message: string,
    public loc: SourceLocation,
  ) {
    super(`${message} at line ${loc.line}, column ${loc.column}`);
    this.name = "KernelSyntaxError";
  }
}

export class LexerError extends KernelSyntaxError {
  constructor(message: string, loc: SourceLocation) {
    super(message, loc);
    this.name = "LexerError";
  }
}

export class Lexer {
  private pos = 0;
  private line = 1;
  private column = 1;
  private tokens: Token[] = [];
  private source: string;

  constructor(source: string) {
    this.source = this.stripComments(source);
  }

  tokenize(): Token[] {
    this.tokens = [];
    this.pos = 0;
    this.line = 1;
    this.column = 1;

    while (this.pos < this.source.length) {
      this.skipWhitespace();
      if (this.pos >= this.source.length) break;

      const ch = this.source.charAt(this.pos);
      const loc = this.loc();

      if (this.isDigit(ch) || (ch === "." && this.isDigit(this.peek(1)))) {
        this.tokens.push(this.readNumber());
      } else if ((ch === "-" || ch === "+") && this.startsSignedLiteral()) {
        this.tokens.push(this.readNumber());
      } else if (this.isIdentStart(ch)) {
        this.tokens.push(this.readIdentOrKeyword());
      } else {
        const op = OPERATORS.find((type) => this.source.startsWith(type, this.pos));
        if (op === undefined) {
          throw new LexerError(`Unexpected character '${ch}'`, loc);
        }
        for (let i = 0; i < op.length; i++) this.advance();
        this.tokens.push({ type: op, value: op, loc });
      }
    }

    this.tokens.push({ type: TokenType.EOF, value: "", loc: this.loc() });
    return this.tokens;
  }

  private stripComments(source: string): string {
    let result = "";
    let i = 0;
    while (i < source.length) {
      if (source[i] === "/" && source[i + 1] === "/") {
        // Line comment: replace with spaces to preserve columns
        while (i < source.length && source[i] !== "\n") {
          result += " ";
          i++;
        }
      } else if (source[i] === "/" && source[i + 1] === "*") {
        const start = i;
        i += 2;
        result += "  ";
        while (i < source.length && !(source[i] === "*" && source[i + 1] === "/")) {
          result += source[i] === "\n" ? "\n" : " ";
          i++;
        }
        if (i >= source.length) {
          throw new LexerError("Unterminated block comment", this.locationOf(source, start));
        }
        result += "  ";
        i += 2; // skip */
      } else {
        result += source.charAt(i);
        i++;
      }
    }
    return result;
  }

  /** A sign directly followed by a digit, in a position where no operand just ended */
  private startsSignedLiteral(): boolean {
    if (!this.isDigit(this.peek(1))) return false;
    const prev = this.tokens[this.tokens.length - 1];
    return prev === undefined || !OPERAND_END.has(prev.type);
  }

  private readNumber(): Token {
    const loc = this.loc();
    let value = "";
    let signed = false;
    if (this.current() === "-" || this.current() === "+") {
      value += this.current();
      signed = true;
      this.advance();
    }

    if (this.current() === "0" && (this.peek(1) === "x" || this.peek(1) === "X")) {
      value += this.current() + this.peek(1);
      this.advance();
      this.advance();
      value += this.readWhile((c) => /[0-9A-Fa-f]/.test(c));
      value += this.readWhile((c) => c === "u" || c === "U");
      return { type: signed ? TokenType.SignedInteger : TokenType.Integer, value, loc };
    }

    value += this.readWhile((c) => this.isDigit(c));

    let decimal = false;
    if (this.current() === ".") {
      decimal = true;
      value += ".";
      this.advance();
      value += this.readWhile((c) => this.isDigit(c));
    }

    // Exponent: 1e5, 2.5E-3
    const exp = this.source.slice(this.pos).match(/^[eE][+-]?\d+/);
    if (exp) {
      decimal = true;
      value += exp[0];
      for (let i = 0; i < exp[0].length; i++) this.advance();
    }

    if (decimal) {
      value += this.readWhile((c) => c === "f" || c === "F");
      return { type: TokenType.Decimal, value, loc };
    }

    value += this.readWhile((c) => c === "u" || c === "U");
    return { type: signed ? TokenType.SignedInteger : TokenType.Integer, value, loc };
  }

  private readIdentOrKeyword(): Token {
    const loc = this.loc();
    const value = this.readWhile((c) => this.isIdentChar(c));
    const kwType = KEYWORDS[value];
    if (kwType !== undefined) {
      return { type: kwType, value, loc };
    }
    return { type: TokenType.Identifier, value, loc };
  }

  private readWhile(predicate: (ch: string) => boolean): string {
    let value = "";
    while (this.pos < this.source.length && predicate(this.current())) {
      value += this.current();
      this.advance();
    }
    return value;
  }

  private advance(): void {
    if (this.pos < this.source.length) {
      if (this.source[this.pos] === "\n") {
        this.line++;
        this.column = 1;
      } else {
        this.column++;
      }
      this.pos++;
    }
  }

  private current(): string {
    return this.source.charAt(this.pos);
  }

  private peek(offset: number): string | undefined {
    return this.source[this.pos + offset];
  }

  private skipWhitespace(): void {
    while (this.pos < this.source.length && /\s/.test(this.current())) {
      this.advance();
    }
  }

  private loc(): SourceLocation {
    return { line: this.line, column: this.column, offset: this.pos };
  }

  private locationOf(source: string, offset: number): SourceLocation {
    const before = source.slice(0, offset);
    const line = before.split("\n").length;
    const column = offset - before.lastIndexOf("\n");
    return { line, column, offset };
  }

  private isDigit(ch: string | undefined): boolean {
    return ch !== undefined && ch >= "0" && ch <= "9";
  }

  private isIdentStart(ch: string): boolean {
    return /[A-Za-z_]/.test(ch);
  }

  private isIdentChar(ch: string): boolean {
    return /[A-Za-z0-9_]/.test(ch);
  }
}
