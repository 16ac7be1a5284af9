import type {
  Assignment,
  AssignmentOperator,
  BinaryOperator,
  Body,
  Conditional,
  Declaration,
  ElseClause,
  Expression,
  ExpressionStatement,
  ForLoop,
  KernelArgument,
  KernelDecl,
  KernelSpec,
  LValue,
  PostfixOperator,
  PrefixOperator,
  Program,
  SourceLocation,
  SourceRange,
  Statement,
  StorageQualifier,
  WhileLoop,
} from "./ast.js";
import { KernelSyntaxError, Lexer, type Token, TokenType } from "./lexer.js";

export class ParseError extends KernelSyntaxError {
  constructor(
    message: string,
    public token: Token,
  ) {
    super(message, token.loc);
    this.name = "ParseError";
  }
}

/**
 * Binary operator precedence, tightest (3) to loosest (12). Levels 1 and 2
 * are the postfix and prefix operators, handled outside the table.
 */
export const BINARY_PRECEDENCE: Readonly<Record<BinaryOperator, number>> = {
  "*": 3,
  "/": 3,
  "%": 3,
  "+": 4,
  "-": 4,
  "<<": 5,
  ">>": 5,
  "<": 6,
  ">": 6,
  "<=": 6,
  ">=": 6,
  "==": 7,
  "!=": 7,
  "&": 8,
  "^": 9,
  "|": 10,
  "&&": 11,
  "||": 12,
};

const LOOSEST_LEVEL = 12;

const PREFIX_OPERATORS: Partial<Record<TokenType, PrefixOperator>> = {
  [TokenType.PlusPlus]: "++",
  [TokenType.MinusMinus]: "--",
  [TokenType.Plus]: "+",
  [TokenType.Minus]: "-",
  [TokenType.Bang]: "!",
  [TokenType.Tilde]: "~",
  [TokenType.Star]: "*",
};

const ASSIGNMENT_OPERATORS: Partial<Record<TokenType, AssignmentOperator>> = {
  [TokenType.Equals]: "=",
  [TokenType.PlusEquals]: "+=",
  [TokenType.MinusEquals]: "-=",
  [TokenType.StarEquals]: "*=",
  [TokenType.SlashEquals]: "/=",
};

const QUALIFIERS: Partial<Record<TokenType, StorageQualifier>> = {
  [TokenType.Shared]: "shared",
  [TokenType.Global]: "global",
  [TokenType.Device]: "device",
};

function isBinaryOperator(value: string): value is BinaryOperator {
  return Object.prototype.hasOwnProperty.call(BINARY_PRECEDENCE, value);
}

export class Parser {
  private tokens: Token[] = [];
  private pos = 0;

  parse(source: string): Program {
    const lexer = new Lexer(source);
    this.tokens = lexer.tokenize();
    this.pos = 0;
    return this.parseProgram();
  }

  private parseProgram(): Program {
    const startLoc = this.current().loc;
    const kernels: KernelSpec[] = [];
    while (!this.check(TokenType.EOF)) {
      kernels.push(this.parseKernel());
    }
    return { kernels, loc: this.range(startLoc, this.current().loc) };
  }

  // ── Kernels ──

  private parseKernel(): KernelSpec {
    const startLoc = this.current().loc;
    this.expect(TokenType.Global);
    const returnType = this.expectIdentifier();
    const decl = this.parseKernelDecl();
    const body = this.parseBlock();
    return {
      kind: "kernel",
      returnType,
      decl,
      body,
      loc: this.range(startLoc, this.prevLoc()),
    };
  }

  private parseKernelDecl(): KernelDecl {
    const startLoc = this.current().loc;
    const name = this.expectIdentifier();
    this.expect(TokenType.LParen);
    const args: KernelArgument[] = [];
    if (!this.check(TokenType.RParen)) {
      args.push(this.parseArgument());
      while (this.match(TokenType.Comma)) {
        args.push(this.parseArgument());
      }
    }
    this.expect(TokenType.RParen);
    return { name, args, loc: this.range(startLoc, this.prevLoc()) };
  }

  private parseArgument(): KernelArgument {
    const startLoc = this.current().loc;
    const typeName = this.expectIdentifier();
    const pointer = this.match(TokenType.Star);
    const name = this.expectIdentifier();
    return {
      type: { name: typeName, pointer },
      name,
      loc: this.range(startLoc, this.prevLoc()),
    };
  }

  /** `{ statement* }` */
  private parseBlock(): Statement[] {
    this.expect(TokenType.LBrace);
    const statements: Statement[] = [];
    while (!this.check(TokenType.RBrace)) {
      if (this.check(TokenType.EOF)) {
        throw this.unexpected("Unterminated block, expected '}'");
      }
      statements.push(this.parseStatement());
    }
    this.expect(TokenType.RBrace);
    return statements;
  }

  /** Braced block or a single statement */
  private parseBody(): Body {
    if (this.check(TokenType.LBrace)) {
      return { kind: "block", statements: this.parseBlock() };
    }
    return { kind: "single", statement: this.parseStatement() };
  }

  // ── Statements ──

  private parseStatement(): Statement {
    const token = this.current();
    switch (token.type) {
      case TokenType.For:
        return this.parseFor();
      case TokenType.While:
        return this.parseWhile();
      case TokenType.If:
        return this.parseConditional(true);
      case TokenType.Shared:
      case TokenType.Global:
      case TokenType.Device:
        return this.parseDeclaration();
      case TokenType.Identifier:
        // `type name ...` is the only statement form with two identifiers in a row
        if (this.peekType(1) === TokenType.Identifier) {
          return this.parseDeclaration();
        }
        return this.parseSimpleStatement();
      default:
        return this.parseSimpleStatement();
    }
  }

  private parseDeclaration(): Declaration {
    const startLoc = this.current().loc;
    const qualifier = QUALIFIERS[this.current().type];
    if (qualifier !== undefined) this.advance();

    const type = this.expectIdentifier();
    const names = [this.expectIdentifier()];
    const dimensions: Expression[] = [];
    let init: Expression | undefined;

    if (this.check(TokenType.Comma)) {
      while (this.match(TokenType.Comma)) {
        names.push(this.expectIdentifier());
      }
    } else {
      while (this.match(TokenType.LBracket)) {
        dimensions.push(this.parseExpression());
        this.expect(TokenType.RBracket);
      }
      if (this.match(TokenType.Equals)) {
        init = this.parseExpression();
      }
    }
    this.expect(TokenType.Semicolon);

    return {
      kind: "declaration",
      ...(qualifier !== undefined && { qualifier }),
      type,
      names,
      dimensions,
      ...(init !== undefined && { init }),
      loc: this.range(startLoc, this.prevLoc()),
    };
  }

  /** Assignment or expression statement, told apart after the leading expression */
  private parseSimpleStatement(): Assignment | ExpressionStatement {
    const startLoc = this.current().loc;
    const expression = this.parseExpression();
    if (ASSIGNMENT_OPERATORS[this.current().type] !== undefined) {
      const assignment = this.finishAssignment(expression, startLoc);
      this.expect(TokenType.Semicolon);
      return { ...assignment, loc: this.range(startLoc, this.prevLoc()) };
    }
    this.expect(TokenType.Semicolon);
    return {
      kind: "expression",
      expression,
      loc: this.range(startLoc, this.prevLoc()),
    };
  }

  private finishAssignment(target: Expression, startLoc: SourceLocation): Assignment {
    const opToken = this.current();
    const op = ASSIGNMENT_OPERATORS[opToken.type];
    if (op === undefined) {
      throw this.unexpected("Expected assignment operator");
    }
    if (!isLValue(target)) {
      throw new ParseError(`Invalid assignment target before '${opToken.value}'`, opToken);
    }
    this.advance();
    const value = this.parseExpression();
    return {
      kind: "assignment",
      target,
      op,
      value,
      loc: this.range(startLoc, this.prevLoc()),
    };
  }

  private parseWhile(): WhileLoop {
    const startLoc = this.current().loc;
    this.expect(TokenType.While);
    this.expect(TokenType.LParen);
    const condition = this.parseExpression();
    this.expect(TokenType.RParen);
    const body = this.parseBody();
    return {
      kind: "while",
      condition,
      body,
      loc: this.range(startLoc, this.prevLoc()),
    };
  }

  private parseFor(): ForLoop {
    const startLoc = this.current().loc;
    this.expect(TokenType.For);
    this.expect(TokenType.LParen);

    let init: Declaration | Assignment;
    if (
      QUALIFIERS[this.current().type] !== undefined ||
      (this.check(TokenType.Identifier) && this.peekType(1) === TokenType.Identifier)
    ) {
      init = this.parseDeclaration();
    } else {
      const initLoc = this.current().loc;
      init = this.finishAssignment(this.parseExpression(), initLoc);
      this.expect(TokenType.Semicolon);
    }

    const condition = this.parseExpression();
    this.expect(TokenType.Semicolon);

    const updateLoc = this.current().loc;
    const updateExpr = this.parseExpression();
    const update =
      ASSIGNMENT_OPERATORS[this.current().type] !== undefined
        ? this.finishAssignment(updateExpr, updateLoc)
        : updateExpr;
    this.expect(TokenType.RParen);

    const body = this.parseBody();
    return {
      kind: "for",
      init,
      condition,
      update,
      body,
      loc: this.range(startLoc, this.prevLoc()),
    };
  }

  /**
   * `if (c) body (else if (c) body)* (else body)?`. Nested `else if` clauses
   * are parsed without their own else clauses so the chain stays flat.
   */
  private parseConditional(withElse: boolean): Conditional {
    const startLoc = this.current().loc;
    this.expect(TokenType.If);
    this.expect(TokenType.LParen);
    const condition = this.parseExpression();
    this.expect(TokenType.RParen);
    const body = this.parseBody();

    const elseClauses: ElseClause[] = [];
    while (withElse && this.match(TokenType.Else)) {
      if (this.check(TokenType.If)) {
        elseClauses.push({ kind: "else_if", conditional: this.parseConditional(false) });
      } else {
        elseClauses.push({ kind: "else", body: this.parseBody() });
        break;
      }
    }

    return {
      kind: "if",
      condition,
      body,
      elseClauses,
      loc: this.range(startLoc, this.prevLoc()),
    };
  }

  // ── Expressions ──

  parseExpression(): Expression {
    return this.parseBinary(LOOSEST_LEVEL);
  }

  /** Precedence climbing: only operators at `maxLevel` or tighter are consumed */
  private parseBinary(maxLevel: number): Expression {
    const startLoc = this.current().loc;
    let left = this.parseUnary();
    for (;;) {
      const token = this.current();
      if (!isBinaryOperator(token.value)) break;
      const level = BINARY_PRECEDENCE[token.value];
      if (level > maxLevel) break;
      this.advance();
      // Left associative: the right operand only takes tighter operators
      const right = this.parseBinary(level - 1);
      left = {
        kind: "binary",
        op: token.value,
        left,
        right,
        loc: this.range(startLoc, this.prevLoc()),
      };
    }
    return left;
  }

  private parseUnary(): Expression {
    const token = this.current();
    const op = PREFIX_OPERATORS[token.type];
    if (op !== undefined) {
      this.advance();
      const operand = this.parseUnary();
      return {
        kind: "unary",
        op,
        operand,
        loc: this.range(token.loc, this.prevLoc()),
      };
    }
    return this.parsePostfix();
  }

  private parsePostfix(): Expression {
    const startLoc = this.current().loc;
    let expr = this.parseAtom();
    for (;;) {
      if (this.match(TokenType.LParen)) {
        const args: Expression[] = [];
        if (!this.check(TokenType.RParen)) {
          args.push(this.parseExpression());
          while (this.match(TokenType.Comma)) {
            args.push(this.parseExpression());
          }
        }
        this.expect(TokenType.RParen);
        expr = { kind: "call", callee: expr, args, loc: this.range(startLoc, this.prevLoc()) };
      } else if (this.match(TokenType.LBracket)) {
        const index = this.parseExpression();
        this.expect(TokenType.RBracket);
        expr = { kind: "index", object: expr, index, loc: this.range(startLoc, this.prevLoc()) };
      } else if (this.match(TokenType.Dot)) {
        const property = this.expectIdentifier();
        expr = { kind: "member", object: expr, property, loc: this.range(startLoc, this.prevLoc()) };
      } else if (this.check(TokenType.PlusPlus) || this.check(TokenType.MinusMinus)) {
        const op: PostfixOperator = this.check(TokenType.PlusPlus) ? "++" : "--";
        this.advance();
        expr = { kind: "postfix", op, operand: expr, loc: this.range(startLoc, this.prevLoc()) };
      } else {
        return expr;
      }
    }
  }

  private parseAtom(): Expression {
    const token = this.current();
    const loc = this.range(token.loc, token.loc);
    switch (token.type) {
      case TokenType.Integer:
        this.advance();
        return { kind: "literal", literal: "integer", raw: token.value, loc };
      case TokenType.SignedInteger:
        this.advance();
        return { kind: "literal", literal: "signed_integer", raw: token.value, loc };
      case TokenType.Decimal:
        this.advance();
        return { kind: "literal", literal: "decimal", raw: token.value, loc };
      case TokenType.True:
      case TokenType.False:
        this.advance();
        return { kind: "literal", literal: "boolean", raw: token.value, loc };
      case TokenType.Identifier:
        this.advance();
        return { kind: "identifier", name: token.value, loc };
      case TokenType.LParen: {
        this.advance();
        const expression = this.parseExpression();
        this.expect(TokenType.RParen);
        return { kind: "paren", expression, loc: this.range(token.loc, this.prevLoc()) };
      }
      default:
        throw this.unexpected("Expected expression");
    }
  }

  // ── Token helpers ──

  private expectIdentifier(): string {
    return this.expect(TokenType.Identifier).value;
  }

  private expect(type: TokenType): Token {
    const token = this.current();
    if (token.type !== type) {
      throw this.unexpected(`Expected '${type}'`);
    }
    this.advance();
    return token;
  }

  private match(type: TokenType): boolean {
    if (this.check(type)) {
      this.advance();
      return true;
    }
    return false;
  }

  private check(type: TokenType): boolean {
    return this.current().type === type;
  }

  private advance(): void {
    if (this.pos < this.tokens.length - 1) {
      this.pos++;
    }
  }

  private current(): Token {
    return this.tokens[this.pos]!;
  }

  private peekType(offset: number): TokenType {
    return this.tokens[this.pos + offset]?.type ?? TokenType.EOF;
  }

  private prevLoc(): SourceLocation {
    return (this.tokens[this.pos - 1] ?? this.current()).loc;
  }

  private unexpected(message: string): ParseError {
    const token = this.current();
    const found = token.type === TokenType.EOF ? "end of input" : `'${token.value}'`;
    return new ParseError(`${message}, got ${found}`, token);
  }

  private range(start: SourceLocation, end: SourceLocation): SourceRange {
    return { start, end };
  }
}

function isLValue(expr: Expression): expr is LValue {
  switch (expr.kind) {
    case "identifier":
      return true;
    case "index":
    case "member":
      return isLValue(expr.object);
    default:
      return false;
  }
}

/** Parse CUDA kernel source into an AST */
export function parseCuda(source: string): Program {
  return new Parser().parse(source);
}
