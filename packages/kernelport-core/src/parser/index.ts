export * from "./ast.js";
export { Lexer, LexerError, KernelSyntaxError, TokenType } from "./lexer.js";
export type { Token } from "./lexer.js";
export { Parser, ParseError, parseCuda, BINARY_PRECEDENCE } from "./parser.js";
