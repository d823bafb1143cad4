export enum TokenType {
  // Single-character punctuation
  LeftParen = "(",
  RightParen = ")",
  LeftBrace = "{",
  RightBrace = "}",
  Comma = ",",
  Dot = ".",
  Minus = "-",
  Plus = "+",
  Semicolon = ";",
  Star = "*",

  // One or two character operators
  Bang = "!",
  BangEqual = "!=",
  Equal = "=",
  EqualEqual = "==",
  Less = "<",
  LessEqual = "<=",
  Greater = ">",
  GreaterEqual = ">=",
  Slash = "/",

  // Trivia
  CommentLine = "CommentLine",
  Whitespace = "Whitespace",

  // Literals
  Identifier = "Identifier",
  String = "String",
  Number = "Number",

  // Keywords
  And = "and",
  Class = "class",
  Else = "else",
  False = "false",
  Fun = "fun",
  For = "for",
  If = "if",
  Nil = "nil",
  Or = "or",
  Print = "print",
  Return = "return",
  Super = "super",
  This = "this",
  True = "true",
  Var = "var",
  While = "while",

  // Special
  Eof = "EOF",
}

export enum ErrorKind {
  Unknown = "Unknown",
  UnfinishString = "UnfinishString",
  InvalidNumber = "InvalidNumber",
}

/** Half-open byte range `[start, end)` into the scanned buffer. */
export interface ByteRange {
  readonly start: number;
  readonly end: number;
}

/**
 * A classified lexeme. Tokens hold no text: the range points into the buffer
 * the scanner was given, which has to outlive the token.
 */
export interface Token {
  readonly type: TokenType;
  readonly range: ByteRange;
}

export interface ScanError {
  readonly kind: ErrorKind;
  readonly range: ByteRange;
}

export type ScanResult =
  | { readonly kind: "token"; readonly token: Token }
  | { readonly kind: "error"; readonly error: ScanError };

/** Whitespace and line comments, which a parser would normally drop. */
export function isTrivia(type: TokenType): boolean {
  return type === TokenType.Whitespace || type === TokenType.CommentLine;
}
