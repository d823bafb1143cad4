import { TokenType } from "./tokens.js";

export const Byte = {
  Tab: 0x09,
  LineFeed: 0x0a,
  CarriageReturn: 0x0d,
  Space: 0x20,
  Bang: 0x21,
  Quote: 0x22,
  LeftParen: 0x28,
  RightParen: 0x29,
  Star: 0x2a,
  Plus: 0x2b,
  Comma: 0x2c,
  Minus: 0x2d,
  Dot: 0x2e,
  Slash: 0x2f,
  Digit0: 0x30,
  Digit9: 0x39,
  Semicolon: 0x3b,
  Less: 0x3c,
  Equal: 0x3d,
  Greater: 0x3e,
  UpperA: 0x41,
  UpperZ: 0x5a,
  Underscore: 0x5f,
  LowerA: 0x61,
  LowerZ: 0x7a,
  LeftBrace: 0x7b,
  RightBrace: 0x7d,
} as const;

/**
 * What the first byte of a lexeme says about the rest of it. Every byte maps
 * to exactly one class, so the scanner can switch over `kind` exhaustively.
 */
export type ByteClass =
  | { kind: "letter" }
  | { kind: "digit" }
  | { kind: "whitespace" }
  | { kind: "punctuation"; type: TokenType }
  | { kind: "comparison"; single: TokenType; withEqual: TokenType }
  | { kind: "slash" }
  | { kind: "quote" }
  | { kind: "other" };

const PUNCTUATION: ReadonlyMap<number, TokenType> = new Map<number, TokenType>([
  [Byte.LeftParen, TokenType.LeftParen],
  [Byte.RightParen, TokenType.RightParen],
  [Byte.LeftBrace, TokenType.LeftBrace],
  [Byte.RightBrace, TokenType.RightBrace],
  [Byte.Comma, TokenType.Comma],
  [Byte.Dot, TokenType.Dot],
  [Byte.Minus, TokenType.Minus],
  [Byte.Plus, TokenType.Plus],
  [Byte.Semicolon, TokenType.Semicolon],
  [Byte.Star, TokenType.Star],
]);

const COMPARISONS: ReadonlyMap<number, [TokenType, TokenType]> = new Map<number, [TokenType, TokenType]>([
  [Byte.Bang, [TokenType.Bang, TokenType.BangEqual]],
  [Byte.Equal, [TokenType.Equal, TokenType.EqualEqual]],
  [Byte.Less, [TokenType.Less, TokenType.LessEqual]],
  [Byte.Greater, [TokenType.Greater, TokenType.GreaterEqual]],
]);

const LETTER: ByteClass = { kind: "letter" };
const DIGIT: ByteClass = { kind: "digit" };
const WHITESPACE: ByteClass = { kind: "whitespace" };
const SLASH: ByteClass = { kind: "slash" };
const QUOTE: ByteClass = { kind: "quote" };
const OTHER: ByteClass = { kind: "other" };

export function classify(byte: number): ByteClass {
  if (isAlpha(byte)) return LETTER;
  if (isDigit(byte)) return DIGIT;
  if (isWhitespace(byte)) return WHITESPACE;
  if (byte === Byte.Slash) return SLASH;
  if (byte === Byte.Quote) return QUOTE;

  const type = PUNCTUATION.get(byte);
  if (type !== undefined) return { kind: "punctuation", type };

  const pair = COMPARISONS.get(byte);
  if (pair !== undefined) return { kind: "comparison", single: pair[0], withEqual: pair[1] };

  return OTHER;
}

export function isDigit(byte: number | undefined): byte is number {
  return byte !== undefined && byte >= Byte.Digit0 && byte <= Byte.Digit9;
}

/** ASCII letters and underscore: anything that may start an identifier. */
export function isAlpha(byte: number | undefined): byte is number {
  return (
    byte !== undefined &&
    ((byte >= Byte.LowerA && byte <= Byte.LowerZ) ||
      (byte >= Byte.UpperA && byte <= Byte.UpperZ) ||
      byte === Byte.Underscore)
  );
}

export function isAlphaNumeric(byte: number | undefined): byte is number {
  return isAlpha(byte) || isDigit(byte);
}

export function isWhitespace(byte: number | undefined): byte is number {
  return (
    byte === Byte.Space ||
    byte === Byte.Tab ||
    byte === Byte.CarriageReturn ||
    byte === Byte.LineFeed
  );
}
