import { Cursor } from "./cursor.js";
import { Byte, classify, isAlphaNumeric, isDigit, isWhitespace } from "./chars.js";
import { KEYWORDS, MAX_KEYWORD_LENGTH, MIN_KEYWORD_LENGTH } from "./keywords.js";
import { ErrorKind, TokenType, type ScanResult } from "./tokens.js";

/**
 * Pull-based scanner. Each `next()` call consumes one lexeme and returns
 * either a token or a scan error covering it; `undefined` means the input is
 * exhausted. Errors never stop the scan, so calling `next()` until it returns
 * `undefined` always covers the whole buffer.
 */
export class Scanner implements Iterable<ScanResult> {
  private readonly source: Uint8Array;
  private readonly cursor: Cursor;
  private start: number = 0;

  constructor(source: Uint8Array) {
    this.source = source;
    this.cursor = new Cursor(source);
  }

  next(): ScanResult | undefined {
    const c = this.cursor.advance();
    if (c === undefined) return undefined;
    this.start = this.cursor.position - 1;
    return this.scanFrom(c);
  }

  *[Symbol.iterator](): Iterator<ScanResult> {
    for (let result = this.next(); result !== undefined; result = this.next()) {
      yield result;
    }
  }

  private scanFrom(c: number): ScanResult {
    const cls = classify(c);
    switch (cls.kind) {
      case "letter":
        return this.readIdentOrKeyword();
      case "whitespace":
        this.advanceWhile(isWhitespace);
        return this.token(TokenType.Whitespace);
      case "digit":
        return this.readNumber();
      case "punctuation":
        return this.token(cls.type);
      case "comparison":
        if (this.match(Byte.Equal)) return this.token(cls.withEqual);
        return this.token(cls.single);
      case "slash":
        if (this.match(Byte.Slash)) {
          this.advanceWhile((b) => b !== Byte.LineFeed);
          return this.token(TokenType.CommentLine);
        }
        return this.token(TokenType.Slash);
      case "quote":
        return this.readString();
      case "other":
        return this.fail(ErrorKind.Unknown);
      default: {
        const unreachable: never = cls;
        return unreachable;
      }
    }
  }

  private readIdentOrKeyword(): ScanResult {
    this.advanceWhile(isAlphaNumeric);

    const length = this.cursor.position - this.start;
    if (length < MIN_KEYWORD_LENGTH || length > MAX_KEYWORD_LENGTH) {
      return this.token(TokenType.Identifier);
    }

    const word = String.fromCharCode(...this.source.subarray(this.start, this.cursor.position));
    return this.token(KEYWORDS.get(word) ?? TokenType.Identifier);
  }

  private readNumber(): ScanResult {
    let fractional = false;

    for (;;) {
      const b = this.cursor.peek();
      if (isDigit(b)) {
        this.cursor.advance();
      } else if (b === Byte.Dot && isDigit(this.cursor.peek(1))) {
        if (fractional) {
          // Second decimal point: swallow the rest of the run so the next
          // scan starts after the malformed literal.
          this.advanceWhile((d) => isDigit(d) || d === Byte.Dot);
          return this.fail(ErrorKind.InvalidNumber);
        }
        this.cursor.advance();
        fractional = true;
      } else {
        break;
      }
    }

    return this.token(TokenType.Number);
  }

  private readString(): ScanResult {
    for (;;) {
      const b = this.cursor.advance();
      if (b === undefined) return this.fail(ErrorKind.UnfinishString);
      if (b === Byte.Quote) return this.token(TokenType.String);
    }
  }

  /** Consume the next byte only if it is `expected`. */
  private match(expected: number): boolean {
    if (this.cursor.peek() !== expected) return false;
    this.cursor.advance();
    return true;
  }

  private advanceWhile(predicate: (byte: number) => boolean): void {
    for (let b = this.cursor.peek(); b !== undefined && predicate(b); b = this.cursor.peek()) {
      this.cursor.advance();
    }
  }

  private token(type: TokenType): ScanResult {
    return {
      kind: "token",
      token: { type, range: { start: this.start, end: this.cursor.position } },
    };
  }

  private fail(kind: ErrorKind): ScanResult {
    return {
      kind: "error",
      error: { kind, range: { start: this.start, end: this.cursor.position } },
    };
  }
}
