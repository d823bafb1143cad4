import type { ByteRange } from "../lexer/tokens.js";
import type { Position, Span } from "./diagnostic.js";

const LINE_FEED = 0x0a;
const CARRIAGE_RETURN = 0x0d;

const encoder = new TextEncoder();
const decoder = new TextDecoder();

/**
 * A named source buffer with byte-offset to line/column lookup.
 *
 * Lines and columns are 1-based; columns count bytes, which is what the
 * scanner's ranges are measured in.
 */
export class SourceText {
  readonly name: string;
  readonly bytes: Uint8Array;
  private readonly lineStarts: number[];

  constructor(name: string, content: string | Uint8Array) {
    this.name = name;
    this.bytes = typeof content === "string" ? encoder.encode(content) : content;
    this.lineStarts = this.computeLineStarts();
  }

  get length(): number {
    return this.bytes.length;
  }

  get lineCount(): number {
    return this.lineStarts.length;
  }

  private computeLineStarts(): number[] {
    const starts = [0];
    for (let i = 0; i < this.bytes.length; i++) {
      if (this.bytes[i] === LINE_FEED) {
        starts.push(i + 1);
      }
    }
    return starts;
  }

  locate(offset: number): Position {
    const clamped = Math.min(Math.max(offset, 0), this.bytes.length);

    let low = 0;
    let high = this.lineStarts.length - 1;
    while (low < high) {
      const mid = Math.ceil((low + high) / 2);
      if (this.lineStarts[mid] <= clamped) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }

    return { offset: clamped, line: low + 1, column: clamped - this.lineStarts[low] + 1 };
  }

  span(range: ByteRange): Span {
    return {
      start: this.locate(range.start),
      end: this.locate(range.end),
      source: this.name,
    };
  }

  /** Copy the lexeme text out of the buffer. */
  slice(range: ByteRange): string {
    return decoder.decode(this.bytes.subarray(range.start, range.end));
  }

  /** Text of a 1-based line, without its line break. Out of range gives "". */
  line(lineNumber: number): string {
    return this.slice(this.lineRange(lineNumber));
  }

  /** Byte range of a 1-based line, excluding its `\n` or `\r\n` break. */
  lineRange(lineNumber: number): ByteRange {
    if (lineNumber < 1 || lineNumber > this.lineStarts.length) {
      return { start: 0, end: 0 };
    }
    const start = this.lineStarts[lineNumber - 1];
    let end =
      lineNumber < this.lineStarts.length
        ? this.lineStarts[lineNumber] - 1
        : this.bytes.length;
    if (end > start && this.bytes[end - 1] === CARRIAGE_RETURN) end--;
    return { start, end };
  }

  /** Offset of the first byte of the UTF-8 sequence holding `offset`. */
  charStart(offset: number): number {
    let at = Math.min(Math.max(offset, 0), this.bytes.length);
    while (at > 0 && at < this.bytes.length && isContinuation(this.bytes[at])) at--;
    return at;
  }

  /** Characters a terminal shows for a byte range: one per UTF-8 sequence. */
  displayWidth(range: ByteRange): number {
    let width = 0;
    for (let i = range.start; i < range.end; i++) {
      if (!isContinuation(this.bytes[i])) width++;
    }
    return width;
  }
}

function isContinuation(byte: number): boolean {
  return (byte & 0xc0) === 0x80;
}
