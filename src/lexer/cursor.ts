/**
 * Forward-only reader over an immutable byte buffer.
 *
 * `advance()` is the only operation that consumes input; `peek()` looks
 * ahead any distance without moving. Reading past the end is a no-op.
 */
export class Cursor {
  private readonly source: Uint8Array;
  private pos: number = 0;
  private prev: number | undefined = undefined;
  private curr: number | undefined = undefined;

  constructor(source: Uint8Array) {
    this.source = source;
  }

  /** Offset of the next unconsumed byte. */
  get position(): number {
    return this.pos;
  }

  /** The byte consumed before `current`. */
  get previous(): number | undefined {
    return this.prev;
  }

  /** The most recently consumed byte, i.e. the one at `position - 1`. */
  get current(): number | undefined {
    return this.curr;
  }

  get length(): number {
    return this.source.length;
  }

  isAtEnd(): boolean {
    return this.pos >= this.source.length;
  }

  peek(n: number = 0): number | undefined {
    const index = this.pos + n;
    if (index < this.pos || index >= this.source.length) {
      return undefined;
    }
    return this.source[index];
  }

  advance(): number | undefined {
    if (this.pos >= this.source.length) {
      return undefined;
    }
    this.prev = this.curr;
    this.curr = this.source[this.pos];
    this.pos++;
    return this.curr;
  }
}
