import { beforeAll, describe, it, expect } from "vitest";
import chalk from "chalk";
import { SourceText } from "../../src/errors/source.js";
import { scanErrorToDiagnostic } from "../../src/errors/diagnostic.js";
import { formatDiagnostic, formatDiagnostics } from "../../src/errors/reporter.js";
import { ErrorKind } from "../../src/lexer/tokens.js";

beforeAll(() => {
  chalk.level = 0;
});

describe("scanErrorToDiagnostic", () => {
  const source = new SourceText("test.lox", 'x @ 9.9.9 "ab');

  it("describes an unknown byte", () => {
    const diag = scanErrorToDiagnostic({ kind: ErrorKind.Unknown, range: { start: 2, end: 3 } }, source);
    expect(diag.severity).toBe("error");
    expect(diag.kind).toBe(ErrorKind.Unknown);
    expect(diag.message).toBe('Unexpected character "@"');
    expect(diag.help).toBeUndefined();
    expect(diag.span.start).toEqual({ offset: 2, line: 1, column: 3 });
    expect(diag.span.end).toEqual({ offset: 3, line: 1, column: 4 });
  });

  it("names a byte outside printable ASCII by its value", () => {
    const text = new SourceText("test.lox", "é\u0007");
    const messageAt = (start: number) =>
      scanErrorToDiagnostic({ kind: ErrorKind.Unknown, range: { start, end: start + 1 } }, text).message;
    expect(messageAt(0)).toBe("Unexpected byte 0xC3");
    expect(messageAt(1)).toBe("Unexpected byte 0xA9");
    expect(messageAt(2)).toBe("Unexpected byte 0x07");
  });

  it("describes a malformed number", () => {
    const diag = scanErrorToDiagnostic({ kind: ErrorKind.InvalidNumber, range: { start: 4, end: 9 } }, source);
    expect(diag.message).toBe('Invalid number literal "9.9.9"');
    expect(diag.help).toBe("A number may contain at most one decimal point");
  });

  it("describes an unterminated string", () => {
    const diag = scanErrorToDiagnostic({ kind: ErrorKind.UnfinishString, range: { start: 10, end: 13 } }, source);
    expect(diag.message).toBe("Unterminated string literal");
    expect(diag.span.source).toBe("test.lox");
  });
});

describe("formatDiagnostic", () => {
  it("underlines a single byte with one line of context", () => {
    const source = new SourceText("test.lox", "var x = 1;\nprint x @ y;\nvar z;");
    const diag = scanErrorToDiagnostic({ kind: ErrorKind.Unknown, range: { start: 19, end: 20 } }, source);
    expect(formatDiagnostic(source, diag)).toBe(
      'error: Unexpected character "@"\n' +
        "  --> test.lox:2:9\n" +
        "  |\n" +
        "1 | var x = 1;\n" +
        "2 | print x @ y;\n" +
        "  |         ^\n" +
        "3 | var z;\n",
    );
  });

  it("underlines every line a span covers", () => {
    const source = new SourceText("test.lox", 'print "ab\ncd');
    const diag = scanErrorToDiagnostic({ kind: ErrorKind.UnfinishString, range: { start: 6, end: 12 } }, source);
    expect(formatDiagnostic(source, diag, { contextLines: 0 })).toBe(
      "error: Unterminated string literal\n" +
        "  --> test.lox:1:7\n" +
        "  |\n" +
        '1 | print "ab\n' +
        "  |       ^^^\n" +
        "2 | cd\n" +
        "  | ^^\n" +
        "  = help: Add a closing '\"' before the end of the input\n",
    );
  });

  it("places the caret by character after non-ASCII text", () => {
    const source = new SourceText("test.lox", '"é" @');
    const diag = scanErrorToDiagnostic({ kind: ErrorKind.Unknown, range: { start: 5, end: 6 } }, source);
    expect(formatDiagnostic(source, diag, { contextLines: 0 })).toBe(
      'error: Unexpected character "@"\n' +
        "  --> test.lox:1:6\n" +
        "  |\n" +
        '1 | "é" @\n' +
        "  |     ^\n",
    );
  });

  it("points both bytes of a multi-byte character at that character", () => {
    const source = new SourceText("test.lox", "xé");
    const diag = scanErrorToDiagnostic({ kind: ErrorKind.Unknown, range: { start: 2, end: 3 } }, source);
    expect(formatDiagnostic(source, diag, { contextLines: 0 })).toBe(
      "error: Unexpected byte 0xA9\n" +
        "  --> test.lox:1:3\n" +
        "  |\n" +
        "1 | xé\n" +
        "  |  ^\n",
    );
  });

  it("does not underline the carriage return of a CRLF line", () => {
    const source = new SourceText("test.lox", 'x "ab\r\ncd');
    const diag = scanErrorToDiagnostic({ kind: ErrorKind.UnfinishString, range: { start: 2, end: 9 } }, source);
    expect(formatDiagnostic(source, diag, { contextLines: 0 })).toBe(
      "error: Unterminated string literal\n" +
        "  --> test.lox:1:3\n" +
        "  |\n" +
        '1 | x "ab\n' +
        "  |   ^^^\n" +
        "2 | cd\n" +
        "  | ^^\n" +
        "  = help: Add a closing '\"' before the end of the input\n",
    );
  });

  it("widens the gutter for multi-digit line numbers", () => {
    const source = new SourceText("test.lox", "\n".repeat(9) + "#");
    const diag = scanErrorToDiagnostic({ kind: ErrorKind.Unknown, range: { start: 9, end: 10 } }, source);
    expect(formatDiagnostic(source, diag)).toBe(
      'error: Unexpected character "#"\n' +
        "   --> test.lox:10:1\n" +
        "   |\n" +
        " 9 | \n" +
        "10 | #\n" +
        "   | ^\n",
    );
  });
});

describe("formatDiagnostics", () => {
  it("joins diagnostics and counts the errors", () => {
    const source = new SourceText("test.lox", "@$");
    const diags = [
      scanErrorToDiagnostic({ kind: ErrorKind.Unknown, range: { start: 0, end: 1 } }, source),
      scanErrorToDiagnostic({ kind: ErrorKind.Unknown, range: { start: 1, end: 2 } }, source),
    ];
    const out = formatDiagnostics(source, diags, { contextLines: 0 });
    expect(out).toBe(
      'error: Unexpected character "@"\n  --> test.lox:1:1\n  |\n1 | @$\n  | ^\n' +
        "\n" +
        'error: Unexpected character "$"\n  --> test.lox:1:2\n  |\n1 | @$\n  |  ^\n' +
        "\n2 errors in test.lox\n",
    );
  });

  it("prints nothing for a clean scan", () => {
    const source = new SourceText("test.lox", "x");
    expect(formatDiagnostics(source, [])).toBe("");
  });
});
