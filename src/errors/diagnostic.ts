import { ErrorKind, type ScanError } from "../lexer/tokens.js";
import type { SourceText } from "./source.js";

export interface Position {
  offset: number;
  line: number;
  column: number;
}

export interface Span {
  start: Position;
  end: Position;
  source: string;
}

export type Severity = "error";

export interface Diagnostic {
  severity: Severity;
  message: string;
  span: Span;
  kind?: ErrorKind;
  help?: string;
}

export function error(message: string, span: Span, help?: string): Diagnostic {
  return { severity: "error", message, span, help };
}

export function scanErrorToDiagnostic(err: ScanError, source: SourceText): Diagnostic {
  const span = source.span(err.range);
  const lexeme = source.slice(err.range);

  switch (err.kind) {
    case ErrorKind.Unknown:
      return {
        ...error(describeUnknown(source.bytes[err.range.start]), span),
        kind: err.kind,
      };
    case ErrorKind.UnfinishString:
      return {
        ...error("Unterminated string literal", span, 'Add a closing \'"\' before the end of the input'),
        kind: err.kind,
      };
    case ErrorKind.InvalidNumber:
      return {
        ...error(
          `Invalid number literal ${JSON.stringify(lexeme)}`,
          span,
          "A number may contain at most one decimal point",
        ),
        kind: err.kind,
      };
  }
}

function describeUnknown(byte: number): string {
  if (byte >= 0x21 && byte <= 0x7e) {
    return `Unexpected character ${JSON.stringify(String.fromCharCode(byte))}`;
  }
  return `Unexpected byte 0x${byte.toString(16).toUpperCase().padStart(2, "0")}`;
}
