import { readFile } from "node:fs/promises";
import { Scanner } from "./lexer/scanner.js";
import { TokenType, isTrivia, type ScanError, type Token } from "./lexer/tokens.js";
import { SourceText } from "./errors/source.js";
import { scanErrorToDiagnostic, type Diagnostic } from "./errors/diagnostic.js";

export interface ScanOptions {
  /** Keep Whitespace and CommentLine tokens. Defaults to true. */
  trivia?: boolean;
  /** Append a zero-width Eof token at the end of the buffer. Defaults to true. */
  eof?: boolean;
}

export interface BatchScanResult {
  source: SourceText;
  tokens: Token[];
  /** Every scan error, in source order. Non-empty means the unit failed. */
  errors: ScanError[];
  diagnostics: Diagnostic[];
}

/**
 * Run the scanner over one source unit to exhaustion.
 * Each call builds its own result; nothing carries over between calls.
 */
export function scan(
  content: string | Uint8Array,
  filename: string,
  options: ScanOptions = {},
): BatchScanResult {
  const source = new SourceText(filename, content);
  const keepTrivia = options.trivia ?? true;
  const tokens: Token[] = [];
  const errors: ScanError[] = [];

  for (const result of new Scanner(source.bytes)) {
    if (result.kind === "error") {
      errors.push(result.error);
    } else if (keepTrivia || !isTrivia(result.token.type)) {
      tokens.push(result.token);
    }
  }

  if (options.eof ?? true) {
    tokens.push({ type: TokenType.Eof, range: { start: source.length, end: source.length } });
  }

  const diagnostics = errors.map((err) => scanErrorToDiagnostic(err, source));
  return { source, tokens, errors, diagnostics };
}

export async function scanFile(filePath: string, options: ScanOptions = {}): Promise<BatchScanResult> {
  const content = await readFile(filePath);
  return scan(content, filePath, options);
}

/** One line per token: type, JSON-quoted lexeme, and line:column of its start. */
export function formatToken(source: SourceText, token: Token): string {
  const { line, column } = source.locate(token.range.start);
  return `${token.type}\t${JSON.stringify(source.slice(token.range))}\t${line}:${column}`;
}

export interface TokenJson {
  type: TokenType;
  lexeme: string;
  start: number;
  end: number;
  line: number;
  column: number;
}

export interface ErrorJson {
  kind: ScanError["kind"];
  message: string;
  lexeme: string;
  start: number;
  end: number;
  line: number;
  column: number;
}

export function toJson(result: BatchScanResult): { file: string; tokens: TokenJson[]; errors: ErrorJson[] } {
  const { source } = result;
  return {
    file: source.name,
    tokens: result.tokens.map((token) => ({
      type: token.type,
      lexeme: source.slice(token.range),
      start: token.range.start,
      end: token.range.end,
      ...lineAndColumn(source, token.range.start),
    })),
    errors: result.errors.map((err) => ({
      kind: err.kind,
      message: scanErrorToDiagnostic(err, source).message,
      lexeme: source.slice(err.range),
      start: err.range.start,
      end: err.range.end,
      ...lineAndColumn(source, err.range.start),
    })),
  };
}

function lineAndColumn(source: SourceText, offset: number): { line: number; column: number } {
  const { line, column } = source.locate(offset);
  return { line, column };
}
