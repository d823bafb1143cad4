import chalk from "chalk";
import type { Diagnostic } from "./diagnostic.js";
import type { SourceText } from "./source.js";

export interface FormatOptions {
  /** Lines of source shown above and below the offending lines. */
  contextLines?: number;
}

export const DEFAULT_CONTEXT_LINES = 1;

export function formatDiagnostic(
  source: SourceText,
  diag: Diagnostic,
  options: FormatOptions = {},
): string {
  const contextLines = Math.max(0, options.contextLines ?? DEFAULT_CONTEXT_LINES);
  const { start, end } = diag.span;

  // `end` is exclusive, so the span's last line is the one holding its last byte.
  const lastLine = end.offset > start.offset ? source.locate(end.offset - 1).line : start.line;
  const firstShown = Math.max(1, start.line - contextLines);
  const lastShown = Math.min(source.lineCount, lastLine + contextLines);
  const gutter = String(lastShown).length;
  const padding = " ".repeat(gutter);

  let output = `${chalk.red.bold(diag.severity)}: ${chalk.bold(diag.message)}\n`;
  output += `${padding} ${chalk.blue("-->")} ${diag.span.source}:${start.line}:${start.column}\n`;
  output += `${padding} ${chalk.blue("|")}\n`;

  for (let n = firstShown; n <= lastShown; n++) {
    const line = source.lineRange(n);
    output += `${chalk.blue(String(n).padStart(gutter))} ${chalk.blue("|")} ${source.slice(line)}\n`;

    if (n < start.line || n > lastLine) continue;

    // Carets are measured in characters of the printed line, not bytes.
    const from = n === start.line ? Math.min(source.charStart(start.offset), line.end) : line.start;
    const to = n === lastLine ? Math.min(end.offset, line.end) : line.end;
    const pad = source.displayWidth({ start: line.start, end: from });
    const width = Math.max(1, source.displayWidth({ start: from, end: to }));
    output += `${padding} ${chalk.blue("|")} ${" ".repeat(pad)}${chalk.red("^".repeat(width))}\n`;
  }

  if (diag.help) {
    output += `${padding} ${chalk.blue("=")} ${chalk.green("help")}: ${diag.help}\n`;
  }

  return output;
}

export function formatDiagnostics(
  source: SourceText,
  diagnostics: Diagnostic[],
  options: FormatOptions = {},
): string {
  const errorCount = diagnostics.length;
  const body = diagnostics.map((d) => formatDiagnostic(source, d, options)).join("\n");
  if (errorCount === 0) return body;
  return `${body}\n${chalk.red.bold(`${errorCount} error${errorCount === 1 ? "" : "s"}`)} in ${source.name}\n`;
}
