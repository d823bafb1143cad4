#!/usr/bin/env node
import { Command } from "commander";
import { readdir } from "node:fs/promises";
import path from "node:path";
import { formatToken, scan, scanFile, toJson, type BatchScanResult } from "./scan.js";
import { formatDiagnostics } from "./errors/reporter.js";
import { parseContextLines, resolveContextLines } from "./config.js";

async function resolveDefaultFile(file: string | undefined): Promise<string> {
  if (file) return file;
  const entries = await readdir(process.cwd());
  const found = entries.filter(f => f.endsWith(".lox"));
  if (found.length === 0) {
    throw new Error("No .lox file found in the current directory. Pass a file path explicitly.");
  }
  if (found.length > 1) {
    throw new Error(`Multiple .lox files found: ${found.join(", ")}. Pass a file path explicitly.`);
  }
  return path.join(process.cwd(), found[0]);
}

function printTokens(result: BatchScanResult): void {
  for (const tok of result.tokens) {
    console.log(formatToken(result.source, tok));
  }
}

async function runRepl(opts: { trivia: boolean; context: number }): Promise<void> {
  const readline = await import("node:readline");
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  console.log("loxscan REPL. Each line is scanned on its own. Ctrl+D to exit.");

  rl.setPrompt("> ");
  rl.prompt();

  for await (const line of rl) {
    const result = scan(line, "<repl>", { trivia: opts.trivia, eof: false });
    printTokens(result);
    if (result.errors.length > 0) {
      console.error(formatDiagnostics(result.source, result.diagnostics, { contextLines: opts.context }));
    }
    rl.prompt();
  }

  console.log();
}

const program = new Command()
  .name("loxscan")
  .description("Lexical scanner for Lox source: prints tokens and reports scan errors")
  .version("0.1.0");

program
  .command("scan [file]")
  .description("Scan a .lox file (defaults to the single .lox file in the current directory)")
  .option("--json", "Print tokens and errors as JSON")
  .option("--no-trivia", "Omit whitespace and comment tokens")
  .option("--no-eof", "Omit the trailing EOF token")
  .option("-C, --context <lines>", "Source lines shown around each error (env: LOXSCAN_CONTEXT)", parseContextLines)
  .action(async (file: string | undefined, opts: { json?: boolean; trivia: boolean; eof: boolean; context?: number }) => {
    try {
      file = await resolveDefaultFile(file);
      const result = await scanFile(file, { trivia: opts.trivia, eof: opts.eof });

      if (opts.json) {
        console.log(JSON.stringify(toJson(result), null, 2));
      } else {
        printTokens(result);
      }

      if (result.errors.length > 0) {
        console.error(formatDiagnostics(result.source, result.diagnostics, { contextLines: resolveContextLines(opts.context) }));
        process.exit(1);
      }
    } catch (e) {
      console.error(`Error: ${e instanceof Error ? e.message : String(e)}`);
      process.exit(1);
    }
  });

program
  .command("repl", { isDefault: true })
  .description("Scan lines typed at an interactive prompt")
  .option("--no-trivia", "Omit whitespace and comment tokens")
  .option("-C, --context <lines>", "Source lines shown around each error (env: LOXSCAN_CONTEXT)", parseContextLines)
  .action(async (opts: { trivia: boolean; context?: number }) => {
    await runRepl({ trivia: opts.trivia, context: resolveContextLines(opts.context) });
  });

await program.parseAsync();
