import { InvalidArgumentError } from "commander";
import { DEFAULT_CONTEXT_LINES } from "./errors/reporter.js";

export const CONTEXT_ENV = "LOXSCAN_CONTEXT";

export function parseContextLines(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return n;
}

/**
 * Context lines for diagnostics: the `--context` flag, else `LOXSCAN_CONTEXT`,
 * else the default. Called from command actions so that `--help` and
 * `--version` never look at the environment.
 */
export function resolveContextLines(
  flag: number | undefined,
  env: NodeJS.ProcessEnv = process.env,
): number {
  if (flag !== undefined) return flag;
  const fromEnv = env[CONTEXT_ENV];
  if (fromEnv === undefined || fromEnv === "") return DEFAULT_CONTEXT_LINES;
  try {
    return parseContextLines(fromEnv);
  } catch {
    console.error(`Ignoring ${CONTEXT_ENV}=${JSON.stringify(fromEnv)}: expected a non-negative integer`);
    return DEFAULT_CONTEXT_LINES;
  }
}
