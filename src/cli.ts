/**
 * CLI output utilities and error handling.
 * Provides standardized output prefixes (OK:, WARN:, ERROR:, HINT:).
 */
import path from "node:path";

/** Structured error with optional hints for user guidance. */
export class CliError extends Error {
  public readonly hints: string[];

  constructor(message: string, hints: string[] = []) {
    super(message);
    this.name = "CliError";
    this.hints = hints;
  }
}

/**
 * Failure talking to the CI server. `status` is the HTTP status when the
 * server answered, and undefined for timeouts and network errors.
 */
/** A Jenkins call that failed at the transport or HTTP level. */
export class JenkinsRequestError extends CliError {
  constructor(message: string, hints: string[] = []) {
    super(message, hints);
    this.name = "JenkinsRequestError";
  }
}

const DEFAULT_SCRIPT_NAME = "ci-trigger";

export function getScriptName(): string {
  const rawScriptName = process.argv[1]
    ? path.basename(process.argv[1])
    : DEFAULT_SCRIPT_NAME;
  return rawScriptName === "index.ts" || rawScriptName === "index.js"
    ? DEFAULT_SCRIPT_NAME
    : rawScriptName;
}

export function printOk(message: string): void {
  console.log(`OK: ${message}`);
}

export function printError(message: string): void {
  console.error(`ERROR: ${message}`);
}

export function printWarn(message: string): void {
  console.error(`WARN: ${message}`);
}

export function printHint(message: string): void {
  console.error(`HINT: ${message}`);
}

export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.message || "Unexpected error.";
  }
  return "Unexpected error.";
}

export function handleCliError(err: unknown): void {
  if (err instanceof CliError) {
    printError(err.message);
    for (const hint of err.hints) {
      printHint(hint);
    }
    return;
  }

  printError(describeError(err));
}
