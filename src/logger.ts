/**
 * Debug trace of Jenkins HTTP traffic.
 * Nothing is written unless debug mode is on. Credentials never reach the file.
 */
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

export const API_LOG_FILE = path.join(
  os.homedir(),
  ".config",
  "ci-trigger",
  "api.log",
);

const MAX_BODY_CHARS = 4_000;
const SECRET_HEADERS = new Set(["authorization", "cookie", "jenkins-crumb"]);

type HeaderSource = Headers | Record<string, string>;

export type ApiLogEntry =
  | {
      kind: "request";
      method: string;
      url: string;
      headers?: HeaderSource;
      body?: string | null;
    }
  | {
      kind: "response";
      method: string;
      url: string;
      status: number;
      headers?: HeaderSource;
      body?: string;
    }
  | { kind: "network-error"; method: string; url: string; reason: string };

let debugMode = false;
let logFile = API_LOG_FILE;

export function setDebugMode(enabled: boolean): void {
  debugMode = enabled;
}

/** Points the trace at another file. */
export function setApiLogFile(file: string): void {
  logFile = file;
}

export function logApi(entry: ApiLogEntry): void {
  if (!debugMode) {
    return;
  }
  const lines = [headline(entry)];
  if (entry.kind !== "network-error") {
    lines.push(...headerLines(entry.headers));
    if (typeof entry.body === "string") {
      lines.push(...bodyLines(entry.body));
    }
  }
  try {
    fs.mkdirSync(path.dirname(logFile), { recursive: true });
    fs.appendFileSync(logFile, `${lines.join("\n")}\n\n`);
  } catch {
    // A failed trace write never fails the request.
  }
}

function headline(entry: ApiLogEntry): string {
  const prefix = `[${new Date().toISOString()}]`;
  switch (entry.kind) {
    case "request":
      return `${prefix} REQUEST ${entry.method} ${entry.url}`;
    case "response": {
      const label = entry.status >= 400 ? "HTTP_ERROR" : "RESPONSE";
      return `${prefix} ${label} ${entry.method} ${entry.url} ${entry.status}`;
    }
    case "network-error":
      return `${prefix} NETWORK_ERROR ${entry.method} ${entry.url}: ${entry.reason}`;
  }
}

function headerLines(headers: HeaderSource | undefined): string[] {
  if (!headers) {
    return [];
  }
  const entries: Array<[string, string]> =
    headers instanceof Headers ? [...headers.entries()] : Object.entries(headers);
  return entries.map(([key, value]) => `  ${key}: ${maskSecret(key, value)}`);
}

function maskSecret(key: string, value: string): string {
  const name = key.toLowerCase();
  if (!SECRET_HEADERS.has(name)) {
    return value;
  }
  if (name === "authorization") {
    return `${value.split(" ")[0] ?? ""} ***`;
  }
  return "***";
}

function bodyLines(body: string): string[] {
  if (body === "") {
    return ["  (empty body)"];
  }
  const shown = body.slice(0, MAX_BODY_CHARS);
  const lines = shown.split("\n").map((line) => `  | ${line}`);
  if (body.length > MAX_BODY_CHARS) {
    lines.push(`  | ... ${body.length - MAX_BODY_CHARS} more chars`);
  }
  return lines;
}
