import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import {
  API_LOG_FILE,
  logApi,
  setApiLogFile,
  setDebugMode,
} from "../src/logger";

let dir: string;
let file: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "ci-trigger-log-"));
  file = path.join(dir, "nested", "api.log");
  setApiLogFile(file);
  vi.useFakeTimers({ toFake: ["Date"] });
  vi.setSystemTime(new Date("2026-01-02T03:04:05.000Z"));
});

afterEach(() => {
  setDebugMode(false);
  setApiLogFile(API_LOG_FILE);
  vi.useRealTimers();
  fs.rmSync(dir, { recursive: true, force: true });
});

describe("logApi", () => {
  test("writes nothing outside debug mode", () => {
    logApi({ kind: "network-error", method: "GET", url: "x", reason: "down" });

    expect(fs.existsSync(file)).toBe(false);
  });

  test("masks credentials and prefixes body lines", () => {
    setDebugMode(true);

    logApi({
      kind: "request",
      method: "POST",
      url: "https://jenkins.example.com/job/app/build",
      headers: {
        Authorization: "Basic dGVzdC1zZWNyZXQ=",
        "Jenkins-Crumb": "test-crumb",
        Accept: "application/json",
      },
      body: "APP_NAME=web\nDEBUG=1",
    });
    logApi({
      kind: "response",
      method: "POST",
      url: "https://jenkins.example.com/job/app/build",
      status: 403,
      body: "",
    });

    expect(fs.readFileSync(file, "utf8")).toBe(
      "[2026-01-02T03:04:05.000Z] REQUEST POST https://jenkins.example.com/job/app/build\n" +
        "  Authorization: Basic ***\n" +
        "  Jenkins-Crumb: ***\n" +
        "  Accept: application/json\n" +
        "  | APP_NAME=web\n" +
        "  | DEBUG=1\n\n" +
        "[2026-01-02T03:04:05.000Z] HTTP_ERROR POST https://jenkins.example.com/job/app/build 403\n" +
        "  (empty body)\n\n",
    );
  });

  test("cuts long bodies", () => {
    setDebugMode(true);

    logApi({
      kind: "response",
      method: "GET",
      url: "https://jenkins.example.com/job/app/1/consoleText",
      status: 200,
      body: "x".repeat(4_010),
    });

    const lines = fs.readFileSync(file, "utf8").split("\n");
    expect(lines[0]).toBe(
      "[2026-01-02T03:04:05.000Z] RESPONSE GET https://jenkins.example.com/job/app/1/consoleText 200",
    );
    expect(lines[1]).toBe(`  | ${"x".repeat(4_000)}`);
    expect(lines[2]).toBe("  | ... 10 more chars");
  });
});
