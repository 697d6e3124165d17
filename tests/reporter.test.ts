import { describe, expect, test, vi } from "vitest";
import { createConsoleReporter, formatAnnotation } from "../src/reporter";

describe("formatAnnotation", () => {
  test("marks stages and problems", () => {
    expect(formatAnnotation({ kind: "stage-start", text: "Build" })).toBe(
      ">> Stage started: Build",
    );
    expect(formatAnnotation({ kind: "stage", text: "Push" })).toBe(
      ">> Stage: Push",
    );
    expect(formatAnnotation({ kind: "problem", text: "ERROR: x" })).toBe(
      "!! ERROR: x",
    );
    expect(formatAnnotation({ kind: "detail", text: "Step 1/3" })).toBe(
      "   Step 1/3",
    );
  });
});

describe("createConsoleReporter", () => {
  test("prints plain lines when not interactive", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const reporter = createConsoleReporter({ interactive: false });

    reporter.progress("Triggering app...");
    reporter.info("Build #4 started for app.");
    reporter.warn("No queue item in the response for app.");
    reporter.annotation({ kind: "build-success", text: "Image ready" });
    reporter.close();

    expect(log.mock.calls).toEqual([
      ["OK: Triggering app..."],
      ["OK: Build #4 started for app."],
      [">> Image ready"],
    ]);
    expect(error.mock.calls).toEqual([
      ["WARN: No queue item in the response for app."],
    ]);
  });
});
