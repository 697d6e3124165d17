import { describe, expect, test } from "vitest";
import {
  annotateConsoleText,
  extractImageInfo,
  stripAnsi,
} from "../src/trigger/console-annotations";

describe("stripAnsi", () => {
  test("removes color and erase sequences", () => {
    expect(stripAnsi("\u001b[2K\u001b[32mOK\u001b[0m")).toBe("OK");
  });

  test("removes OSC hyperlinks", () => {
    expect(
      stripAnsi("\u001b]8;;https://example.com\u0007link\u001b]8;;\u0007"),
    ).toBe("link");
  });
});

describe("annotateConsoleText", () => {
  test("reads structured markers", () => {
    const text = [
      "[STAGE_START] Checkout",
      "prefix [STAGE_END] Checkout",
      "[BUILD_INFO] Tag 1.2.0",
      "[BUILD_SUCCESS] Image ready",
    ].join("\n");

    expect(annotateConsoleText(text, { verbose: false, seen: new Set() })).toEqual(
      [
        { kind: "stage-start", text: "Checkout" },
        { kind: "stage-end", text: "Checkout" },
        { kind: "build-info", text: "Tag 1.2.0" },
        { kind: "build-success", text: "Image ready" },
      ],
    );
  });

  test("classifies keyword lines and skips noise", () => {
    const text = [
      "[Pipeline] { (Docker Build)",
      "Registry: registry.example.com",
      "warning: cache miss",
      "Pushing layer 3/5",
      "Step 4/9 : RUN npm ci",
      "some unrelated output",
    ].join("\n");

    expect(annotateConsoleText(text, { verbose: false, seen: new Set() })).toEqual(
      [
        { kind: "stage", text: "Docker Build" },
        { kind: "image", text: "Registry: registry.example.com" },
        { kind: "problem", text: "warning: cache miss" },
        { kind: "progress", text: "Pushing layer 3/5" },
      ],
    );
  });

  test("adds build steps in verbose mode", () => {
    const annotations = annotateConsoleText("Step 4/9 : RUN npm ci\n", {
      verbose: true,
      seen: new Set(),
    });

    expect(annotations).toEqual([
      { kind: "detail", text: "Step 4/9 : RUN npm ci" },
    ]);
  });

  test("emits keyword lines once per session", () => {
    const seen = new Set<string>();
    const first = annotateConsoleText("ERROR: disk full\n", {
      verbose: false,
      seen,
    });
    const second = annotateConsoleText(
      "ERROR: disk full\n[STAGE_END] Build\n[STAGE_END] Build\n",
      { verbose: false, seen },
    );

    expect(first).toEqual([{ kind: "problem", text: "ERROR: disk full" }]);
    expect(second).toEqual([
      { kind: "stage-end", text: "Build" },
      { kind: "stage-end", text: "Build" },
    ]);
  });
});

describe("extractImageInfo", () => {
  test("collects registry metadata", () => {
    const text = [
      "Registry: registry.example.com",
      "Project: platform",
      "Image: app:1.2.0",
      "Image pushed to: registry.example.com/platform/app:1.2.0",
      "1.2.0: digest: sha256:abc123 size: 2417",
    ].join("\n");

    expect(extractImageInfo(text)).toEqual({
      registry: "registry.example.com",
      project: "platform",
      imageTag: "app:1.2.0",
      fullImageUrl: "registry.example.com/platform/app:1.2.0",
      digest: "sha256:abc123",
    });
  });

  test("keeps the first occurrence of a field", () => {
    const text = "Registry: first.example.com\nRegistry: second.example.com\n";

    expect(extractImageInfo(text)).toEqual({ registry: "first.example.com" });
  });

  test("falls back to a bare sha256 reference", () => {
    expect(extractImageInfo("pushed sha256:DEADbeef0 ok")).toEqual({
      digest: "sha256:DEADbeef0",
    });
  });

  test("returns an empty object when nothing matches", () => {
    expect(extractImageInfo("hello\nworld\n")).toEqual({});
  });
});
