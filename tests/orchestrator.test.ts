import fs from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { TriggerOrchestrator } from "../src/trigger/orchestrator";
import type { TriggerSettings } from "../src/trigger/settings";
import { createTriggerRequest } from "../src/trigger/types";
import {
  buildStatus,
  calledMethods,
  createFakeJenkins,
  createRecordingReporter,
  createRecordingSleep,
  testSettings,
  type FakeJenkins,
  type RecordingReporter,
} from "./helpers.fake-jenkins";

const BUILD_URL = "https://jenkins.example.com/job/app/42/";

let client: FakeJenkins;
let reporter: RecordingReporter;

beforeEach(() => {
  client = createFakeJenkins();
  reporter = createRecordingReporter();
});

function createOrchestrator(overrides: Partial<TriggerSettings> = {}) {
  return new TriggerOrchestrator({
    client,
    settings: testSettings(overrides),
    reporter,
    sleep: createRecordingSleep().sleep,
    now: () => 0,
  });
}

describe("TriggerOrchestrator preconditions", () => {
  test("stops when the job does not exist", async () => {
    client.jobExists.mockResolvedValue(false);

    const result = await createOrchestrator().submitAndWait(
      createTriggerRequest({ job: "app", parameters: { APP_NAME: "app" } }),
    );

    expect(result).toEqual({
      success: false,
      status: "NOT_FOUND",
      message: 'Job "app" was not found.',
      job: "app",
    });
    expect(calledMethods(client)).toEqual(["jobExists"]);
    expect(Object.isFrozen(result)).toBe(true);
  });

  test("checks the archive before talking to the server", async () => {
    const missing = join(tmpdir(), "ci-trigger-missing", "context.zip");

    const result = await createOrchestrator().submitAndWait(
      createTriggerRequest({
        job: "app",
        artifact: {
          path: missing,
          fileName: "context.zip",
          fieldName: "BUILD_ARCHIVE",
        },
      }),
    );

    expect(result).toEqual({
      success: false,
      status: "PRECONDITION_FAILED",
      message: `Build archive not found or unreadable: ${missing}`,
      job: "app",
      artifactPath: missing,
    });
    expect(calledMethods(client)).toEqual([]);
  });

  test("reports a failed existence check as a submit failure", async () => {
    client.jobExists.mockRejectedValue(new Error("Network error"));

    const result = await createOrchestrator().submitAndWait(
      createTriggerRequest({ job: "app" }),
    );

    expect(result.status).toBe("SUBMIT_FAILED");
    expect(result.message).toBe('Could not check job "app": Network error');
  });
});

describe("TriggerOrchestrator submission", () => {
  test("follows a queued build to success and captures the console", async () => {
    client.getLastBuildNumber.mockResolvedValue(41);
    client.triggerBuild.mockResolvedValue({
      queueUrl: "https://jenkins.example.com/queue/item/7/",
      queueId: 7,
    });
    client.getQueueItem.mockResolvedValue({
      state: "started",
      buildNumber: 42,
      buildUrl: BUILD_URL,
    });
    client.getBuildStatus.mockResolvedValue(
      buildStatus({
        number: 42,
        result: "SUCCESS",
        durationMs: 65_000,
        timestampMs: 1_700_000_000_000,
        url: BUILD_URL,
      }),
    );
    client.getConsoleText.mockResolvedValue("Image: app:1.2.0\n");

    const result = await createOrchestrator().submitAndWait(
      createTriggerRequest({ job: "app", parameters: { APP_NAME: "app" } }),
      { streamLogs: false, captureConsole: true },
    );

    expect(result).toEqual({
      success: true,
      status: "SUCCESS",
      message: "Build #42 succeeded in 1m 5s.",
      job: "app",
      queueId: 7,
      buildNumber: 42,
      buildUrl: BUILD_URL,
      durationMs: 65_000,
      timestampMs: 1_700_000_000_000,
      consoleText: "Image: app:1.2.0\n",
      imageInfo: { imageTag: "app:1.2.0" },
    });
    expect(client.triggerBuild).toHaveBeenCalledWith("app", {
      APP_NAME: "app",
    });
    expect(reporter.progressMessages).toEqual(["Triggering app..."]);
    expect(reporter.infoMessages).toEqual([
      "Queued app as queue item #7.",
      "Build #42 started for app.",
    ]);
  });

  test("reports a failed build", async () => {
    client.triggerBuild.mockResolvedValue({ queueId: 7 });
    client.getQueueItem.mockResolvedValue({ state: "started", buildNumber: 42 });
    client.getBuildStatus.mockResolvedValue(
      buildStatus({ number: 42, result: "FAILURE", durationMs: 3_000 }),
    );

    const result = await createOrchestrator().submitAndWait(
      createTriggerRequest({ job: "app" }),
      { streamLogs: false },
    );

    expect(result.success).toBe(false);
    expect(result.status).toBe("FAILURE");
    expect(result.message).toBe("Build #42 finished with FAILURE after 3s.");
    expect(result.consoleText).toBeUndefined();
  });

  test("returns once the build starts when not waiting", async () => {
    client.triggerBuild.mockResolvedValue({ queueId: 7 });
    client.getQueueItem.mockResolvedValue({
      state: "started",
      buildNumber: 42,
      buildUrl: BUILD_URL,
    });

    const result = await createOrchestrator().submitAndWait(
      createTriggerRequest({ job: "app" }),
      { wait: false },
    );

    expect(result).toEqual({
      success: true,
      status: "STARTED",
      message: "Build #42 started.",
      job: "app",
      queueId: 7,
      buildNumber: 42,
      buildUrl: BUILD_URL,
    });
    expect(client.getBuildStatus).not.toHaveBeenCalled();
  });

  test("re-submits once when the response has no queue item", async () => {
    client.triggerBuild
      .mockResolvedValueOnce({})
      .mockResolvedValue({ queueId: 8 });
    client.getQueueItem.mockResolvedValue({ state: "started", buildNumber: 42 });

    const result = await createOrchestrator().submitAndWait(
      createTriggerRequest({ job: "app" }),
      { wait: false },
    );

    expect(result.status).toBe("STARTED");
    expect(result.queueId).toBe(8);
    expect(client.triggerBuild).toHaveBeenCalledTimes(2);
    expect(client.getQueueItem).toHaveBeenCalledWith(8);
    expect(reporter.warnMessages).toEqual([
      "No queue item in the response for app.",
    ]);
  });

  test("falls back to prediction from the baseline", async () => {
    client.getLastBuildNumber.mockResolvedValueOnce(41).mockResolvedValue(42);
    client.getBuildStatus.mockResolvedValue(
      buildStatus({ number: 42, building: true, result: null }),
    );

    const result = await createOrchestrator().submitAndWait(
      createTriggerRequest({ job: "app" }),
      { wait: false },
    );

    expect(result).toEqual({
      success: true,
      status: "STARTED",
      message: "Build #42 started.",
      job: "app",
      buildNumber: 42,
    });
    expect(client.triggerBuild).toHaveBeenCalledTimes(2);
    expect(reporter.warnMessages).toEqual([
      "No queue item in the response for app.",
      "Falling back to predicting build #42.",
    ]);
  });

  test("predictive strategy skips the queue item", async () => {
    client.getLastBuildNumber.mockResolvedValueOnce(41).mockResolvedValue(42);
    client.triggerBuild.mockResolvedValue({ queueId: 7 });
    client.getBuildStatus.mockResolvedValue(
      buildStatus({ number: 42, building: true, result: null }),
    );

    const result = await createOrchestrator({
      strategy: "predictive",
    }).submitAndWait(createTriggerRequest({ job: "app" }), { wait: false });

    expect(result.status).toBe("STARTED");
    expect(result.buildNumber).toBe(42);
    expect(result.queueId).toBeUndefined();
    expect(client.getQueueItem).not.toHaveBeenCalled();
  });

  test("maps a queue timeout to TIMEOUT", async () => {
    client.triggerBuild.mockResolvedValue({ queueId: 7 });

    const result = await createOrchestrator({
      queueMaxWaitMs: 1000,
    }).submitAndWait(createTriggerRequest({ job: "app" }));

    expect(result).toEqual({
      success: false,
      status: "TIMEOUT",
      message: "Queue item #7 did not start within 1s.",
      job: "app",
      queueId: 7,
    });
  });

  test("maps a cancelled queue item to UNRESOLVED", async () => {
    client.triggerBuild.mockResolvedValue({ queueId: 7 });
    client.getQueueItem.mockResolvedValue({ state: "cancelled" });

    const result = await createOrchestrator().submitAndWait(
      createTriggerRequest({ job: "app" }),
    );

    expect(result.status).toBe("UNRESOLVED");
    expect(result.success).toBe(false);
  });

  test("reports a rejected submission", async () => {
    client.triggerBuild.mockRejectedValue(new Error("HTTP 500"));

    const result = await createOrchestrator().submitAndWait(
      createTriggerRequest({ job: "app" }),
    );

    expect(result).toEqual({
      success: false,
      status: "SUBMIT_FAILED",
      message: 'Failed to submit build for "app": HTTP 500',
      job: "app",
    });
  });
});

describe("TriggerOrchestrator uploads", () => {
  let tempDir: string;
  let archivePath: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(join(tmpdir(), "ci-trigger-orchestrator-"));
    archivePath = join(tempDir, "context.zip");
    fs.writeFileSync(archivePath, "PK");
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  test("uploads the archive with the parameters", async () => {
    client.uploadBuild.mockResolvedValue({ queueId: 9 });
    client.getQueueItem.mockResolvedValue({ state: "started", buildNumber: 5 });
    const artifact = {
      path: archivePath,
      fileName: "context.zip",
      fieldName: "BUILD_ARCHIVE",
    };

    const result = await createOrchestrator().submitAndWait(
      createTriggerRequest({
        job: "app",
        parameters: { BUILD_CONTEXT: "web" },
        artifact,
      }),
      { wait: false },
    );

    expect(result).toEqual({
      success: true,
      status: "STARTED",
      message: "Build #5 started.",
      job: "app",
      queueId: 9,
      buildNumber: 5,
      artifactPath: archivePath,
    });
    expect(client.uploadBuild).toHaveBeenCalledWith(
      "app",
      { BUILD_CONTEXT: "web" },
      artifact,
    );
    expect(reporter.progressMessages).toEqual([
      "Uploading context.zip to app...",
    ]);
  });

  test("does not re-upload when the response has no queue item", async () => {
    client.getLastBuildNumber.mockResolvedValueOnce(4).mockResolvedValue(5);
    client.getBuildStatus.mockResolvedValue(
      buildStatus({ number: 5, building: true, result: null }),
    );

    const result = await createOrchestrator().submitAndWait(
      createTriggerRequest({
        job: "app",
        artifact: {
          path: archivePath,
          fileName: "context.zip",
          fieldName: "BUILD_ARCHIVE",
        },
      }),
      { wait: false },
    );

    expect(result.buildNumber).toBe(5);
    expect(client.uploadBuild).toHaveBeenCalledTimes(1);
    expect(client.triggerBuild).not.toHaveBeenCalled();
  });

  test("rejects a directory in place of the archive", async () => {
    const result = await createOrchestrator().submitAndWait(
      createTriggerRequest({
        job: "app",
        artifact: {
          path: tempDir,
          fileName: "context.zip",
          fieldName: "BUILD_ARCHIVE",
        },
      }),
    );

    expect(result.status).toBe("PRECONDITION_FAILED");
    expect(result.message).toBe(`Build archive is not a file: ${tempDir}`);
  });
});
