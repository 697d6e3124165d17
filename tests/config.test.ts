import fs from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import {
  normalizeBuildParams,
  parseBuildConfig,
  readBuildConfigSync,
  writeExampleConfig,
} from "../src/config";

const CONFIG_PATH = "/tmp/ci-trigger.json";

describe("parseBuildConfig", () => {
  test("accepts snake_case keys", () => {
    const config = parseBuildConfig(
      JSON.stringify({
        jenkins: {
          url: "https://jenkins.example.com",
          username: "builder",
          api_token: "test-secret",
          use_crumb: "true",
        },
        job_name: "docker-build",
        source_dir: "app",
        build_params: {
          BUILD_PLATFORM: "linux/amd64",
          APP_VERSION: 2,
          ENABLE_CACHE: false,
          IGNORED: null,
        },
        build_options: {
          auto_cleanup: false,
          monitor_build: true,
          show_build_logs: false,
        },
      }),
      CONFIG_PATH,
    );

    expect(config).toEqual({
      jenkins: {
        url: "https://jenkins.example.com",
        user: "builder",
        apiToken: "test-secret",
        useCrumb: true,
      },
      jobName: "docker-build",
      sourceDir: "app",
      buildParams: {
        APP_VERSION: "2",
        ENABLE_CACHE: false,
        BUILD_PLATFORMS: "linux/amd64",
      },
      buildOptions: { autoCleanup: false, monitor: true, showLogs: false },
      settings: {},
    });
  });

  test("reads trigger settings", () => {
    const config = parseBuildConfig(
      JSON.stringify({
        settings: {
          strategy: "predictive",
          queueMaxWaitMs: 5000,
          resubmitOnMissingQueueId: false,
        },
        debug: true,
      }),
      CONFIG_PATH,
    );

    expect(config.settings).toEqual({
      strategy: "predictive",
      queueMaxWaitMs: 5000,
      resubmitOnMissingQueueId: false,
    });
    expect(config.debug).toBe(true);
  });

  test("rejects a non-numeric setting", () => {
    expect(() =>
      parseBuildConfig(
        JSON.stringify({ settings: { queueMaxWaitMs: "5s" } }),
        CONFIG_PATH,
      ),
    ).toThrow(`Invalid "settings.queueMaxWaitMs" in ${CONFIG_PATH}.`);
  });

  test("rejects malformed files", () => {
    expect(() => parseBuildConfig("{", CONFIG_PATH)).toThrow(
      "Invalid config file JSON.",
    );
    expect(() => parseBuildConfig("[]", CONFIG_PATH)).toThrow(
      "Invalid config file format.",
    );
  });
});

describe("normalizeBuildParams", () => {
  test("keeps an explicit BUILD_PLATFORMS over the older name", () => {
    expect(
      normalizeBuildParams({
        BUILD_PLATFORM: "linux/arm64",
        BUILD_PLATFORMS: "linux/amd64",
      }),
    ).toEqual({ BUILD_PLATFORMS: "linux/amd64" });
  });
});

describe("config files", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(join(tmpdir(), "ci-trigger-config-"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  test("fails when an explicit config file is missing", () => {
    const missing = join(tempDir, "missing.json");

    expect(() => readBuildConfigSync(missing)).toThrow(
      `Config file not found: ${missing}`,
    );
  });

  test("writes an example config that reads back", async () => {
    const configPath = join(tempDir, "ci-trigger.json");

    await writeExampleConfig(configPath);
    const loaded = readBuildConfigSync(configPath);

    expect(loaded?.path).toBe(configPath);
    expect(loaded?.config.jobName).toBe("docker-build");
    expect(loaded?.config.buildParams.BUILD_PLATFORMS).toBe(
      "linux/amd64,linux/arm64",
    );
    expect(loaded?.config.settings.strategy).toBe("queue-item");
    expect(fs.statSync(configPath).mode & 0o777).toBe(0o600);
  });
});
