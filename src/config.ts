import fs from "node:fs";
import { writeFile } from "node:fs/promises";
import path from "node:path";
import { CliError } from "./cli";
import {
  DEFAULT_TRIGGER_SETTINGS,
  parseStrategy,
  type TriggerSettings,
} from "./trigger/settings";
import type { TriggerBuildParams } from "./types/jenkins";

export const DEFAULT_CONFIG_FILE = "ci-trigger.json";

export type JenkinsConnectionConfig = {
  url?: string;
  user?: string;
  apiToken?: string;
  useCrumb?: boolean;
};

export type BuildOptionsConfig = {
  autoCleanup?: boolean;
  monitor?: boolean;
  showLogs?: boolean;
  verbose?: boolean;
};

export type BuildConfig = {
  jenkins: JenkinsConnectionConfig;
  jobName?: string;
  sourceDir?: string;
  buildParams: TriggerBuildParams;
  buildOptions: BuildOptionsConfig;
  settings: Partial<TriggerSettings>;
  debug?: boolean;
};

export type LoadedBuildConfig = {
  path: string;
  config: BuildConfig;
};

export function resolveConfigPath(configFile: string | undefined): string {
  return path.resolve(
    normalizeOptionalString(configFile) ?? DEFAULT_CONFIG_FILE,
  );
}

/**
 * Reads the JSON build config. A missing file is only an error when the
 * caller named it explicitly.
 */
export function readBuildConfigSync(
  configFile: string | undefined,
): LoadedBuildConfig | null {
  const configPath = resolveConfigPath(configFile);
  let raw: string;
  try {
    raw = fs.readFileSync(configPath, "utf8");
  } catch (error) {
    if (isNotFound(error) && !configFile) {
      return null;
    }
    if (isNotFound(error)) {
      throw new CliError(`Config file not found: ${configPath}`, [
        "Run `ci-trigger init-config` to create an example config.",
      ]);
    }
    throw new CliError("Unable to read config file.", [
      `Check permissions for ${configPath}.`,
    ]);
  }
  return { path: configPath, config: parseBuildConfig(raw, configPath) };
}

export function parseBuildConfig(
  contents: string,
  configPath: string,
): BuildConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch {
    throw new CliError("Invalid config file JSON.", [
      `Fix the JSON in ${configPath}.`,
    ]);
  }

  const record = asRecord(parsed);
  if (!record) {
    throw new CliError("Invalid config file format.", [
      `Expected a JSON object in ${configPath}.`,
    ]);
  }

  const jenkins = asRecord(record.jenkins) ?? {};
  const options = asRecord(record.buildOptions ?? record.build_options) ?? {};
  const params = asRecord(record.buildParams ?? record.build_params) ?? {};
  const settings = asRecord(record.settings) ?? {};
  const useCrumb = firstBoolean(jenkins, ["useCrumb", "use_crumb"]);
  const debug = parseBooleanLike(record.debug);

  return {
    jenkins: {
      url: pickString(jenkins, ["url", "jenkinsUrl"]),
      user: pickString(jenkins, ["user", "username", "jenkinsUser"]),
      apiToken: pickString(jenkins, ["apiToken", "api_token", "token"]),
      ...(useCrumb !== undefined ? { useCrumb } : {}),
    },
    jobName: pickString(record, ["jobName", "job_name"]),
    sourceDir: pickString(record, ["sourceDir", "source_dir"]),
    buildParams: normalizeBuildParams(params),
    buildOptions: {
      autoCleanup: firstBoolean(options, ["autoCleanup", "auto_cleanup"]),
      monitor: firstBoolean(options, ["monitor", "monitor_build"]),
      showLogs: firstBoolean(options, ["showLogs", "show_build_logs"]),
      verbose: firstBoolean(options, ["verbose"]),
    },
    settings: parseSettings(settings, configPath),
    ...(debug !== undefined ? { debug } : {}),
  };
}

/**
 * String and boolean values pass through; numbers are stringified.
 * `BUILD_PLATFORM` is accepted as the older name of `BUILD_PLATFORMS`.
 */
export function normalizeBuildParams(
  raw: Record<string, unknown>,
): TriggerBuildParams {
  const params: TriggerBuildParams = {};
  for (const [name, value] of Object.entries(raw)) {
    if (typeof value === "string" || typeof value === "boolean") {
      params[name] = value;
    } else if (typeof value === "number" && Number.isFinite(value)) {
      params[name] = String(value);
    }
  }
  const legacyPlatform = params.BUILD_PLATFORM;
  if (legacyPlatform !== undefined) {
    if (params.BUILD_PLATFORMS === undefined) {
      params.BUILD_PLATFORMS = legacyPlatform;
    }
    delete params.BUILD_PLATFORM;
  }
  return params;
}

export function createExampleConfig(): Record<string, unknown> {
  return {
    jenkins: {
      url: "http://localhost:8080",
      user: "admin",
      apiToken: "your-jenkins-api-token",
      useCrumb: false,
    },
    jobName: "docker-build",
    sourceDir: "app",
    buildParams: {
      APP_NAME: "example-app",
      APP_VERSION: "1.0.0",
      BUILD_CONTEXT: ".",
      DOCKERFILE_PATH: "Dockerfile",
      IMAGE_TAG_STRATEGY: "version-build",
      BUILD_PLATFORMS: "linux/amd64,linux/arm64",
      ENABLE_CACHE: true,
    },
    buildOptions: {
      autoCleanup: true,
      monitor: true,
      showLogs: true,
      verbose: false,
    },
    settings: {
      strategy: DEFAULT_TRIGGER_SETTINGS.strategy,
      queueMaxWaitMs: DEFAULT_TRIGGER_SETTINGS.queueMaxWaitMs,
      buildTimeoutMs: DEFAULT_TRIGGER_SETTINGS.buildTimeoutMs,
    },
  };
}

export async function writeExampleConfig(configPath: string): Promise<string> {
  const contents = `${JSON.stringify(createExampleConfig(), null, 2)}\n`;
  await writeFile(configPath, contents, { encoding: "utf8", mode: 0o600 });
  return configPath;
}

const NUMERIC_SETTINGS = [
  "queuePollIntervalMs",
  "queueMaxWaitMs",
  "queueErrorBackoffMs",
  "queueNoticeEvery",
  "logPollIntervalMs",
  "statusPollIntervalMs",
  "buildTimeoutMs",
  "predictiveRetries",
  "predictiveRetryDelayMs",
] as const;

function parseSettings(
  record: Record<string, unknown>,
  configPath: string,
): Partial<TriggerSettings> {
  const settings: Partial<TriggerSettings> = {};
  const strategy = parseStrategy(
    pickString(record, ["strategy"]),
    `"settings.strategy" in ${configPath}`,
  );
  if (strategy) {
    settings.strategy = strategy;
  }
  for (const key of NUMERIC_SETTINGS) {
    const value = record[key];
    if (value === undefined) {
      continue;
    }
    if (typeof value !== "number" || !Number.isFinite(value)) {
      throw new CliError(`Invalid "settings.${key}" in ${configPath}.`, [
        "Use a number of milliseconds.",
      ]);
    }
    settings[key] = value;
  }
  const resubmit = parseBooleanLike(record.resubmitOnMissingQueueId);
  if (resubmit !== undefined) {
    settings.resubmitOnMissingQueueId = resubmit;
  }
  return settings;
}

function asRecord(value: unknown): Record<string, unknown> | undefined {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    return undefined;
  }
  return Object.fromEntries(Object.entries(value));
}

function isNotFound(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ENOENT"
  );
}

function pickString(
  record: Record<string, unknown>,
  keys: string[],
): string | undefined {
  for (const key of keys) {
    const value = normalizeOptionalString(record[key]);
    if (value) {
      return value;
    }
  }
  return undefined;
}

function firstBoolean(
  record: Record<string, unknown>,
  keys: string[],
): boolean | undefined {
  for (const key of keys) {
    const value = parseBooleanLike(record[key]);
    if (value !== undefined) {
      return value;
    }
  }
  return undefined;
}

export function parseBooleanLike(value: unknown): boolean | undefined {
  if (typeof value === "boolean") {
    return value;
  }
  if (typeof value !== "string") {
    return undefined;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "true" || normalized === "1") {
    return true;
  }
  if (normalized === "false" || normalized === "0") {
    return false;
  }
  return undefined;
}

export function normalizeOptionalString(value: unknown): string | undefined {
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed ? trimmed : undefined;
}
