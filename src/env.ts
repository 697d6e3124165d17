/**
 * Connection and settings loader.
 * Each value comes from the CLI flag, then the environment, then the
 * JSON config file.
 */
import { CliError } from "./cli";
import {
  DEFAULT_CONFIG_FILE,
  normalizeOptionalString,
  parseBooleanLike,
  type LoadedBuildConfig,
} from "./config";
import { ENV_KEYS } from "./env-keys";
import {
  parseStrategy,
  resolveTriggerSettings,
  type ResolutionStrategy,
  type TriggerSettings,
} from "./trigger/settings";

export type LoadEnvOptions = {
  url?: string;
  user?: string;
  apiToken?: string;
  useCrumb?: boolean;
};

/** Jenkins connection configuration. */
export type EnvConfig = {
  jenkinsUrl: string;
  jenkinsUser: string;
  jenkinsApiToken: string;
  /** Whether Jenkins CSRF crumb should be used for POST requests. */
  useCrumb: boolean;
};

export function normalizeUrl(rawUrl: string): string {
  const trimmed = rawUrl.trim();
  let url: URL;
  try {
    url = new URL(trimmed);
  } catch {
    throw new CliError(`Invalid ${ENV_KEYS.JENKINS_URL}.`, [
      "Use a full URL like https://jenkins.example.com.",
    ]);
  }

  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new CliError(`Invalid ${ENV_KEYS.JENKINS_URL} protocol.`, [
      `Use http:// or https:// for ${ENV_KEYS.JENKINS_URL}.`,
    ]);
  }

  return url.toString().replace(/\/+$/, "");
}

export function loadEnv(
  options: LoadEnvOptions = {},
  loaded: LoadedBuildConfig | null = null,
): EnvConfig {
  const file = loaded?.config.jenkins;
  const configLabel = loaded?.path ?? DEFAULT_CONFIG_FILE;

  const rawUrl = firstValue(
    options.url,
    process.env[ENV_KEYS.JENKINS_URL],
    file?.url,
  );
  const rawUser = firstValue(
    options.user,
    process.env[ENV_KEYS.JENKINS_USER],
    file?.user,
  );
  const rawToken = firstValue(
    options.apiToken,
    process.env[ENV_KEYS.JENKINS_API_TOKEN],
    file?.apiToken,
  );

  if (!rawUrl) {
    throw new CliError(`Missing ${ENV_KEYS.JENKINS_URL}.`, [
      `Pass --url or set ${ENV_KEYS.JENKINS_URL} to your Jenkins base URL (e.g., https://jenkins.example.com).`,
      `Or add "jenkins.url" to ${configLabel}.`,
    ]);
  }

  if (!rawUser) {
    throw new CliError(`Missing ${ENV_KEYS.JENKINS_USER}.`, [
      `Pass --user or set ${ENV_KEYS.JENKINS_USER} to your Jenkins username or service account.`,
      `Or add "jenkins.user" to ${configLabel}.`,
    ]);
  }

  if (!rawToken) {
    throw new CliError(`Missing ${ENV_KEYS.JENKINS_API_TOKEN}.`, [
      `Pass --token or set ${ENV_KEYS.JENKINS_API_TOKEN} to your Jenkins API token.`,
      `Or add "jenkins.apiToken" to ${configLabel}.`,
    ]);
  }

  return {
    jenkinsUrl: normalizeUrl(rawUrl),
    jenkinsUser: rawUser,
    jenkinsApiToken: rawToken,
    useCrumb:
      options.useCrumb ??
      parseBooleanLike(process.env[ENV_KEYS.JENKINS_USE_CRUMB]) ??
      file?.useCrumb ??
      false,
  };
}

/**
 * Debug default when --debug is not passed: JENKINS_DEBUG ("true"/"1"),
 * then the config file's "debug" flag.
 */
export function getDebugDefault(loaded: LoadedBuildConfig | null): boolean {
  const fromEnv = parseBooleanLike(process.env[ENV_KEYS.JENKINS_DEBUG]);
  if (fromEnv !== undefined) {
    return fromEnv;
  }
  return loaded?.config.debug ?? false;
}

export type SettingsOverrides = {
  strategy?: string;
  queueMaxWaitMs?: number;
  buildTimeoutMs?: number;
};

export function loadTriggerSettings(
  overrides: SettingsOverrides,
  loaded: LoadedBuildConfig | null,
): TriggerSettings {
  const fileSettings = loaded?.config.settings ?? {};
  const strategy: ResolutionStrategy | undefined =
    parseStrategy(overrides.strategy, "--strategy") ??
    parseStrategy(
      process.env[ENV_KEYS.JENKINS_RESOLVE_STRATEGY],
      ENV_KEYS.JENKINS_RESOLVE_STRATEGY,
    ) ??
    fileSettings.strategy;

  return resolveTriggerSettings({
    ...fileSettings,
    strategy,
    queueMaxWaitMs: overrides.queueMaxWaitMs ?? fileSettings.queueMaxWaitMs,
    buildTimeoutMs: overrides.buildTimeoutMs ?? fileSettings.buildTimeoutMs,
  });
}

function firstValue(
  ...values: Array<string | undefined>
): string | undefined {
  for (const value of values) {
    const normalized = normalizeOptionalString(value);
    if (normalized) {
      return normalized;
    }
  }
  return undefined;
}
