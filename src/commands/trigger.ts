/**
 * Trigger command implementation.
 * Builds a Docker image from a Git repository on the CI server.
 */
import { CliError } from "../cli";
import type { BuildConfig } from "../config";
import type { TriggerSettings } from "../trigger/settings";
import {
  createTriggerRequest,
  type TriggerApi,
  type TriggerResult,
} from "../trigger/types";
import type { TriggerBuildParams } from "../types/jenkins";
import {
  generateBuildUniqueId,
  parseParamAssignments,
  submitBuild,
  type SubmitFlags,
} from "./ops-helpers";

export const TAG_STRATEGIES = [
  "version-build",
  "latest",
  "timestamp",
  "git-commit",
] as const;

export const MULTI_ARCH_PLATFORMS = "linux/amd64,linux/arm64";

/** Repository build flags; each maps to one job parameter. */
export type RepositoryBuildFlags = {
  gitRepo?: string;
  gitBranch?: string;
  gitCredentials?: string;
  appName?: string;
  appVersion?: string;
  buildContext?: string;
  dockerfile?: string;
  tagStrategy?: string;
  platforms?: string;
  multiArch?: boolean;
  buildUniqueId?: string;
  disableCache?: boolean;
  buildArgs?: string;
};

type TriggerOptions = {
  client: TriggerApi;
  settings: TriggerSettings;
  config: BuildConfig | null;
  job?: string;
  build: RepositoryBuildFlags;
  params: readonly string[];
  flags: SubmitFlags;
};

export async function runTrigger(
  options: TriggerOptions,
): Promise<TriggerResult> {
  const job = resolveJobName(options.job, options.config);
  const parameters = buildRepositoryParams(
    options.config?.buildParams ?? {},
    options.build,
    parseParamAssignments(options.params),
  );
  if (typeof parameters.GIT_REPOSITORY_URL !== "string") {
    throw new CliError("Missing --git-repo.", [
      "Pass --git-repo <url>, or set GIT_REPOSITORY_URL in buildParams of the config file.",
    ]);
  }

  return await submitBuild({
    client: options.client,
    settings: options.settings,
    request: createTriggerRequest({ job, parameters }),
    flags: options.flags,
  });
}

export function resolveJobName(
  job: string | undefined,
  config: BuildConfig | null,
): string {
  const name = job?.trim() || config?.jobName;
  if (!name) {
    throw new CliError("Missing required --job.", [
      'Pass --job <name>, or set "jobName" in the config file.',
    ]);
  }
  return name;
}

/**
 * Layers config defaults, then repository flags, then explicit --param
 * assignments. BUILD_UNIQUE_ID is generated when nothing supplies one.
 */
export function buildRepositoryParams(
  defaults: TriggerBuildParams,
  flags: RepositoryBuildFlags,
  overrides: TriggerBuildParams,
  createUniqueId: () => string = generateBuildUniqueId,
): TriggerBuildParams {
  if (
    flags.tagStrategy !== undefined &&
    !TAG_STRATEGIES.some((strategy) => strategy === flags.tagStrategy)
  ) {
    throw new CliError(`Invalid --tag-strategy value "${flags.tagStrategy}".`, [
      `Use one of: ${TAG_STRATEGIES.join(", ")}.`,
    ]);
  }

  const fromFlags: TriggerBuildParams = {};
  const assign = (name: string, value: string | boolean | undefined) => {
    if (value !== undefined && value !== "") {
      fromFlags[name] = value;
    }
  };
  assign("GIT_REPOSITORY_URL", flags.gitRepo);
  assign("GIT_BRANCH", flags.gitBranch);
  assign("GIT_CREDENTIALS_ID", flags.gitCredentials);
  assign("APP_NAME", flags.appName);
  assign("APP_VERSION", flags.appVersion);
  assign("BUILD_CONTEXT", flags.buildContext);
  assign("DOCKERFILE_PATH", flags.dockerfile);
  assign("IMAGE_TAG_STRATEGY", flags.tagStrategy);
  assign(
    "BUILD_PLATFORMS",
    flags.multiArch ? MULTI_ARCH_PLATFORMS : flags.platforms,
  );
  assign("BUILD_UNIQUE_ID", flags.buildUniqueId);
  assign("BUILD_ARGS", flags.buildArgs);
  if (flags.disableCache) {
    fromFlags.ENABLE_CACHE = false;
  }

  const params: TriggerBuildParams = {
    ...defaults,
    ...fromFlags,
    ...overrides,
  };
  if (!params.BUILD_UNIQUE_ID) {
    params.BUILD_UNIQUE_ID = createUniqueId();
  }
  return params;
}
