#!/usr/bin/env node
/**
 * CLI entry point for ci-trigger.
 * Registers commands (trigger, upload, status, jobs, ping, init-config) and
 * handles argument parsing via yargs.
 */
import yargs, { type Argv } from "yargs";
import { hideBin } from "yargs/helpers";
import { CliError, getScriptName, handleCliError } from "./cli";
import { runInitConfig } from "./commands/init-config";
import { runJobs } from "./commands/jobs";
import {
  parseOptionalDurationMs,
  type SubmitFlags,
} from "./commands/ops-helpers";
import { runPing } from "./commands/ping";
import { runStatus } from "./commands/status";
import { runTrigger, type RepositoryBuildFlags } from "./commands/trigger";
import { runUpload } from "./commands/upload";
import { readBuildConfigSync, type LoadedBuildConfig } from "./config";
import { getDebugDefault, loadEnv, loadTriggerSettings } from "./env";
import { JenkinsClient } from "./jenkins/client";
import { setDebugMode } from "./logger";
import { RESOLUTION_STRATEGIES } from "./trigger/settings";
import packageJson from "../package.json";

const VERSION = packageJson.version;

type GlobalArgs = {
  configFile?: unknown;
  url?: unknown;
  user?: unknown;
  token?: unknown;
  useCrumb?: unknown;
  nonInteractive?: unknown;
};

type SubmitArgs = GlobalArgs & {
  job?: unknown;
  strategy?: unknown;
  queueTimeout?: unknown;
  buildTimeout?: unknown;
  wait?: unknown;
  logs?: unknown;
  verbose?: unknown;
  json?: unknown;
  param?: unknown;
};

async function main(): Promise<void> {
  const parser = yargs(hideBin(process.argv))
    .scriptName(getScriptName())
    .usage("Usage: $0 <command> [options]")
    .option("config-file", {
      type: "string",
      describe: "JSON config file (default: ./ci-trigger.json)",
    })
    .option("url", {
      type: "string",
      describe: "Jenkins base URL (overrides JENKINS_URL)",
    })
    .option("user", {
      type: "string",
      describe: "Jenkins username (overrides JENKINS_USER)",
    })
    .option("token", {
      type: "string",
      alias: "api-token",
      describe: "Jenkins API token (overrides JENKINS_API_TOKEN)",
    })
    .option("use-crumb", {
      type: "boolean",
      describe: "Send a CSRF crumb with POST requests",
    })
    .option("non-interactive", {
      type: "boolean",
      default: false,
      describe: "Disable prompts and fail fast",
    })
    .option("debug", {
      type: "boolean",
      describe: "Log API requests and responses to api.log",
    })
    .middleware((argv) => {
      const rawArgs = hideBin(process.argv);
      const debugExplicitlyPassed = rawArgs.some(
        (arg) => arg === "--debug" || arg === "--no-debug",
      );

      if (debugExplicitlyPassed) {
        setDebugMode(Boolean(argv.debug));
      } else if (argv._[0] !== "init-config") {
        setDebugMode(getDebugDefault(loadConfig(argv)));
      }
    })
    .command(
      "trigger",
      "Build an image from a Git repository and wait for the result",
      (yargsInstance) =>
        withSubmitOptions(yargsInstance)
          .option("git-repo", {
            type: "string",
            describe: "Git repository URL (GIT_REPOSITORY_URL)",
          })
          .option("git-branch", {
            type: "string",
            describe: "Branch to build (GIT_BRANCH)",
          })
          .option("git-credentials", {
            type: "string",
            describe: "Jenkins credentials id for the repository",
          }),
      async (argv) => {
        const context = createContext(argv);
        await runTrigger({
          ...context,
          job: optionalString(argv.job),
          build: {
            ...readBuildFlags(argv),
            gitRepo: optionalString(argv.gitRepo),
            gitBranch: optionalString(argv.gitBranch),
            gitCredentials: optionalString(argv.gitCredentials),
          },
          params: stringList(argv.param),
          flags: readSubmitFlags(argv, context.loaded),
        });
      },
    )
    .command(
      "upload",
      "Upload a local build context as a zip and wait for the result",
      (yargsInstance) =>
        withSubmitOptions(yargsInstance)
          .option("source-dir", {
            type: "string",
            describe: "Directory to zip (must contain a Dockerfile)",
          })
          .option("archive", {
            type: "string",
            describe: "Existing zip file to upload instead of --source-dir",
          })
          .option("cleanup", {
            type: "boolean",
            default: true,
            describe: "Delete the temporary zip afterwards (--no-cleanup keeps it)",
          }),
      async (argv) => {
        const context = createContext(argv);
        await runUpload({
          ...context,
          job: optionalString(argv.job),
          sourceDir: optionalString(argv.sourceDir),
          archive: optionalString(argv.archive),
          cleanup: Boolean(argv.cleanup),
          build: readBuildFlags(argv),
          params: stringList(argv.param),
          flags: readSubmitFlags(argv, context.loaded),
        });
      },
    )
    .command(
      "status",
      "Show whether a job is queued, building, or how its last build ended",
      (yargsInstance) =>
        yargsInstance
          .option("job", {
            type: "string",
            describe: "Job name (folders as a/b)",
          })
          .option("json", {
            type: "boolean",
            default: false,
            describe: "Print machine-readable JSON",
          }),
      async (argv) => {
        const context = createContext(argv);
        const job = optionalString(argv.job) ?? context.config?.jobName;
        if (!job) {
          throw new CliError("Missing required --job.", [
            'Pass --job <name>, or set "jobName" in the config file.',
          ]);
        }
        await runStatus({
          client: context.client,
          job,
          json: Boolean(argv.json),
        });
      },
    )
    .command(
      "jobs",
      "List Jenkins jobs",
      (yargsInstance) =>
        yargsInstance
          .option("search", {
            type: "string",
            describe: "Only show jobs whose name contains this text",
          })
          .option("json", {
            type: "boolean",
            default: false,
            describe: "Print machine-readable JSON",
          }),
      async (argv) => {
        const { client } = createContext(argv);
        await runJobs({
          client,
          search: optionalString(argv.search),
          json: Boolean(argv.json),
        });
      },
    )
    .command(
      "ping",
      "Check the connection and credentials",
      (yargsInstance) =>
        yargsInstance.option("json", {
          type: "boolean",
          default: false,
          describe: "Print machine-readable JSON",
        }),
      async (argv) => {
        const { client, env } = createContext(argv);
        await runPing({
          client,
          baseUrl: env.jenkinsUrl,
          json: Boolean(argv.json),
        });
      },
    )
    .command(
      "init-config",
      "Write an example config file",
      (yargsInstance) =>
        yargsInstance
          .option("path", {
            type: "string",
            describe: "Where to write it (default: ./ci-trigger.json)",
          })
          .option("force", {
            type: "boolean",
            default: false,
            describe: "Overwrite an existing file without asking",
          }),
      async (argv) => {
        await runInitConfig({
          path: optionalString(argv.path) ?? optionalString(argv.configFile),
          force: Boolean(argv.force),
          nonInteractive: Boolean(argv.nonInteractive),
        });
      },
    )
    .version("version", `Show version (${VERSION})`, VERSION)
    .alias("version", "v")
    .demandCommand(1, "Missing command. Use --help to see usage.")
    .strict()
    .help()
    .epilog(
      `Connection settings come from --url/--user/--token, then JENKINS_URL,
JENKINS_USER and JENKINS_API_TOKEN, then the "jenkins" block of the config file.

Exit codes: 0 success, 1 failure, 124 timed out waiting.

Run "$0 <command> --help" for full details.`,
    )
    .fail((message, error) => {
      if (error) {
        throw error;
      }
      throw new CliError(message, ["Run with --help to see usage."]);
    });

  await parser.parseAsync();
}

function withSubmitOptions<T>(yargsInstance: Argv<T>) {
  return yargsInstance
    .option("job", {
      type: "string",
      describe: "Job name (folders as a/b)",
    })
    .option("param", {
      type: "string",
      array: true,
      describe: "Extra job parameter as KEY=VALUE (repeatable)",
    })
    .option("app-name", { type: "string", describe: "APP_NAME" })
    .option("app-version", { type: "string", describe: "APP_VERSION" })
    .option("build-context", { type: "string", describe: "BUILD_CONTEXT" })
    .option("dockerfile", { type: "string", describe: "DOCKERFILE_PATH" })
    .option("tag-strategy", {
      type: "string",
      describe: "IMAGE_TAG_STRATEGY: version-build, latest, timestamp or git-commit",
    })
    .option("platforms", {
      type: "string",
      describe: "BUILD_PLATFORMS, e.g. linux/amd64 or linux/amd64,linux/arm64",
    })
    .option("multi-arch", {
      type: "boolean",
      default: false,
      describe: "Build for linux/amd64 and linux/arm64",
    })
    .option("build-unique-id", {
      type: "string",
      describe: "BUILD_UNIQUE_ID (generated when omitted)",
    })
    .option("disable-cache", {
      type: "boolean",
      default: false,
      describe: "Pass ENABLE_CACHE=false",
    })
    .option("build-args", { type: "string", describe: "BUILD_ARGS" })
    .option("strategy", {
      type: "string",
      choices: RESOLUTION_STRATEGIES,
      describe: "How to find the build started by the submission",
    })
    .option("queue-timeout", {
      type: "string",
      describe: "How long to wait for the build to leave the queue (e.g. 2m)",
    })
    .option("build-timeout", {
      type: "string",
      describe: "How long to wait for the build to finish (e.g. 30m)",
    })
    .option("wait", {
      type: "boolean",
      default: true,
      describe: "Wait for completion (--no-wait returns once started)",
    })
    .option("logs", {
      type: "boolean",
      describe: "Stream console highlights while waiting (--no-logs polls status only)",
    })
    .option("verbose", {
      type: "boolean",
      describe: "Also show Docker build steps from the console",
    })
    .option("json", {
      type: "boolean",
      default: false,
      describe: "Print the result as JSON",
    });
}

function loadConfig(argv: GlobalArgs): LoadedBuildConfig | null {
  return readBuildConfigSync(optionalString(argv.configFile));
}

function createContext(argv: SubmitArgs) {
  const loaded = loadConfig(argv);
  const env = loadEnv(
    {
      url: optionalString(argv.url),
      user: optionalString(argv.user),
      apiToken: optionalString(argv.token),
      useCrumb: typeof argv.useCrumb === "boolean" ? argv.useCrumb : undefined,
    },
    loaded,
  );
  const settings = loadTriggerSettings(
    {
      strategy: optionalString(argv.strategy),
      queueMaxWaitMs: parseOptionalDurationMs(
        optionalString(argv.queueTimeout),
        "queue-timeout",
      ),
      buildTimeoutMs: parseOptionalDurationMs(
        optionalString(argv.buildTimeout),
        "build-timeout",
      ),
    },
    loaded,
  );
  const client = new JenkinsClient({
    baseUrl: env.jenkinsUrl,
    user: env.jenkinsUser,
    apiToken: env.jenkinsApiToken,
    useCrumb: env.useCrumb,
  });
  return { env, client, settings, loaded, config: loaded?.config ?? null };
}

function readSubmitFlags(
  argv: SubmitArgs,
  loaded: LoadedBuildConfig | null,
): SubmitFlags {
  const options = loaded?.config.buildOptions;
  return {
    wait: Boolean(argv.wait) && (options?.monitor ?? true),
    logs:
      typeof argv.logs === "boolean" ? argv.logs : (options?.showLogs ?? true),
    verbose:
      typeof argv.verbose === "boolean"
        ? argv.verbose
        : (options?.verbose ?? false),
    json: Boolean(argv.json),
  };
}

function readBuildFlags(argv: {
  appName?: unknown;
  appVersion?: unknown;
  buildContext?: unknown;
  dockerfile?: unknown;
  tagStrategy?: unknown;
  platforms?: unknown;
  multiArch?: unknown;
  buildUniqueId?: unknown;
  disableCache?: unknown;
  buildArgs?: unknown;
}): RepositoryBuildFlags {
  return {
    appName: optionalString(argv.appName),
    appVersion: optionalString(argv.appVersion),
    buildContext: optionalString(argv.buildContext),
    dockerfile: optionalString(argv.dockerfile),
    tagStrategy: optionalString(argv.tagStrategy),
    platforms: optionalString(argv.platforms),
    multiArch: Boolean(argv.multiArch),
    buildUniqueId: optionalString(argv.buildUniqueId),
    disableCache: Boolean(argv.disableCache),
    buildArgs: optionalString(argv.buildArgs),
  };
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() ? value.trim() : undefined;
}

function stringList(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter((entry): entry is string => typeof entry === "string");
}

main().catch((error) => {
  handleCliError(error);
  process.exitCode = 1;
});
