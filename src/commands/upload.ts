/**
 * Upload command implementation.
 * Zips a local build context (or takes a ready archive) and submits it as
 * the BUILD_ARCHIVE file parameter.
 */
import path from "node:path";
import { CliError, printOk } from "../cli";
import {
  createBuildArchive,
  removeBuildArchive,
  type BuildArchive,
} from "../archive";
import type { BuildConfig } from "../config";
import type { TriggerSettings } from "../trigger/settings";
import {
  createTriggerRequest,
  type TriggerApi,
  type TriggerResult,
} from "../trigger/types";
import type { BuildArtifact } from "../types/jenkins";
import {
  parseParamAssignments,
  submitBuild,
  type SubmitFlags,
} from "./ops-helpers";
import {
  buildRepositoryParams,
  resolveJobName,
  type RepositoryBuildFlags,
} from "./trigger";

export const ARCHIVE_FIELD = "BUILD_ARCHIVE";

type UploadOptions = {
  client: TriggerApi;
  settings: TriggerSettings;
  config: BuildConfig | null;
  job?: string;
  sourceDir?: string;
  archive?: string;
  cleanup: boolean;
  build: RepositoryBuildFlags;
  params: readonly string[];
  flags: SubmitFlags;
};

export async function runUpload(
  options: UploadOptions,
): Promise<TriggerResult> {
  if (options.sourceDir && options.archive) {
    throw new CliError("Provide either --source-dir or --archive, not both.", [
      "Remove one of the flags and try again.",
    ]);
  }
  const job = resolveJobName(options.job, options.config);
  const sourceDir = options.archive
    ? undefined
    : (options.sourceDir ?? options.config?.sourceDir);

  const defaults = { ...(options.config?.buildParams ?? {}) };
  if (sourceDir && defaults.BUILD_CONTEXT === undefined) {
    defaults.BUILD_CONTEXT = path.basename(path.resolve(sourceDir));
  }
  const parameters = buildRepositoryParams(
    defaults,
    options.build,
    parseParamAssignments(options.params),
  );

  let created: BuildArchive | undefined;
  let artifact: BuildArtifact;
  if (options.archive) {
    artifact = {
      path: path.resolve(options.archive),
      fileName: path.basename(options.archive),
      fieldName: ARCHIVE_FIELD,
    };
  } else if (sourceDir) {
    created = await createBuildArchive({
      sourceDir,
      dockerfile: options.build.dockerfile,
    });
    if (!options.flags.json) {
      printOk(`Created ${created.fileName} (${created.bytes} bytes).`);
    }
    artifact = {
      path: created.path,
      fileName: created.fileName,
      fieldName: ARCHIVE_FIELD,
    };
  } else {
    throw new CliError("Missing --source-dir.", [
      'Pass --source-dir <dir> or --archive <file.zip>, or set "sourceDir" in the config file.',
    ]);
  }

  try {
    return await submitBuild({
      client: options.client,
      settings: options.settings,
      request: createTriggerRequest({ job, parameters, artifact }),
      flags: options.flags,
    });
  } finally {
    const autoCleanup =
      options.cleanup && (options.config?.buildOptions.autoCleanup ?? true);
    if (created && autoCleanup) {
      await removeBuildArchive(created).catch(() => {
        // Best-effort cleanup of the temporary archive.
      });
    }
  }
}
