/**
 * Submit a build and follow it to a final, structured result.
 *
 * Every failure is folded into a TriggerResult; callers never see a thrown
 * error from {@link TriggerOrchestrator.submitAndWait}.
 */
import { constants } from "node:fs";
import { access, stat } from "node:fs/promises";
import { describeError } from "../cli";
import { formatDuration } from "../status-format";
import type {
  BuildIdentifier,
  BuildStatus,
  TriggerBuildResult,
} from "../types/jenkins";
import { CompletionWaiter } from "./completion-waiter";
import { extractImageInfo } from "./console-annotations";
import { QueueResolver } from "./queue-resolver";
import type { TriggerSettings } from "./settings";
import {
  DEFAULT_TRIGGER_OPTIONS,
  type Clock,
  type QueueHandle,
  type Reporter,
  type Sleep,
  type TriggerApi,
  type TriggerOptions,
  type TriggerRequest,
  type TriggerResult,
  type TriggerStatus,
} from "./types";

type ResultFields = Omit<
  TriggerResult,
  "success" | "status" | "message" | "job"
>;

export class TriggerOrchestrator {
  private readonly client: TriggerApi;
  private readonly settings: TriggerSettings;
  private readonly reporter: Reporter;
  private readonly resolver: QueueResolver;
  private readonly waiter: CompletionWaiter;

  constructor(options: {
    client: TriggerApi;
    settings: TriggerSettings;
    reporter: Reporter;
    sleep?: Sleep;
    now?: Clock;
  }) {
    this.client = options.client;
    this.settings = options.settings;
    this.reporter = options.reporter;
    this.resolver = new QueueResolver(options);
    this.waiter = new CompletionWaiter(options);
  }

  async submitAndWait(
    request: TriggerRequest,
    options: Partial<TriggerOptions> = {},
  ): Promise<TriggerResult> {
    const opts: TriggerOptions = { ...DEFAULT_TRIGGER_OPTIONS, ...options };
    const job = request.job;
    const artifactPath = request.artifact?.path;

    if (request.artifact) {
      const problem = await checkReadableFile(request.artifact.path);
      if (problem) {
        return finish(job, "PRECONDITION_FAILED", problem, { artifactPath });
      }
    }

    let exists: boolean;
    try {
      exists = await this.client.jobExists(job);
    } catch (error) {
      return finish(
        job,
        "SUBMIT_FAILED",
        `Could not check job "${job}": ${describeError(error)}`,
        { artifactPath },
      );
    }
    if (!exists) {
      return finish(job, "NOT_FOUND", `Job "${job}" was not found.`, {
        artifactPath,
      });
    }

    const baseline = await this.readBaseline(job);

    let submission: TriggerBuildResult;
    try {
      this.reporter.progress(
        request.artifact
          ? `Uploading ${request.artifact.fileName} to ${job}...`
          : `Triggering ${job}...`,
      );
      submission = request.artifact
        ? await this.client.uploadBuild(
            job,
            request.parameters,
            request.artifact,
          )
        : await this.client.triggerBuild(job, request.parameters);
    } catch (error) {
      return finish(
        job,
        "SUBMIT_FAILED",
        `Failed to submit build for "${job}": ${describeError(error)}`,
        { artifactPath },
      );
    }

    const handle = await this.toQueueHandle(request, submission, baseline);
    const queueId = handle.kind === "queue-item" ? handle.queueId : undefined;
    if (queueId !== undefined) {
      this.reporter.info(`Queued ${job} as queue item #${queueId}.`);
    }

    const resolution = await this.resolver.resolve(handle);
    if (resolution.status === "unresolved") {
      return finish(
        job,
        resolution.reason === "timeout" ? "TIMEOUT" : "UNRESOLVED",
        resolution.message,
        { queueId, artifactPath },
      );
    }

    const build: Readonly<BuildIdentifier> = Object.freeze({
      ...resolution.build,
    });
    this.reporter.info(`Build #${build.number} started for ${job}.`);
    if (!opts.wait) {
      return finish(job, "STARTED", `Build #${build.number} started.`, {
        queueId,
        buildNumber: build.number,
        buildUrl: resolution.buildUrl,
        artifactPath,
      });
    }

    const outcome = await this.waiter.waitForCompletion(build, {
      streamLogs: opts.streamLogs,
      verbose: opts.verbose,
    });
    if (outcome.status === "timeout") {
      return finish(
        job,
        "TIMEOUT",
        `Build #${build.number} was still running after ${formatDuration(
          outcome.elapsedMs,
        )}.`,
        {
          queueId,
          buildNumber: build.number,
          buildUrl: outcome.last?.url ?? resolution.buildUrl,
          artifactPath,
        },
      );
    }

    const final: Readonly<BuildStatus> = outcome.final;
    const fields: ResultFields = {
      queueId,
      buildNumber: build.number,
      buildUrl: final.url ?? resolution.buildUrl,
      durationMs: final.durationMs,
      timestampMs: final.timestampMs,
      artifactPath,
      ...(opts.captureConsole ? await this.captureConsole(build) : {}),
    };
    const message =
      outcome.classification === "SUCCESS"
        ? `Build #${build.number} succeeded in ${formatDuration(final.durationMs)}.`
        : `Build #${build.number} finished with ${outcome.classification} after ${formatDuration(
            final.durationMs,
          )}.`;
    return finish(job, outcome.classification, message, fields);
  }

  /**
   * Queue-item strategy falls back to one parameters-only re-submission,
   * then to prediction from the pre-submission baseline.
   */
  private async toQueueHandle(
    request: TriggerRequest,
    submission: TriggerBuildResult,
    baseline: number | undefined,
  ): Promise<QueueHandle> {
    const job = request.job;
    const expectedBuildNumber = (baseline ?? 0) + 1;
    const predicted: QueueHandle = {
      kind: "predicted",
      job,
      expectedBuildNumber,
    };
    if (this.settings.strategy === "predictive") {
      return predicted;
    }
    if (submission.queueId !== undefined) {
      return { kind: "queue-item", job, queueId: submission.queueId };
    }

    this.reporter.warn(
      `No queue item in the response for ${job}${
        submission.queueUrl ? ` (Location: ${submission.queueUrl})` : ""
      }.`,
    );
    if (this.settings.resubmitOnMissingQueueId && !request.artifact) {
      try {
        const retry = await this.client.triggerBuild(job, request.parameters);
        if (retry.queueId !== undefined) {
          return { kind: "queue-item", job, queueId: retry.queueId };
        }
      } catch (error) {
        this.reporter.warn(`Re-submission failed: ${describeError(error)}`);
      }
    }
    this.reporter.warn(
      `Falling back to predicting build #${expectedBuildNumber}.`,
    );
    return predicted;
  }

  private async readBaseline(job: string): Promise<number | undefined> {
    try {
      return await this.client.getLastBuildNumber(job);
    } catch (error) {
      this.reporter.warn(
        `Could not read the last build of ${job}: ${describeError(error)}`,
      );
      return undefined;
    }
  }

  private async captureConsole(
    build: BuildIdentifier,
  ): Promise<Pick<ResultFields, "consoleText" | "imageInfo">> {
    try {
      const consoleText = await this.client.getConsoleText(build);
      return {
        consoleText,
        imageInfo: Object.freeze(extractImageInfo(consoleText)),
      };
    } catch (error) {
      this.reporter.warn(
        `Could not capture console of #${build.number}: ${describeError(error)}`,
      );
      return {};
    }
  }
}

async function checkReadableFile(filePath: string): Promise<string | null> {
  try {
    await access(filePath, constants.R_OK);
    const info = await stat(filePath);
    if (!info.isFile()) {
      return `Build archive is not a file: ${filePath}`;
    }
    return null;
  } catch {
    return `Build archive not found or unreadable: ${filePath}`;
  }
}

function finish(
  job: string,
  status: TriggerStatus,
  message: string,
  fields: ResultFields = {},
): TriggerResult {
  const result: TriggerResult = {
    success: status === "SUCCESS" || status === "STARTED",
    status,
    message,
    job,
    ...withoutUndefined(fields),
  };
  return Object.freeze(result);
}

function withoutUndefined(fields: ResultFields): ResultFields {
  const result: ResultFields = {};
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) {
      Object.assign(result, { [key]: value });
    }
  }
  return result;
}
