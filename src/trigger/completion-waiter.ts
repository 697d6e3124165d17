import { setTimeout as delay } from "node:timers/promises";
import { describeError } from "../cli";
import { formatCompactStatus } from "../status-format";
import type { BuildIdentifier, BuildStatus } from "../types/jenkins";
import { annotateConsoleText } from "./console-annotations";
import { ConsoleTailer } from "./console-tailer";
import type { TriggerSettings } from "./settings";
import type {
  BuildClassification,
  Clock,
  Reporter,
  Sleep,
  TriggerApi,
  WaitOutcome,
} from "./types";

type WaiterApi = Pick<TriggerApi, "getBuildStatus" | "getConsoleText">;

type ConsoleSession = {
  tailer: ConsoleTailer;
  seen: Set<string>;
  pending: string;
};

export type WaitOptions = {
  streamLogs: boolean;
  verbose: boolean;
};

export function classifyResult(result: string | null): BuildClassification {
  switch (result) {
    case "SUCCESS":
    case "FAILURE":
    case "ABORTED":
    case "UNSTABLE":
    case "NOT_BUILT":
      return result;
    default:
      return "UNKNOWN";
  }
}

/**
 * Polls a running build until it stops. The deadline applies in both the
 * log-streaming and status-only modes and is checked between polls.
 */
export class CompletionWaiter {
  private readonly client: WaiterApi;
  private readonly settings: TriggerSettings;
  private readonly reporter: Reporter;
  private readonly sleep: Sleep;
  private readonly now: Clock;

  constructor(options: {
    client: WaiterApi;
    settings: TriggerSettings;
    reporter: Reporter;
    sleep?: Sleep;
    now?: Clock;
  }) {
    this.client = options.client;
    this.settings = options.settings;
    this.reporter = options.reporter;
    this.sleep = options.sleep ?? ((ms) => delay(ms));
    this.now = options.now ?? Date.now;
  }

  async waitForCompletion(
    build: BuildIdentifier,
    options: WaitOptions,
  ): Promise<WaitOutcome> {
    const intervalMs = options.streamLogs
      ? this.settings.logPollIntervalMs
      : this.settings.statusPollIntervalMs;
    const session: ConsoleSession | null = options.streamLogs
      ? {
          tailer: new ConsoleTailer({ client: this.client, build }),
          seen: new Set<string>(),
          pending: "",
        }
      : null;
    const startedAt = this.now();
    let last: BuildStatus | undefined;
    let stage: string | undefined;

    while (true) {
      const elapsedMs = this.now() - startedAt;
      if (elapsedMs >= this.settings.buildTimeoutMs) {
        return {
          status: "timeout",
          build,
          last: last ? Object.freeze({ ...last }) : undefined,
          elapsedMs,
        };
      }

      let status: BuildStatus;
      try {
        status = await this.client.getBuildStatus(build);
      } catch (error) {
        this.reporter.warn(
          `Could not read status of ${build.job} #${build.number}: ${describeError(error)}`,
        );
        await this.sleep(intervalMs);
        continue;
      }
      last = status;

      if (session) {
        const latestStage = await this.flushConsole(
          session,
          options.verbose,
          !status.building,
        );
        stage = latestStage ?? stage;
      }

      if (!status.building) {
        const final = Object.freeze({ ...status });
        return {
          status: "completed",
          build,
          final,
          classification: classifyResult(final.result),
        };
      }

      this.reporter.progress(
        `${build.job}: ${formatCompactStatus({
          buildNumber: build.number,
          result: "RUNNING",
          status: {
            building: true,
            durationMs: elapsedMs,
            estimatedDurationMs: status.estimatedDurationMs,
            stage: stage ? { name: stage } : undefined,
          },
        })}`,
      );
      await this.sleep(intervalMs);
    }
  }

  /**
   * Annotates the complete lines of the new text and returns the most recent
   * stage name among them. An unterminated last line waits for the next poll
   * unless the build has finished.
   */
  private async flushConsole(
    session: ConsoleSession,
    verbose: boolean,
    finished: boolean,
  ): Promise<string | undefined> {
    const { tailer } = session;
    let chunk: string;
    try {
      chunk = await tailer.poll();
    } catch (error) {
      this.reporter.warn(
        `Could not read console of ${tailer.build.job} #${tailer.build.number}: ${describeError(error)}`,
      );
      chunk = "";
      if (!finished) {
        return undefined;
      }
    }
    let text = session.pending + chunk;
    session.pending = "";
    if (!finished) {
      const end = text.lastIndexOf("\n") + 1;
      session.pending = text.slice(end);
      text = text.slice(0, end);
    }
    let stage: string | undefined;
    const seen = session.seen;
    for (const annotation of annotateConsoleText(text, { verbose, seen })) {
      if (annotation.kind === "stage-start" || annotation.kind === "stage") {
        stage = annotation.text;
      }
      this.reporter.annotation(annotation);
    }
    return stage;
  }
}
