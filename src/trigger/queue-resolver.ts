/**
 * Maps a queue handle to the build it became.
 *
 * The queue-item strategy follows the authoritative queue resource. The
 * predictive strategy guesses "last build + 1" and is racy: two concurrent
 * submissions to the same job can both settle on the same running build.
 */
import { setTimeout as delay } from "node:timers/promises";
import { describeError } from "../cli";
import type { BuildIdentifier, QueueItemState } from "../types/jenkins";
import { queuePollBudget, type TriggerSettings } from "./settings";
import type {
  QueueHandle,
  Reporter,
  ResolutionOutcome,
  Sleep,
  TriggerApi,
} from "./types";

type ResolverApi = Pick<
  TriggerApi,
  "getQueueItem" | "isJobQueued" | "getLastBuildNumber" | "getBuildStatus"
>;

export class QueueResolver {
  private readonly client: ResolverApi;
  private readonly settings: TriggerSettings;
  private readonly reporter: Reporter;
  private readonly sleep: Sleep;

  constructor(options: {
    client: ResolverApi;
    settings: TriggerSettings;
    reporter: Reporter;
    sleep?: Sleep;
  }) {
    this.client = options.client;
    this.settings = options.settings;
    this.reporter = options.reporter;
    this.sleep = options.sleep ?? ((ms) => delay(ms));
  }

  async resolve(handle: QueueHandle): Promise<ResolutionOutcome> {
    if (handle.kind === "queue-item") {
      return await this.resolveQueueItem(handle.job, handle.queueId);
    }
    return await this.resolvePredictive(
      handle.job,
      handle.expectedBuildNumber,
    );
  }

  async resolveQueueItem(
    job: string,
    queueId: number,
  ): Promise<ResolutionOutcome> {
    const budget = queuePollBudget(this.settings);
    for (let poll = 0; poll < budget; poll += 1) {
      let state: QueueItemState;
      try {
        state = await this.client.getQueueItem(queueId);
      } catch (error) {
        this.reporter.warn(
          `Queue item #${queueId} could not be read: ${describeError(error)}`,
        );
        await this.sleep(this.settings.queueErrorBackoffMs);
        continue;
      }

      switch (state.state) {
        case "started":
          if (typeof state.buildNumber === "number" && state.buildNumber > 0) {
            return {
              status: "resolved",
              build: { job, number: state.buildNumber },
              buildUrl: state.buildUrl,
            };
          }
          break;
        case "missing":
          return {
            status: "unresolved",
            reason: "expired",
            message: `Queue item #${queueId} no longer exists; it may have expired after the build started.`,
          };
        case "cancelled":
          return {
            status: "unresolved",
            reason: "cancelled",
            message: `Queue item #${queueId} was cancelled before a build started.`,
          };
        case "queued":
          this.noticeQueued(poll, state.why);
          break;
      }
      await this.sleep(this.settings.queuePollIntervalMs);
    }

    return {
      status: "unresolved",
      reason: "timeout",
      message: `Queue item #${queueId} did not start within ${formatSeconds(
        this.settings.queueMaxWaitMs,
      )}.`,
    };
  }

  /**
   * Predictive resolution with retries. Each retry re-reads the job's last
   * build to recompute the expected number, never going below the first
   * expectation.
   */
  async resolvePredictive(
    job: string,
    expectedBuildNumber: number,
  ): Promise<ResolutionOutcome> {
    let expected = expectedBuildNumber;
    let outcome = await this.predictOnce(job, expected);
    for (
      let retry = 1;
      retry <= this.settings.predictiveRetries && outcome.status !== "resolved";
      retry += 1
    ) {
      this.reporter.info(
        `Build for ${job} not found yet; retry ${retry}/${this.settings.predictiveRetries}.`,
      );
      await this.sleep(this.settings.predictiveRetryDelayMs);
      expected = Math.max(expectedBuildNumber, await this.recompute(job));
      outcome = await this.predictOnce(job, expected);
    }
    return outcome;
  }

  private async predictOnce(
    job: string,
    expected: number,
  ): Promise<ResolutionOutcome> {
    const budget = queuePollBudget(this.settings);
    for (let poll = 0; poll < budget; poll += 1) {
      try {
        if (await this.client.isJobQueued(job)) {
          this.noticeQueued(poll);
          await this.sleep(this.settings.queuePollIntervalMs);
          continue;
        }
        const current = await this.client.getLastBuildNumber(job);
        if (current !== undefined && current >= expected) {
          const build: BuildIdentifier = { job, number: current };
          const status = await this.client.getBuildStatus(build);
          if (status.building) {
            return { status: "resolved", build, buildUrl: status.url };
          }
        }
      } catch (error) {
        this.reporter.warn(
          `Could not check build start for ${job}: ${describeError(error)}`,
        );
        await this.sleep(this.settings.queueErrorBackoffMs);
        continue;
      }
      await this.sleep(this.settings.queuePollIntervalMs);
    }
    return {
      status: "unresolved",
      reason: "timeout",
      message: `No running build #${expected} or later appeared for ${job} within ${formatSeconds(
        this.settings.queueMaxWaitMs,
      )}.`,
    };
  }

  private async recompute(job: string): Promise<number> {
    try {
      const last = await this.client.getLastBuildNumber(job);
      if (last === undefined) {
        return 1;
      }
      const status = await this.client.getBuildStatus({ job, number: last });
      return status.building ? last : last + 1;
    } catch (error) {
      this.reporter.warn(
        `Could not read the last build of ${job}: ${describeError(error)}`,
      );
      return 1;
    }
  }

  private noticeQueued(poll: number, why?: string): void {
    if (poll % this.settings.queueNoticeEvery !== 0) {
      return;
    }
    const elapsed = formatSeconds(poll * this.settings.queuePollIntervalMs);
    this.reporter.progress(
      why
        ? `Still queued after ${elapsed}: ${why}`
        : `Still queued after ${elapsed}.`,
    );
  }
}

function formatSeconds(ms: number): string {
  return `${Math.round(ms / 1000)}s`;
}
