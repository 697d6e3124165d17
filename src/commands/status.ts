/**
 * Status command implementation.
 * Reports whether a job is queued, building, or how its last build ended.
 */
import { CliError, printOk } from "../cli";
import {
  formatStatusDetails,
  formatStatusSummary,
  toStatusDetails,
} from "../status-format";
import type { TriggerApi } from "../trigger/types";
import type { BuildStatus } from "../types/jenkins";

type StatusOptions = {
  client: Pick<
    TriggerApi,
    "jobExists" | "isJobQueued" | "getLastBuildNumber" | "getBuildStatus"
  >;
  job: string;
  json: boolean;
};

export type JobStatusReport = {
  job: string;
  /** PENDING, BUILDING, NO_BUILDS, or the last build's result. */
  state: string;
  buildNumber?: number;
  build?: BuildStatus;
};

export async function getJobStatus(
  options: Omit<StatusOptions, "json">,
): Promise<JobStatusReport> {
  const { client, job } = options;
  if (!(await client.jobExists(job))) {
    throw new CliError(`Job "${job}" was not found.`, [
      "Run `ci-trigger jobs` to list the available jobs.",
    ]);
  }
  if (await client.isJobQueued(job)) {
    return { job, state: "PENDING" };
  }
  const buildNumber = await client.getLastBuildNumber(job);
  if (buildNumber === undefined) {
    return { job, state: "NO_BUILDS" };
  }
  const build = await client.getBuildStatus({ job, number: buildNumber });
  return {
    job,
    state: build.building ? "BUILDING" : (build.result ?? "UNKNOWN"),
    buildNumber,
    build,
  };
}

export async function runStatus(options: StatusOptions): Promise<void> {
  const report = await getJobStatus(options);
  if (options.json) {
    console.log(JSON.stringify(report, null, 2));
    return;
  }

  printOk(
    formatStatusSummary({
      jobLabel: report.job,
      buildNumber: report.buildNumber,
      result: report.state,
    }),
  );
  if (report.build?.url) {
    console.log(
      formatStatusDetails(toStatusDetails(report.build), report.build.url),
    );
  }
}
