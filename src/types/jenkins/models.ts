/**
 * Normalized Jenkins domain models used throughout the CLI.
 */

/** Jenkins job metadata. */
export type JenkinsJob = {
  name: string;
  fullName?: string;
  url: string;
};

/** One concrete execution of a job. Never changes once assigned. */
export type BuildIdentifier = {
  job: string;
  number: number;
};

export type BuildStatus = {
  number: number;
  building: boolean;
  result: string | null;
  durationMs: number;
  estimatedDurationMs?: number;
  timestampMs?: number;
  url?: string;
  description?: string;
};

export type QueueItemState =
  | { state: "queued"; why?: string }
  | { state: "started"; buildNumber?: number; buildUrl?: string }
  | { state: "cancelled" }
  | { state: "missing" };

export type QueueItemSummary = {
  id: number;
  jobName?: string;
  jobUrl?: string;
};

export type TriggerBuildResult = {
  queueUrl?: string;
  queueId?: number;
};

export type ServerInfo = {
  version?: string;
  user?: string;
};

export type Crumb = {
  field: string;
  value: string;
};

export type JenkinsClientOptions = {
  baseUrl: string;
  user: string;
  apiToken: string;
  timeoutMs?: number;
  uploadTimeoutMs?: number;
  useCrumb?: boolean;
};
