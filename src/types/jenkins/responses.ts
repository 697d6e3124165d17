/**
 * Raw Jenkins API response payloads (wire format).
 */

export type JenkinsApiJob = {
  name?: string;
  fullName?: string;
  url?: string;
};

export type JenkinsJobsResponse = {
  jobs?: JenkinsApiJob[];
};

export type JenkinsApiBuild = {
  number?: number;
  url?: string;
  result?: string | null;
  building?: boolean;
  timestamp?: number;
  duration?: number;
  estimatedDuration?: number;
  description?: string | null;
};

export type JenkinsJobInfoResponse = {
  name?: string;
  lastBuild?: { number?: number } | null;
};

export type JenkinsApiQueueTask = {
  name?: string;
  url?: string;
};

export type JenkinsApiQueueExecutable = {
  number?: number;
  url?: string;
};

export type JenkinsApiQueueItem = {
  id?: number;
  url?: string;
  why?: string;
  cancelled?: boolean;
  task?: JenkinsApiQueueTask;
  executable?: JenkinsApiQueueExecutable | null;
};

export type JenkinsQueueItemsResponse = {
  items?: JenkinsApiQueueItem[];
};

export type JenkinsCrumbResponse = {
  crumbRequestField?: string;
  crumb?: string;
};

export type JenkinsWhoAmIResponse = {
  fullName?: string;
  id?: string;
};
