export type {
  BuildIdentifier,
  BuildStatus,
  Crumb,
  JenkinsClientOptions,
  JenkinsJob,
  QueueItemState,
  QueueItemSummary,
  ServerInfo,
  TriggerBuildResult,
} from "./models";

export type {
  JenkinsApiBuild,
  JenkinsApiJob,
  JenkinsApiQueueExecutable,
  JenkinsApiQueueItem,
  JenkinsApiQueueTask,
  JenkinsCrumbResponse,
  JenkinsJobInfoResponse,
  JenkinsJobsResponse,
  JenkinsQueueItemsResponse,
  JenkinsWhoAmIResponse,
} from "./responses";

export type { BuildArtifact, TriggerBuildParams } from "./requests";
