import type {
  BuildArtifact,
  BuildIdentifier,
  BuildStatus,
  QueueItemState,
  TriggerBuildParams,
  TriggerBuildResult,
} from "../types/jenkins";
import type { Annotation, ImageInfo } from "./console-annotations";

/** What the operator asked to run. Frozen by {@link createTriggerRequest}. */
export type TriggerRequest = {
  readonly job: string;
  readonly parameters: Readonly<TriggerBuildParams>;
  readonly artifact?: Readonly<BuildArtifact>;
};

export type QueueHandle =
  | { kind: "queue-item"; job: string; queueId: number }
  | { kind: "predicted"; job: string; expectedBuildNumber: number };

export type UnresolvedReason = "expired" | "cancelled" | "timeout";

export type ResolutionOutcome =
  | { status: "resolved"; build: BuildIdentifier; buildUrl?: string }
  | { status: "unresolved"; reason: UnresolvedReason; message: string };

export type BuildClassification =
  | "SUCCESS"
  | "FAILURE"
  | "ABORTED"
  | "UNSTABLE"
  | "NOT_BUILT"
  | "UNKNOWN";

export type WaitOutcome =
  | {
      status: "completed";
      build: BuildIdentifier;
      final: Readonly<BuildStatus>;
      classification: BuildClassification;
    }
  | {
      status: "timeout";
      build: BuildIdentifier;
      last?: Readonly<BuildStatus>;
      elapsedMs: number;
    };

export type TriggerStatus =
  | BuildClassification
  | "STARTED"
  | "TIMEOUT"
  | "NOT_FOUND"
  | "UNRESOLVED"
  | "PRECONDITION_FAILED"
  | "SUBMIT_FAILED";

export type TriggerResult = {
  readonly success: boolean;
  readonly status: TriggerStatus;
  readonly message: string;
  readonly job: string;
  readonly queueId?: number;
  readonly buildNumber?: number;
  readonly buildUrl?: string;
  readonly durationMs?: number;
  readonly timestampMs?: number;
  readonly consoleText?: string;
  readonly imageInfo?: Readonly<ImageInfo>;
  readonly artifactPath?: string;
};

export type TriggerOptions = {
  /** Follow the build to completion after it leaves the queue. */
  wait: boolean;
  /** Tail the console while waiting; otherwise poll status only. */
  streamLogs: boolean;
  verbose: boolean;
  /** Attach the full console text and parsed image metadata to the result. */
  captureConsole: boolean;
};

export const DEFAULT_TRIGGER_OPTIONS: Readonly<TriggerOptions> = Object.freeze({
  wait: true,
  streamLogs: true,
  verbose: false,
  captureConsole: false,
});

/** Progress sink for the core components. Never affects control flow. */
export interface Reporter {
  progress(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  annotation(annotation: Annotation): void;
}

export type Sleep = (ms: number) => Promise<void>;
export type Clock = () => number;

/** The slice of the Jenkins client the core depends on. */
export interface TriggerApi {
  jobExists(job: string): Promise<boolean>;
  getLastBuildNumber(job: string): Promise<number | undefined>;
  isJobQueued(job: string): Promise<boolean>;
  getQueueItem(queueId: number): Promise<QueueItemState>;
  getBuildStatus(build: BuildIdentifier): Promise<BuildStatus>;
  getConsoleText(build: BuildIdentifier): Promise<string>;
  triggerBuild(
    job: string,
    params: TriggerBuildParams,
  ): Promise<TriggerBuildResult>;
  uploadBuild(
    job: string,
    params: TriggerBuildParams,
    artifact: BuildArtifact,
  ): Promise<TriggerBuildResult>;
}

export function createTriggerRequest(input: {
  job: string;
  parameters?: TriggerBuildParams;
  artifact?: BuildArtifact;
}): TriggerRequest {
  return Object.freeze({
    job: input.job,
    parameters: Object.freeze({ ...(input.parameters ?? {}) }),
    ...(input.artifact ? { artifact: Object.freeze({ ...input.artifact }) } : {}),
  });
}
