import { vi } from "vitest";
import type { Annotation } from "../src/trigger/console-annotations";
import {
  resolveTriggerSettings,
  type TriggerSettings,
} from "../src/trigger/settings";
import type { Reporter, Sleep, TriggerApi } from "../src/trigger/types";
import type { BuildStatus } from "../src/types/jenkins";

/** In-process stand-in for the Jenkins client; every method is a vi.fn. */
export function createFakeJenkins() {
  return {
    jobExists: vi.fn<TriggerApi["jobExists"]>(async () => true),
    getLastBuildNumber: vi.fn<TriggerApi["getLastBuildNumber"]>(
      async () => undefined,
    ),
    isJobQueued: vi.fn<TriggerApi["isJobQueued"]>(async () => false),
    getQueueItem: vi.fn<TriggerApi["getQueueItem"]>(async () => ({
      state: "queued",
    })),
    getBuildStatus: vi.fn<TriggerApi["getBuildStatus"]>(async (build) =>
      buildStatus({ number: build.number }),
    ),
    getConsoleText: vi.fn<TriggerApi["getConsoleText"]>(async () => ""),
    triggerBuild: vi.fn<TriggerApi["triggerBuild"]>(async () => ({})),
    uploadBuild: vi.fn<TriggerApi["uploadBuild"]>(async () => ({})),
  } satisfies TriggerApi;
}

export type FakeJenkins = ReturnType<typeof createFakeJenkins>;

/** Names of the fake's methods that received at least one call. */
export function calledMethods(client: FakeJenkins): string[] {
  return Object.entries(client)
    .filter(([, method]) => method.mock.calls.length > 0)
    .map(([name]) => name);
}

export function buildStatus(overrides: Partial<BuildStatus> = {}): BuildStatus {
  return {
    number: 1,
    building: false,
    result: "SUCCESS",
    durationMs: 0,
    ...overrides,
  };
}

/** Sleep that resolves immediately and remembers what was asked for. */
export function createRecordingSleep(onSleep?: (ms: number) => void): {
  sleep: Sleep;
  calls: number[];
} {
  const calls: number[] = [];
  return {
    calls,
    sleep: async (ms) => {
      calls.push(ms);
      onSleep?.(ms);
    },
  };
}

export type RecordingReporter = Reporter & {
  progressMessages: string[];
  infoMessages: string[];
  warnMessages: string[];
  annotations: Annotation[];
};

export function createRecordingReporter(): RecordingReporter {
  const progressMessages: string[] = [];
  const infoMessages: string[] = [];
  const warnMessages: string[] = [];
  const annotations: Annotation[] = [];
  return {
    progressMessages,
    infoMessages,
    warnMessages,
    annotations,
    progress: (message) => progressMessages.push(message),
    info: (message) => infoMessages.push(message),
    warn: (message) => warnMessages.push(message),
    annotation: (annotation) => annotations.push(annotation),
  };
}

export function testSettings(
  overrides: Partial<TriggerSettings> = {},
): TriggerSettings {
  return resolveTriggerSettings(overrides);
}
