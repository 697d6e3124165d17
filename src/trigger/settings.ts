import { CliError } from "../cli";

export type ResolutionStrategy = "queue-item" | "predictive";

export const RESOLUTION_STRATEGIES: readonly ResolutionStrategy[] = [
  "queue-item",
  "predictive",
];

/**
 * Timing and strategy knobs for one trigger-and-wait invocation.
 * Passed explicitly to every component; all durations in milliseconds.
 */
export type TriggerSettings = {
  strategy: ResolutionStrategy;
  queuePollIntervalMs: number;
  queueMaxWaitMs: number;
  queueErrorBackoffMs: number;
  /** Emit a "still queued" notice every N polls. */
  queueNoticeEvery: number;
  logPollIntervalMs: number;
  statusPollIntervalMs: number;
  buildTimeoutMs: number;
  predictiveRetries: number;
  predictiveRetryDelayMs: number;
  resubmitOnMissingQueueId: boolean;
};

export const DEFAULT_TRIGGER_SETTINGS: Readonly<TriggerSettings> =
  Object.freeze({
    strategy: "queue-item",
    queuePollIntervalMs: 1_000,
    queueMaxWaitMs: 120_000,
    queueErrorBackoffMs: 2_000,
    queueNoticeEvery: 10,
    logPollIntervalMs: 3_000,
    statusPollIntervalMs: 10_000,
    buildTimeoutMs: 1_800_000,
    predictiveRetries: 3,
    predictiveRetryDelayMs: 5_000,
    resubmitOnMissingQueueId: true,
  });

export function parseStrategy(
  value: string | undefined,
  source: string,
): ResolutionStrategy | undefined {
  const normalized = value?.trim().toLowerCase();
  if (!normalized) {
    return undefined;
  }
  const match = RESOLUTION_STRATEGIES.find(
    (strategy) => strategy === normalized,
  );
  if (!match) {
    throw new CliError(`Invalid ${source} value "${value}".`, [
      `Use one of: ${RESOLUTION_STRATEGIES.join(", ")}.`,
    ]);
  }
  return match;
}

export function resolveTriggerSettings(
  overrides: Partial<TriggerSettings> = {},
): TriggerSettings {
  const settings: TriggerSettings = { ...DEFAULT_TRIGGER_SETTINGS };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined && key in settings) {
      Object.assign(settings, { [key]: value });
    }
  }

  const positiveKeys = [
    "queuePollIntervalMs",
    "queueMaxWaitMs",
    "logPollIntervalMs",
    "statusPollIntervalMs",
    "buildTimeoutMs",
    "queueNoticeEvery",
  ] as const;
  for (const key of positiveKeys) {
    const value = settings[key];
    if (!Number.isFinite(value) || value <= 0) {
      throw new CliError(`Invalid ${key} setting.`, [
        `Use a value greater than 0 for ${key}.`,
      ]);
    }
  }
  if (
    !Number.isInteger(settings.predictiveRetries) ||
    settings.predictiveRetries < 0
  ) {
    throw new CliError("Invalid predictiveRetries setting.", [
      "Use a whole number of retries (0 or more).",
    ]);
  }
  return settings;
}

/** Number of queue polls allowed before resolution gives up. */
export function queuePollBudget(settings: TriggerSettings): number {
  return Math.max(
    1,
    Math.ceil(settings.queueMaxWaitMs / settings.queuePollIntervalMs),
  );
}
