import { describe, expect, test } from "vitest";
import {
  DEFAULT_TRIGGER_SETTINGS,
  parseStrategy,
  queuePollBudget,
  resolveTriggerSettings,
} from "../src/trigger/settings";

describe("resolveTriggerSettings", () => {
  test("starts from the defaults", () => {
    expect(resolveTriggerSettings()).toEqual(DEFAULT_TRIGGER_SETTINGS);
  });

  test("ignores undefined overrides", () => {
    const settings = resolveTriggerSettings({
      queueMaxWaitMs: undefined,
      buildTimeoutMs: 60_000,
    });

    expect(settings.queueMaxWaitMs).toBe(120_000);
    expect(settings.buildTimeoutMs).toBe(60_000);
  });

  test("rejects non-positive intervals", () => {
    expect(() => resolveTriggerSettings({ queuePollIntervalMs: 0 })).toThrow(
      "Invalid queuePollIntervalMs setting.",
    );
    expect(() => resolveTriggerSettings({ predictiveRetries: 1.5 })).toThrow(
      "Invalid predictiveRetries setting.",
    );
  });
});

describe("parseStrategy", () => {
  test("normalizes known strategies", () => {
    expect(parseStrategy(" Predictive ", "--strategy")).toBe("predictive");
    expect(parseStrategy("", "--strategy")).toBeUndefined();
  });

  test("rejects unknown strategies", () => {
    expect(() => parseStrategy("guess", "--strategy")).toThrow(
      'Invalid --strategy value "guess".',
    );
  });
});

describe("queuePollBudget", () => {
  test("rounds up and never drops below one poll", () => {
    expect(queuePollBudget(resolveTriggerSettings())).toBe(120);
    expect(
      queuePollBudget(
        resolveTriggerSettings({
          queueMaxWaitMs: 2_500,
          queuePollIntervalMs: 1_000,
        }),
      ),
    ).toBe(3);
    expect(
      queuePollBudget(
        resolveTriggerSettings({
          queueMaxWaitMs: 100,
          queuePollIntervalMs: 1_000,
        }),
      ),
    ).toBe(1);
  });
});
