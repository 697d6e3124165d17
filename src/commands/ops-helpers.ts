import { randomUUID } from "node:crypto";
import { CliError, printError, printHint, printOk } from "../cli";
import { createConsoleReporter, silentReporter } from "../reporter";
import { formatStatusDetails, formatStatusSummary } from "../status-format";
import type { ImageInfo } from "../trigger/console-annotations";
import { TriggerOrchestrator } from "../trigger/orchestrator";
import type { TriggerSettings } from "../trigger/settings";
import type { TriggerApi, TriggerRequest, TriggerResult } from "../trigger/types";
import type { TriggerBuildParams } from "../types/jenkins";

export const EXIT_TIMEOUT = 124;

/** Flags shared by every command that submits a build. */
export type SubmitFlags = {
  wait: boolean;
  logs: boolean;
  verbose: boolean;
  json: boolean;
};

export function parseDurationMs(
  input: string | undefined,
  label: string,
): number {
  const value = input?.trim() ?? "";
  if (!value) {
    throw new CliError(`Missing --${label}.`, [
      `Provide --${label} with a duration like 30s, 5m, or 1h.`,
    ]);
  }
  const match = value.match(/^(\d+)(ms|s|m|h)?$/i);
  if (!match) {
    throw new CliError(`Invalid --${label} value "${value}".`, [
      "Use duration values like 500ms, 30s, 5m, or 1h.",
    ]);
  }

  const amount = Number(match[1]);
  const unit = (match[2] || "ms").toLowerCase();
  const multipliers: Record<string, number> = {
    ms: 1,
    s: 1_000,
    m: 60_000,
    h: 3_600_000,
  };
  const multiplier = multipliers[unit];
  if (!multiplier || !Number.isFinite(amount) || amount <= 0) {
    throw new CliError(`Invalid --${label} value "${value}".`, [
      "Use a duration greater than 0, like 500ms, 30s, 5m, or 1h.",
    ]);
  }
  return Math.floor(amount * multiplier);
}

export function parseOptionalDurationMs(
  input: string | undefined,
  label: string,
): number | undefined {
  if (!input || !input.trim()) {
    return undefined;
  }
  return parseDurationMs(input, label);
}

/** Parses repeated `--param KEY=VALUE` flags. Later keys win. */
export function parseParamAssignments(
  values: readonly string[],
): TriggerBuildParams {
  const params: TriggerBuildParams = {};
  for (const raw of values) {
    const separator = raw.indexOf("=");
    const name = separator > 0 ? raw.slice(0, separator).trim() : "";
    if (!name) {
      throw new CliError(`Invalid --param value "${raw}".`, [
        "Use KEY=VALUE, for example --param APP_VERSION=1.2.0.",
      ]);
    }
    params[name] = raw.slice(separator + 1);
  }
  return params;
}

/** `<yyyymmdd>-<hhmmss>-<8 hex>` in local time. */
export function generateBuildUniqueId(
  now: Date = new Date(),
  uuid: string = randomUUID(),
): string {
  const pad = (value: number) => String(value).padStart(2, "0");
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(
    now.getDate(),
  )}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(
    now.getSeconds(),
  )}`;
  return `${date}-${time}-${uuid.replace(/-/g, "").slice(0, 8)}`;
}

export function exitCodeFor(result: TriggerResult): number {
  if (result.success) {
    return 0;
  }
  return result.status === "TIMEOUT" ? EXIT_TIMEOUT : 1;
}

export async function submitBuild(options: {
  client: TriggerApi;
  settings: TriggerSettings;
  request: TriggerRequest;
  flags: SubmitFlags;
}): Promise<TriggerResult> {
  const reporter = options.flags.json
    ? null
    : createConsoleReporter({ interactive: Boolean(process.stdout.isTTY) });
  const orchestrator = new TriggerOrchestrator({
    client: options.client,
    settings: options.settings,
    reporter: reporter ?? silentReporter,
  });

  const result = await orchestrator.submitAndWait(options.request, {
    wait: options.flags.wait,
    streamLogs: options.flags.logs,
    verbose: options.flags.verbose,
    captureConsole: options.flags.wait,
  });
  reporter?.close();

  printTriggerResult(result, options.flags.json);
  process.exitCode = exitCodeFor(result);
  return result;
}

export function printTriggerResult(result: TriggerResult, json: boolean): void {
  if (json) {
    const payload = { ...result, consoleText: undefined };
    console.log(JSON.stringify(payload, null, 2));
    return;
  }

  if (!result.success) {
    printError(result.message);
    for (const hint of hintsFor(result)) {
      printHint(hint);
    }
    if (result.buildUrl) {
      printHint(`Build URL: ${result.buildUrl}`);
    }
    return;
  }

  printOk(
    formatStatusSummary({
      jobLabel: result.job,
      buildNumber: result.buildNumber,
      result: result.status,
    }),
  );
  printOk(result.message);
  if (result.buildUrl) {
    console.log(
      formatStatusDetails(
        {
          building: result.status === "STARTED",
          timestampMs: result.timestampMs,
          durationMs: result.durationMs,
        },
        result.buildUrl,
      ),
    );
  }
  for (const line of formatImageInfo(result.imageInfo)) {
    console.log(line);
  }
}

export function formatImageInfo(info: ImageInfo | undefined): string[] {
  if (!info) {
    return [];
  }
  const labels: Array<[keyof ImageInfo, string]> = [
    ["registry", "Registry"],
    ["project", "Project"],
    ["imageTag", "Image"],
    ["fullImageUrl", "Pushed to"],
    ["digest", "Digest"],
  ];
  return labels.flatMap(([key, label]) => {
    const value = info[key];
    return value ? [`${label}: ${value}`] : [];
  });
}

function hintsFor(result: TriggerResult): string[] {
  switch (result.status) {
    case "NOT_FOUND":
      return ["Run `ci-trigger jobs` to list the available jobs."];
    case "PRECONDITION_FAILED":
      return ["Check the --archive or --source-dir path."];
    case "TIMEOUT":
      return [
        "The build keeps running on the server; nothing was cancelled.",
        "Raise --queue-timeout or --build-timeout to wait longer.",
      ];
    case "UNRESOLVED":
      return [
        "The build may still have started; check the job page on the server.",
      ];
    case "SUBMIT_FAILED":
      return ["Check the job parameters and your permissions on the job."];
    default:
      return [];
  }
}
