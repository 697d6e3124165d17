import type { BuildStatus } from "./types/jenkins";

const ANSI_BOLD = "\u001b[1m";
const ANSI_RESET = "\u001b[0m";

export type StatusDetails = {
  building?: boolean;
  timestampMs?: number;
  durationMs?: number;
  estimatedDurationMs?: number;
  stage?: { name?: string; status?: string };
};

type StatusSummaryInput = {
  jobLabel: string;
  buildNumber?: number;
  result: string;
};

export function formatStatusSummary(options: StatusSummaryInput): string {
  const build =
    typeof options.buildNumber === "number" ? ` #${options.buildNumber}` : "";
  return `${options.jobLabel}${build}: ${bold(options.result)}`;
}

export function toStatusDetails(status: BuildStatus): StatusDetails {
  return {
    building: status.building,
    timestampMs: status.timestampMs,
    durationMs: status.durationMs,
    estimatedDurationMs: status.estimatedDurationMs,
  };
}

/** Multi-line block printed under a summary: URL, then timing. */
export function formatStatusDetails(
  status: StatusDetails,
  url: string,
): string {
  const lines: string[] = [formatLabelValue("URL:", url)];

  const timingParts: string[] = [];
  if (typeof status.timestampMs === "number") {
    timingParts.push(
      formatLabelValue("Started:", formatLocalTime(status.timestampMs)),
    );
  }
  const timing = describeTiming(status);
  if (timing) {
    timingParts.push(formatLabelValue(`${timing.label}:`, timing.value));
  }
  if (timingParts.length > 0) {
    lines.push(timingParts.join(" | "));
  }
  return lines.join("\n");
}

/** Single-line form used for spinner progress. */
export function formatCompactStatus(options: {
  buildNumber?: number;
  result: string;
  status: StatusDetails;
}): string {
  const parts: string[] = [];
  if (typeof options.buildNumber === "number") {
    parts.push(`#${options.buildNumber}`);
  }
  parts.push(options.result);

  const timing = describeTiming(options.status);
  if (timing) {
    parts.push(`${timing.label}: ${timing.value}`);
  }

  const stage = options.status.stage;
  if (stage?.name) {
    const stageStatus = stage.status ? ` (${stage.status})` : "";
    parts.push(`Stage: ${stage.name}${stageStatus}`);
  }

  return parts.join(" | ");
}

function describeTiming(
  status: StatusDetails,
): { label: string; value: string } | null {
  const duration = resolveDurationMs(status);
  if (duration <= 0) {
    return null;
  }
  let value = formatDuration(duration);
  if (
    status.building &&
    typeof status.estimatedDurationMs === "number" &&
    status.estimatedDurationMs > 0
  ) {
    value += ` (est ${formatDuration(status.estimatedDurationMs)})`;
  }
  return { label: status.building ? "Elapsed" : "Duration", value };
}

function bold(value: string): string {
  return `${ANSI_BOLD}${value}${ANSI_RESET}`;
}

function formatLabelValue(label: string, value: string): string {
  return `${bold(label)} ${value}`;
}

function resolveDurationMs(status: StatusDetails): number {
  if (
    status.building &&
    typeof status.timestampMs === "number" &&
    status.timestampMs > 0
  ) {
    return Math.max(0, Date.now() - status.timestampMs);
  }
  if (typeof status.durationMs === "number") {
    return status.durationMs;
  }
  return 0;
}

function formatLocalTime(timestampMs: number): string {
  return new Date(timestampMs).toLocaleString();
}

export function formatDuration(durationMs: number): string {
  if (durationMs < 1000) {
    return `${Math.max(0, Math.round(durationMs))}ms`;
  }
  const totalSeconds = Math.max(0, Math.floor(durationMs / 1000));
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  if (hours > 0) {
    return `${hours}h ${minutes}m ${seconds}s`;
  }
  if (minutes > 0) {
    return `${minutes}m ${seconds}s`;
  }
  return `${seconds}s`;
}
