/**
 * Presentation layer over raw console text.
 * Pure functions: nothing here feeds back into polling or completion logic.
 */

export type AnnotationKind =
  | "stage-start"
  | "stage-end"
  | "build-success"
  | "build-info"
  | "stage"
  | "image"
  | "problem"
  | "progress"
  | "detail";

export type Annotation = {
  kind: AnnotationKind;
  text: string;
};

export type AnnotateOptions = {
  verbose: boolean;
  /** Keys already emitted in this monitoring session; updated in place. */
  seen: Set<string>;
};

export type ImageInfo = {
  registry?: string;
  project?: string;
  imageTag?: string;
  fullImageUrl?: string;
  digest?: string;
};

// OSC (terminated by BEL or ST), then single-char escapes and CSI sequences.
const ANSI_PATTERN =
  /\u001b\][^\u0007\u001b]*(?:\u0007|\u001b\\)|\u001b(?:[@-Z\\-_]|\[[0-?]*[ -/]*[@-~])/g;

const MARKERS: ReadonlyArray<[string, AnnotationKind]> = [
  ["[STAGE_START]", "stage-start"],
  ["[STAGE_END]", "stage-end"],
  ["[BUILD_SUCCESS]", "build-success"],
  ["[BUILD_INFO]", "build-info"],
];

const PIPELINE_STAGE_PATTERN = /^\[Pipeline\] \{ \((.+)\)$/;

const IMAGE_PATTERNS = [
  "registry:",
  "project:",
  "image:",
  "image pushed to:",
  "digest:",
  "sha256:",
];
const PROBLEM_PATTERNS = ["error:", "warning:", "build failed"];
const PROGRESS_PATTERNS = ["building", "pushing"];

const VERBOSE_ALLOWLIST = [
  "Step ",
  "Successfully built",
  "Successfully tagged",
  "Sending build context",
  "FROM ",
  "RUN ",
  "COPY ",
  "WORKDIR ",
  "EXPOSE ",
  "CMD ",
];

/** Keyword categories that are emitted at most once per session. */
const DEDUPED_KINDS: ReadonlySet<AnnotationKind> = new Set([
  "stage",
  "image",
  "problem",
  "progress",
]);

export function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, "");
}

export function annotateConsoleText(
  text: string,
  options: AnnotateOptions,
): Annotation[] {
  const annotations: Annotation[] = [];
  for (const rawLine of stripAnsi(text).split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line) {
      continue;
    }
    const annotation = classifyLine(line, options.verbose);
    if (!annotation) {
      continue;
    }
    if (DEDUPED_KINDS.has(annotation.kind)) {
      const key = `${annotation.kind}:${annotation.text}`;
      if (options.seen.has(key)) {
        continue;
      }
      options.seen.add(key);
    }
    annotations.push(annotation);
  }
  return annotations;
}

function classifyLine(line: string, verbose: boolean): Annotation | null {
  for (const [marker, kind] of MARKERS) {
    if (line.includes(marker)) {
      return { kind, text: textAfter(line, marker) };
    }
  }

  const stage = line.match(PIPELINE_STAGE_PATTERN);
  if (stage?.[1]) {
    return { kind: "stage", text: stage[1] };
  }

  const lower = line.toLowerCase();
  if (IMAGE_PATTERNS.some((pattern) => lower.includes(pattern))) {
    return { kind: "image", text: line };
  }
  if (PROBLEM_PATTERNS.some((pattern) => lower.includes(pattern))) {
    return { kind: "problem", text: line };
  }
  if (PROGRESS_PATTERNS.some((pattern) => lower.includes(pattern))) {
    return { kind: "progress", text: line };
  }

  if (verbose && VERBOSE_ALLOWLIST.some((pattern) => line.includes(pattern))) {
    return { kind: "detail", text: line };
  }
  return null;
}

/**
 * Best-effort scrape of registry/image metadata printed by the build.
 * The first occurrence of each field wins.
 */
export function extractImageInfo(text: string): ImageInfo {
  const info: ImageInfo = {};
  for (const rawLine of stripAnsi(text).split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line) {
      continue;
    }
    if (info.registry === undefined && line.includes("Registry:")) {
      info.registry = textAfter(line, "Registry:") || undefined;
    }
    if (info.project === undefined && line.includes("Project:")) {
      info.project = textAfter(line, "Project:") || undefined;
    }
    if (info.fullImageUrl === undefined && line.includes("Image pushed to:")) {
      info.fullImageUrl = textAfter(line, "Image pushed to:") || undefined;
    } else if (info.imageTag === undefined && line.includes("Image:")) {
      info.imageTag = textAfter(line, "Image:") || undefined;
    }
    if (info.digest === undefined) {
      info.digest = findDigest(line);
    }
  }
  return dropUndefined(info);
}

function findDigest(line: string): string | undefined {
  const lower = line.toLowerCase();
  const digestIndex = lower.indexOf("digest:");
  if (digestIndex >= 0) {
    const rest = line.slice(digestIndex + "digest:".length).trim();
    const token = rest.split(/\s+/)[0];
    return token ? token : undefined;
  }
  const sha = line.match(/sha256:[0-9a-f]+/i);
  return sha?.[0];
}

function textAfter(line: string, marker: string): string {
  const index = line.lastIndexOf(marker);
  return line.slice(index + marker.length).trim();
}

function dropUndefined(info: ImageInfo): ImageInfo {
  const result: ImageInfo = {};
  for (const [key, value] of Object.entries(info)) {
    if (typeof value === "string") {
      Object.assign(result, { [key]: value });
    }
  }
  return result;
}
