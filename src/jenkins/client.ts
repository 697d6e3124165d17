/**
 * Jenkins REST API client.
 * Handles authentication, CSRF crumbs, and provides the calls needed to
 * submit builds, follow queue items, read build status and console text.
 */
import { readFile } from "node:fs/promises";
import { JenkinsRequestError } from "../cli";
import { logApi } from "../logger";
import type {
  BuildArtifact,
  BuildIdentifier,
  BuildStatus,
  Crumb,
  JenkinsApiBuild,
  JenkinsApiQueueItem,
  JenkinsClientOptions,
  JenkinsCrumbResponse,
  JenkinsJob,
  JenkinsJobInfoResponse,
  JenkinsJobsResponse,
  JenkinsQueueItemsResponse,
  JenkinsWhoAmIResponse,
  QueueItemState,
  QueueItemSummary,
  ServerInfo,
  TriggerBuildParams,
  TriggerBuildResult,
} from "../types/jenkins";

type RequestOptions = {
  method: "GET" | "POST";
  headers: Record<string, string>;
  body?: string | FormData;
};

/** A response whose body was read inside the request's timeout window. */
type JenkinsResponse = {
  status: number;
  ok: boolean;
  headers: Headers;
  body: string;
};

const QUEUE_ITEM_PATTERN = /\/queue\/item\/(\d+)\/?/;

export class JenkinsClient {
  private readonly baseUrl: string;
  private readonly authHeader: string;
  private readonly timeoutMs: number;
  private readonly uploadTimeoutMs: number;
  private readonly useCrumb: boolean;
  private crumbCache?: Crumb;

  constructor(options: JenkinsClientOptions) {
    this.baseUrl = options.baseUrl;
    const token = Buffer.from(`${options.user}:${options.apiToken}`).toString(
      "base64",
    );
    this.authHeader = `Basic ${token}`;
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.uploadTimeoutMs = options.uploadTimeoutMs ?? 300_000;
    this.useCrumb = options.useCrumb ?? false;
  }

  async getServerInfo(): Promise<ServerInfo> {
    const rootUrl = this.withBase("api/json?tree=mode");
    const rootResponse = await this.fetchWithTimeout(
      rootUrl,
      { method: "GET", headers: this.authHeaders() },
      1,
      "reach Jenkins",
    );
    if (!rootResponse.ok) {
      this.raiseHttpError(rootResponse, "reach Jenkins");
    }
    const whoami = await this.requestJson<JenkinsWhoAmIResponse>(
      this.withBase("me/api/json?tree=fullName,id"),
      "identify user",
    );
    return {
      version: rootResponse.headers.get("x-jenkins") ?? undefined,
      user: whoami.fullName ?? whoami.id,
    };
  }

  async listJobs(): Promise<JenkinsJob[]> {
    const url = this.withBase("api/json?tree=jobs[name,fullName,url]");
    const data = await this.requestJson<JenkinsJobsResponse>(url, "list jobs");
    if (!Array.isArray(data.jobs)) {
      throw new JenkinsRequestError(
        "Unexpected Jenkins response when listing jobs.",
        ["Try again, or verify your Jenkins server is healthy."],
      );
    }
    const jobs: JenkinsJob[] = [];
    for (const job of data.jobs) {
      if (typeof job.name !== "string" || typeof job.url !== "string") {
        continue;
      }
      jobs.push({ name: job.name, fullName: job.fullName, url: job.url });
    }
    return jobs;
  }

  async jobExists(job: string): Promise<boolean> {
    const url = this.withBase(`${jobPath(job)}/api/json?tree=name`);
    const response = await this.fetchWithTimeout(
      url,
      { method: "GET", headers: this.authHeaders() },
      1,
      "check job",
    );
    if (response.status === 404) {
      return false;
    }
    if (!response.ok) {
      this.raiseHttpError(response, "check job");
    }
    return true;
  }

  async getLastBuildNumber(job: string): Promise<number | undefined> {
    const url = this.withBase(`${jobPath(job)}/api/json?tree=lastBuild[number]`);
    const data = await this.requestJson<JenkinsJobInfoResponse>(
      url,
      "read last build",
    );
    const number = data.lastBuild?.number;
    return typeof number === "number" && number > 0 ? number : undefined;
  }

  async listQueueItems(): Promise<QueueItemSummary[]> {
    const url = this.withBase(
      "queue/api/json?tree=items[id,task[name,url]]",
    );
    const data = await this.requestJson<JenkinsQueueItemsResponse>(
      url,
      "list queue",
    );
    const items = Array.isArray(data.items) ? data.items : [];
    return items.flatMap((item) => {
      const summary = toQueueItemSummary(item);
      return summary ? [summary] : [];
    });
  }

  async isJobQueued(job: string): Promise<boolean> {
    const items = await this.listQueueItems();
    return items.some((item) => queueItemMatchesJob(item, job));
  }

  async getQueueItem(queueId: number): Promise<QueueItemState> {
    const url = this.withBase(`queue/item/${queueId}/api/json`);
    const response = await this.fetchWithTimeout(
      url,
      { method: "GET", headers: this.authHeaders() },
      0,
      "read queue item",
    );
    if (response.status === 404) {
      return { state: "missing" };
    }
    if (!response.ok) {
      this.raiseHttpError(response, "read queue item");
    }
    const data = this.parseJson<JenkinsApiQueueItem>(
      response,
      "read queue item",
    );
    if (data.cancelled === true) {
      return { state: "cancelled" };
    }
    if (data.executable) {
      return {
        state: "started",
        buildNumber:
          typeof data.executable.number === "number"
            ? data.executable.number
            : undefined,
        buildUrl: data.executable.url,
      };
    }
    return { state: "queued", why: data.why };
  }

  async getBuildStatus(build: BuildIdentifier): Promise<BuildStatus> {
    const url = this.withBase(
      `${buildPath(build)}/api/json?tree=number,url,result,building,timestamp,duration,estimatedDuration,description`,
    );
    const data = await this.requestJson<JenkinsApiBuild>(url, "read build");
    return {
      number: typeof data.number === "number" ? data.number : build.number,
      building: data.building ?? false,
      result: data.result ?? null,
      durationMs: typeof data.duration === "number" ? data.duration : 0,
      estimatedDurationMs: data.estimatedDuration,
      timestampMs: data.timestamp,
      url: data.url,
      description: data.description ?? undefined,
    };
  }

  async getConsoleText(build: BuildIdentifier): Promise<string> {
    const url = this.withBase(`${buildPath(build)}/consoleText`);
    const response = await this.fetchWithTimeout(
      url,
      {
        method: "GET",
        headers: { Authorization: this.authHeader, Accept: "text/plain" },
      },
      1,
      "read console output",
    );
    if (!response.ok) {
      this.raiseHttpError(response, "read console output");
    }
    return response.body;
  }

  async triggerBuild(
    job: string,
    params: TriggerBuildParams,
  ): Promise<TriggerBuildResult> {
    const hasParams = Object.keys(params).length > 0;
    const url = this.withBase(
      `${jobPath(job)}/${hasParams ? "buildWithParameters" : "build"}`,
    );
    const body = hasParams ? toFormEncoded(params) : undefined;
    const response = await this.postWithCrumb(
      url,
      () => body,
      body ? "application/x-www-form-urlencoded" : undefined,
      "trigger build",
      this.timeoutMs,
    );
    return toTriggerResult(response);
  }

  async uploadBuild(
    job: string,
    params: TriggerBuildParams,
    artifact: BuildArtifact,
  ): Promise<TriggerBuildResult> {
    const contents = await readFile(artifact.path);
    const url = this.withBase(`${jobPath(job)}/buildWithParameters`);
    const response = await this.postWithCrumb(
      url,
      () => {
        const form = new FormData();
        for (const [name, value] of Object.entries(params)) {
          form.append(name, String(value));
        }
        form.append(
          artifact.fieldName,
          new Blob([new Uint8Array(contents)], {
            type: "application/octet-stream",
          }),
          artifact.fileName,
        );
        return form;
      },
      undefined,
      "upload build archive",
      this.uploadTimeoutMs,
    );
    return toTriggerResult(response);
  }

  private async postWithCrumb(
    url: string,
    createBody: () => string | FormData | undefined,
    contentType: string | undefined,
    context: string,
    timeoutMs: number,
  ): Promise<JenkinsResponse> {
    const send = async (crumb: Crumb | null): Promise<JenkinsResponse> => {
      const headers: Record<string, string> = {
        Authorization: this.authHeader,
      };
      if (contentType) {
        headers["Content-Type"] = contentType;
      }
      if (crumb) {
        headers[crumb.field] = crumb.value;
      }
      return await this.fetchWithTimeout(
        url,
        { method: "POST", headers, body: createBody() },
        0,
        context,
        timeoutMs,
      );
    };

    let response = await send(await this.getCrumb());
    if (response.status === 403 && this.useCrumb) {
      this.crumbCache = undefined;
      response = await send(await this.getCrumb());
    }
    if (!response.ok) {
      this.raiseHttpError(response, context);
    }
    return response;
  }

  private async getCrumb(): Promise<Crumb | null> {
    if (!this.useCrumb) {
      return null;
    }
    if (this.crumbCache) {
      return this.crumbCache;
    }

    const url = this.withBase("crumbIssuer/api/json");
    const response = await this.fetchWithTimeout(
      url,
      { method: "GET", headers: this.authHeaders() },
      1,
      "fetch crumb",
    );

    if (!response.ok) {
      if (response.status === 404 || response.status === 403) {
        return null;
      }
      this.raiseHttpError(response, "fetch crumb");
    }

    const data = this.parseJson<JenkinsCrumbResponse>(
      response,
      "fetch crumb",
    );
    if (!data.crumbRequestField || !data.crumb) {
      return null;
    }

    this.crumbCache = { field: data.crumbRequestField, value: data.crumb };
    return this.crumbCache;
  }

  private async requestJson<T>(url: string, context: string): Promise<T> {
    const response = await this.fetchWithTimeout(
      url,
      { method: "GET", headers: this.authHeaders() },
      1,
      context,
    );

    if (!response.ok) {
      this.raiseHttpError(response, context);
    }

    return this.parseJson<T>(response, context);
  }

  private parseJson<T>(response: JenkinsResponse, context: string): T {
    try {
      return JSON.parse(response.body) as T;
    } catch {
      throw new JenkinsRequestError(
        `Invalid JSON response while trying to ${context}.`,
        ["Try again, or verify your Jenkins server is healthy."],
      );
    }
  }

  private authHeaders(): Record<string, string> {
    return {
      Authorization: this.authHeader,
      Accept: "application/json",
    };
  }

  private async fetchWithTimeout(
    url: string,
    options: RequestOptions,
    retriesLeft: number,
    context: string,
    timeoutMs: number = this.timeoutMs,
  ): Promise<JenkinsResponse> {
    const method = options.method;
    logApi({
      kind: "request",
      method,
      url,
      headers: options.headers,
      body: serializeRequestBody(options.body),
    });

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);
    try {
      const response = await fetch(url, {
        method,
        headers: options.headers,
        body: options.body,
        signal: controller.signal,
      });
      const body = await readBody(response, controller.signal);
      logApi({
        kind: "response",
        method,
        url,
        status: response.status,
        headers: response.headers,
        body,
      });
      return {
        status: response.status,
        ok: response.ok,
        headers: response.headers,
        body,
      };
    } catch (error) {
      if (retriesLeft > 0) {
        return this.fetchWithTimeout(
          url,
          options,
          retriesLeft - 1,
          context,
          timeoutMs,
        );
      }

      if (controller.signal.aborted) {
        logApi({ kind: "network-error", method, url, reason: "timed out" });
        throw new JenkinsRequestError(
          `Request timed out while trying to ${context}.`,
          [`Check your network and that ${this.baseUrl} is reachable.`],
        );
      }

      const errorMsg = error instanceof Error ? error.message : "Unknown error";
      logApi({ kind: "network-error", method, url, reason: errorMsg });
      throw new JenkinsRequestError(
        `Network error while trying to ${context}.`,
        [`Check your network and that ${this.baseUrl} is reachable.`],
      );
    } finally {
      clearTimeout(timeout);
    }
  }

  private raiseHttpError(response: JenkinsResponse, context: string): never {
    const status = response.status;
    if (status === 401 || status === 403) {
      throw new JenkinsRequestError(
        `Jenkins rejected the request while trying to ${context}.`,
        [
          "Check JENKINS_USER and JENKINS_API_TOKEN.",
          `Confirm you can access ${this.baseUrl} in a browser.`,
        ],
      );
    }
    if (status === 404) {
      throw new JenkinsRequestError(
        `Resource not found while trying to ${context}.`,
        ["Verify JENKINS_URL and the job name are correct."],
      );
    }

    throw new JenkinsRequestError(
      `Jenkins returned HTTP ${status} while trying to ${context}.`,
      ["Try again, or check the Jenkins server logs."],
    );
  }

  private withBase(path: string): string {
    const base = this.baseUrl.endsWith("/") ? this.baseUrl : `${this.baseUrl}/`;
    return new URL(path, base).toString();
  }
}

/** Maps "folder/name" to "job/folder/job/name". */
export function jobPath(job: string): string {
  return job
    .split("/")
    .map((segment) => segment.trim())
    .filter((segment) => segment.length > 0)
    .map((segment) => `job/${encodeURIComponent(segment)}`)
    .join("/");
}

export function buildPath(build: BuildIdentifier): string {
  return `${jobPath(build.job)}/${build.number}`;
}

export function parseQueueId(location: string | undefined): number | undefined {
  if (!location) {
    return undefined;
  }
  const match = location.match(QUEUE_ITEM_PATTERN);
  if (!match?.[1]) {
    return undefined;
  }
  const id = Number(match[1]);
  return Number.isSafeInteger(id) && id > 0 ? id : undefined;
}

export function queueItemMatchesJob(
  item: QueueItemSummary,
  job: string,
): boolean {
  const segments = job.split("/").filter((segment) => segment.length > 0);
  const shortName = segments[segments.length - 1];
  if (!shortName || item.jobName !== shortName) {
    return false;
  }
  if (!item.jobUrl) {
    return true;
  }
  try {
    const pathname = new URL(item.jobUrl).pathname.replace(/\/+$/, "");
    return pathname.endsWith(`/${jobPath(job)}`);
  } catch {
    return true;
  }
}

function toTriggerResult(response: JenkinsResponse): TriggerBuildResult {
  const queueUrl = response.headers.get("location") ?? undefined;
  return { queueUrl, queueId: parseQueueId(queueUrl) };
}

function toQueueItemSummary(
  item: JenkinsApiQueueItem,
): QueueItemSummary | undefined {
  if (typeof item.id !== "number") {
    return undefined;
  }
  return {
    id: item.id,
    jobName: item.task?.name,
    jobUrl: item.task?.url,
  };
}

function toFormEncoded(params: TriggerBuildParams): string {
  const search = new URLSearchParams();
  for (const [name, value] of Object.entries(params)) {
    search.append(name, String(value));
  }
  return search.toString();
}

function serializeRequestBody(
  body: string | FormData | undefined,
): string | null {
  if (body === undefined) {
    return null;
  }
  if (typeof body === "string") {
    return body;
  }
  const entries: string[] = [];
  for (const [key, value] of body.entries()) {
    entries.push(`${key}=${typeof value === "string" ? value : "<file>"}`);
  }
  return entries.join("&");
}

/** Reads the whole body, failing as soon as the request is aborted. */
async function readBody(
  response: Response,
  signal: AbortSignal,
): Promise<string> {
  signal.throwIfAborted();
  const aborted = new Promise<never>((_, reject) => {
    signal.addEventListener("abort", () => reject(signal.reason), {
      once: true,
    });
  });
  return await Promise.race([response.text(), aborted]);
}
