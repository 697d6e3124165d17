/**
 * Jobs command implementation.
 * Prints job names from the server, optionally filtered by a substring.
 */
import { printOk } from "../cli";
import type { JenkinsClient } from "../jenkins/client";
import type { JenkinsJob } from "../types/jenkins";

type JobsOptions = {
  client: Pick<JenkinsClient, "listJobs">;
  search?: string;
  json: boolean;
};

export async function runJobs(options: JobsOptions): Promise<JenkinsJob[]> {
  const jobs = filterJobs(await options.client.listJobs(), options.search);
  if (options.json) {
    console.log(JSON.stringify(jobs, null, 2));
    return jobs;
  }
  if (jobs.length === 0) {
    printOk(
      options.search?.trim()
        ? `No jobs match "${options.search.trim()}".`
        : "No jobs found.",
    );
    return jobs;
  }
  for (const job of jobs) {
    console.log(`${getJobDisplayName(job)}  ${job.url}`);
  }
  return jobs;
}

export function filterJobs(jobs: JenkinsJob[], search?: string): JenkinsJob[] {
  const needle = search?.trim().toLowerCase() ?? "";
  return jobs
    .filter((job) =>
      needle ? getJobDisplayName(job).toLowerCase().includes(needle) : true,
    )
    .sort((a, b) => getJobDisplayName(a).localeCompare(getJobDisplayName(b)));
}

export function getJobDisplayName(job: JenkinsJob): string {
  return job.fullName ?? job.name;
}
