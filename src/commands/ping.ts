import { printOk } from "../cli";
import type { JenkinsClient } from "../jenkins/client";
import type { ServerInfo } from "../types/jenkins";

export async function runPing(options: {
  client: Pick<JenkinsClient, "getServerInfo">;
  baseUrl: string;
  json: boolean;
}): Promise<ServerInfo> {
  const info = await options.client.getServerInfo();
  if (options.json) {
    console.log(JSON.stringify({ url: options.baseUrl, ...info }, null, 2));
    return info;
  }
  const user = info.user ?? "unknown user";
  const version = info.version ? `Jenkins ${info.version}` : "Jenkins";
  printOk(`Connected as ${user} @ ${version} (${options.baseUrl})`);
  return info;
}
