/**
 * Init-config command implementation.
 * Writes an example JSON config, asking before overwriting an existing one.
 */
import { confirm, isCancel } from "@clack/prompts";
import fs from "node:fs";
import { CliError, printHint, printOk } from "../cli";
import { resolveConfigPath, writeExampleConfig } from "../config";

type InitConfigOptions = {
  path?: string;
  force: boolean;
  nonInteractive: boolean;
};

export async function runInitConfig(
  options: InitConfigOptions,
): Promise<string> {
  const configPath = resolveConfigPath(options.path);
  if (fs.existsSync(configPath) && !options.force) {
    if (options.nonInteractive || !process.stdin.isTTY) {
      throw new CliError(`Config file already exists: ${configPath}`, [
        "Pass --force to overwrite it.",
      ]);
    }
    const response = await confirm({
      message: `Overwrite ${configPath}?`,
      initialValue: false,
    });
    if (isCancel(response) || !response) {
      throw new CliError("Operation cancelled.");
    }
  }

  await writeExampleConfig(configPath);
  printOk(`Example config written to ${configPath}`);
  printHint(`Edit it, then run with --config-file ${configPath}.`);
  printHint(
    "BUILD_PLATFORMS takes one platform (linux/amd64) or a comma-separated list (linux/amd64,linux/arm64).",
  );
  return configPath;
}
