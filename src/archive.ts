import archiver from "archiver";
import fs from "node:fs";
import { mkdtemp, rm, stat } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { CliError } from "./cli";

export type BuildArchive = {
  path: string;
  fileName: string;
  bytes: number;
};

/**
 * Zips a build context into a fresh temp directory. Entries are stored
 * under the directory's own name, e.g. `app/Dockerfile`.
 */
export async function createBuildArchive(options: {
  sourceDir: string;
  dockerfile?: string;
  tempRoot?: string;
}): Promise<BuildArchive> {
  const sourceDir = path.resolve(options.sourceDir);
  const dockerfile = options.dockerfile ?? "Dockerfile";

  const sourceInfo = await stat(sourceDir).catch(() => null);
  if (!sourceInfo) {
    throw new CliError(`Source directory not found: ${sourceDir}`, [
      "Pass --source-dir with an existing build context.",
    ]);
  }
  if (!sourceInfo.isDirectory()) {
    throw new CliError(`Source path is not a directory: ${sourceDir}`, [
      "Pass a directory to --source-dir, or a zip file to --archive.",
    ]);
  }
  const dockerfileInfo = await stat(path.join(sourceDir, dockerfile)).catch(
    () => null,
  );
  if (!dockerfileInfo?.isFile()) {
    throw new CliError(`No ${dockerfile} found in ${sourceDir}.`, [
      "The build context must contain the Dockerfile used by the job.",
    ]);
  }

  const baseName = path.basename(sourceDir);
  const tempDir = await mkdtemp(
    path.join(options.tempRoot ?? os.tmpdir(), "ci-trigger-"),
  );
  const fileName = `${baseName}.zip`;
  const archivePath = path.join(tempDir, fileName);

  try {
    await writeZip(sourceDir, baseName, archivePath);
    const info = await stat(archivePath);
    return { path: archivePath, fileName, bytes: info.size };
  } catch (error) {
    await rm(tempDir, { recursive: true, force: true });
    throw error;
  }
}

/** Deletes an archive made by {@link createBuildArchive} and its temp dir. */
export async function removeBuildArchive(archive: BuildArchive): Promise<void> {
  await rm(path.dirname(archive.path), { recursive: true, force: true });
}

function writeZip(
  sourceDir: string,
  prefix: string,
  targetPath: string,
): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const output = fs.createWriteStream(targetPath);
    const archive = archiver("zip", { zlib: { level: 9 } });

    const fail = (error: Error) => {
      output.destroy();
      reject(error);
    };

    output.on("close", () => resolve());
    output.on("error", fail);
    archive.on("error", fail);
    archive.on("warning", (error) => {
      if (error.code !== "ENOENT") {
        fail(error);
      }
    });

    archive.pipe(output);
    archive.directory(sourceDir, prefix);
    archive.finalize().catch(fail);
  });
}
