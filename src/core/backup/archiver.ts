/**
 * Packs unit directories into archives and unpacks them for restore
 */

import { chmod, mkdir, rename, rm, stat } from "node:fs/promises";
import { $, execa } from "execa";
import { logger } from "../../utils/logger";
import { BackendIOError, errorMessage } from "../errors";

export interface ArchiveOptions {
  /** gzip level 1-9 */
  compression: number;
  /** `user[:group]` to chown the archive to */
  owner?: string;
  /** Octal mode string, e.g. "0640" */
  mode?: string;
}

export interface ArchiveResult {
  archivePath: string;
  sizeBytes: number;
}

export const TEMP_SUFFIX = ".tmp";

async function exists(filePath: string): Promise<boolean> {
  try {
    await stat(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Compress `dir` into `archivePath`.
 *
 * The archive is written under a temporary name and renamed when complete;
 * the directory is removed only after the rename.
 */
export async function archiveDirectory(
  dir: string,
  archivePath: string,
  options: ArchiveOptions,
): Promise<ArchiveResult> {
  const tempPath = `${archivePath}${TEMP_SUFFIX}`;
  logger.debug(
    `Creating tar.gz archive with compression level ${options.compression}`,
  );

  try {
    await execa("tar", ["-cf", "-", "-C", dir, "."]).pipe(
      "gzip",
      [`-${options.compression}`],
      { stdout: { file: tempPath } },
    );
    await rename(tempPath, archivePath);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw new BackendIOError(
      `Failed to archive ${dir}: ${errorMessage(error)}`,
      error,
    );
  }

  await applyPermissions(archivePath, options);
  await rm(dir, { recursive: true, force: true });

  const { size } = await stat(archivePath);
  logger.info(`Archive created: ${archivePath} (${size} bytes)`);

  return { archivePath, sizeBytes: size };
}

/**
 * Ownership and mode fix-up so the engine's user can read the archive back
 */
export async function applyPermissions(
  filePath: string,
  options: ArchiveOptions,
): Promise<void> {
  try {
    if (options.owner) {
      await $`chown ${options.owner} ${filePath}`;
    }
    if (options.mode) {
      await chmod(filePath, Number.parseInt(options.mode, 8));
    }
  } catch (error) {
    throw new BackendIOError(
      `Failed to set permissions on ${filePath}: ${errorMessage(error)}`,
      error,
    );
  }
}

/**
 * Unpack `archivePath` into `dir`. An existing directory is kept as is.
 */
export async function extractArchive(
  archivePath: string,
  dir: string,
  options: Pick<ArchiveOptions, "owner"> = {},
): Promise<boolean> {
  if (await exists(dir)) {
    logger.debug(`Already extracted: ${dir}`);
    return false;
  }
  if (archivePath.endsWith(".zip")) {
    throw new BackendIOError(
      `Cannot extract zip archive ${archivePath}; the engine reads it directly`,
    );
  }

  const tempDir = `${dir}${TEMP_SUFFIX}`;
  try {
    await rm(tempDir, { recursive: true, force: true });
    await mkdir(tempDir, { recursive: true });
    await $`tar -xf ${archivePath} -C ${tempDir}`;
    if (options.owner) {
      await $`chown -R ${options.owner} ${tempDir}`;
    }
    await rename(tempDir, dir);
  } catch (error) {
    await rm(tempDir, { recursive: true, force: true });
    throw new BackendIOError(
      `Failed to extract ${archivePath}: ${errorMessage(error)}`,
      error,
    );
  }

  logger.info(`Extracted ${archivePath} to ${dir}`);
  return true;
}
