/**
 * Configuration path resolution and derived settings
 */

import { stat } from "node:fs/promises";
import * as path from "node:path";
import type { ChBackupConfig, RetentionPolicy } from "../types";
import { ConfigError } from "./validator";

/**
 * Resolve relative paths in config against the config folder
 */
export function resolvePaths(
  config: ChBackupConfig,
  configFolder: string,
): ChBackupConfig {
  const baseDir = path.resolve(configFolder);

  if (config.backup.dir && !path.isAbsolute(config.backup.dir)) {
    config.backup.dir = path.resolve(baseDir, config.backup.dir);
  }

  if (config.logging.dir && !path.isAbsolute(config.logging.dir)) {
    config.logging.dir = path.resolve(baseDir, config.logging.dir);
  }

  return config;
}

/**
 * File and Disk targets are listed through a local directory, which must exist.
 */
export async function checkTargetDir(config: ChBackupConfig): Promise<void> {
  const { target, dir } = config.backup;
  if (target !== "File" && target !== "Disk") return;
  if (!dir) {
    throw new ConfigError(`backup.dir must be set for the ${target} target`);
  }

  try {
    const info = await stat(dir);
    if (!info.isDirectory()) {
      throw new ConfigError(`backup.dir ${dir} is not a directory`);
    }
  } catch (error) {
    if (error instanceof ConfigError) throw error;
    throw new ConfigError(
      `backup.dir ${dir} does not exist or is not readable`,
    );
  }
}

export function getRetentionPolicy(config: ChBackupConfig): RetentionPolicy {
  return {
    maxIncrementalBackups: config.backup.max_incremental_backups,
    maxFullBackups: config.backup.max_full_backups,
  };
}
