/**
 * Shared setup for commands: configuration, logging and the storage backend
 */

import {
  DEFAULT_CONFIG_FOLDER,
  getRetentionPolicy,
  loadConfig,
} from "../config";
import { ClickHouseEngine } from "../clickhouse/client";
import { createBackend } from "../storage";
import type { ChBackupConfig, IBackupBackend, RetentionPolicy } from "../types";
import { setLogDir, setLogLevel } from "../utils";

export const CONFIG_FOLDER_OPTION = {
  "config-folder": { type: "string", short: "c" },
} as const;

export interface CommandContext {
  config: ChBackupConfig;
  backend: IBackupBackend;
  policy: RetentionPolicy;
}

export async function openContext(
  configFolder: string | undefined,
  verbose: boolean,
): Promise<CommandContext> {
  // Debug output while the config itself is being read
  if (verbose) setLogLevel("debug");

  const config = await loadConfig(configFolder ?? DEFAULT_CONFIG_FOLDER);
  setLogLevel(verbose ? "debug" : config.logging.level);
  setLogDir(config.logging.dir ?? null);

  return {
    config,
    backend: createBackend(config),
    policy: getRetentionPolicy(config),
  };
}

export function createEngine(config: ChBackupConfig): ClickHouseEngine {
  return new ClickHouseEngine(config.clickhouse, {
    pollIntervalMs: config.backup.poll_interval * 1000,
  });
}
