/**
 * Default configuration values
 */

import type { ChBackupConfig } from "../types";

export const DEFAULT_CONFIG_FOLDER = "/etc/chbackup";

export const DEFAULT_IGNORED_DATABASES = [
  "system",
  "information_schema",
  "INFORMATION_SCHEMA",
];

export const DEFAULT_CONFIG: ChBackupConfig = {
  clickhouse: {
    host: "localhost",
    port: 8123,
    protocol: "http",
    user: "default",
    password: "",
  },
  backup: {
    target: "File",
    ignored_databases: DEFAULT_IGNORED_DATABASES,
    max_incremental_backups: 6,
    max_full_backups: 2,
    poll_interval: 30,
    compression: 6,
  },
  logging: {
    level: "info",
  },
};

export type PlainObject = Record<string, unknown>;

export function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects, with source overriding target. Arrays are replaced.
 */
export function deepMerge(
  target: PlainObject,
  source: PlainObject,
): PlainObject {
  const result: PlainObject = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = target[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

/**
 * Defaults as a fresh mutable tree
 */
export function defaultConfigTree(): PlainObject {
  return {
    clickhouse: { ...DEFAULT_CONFIG.clickhouse },
    backup: {
      ...DEFAULT_CONFIG.backup,
      ignored_databases: [...DEFAULT_CONFIG.backup.ignored_databases],
    },
    logging: { ...DEFAULT_CONFIG.logging },
  };
}
