/**
 * Configuration validation
 */

import {
  BACKUP_TARGETS,
  type BackupTarget,
  type ChBackupConfig,
} from "../types";
import { isPlainObject, type PlainObject } from "./defaults";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const LOG_LEVELS = ["debug", "info", "warn", "error"];

function section(c: PlainObject, name: string): PlainObject {
  const value = c[name];
  if (!isPlainObject(value)) {
    throw new ConfigError(`Config must have a '${name}' section`);
  }
  return value;
}

function requireString(value: unknown, name: string): void {
  if (typeof value !== "string" || value === "") {
    throw new ConfigError(`${name} must be a non-empty string`);
  }
}

function optionalString(value: unknown, name: string): void {
  if (value !== undefined && typeof value !== "string") {
    throw new ConfigError(`${name} must be a string`);
  }
}

function requireCount(value: unknown, name: string): void {
  if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
    throw new ConfigError(`${name} must be a non-negative integer`);
  }
}

function isBackupTarget(value: unknown): value is BackupTarget {
  return (
    typeof value === "string" &&
    (BACKUP_TARGETS as readonly string[]).includes(value)
  );
}

type Validator = (config: PlainObject) => void;

type Section = "clickhouse" | "backup" | "target" | "logging";

const validators: Record<Section, Validator> = {
  clickhouse: (c) => {
    const ch = section(c, "clickhouse");
    requireString(ch.host, "clickhouse.host");
    if (
      typeof ch.port !== "number" ||
      !Number.isInteger(ch.port) ||
      ch.port < 1 ||
      ch.port > 65535
    ) {
      throw new ConfigError("clickhouse.port must be a port number");
    }
    if (ch.protocol !== "http" && ch.protocol !== "https") {
      throw new ConfigError("clickhouse.protocol must be 'http' or 'https'");
    }
    requireString(ch.user, "clickhouse.user");
    if (typeof ch.password !== "string") {
      throw new ConfigError("clickhouse.password must be a string");
    }
  },

  backup: (c) => {
    const backup = section(c, "backup");

    if (!isBackupTarget(backup.target)) {
      throw new ConfigError(
        `backup.target must be one of: ${BACKUP_TARGETS.join(", ")}`,
      );
    }
    optionalString(backup.dir, "backup.dir");
    optionalString(backup.disk, "backup.disk");

    const ignored = backup.ignored_databases;
    if (!Array.isArray(ignored) || ignored.length === 0) {
      throw new ConfigError(
        "backup.ignored_databases must list at least one database, e.g. system",
      );
    }
    for (const db of ignored) {
      if (typeof db !== "string" || !/^[A-Za-z0-9_]+$/.test(db)) {
        throw new ConfigError(
          `backup.ignored_databases contains an invalid name: ${String(db)}`,
        );
      }
    }

    requireCount(
      backup.max_incremental_backups,
      "backup.max_incremental_backups",
    );
    requireCount(backup.max_full_backups, "backup.max_full_backups");

    if (
      typeof backup.poll_interval !== "number" ||
      !Number.isFinite(backup.poll_interval) ||
      backup.poll_interval <= 0
    ) {
      throw new ConfigError(
        "backup.poll_interval must be a positive number of seconds",
      );
    }
    if (
      typeof backup.compression !== "number" ||
      !Number.isInteger(backup.compression) ||
      backup.compression < 1 ||
      backup.compression > 9
    ) {
      throw new ConfigError(
        "backup.compression must be an integer between 1 and 9",
      );
    }

    optionalString(backup.archive_owner, "backup.archive_owner");
    if (
      backup.archive_owner !== undefined &&
      !/^[A-Za-z0-9_.-]+(:[A-Za-z0-9_.-]+)?$/.test(String(backup.archive_owner))
    ) {
      throw new ConfigError(
        "backup.archive_owner must be 'user' or 'user:group'",
      );
    }
    optionalString(backup.archive_mode, "backup.archive_mode");
    if (
      backup.archive_mode !== undefined &&
      !/^0?[0-7]{3}$/.test(String(backup.archive_mode))
    ) {
      throw new ConfigError(
        "backup.archive_mode must be an octal mode such as 0640",
      );
    }

    if (backup.s3 !== undefined && !isPlainObject(backup.s3)) {
      throw new ConfigError("backup.s3 must be a section");
    }
  },

  // Settings each target needs
  target: (c) => {
    const backup = section(c, "backup");
    const s3 = isPlainObject(backup.s3) ? backup.s3 : {};

    const requireS3 = () => {
      requireString(s3.endpoint, "backup.s3.endpoint");
      requireString(s3.bucket, "backup.s3.bucket");
      requireString(s3.access_key_id, "backup.s3.access_key_id");
      requireString(s3.secret_access_key, "backup.s3.secret_access_key");
      optionalString(s3.prefix, "backup.s3.prefix");
      optionalString(s3.region, "backup.s3.region");
    };

    switch (backup.target) {
      case "File":
        requireString(backup.dir, "backup.dir (File target)");
        break;
      case "Disk":
        requireString(backup.disk, "backup.disk (Disk target)");
        requireString(backup.dir, "backup.dir (Disk target)");
        break;
      case "S3":
        requireS3();
        break;
      case "S3-Disk":
        requireString(backup.disk, "backup.disk (S3-Disk target)");
        requireS3();
        break;
    }
  },

  logging: (c) => {
    const logging = section(c, "logging");
    optionalString(logging.dir, "logging.dir");
    if (
      typeof logging.level !== "string" ||
      !LOG_LEVELS.includes(logging.level)
    ) {
      throw new ConfigError(
        `logging.level must be one of: ${LOG_LEVELS.join(", ")}`,
      );
    }
  },
};

/**
 * Validate a merged configuration tree
 */
export function validateConfig(
  config: unknown,
): asserts config is ChBackupConfig {
  if (!isPlainObject(config)) {
    throw new ConfigError("Config must be an object");
  }

  validators.clickhouse(config);
  validators.backup(config);
  validators.target(config);
  validators.logging(config);
}
