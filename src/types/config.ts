/**
 * Configuration type definitions for chbackup
 */

export const BACKUP_TARGETS = ["File", "Disk", "S3", "S3-Disk"] as const;

export type BackupTarget = (typeof BACKUP_TARGETS)[number];

export interface ClickHouseConfig {
  host: string;
  port: number;
  protocol: "http" | "https";
  user: string;
  password: string;
}

export interface S3Config {
  endpoint?: string;
  bucket?: string;
  /** Key prefix inside the bucket that holds the backups */
  prefix?: string;
  region?: string;
  access_key_id?: string;
  secret_access_key?: string;
}

export interface BackupConfig {
  target: BackupTarget;
  /** Local directory backing File and Disk targets */
  dir?: string;
  /** Engine storage alias for Disk and S3-Disk targets */
  disk?: string;
  ignored_databases: string[];
  max_incremental_backups: number;
  max_full_backups: number;
  /** Seconds between status checks while the engine is writing a backup */
  poll_interval: number;
  /** gzip level for archives */
  compression: number;
  /** `user[:group]` applied to archives after they are written */
  archive_owner?: string;
  /** Octal mode applied to archives, e.g. "0640" */
  archive_mode?: string;
  s3?: S3Config;
}

export interface LoggingConfig {
  dir?: string;
  level: "debug" | "info" | "warn" | "error";
}

export interface ChBackupConfig {
  clickhouse: ClickHouseConfig;
  backup: BackupConfig;
  logging: LoggingConfig;
}
