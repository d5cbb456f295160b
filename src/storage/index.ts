/**
 * Storage module exports
 */

import { ConfigError } from "../config/validator";
import type { ArchiveOptions } from "../core/backup/archiver";
import type { ChBackupConfig, IBackupBackend } from "../types";
import { DiskBackend, FileBackend } from "./local";
import { S3Backend, S3DiskBackend, S3ObjectStore } from "./s3";

export { DiskBackend, FileBackend } from "./local";
export {
  type IObjectStore,
  normalizePrefix,
  S3Backend,
  S3DiskBackend,
  S3ObjectStore,
} from "./s3";

/**
 * Create the backend for the configured target
 */
export function createBackend(config: ChBackupConfig): IBackupBackend {
  const { backup } = config;
  const archive: ArchiveOptions = {
    compression: backup.compression,
    owner: backup.archive_owner,
    mode: backup.archive_mode,
  };
  const s3 = backup.s3 ?? {};

  switch (backup.target) {
    case "File":
      if (!backup.dir) {
        throw new ConfigError("backup.dir must be set for the File target");
      }
      return new FileBackend(backup.dir, archive);

    case "Disk":
      if (!backup.disk || !backup.dir) {
        throw new ConfigError(
          "backup.disk and backup.dir must be set for the Disk target",
        );
      }
      return new DiskBackend(backup.disk, backup.dir, archive);

    case "S3":
      if (!s3.bucket) {
        throw new ConfigError("backup.s3.bucket must be set for the S3 target");
      }
      return new S3Backend(new S3ObjectStore(s3.bucket, s3), s3);

    case "S3-Disk":
      if (!backup.disk || !s3.bucket) {
        throw new ConfigError(
          "backup.disk and backup.s3.bucket must be set for the S3-Disk target",
        );
      }
      return new S3DiskBackend(
        new S3ObjectStore(s3.bucket, s3),
        backup.disk,
        s3.prefix,
      );
  }
}
