/**
 * Backup module exports
 */

export {
  type ArchiveOptions,
  type ArchiveResult,
  applyPermissions,
  archiveDirectory,
  extractArchive,
} from "./archiver";
export {
  type BackupCommandOptions,
  buildBackupCommand,
  buildRestoreCommand,
  buildRestoreVariants,
  diskClause,
  fileClause,
  quote,
  type RestoreCommandOptions,
  type RestoreScope,
  type RestoreVariant,
  s3Clause,
} from "./command-builder";
export {
  type BackupContext,
  type BackupOptions,
  runBackup,
} from "./orchestrator";
export { decideNext } from "./scheduler";
