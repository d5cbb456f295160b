/**
 * Centralized type exports for chbackup
 */

// Backup types
export type {
  BackupDecision,
  BackupKind,
  BackupResult,
  BackupUnit,
  Chain,
  DeletionOutcome,
  Inventory,
  InventoryWarning,
  OrphanedUnit,
  OrphanReason,
  RetentionPolicy,
} from "./backup";
// Config types
export type {
  BackupConfig,
  BackupTarget,
  ChBackupConfig,
  ClickHouseConfig,
  LoggingConfig,
  S3Config,
} from "./config";
export { BACKUP_TARGETS } from "./config";
// Storage types
export type { IBackupBackend, StoredEntry } from "./storage";
