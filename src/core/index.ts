/**
 * Core module exports
 */

// Backup
export {
  type BackupContext,
  type BackupOptions,
  buildBackupCommand,
  buildRestoreVariants,
  decideNext,
  type RestoreVariant,
  runBackup,
} from "./backup";

// Cleanup
export {
  type DeletionOptions,
  executeDeletions,
  planChainDeletions,
  planDeletions,
} from "./cleanup";

// Errors
export { BackendIOError, errorMessage, NativeCommandError } from "./errors";

// Inventory
export {
  ancestry,
  buildInventory,
  chainUnits,
  findUnit,
  latestUnit,
  mostRecentChain,
  scanInventory,
} from "./inventory";

// Restore
export {
  BackupNotFoundError,
  planRestore,
  type RestoreOptions,
  type RestorePlan,
} from "./restore";
