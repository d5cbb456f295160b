/**
 * Backup chain type definitions
 */

export type BackupKind = "full" | "incremental";

/**
 * One physical backup artifact at the target.
 */
export interface BackupUnit {
  /**
   * Name derived from the creation timestamp,
   * e.g. `ch-backup-20240501_020000-full`
   */
  id: string;
  /** Timestamp part of the id; incrementals reference their base by it */
  key: string;
  createdAt: Date;
  kind: BackupKind;
  /** Key of the base named by an incremental; null for full backups */
  baseKey: string | null;
  /**
   * Id of the unit this one is incremental against, once resolved; null for
   * full backups
   */
  baseId: string | null;
  /** Name of the stored entry (archive file, directory or key prefix) */
  location: string;
  archived: boolean;
}

/**
 * A full backup followed by the incrementals that link back to it,
 * oldest first.
 */
export interface Chain {
  full: BackupUnit;
  incrementals: BackupUnit[];
}

export type OrphanReason =
  | "missing-base"
  | "forward-reference"
  | "cycle"
  | "duplicate"
  | "partial"
  | "invalid-base";

export interface OrphanedUnit {
  unit: BackupUnit;
  reason: OrphanReason;
}

export interface InventoryWarning {
  entry: string;
  message: string;
}

/**
 * Chains reconstructed from a target listing. Never persisted.
 */
export interface Inventory {
  /** Ordered by the full unit's creation time, oldest first */
  chains: Chain[];
  orphans: OrphanedUnit[];
  warnings: InventoryWarning[];
}

export interface RetentionPolicy {
  /**
   * Incrementals allowed on a chain before the next backup is full
   * (0 = always full)
   */
  maxIncrementalBackups: number;
  /** Chains to keep (0 = unlimited) */
  maxFullBackups: number;
}

export type BackupDecision =
  | { kind: "full"; base: null }
  | { kind: "incremental"; base: BackupUnit };

export interface DeletionOutcome {
  unit: BackupUnit;
  success: boolean;
  error?: string;
}

export interface BackupResult {
  unit: BackupUnit;
  decision: BackupDecision;
  command: string;
  /** Deletions from the pass before and the pass after the backup */
  deletions: DeletionOutcome[];
  durationMs: number;
  dryRun: boolean;
}
