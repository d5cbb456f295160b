/**
 * Backend interface definitions
 */

import type { BackupTarget } from "./config";
import type { BackupUnit } from "./backup";

/**
 * A raw entry found at the target before its name is parsed.
 */
export interface StoredEntry {
  name: string;
  /** Directory on disk, or key prefix in an object store */
  isDirectory: boolean;
  /**
   * False for a unit directory the engine never marked as finished.
   * Left out by backends that cannot tell.
   */
  complete?: boolean;
}

export interface IBackupBackend {
  readonly target: BackupTarget;

  /**
   * Whether units are packed into a single archive after the engine
   * writes them
   */
  readonly requiresArchiving: boolean;

  /**
   * List the raw entries at the target
   */
  listEntries(): Promise<StoredEntry[]>;

  /**
   * Native clause the engine writes a new unit to
   */
  destination(id: string): string;

  /**
   * Native clause the engine reads an existing unit from
   */
  source(unit: BackupUnit): string;

  /**
   * Post-process a unit after the engine wrote it successfully
   */
  finalize(unit: BackupUnit): Promise<void>;

  /**
   * Make a unit readable for restore and return the native clause to
   * restore from.
   * Archived units are unpacked beside their archive.
   */
  extract(unit: BackupUnit): Promise<string>;

  /**
   * Delete a unit. Deleting an absent unit is not an error.
   */
  delete(unit: BackupUnit): Promise<void>;
}
