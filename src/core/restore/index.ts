/**
 * Restore command generation. Commands are returned for the operator to run;
 * nothing is executed against the engine.
 */

import type {
  BackupUnit,
  IBackupBackend,
  Inventory,
  OrphanReason,
} from "../../types";
import {
  buildRestoreVariants,
  type RestoreVariant,
} from "../backup/command-builder";
import { ancestry, findOrphan, findUnit } from "../inventory";

export class BackupNotFoundError extends Error {
  constructor(
    readonly backupName: string,
    readonly unresolved: OrphanReason | null,
  ) {
    super(
      unresolved
        ? `Backup ${backupName} is unresolved (${unresolved}) ` +
          "and cannot be restored"
        : `No match for ${backupName}! Check the name`,
    );
    this.name = "BackupNotFoundError";
  }
}

export interface RestorePlan {
  unit: BackupUnit;
  /** The unit and its bases down to the full backup */
  lineage: BackupUnit[];
  source: string;
  base: string | null;
  variants: RestoreVariant[];
}

export interface RestoreOptions {
  ignoredDatabases: string[];
  /** Unpack archived units first and restore from the directories */
  extract?: boolean;
}

export async function planRestore(
  backend: IBackupBackend,
  inventory: Inventory,
  name: string,
  options: RestoreOptions,
): Promise<RestorePlan> {
  const unit = findUnit(inventory, name);
  if (!unit) {
    const orphan = findOrphan(inventory, name);
    throw new BackupNotFoundError(name, orphan ? orphan.reason : null);
  }

  const lineage = ancestry(inventory, unit);
  const clauses = new Map<string, string>();

  // Full backup first so each base is in place before what builds on it
  for (const member of [...lineage].reverse()) {
    clauses.set(
      member.id,
      options.extract ? await backend.extract(member) : backend.source(member),
    );
  }

  const source = clauses.get(unit.id) ?? backend.source(unit);
  const base = unit.baseId ? (clauses.get(unit.baseId) ?? null) : null;

  return {
    unit,
    lineage,
    source,
    base,
    variants: buildRestoreVariants(source, base, options.ignoredDatabases),
  };
}
