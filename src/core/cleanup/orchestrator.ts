/**
 * Deletion of planned units
 */

import type { BackupUnit, DeletionOutcome, IBackupBackend } from "../../types";
import { logger } from "../../utils/logger";
import { errorMessage } from "../errors";

export interface DeletionOptions {
  dryRun?: boolean;
}

/**
 * Delete units one by one. A failure is recorded and the remaining units are
 * still attempted.
 *
 * Chains are deleted full backup first, so an incremental that fails to go
 * after its base went is left without a base. Retention never reaches such a
 * unit again; it is reported for manual cleanup.
 */
export async function executeDeletions(
  backend: IBackupBackend,
  units: BackupUnit[],
  options: DeletionOptions = {},
): Promise<DeletionOutcome[]> {
  const outcomes: DeletionOutcome[] = [];
  // Ids of units that are gone or were left without their base
  const baseless = new Set<string>();

  for (const unit of units) {
    if (options.dryRun) {
      logger.info(`[DRY RUN] Would delete: ${unit.location}`);
      outcomes.push({ unit, success: true });
      continue;
    }

    try {
      await backend.delete(unit);
      logger.info(`Deleted ${unit.kind} backup: ${unit.location}`);
      outcomes.push({ unit, success: true });
      baseless.add(unit.id);
    } catch (error) {
      const message = errorMessage(error);
      logger.error(`Failed to delete ${unit.location}: ${message}`);
      outcomes.push({ unit, success: false, error: message });

      if (unit.baseId && baseless.has(unit.baseId)) {
        baseless.add(unit.id);
        logger.warn(
          `${unit.location} is left without its base and needs manual cleanup`,
        );
      }
    }
  }

  return outcomes;
}
