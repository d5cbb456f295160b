/**
 * Backup inventory scanner
 */

import type {
  BackupUnit,
  IBackupBackend,
  Inventory,
  InventoryWarning,
  OrphanedUnit,
  StoredEntry,
} from "../../types";
import { logger } from "../../utils/logger";
import { parseUnitName } from "../../utils/naming";
import { buildInventory } from "./chain";

export interface ParsedEntries {
  units: BackupUnit[];
  orphans: OrphanedUnit[];
  warnings: InventoryWarning[];
}

/**
 * Parse raw target entries into units.
 *
 * On archived targets a unit is an archive file. A directory with a unit name
 * is an extracted copy when the archive of the same id exists, otherwise a
 * unit the engine or the archiver never finished. On object stores a unit
 * prefix without the engine's completion marker is partial.
 */
export function parseEntries(
  entries: StoredEntry[],
  archived: boolean,
): ParsedEntries {
  const units: BackupUnit[] = [];
  const orphans: OrphanedUnit[] = [];
  const warnings: InventoryWarning[] = [];

  const archivedIds = new Set<string>();
  for (const entry of entries) {
    const parsed = parseUnitName(entry.name);
    if (parsed?.archiveSuffix && !entry.isDirectory) archivedIds.add(parsed.id);
  }

  for (const entry of entries) {
    const parsed = parseUnitName(entry.name);

    if (!parsed) {
      const message = entry.name.endsWith(".tmp")
        ? "Incomplete archive left by an interrupted run"
        : "Not a backup name";
      warnings.push({ entry: entry.name, message });
      continue;
    }

    const unit: BackupUnit = {
      id: parsed.id,
      key: parsed.key,
      createdAt: parsed.createdAt,
      kind: parsed.kind,
      baseKey: parsed.baseKey,
      baseId: null,
      location: entry.name,
      archived: parsed.archiveSuffix !== null,
    };

    if (parsed.archiveSuffix) {
      if (entry.isDirectory) {
        warnings.push({
          entry: entry.name,
          message: "Directory named like an archive",
        });
      } else if (parsed.baseKeyValid) {
        units.push(unit);
      } else {
        orphans.push({ unit, reason: "invalid-base" });
      }
      continue;
    }

    if (!entry.isDirectory) {
      warnings.push({
        entry: entry.name,
        message: "File without an archive suffix",
      });
      continue;
    }

    if (archived && archivedIds.has(parsed.id)) {
      logger.debug(`Ignoring extracted copy: ${entry.name}`);
    } else if (archived || entry.complete === false) {
      orphans.push({ unit, reason: "partial" });
    } else if (parsed.baseKeyValid) {
      units.push(unit);
    } else {
      orphans.push({ unit, reason: "invalid-base" });
    }
  }

  return { units, orphans, warnings };
}

/**
 * List the target and rebuild its chains
 */
export async function scanInventory(
  backend: IBackupBackend,
): Promise<Inventory> {
  const entries = await backend.listEntries();
  logger.debug(`Found ${entries.length} entries at ${backend.target} target`);

  const { units, orphans, warnings } = parseEntries(
    entries,
    backend.requiresArchiving,
  );
  const inventory = buildInventory(units, orphans, warnings);

  for (const warning of inventory.warnings) {
    logger.warn(`Skipping ${warning.entry}: ${warning.message}`);
  }
  for (const orphan of inventory.orphans) {
    logger.warn(
      `Unresolved backup ${orphan.unit.location} (${orphan.reason}), ` +
        "excluded from scheduling",
    );
  }

  return inventory;
}
