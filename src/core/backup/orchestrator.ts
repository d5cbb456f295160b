/**
 * Backup orchestration: scan, decide, prune, write, archive, re-check
 */

import type { INativeEngine } from "../../clickhouse/client";
import type {
  BackupResult,
  IBackupBackend,
  Inventory,
  RetentionPolicy,
} from "../../types";
import { maskSecrets } from "../../utils/format";
import { logger } from "../../utils/logger";
import { createUnit } from "../../utils/naming";
import { executeDeletions, planDeletions } from "../cleanup";
import { BackendIOError } from "../errors";
import { chainUnits, scanInventory } from "../inventory";
import { buildBackupCommand } from "./command-builder";
import { decideNext } from "./scheduler";

export interface BackupContext {
  backend: IBackupBackend;
  engine: INativeEngine;
  policy: RetentionPolicy;
  ignoredDatabases: string[];
}

export interface BackupOptions {
  forceFull?: boolean;
  dryRun?: boolean;
  /** Creation time of the new unit */
  now?: Date;
}

function usedKeys(inventory: Inventory): Set<string> {
  const keys = new Set<string>();
  for (const chain of inventory.chains) {
    for (const unit of chainUnits(chain)) keys.add(unit.key);
  }
  for (const orphan of inventory.orphans) keys.add(orphan.unit.key);
  return keys;
}

export async function runBackup(
  context: BackupContext,
  options: BackupOptions = {},
): Promise<BackupResult> {
  const startTime = Date.now();
  const { backend, engine, policy } = context;

  const inventory = await scanInventory(backend);
  const decision = decideNext(inventory, policy, options.forceFull ?? false);
  const unit = createUnit(
    options.now ?? new Date(),
    decision.base,
    backend.requiresArchiving,
  );

  if (usedKeys(inventory).has(unit.key)) {
    throw new BackendIOError(
      `A backup with timestamp ${unit.key} already exists at the target`,
    );
  }

  const command = buildBackupCommand({
    destination: backend.destination(unit.id),
    ignoredDatabases: context.ignoredDatabases,
    base: decision.base ? backend.source(decision.base) : null,
  });

  logger.info(
    decision.base
      ? `Next backup: incremental ${unit.id} on top of ${decision.base.id}`
      : `Next backup: full ${unit.id}`,
  );

  const dryRun = options.dryRun ?? false;
  const deletions = await executeDeletions(
    backend,
    planDeletions(inventory, policy, decision),
    { dryRun },
  );

  const finish = (): BackupResult => ({
    unit,
    decision,
    command,
    deletions,
    durationMs: Date.now() - startTime,
    dryRun,
  });

  if (dryRun) {
    logger.info(`[DRY RUN] Would run: ${maskSecrets(command)}`);
    return finish();
  }

  logger.debug(`Running: ${maskSecrets(command)}`);
  await engine.runBackup(command);
  await backend.finalize(unit);
  logger.info(`Backup ${unit.location} created`);

  // The chain kept back for lack of a replacement can go now
  const settled = await scanInventory(backend);
  const postCheck = planDeletions(settled, policy, null);
  deletions.push(...(await executeDeletions(backend, postCheck)));

  return finish();
}
