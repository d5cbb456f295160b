/**
 * Retention policy logic
 */

import type {
  BackupDecision,
  BackupUnit,
  Chain,
  Inventory,
  RetentionPolicy,
} from "../../types";
import { chainUnits } from "../inventory";

/**
 * Chains to remove, oldest first.
 *
 * `pending` is the backup about to be written, or null once it has been
 * written. A pending full backup makes room for its own chain ahead of time;
 * the chain a pending incremental extends is never removed. The newest
 * existing chain is never removed ahead of its replacement, so with a limit of
 * one the old chain goes only after the new full backup exists.
 */
export function planChainDeletions(
  inventory: Inventory,
  policy: RetentionPolicy,
  pending: BackupDecision | null,
): Chain[] {
  if (policy.maxFullBackups === 0) return [];

  const limit =
    pending?.kind === "full"
      ? policy.maxFullBackups - 1
      : policy.maxFullBackups;
  const keep = Math.max(limit, 1);
  const excess = inventory.chains.length - keep;
  if (excess <= 0) return [];

  const base = pending?.kind === "incremental" ? pending.base : null;
  const candidates = inventory.chains
    .filter(
      (chain) =>
        !base || !chainUnits(chain).some((unit) => unit.id === base.id),
    )
    .sort(
      (a, b) => a.full.createdAt.getTime() - b.full.createdAt.getTime(),
    );

  return candidates.slice(0, excess);
}

/**
 * Units to delete in order: oldest chain first, oldest unit first within
 * a chain
 */
export function planDeletions(
  inventory: Inventory,
  policy: RetentionPolicy,
  pending: BackupDecision | null,
): BackupUnit[] {
  return planChainDeletions(inventory, policy, pending).flatMap(chainUnits);
}
