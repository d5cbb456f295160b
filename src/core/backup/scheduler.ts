/**
 * Decides whether the next backup is full or incremental
 */

import type { BackupDecision, Inventory, RetentionPolicy } from "../../types";
import { chainLength, latestUnit, mostRecentChain } from "../inventory";

/**
 * Pick the next backup's kind and base.
 *
 * An incremental extends the most recent chain from its newest unit. A full
 * backup starts a new chain when forced, when there is nothing to extend, when
 * incrementals are disabled, or when the chain is at its limit.
 */
export function decideNext(
  inventory: Inventory,
  policy: RetentionPolicy,
  forceFull = false,
): BackupDecision {
  if (forceFull || policy.maxIncrementalBackups === 0) {
    return { kind: "full", base: null };
  }

  const chain = mostRecentChain(inventory);
  if (!chain || chainLength(chain) >= policy.maxIncrementalBackups) {
    return { kind: "full", base: null };
  }

  return { kind: "incremental", base: latestUnit(chain) };
}
