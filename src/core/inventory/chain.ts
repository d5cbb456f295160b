/**
 * Chain reconstruction from parsed backup units
 */

import type {
  BackupUnit,
  Chain,
  Inventory,
  InventoryWarning,
  OrphanedUnit,
  OrphanReason,
} from "../../types";

type Resolution = { chain: Chain } | { reason: OrphanReason };

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function compareUnits(a: BackupUnit, b: BackupUnit): number {
  const byTime = a.createdAt.getTime() - b.createdAt.getTime();
  if (byTime !== 0) return byTime;
  return compareStrings(a.id, b.id);
}

/**
 * Group units into chains by following base links back to a full backup.
 *
 * Incrementals whose base is missing, not older than themselves, or part of a
 * loop are orphaned, as is everything built on top of them. Units sharing a
 * key with an earlier unit are orphaned as duplicates.
 */
export function buildInventory(
  units: BackupUnit[],
  orphans: OrphanedUnit[] = [],
  warnings: InventoryWarning[] = [],
): Inventory {
  const sorted = [...units].sort(
    (a, b) => compareStrings(a.key, b.key) || compareStrings(a.id, b.id),
  );

  const allOrphans: OrphanedUnit[] = [...orphans];
  const byKey = new Map<string, BackupUnit>();

  for (const unit of sorted) {
    if (byKey.has(unit.key)) {
      allOrphans.push({ unit: { ...unit, baseId: null }, reason: "duplicate" });
      continue;
    }
    byKey.set(unit.key, { ...unit, baseId: null });
  }

  const chainsByFullKey = new Map<string, Chain>();
  for (const unit of byKey.values()) {
    if (unit.kind === "full") {
      chainsByFullKey.set(unit.key, { full: unit, incrementals: [] });
    }
  }

  const resolved = new Map<string, Resolution>();

  const resolve = (unit: BackupUnit, visiting: Set<string>): Resolution => {
    const known = resolved.get(unit.key);
    if (known) return known;

    let result: Resolution;
    if (unit.kind === "full") {
      const chain = chainsByFullKey.get(unit.key);
      result = chain ? { chain } : { reason: "missing-base" };
    } else if (visiting.has(unit.key)) {
      result = { reason: "cycle" };
    } else {
      const base = unit.baseKey ? byKey.get(unit.baseKey) : undefined;
      if (!base) {
        result = { reason: "missing-base" };
      } else if (compareUnits(base, unit) >= 0) {
        result = { reason: "forward-reference" };
      } else {
        visiting.add(unit.key);
        const parent = resolve(base, visiting);
        visiting.delete(unit.key);
        if ("chain" in parent) {
          unit.baseId = base.id;
          result = parent;
        } else {
          result = {
            reason: parent.reason === "cycle" ? "cycle" : "missing-base",
          };
        }
      }
    }

    resolved.set(unit.key, result);
    return result;
  };

  for (const unit of byKey.values()) {
    if (unit.kind !== "incremental") continue;

    const result = resolve(unit, new Set());
    if ("chain" in result) {
      result.chain.incrementals.push(unit);
    } else {
      allOrphans.push({ unit, reason: result.reason });
    }
  }

  const chains = [...chainsByFullKey.values()];
  for (const chain of chains) {
    chain.incrementals.sort(compareUnits);
  }
  chains.sort((a, b) => compareUnits(a.full, b.full));
  allOrphans.sort((a, b) => compareUnits(a.unit, b.unit));

  return { chains, orphans: allOrphans, warnings };
}

/**
 * Number of incrementals in the chain
 */
export function chainLength(chain: Chain): number {
  return chain.incrementals.length;
}

/**
 * Newest unit of the chain, the full backup when it has no incrementals
 */
export function latestUnit(chain: Chain): BackupUnit {
  return chain.incrementals[chain.incrementals.length - 1] ?? chain.full;
}

/**
 * All units of the chain, oldest first
 */
export function chainUnits(chain: Chain): BackupUnit[] {
  return [chain.full, ...chain.incrementals];
}

/**
 * The chain whose newest unit is the most recent. Ties go to the greatest id.
 */
export function mostRecentChain(inventory: Inventory): Chain | null {
  let best: Chain | null = null;

  for (const chain of inventory.chains) {
    if (!best || compareUnits(latestUnit(chain), latestUnit(best)) > 0) {
      best = chain;
    }
  }

  return best;
}

/**
 * Find a resolved unit by id or by stored entry name
 */
export function findUnit(
  inventory: Inventory,
  name: string,
): BackupUnit | null {
  for (const chain of inventory.chains) {
    for (const unit of chainUnits(chain)) {
      if (unit.id === name || unit.location === name) return unit;
    }
  }
  return null;
}

/**
 * Find an orphaned unit by id or by stored entry name
 */
export function findOrphan(
  inventory: Inventory,
  name: string,
): OrphanedUnit | null {
  return (
    inventory.orphans.find(
      (o) => o.unit.id === name || o.unit.location === name,
    ) ?? null
  );
}

/**
 * The unit followed by its bases down to the full backup
 */
export function ancestry(inventory: Inventory, unit: BackupUnit): BackupUnit[] {
  const byId = new Map<string, BackupUnit>();
  for (const chain of inventory.chains) {
    for (const member of chainUnits(chain)) byId.set(member.id, member);
  }

  const path: BackupUnit[] = [];
  let current: BackupUnit | undefined = unit;
  while (current) {
    path.push(current);
    current = current.baseId ? byId.get(current.baseId) : undefined;
  }
  return path;
}
