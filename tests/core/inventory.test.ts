import { describe, expect, test } from "vitest";
import {
  ancestry,
  buildInventory,
  chainUnits,
  findOrphan,
  findUnit,
  latestUnit,
  mostRecentChain,
  parseEntries,
  scanInventory,
} from "../../src/core/inventory";
import { full, inc, inventoryOf, MemoryBackend, unit } from "../helpers";

const ids = (units: { id: string }[]) => units.map((u) => u.id);

describe("inventory", () => {
  describe("buildInventory", () => {
    test("groups incrementals under their full backup", () => {
      const inventory = inventoryOf(
        inc("20240503_020000", "20240502_020000"),
        full("20240501_020000"),
        inc("20240502_020000", "20240501_020000"),
        full("20240504_020000"),
      );

      expect(inventory.chains).toHaveLength(2);
      const [first] = inventory.chains;
      expect(first && ids(chainUnits(first))).toEqual([
        "ch-backup-20240501_020000-full",
        "ch-backup-20240502_020000-inc-20240501_020000",
        "ch-backup-20240503_020000-inc-20240502_020000",
      ]);
      expect(inventory.chains[1]?.full.id).toBe("ch-backup-20240504_020000-full");
      expect(inventory.chains[1]?.incrementals).toEqual([]);
      expect(inventory.orphans).toEqual([]);
    });

    test("resolves base ids through incremental bases", () => {
      const inventory = inventoryOf(
        full("20240501_020000"),
        inc("20240502_020000", "20240501_020000"),
        inc("20240503_020000", "20240502_020000"),
      );

      const [first, second] = inventory.chains[0]?.incrementals ?? [];
      expect(first?.baseId).toBe("ch-backup-20240501_020000-full");
      expect(second?.baseId).toBe("ch-backup-20240502_020000-inc-20240501_020000");
    });

    test("orphans incrementals with a missing base and their descendants", () => {
      const inventory = inventoryOf(
        full("20240501_020000"),
        inc("20240503_020000", "20240502_020000"),
        inc("20240504_020000", "20240503_020000"),
      );

      expect(inventory.chains[0]?.incrementals).toEqual([]);
      expect(inventory.orphans.map((o) => [o.unit.id, o.reason])).toEqual([
        ["ch-backup-20240503_020000-inc-20240502_020000", "missing-base"],
        ["ch-backup-20240504_020000-inc-20240503_020000", "missing-base"],
      ]);
    });

    test("orphans incrementals whose base is not older", () => {
      const inventory = inventoryOf(
        full("20240505_020000"),
        inc("20240502_020000", "20240505_020000"),
      );

      expect(inventory.orphans).toEqual([
        { unit: expect.objectContaining({ key: "20240502_020000" }), reason: "forward-reference" },
      ]);
    });

    test("orphans a second unit with the same timestamp as a duplicate", () => {
      const inventory = inventoryOf(
        full("20240501_020000"),
        inc("20240501_020000", "20240430_020000"),
      );

      expect(inventory.chains).toHaveLength(1);
      expect(inventory.orphans.map((o) => [o.unit.id, o.reason])).toEqual([
        ["ch-backup-20240501_020000-inc-20240430_020000", "duplicate"],
      ]);
    });

    test("does not mutate the input units", () => {
      const base = full("20240501_020000");
      const next = inc("20240502_020000", "20240501_020000");
      buildInventory([base, next]);
      expect(next.baseId).toBeNull();
    });
  });

  describe("queries", () => {
    const inventory = inventoryOf(
      full("20240501_020000"),
      inc("20240502_020000", "20240501_020000"),
      full("20240503_020000"),
      inc("20240510_020000", "20240509_020000"),
    );

    test("latestUnit returns the newest incremental or the full backup", () => {
      const [first, second] = inventory.chains;
      expect(first && latestUnit(first).id).toBe("ch-backup-20240502_020000-inc-20240501_020000");
      expect(second && latestUnit(second).id).toBe("ch-backup-20240503_020000-full");
    });

    test("mostRecentChain picks the chain with the newest unit", () => {
      expect(mostRecentChain(inventory)?.full.id).toBe("ch-backup-20240503_020000-full");
      expect(mostRecentChain(inventoryOf())).toBeNull();
    });

    test("mostRecentChain breaks ties by id", () => {
      // Same instant, legacy key without seconds
      const tied = inventoryOf(full("20240501_0200"), full("20240501_020000"));
      expect(mostRecentChain(tied)?.full.id).toBe("ch-backup-20240501_020000-full");
    });

    test("findUnit matches ids and stored names", () => {
      expect(findUnit(inventory, "ch-backup-20240501_020000-full")?.kind).toBe("full");
      expect(findUnit(inventory, "ch-backup-20240510_020000-inc-20240509_020000")).toBeNull();
      expect(findOrphan(inventory, "ch-backup-20240510_020000-inc-20240509_020000")?.reason).toBe(
        "missing-base",
      );
    });

    test("ancestry walks back to the full backup", () => {
      const chained = inventoryOf(
        full("20240501_020000"),
        inc("20240502_020000", "20240501_020000"),
        inc("20240503_020000", "20240502_020000"),
      );
      const newest = findUnit(chained, "ch-backup-20240503_020000-inc-20240502_020000");
      expect(newest && ids(ancestry(chained, newest))).toEqual([
        "ch-backup-20240503_020000-inc-20240502_020000",
        "ch-backup-20240502_020000-inc-20240501_020000",
        "ch-backup-20240501_020000-full",
      ]);
    });
  });

  describe("parseEntries", () => {
    test("treats archives as units on archived targets", () => {
      const { units, orphans, warnings } = parseEntries(
        [
          { name: "ch-backup-20240501_020000-full.tar.gz", isDirectory: false },
          { name: "ch-backup-20240501_020000-full", isDirectory: true },
          { name: "ch-backup-20240502_020000-inc-20240501_020000", isDirectory: true },
          { name: "ch-backup-20240503_020000-full.tar.gz.tmp", isDirectory: false },
          { name: "lost+found", isDirectory: true },
        ],
        true,
      );

      expect(units.map((u) => u.location)).toEqual(["ch-backup-20240501_020000-full.tar.gz"]);
      expect(units[0]?.archived).toBe(true);
      expect(orphans.map((o) => [o.unit.id, o.reason])).toEqual([
        ["ch-backup-20240502_020000-inc-20240501_020000", "partial"],
      ]);
      expect(warnings).toEqual([
        {
          entry: "ch-backup-20240503_020000-full.tar.gz.tmp",
          message: "Incomplete archive left by an interrupted run",
        },
        { entry: "lost+found", message: "Not a backup name" },
      ]);
    });

    test("treats directories as units on other targets", () => {
      const { units, warnings } = parseEntries(
        [
          { name: "ch-backup-20240501_020000-full", isDirectory: true },
          { name: "ch-backup-20240502_020000-full", isDirectory: false },
        ],
        false,
      );

      expect(units.map((u) => u.id)).toEqual(["ch-backup-20240501_020000-full"]);
      expect(units[0]?.archived).toBe(false);
      expect(warnings).toEqual([
        { entry: "ch-backup-20240502_020000-full", message: "File without an archive suffix" },
      ]);
    });

    test("orphans unit prefixes the engine never finished", () => {
      const { units, orphans } = parseEntries(
        [
          { name: "ch-backup-20240501_020000-full", isDirectory: true, complete: true },
          {
            name: "ch-backup-20240501_030000-inc-20240501_020000",
            isDirectory: true,
            complete: false,
          },
        ],
        false,
      );

      expect(units.map((u) => u.id)).toEqual(["ch-backup-20240501_020000-full"]);
      expect(orphans.map((o) => [o.unit.id, o.reason])).toEqual([
        ["ch-backup-20240501_030000-inc-20240501_020000", "partial"],
      ]);
    });

    test("orphans incrementals whose base is not a valid key", () => {
      const { units, orphans, warnings } = parseEntries(
        [
          { name: "ch-backup-20240501_020000-full.tar.gz", isDirectory: false },
          { name: "ch-backup-20240502_020000-inc-20241399_999999.tar.gz", isDirectory: false },
        ],
        true,
      );

      expect(units.map((u) => u.id)).toEqual(["ch-backup-20240501_020000-full"]);
      expect(orphans.map((o) => [o.unit.location, o.reason])).toEqual([
        ["ch-backup-20240502_020000-inc-20241399_999999.tar.gz", "invalid-base"],
      ]);
      expect(warnings).toEqual([]);
    });
  });

  describe("scanInventory", () => {
    test("rebuilds chains from the backend listing", async () => {
      const backend = new MemoryBackend(true, [
        "ch-backup-20240501_020000-full.tar.gz",
        "ch-backup-20240502_020000-inc-20240501_020000.tar.gz",
        "notes.txt",
      ]);

      const inventory = await scanInventory(backend);

      expect(inventory.chains).toHaveLength(1);
      expect(inventory.chains[0]?.incrementals[0]?.baseId).toBe("ch-backup-20240501_020000-full");
      expect(inventory.warnings).toEqual([{ entry: "notes.txt", message: "Not a backup name" }]);
    });

    test("keeps partial units out of the chains", async () => {
      const backend = new MemoryBackend(true, ["ch-backup-20240501_020000-full"]);

      const inventory = await scanInventory(backend);

      expect(inventory.chains).toEqual([]);
      expect(inventory.orphans).toEqual([
        { unit: unit("ch-backup-20240501_020000-full"), reason: "partial" },
      ]);
    });
  });
});
