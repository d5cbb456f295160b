import { describe, expect, test } from "vitest";
import { decideNext } from "../../src/core/backup/scheduler";
import type { BackupUnit } from "../../src/types";
import { createUnit } from "../../src/utils/naming";
import { full, inc, inventoryOf, policyOf } from "../helpers";

const policy = { maxIncrementalBackups: 2, maxFullBackups: 2 };

describe("scheduler", () => {
  test("decides full on an empty target", () => {
    expect(decideNext(inventoryOf(), policy)).toEqual({ kind: "full", base: null });
  });

  test("extends the chain from its newest unit", () => {
    const inventory = inventoryOf(
      full("20240501_020000"),
      inc("20240502_020000", "20240501_020000"),
    );

    const decision = decideNext(inventory, policy);

    expect(decision.kind).toBe("incremental");
    expect(decision.base?.id).toBe("ch-backup-20240502_020000-inc-20240501_020000");
  });

  test("starts a new chain when the chain is at its limit", () => {
    const inventory = inventoryOf(
      full("20240501_020000"),
      inc("20240502_020000", "20240501_020000"),
      inc("20240503_020000", "20240502_020000"),
    );

    expect(decideNext(inventory, policy)).toEqual({ kind: "full", base: null });
  });

  test("always decides full when incrementals are disabled", () => {
    const inventory = inventoryOf(full("20240501_020000"));

    expect(decideNext(inventory, { ...policy, maxIncrementalBackups: 0 })).toEqual({
      kind: "full",
      base: null,
    });
  });

  test("decides full when forced", () => {
    const inventory = inventoryOf(full("20240501_020000"));

    expect(decideNext(inventory, policy, true)).toEqual({ kind: "full", base: null });
  });

  test("extends the chain holding the newest unit", () => {
    const inventory = inventoryOf(
      full("20240501_020000"),
      full("20240502_020000"),
      inc("20240503_020000", "20240501_020000"),
    );

    expect(decideNext(inventory, policy).base?.id).toBe(
      "ch-backup-20240503_020000-inc-20240501_020000",
    );
  });

  test("never builds on an orphaned unit", () => {
    const inventory = inventoryOf(
      full("20240501_020000"),
      inc("20240505_020000", "20240504_020000"),
    );

    expect(decideNext(inventory, policy).base?.id).toBe("ch-backup-20240501_020000-full");
  });

  test("a chain reaches N incrementals before the next full", () => {
    for (const n of [1, 3, 6]) {
      const units: BackupUnit[] = [];
      const kinds: string[] = [];
      let time = Date.UTC(2024, 4, 1, 2);

      for (let i = 0; i < n + 2; i++) {
        const decision = decideNext(inventoryOf(...units), policyOf(n, 0));
        kinds.push(decision.kind);
        units.push(createUnit(new Date(time), decision.base, false));
        time += 3_600_000;
      }

      expect(kinds).toEqual(["full", ...Array<string>(n).fill("incremental"), "full"]);
    }
  });
});
