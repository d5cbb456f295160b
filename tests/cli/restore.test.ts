import { describe, expect, test } from "vitest";
import { restoreCommands } from "../../src/cli/commands/restore";
import { scanInventory } from "../../src/core/inventory";
import { planRestore } from "../../src/core/restore";
import { S3Backend } from "../../src/storage/s3";
import { MemoryObjectStore } from "../helpers";

const FULL = "ch-backup-20240501_020000-full";

const s3Config = {
  endpoint: "http://minio:9000",
  bucket: "b",
  access_key_id: "test-key",
  secret_access_key: "test-secret",
};

async function planFor(name: string) {
  const store = new MemoryObjectStore([`${FULL}/.backup`]);
  const backend = new S3Backend(store, s3Config);
  const inventory = await scanInventory(backend);
  return planRestore(backend, inventory, name, { ignoredDatabases: ["system"] });
}

describe("restore output", () => {
  test("prints S3 commands with their credentials", async () => {
    const commands = restoreCommands(await planFor(FULL), false);

    expect(commands).toHaveLength(5);
    expect(commands[0]?.command).toBe(
      "RESTORE ALL EXCEPT DATABASES system FROM " +
        `S3('http://minio:9000/b/${FULL}', 'test-key', 'test-secret')`,
    );
  });

  test("masks credentials on request", async () => {
    const commands = restoreCommands(await planFor(FULL), true);

    expect(commands[0]?.command).toBe(
      "RESTORE ALL EXCEPT DATABASES system FROM " +
        `S3('http://minio:9000/b/${FULL}', '***', '***')`,
    );
    expect(commands.every((c) => !c.command.includes("test-secret"))).toBe(true);
  });
});
