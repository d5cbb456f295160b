import { mkdir, mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { ConfigError } from "../../src/config";
import { scanInventory } from "../../src/core/inventory";
import { DiskBackend, FileBackend } from "../../src/storage/local";
import { unit } from "../helpers";

const FULL = "ch-backup-20240501_020000-full";

describe("local backends", () => {
  let tempDir: string;
  let backend: FileBackend;

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), "chbackup-local-test-"));
    backend = new FileBackend(tempDir, { compression: 1 });
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  test("address units through native clauses", () => {
    const disk = new DiskBackend("backups", tempDir, { compression: 6 });

    expect(backend.destination(FULL)).toBe(`File('${FULL}')`);
    expect(backend.source(unit(`${FULL}.tar.gz`))).toBe(`File('${FULL}.tar.gz')`);
    expect(disk.destination(FULL)).toBe(`Disk('backups', '${FULL}')`);
    expect(backend.requiresArchiving).toBe(true);
  });

  test("lists files and directories", async () => {
    await writeFile(path.join(tempDir, `${FULL}.tar.gz`), "archive");
    await mkdir(path.join(tempDir, "ch-backup-20240502_020000-full"));

    const entries = await backend.listEntries();

    expect(entries.sort((a, b) => a.name.localeCompare(b.name))).toEqual([
      { name: `${FULL}.tar.gz`, isDirectory: false },
      { name: "ch-backup-20240502_020000-full", isDirectory: true },
    ]);
  });

  test("reports an unreadable directory as a configuration error", async () => {
    const missing = new FileBackend(path.join(tempDir, "missing"), { compression: 6 });

    await expect(missing.listEntries()).rejects.toThrow(ConfigError);
  });

  test("finalize turns the written directory into an archive unit", async () => {
    await mkdir(path.join(tempDir, FULL));
    await writeFile(path.join(tempDir, FULL, ".backup"), "<config/>");

    await backend.finalize(unit(`${FULL}.tar.gz`));

    const inventory = await scanInventory(backend);
    expect(inventory.chains.map((c) => c.full.location)).toEqual([`${FULL}.tar.gz`]);
    expect(inventory.orphans).toEqual([]);
  });

  test("delete removes the archive and its extracted copy", async () => {
    await writeFile(path.join(tempDir, `${FULL}.tar.gz`), "archive");
    await mkdir(path.join(tempDir, FULL));
    await writeFile(path.join(tempDir, "keep.txt"), "x");

    await backend.delete(unit(`${FULL}.tar.gz`));

    expect(await readdir(tempDir)).toEqual(["keep.txt"]);
  });

  test("deleting an absent unit succeeds", async () => {
    await expect(backend.delete(unit(`${FULL}.tar.gz`))).resolves.toBeUndefined();
  });

  test("refuses paths outside the directory", async () => {
    const escaping = { ...unit(`${FULL}.tar.gz`), location: "../elsewhere.tar.gz" };

    await expect(backend.delete(escaping)).rejects.toThrow("Refusing to touch a path outside");
  });
});
