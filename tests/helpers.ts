import type { INativeEngine } from "../src/clickhouse/client";
import { buildInventory } from "../src/core/inventory";
import type { IObjectStore } from "../src/storage/s3";
import type {
  BackupUnit,
  IBackupBackend,
  Inventory,
  RetentionPolicy,
  StoredEntry,
} from "../src/types";
import { parseUnitName } from "../src/utils/naming";

/**
 * Unit record for a stored entry name
 */
export function unit(name: string): BackupUnit {
  const parsed = parseUnitName(name);
  if (!parsed) throw new Error(`Not a unit name: ${name}`);
  return {
    id: parsed.id,
    key: parsed.key,
    createdAt: parsed.createdAt,
    kind: parsed.kind,
    baseKey: parsed.baseKey,
    baseId: null,
    location: name,
    archived: parsed.archiveSuffix !== null,
  };
}

export const full = (key: string) => unit(`ch-backup-${key}-full`);
export const inc = (key: string, baseKey: string) => unit(`ch-backup-${key}-inc-${baseKey}`);

export function policyOf(
  maxIncrementalBackups: number,
  maxFullBackups: number,
): RetentionPolicy {
  return { maxIncrementalBackups, maxFullBackups };
}

export function inventoryOf(...units: BackupUnit[]): Inventory {
  return buildInventory(units);
}

/**
 * Backend keeping its entries in a map, name -> isDirectory. Names in
 * `incomplete` are listed as units the engine never finished.
 */
export class MemoryBackend implements IBackupBackend {
  readonly target = "File" as const;
  readonly entries = new Map<string, boolean>();
  readonly failDeletes = new Set<string>();
  readonly incomplete = new Set<string>();
  readonly finalized: string[] = [];
  readonly extracted: string[] = [];

  constructor(
    readonly requiresArchiving: boolean,
    names: string[] = [],
  ) {
    for (const name of names) this.add(name);
  }

  add(name: string, isDirectory = !name.endsWith(".tar.gz")): void {
    this.entries.set(name, isDirectory);
  }

  names(): string[] {
    return [...this.entries.keys()].sort();
  }

  async listEntries(): Promise<StoredEntry[]> {
    return [...this.entries].map(([name, isDirectory]) =>
      this.incomplete.has(name)
        ? { name, isDirectory, complete: false }
        : { name, isDirectory },
    );
  }

  destination(id: string): string {
    return `Memory('${id}')`;
  }

  source(unit: BackupUnit): string {
    return `Memory('${unit.location}')`;
  }

  async finalize(unit: BackupUnit): Promise<void> {
    this.finalized.push(unit.id);
    if (this.requiresArchiving) {
      this.entries.delete(unit.id);
      this.add(unit.location, false);
    }
  }

  async extract(unit: BackupUnit): Promise<string> {
    this.extracted.push(unit.id);
    return `Memory('${unit.id}')`;
  }

  async delete(unit: BackupUnit): Promise<void> {
    if (this.failDeletes.has(unit.id)) {
      throw new Error("permission denied");
    }
    this.entries.delete(unit.location);
    this.incomplete.delete(unit.location);
  }
}

/**
 * Engine that writes the destination directory into a MemoryBackend. With
 * `leavesPartial` a failing backup still leaves its unfinished directory.
 */
export class FakeEngine implements INativeEngine {
  readonly commands: string[] = [];
  failure: Error | null = null;
  leavesPartial = false;
  closed = false;

  constructor(private readonly backend: MemoryBackend) {}

  async runBackup(command: string): Promise<void> {
    this.commands.push(command);

    const match = command.match(/ TO Memory\('([^']+)'\)/);
    if (!match?.[1]) throw new Error(`No destination in ${command}`);

    if (this.failure) {
      if (this.leavesPartial) {
        this.backend.add(match[1], true);
        this.backend.incomplete.add(match[1]);
      }
      throw this.failure;
    }
    this.backend.add(match[1], true);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

/**
 * Object store keeping its keys in a set
 */
export class MemoryObjectStore implements IObjectStore {
  readonly bucket = "backups";
  readonly keys: Set<string>;
  readonly deleteCalls: string[][] = [];

  constructor(keys: string[]) {
    this.keys = new Set(keys);
  }

  async listChildren(prefix: string): Promise<StoredEntry[]> {
    const entries = new Map<string, boolean>();
    for (const key of this.keys) {
      if (!key.startsWith(prefix)) continue;
      const rest = key.slice(prefix.length);
      const slash = rest.indexOf("/");
      if (slash === -1) entries.set(rest, false);
      else entries.set(rest.slice(0, slash), true);
    }
    return [...entries].map(([name, isDirectory]) => ({ name, isDirectory }));
  }

  async listKeys(prefix: string): Promise<string[]> {
    return [...this.keys].filter((key) => key.startsWith(prefix)).sort();
  }

  async deleteKeys(keys: string[]): Promise<void> {
    this.deleteCalls.push(keys);
    for (const key of keys) this.keys.delete(key);
  }
}
