/**
 * Backends whose units are archives in a local directory
 * (File and Disk targets)
 */

import { readdir, rm } from "node:fs/promises";
import * as path from "node:path";
import { ConfigError } from "../config/validator";
import {
  type ArchiveOptions,
  archiveDirectory,
  extractArchive,
} from "../core/backup/archiver";
import { diskClause, fileClause } from "../core/backup/command-builder";
import { BackendIOError, errorMessage } from "../core/errors";
import type {
  BackupTarget,
  BackupUnit,
  IBackupBackend,
  StoredEntry,
} from "../types";
import { logger } from "../utils/logger";
import { isPathWithinDir } from "../utils/path";

abstract class ArchivedBackend implements IBackupBackend {
  abstract readonly target: BackupTarget;
  readonly requiresArchiving = true;

  constructor(
    readonly dir: string,
    protected readonly archive: ArchiveOptions,
  ) {}

  /** Native clause for an entry name relative to the engine's backup path */
  protected abstract clause(name: string): string;

  async listEntries(): Promise<StoredEntry[]> {
    try {
      const entries = await readdir(this.dir, { withFileTypes: true });
      return entries.map((entry) => ({
        name: entry.name,
        isDirectory: entry.isDirectory(),
      }));
    } catch (error) {
      throw new ConfigError(
        `Cannot read backup.dir ${this.dir}: ${errorMessage(error)}`,
      );
    }
  }

  destination(id: string): string {
    return this.clause(id);
  }

  source(unit: BackupUnit): string {
    return this.clause(unit.location);
  }

  async finalize(unit: BackupUnit): Promise<void> {
    await archiveDirectory(
      this.resolve(unit.id),
      this.resolve(unit.location),
      this.archive,
    );
  }

  async extract(unit: BackupUnit): Promise<string> {
    if (!unit.archived) return this.source(unit);
    await extractArchive(
      this.resolve(unit.location),
      this.resolve(unit.id),
      this.archive,
    );
    return this.clause(unit.id);
  }

  async delete(unit: BackupUnit): Promise<void> {
    const targets = [this.resolve(unit.location)];
    // Copy left behind by a restore --extract
    if (unit.archived) targets.push(this.resolve(unit.id));

    for (const target of targets) {
      try {
        await rm(target, { recursive: true, force: true });
      } catch (error) {
        throw new BackendIOError(
          `Failed to delete ${target}: ${errorMessage(error)}`,
          error,
        );
      }
    }
    logger.debug(`Deleted local backup: ${unit.location}`);
  }

  protected resolve(name: string): string {
    const resolved = path.resolve(this.dir, name);
    if (!isPathWithinDir(resolved, this.dir)) {
      throw new BackendIOError(
        `Refusing to touch a path outside ${this.dir}: ${name}`,
      );
    }
    return resolved;
  }
}

/**
 * Units addressed by path through the engine's `File()` destination
 */
export class FileBackend extends ArchivedBackend {
  readonly target = "File" as const;

  protected clause(name: string): string {
    return fileClause(name);
  }
}

/**
 * Units addressed through an engine storage alias, listed through the
 * directory that alias points at
 */
export class DiskBackend extends ArchivedBackend {
  readonly target = "Disk" as const;

  constructor(
    private readonly disk: string,
    dir: string,
    archive: ArchiveOptions,
  ) {
    super(dir, archive);
  }

  protected clause(name: string): string {
    return diskClause(this.disk, name);
  }
}
