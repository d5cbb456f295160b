/**
 * Backends whose units are key prefixes in an object store
 * (S3 and S3-Disk targets)
 */

import {
  DeleteObjectsCommand,
  type DeleteObjectsCommandOutput,
  ListObjectsV2Command,
  type ListObjectsV2CommandOutput,
  S3Client,
} from "@aws-sdk/client-s3";
import { diskClause, s3Clause } from "../core/backup/command-builder";
import { BackendIOError, errorMessage } from "../core/errors";
import type {
  BackupTarget,
  BackupUnit,
  IBackupBackend,
  S3Config,
  StoredEntry,
} from "../types";
import { logger } from "../utils/logger";
import { UNIT_PREFIX } from "../utils/naming";

/**
 * The object store operations the backends need
 */
export interface IObjectStore {
  readonly bucket: string;

  /** Objects and sub-prefixes directly under `prefix` */
  listChildren(prefix: string): Promise<StoredEntry[]>;

  /** Every key starting with `prefix` */
  listKeys(prefix: string): Promise<string[]>;

  deleteKeys(keys: string[]): Promise<void>;
}

// DeleteObjects accepts at most this many keys per request
const DELETE_BATCH_SIZE = 1000;

/** Metadata object the engine writes last, once a backup has finished */
export const BACKUP_MARKER = ".backup";

export function normalizePrefix(prefix: string | undefined): string {
  if (!prefix) return "";
  const trimmed = prefix.replace(/^\/+/, "").replace(/\/+$/, "");
  return trimmed ? `${trimmed}/` : "";
}

export class S3ObjectStore implements IObjectStore {
  private readonly client: S3Client;

  constructor(
    readonly bucket: string,
    config: S3Config,
  ) {
    const accessKeyId =
      config.access_key_id ?? process.env.AWS_ACCESS_KEY_ID;
    const secretAccessKey =
      config.secret_access_key ?? process.env.AWS_SECRET_ACCESS_KEY;

    if (!accessKeyId || !secretAccessKey) {
      throw new BackendIOError(
        "S3 credentials not found. Set backup.s3.access_key_id " +
          "and backup.s3.secret_access_key.",
      );
    }

    this.client = new S3Client({
      endpoint: config.endpoint,
      region: config.region ?? process.env.AWS_REGION ?? "us-east-1",
      credentials: { accessKeyId, secretAccessKey },
      forcePathStyle: true,
    });
  }

  async listChildren(prefix: string): Promise<StoredEntry[]> {
    const entries: StoredEntry[] = [];
    await this.paginate(prefix, "/", (page) => {
      for (const common of page.CommonPrefixes ?? []) {
        const name = common.Prefix?.slice(prefix.length)
          .replace(/\/$/, "");
        if (name) entries.push({ name, isDirectory: true });
      }
      for (const object of page.Contents ?? []) {
        const name = object.Key?.slice(prefix.length);
        if (name) entries.push({ name, isDirectory: false });
      }
    });
    return entries;
  }

  async listKeys(prefix: string): Promise<string[]> {
    const keys: string[] = [];
    await this.paginate(prefix, undefined, (page) => {
      for (const object of page.Contents ?? []) {
        if (object.Key) keys.push(object.Key);
      }
    });
    return keys;
  }

  async deleteKeys(keys: string[]): Promise<void> {
    for (let i = 0; i < keys.length; i += DELETE_BATCH_SIZE) {
      const batch = keys.slice(i, i + DELETE_BATCH_SIZE);
      let output: DeleteObjectsCommandOutput;
      try {
        output = await this.client.send(
          new DeleteObjectsCommand({
            Bucket: this.bucket,
            Delete: { Objects: batch.map((Key) => ({ Key })), Quiet: true },
          }),
        );
      } catch (error) {
        throw new BackendIOError(
          `S3 delete failed: ${errorMessage(error)}`,
          error,
        );
      }

      const failed = output.Errors ?? [];
      if (failed.length > 0) {
        const first = failed[0];
        throw new BackendIOError(
          `S3 delete failed for ${failed.length} object(s), ` +
            `e.g. ${first?.Key}: ${first?.Message}`,
        );
      }
    }
  }

  private async paginate(
    prefix: string,
    delimiter: string | undefined,
    onPage: (page: ListObjectsV2CommandOutput) => void,
  ): Promise<void> {
    let token: string | undefined;
    do {
      let page: ListObjectsV2CommandOutput;
      try {
        page = await this.client.send(
          new ListObjectsV2Command({
            Bucket: this.bucket,
            Prefix: prefix,
            Delimiter: delimiter,
            ContinuationToken: token,
          }),
        );
      } catch (error) {
        throw new BackendIOError(
          `S3 listing failed for s3://${this.bucket}/${prefix}: ` +
            errorMessage(error),
          error,
        );
      }
      onPage(page);
      token = page.IsTruncated ? page.NextContinuationToken : undefined;
    } while (token);
  }
}

abstract class ObjectStoreBackend implements IBackupBackend {
  abstract readonly target: BackupTarget;
  readonly requiresArchiving = false;
  readonly prefix: string;

  constructor(
    protected readonly store: IObjectStore,
    prefix: string | undefined,
  ) {
    this.prefix = normalizePrefix(prefix);
  }

  protected abstract clause(name: string): string;

  /**
   * A unit prefix without the engine's completion marker is listed as
   * incomplete
   */
  async listEntries(): Promise<StoredEntry[]> {
    const entries = await this.store.listChildren(this.prefix);
    const checked: StoredEntry[] = [];

    for (const entry of entries) {
      if (!entry.isDirectory || !entry.name.startsWith(UNIT_PREFIX)) {
        checked.push(entry);
        continue;
      }
      const marker = `${this.prefix}${entry.name}/${BACKUP_MARKER}`;
      const keys = await this.store.listKeys(marker);
      checked.push({ ...entry, complete: keys.includes(marker) });
    }

    return checked;
  }

  destination(id: string): string {
    return this.clause(id);
  }

  source(unit: BackupUnit): string {
    return this.clause(unit.location);
  }

  async finalize(unit: BackupUnit): Promise<void> {
    const key = `${this.prefix}${unit.location}`;
    logger.debug(`Backup written to s3://${this.store.bucket}/${key}/`);
  }

  async extract(unit: BackupUnit): Promise<string> {
    logger.debug(`Nothing to unpack for ${unit.location}`);
    return this.source(unit);
  }

  async delete(unit: BackupUnit): Promise<void> {
    const key = `${this.prefix}${unit.location}`;
    const keys = unit.archived
      ? (await this.store.listKeys(key)).filter((k) => k === key)
      : await this.store.listKeys(`${key}/`);

    if (keys.length === 0) {
      logger.warn(
        "S3 objects not found (already deleted?): " +
          `s3://${this.store.bucket}/${key}`,
      );
      return;
    }

    await this.store.deleteKeys(keys);
    logger.debug(
      `Deleted ${keys.length} S3 object(s) under ` +
        `s3://${this.store.bucket}/${key}`,
    );
  }
}

/**
 * Units written by the engine straight to `S3(url, key, secret)`
 */
export class S3Backend extends ObjectStoreBackend {
  readonly target = "S3" as const;
  private readonly baseUrl: string;

  constructor(
    store: IObjectStore,
    private readonly config: S3Config,
  ) {
    super(store, config.prefix);
    const endpoint = (config.endpoint ?? "").replace(/\/+$/, "");
    this.baseUrl = `${endpoint}/${store.bucket}/`;
  }

  protected clause(name: string): string {
    return s3Clause(
      `${this.baseUrl}${this.prefix}${name}`,
      this.config.access_key_id ?? "",
      this.config.secret_access_key ?? "",
    );
  }
}

/**
 * Units written through an engine storage alias backed by the bucket, listed
 * and deleted through the bucket itself
 */
export class S3DiskBackend extends ObjectStoreBackend {
  readonly target = "S3-Disk" as const;

  constructor(
    store: IObjectStore,
    private readonly disk: string,
    prefix: string | undefined,
  ) {
    super(store, prefix);
  }

  protected clause(name: string): string {
    return diskClause(this.disk, name);
  }
}
