/**
 * ClickHouse client wrapper for native BACKUP commands
 */

import { type ClickHouseClient, createClient } from "@clickhouse/client";
import { errorMessage, NativeCommandError } from "../core/errors";
import type { ClickHouseConfig } from "../types";
import { maskSecrets } from "../utils/format";
import { logger } from "../utils/logger";

/**
 * Runs native commands against the database engine
 */
export interface INativeEngine {
  /**
   * Run a BACKUP command and wait until the engine reports it finished
   */
  runBackup(command: string): Promise<void>;

  close(): Promise<void>;
}

export interface BackupStatusRow {
  name: string;
  status: string;
  error: string;
}

export const STATUS_CREATING = "CREATING_BACKUP";
export const STATUS_CREATED = "BACKUP_CREATED";

/**
 * Parse the `id<TAB>status` row an ASYNC backup returns
 */
export function parseSubmitResponse(text: string): {
  id: string;
  status: string;
} {
  const line = text.split("\n").find((l) => l.trim() !== "");
  const [id, status] = (line ?? "").split("\t");
  if (!id || !status) {
    throw new Error(`Unexpected response to BACKUP: ${JSON.stringify(text)}`);
  }
  return { id: id.trim(), status: status.trim() };
}

const sleep = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

export interface ClickHouseEngineOptions {
  pollIntervalMs: number;
}

export class ClickHouseEngine implements INativeEngine {
  private readonly client: ClickHouseClient;

  constructor(
    config: ClickHouseConfig,
    private readonly options: ClickHouseEngineOptions,
  ) {
    this.client = createClient({
      url: `${config.protocol}://${config.host}:${config.port}`,
      username: config.user,
      password: config.password,
      // The engine may take hours; status is polled instead
      request_timeout: 300_000,
    });
  }

  async runBackup(command: string): Promise<void> {
    const { id, status } = await this.submit(command);
    logger.info(`Backup ${id} status: ${status}`);

    if (status !== STATUS_CREATING && status !== STATUS_CREATED) {
      throw new NativeCommandError(
        `Backup ${id} was not started (status ${status}). ` +
          "Check the server logs or system.backups",
        maskSecrets(command),
      );
    }

    await this.waitForBackup(id, command);
  }

  async close(): Promise<void> {
    await this.client.close();
  }

  private async submit(
    command: string,
  ): Promise<{ id: string; status: string }> {
    try {
      const result = await this.client.exec({ query: `${command} ASYNC` });
      let text = "";
      for await (const chunk of result.stream) {
        text += chunk.toString();
      }
      return parseSubmitResponse(text);
    } catch (error) {
      throw new NativeCommandError(errorMessage(error), maskSecrets(command));
    }
  }

  private async getStatus(id: string): Promise<BackupStatusRow> {
    const result = await this.client.query({
      query:
        "SELECT name, status, error FROM system.backups WHERE id = {id:String}",
      query_params: { id },
      format: "JSONEachRow",
    });
    const rows = await result.json<BackupStatusRow>();
    const row = rows[0];
    if (!row) {
      throw new Error(`Backup ${id} not found in system.backups`);
    }
    return row;
  }

  private async waitForBackup(id: string, command: string): Promise<void> {
    for (;;) {
      let row: BackupStatusRow;
      try {
        row = await this.getStatus(id);
      } catch (error) {
        throw new NativeCommandError(errorMessage(error), maskSecrets(command));
      }

      if (row.status === STATUS_CREATING) {
        logger.debug(
          "Still creating the backup... Checking again in " +
            `${this.options.pollIntervalMs / 1000}s`,
        );
        await sleep(this.options.pollIntervalMs);
        continue;
      }

      if (row.status === STATUS_CREATED) {
        logger.info(`Backup ${row.name} has been created`);
        return;
      }

      throw new NativeCommandError(
        `Backup ${id} failed with status ${row.status}: ${row.error}`,
        maskSecrets(command),
      );
    }
  }
}
