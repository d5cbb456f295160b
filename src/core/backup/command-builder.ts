/**
 * Native BACKUP / RESTORE command text
 */

/**
 * Quote a value as an engine string literal
 */
export function quote(value: string): string {
  return `'${value.replace(/\\/g, "\\\\").replace(/'/g, "\\'")}'`;
}

export function fileClause(name: string): string {
  return `File(${quote(name)})`;
}

export function diskClause(disk: string, name: string): string {
  return `Disk(${quote(disk)}, ${quote(name)})`;
}

export function s3Clause(
  url: string,
  accessKeyId: string,
  secretAccessKey: string,
): string {
  return `S3(${quote(url)}, ${quote(accessKeyId)}, ${quote(secretAccessKey)})`;
}

function allExcept(ignoredDatabases: string[]): string {
  if (ignoredDatabases.length === 0) {
    throw new Error("At least one database must be ignored, e.g. system");
  }
  return `ALL EXCEPT DATABASES ${ignoredDatabases.join(", ")}`;
}

export interface BackupCommandOptions {
  destination: string;
  ignoredDatabases: string[];
  /** Clause of the base unit for an incremental backup */
  base?: string | null;
}

export function buildBackupCommand(options: BackupCommandOptions): string {
  const scope = allExcept(options.ignoredDatabases);
  let command = `BACKUP ${scope} TO ${options.destination}`;
  if (options.base) {
    command += ` SETTINGS base_backup = ${options.base}`;
  }
  return command;
}

export type RestoreScope =
  | { kind: "all"; ignoredDatabases: string[] }
  | { kind: "table"; table: string; as?: string };

export interface RestoreCommandOptions {
  source: string;
  scope: RestoreScope;
  base?: string | null;
  /** Restore into tables that already hold data */
  overwrite?: boolean;
}

export function buildRestoreCommand(options: RestoreCommandOptions): string {
  const { scope } = options;
  const what =
    scope.kind === "all"
      ? allExcept(scope.ignoredDatabases)
      : `TABLE ${scope.table}${scope.as ? ` AS ${scope.as}` : ""}`;

  const settings: string[] = [];
  if (options.base) settings.push(`base_backup = ${options.base}`);
  if (options.overwrite) settings.push("allow_non_empty_tables = true");

  let command = `RESTORE ${what} FROM ${options.source}`;
  if (settings.length > 0) {
    command += ` SETTINGS ${settings.join(", ")}`;
  }
  return command;
}

export interface RestoreVariant {
  title: string;
  command: string;
}

/**
 * The restore commands offered to the operator for one unit
 */
export function buildRestoreVariants(
  source: string,
  base: string | null,
  ignoredDatabases: string[],
): RestoreVariant[] {
  const all: RestoreScope = { kind: "all", ignoredDatabases };
  const table: RestoreScope = { kind: "table", table: "database.table" };

  return [
    {
      title: "Restore all databases except the ignored ones",
      command: buildRestoreCommand({ source, base, scope: all }),
    },
    {
      title: "Force restore all databases and overwrite existing data",
      command: buildRestoreCommand({
        source,
        base,
        scope: all,
        overwrite: true,
      }),
    },
    {
      title: "Restore a specific table",
      command: buildRestoreCommand({ source, base, scope: table }),
    },
    {
      title: "Force restore a specific table",
      command: buildRestoreCommand({
        source,
        base,
        scope: table,
        overwrite: true,
      }),
    },
    {
      title: "Restore a specific table to a new table",
      command: buildRestoreCommand({
        source,
        base,
        scope: {
          kind: "table",
          table: "database.table",
          as: "database.new_table",
        },
      }),
    },
  ];
}
