import { parseArgs } from "node:util";
import {
  chainUnits,
  errorMessage,
  planRestore,
  type RestorePlan,
  type RestoreVariant,
  scanInventory,
} from "../../core";
import type { Inventory } from "../../types";
import { formatTimestamp, maskSecrets } from "../../utils";
import { CONFIG_FOLDER_OPTION, openContext } from "../context";
import { color, ui } from "../ui";

export async function restoreCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      ...CONFIG_FOLDER_OPTION,
      extract: { type: "boolean", default: false },
      "mask-secrets": { type: "boolean", default: false },
      verbose: { type: "boolean", short: "v", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    allowPositionals: true,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  if (positionals.length > 1) {
    ui.error("Only one backup can be restored at a time");
    return 1;
  }

  try {
    const { config, backend } = await openContext(
      values["config-folder"],
      values.verbose,
    );
    const inventory = await scanInventory(backend);

    ui.intro("chbackup restore");

    let name = positionals[0];
    if (!name) {
      if (!process.stdin.isTTY) {
        ui.error("Name the backup to restore, e.g. chbackup restore <BACKUP>");
        return 1;
      }

      const selected = await selectBackup(inventory);
      if (selected === null) {
        ui.cancel("Restore cancelled");
        return 1;
      }
      name = selected;
    }

    if (values.extract && !backend.requiresArchiving) {
      ui.warn(
        `${backend.target} backups are not archived; --extract has no effect`,
      );
    }

    const plan = await planRestore(backend, inventory, name, {
      ignoredDatabases: config.backup.ignored_databases,
      extract: values.extract,
    });

    if (plan.lineage.length > 1) {
      const bases = plan.lineage.slice(1).map((u) => u.id);
      ui.info(`Restore depends on: ${bases.join(" <- ")}`);
    }

    const commands = restoreCommands(plan, values["mask-secrets"]);
    for (const { title, command } of commands) {
      ui.note(command, title);
    }

    ui.outro("Run one of the commands above with clickhouse-client");
    return 0;
  } catch (error) {
    ui.error(`Restore failed: ${errorMessage(error)}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

/**
 * The commands printed for the operator, S3 credentials masked on request
 */
export function restoreCommands(
  plan: RestorePlan,
  mask: boolean,
): RestoreVariant[] {
  return plan.variants.map(({ title, command }) => ({
    title,
    command: mask ? maskSecrets(command) : command,
  }));
}

async function selectBackup(inventory: Inventory): Promise<string | null> {
  const units = inventory.chains.flatMap(chainUnits).reverse();
  if (units.length === 0) {
    ui.info("No backups found");
    return null;
  }

  const selected = await ui.select({
    message: "Select a backup to restore",
    options: units.map((unit) => ({
      value: unit.id,
      label: unit.id,
      hint: formatTimestamp(unit.createdAt),
    })),
  });

  return ui.isCancel(selected) ? null : selected;
}

function printHelp(): void {
  console.log(`
${color.bold("chbackup restore")} - Print the commands that restore a backup

${color.dim("USAGE:")}
  chbackup restore [BACKUP] [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config-folder <dir>  Config folder (default: /etc/chbackup)
      --extract              Unpack archived backups and restore from the directories
      --mask-secrets         Hide object store credentials in the printed commands
  -v, --verbose              Verbose output
  -h, --help                 Show this help message

Without BACKUP the backup is picked interactively.
Nothing is executed; the commands are printed for you to run.

${color.dim("EXAMPLES:")}
  chbackup restore                                         # Pick a backup
  chbackup restore ch-backup-20240501_020000-full          # Restore commands for one backup
  chbackup restore ch-backup-20240502_020000-inc-20240501_020000 --extract
`);
}
