import { parseArgs } from "node:util";
import { errorMessage, runBackup } from "../../core";
import { formatDuration, maskSecrets } from "../../utils";
import { CONFIG_FOLDER_OPTION, createEngine, openContext } from "../context";
import { color, formatSummary, ui } from "../ui";

export async function backupCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      ...CONFIG_FOLDER_OPTION,
      "force-full": { type: "boolean", short: "f", default: false },
      "dry-run": { type: "boolean", default: false },
      verbose: { type: "boolean", short: "v", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  try {
    const { config, backend, policy } = await openContext(
      values["config-folder"],
      values.verbose,
    );
    const dryRun = values["dry-run"];

    ui.intro("chbackup backup");

    const engine = createEngine(config);
    const result = await runBackup(
      {
        backend,
        engine,
        policy,
        ignoredDatabases: config.backup.ignored_databases,
      },
      { forceFull: values["force-full"], dryRun },
    ).finally(() => engine.close());

    const failed = result.deletions.filter((d) => !d.success);
    const deleted = result.deletions
      .filter((d) => d.success)
      .map((d) => d.unit.location);

    ui.note(
      formatSummary([
        { label: "Target", value: backend.target },
        { label: "Kind", value: result.decision.kind },
        { label: "Backup", value: result.unit.location },
        { label: "Base", value: result.decision.base?.id },
        {
          label: dryRun ? "Would delete" : "Deleted",
          value: deleted.join(", ") || "none",
        },
        {
          label: "Command",
          value: dryRun ? maskSecrets(result.command) : null,
        },
        { label: "Duration", value: formatDuration(result.durationMs) },
      ]),
      "Backup Summary",
    );

    if (dryRun) {
      ui.warn("[DRY RUN] No changes were made.");
    }

    if (failed.length > 0) {
      for (const outcome of failed) {
        ui.warn(`Could not delete ${outcome.unit.location}: ${outcome.error}`);
      }
      ui.outro(`Backup complete, ${failed.length} deletion(s) failed`);
      return 1;
    }

    ui.outro("Backup complete!");
    return 0;
  } catch (error) {
    ui.error(`Backup failed: ${errorMessage(error)}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("chbackup backup")} - Create the next full or incremental backup

${color.dim("USAGE:")}
  chbackup backup [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config-folder <dir>  Config folder (default: /etc/chbackup)
  -f, --force-full           Start a new chain with a full backup
      --dry-run              Show the decision, deletions and command without running them
  -v, --verbose              Verbose output
  -h, --help                 Show this help message

${color.dim("EXAMPLES:")}
  chbackup backup                          # Full or incremental, as the policy decides
  chbackup backup --force-full             # Full backup now
  chbackup -c ./conf backup --dry-run      # Preview with a local config folder
`);
}
