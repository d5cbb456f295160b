#!/usr/bin/env tsx

import * as p from "@clack/prompts";
import color from "picocolors";
import { splitGlobalArgs } from "./cli/args";
import { backupCommand } from "./cli/commands/backup";
import { listCommand } from "./cli/commands/list";
import { restoreCommand } from "./cli/commands/restore";
import { LOGO, VERSION } from "./cli/ui";

function printHelp(): void {
  console.log(color.bold(color.cyan(LOGO)));
  p.intro(
    `${color.cyan("chbackup")} ${color.dim(`v${VERSION}`)} - ` +
      "ClickHouse backup chains",
  );

  p.note(
    `${color.cyan("backup")}      Create the next full or incremental backup
${color.cyan("list")}        List backup chains at the target
${color.cyan("restore")}     Print the commands that restore a backup`,
    "Commands",
  );

  p.note(
    `-c, --config-folder <dir>  Config folder (default: /etc/chbackup)
-h, --help                 Show this help message
    --version              Show version`,
    "Options",
  );

  p.note(
    `chbackup backup                          ${color.dim("# Full or incremental, as the policy decides")}
chbackup backup --force-full             ${color.dim("# Start a new chain")}
chbackup -c ./conf backup --dry-run      ${color.dim("# Preview with a local config folder")}
chbackup list                            ${color.dim("# List all chains")}
chbackup restore                         ${color.dim("# Pick a backup to restore")}`,
    "Examples",
  );

  p.outro(`Run ${color.cyan("chbackup <command> --help")} for command details`);
}

function printVersion(): void {
  console.log(`chbackup ${VERSION}`);
}

async function main(): Promise<number> {
  const { command, rest } = splitGlobalArgs(process.argv.slice(2));

  switch (command) {
    case undefined:
      printHelp();
      return 0;

    case "backup":
      return backupCommand(rest);

    case "list":
      return listCommand(rest);

    case "restore":
      return restoreCommand(rest);

    case "-h":
    case "--help":
    case "help":
      printHelp();
      return 0;

    case "--version":
    case "version":
      printVersion();
      return 0;

    default:
      console.error(`${color.red("Error:")} Unknown command: ${command}`);
      console.error(
        `Run ${color.cyan("chbackup --help")} for usage information.`,
      );
      return 1;
  }
}

main()
  .then((code) => process.exit(code))
  .catch((error) => {
    console.error(`${color.red("Fatal error:")}`, error);
    process.exit(1);
  });
