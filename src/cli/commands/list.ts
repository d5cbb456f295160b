import { parseArgs } from "node:util";
import {
  errorMessage,
  latestUnit,
  mostRecentChain,
  scanInventory,
} from "../../core";
import type { BackupUnit, Inventory } from "../../types";
import { formatTimestamp } from "../../utils";
import { CONFIG_FOLDER_OPTION, openContext } from "../context";
import {
  color,
  formatTableRow,
  formatTableSeparator,
  TABLE_WIDTHS,
  ui,
} from "../ui";

const WIDTHS = [
  TABLE_WIDTHS.unit,
  TABLE_WIDTHS.kind,
  TABLE_WIDTHS.created,
  TABLE_WIDTHS.base,
];

export async function listCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      ...CONFIG_FOLDER_OPTION,
      format: { type: "string", default: "table" },
      verbose: { type: "boolean", short: "v", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  if (values.format !== "table" && values.format !== "json") {
    ui.error(`Unknown format: ${values.format}`);
    return 1;
  }

  try {
    const { backend } = await openContext(
      values["config-folder"],
      values.verbose,
    );
    const inventory = await scanInventory(backend);

    // No intro for scripting formats
    if (values.format === "json") {
      console.log(JSON.stringify(inventoryToJson(inventory), null, 2));
      return 0;
    }

    ui.intro("chbackup list");

    if (inventory.chains.length === 0 && inventory.orphans.length === 0) {
      ui.info("No backups found");
      ui.outro("Done");
      return 0;
    }

    ui.step(`Backups (${backend.target}):`);
    for (const line of formatInventoryTable(inventory)) {
      console.log(line);
    }

    const chain = mostRecentChain(inventory);
    if (chain) {
      const newest = latestUnit(chain);
      ui.note(`chbackup restore ${newest.id}`, "Restore the newest backup");
    }

    const count = inventory.chains.reduce(
      (sum, c) => sum + 1 + c.incrementals.length,
      0,
    );
    ui.outro(`${count} backup(s) in ${inventory.chains.length} chain(s)`);
    return 0;
  } catch (error) {
    ui.error(`List failed: ${errorMessage(error)}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function unitRow(unit: BackupUnit, indent: string): string[] {
  return [
    `${indent}${unit.location}`,
    unit.kind,
    formatTimestamp(unit.createdAt),
    unit.baseId ?? "",
  ];
}

/**
 * Chains oldest first, incrementals indented under their full backup,
 * unresolved units last
 */
export function formatInventoryTable(inventory: Inventory): string[] {
  const lines = [
    formatTableRow(["Backup", "Kind", "Created", "Base"], WIDTHS),
    formatTableSeparator(WIDTHS),
  ];

  for (const chain of inventory.chains) {
    lines.push(formatTableRow(unitRow(chain.full, ""), WIDTHS));
    for (const unit of chain.incrementals) {
      lines.push(formatTableRow(unitRow(unit, "  "), WIDTHS));
    }
  }

  for (const { unit, reason } of inventory.orphans) {
    const row = unitRow(unit, "");
    row[3] = color.red(`unresolved: ${reason}`);
    lines.push(formatTableRow(row, WIDTHS));
  }

  return lines;
}

function unitToJson(unit: BackupUnit) {
  return {
    id: unit.id,
    kind: unit.kind,
    createdAt: unit.createdAt.toISOString(),
    base: unit.baseId,
    location: unit.location,
    archived: unit.archived,
  };
}

export function inventoryToJson(inventory: Inventory) {
  return {
    chains: inventory.chains.map((chain) => ({
      full: unitToJson(chain.full),
      incrementals: chain.incrementals.map(unitToJson),
    })),
    unresolved: inventory.orphans.map(({ unit, reason }) => ({
      ...unitToJson(unit),
      reason,
    })),
    warnings: inventory.warnings,
  };
}

function printHelp(): void {
  console.log(`
${color.bold("chbackup list")} - List backup chains at the target

${color.dim("USAGE:")}
  chbackup list [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config-folder <dir>  Config folder (default: /etc/chbackup)
      --format <format>      Output format: table, json (default: table)
  -v, --verbose              Verbose output
  -h, --help                 Show this help message

${color.dim("EXAMPLES:")}
  chbackup list                            # Chains with their incrementals
  chbackup list --format json              # Output as JSON (for scripting)
`);
}
