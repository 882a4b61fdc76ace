import { parseArgs } from "node:util";
import {
  COMMON_HELP,
  COMMON_OPTIONS,
  confirmAction,
  printWarnings,
  reportError,
  withOrchestrator,
} from "../context";
import { color, formatTableRow, formatTableSeparator, TABLE_WIDTHS, ui } from "../ui";

export async function archivesCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      delete: { type: "string", short: "d" },
      "dry-run": { type: "boolean", default: false },
      yes: { type: "boolean", short: "y", default: false },
    },
    allowPositionals: true,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  const [name, archiveName] = positionals;
  if (!name) {
    ui.error("Repository name is required");
    return 1;
  }

  try {
    if (values.delete) {
      return await deleteArchive(name, values.delete, values);
    }

    if (archiveName) {
      const entries = await withOrchestrator(values, (orchestrator) =>
        orchestrator.listArchiveContents(name, archiveName, { passphrase: values.passphrase }),
      );
      for (const entry of entries) {
        console.log(`${entry.mode} ${entry.user.padEnd(8)} ${String(entry.size).padStart(12)} ${entry.mtime} ${entry.path}`);
      }
      return 0;
    }

    const archives = await withOrchestrator(values, (orchestrator) =>
      orchestrator.listArchives(name, { passphrase: values.passphrase }),
    );

    ui.intro("borgmate archives");
    if (archives.length === 0) {
      ui.info(`No archives in ${name}`);
      ui.outro("Done");
      return 0;
    }

    const widths = [TABLE_WIDTHS.archive, 26, 64];
    ui.step(`Archives in ${name}:`);
    console.log(formatTableRow(["Name", "Time", "ID"], widths));
    console.log(formatTableSeparator(widths));
    for (const archive of archives) {
      console.log(formatTableRow([color.cyan(archive.name), archive.time, color.dim(archive.id)], widths));
    }
    console.log(formatTableSeparator(widths));
    ui.outro(`${archives.length} archive(s)`);
    return 0;
  } catch (error) {
    return reportError("Archives", error, values.verbose);
  }
}

async function deleteArchive(
  name: string,
  archiveName: string,
  values: { "dry-run": boolean; yes: boolean; passphrase?: string; config?: string; offline?: boolean; verbose?: boolean },
): Promise<number> {
  ui.intro("borgmate archives");
  const dryRun = values["dry-run"];
  if (!dryRun && !(await confirmAction(`Delete archive ${archiveName} from ${name}?`, values.yes))) {
    ui.cancel("Deletion cancelled");
    return 1;
  }

  const s = ui.spinner();
  s.start(`Deleting ${archiveName}...`);
  const result = await withOrchestrator(values, (orchestrator) =>
    orchestrator.deleteArchive(name, archiveName, { dryRun, passphrase: values.passphrase }),
  ).finally(() => s.stop("Finished"));

  printWarnings(result.warnings);
  if (dryRun) {
    ui.warn("[DRY RUN] No changes were made.");
  }
  ui.outro(dryRun ? "Preview complete" : `Archive ${archiveName} deleted`);
  return 0;
}

function printHelp(): void {
  console.log(`
${color.bold("borgmate archives")} - List archives, their contents, or delete one

${color.dim("USAGE:")}
  borgmate archives <name> [archive] [OPTIONS]

${color.dim("OPTIONS:")}
  -d, --delete <archive>    Delete the named archive, then compact
      --dry-run             With --delete, only show what would happen
  -y, --yes                 Skip the confirmation prompt
${COMMON_HELP}

${color.dim("EXAMPLES:")}
  borgmate archives docs                          # List archives
  borgmate archives docs 2025-01-31_02:00:00      # List archive contents
  borgmate archives docs -d 2025-01-31_02:00:00   # Delete an archive
`);
}
