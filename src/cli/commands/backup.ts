import { parseArgs } from "node:util";
import { formatBytes, formatDuration } from "../../utils/format";
import {
  COMMON_HELP,
  COMMON_OPTIONS,
  interruptSignal,
  printWarnings,
  reportError,
  spinnerProgress,
  withOrchestrator,
} from "../context";
import { color, formatSummary, ui } from "../ui";

export async function backupCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      "no-sync": { type: "boolean", default: false },
    },
    allowPositionals: true,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  const name = positionals[0];
  if (!name) {
    ui.error("Repository name is required");
    return 1;
  }

  const interrupt = interruptSignal();
  try {
    ui.intro("borgmate backup");
    const s = ui.spinner();
    s.start(`Backing up ${name}...`);

    const result = await withOrchestrator(values, (orchestrator) =>
      orchestrator.dailyBackup(name, {
        passphrase: values.passphrase,
        skipSync: values["no-sync"],
        signal: interrupt.signal,
        onEvent: spinnerProgress(s),
      }),
    ).finally(() => s.stop("Finished"));

    printWarnings(result.warnings);

    const { retention, archive } = result;
    ui.note(
      formatSummary([
        { label: "Archive", value: result.archiveName },
        { label: "Original size", value: archive ? formatBytes(archive.original_size) : null },
        { label: "Compressed", value: archive ? formatBytes(archive.compressed_size) : null },
        { label: "Deduplicated", value: archive ? formatBytes(archive.deduplicated_size) : null },
        {
          label: "Retention",
          value: `${retention.daily}d ${retention.weekly}w ${retention.monthly}m ${retention.yearly}y${
            result.pruned ? "" : color.yellow(" (prune skipped)")
          }`,
        },
        { label: "Remote sync", value: result.synced ? color.green("done") : color.dim("skipped") },
        { label: "Duration", value: formatDuration(result.durationMs) },
      ]),
      "Backup",
    );

    ui.outro(
      result.warnings.length > 0
        ? `Backup completed with ${result.warnings.length} warning(s)`
        : "Backup completed",
    );
    return 0;
  } catch (error) {
    return reportError("Backup", error, values.verbose);
  } finally {
    interrupt.dispose();
  }
}

function printHelp(): void {
  console.log(`
${color.bold("borgmate backup")} - Archive, prune and compact a repository

${color.dim("USAGE:")}
  borgmate backup <name> [OPTIONS]

${color.dim("OPTIONS:")}
      --no-sync             Do not mirror the repository to S3 afterwards
${COMMON_HELP}

${color.dim("EXAMPLES:")}
  borgmate backup docs
  borgmate backup docs --no-sync --offline
`);
}
