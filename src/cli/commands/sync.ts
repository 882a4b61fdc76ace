import { parseArgs } from "node:util";
import { formatBytes } from "../../utils/format";
import { COMMON_HELP, COMMON_OPTIONS, printWarnings, reportError, withOrchestrator } from "../context";
import { color, formatSummary, formatTimestamp, ui } from "../ui";

export async function syncCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      "stats-only": { type: "boolean", default: false },
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

  try {
    ui.intro("borgmate sync");
    const s = ui.spinner();
    s.start(values["stats-only"] ? "Refreshing S3 stats..." : `Syncing ${name} to S3...`);

    const { synced, warnings, stats } = await withOrchestrator(values, async (orchestrator) => {
      if (values["stats-only"]) {
        return { synced: false, warnings: [], stats: await orchestrator.refreshRemoteStats(name) };
      }
      const result = await orchestrator.syncRepository(name);
      return { ...result, stats: await orchestrator.getRemoteStats(name) };
    }).finally(() => s.stop("Finished"));

    printWarnings(warnings);
    ui.note(
      formatSummary([
        { label: "Synced", value: values["stats-only"] ? null : synced ? color.green("yes") : color.red("no") },
        { label: "S3 size", value: stats ? formatBytes(stats.total_size_bytes) : null },
        { label: "S3 objects", value: stats ? stats.object_count : null },
        { label: "Last modified", value: stats ? formatTimestamp(stats.last_modified) : null },
      ]),
      "Remote",
    );

    if (!values["stats-only"] && !synced) {
      ui.outro("Sync failed");
      return 1;
    }
    ui.outro("Done");
    return 0;
  } catch (error) {
    return reportError("Sync", error, values.verbose);
  }
}

function printHelp(): void {
  console.log(`
${color.bold("borgmate sync")} - Mirror a repository to the configured S3 bucket

${color.dim("USAGE:")}
  borgmate sync <name> [OPTIONS]

${color.dim("OPTIONS:")}
      --stats-only          Only refresh the cached bucket statistics
${COMMON_HELP}
`);
}
