import { parseArgs } from "node:util";
import { formatBytes } from "../../utils/format";
import { COMMON_HELP, COMMON_OPTIONS, reportError, withOrchestrator } from "../context";
import { color, formatSummary, formatTimestamp, ui } from "../ui";

export async function infoCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      raw: { type: "boolean", default: false },
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
    const { repo, info, stats } = await withOrchestrator(values, async (orchestrator) => ({
      repo: await orchestrator.getRepository(name),
      info: await orchestrator.repositoryInfo(name, { passphrase: values.passphrase }),
      stats: await orchestrator.getRemoteStats(name),
    }));

    if (values.raw) {
      console.log(JSON.stringify(info, null, 2));
      return 0;
    }

    ui.intro("borgmate info");
    const cacheStats = info.cache.stats;
    ui.note(
      formatSummary([
        { label: "Name", value: repo.name },
        { label: "Path", value: repo.path },
        { label: "Backup target", value: repo.backup_target },
        { label: "Host", value: `${repo.hostname} (${repo.os_platform})` },
        { label: "Last backup", value: formatTimestamp(repo.last_backup) },
        { label: "Last S3 sync", value: formatTimestamp(repo.last_s3_sync) },
        { label: "Encryption", value: info.encryption.mode },
        { label: "Total size", value: formatBytes(cacheStats.total_size) },
        { label: "Compressed", value: formatBytes(cacheStats.total_csize) },
        { label: "Deduplicated", value: formatBytes(cacheStats.unique_csize) },
        { label: "S3 size", value: stats ? formatBytes(stats.total_size_bytes) : null },
        { label: "S3 objects", value: stats ? stats.object_count : null },
      ]),
      "Repository",
    );
    ui.outro("Done");
    return 0;
  } catch (error) {
    return reportError("Info", error, values.verbose);
  }
}

function printHelp(): void {
  console.log(`
${color.bold("borgmate info")} - Show repository details

${color.dim("USAGE:")}
  borgmate info <name> [OPTIONS]

${color.dim("OPTIONS:")}
      --raw                 Print the engine's info output as JSON
${COMMON_HELP}
`);
}
