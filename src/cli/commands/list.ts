import { parseArgs } from "node:util";
import type { RepositoryRecord } from "../../types";
import { COMMON_HELP, COMMON_OPTIONS, reportError, withOrchestrator } from "../context";
import { color, formatTableRow, formatTableSeparator, formatTimestamp, TABLE_WIDTHS, ui } from "../ui";

export async function listCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      format: { type: "string", default: "table" },
    },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  try {
    const repos = await withOrchestrator(values, (orchestrator) => orchestrator.listRepositories());

    // No intro for scripting formats
    switch (values.format) {
      case "json":
        console.log(JSON.stringify(repos.map(withoutSecrets), null, 2));
        return 0;
      case "csv":
        printCsv(repos);
        return 0;
      default:
        ui.intro("borgmate list");

        if (repos.length === 0) {
          ui.info("No repositories found");
          ui.outro("Done");
          return 0;
        }

        printTable(repos);
        ui.outro(`${repos.length} repositor${repos.length === 1 ? "y" : "ies"} total`);
        return 0;
    }
  } catch (error) {
    return reportError("List", error, values.verbose);
  }
}

function withoutSecrets(repo: RepositoryRecord): Omit<RepositoryRecord, "passphrase"> {
  const { passphrase: _passphrase, ...rest } = repo;
  return rest;
}

function printTable(repos: RepositoryRecord[]): void {
  const widths = [TABLE_WIDTHS.name, TABLE_WIDTHS.path, TABLE_WIDTHS.hostname, TABLE_WIDTHS.lastBackup];
  const headers = ["Name", "Path", "Host", "Last backup"];

  ui.step("Repositories:");
  console.log(formatTableRow(headers, widths));
  console.log(formatTableSeparator(widths));

  for (const repo of repos) {
    console.log(
      formatTableRow(
        [
          color.cyan(repo.name),
          repo.path,
          repo.hostname,
          repo.last_backup ? formatTimestamp(repo.last_backup) : color.dim("never"),
        ],
        widths,
      ),
    );
  }

  console.log(formatTableSeparator(widths));
}

function printCsv(repos: RepositoryRecord[]): void {
  console.log("name,path,backup_target,hostname,os_platform,last_backup,last_s3_sync,created_at");
  for (const repo of repos) {
    console.log(
      [
        repo.name,
        repo.path,
        repo.backup_target,
        repo.hostname,
        repo.os_platform,
        repo.last_backup ?? "",
        repo.last_s3_sync ?? "",
        repo.created_at,
      ].join(","),
    );
  }
}

function printHelp(): void {
  console.log(`
${color.bold("borgmate list")} - List registered repositories

${color.dim("USAGE:")}
  borgmate list [OPTIONS]

${color.dim("OPTIONS:")}
      --format <format>     Output format: table, json, csv (default: table)
${COMMON_HELP}

${color.dim("EXAMPLES:")}
  borgmate list
  borgmate list --format json
`);
}
