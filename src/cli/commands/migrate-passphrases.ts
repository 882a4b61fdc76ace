import { parseArgs } from "node:util";
import { COMMON_HELP, COMMON_OPTIONS, reportError, withOrchestrator } from "../context";
import { color, formatSummary, ui } from "../ui";

export async function migratePassphrasesCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      name: { type: "string", short: "n", multiple: true },
    },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  try {
    ui.intro("borgmate migrate-passphrases");
    const outcomes = await withOrchestrator(values, (orchestrator) =>
      orchestrator.migratePassphrases(values.name),
    );

    for (const outcome of outcomes) {
      switch (outcome.status) {
        case "migrated":
          ui.success(`${outcome.name}: moved to ${outcome.filePath}`);
          break;
        case "skipped":
          ui.info(`${outcome.name}: nothing to migrate`);
          break;
        case "failed":
          ui.error(`${outcome.name}: ${outcome.error}`);
          break;
      }
    }

    const count = (status: string) => outcomes.filter((o) => o.status === status).length;
    ui.note(
      formatSummary([
        { label: "Migrated", value: count("migrated") },
        { label: "Skipped", value: count("skipped") },
        { label: "Failed", value: count("failed") },
      ]),
      "Summary",
    );

    const failed = count("failed");
    ui.outro(failed > 0 ? `${failed} repositor${failed === 1 ? "y" : "ies"} failed` : "Done");
    return failed > 0 ? 1 : 0;
  } catch (error) {
    return reportError("Passphrase migration", error, values.verbose);
  }
}

function printHelp(): void {
  console.log(`
${color.bold("borgmate migrate-passphrases")} - Move stored passphrases into key files

${color.dim("USAGE:")}
  borgmate migrate-passphrases [OPTIONS]

${color.dim("OPTIONS:")}
  -n, --name <name>         Only migrate this repository (repeatable)
${COMMON_HELP}
`);
}
