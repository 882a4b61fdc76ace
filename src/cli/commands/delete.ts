import { parseArgs } from "node:util";
import {
  COMMON_HELP,
  COMMON_OPTIONS,
  confirmAction,
  interruptSignal,
  printWarnings,
  reportError,
  spinnerProgress,
  withOrchestrator,
} from "../context";
import { color, formatSummary, ui } from "../ui";

export async function deleteCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      "dry-run": { type: "boolean", default: false },
      yes: { type: "boolean", short: "y", default: false },
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

  const dryRun = values["dry-run"];
  const interrupt = interruptSignal();
  try {
    ui.intro("borgmate delete");

    if (!dryRun && !(await confirmAction(`Delete repository ${name} and all its archives?`, values.yes))) {
      ui.cancel("Deletion cancelled");
      return 1;
    }

    const s = ui.spinner();
    s.start(dryRun ? `Simulating deletion of ${name}...` : `Deleting ${name}...`);

    const result = await withOrchestrator(values, (orchestrator) =>
      orchestrator.deleteRepository(name, {
        dryRun,
        passphrase: values.passphrase,
        signal: interrupt.signal,
        onEvent: spinnerProgress(s),
      }),
    ).finally(() => s.stop("Finished"));

    printWarnings(result.warnings);

    if (result.dryRun) {
      ui.warn("[DRY RUN] No changes were made.");
      ui.outro("Preview complete");
      return 0;
    }

    ui.note(
      formatSummary([
        { label: "Repository", value: result.name },
        { label: "Compacted", value: result.compacted ? "yes" : "no" },
        { label: "Exclusions file", value: result.exclusionsRemoved ? "removed" : "none" },
      ]),
      "Deleted",
    );
    ui.outro("Repository deleted");
    return 0;
  } catch (error) {
    return reportError("Delete", error, values.verbose);
  } finally {
    interrupt.dispose();
  }
}

function printHelp(): void {
  console.log(`
${color.bold("borgmate delete")} - Delete a repository and its metadata

${color.dim("USAGE:")}
  borgmate delete <name> [OPTIONS]

${color.dim("OPTIONS:")}
      --dry-run             Show what would be deleted
  -y, --yes                 Skip the confirmation prompt
${COMMON_HELP}

${color.dim("EXAMPLES:")}
  borgmate delete docs --dry-run
  borgmate delete docs --yes
`);
}
