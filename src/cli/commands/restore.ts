import { parseArgs } from "node:util";
import {
  COMMON_HELP,
  COMMON_OPTIONS,
  confirmAction,
  interruptSignal,
  printWarnings,
  reportError,
  withOrchestrator,
} from "../context";
import { color, formatSummary, ui } from "../ui";

export async function restoreCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      force: { type: "boolean", default: false },
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

  const interrupt = interruptSignal();
  try {
    ui.intro("borgmate restore");

    if (
      values.force &&
      !(await confirmAction(`Replace any local copy of ${name} with the S3 mirror?`, values.yes))
    ) {
      ui.cancel("Restore cancelled");
      return 1;
    }

    const s = ui.spinner();
    s.start(`Downloading ${name} from S3...`);

    const result = await withOrchestrator(values, (orchestrator) =>
      orchestrator.restoreRepository(name, {
        force: values.force,
        passphrase: values.passphrase,
        signal: interrupt.signal,
      }),
    ).finally(() => s.stop("Finished"));

    printWarnings(result.warnings);
    ui.note(
      formatSummary([
        { label: "Repository", value: result.repository.name },
        { label: "Path", value: result.repository.path },
        { label: "Host", value: result.repository.hostname },
        { label: "Replaced local copy", value: result.replacedLocal ? "yes" : "no" },
      ]),
      "Restored",
    );
    ui.outro("Repository restored");
    return 0;
  } catch (error) {
    return reportError("Restore", error, values.verbose);
  } finally {
    interrupt.dispose();
  }
}

function printHelp(): void {
  console.log(`
${color.bold("borgmate restore")} - Download a repository from its S3 mirror

${color.dim("USAGE:")}
  borgmate restore <name> [OPTIONS]

${color.dim("OPTIONS:")}
      --force               Replace a repository that exists locally
  -y, --yes                 Skip the confirmation prompt
${COMMON_HELP}

${color.dim("EXAMPLES:")}
  borgmate restore docs
  borgmate restore docs --force --yes
`);
}
