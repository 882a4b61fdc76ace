import { parseArgs } from "node:util";
import { formatDuration } from "../../utils/format";
import {
  COMMON_HELP,
  COMMON_OPTIONS,
  interruptSignal,
  parseCount,
  printWarnings,
  reportError,
  spinnerProgress,
  withOrchestrator,
} from "../context";
import { color, formatSummary, ui } from "../ui";

export async function createCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      name: { type: "string", short: "n" },
      path: { type: "string", short: "r" },
      target: { type: "string", short: "t" },
      "keep-daily": { type: "string" },
      "keep-weekly": { type: "string" },
      "keep-monthly": { type: "string" },
      "keep-yearly": { type: "string" },
    },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  if (!values.name || !values.path || !values.target) {
    ui.error("--name, --path and --target are required");
    return 1;
  }

  const interrupt = interruptSignal();
  try {
    const name = values.name;
    const repoPath = values.path;
    const backupTarget = values.target;
    const retention = {
      daily: parseCount(values["keep-daily"], "--keep-daily"),
      weekly: parseCount(values["keep-weekly"], "--keep-weekly"),
      monthly: parseCount(values["keep-monthly"], "--keep-monthly"),
      yearly: parseCount(values["keep-yearly"], "--keep-yearly"),
    };

    ui.intro("borgmate create");
    const startTime = Date.now();
    const s = ui.spinner();
    s.start(`Initialising repository ${name}...`);

    const result = await withOrchestrator(values, (orchestrator) =>
      orchestrator.createRepository({
        name,
        path: repoPath,
        backupTarget,
        retention,
        passphrase: values.passphrase,
        signal: interrupt.signal,
        onEvent: spinnerProgress(s),
      }),
    ).finally(() => s.stop("Finished"));

    printWarnings(result.warnings);
    ui.note(
      formatSummary([
        { label: "Name", value: result.repository.name },
        { label: "Path", value: result.repository.path },
        { label: "Backup target", value: result.repository.backup_target },
        { label: "Host", value: result.repository.hostname },
        { label: "Passphrase file", value: result.passphraseFile },
        { label: "Passphrase source", value: result.passphraseSource },
        { label: "Duration", value: formatDuration(Date.now() - startTime) },
      ]),
      "Repository",
    );

    if (result.passphraseSource === "generated") {
      ui.warn(`Back up ${color.cyan(result.passphraseFile)}: the repository cannot be opened without it.`);
    }

    ui.outro("Repository created");
    return 0;
  } catch (error) {
    return reportError("Create", error, values.verbose);
  } finally {
    interrupt.dispose();
  }
}

function printHelp(): void {
  console.log(`
${color.bold("borgmate create")} - Initialise and register a new repository

${color.dim("USAGE:")}
  borgmate create --name <name> --path <repo-dir> --target <dir> [OPTIONS]

${color.dim("OPTIONS:")}
  -n, --name <name>         Unique repository name
  -r, --path <dir>          Where the repository is created
  -t, --target <dir>        Directory the daily backup archives
      --keep-daily <n>      Retention override (likewise --keep-weekly,
                            --keep-monthly, --keep-yearly)
${COMMON_HELP}

${color.dim("EXAMPLES:")}
  borgmate create -n docs -r /backups/docs -t ~/Documents
  borgmate create -n photos -r /backups/photos -t ~/Pictures --keep-daily 3
`);
}
