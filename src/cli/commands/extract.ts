import { parseArgs } from "node:util";
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
import { color, ui } from "../ui";

export async function extractCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      dest: { type: "string", short: "d", default: "." },
      "dry-run": { type: "boolean", default: false },
      "strip-components": { type: "string" },
      pattern: { type: "string", multiple: true },
      exclude: { type: "string", short: "e", multiple: true },
      sparse: { type: "boolean", default: false },
    },
    allowPositionals: true,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  const [name, archiveName, ...paths] = positionals;
  if (!name || !archiveName) {
    ui.error("Repository name and archive name are required");
    return 1;
  }

  const interrupt = interruptSignal();
  try {
    const stripComponents = parseCount(values["strip-components"], "--strip-components");

    ui.intro("borgmate extract");
    const s = ui.spinner();
    s.start(`Extracting ${archiveName} into ${values.dest}...`);

    const result = await withOrchestrator(values, (orchestrator) =>
      orchestrator.extractArchive(name, archiveName, values.dest, {
        passphrase: values.passphrase,
        signal: interrupt.signal,
        onEvent: spinnerProgress(s),
        extract: {
          dryRun: values["dry-run"],
          sparse: values.sparse,
          stripComponents,
          patterns: values.pattern,
          excludes: values.exclude,
          paths,
        },
      }),
    ).finally(() => s.stop("Finished"));

    printWarnings(result.warnings);
    if (values["dry-run"]) {
      ui.warn("[DRY RUN] No files were written.");
    }
    ui.outro(`Extracted ${archiveName}`);
    return 0;
  } catch (error) {
    return reportError("Extract", error, values.verbose);
  } finally {
    interrupt.dispose();
  }
}

function printHelp(): void {
  console.log(`
${color.bold("borgmate extract")} - Extract an archive into a directory

${color.dim("USAGE:")}
  borgmate extract <name> <archive> [path...] [OPTIONS]

${color.dim("OPTIONS:")}
  -d, --dest <dir>              Destination directory (default: .)
      --dry-run                 List what would be extracted
      --strip-components <n>    Drop n leading path elements
      --pattern <pattern>       Include pattern (repeatable)
  -e, --exclude <pattern>       Exclude pattern (repeatable)
      --sparse                  Create sparse files
${COMMON_HELP}

${color.dim("EXAMPLES:")}
  borgmate extract docs 2025-01-31_02:00:00 --dest /tmp/restore
  borgmate extract docs 2025-01-31_02:00:00 home/me/notes --strip-components 2
`);
}
