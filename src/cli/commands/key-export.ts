import { parseArgs } from "node:util";
import { COMMON_HELP, COMMON_OPTIONS, printWarnings, reportError, withOrchestrator } from "../context";
import { color, ui } from "../ui";

export async function keyExportCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      output: { type: "string", short: "o" },
      paper: { type: "boolean", default: false },
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
    ui.intro("borgmate key-export");
    const result = await withOrchestrator(values, (orchestrator) =>
      orchestrator.exportKey(name, {
        passphrase: values.passphrase,
        outputPath: values.output,
        paper: values.paper,
      }),
    );
    printWarnings(result.warnings);
    ui.success(`Key written to ${result.outputPath}`);
    ui.outro("Store it somewhere other than the repository's disk");
    return 0;
  } catch (error) {
    return reportError("Key export", error, values.verbose);
  }
}

function printHelp(): void {
  console.log(`
${color.bold("borgmate key-export")} - Export a repository's encryption key

${color.dim("USAGE:")}
  borgmate key-export <name> [OPTIONS]

${color.dim("OPTIONS:")}
  -o, --output <path>       Output file (default: ~/<name>-encrypted-key-backup.txt)
      --paper               Export in printable paper format
${COMMON_HELP}
`);
}
