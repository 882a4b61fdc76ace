import { parseArgs } from "node:util";
import {
  COMMON_HELP,
  COMMON_OPTIONS,
  interruptSignal,
  printWarnings,
  reportError,
  spinnerProgress,
  withOrchestrator,
} from "../context";
import { color, ui } from "../ui";

export async function checkCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      "verify-data": { type: "boolean", default: false },
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
    ui.intro("borgmate check");
    const s = ui.spinner();
    s.start(`Checking ${name}...`);

    const result = await withOrchestrator(values, (orchestrator) =>
      orchestrator.checkRepository(name, {
        passphrase: values.passphrase,
        verifyData: values["verify-data"],
        signal: interrupt.signal,
        onEvent: spinnerProgress(s),
      }),
    ).finally(() => s.stop("Finished"));

    printWarnings(result.warnings);
    ui.outro(`${name} is consistent`);
    return 0;
  } catch (error) {
    return reportError("Check", error, values.verbose);
  } finally {
    interrupt.dispose();
  }
}

function printHelp(): void {
  console.log(`
${color.bold("borgmate check")} - Verify repository and archive consistency

${color.dim("USAGE:")}
  borgmate check <name> [OPTIONS]

${color.dim("OPTIONS:")}
      --verify-data         Also read and verify every data chunk (slow)
${COMMON_HELP}
`);
}
