import { readFile } from "node:fs/promises";
import { parseArgs } from "node:util";
import { ValidationError } from "../../errors";
import type { Orchestrator } from "../../core";
import { COMMON_HELP, COMMON_OPTIONS, reportError, withOrchestrator } from "../context";
import { color, ui } from "../ui";

export async function exclusionsCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      file: { type: "string", short: "f" },
    },
    allowPositionals: true,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  const [name, action = "list", argument] = positionals;
  if (!name) {
    ui.error("Repository name is required");
    return 1;
  }

  try {
    return await withOrchestrator(values, (orchestrator) =>
      runAction(orchestrator, name, action, argument, values.file),
    );
  } catch (error) {
    return reportError("Exclusions", error, values.verbose);
  }
}

async function runAction(
  orchestrator: Orchestrator,
  name: string,
  action: string,
  argument: string | undefined,
  file: string | undefined,
): Promise<number> {
  switch (action) {
    case "list": {
      printPatterns(name, await orchestrator.getExclusions(name));
      return 0;
    }
    case "add": {
      if (argument === undefined) {
        throw new ValidationError("A pattern is required", "pattern");
      }
      printPatterns(name, await orchestrator.addExclusion(name, argument));
      return 0;
    }
    case "remove": {
      const line = Number(argument);
      if (argument === undefined || !Number.isInteger(line)) {
        throw new ValidationError("A line number is required", "lineNumber", argument);
      }
      printPatterns(name, await orchestrator.removeExclusion(name, line));
      return 0;
    }
    case "set": {
      if (!file) {
        throw new ValidationError("--file is required for set", "file");
      }
      const patterns = (await readFile(file, "utf-8")).split(/\r?\n/);
      const written = await orchestrator.setExclusions(name, patterns);
      ui.success(`Wrote ${written}`);
      printPatterns(name, await orchestrator.getExclusions(name));
      return 0;
    }
    default:
      ui.error(`Unknown exclusions action: ${action}`);
      return 1;
  }
}

function printPatterns(name: string, patterns: string[]): void {
  if (patterns.length === 0) {
    ui.info(`No exclusion patterns for ${name}`);
    return;
  }
  ui.step(`Exclusion patterns for ${name}:`);
  patterns.forEach((pattern, index) => {
    console.log(`  ${color.dim(String(index + 1).padStart(3))}  ${pattern}`);
  });
}

function printHelp(): void {
  console.log(`
${color.bold("borgmate exclusions")} - Manage a repository's exclusion patterns

${color.dim("USAGE:")}
  borgmate exclusions <name> [list]
  borgmate exclusions <name> add <pattern>
  borgmate exclusions <name> remove <line>
  borgmate exclusions <name> set --file <path>

${color.dim("OPTIONS:")}
  -f, --file <path>         Pattern file to copy in (with set)
${COMMON_HELP}

${color.dim("EXAMPLES:")}
  borgmate exclusions docs add '**/node_modules'
  borgmate exclusions docs remove 2
`);
}
