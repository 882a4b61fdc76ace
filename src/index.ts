#!/usr/bin/env node

import * as p from "@clack/prompts";
import color from "picocolors";
import { archivesCommand } from "./cli/commands/archives";
import { backupCommand } from "./cli/commands/backup";
import { checkCommand } from "./cli/commands/check";
import { createCommand } from "./cli/commands/create";
import { deleteCommand } from "./cli/commands/delete";
import { exclusionsCommand } from "./cli/commands/exclusions";
import { extractCommand } from "./cli/commands/extract";
import { infoCommand } from "./cli/commands/info";
import { keyExportCommand } from "./cli/commands/key-export";
import { listCommand } from "./cli/commands/list";
import { migratePassphrasesCommand } from "./cli/commands/migrate-passphrases";
import { restoreCommand } from "./cli/commands/restore";
import { syncCommand } from "./cli/commands/sync";
import { banner, LOGO, TIPS, VERSION } from "./cli/ui";

function printHelp(): void {
  console.log(color.bold(color.cyan(LOGO)));
  p.intro(`${color.cyan("borgmate")} ${color.dim(`v${VERSION}`)} - Borg repository manager`);

  p.note(
    `${color.cyan("create")}               Initialise and register a repository
${color.cyan("backup")}               Archive, prune, compact and sync a repository
${color.cyan("delete")}               Delete a repository and its metadata
${color.cyan("restore")}              Fetch a repository back from S3
${color.cyan("list")}                 List registered repositories
${color.cyan("info")}                 Show repository details
${color.cyan("archives")}             List, inspect or delete archives
${color.cyan("extract")}              Extract an archive
${color.cyan("exclusions")}           Manage exclusion patterns
${color.cyan("key-export")}           Export a repository key
${color.cyan("check")}                Verify repository consistency
${color.cyan("sync")}                 Mirror a repository to S3
${color.cyan("migrate-passphrases")}  Move stored passphrases into key files`,
    "Commands",
  );

  p.note(
    `-h, --help      Show this help message
-v, --version   Show version`,
    "Options",
  );

  p.note(
    `borgmate create -n docs -r /mnt/backup/docs -t ~/Documents
borgmate backup docs                ${color.dim("# Daily backup")}
borgmate list --format json         ${color.dim("# Repositories as JSON")}
borgmate restore docs --force       ${color.dim("# Replace local copy from S3")}`,
    "Examples",
  );

  p.note(TIPS, "Tips");
  p.outro(`Run ${color.cyan("borgmate <command> --help")} for command details`);
}

function printVersion(): void {
  banner("version");
  p.outro(`Run ${color.cyan("borgmate --help")} for usage`);
}

async function main(): Promise<number> {
  const args = process.argv.slice(2);

  if (args.length === 0) {
    printHelp();
    return 0;
  }

  const command = args[0];
  const commandArgs = args.slice(1);

  switch (command) {
    case "create":
      return createCommand(commandArgs);

    case "backup":
      return backupCommand(commandArgs);

    case "delete":
      return deleteCommand(commandArgs);

    case "restore":
      return restoreCommand(commandArgs);

    case "list":
    case "ls":
      return listCommand(commandArgs);

    case "info":
      return infoCommand(commandArgs);

    case "archives":
      return archivesCommand(commandArgs);

    case "extract":
      return extractCommand(commandArgs);

    case "exclusions":
      return exclusionsCommand(commandArgs);

    case "key-export":
      return keyExportCommand(commandArgs);

    case "check":
      return checkCommand(commandArgs);

    case "sync":
      return syncCommand(commandArgs);

    case "migrate-passphrases":
      return migratePassphrasesCommand(commandArgs);

    case "-h":
    case "--help":
    case "help":
      printHelp();
      return 0;

    case "-v":
    case "--version":
    case "version":
      printVersion();
      return 0;

    default:
      console.error(`${color.red("Error:")} Unknown command: ${command}`);
      console.error(`Run ${color.cyan("borgmate --help")} for usage information.`);
      return 1;
  }
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    console.error(`${color.red("Fatal error:")}`, error);
    process.exit(1);
  });
