/**
 * Argument vectors for engine subcommands
 */

import { ValidationError } from "../errors";
import type { EngineClientOptions, EngineInvocation, RetentionPolicy } from "../types";

type ArgOptions = Pick<EngineClientOptions, "compression" | "checkpointInterval" | "storageQuota">;

/**
 * Reject operands the engine could read as flags
 */
export function assertOperand(value: string, field: string): string {
  if (value.length === 0 || value.startsWith("-") || value.includes("\0")) {
    throw new ValidationError(`Invalid ${field}: ${JSON.stringify(value)}`, field, value);
  }
  return value;
}

function archiveRef(repoPath: string, archiveName: string): string {
  assertOperand(repoPath, "repository path");
  assertOperand(archiveName, "archive name");
  if (archiveName.includes("::") || archiveName.includes("/")) {
    throw new ValidationError(`Invalid archive name: ${archiveName}`, "archive name", archiveName);
  }
  return `${repoPath}::${archiveName}`;
}

export function pruneArgs(retention: RetentionPolicy): string[] {
  const args = [
    `--keep-daily=${retention.daily}`,
    `--keep-weekly=${retention.weekly}`,
    `--keep-monthly=${retention.monthly}`,
  ];
  // keep-yearly=0 would be a no-op rule, so it is left off
  if (retention.yearly > 0) {
    args.push(`--keep-yearly=${retention.yearly}`);
  }
  return args;
}

export function buildArgs(invocation: EngineInvocation, options: ArgOptions): string[] {
  const checkpoint = ["--checkpoint-interval", String(options.checkpointInterval)];

  switch (invocation.subcommand) {
    case "init":
      return [
        "init",
        "--log-json",
        "--progress",
        "--encryption=repokey",
        `--storage-quota=${options.storageQuota}`,
        assertOperand(invocation.repoPath, "repository path"),
      ];

    case "set-config":
      return [
        "config",
        "--log-json",
        "--progress",
        assertOperand(invocation.repoPath, "repository path"),
        assertOperand(invocation.key, "config key"),
        assertOperand(invocation.value, "config value"),
      ];

    case "create-archive": {
      const args = [
        "create",
        "--filter",
        "AME",
        "--show-rc",
        `--compression=${options.compression}`,
        "--exclude-caches",
        "--exclude-nodump",
        "--progress",
        "--stats",
        "--list",
        "--log-json",
        ...checkpoint,
      ];
      if (invocation.excludeFrom) {
        args.push("--exclude-from", assertOperand(invocation.excludeFrom, "exclusions file"));
      }
      args.push(
        archiveRef(invocation.repoPath, invocation.archiveName),
        assertOperand(invocation.backupTarget, "backup target"),
      );
      return args;
    }

    case "prune":
      return [
        "prune",
        "--log-json",
        "--progress",
        "--list",
        ...pruneArgs(invocation.retention),
        assertOperand(invocation.repoPath, "repository path"),
      ];

    case "compact":
      return ["compact", "--log-json", "--progress", assertOperand(invocation.repoPath, "repository path")];

    case "check": {
      const args = ["check", "--log-json", "--progress"];
      if (invocation.verifyData) args.push("--verify-data");
      args.push(assertOperand(invocation.repoPath, "repository path"));
      return args;
    }

    case "info":
      return [
        "info",
        "--json",
        invocation.archiveName
          ? archiveRef(invocation.repoPath, invocation.archiveName)
          : assertOperand(invocation.repoPath, "repository path"),
      ];

    case "list-archives":
      return ["list", "--json", assertOperand(invocation.repoPath, "repository path")];

    case "list-archive-contents":
      return ["list", "--json-lines", archiveRef(invocation.repoPath, invocation.archiveName)];

    case "extract": {
      const opts = invocation.options ?? {};
      const args = ["extract", "--log-json", "--progress", "--list"];
      if (opts.dryRun) args.push("--dry-run");
      if (opts.sparse) args.push("--sparse");
      if (opts.stripComponents !== undefined) {
        if (!Number.isInteger(opts.stripComponents) || opts.stripComponents < 0) {
          throw new ValidationError(
            "stripComponents must be a non-negative integer",
            "stripComponents",
            opts.stripComponents,
          );
        }
        args.push(`--strip-components=${opts.stripComponents}`);
      }
      for (const pattern of opts.patterns ?? []) {
        args.push(`--pattern=+${pattern}`);
      }
      for (const exclude of opts.excludes ?? []) {
        args.push(`--exclude=${exclude}`);
      }
      args.push(archiveRef(invocation.repoPath, invocation.archiveName));
      for (const p of opts.paths ?? []) {
        args.push(assertOperand(p, "extract path"));
      }
      return args;
    }

    case "delete-archive":
    case "delete-repository": {
      const args = ["delete", "--log-json", "--progress", "--list", "--force", ...checkpoint];
      if (invocation.dryRun) args.push("--dry-run");
      args.push(
        invocation.subcommand === "delete-archive"
          ? archiveRef(invocation.repoPath, invocation.archiveName)
          : assertOperand(invocation.repoPath, "repository path"),
      );
      return args;
    }

    case "export-key": {
      const args = ["key", "export"];
      if (invocation.paper) args.push("--paper");
      args.push(
        assertOperand(invocation.repoPath, "repository path"),
        assertOperand(invocation.outputPath, "key output path"),
      );
      return args;
    }
  }
}
