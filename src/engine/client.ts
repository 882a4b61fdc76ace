/**
 * Backup engine client
 */

import * as path from "node:path";
import { EngineError } from "../errors";
import type {
  BorgmateConfig,
  EngineClientOptions,
  EngineEvent,
  EngineInvocation,
  EngineOutcome,
  EngineSubcommand,
  RunOptions,
} from "../types";
import { scoped } from "../utils/logger";
import { buildArgs } from "./args";
import { classifyExitCode, isWarningLevel, parseEventLine } from "./events";
import { type ProcessResult, startProcess } from "./process";

/**
 * Anything that can run engine subcommands. The orchestrator depends on
 * this rather than on the subprocess-backed client.
 */
export interface BackupEngine {
  /**
   * Run a subcommand, yielding structured stderr events as they arrive.
   * The generator returns the outcome for success and warning exits and
   * throws EngineError for fatal ones.
   */
  stream(
    invocation: EngineInvocation,
    options?: RunOptions,
  ): AsyncGenerator<EngineEvent, EngineOutcome, undefined>;
}

const log = scoped("engine");

function workingDirectory(invocation: EngineInvocation): string {
  if (invocation.subcommand === "extract") return invocation.destination;
  return path.dirname(invocation.repoPath);
}

export class BorgClient implements BackupEngine {
  constructor(private readonly options: EngineClientOptions) {}

  get executablePath(): string {
    return this.options.executablePath;
  }

  buildCommand(invocation: EngineInvocation): string[] {
    return [this.options.executablePath, ...buildArgs(invocation, this.options)];
  }

  async *stream(
    invocation: EngineInvocation,
    options: RunOptions = {},
  ): AsyncGenerator<EngineEvent, EngineOutcome, undefined> {
    const command = this.buildCommand(invocation);
    const env: NodeJS.ProcessEnv = { ...process.env };
    if (options.passphrase !== undefined) {
      env.BORG_PASSPHRASE = options.passphrase;
    }
    if (invocation.subcommand === "delete-repository") {
      env.BORG_DELETE_I_KNOW_WHAT_I_AM_DOING = "YES";
    }

    log.debug(`Running ${command.join(" ")}`);

    const proc = startProcess({
      executable: this.options.executablePath,
      args: command.slice(1),
      cwd: workingDirectory(invocation),
      env,
      timeoutMs: options.timeoutMs ?? this.options.timeoutMs,
      signal: options.signal,
    });

    const warnings: string[] = [];
    try {
      for await (const line of proc.lines()) {
        const event = parseEventLine(line);
        if (!event) continue;
        if (event.type === "log_message") {
          if (isWarningLevel(event.levelname)) {
            warnings.push(event.message);
            log.warn(event.message);
          } else {
            log.debug(event.message);
          }
        }
        yield event;
      }

      const result = await proc.wait();
      return settle(invocation.subcommand, command, result, warnings);
    } finally {
      proc.dispose();
    }
  }
}

function failure(
  message: string,
  subcommand: EngineSubcommand,
  command: string[],
  result: ProcessResult,
  kind: EngineError["kind"],
  exitCode: number | null,
  cause?: unknown,
): EngineError {
  return new EngineError(message, {
    classification: "fatal",
    kind,
    subcommand,
    exitCode,
    command,
    stdout: result.stdout,
    stderr: result.stderrLines.join("\n"),
    cause,
  });
}

/**
 * Turn a finished process into an outcome, or throw for fatal results
 */
export function settle(
  subcommand: EngineSubcommand,
  command: string[],
  result: ProcessResult,
  warnings: string[],
): EngineOutcome {
  const { exit } = result;
  const executable = command[0] ?? "borg";

  if (exit.kind === "spawn-error") {
    throw failure(
      `Failed to start ${executable}: ${exit.error.message}`,
      subcommand,
      command,
      result,
      "spawn",
      null,
      exit.error,
    );
  }

  if (result.terminatedBy === "timeout") {
    throw failure(`${executable} ${subcommand} timed out`, subcommand, command, result, "timeout", exit.code);
  }
  if (result.terminatedBy === "aborted") {
    throw failure(`${executable} ${subcommand} was cancelled`, subcommand, command, result, "aborted", exit.code);
  }

  const classification = classifyExitCode(exit.code);
  if (classification === "fatal") {
    const reason = exit.code === null ? `killed by ${exit.signal ?? "signal"}` : `exit code ${exit.code}`;
    const detail = warnings.length > 0 ? `: ${warnings[warnings.length - 1]}` : "";
    throw failure(
      `${executable} ${subcommand} failed with ${reason}${detail}`,
      subcommand,
      command,
      result,
      "exit",
      exit.code,
    );
  }

  if (classification === "warning") {
    log.warn(`${executable} ${subcommand} completed with warnings`);
  }

  return {
    exitCode: exit.code ?? 0,
    classification,
    warnings,
    stdout: result.stdout,
    stderrLines: result.stderrLines,
  };
}

export function createBorgClient(config: BorgmateConfig): BorgClient {
  return new BorgClient({
    executablePath: config.borg.executablePath,
    compression: config.borg.compression,
    checkpointInterval: config.borg.checkpointInterval,
    storageQuota: config.borg.storageQuota,
    timeoutMs: config.borg.timeoutMs,
  });
}
