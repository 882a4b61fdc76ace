/**
 * Shared plumbing for CLI commands
 */

import { loadConfig } from "../config";
import { createOrchestrator, type Orchestrator, type StepEventHandler, type StepWarning } from "../core";
import { describeEvent } from "../engine";
import { ValidationError, WorkflowError, errorMessage } from "../errors";
import { setLogLevel } from "../utils/logger";
import { color, ui } from "./ui";

/**
 * Options every repository command accepts
 */
export const COMMON_OPTIONS = {
  config: { type: "string" as const, short: "c" },
  offline: { type: "boolean" as const, default: false },
  passphrase: { type: "string" as const, short: "p" },
  verbose: { type: "boolean" as const, short: "v", default: false },
  help: { type: "boolean" as const, short: "h", default: false },
};

export const COMMON_HELP = `  -c, --config <path>       Path to config file (default: ./borgmate.yaml)
      --offline             Keep metadata in the local SQLite database
  -p, --passphrase <value>  Passphrase override for this run
  -v, --verbose             Show debug logs and full error diagnostics
  -h, --help                Show this help message`;

export interface CommonFlags {
  config?: string;
  offline?: boolean;
  verbose?: boolean;
}

export async function openOrchestrator(flags: CommonFlags): Promise<Orchestrator> {
  if (flags.verbose) {
    setLogLevel("debug");
  }
  const config = await loadConfig(flags.config);
  return createOrchestrator(flags.offline ? { ...config, offline: true } : config);
}

/**
 * Run a command body against an orchestrator and always close its store
 */
export async function withOrchestrator<T>(
  flags: CommonFlags,
  fn: (orchestrator: Orchestrator) => Promise<T>,
): Promise<T> {
  const orchestrator = await openOrchestrator(flags);
  try {
    return await fn(orchestrator);
  } finally {
    await orchestrator.close();
  }
}

export function reportError(action: string, error: unknown, verbose: boolean | undefined): number {
  ui.error(`${action} failed: ${errorMessage(error)}`);
  if (verbose) {
    if (error instanceof WorkflowError && error.stderr) {
      console.error(color.dim(error.stderr));
    }
    console.error(error);
  }
  return 1;
}

export function printWarnings(warnings: StepWarning[]): void {
  for (const warning of warnings) {
    ui.warn(`${color.dim(`[${warning.step}]`)} ${warning.message}`);
  }
}

type Spinner = ReturnType<typeof ui.spinner>;

/**
 * Feed engine progress into a spinner's message line
 */
export function spinnerProgress(s: Spinner): StepEventHandler {
  return (step, event) => {
    const text = describeEvent(event);
    if (text) {
      s.message(`${step}: ${text}`);
    }
  };
}

/**
 * Abort signal fired by Ctrl-C, so a running engine subprocess is stopped
 */
export function interruptSignal(): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const onInterrupt = () => controller.abort();
  process.once("SIGINT", onInterrupt);
  return {
    signal: controller.signal,
    dispose: () => process.off("SIGINT", onInterrupt),
  };
}

/**
 * Ask before a destructive action unless --yes was given
 */
export async function confirmAction(message: string, yes: boolean | undefined): Promise<boolean> {
  if (yes) return true;
  const confirmed = await ui.confirm({ message, initialValue: false });
  return !ui.isCancel(confirmed) && confirmed;
}

export function parseCount(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new ValidationError(`${flag} must be a non-negative integer`, flag, value);
  }
  return parsed;
}
