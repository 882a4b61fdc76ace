/**
 * Child process execution with concurrent stdout/stderr draining
 */

import { type ChildProcess, spawn } from "node:child_process";

/** Time between SIGTERM and SIGKILL when a child ignores termination */
export const KILL_GRACE_MS = 5000;

export interface ProcessSpec {
  executable: string;
  args: string[];
  cwd: string;
  env: NodeJS.ProcessEnv;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export type ProcessExit =
  | { kind: "exited"; code: number | null; signal: NodeJS.Signals | null }
  | { kind: "spawn-error"; error: Error };

export interface ProcessResult {
  exit: ProcessExit;
  stdout: string;
  stderrLines: string[];
  terminatedBy: "timeout" | "aborted" | null;
}

export interface RunningProcess {
  /** Stderr lines as they arrive. Finite, single pass. */
  lines(): AsyncGenerator<string, void, undefined>;
  /** Resolves once the process has exited and all output is flushed */
  wait(): Promise<ProcessResult>;
  /** Kill the child if it is still running and release timers */
  dispose(): void;
}

/**
 * Buffers lines between the stderr listener and the async consumer
 */
class LineChannel {
  private readonly queue: string[] = [];
  private waiter: (() => void) | null = null;
  private closed = false;

  push(line: string): void {
    this.queue.push(line);
    this.wake();
  }

  close(): void {
    this.closed = true;
    this.wake();
  }

  private wake(): void {
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.();
  }

  async *drain(): AsyncGenerator<string, void, undefined> {
    for (;;) {
      const line = this.queue.shift();
      if (line !== undefined) {
        yield line;
        continue;
      }
      if (this.closed) return;
      await new Promise<void>((resolve) => {
        this.waiter = resolve;
      });
    }
  }
}

function isRunning(child: ChildProcess): boolean {
  return child.exitCode === null && child.signalCode === null;
}

export function startProcess(spec: ProcessSpec): RunningProcess {
  const channel = new LineChannel();
  const stdoutChunks: string[] = [];
  const stderrLines: string[] = [];
  let partial = "";
  let terminatedBy: ProcessResult["terminatedBy"] = null;
  let exited = false;
  let timer: NodeJS.Timeout | null = null;
  let killTimer: NodeJS.Timeout | null = null;

  const flushPartial = (): void => {
    if (partial.length > 0) {
      stderrLines.push(partial);
      channel.push(partial);
      partial = "";
    }
  };

  if (spec.signal?.aborted) {
    channel.close();
    const result: ProcessResult = {
      exit: { kind: "exited", code: null, signal: null },
      stdout: "",
      stderrLines: [],
      terminatedBy: "aborted",
    };
    return {
      lines: () => channel.drain(),
      wait: () => Promise.resolve(result),
      dispose: () => undefined,
    };
  }

  let child: ChildProcess;
  try {
    child = spawn(spec.executable, spec.args, {
      cwd: spec.cwd,
      env: spec.env,
      stdio: ["ignore", "pipe", "pipe"],
    });
  } catch (err) {
    channel.close();
    const error = err instanceof Error ? err : new Error(String(err));
    const result: ProcessResult = {
      exit: { kind: "spawn-error", error },
      stdout: "",
      stderrLines: [],
      terminatedBy: null,
    };
    return {
      lines: () => channel.drain(),
      wait: () => Promise.resolve(result),
      dispose: () => undefined,
    };
  }

  const terminate = (reason: "timeout" | "aborted"): void => {
    if (terminatedBy || !isRunning(child)) return;
    terminatedBy = reason;
    child.kill("SIGTERM");
    killTimer = setTimeout(() => {
      if (isRunning(child)) child.kill("SIGKILL");
    }, KILL_GRACE_MS);
    killTimer.unref();
  };

  const onAbort = (): void => terminate("aborted");
  spec.signal?.addEventListener("abort", onAbort, { once: true });

  if (spec.timeoutMs !== undefined && spec.timeoutMs > 0) {
    timer = setTimeout(() => terminate("timeout"), spec.timeoutMs);
  }

  child.stdout?.setEncoding("utf8");
  child.stdout?.on("data", (chunk: string) => {
    stdoutChunks.push(chunk);
  });

  child.stderr?.setEncoding("utf8");
  child.stderr?.on("data", (chunk: string) => {
    const parts = (partial + chunk).split(/\r?\n/);
    partial = parts.pop() ?? "";
    for (const line of parts) {
      stderrLines.push(line);
      channel.push(line);
    }
  });

  const cleanup = (): void => {
    if (timer) clearTimeout(timer);
    timer = null;
    spec.signal?.removeEventListener("abort", onAbort);
  };

  // Never rejects: failures are reported through ProcessExit
  const exitPromise = new Promise<ProcessExit>((resolve) => {
    child.on("error", (error) => {
      if (exited) return;
      exited = true;
      resolve({ kind: "spawn-error", error });
    });
    child.once("close", (code, signal) => {
      if (exited) return;
      exited = true;
      resolve({ kind: "exited", code, signal });
    });
  }).then((exit) => {
    cleanup();
    if (killTimer) clearTimeout(killTimer);
    flushPartial();
    channel.close();
    return exit;
  });

  return {
    lines: () => channel.drain(),
    wait: async () => {
      const exit = await exitPromise;
      return {
        exit,
        stdout: stdoutChunks.join(""),
        stderrLines,
        terminatedBy,
      };
    },
    dispose: () => {
      cleanup();
      if (isRunning(child) && !exited) {
        terminatedBy ??= "aborted";
        child.kill("SIGTERM");
      }
    },
  };
}
