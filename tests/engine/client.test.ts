import { mkdtemp, rm } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { BorgClient } from "../../src/engine/client";
import { runToCompletion } from "../../src/engine/operations";
import { EngineError } from "../../src/errors";
import type { EngineEvent } from "../../src/types";
import { logLine, writeFakeBorg } from "../helpers/fake-borg";

function clientFor(executablePath: string, timeoutMs?: number): BorgClient {
  return new BorgClient({
    executablePath,
    compression: "zstd,6",
    checkpointInterval: 900,
    storageQuota: "100G",
    timeoutMs,
  });
}

describe("BorgClient", () => {
  let tempDir: string;
  let repoPath: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), "borgmate-engine-test-"));
    repoPath = path.join(tempDir, "repo");
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  test("streams structured events and returns the outcome", async () => {
    const borg = await writeFakeBorg(
      tempDir,
      "borg-ok",
      [
        `echo '${logLine("INFO", "starting")}' >&2`,
        `echo '${logLine("WARNING", "file changed")}' >&2`,
        "echo 'plain text' >&2",
        'echo "args=$*"',
        'echo "pass=$BORG_PASSPHRASE"',
        "exit 0",
      ].join("\n"),
    );
    const events: EngineEvent[] = [];

    const outcome = await runToCompletion(
      clientFor(borg),
      { subcommand: "compact", repoPath },
      { passphrase: "test-secret" },
      (event) => events.push(event),
    );

    expect(events.map((e) => e.type)).toEqual(["log_message", "log_message", "raw"]);
    expect(outcome.classification).toBe("success");
    expect(outcome.exitCode).toBe(0);
    expect(outcome.warnings).toEqual(["file changed"]);
    expect(outcome.stdout).toBe(`args=compact --log-json --progress ${repoPath}\npass=test-secret\n`);
    expect(outcome.stderrLines).toHaveLength(3);
  });

  test("exit code 1 is a warning, not a failure", async () => {
    const borg = await writeFakeBorg(tempDir, "borg-warn", "exit 1");

    const outcome = await runToCompletion(clientFor(borg), { subcommand: "compact", repoPath });

    expect(outcome.classification).toBe("warning");
    expect(outcome.exitCode).toBe(1);
  });

  test("exit code 2 throws a fatal EngineError carrying diagnostics", async () => {
    const borg = await writeFakeBorg(
      tempDir,
      "borg-fail",
      [`echo '${logLine("ERROR", "repository locked")}' >&2`, "echo partial", "exit 2"].join("\n"),
    );

    const error = await runToCompletion(clientFor(borg), { subcommand: "compact", repoPath }).catch(
      (err: unknown) => err,
    );

    expect(error).toBeInstanceOf(EngineError);
    if (!(error instanceof EngineError)) return;
    expect(error.classification).toBe("fatal");
    expect(error.kind).toBe("exit");
    expect(error.exitCode).toBe(2);
    expect(error.subcommand).toBe("compact");
    expect(error.stdout).toBe("partial\n");
    expect(error.message).toBe(`${borg} compact failed with exit code 2: repository locked`);
  });

  test("a missing executable is a spawn failure", async () => {
    const error = await runToCompletion(clientFor(path.join(tempDir, "no-such-borg")), {
      subcommand: "compact",
      repoPath,
    }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(EngineError);
    expect(error instanceof EngineError && error.kind).toBe("spawn");
  });

  test("kills the process when the timeout elapses", async () => {
    const borg = await writeFakeBorg(tempDir, "borg-slow", "exec sleep 5");

    const error = await runToCompletion(clientFor(borg, 100), { subcommand: "compact", repoPath }).catch(
      (err: unknown) => err,
    );

    expect(error).toBeInstanceOf(EngineError);
    expect(error instanceof EngineError && error.kind).toBe("timeout");
  });

  test("stops the process when the signal aborts", async () => {
    const borg = await writeFakeBorg(tempDir, "borg-abort", "exec sleep 5");
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 100);

    const error = await runToCompletion(clientFor(borg), { subcommand: "compact", repoPath }, {
      signal: controller.signal,
    }).catch((err: unknown) => err);

    expect(error instanceof EngineError && error.kind).toBe("aborted");
  });

  test("confirms repository deletion through the environment", async () => {
    const borg = await writeFakeBorg(tempDir, "borg-delete", 'echo "$BORG_DELETE_I_KNOW_WHAT_I_AM_DOING"');

    const outcome = await runToCompletion(clientFor(borg), { subcommand: "delete-repository", repoPath });

    expect(outcome.stdout).toBe("YES\n");
  });
});
