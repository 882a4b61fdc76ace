/**
 * Typed engine operations built on a BackupEngine
 */

import type { z } from "zod";
import { EngineError } from "../errors";
import type {
  ArchiveContentEntry,
  EngineEvent,
  EngineInvocation,
  EngineOutcome,
  EventHandler,
  RepoArchive,
  RepoInfo,
  RunOptions,
} from "../types";
import type { BackupEngine } from "./client";
import {
  archiveContentEntrySchema,
  archiveInfoSchema,
  archiveListSchema,
  repoInfoSchema,
} from "./schemas";

/**
 * Consume a run, handing each event to the callback, and return its outcome
 */
export async function drain(
  run: AsyncGenerator<EngineEvent, EngineOutcome, undefined>,
  onEvent?: EventHandler,
): Promise<EngineOutcome> {
  let next = await run.next();
  while (!next.done) {
    onEvent?.(next.value);
    next = await run.next();
  }
  return next.value;
}

export function runToCompletion(
  engine: BackupEngine,
  invocation: EngineInvocation,
  options: RunOptions = {},
  onEvent?: EventHandler,
): Promise<EngineOutcome> {
  return drain(engine.stream(invocation, options), onEvent);
}

function malformed(
  subcommand: string,
  stdout: string,
  detail: string,
  cause?: unknown,
): EngineError {
  return new EngineError(`Unexpected ${subcommand} output: ${detail}`, {
    classification: "fatal",
    kind: "exit",
    subcommand,
    exitCode: 0,
    command: [],
    stdout,
    stderr: "",
    cause,
  });
}

export function parseJsonOutput<T extends z.ZodTypeAny>(
  schema: T,
  stdout: string,
  subcommand: string,
): z.infer<T> {
  let raw: unknown;
  try {
    raw = JSON.parse(stdout);
  } catch (err) {
    throw malformed(subcommand, stdout, "not valid JSON", err);
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw malformed(subcommand, stdout, parsed.error.message, parsed.error);
  }
  return parsed.data;
}

export async function readRepoInfo(
  engine: BackupEngine,
  repoPath: string,
  options: RunOptions = {},
): Promise<RepoInfo> {
  const outcome = await runToCompletion(engine, { subcommand: "info", repoPath }, options);
  return parseJsonOutput(repoInfoSchema, outcome.stdout, "info");
}

export interface ArchiveSummary {
  id: string;
  name: string;
  start: string;
  hostname: string | null;
  originalSize: number;
  compressedSize: number;
  deduplicatedSize: number;
  fileCount: number;
}

export async function readArchiveInfo(
  engine: BackupEngine,
  repoPath: string,
  archiveName: string,
  options: RunOptions = {},
): Promise<ArchiveSummary> {
  const outcome = await runToCompletion(
    engine,
    { subcommand: "info", repoPath, archiveName },
    options,
  );
  const info = parseJsonOutput(archiveInfoSchema, outcome.stdout, "info");
  const archive = info.archives[0];
  if (!archive) {
    throw malformed("info", outcome.stdout, `archive ${archiveName} missing from output`);
  }
  return {
    id: archive.id,
    name: archive.name,
    start: archive.start,
    hostname: archive.hostname ?? null,
    originalSize: archive.stats.original_size,
    compressedSize: archive.stats.compressed_size,
    deduplicatedSize: archive.stats.deduplicated_size,
    fileCount: archive.stats.nfiles,
  };
}

export async function readArchiveList(
  engine: BackupEngine,
  repoPath: string,
  options: RunOptions = {},
): Promise<RepoArchive[]> {
  const outcome = await runToCompletion(engine, { subcommand: "list-archives", repoPath }, options);
  return parseJsonOutput(archiveListSchema, outcome.stdout, "list").archives;
}

export async function readArchiveContents(
  engine: BackupEngine,
  repoPath: string,
  archiveName: string,
  options: RunOptions = {},
): Promise<ArchiveContentEntry[]> {
  const outcome = await runToCompletion(
    engine,
    { subcommand: "list-archive-contents", repoPath, archiveName },
    options,
  );
  return outcome.stdout
    .split("\n")
    .filter((line) => line.trim() !== "")
    .map((line) => parseJsonOutput(archiveContentEntrySchema, line, "list"));
}
