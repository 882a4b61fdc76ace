/**
 * Structured log-line parsing and exit-status classification
 */

import type { ExitClassification } from "../errors";
import type { EngineEvent, LogLevelName } from "../types";
import { engineLogEventSchema } from "./schemas";

const WARNING_LEVELS: ReadonlySet<LogLevelName> = new Set(["WARNING", "ERROR", "CRITICAL"]);

/**
 * 0 is success, 1 means the run finished with recoverable issues, anything
 * else (or no exit code at all) is fatal.
 */
export function classifyExitCode(code: number | null): ExitClassification {
  if (code === 0) return "success";
  if (code === 1) return "warning";
  return "fatal";
}

export function isWarningLevel(level: LogLevelName): boolean {
  return WARNING_LEVELS.has(level);
}

function tryParseJson(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch {
    return undefined;
  }
}

// progress_message records that carry counters are percent records
function normalizeType(value: unknown): unknown {
  if (
    typeof value === "object" &&
    value !== null &&
    "type" in value &&
    value.type === "progress_message" &&
    ("current" in value || "total" in value)
  ) {
    return { ...value, type: "progress_percent" };
  }
  return value;
}

/**
 * Parse one stderr line. Blank lines yield null; anything that is not a
 * recognised JSON record becomes a raw event.
 */
export function parseEventLine(line: string): EngineEvent | null {
  const trimmed = line.trim();
  if (trimmed === "") return null;

  if (trimmed.startsWith("{")) {
    const parsed = engineLogEventSchema.safeParse(normalizeType(tryParseJson(trimmed)));
    if (parsed.success) {
      return parsed.data;
    }
  }

  return { type: "raw", line: trimmed };
}

/**
 * Short human-readable rendering of an event, or null for events that
 * carry nothing worth printing.
 */
export function describeEvent(event: EngineEvent): string | null {
  switch (event.type) {
    case "log_message":
      return `${event.levelname}: ${event.message}`;
    case "file_status":
      return `${event.status} ${event.path}`;
    case "progress_percent":
      if (event.finished) return null;
      if (event.message) return event.message;
      if (event.current !== undefined && event.total !== undefined && event.total > 0) {
        return `${Math.round((event.current / event.total) * 100)}%`;
      }
      return null;
    case "progress_message":
      return event.finished ? null : (event.message ?? null);
    case "archive_progress":
      if (event.finished || event.nfiles === undefined) return null;
      return `${event.nfiles} files${event.path ? ` ${event.path}` : ""}`;
    case "raw":
      return event.line;
  }
}
