/**
 * Schemas for the engine's JSON output
 */

import { z } from "zod";

export const logLevelNameSchema = z.enum(["DEBUG", "INFO", "WARNING", "ERROR", "CRITICAL"]);

export const archiveProgressSchema = z.object({
  type: z.literal("archive_progress"),
  original_size: z.number().optional(),
  compressed_size: z.number().optional(),
  deduplicated_size: z.number().optional(),
  nfiles: z.number().optional(),
  path: z.string().optional(),
  time: z.number(),
  finished: z.boolean().optional(),
});

export const progressMessageSchema = z.object({
  type: z.literal("progress_message"),
  operation: z.number(),
  msgid: z.string().nullable().optional(),
  finished: z.boolean(),
  message: z.string().optional(),
  time: z.number(),
});

export const progressPercentSchema = z.object({
  type: z.literal("progress_percent"),
  operation: z.number(),
  msgid: z.string().nullable().optional(),
  finished: z.boolean(),
  message: z.string().optional(),
  current: z.number().optional(),
  total: z.number().optional(),
  info: z.array(z.string()).optional(),
  time: z.number(),
});

export const fileStatusSchema = z.object({
  type: z.literal("file_status"),
  status: z.string(),
  path: z.string(),
});

export const logMessageSchema = z.object({
  type: z.literal("log_message"),
  time: z.number(),
  levelname: logLevelNameSchema,
  name: z.string(),
  message: z.string(),
  msgid: z.string().nullable().optional(),
});

export const engineLogEventSchema = z.discriminatedUnion("type", [
  archiveProgressSchema,
  progressMessageSchema,
  progressPercentSchema,
  fileStatusSchema,
  logMessageSchema,
]);

const repoStatsSchema = z.object({
  total_chunks: z.number(),
  total_csize: z.number(),
  total_size: z.number(),
  total_unique_chunks: z.number(),
  unique_csize: z.number(),
  unique_size: z.number(),
});

export const repoInfoSchema = z.object({
  cache: z.object({
    path: z.string(),
    stats: repoStatsSchema,
  }),
  encryption: z.object({
    mode: z.string(),
    keyfile: z.string().optional(),
  }),
  repository: z.object({
    id: z.string(),
    last_modified: z.string(),
    location: z.string(),
  }),
  security_dir: z.string(),
});

export const repoArchiveSchema = z.object({
  archive: z.string(),
  barchive: z.string().optional(),
  id: z.string(),
  name: z.string(),
  start: z.string(),
  time: z.string(),
});

export const archiveListSchema = z.object({
  archives: z.array(repoArchiveSchema),
});

export const archiveContentEntrySchema = z.object({
  type: z.string(),
  mode: z.string(),
  user: z.string(),
  group: z.string(),
  uid: z.number(),
  gid: z.number(),
  path: z.string(),
  healthy: z.boolean().optional(),
  source: z.string().optional(),
  linktarget: z.string().optional(),
  flags: z.number().nullable().optional(),
  mtime: z.string(),
  size: z.number(),
});

export const archiveStatsSchema = z.object({
  original_size: z.number(),
  compressed_size: z.number(),
  deduplicated_size: z.number(),
  nfiles: z.number(),
});

export const archiveInfoSchema = z.object({
  archives: z.array(
    z.object({
      id: z.string(),
      name: z.string(),
      start: z.string(),
      end: z.string().optional(),
      hostname: z.string().optional(),
      stats: archiveStatsSchema,
    }),
  ),
});

export type LogLevelName = z.infer<typeof logLevelNameSchema>;
export type ArchiveProgressEvent = z.infer<typeof archiveProgressSchema>;
export type ProgressMessageEvent = z.infer<typeof progressMessageSchema>;
export type ProgressPercentEvent = z.infer<typeof progressPercentSchema>;
export type FileStatusEvent = z.infer<typeof fileStatusSchema>;
export type LogMessageEvent = z.infer<typeof logMessageSchema>;
export type EngineLogEvent = z.infer<typeof engineLogEventSchema>;
export type RepoInfo = z.infer<typeof repoInfoSchema>;
export type RepoArchive = z.infer<typeof repoArchiveSchema>;
export type ArchiveContentEntry = z.infer<typeof archiveContentEntrySchema>;
export type ArchiveInfo = z.infer<typeof archiveInfoSchema>;
