/**
 * Utility exports
 */

// Crypto utilities
export { computeStringHash, generateSecurePassphrase, PASSPHRASE_BYTES, secretsEqual } from "./crypto";
// Formatting utilities
export { formatBytes, formatDuration } from "./format";
export type { LogLevel, ScopedLogger } from "./logger";
// Logger
export {
  debug,
  error,
  getLogLevel,
  info,
  logger,
  parseLogLevel,
  scoped,
  setLogLevel,
  warn,
} from "./logger";
// Naming utilities
export {
  ARCHIVE_NAME_PATTERN,
  archiveNameToIso,
  generateArchiveName,
  isValidArchiveName,
  isValidRepositoryName,
  REPOSITORY_NAME_PATTERN,
} from "./naming";
// Path utilities
export { expandHome, isPathWithinDir, pathExists } from "./path";
