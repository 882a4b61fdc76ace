/**
 * Archive and repository naming utilities
 */

// Pattern: YYYY-MM-DD_HH:MM:SS (UTC)
export const ARCHIVE_NAME_PATTERN = /^\d{4}-\d{2}-\d{2}_\d{2}:\d{2}:\d{2}$/;

// Repository names double as file names and object-store prefixes
export const REPOSITORY_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]{0,62}$/;

/**
 * Archive names are derived from the UTC time so they sort chronologically
 */
export function generateArchiveName(now: Date = new Date()): string {
  const iso = now.toISOString();
  return `${iso.slice(0, 10)}_${iso.slice(11, 19)}`;
}

export function isValidArchiveName(archiveName: string): boolean {
  return ARCHIVE_NAME_PATTERN.test(archiveName);
}

/**
 * Convert an archive name back to the ISO timestamp it encodes
 */
export function archiveNameToIso(archiveName: string): string | null {
  if (!isValidArchiveName(archiveName)) return null;
  const iso = `${archiveName.slice(0, 10)}T${archiveName.slice(11)}.000Z`;
  return Number.isNaN(Date.parse(iso)) ? null : iso;
}

export function isValidRepositoryName(name: string): boolean {
  return REPOSITORY_NAME_PATTERN.test(name) && name !== "." && name !== "..";
}
