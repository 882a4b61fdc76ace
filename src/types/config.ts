/**
 * Configuration type definitions for borgmate
 */

export interface DatabaseConfig {
  path: string;
}

export interface AwsConfig {
  reposTable: string;
  archivesTable: string;
  statsTable: string;
  /** Empty string disables remote sync */
  s3Bucket: string;
  region: string;
  endpoint?: string;
  /** Bound on attempts for throttled remote-table calls */
  maxAttempts: number;
}

export interface RetentionConfig {
  keepDaily: number;
  keepWeekly: number;
  keepMonthly: number;
  keepYearly: number;
}

export interface BorgConfig {
  executablePath: string;
  compression: string;
  checkpointInterval: number;
  storageQuota: string;
  additionalFreeSpace: string;
  retention: RetentionConfig;
  /** Fallback passphrase for existing repositories */
  passphrase?: string;
  /** Fallback passphrase for new repositories */
  newPassphrase?: string;
  /** Per-invocation engine timeout; unset means no timeout */
  timeoutMs?: number;
}

export interface PathsConfig {
  homeDir: string;
  passphrasesDir: string;
  exclusionsDir: string;
  legacyDataDir: string;
}

export interface BorgmateConfig {
  /** Use the embedded database instead of the remote table store */
  offline: boolean;
  database: DatabaseConfig;
  aws: AwsConfig;
  borg: BorgConfig;
  paths: PathsConfig;
}
