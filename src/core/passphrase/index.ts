/**
 * Passphrase module exports
 */

export {
  DIR_MODE,
  EXISTING_REPO_ENV,
  FILE_MODE,
  migratePassphrases,
  migrateRepositoryPassphrase,
  NEW_REPO_ENV,
  needsPassphraseMigration,
  type PassphraseMigrationOutcome,
  type PassphraseMigrationStatus,
  type PassphraseSource,
  PassphraseStore,
  type PassphraseStoreOptions,
  type ResolvedPassphrase,
} from "./store";
