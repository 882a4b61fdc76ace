/**
 * Repository passphrase files and resolution
 */

import { chmod, mkdir, readFile, stat, unlink, writeFile } from "node:fs/promises";
import * as path from "node:path";
import { ValidationError, errorMessage, isNodeError } from "../../errors";
import type { MetadataStore, RepositoryRecord } from "../../types";
import { generateSecurePassphrase, secretsEqual } from "../../utils/crypto";
import { scoped } from "../../utils/logger";
import { isValidRepositoryName } from "../../utils/naming";

const log = scoped("passphrase");

export const FILE_MODE = 0o600;
export const DIR_MODE = 0o700;

export const EXISTING_REPO_ENV = "BORG_PASSPHRASE";
export const NEW_REPO_ENV = "BORG_NEW_PASSPHRASE";

export type PassphraseSource =
  | "explicit"
  | "file"
  | "legacy"
  | "environment"
  | "config"
  | "generated";

export interface ResolvedPassphrase {
  value: string;
  source: PassphraseSource;
}

export interface PassphraseStoreOptions {
  dir: string;
  env?: NodeJS.ProcessEnv;
  /** Fallback for existing repositories */
  configPassphrase?: string;
  /** Fallback for new repositories */
  configNewPassphrase?: string;
}

function present(value: string | null | undefined): value is string {
  return value !== undefined && value !== null && value !== "";
}

export class PassphraseStore {
  private readonly env: NodeJS.ProcessEnv;

  constructor(private readonly options: PassphraseStoreOptions) {
    this.env = options.env ?? process.env;
  }

  get dir(): string {
    return this.options.dir;
  }

  filePath(repoName: string): string {
    if (!isValidRepositoryName(repoName)) {
      throw new ValidationError(`Invalid repository name: ${repoName}`, "name", repoName);
    }
    return path.join(this.options.dir, `${repoName}.key`);
  }

  /**
   * Read a repository's passphrase file, or null when there is none.
   * Files readable by anyone but the owner are still used, with a warning.
   */
  async load(repoName: string): Promise<string | null> {
    const file = this.filePath(repoName);
    try {
      const info = await stat(file);
      const mode = info.mode & 0o777;
      if (mode !== FILE_MODE) {
        log.warn(
          `Passphrase file ${file} has permissions ${mode.toString(8)}, expected 600 (run: chmod 600 ${file})`,
        );
      }
      const content = (await readFile(file, "utf-8")).trim();
      return content === "" ? null : content;
    } catch (err) {
      if (isNodeError(err) && err.code === "ENOENT") return null;
      throw err;
    }
  }

  async save(repoName: string, passphrase: string): Promise<string> {
    const file = this.filePath(repoName);
    await mkdir(this.options.dir, { recursive: true, mode: DIR_MODE });
    await chmod(this.options.dir, DIR_MODE);
    await writeFile(file, passphrase, { encoding: "utf-8", mode: FILE_MODE });
    // mode only applies when the file is created
    await chmod(file, FILE_MODE);
    log.debug(`Saved passphrase file ${file}`);
    return file;
  }

  async remove(repoName: string): Promise<void> {
    try {
      await unlink(this.filePath(repoName));
    } catch (err) {
      if (isNodeError(err) && err.code === "ENOENT") return;
      throw err;
    }
  }

  /**
   * Passphrase for a repository that already exists. Sources in order:
   * explicit, passphrase file, legacy stored value, BORG_PASSPHRASE,
   * configuration.
   */
  async resolveExisting(
    repo: Pick<RepositoryRecord, "name" | "passphrase">,
    explicit?: string,
  ): Promise<ResolvedPassphrase> {
    if (present(explicit)) return { value: explicit, source: "explicit" };

    const fromFile = await this.load(repo.name);
    if (present(fromFile)) return { value: fromFile, source: "file" };

    if (present(repo.passphrase)) return { value: repo.passphrase, source: "legacy" };

    const fromEnv = this.env[EXISTING_REPO_ENV];
    if (present(fromEnv)) return { value: fromEnv, source: "environment" };

    if (present(this.options.configPassphrase)) {
      return { value: this.options.configPassphrase, source: "config" };
    }

    throw new ValidationError(
      `No passphrase found for repository ${repo.name}. Pass one explicitly, create ${this.filePath(repo.name)}, or set ${EXISTING_REPO_ENV}.`,
      "passphrase",
    );
  }

  /**
   * Passphrase for a repository about to be created. Falls back to a
   * freshly generated one; persisting it is left to the caller.
   */
  async resolveNew(repoName: string, explicit?: string): Promise<ResolvedPassphrase> {
    if (present(explicit)) return { value: explicit, source: "explicit" };

    const fromFile = await this.load(repoName);
    if (present(fromFile)) return { value: fromFile, source: "file" };

    const fromEnv = this.env[NEW_REPO_ENV];
    if (present(fromEnv)) return { value: fromEnv, source: "environment" };

    if (present(this.options.configNewPassphrase)) {
      return { value: this.options.configNewPassphrase, source: "config" };
    }

    return { value: generateSecurePassphrase(), source: "generated" };
  }

  /**
   * Write a passphrase to its file and confirm it reads back unchanged.
   * A mismatching file is removed before the error is raised.
   */
  async migrate(repoName: string, passphrase: string): Promise<string> {
    const file = await this.save(repoName, passphrase);
    const loaded = await this.load(repoName);
    if (loaded === null || !secretsEqual(loaded, passphrase)) {
      await this.remove(repoName);
      throw new ValidationError(
        `Passphrase verification failed for repository ${repoName}`,
        "passphrase",
      );
    }
    return file;
  }
}

export type PassphraseMigrationStatus = "migrated" | "skipped" | "failed";

export interface PassphraseMigrationOutcome {
  name: string;
  status: PassphraseMigrationStatus;
  filePath: string | null;
  error: string | null;
}

export function needsPassphraseMigration(repo: RepositoryRecord): boolean {
  return present(repo.passphrase) && !repo.passphrase_migrated;
}

/**
 * Move a single repository's stored passphrase into its file and clear it
 * from the record
 */
export async function migrateRepositoryPassphrase(
  store: MetadataStore,
  passphrases: PassphraseStore,
  repo: RepositoryRecord,
): Promise<RepositoryRecord> {
  if (!present(repo.passphrase)) {
    return repo;
  }
  const filePath = await passphrases.migrate(repo.name, repo.passphrase);
  return store.update({
    ...repo,
    passphrase: null,
    passphrase_file_path: filePath,
    passphrase_migrated: true,
  });
}

/**
 * Migrate every repository still holding a stored passphrase. Each one is
 * committed on its own; a failure is recorded and the rest continue.
 */
export async function migratePassphrases(
  store: MetadataStore,
  passphrases: PassphraseStore,
  names?: string[],
): Promise<PassphraseMigrationOutcome[]> {
  const repos = await store.listAll();
  const selected = names ? repos.filter((repo) => names.includes(repo.name)) : repos;
  const outcomes: PassphraseMigrationOutcome[] = [];

  for (const repo of selected) {
    if (!needsPassphraseMigration(repo)) {
      outcomes.push({ name: repo.name, status: "skipped", filePath: repo.passphrase_file_path, error: null });
      continue;
    }
    try {
      const updated = await migrateRepositoryPassphrase(store, passphrases, repo);
      log.info(`Migrated passphrase for ${repo.name} to ${updated.passphrase_file_path}`);
      outcomes.push({
        name: repo.name,
        status: "migrated",
        filePath: updated.passphrase_file_path,
        error: null,
      });
    } catch (err) {
      log.error(`Failed to migrate passphrase for ${repo.name}: ${errorMessage(err)}`);
      outcomes.push({ name: repo.name, status: "failed", filePath: null, error: errorMessage(err) });
    }
  }

  return outcomes;
}
