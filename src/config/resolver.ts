/**
 * Configuration path resolution
 */

import * as path from "node:path";
import type { BorgmateConfig } from "../types";
import { expandHome } from "../utils/path";

function resolveAgainst(baseDir: string, value: string): string {
  const expanded = expandHome(value);
  return path.isAbsolute(expanded) ? expanded : path.resolve(baseDir, expanded);
}

/**
 * Resolve relative paths against the config file's directory (or the
 * working directory when no file was loaded) and derive the defaults
 * that live under the home directory.
 */
export function resolvePaths(config: BorgmateConfig, configPath: string | null): BorgmateConfig {
  const baseDir = configPath ? path.dirname(path.resolve(configPath)) : process.cwd();
  const homeDir = resolveAgainst(baseDir, config.paths.homeDir);

  const derive = (value: string, fallback: string): string =>
    value === "" ? path.join(homeDir, fallback) : resolveAgainst(baseDir, value);

  return {
    ...config,
    database: {
      path: derive(config.database.path, "borgmate.db"),
    },
    paths: {
      homeDir,
      passphrasesDir: derive(config.paths.passphrasesDir, "passphrases"),
      exclusionsDir: derive(config.paths.exclusionsDir, "exclusions"),
      legacyDataDir: derive(config.paths.legacyDataDir, "data"),
    },
  };
}
