/**
 * Configuration file loading
 */

import { readFile } from "node:fs/promises";
import * as path from "node:path";
import * as yaml from "js-yaml";
import { ConfigurationError, errorMessage } from "../errors";
import type { BorgmateConfig } from "../types";
import { debug } from "../utils/logger";
import { pathExists } from "../utils/path";
import { CONFIG_FILE_NAMES, deepMerge, defaultConfig, isPlainObject, resolveHomeDir } from "./defaults";
import { envOverrides } from "./env";
import { resolvePaths } from "./resolver";
import { validateConfig } from "./validator";

export function parseConfigContent(content: string, ext: string): Record<string, unknown> {
  let parsed: unknown;

  if (ext === ".yaml" || ext === ".yml") {
    try {
      parsed = yaml.load(content);
    } catch (e) {
      throw new ConfigurationError(`Failed to parse YAML: ${errorMessage(e)}`);
    }
  } else if (ext === ".json") {
    try {
      parsed = JSON.parse(content);
    } catch (e) {
      throw new ConfigurationError(`Failed to parse JSON: ${errorMessage(e)}`);
    }
  } else {
    throw new ConfigurationError(`Unsupported config file format: ${ext}. Use .yaml, .yml, or .json`);
  }

  // An empty file parses to undefined/null
  if (parsed === undefined || parsed === null) return {};
  if (!isPlainObject(parsed)) {
    throw new ConfigurationError("Config file must contain a mapping at the top level");
  }
  return parsed;
}

/**
 * Find a config file in the working directory, then in the home directory
 */
export async function findConfigFile(
  startDir: string = process.cwd(),
  homeDir: string = resolveHomeDir(),
): Promise<string | null> {
  const candidates = [
    ...CONFIG_FILE_NAMES.map((name) => path.join(startDir, name)),
    path.join(homeDir, "config.yaml"),
  ];

  for (const candidate of candidates) {
    if (await pathExists(candidate)) {
      return candidate;
    }
  }

  return null;
}

/**
 * Load configuration: defaults, then the config file, then BORGMATE_*
 * variables. A missing config file is not an error unless one was named.
 */
export async function loadConfig(
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<BorgmateConfig> {
  const homeDir = resolveHomeDir(env);
  let filePath: string | null = null;

  if (configPath) {
    filePath = path.resolve(configPath);
    if (!(await pathExists(filePath))) {
      throw new ConfigurationError(`Config file not found: ${filePath}`);
    }
  } else {
    filePath = await findConfigFile(process.cwd(), homeDir);
  }

  let fromFile: Record<string, unknown> = {};
  if (filePath) {
    debug(`Loading config from ${filePath}`);
    const content = await readFile(filePath, "utf-8");
    fromFile = parseConfigContent(content, path.extname(filePath).toLowerCase());
  }

  const merged = deepMerge(deepMerge(defaultConfig(homeDir), fromFile), envOverrides(env));

  return resolvePaths(validateConfig(merged), filePath);
}
