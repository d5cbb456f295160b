/**
 * Configuration folder loading
 */

import { readFile, stat } from "node:fs/promises";
import * as path from "node:path";
import * as yaml from "js-yaml";
import { errorMessage } from "../core/errors";
import type { ChBackupConfig } from "../types";
import { logger } from "../utils/logger";
import {
  deepMerge,
  defaultConfigTree,
  isPlainObject,
  type PlainObject,
} from "./defaults";
import { buildEnvOverlay } from "./env";
import { checkTargetDir, resolvePaths } from "./resolver";
import { ConfigError, validateConfig } from "./validator";

export { ConfigError } from "./validator";

/** Base names loaded from the config folder; later ones override earlier */
export const CONFIG_FILE_NAMES = ["default", "config"];

const CONFIG_EXTENSIONS = [".yaml", ".yml", ".json"];

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  /** Skip the check that a File/Disk target directory exists */
  skipTargetCheck?: boolean;
}

export function parseConfigContent(content: string, ext: string): PlainObject {
  let parsed: unknown;

  if (ext === ".yaml" || ext === ".yml") {
    try {
      parsed = yaml.load(content);
    } catch (e) {
      throw new ConfigError(`Failed to parse YAML: ${errorMessage(e)}`);
    }
  } else if (ext === ".json") {
    try {
      parsed = JSON.parse(content);
    } catch (e) {
      throw new ConfigError(`Failed to parse JSON: ${errorMessage(e)}`);
    }
  } else {
    throw new ConfigError(
      `Unsupported config file format: ${ext}. Use .yaml, .yml, or .json`,
    );
  }

  // An empty file is an empty config
  if (parsed === undefined || parsed === null) return {};
  if (!isPlainObject(parsed)) {
    throw new ConfigError("Config file must contain a mapping of sections");
  }
  return parsed;
}

/**
 * Find `<name>.yaml|.yml|.json` in the folder
 */
export async function findConfigFile(
  folder: string,
  name: string,
): Promise<string | null> {
  for (const ext of CONFIG_EXTENSIONS) {
    const candidate = path.join(folder, `${name}${ext}`);
    try {
      const info = await stat(candidate);
      if (info.isFile()) return candidate;
    } catch {
      // Not present, try the next extension
    }
  }
  return null;
}

/**
 * Load default.* and config.* from the folder, overlay the environment
 * and validate
 */
export async function loadConfig(
  configFolder: string,
  options: LoadConfigOptions = {},
): Promise<ChBackupConfig> {
  const folder = path.resolve(configFolder);

  try {
    const info = await stat(folder);
    if (!info.isDirectory()) {
      throw new ConfigError(`Config folder is not a directory: ${folder}`);
    }
  } catch (error) {
    if (error instanceof ConfigError) throw error;
    throw new ConfigError(`Config folder not found: ${folder}`);
  }

  let tree = defaultConfigTree();

  for (const name of CONFIG_FILE_NAMES) {
    const file = await findConfigFile(folder, name);
    if (!file) {
      logger.debug(`No ${name} config in ${folder}`);
      continue;
    }
    logger.debug(`Loading config file: ${file}`);
    const content = await readFile(file, "utf8");
    const ext = path.extname(file).toLowerCase();
    tree = deepMerge(tree, parseConfigContent(content, ext));
  }

  tree = deepMerge(tree, buildEnvOverlay(options.env ?? process.env));

  validateConfig(tree);
  const config = resolvePaths(tree, folder);

  if (!options.skipTargetCheck) {
    await checkTargetDir(config);
  }

  return config;
}
