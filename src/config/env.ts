/**
 * Environment overlay: CHBACKUP_<SECTION>__<SETTING>[__<SUB>]=value
 */

import { isPlainObject, type PlainObject } from "./defaults";

export const ENV_PREFIX = "CHBACKUP_";

// Settings that stay strings even when they look like numbers
const STRING_SETTINGS = new Set([
  "host",
  "user",
  "password",
  "target",
  "dir",
  "disk",
  "endpoint",
  "bucket",
  "prefix",
  "region",
  "access_key_id",
  "secret_access_key",
  "archive_owner",
  "archive_mode",
]);

/**
 * Parse an environment value into a config value
 */
export function parseEnvValue(setting: string, raw: string): unknown {
  if (STRING_SETTINGS.has(setting)) return raw;

  const trimmed = raw.trim();
  if (trimmed === "true") return true;
  if (trimmed === "false") return false;
  if (/^(0|-?[1-9]\d*)$/.test(trimmed)) return Number(trimmed);
  if (trimmed.startsWith("[") && trimmed.endsWith("]")) {
    const inner = trimmed.slice(1, -1).trim();
    if (inner === "") return [];
    return inner
      .split(",")
      .map((item) => item.trim().replace(/^(["'])(.*)\1$/, "$2"));
  }
  return raw;
}

/**
 * Build a partial config tree from the environment
 */
export function buildEnvOverlay(
  env: NodeJS.ProcessEnv = process.env,
): PlainObject {
  const overlay: PlainObject = {};

  for (const [name, value] of Object.entries(env)) {
    if (!name.startsWith(ENV_PREFIX) || value === undefined) continue;

    const segments = name
      .slice(ENV_PREFIX.length)
      .split("__")
      .map((segment) => segment.toLowerCase());
    if (segments.length < 2 || segments.includes("")) continue;

    const setting = segments[segments.length - 1] ?? "";
    let node = overlay;
    for (const segment of segments.slice(0, -1)) {
      const child = node[segment];
      if (isPlainObject(child)) {
        node = child;
      } else {
        const created: PlainObject = {};
        node[segment] = created;
        node = created;
      }
    }
    node[setting] = parseEnvValue(setting, value);
  }

  return overlay;
}
