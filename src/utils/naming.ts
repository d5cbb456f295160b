/**
 * Backup unit naming utilities
 *
 * Full:        ch-backup-20240501_020000-full
 * Incremental: ch-backup-20240502_020000-inc-20240501_020000
 *
 * The trailing timestamp of an incremental is the key of its base unit, which
 * may itself be an incremental.
 */

import type { BackupKind, BackupUnit } from "../types";

export const UNIT_PREFIX = "ch-backup-";

/** Suffix of archives written by the archiver */
export const ARCHIVE_SUFFIX = ".tar.gz";

const KEY = String.raw`\d{8}_\d{4}(?:\d{2})?`;

// The base of an incremental is captured loosely so that a unit with a
// mangled base still parses and can be reported
export const UNIT_NAME_PATTERN = new RegExp(
  `^ch-backup-(${KEY})-(full|inc)(?:-([^.]+))?$`,
);

// Archives the engine can read natively
const ARCHIVE_SUFFIX_PATTERN = /(\.zip|\.tar(?:\.[a-z0-9]+)?)$/;

export interface ParsedUnitName {
  id: string;
  key: string;
  createdAt: Date;
  kind: BackupKind;
  baseKey: string | null;
  /** False for an incremental whose base is not a valid key */
  baseKeyValid: boolean;
  /** Archive suffix of the entry, null for a bare directory or key prefix */
  archiveSuffix: string | null;
}

function pad(value: number, length = 2): string {
  return String(value).padStart(length, "0");
}

/**
 * Format a date as a unit key (UTC, second resolution)
 */
export function formatKey(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}` +
    `${pad(date.getUTCDate())}_${pad(date.getUTCHours())}` +
    `${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

/**
 * Parse a unit key. Keys without seconds are accepted.
 */
export function parseKey(key: string): Date | null {
  const match = key.match(/^(\d{4})(\d{2})(\d{2})_(\d{2})(\d{2})(\d{2})?$/);
  if (!match) return null;

  const [, year, month, day, hours, minutes, seconds] = match;
  const date = new Date(
    Date.UTC(
      Number(year),
      Number(month) - 1,
      Number(day),
      Number(hours),
      Number(minutes),
      Number(seconds ?? "0"),
    ),
  );

  // Reject rollovers such as month 13 or 25:00
  if (
    Number.isNaN(date.getTime()) ||
    formatKey(date).slice(0, key.length) !== key
  ) {
    return null;
  }
  return date;
}

export function buildUnitId(
  kind: BackupKind,
  key: string,
  baseKey: string | null,
): string {
  if (kind === "full") {
    return `${UNIT_PREFIX}${key}-full`;
  }
  if (!baseKey) {
    throw new Error("An incremental backup needs a base");
  }
  return `${UNIT_PREFIX}${key}-inc-${baseKey}`;
}

/**
 * Create the unit record for a backup about to be written
 */
export function createUnit(
  createdAt: Date,
  base: BackupUnit | null,
  archived: boolean,
): BackupUnit {
  const key = formatKey(createdAt);
  const kind: BackupKind = base ? "incremental" : "full";
  const baseKey = base ? base.key : null;
  const id = buildUnitId(kind, key, baseKey);

  return {
    id,
    key,
    createdAt: parseKey(key) ?? createdAt,
    kind,
    baseKey,
    baseId: base ? base.id : null,
    location: archived ? `${id}${ARCHIVE_SUFFIX}` : id,
    archived,
  };
}

/**
 * Strip a native archive suffix from an entry name
 */
export function splitArchiveSuffix(name: string): {
  stem: string;
  suffix: string | null;
} {
  const match = name.match(ARCHIVE_SUFFIX_PATTERN);
  if (!match || match.index === undefined) {
    return { stem: name, suffix: null };
  }
  return { stem: name.slice(0, match.index), suffix: match[1] ?? null };
}

/**
 * Parse an entry name. An incremental whose base is not a valid key is
 * returned with `baseKeyValid` false; callers treat it as unresolved.
 */
export function parseUnitName(name: string): ParsedUnitName | null {
  const { stem, suffix } = splitArchiveSuffix(name);
  const match = stem.match(UNIT_NAME_PATTERN);
  if (!match) return null;

  const [, key, type, baseKey] = match;
  if (!key) return null;

  const createdAt = parseKey(key);
  if (!createdAt) return null;

  if (type === "full") {
    if (baseKey) return null;
    return {
      id: stem,
      key,
      createdAt,
      kind: "full",
      baseKey: null,
      baseKeyValid: true,
      archiveSuffix: suffix,
    };
  }

  if (!baseKey) return null;
  return {
    id: stem,
    key,
    createdAt,
    kind: "incremental",
    baseKey,
    baseKeyValid: parseKey(baseKey) !== null,
    archiveSuffix: suffix,
  };
}

export function isValidUnitName(name: string): boolean {
  return parseUnitName(name)?.baseKeyValid === true;
}
