import { appendFileSync, mkdirSync, readdirSync, rmSync } from "node:fs";
import * as path from "node:path";

export type LogLevel = "debug" | "info" | "warn" | "error";

let currentLevel: LogLevel = "info";
let logDir: string | null = null;

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: "\x1b[90m", // gray
  info: "\x1b[36m", // cyan
  warn: "\x1b[33m", // yellow
  error: "\x1b[31m", // red
};

const RESET = "\x1b[0m";

export const LOG_FILE_PREFIX = "chbackup-";
export const LOG_RETENTION_DAYS = 14;

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

/**
 * Mirror log lines into a day file under `dir`. Pass null to stop.
 */
export function setLogDir(dir: string | null, now: Date = new Date()): void {
  logDir = dir;
  if (!dir) return;

  mkdirSync(dir, { recursive: true });
  pruneLogFiles(dir, now);
}

export function getLogDir(): string | null {
  return logDir;
}

export function logFileName(date: Date): string {
  return `${LOG_FILE_PREFIX}${date.toISOString().slice(0, 10)}.log`;
}

function pruneLogFiles(dir: string, now: Date): void {
  const retentionMs = LOG_RETENTION_DAYS * 24 * 60 * 60 * 1000;
  const cutoff = new Date(now.getTime() - retentionMs);
  const oldest = logFileName(cutoff);

  for (const name of readdirSync(dir)) {
    if (!/^chbackup-\d{4}-\d{2}-\d{2}\.log$/.test(name)) continue;
    // Day files sort lexicographically by date
    if (name < oldest) {
      rmSync(path.join(dir, name), { force: true });
    }
  }
}

function formatTimestamp(): string {
  return new Date().toISOString();
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[currentLevel];
}

function formatBody(message: string, data?: unknown): string {
  if (data === undefined) return message;
  if (typeof data === "object") {
    return `${message} ${JSON.stringify(data, null, 2)}`;
  }
  return `${message} ${String(data)}`;
}

function formatMessage(
  level: LogLevel,
  timestamp: string,
  body: string,
): string {
  const color = LEVEL_COLORS[level];
  const levelStr = level.toUpperCase().padEnd(5);
  return `${color}[${timestamp}] ${levelStr}${RESET} ${body}`;
}

function writeToFile(level: LogLevel, timestamp: string, body: string): void {
  if (!logDir) return;
  const line = `[${timestamp}] ${level.toUpperCase().padEnd(5)} ${body}\n`;
  appendFileSync(path.join(logDir, logFileName(new Date(timestamp))), line);
}

function emit(level: LogLevel, message: string, data?: unknown): void {
  if (!shouldLog(level)) return;

  const timestamp = formatTimestamp();
  const body = formatBody(message, data);
  const formatted = formatMessage(level, timestamp, body);

  if (level === "warn") {
    console.warn(formatted);
  } else if (level === "error") {
    console.error(formatted);
  } else {
    console.log(formatted);
  }
  writeToFile(level, timestamp, body);
}

export function debug(message: string, data?: unknown): void {
  emit("debug", message, data);
}

export function info(message: string, data?: unknown): void {
  emit("info", message, data);
}

export function warn(message: string, data?: unknown): void {
  emit("warn", message, data);
}

export function error(message: string, data?: unknown): void {
  emit("error", message, data);
}

export const logger = {
  debug,
  info,
  warn,
  error,
  setLevel: setLogLevel,
  getLevel: getLogLevel,
  setDir: setLogDir,
};
