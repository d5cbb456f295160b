/**
 * Utility exports
 */

// Formatting utilities
export { formatDuration, formatTimestamp, maskSecrets } from "./format";
export type { LogLevel } from "./logger";
// Logger
export {
  debug,
  error,
  getLogDir,
  getLogLevel,
  info,
  logger,
  setLogDir,
  setLogLevel,
  warn,
} from "./logger";
export type { ParsedUnitName } from "./naming";
// Naming utilities
export {
  ARCHIVE_SUFFIX,
  buildUnitId,
  createUnit,
  formatKey,
  isValidUnitName,
  parseKey,
  parseUnitName,
  UNIT_NAME_PATTERN,
} from "./naming";
// Path utilities
export { isPathWithinDir } from "./path";
