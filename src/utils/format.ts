/**
 * Formatting helpers for CLI output
 */

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;

  const seconds = Math.floor(ms / 1000);
  if (seconds < 60) return `${(ms / 1000).toFixed(1)}s`;

  const minutes = Math.floor(seconds / 60);
  const remainder = seconds % 60;
  if (minutes < 60) return `${minutes}m ${remainder}s`;

  const hours = Math.floor(minutes / 60);
  return `${hours}h ${minutes % 60}m`;
}

/**
 * Human-readable creation time of a unit, UTC without seconds
 */
export function formatTimestamp(date: Date): string {
  return `${date.toISOString().slice(0, 16).replace("T", " ")} UTC`;
}

/**
 * Hide S3 credentials embedded in a native command
 */
export function maskSecrets(command: string): string {
  return command.replace(
    /S3\('([^']*)', '[^']*', '[^']*'\)/g,
    "S3('$1', '***', '***')",
  );
}
