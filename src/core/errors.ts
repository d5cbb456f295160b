/**
 * Errors raised while talking to storage or to the engine
 */

export class BackendIOError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "BackendIOError";
  }
}

/**
 * The engine rejected or failed a native BACKUP/RESTORE command.
 * The message carries the engine's own error text.
 */
export class NativeCommandError extends Error {
  constructor(
    message: string,
    readonly command: string,
  ) {
    super(message);
    this.name = "NativeCommandError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
