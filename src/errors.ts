/**
 * Harness error types
 *
 * Recoverable failures (bad tool arguments, tool crashes, denied approvals) never
 * surface as exceptions: the executor folds them into a ToolResult. The classes
 * below are for the failures a caller must handle.
 */

/**
 * Persisted or wire content that cannot be decoded into a message part
 */
export class MessageFormatError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "MessageFormatError";
  }
}

/**
 * Invalid configuration value or permission rule
 */
export class ConfigError extends Error {
  readonly keys: string[];

  constructor(message: string, params?: { keys?: string[]; cause?: unknown }) {
    super(message, { cause: params?.cause });
    this.name = "ConfigError";
    this.keys = params?.keys ?? [];
  }
}

/**
 * A tool was called without one or more of its required parameters
 */
export class MissingArgumentError extends Error {
  readonly missing: string[];

  constructor(missing: string[]) {
    super(`missing required parameters: ${missing.join(", ")}`);
    this.name = "MissingArgumentError";
    this.missing = missing;
  }
}

/**
 * The run was interrupted by the user (AbortSignal fired)
 */
export class InterruptError extends Error {
  constructor(message = "Operation aborted") {
    super(message);
    this.name = "InterruptError";
  }
}

export function isInterruptError(err: unknown): err is InterruptError {
  return err instanceof InterruptError;
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
