/**
 * CLI error handling and exit code mapping
 */

/**
 * Base CLI error class
 */
export class CliError extends Error {
  exitCode: number;

  constructor(message: string, options?: { exitCode?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "CliError";
    this.exitCode = options?.exitCode ?? 1;
  }
}

/**
 * Map SDK errors to CLI exit codes
 * - 0: success
 * - 1: usage/validation/unknown error
 * - 2: malformed manifest
 */
export function mapSdkErrorToExitCode(error: unknown): number {
  // Check for CliError first (has exitCode property)
  if (error instanceof CliError) {
    return error.exitCode;
  }

  if (error instanceof Error && error.name === "MalformedManifestError") {
    return 2;
  }

  return 1;
}

/**
 * Format an error for CLI output
 */
export function formatCliError(error: unknown, verbose = false): string {
  if (error instanceof Error) {
    let message = error.message;

    // Redact large payloads from error messages
    if (message.length > 2000) {
      message = message.substring(0, 2000) + "... (truncated)";
    }

    if (verbose && error.cause) {
      message += `\n  Cause: ${error.cause instanceof Error ? error.cause.message : String(error.cause)}`;
    }

    if (verbose && error.stack) {
      message += `\n${error.stack}`;
    }

    return message;
  }

  return String(error);
}
