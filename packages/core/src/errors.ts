/**
 * Error types for operational failures.
 *
 * Registry violations are reported as data (see `ValidationReport`), never thrown.
 * These classes cover the cases where an operation itself cannot proceed.
 */

export type ModgateErrorCode =
  | "REGISTRY_FORMAT_ERROR"
  | "NETWORK_ERROR"
  | "CANCELLED";

export class ModgateError extends Error {
  /** Error code for programmatic handling */
  readonly code: ModgateErrorCode;

  constructor(
    message: string,
    code: ModgateErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, { cause: options?.cause });
    this.name = "ModgateError";
    this.code = code;
  }
}

/**
 * A registry that has to be valid (e.g. the accepted base of a gate run) is not.
 */
export class RegistryFormatError extends ModgateError {
  /** Formatted violation lines that made the registry unusable */
  readonly details: string[];

  constructor(message: string, details: string[] = []) {
    super(message, "REGISTRY_FORMAT_ERROR");
    this.name = "RegistryFormatError";
    this.details = details;
  }
}

export class NetworkError extends ModgateError {
  /** HTTP status, when the server answered */
  readonly statusCode?: number;

  constructor(
    message: string,
    options?: { statusCode?: number; cause?: unknown }
  ) {
    super(message, "NETWORK_ERROR", { cause: options?.cause });
    this.name = "NetworkError";
    this.statusCode = options?.statusCode;
  }
}

export class CancellationError extends ModgateError {
  constructor(message = "Operation cancelled") {
    super(message, "CANCELLED");
    this.name = "CancellationError";
  }
}

/**
 * Safely extract an error message from any error type.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
