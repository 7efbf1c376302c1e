/**
 * Error utilities
 */

import { RegistryFormatError } from "@modgate/core";

/**
 * Safely extract an error message from any error type.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Extra lines worth showing under the message (e.g. the violations that
 * made a registry unreadable).
 */
export function getErrorDetails(error: unknown): string[] {
  if (error instanceof RegistryFormatError) {
    return error.details;
  }
  return [];
}
