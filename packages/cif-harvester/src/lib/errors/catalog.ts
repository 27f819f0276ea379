import { CLIError, errorMessage } from "./types.js";

/**
 * Error catalog - factory functions for creating CLIErrors with helpful context.
 * Each function produces a consistent, user-friendly error message.
 */

// ============================================================================
// Input Errors
// ============================================================================

export function inputNotFound(path: string): CLIError {
  return new CLIError("INPUT_NOT_FOUND", `Can't find "${path}"`, {
    suggestion: "Point --ids at an identifier list, or create one with reconcile",
    examples: [
      "cif-harvester fetch --ids missing_ids.txt",
      "cif-harvester reconcile --ids material_ids.txt --out cif_downloads",
    ],
  });
}

export function inputNotReadable(path: string, reason?: string): CLIError {
  return new CLIError("INPUT_NOT_READABLE", `Can't read "${path}"`, {
    suggestion: "Check file permissions and that the path is a regular file",
    details: reason,
  });
}

export function outputDirUncreatable(path: string, reason?: string): CLIError {
  return new CLIError("OUTPUT_DIR_UNCREATABLE", `Can't create output directory "${path}"`, {
    suggestion: "Choose a writable location with --out",
    details: reason,
  });
}

// ============================================================================
// Validation Errors
// ============================================================================

export function invalidOption(optionName: string, reason: string, validValues?: string[]): CLIError {
  return new CLIError("VALIDATION_INVALID_OPTION", `Invalid --${optionName}: ${reason}`, {
    suggestion: validValues?.length
      ? `Choose from: ${validValues.join(", ")}`
      : undefined,
  });
}

export function invalidEnvironment(variable: string, reason: string): CLIError {
  return new CLIError("VALIDATION_INVALID_OPTION", `Invalid ${variable}: ${reason}`, {
    suggestion: `Fix or unset ${variable}`,
  });
}

export function invalidConfig(path: string, issues: string[]): CLIError {
  const details = issues.length > 1
    ? issues.map((i) => `• ${i}`).join("\n")
    : issues[0];
  return new CLIError("VALIDATION_CONFIG_INVALID", `Config file ${path} has errors`, {
    suggestion: "Fix the issues below and try again",
    details,
  });
}

// ============================================================================
// Request Errors
// ============================================================================

export function requestTimeout(url: string, timeoutMs: number): CLIError {
  return new CLIError("NETWORK_TIMEOUT", "Request timed out", {
    suggestion: "The server might be busy. Raise --timeout or re-run later",
    details: `${url} (after ${timeoutMs}ms)`,
  });
}

export function networkError(url: string, cause: unknown): CLIError {
  return new CLIError("NETWORK_ERROR", `Can't reach ${new URL(url).host}`, {
    suggestion: "Check your internet connection and try again",
    details: errorMessage(cause),
    cause: cause instanceof Error ? cause : undefined,
  });
}

export function unexpectedStatus(url: string, status: number, statusText: string): CLIError {
  const label = statusText ? `${status} ${statusText}` : String(status);
  return new CLIError("HTTP_STATUS", `Request failed (HTTP ${label})`, {
    details: url,
  });
}

export function emptyBody(url: string): CLIError {
  return new CLIError("EMPTY_BODY", "Server returned an empty body", {
    details: url,
  });
}

export function listingUnexpected(pageUrl: string, reason: string, snippet?: string): CLIError {
  return new CLIError("LISTING_UNEXPECTED", `Listing page ${pageUrl}: ${reason}`, {
    suggestion: "The page layout may have changed; inspect the page in a browser",
    details: snippet,
  });
}

// ============================================================================
// Generic Error
// ============================================================================

export function unknownError(error: unknown): CLIError {
  const cause = error instanceof Error ? error : undefined;
  return new CLIError("UNKNOWN_ERROR", errorMessage(error), { cause });
}

// ============================================================================
// Failure Reasons
// ============================================================================

/**
 * Short reason string recorded in the ledger for a failed fetch.
 */
export function failureReason(error: unknown): string {
  if (error instanceof CLIError) {
    switch (error.code) {
      case "NETWORK_TIMEOUT":
        return "timeout";
      case "NETWORK_ERROR":
        return `network error: ${error.details ?? error.message}`;
      case "EMPTY_BODY":
        return "empty body";
      case "HTTP_STATUS":
        return error.message.replace(/^Request failed \((.*)\)$/, "$1");
      default:
        return error.message;
    }
  }
  return errorMessage(error);
}
