import { CLIError, errorMessage } from "./types.js";

/**
 * Factory functions for the errors this CLI reports.
 */

// ============================================================================
// File Errors
// ============================================================================

export function fileNotFound(path: string): CLIError {
  return new CLIError("FILE_NOT_FOUND", `Can't find "${path}"`, {
    suggestion: "Check the path to the exported HTML file and try again",
  });
}

export function fileNotReadable(path: string, reason?: string): CLIError {
  return new CLIError("FILE_NOT_READABLE", `Can't read "${path}"`, {
    suggestion: "Check file permissions",
    details: reason,
  });
}

export function fileIsDirectory(path: string): CLIError {
  return new CLIError("FILE_IS_DIRECTORY", `"${path}" is a directory, not a file`, {
    suggestion: "Point to the followers or followings HTML file inside the export",
  });
}

// ============================================================================
// Validation Errors
// ============================================================================

export function missingInputFiles(): CLIError {
  return new CLIError(
    "VALIDATION_MISSING_ARG",
    "Please provide both followers and followings HTML files.",
    { example: "follow-audit --followers followers.html --followings following.html" }
  );
}

export function invalidOption(optionName: string, reason: string, validValues?: string[]): CLIError {
  return new CLIError("VALIDATION_INVALID_OPTION", `Invalid --${optionName}: ${reason}`, {
    suggestion: validValues?.length
      ? `Choose from: ${validValues.join(", ")}`
      : undefined,
  });
}

export function invalidConfig(path: string, issues: string[]): CLIError {
  const details = issues.length > 1
    ? issues.map((i) => `• ${i}`).join("\n")
    : issues[0];
  return new CLIError("VALIDATION_CONFIG_INVALID", `Config file ${path} has errors`, {
    suggestion: "Fix the issues below and try again",
    example: `follow-audit config validate -c ${path}`,
    details,
  });
}

// ============================================================================
// Browser Errors
// ============================================================================

export function browserOpenFailed(url: string, error: unknown): CLIError {
  return new CLIError("BROWSER_OPEN_FAILED", `Couldn't open ${url} in the browser`, {
    suggestion: "Make sure a default browser is configured, or use --dry-run to only list links",
    details: errorMessage(error),
    cause: error instanceof Error ? error : undefined,
  });
}

// ============================================================================
// Generic Error
// ============================================================================

export function unknownError(error: unknown): CLIError {
  const cause = error instanceof Error ? error : undefined;
  return new CLIError("UNKNOWN_ERROR", errorMessage(error), { cause });
}
