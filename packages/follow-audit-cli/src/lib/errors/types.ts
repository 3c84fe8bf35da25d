/**
 * Error codes for all CLI error types.
 * Each code maps to a specific failure with predefined messaging.
 */
export type ErrorCode =
  // File errors
  | "FILE_NOT_FOUND"
  | "FILE_NOT_READABLE"
  | "FILE_IS_DIRECTORY"
  // Validation errors
  | "VALIDATION_MISSING_ARG"
  | "VALIDATION_INVALID_OPTION"
  | "VALIDATION_CONFIG_INVALID"
  // Browser errors
  | "BROWSER_OPEN_FAILED"
  // Generic
  | "UNKNOWN_ERROR";

/**
 * Error carrying a code plus optional hints for the user.
 */
export class CLIError extends Error {
  readonly code: ErrorCode;
  readonly suggestion?: string;
  readonly example?: string;
  readonly details?: string;

  constructor(
    code: ErrorCode,
    message: string,
    options?: {
      suggestion?: string;
      example?: string;
      details?: string;
      cause?: Error;
    }
  ) {
    super(message, { cause: options?.cause });
    this.name = "CLIError";
    this.code = code;
    this.suggestion = options?.suggestion;
    this.example = options?.example;
    this.details = options?.details;
  }
}

export function isCLIError(error: unknown): error is CLIError {
  return error instanceof CLIError;
}

/**
 * Message of an Error, or the value itself as text.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
