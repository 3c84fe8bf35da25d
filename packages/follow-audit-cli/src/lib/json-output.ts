/**
 * JSON output for machine-readable CLI results.
 */

import type { Link } from "./links.js";
import type { DiffStrategy } from "./differ.js";
import type { CLIError, ErrorCode } from "./errors/types.js";

export interface JsonSuccess<T> {
  success: true;
  data: T;
  meta?: {
    version?: string;
  };
}

export interface JsonFailure {
  success: false;
  error: {
    code: ErrorCode;
    message: string;
    example?: string;
  };
}

export interface DetectResultJson {
  count: number;
  links: Link[];
  strategy: DiffStrategy;
  domain: string;
  batches: number;
  opened: number;
  dryRun: boolean;
}

/**
 * Print a successful JSON result to stdout.
 */
export function outputSuccess<T>(data: T, meta?: JsonSuccess<T>["meta"]): void {
  const result: JsonSuccess<T> = {
    success: true,
    data,
    ...(meta && { meta }),
  };
  console.log(JSON.stringify(result, null, 2));
}

/**
 * Print a failed result to stdout, for outcomes that are not errors of the
 * process itself (the exit status stays 0).
 */
export function outputFailure(error: CLIError): void {
  const result: JsonFailure = {
    success: false,
    error: {
      code: error.code,
      message: error.message,
      example: error.example,
    },
  };
  console.log(JSON.stringify(result, null, 2));
}
