/**
 * Output mode detection for deciding how results and errors are printed.
 */

export type OutputMode = "text" | "json";

/**
 * - `text`: human-readable lines, coloured where the terminal allows
 * - `json`: a single JSON document for scripting
 */
export function getOutputMode(
  argv: string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env
): OutputMode {
  if (argv.includes("--json")) {
    return "json";
  }

  if (env.FOLLOW_AUDIT_JSON === "1" || env.FOLLOW_AUDIT_JSON === "true") {
    return "json";
  }

  return "text";
}
