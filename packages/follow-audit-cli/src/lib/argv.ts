/**
 * Two-letter short flags accepted for compatibility with older invocations.
 * Commander only understands single-letter short flags, so these are
 * rewritten to their long forms before parsing.
 */
export const LEGACY_FLAG_ALIASES: Readonly<Record<string, string>> = {
  "-fw": "--followers",
  "-fg": "--followings",
};

/**
 * Rewrite `-fw <path>` and `-fw=<path>` style arguments. Everything after a
 * bare `--` is left untouched.
 */
export function normalizeArgv(argv: readonly string[]): string[] {
  const result: string[] = [];
  let passthrough = false;

  for (const arg of argv) {
    if (passthrough || arg === "--") {
      passthrough = true;
      result.push(arg);
      continue;
    }

    const eq = arg.indexOf("=");
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    const replacement = LEGACY_FLAG_ALIASES[flag];

    if (replacement === undefined) {
      result.push(arg);
    } else {
      result.push(eq === -1 ? replacement : `${replacement}${arg.slice(eq)}`);
    }
  }

  return result;
}
