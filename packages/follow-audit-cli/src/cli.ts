import { createProgram } from "./program.js";
import { initContext } from "./lib/cli-context.js";
import { normalizeArgv } from "./lib/argv.js";
import { renderUnknownError } from "./lib/errors/renderer.js";
import { getOutputMode } from "./lib/output/mode.js";
import type { DetectDeps } from "./modules/detect.js";

/**
 * Run the CLI once. Anything escaping a command is rendered on stderr and
 * turns into exit status 1.
 */
export async function main(argv: string[] = process.argv, deps: DetectDeps = {}): Promise<void> {
  initContext(argv);
  try {
    await createProgram(deps).parseAsync(normalizeArgv(argv));
  } catch (error) {
    renderUnknownError(error, getOutputMode(argv));
    process.exitCode = 1;
  }
}
