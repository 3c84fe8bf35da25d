import { Command } from "commander";
import { registerDetectCommand, type DetectDeps } from "./modules/detect.js";
import { registerConfigCommands } from "./modules/config-cmd.js";
import { getVersion } from "./lib/version.js";

/**
 * Build the command tree. The root command runs the follower comparison;
 * `config` manages the configuration file.
 */
export function createProgram(deps: DetectDeps = {}): Command {
  const program = new Command()
    .name("follow-audit")
    .description("Open the profiles of accounts that do not follow you back")
    .version(getVersion())
    .enablePositionalOptions()
    .option("--json", "Print the result as JSON")
    .option("-q, --quiet", "Hide the progress spinner");

  registerDetectCommand(program, deps);
  registerConfigCommands(program);

  return program;
}
