import { Command } from "commander";
import { existsSync, mkdirSync, writeFileSync } from "fs";
import { dirname } from "path";
import chalk from "chalk";
import {
  loadConfig,
  loadConfigFile,
  USER_CONFIG_PATH,
  SYSTEM_CONFIG_PATH,
} from "../lib/config.js";
import { errorMessage, isCLIError } from "../lib/errors/types.js";

// ---------------------------------------------------------------------------
// Example Configuration Content
// ---------------------------------------------------------------------------

export const EXAMPLE_CONFIG = `# follow-audit configuration
# Place at ~/.config/follow-audit/config.yaml (user) or
# /etc/follow-audit/config.yaml (system)
#
# Precedence (highest to lowest):
# 1. CLI flags
# 2. User config, or the file given with --config
# 3. System config
# 4. Built-in defaults

batch:
  # Tabs opened per batch (1 or more)
  numTabs: 5

  # Seconds to wait after each batch (0 or more)
  durationSeconds: 30

  # Also wait after the final batch
  trailingPause: true

links:
  # Only links containing this prefix are reported
  domain: "https://www.instagram.com/"

  # diff: unified diff of the two pages, then extract links
  # set:  links of followers minus links of followings
  strategy: diff

logging:
  # debug, info, warn, error
  level: warn

  # One JSON object per log line
  json: false
`;

function describeError(error: unknown): string {
  if (isCLIError(error) && error.details) {
    return `${error.message}\n${error.details}`;
  }
  return errorMessage(error);
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerConfigCommands(program: Command): void {
  const config = program
    .command("config")
    .description("Manage follow-audit configuration");

  config
    .command("init")
    .description("Create an example configuration file")
    .option("-g, --global", "Create system-wide config at /etc/follow-audit/config.yaml")
    .action((options: { global?: boolean }) => {
      const targetPath = options.global ? SYSTEM_CONFIG_PATH : USER_CONFIG_PATH;

      if (existsSync(targetPath)) {
        console.error(chalk.yellow(`Config file already exists: ${targetPath}`));
        console.error(chalk.gray("Use a text editor to modify it, or delete it first."));
        process.exitCode = 1;
        return;
      }

      try {
        mkdirSync(dirname(targetPath), { recursive: true });
        writeFileSync(targetPath, EXAMPLE_CONFIG, "utf-8");
        console.log(chalk.green(`Created config file: ${targetPath}`));
      } catch (error) {
        console.error(chalk.red(`Failed to create config: ${describeError(error)}`));
        if (options.global) {
          console.error(chalk.gray("System config may require sudo."));
        }
        process.exitCode = 1;
      }
    });

  config
    .command("validate")
    .description("Validate configuration file(s)")
    .option("-c, --config <path>", "Specific config file to validate")
    .action((options: { config?: string }) => {
      const pathsToCheck = options.config
        ? [options.config]
        : [SYSTEM_CONFIG_PATH, USER_CONFIG_PATH];

      let hasErrors = false;
      let foundAny = false;

      for (const path of pathsToCheck) {
        if (!existsSync(path)) {
          if (options.config) {
            console.error(chalk.red(`File not found: ${path}`));
            hasErrors = true;
          }
          continue;
        }

        foundAny = true;
        console.log(chalk.cyan(`Checking ${path}...`));

        try {
          loadConfigFile(path);
          console.log(chalk.green("  ✓ Valid"));
        } catch (error) {
          console.error(chalk.red(`  ✗ Invalid: ${describeError(error)}`));
          hasErrors = true;
        }
      }

      if (hasErrors) {
        process.exitCode = 1;
      } else if (!foundAny) {
        console.log(chalk.yellow("No configuration files found."));
        console.log(chalk.gray("Run 'follow-audit config init' to create one."));
      } else {
        console.log(chalk.green("\nAll configuration files are valid."));
      }
    });

  config
    .command("show")
    .description("Display the effective configuration")
    .option("-c, --config <path>", "Specific config file to use")
    .action((options: { config?: string }) => {
      try {
        const { config: resolved, sources } = loadConfig(options.config);

        console.log(chalk.cyan("Effective Configuration:"));
        console.log(chalk.gray("─".repeat(40)));
        console.log(
          chalk.gray(`Sources: ${sources.length > 0 ? sources.join(", ") : "(defaults only)"}`)
        );

        console.log();
        console.log(chalk.bold("Batch:"));
        console.log(`  numTabs:          ${resolved.numTabs}`);
        console.log(`  durationSeconds:  ${resolved.durationSeconds}`);
        console.log(`  trailingPause:    ${resolved.trailingPause}`);

        console.log();
        console.log(chalk.bold("Links:"));
        console.log(`  domain:           ${resolved.domain}`);
        console.log(`  strategy:         ${resolved.strategy}`);

        console.log();
        console.log(chalk.bold("Logging:"));
        console.log(`  level:            ${resolved.logLevel}`);
        console.log(`  json:             ${resolved.logJson}`);
      } catch (error) {
        console.error(chalk.red(`Failed to load config: ${describeError(error)}`));
        process.exitCode = 1;
      }
    });

  config
    .command("path")
    .description("Show configuration file paths")
    .action(() => {
      for (const [label, path] of [
        ["User config:", USER_CONFIG_PATH],
        ["System config:", SYSTEM_CONFIG_PATH],
      ] as const) {
        console.log(chalk.bold(label));
        console.log(`  ${path}`);
        console.log(`  ${existsSync(path) ? chalk.green("(exists)") : chalk.gray("(not found)")}`);
      }
    });
}
