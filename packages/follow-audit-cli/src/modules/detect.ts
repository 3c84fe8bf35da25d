import { Command } from "commander";
import chalk from "chalk";
import {
  loadConfig,
  MIN_NUM_TABS,
  MIN_DURATION_SECONDS,
  type ResolvedConfig,
} from "../lib/config.js";
import { createLogger, type Logger } from "../lib/logger.js";
import { readDocuments, type DocumentPair } from "../lib/loader.js";
import {
  DIFF_STRATEGIES,
  findNonFollowers,
  isDiffStrategy,
  type DiffStrategy,
} from "../lib/differ.js";
import { openInBatches, type BatchReporter } from "../lib/batches.js";
import type { Link } from "../lib/links.js";
import type { BrowserService } from "../lib/ports/browser.js";
import type { DelayFn } from "../lib/ports/timer.js";
import { systemBrowser } from "../lib/adapters/system-browser.js";
import { realDelay } from "../lib/adapters/real-timers.js";
import { createSpinner, type Spinner } from "../lib/spinner.js";
import { isJsonMode } from "../lib/cli-context.js";
import { outputFailure, outputSuccess, type DetectResultJson } from "../lib/json-output.js";
import { invalidOption, missingInputFiles } from "../lib/errors/catalog.js";
import { getVersion } from "../lib/version.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface DetectOptions {
  followers?: string;
  followings?: string;
  numTabs?: number;
  duration?: number;
  domain?: string;
  strategy?: DiffStrategy;
  /** Commander sets this to false for --no-trailing-pause */
  trailingPause?: boolean;
  dryRun?: boolean;
  config?: string;
  verbose?: boolean;
}

/**
 * Dependencies for the detect command.
 * All have defaults for production use.
 */
export interface DetectDeps {
  browser?: BrowserService;
  delay?: DelayFn;
  spinner?: () => Spinner;
  logger?: Logger;
  readDocuments?: (followersPath: string, followingsPath: string) => Promise<DocumentPair>;
  loadConfig?: (
    explicitPath: string | undefined,
    cliOptions: Partial<ResolvedConfig>
  ) => { config: ResolvedConfig; sources: string[] };
}

// ---------------------------------------------------------------------------
// Messages
// ---------------------------------------------------------------------------

export const MISSING_FILES_MESSAGE = missingInputFiles().message;

export const NO_RESULTS_MESSAGE =
  "No new profile links were found in followers compared to followings.";

export function formatCount(count: number): string {
  return `Number of non-followers found: ${count}`;
}

// ---------------------------------------------------------------------------
// Option Parsing (Pure Functions)
// ---------------------------------------------------------------------------

/**
 * Build a commander parser for an integer flag with a lower bound.
 */
export function integerOption(name: string, min: number): (value: string) => number {
  return (value: string) => {
    const n = /^-?\d+$/.test(value.trim()) ? parseInt(value, 10) : NaN;
    if (isNaN(n) || n < min) {
      throw invalidOption(name, `expected a whole number of ${min} or more, got "${value}"`);
    }
    return n;
  };
}

export const parseNumTabs = integerOption("num-tabs", MIN_NUM_TABS);
export const parseDuration = integerOption("duration", MIN_DURATION_SECONDS);

export function parseStrategy(value: string): DiffStrategy {
  if (!isDiffStrategy(value)) {
    throw invalidOption("strategy", `unknown strategy "${value}"`, [...DIFF_STRATEGIES]);
  }
  return value;
}

/**
 * Map command options onto config keys. Unset values stay undefined so
 * config files and defaults fill them in.
 */
export function toConfigOverrides(options: DetectOptions): Partial<ResolvedConfig> {
  return {
    numTabs: options.numTabs,
    durationSeconds: options.duration,
    domain: options.domain,
    strategy: options.strategy,
    trailingPause: options.trailingPause === false ? false : undefined,
    logLevel: options.verbose ? "debug" : undefined,
  };
}

// ---------------------------------------------------------------------------
// Console Reporting
// ---------------------------------------------------------------------------

/**
 * Reporter that prints each batch and link, with a spinner during pauses.
 */
export function createConsoleReporter(spinner: Spinner): BatchReporter {
  return {
    onBatchStart(batch, totalBatches) {
      console.log(chalk.cyan(`\nOpening batch ${batch.index} of ${totalBatches}`));
    },
    onLink(link, batch) {
      console.log(`  [${batch.index}] ${link}`);
    },
    onPauseStart(ms) {
      spinner.start(`Waiting ${ms / 1000}s`);
    },
    onPauseEnd() {
      spinner.stop();
    },
  };
}

// ---------------------------------------------------------------------------
// Core Logic
// ---------------------------------------------------------------------------

/**
 * Read both exports, find profiles in followers that followings lacks and
 * open them in batches.
 *
 * @returns The result, or undefined when a path is missing
 */
export async function detectNonFollowers(
  options: DetectOptions,
  deps: DetectDeps = {}
): Promise<DetectResultJson | undefined> {
  const jsonMode = isJsonMode();

  if (!options.followers || !options.followings) {
    if (jsonMode) {
      outputFailure(missingInputFiles());
    } else {
      console.log(MISSING_FILES_MESSAGE);
    }
    return undefined;
  }

  const { config, sources } = (deps.loadConfig ?? loadConfig)(
    options.config,
    toConfigOverrides(options)
  );
  const logger =
    deps.logger ??
    createLogger({
      level: config.logLevel,
      json: config.logJson,
      // keep stdout clean for the JSON result
      sink: jsonMode
        ? { out: (line) => console.error(line), err: (line) => console.error(line) }
        : undefined,
    });

  logger.debug("Configuration resolved", {
    sources,
    numTabs: config.numTabs,
    durationSeconds: config.durationSeconds,
    strategy: config.strategy,
  });

  const { followers, followings } = await (deps.readDocuments ?? readDocuments)(
    options.followers,
    options.followings
  );
  logger.debug("Documents loaded", {
    followersChars: followers.length,
    followingsChars: followings.length,
  });

  const links: Link[] = findNonFollowers(followings, followers, {
    strategy: config.strategy,
    domain: config.domain,
  });

  if (!jsonMode) {
    console.log(formatCount(links.length));
    if (links.length === 0) {
      console.log(chalk.yellow(NO_RESULTS_MESSAGE));
    }
  }

  const spinner = (deps.spinner ?? (() => createSpinner()))();
  const dryRun = options.dryRun ?? false;

  const summary = await openInBatches(
    links,
    {
      batchSize: config.numTabs,
      pauseMs: config.durationSeconds * 1000,
      trailingPause: config.trailingPause,
      dryRun,
    },
    {
      browser: deps.browser ?? systemBrowser,
      delay: deps.delay ?? realDelay,
      logger: logger.child({ component: "batches" }),
      reporter: jsonMode ? {} : createConsoleReporter(spinner),
    }
  );

  const result: DetectResultJson = {
    count: links.length,
    links,
    strategy: config.strategy,
    domain: config.domain,
    batches: summary.batches,
    opened: summary.opened,
    dryRun,
  };

  if (jsonMode) {
    outputSuccess(result, { version: getVersion() });
  } else if (links.length > 0) {
    console.log(
      dryRun
        ? chalk.gray(`\nDry run: ${links.length} links listed, none opened`)
        : chalk.green(`\n✓ Opened ${summary.opened} of ${links.length} links`)
    );
  }

  return result;
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerDetectCommand(program: Command, deps: DetectDeps = {}): void {
  program
    .option("--followers <path>", "Path to the followers HTML document (alias -fw)")
    .option("--followings <path>", "Path to the followings HTML document (alias -fg)")
    .option("-t, --num-tabs <count>", "Number of tabs to open at once (default: 5)", parseNumTabs)
    .option(
      "-d, --duration <seconds>",
      "Seconds to wait between batches of tabs (default: 30)",
      parseDuration
    )
    .option("--domain <prefix>", "Only report links containing this prefix")
    .option("--strategy <name>", "How links are compared: diff or set (default: diff)", parseStrategy)
    .option("--no-trailing-pause", "Do not wait after the final batch")
    .option("-n, --dry-run", "List links without opening them")
    .option("-c, --config <path>", "Path to configuration file")
    .option("--verbose", "Print debug logs")
    .addHelpText(
      "after",
      `
${chalk.bold.cyan("How It Works:")}
  1. Reads the followers and followings pages from your data export
  2. Diffs the two pages and collects profile links only followers has
  3. Opens those profiles in your browser, a batch at a time

${chalk.bold.cyan("Examples:")}
  follow-audit -fw followers_1.html -fg following.html
      ${chalk.gray("Open non-followers 5 tabs at a time, 30s apart")}

  follow-audit -fw followers_1.html -fg following.html -t 10 -d 60
      ${chalk.gray("Bigger batches, longer pauses")}

  follow-audit -fw followers_1.html -fg following.html --dry-run --json
      ${chalk.gray("List the links as JSON without opening anything")}
`
    )
    .action(async (options: DetectOptions) => {
      await detectNonFollowers(options, deps);
    });
}
