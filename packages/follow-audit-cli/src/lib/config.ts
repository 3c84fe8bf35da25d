import { z } from "zod";
import { readFileSync, existsSync, statSync } from "fs";
import { parse as parseYaml } from "yaml";
import { homedir } from "os";
import { join } from "path";
import { LOG_LEVEL_NAMES, type LogLevel } from "./logger.js";
import { DEFAULT_PROFILE_DOMAIN } from "./links.js";
import type { DiffStrategy } from "./differ.js";
import {
  fileIsDirectory,
  fileNotFound,
  fileNotReadable,
  invalidConfig,
} from "./errors/catalog.js";
import { errorMessage } from "./errors/types.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** System-wide configuration path */
export const SYSTEM_CONFIG_PATH = "/etc/follow-audit/config.yaml";

/** User-level configuration path (XDG Base Directory Specification) */
export const USER_CONFIG_PATH = join(
  homedir(),
  ".config",
  "follow-audit",
  "config.yaml"
);

export const CONFIG_DEFAULTS = {
  numTabs: 5,
  durationSeconds: 30,
  trailingPause: true,
  domain: DEFAULT_PROFILE_DOMAIN,
  strategy: "diff",
  logLevel: "warn",
  logJson: false,
} as const;

export const MIN_NUM_TABS = 1;
export const MIN_DURATION_SECONDS = 0;

// ---------------------------------------------------------------------------
// Zod Schemas
// ---------------------------------------------------------------------------

const BatchSchema = z.object({
  numTabs: z.number().int().min(MIN_NUM_TABS).optional(),
  durationSeconds: z.number().int().min(MIN_DURATION_SECONDS).optional(),
  trailingPause: z.boolean().optional(),
});

export const ConfigFileSchema = z.object({
  batch: BatchSchema.optional(),
  links: z
    .object({
      domain: z.string().min(1).optional(),
      strategy: z.enum(["diff", "set"]).optional(),
    })
    .optional(),
  logging: z
    .object({
      level: z.enum(LOG_LEVEL_NAMES).optional(),
      json: z.boolean().optional(),
    })
    .optional(),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/** Configuration with every default applied */
export interface ResolvedConfig {
  numTabs: number;
  durationSeconds: number;
  trailingPause: boolean;
  domain: string;
  strategy: DiffStrategy;
  logLevel: LogLevel;
  logJson: boolean;
}

// ---------------------------------------------------------------------------
// Loader Functions
// ---------------------------------------------------------------------------

/**
 * Load a YAML config file from disk.
 * Returns undefined if the file doesn't exist and throws a CLIError if it
 * exists but cannot be used.
 */
export function loadConfigFile(path: string): ConfigFile | undefined {
  if (!existsSync(path)) {
    return undefined;
  }

  if (statSync(path).isDirectory()) {
    throw fileIsDirectory(path);
  }

  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (err) {
    throw fileNotReadable(path, errorMessage(err));
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw invalidConfig(path, [`Invalid YAML: ${errorMessage(err)}`]);
  }

  // Empty file
  if (parsed === null || parsed === undefined) {
    return {};
  }

  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    throw invalidConfig(
      path,
      result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`)
    );
  }

  return result.data;
}

/**
 * Copy values that are explicitly set in `source` onto `target`.
 */
function applyConfigFile(target: ResolvedConfig, source: ConfigFile): void {
  if (source.batch?.numTabs !== undefined) {
    target.numTabs = source.batch.numTabs;
  }
  if (source.batch?.durationSeconds !== undefined) {
    target.durationSeconds = source.batch.durationSeconds;
  }
  if (source.batch?.trailingPause !== undefined) {
    target.trailingPause = source.batch.trailingPause;
  }
  if (source.links?.domain !== undefined) {
    target.domain = source.links.domain;
  }
  if (source.links?.strategy !== undefined) {
    target.strategy = source.links.strategy;
  }
  if (source.logging?.level !== undefined) {
    target.logLevel = source.logging.level;
  }
  if (source.logging?.json !== undefined) {
    target.logJson = source.logging.json;
  }
}

function filterUndefined<T extends object>(obj: T): Partial<T> {
  return Object.fromEntries(
    Object.entries(obj).filter(([, v]) => v !== undefined)
  ) as Partial<T>;
}

/**
 * Merge configuration sources with precedence:
 * CLI options > user config > system config > defaults
 */
export function resolveConfig(
  cliOptions: Partial<ResolvedConfig> = {},
  userConfig: ConfigFile | undefined = undefined,
  systemConfig: ConfigFile | undefined = undefined
): ResolvedConfig {
  const config: ResolvedConfig = {
    numTabs: CONFIG_DEFAULTS.numTabs,
    durationSeconds: CONFIG_DEFAULTS.durationSeconds,
    trailingPause: CONFIG_DEFAULTS.trailingPause,
    domain: CONFIG_DEFAULTS.domain,
    strategy: CONFIG_DEFAULTS.strategy,
    logLevel: CONFIG_DEFAULTS.logLevel,
    logJson: CONFIG_DEFAULTS.logJson,
  };

  if (systemConfig) {
    applyConfigFile(config, systemConfig);
  }

  if (userConfig) {
    applyConfigFile(config, userConfig);
  }

  Object.assign(config, filterUndefined(cliOptions));

  return config;
}

/**
 * Load configuration from all sources. An explicit path replaces both the
 * system and user files and must exist.
 *
 * @returns The resolved config and the files that were loaded
 */
export function loadConfig(
  explicitPath?: string,
  cliOptions: Partial<ResolvedConfig> = {}
): {
  config: ResolvedConfig;
  sources: string[];
} {
  const sources: string[] = [];

  let systemConfig: ConfigFile | undefined;
  let userConfig: ConfigFile | undefined;

  if (explicitPath) {
    userConfig = loadConfigFile(explicitPath);
    if (!userConfig) throw fileNotFound(explicitPath);
    sources.push(explicitPath);
  } else {
    systemConfig = loadConfigFile(SYSTEM_CONFIG_PATH);
    if (systemConfig) sources.push(SYSTEM_CONFIG_PATH);

    userConfig = loadConfigFile(USER_CONFIG_PATH);
    if (userConfig) sources.push(USER_CONFIG_PATH);
  }

  const config = resolveConfig(cliOptions, userConfig, systemConfig);

  return { config, sources };
}
