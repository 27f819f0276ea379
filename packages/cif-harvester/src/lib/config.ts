import { z } from "zod";
import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import { homedir } from "os";
import { join } from "path";
import { invalidConfig, invalidEnvironment, invalidOption } from "./errors/catalog.js";
import { errorMessage } from "./errors/types.js";
import type { LogLevel } from "./logger.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** User-level configuration path (XDG Base Directory Specification) */
export const USER_CONFIG_PATH = join(
  homedir(),
  ".config",
  "cif-harvester",
  "config.yaml"
);

/** Environment variables are read with this prefix */
export const ENV_PREFIX = "CIF_HARVESTER_";

export const MIN_BATCH_SIZE = 1;
export const MAX_BATCH_SIZE = 64;
export const MAX_TIMEOUT_MS = 3_600_000;
export const MAX_DELAY_MS = 60_000;
export const MAX_SCRAPE_INTERVAL_MS = 300_000;

/** Default values for all configuration options */
export const CONFIG_DEFAULTS = {
  idsPath: "missing_ids.txt",
  outputDir: "cif_downloads",
  ledgerPath: "download_ledger.jsonl",
  timeoutSeconds: 30,
  batchSize: 5,
  urlTemplate: "https://qpod.fysik.dtu.dk/material/{id}/download/cif",
  userAgent: "cif-harvester/1.0",
  minDelayMs: 500,
  maxDelayMs: 1000,
  listingUrlTemplate: "https://qpod.fysik.dtu.dk/table?sid={sid}&page={page}",
  scrapeIntervalMs: 5000,
  scrapeMaxAttempts: 5,
} as const;

// ---------------------------------------------------------------------------
// Zod Schemas
// ---------------------------------------------------------------------------

const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

const templateWith = (placeholder: string) =>
  z.string().url().refine((value) => value.includes(placeholder), {
    message: `must contain ${placeholder}`,
  });

/** Complete configuration file schema */
export const ConfigFileSchema = z
  .object({
    fetch: z
      .object({
        ids: z.string().min(1).optional(),
        outputDir: z.string().min(1).optional(),
        ledger: z.string().min(1).optional(),
        timeoutSeconds: z.number().positive().max(MAX_TIMEOUT_MS / 1000).optional(),
        batchSize: z.number().int().min(MIN_BATCH_SIZE).max(MAX_BATCH_SIZE).optional(),
        urlTemplate: templateWith("{id}").optional(),
        userAgent: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
    rateLimit: z
      .object({
        minDelayMs: z.number().int().min(0).max(MAX_DELAY_MS).optional(),
        maxDelayMs: z.number().int().min(0).max(MAX_DELAY_MS).optional(),
      })
      .strict()
      .optional(),
    scrape: z
      .object({
        urlTemplate: templateWith("{page}").optional(),
        intervalMs: z.number().int().min(0).max(MAX_SCRAPE_INTERVAL_MS).optional(),
        maxAttempts: z.number().int().min(1).max(100).optional(),
        maxPages: z.number().int().min(1).optional(),
      })
      .strict()
      .optional(),
    logging: z
      .object({
        level: LogLevelSchema.optional(),
        json: z.boolean().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

/** Type derived from the Zod schema */
export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/** Resolved configuration with all defaults applied */
export interface ResolvedConfig {
  idsPath: string;
  outputDir: string;
  ledgerPath: string;
  timeoutMs: number;
  batchSize: number;
  urlTemplate: string;
  userAgent: string;
  minDelayMs: number;
  maxDelayMs: number;
  listingUrlTemplate: string;
  scrapeIntervalMs: number;
  scrapeMaxAttempts: number;
  scrapeMaxPages?: number;
  logLevel: LogLevel;
  logJson: boolean;
}

export type ConfigOverrides = Partial<ResolvedConfig>;

// ---------------------------------------------------------------------------
// Loader Functions
// ---------------------------------------------------------------------------

/**
 * Load a YAML config file from disk.
 * Returns undefined if file doesn't exist.
 * Throws a VALIDATION_CONFIG_INVALID CLIError if it exists but is invalid.
 */
export function loadConfigFile(path: string): ConfigFile | undefined {
  if (!existsSync(path)) {
    return undefined;
  }

  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (err) {
    throw invalidConfig(path, [`cannot read file: ${errorMessage(err)}`]);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw invalidConfig(path, [`invalid YAML: ${errorMessage(err)}`]);
  }

  // Handle empty files
  if (parsed === null || parsed === undefined) {
    return {};
  }

  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    throw invalidConfig(
      path,
      result.error.issues.map((i) =>
        i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message
      )
    );
  }

  return result.data;
}

/**
 * Translate a config file into overrides.
 * Only values that are explicitly set in the source appear.
 */
function fromConfigFile(source: ConfigFile): ConfigOverrides {
  return {
    idsPath: source.fetch?.ids,
    outputDir: source.fetch?.outputDir,
    ledgerPath: source.fetch?.ledger,
    timeoutMs:
      source.fetch?.timeoutSeconds !== undefined
        ? Math.round(source.fetch.timeoutSeconds * 1000)
        : undefined,
    batchSize: source.fetch?.batchSize,
    urlTemplate: source.fetch?.urlTemplate,
    userAgent: source.fetch?.userAgent,
    minDelayMs: source.rateLimit?.minDelayMs,
    maxDelayMs: source.rateLimit?.maxDelayMs,
    listingUrlTemplate: source.scrape?.urlTemplate,
    scrapeIntervalMs: source.scrape?.intervalMs,
    scrapeMaxAttempts: source.scrape?.maxAttempts,
    scrapeMaxPages: source.scrape?.maxPages,
    logLevel: source.logging?.level,
    logJson: source.logging?.json,
  };
}

const EnvSchema = z.object({
  IDS: z.string().min(1).optional(),
  OUT: z.string().min(1).optional(),
  LOG: z.string().min(1).optional(),
  TIMEOUT: z.coerce.number().positive().max(MAX_TIMEOUT_MS / 1000).optional(),
  BATCH_SIZE: z.coerce.number().int().min(MIN_BATCH_SIZE).max(MAX_BATCH_SIZE).optional(),
  URL_TEMPLATE: z.string().min(1).optional(),
  USER_AGENT: z.string().min(1).optional(),
  MIN_DELAY_MS: z.coerce.number().int().min(0).max(MAX_DELAY_MS).optional(),
  MAX_DELAY_MS: z.coerce.number().int().min(0).max(MAX_DELAY_MS).optional(),
  LOG_LEVEL: LogLevelSchema.optional(),
});

/**
 * Read `CIF_HARVESTER_*` variables.
 * An invalid value is reported against the variable's name.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
  const raw: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (key.startsWith(ENV_PREFIX) && value !== undefined && value !== "") {
      raw[key.slice(ENV_PREFIX.length)] = value;
    }
  }

  const result = EnvSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const name = `${ENV_PREFIX}${issue?.path.join(".") ?? ""}`;
    throw invalidEnvironment(name, issue?.message ?? "invalid value");
  }

  const vars = result.data;
  return {
    idsPath: vars.IDS,
    outputDir: vars.OUT,
    ledgerPath: vars.LOG,
    timeoutMs: vars.TIMEOUT !== undefined ? Math.round(vars.TIMEOUT * 1000) : undefined,
    batchSize: vars.BATCH_SIZE,
    urlTemplate: vars.URL_TEMPLATE,
    userAgent: vars.USER_AGENT,
    minDelayMs: vars.MIN_DELAY_MS,
    maxDelayMs: vars.MAX_DELAY_MS,
    logLevel: vars.LOG_LEVEL,
  };
}

/**
 * Filter out undefined values from an object.
 */
function filterUndefined<T extends object>(obj: T): Partial<T> {
  const result: Partial<T> = { ...obj };
  for (const key in result) {
    if (result[key] === undefined) delete result[key];
  }
  return result;
}

/**
 * Merge configuration sources with proper precedence:
 * CLI args > Environment > Config file > Defaults
 */
export function resolveConfig(
  cliOptions: ConfigOverrides = {},
  fileConfig: ConfigFile | undefined = undefined,
  envConfig: ConfigOverrides = {}
): ResolvedConfig {
  // Start with defaults
  const config: ResolvedConfig = {
    idsPath: CONFIG_DEFAULTS.idsPath,
    outputDir: CONFIG_DEFAULTS.outputDir,
    ledgerPath: CONFIG_DEFAULTS.ledgerPath,
    timeoutMs: CONFIG_DEFAULTS.timeoutSeconds * 1000,
    batchSize: CONFIG_DEFAULTS.batchSize,
    urlTemplate: CONFIG_DEFAULTS.urlTemplate,
    userAgent: CONFIG_DEFAULTS.userAgent,
    minDelayMs: CONFIG_DEFAULTS.minDelayMs,
    maxDelayMs: CONFIG_DEFAULTS.maxDelayMs,
    listingUrlTemplate: CONFIG_DEFAULTS.listingUrlTemplate,
    scrapeIntervalMs: CONFIG_DEFAULTS.scrapeIntervalMs,
    scrapeMaxAttempts: CONFIG_DEFAULTS.scrapeMaxAttempts,
    logLevel: "info",
    logJson: false,
  };

  if (fileConfig) {
    Object.assign(config, filterUndefined(fromConfigFile(fileConfig)));
  }
  Object.assign(config, filterUndefined(envConfig));
  Object.assign(config, filterUndefined(cliOptions));

  validateResolved(config);
  return config;
}

/**
 * Cross-field checks that no single source can express.
 */
function validateResolved(config: ResolvedConfig): void {
  if (!Number.isInteger(config.timeoutMs) || config.timeoutMs < 1 || config.timeoutMs > MAX_TIMEOUT_MS) {
    throw invalidOption("timeout", `must be between 0.001 and ${MAX_TIMEOUT_MS / 1000} seconds`);
  }
  if (config.maxDelayMs > MAX_DELAY_MS) {
    throw invalidOption("max-delay", `must be at most ${MAX_DELAY_MS}ms`);
  }
  if (config.scrapeIntervalMs > MAX_SCRAPE_INTERVAL_MS) {
    throw invalidOption("interval", `must be at most ${MAX_SCRAPE_INTERVAL_MS / 1000} seconds`);
  }
  if (config.minDelayMs > config.maxDelayMs) {
    throw invalidOption(
      "min-delay",
      `${config.minDelayMs}ms is greater than the maximum delay of ${config.maxDelayMs}ms`
    );
  }
  if (
    !Number.isInteger(config.batchSize) ||
    config.batchSize < MIN_BATCH_SIZE ||
    config.batchSize > MAX_BATCH_SIZE
  ) {
    throw invalidOption(
      "batch-size",
      `must be an integer from ${MIN_BATCH_SIZE} to ${MAX_BATCH_SIZE}`
    );
  }
  if (!config.urlTemplate.includes("{id}")) {
    throw invalidOption("url-template", "must contain {id}");
  }
}

export interface LoadConfigOptions {
  /** Explicit --config path; unlike the default location it must exist */
  explicitPath?: string;
  cli?: ConfigOverrides;
  env?: NodeJS.ProcessEnv;
}

/**
 * Load configuration from all sources.
 *
 * @returns The resolved config and list of source files that were loaded
 */
export function loadConfig(options: LoadConfigOptions = {}): {
  config: ResolvedConfig;
  sources: string[];
} {
  const { explicitPath, cli = {}, env = process.env } = options;
  const sources: string[] = [];

  let fileConfig: ConfigFile | undefined;
  if (explicitPath) {
    fileConfig = loadConfigFile(explicitPath);
    if (!fileConfig) {
      throw invalidConfig(explicitPath, ["file does not exist"]);
    }
    sources.push(explicitPath);
  } else {
    fileConfig = loadConfigFile(USER_CONFIG_PATH);
    if (fileConfig) sources.push(USER_CONFIG_PATH);
  }

  const config = resolveConfig(cli, fileConfig, configFromEnv(env));

  return { config, sources };
}
