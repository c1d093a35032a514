import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import yaml from "js-yaml";
import { config as loadEnv } from "dotenv";
import type {
  Config,
  SyncOptions,
} from "../../core/domain/entities/config.entity.js";
import { ConfigurationError } from "../../core/domain/errors.js";
import {
  ConfigFileSchema,
  SyncFlagsSchema,
  WatchIntervalEnvSchema,
  formatIssues,
} from "../../adapters/validation.js";
import { parseDuration } from "./duration.utils.js";
import { globToRegExp } from "./glob.utils.js";

loadEnv();

export const WATCH_INTERVAL_ENV = "BUCKETSYNC_WATCH_INTERVAL_SEC";
const CONFIG_ENV = "BUCKETSYNC_CONFIG";

export function getConfigPath(): string {
  return (
    process.env[CONFIG_ENV] ?? resolve(process.cwd(), "config", "config.yaml")
  );
}

/** Replaces `${VAR}` string values with the environment variable, if set. */
export function substituteEnv(
  value: unknown,
  env: NodeJS.ProcessEnv = process.env,
): unknown {
  if (typeof value === "string" && value.startsWith("${") && value.endsWith("}")) {
    const key = value.slice(2, -1);
    return env[key] ?? value;
  }
  if (Array.isArray(value)) return value.map((v) => substituteEnv(v, env));
  if (value !== null && typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) out[k] = substituteEnv(v, env);
    return out;
  }
  return value;
}

export function parseConfig(
  raw: unknown,
  env: NodeJS.ProcessEnv = process.env,
  source = "config",
): Config {
  const result = ConfigFileSchema.safeParse(substituteEnv(raw ?? {}, env));
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid config at ${source}. ${formatIssues(result.error)}.`,
    );
  }
  const config = result.data;

  const interval = env[WATCH_INTERVAL_ENV];
  if (interval !== undefined && interval.trim() !== "") {
    const parsed = WatchIntervalEnvSchema.safeParse(interval);
    if (!parsed.success) {
      throw new ConfigurationError(
        `${WATCH_INTERVAL_ENV}="${interval}" ${formatIssues(parsed.error)}.`,
      );
    }
    config.watch.intervalSec = parsed.data;
  }
  return config;
}

/**
 * Loads the YAML config. A missing file is fine at the default location
 * (defaults apply, local-only syncs need no aliases) but an error when the
 * path was given explicitly.
 */
export function loadConfig(
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env,
): Config {
  const path = configPath ?? getConfigPath();
  if (!existsSync(path)) {
    if (configPath !== undefined && configPath !== getConfigPath()) {
      throw new ConfigurationError(`Config file not found: ${path}`);
    }
    return parseConfig({}, env, path);
  }
  let raw: string;
  try {
    raw = readFileSync(path, "utf-8");
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new ConfigurationError(`Failed to load config from ${path}. ${msg}`, {
      cause: e,
    });
  }
  let parsed: unknown;
  try {
    parsed = yaml.load(raw);
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new ConfigurationError(`Invalid YAML in ${path}. ${msg}`, {
      cause: e,
    });
  }
  if (parsed !== undefined && (parsed === null || typeof parsed !== "object")) {
    throw new ConfigurationError(`Config at ${path} must be a YAML object.`);
  }
  return parseConfig(parsed, env, path);
}

export interface ParsedSyncFlags {
  options: SyncOptions;
  concurrency?: number;
}

/**
 * Turns raw command flags into a SyncOptions value. Every duration and glob
 * is checked here, before any listing starts.
 */
export function buildSyncOptions(raw: unknown): ParsedSyncFlags {
  const result = SyncFlagsSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(`Invalid flags. ${formatIssues(result.error)}.`);
  }
  const flags = result.data;
  for (const pattern of flags.exclude) globToRegExp(pattern);

  const olderThanMs =
    flags.olderThan !== undefined ? parseDuration(flags.olderThan) : undefined;
  const newerThanMs =
    flags.newerThan !== undefined ? parseDuration(flags.newerThan) : undefined;
  if (
    olderThanMs !== undefined &&
    newerThanMs !== undefined &&
    olderThanMs >= newerThanMs
  ) {
    throw new ConfigurationError(
      `--older-than ${flags.olderThan} with --newer-than ${flags.newerThan} leaves no object eligible.`,
    );
  }

  return {
    options: {
      dryRun: flags.dryRun,
      remove: flags.remove,
      watch: flags.watch,
      exclude: flags.exclude,
      olderThanMs,
      newerThanMs,
      overwrite: flags.overwrite,
    },
    concurrency: flags.concurrency,
  };
}
