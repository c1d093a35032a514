import { z } from "zod";

/**
 * Schemas for the YAML config file and the sync command flags.
 * Defaults live here so that an absent file still yields a full Config.
 */

const MiB = 1024 * 1024;

export const AliasSchema = z.object({
  endpoint: z.string().url("endpoint must be a URL"),
  accessKey: z.string().min(1, "accessKey is required"),
  secretKey: z.string().min(1, "secretKey is required"),
  region: z.string().min(1).default("us-east-1"),
  pathStyle: z.boolean().default(true),
});

export const TransferSchema = z.object({
  concurrency: z.number().int().min(1).default(4),
  partConcurrency: z.number().int().min(1).default(4),
  partSize: z
    .number()
    .int()
    .min(5 * MiB, "partSize must be at least 5 MiB")
    .max(5 * 1024 * MiB, "partSize must be at most 5 GiB")
    .default(8 * MiB),
  requestTimeoutMs: z.number().int().positive().default(60_000),
});

export const RetrySchema = z.object({
  maxAttempts: z.number().int().min(1).default(4),
  backoffBaseMs: z.number().int().min(0).default(500),
  backoffMaxMs: z.number().int().min(0).default(10_000),
});

export const WatchSchema = z.object({
  intervalSec: z.number().positive().default(30),
});

export const LoggingSchema = z.object({
  dir: z.string().min(1).default("output/logs"),
  transferLog: z.string().min(1).default("transfers.jsonl"),
});

export const HistorySchema = z.object({
  enabled: z.boolean().default(true),
  path: z.string().min(1).default("output/sync-history.db"),
});

export const ConfigFileSchema = z.object({
  aliases: z.record(AliasSchema).default({}),
  transfer: TransferSchema.default({}),
  retry: RetrySchema.default({}),
  watch: WatchSchema.default({}),
  logging: LoggingSchema.default({}),
  history: HistorySchema.default({}),
});

export const SyncFlagsSchema = z.object({
  dryRun: z.boolean().default(false),
  remove: z.boolean().default(false),
  watch: z.boolean().default(false),
  overwrite: z.boolean().default(false),
  exclude: z.array(z.string()).default([]),
  olderThan: z.string().optional(),
  newerThan: z.string().optional(),
  concurrency: z.coerce.number().int().min(1).optional(),
});

export const WatchIntervalEnvSchema = z.coerce
  .number({ invalid_type_error: "must be a number of seconds" })
  .positive("must be greater than zero");

/** `transfer.partSize: Expected number` style lines for error messages. */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => `${i.path.length ? i.path.join(".") : "(root)"}: ${i.message}`)
    .join("; ");
}
