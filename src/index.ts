#!/usr/bin/env node
/**
 * bucketsync CLI
 * Commands: sync (alias mirror) | ls | cp | mv | rm | stat | cat | history
 */

import { program } from "commander";
import { readFileSync } from "node:fs";
import { z } from "zod";
import { loadConfig, getConfigPath } from "./infrastructure/utils/config.utils.js";
import { ConsoleReporter } from "./infrastructure/services/console-reporter.service.js";
import { JsonLogger } from "./infrastructure/services/json-logger.service.js";
import { SqliteSyncHistoryRepository } from "./infrastructure/database/sqlite-sync-history.repository.js";
import {
  EXIT_FAILURE,
  SyncController,
} from "./adapters/controllers/sync.controller.js";
import { ConfigurationError, errorMessage } from "./core/domain/errors.js";

const PackageSchema = z.object({ version: z.string() });
const pkg = PackageSchema.parse(
  JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8")),
);

const GlobalOptionsSchema = z.object({
  config: z.string(),
  json: z.boolean().default(false),
  debug: z.boolean().default(false),
});

// First SIGINT/SIGTERM stops watch mode after the running cycle; a second one exits.
const shutdown = new AbortController();
for (const sig of ["SIGINT", "SIGTERM"] as const) {
  process.on(sig, () => {
    if (shutdown.signal.aborted) process.exit(sig === "SIGINT" ? 130 : 143);
    process.stderr.write(`\nReceived ${sig}, stopping after the current cycle...\n`);
    shutdown.abort();
  });
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

async function runCommand(
  command: (controller: SyncController) => Promise<number>,
): Promise<number> {
  const globals = GlobalOptionsSchema.parse(program.opts());
  const reporter = new ConsoleReporter({
    json: globals.json,
    debug: globals.debug,
  });
  let history: SqliteSyncHistoryRepository | null = null;
  try {
    const config = loadConfig(globals.config);
    reporter.debug(`config: ${globals.config}`);
    history = config.history.enabled
      ? new SqliteSyncHistoryRepository(config.history.path)
      : null;
    const controller = new SyncController({
      config,
      reporter,
      logger: new JsonLogger(config.logging.dir, config.logging.transferLog),
      history,
      signal: shutdown.signal,
    });
    return await command(controller);
  } catch (e) {
    const prefix = e instanceof ConfigurationError ? "configuration" : "failed";
    reporter.error(`${prefix}: ${errorMessage(e)}`);
    return EXIT_FAILURE;
  } finally {
    history?.close();
  }
}

program
  .name("bucketsync")
  .description("Reconcile local directories and S3-compatible buckets")
  .version(pkg.version, "-v, --version")
  .option("-c, --config <path>", "Config file path", getConfigPath())
  .option("--json", "Print one JSON object per line")
  .option("--debug", "Print debug output");

// ─── sync / mirror ────────────────────────────────────────────────────────────

program
  .command("sync")
  .alias("mirror")
  .description(
    "Copy new and changed objects from <source> to <target> (alias/bucket[/prefix] or a local path)",
  )
  .argument("<source>")
  .argument("<target>")
  .option("--dry-run", "Show the plan without transferring anything")
  .option("--remove", "Delete objects that exist only on the target")
  .option("-w, --watch", "Repeat the sync on an interval until interrupted")
  .option("--exclude <glob>", "Skip source keys matching the pattern (repeatable)", collect, [])
  .option("--older-than <duration>", "Only objects older than this (e.g. 365d)")
  .option("--newer-than <duration>", "Only objects newer than this (e.g. 12h)")
  .option("--overwrite", "Overwrite changed objects (default behaviour)")
  .option("--concurrency <n>", "Parallel transfers (overrides transfer.concurrency)")
  .action(async (source: string, target: string, opts: Record<string, unknown>) => {
    process.exitCode = await runCommand((c) => c.sync(source, target, opts));
  });

// ─── ls ───────────────────────────────────────────────────────────────────────

program
  .command("ls")
  .description("List every object under a target, sorted by key")
  .argument("<target>")
  .action(async (target: string) => {
    process.exitCode = await runCommand((c) => c.ls(target));
  });

// ─── object commands ──────────────────────────────────────────────────────────

program
  .command("cp")
  .description("Copy one object; a <target> ending in / keeps the source name")
  .argument("<source>")
  .argument("<target>")
  .action(async (source: string, target: string) => {
    process.exitCode = await runCommand((c) => c.copy(source, target));
  });

program
  .command("mv")
  .description("Move one object: copy it, then remove the source")
  .argument("<source>")
  .argument("<target>")
  .action(async (source: string, target: string) => {
    process.exitCode = await runCommand((c) => c.copy(source, target, true));
  });

program
  .command("rm")
  .description("Remove one object")
  .argument("<target>")
  .action(async (target: string) => {
    process.exitCode = await runCommand((c) => c.rm(target));
  });

program
  .command("stat")
  .description("Show size, modification time and MD5 of one object")
  .argument("<target>")
  .action(async (target: string) => {
    process.exitCode = await runCommand((c) => c.stat(target));
  });

program
  .command("cat")
  .description("Write one object to stdout")
  .argument("<target>")
  .action(async (target: string) => {
    process.exitCode = await runCommand((c) => c.cat(target));
  });

// ─── history ──────────────────────────────────────────────────────────────────

program
  .command("history")
  .description("Show the most recent sync runs")
  .option("--limit <n>", "Number of entries", "20")
  .action(async (opts: { limit: string }) => {
    const limit = Number.parseInt(opts.limit, 10);
    process.exitCode = await runCommand((c) =>
      c.history(Number.isNaN(limit) || limit < 1 ? 20 : limit),
    );
  });

await program.parseAsync(process.argv);
