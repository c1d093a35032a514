import type { Config } from "../../core/domain/entities/config.entity.js";
import type { Scope } from "../../core/domain/entities/object-entry.entity.js";
import type {
  ExecutionReport,
  SyncPlan,
  Task,
} from "../../core/domain/entities/sync-plan.entity.js";
import type { IObjectStore } from "../../core/domain/services/object-store.service.js";
import type { ILogger } from "../../core/domain/services/logger.service.js";
import type { IReporter } from "../../core/domain/services/reporter.service.js";
import type { ISyncHistoryRepository } from "../../core/domain/repositories/sync-history.repository.js";
import { ListTreeUseCase } from "../../core/use-cases/list-tree.use-case.js";
import { PlanSyncUseCase } from "../../core/use-cases/plan-sync.use-case.js";
import { ExecutePlanUseCase } from "../../core/use-cases/execute-plan.use-case.js";
import { SyncTreesUseCase } from "../../core/use-cases/sync-trees.use-case.js";
import {
  WatchSyncUseCase,
  type WatchHooks,
} from "../../core/use-cases/watch-sync.use-case.js";
import { ObjectStoreFactory } from "../../infrastructure/services/object-store.factory.js";
import { buildSyncOptions } from "../../infrastructure/utils/config.utils.js";
import {
  assertLocalSource,
  classifyCopyDestination,
  classifyObjectTarget,
  classifyTarget,
  type ObjectTarget,
} from "../../infrastructure/utils/target.utils.js";
import { withRetry } from "../../infrastructure/utils/retry.utils.js";
import { PartPlanService } from "../../core/domain/services/part-plan.service.js";
import { ConfigurationError } from "../../core/domain/errors.js";
import { runId as newRunId } from "../../infrastructure/utils/id.utils.js";
import { formatBytes } from "../../infrastructure/services/console-reporter.service.js";

export interface SyncControllerDeps {
  config: Config;
  reporter: IReporter;
  logger: ILogger;
  history?: ISyncHistoryRepository | null;
  /** Defaults to ObjectStoreFactory; tests hand in-memory stores. */
  createStore?: (scope: Scope) => IObjectStore;
  /** Cancels watch mode between cycles. */
  signal?: AbortSignal;
  watchHooks?: WatchHooks;
  /** Sink for `cat`; defaults to stdout. */
  write?: (chunk: Buffer) => void;
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;

function exitCodeFor(report: ExecutionReport | undefined): number {
  if (!report) return EXIT_FAILURE;
  return report.failed > 0 ? EXIT_FAILURE : EXIT_OK;
}

function singleTaskPlan(task: Task): SyncPlan {
  return {
    creates: task.kind === "create" ? [task] : [],
    updates: task.kind === "update" ? [task] : [],
    deletes: task.kind === "delete" ? [task] : [],
    skipped: 0,
  };
}

/**
 * Wires the engine for every command and turns outcomes into exit codes.
 * Configuration problems are thrown, before any listing.
 */
export class SyncController {
  private createStore: (scope: Scope) => IObjectStore;
  private write: (chunk: Buffer) => void;

  constructor(private deps: SyncControllerDeps) {
    this.createStore =
      deps.createStore ??
      ((scope) => ObjectStoreFactory.create(scope, deps.config, deps.reporter));
    this.write =
      deps.write ??
      ((chunk) => {
        process.stdout.write(chunk);
      });
  }

  async sync(source: string, destination: string, flags: unknown): Promise<number> {
    const { config, reporter, logger } = this.deps;
    const { options, concurrency } = buildSyncOptions(flags);
    const sourceScope = classifyTarget(source, config.aliases);
    assertLocalSource(source, sourceScope);
    const sourceStore = this.createStore(sourceScope);
    const destinationStore = this.createStore(
      classifyTarget(destination, config.aliases),
    );
    const transfer = {
      ...config.transfer,
      concurrency: concurrency ?? config.transfer.concurrency,
    };

    const runId = newRunId();
    logger.init(runId);
    const lister = new ListTreeUseCase(
      config.retry,
      transfer.requestTimeoutMs,
      reporter,
    );
    const executor = new ExecutePlanUseCase({
      source: sourceStore,
      destination: destinationStore,
      transfer,
      retry: config.retry,
      logger,
      reporter,
    });
    const syncTrees = new SyncTreesUseCase({
      runId,
      source: sourceStore,
      destination: destinationStore,
      lister,
      planner: new PlanSyncUseCase(),
      executor,
      logger,
      reporter,
      history: this.deps.history,
    });

    try {
      if (options.watch) {
        const watch = new WatchSyncUseCase(
          syncTrees,
          reporter,
          logger,
          this.deps.watchHooks,
        );
        const latest = await watch.run({
          source: sourceStore.label,
          destination: destinationStore.label,
          options,
          intervalMs: config.watch.intervalSec * 1000,
          signal: this.deps.signal ?? new AbortController().signal,
        });
        if (!latest || latest.error) return EXIT_FAILURE;
        return exitCodeFor(latest.result?.report);
      }
      const result = await syncTrees.execute(options);
      return exitCodeFor(result.report);
    } finally {
      await logger.close();
    }
  }

  async ls(target: string): Promise<number> {
    const { config, reporter } = this.deps;
    const store = this.createStore(classifyTarget(target, config.aliases));
    const lister = new ListTreeUseCase(
      config.retry,
      config.transfer.requestTimeoutMs,
      reporter,
    );
    const entries = await lister.execute(store);
    reporter.listing(entries, store.label);
    return EXIT_OK;
  }

  /** `cp`, or `mv` when `move` is set: the source goes only once the copy succeeded. */
  async copy(source: string, destination: string, move = false): Promise<number> {
    const { config, reporter, logger } = this.deps;
    const from = this.objectTarget(source);
    const to = classifyCopyDestination(destination, from.key, config.aliases);
    const sourceStore = this.createStore(from.scope);
    const destinationStore = this.createStore(to.scope);
    const sourceRef = sourceStore.describe(from.key);
    const destRef = destinationStore.describe(to.key);
    if (sourceRef === destRef) {
      throw new ConfigurationError(`${sourceRef} cannot be copied onto itself.`);
    }

    const entry = await this.request((signal) =>
      sourceStore.stat(from.key, { signal }),
    );
    if (!entry) {
      reporter.error(`No such object: ${sourceRef}`);
      return EXIT_FAILURE;
    }
    const existing = await this.request((signal) =>
      destinationStore.stat(to.key, { signal }),
    );

    logger.init(newRunId());
    try {
      const copied = await this.executor(sourceStore, destinationStore).execute({
        plan: singleTaskPlan({
          key: to.key,
          sourceKey: from.key,
          sourceRef,
          destRef,
          size: entry.size,
          kind: existing ? "update" : "create",
        }),
        dryRun: false,
      });
      if (!move || copied.failed > 0) return exitCodeFor(copied);
      return exitCodeFor(await this.remove(sourceStore, from.key, entry.size));
    } finally {
      await logger.close();
    }
  }

  async rm(target: string): Promise<number> {
    const { reporter, logger } = this.deps;
    const { scope, key } = this.objectTarget(target);
    const store = this.createStore(scope);
    const entry = await this.request((signal) => store.stat(key, { signal }));
    if (!entry) {
      reporter.error(`No such object: ${store.describe(key)}`);
      return EXIT_FAILURE;
    }
    logger.init(newRunId());
    try {
      return exitCodeFor(await this.remove(store, key, entry.size));
    } finally {
      await logger.close();
    }
  }

  async stat(target: string): Promise<number> {
    const { reporter } = this.deps;
    const { scope, key } = this.objectTarget(target);
    const store = this.createStore(scope);
    const entry = await this.request((signal) => store.stat(key, { signal }));
    if (!entry) {
      reporter.error(`No such object: ${store.describe(key)}`);
      return EXIT_FAILURE;
    }
    reporter.object(entry, store.describe(key));
    return EXIT_OK;
  }

  async cat(target: string): Promise<number> {
    const { config, reporter } = this.deps;
    const { scope, key } = this.objectTarget(target);
    const store = this.createStore(scope);
    const entry = await this.request((signal) => store.stat(key, { signal }));
    if (!entry) {
      reporter.error(`No such object: ${store.describe(key)}`);
      return EXIT_FAILURE;
    }
    if (!PartPlanService.requiresMultipart(entry.size)) {
      this.write(await this.request((signal) => store.get(key, { signal })));
      return EXIT_OK;
    }
    // Large objects go out one part-sized range at a time
    const { ranges } = PartPlanService.build(entry.size, config.transfer.partSize);
    for (const range of ranges) {
      this.write(
        await this.request((signal) =>
          store.readRange(key, range.start, range.length, { signal }),
        ),
      );
    }
    return EXIT_OK;
  }

  async history(limit: number): Promise<number> {
    const { history, reporter } = this.deps;
    if (!history) {
      reporter.warn("Sync history is disabled (history.enabled: false).");
      return EXIT_OK;
    }
    const entries = await history.latest(limit);
    if (entries.length === 0) {
      reporter.info("No sync history yet.");
      return EXIT_OK;
    }
    for (const e of entries) {
      reporter.info(
        `${e.timestamp}  ${e.source} -> ${e.destination}  +${e.creates} ~${e.updates} -${e.deletes} =${e.skipped} failed:${e.failed} ${formatBytes(e.bytes)}`,
      );
    }
    return EXIT_OK;
  }

  private objectTarget(input: string): ObjectTarget {
    const target = classifyObjectTarget(input, this.deps.config.aliases);
    if (!target.key) {
      throw new ConfigurationError(`"${input}" does not name an object.`);
    }
    return target;
  }

  private executor(
    source: IObjectStore,
    destination: IObjectStore,
  ): ExecutePlanUseCase {
    const { config, logger, reporter } = this.deps;
    return new ExecutePlanUseCase({
      source,
      destination,
      transfer: config.transfer,
      retry: config.retry,
      logger,
      reporter,
    });
  }

  private remove(
    store: IObjectStore,
    key: string,
    size: number,
  ): Promise<ExecutionReport> {
    return this.executor(store, store).execute({
      plan: singleTaskPlan({
        key,
        sourceRef: null,
        destRef: store.describe(key),
        size,
        kind: "delete",
      }),
      dryRun: false,
    });
  }

  /** A lookup outside the executor: same timeout and retry policy. */
  private request<T>(op: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const { transfer, retry } = this.deps.config;
    return withRetry(
      () => op(AbortSignal.timeout(transfer.requestTimeoutMs)),
      retry,
    );
  }
}
