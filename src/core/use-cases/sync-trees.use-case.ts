import type { SyncOptions } from "../domain/entities/config.entity.js";
import type { ObjectEntry } from "../domain/entities/object-entry.entity.js";
import {
  isPlanEmpty,
  type ExecutionReport,
  type SyncPlan,
} from "../domain/entities/sync-plan.entity.js";
import type { IObjectStore } from "../domain/services/object-store.service.js";
import type { ILogger } from "../domain/services/logger.service.js";
import type { IReporter } from "../domain/services/reporter.service.js";
import type { ISyncHistoryRepository } from "../domain/repositories/sync-history.repository.js";
import { FilterChain } from "../domain/services/filter-chain.service.js";
import { errorMessage } from "../domain/errors.js";
import { formatDuration } from "../../infrastructure/utils/duration.utils.js";
import type { ListTreeUseCase } from "./list-tree.use-case.js";
import type { PlanSyncUseCase } from "./plan-sync.use-case.js";
import type { ExecutePlanUseCase } from "./execute-plan.use-case.js";

export interface SyncTreesDeps {
  runId: string;
  source: IObjectStore;
  destination: IObjectStore;
  lister: ListTreeUseCase;
  planner: PlanSyncUseCase;
  executor: ExecutePlanUseCase;
  logger: ILogger;
  reporter: IReporter;
  history?: ISyncHistoryRepository | null;
}

export interface SyncCycleResult {
  cycle: number;
  plan: SyncPlan;
  report: ExecutionReport;
  sourceEntries: number;
  destinationEntries: number;
}

/** One reconciliation cycle: list both sides, filter, plan, execute. */
export class SyncTreesUseCase {
  constructor(private deps: SyncTreesDeps) {}

  async execute(
    options: SyncOptions,
    cycle = 1,
    now: Date = new Date(),
  ): Promise<SyncCycleResult> {
    const { source, destination, lister, planner, executor, logger, reporter } =
      this.deps;
    const filter = FilterChain.fromOptions(options, now);
    logger.log({
      event: "cycle-start",
      cycle,
      source: source.label,
      destination: destination.label,
      dryRun: options.dryRun,
      success: true,
    });
    const started = Date.now();

    // Both listings must be complete before any decision is made.
    const sourceEntries: ObjectEntry[] = await lister.execute(source);
    const destinationEntries: ObjectEntry[] = await lister.execute(destination);

    const plan = planner.execute({
      source: sourceEntries,
      destination: destinationEntries,
      filter,
      options,
      describeSource: (key) => source.describe(key),
      describeDestination: (key) => destination.describe(key),
    });
    reporter.planned({
      source: source.label,
      destination: destination.label,
      plan,
      dryRun: options.dryRun,
    });
    if (isPlanEmpty(plan)) {
      reporter.debug(`Cycle ${cycle}: ${destination.label} is up to date`);
    }

    const report = await executor.execute({
      plan,
      dryRun: options.dryRun,
      cycle,
    });
    const durationMs = Date.now() - started;
    logger.log({
      event: "cycle-end",
      cycle,
      source: source.label,
      destination: destination.label,
      bytes: report.bytesTransferred,
      durationMs,
      dryRun: options.dryRun,
      success: report.failed === 0,
    });
    reporter.finished(report, options.dryRun);
    reporter.debug(`Cycle ${cycle} took ${formatDuration(durationMs)}`);

    if (!options.dryRun && this.deps.history) {
      try {
        await this.deps.history.append({
          timestamp: new Date().toISOString(),
          runId: this.deps.runId,
          source: source.label,
          destination: destination.label,
          creates: plan.creates.length,
          updates: plan.updates.length,
          deletes: plan.deletes.length,
          skipped: plan.skipped,
          failed: report.failed,
          bytes: report.bytesTransferred,
        });
      } catch (e) {
        reporter.warn(`Could not record sync history: ${errorMessage(e)}`);
      }
    }

    return {
      cycle,
      plan,
      report,
      sourceEntries: sourceEntries.length,
      destinationEntries: destinationEntries.length,
    };
  }
}
