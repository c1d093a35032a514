import type { ObjectEntry } from "../entities/object-entry.entity.js";
import type {
  ExecutionReport,
  SyncPlan,
  TaskResult,
} from "../entities/sync-plan.entity.js";

export interface PlanSummary {
  source: string;
  destination: string;
  plan: SyncPlan;
  dryRun: boolean;
}

/** User-facing output of the command layer. */
export interface IReporter {
  planned(summary: PlanSummary): void;
  taskDone(result: TaskResult): void;
  finished(report: ExecutionReport, dryRun: boolean): void;
  listing(entries: ObjectEntry[], label: string): void;
  /** Metadata of one object, for `stat`. */
  object(entry: ObjectEntry, ref: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  debug(message: string): void;
}
