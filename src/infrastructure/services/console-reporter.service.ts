import type { ObjectEntry } from "../../core/domain/entities/object-entry.entity.js";
import type {
  ExecutionReport,
  TaskResult,
} from "../../core/domain/entities/sync-plan.entity.js";
import type {
  IReporter,
  PlanSummary,
} from "../../core/domain/services/reporter.service.js";

export interface ConsoleReporterOptions {
  json?: boolean;
  debug?: boolean;
  out?: (line: string) => void;
  err?: (line: string) => void;
}

export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  const units = ["KiB", "MiB", "GiB", "TiB"];
  let value = bytes / 1024;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }
  return `${value.toFixed(1)} ${units[unit]}`;
}

/** Human readable lines on stdout, or one JSON object per line with --json. */
export class ConsoleReporter implements IReporter {
  private json: boolean;
  private verbose: boolean;
  private out: (line: string) => void;
  private err: (line: string) => void;

  constructor(options: ConsoleReporterOptions = {}) {
    this.json = options.json ?? false;
    this.verbose = options.debug ?? false;
    this.out = options.out ?? ((line) => process.stdout.write(line + "\n"));
    this.err = options.err ?? ((line) => process.stderr.write(line + "\n"));
  }

  private emit(type: string, payload: Record<string, unknown>): void {
    this.out(JSON.stringify({ type, ...payload }));
  }

  planned({ source, destination, plan, dryRun }: PlanSummary): void {
    const counts = {
      creates: plan.creates.length,
      updates: plan.updates.length,
      deletes: plan.deletes.length,
      skipped: plan.skipped,
    };
    if (this.json) {
      this.emit("plan", { source, destination, ...counts, dryRun });
      return;
    }
    this.out(`Plan: ${source} -> ${destination}`);
    this.out(
      `  creates: ${counts.creates}, updates: ${counts.updates}, deletes: ${counts.deletes}, skipped: ${counts.skipped}`,
    );
    this.out(`  dry-run: ${dryRun}`);
  }

  taskDone(result: TaskResult): void {
    const { task } = result;
    if (this.json) {
      this.emit("task", {
        kind: task.kind,
        key: task.key,
        source: task.sourceRef,
        destination: task.destRef,
        status: result.status,
        bytes: result.bytes,
        parts: result.parts,
        durationMs: result.durationMs,
        error: result.errorMessage,
      });
      return;
    }
    const target =
      task.kind === "delete"
        ? task.destRef
        : `${task.sourceRef} -> ${task.destRef}`;
    if (result.status === "failed") {
      this.err(`[failed] ${task.kind} ${target}: ${result.errorMessage}`);
      return;
    }
    const tag = result.status === "planned" ? "dry-run" : "ok";
    const size =
      task.kind === "delete"
        ? ""
        : ` (${formatBytes(task.size)}${result.parts ? `, ${result.parts} parts` : ""})`;
    this.out(`[${tag}] ${task.kind} ${target}${size}`);
  }

  finished(report: ExecutionReport, dryRun: boolean): void {
    const total = report.results.length;
    const status = report.failed > 0 ? "failed" : "ok";
    if (this.json) {
      this.emit("summary", {
        status,
        total,
        succeeded: report.succeeded,
        failed: report.failed,
        planned: report.planned,
        bytes: report.bytesTransferred,
        dryRun,
      });
      return;
    }
    if (dryRun) {
      this.out(`status: ok (dry-run, ${report.planned} task(s) planned)`);
    } else if (report.failed > 0) {
      this.out(
        `status: failed (${report.failed} of ${total} task(s) failed, ${report.succeeded} succeeded, ${formatBytes(report.bytesTransferred)} transferred)`,
      );
    } else {
      this.out(
        `status: ok (${report.succeeded} task(s), ${formatBytes(report.bytesTransferred)} transferred)`,
      );
    }
  }

  listing(entries: ObjectEntry[], label: string): void {
    if (this.json) {
      for (const e of entries) {
        this.emit("object", {
          key: e.key,
          size: e.size,
          lastModified: e.lastModified.toISOString(),
          hash: e.contentHash,
        });
      }
      return;
    }
    for (const e of entries) {
      this.out(
        `[${e.lastModified.toISOString()}] ${formatBytes(e.size).padStart(10)} ${e.key}`,
      );
    }
    this.out(`${entries.length} object(s) in ${label}`);
  }

  object(entry: ObjectEntry, ref: string): void {
    if (this.json) {
      this.emit("stat", {
        name: ref,
        key: entry.key,
        size: entry.size,
        lastModified: entry.lastModified.toISOString(),
        hash: entry.contentHash,
      });
      return;
    }
    this.out(`Name:     ${ref}`);
    this.out(`Size:     ${formatBytes(entry.size)} (${entry.size} bytes)`);
    this.out(`Modified: ${entry.lastModified.toISOString()}`);
    if (entry.contentHash) this.out(`MD5:      ${entry.contentHash}`);
  }

  info(message: string): void {
    if (this.json) this.emit("info", { message });
    else this.out(message);
  }

  warn(message: string): void {
    if (this.json) this.emit("warn", { message });
    else this.err(`warning: ${message}`);
  }

  error(message: string): void {
    if (this.json) this.emit("error", { message });
    else this.err(`error: ${message}`);
  }

  debug(message: string): void {
    if (!this.verbose) return;
    if (this.json) this.emit("debug", { message });
    else this.err(`[debug] ${message}`);
  }
}
