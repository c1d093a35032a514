import PQueue from "p-queue";
import {
  planTasks,
  type ExecutionReport,
  type SyncPlan,
  type Task,
  type TaskResult,
} from "../domain/entities/sync-plan.entity.js";
import type { TransferConfig } from "../domain/entities/config.entity.js";
import type {
  IObjectStore,
  MultipartSession,
  UploadedPart,
} from "../domain/services/object-store.service.js";
import type { ILogger } from "../domain/services/logger.service.js";
import type { IReporter } from "../domain/services/reporter.service.js";
import { PartPlanService } from "../domain/services/part-plan.service.js";
import { TransferError, errorMessage } from "../domain/errors.js";
import {
  withRetry,
  type RetryPolicy,
} from "../../infrastructure/utils/retry.utils.js";

/** Single writer for task results; workers only ever append. */
export class ResultAccumulator {
  private results: TaskResult[] = [];

  add(result: TaskResult): void {
    this.results.push(result);
  }

  report(): ExecutionReport {
    const results = [...this.results];
    return {
      results,
      succeeded: results.filter((r) => r.status === "ok").length,
      failed: results.filter((r) => r.status === "failed").length,
      planned: results.filter((r) => r.status === "planned").length,
      bytesTransferred: results.reduce((sum, r) => sum + r.bytes, 0),
    };
  }
}

/** Serializes work per key: a second job for a key waits for the first. */
export class KeyedLock {
  private tails = new Map<string, Promise<unknown>>();

  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const current = previous.then(fn, fn);
    const tail = current.catch(() => undefined);
    this.tails.set(key, tail);
    try {
      return await current;
    } finally {
      if (this.tails.get(key) === tail) this.tails.delete(key);
    }
  }

  get size(): number {
    return this.tails.size;
  }
}

export interface ExecutePlanDeps {
  source: IObjectStore;
  destination: IObjectStore;
  transfer: TransferConfig;
  retry: RetryPolicy;
  logger: ILogger;
  reporter: IReporter;
}

export interface ExecutePlanRequest {
  plan: SyncPlan;
  dryRun: boolean;
  cycle?: number;
}

export class ExecutePlanUseCase {
  private locks = new KeyedLock();

  constructor(private deps: ExecutePlanDeps) {}

  async execute(request: ExecutePlanRequest): Promise<ExecutionReport> {
    const accumulator = new ResultAccumulator();
    const tasks = planTasks(request.plan);

    if (request.dryRun) {
      for (const task of tasks) {
        if (task.kind === "delete") {
          this.deps.logger.log({
            event: "delete",
            cycle: request.cycle,
            key: task.key,
            destination: task.destRef,
            success: true,
            dryRun: true,
          });
        }
        const result: TaskResult = {
          task,
          status: "planned",
          bytes: 0,
          durationMs: 0,
        };
        accumulator.add(result);
        this.deps.reporter.taskDone(result);
      }
      return accumulator.report();
    }

    const queue = new PQueue({ concurrency: this.deps.transfer.concurrency });
    for (const task of tasks) {
      void queue.add(async () => {
        const result = await this.locks.run(task.key, () =>
          this.runTask(task, request.cycle),
        );
        accumulator.add(result);
        this.deps.reporter.taskDone(result);
      });
    }
    await queue.onIdle();
    return accumulator.report();
  }

  /** Never throws: a failed task becomes a failed result. */
  private async runTask(task: Task, cycle?: number): Promise<TaskResult> {
    const started = Date.now();
    try {
      if (task.kind === "delete") {
        await this.call(task.key, "delete", (signal) =>
          this.deps.destination.delete(task.key, { signal }),
        );
        const durationMs = Date.now() - started;
        this.deps.logger.log({
          event: "delete",
          cycle,
          key: task.key,
          destination: task.destRef,
          durationMs,
          success: true,
        });
        return { task, status: "ok", bytes: 0, durationMs };
      }

      const { bytes, parts } = PartPlanService.requiresMultipart(task.size)
        ? await this.multipartCopy(task, cycle)
        : await this.singleCopy(task);
      const durationMs = Date.now() - started;
      this.deps.logger.log({
        event: "transfer",
        cycle,
        key: task.key,
        source: task.sourceRef ?? undefined,
        destination: task.destRef,
        bytes,
        parts,
        durationMs,
        success: true,
      });
      return { task, status: "ok", bytes, parts, durationMs };
    } catch (e) {
      const durationMs = Date.now() - started;
      this.deps.logger.log({
        event: task.kind === "delete" ? "delete" : "transfer",
        cycle,
        key: task.key,
        source: task.sourceRef ?? undefined,
        destination: task.destRef,
        durationMs,
        success: false,
        errorMessage: errorMessage(e),
      });
      return {
        task,
        status: "failed",
        errorMessage: errorMessage(e),
        bytes: 0,
        durationMs,
      };
    }
  }

  private async singleCopy(
    task: Task,
  ): Promise<{ bytes: number; parts?: number }> {
    const body = await this.call(task.key, "get", (signal) =>
      this.deps.source.get(task.sourceKey ?? task.key, { signal }),
    );
    await this.call(task.key, "put", (signal) =>
      this.deps.destination.put(task.key, body, body.length, { signal }),
    );
    return { bytes: body.length };
  }

  /**
   * Chunked upload. Parts go through a sub-pool scoped to this task and are
   * retried one by one; completion is sent only once every part is in.
   * Any part that gives up aborts the session and fails the task.
   */
  private async multipartCopy(
    task: Task,
    cycle?: number,
  ): Promise<{ bytes: number; parts: number }> {
    const { source, destination, transfer } = this.deps;
    const partPlan = PartPlanService.build(task.size, transfer.partSize);
    const sourceKey = task.sourceKey ?? task.key;
    const session = await this.call(task.key, "initiate multipart", (signal) =>
      destination.initiateMultipart(task.key, { signal }),
    );

    const uploaded: UploadedPart[] = [];
    const state: { failed: boolean; error?: unknown } = { failed: false };
    const parts = new PQueue({ concurrency: transfer.partConcurrency });

    try {
      for (const range of partPlan.ranges) {
        void parts.add(async () => {
          if (state.failed) return;
          try {
            const body = await this.call(
              task.key,
              `read part ${range.index}`,
              (signal) =>
                source.readRange(sourceKey, range.start, range.length, {
                  signal,
                }),
            );
            const etag = await this.call(
              task.key,
              `upload part ${range.index}/${partPlan.partCount}`,
              (signal) =>
                destination.uploadPart(session, range.index, body, { signal }),
            );
            uploaded.push({ index: range.index, etag });
          } catch (e) {
            if (!state.failed) {
              state.failed = true;
              state.error = e;
              parts.clear();
            }
          }
        });
      }
      await parts.onIdle();
      if (state.failed) throw state.error;
      if (uploaded.length !== partPlan.partCount) {
        throw new TransferError(
          `Only ${uploaded.length}/${partPlan.partCount} parts uploaded for ${task.key}`,
          task.key,
        );
      }

      uploaded.sort((a, b) => a.index - b.index);
      await this.call(task.key, "complete multipart", (signal) =>
        destination.completeMultipart(session, uploaded, { signal }),
      );
    } catch (e) {
      await this.abort(session, task, cycle);
      throw e;
    }
    return { bytes: task.size, parts: partPlan.partCount };
  }

  private async abort(
    session: MultipartSession,
    task: Task,
    cycle?: number,
  ): Promise<void> {
    try {
      await this.call(task.key, "abort multipart", (signal) =>
        this.deps.destination.abortMultipart(session, { signal }),
      );
      this.deps.logger.log({
        event: "multipart-abort",
        cycle,
        key: task.key,
        destination: task.destRef,
        success: true,
      });
    } catch (e) {
      this.deps.logger.log({
        event: "multipart-abort",
        cycle,
        key: task.key,
        destination: task.destRef,
        success: false,
        errorMessage: errorMessage(e),
      });
      this.deps.reporter.warn(
        `Could not abort upload ${session.uploadId} for ${task.destRef}: ${errorMessage(e)}`,
      );
    }
  }

  /** One network call: its own timeout, retried under the policy. */
  private async call<T>(
    key: string,
    action: string,
    op: (signal: AbortSignal) => Promise<T>,
  ): Promise<T> {
    try {
      return await withRetry(
        () => op(AbortSignal.timeout(this.deps.transfer.requestTimeoutMs)),
        this.deps.retry,
        {
          onRetry: (e, attempt, delayMs) => {
            this.deps.logger.log({
              event: "retry",
              key,
              attempt,
              success: false,
              errorMessage: `${action}: ${errorMessage(e)}`,
            });
            this.deps.reporter.debug(
              `${action} ${key} failed (${errorMessage(e)}), retry ${attempt} in ${delayMs}ms`,
            );
          },
        },
      );
    } catch (e) {
      if (e instanceof TransferError) throw e;
      throw new TransferError(`${action} failed: ${errorMessage(e)}`, key, {
        cause: e,
      });
    }
  }
}
