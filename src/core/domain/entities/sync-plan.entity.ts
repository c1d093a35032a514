export type TaskKind = "create" | "update" | "delete";

export interface Task {
  /** Destination key. */
  key: string;
  /** Source key, when it differs from the destination key (cp, mv). */
  sourceKey?: string;
  /** Null for deletes. */
  sourceRef: string | null;
  destRef: string;
  size: number;
  kind: TaskKind;
}

export interface SyncPlan {
  creates: Task[];
  updates: Task[];
  deletes: Task[];
  /** Keys left alone: unchanged, or destination-only without --remove. */
  skipped: number;
}

/** Objects strictly larger than this go through a multipart upload. */
export const MULTIPART_THRESHOLD = 16 * 1024 * 1024;

export interface PartRange {
  /** 1-based, as S3 part numbers are. */
  index: number;
  start: number;
  length: number;
}

export interface PartPlan {
  partSize: number;
  partCount: number;
  ranges: PartRange[];
}

export type TaskStatus = "ok" | "failed" | "planned";

export interface TaskResult {
  task: Task;
  status: TaskStatus;
  errorMessage?: string;
  /** Number of parts uploaded, multipart tasks only. */
  parts?: number;
  bytes: number;
  durationMs: number;
}

export interface ExecutionReport {
  results: TaskResult[];
  succeeded: number;
  failed: number;
  planned: number;
  bytesTransferred: number;
}

export function planTasks(plan: SyncPlan): Task[] {
  return [...plan.creates, ...plan.updates, ...plan.deletes];
}

export function isPlanEmpty(plan: SyncPlan): boolean {
  return (
    plan.creates.length === 0 &&
    plan.updates.length === 0 &&
    plan.deletes.length === 0
  );
}
