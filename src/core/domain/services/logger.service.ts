export type LogEvent =
  | "cycle-start"
  | "cycle-end"
  | "cycle-error"
  | "transfer"
  | "delete"
  | "multipart-abort"
  | "retry";

export interface LogEntry {
  runId: string;
  event: LogEvent;
  cycle?: number;
  key?: string;
  source?: string;
  destination?: string;
  bytes?: number;
  parts?: number;
  attempt?: number;
  durationMs?: number;
  success: boolean;
  dryRun?: boolean;
  errorMessage?: string;
}

/** JSON-lines event log, one file per run. */
export interface ILogger {
  init(runId: string): void;
  log(entry: Omit<LogEntry, "runId">): void;
  close(): void | Promise<void>;
}
