import { createWriteStream, mkdirSync, existsSync, type WriteStream } from "node:fs";
import { join } from "node:path";
import type {
  ILogger,
  LogEntry,
} from "../../core/domain/services/logger.service.js";

export class JsonLogger implements ILogger {
  private logStream: WriteStream | null = null;
  private runId = "";
  private path: string | null = null;

  constructor(
    private logDir: string,
    private logNameTemplate: string,
  ) {}

  init(runId: string): void {
    if (!existsSync(this.logDir)) mkdirSync(this.logDir, { recursive: true });
    const filename =
      this.logNameTemplate.replace(/\.[^.]+$/, "") + `_${runId}.jsonl`;
    this.path = join(this.logDir, filename);
    this.runId = runId;
    this.logStream = createWriteStream(this.path, { flags: "a" });
  }

  get logPath(): string | null {
    return this.path;
  }

  log(entry: Omit<LogEntry, "runId">): void {
    if (this.logStream?.writable) {
      const full = {
        ...entry,
        runId: this.runId,
        timestamp: new Date().toISOString(),
      };
      this.logStream.write(JSON.stringify(full) + "\n");
    }
  }

  close(): Promise<void> {
    const stream = this.logStream;
    this.logStream = null;
    if (!stream) return Promise.resolve();
    return new Promise((resolve) => stream.end(resolve));
  }
}
