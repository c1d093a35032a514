import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { z } from "zod";
import type {
  ISyncHistoryRepository,
  SyncHistoryEntry,
} from "../../core/domain/repositories/sync-history.repository.js";

const SyncHistoryRowSchema = z.object({
  timestamp: z.string(),
  runId: z.string(),
  source: z.string(),
  destination: z.string(),
  creates: z.number(),
  updates: z.number(),
  deletes: z.number(),
  skipped: z.number(),
  failed: z.number(),
  bytes: z.number(),
});

export class SqliteSyncHistoryRepository implements ISyncHistoryRepository {
  private _db: Database.Database | null = null;

  /** `:memory:` keeps the history in process, for tests. */
  constructor(private dbPath: string) {}

  private getDb(): Database.Database {
    if (this._db) return this._db;
    if (this.dbPath !== ":memory:") {
      mkdirSync(dirname(this.dbPath), { recursive: true });
    }
    this._db = new Database(this.dbPath);
    this._db.pragma("journal_mode = DELETE");
    this._db.pragma("busy_timeout = 5000");
    this._db.exec(`
      CREATE TABLE IF NOT EXISTS tbl_sync_history (
        id          INTEGER PRIMARY KEY AUTOINCREMENT,
        timestamp   TEXT    NOT NULL,
        runId       TEXT    NOT NULL,
        source      TEXT    NOT NULL,
        destination TEXT    NOT NULL,
        creates     INTEGER NOT NULL,
        updates     INTEGER NOT NULL,
        deletes     INTEGER NOT NULL,
        skipped     INTEGER NOT NULL,
        failed      INTEGER NOT NULL,
        bytes       INTEGER NOT NULL
      )
    `);
    return this._db;
  }

  async append(entry: SyncHistoryEntry): Promise<void> {
    this.getDb()
      .prepare(
        `INSERT INTO tbl_sync_history
           (timestamp, runId, source, destination, creates, updates, deletes, skipped, failed, bytes)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        entry.timestamp,
        entry.runId,
        entry.source,
        entry.destination,
        entry.creates,
        entry.updates,
        entry.deletes,
        entry.skipped,
        entry.failed,
        entry.bytes,
      );
  }

  /** Newest first. */
  async latest(limit: number): Promise<SyncHistoryEntry[]> {
    const rows = this.getDb()
      .prepare(
        `SELECT timestamp, runId, source, destination, creates, updates, deletes, skipped, failed, bytes
           FROM tbl_sync_history ORDER BY id DESC LIMIT ?`,
      )
      .all(limit);
    return z.array(SyncHistoryRowSchema).parse(rows);
  }

  close(): void {
    this._db?.close();
    this._db = null;
  }
}
