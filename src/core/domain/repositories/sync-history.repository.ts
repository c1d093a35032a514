export interface SyncHistoryEntry {
  timestamp: string;
  runId: string;
  source: string;
  destination: string;
  creates: number;
  updates: number;
  deletes: number;
  skipped: number;
  failed: number;
  bytes: number;
}

export interface ISyncHistoryRepository {
  append(entry: SyncHistoryEntry): Promise<void>;
  latest(limit: number): Promise<SyncHistoryEntry[]>;
  close(): void;
}
