export interface AliasConfig {
  endpoint: string;
  accessKey: string;
  secretKey: string;
  region: string;
  pathStyle: boolean;
}

export interface TransferConfig {
  /** Worker pool size for tasks. */
  concurrency: number;
  /** Sub-pool size for the parts of one multipart task. */
  partConcurrency: number;
  partSize: number;
  requestTimeoutMs: number;
}

export interface RetryConfig {
  maxAttempts: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
}

export interface WatchConfig {
  intervalSec: number;
}

export interface LoggingConfig {
  dir: string;
  transferLog: string;
}

export interface HistoryConfig {
  enabled: boolean;
  path: string;
}

export interface Config {
  aliases: Record<string, AliasConfig>;
  transfer: TransferConfig;
  retry: RetryConfig;
  watch: WatchConfig;
  logging: LoggingConfig;
  history: HistoryConfig;
}

/** Flags of one sync invocation, fixed before any listing begins. */
export interface SyncOptions {
  dryRun: boolean;
  remove: boolean;
  watch: boolean;
  exclude: string[];
  olderThanMs?: number;
  newerThanMs?: number;
  /** Accepted for compatibility; overwriting changed objects is the default. */
  overwrite: boolean;
}
