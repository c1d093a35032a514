import type {
  EntryOrigin,
  ObjectEntry,
} from "../entities/object-entry.entity.js";

export interface ObjectPage {
  entries: ObjectEntry[];
  /** Present when another page must be requested. */
  nextToken?: string;
}

/** Chunked-upload session; lives only inside the task that opened it. */
export interface MultipartSession {
  key: string;
  uploadId: string;
}

export interface UploadedPart {
  index: number;
  etag: string;
}

/** Per-call options. `signal` carries the request timeout. */
export interface CallOptions {
  signal?: AbortSignal;
}

/**
 * Object store bound to one scope (a local directory or a bucket prefix).
 * Every key is relative to that scope.
 */
export interface IObjectStore {
  readonly origin: EntryOrigin;
  /** Human readable scope, e.g. `s3://photos/2024` or `/tmp/out`. */
  readonly label: string;
  describe(key: string): string;

  listPage(token?: string, options?: CallOptions): Promise<ObjectPage>;
  stat(key: string, options?: CallOptions): Promise<ObjectEntry | null>;

  put(
    key: string,
    body: Buffer,
    size: number,
    options?: CallOptions,
  ): Promise<void>;
  get(key: string, options?: CallOptions): Promise<Buffer>;
  readRange(
    key: string,
    start: number,
    length: number,
    options?: CallOptions,
  ): Promise<Buffer>;

  initiateMultipart(
    key: string,
    options?: CallOptions,
  ): Promise<MultipartSession>;
  uploadPart(
    session: MultipartSession,
    index: number,
    body: Buffer,
    options?: CallOptions,
  ): Promise<string>;
  completeMultipart(
    session: MultipartSession,
    parts: UploadedPart[],
    options?: CallOptions,
  ): Promise<void>;
  abortMultipart(
    session: MultipartSession,
    options?: CallOptions,
  ): Promise<void>;

  delete(key: string, options?: CallOptions): Promise<void>;
}
