import { createHash, randomUUID } from "node:crypto";
import { existsSync, type Stats } from "node:fs";
import {
  lstat,
  mkdir,
  mkdtemp,
  open,
  readFile,
  readdir,
  rename,
  rm,
  writeFile,
} from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join, relative, resolve, sep } from "node:path";
import type { ObjectEntry } from "../../core/domain/entities/object-entry.entity.js";
import { MULTIPART_THRESHOLD } from "../../core/domain/entities/sync-plan.entity.js";
import type {
  CallOptions,
  IObjectStore,
  MultipartSession,
  ObjectPage,
  UploadedPart,
} from "../../core/domain/services/object-store.service.js";

export interface LocalObjectStoreOptions {
  /** Called for every symbolic link the walk leaves out. */
  onSkip?: (path: string, reason: string) => void;
}

function hasCode(e: unknown, code: string): boolean {
  return typeof e === "object" && e !== null && "code" in e && e.code === code;
}

export function md5(body: Buffer): string {
  return createHash("md5").update(body).digest("hex");
}

/**
 * A local directory seen as an object store. Symbolic links are never
 * followed and never listed. Files up to the multipart threshold carry an
 * MD5 content hash, comparable with single-part S3 ETags.
 */
export class LocalObjectStore implements IObjectStore {
  readonly origin = "local" as const;
  readonly label: string;
  private readonly root: string;
  private sessions = new Map<string, string>();

  constructor(
    root: string,
    private options: LocalObjectStoreOptions = {},
  ) {
    this.root = resolve(root);
    this.label = this.root;
  }

  describe(key: string): string {
    return join(this.root, ...key.split("/"));
  }

  private pathFor(key: string): string {
    const path = this.describe(key);
    if (!path.startsWith(this.root + sep)) {
      throw new Error(`Key "${key}" resolves outside ${this.root}`);
    }
    return path;
  }

  async listPage(_token?: string, _options?: CallOptions): Promise<ObjectPage> {
    if (!existsSync(this.root)) return { entries: [] };
    const entries: ObjectEntry[] = [];
    await this.walk(this.root, entries);
    return { entries };
  }

  private async walk(dir: string, out: ObjectEntry[]): Promise<void> {
    const dirents = await readdir(dir, { withFileTypes: true });
    for (const dirent of dirents) {
      const full = join(dir, dirent.name);
      if (dirent.isSymbolicLink()) {
        this.options.onSkip?.(full, "symbolic link");
        continue;
      }
      if (dirent.isDirectory()) {
        await this.walk(full, out);
      } else if (dirent.isFile()) {
        const key = relative(this.root, full).split(sep).join("/");
        const entry = await this.entryFor(key, full);
        if (entry) out.push(entry);
      }
    }
  }

  private async entryFor(key: string, path: string): Promise<ObjectEntry | null> {
    let stats: Stats;
    try {
      stats = await lstat(path);
    } catch (e) {
      // Removed between readdir and lstat
      if (hasCode(e, "ENOENT")) return null;
      throw e;
    }
    if (!stats.isFile()) return null;
    const entry: ObjectEntry = {
      key,
      size: stats.size,
      lastModified: stats.mtime,
      origin: "local",
    };
    if (stats.size <= MULTIPART_THRESHOLD) {
      entry.contentHash = md5(await readFile(path));
    }
    return entry;
  }

  async stat(key: string): Promise<ObjectEntry | null> {
    return this.entryFor(key, this.pathFor(key));
  }

  async put(key: string, body: Buffer, _size: number): Promise<void> {
    const path = this.pathFor(key);
    await mkdir(dirname(path), { recursive: true });
    const tmp = `${path}.bucketsync-${randomUUID()}`;
    await writeFile(tmp, body);
    await rename(tmp, path);
  }

  async get(key: string): Promise<Buffer> {
    return readFile(this.pathFor(key));
  }

  async readRange(key: string, start: number, length: number): Promise<Buffer> {
    const handle = await open(this.pathFor(key), "r");
    try {
      const buffer = Buffer.alloc(length);
      let offset = 0;
      while (offset < length) {
        const { bytesRead } = await handle.read(
          buffer,
          offset,
          length - offset,
          start + offset,
        );
        if (bytesRead === 0) {
          throw new Error(
            `Short read on ${key}: wanted ${length} bytes at ${start}, got ${offset}`,
          );
        }
        offset += bytesRead;
      }
      return buffer;
    } finally {
      await handle.close();
    }
  }

  async initiateMultipart(key: string): Promise<MultipartSession> {
    this.pathFor(key);
    const uploadId = randomUUID();
    const dir = await mkdtemp(join(tmpdir(), "bucketsync-mpu-"));
    this.sessions.set(uploadId, dir);
    return { key, uploadId };
  }

  private sessionDir(session: MultipartSession): string {
    const dir = this.sessions.get(session.uploadId);
    if (!dir) throw new Error(`Unknown upload ${session.uploadId}`);
    return dir;
  }

  async uploadPart(
    session: MultipartSession,
    index: number,
    body: Buffer,
  ): Promise<string> {
    await writeFile(join(this.sessionDir(session), String(index)), body);
    return md5(body);
  }

  /** Concatenates the staged parts in index order, then moves the result in place. */
  async completeMultipart(
    session: MultipartSession,
    parts: UploadedPart[],
  ): Promise<void> {
    const dir = this.sessionDir(session);
    const path = this.pathFor(session.key);
    await mkdir(dirname(path), { recursive: true });
    const tmp = `${path}.bucketsync-${session.uploadId}`;
    const ordered = [...parts].sort((a, b) => a.index - b.index);
    const handle = await open(tmp, "w");
    try {
      for (const part of ordered) {
        const body = await readFile(join(dir, String(part.index)));
        if (md5(body) !== part.etag) {
          throw new Error(`Part ${part.index} of ${session.key} does not match its ETag`);
        }
        await handle.write(body);
      }
    } finally {
      await handle.close();
    }
    await rename(tmp, path);
    await rm(dir, { recursive: true, force: true });
    this.sessions.delete(session.uploadId);
  }

  async abortMultipart(session: MultipartSession): Promise<void> {
    const dir = this.sessions.get(session.uploadId);
    if (dir) await rm(dir, { recursive: true, force: true });
    await rm(`${this.pathFor(session.key)}.bucketsync-${session.uploadId}`, {
      force: true,
    });
    this.sessions.delete(session.uploadId);
  }

  async delete(key: string): Promise<void> {
    await rm(this.pathFor(key), { force: true });
  }
}
