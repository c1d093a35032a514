import { mkdtempSync, mkdirSync, rmSync, utimesSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import type { ObjectEntry } from "../../src/core/domain/entities/object-entry.entity.js";

export function makeTmpDir(label = "tree"): string {
  return mkdtempSync(join(tmpdir(), `bucketsync-test-${label}-`));
}

export function rmTmpDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/** Writes `files` (relative "/"-keys) under `root`, optionally backdating them. */
export function writeTree(
  root: string,
  files: Record<string, string | Buffer>,
  mtime?: Date,
): void {
  for (const [key, content] of Object.entries(files)) {
    const path = join(root, ...key.split("/"));
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, content);
    if (mtime) utimesSync(path, mtime, mtime);
  }
}

export function entry(
  key: string,
  overrides: Partial<Omit<ObjectEntry, "key">> = {},
): ObjectEntry {
  return {
    key,
    size: 5,
    lastModified: new Date("2024-01-01T00:00:00Z"),
    origin: "local",
    ...overrides,
  };
}

/** Deterministic, non-repeating filler so part boundaries are observable. */
export function patternedBuffer(size: number): Buffer {
  const buf = Buffer.alloc(size);
  for (let i = 0; i < size; i++) buf[i] = (i * 31 + (i >> 12)) & 0xff;
  return buf;
}
