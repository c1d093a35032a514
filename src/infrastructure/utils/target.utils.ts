import { existsSync, statSync } from "node:fs";
import { basename, dirname, join, resolve } from "node:path";
import type { Scope } from "../../core/domain/entities/object-entry.entity.js";
import { ConfigurationError } from "../../core/domain/errors.js";

export interface ParsedTarget {
  alias: string;
  bucket?: string;
  key?: string;
}

/** `alias/bucket/some/prefix` → `{ alias, bucket, key: "some/prefix" }`. */
export function parseTarget(input: string): ParsedTarget {
  const [alias, bucket, ...rest] = input.split("/");
  if (!alias) {
    throw new ConfigurationError(`Target "${input}" must start with an alias.`);
  }
  return {
    alias,
    bucket: bucket || undefined,
    key: rest.length > 0 ? rest.join("/") : undefined,
  };
}

export function normalizePrefix(prefix: string | undefined): string {
  return (prefix ?? "").replace(/^\/+|\/+$/g, "");
}

/**
 * A target whose first segment names a configured alias is remote; anything
 * else is a local path, resolved against the working directory.
 */
export function classifyTarget(
  input: string,
  aliases: Record<string, unknown>,
): Scope {
  if (!input.trim()) {
    throw new ConfigurationError("Target must not be empty.");
  }
  const firstSegment = input.split("/")[0];
  if (firstSegment && Object.hasOwn(aliases, firstSegment)) {
    const parsed = parseTarget(input);
    if (!parsed.bucket) {
      throw new ConfigurationError(
        `Target "${input}" names alias "${parsed.alias}" but no bucket.`,
      );
    }
    return {
      kind: "remote",
      alias: parsed.alias,
      bucket: parsed.bucket,
      prefix: normalizePrefix(parsed.key),
    };
  }
  return { kind: "local", root: resolve(input) };
}

/**
 * A local source must be an existing directory: a missing one would list as
 * an empty tree and plan every destination object as a delete.
 */
export function assertLocalSource(input: string, scope: Scope): void {
  if (scope.kind !== "local") return;
  if (!existsSync(scope.root)) {
    const [first] = input.split("/");
    const hint =
      first && input.includes("/")
        ? ` (no alias named "${first}" is configured)`
        : "";
    throw new ConfigurationError(`Source ${scope.root} does not exist${hint}.`);
  }
  if (!statSync(scope.root).isDirectory()) {
    throw new ConfigurationError(`Source ${scope.root} is not a directory.`);
  }
}

export interface ObjectTarget {
  /** Scope of the object's parent directory or prefix. */
  scope: Scope;
  /** Object name inside `scope`; empty when the target ends in "/" or names a bucket. */
  key: string;
}

/**
 * Single-object form of classifyTarget, for cp, mv, rm, stat and cat:
 * `minio/photos/2024/a.jpg` is key `a.jpg` under prefix `2024`.
 */
export function classifyObjectTarget(
  input: string,
  aliases: Record<string, unknown>,
): ObjectTarget {
  const scope = classifyTarget(input, aliases);
  const isDir = /[\\/]$/.test(input);
  if (scope.kind === "local") {
    if (isDir) return { scope, key: "" };
    return {
      scope: { kind: "local", root: dirname(scope.root) },
      key: basename(scope.root),
    };
  }
  if (isDir) return { scope, key: "" };
  const cut = scope.prefix.lastIndexOf("/");
  return {
    scope: { ...scope, prefix: cut < 0 ? "" : scope.prefix.slice(0, cut) },
    key: scope.prefix.slice(cut + 1),
  };
}

/**
 * Where a copy lands: a target ending in "/", a bare bucket or an existing
 * local directory receives the object under its source name.
 */
export function classifyCopyDestination(
  input: string,
  sourceKey: string,
  aliases: Record<string, unknown>,
): ObjectTarget {
  const target = classifyObjectTarget(input, aliases);
  if (!target.key) return { scope: target.scope, key: sourceKey };
  if (target.scope.kind === "local") {
    const path = join(target.scope.root, target.key);
    if (existsSync(path) && statSync(path).isDirectory()) {
      return { scope: { kind: "local", root: path }, key: sourceKey };
    }
  }
  return target;
}

/** Places a relative key under a (normalized) prefix. */
export function joinKey(prefix: string, key: string): string {
  if (!prefix) return key;
  if (!key) return prefix;
  return `${prefix}/${key}`;
}

/**
 * Inverse of joinKey for listings: returns the key relative to `prefix`, or
 * null when the object does not live strictly below it.
 */
export function relativeKey(prefix: string, objectKey: string): string | null {
  if (!prefix) return objectKey || null;
  const head = `${prefix}/`;
  if (!objectKey.startsWith(head)) return null;
  const rest = objectKey.slice(head.length);
  return rest || null;
}
