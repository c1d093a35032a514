export type EntryOrigin = "local" | "remote";

export interface ObjectEntry {
  /** Path relative to the scope root, always "/"-separated. */
  key: string;
  size: number;
  lastModified: Date;
  /** MD5 hex of the content, only when the store exposes a comparable one. */
  contentHash?: string;
  origin: EntryOrigin;
}

export interface LocalScope {
  kind: "local";
  root: string;
}

export interface RemoteScope {
  kind: "remote";
  alias: string;
  bucket: string;
  /** Normalized: no leading or trailing "/". Empty for the whole bucket. */
  prefix: string;
}

export type Scope = LocalScope | RemoteScope;

export function describeScope(scope: Scope): string {
  if (scope.kind === "local") return scope.root;
  return scope.prefix
    ? `${scope.alias}/${scope.bucket}/${scope.prefix}`
    : `${scope.alias}/${scope.bucket}`;
}

/** Byte-lexicographic order on the UTF-8 encoding of the keys. */
export function compareKeys(a: string, b: string): number {
  if (a === b) return 0;
  return Buffer.compare(Buffer.from(a, "utf8"), Buffer.from(b, "utf8"));
}
