import { describe, it, expect, afterEach } from "vitest";
import { writeFileSync } from "node:fs";
import { join, resolve } from "node:path";
import {
  WATCH_INTERVAL_ENV,
  buildSyncOptions,
  loadConfig,
  parseConfig,
  substituteEnv,
} from "../src/infrastructure/utils/config.utils.js";
import {
  classifyCopyDestination,
  classifyObjectTarget,
  classifyTarget,
  joinKey,
  normalizePrefix,
  parseTarget,
  relativeKey,
} from "../src/infrastructure/utils/target.utils.js";
import { ConfigurationError } from "../src/core/domain/errors.js";
import { makeTmpDir, rmTmpDir } from "./helpers/tmp.js";

const MiB = 1024 * 1024;
const alias = {
  endpoint: "http://127.0.0.1:9000",
  accessKey: "${TEST_ACCESS}",
  secretKey: "${TEST_SECRET}",
};

describe("parseConfig", () => {
  it("fills every default from an empty document", () => {
    const config = parseConfig({}, {});
    expect(config).toEqual({
      aliases: {},
      transfer: { concurrency: 4, partConcurrency: 4, partSize: 8 * MiB, requestTimeoutMs: 60_000 },
      retry: { maxAttempts: 4, backoffBaseMs: 500, backoffMaxMs: 10_000 },
      watch: { intervalSec: 30 },
      logging: { dir: "output/logs", transferLog: "transfers.jsonl" },
      history: { enabled: true, path: "output/sync-history.db" },
    });
  });

  it("substitutes ${VAR} values from the environment", () => {
    const config = parseConfig(
      { aliases: { minio: alias } },
      { TEST_ACCESS: "test-access-key", TEST_SECRET: "test-secret" },
    );
    expect(config.aliases.minio).toEqual({
      endpoint: "http://127.0.0.1:9000",
      accessKey: "test-access-key",
      secretKey: "test-secret",
      region: "us-east-1",
      pathStyle: true,
    });
  });

  it("overrides the watch interval from the environment", () => {
    const config = parseConfig({ watch: { intervalSec: 30 } }, { [WATCH_INTERVAL_ENV]: "5" });
    expect(config.watch.intervalSec).toBe(5);
  });

  it("rejects a non-numeric watch interval override", () => {
    expect(() => parseConfig({}, { [WATCH_INTERVAL_ENV]: "soon" })).toThrow(
      ConfigurationError,
    );
    expect(() => parseConfig({}, { [WATCH_INTERVAL_ENV]: "-1" })).toThrow(
      /must be greater than zero/,
    );
  });

  it("names each invalid field", () => {
    expect(() =>
      parseConfig({ transfer: { partSize: 1024, concurrency: 0 } }, {}, "cfg.yaml"),
    ).toThrow(
      "Invalid config at cfg.yaml. transfer.concurrency: Number must be greater than or equal to 1; transfer.partSize: partSize must be at least 5 MiB.",
    );
  });

  it("rejects an alias without an endpoint URL", () => {
    expect(() =>
      parseConfig({ aliases: { bad: { ...alias, endpoint: "nope" } } }, {}),
    ).toThrow(/aliases\.bad\.endpoint: endpoint must be a URL/);
  });
});

describe("substituteEnv", () => {
  it("walks nested objects and arrays and leaves unknown variables alone", () => {
    expect(substituteEnv({ a: ["${X}", "plain"], b: { c: "${MISSING}" }, n: 3 }, { X: "x" })).toEqual({
      a: ["x", "plain"],
      b: { c: "${MISSING}" },
      n: 3,
    });
  });
});

describe("loadConfig", () => {
  let dir: string | undefined;
  afterEach(() => {
    if (dir) rmTmpDir(dir);
    dir = undefined;
  });

  it("reads a YAML file", () => {
    dir = makeTmpDir("cfg");
    const path = join(dir, "config.yaml");
    writeFileSync(
      path,
      [
        "aliases:",
        "  minio:",
        "    endpoint: http://127.0.0.1:9000",
        "    accessKey: ${TEST_ACCESS}",
        "    secretKey: plain-secret",
        "transfer:",
        "  concurrency: 8",
        "history:",
        "  enabled: false",
      ].join("\n"),
    );
    const config = loadConfig(path, { TEST_ACCESS: "test-access-key" });
    expect(config.aliases.minio.accessKey).toBe("test-access-key");
    expect(config.transfer.concurrency).toBe(8);
    expect(config.transfer.partConcurrency).toBe(4);
    expect(config.history.enabled).toBe(false);
  });

  it("treats an empty file as all defaults", () => {
    dir = makeTmpDir("cfg");
    const path = join(dir, "config.yaml");
    writeFileSync(path, "");
    expect(loadConfig(path, {}).watch.intervalSec).toBe(30);
  });

  it("fails on an explicit path that does not exist", () => {
    dir = makeTmpDir("cfg");
    expect(() => loadConfig(join(dir ?? "", "absent.yaml"), {})).toThrow(
      /Config file not found/,
    );
  });

  it("fails on invalid YAML and on a scalar document", () => {
    dir = makeTmpDir("cfg");
    const broken = join(dir, "broken.yaml");
    writeFileSync(broken, "aliases: [unclosed");
    expect(() => loadConfig(broken, {})).toThrow(/Invalid YAML/);
    const scalar = join(dir, "scalar.yaml");
    writeFileSync(scalar, "42");
    expect(() => loadConfig(scalar, {})).toThrow(/must be a YAML object/);
  });
});

describe("buildSyncOptions", () => {
  it("defaults every flag", () => {
    expect(buildSyncOptions({})).toEqual({
      options: {
        dryRun: false,
        remove: false,
        watch: false,
        exclude: [],
        olderThanMs: undefined,
        newerThanMs: undefined,
        overwrite: false,
      },
      concurrency: undefined,
    });
  });

  it("parses durations and the concurrency override", () => {
    const { options, concurrency } = buildSyncOptions({
      olderThan: "1d",
      newerThan: "2w",
      concurrency: "8",
      exclude: ["*.tmp"],
    });
    expect(options.olderThanMs).toBe(86_400_000);
    expect(options.newerThanMs).toBe(14 * 86_400_000);
    expect(options.exclude).toEqual(["*.tmp"]);
    expect(concurrency).toBe(8);
  });

  it("rejects a malformed glob", () => {
    expect(() => buildSyncOptions({ exclude: ["[abc"] })).toThrow(ConfigurationError);
  });

  it("rejects an empty age window", () => {
    expect(() => buildSyncOptions({ olderThan: "7d", newerThan: "7d" })).toThrow(ConfigurationError);
  });
});

describe("targets", () => {
  const aliases = { minio: {}, r2: {} };

  it("splits alias, bucket and key", () => {
    expect(parseTarget("minio/photos/2024/raw")).toEqual({
      alias: "minio",
      bucket: "photos",
      key: "2024/raw",
    });
    expect(parseTarget("minio/photos")).toEqual({ alias: "minio", bucket: "photos", key: undefined });
  });

  it("classifies configured aliases as remote", () => {
    expect(classifyTarget("minio/photos/2024/", aliases)).toEqual({
      kind: "remote",
      alias: "minio",
      bucket: "photos",
      prefix: "2024",
    });
    expect(classifyTarget("r2/archive", aliases)).toEqual({
      kind: "remote",
      alias: "r2",
      bucket: "archive",
      prefix: "",
    });
  });

  it("treats anything else as a local path", () => {
    expect(classifyTarget("./data/in", aliases)).toEqual({ kind: "local", root: resolve("data/in") });
    expect(classifyTarget("other/bucket", aliases)).toEqual({
      kind: "local",
      root: resolve("other/bucket"),
    });
    expect(classifyTarget("constructor/x", aliases).kind).toBe("local");
  });

  it("requires a bucket after an alias, and a non-empty target", () => {
    expect(() => classifyTarget("minio", aliases)).toThrow(/no bucket/);
    expect(() => classifyTarget("minio/", aliases)).toThrow(/no bucket/);
    expect(() => classifyTarget("  ", aliases)).toThrow(ConfigurationError);
  });

  it("splits a single-object target into its parent scope and name", () => {
    expect(classifyObjectTarget("minio/photos/2024/a.jpg", aliases)).toEqual({
      scope: { kind: "remote", alias: "minio", bucket: "photos", prefix: "2024" },
      key: "a.jpg",
    });
    expect(classifyObjectTarget("minio/photos/a.jpg", aliases)).toEqual({
      scope: { kind: "remote", alias: "minio", bucket: "photos", prefix: "" },
      key: "a.jpg",
    });
    expect(classifyObjectTarget("minio/photos/2024/", aliases)).toEqual({
      scope: { kind: "remote", alias: "minio", bucket: "photos", prefix: "2024" },
      key: "",
    });
    expect(classifyObjectTarget("./data/in/x.txt", aliases)).toEqual({
      scope: { kind: "local", root: resolve("data/in") },
      key: "x.txt",
    });
  });

  it("puts a copy into a directory under its source name", () => {
    const dir = makeTmpDir("copy-dest");
    try {
      writeFileSync(join(dir, "file.txt"), "x");
      expect(classifyCopyDestination("r2/archive", "a.jpg", aliases)).toEqual({
        scope: { kind: "remote", alias: "r2", bucket: "archive", prefix: "" },
        key: "a.jpg",
      });
      expect(classifyCopyDestination(dir, "a.jpg", aliases)).toEqual({
        scope: { kind: "local", root: dir },
        key: "a.jpg",
      });
      expect(classifyCopyDestination(join(dir, "renamed.jpg"), "a.jpg", aliases)).toEqual({
        scope: { kind: "local", root: dir },
        key: "renamed.jpg",
      });
      expect(classifyCopyDestination(join(dir, "file.txt"), "a.jpg", aliases).key).toBe(
        "file.txt",
      );
    } finally {
      rmTmpDir(dir);
    }
  });

  it("joins and strips prefixes", () => {
    expect(normalizePrefix("/a/b/")).toBe("a/b");
    expect(joinKey("", "x.txt")).toBe("x.txt");
    expect(joinKey("a/b", "x.txt")).toBe("a/b/x.txt");
    expect(relativeKey("a/b", "a/b/x.txt")).toBe("x.txt");
    expect(relativeKey("a/b", "a/bc/x.txt")).toBeNull();
    expect(relativeKey("a/b", "a/b/")).toBeNull();
    expect(relativeKey("", "x.txt")).toBe("x.txt");
  });
});
