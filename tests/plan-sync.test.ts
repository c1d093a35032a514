import { describe, it, expect } from "vitest";
import {
  PlanSyncUseCase,
  fingerprintsDiffer,
} from "../src/core/use-cases/plan-sync.use-case.js";
import { FilterChain } from "../src/core/domain/services/filter-chain.service.js";
import { compareKeys, type ObjectEntry } from "../src/core/domain/entities/object-entry.entity.js";
import { isPlanEmpty, planTasks } from "../src/core/domain/entities/sync-plan.entity.js";
import { entry } from "./helpers/tmp.js";

const planner = new PlanSyncUseCase();
const none = FilterChain.empty();
const sorted = (entries: ObjectEntry[]) =>
  [...entries].sort((a, b) => compareKeys(a.key, b.key));

const T0 = new Date("2024-01-01T00:00:00Z");
const T1 = new Date("2024-02-01T00:00:00Z");

describe("fingerprintsDiffer", () => {
  it("uses content hashes when both sides have one", () => {
    const a = entry("k", { contentHash: "aa", lastModified: T1 });
    expect(fingerprintsDiffer(a, entry("k", { contentHash: "aa", lastModified: T0 }))).toBe(false);
    expect(fingerprintsDiffer(a, entry("k", { contentHash: "bb", lastModified: T1 }))).toBe(true);
  });

  it("falls back to size and modification time", () => {
    const src = entry("k", { size: 10, lastModified: T0 });
    expect(fingerprintsDiffer(src, entry("k", { size: 11, lastModified: T1 }))).toBe(true);
    expect(fingerprintsDiffer(src, entry("k", { size: 10, lastModified: T1 }))).toBe(false);
    expect(fingerprintsDiffer(entry("k", { size: 10, lastModified: T1 }), src)).toBe(true);
  });
});

describe("PlanSyncUseCase", () => {
  it("an empty destination makes every source key a create", () => {
    const source = [entry("a.txt"), entry("b.txt"), entry("dir/c.txt")];
    const plan = planner.execute({ source, destination: [], filter: none, options: { remove: false } });
    expect(plan.creates.map((t) => t.key)).toEqual(["a.txt", "b.txt", "dir/c.txt"]);
    expect(plan.updates).toEqual([]);
    expect(plan.deletes).toEqual([]);
    expect(plan.skipped).toBe(0);
  });

  it("identical listings give an empty plan", () => {
    const listing = [
      entry("a", { contentHash: "h1" }),
      entry("b", { contentHash: "h2" }),
    ];
    const plan = planner.execute({
      source: listing,
      destination: listing.map((e) => ({ ...e, origin: "remote" as const })),
      filter: none,
      options: { remove: true },
    });
    expect(isPlanEmpty(plan)).toBe(true);
    expect(plan.skipped).toBe(2);
  });

  it("destination-only keys are skipped without --remove", () => {
    const plan = planner.execute({
      source: [entry("a.txt")],
      destination: [entry("a.txt"), entry("extraneous.txt")],
      filter: none,
      options: { remove: false },
    });
    expect(plan.deletes).toEqual([]);
    expect(plan.skipped).toBe(2);
  });

  it("destination-only keys are deleted with --remove", () => {
    const plan = planner.execute({
      source: [entry("a.txt")],
      destination: [entry("a.txt"), entry("extraneous.txt", { size: 9 })],
      filter: none,
      options: { remove: true },
      describeDestination: (k) => `s3/bkt/${k}`,
    });
    expect(plan.deletes).toEqual([
      { key: "extraneous.txt", sourceRef: null, destRef: "s3/bkt/extraneous.txt", size: 9, kind: "delete" },
    ]);
    expect(plan.skipped).toBe(1);
  });

  it("changed keys become updates with both refs", () => {
    const plan = planner.execute({
      source: [entry("a", { size: 7 })],
      destination: [entry("a", { size: 5 })],
      filter: none,
      options: { remove: false },
      describeSource: (k) => `/src/${k}`,
      describeDestination: (k) => `m/b/${k}`,
    });
    expect(plan.updates).toEqual([
      { key: "a", sourceRef: "/src/a", destRef: "m/b/a", size: 7, kind: "update" },
    ]);
  });

  it("filtered source keys are neither created nor kept from deletion", () => {
    const plan = planner.execute({
      source: [entry("2024/exclude.tmp"), entry("2024/keep.txt")],
      destination: [entry("2024/exclude.tmp")],
      filter: FilterChain.fromOptions({ exclude: ["*.tmp"] }),
      options: { remove: true },
    });
    expect(plan.creates.map((t) => t.key)).toEqual(["2024/keep.txt"]);
    expect(plan.deletes.map((t) => t.key)).toEqual(["2024/exclude.tmp"]);
  });

  it("orders tasks creates, updates, deletes, each by key", () => {
    const plan = planner.execute({
      source: [entry("b", { size: 1 }), entry("c"), entry("e")],
      destination: [entry("a"), entry("b", { size: 2 }), entry("d")],
      filter: none,
      options: { remove: true },
    });
    expect(planTasks(plan).map((t) => `${t.kind}:${t.key}`)).toEqual([
      "create:c",
      "create:e",
      "update:b",
      "delete:a",
      "delete:d",
    ]);
  });

  it("is deterministic over any input order once sorted", () => {
    const keys = ["z", "a", "m/1", "m/0", "é", "B"];
    const source = keys.map((k, i) => entry(k, { size: i }));
    const destination = [entry("a", { size: 99 }), entry("q")];
    const first = planner.execute({
      source: sorted(source),
      destination: sorted(destination),
      filter: none,
      options: { remove: true },
    });
    const second = planner.execute({
      source: sorted([...source].reverse()),
      destination: sorted([...destination].reverse()),
      filter: none,
      options: { remove: true },
    });
    expect(second).toEqual(first);
    expect(first.creates.map((t) => t.key)).toEqual(["B", "m/0", "m/1", "z", "é"]);
  });

  it("refuses unsorted input", () => {
    expect(() =>
      planner.execute({
        source: [entry("b"), entry("a")],
        destination: [],
        filter: none,
        options: { remove: false },
      }),
    ).toThrow(/not strictly sorted/);
  });
});
