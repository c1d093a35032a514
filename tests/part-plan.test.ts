import { describe, it, expect } from "vitest";
import { MAX_PARTS, PartPlanService } from "../src/core/domain/services/part-plan.service.js";
import { MULTIPART_THRESHOLD } from "../src/core/domain/entities/sync-plan.entity.js";

const MiB = 1024 * 1024;

describe("PartPlanService.requiresMultipart", () => {
  it("switches strictly above 16 MiB", () => {
    expect(MULTIPART_THRESHOLD).toBe(16 * MiB);
    expect(PartPlanService.requiresMultipart(16 * MiB)).toBe(false);
    expect(PartPlanService.requiresMultipart(16 * MiB + 1)).toBe(true);
    expect(PartPlanService.requiresMultipart(0)).toBe(false);
  });
});

describe("PartPlanService.build", () => {
  it("17 MiB at 8 MiB parts gives 8 + 8 + 1", () => {
    const plan = PartPlanService.build(17 * MiB, 8 * MiB);
    expect(plan.partCount).toBe(3);
    expect(plan.ranges).toEqual([
      { index: 1, start: 0, length: 8 * MiB },
      { index: 2, start: 8 * MiB, length: 8 * MiB },
      { index: 3, start: 16 * MiB, length: MiB },
    ]);
  });

  it("an exact multiple has no short tail", () => {
    const plan = PartPlanService.build(24 * MiB, 8 * MiB);
    expect(plan.ranges.map((r) => r.length)).toEqual([8 * MiB, 8 * MiB, 8 * MiB]);
  });

  it("ranges cover the object exactly once", () => {
    const size = 100 * MiB + 12345;
    const plan = PartPlanService.build(size, 5 * MiB);
    let expected = 0;
    for (const r of plan.ranges) {
      expect(r.start).toBe(expected);
      expected += r.length;
    }
    expect(expected).toBe(size);
  });

  it("grows the part size to stay within the part limit", () => {
    const size = MAX_PARTS * 5 * MiB + 1;
    const plan = PartPlanService.build(size, 5 * MiB);
    expect(plan.partSize).toBe(10 * MiB);
    expect(plan.partCount).toBeLessThanOrEqual(MAX_PARTS);
  });

  it("rejects a non-positive part size", () => {
    expect(() => PartPlanService.build(10, 0)).toThrow(RangeError);
  });
});
