import {
  MULTIPART_THRESHOLD,
  type PartPlan,
  type PartRange,
} from "../entities/sync-plan.entity.js";

/** S3 rejects uploads with more parts than this. */
export const MAX_PARTS = 10_000;

export class PartPlanService {
  static requiresMultipart(size: number): boolean {
    return size > MULTIPART_THRESHOLD;
  }

  /**
   * Splits `size` bytes into fixed `partSize` ranges, the last one holding the
   * remainder. The part size grows (in whole multiples) when the object would
   * otherwise need more than MAX_PARTS parts.
   */
  static build(size: number, partSize: number): PartPlan {
    if (!Number.isInteger(partSize) || partSize <= 0) {
      throw new RangeError(`Invalid part size: ${partSize}`);
    }
    let effective = partSize;
    if (Math.ceil(size / effective) > MAX_PARTS) {
      effective = partSize * Math.ceil(size / (partSize * MAX_PARTS));
    }
    const partCount = Math.max(1, Math.ceil(size / effective));
    const ranges: PartRange[] = [];
    for (let i = 0; i < partCount; i++) {
      const start = i * effective;
      ranges.push({
        index: i + 1,
        start,
        length: Math.min(effective, size - start),
      });
    }
    return { partSize: effective, partCount, ranges };
  }
}
