import {
  compareKeys,
  type ObjectEntry,
} from "../domain/entities/object-entry.entity.js";
import type { SyncOptions } from "../domain/entities/config.entity.js";
import type { SyncPlan, Task } from "../domain/entities/sync-plan.entity.js";
import type { FilterChain } from "../domain/services/filter-chain.service.js";

export interface PlanSyncRequest {
  /** Key-sorted, unfiltered source listing. */
  source: ObjectEntry[];
  /** Key-sorted destination listing. */
  destination: ObjectEntry[];
  filter: FilterChain;
  options: Pick<SyncOptions, "remove">;
  /** Location strings for task refs; default to the bare key. */
  describeSource?: (key: string) => string;
  describeDestination?: (key: string) => string;
}

/**
 * Content hashes decide when both sides have one. Otherwise a size change or a
 * source newer than the destination copy counts as a change.
 */
export function fingerprintsDiffer(
  source: ObjectEntry,
  destination: ObjectEntry,
): boolean {
  if (source.contentHash && destination.contentHash) {
    return source.contentHash !== destination.contentHash;
  }
  if (source.size !== destination.size) return true;
  return source.lastModified.getTime() > destination.lastModified.getTime();
}

function assertSorted(entries: ObjectEntry[], side: string): void {
  for (let i = 1; i < entries.length; i++) {
    if (compareKeys(entries[i - 1].key, entries[i].key) >= 0) {
      throw new Error(
        `${side} listing is not strictly sorted at "${entries[i].key}"`,
      );
    }
  }
}

/**
 * Merge-joins two sorted listings into a transfer plan. Pure: the same
 * listings, filter and options always give the same plan.
 */
export class PlanSyncUseCase {
  execute(request: PlanSyncRequest): SyncPlan {
    const source = request.filter.apply(request.source);
    const destination = request.destination;
    assertSorted(source, "Source");
    assertSorted(destination, "Destination");

    const srcRef = request.describeSource ?? ((key: string) => key);
    const dstRef = request.describeDestination ?? ((key: string) => key);
    const plan: SyncPlan = { creates: [], updates: [], deletes: [], skipped: 0 };

    const upload = (entry: ObjectEntry, kind: "create" | "update"): Task => ({
      key: entry.key,
      sourceRef: srcRef(entry.key),
      destRef: dstRef(entry.key),
      size: entry.size,
      kind,
    });

    let i = 0;
    let j = 0;
    while (i < source.length || j < destination.length) {
      const s = source[i];
      const d = destination[j];
      const order =
        s === undefined ? 1 : d === undefined ? -1 : compareKeys(s.key, d.key);

      if (order < 0) {
        plan.creates.push(upload(s, "create"));
        i++;
      } else if (order > 0) {
        if (request.options.remove) {
          plan.deletes.push({
            key: d.key,
            sourceRef: null,
            destRef: dstRef(d.key),
            size: d.size,
            kind: "delete",
          });
        } else {
          plan.skipped++;
        }
        j++;
      } else {
        if (fingerprintsDiffer(s, d)) plan.updates.push(upload(s, "update"));
        else plan.skipped++;
        i++;
        j++;
      }
    }
    return plan;
  }
}
