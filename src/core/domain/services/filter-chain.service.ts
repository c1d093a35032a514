import type { ObjectEntry } from "../entities/object-entry.entity.js";
import type { SyncOptions } from "../entities/config.entity.js";
import { globToRegExp } from "../../../infrastructure/utils/glob.utils.js";

/** True when the entry must be kept out of the source side. */
export type EntryPredicate = (entry: ObjectEntry) => boolean;

/**
 * Exclude globs and age windows, built once per invocation and applied to
 * the source listing before diffing. An entry is excluded as soon as one
 * predicate rejects it.
 */
export class FilterChain {
  private constructor(private readonly predicates: EntryPredicate[]) {}

  static empty(): FilterChain {
    return new FilterChain([]);
  }

  /**
   * @param now reference instant for age checks; one value per cycle so that
   *   every entry of a listing is judged against the same clock.
   */
  static fromOptions(
    options: Pick<SyncOptions, "exclude" | "olderThanMs" | "newerThanMs">,
    now: Date = new Date(),
  ): FilterChain {
    const predicates: EntryPredicate[] = [];

    if (options.exclude.length > 0) {
      const patterns = options.exclude.map(globToRegExp);
      predicates.push((entry) => patterns.some((re) => re.test(entry.key)));
    }

    const nowMs = now.getTime();
    const { olderThanMs, newerThanMs } = options;
    if (olderThanMs !== undefined) {
      // Too fresh
      predicates.push(
        (entry) => nowMs - entry.lastModified.getTime() < olderThanMs,
      );
    }
    if (newerThanMs !== undefined) {
      // Too old
      predicates.push(
        (entry) => nowMs - entry.lastModified.getTime() > newerThanMs,
      );
    }

    return new FilterChain(predicates);
  }

  excludes(entry: ObjectEntry): boolean {
    return this.predicates.some((p) => p(entry));
  }

  apply(entries: ObjectEntry[]): ObjectEntry[] {
    if (this.predicates.length === 0) return entries;
    return entries.filter((e) => !this.excludes(e));
  }
}
