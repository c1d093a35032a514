import {
  compareKeys,
  type ObjectEntry,
} from "../domain/entities/object-entry.entity.js";
import type {
  IObjectStore,
  ObjectPage,
} from "../domain/services/object-store.service.js";
import type { IReporter } from "../domain/services/reporter.service.js";
import { ListingError, errorMessage } from "../domain/errors.js";
import {
  withRetry,
  type RetryPolicy,
} from "../../infrastructure/utils/retry.utils.js";

/**
 * Enumerates a whole tree into a key-sorted listing. Pages are fetched one
 * after the other; each page is retried on its own. When a page gives up the
 * listing fails as a whole, so no plan is ever built from a partial tree.
 */
export class ListTreeUseCase {
  constructor(
    private retry: RetryPolicy,
    private requestTimeoutMs: number,
    private reporter?: IReporter,
  ) {}

  async execute(store: IObjectStore): Promise<ObjectEntry[]> {
    const entries: ObjectEntry[] = [];
    const seenTokens = new Set<string>();
    let token: string | undefined;
    let page = 0;

    do {
      page++;
      const pageToken = token;
      let result: ObjectPage;
      try {
        result = await withRetry(
          () =>
            store.listPage(pageToken, {
              signal: AbortSignal.timeout(this.requestTimeoutMs),
            }),
          this.retry,
          {
            onRetry: (e, attempt, delayMs) =>
              this.reporter?.warn(
                `Listing ${store.label} page ${page} failed (${errorMessage(e)}). Retry ${attempt}/${this.retry.maxAttempts - 1} in ${delayMs}ms`,
              ),
          },
        );
      } catch (e) {
        throw new ListingError(
          `Listing ${store.label} failed on page ${page}: ${errorMessage(e)}`,
          store.label,
          { cause: e },
        );
      }
      entries.push(...result.entries);
      token = result.nextToken;
      if (token !== undefined) {
        if (seenTokens.has(token)) {
          throw new ListingError(
            `Listing ${store.label} returned a repeated continuation token on page ${page}`,
            store.label,
          );
        }
        seenTokens.add(token);
      }
    } while (token !== undefined);

    entries.sort((a, b) => compareKeys(a.key, b.key));
    for (let i = 1; i < entries.length; i++) {
      if (entries[i].key === entries[i - 1].key) {
        throw new ListingError(
          `Listing ${store.label} returned "${entries[i].key}" twice`,
          store.label,
        );
      }
    }
    this.reporter?.debug(
      `Listed ${entries.length} object(s) from ${store.label} in ${page} page(s)`,
    );
    return entries;
  }
}
