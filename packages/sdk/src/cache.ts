/**
 * Change-gated snapshot cache over a selector
 *
 * Before every read the store's change feed is probed from the last known
 * cursor. The cached snapshot is served, by identity, until the feed reports
 * a matching change; then the full result set is fetched again.
 */

import { stripBookkeeping } from "./documents.js";
import { logger as defaultLogger, errorFields, type Logger } from "./observability/logs.js";
import type { RemoteStore, Selector, StoreDocument } from "./types.js";

/** Feed position meaning "from the beginning" */
export const INITIAL_CURSOR = "0";

export interface GatedFetch {
  documents: StoreDocument[];
  cursor: string;
  refreshed: boolean;
}

/**
 * One change-gated read
 *
 * A change probe from the initial cursor always resolves a cursor, even when
 * nothing matched. Fresh documents are returned without their bookkeeping
 * field.
 */
export async function fetchChangeGated(
  store: RemoteStore,
  selector: Selector,
  cached: StoreDocument[] | null,
  cursor: string
): Promise<GatedFetch> {
  const probe = await store.checkChanges(cursor, selector);
  let nextCursor: string | null =
    probe.matchedAny || cursor === INITIAL_CURSOR ? probe.cursor : null;

  if (nextCursor === null && cached !== null) {
    return { documents: cached, cursor, refreshed: false };
  }

  const documents = (await store.findDocuments(selector)).map(stripBookkeeping);

  if (nextCursor === null) {
    const baseline = await store.checkChanges(INITIAL_CURSOR, selector);
    nextCursor = baseline.cursor !== "" ? baseline.cursor : cursor;
  }

  return { documents, cursor: nextCursor, refreshed: true };
}

export interface ChangeGatedCacheOptions {
  store: RemoteStore;
  selector: Selector;
  /** Label used in logs and stats */
  name: string;
  logger?: Logger;
}

export interface CacheStats {
  name: string;
  cursor: string;
  size: number;
  hits: number;
  refreshes: number;
  invalidations: number;
}

export class ChangeGatedCache {
  #store: RemoteStore;
  #selector: Selector;
  #name: string;
  #logger: Logger;
  #documents: StoreDocument[] | null = null;
  #cursor = INITIAL_CURSOR;
  #hits = 0;
  #refreshes = 0;
  #invalidations = 0;

  constructor(options: ChangeGatedCacheOptions) {
    this.#store = options.store;
    this.#selector = options.selector;
    this.#name = options.name;
    this.#logger = options.logger ?? defaultLogger;
  }

  /**
   * Current snapshot; the same array is returned while nothing changed
   *
   * Any failure drops the snapshot and resets the cursor before rethrowing.
   */
  async fetch(): Promise<StoreDocument[]> {
    try {
      const result = await fetchChangeGated(
        this.#store,
        this.#selector,
        this.#documents,
        this.#cursor
      );

      if (result.refreshed) {
        this.#refreshes++;
        this.#logger.debug("cache.refresh", {
          cache: this.#name,
          count: result.documents.length,
          cursor: result.cursor,
        });
      } else {
        this.#hits++;
        this.#logger.debug("cache.hit", { cache: this.#name, cursor: result.cursor });
      }

      this.#documents = result.documents;
      this.#cursor = result.cursor;
      return result.documents;
    } catch (err) {
      this.invalidate();
      this.#logger.error("cache.fetch.error", { cache: this.#name, ...errorFields(err) });
      throw err;
    }
  }

  invalidate(): void {
    this.#documents = null;
    this.#cursor = INITIAL_CURSOR;
    this.#invalidations++;
  }

  get cursor(): string {
    return this.#cursor;
  }

  stats(): CacheStats {
    return {
      name: this.#name,
      cursor: this.#cursor,
      size: this.#documents?.length ?? 0,
      hits: this.#hits,
      refreshes: this.#refreshes,
      invalidations: this.#invalidations,
    };
  }
}
