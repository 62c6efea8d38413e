/**
 * In-process stand-in for the CouchDB task database
 *
 * Keeps documents in a Map, evaluates Mango selectors, hands out increasing
 * sequence numbers for the change feed and bumps `_rev` on every write.
 */

import {
  matches,
  StoreError,
  type ChangeProbe,
  type NewDocument,
  type RemoteStore,
  type Selector,
  type StoreDocument,
} from "@taskbridge/sdk";

export type StoreOperation = "find" | "changes" | "get" | "put" | "create" | "ping";

export interface RecordedCall {
  operation: StoreOperation;
  selector?: Selector;
  since?: string;
}

function parseSeq(cursor: string): number {
  const seq = Number.parseInt(cursor, 10);
  return Number.isFinite(seq) ? seq : 0;
}

function parseGeneration(rev: string | undefined): number {
  const generation = rev === undefined ? 0 : Number.parseInt(rev, 10);
  return Number.isFinite(generation) ? generation : 0;
}

export class MemoryStore implements RemoteStore {
  #docs = new Map<string, StoreDocument>();
  /** Latest sequence number per document, as the change feed reports only the newest change */
  #lastChange = new Map<string, number>();
  #seq = 0;
  #nextId = 1;
  #failures = new Map<StoreOperation, Error>();
  readonly calls: RecordedCall[] = [];

  constructor(docs: readonly NewDocument[] = []) {
    for (const doc of docs) {
      this.insert(doc);
    }
  }

  /**
   * Write a document directly, as another client of the database would
   */
  insert(doc: NewDocument): StoreDocument {
    const id = typeof doc._id === "string" && doc._id !== "" ? doc._id : `doc-${this.#nextId++}`;
    const previous = this.#docs.get(id);
    const stored: StoreDocument = {
      ...structuredClone(doc),
      _id: id,
      _rev: `${parseGeneration(previous?._rev) + 1}-mem`,
    };
    this.#docs.set(id, stored);
    this.#lastChange.set(id, ++this.#seq);
    return structuredClone(stored);
  }

  /** Stored copy of a document, bookkeeping included */
  peek(id: string): StoreDocument | undefined {
    const doc = this.#docs.get(id);
    return doc === undefined ? undefined : structuredClone(doc);
  }

  /** Current change-feed position */
  get lastSeq(): string {
    return String(this.#seq);
  }

  get size(): number {
    return this.#docs.size;
  }

  /**
   * Make the next call of `operation` throw
   */
  failNext(operation: StoreOperation, error?: Error): void {
    this.#failures.set(operation, error ?? new StoreError(operation, "simulated failure"));
  }

  count(operation: StoreOperation): number {
    return this.calls.filter((call) => call.operation === operation).length;
  }

  resetCalls(): void {
    this.calls.length = 0;
  }

  async findDocuments(selector: Selector): Promise<StoreDocument[]> {
    this.#enter({ operation: "find", selector });
    return [...this.#docs.values()]
      .filter((doc) => matches(doc, selector))
      .map((doc) => structuredClone(doc));
  }

  async checkChanges(since: string, selector: Selector): Promise<ChangeProbe> {
    this.#enter({ operation: "changes", since, selector });
    const sinceSeq = parseSeq(since);
    let matchedAny = false;
    for (const [id, seq] of this.#lastChange) {
      const doc = this.#docs.get(id);
      if (seq > sinceSeq && doc !== undefined && matches(doc, selector)) {
        matchedAny = true;
        break;
      }
    }
    return { matchedAny, cursor: this.lastSeq };
  }

  async getDocument(id: string): Promise<StoreDocument> {
    this.#enter({ operation: "get" });
    const doc = this.#docs.get(id);
    if (doc === undefined) {
      throw new StoreError("get", "HTTP 404: not_found", { status: 404 });
    }
    return structuredClone(doc);
  }

  async putDocument(doc: StoreDocument): Promise<StoreDocument> {
    this.#enter({ operation: "put" });
    return this.insert(doc);
  }

  async createDocument(doc: NewDocument): Promise<StoreDocument> {
    this.#enter({ operation: "create" });
    return this.insert(doc);
  }

  async ping(): Promise<boolean> {
    try {
      this.#enter({ operation: "ping" });
      return true;
    } catch {
      return false;
    }
  }

  #enter(call: RecordedCall): void {
    this.calls.push(call);
    const failure = this.#failures.get(call.operation);
    if (failure !== undefined) {
      this.#failures.delete(call.operation);
      throw failure;
    }
  }
}
