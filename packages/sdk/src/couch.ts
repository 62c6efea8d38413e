/**
 * HTTP client for the CouchDB-compatible task database
 */

import { StoreError } from "./errors.js";
import { isRecord, isStoreDocument } from "./documents.js";
import { logger as defaultLogger, errorFields, type Logger } from "./observability/logs.js";
import type {
  ChangeProbe,
  NewDocument,
  RemoteStore,
  Selector,
  StoreDocument,
} from "./types.js";
import { DEFAULT_FIND_LIMIT, DEFAULT_REQUEST_TIMEOUT_MS, type StoreConnection } from "./config.js";

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface CouchClientOptions extends Partial<Pick<StoreConnection, "requestTimeoutMs" | "findLimit">> {
  url: string;
  database: string;
  username: string;
  password: string;
  logger?: Logger;
  fetch?: FetchLike;
}

export class CouchStoreClient implements RemoteStore {
  #baseUrl: string;
  #authorization: string;
  #timeoutMs: number;
  #findLimit: number;
  #logger: Logger;
  #fetch: FetchLike;

  constructor(options: CouchClientOptions) {
    this.#baseUrl = `${options.url.replace(/\/+$/, "")}/${encodeURIComponent(options.database)}`;
    this.#authorization = `Basic ${Buffer.from(`${options.username}:${options.password}`).toString("base64")}`;
    this.#timeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.#findLimit = options.findLimit ?? DEFAULT_FIND_LIMIT;
    this.#logger = options.logger ?? defaultLogger;
    this.#fetch = options.fetch ?? ((input, init) => fetch(input, init));
  }

  static fromConnection(connection: StoreConnection, logger?: Logger): CouchStoreClient {
    return new CouchStoreClient({ ...connection, logger });
  }

  async findDocuments(selector: Selector): Promise<StoreDocument[]> {
    const body = await this.#request("find", "POST", "/_find", {
      selector,
      limit: this.#findLimit,
    });
    if (!isRecord(body) || !Array.isArray(body.docs)) {
      throw new StoreError("find", "response has no docs array");
    }

    const docs: StoreDocument[] = [];
    for (const doc of body.docs) {
      if (isStoreDocument(doc)) {
        docs.push(doc);
      } else {
        this.#logger.warn("store.find.skipped", { reason: "document without _id" });
      }
    }
    if (docs.length >= this.#findLimit) {
      this.#logger.warn("store.find.limit_reached", { limit: this.#findLimit });
    }
    return docs;
  }

  async checkChanges(since: string, selector: Selector): Promise<ChangeProbe> {
    const params = new URLSearchParams({
      feed: "normal",
      filter: "_selector",
      include_docs: "false",
      since,
    });
    const body = await this.#request("changes", "POST", `/_changes?${params.toString()}`, {
      selector,
    });
    if (!isRecord(body)) {
      throw new StoreError("changes", "malformed change feed response");
    }

    const results = Array.isArray(body.results) ? body.results : [];
    const lastSeq = body.last_seq;
    return {
      matchedAny: results.length > 0,
      cursor: typeof lastSeq === "string" || typeof lastSeq === "number" ? String(lastSeq) : "",
    };
  }

  async getDocument(id: string): Promise<StoreDocument> {
    const body = await this.#request("get", "GET", `/${encodeURIComponent(id)}`);
    if (!isStoreDocument(body)) {
      throw new StoreError("get", `document ${id} is malformed`);
    }
    return body;
  }

  async putDocument(doc: StoreDocument): Promise<StoreDocument> {
    const body = await this.#request("put", "PUT", `/${encodeURIComponent(doc._id)}`, doc);
    const rev = isRecord(body) && typeof body.rev === "string" ? body.rev : doc._rev;
    return { ...doc, _rev: rev };
  }

  async createDocument(doc: NewDocument): Promise<StoreDocument> {
    const body = await this.#request("create", "POST", "", doc);
    if (!isRecord(body) || typeof body.id !== "string") {
      throw new StoreError("create", "response has no document id");
    }
    const rev = typeof body.rev === "string" ? body.rev : undefined;
    return { ...doc, _id: body.id, _rev: rev };
  }

  async ping(): Promise<boolean> {
    try {
      await this.#request("ping", "GET", "");
      return true;
    } catch (err) {
      this.#logger.warn("store.ping.failed", errorFields(err));
      return false;
    }
  }

  async #request(operation: string, method: string, path: string, payload?: unknown): Promise<unknown> {
    const startTime = Date.now();
    let response: Response;

    try {
      response = await this.#fetch(`${this.#baseUrl}${path}`, {
        method,
        headers: {
          Accept: "application/json",
          "Content-Type": "application/json",
          Authorization: this.#authorization,
        },
        body: payload === undefined ? undefined : JSON.stringify(payload),
        signal: AbortSignal.timeout(this.#timeoutMs),
      });
    } catch (err) {
      const reason =
        err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError")
          ? `timed out after ${this.#timeoutMs}ms`
          : err instanceof Error
            ? err.message
            : String(err);
      throw new StoreError(operation, reason, { cause: err });
    }

    this.#logger.debug("store.request", {
      operation,
      status: response.status,
      duration_ms: Date.now() - startTime,
    });

    if (!response.ok) {
      const detail = await response.text();
      const suffix = detail ? `: ${detail.slice(0, 200)}` : "";
      throw new StoreError(operation, `HTTP ${response.status}${suffix}`, {
        status: response.status,
      });
    }

    try {
      const body: unknown = await response.json();
      return body;
    } catch (err) {
      throw new StoreError(operation, "response is not valid JSON", { cause: err });
    }
  }
}
