/**
 * Friendly-ID registry
 *
 * Persistent store IDs are long opaque strings; callers see short tokens
 * instead ("t1", "p2", "c3"). Each namespace counts up from 1, a binding is
 * never removed, and "p0" always names the Inbox.
 */

import { UNASSIGNED_PARENT } from "./documents.js";
import { InvalidTokenError } from "./errors.js";
import { logger as defaultLogger, type Logger } from "./observability/logs.js";
import type { ContainerRecord, Namespace, WorkUnitRecord } from "./types.js";

export const NAMESPACE_PREFIX: Record<Namespace, string> = {
  task: "t",
  project: "p",
  category: "c",
};

export const INBOX_TOKEN = "p0";

const TOKEN_PATTERN = /^([tpc])(\d+)$/;

/**
 * Anything that can hand out tokens for persistent IDs
 */
export interface TokenResolver {
  resolveToken(persistentId: string, namespace: Namespace): string;
}

class TokenTable {
  readonly #prefix: string;
  #byId = new Map<string, string>();
  #byToken = new Map<string, string>();
  #next = 1;

  constructor(prefix: string) {
    this.#prefix = prefix;
  }

  tokenFor(persistentId: string): string {
    const existing = this.#byId.get(persistentId);
    if (existing !== undefined) {
      return existing;
    }
    const token = `${this.#prefix}${this.#next++}`;
    this.bind(persistentId, token);
    return token;
  }

  bind(persistentId: string, token: string): void {
    this.#byId.set(persistentId, token);
    this.#byToken.set(token, persistentId);
  }

  lookup(token: string): string | undefined {
    return this.#byToken.get(token);
  }

  entries(): Array<[token: string, persistentId: string]> {
    return [...this.#byToken.entries()];
  }

  get size(): number {
    return this.#byToken.size;
  }
}

function byCreatedAt<T extends { createdAt: number }>(records: readonly T[]): T[] {
  // Array.prototype.sort is stable, so equal timestamps keep fetch order
  return [...records].sort((a, b) => a.createdAt - b.createdAt);
}

export class FriendlyIdRegistry implements TokenResolver {
  #tables: Record<Namespace, TokenTable> = {
    task: new TokenTable(NAMESPACE_PREFIX.task),
    project: new TokenTable(NAMESPACE_PREFIX.project),
    category: new TokenTable(NAMESPACE_PREFIX.category),
  };
  #logger: Logger;

  constructor(logger: Logger = defaultLogger) {
    this.#logger = logger;
    this.#tables.project.bind(UNASSIGNED_PARENT, INBOX_TOKEN);
  }

  /**
   * Token for a persistent ID, allocating the next one on first sight
   */
  resolveToken(persistentId: string, namespace: Namespace): string {
    if (persistentId.length === 0) {
      throw new Error(`Cannot allocate a ${namespace} token for an empty ID`);
    }
    return this.#tables[namespace].tokenFor(persistentId);
  }

  /**
   * Persistent ID behind a token
   * @param expected - when given, tokens from any other namespace are rejected
   * @throws InvalidTokenError for unknown, malformed or wrong-namespace tokens
   */
  resolvePersistentId(token: string, expected?: Namespace): string {
    const namespace = this.namespaceOf(token);
    if (namespace === undefined || (expected !== undefined && namespace !== expected)) {
      throw new InvalidTokenError(token, expected);
    }
    const persistentId = this.#tables[namespace].lookup(token);
    if (persistentId === undefined) {
      throw new InvalidTokenError(token, expected ?? namespace);
    }
    return persistentId;
  }

  /**
   * Namespace a well-formed token belongs to, whether or not it is bound
   */
  namespaceOf(token: string): Namespace | undefined {
    const match = TOKEN_PATTERN.exec(token);
    if (!match) {
      return undefined;
    }
    switch (match[1]) {
      case "t":
        return "task";
      case "p":
        return "project";
      case "c":
        return "category";
      default:
        return undefined;
    }
  }

  /**
   * Bind tokens for everything currently in the store
   *
   * Containers go first (categories, then projects), then work-units, each
   * ordered by creation time, so a fresh process hands out the same tokens
   * for the same data.
   */
  seed(containers: readonly ContainerRecord[], workUnits: readonly WorkUnitRecord[]): void {
    for (const kind of ["category", "project"] as const) {
      for (const container of byCreatedAt(containers.filter((c) => c.kind === kind))) {
        this.resolveToken(container.id, kind);
      }
    }
    for (const unit of byCreatedAt(workUnits)) {
      this.resolveToken(unit.id, "task");
    }

    this.#logger.info("registry.init", {
      categories: this.#tables.category.size,
      projects: this.#tables.project.size - 1,
      tasks: this.#tables.task.size,
    });
  }

  /** Token → persistent ID pairs for one namespace, in allocation order */
  entries(namespace: Namespace): Array<[token: string, persistentId: string]> {
    return this.#tables[namespace].entries();
  }
}
