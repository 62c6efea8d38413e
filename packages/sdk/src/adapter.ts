/**
 * Friendly-ID facing operations over the task store
 *
 * One adapter owns its caches, its registry and a serial lock; every public
 * operation runs under that lock, so concurrent callers never interleave
 * cache refreshes or token allocation.
 */

import { renderCompact } from "./compact.js";
import type { TaskBridgeConfig } from "./config.js";
import { CouchStoreClient } from "./couch.js";
import { ROOT_PARENT, UNASSIGNED_PARENT } from "./documents.js";
import { InvalidInputError, InvalidTokenError } from "./errors.js";
import { buildHierarchy, summarizeDayWorkUnit } from "./hierarchy.js";
import { SerialLock } from "./lock.js";
import { errorFields, Logger, logger as defaultLogger } from "./observability/logs.js";
import { FriendlyIdRegistry, INBOX_TOKEN } from "./registry.js";
import { TaskRepository, type WorkUnitChanges } from "./repository.js";
import { parseTimeEstimate } from "./time-estimate.js";
import type {
  ContainerEcho,
  ContainerResult,
  CreateContainerInput,
  CreateWorkUnitInput,
  DayListing,
  Hierarchy,
  PriorityInput,
  Priority,
  UpdateWorkUnitInput,
  WorkUnitEcho,
  WorkUnitResult,
} from "./types.js";
import { parsePriority, requireTitle, validateDate } from "./validation.js";
import type { CacheStats } from "./cache.js";

export interface TaskAdapterOptions {
  logger?: Logger;
}

function isBlank(value: string): boolean {
  return value.trim() === "";
}

function optionalDate(value: string | undefined, field: string): string | undefined {
  return value === undefined || isBlank(value) ? undefined : validateDate(value, field);
}

function optionalPriority(value: PriorityInput | undefined): Priority | undefined {
  return value === undefined || value === "" ? undefined : parsePriority(value);
}

export class TaskAdapter {
  #repository: TaskRepository;
  #registry: FriendlyIdRegistry;
  #lock = new SerialLock();
  #logger: Logger;

  private constructor(repository: TaskRepository, registry: FriendlyIdRegistry, logger: Logger) {
    this.#repository = repository;
    this.#registry = registry;
    this.#logger = logger;
  }

  /**
   * Create an adapter and seed its registry from the current store contents
   *
   * A failed seed is logged; tokens are then handed out lazily on first sight.
   */
  static async open(repository: TaskRepository, options: TaskAdapterOptions = {}): Promise<TaskAdapter> {
    const logger = options.logger ?? defaultLogger;
    const adapter = new TaskAdapter(repository, new FriendlyIdRegistry(logger), logger);
    await adapter.#seedRegistry();
    return adapter;
  }

  /**
   * Connect to the configured CouchDB store
   */
  static async connect(config: TaskBridgeConfig, options: TaskAdapterOptions = {}): Promise<TaskAdapter> {
    const logger = options.logger ?? new Logger(config.logLevel);
    const client = CouchStoreClient.fromConnection(config.store, logger);
    return TaskAdapter.open(new TaskRepository(client, { logger }), { ...options, logger });
  }

  async #seedRegistry(): Promise<void> {
    try {
      const containers = await this.#repository.listContainers();
      const workUnits = await this.#repository.listWorkUnits();
      this.#registry.seed(containers, workUnits);
    } catch (err) {
      this.#logger.warn("registry.init.failed", errorFields(err));
    }
  }

  async #buildHierarchy(): Promise<Hierarchy> {
    const containers = await this.#repository.listContainers();
    const workUnits = await this.#repository.listWorkUnits();
    return buildHierarchy(containers, workUnits, this.#registry);
  }

  /**
   * Persistent parent ID for a container token; blank means `fallback`
   */
  #resolveParent(token: string | undefined, fallback: string): string {
    if (token === undefined || isBlank(token)) {
      return fallback;
    }
    const trimmed = token.trim();
    const namespace = this.#registry.namespaceOf(trimmed);
    if (namespace !== "project" && namespace !== "category") {
      throw new InvalidTokenError(trimmed, "parent");
    }
    try {
      return this.#registry.resolvePersistentId(trimmed, namespace);
    } catch (err) {
      throw new InvalidTokenError(trimmed, "parent", { cause: err });
    }
  }

  #resolveTask(token: string): string {
    return this.#registry.resolvePersistentId(token.trim(), "task");
  }

  getHierarchy(): Promise<Hierarchy> {
    return this.#lock.withLock(() => this.#buildHierarchy());
  }

  /**
   * Whole hierarchy as compact text
   */
  listHierarchy(): Promise<string> {
    return this.#lock.withLock(async () => renderCompact(await this.#buildHierarchy()));
  }

  createWorkUnit(input: CreateWorkUnitInput): Promise<WorkUnitResult> {
    return this.#lock.withLock(async () => {
      const title = requireTitle(input.title);
      const parentId = this.#resolveParent(input.parentId, UNASSIGNED_PARENT);
      const dueDate = optionalDate(input.dueDate, "dueDate");
      const timeEstimate = input.timeEstimate?.trim() || undefined;
      const timeEstimateMs = timeEstimate === undefined ? undefined : parseTimeEstimate(timeEstimate);
      const priority = optionalPriority(input.priority);

      const created = await this.#repository.createWorkUnit({
        title,
        parentId,
        dueDate,
        timeEstimate: timeEstimateMs,
        priority,
      });
      const id = this.#registry.resolveToken(created._id, "task");

      const task: WorkUnitEcho = { id, title, parentId: input.parentId?.trim() || INBOX_TOKEN };
      if (dueDate !== undefined) task.dueDate = dueDate;
      if (timeEstimate !== undefined) task.timeEstimate = timeEstimate;
      if (priority !== undefined) task.priority = priority;
      return { task, message: `Task '${title}' created successfully with ID ${id}` };
    });
  }

  createContainer(input: CreateContainerInput): Promise<ContainerResult> {
    return this.#lock.withLock(async () => {
      const title = requireTitle(input.title);
      const parentId = this.#resolveParent(input.parentId, ROOT_PARENT);
      const dueDate = optionalDate(input.dueDate, "dueDate");
      const priority = optionalPriority(input.priority);

      const created = await this.#repository.createContainer({
        title,
        parentId,
        kind: input.kind,
        dueDate,
        priority,
      });
      const id = this.#registry.resolveToken(created._id, input.kind);
      const label = input.kind === "category" ? "Category" : "Project";

      const container: ContainerEcho = {
        id,
        title,
        kind: input.kind,
        parentId: input.parentId?.trim() || ROOT_PARENT,
      };
      if (dueDate !== undefined) container.dueDate = dueDate;
      if (priority !== undefined) container.priority = priority;
      return { container, message: `${label} '${title}' created successfully with ID ${id}` };
    });
  }

  /**
   * Change fields of an existing work-unit
   *
   * Blank `dueDate`, `timeEstimate` or `priority` clears the field; a blank
   * `parentId` moves the work-unit to the Inbox.
   */
  updateWorkUnit(taskId: string, input: UpdateWorkUnitInput): Promise<WorkUnitResult> {
    return this.#lock.withLock(async () => {
      const realId = this.#resolveTask(taskId);
      const changes: WorkUnitChanges = {};
      const echo: Omit<WorkUnitEcho, "id" | "title"> = {};

      if (input.title !== undefined) {
        changes.title = requireTitle(input.title);
      }
      if (input.parentId !== undefined) {
        changes.parentId = this.#resolveParent(input.parentId, UNASSIGNED_PARENT);
        echo.parentId = isBlank(input.parentId) ? INBOX_TOKEN : input.parentId.trim();
      }
      if (input.dueDate !== undefined) {
        changes.dueDate = isBlank(input.dueDate) ? null : validateDate(input.dueDate, "dueDate");
        echo.dueDate = changes.dueDate;
      }
      if (input.timeEstimate !== undefined) {
        const raw = input.timeEstimate.trim();
        changes.timeEstimate = raw === "" ? null : parseTimeEstimate(raw);
        echo.timeEstimate = raw === "" ? null : raw;
      }
      if (input.priority !== undefined) {
        changes.isStarred = input.priority === "" ? null : parsePriority(input.priority);
        echo.priority = changes.isStarred;
      }
      if (Object.keys(changes).length === 0) {
        throw new InvalidInputError("updates", "No updates provided");
      }

      const saved = await this.#repository.updateWorkUnit(realId, changes);
      const id = this.#registry.resolveToken(realId, "task");
      const title = typeof saved.title === "string" ? saved.title : (changes.title ?? "");
      return { task: { id, title, ...echo }, message: "Task updated successfully" };
    });
  }

  /**
   * Put a work-unit on a day's plan
   */
  scheduleWorkUnit(taskId: string, day: string): Promise<WorkUnitResult> {
    return this.#lock.withLock(async () => {
      const date = validateDate(day, "day");
      const realId = this.#resolveTask(taskId);
      const saved = await this.#repository.updateWorkUnit(realId, { day: date });
      const id = this.#registry.resolveToken(realId, "task");
      const title = typeof saved.title === "string" ? saved.title : "";
      return { task: { id, title, day: date }, message: `Task scheduled for ${date}` };
    });
  }

  listDayWorkUnits(day: string): Promise<DayListing> {
    return this.#lock.withLock(async () => {
      const date = validateDate(day, "day");
      const units = await this.#repository.listWorkUnitsForDay(date);
      return { date, tasks: units.map((unit) => summarizeDayWorkUnit(unit, this.#registry)) };
    });
  }

  ping(): Promise<boolean> {
    return this.#lock.withLock(() => this.#repository.ping());
  }

  cacheStats(): { containers: CacheStats; workUnits: CacheStats } {
    return this.#repository.cacheStats();
  }
}
