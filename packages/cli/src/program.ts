/**
 * Command definitions for the `taskbridge` CLI
 */

import { readFileSync } from "node:fs";
import { Command, CommanderError } from "commander";
import {
  isRecord,
  loadConfig,
  Logger,
  TaskAdapter,
  type Priority,
  type TaskBridgeConfig,
} from "@taskbridge/sdk";
import {
  parseDateOption,
  parseDayArgument,
  parseEstimateOption,
  parseFriendlyId,
  parsePriorityOption,
} from "./lib/arg.js";
import { connectionOverrides, isVerbose, type ConnectionFlags } from "./lib/env.js";
import { CliError, EXIT, exitCodeFor, formatCliError, type ExitCode } from "./lib/errors.js";
import { colorize, printJson, printText, type Output } from "./lib/render.js";
import { withTiming, type Telemetry } from "./lib/telemetry.js";

export interface ProgramDeps {
  env?: NodeJS.ProcessEnv;
  stdout?: Output;
  stderr?: Output;
  /** Opens the adapter; defaults to connecting to the configured store */
  connect?: (config: TaskBridgeConfig, logger: Logger) => Promise<TaskAdapter>;
}

// commander's opts<T>() wants index-signature compatible object types
type GlobalOptions = ConnectionFlags & {
  verbose?: boolean;
};

interface FieldOptions {
  parent?: string;
  due?: string;
  priority?: Priority | "";
}

interface TaskOptions extends FieldOptions {
  estimate?: string;
}

interface UpdateOptions extends TaskOptions {
  title?: string;
}

function readVersion(): string {
  const raw: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
  return isRecord(raw) && typeof raw.version === "string" ? raw.version : "0.0.0";
}

const defaultConnect = (config: TaskBridgeConfig, logger: Logger): Promise<TaskAdapter> =>
  TaskAdapter.connect(config, { logger });

/**
 * Build a fresh program; commander keeps parse state, so one per run
 */
export function buildProgram(deps: ProgramDeps = {}): Command {
  const env = deps.env ?? process.env;
  const stdout = deps.stdout ?? process.stdout;
  const stderr = deps.stderr ?? process.stderr;
  const connect = deps.connect ?? defaultConnect;

  const program = new Command();

  const globals = (): GlobalOptions => program.opts<GlobalOptions>();
  const telemetry = (): Telemetry => ({ verbose: isVerbose(globals().verbose, env), stderr });

  const openAdapter = async (): Promise<TaskAdapter> => {
    const config = loadConfig(env, connectionOverrides(globals()));
    const level = telemetry().verbose ? "debug" : config.logLevel;
    const logger = new Logger(level, (line) => stderr.write(`${line}\n`));
    return connect(config, logger);
  };

  // Run a command body against a connected adapter, timed under `cli.<name>`
  const withAdapter =
    <A extends unknown[]>(name: string, body: (adapter: TaskAdapter, ...args: A) => Promise<void>) =>
    async (...args: A): Promise<void> => {
      await withTiming(telemetry(), `cli.${name}`, async () => body(await openAdapter(), ...args));
    };

  program
    .name("taskbridge")
    .description("TaskBridge - short-ID access to a CouchDB task store")
    .version(readVersion())
    .option("--url <url>", "Store base URL (overrides DB_URL)")
    .option("--db <name>", "Database name (overrides DB_NAME)")
    .option("--user <name>", "Username (overrides DB_USERNAME)")
    .option("--password <password>", "Password (overrides DB_PASSWORD)")
    .option("--verbose", "Verbose diagnostics")
    .configureOutput({
      writeOut: (str) => stdout.write(str),
      writeErr: (str) => stderr.write(colorize(str, "red", stderr)),
    })
    .exitOverride();

  program
    .command("ping")
    .description("Check that the store answers")
    .action(
      withAdapter("ping", async (adapter) => {
        if (!(await adapter.ping())) {
          throw new CliError("Store is unreachable", { exitCode: EXIT.STORE });
        }
        printJson(stdout, { ok: true });
      })
    );

  program
    .command("list")
    .description("Print every open project, category and task")
    .action(
      withAdapter("list", async (adapter) => {
        printText(stdout, await adapter.listHierarchy());
      })
    );

  program
    .command("day")
    .description("List the tasks planned for a day, completed ones included")
    .argument("<date>", "Day (YYYY-MM-DD)", parseDayArgument)
    .action(
      withAdapter("day", async (adapter, date: string) => {
        printJson(stdout, await adapter.listDayWorkUnits(date));
      })
    );

  program
    .command("add-task")
    .description("Create a task, in the Inbox unless --parent is given")
    .argument("<title>", "Task title")
    .option("--parent <id>", "Project or category ID (p1, c1)")
    .option("--due <date>", "Due date (YYYY-MM-DD)", parseDateOption)
    .option("--estimate <time>", "Time estimate such as 30m, 1.5h or '1h 30m'", parseEstimateOption)
    .option("--priority <n>", "Priority 1-3, 3 being the highest", parsePriorityOption)
    .action(
      withAdapter("add-task", async (adapter, title: string, options: TaskOptions) => {
        const result = await adapter.createWorkUnit({
          title,
          parentId: options.parent,
          dueDate: options.due,
          timeEstimate: options.estimate,
          priority: options.priority,
        });
        printJson(stdout, result);
      })
    );

  for (const kind of ["project", "category"] as const) {
    program
      .command(`add-${kind}`)
      .description(`Create a ${kind}, at the top level unless --parent is given`)
      .argument("<title>", `${kind === "project" ? "Project" : "Category"} title`)
      .option("--parent <id>", "Project or category ID (p1, c1)")
      .option("--due <date>", "Due date (YYYY-MM-DD)", parseDateOption)
      .option("--priority <n>", "Priority 1-3, 3 being the highest", parsePriorityOption)
      .action(
        withAdapter(`add-${kind}`, async (adapter, title: string, options: FieldOptions) => {
          const result = await adapter.createContainer({
            title,
            kind,
            parentId: options.parent,
            dueDate: options.due,
            priority: options.priority,
          });
          printJson(stdout, result);
        })
      );
  }

  program
    .command("update")
    .description("Change a task; an empty value clears --due, --estimate and --priority")
    .argument("<taskId>", "Task ID (t1)", parseFriendlyId)
    .option("--title <title>", "New title")
    .option("--parent <id>", "New project or category ID; empty moves it to the Inbox")
    .option("--due <date>", "New due date (YYYY-MM-DD)", parseDateOption)
    .option("--estimate <time>", "New time estimate", parseEstimateOption)
    .option("--priority <n>", "New priority 1-3", parsePriorityOption)
    .action(
      withAdapter("update", async (adapter, taskId: string, options: UpdateOptions) => {
        const result = await adapter.updateWorkUnit(taskId, {
          title: options.title,
          parentId: options.parent,
          dueDate: options.due,
          timeEstimate: options.estimate,
          priority: options.priority,
        });
        printJson(stdout, result);
      })
    );

  program
    .command("schedule")
    .description("Plan a task for a day")
    .argument("<taskId>", "Task ID (t1)", parseFriendlyId)
    .argument("<day>", "Day (YYYY-MM-DD)", parseDayArgument)
    .action(
      withAdapter("schedule", async (adapter, taskId: string, day: string) => {
        printJson(stdout, await adapter.scheduleWorkUnit(taskId, day));
      })
    );

  return program;
}

/**
 * Parse and run one invocation
 * @param args - user arguments, without the node binary and script path
 * @returns the process exit code
 */
export async function run(args: readonly string[], deps: ProgramDeps = {}): Promise<ExitCode> {
  const stderr = deps.stderr ?? process.stderr;
  const program = buildProgram(deps);

  try {
    await program.parseAsync([...args], { from: "user" });
    return EXIT.OK;
  } catch (err) {
    const exitCode = exitCodeFor(err);
    // commander has already printed its own usage errors
    if (!(err instanceof CommanderError)) {
      const verbose = isVerbose(program.opts<GlobalOptions>().verbose, deps.env ?? process.env);
      stderr.write(colorize(`Error: ${formatCliError(err, verbose)}\n`, "red", stderr));
    }
    return exitCode;
  }
}
