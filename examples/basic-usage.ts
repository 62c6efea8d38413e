/**
 * Basic usage of the TaskBridge SDK
 *
 * Expects DB_URL, DB_NAME, DB_USERNAME and DB_PASSWORD in the environment.
 */

import { loadConfig, TaskAdapter } from "@taskbridge/sdk";

async function main() {
  const adapter = await TaskAdapter.connect(loadConfig());

  if (!(await adapter.ping())) {
    throw new Error("Store is unreachable");
  }

  // Create a category and a project inside it
  const { container: work } = await adapter.createContainer({ title: "Work", kind: "category" });
  const { container: report } = await adapter.createContainer({
    title: "Quarterly report",
    kind: "project",
    parentId: work.id,
    priority: 3,
  });
  console.log(`Created ${work.id} and ${report.id}`);

  const { task } = await adapter.createWorkUnit({
    title: "Collect figures",
    parentId: report.id,
    dueDate: "2025-04-25",
    timeEstimate: "1h 30m",
  });
  console.log(`Created task ${task.id}`);

  await adapter.scheduleWorkUnit(task.id, "2025-04-22");
  const day = await adapter.listDayWorkUnits("2025-04-22");
  console.log(`${day.tasks.length} task(s) planned for ${day.date}`);

  console.log(await adapter.listHierarchy());
  console.log("Cache:", adapter.cacheStats());
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
