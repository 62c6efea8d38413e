/**
 * Compact text rendering of a hierarchy
 *
 * Output reads like two-space indented JSON, except that each `tasks` array
 * puts one whole work-unit record per line.
 */

const INDENT = "  ";

/**
 * Render a tree (Maps, plain objects, arrays and primitives) as compact text
 */
export function renderCompact(value: unknown): string {
  return renderValue(value, 0);
}

function entriesOf(value: unknown): Array<[string, unknown]> | undefined {
  if (value instanceof Map) {
    const entries: Array<[string, unknown]> = [];
    for (const [key, item] of value) {
      entries.push([String(key), item]);
    }
    return entries;
  }
  if (typeof value === "object" && value !== null && !Array.isArray(value)) {
    return Object.entries(value);
  }
  return undefined;
}

function renderValue(value: unknown, depth: number): string {
  const entries = entriesOf(value);
  if (entries) {
    return renderObject(entries, depth);
  }
  if (Array.isArray(value)) {
    return renderArray(value, depth, (item) => renderValue(item, depth + 1));
  }
  return renderScalar(value);
}

function renderObject(entries: Array<[string, unknown]>, depth: number): string {
  const present = entries.filter(([, item]) => item !== undefined);
  if (present.length === 0) {
    return "{}";
  }

  const pad = INDENT.repeat(depth + 1);
  const lines = present.map(([key, item]) => {
    const rendered =
      key === "tasks" && Array.isArray(item)
        ? renderArray(item, depth + 1, (record) => JSON.stringify(record) ?? "null")
        : renderValue(item, depth + 1);
    return `${pad}${JSON.stringify(key)}: ${rendered}`;
  });
  return `{\n${lines.join(",\n")}\n${INDENT.repeat(depth)}}`;
}

function renderArray(
  items: readonly unknown[],
  depth: number,
  renderItem: (item: unknown) => string
): string {
  if (items.length === 0) {
    return "[]";
  }
  const pad = INDENT.repeat(depth + 1);
  const lines = items.map((item) => `${pad}${renderItem(item)}`);
  return `[\n${lines.join(",\n")}\n${INDENT.repeat(depth)}]`;
}

function renderScalar(value: unknown): string {
  return JSON.stringify(value) ?? "null";
}
