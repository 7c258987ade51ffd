/**
 * Format a value as a TOML literal. JSON string escaping is valid TOML
 * basic-string escaping.
 */
export function formatTomlValue(value: string | number | boolean): string {
  if (typeof value === "string") return JSON.stringify(value);
  return String(value);
}

export function formatTomlLine(
  key: string,
  value: string | number | boolean
): string {
  return `${key} = ${formatTomlValue(value)}`;
}

/**
 * Format a flat record as a TOML inline table: `{ a = "x", b = true }`.
 */
export function formatInlineTable(
  entries: ReadonlyArray<[string, string | number | boolean]>
): string {
  const body = entries.map(([key, value]) => formatTomlLine(key, value));
  return `{ ${body.join(", ")} }`;
}

/**
 * Format an array of inline tables, one per line. An empty list stays on
 * one line.
 */
export function formatTableArray(key: string, items: string[]): string[] {
  if (items.length === 0) {
    return [`${key} = []`];
  }
  return [`${key} = [`, ...items.map((item) => `  ${item},`), "]"];
}
