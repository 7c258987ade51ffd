export type RawTable = Record<string, unknown>;

export function isTable(value: unknown): value is RawTable {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Returns the array of tables under `key`, or an empty list when absent.
 * `[[team]]` in TOML and `team: [...]` in YAML both land here.
 */
export function readTableArray(
  raw: RawTable,
  key: string,
  context: string
): RawTable[] {
  const value = raw[key];
  if (value === undefined) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new Error(`${context}: ${key} must be an array of tables`);
  }
  return value.map((item, i) => {
    if (!isTable(item)) {
      throw new Error(`${context}: ${key}[${i}] must be a table`);
    }
    return item;
  });
}

export function readTable(
  raw: RawTable,
  key: string,
  context: string
): RawTable {
  const value = raw[key];
  if (!isTable(value)) {
    throw new Error(`${context}: ${key} must be a table`);
  }
  return value;
}

export function requireString(
  table: RawTable,
  key: string,
  context: string
): string {
  const value = table[key];
  if (typeof value !== "string" || value.length === 0) {
    throw new Error(`${context}: ${key} must be a non-empty string`);
  }
  return value;
}

export function optionalString(
  table: RawTable,
  key: string,
  context: string
): string | undefined {
  const value = table[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new Error(`${context}: ${key} must be a string`);
  }
  return value;
}

export function requireInteger(
  table: RawTable,
  key: string,
  context: string
): number {
  const value = table[key];
  if (typeof value !== "number" || !Number.isSafeInteger(value)) {
    throw new Error(`${context}: ${key} must be an integer`);
  }
  return value;
}

export function optionalInteger(
  table: RawTable,
  key: string,
  context: string
): number | undefined {
  if (table[key] === undefined) {
    return undefined;
  }
  return requireInteger(table, key, context);
}

export function optionalBoolean(
  table: RawTable,
  key: string,
  context: string
): boolean | undefined {
  const value = table[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "boolean") {
    throw new Error(`${context}: ${key} must be a boolean`);
  }
  return value;
}

export function optionalStringArray(
  table: RawTable,
  key: string,
  context: string
): string[] | undefined {
  const value = table[key];
  if (value === undefined) {
    return undefined;
  }
  if (!Array.isArray(value)) {
    throw new Error(`${context}: ${key} must be an array of strings`);
  }
  return value.map((item, i) => {
    if (typeof item !== "string") {
      throw new Error(`${context}: ${key}[${i}] must be a string`);
    }
    return item;
  });
}

export function requireOneOf<T extends string>(
  table: RawTable,
  key: string,
  allowed: readonly T[],
  context: string
): T {
  const value = table[key];
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new Error(
      `${context}: ${key} must be one of: ${allowed.join(", ")}`
    );
  }
  return match;
}

/**
 * Throws when two entries share a value, e.g. two teams with one name.
 */
export function assertUnique(
  values: readonly string[],
  what: string,
  context: string
): void {
  const seen = new Set<string>();
  for (const value of values) {
    if (seen.has(value)) {
      throw new Error(`${context}: duplicate ${what} '${value}'`);
    }
    seen.add(value);
  }
}
