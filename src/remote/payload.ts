// Readers for JSON payloads of remote APIs. A field that does not have the
// expected shape means the API changed under us, so they throw.

export type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function asObject(value: unknown, what: string): JsonObject {
  if (!isJsonObject(value)) {
    throw new Error(`Unexpected API response: ${what} must be an object`);
  }
  return value;
}

export function asArray(value: unknown, what: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new Error(`Unexpected API response: ${what} must be an array`);
  }
  return value;
}

export function getString(obj: JsonObject, key: string, what: string): string {
  const value = obj[key];
  if (typeof value !== "string") {
    throw new Error(`Unexpected API response: ${what}.${key} must be a string`);
  }
  return value;
}

/** null and a missing field both read as null. */
export function getNullableString(
  obj: JsonObject,
  key: string,
  what: string
): string | null {
  const value = obj[key];
  if (value === undefined || value === null) {
    return null;
  }
  return getString(obj, key, what);
}

export function getNumber(obj: JsonObject, key: string, what: string): number {
  const value = obj[key];
  if (typeof value !== "number") {
    throw new Error(`Unexpected API response: ${what}.${key} must be a number`);
  }
  return value;
}

/** A missing field reads as `fallback`. */
export function getBoolean(
  obj: JsonObject,
  key: string,
  what: string,
  fallback: boolean
): boolean {
  const value = obj[key];
  if (value === undefined || value === null) {
    return fallback;
  }
  if (typeof value !== "boolean") {
    throw new Error(
      `Unexpected API response: ${what}.${key} must be a boolean`
    );
  }
  return value;
}
