// =============================================================================
// Types
// =============================================================================

export type Identity = string | number;

export type FieldValue = string | number | boolean | null | undefined;

/**
 * Capabilities the diff engine needs from an entity kind.
 * Entities themselves are plain readonly records; everything kind-specific
 * lives here so a single generic engine serves every kind.
 */
export interface EntityKind<E> {
  /** Display name, used in error messages. */
  readonly name: string;
  /**
   * Key correlating an entity across target and actual state. Relationship
   * kinds return their full value here, so they are never promoted to a
   * change.
   */
  identity(entity: E): Identity;
  /** Total order, used only for deterministic output. */
  compare(a: E, b: E): number;
  /** Canonical text form, single or multi-line. */
  render(entity: E): string;
}

// =============================================================================
// Equality
// =============================================================================

/**
 * Serializes a value with object keys sorted, so that two entities have the
 * same key exactly when all their attributes match.
 */
export function valueKey(value: unknown): string {
  if (value === undefined) return "undefined";
  if (value === null || typeof value !== "object") {
    return JSON.stringify(value);
  }
  if (Array.isArray(value)) {
    return `[${value.map((item) => valueKey(item)).join(",")}]`;
  }
  const entries = Object.entries(value)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => compareStrings(a, b));
  return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${valueKey(v)}`).join(",")}}`;
}

// =============================================================================
// Ordering
// =============================================================================

/**
 * Code unit order. Locale-aware comparison would make output depend on the
 * machine it runs on.
 */
export function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function rank(value: FieldValue): number {
  if (value === undefined) return 0;
  if (value === null) return 1;
  if (typeof value === "boolean") return 2;
  if (typeof value === "number") return 3;
  return 4;
}

export function compareFieldValues(a: FieldValue, b: FieldValue): number {
  const rankDiff = rank(a) - rank(b);
  if (rankDiff !== 0) return rankDiff;
  if (typeof a === "number" && typeof b === "number") return a - b;
  if (typeof a === "string" && typeof b === "string") {
    return compareStrings(a, b);
  }
  if (typeof a === "boolean" && typeof b === "boolean") {
    return Number(a) - Number(b);
  }
  return 0;
}

/**
 * Lexicographic comparison over the given fields, in order.
 */
export function compareFields<E>(
  a: E,
  b: E,
  fields: ReadonlyArray<(entity: E) => FieldValue>
): number {
  for (const field of fields) {
    const result = compareFieldValues(field(a), field(b));
    if (result !== 0) return result;
  }
  return 0;
}

/**
 * Orders identities: numbers before strings, numbers numerically.
 */
export function compareIdentities(a: Identity, b: Identity): number {
  return compareFieldValues(a, b);
}
