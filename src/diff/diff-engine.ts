import {
  compareIdentities,
  valueKey,
  type EntityKind,
  type Identity,
} from "./entity-kind.js";

// =============================================================================
// Types
// =============================================================================

export interface DiffEntry<E> {
  readonly actual: E;
  readonly target: E;
}

export interface DiffResult<E> {
  readonly kind: EntityKind<E>;
  /** In target, absent from actual, no identity match. */
  readonly toAdd: readonly E[];
  /** In actual, absent from target, no identity match. */
  readonly toRemove: readonly E[];
  /** Same identity on both sides, different value. */
  readonly toChange: readonly DiffEntry<E>[];
}

export interface DiffCounts {
  add: number;
  remove: number;
  change: number;
}

export type DiffSide = "target" | "actual";

/**
 * Two distinct entities on the same side of a diff share an identity, so
 * there is no way to tell which one a change refers to.
 */
export class AmbiguousIdentityError extends Error {
  constructor(
    readonly kindName: string,
    readonly side: DiffSide,
    readonly identity: Identity
  ) {
    super(
      `Ambiguous ${kindName} identity ${JSON.stringify(identity)} in ${side} state: ` +
        `more than one ${kindName} shares it`
    );
    this.name = "AmbiguousIdentityError";
  }
}

// =============================================================================
// Helpers
// =============================================================================

function indexByValue<E>(entities: Iterable<E>): Map<string, E> {
  const byValue = new Map<string, E>();
  for (const entity of entities) {
    byValue.set(valueKey(entity), entity);
  }
  return byValue;
}

function difference<E>(
  from: Map<string, E>,
  without: Map<string, E>
): Map<string, E> {
  const result = new Map<string, E>();
  for (const [key, entity] of from) {
    if (!without.has(key)) {
      result.set(key, entity);
    }
  }
  return result;
}

function indexByIdentity<E>(
  kind: EntityKind<E>,
  entities: Iterable<E>,
  side: DiffSide
): Map<Identity, E> {
  const byIdentity = new Map<Identity, E>();
  for (const entity of entities) {
    const id = kind.identity(entity);
    if (byIdentity.has(id)) {
      throw new AmbiguousIdentityError(kind.name, side, id);
    }
    byIdentity.set(id, entity);
  }
  return byIdentity;
}

// =============================================================================
// Diff Algorithm
// =============================================================================

/**
 * Classify the symmetric difference of target and actual into additions,
 * removals and in-place changes.
 *
 * A plain set difference reports an entity whose attributes changed as one
 * removal plus one addition. When such a pair shares an identity it is
 * reported as a single change instead.
 *
 * @throws AmbiguousIdentityError when two distinct entities on the same side
 * of the difference share an identity.
 */
export function computeDiff<E>(
  kind: EntityKind<E>,
  target: Iterable<E>,
  actual: Iterable<E>
): DiffResult<E> {
  const targetByValue = indexByValue(target);
  const actualByValue = indexByValue(actual);

  const rawAdd = difference(targetByValue, actualByValue);
  const rawRemove = difference(actualByValue, targetByValue);

  const addById = indexByIdentity(kind, rawAdd.values(), "target");
  const removeById = indexByIdentity(kind, rawRemove.values(), "actual");

  const toChange: DiffEntry<E>[] = [];
  for (const [id, targetEntity] of addById) {
    const actualEntity = removeById.get(id);
    if (actualEntity !== undefined) {
      toChange.push({ actual: actualEntity, target: targetEntity });
    }
  }

  for (const change of toChange) {
    rawAdd.delete(valueKey(change.target));
    rawRemove.delete(valueKey(change.actual));
  }

  const toAdd = [...rawAdd.values()].sort((a, b) => kind.compare(a, b));
  const toRemove = [...rawRemove.values()].sort((a, b) => kind.compare(a, b));
  toChange.sort((a, b) =>
    compareIdentities(kind.identity(a.target), kind.identity(b.target))
  );

  return { kind, toAdd, toRemove, toChange };
}

export function countDiff<E>(diff: DiffResult<E>): DiffCounts {
  return {
    add: diff.toAdd.length,
    remove: diff.toRemove.length,
    change: diff.toChange.length,
  };
}

export function isEmptyDiff<E>(diff: DiffResult<E>): boolean {
  return (
    diff.toAdd.length === 0 &&
    diff.toRemove.length === 0 &&
    diff.toChange.length === 0
  );
}
