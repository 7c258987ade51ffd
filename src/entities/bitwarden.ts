import {
  compareFields,
  compareStrings,
  valueKey,
  type EntityKind,
} from "../diff/index.js";
import {
  formatInlineTable,
  formatTableArray,
  formatTomlLine,
} from "./toml-format.js";

// =============================================================================
// Types
// =============================================================================

export type MemberType = "owner" | "admin" | "user" | "manager" | "custom";

/** Position is the integer the Bitwarden public API uses. */
export const MEMBER_TYPES: readonly MemberType[] = [
  "owner",
  "admin",
  "user",
  "manager",
  "custom",
];

export type CollectionAccessLevel = "readonly" | "write";

export interface Member {
  readonly id: string;
  readonly name: string;
  readonly email: string;
  readonly type: MemberType;
  readonly accessAll: boolean;
}

export interface Group {
  readonly id: string;
  readonly name: string;
  readonly accessAll: boolean;
}

/**
 * "Member X belongs to group Y". Has no identifier of its own.
 */
export interface GroupMember {
  readonly memberId: string;
  readonly memberName: string;
  readonly groupName: string;
}

export interface MemberCollectionAccess {
  readonly memberName: string;
}

export interface GroupCollectionAccess {
  readonly groupName: string;
  readonly access: CollectionAccessLevel;
}

export interface Collection {
  readonly id: string;
  readonly externalId: string;
  /** null when the collection lists no member access at all. */
  readonly memberAccess: readonly MemberCollectionAccess[] | null;
  /** null when the collection lists no group access at all. */
  readonly groupAccess: readonly GroupCollectionAccess[] | null;
}

// =============================================================================
// Helpers
// =============================================================================

export function memberTypeFromApi(value: number): MemberType {
  const type = MEMBER_TYPES[value];
  if (type === undefined) {
    throw new Error(`Unknown Bitwarden member type: ${value}`);
  }
  return type;
}

/**
 * Deduplicate and sort member access entries. A member reachable through
 * several groups is listed once.
 */
export function normalizeMemberAccess(
  entries: Iterable<MemberCollectionAccess>
): MemberCollectionAccess[] {
  const names = new Set<string>();
  for (const entry of entries) {
    names.add(entry.memberName);
  }
  return [...names]
    .sort(compareStrings)
    .map((memberName) => ({ memberName }));
}

export function normalizeGroupAccess(
  entries: Iterable<GroupCollectionAccess>
): GroupCollectionAccess[] {
  const byKey = new Map<string, GroupCollectionAccess>();
  for (const entry of entries) {
    byKey.set(valueKey(entry), entry);
  }
  return [...byKey.values()].sort((a, b) =>
    compareFields(a, b, [(g) => g.groupName, (g) => g.access])
  );
}

// =============================================================================
// Entity Kinds
// =============================================================================

export const memberKind: EntityKind<Member> = {
  name: "member",
  identity: (member) => member.id,
  compare: (a, b) =>
    compareFields(a, b, [
      (m) => m.id,
      (m) => m.name,
      (m) => m.email,
      (m) => MEMBER_TYPES.indexOf(m.type),
      (m) => m.accessAll,
    ]),
  render: (member) =>
    [
      "[[member]]",
      formatTomlLine("member_id", member.id),
      formatTomlLine("member_name", member.name),
      formatTomlLine("email", member.email),
      formatTomlLine("type", member.type),
      formatTomlLine("access_all", member.accessAll),
    ].join("\n"),
};

export const groupKind: EntityKind<Group> = {
  name: "group",
  identity: (group) => group.id,
  compare: (a, b) =>
    compareFields(a, b, [(g) => g.id, (g) => g.name, (g) => g.accessAll]),
  render: (group) =>
    [
      "[[group]]",
      formatTomlLine("group_id", group.id),
      formatTomlLine("group_name", group.name),
      formatTomlLine("access_all", group.accessAll),
    ].join("\n"),
};

export const groupMemberKind: EntityKind<GroupMember> = {
  name: "group membership",
  // The full value: a membership is only ever added or removed
  identity: (membership) => valueKey(membership),
  compare: (a, b) =>
    compareFields(a, b, [
      (m) => m.memberId,
      (m) => m.memberName,
      (m) => m.groupName,
    ]),
  render: (membership) => membership.memberName,
};

export const collectionKind: EntityKind<Collection> = {
  name: "collection",
  identity: (collection) => collection.id,
  compare: (a, b) =>
    compareFields(a, b, [
      (c) => c.id,
      (c) => c.externalId,
      (c) => valueKey(c.memberAccess),
      (c) => valueKey(c.groupAccess),
    ]),
  render: (collection) => {
    const lines = [
      "[[collection]]",
      formatTomlLine("collection_id", collection.id),
      formatTomlLine("external_id", collection.externalId),
    ];
    if (collection.memberAccess !== null) {
      lines.push(
        ...formatTableArray(
          "member_access",
          collection.memberAccess.map((a) =>
            formatInlineTable([["member_name", a.memberName]])
          )
        )
      );
    }
    if (collection.groupAccess !== null) {
      lines.push(
        ...formatTableArray(
          "group_access",
          collection.groupAccess.map((a) =>
            formatInlineTable([
              ["group_name", a.groupName],
              ["access", a.access],
            ])
          )
        )
      );
    }
    return lines.join("\n");
  },
};
