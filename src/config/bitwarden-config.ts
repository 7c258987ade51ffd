import {
  MEMBER_TYPES,
  normalizeGroupAccess,
  normalizeMemberAccess,
  type Collection,
  type CollectionAccessLevel,
  type Group,
  type GroupCollectionAccess,
  type GroupMember,
  type Member,
  type MemberCollectionAccess,
  type MemberType,
} from "../entities/index.js";
import type { BitwardenTarget, RawConfig } from "./types.js";
import {
  assertUnique,
  optionalBoolean,
  optionalString,
  optionalStringArray,
  readTableArray,
  requireString,
  type RawTable,
} from "./validators/field-validator.js";

const ACCESS_LEVELS: readonly CollectionAccessLevel[] = ["readonly", "write"];

function parseMemberType(data: RawTable, context: string): MemberType {
  const value = requireString(data, "type", context).toLowerCase();
  const type = MEMBER_TYPES.find((candidate) => candidate === value);
  if (type === undefined) {
    throw new Error(
      `${context}: type must be one of: ${MEMBER_TYPES.join(", ")}`
    );
  }
  return type;
}

function parseMember(data: RawTable, context: string): Member {
  return {
    id: requireString(data, "member_id", context),
    name: requireString(data, "member_name", context),
    email: requireString(data, "email", context),
    type: parseMemberType(data, context),
    accessAll: optionalBoolean(data, "access_all", context) ?? false,
  };
}

function parseGroup(data: RawTable, context: string): Group {
  return {
    id: requireString(data, "group_id", context),
    name: requireString(data, "group_name", context),
    accessAll: optionalBoolean(data, "access_all", context) ?? false,
  };
}

/**
 * Access is `access = "readonly" | "write"`; the older
 * `read_only = true | false` spelling is accepted too.
 */
function parseAccessLevel(
  data: RawTable,
  context: string
): CollectionAccessLevel {
  const access = optionalString(data, "access", context);
  if (access !== undefined) {
    const level = ACCESS_LEVELS.find((l) => l === access.toLowerCase());
    if (level === undefined) {
      throw new Error(
        `${context}: access must be one of: ${ACCESS_LEVELS.join(", ")}`
      );
    }
    return level;
  }
  const readOnly = optionalBoolean(data, "read_only", context);
  if (readOnly === undefined) {
    throw new Error(`${context}: access or read_only is required`);
  }
  return readOnly ? "readonly" : "write";
}

function parseCollection(data: RawTable, context: string): Collection {
  let memberAccess: MemberCollectionAccess[] | null = null;
  if (data.member_access !== undefined) {
    memberAccess = normalizeMemberAccess(
      readTableArray(data, "member_access", context).map((entry, i) => ({
        memberName: requireString(
          entry,
          "member_name",
          `${context}.member_access[${i}]`
        ),
      }))
    );
  }

  let groupAccess: GroupCollectionAccess[] | null = null;
  if (data.group_access !== undefined) {
    groupAccess = normalizeGroupAccess(
      readTableArray(data, "group_access", context).map((entry, i) => {
        const entryContext = `${context}.group_access[${i}]`;
        return {
          groupName: requireString(entry, "group_name", entryContext),
          access: parseAccessLevel(entry, entryContext),
        };
      })
    );
  }

  return {
    id: requireString(data, "collection_id", context),
    externalId: optionalString(data, "external_id", context) ?? "",
    memberAccess,
    groupAccess,
  };
}

/**
 * Build the declared Bitwarden organization state from a config document.
 *
 * ```toml
 * [[member]]
 * member_id = "2564c11f-..."
 * member_name = "alice"
 * email = "alice@example.com"
 * type = "user"
 * groups = ["engineering"]
 *
 * [[group]]
 * group_id = "c6a13b93-..."
 * group_name = "engineering"
 *
 * [[collection]]
 * collection_id = "50351c20-..."
 * external_id = "engineering-secrets"
 * group_access = [{ group_name = "engineering", access = "readonly" }]
 * ```
 */
export function parseBitwardenConfig(raw: RawConfig): BitwardenTarget {
  const memberTables = readTableArray(raw, "member", "config");
  const members = memberTables.map((data, i) =>
    parseMember(data, `member[${i}]`)
  );
  const groups = readTableArray(raw, "group", "config").map((data, i) =>
    parseGroup(data, `group[${i}]`)
  );
  const collections = readTableArray(raw, "collection", "config").map(
    (data, i) => parseCollection(data, `collection[${i}]`)
  );

  assertUnique(
    members.map((m) => m.id),
    "member_id",
    "member"
  );
  assertUnique(
    groups.map((g) => g.id),
    "group_id",
    "group"
  );
  assertUnique(
    groups.map((g) => g.name),
    "group_name",
    "group"
  );
  assertUnique(
    collections.map((c) => c.id),
    "collection_id",
    "collection"
  );

  const groupNames = new Set(groups.map((g) => g.name));
  const groupMemberships: GroupMember[] = [];
  memberTables.forEach((data, i) => {
    const member = members[i];
    const context = `member[${i}]`;
    for (const groupName of optionalStringArray(data, "groups", context) ??
      []) {
      if (!groupNames.has(groupName)) {
        throw new Error(
          `${context}: group '${groupName}' is not a declared group`
        );
      }
      groupMemberships.push({
        memberId: member.id,
        memberName: member.name,
        groupName,
      });
    }
  });

  return { members, groups, groupMemberships, collections };
}
