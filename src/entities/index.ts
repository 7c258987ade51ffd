// GitHub
export {
  organizationMemberKind,
  teamKind,
  teamMemberKind,
  ORGANIZATION_ROLES,
  type OrganizationRole,
  type OrganizationMember,
  type Team,
  type TeamMember,
} from "./github.js";

// Bitwarden
export {
  memberKind,
  groupKind,
  groupMemberKind,
  collectionKind,
  memberTypeFromApi,
  normalizeMemberAccess,
  normalizeGroupAccess,
  MEMBER_TYPES,
  type MemberType,
  type CollectionAccessLevel,
  type Member,
  type Group,
  type GroupMember,
  type MemberCollectionAccess,
  type GroupCollectionAccess,
  type Collection,
} from "./bitwarden.js";

// TOML rendering
export {
  formatTomlValue,
  formatTomlLine,
  formatInlineTable,
  formatTableArray,
} from "./toml-format.js";
