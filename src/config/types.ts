import type {
  Collection,
  Group,
  GroupMember,
  Member,
  OrganizationMember,
  Team,
  TeamMember,
} from "../entities/index.js";

/**
 * Parsed but unvalidated config document.
 */
export type RawConfig = Record<string, unknown>;

export type ConfigFormat = "toml" | "yaml";

/**
 * Declared state of a GitHub organization.
 */
export interface GitHubTarget {
  organization: string;
  members: OrganizationMember[];
  teams: Team[];
  teamMemberships: TeamMember[];
}

/**
 * Declared state of a Bitwarden organization.
 */
export interface BitwardenTarget {
  members: Member[];
  groups: Group[];
  groupMemberships: GroupMember[];
  collections: Collection[];
}
