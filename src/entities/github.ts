import { compareFields, valueKey, type EntityKind } from "../diff/index.js";
import { formatTomlLine } from "./toml-format.js";

// =============================================================================
// Types
// =============================================================================

export type OrganizationRole = "admin" | "member";

export const ORGANIZATION_ROLES: readonly OrganizationRole[] = [
  "admin",
  "member",
];

export interface OrganizationMember {
  readonly userId: number;
  readonly userName: string;
  readonly role: OrganizationRole;
}

export interface Team {
  /** 0 for a team that has not been created on GitHub yet. */
  readonly teamId: number;
  readonly name: string;
  readonly slug: string;
  readonly description: string;
  readonly parentTeamName: string | null;
}

/**
 * "User X is a member of team Y". Has no identifier of its own.
 */
export interface TeamMember {
  readonly userId: number;
  readonly userName: string;
  readonly teamName: string;
}

// =============================================================================
// Entity Kinds
// =============================================================================

export const organizationMemberKind: EntityKind<OrganizationMember> = {
  name: "member",
  identity: (member) => member.userId,
  compare: (a, b) =>
    compareFields(a, b, [(m) => m.userId, (m) => m.userName, (m) => m.role]),
  render: (member) =>
    [
      "[[member]]",
      formatTomlLine("github_user_id", member.userId),
      formatTomlLine("github_user_name", member.userName),
      formatTomlLine("organization_role", member.role),
    ].join("\n"),
};

export const teamKind: EntityKind<Team> = {
  name: "team",
  // Every remote team has a real id, so an uncreated team is always an add.
  identity: (team) => (team.teamId !== 0 ? team.teamId : `slug:${team.slug}`),
  compare: (a, b) =>
    compareFields(a, b, [
      (t) => t.teamId,
      (t) => t.name,
      (t) => t.slug,
      (t) => t.description,
      (t) => t.parentTeamName,
    ]),
  render: (team) => {
    const lines = [
      "[[team]]",
      formatTomlLine("github_team_id", team.teamId),
      formatTomlLine("name", team.name),
    ];
    // The slug defaults to the name
    if (team.slug !== team.name) {
      lines.push(formatTomlLine("slug", team.slug));
    }
    lines.push(formatTomlLine("description", team.description));
    if (team.parentTeamName !== null) {
      lines.push(formatTomlLine("parent", team.parentTeamName));
    }
    return lines.join("\n");
  },
};

export const teamMemberKind: EntityKind<TeamMember> = {
  name: "team membership",
  // The full value: a membership is only ever added or removed
  identity: (membership) => valueKey(membership),
  compare: (a, b) =>
    compareFields(a, b, [
      (m) => m.userId,
      (m) => m.userName,
      (m) => m.teamName,
    ]),
  render: (membership) => membership.userName,
};
