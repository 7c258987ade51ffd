import {
  ORGANIZATION_ROLES,
  type OrganizationMember,
  type Team,
  type TeamMember,
} from "../entities/index.js";
import type { GitHubTarget, RawConfig } from "./types.js";
import {
  assertUnique,
  optionalInteger,
  optionalString,
  optionalStringArray,
  readTable,
  readTableArray,
  requireInteger,
  requireOneOf,
  requireString,
  type RawTable,
} from "./validators/field-validator.js";

function parseTeam(data: RawTable, context: string): Team {
  const name = requireString(data, "name", context);
  return {
    teamId: optionalInteger(data, "github_team_id", context) ?? 0,
    name,
    // The slug defaults to the team name
    slug: optionalString(data, "slug", context) ?? name,
    description: optionalString(data, "description", context) ?? "",
    parentTeamName: optionalString(data, "parent", context) ?? null,
  };
}

function parseMember(data: RawTable, context: string): OrganizationMember {
  return {
    userId: requireInteger(data, "github_user_id", context),
    userName: requireString(data, "github_user_name", context),
    role: requireOneOf(
      data,
      "organization_role",
      ORGANIZATION_ROLES,
      context
    ),
  };
}

/**
 * Build the declared GitHub organization state from a config document.
 *
 * ```toml
 * [organization]
 * name = "acme-co"
 *
 * [[team]]
 * name = "developers"
 * github_team_id = 9999
 * description = "All developers"
 * parent = "humans"
 *
 * [[member]]
 * github_user_id = 583231
 * github_user_name = "octocat"
 * organization_role = "member"
 * teams = ["developers"]
 * ```
 */
export function parseGitHubConfig(raw: RawConfig): GitHubTarget {
  const organization = requireString(
    readTable(raw, "organization", "config"),
    "name",
    "organization"
  );

  const teamTables = readTableArray(raw, "team", "config");
  const memberTables = readTableArray(raw, "member", "config");

  const teams = teamTables.map((data, i) => parseTeam(data, `team[${i}]`));
  const members = memberTables.map((data, i) =>
    parseMember(data, `member[${i}]`)
  );

  assertUnique(
    teams.map((t) => t.name),
    "team name",
    "team"
  );
  // Uncreated teams all share id 0
  assertUnique(
    teams.filter((t) => t.teamId !== 0).map((t) => String(t.teamId)),
    "github_team_id",
    "team"
  );
  assertUnique(
    members.map((m) => String(m.userId)),
    "github_user_id",
    "member"
  );

  const teamNames = new Set(teams.map((t) => t.name));
  for (const team of teams) {
    if (team.parentTeamName !== null && !teamNames.has(team.parentTeamName)) {
      throw new Error(
        `team '${team.name}': parent '${team.parentTeamName}' is not a declared team`
      );
    }
  }

  const teamMemberships: TeamMember[] = [];
  memberTables.forEach((data, i) => {
    const member = members[i];
    const context = `member[${i}]`;
    for (const teamName of optionalStringArray(data, "teams", context) ?? []) {
      if (!teamNames.has(teamName)) {
        throw new Error(
          `${context}: team '${teamName}' is not a declared team`
        );
      }
      teamMemberships.push({
        userId: member.userId,
        userName: member.userName,
        teamName,
      });
    }
  });

  return { organization, members, teams, teamMemberships };
}
