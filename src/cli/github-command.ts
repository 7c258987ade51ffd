import { loadGitHubConfig } from "../config/index.js";
import {
  compareStrings,
  computeDiff,
  formatDiffSummary,
} from "../diff/index.js";
import {
  organizationMemberKind,
  teamKind,
  teamMemberKind,
} from "../entities/index.js";
import {
  DiffReport,
  selectStyle,
  writeDiffReportSummary,
} from "../output/index.js";
import { logger, type ILogger } from "../shared/logger.js";
import { loadTarget, requireEnv, resolveConfigPath } from "./command-utils.js";
import {
  defaultGitHubSourceFactory,
  type CommandResult,
  type Env,
  type GitHubSourceFactory,
  type SharedOptions,
} from "./types.js";

/**
 * Options for the github command.
 */
export type GitHubOptions = SharedOptions;

/**
 * Run the github command - compares a GitHub organization against its
 * declared members, teams and team memberships.
 */
export async function runGitHub(
  options: GitHubOptions,
  sourceFactory: GitHubSourceFactory = defaultGitHubSourceFactory,
  log: ILogger = logger,
  env: Env = process.env
): Promise<CommandResult> {
  const configPath = resolveConfigPath(options.config, log);
  if (configPath === null) {
    return { exitCode: 1 };
  }

  const token = requireEnv(env, "GITHUB_TOKEN", log);
  if (token === null) {
    return { exitCode: 1 };
  }

  const target = loadTarget(loadGitHubConfig, configPath, log);
  if (target === null) {
    return { exitCode: 1 };
  }

  const fname = options.config;
  const org = target.organization;
  const source = sourceFactory(token, { retries: options.retries, env });
  const report = new DiffReport(log, selectStyle(options.color ?? true));

  const currentMembers = await source.getOrganizationMembers(org);
  report.addDiff(
    "Members",
    computeDiff(organizationMemberKind, target.members, currentMembers),
    {
      add: `The following members are specified in ${fname} but not a member of the GitHub organization:`,
      remove: `The following members of the GitHub organization are not specified in ${fname}:`,
      change: `The following members on GitHub need to be changed to match ${fname}:`,
    }
  );

  const currentTeams = await source.getOrganizationTeams(org);
  report.addDiff(
    "Teams",
    computeDiff(teamKind, target.teams, currentTeams),
    {
      add: `The following teams specified in ${fname} are not present on GitHub:`,
      remove: `The following teams in the GitHub organization are not specified in ${fname}:`,
      change: `The following teams on GitHub need to be changed to match ${fname}:`,
    }
  );

  // Compare members of the teams that should exist and do exist. The remote
  // team is passed on, since its slug is the one the API knows.
  const targetTeamNames = new Set(target.teams.map((team) => team.name));
  const existingDesiredTeams = currentTeams
    .filter((team) => targetTeamNames.has(team.name))
    .sort((a, b) => compareStrings(a.name, b.name));

  for (let i = 0; i < existingDesiredTeams.length; i++) {
    const team = existingDesiredTeams[i];
    log.progress(
      i + 1,
      existingDesiredTeams.length,
      `Fetching members of team '${team.name}'`
    );
    const actualMembers = await source.getTeamMembers(org, team);
    report.addMembershipDiff(
      `Team ${team.name}`,
      computeDiff(
        teamMemberKind,
        target.teamMemberships.filter((m) => m.teamName === team.name),
        actualMembers
      ),
      {
        remove: `The following members of team '${team.name}' are not specified in ${fname}, but are present on GitHub:`,
        add: `The following members of team '${team.name}' are not members on GitHub, but are specified in ${fname}:`,
      },
      (membership) => membership.userName
    );
  }

  log.info(formatDiffSummary(report.getTotals()));
  writeDiffReportSummary(
    report,
    `GitHub organization ${org}`,
    env.GITHUB_STEP_SUMMARY
  );

  return { exitCode: options.failOnDiff && report.hasDifferences() ? 1 : 0 };
}
