import { loadBitwardenConfig } from "../config/index.js";
import {
  compareStrings,
  computeDiff,
  formatDiffSummary,
} from "../diff/index.js";
import {
  collectionKind,
  groupKind,
  groupMemberKind,
  memberKind,
  type Member,
} from "../entities/index.js";
import {
  DiffReport,
  selectStyle,
  writeDiffReportSummary,
} from "../output/index.js";
import { logger, type ILogger } from "../shared/logger.js";
import { loadTarget, requireEnv, resolveConfigPath } from "./command-utils.js";
import {
  defaultBitwardenSourceFactory,
  type BitwardenSourceFactory,
  type CommandResult,
  type Env,
  type SharedOptions,
} from "./types.js";

/**
 * Options for the bitwarden command.
 */
export type BitwardenOptions = SharedOptions;

/**
 * Run the bitwarden command - compares a Bitwarden organization against its
 * declared members, collections, groups and group memberships.
 */
export async function runBitwarden(
  options: BitwardenOptions,
  sourceFactory: BitwardenSourceFactory = defaultBitwardenSourceFactory,
  log: ILogger = logger,
  env: Env = process.env
): Promise<CommandResult> {
  const configPath = resolveConfigPath(options.config, log);
  if (configPath === null) {
    return { exitCode: 1 };
  }

  const clientId = requireEnv(env, "BITWARDEN_CLIENT_ID", log);
  if (clientId === null) {
    return { exitCode: 1 };
  }
  const clientSecret = requireEnv(env, "BITWARDEN_CLIENT_SECRET", log);
  if (clientSecret === null) {
    return { exitCode: 1 };
  }

  const target = loadTarget(loadBitwardenConfig, configPath, log);
  if (target === null) {
    return { exitCode: 1 };
  }

  const fname = options.config;
  const source = await sourceFactory(clientId, clientSecret, {
    retries: options.retries,
    env,
  });
  const report = new DiffReport(log, selectStyle(options.color ?? true));

  const currentMembers = await source.getMembers();
  report.addDiff(
    "Members",
    computeDiff(memberKind, target.members, currentMembers),
    {
      add: `The following members are specified in ${fname} but not a member of the Bitwarden organization:`,
      remove: `The following members are not specified in ${fname} but are a member of the Bitwarden organization:`,
      change: `The following members on Bitwarden need to be changed to match ${fname}:`,
    }
  );

  const membersById = new Map<string, Member>(
    currentMembers.map((member) => [member.id, member])
  );
  const currentGroups = await source.getGroups();

  const currentCollections = await source.getCollections(
    currentGroups,
    membersById
  );
  report.addDiff(
    "Collections",
    computeDiff(collectionKind, target.collections, currentCollections),
    {
      add: `The following collections are specified in ${fname} but not present in the Bitwarden organization:`,
      remove: `The following collections are not specified in ${fname} but are present in the Bitwarden organization:`,
      change: `The following collections on Bitwarden need to be changed to match ${fname}:`,
    }
  );

  report.addDiff(
    "Groups",
    computeDiff(groupKind, target.groups, currentGroups),
    {
      add: `The following groups specified in ${fname} are not present on Bitwarden:`,
      remove: `The following groups are not specified in ${fname} but are present on Bitwarden:`,
      change: `The following groups on Bitwarden need to be changed to match ${fname}:`,
    }
  );

  // Compare members of the groups that should exist and do exist
  const targetGroupNames = new Set(target.groups.map((group) => group.name));
  const existingDesiredGroups = currentGroups
    .filter((group) => targetGroupNames.has(group.name))
    .sort((a, b) => compareStrings(a.name, b.name));

  for (let i = 0; i < existingDesiredGroups.length; i++) {
    const group = existingDesiredGroups[i];
    log.progress(
      i + 1,
      existingDesiredGroups.length,
      `Fetching members of group '${group.name}'`
    );
    const actualMembers = await source.getGroupMembers(group, membersById);
    report.addMembershipDiff(
      `Group ${group.name}`,
      computeDiff(
        groupMemberKind,
        target.groupMemberships.filter((m) => m.groupName === group.name),
        actualMembers
      ),
      {
        remove: `The following members of group '${group.name}' are not specified in ${fname}, but are present on Bitwarden:`,
        add: `The following members of group '${group.name}' are specified in ${fname}, but are not present on Bitwarden:`,
      },
      (membership) => membership.memberName
    );
  }

  log.info(formatDiffSummary(report.getTotals()));
  writeDiffReportSummary(
    report,
    "Bitwarden organization",
    env.GITHUB_STEP_SUMMARY
  );

  return { exitCode: options.failOnDiff && report.hasDifferences() ? 1 : 0 };
}
