import type {
  Collection,
  Group,
  GroupMember,
  Member,
  OrganizationMember,
  Team,
  TeamMember,
} from "../entities/index.js";
import { BitwardenClient, GitHubClient } from "../remote/index.js";

/**
 * Options common to all commands.
 */
export interface SharedOptions {
  config: string;
  retries?: number;
  failOnDiff?: boolean;
  /** False with --no-color. */
  color?: boolean;
}

export interface CommandResult {
  exitCode: number;
}

export type Env = Record<string, string | undefined>;

/**
 * Actual state of a GitHub organization, for dependency injection in tests.
 */
export interface IGitHubStateSource {
  getOrganizationMembers(org: string): Promise<OrganizationMember[]>;
  getOrganizationTeams(org: string): Promise<Team[]>;
  getTeamMembers(org: string, team: Team): Promise<TeamMember[]>;
}

export interface SourceFactoryOptions {
  retries?: number;
  env: Env;
}

/**
 * Factory function type for creating GitHub state sources.
 */
export type GitHubSourceFactory = (
  token: string,
  options: SourceFactoryOptions
) => IGitHubStateSource;

/**
 * Default factory that creates a real GitHubClient.
 */
export const defaultGitHubSourceFactory: GitHubSourceFactory = (
  token,
  options
) =>
  new GitHubClient(token, {
    apiUrl: options.env.GITHUB_API_URL,
    retries: options.retries,
  });

/**
 * Actual state of a Bitwarden organization, for dependency injection in
 * tests.
 */
export interface IBitwardenStateSource {
  getMembers(): Promise<Member[]>;
  getGroups(): Promise<Group[]>;
  getGroupMembers(
    group: Group,
    membersById: ReadonlyMap<string, Member>
  ): Promise<GroupMember[]>;
  getCollections(
    groups: readonly Group[],
    membersById: ReadonlyMap<string, Member>
  ): Promise<Collection[]>;
}

/**
 * Factory function type for creating Bitwarden state sources. Async, since
 * connecting requires a token exchange.
 */
export type BitwardenSourceFactory = (
  clientId: string,
  clientSecret: string,
  options: SourceFactoryOptions
) => Promise<IBitwardenStateSource>;

/**
 * Default factory that connects a real BitwardenClient.
 */
export const defaultBitwardenSourceFactory: BitwardenSourceFactory = (
  clientId,
  clientSecret,
  options
) =>
  BitwardenClient.connect(clientId, clientSecret, {
    apiUrl: options.env.BITWARDEN_API_URL,
    identityUrl: options.env.BITWARDEN_IDENTITY_URL,
    retries: options.retries,
  });
