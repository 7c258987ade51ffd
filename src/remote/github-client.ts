import type {
  OrganizationMember,
  Team,
  TeamMember,
} from "../entities/index.js";
import { logger as defaultLogger, type ILogger } from "../shared/logger.js";
import { HttpClient, type FetchFn } from "./http.js";
import {
  asObject,
  getNullableString,
  getNumber,
  getString,
} from "./payload.js";

export const DEFAULT_GITHUB_API_URL = "https://api.github.com";

const PAGE_SIZE = 100;

export interface GitHubClientOptions {
  /** API root, e.g. `https://ghe.example.com/api/v3` for GitHub Enterprise. */
  apiUrl?: string;
  fetch?: FetchFn;
  retries?: number;
  retryMinTimeout?: number;
  logger?: ILogger;
}

/**
 * Reads the actual state of a GitHub organization through the REST API.
 */
export class GitHubClient {
  private readonly http: HttpClient;
  private readonly apiUrl: string;
  private readonly log: ILogger;

  constructor(token: string, options: GitHubClientOptions = {}) {
    this.apiUrl = (options.apiUrl ?? DEFAULT_GITHUB_API_URL).replace(
      /\/+$/,
      ""
    );
    this.log = options.logger ?? defaultLogger;
    this.http = new HttpClient({
      fetch: options.fetch,
      retries: options.retries,
      retryMinTimeout: options.retryMinTimeout,
      logger: this.log,
      headers: {
        Authorization: `Bearer ${token}`,
        Accept: "application/vnd.github+json",
        "X-GitHub-Api-Version": "2022-11-28",
        "User-Agent": "access-diff",
      },
    });
  }

  private listUrl(path: string, query: Record<string, string> = {}): string {
    const params = new URLSearchParams({
      ...query,
      per_page: String(PAGE_SIZE),
    });
    return `${this.apiUrl}${path}?${params.toString()}`;
  }

  /**
   * Organization members with their role. Admins are listed separately,
   * which saves one membership request per member.
   */
  async getOrganizationMembers(org: string): Promise<OrganizationMember[]> {
    const orgPath = `/orgs/${encodeURIComponent(org)}/members`;

    this.log.progress(1, 2, `Fetching members of ${org}`);
    const members = await this.http.getAllPages(this.listUrl(orgPath));
    this.log.progress(2, 2, `Fetching admins of ${org}`);
    const admins = await this.http.getAllPages(
      this.listUrl(orgPath, { role: "admin" })
    );

    const adminIds = new Set(
      admins.map((admin) =>
        getNumber(asObject(admin, "member"), "id", "member")
      )
    );

    return members.map((item): OrganizationMember => {
      const member = asObject(item, "member");
      const userId = getNumber(member, "id", "member");
      return {
        userId,
        userName: getString(member, "login", "member"),
        role: adminIds.has(userId) ? "admin" : "member",
      };
    });
  }

  async getOrganizationTeams(org: string): Promise<Team[]> {
    this.log.debug(`Fetching teams of ${org}`);
    const teams = await this.http.getAllPages(
      this.listUrl(`/orgs/${encodeURIComponent(org)}/teams`)
    );

    return teams.map((item): Team => {
      const team = asObject(item, "team");
      const parent =
        team.parent === null || team.parent === undefined
          ? null
          : asObject(team.parent, "team.parent");
      return {
        teamId: getNumber(team, "id", "team"),
        name: getString(team, "name", "team"),
        slug: getString(team, "slug", "team"),
        description: getNullableString(team, "description", "team") ?? "",
        parentTeamName:
          parent === null ? null : getString(parent, "name", "team.parent"),
      };
    });
  }

  /**
   * Members of a team. Takes the remote team, since the endpoint needs its
   * actual slug.
   */
  async getTeamMembers(org: string, team: Team): Promise<TeamMember[]> {
    this.log.debug(`Fetching members of team '${team.name}'`);
    const members = await this.http.getAllPages(
      this.listUrl(
        `/orgs/${encodeURIComponent(org)}/teams/${encodeURIComponent(team.slug)}/members`
      )
    );

    return members.map((item): TeamMember => {
      const member = asObject(item, "team member");
      return {
        userId: getNumber(member, "id", "team member"),
        userName: getString(member, "login", "team member"),
        teamName: team.name,
      };
    });
  }
}
