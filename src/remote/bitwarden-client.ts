import {
  memberTypeFromApi,
  normalizeGroupAccess,
  normalizeMemberAccess,
  type Collection,
  type Group,
  type GroupCollectionAccess,
  type GroupMember,
  type Member,
  type MemberCollectionAccess,
} from "../entities/index.js";
import { logger as defaultLogger, type ILogger } from "../shared/logger.js";
import { HttpClient, type FetchFn } from "./http.js";
import {
  asArray,
  asObject,
  getBoolean,
  getNullableString,
  getNumber,
  getString,
} from "./payload.js";

export const DEFAULT_BITWARDEN_API_URL = "https://api.bitwarden.com";
export const DEFAULT_BITWARDEN_IDENTITY_URL = "https://identity.bitwarden.com";

export interface BitwardenClientOptions {
  /** Public API root, for self-hosted instances. */
  apiUrl?: string;
  /** Identity server root, for self-hosted instances. */
  identityUrl?: string;
  fetch?: FetchFn;
  retries?: number;
  retryMinTimeout?: number;
  logger?: ILogger;
}

function trimSlash(url: string): string {
  return url.replace(/\/+$/, "");
}

/**
 * Request an organization API token with the client credentials grant.
 */
export async function requestAccessToken(
  clientId: string,
  clientSecret: string,
  options: BitwardenClientOptions = {}
): Promise<string> {
  const http = new HttpClient({
    fetch: options.fetch,
    retries: options.retries,
    retryMinTimeout: options.retryMinTimeout,
    logger: options.logger,
  });
  const identityUrl = trimSlash(
    options.identityUrl ?? DEFAULT_BITWARDEN_IDENTITY_URL
  );
  const url = `${identityUrl}/connect/token`;

  const res = await http.request(url, {
    method: "POST",
    headers: {
      "Content-Type": "application/x-www-form-urlencoded",
      Accept: "application/json",
    },
    body: new URLSearchParams({
      grant_type: "client_credentials",
      scope: "api.organization",
      client_id: clientId,
      client_secret: clientSecret,
    }).toString(),
  });

  const body = asObject(await res.json(), "token response");
  return getString(body, "access_token", "token response");
}

/**
 * Reads the actual state of a Bitwarden organization through the public
 * API.
 */
export class BitwardenClient {
  private readonly http: HttpClient;
  private readonly apiUrl: string;
  private readonly log: ILogger;
  /** Group id -> member ids; shared by group and collection lookups. */
  private readonly memberIdsByGroup = new Map<string, string[]>();

  constructor(accessToken: string, options: BitwardenClientOptions = {}) {
    this.apiUrl = trimSlash(options.apiUrl ?? DEFAULT_BITWARDEN_API_URL);
    this.log = options.logger ?? defaultLogger;
    this.http = new HttpClient({
      fetch: options.fetch,
      retries: options.retries,
      retryMinTimeout: options.retryMinTimeout,
      logger: this.log,
      headers: {
        Authorization: `Bearer ${accessToken}`,
        Accept: "application/json",
      },
    });
  }

  static async connect(
    clientId: string,
    clientSecret: string,
    options: BitwardenClientOptions = {}
  ): Promise<BitwardenClient> {
    const token = await requestAccessToken(clientId, clientSecret, options);
    return new BitwardenClient(token, options);
  }

  /**
   * List endpoints wrap their items as `{ "data": [...] }`.
   */
  private async getList(path: string, what: string): Promise<unknown[]> {
    const body = asObject(
      await this.http.getJson(`${this.apiUrl}${path}`),
      what
    );
    return asArray(body.data, `${what}.data`);
  }

  async getMembers(): Promise<Member[]> {
    this.log.debug("Fetching members");
    const members = await this.getList("/public/members", "members");

    return members.map((item): Member => {
      const member = asObject(item, "member");
      return {
        id: getString(member, "id", "member"),
        // Invited members have not set a name yet
        name: getNullableString(member, "name", "member") ?? "",
        email: getString(member, "email", "member"),
        type: memberTypeFromApi(getNumber(member, "type", "member")),
        accessAll: getBoolean(member, "accessAll", "member", false),
      };
    });
  }

  async getGroups(): Promise<Group[]> {
    this.log.debug("Fetching groups");
    const groups = await this.getList("/public/groups", "groups");

    return groups.map((item): Group => {
      const group = asObject(item, "group");
      return {
        id: getString(group, "id", "group"),
        name: getString(group, "name", "group"),
        accessAll: getBoolean(group, "accessAll", "group", false),
      };
    });
  }

  async getGroupMemberIds(groupId: string): Promise<string[]> {
    const cached = this.memberIdsByGroup.get(groupId);
    if (cached) {
      return cached;
    }

    const body = await this.http.getJson(
      `${this.apiUrl}/public/groups/${encodeURIComponent(groupId)}/member-ids`
    );
    const ids = asArray(body, "member ids").map((id) => {
      if (typeof id !== "string") {
        throw new Error("Unexpected API response: member ids must be strings");
      }
      return id;
    });
    this.memberIdsByGroup.set(groupId, ids);
    return ids;
  }

  async getGroupMembers(
    group: Group,
    membersById: ReadonlyMap<string, Member>
  ): Promise<GroupMember[]> {
    const ids = await this.getGroupMemberIds(group.id);
    return ids.map(
      (memberId): GroupMember => ({
        memberId,
        memberName: this.memberName(memberId, membersById),
        groupName: group.name,
      })
    );
  }

  /**
   * Collections with their access lists. Group names come from `groups`;
   * member access is derived from the members of the groups that have
   * access. Both lists are null when no group has access.
   */
  async getCollections(
    groups: readonly Group[],
    membersById: ReadonlyMap<string, Member>
  ): Promise<Collection[]> {
    const groupsById = new Map(groups.map((g) => [g.id, g]));
    const summaries = await this.getList("/public/collections", "collections");
    const collections: Collection[] = [];

    for (let i = 0; i < summaries.length; i++) {
      const id = getString(
        asObject(summaries[i], "collection"),
        "id",
        "collection"
      );
      this.log.progress(i + 1, summaries.length, `Fetching collection ${id}`);

      const detail = asObject(
        await this.http.getJson(
          `${this.apiUrl}/public/collections/${encodeURIComponent(id)}`
        ),
        "collection"
      );
      const accessGroups = asArray(
        detail.groups ?? [],
        "collection.groups"
      ).map((entry) => asObject(entry, "collection.groups[]"));

      let groupAccess: GroupCollectionAccess[] | null = null;
      let memberAccess: MemberCollectionAccess[] | null = null;

      if (accessGroups.length > 0) {
        const groupEntries: GroupCollectionAccess[] = [];
        const memberEntries: MemberCollectionAccess[] = [];

        for (const entry of accessGroups) {
          const groupId = getString(entry, "id", "collection.groups[]");
          const readOnly = getBoolean(
            entry,
            "readOnly",
            "collection.groups[]",
            false
          );
          groupEntries.push({
            groupName: groupsById.get(groupId)?.name ?? groupId,
            access: readOnly ? "readonly" : "write",
          });
          for (const memberId of await this.getGroupMemberIds(groupId)) {
            memberEntries.push({
              memberName: this.memberName(memberId, membersById),
            });
          }
        }

        groupAccess = normalizeGroupAccess(groupEntries);
        if (memberEntries.length > 0) {
          memberAccess = normalizeMemberAccess(memberEntries);
        }
      }

      collections.push({
        id,
        externalId:
          getNullableString(detail, "externalId", "collection") ?? "",
        memberAccess,
        groupAccess,
      });
    }

    return collections;
  }

  private memberName(
    memberId: string,
    membersById: ReadonlyMap<string, Member>
  ): string {
    const member = membersById.get(memberId);
    if (member === undefined) {
      this.log.warn(`Member ${memberId} is not listed in the organization`);
      return memberId;
    }
    return member.name;
  }
}
