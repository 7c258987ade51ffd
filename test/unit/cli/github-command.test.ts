import { test, describe, beforeEach, afterEach } from "node:test";
import { strict as assert } from "node:assert";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join, resolve } from "node:path";
import { runGitHub } from "../../../src/cli/github-command.js";
import type {
  GitHubSourceFactory,
  IGitHubStateSource,
  SourceFactoryOptions,
} from "../../../src/cli/types.js";
import type {
  OrganizationMember,
  Team,
  TeamMember,
} from "../../../src/entities/index.js";
import { createMockLogger } from "../../mocks/index.js";

const CONFIG = `[organization]
name = "acme"

[[team]]
name = "core"
github_team_id = 10

[[team]]
name = "infra"

[[member]]
github_user_id = 1
github_user_name = "alice"
organization_role = "admin"
teams = ["core"]

[[member]]
github_user_id = 2
github_user_name = "bob"
organization_role = "member"
teams = ["core"]
`;

const coreTeam: Team = {
  teamId: 10,
  name: "core",
  slug: "core",
  description: "",
  parentTeamName: null,
};
const legacyTeam: Team = {
  ...coreTeam,
  teamId: 20,
  name: "legacy",
  slug: "legacy",
};

interface FakeState {
  members: OrganizationMember[];
  teams: Team[];
  teamMembers: Record<string, TeamMember[]>;
}

const actualState: FakeState = {
  members: [
    { userId: 1, userName: "alice", role: "member" },
    { userId: 3, userName: "carol", role: "member" },
  ],
  teams: [coreTeam, legacyTeam],
  teamMembers: {
    core: [
      { userId: 1, userName: "alice", teamName: "core" },
      { userId: 3, userName: "carol", teamName: "core" },
    ],
  },
};

interface FactoryCall {
  token: string;
  options: SourceFactoryOptions;
}

function createFakeFactory(state: FakeState) {
  const calls: FactoryCall[] = [];
  const teamRequests: string[] = [];
  const source: IGitHubStateSource = {
    getOrganizationMembers: async () => state.members,
    getOrganizationTeams: async () => state.teams,
    getTeamMembers: async (org, team) => {
      teamRequests.push(`${org}/${team.slug}`);
      return state.teamMembers[team.name] ?? [];
    },
  };
  const factory: GitHubSourceFactory = (token, options) => {
    calls.push({ token, options });
    return source;
  };
  return { factory, calls, teamRequests };
}

describe("runGitHub", () => {
  let dir: string;
  let configPath: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "access-diff-github-"));
    configPath = join(dir, "github.toml");
    writeFileSync(configPath, CONFIG);
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test("prints member, team and team membership differences", async () => {
    const { factory, teamRequests } = createFakeFactory(actualState);
    const { mock, messages, progress } = createMockLogger();

    const result = await runGitHub(
      { config: configPath, color: false },
      factory,
      mock,
      { GITHUB_TOKEN: "test-token" }
    );

    assert.deepEqual(result, { exitCode: 0 });
    assert.deepEqual(messages, [
      `The following members are specified in ${configPath} but not a member of the GitHub organization:`,
      "",
      "  [[member]]",
      "  github_user_id = 2",
      '  github_user_name = "bob"',
      '  organization_role = "member"',
      "",
      `The following members of the GitHub organization are not specified in ${configPath}:`,
      "",
      "  [[member]]",
      "  github_user_id = 3",
      '  github_user_name = "carol"',
      '  organization_role = "member"',
      "",
      `The following members on GitHub need to be changed to match ${configPath}:`,
      "",
      "  [[member]]",
      "  github_user_id = 1",
      '  github_user_name = "alice"',
      '- organization_role = "member"',
      '+ organization_role = "admin"',
      "",
      `The following teams specified in ${configPath} are not present on GitHub:`,
      "",
      "  [[team]]",
      "  github_team_id = 0",
      '  name = "infra"',
      '  description = ""',
      "",
      `The following teams in the GitHub organization are not specified in ${configPath}:`,
      "",
      "  [[team]]",
      "  github_team_id = 20",
      '  name = "legacy"',
      '  description = ""',
      "",
      `The following members of team 'core' are not specified in ${configPath}, but are present on GitHub:`,
      "",
      "  carol",
      "",
      `The following members of team 'core' are not members on GitHub, but are specified in ${configPath}:`,
      "",
      "  bob",
      "",
      "Summary: 3 to add, 1 to change, 3 to remove",
    ]);
    assert.deepEqual(teamRequests, ["acme/core"]);
    assert.deepEqual(progress, [
      { current: 1, total: 1, message: "Fetching members of team 'core'" },
    ]);
  });

  test("prints only the summary when nothing differs", async () => {
    const { factory } = createFakeFactory({
      members: [
        { userId: 1, userName: "alice", role: "admin" },
        { userId: 2, userName: "bob", role: "member" },
      ],
      teams: [coreTeam, { ...coreTeam, teamId: 0, name: "infra", slug: "infra" }],
      teamMembers: {
        core: [
          { userId: 2, userName: "bob", teamName: "core" },
          { userId: 1, userName: "alice", teamName: "core" },
        ],
      },
    });
    const { mock, messages } = createMockLogger();

    const result = await runGitHub(
      { config: configPath, color: false, failOnDiff: true },
      factory,
      mock,
      { GITHUB_TOKEN: "test-token" }
    );

    assert.deepEqual(result, { exitCode: 0 });
    assert.deepEqual(messages, ["No differences found."]);
  });

  test("prints a team member whose login differs", async () => {
    const { factory } = createFakeFactory({
      members: [
        { userId: 1, userName: "alice", role: "admin" },
        { userId: 2, userName: "bob", role: "member" },
      ],
      teams: [coreTeam, { ...coreTeam, teamId: 0, name: "infra", slug: "infra" }],
      teamMembers: {
        core: [
          { userId: 1, userName: "alice-renamed", teamName: "core" },
          { userId: 2, userName: "bob", teamName: "core" },
        ],
      },
    });
    const { mock, messages } = createMockLogger();

    const result = await runGitHub(
      { config: configPath, color: false, failOnDiff: true },
      factory,
      mock,
      { GITHUB_TOKEN: "test-token" }
    );

    assert.deepEqual(result, { exitCode: 1 });
    assert.deepEqual(messages, [
      `The following members of team 'core' are not specified in ${configPath}, but are present on GitHub:`,
      "",
      "  alice-renamed",
      "",
      `The following members of team 'core' are not members on GitHub, but are specified in ${configPath}:`,
      "",
      "  alice",
      "",
      "Summary: 1 to add, 1 to remove",
    ]);
  });

  test("exits with 1 on differences with failOnDiff", async () => {
    const { factory } = createFakeFactory(actualState);
    const { mock } = createMockLogger();

    const result = await runGitHub(
      { config: configPath, color: false, failOnDiff: true },
      factory,
      mock,
      { GITHUB_TOKEN: "test-token" }
    );

    assert.deepEqual(result, { exitCode: 1 });
  });

  test("passes the token and retries to the source factory", async () => {
    const { factory, calls } = createFakeFactory(actualState);
    const { mock } = createMockLogger();
    const env = { GITHUB_TOKEN: "test-token" };

    await runGitHub({ config: configPath, retries: 0 }, factory, mock, env);

    assert.deepEqual(calls, [
      { token: "test-token", options: { retries: 0, env } },
    ]);
  });

  test("writes the step summary", async () => {
    const { factory } = createFakeFactory(actualState);
    const { mock } = createMockLogger();
    const summaryPath = join(dir, "summary.md");

    await runGitHub({ config: configPath, color: false }, factory, mock, {
      GITHUB_TOKEN: "test-token",
      GITHUB_STEP_SUMMARY: summaryPath,
    });

    const summary = readFileSync(summaryPath, "utf-8");
    assert.ok(summary.startsWith("\n## GitHub organization acme\n\n### Members\n"));
    assert.ok(summary.endsWith("**Summary: 3 to add, 1 to change, 3 to remove**\n"));
  });

  test("fails when the config file is missing", async () => {
    const { factory, calls } = createFakeFactory(actualState);
    const { mock, errors } = createMockLogger();
    const missing = join(dir, "missing.toml");

    const result = await runGitHub({ config: missing }, factory, mock, {
      GITHUB_TOKEN: "test-token",
    });

    assert.deepEqual(result, { exitCode: 1 });
    assert.deepEqual(errors, [`Config file not found: ${resolve(missing)}`]);
    assert.equal(calls.length, 0);
  });

  test("fails without a token", async () => {
    const { factory, calls } = createFakeFactory(actualState);
    const { mock, errors } = createMockLogger();

    const result = await runGitHub({ config: configPath }, factory, mock, {});

    assert.deepEqual(result, { exitCode: 1 });
    assert.deepEqual(errors, [
      "Expected GITHUB_TOKEN environment variable to be set. See also --help.",
    ]);
    assert.equal(calls.length, 0);
  });

  test("reports an invalid config", async () => {
    writeFileSync(configPath, '[organization]\nname = ""\n');
    const { factory, calls } = createFakeFactory(actualState);
    const { mock, errors } = createMockLogger();

    const result = await runGitHub({ config: configPath }, factory, mock, {
      GITHUB_TOKEN: "test-token",
    });

    assert.deepEqual(result, { exitCode: 1 });
    assert.deepEqual(errors, ["organization: name must be a non-empty string"]);
    assert.equal(calls.length, 0);
  });

  test("reports declared teams sharing an id as a config error", async () => {
    writeFileSync(
      configPath,
      [
        "[organization]",
        'name = "acme"',
        "",
        "[[team]]",
        'name = "core"',
        "github_team_id = 10",
        "",
        "[[team]]",
        'name = "infra"',
        "github_team_id = 10",
        "",
      ].join("\n")
    );
    const { factory, calls } = createFakeFactory(actualState);
    const { mock, errors } = createMockLogger();

    const result = await runGitHub({ config: configPath }, factory, mock, {
      GITHUB_TOKEN: "test-token",
    });

    assert.deepEqual(result, { exitCode: 1 });
    assert.deepEqual(errors, ["team: duplicate github_team_id '10'"]);
    assert.equal(calls.length, 0);
  });

  test("rejects ambiguous remote state", async () => {
    const { factory } = createFakeFactory({
      ...actualState,
      members: [
        { userId: 5, userName: "dave", role: "member" },
        { userId: 5, userName: "dave2", role: "member" },
      ],
    });
    const { mock } = createMockLogger();

    await assert.rejects(
      runGitHub({ config: configPath, color: false }, factory, mock, {
        GITHUB_TOKEN: "test-token",
      }),
      { name: "AmbiguousIdentityError" }
    );
  });
});
