import { test, describe } from "node:test";
import { strict as assert } from "node:assert";
import {
  collectionKind,
  groupKind,
  groupMemberKind,
  memberKind,
  memberTypeFromApi,
  normalizeGroupAccess,
  normalizeMemberAccess,
  type Collection,
} from "../../../src/entities/bitwarden.js";

function collection(overrides: Partial<Collection> = {}): Collection {
  return {
    id: "col-1",
    externalId: "secrets",
    memberAccess: null,
    groupAccess: null,
    ...overrides,
  };
}

describe("memberTypeFromApi", () => {
  test("maps API integers to member types", () => {
    assert.equal(memberTypeFromApi(0), "owner");
    assert.equal(memberTypeFromApi(2), "user");
    assert.equal(memberTypeFromApi(4), "custom");
  });

  test("rejects unknown integers", () => {
    assert.throws(() => memberTypeFromApi(5), {
      message: "Unknown Bitwarden member type: 5",
    });
  });
});

describe("normalizeMemberAccess", () => {
  test("deduplicates and sorts by name", () => {
    assert.deepEqual(
      normalizeMemberAccess([
        { memberName: "carol" },
        { memberName: "alice" },
        { memberName: "carol" },
      ]),
      [{ memberName: "alice" }, { memberName: "carol" }]
    );
  });
});

describe("normalizeGroupAccess", () => {
  test("deduplicates and sorts by group then access", () => {
    assert.deepEqual(
      normalizeGroupAccess([
        { groupName: "ops", access: "write" },
        { groupName: "devs", access: "write" },
        { groupName: "devs", access: "readonly" },
        { groupName: "ops", access: "write" },
      ]),
      [
        { groupName: "devs", access: "readonly" },
        { groupName: "devs", access: "write" },
        { groupName: "ops", access: "write" },
      ]
    );
  });
});

describe("memberKind", () => {
  test("renders a member", () => {
    assert.equal(
      memberKind.render({
        id: "m-1",
        name: "alice",
        email: "alice@example.com",
        type: "user",
        accessAll: false,
      }),
      [
        "[[member]]",
        'member_id = "m-1"',
        'member_name = "alice"',
        'email = "alice@example.com"',
        'type = "user"',
        "access_all = false",
      ].join("\n")
    );
  });
});

describe("groupKind", () => {
  test("renders a group", () => {
    assert.equal(
      groupKind.render({ id: "g-1", name: "devs", accessAll: true }),
      ["[[group]]", 'group_id = "g-1"', 'group_name = "devs"', "access_all = true"].join(
        "\n"
      )
    );
  });
});

describe("groupMemberKind", () => {
  const membership = { memberId: "m-1", memberName: "alice", groupName: "devs" };

  test("identifies a membership by its full value", () => {
    assert.equal(
      groupMemberKind.identity(membership),
      '{"groupName":"devs","memberId":"m-1","memberName":"alice"}'
    );
  });

  test("renders the member name", () => {
    assert.equal(groupMemberKind.render(membership), "alice");
  });
});

describe("collectionKind", () => {
  test("identifies collections by id", () => {
    assert.equal(collectionKind.identity(collection()), "col-1");
  });

  test("renders access lists", () => {
    assert.equal(
      collectionKind.render(
        collection({
          memberAccess: [{ memberName: "alice" }],
          groupAccess: [{ groupName: "devs", access: "write" }],
        })
      ),
      [
        "[[collection]]",
        'collection_id = "col-1"',
        'external_id = "secrets"',
        "member_access = [",
        '  { member_name = "alice" },',
        "]",
        "group_access = [",
        '  { group_name = "devs", access = "write" },',
        "]",
      ].join("\n")
    );
  });

  test("omits absent access lists but keeps empty ones", () => {
    assert.equal(
      collectionKind.render(collection({ memberAccess: [] })),
      [
        "[[collection]]",
        'collection_id = "col-1"',
        'external_id = "secrets"',
        "member_access = []",
      ].join("\n")
    );
  });

  test("orders collections by id", () => {
    assert.ok(
      collectionKind.compare(collection({ id: "a" }), collection({ id: "b" })) < 0
    );
  });
});
