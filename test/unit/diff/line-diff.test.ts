import { test, describe } from "node:test";
import { strict as assert } from "node:assert";
import {
  computeLineOpcodes,
  renderLineDiff,
  splitLines,
} from "../../../src/diff/line-diff.js";

describe("splitLines", () => {
  test("drops a trailing line break", () => {
    assert.deepEqual(splitLines("a\nb\n"), ["a", "b"]);
  });

  test("splits on every line break style", () => {
    assert.deepEqual(splitLines("a\r\nb\rc\nd"), ["a", "b", "c", "d"]);
  });

  test("returns no lines for empty text", () => {
    assert.deepEqual(splitLines(""), []);
  });

  test("keeps inner empty lines", () => {
    assert.deepEqual(splitLines("a\n\nb"), ["a", "", "b"]);
  });

  test("rejects non-string input", () => {
    assert.throws(() => Reflect.apply(splitLines, undefined, [null]), {
      name: "TypeError",
      message: "text must be a string, got null",
    });
  });
});

describe("computeLineOpcodes", () => {
  test("covers both sequences without gaps", () => {
    const opcodes = computeLineOpcodes(["a", "b", "c"], ["a", "x", "c"]);

    assert.deepEqual(opcodes, [
      { tag: "equal", i1: 0, i2: 1, j1: 0, j2: 1 },
      { tag: "replace", i1: 1, i2: 2, j1: 1, j2: 2 },
      { tag: "equal", i1: 2, i2: 3, j1: 2, j2: 3 },
    ]);
  });

  test("emits a single insert for empty actual lines", () => {
    assert.deepEqual(computeLineOpcodes([], ["a", "b"]), [
      { tag: "insert", i1: 0, i2: 0, j1: 0, j2: 2 },
    ]);
  });

  test("emits a single delete for empty target lines", () => {
    assert.deepEqual(computeLineOpcodes(["a"], []), [
      { tag: "delete", i1: 0, i2: 1, j1: 0, j2: 0 },
    ]);
  });

  test("emits nothing for two empty sequences", () => {
    assert.deepEqual(computeLineOpcodes([], []), []);
  });
});

describe("renderLineDiff", () => {
  test("prints unchanged lines with two spaces", () => {
    assert.deepEqual(renderLineDiff("x\ny", "x\ny"), ["  x", "  y"]);
  });

  test("marks a replaced line", () => {
    assert.deepEqual(renderLineDiff("a\nb\nc", "a\nB\nc"), [
      "  a",
      "- b",
      "+ B",
      "  c",
    ]);
  });

  test("marks appended lines", () => {
    assert.deepEqual(renderLineDiff("a", "a\nb"), ["  a", "+ b"]);
  });

  test("marks dropped lines", () => {
    assert.deepEqual(renderLineDiff("a\nb", "a"), ["  a", "- b"]);
  });

  test("prints all removals of a replaced block before its additions", () => {
    assert.deepEqual(renderLineDiff("a\nb\nc", "x\ny"), [
      "- a",
      "- b",
      "- c",
      "+ x",
      "+ y",
    ]);
  });

  test("prints every line as added when actual is empty", () => {
    assert.deepEqual(renderLineDiff("", "a\nb"), ["+ a", "+ b"]);
  });

  test("returns no lines for two empty texts", () => {
    assert.deepEqual(renderLineDiff("", ""), []);
  });

  test("rejects a missing target", () => {
    assert.throws(() => Reflect.apply(renderLineDiff, undefined, ["a", 3]), {
      name: "TypeError",
      message: "target must be a string, got number",
    });
  });
});
