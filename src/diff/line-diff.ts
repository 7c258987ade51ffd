import { diffArrays } from "diff";

// =============================================================================
// Types
// =============================================================================

export type OpcodeTag = "equal" | "delete" | "insert" | "replace";

/**
 * A maximal run of one classification. `[i1, i2)` indexes the actual lines
 * and `[j1, j2)` the target lines; consecutive opcodes leave no gaps.
 */
export interface LineOpcode {
  tag: OpcodeTag;
  i1: number;
  i2: number;
  j1: number;
  j2: number;
}

// =============================================================================
// Helpers
// =============================================================================

function assertText(value: unknown, name: string): asserts value is string {
  if (typeof value !== "string") {
    throw new TypeError(
      `${name} must be a string, got ${value === null ? "null" : typeof value}`
    );
  }
}

/**
 * Split text into lines. A trailing line break does not produce an empty
 * last line.
 */
export function splitLines(text: string): string[] {
  assertText(text, "text");
  if (text === "") return [];
  const lines = text.split(/\r\n|\r|\n/);
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}

// =============================================================================
// Alignment
// =============================================================================

/**
 * Align two line sequences along a longest common subsequence and group the
 * result into opcode runs.
 */
export function computeLineOpcodes(
  actualLines: string[],
  targetLines: string[]
): LineOpcode[] {
  const opcodes: LineOpcode[] = [];
  let i = 0;
  let j = 0;
  // Start of the pending run of non-equal lines
  let pendingI = 0;
  let pendingJ = 0;

  const flushPending = (): void => {
    const deleted = i > pendingI;
    const inserted = j > pendingJ;
    if (!deleted && !inserted) return;
    const tag: OpcodeTag =
      deleted && inserted ? "replace" : deleted ? "delete" : "insert";
    opcodes.push({ tag, i1: pendingI, i2: i, j1: pendingJ, j2: j });
  };

  for (const change of diffArrays(actualLines, targetLines)) {
    const count = change.value.length;
    if (count === 0) continue;

    if (change.removed) {
      i += count;
    } else if (change.added) {
      j += count;
    } else {
      flushPending();
      opcodes.push({ tag: "equal", i1: i, i2: i + count, j1: j, j2: j + count });
      i += count;
      j += count;
      pendingI = i;
      pendingJ = j;
    }
  }
  flushPending();

  return opcodes;
}

// =============================================================================
// Rendering
// =============================================================================

/**
 * Line diff of two renderings. Unlike a unified diff, runs of equal lines
 * are printed in full.
 */
export function renderLineDiff(actual: string, target: string): string[] {
  assertText(actual, "actual");
  assertText(target, "target");

  const actualLines = splitLines(actual);
  const targetLines = splitLines(target);
  const lines: string[] = [];

  for (const op of computeLineOpcodes(actualLines, targetLines)) {
    const removed = actualLines.slice(op.i1, op.i2);
    const added = targetLines.slice(op.j1, op.j2);

    switch (op.tag) {
      case "equal":
        lines.push(...removed.map((line) => `  ${line}`));
        break;
      case "delete":
        lines.push(...removed.map((line) => `- ${line}`));
        break;
      case "insert":
        lines.push(...added.map((line) => `+ ${line}`));
        break;
      case "replace":
        lines.push(...removed.map((line) => `- ${line}`));
        lines.push(...added.map((line) => `+ ${line}`));
        break;
      default: {
        const unknown: never = op.tag;
        throw new Error(`Invalid diff operation: ${String(unknown)}`);
      }
    }
  }

  return lines;
}
