import type { DiffCounts, DiffResult } from "./diff-engine.js";
import { renderLineDiff, splitLines } from "./line-diff.js";

export interface DiffHeaders {
  add: string;
  remove: string;
  change: string;
}

export interface MembershipHeaders {
  add: string;
  remove: string;
}

/**
 * Hooks for decorating rendered lines, e.g. with terminal colours.
 * Each receives a complete line and must not change its text.
 */
export interface DiffStyle {
  header(line: string): string;
  added(line: string): string;
  removed(line: string): string;
}

const identity = (line: string): string => line;

export const plainStyle: DiffStyle = {
  header: identity,
  added: identity,
  removed: identity,
};

function indent(text: string): string[] {
  return splitLines(text).map((line) => `  ${line}`);
}

function styleDiffLine(line: string, style: DiffStyle): string {
  if (line.startsWith("+ ")) return style.added(line);
  if (line.startsWith("- ")) return style.removed(line);
  return line;
}

/**
 * Render a diff as printable lines. Sections without entries print nothing,
 * not even their header.
 */
export function renderDiff<E>(
  diff: DiffResult<E>,
  headers: DiffHeaders,
  style: DiffStyle = plainStyle
): string[] {
  const { kind } = diff;
  const lines: string[] = [];

  if (diff.toAdd.length > 0) {
    lines.push(style.header(headers.add));
    for (const entity of diff.toAdd) {
      lines.push("");
      lines.push(...indent(kind.render(entity)).map((l) => style.added(l)));
    }
    lines.push("");
  }

  if (diff.toRemove.length > 0) {
    lines.push(style.header(headers.remove));
    for (const entity of diff.toRemove) {
      lines.push("");
      lines.push(...indent(kind.render(entity)).map((l) => style.removed(l)));
    }
    lines.push("");
  }

  if (diff.toChange.length > 0) {
    lines.push(style.header(headers.change));
    for (const change of diff.toChange) {
      lines.push("");
      const diffLines = renderLineDiff(
        kind.render(change.actual),
        kind.render(change.target)
      );
      lines.push(...diffLines.map((l) => styleDiffLine(l, style)));
    }
    lines.push("");
  }

  return lines;
}

/**
 * Compact listing for relationship kinds, which are only ever added or
 * removed: one `label` per line under each header.
 */
export function renderMembershipDiff<E>(
  diff: DiffResult<E>,
  headers: MembershipHeaders,
  label: (entity: E) => string,
  style: DiffStyle = plainStyle
): string[] {
  const lines: string[] = [];

  if (diff.toRemove.length > 0) {
    lines.push(style.header(headers.remove), "");
    for (const entity of diff.toRemove) {
      lines.push(style.removed(`  ${label(entity)}`));
    }
    lines.push("");
  }

  if (diff.toAdd.length > 0) {
    lines.push(style.header(headers.add), "");
    for (const entity of diff.toAdd) {
      lines.push(style.added(`  ${label(entity)}`));
    }
    lines.push("");
  }

  return lines;
}

export function formatDiffSummary(counts: DiffCounts): string {
  const parts: string[] = [];

  if (counts.add > 0) {
    parts.push(`${counts.add} to add`);
  }
  if (counts.change > 0) {
    parts.push(`${counts.change} to change`);
  }
  if (counts.remove > 0) {
    parts.push(`${counts.remove} to remove`);
  }

  if (parts.length === 0) {
    return "No differences found.";
  }
  return `Summary: ${parts.join(", ")}`;
}
