// src/output/diff-report.ts
import { appendFileSync } from "node:fs";
import {
  countDiff,
  formatDiffSummary,
  plainStyle,
  renderDiff,
  renderMembershipDiff,
  type DiffCounts,
  type DiffHeaders,
  type DiffResult,
  type DiffStyle,
  type MembershipHeaders,
} from "../diff/index.js";
import type { ILogger } from "../shared/logger.js";

export interface DiffReportSection {
  title: string;
  /** Uncoloured lines, as rendered. */
  lines: string[];
}

/**
 * Collects the rendered diffs of one run. Each diff is printed as soon as
 * it is added, and kept for the totals and the step summary.
 */
export class DiffReport {
  private readonly sections: DiffReportSection[] = [];
  private readonly totals: DiffCounts = { add: 0, remove: 0, change: 0 };

  constructor(
    private readonly log: ILogger,
    private readonly style: DiffStyle = plainStyle
  ) {}

  addDiff<E>(title: string, diff: DiffResult<E>, headers: DiffHeaders): void {
    this.print(renderDiff(diff, headers, this.style));
    this.record(title, renderDiff(diff, headers), countDiff(diff));
  }

  addMembershipDiff<E>(
    title: string,
    diff: DiffResult<E>,
    headers: MembershipHeaders,
    label: (entity: E) => string
  ): void {
    this.print(renderMembershipDiff(diff, headers, label, this.style));
    this.record(
      title,
      renderMembershipDiff(diff, headers, label),
      countDiff(diff)
    );
  }

  getTotals(): DiffCounts {
    return { ...this.totals };
  }

  getSections(): DiffReportSection[] {
    return this.sections;
  }

  hasDifferences(): boolean {
    return (
      this.totals.add + this.totals.remove + this.totals.change > 0
    );
  }

  private print(lines: string[]): void {
    for (const line of lines) {
      this.log.info(line);
    }
  }

  private record(title: string, lines: string[], counts: DiffCounts): void {
    this.totals.add += counts.add;
    this.totals.remove += counts.remove;
    this.totals.change += counts.change;
    if (lines.length > 0) {
      this.sections.push({ title, lines });
    }
  }
}

export function formatDiffReportMarkdown(
  report: DiffReport,
  heading: string
): string {
  const lines: string[] = [];

  lines.push(`## ${heading}`);
  lines.push("");

  for (const section of report.getSections()) {
    lines.push(`### ${section.title}`);
    lines.push("");
    lines.push("```diff");
    lines.push(...section.lines);
    lines.push("```");
    lines.push("");
  }

  lines.push(`**${formatDiffSummary(report.getTotals())}**`);

  return lines.join("\n");
}

/**
 * Append the report to the GitHub Actions step summary file
 * (`GITHUB_STEP_SUMMARY`), when running there.
 */
export function writeDiffReportSummary(
  report: DiffReport,
  heading: string,
  summaryPath: string | undefined
): void {
  if (!summaryPath) return;

  const markdown = formatDiffReportMarkdown(report, heading);
  appendFileSync(summaryPath, "\n" + markdown + "\n");
}
