// Diff report (printed diffs plus totals)
export {
  DiffReport,
  formatDiffReportMarkdown,
  writeDiffReportSummary,
  type DiffReportSection,
} from "./diff-report.js";

// Terminal styling
export { colorStyle, selectStyle } from "./diff-style.js";
