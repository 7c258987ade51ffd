// Entity capabilities
export {
  valueKey,
  compareStrings,
  compareFieldValues,
  compareFields,
  compareIdentities,
  type EntityKind,
  type Identity,
  type FieldValue,
} from "./entity-kind.js";

// Diff engine
export {
  computeDiff,
  countDiff,
  isEmptyDiff,
  AmbiguousIdentityError,
  type DiffEntry,
  type DiffResult,
  type DiffCounts,
  type DiffSide,
} from "./diff-engine.js";

// Line-level differ
export {
  splitLines,
  computeLineOpcodes,
  renderLineDiff,
  type LineOpcode,
  type OpcodeTag,
} from "./line-diff.js";

// Rendering
export {
  renderDiff,
  renderMembershipDiff,
  formatDiffSummary,
  plainStyle,
  type DiffHeaders,
  type MembershipHeaders,
  type DiffStyle,
} from "./renderer.js";
