// CLI command implementations
export { runGitHub } from "./github-command.js";
export { runBitwarden } from "./bitwarden-command.js";

// Dependency injection types and defaults
export {
  type IGitHubStateSource,
  type GitHubSourceFactory,
  type IBitwardenStateSource,
  type BitwardenSourceFactory,
  type SourceFactoryOptions,
  type CommandResult,
  type Env,
  defaultGitHubSourceFactory,
  defaultBitwardenSourceFactory,
} from "./types.js";

// Export command option types
export type { SharedOptions } from "./types.js";
export type { GitHubOptions } from "./github-command.js";
export type { BitwardenOptions } from "./bitwarden-command.js";
