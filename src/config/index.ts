// Re-export all types
export type {
  RawConfig,
  ConfigFormat,
  GitHubTarget,
  BitwardenTarget,
} from "./types.js";

// Loading functions
export {
  detectConfigFormat,
  parseRawConfig,
  loadRawConfig,
  loadGitHubConfig,
  loadBitwardenConfig,
} from "./loader.js";

// Interpretation
export { parseGitHubConfig } from "./github-config.js";
export { parseBitwardenConfig } from "./bitwarden-config.js";
