import { readFileSync } from "node:fs";
import { extname } from "node:path";
import { parse as parseToml } from "smol-toml";
import { parse as parseYaml } from "yaml";
import { parseBitwardenConfig } from "./bitwarden-config.js";
import { parseGitHubConfig } from "./github-config.js";
import { isTable } from "./validators/field-validator.js";
import type {
  BitwardenTarget,
  ConfigFormat,
  GitHubTarget,
  RawConfig,
} from "./types.js";

/**
 * Detect the config format from the file extension. Anything that is not
 * YAML is read as TOML.
 */
export function detectConfigFormat(filePath: string): ConfigFormat {
  const ext = extname(filePath).toLowerCase();
  return ext === ".yaml" || ext === ".yml" ? "yaml" : "toml";
}

/**
 * Parse a config document without interpreting it.
 */
export function parseRawConfig(
  content: string,
  format: ConfigFormat,
  source: string
): RawConfig {
  let parsed: unknown;
  try {
    parsed = format === "yaml" ? parseYaml(content) : parseToml(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(
      `Failed to parse ${format.toUpperCase()} config at ${source}: ${message}`
    );
  }

  if (!isTable(parsed)) {
    throw new Error(`Config at ${source} must be a table at the top level`);
  }
  return parsed;
}

export function loadRawConfig(filePath: string): RawConfig {
  const content = readFileSync(filePath, "utf-8");
  return parseRawConfig(content, detectConfigFormat(filePath), filePath);
}

export function loadGitHubConfig(filePath: string): GitHubTarget {
  return parseGitHubConfig(loadRawConfig(filePath));
}

export function loadBitwardenConfig(filePath: string): BitwardenTarget {
  return parseBitwardenConfig(loadRawConfig(filePath));
}
