import { existsSync } from "node:fs";
import { resolve } from "node:path";
import type { ILogger } from "../shared/logger.js";
import type { Env } from "./types.js";

/**
 * Resolve the config path, or log why it cannot be used.
 */
export function resolveConfigPath(
  config: string,
  log: ILogger
): string | null {
  const configPath = resolve(config);
  if (!existsSync(configPath)) {
    log.error(`Config file not found: ${configPath}`);
    return null;
  }
  return configPath;
}

/**
 * Read a required environment variable, or log that it is missing.
 */
export function requireEnv(
  env: Env,
  name: string,
  log: ILogger
): string | null {
  const value = env[name];
  if (!value) {
    log.error(
      `Expected ${name} environment variable to be set. See also --help.`
    );
    return null;
  }
  return value;
}

/**
 * Load the target state, logging a config error instead of throwing it.
 */
export function loadTarget<T>(
  load: (path: string) => T,
  configPath: string,
  log: ILogger
): T | null {
  try {
    return load(configPath);
  } catch (error) {
    log.error(error instanceof Error ? error.message : String(error));
    return null;
  }
}
