import { program, Command, InvalidArgumentError } from "commander";
import { dirname, join } from "node:path";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { runGitHub } from "./github-command.js";
import { runBitwarden } from "./bitwarden-command.js";
import type { CommandResult, SharedOptions } from "./types.js";

// Get version from package.json
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJson = JSON.parse(
  readFileSync(join(__dirname, "../..", "package.json"), "utf-8")
) as { version: string };

// =============================================================================
// Shared CLI Options
// =============================================================================

export function parseRetries(value: string): number {
  const retries = Number(value);
  if (!Number.isInteger(retries) || retries < 0) {
    throw new InvalidArgumentError("Must be a non-negative integer.");
  }
  return retries;
}

/**
 * Adds shared options to a command.
 */
function addSharedOptions(cmd: Command): Command {
  return cmd
    .requiredOption(
      "-c, --config <path>",
      "Path to the TOML or YAML file describing the target state"
    )
    .option(
      "-r, --retries <number>",
      "Number of retries for network operations (0 to disable)",
      parseRetries,
      3
    )
    .option(
      "--fail-on-diff",
      "Exit with code 1 when any difference is found"
    )
    .option("--no-color", "Print the diff without colours");
}

function exitWith(run: Promise<CommandResult>): void {
  run
    .then(({ exitCode }) => {
      process.exitCode = exitCode;
    })
    .catch((error: unknown) => {
      console.error("Fatal error:", error);
      process.exit(1);
    });
}

// =============================================================================
// CLI Program
// =============================================================================

program
  .name("access-diff")
  .description(
    "Compare GitHub and Bitwarden organizations against a declared target state"
  )
  .version(packageJson.version);

const githubCommand = new Command("github")
  .description(
    "Compare members, teams and team memberships of a GitHub organization (needs GITHUB_TOKEN)"
  )
  .action((opts: SharedOptions) => {
    exitWith(runGitHub(opts));
  });

addSharedOptions(githubCommand);
program.addCommand(githubCommand);

const bitwardenCommand = new Command("bitwarden")
  .description(
    "Compare members, groups and collections of a Bitwarden organization (needs BITWARDEN_CLIENT_ID and BITWARDEN_CLIENT_SECRET)"
  )
  .action((opts: SharedOptions) => {
    exitWith(runBitwarden(opts));
  });

addSharedOptions(bitwardenCommand);
program.addCommand(bitwardenCommand);

export { program };
