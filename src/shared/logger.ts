import chalk from "chalk";
import { sanitizeCredentials } from "./sanitize-utils.js";

export interface ILogger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  debug(message: string): void;
  /** Progress of a multi-step fetch, e.g. `[2/5] Fetching members of team 'x'`. */
  progress(current: number, total: number, message: string): void;
}

export interface LoggerOptions {
  debug?: boolean;
}

/**
 * Console logger. Diff output goes to stdout through `info`; progress,
 * warnings and errors go to stderr so stdout can be redirected to a file.
 */
export class Logger implements ILogger {
  private readonly debugEnabled: boolean;

  constructor(options: LoggerOptions = {}) {
    this.debugEnabled =
      options.debug ?? Boolean(process.env.ACCESS_DIFF_DEBUG);
  }

  info(message: string): void {
    console.log(message);
  }

  warn(message: string): void {
    console.error(chalk.yellow(`⚠️  ${sanitizeCredentials(message)}`));
  }

  error(message: string): void {
    console.error(chalk.red(`✗ ${sanitizeCredentials(message)}`));
  }

  debug(message: string): void {
    if (this.debugEnabled) {
      console.error(chalk.gray(`[debug] ${sanitizeCredentials(message)}`));
    }
  }

  progress(current: number, total: number, message: string): void {
    console.error(chalk.cyan(`[${current}/${total}]`) + ` ${message}`);
  }
}

export const logger = new Logger();
