import chalk from "chalk";
import { plainStyle, type DiffStyle } from "../diff/index.js";

export const colorStyle: DiffStyle = {
  header: (line) => chalk.bold(line),
  added: (line) => chalk.green(line),
  removed: (line) => chalk.red(line),
};

export function selectStyle(color: boolean): DiffStyle {
  return color ? colorStyle : plainStyle;
}
