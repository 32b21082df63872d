/**
 * Theme
 *
 * Styles used by the screen components. The TUI is drawn on stderr, so the
 * default theme takes its color level from stderr rather than stdout.
 */

import { Chalk, chalkStderr, type ChalkInstance } from "chalk";

export interface Theme {
  accent: (text: string) => string;
  fg: (text: string) => string;
  dim: (text: string) => string;
  bold: (text: string) => string;
  selectedTab: (text: string) => string;
  highlighted: (text: string) => string;
  error: (text: string) => string;
  /** ink color for focused panel borders; unset draws them uncolored */
  border?: string;
}

export function createTheme(chalk: ChalkInstance = chalkStderr): Theme {
  return {
    accent: (text) => chalk.rgb(175, 135, 255)(text),
    fg: (text) => text,
    dim: (text) => chalk.dim(text),
    bold: (text) => chalk.bold(text),
    selectedTab: (text) => chalk.white.bold.underline(text),
    highlighted: (text) => chalk.black.bgRgb(175, 135, 255)(text),
    error: (text) => chalk.red(text),
    border: chalk.level > 0 ? "#af87ff" : undefined,
  };
}

/** Theme without escape codes, for tests and dumb terminals */
export const PLAIN_THEME: Theme = createTheme(new Chalk({ level: 0 }));
