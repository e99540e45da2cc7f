import chalk from "chalk";

const PAINTERS = {
  red: chalk.red,
  green: chalk.green,
  yellow: chalk.yellow,
  cyan: chalk.cyan,
  gray: chalk.gray,
} satisfies Record<string, (text: string) => string>;

export type TerminalColor = keyof typeof PAINTERS;

export function colorize(text: string, color: TerminalColor): string {
  return text ? PAINTERS[color](text) : text;
}
